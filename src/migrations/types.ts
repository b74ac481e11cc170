import type { ServiceDescriptorSet } from '../compose/service-descriptor-set';
import type { EnvDeclarations } from '../compose/env-file';
import type { DiscoveredDevice } from '../discovery/types';
import type { ComponentLogger } from '../logging/component-logger';
import type { StateRecord } from '../state/types';
import type { Version } from '../version/version';

/**
 * Everything a step may change. The engine hands each step deep copies;
 * whatever the step returns becomes the next checkpoint.
 */
export interface MigrationInput {
	state: StateRecord;
	services: ServiceDescriptorSet;
	env: EnvDeclarations;
}

export type MigrationOutput = MigrationInput;

export interface MigrationContext {
	/** Time-bounded; resolves to an empty list when nothing answers */
	discover(): Promise<DiscoveredDevice[]>;
	logger: ComponentLogger;
}

export interface VersionRange {
	/** Inclusive */
	lower: Version;
	/** Exclusive */
	upper?: Version;
}

export interface MigrationStep {
	id: number;
	name: string;
	description: string;
	range: VersionRange;
	/** Re-running on its own output changes nothing */
	idempotent: boolean;
	transform(input: MigrationInput, context: MigrationContext): MigrationOutput | Promise<MigrationOutput>;
}
