import { z } from 'zod';
import { Version } from '../version/version';

export type MigrationId = number;

export type ServiceFlagValue = string | number | boolean;

export interface StateRecord {
	installedVersion: Version;
	/** Sorted, unique ids of committed migration steps */
	appliedMigrations: MigrationId[];
	serviceFlags: Record<string, ServiceFlagValue>;
	/** SHA-256 of the compose definition written at the last checkpoint */
	descriptorsDigest?: string;
	/** ISO timestamp of the last save */
	updatedAt?: string;
}

export type LoadResult =
	| { status: 'found'; record: StateRecord }
	| { status: 'not-found' };

export const STATE_SCHEMA_VERSION = 1;

/**
 * On-disk representation of a StateRecord
 */
export const StateFileSchema = z.object({
	schemaVersion: z.literal(STATE_SCHEMA_VERSION),
	installedVersion: z.string().refine(Version.isValid, { message: 'not a MAJOR.MINOR.PATCH version' }),
	appliedMigrations: z.array(z.number().int().nonnegative()),
	serviceFlags: z.record(z.union([z.string(), z.number(), z.boolean()])),
	descriptorsDigest: z.string().optional(),
	updatedAt: z.string().optional(),
});

export type StateFile = z.infer<typeof StateFileSchema>;

export function emptyStateRecord(): StateRecord {
	return {
		installedVersion: Version.ZERO,
		appliedMigrations: [],
		serviceFlags: {},
	};
}

export function hasApplied(record: StateRecord, id: MigrationId): boolean {
	return record.appliedMigrations.includes(id);
}

export function withApplied(record: StateRecord, id: MigrationId): StateRecord {
	if (hasApplied(record, id)) {
		return record;
	}
	return {
		...record,
		appliedMigrations: [...record.appliedMigrations, id].sort((a, b) => a - b),
	};
}
