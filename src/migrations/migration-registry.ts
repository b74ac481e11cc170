/**
 * MIGRATION REGISTRY
 * ==================
 *
 * Ordered catalog of migration steps.
 *
 * A step applies to an upgrade from -> to iff from <= lower < to, so a step
 * runs once when a host crosses its boundary and never on a host that is
 * already past it.
 */

import { RegistryError } from '../lib/errors';
import type { MigrationId } from '../state/types';
import type { Version } from '../version/version';
import type { MigrationStep } from './types';

export class MigrationRegistry {
	private readonly steps: readonly MigrationStep[];

	constructor(steps: Iterable<MigrationStep>) {
		this.steps = [...steps].sort((a, b) => a.id - b.id);
		this.validate();
	}

	public applicable(from: Version, to: Version): MigrationStep[] {
		return this.steps.filter((step) => from.lessThanOrEqual(step.range.lower) && step.range.lower.lessThan(to));
	}

	/**
	 * Applicable steps that have not been committed yet
	 */
	public pending(from: Version, to: Version, applied: readonly MigrationId[]): MigrationStep[] {
		const done = new Set(applied);
		return this.applicable(from, to).filter((step) => !done.has(step.id));
	}

	public get(id: MigrationId): MigrationStep | undefined {
		return this.steps.find((step) => step.id === id);
	}

	public all(): MigrationStep[] {
		return [...this.steps];
	}

	public latestLowerBound(): Version | undefined {
		return this.steps.length > 0 ? this.steps[this.steps.length - 1].range.lower : undefined;
	}

	private validate(): void {
		const seen = new Set<number>();
		let previous: MigrationStep | undefined;

		for (const step of this.steps) {
			if (!Number.isInteger(step.id) || step.id < 0) {
				throw new RegistryError(`Migration '${step.name}' has invalid id ${step.id}`);
			}
			if (seen.has(step.id)) {
				throw new RegistryError(`Duplicate migration id ${step.id}`);
			}
			seen.add(step.id);

			if (step.range.upper && !step.range.lower.lessThan(step.range.upper)) {
				throw new RegistryError(
					`Migration ${step.id} has an empty range [${step.range.lower.toString()}, ${step.range.upper.toString()})`,
				);
			}
			if (previous && step.range.lower.lessThan(previous.range.lower)) {
				throw new RegistryError(
					`Migration ${step.id} (lower ${step.range.lower.toString()}) is ordered after migration ${previous.id} (lower ${previous.range.lower.toString()})`,
				);
			}
			previous = step;
		}
	}
}
