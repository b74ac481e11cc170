/**
 * Reconciliation planning
 *
 * Pure diff of desired specs against observed containers:
 *   missing                      -> create
 *   digest differs               -> recreate
 *   same digest, not running     -> start
 *   same digest, running         -> unchanged
 *   not desired                  -> remove
 *   duplicate containers         -> extras removed
 *
 * Removals come first so ports and names are free before anything is created.
 */

import _ from 'lodash';
import type { ObservedContainer, ReconcileAction, RuntimeServiceSpec } from './types';

export function planReconciliation(
	desired: RuntimeServiceSpec[],
	observed: ObservedContainer[],
): ReconcileAction[] {
	const removals: ReconcileAction[] = [];
	const updates: ReconcileAction[] = [];

	const desiredByName = new Map(desired.map((spec) => [spec.name, spec]));
	const observedByService = _.groupBy(_.sortBy(observed, 'name'), 'service');

	for (const service of Object.keys(observedByService).sort()) {
		if (!desiredByName.has(service)) {
			for (const container of observedByService[service]) {
				removals.push({ action: 'remove', service, container });
			}
		}
	}

	for (const spec of _.sortBy(desired, 'name')) {
		const containers = observedByService[spec.name] ?? [];
		const primary =
			containers.find((c) => c.digest === spec.digest && c.running) ??
			containers.find((c) => c.digest === spec.digest) ??
			containers[0];

		for (const container of containers) {
			if (container !== primary) {
				removals.push({ action: 'remove', service: spec.name, container });
			}
		}

		if (!primary) {
			updates.push({ action: 'create', service: spec.name, spec });
		} else if (primary.digest !== spec.digest) {
			updates.push({ action: 'recreate', service: spec.name, container: primary, spec });
		} else if (!primary.running) {
			updates.push({ action: 'start', service: spec.name, container: primary });
		} else {
			updates.push({ action: 'unchanged', service: spec.name, container: primary });
		}
	}

	return [...removals, ...updates];
}

/**
 * Whether a plan would touch the runtime at all
 */
export function isNoop(plan: ReconcileAction[]): boolean {
	return plan.every((step) => step.action === 'unchanged');
}
