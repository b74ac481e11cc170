/**
 * CONTAINER RUNTIME
 * =================
 *
 * Runtime adapter over primitive container operations:
 *   observe -> plan (pure) -> remove -> update per service
 *
 * Every removal settles before any service is created, recreated or
 * started, so names and host ports are free. Within a phase services run in
 * parallel. A failure is recorded against its service only; the others
 * still run to completion before the report is returned.
 */

import _ from 'lodash';
import { describeError, toError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import { planReconciliation } from './reconcile-plan';
import type {
	ContainerOperations,
	ReconcileAction,
	ReconcileReport,
	RuntimeAdapter,
	RuntimeServiceSpec,
	ServiceOutcome,
	UnresolvedService,
} from './types';

export class ContainerRuntime implements RuntimeAdapter {
	private readonly logger: ComponentLogger;

	constructor(
		private readonly operations: ContainerOperations,
		logger?: Logger,
	) {
		this.logger = new ComponentLogger(logger, 'ContainerRuntime');
	}

	/**
	 * Containers of services named in `untouched` are neither removed nor
	 * replaced
	 */
	public async plan(desired: RuntimeServiceSpec[], untouched: string[] = []): Promise<ReconcileAction[]> {
		const skip = new Set(untouched);
		const observed = (await this.operations.list()).filter((container) => !skip.has(container.service));
		return planReconciliation(
			desired.filter((spec) => !skip.has(spec.name)),
			observed,
		);
	}

	public async reconcile(desired: RuntimeServiceSpec[], unresolved: UnresolvedService[] = []): Promise<ReconcileReport> {
		const plan = await this.plan(
			desired,
			unresolved.map((item) => item.service),
		);
		const byService = _.groupBy(plan, 'service');

		this.logger.infoSync('Reconciling containers', {
			operation: 'reconcile',
			desired: desired.length,
			steps: plan.filter((step) => step.action !== 'unchanged').length,
		});

		const removalErrors = await this.runPhase(plan.filter((step) => step.action === 'remove'));
		const updateErrors = await this.runPhase(
			plan.filter((step) => step.action !== 'remove' && !removalErrors.has(step.service)),
		);

		const outcomes: ServiceOutcome[] = Object.keys(byService).map((service) => {
			const actions = byService[service].map((step) => step.action);
			const error = removalErrors.get(service) ?? updateErrors.get(service);
			if (!error) {
				return { service, actions, status: 'ok' };
			}
			this.logger.errorSync('Service failed to converge', error, { service, actions });
			return { service, actions, status: 'failed', error: describeError(error) };
		});
		for (const item of unresolved) {
			this.logger.errorSync('Service has no runtime spec', new Error(item.error), { service: item.service });
			outcomes.push({ service: item.service, actions: [], status: 'failed', error: item.error });
		}
		outcomes.sort((a, b) => a.service.localeCompare(b.service));

		const converged = outcomes.every((outcome) => outcome.status === 'ok');
		this.logger.infoSync(converged ? 'Containers converged' : 'Containers partially converged', {
			operation: 'reconcile',
			failed: outcomes.filter((outcome) => outcome.status === 'failed').map((outcome) => outcome.service),
		});

		return { outcomes, converged };
	}

	/**
	 * Runs each service's steps in order, services in parallel, and returns
	 * the error of every service that failed
	 */
	private async runPhase(steps: ReconcileAction[]): Promise<Map<string, Error>> {
		const byService = _.groupBy(steps, 'service');
		const services = Object.keys(byService);

		const settled = await Promise.allSettled(
			services.map(async (service) => {
				for (const step of byService[service]) {
					await this.execute(step);
				}
			}),
		);

		const errors = new Map<string, Error>();
		settled.forEach((result, index) => {
			if (result.status === 'rejected') {
				errors.set(services[index], toError(result.reason));
			}
		});
		return errors;
	}

	private async execute(step: ReconcileAction): Promise<void> {
		switch (step.action) {
			case 'create':
				this.logger.infoSync('Creating container', { service: step.service, image: step.spec.image });
				await this.operations.create(step.spec);
				break;
			case 'recreate':
				this.logger.infoSync('Recreating container', { service: step.service, image: step.spec.image });
				await this.operations.remove(step.container);
				await this.operations.create(step.spec);
				break;
			case 'start':
				this.logger.infoSync('Starting container', { service: step.service });
				await this.operations.start(step.container);
				break;
			case 'remove':
				this.logger.infoSync('Removing container', { service: step.service, container: step.container.name });
				await this.operations.remove(step.container);
				break;
			case 'unchanged':
				break;
		}
	}
}
