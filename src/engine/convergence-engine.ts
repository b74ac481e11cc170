/**
 * CONVERGENCE ENGINE
 * ==================
 *
 * Takes a stack directory from whatever it holds to the target version:
 *
 *   idle -> loading -> migrating -> reconciling -> done
 *                 \________\______________\______-> failed
 *
 * Every migration step is checkpointed before the next one starts, in a
 * fixed order: compose definition, then .env, then the state record with
 * the step id added. A run that stops anywhere can be started again and
 * resumes at the first uncommitted step.
 *
 * installedVersion only moves forward, and only after reconciliation
 * succeeded.
 */

import { EventEmitter } from 'events';
import _ from 'lodash';
import { ComposeStore } from '../compose/compose-store';
import { EnvFile, type EnvDeclarations } from '../compose/env-file';
import type { ComposeDefinition } from '../compose/types';
import { memoizedDiscovery } from '../discovery/bounded-discovery';
import type { DiscoveredDevice, DiscoveryAdapter } from '../discovery/types';
import { DEFAULT_DISCOVERY_TIMEOUT_MS } from '../lib/constants';
import {
	DowngradeError,
	MigrationFailureError,
	ReconciliationFailureError,
	describeError,
	toError,
} from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import type { MigrationRegistry } from '../migrations/migration-registry';
import type { MigrationStep } from '../migrations/types';
import { toRuntimeSpecs } from '../runtime/runtime-spec';
import type { ReconcileReport, RuntimeAdapter } from '../runtime/types';
import { acquireLock } from '../state/lock-file';
import { StateStore } from '../state/state-store';
import { emptyStateRecord, hasApplied, withApplied, type StateRecord } from '../state/types';
import type {
	ConvergeOptions,
	ConvergenceEngineEvents,
	ConvergenceFailed,
	ConvergenceResult,
	EnginePhase,
	FailurePhase,
} from './types';

export interface ConvergenceEngineOptions {
	stackDir: string;
	registry: MigrationRegistry;
	/** Required unless every run passes reconcile: false */
	runtime?: RuntimeAdapter;
	discovery?: DiscoveryAdapter;
	discoveryTimeoutMs?: number;
	logger?: Logger;
}

interface Workspace {
	state: StateRecord;
	compose: ComposeDefinition;
	env: EnvDeclarations;
}

class PhaseFailure extends Error {
	constructor(
		readonly phase: FailurePhase,
		readonly error: Error,
		readonly failedStepId?: number,
		readonly report?: ReconcileReport,
	) {
		super(error.message);
		this.name = 'PhaseFailure';
	}
}

export class ConvergenceEngine extends EventEmitter {
	private phase: EnginePhase = 'idle';
	private lastCompletedPhase: EnginePhase = 'idle';
	private running = false;

	private readonly stackDir: string;
	private readonly registry: MigrationRegistry;
	private readonly runtime?: RuntimeAdapter;
	private readonly discovery?: DiscoveryAdapter;
	private readonly discoveryTimeoutMs: number;
	private readonly rootLogger?: Logger;
	private readonly logger: ComponentLogger;
	private readonly stateStore: StateStore;
	private readonly composeStore: ComposeStore;
	private readonly envFile: EnvFile;

	constructor(options: ConvergenceEngineOptions) {
		super();
		this.stackDir = options.stackDir;
		this.registry = options.registry;
		this.runtime = options.runtime;
		this.discovery = options.discovery;
		this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? DEFAULT_DISCOVERY_TIMEOUT_MS;
		this.rootLogger = options.logger;
		this.logger = new ComponentLogger(options.logger, 'ConvergenceEngine');
		this.stateStore = new StateStore(options.stackDir, options.logger);
		this.composeStore = new ComposeStore(options.stackDir, options.logger);
		this.envFile = new EnvFile(options.stackDir);
	}

	public getPhase(): EnginePhase {
		return this.phase;
	}

	/**
	 * Converge the stack directory to options.target.
	 *
	 * Throws LockHeldError when another command holds the stack; every other
	 * problem is reported through the returned result.
	 */
	public async converge(options: ConvergeOptions): Promise<ConvergenceResult> {
		if (this.running) {
			throw new Error('Convergence is already running on this engine');
		}
		this.running = true;
		this.phase = 'idle';
		this.lastCompletedPhase = 'idle';

		try {
			if (options.lock) {
				return await this.run(options);
			}
			const lock = await acquireLock(this.stackDir, this.rootLogger);
			try {
				return await this.run(options);
			} finally {
				await lock.release();
			}
		} finally {
			this.running = false;
		}
	}

	private async run(options: ConvergeOptions): Promise<ConvergenceResult> {
		const applied: number[] = [];
		const skipped: number[] = [];
		const warnings: string[] = [];
		let workspace: Workspace | undefined;

		try {
			this.setPhase('loading');
			workspace = await this.load();
			const installed = workspace.state.installedVersion;
			if (options.target.lessThan(installed)) {
				throw new PhaseFailure('loading', new DowngradeError(installed.toString(), options.target.toString()));
			}
			this.lastCompletedPhase = 'loading';

			this.setPhase('migrating');
			const discover = memoizedDiscovery(this.discovery, {
				timeoutMs: this.discoveryTimeoutMs,
				logger: this.rootLogger,
			});
			for (const step of this.registry.applicable(installed, options.target)) {
				if (hasApplied(workspace.state, step.id)) {
					this.logger.debugSync('Migration already applied', { migration: step.id, name: step.name });
					skipped.push(step.id);
					this.emit('step-skipped', step);
					continue;
				}
				workspace = await this.applyStep(step, workspace, discover);
				applied.push(step.id);
				this.emit('step-applied', step, workspace.state);
			}
			this.lastCompletedPhase = 'migrating';

			let report: ReconcileReport | undefined;
			if (options.reconcile !== false) {
				this.setPhase('reconciling');
				report = await this.reconcile(workspace, warnings);
				this.lastCompletedPhase = 'reconciling';
			}

			const state = await this.persistVersion(workspace.state, options.target, options.reconcile !== false);
			this.setPhase('done');
			this.logger.infoSync('Stack converged', {
				operation: 'converge',
				version: state.installedVersion.toString(),
				applied,
			});
			return {
				status: 'done',
				installedVersion: state.installedVersion,
				applied,
				skipped,
				state,
				...(report ? { report } : {}),
				warnings,
			};
		} catch (error) {
			return this.fail(error, applied, workspace?.state);
		}
	}

	private async load(): Promise<Workspace> {
		try {
			const loaded = await this.stateStore.load();
			const state = loaded.status === 'found' ? loaded.record : emptyStateRecord();
			if (loaded.status === 'not-found') {
				this.logger.infoSync('No state record, starting from 0.0.0', { stackDir: this.stackDir });
			}

			const compose = await this.composeStore.read();
			const env = await this.envFile.read();

			if (state.descriptorsDigest) {
				const digest = await this.composeStore.digest();
				if (digest !== undefined && digest !== state.descriptorsDigest) {
					this.logger.warnSync('Compose definition was edited since the last run', {
						path: this.composeStore.getPath(),
					});
				}
			}

			return { state, compose, env };
		} catch (error) {
			throw new PhaseFailure('loading', toError(error));
		}
	}

	private async applyStep(
		step: MigrationStep,
		workspace: Workspace,
		discover: () => Promise<DiscoveredDevice[]>,
	): Promise<Workspace> {
		this.logger.infoSync('Applying migration', { operation: 'migrate', migration: step.id, name: step.name });

		try {
			const output = await step.transform(
				{
					state: _.cloneDeep(workspace.state),
					services: workspace.compose.services,
					env: { ...workspace.env },
				},
				{ discover, logger: new ComponentLogger(this.rootLogger, `migration:${step.name}`) },
			);
			output.services.assertValid(output.env);

			const compose: ComposeDefinition = { ...workspace.compose, services: output.services };
			const descriptorsDigest = await this.composeStore.write(compose);
			await this.envFile.write(output.env);

			// The engine owns version and applied ids; a step only contributes flags
			const state = await this.stateStore.save(
				withApplied(
					{
						...output.state,
						installedVersion: workspace.state.installedVersion,
						appliedMigrations: workspace.state.appliedMigrations,
						descriptorsDigest,
					},
					step.id,
				),
			);

			return { state, compose, env: output.env };
		} catch (error) {
			throw new PhaseFailure('migrating', new MigrationFailureError(step.id, step.name, error), step.id);
		}
	}

	private async reconcile(workspace: Workspace, warnings: string[]): Promise<ReconcileReport> {
		if (!this.runtime) {
			throw new PhaseFailure('reconciling', new Error('No container runtime configured'));
		}

		let report: ReconcileReport;
		try {
			const result = toRuntimeSpecs(workspace.compose.services, workspace.env, this.stackDir);
			for (const warning of result.warnings) {
				this.logger.warnSync(warning, { operation: 'reconcile' });
				warnings.push(warning);
			}
			report = await this.runtime.reconcile(result.specs, result.unresolved);
		} catch (error) {
			throw new PhaseFailure('reconciling', toError(error));
		}

		if (!report.converged) {
			throw new PhaseFailure('reconciling', new ReconciliationFailureError(report), undefined, report);
		}
		return report;
	}

	private async persistVersion(state: StateRecord, target: ConvergeOptions['target'], reconciled: boolean): Promise<StateRecord> {
		const phase: FailurePhase = reconciled ? 'reconciling' : 'migrating';
		if (state.installedVersion.equals(target) && state.updatedAt) {
			return state;
		}
		try {
			return await this.stateStore.save({ ...state, installedVersion: target });
		} catch (error) {
			throw new PhaseFailure(phase, toError(error));
		}
	}

	private fail(error: unknown, applied: number[], state: StateRecord | undefined): ConvergenceFailed {
		const failure = error instanceof PhaseFailure ? error : new PhaseFailure(this.failurePhase(), toError(error));
		this.setPhase('failed');
		this.logger.errorSync('Convergence failed', failure.error, {
			operation: 'converge',
			phase: failure.phase,
			lastCompletedPhase: this.lastCompletedPhase,
			...(failure.failedStepId !== undefined ? { migration: failure.failedStepId } : {}),
		});
		return {
			status: 'failed',
			phase: failure.phase,
			lastCompletedPhase: this.lastCompletedPhase,
			...(failure.failedStepId !== undefined ? { failedStepId: failure.failedStepId } : {}),
			error: failure.error,
			applied,
			...(state ? { state } : {}),
			...(failure.report ? { report: failure.report } : {}),
		};
	}

	private failurePhase(): FailurePhase {
		return this.phase === 'loading' || this.phase === 'migrating' || this.phase === 'reconciling'
			? this.phase
			: 'loading';
	}

	private setPhase(phase: EnginePhase): void {
		const previous = this.phase;
		this.phase = phase;
		this.logger.debugSync(`Phase ${previous} -> ${phase}`);
		this.emit('phase-changed', phase, previous);
	}

	// Typed event emitter methods
	public on<K extends keyof ConvergenceEngineEvents>(event: K, listener: ConvergenceEngineEvents[K]): this {
		return super.on(event, listener);
	}

	public emit<K extends keyof ConvergenceEngineEvents>(
		event: K,
		...args: Parameters<ConvergenceEngineEvents[K]>
	): boolean {
		return super.emit(event, ...args);
	}
}

export function describeFailure(result: ConvergenceFailed): string {
	const step = result.failedStepId !== undefined ? ` at migration ${result.failedStepId}` : '';
	return `Failed during ${result.phase}${step}: ${describeError(result.error)}`;
}
