import type { ReconcileReport } from '../runtime/types';
import type { MigrationStep } from '../migrations/types';
import type { LockHandle } from '../state/lock-file';
import type { StateRecord } from '../state/types';
import type { Version } from '../version/version';

export type EnginePhase = 'idle' | 'loading' | 'migrating' | 'reconciling' | 'done' | 'failed';

export type FailurePhase = 'loading' | 'migrating' | 'reconciling';

export interface ConvergeOptions {
	target: Version;
	/** Skip the reconciling phase; defaults to true */
	reconcile?: boolean;
	/** Stack lock the caller already holds; the caller releases it */
	lock?: LockHandle;
}

export interface ConvergenceDone {
	status: 'done';
	installedVersion: Version;
	/** Steps whose transform ran in this run */
	applied: number[];
	/** Steps already committed by an earlier run */
	skipped: number[];
	state: StateRecord;
	report?: ReconcileReport;
	warnings: string[];
}

export interface ConvergenceFailed {
	status: 'failed';
	phase: FailurePhase;
	lastCompletedPhase: EnginePhase;
	failedStepId?: number;
	error: Error;
	applied: number[];
	/** Last persisted record, when one was loaded */
	state?: StateRecord;
	report?: ReconcileReport;
}

export type ConvergenceResult = ConvergenceDone | ConvergenceFailed;

export interface ConvergenceEngineEvents {
	'phase-changed': (phase: EnginePhase, previous: EnginePhase) => void;
	'step-applied': (step: MigrationStep, state: StateRecord) => void;
	'step-skipped': (step: MigrationStep) => void;
}
