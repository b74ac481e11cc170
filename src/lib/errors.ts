/**
 * Error classes
 *
 * UserError subclasses describe problems the operator can fix by changing
 * the invocation; the CLI maps them to a separate exit code.
 */

import type { ReconcileReport } from '../runtime/types';

export class UserError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'UserError';
	}
}

export class InvalidArgumentError extends UserError {
	constructor(message: string) {
		super(message);
		this.name = 'InvalidArgumentError';
	}
}

export class LockHeldError extends UserError {
	constructor(
		public readonly lockPath: string,
		public readonly holderPid?: number,
	) {
		super(
			holderPid !== undefined
				? `Another brewstack command (pid ${holderPid}) holds ${lockPath}`
				: `Another brewstack command holds ${lockPath}`,
		);
		this.name = 'LockHeldError';
	}
}

export class DowngradeError extends UserError {
	constructor(
		public readonly installed: string,
		public readonly target: string,
	) {
		super(`Installed version ${installed} is newer than target ${target}; downgrades are not supported`);
		this.name = 'DowngradeError';
	}
}

export class NotAStackDirectoryError extends UserError {
	constructor(public readonly dir: string) {
		super(`'${dir}' is not a brewstack directory`);
		this.name = 'NotAStackDirectoryError';
	}
}

export class VersionParseError extends Error {
	constructor(input: string) {
		super(`Invalid version '${input}': expected MAJOR.MINOR.PATCH`);
		this.name = 'VersionParseError';
	}
}

export class CorruptStateError extends Error {
	constructor(
		public readonly path: string,
		reason: string,
	) {
		super(`State record ${path} is unreadable (${reason}). Inspect or restore it before running again.`);
		this.name = 'CorruptStateError';
	}
}

export class StateWriteError extends Error {
	constructor(
		public readonly path: string,
		cause: unknown,
	) {
		super(`Failed to write ${path}: ${describeError(cause)}`, { cause });
		this.name = 'StateWriteError';
	}
}

export class InvalidComposeError extends Error {
	constructor(
		public readonly path: string,
		reason: string,
	) {
		super(`Compose definition ${path} is invalid: ${reason}`);
		this.name = 'InvalidComposeError';
	}
}

export class InvalidDescriptorError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'InvalidDescriptorError';
	}
}

export class RegistryError extends Error {
	constructor(message: string) {
		super(message);
		this.name = 'RegistryError';
	}
}

export class MigrationFailureError extends Error {
	constructor(
		public readonly stepId: number,
		public readonly stepName: string,
		cause: unknown,
	) {
		super(`Migration ${stepId} (${stepName}) failed: ${describeError(cause)}`, { cause });
		this.name = 'MigrationFailureError';
	}
}

export class ReconciliationFailureError extends Error {
	constructor(public readonly report: ReconcileReport) {
		const failed = report.outcomes.filter((outcome) => outcome.status === 'failed');
		super(
			`${failed.length} service(s) failed to converge: ${failed.map((outcome) => outcome.service).join(', ')}`,
		);
		this.name = 'ReconciliationFailureError';
	}
}

export class DiscoveryTimeoutError extends Error {
	constructor(public readonly timeoutMs: number) {
		super(`Discovery did not finish within ${timeoutMs}ms`);
		this.name = 'DiscoveryTimeoutError';
	}
}

export function describeError(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

export function toError(error: unknown): Error {
	return error instanceof Error ? error : new Error(String(error));
}

export function isNotFoundError(error: unknown): boolean {
	if (typeof error !== 'object' || error === null) {
		return false;
	}
	if ('code' in error && error.code === 'ENOENT') {
		return true;
	}
	return 'statusCode' in error && error.statusCode === 404;
}
