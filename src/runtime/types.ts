/**
 * Runtime adapter boundary: desired service specs in, per-service outcomes out
 */

export interface RuntimeServiceSpec {
	/** Compose service name */
	name: string;
	/** Fully interpolated image reference */
	image: string;
	environment: Record<string, string>;
	ports: string[];
	/** Bind mounts with host paths resolved against the stack directory */
	volumes: string[];
	command?: string[];
	restart?: string;
	privileged?: boolean;
	labels: Record<string, string>;
	/** Hash of everything above; a changed digest means the container must be recreated */
	digest: string;
}

export interface ObservedContainer {
	id: string;
	name: string;
	service: string;
	image: string;
	/** Digest label written at creation; undefined for containers created by other tools */
	digest?: string;
	running: boolean;
}

export type ReconcileAction =
	| { action: 'create'; service: string; spec: RuntimeServiceSpec }
	| { action: 'recreate'; service: string; container: ObservedContainer; spec: RuntimeServiceSpec }
	| { action: 'start'; service: string; container: ObservedContainer }
	| { action: 'remove'; service: string; container: ObservedContainer }
	| { action: 'unchanged'; service: string; container: ObservedContainer };

export type ReconcileActionKind = ReconcileAction['action'];

export interface ServiceOutcome {
	service: string;
	actions: ReconcileActionKind[];
	status: 'ok' | 'failed';
	error?: string;
}

export interface ReconcileReport {
	outcomes: ServiceOutcome[];
	converged: boolean;
}

/**
 * Primitive container operations a runtime backend provides
 */
export interface ContainerOperations {
	list(): Promise<ObservedContainer[]>;
	/** Pull if needed, create and start */
	create(spec: RuntimeServiceSpec): Promise<void>;
	start(container: ObservedContainer): Promise<void>;
	/** Stop if running, then remove */
	remove(container: ObservedContainer): Promise<void>;
}

/**
 * A container that runs a command to completion outside the stack, such as
 * the firmware flasher
 */
export interface OneShotContainerSpec {
	image: string;
	command: string[];
	privileged: boolean;
	/** Bind mounts, host:container */
	volumes: string[];
	/** Attach the terminal's stdin through a TTY */
	interactive: boolean;
}

export interface OneShotRunner {
	/** Pull if needed, run, remove; resolves with the container's exit code */
	runOnce(spec: OneShotContainerSpec): Promise<number>;
}

/**
 * A service whose runtime spec could not be built. Its containers are left
 * as they are and it is reported as failed.
 */
export interface UnresolvedService {
	service: string;
	error: string;
}

export interface RuntimeAdapter {
	reconcile(desired: RuntimeServiceSpec[], unresolved?: UnresolvedService[]): Promise<ReconcileReport>;
}
