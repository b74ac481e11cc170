/**
 * DOCKER OPERATIONS
 * =================
 *
 * Container operations against the Docker Engine API.
 * Handles: pulling images, the stack network, creating/starting/stopping/removing containers
 *
 * Containers are named <project>_<service> and labelled with the project,
 * service and config digest; list() only sees containers of this project.
 */

import Docker from 'dockerode';
import { DEFAULT_DOCKER_SOCKET, LABEL_DIGEST, LABEL_PROJECT, LABEL_SERVICE } from '../lib/constants';
import { toError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import type { ContainerOperations, ObservedContainer, OneShotContainerSpec, OneShotRunner, RuntimeServiceSpec } from './types';

export type PullPolicy = 'missing' | 'always';

export interface DockerOperationsOptions {
	project: string;
	socketPath?: string;
	pullPolicy?: PullPolicy;
	stopTimeoutSeconds?: number;
	logger?: Logger;
}

export interface PortBindingSpec {
	containerPort: string;
	hostIp?: string;
	hostPort?: string;
}

export class DockerContainerOperations implements ContainerOperations, OneShotRunner {
	private readonly docker: Docker;
	private readonly project: string;
	private readonly networkName: string;
	private readonly pullPolicy: PullPolicy;
	private readonly stopTimeoutSeconds: number;
	private readonly logger: ComponentLogger;
	private networkReady?: Promise<void>;
	private readonly pulls = new Map<string, Promise<void>>();

	constructor(options: DockerOperationsOptions) {
		this.project = options.project;
		this.networkName = `${options.project}_default`;
		this.pullPolicy = options.pullPolicy ?? 'missing';
		this.stopTimeoutSeconds = options.stopTimeoutSeconds ?? 10;
		this.logger = new ComponentLogger(options.logger, 'DockerOperations');

		if (options.socketPath) {
			this.docker = new Docker({ socketPath: options.socketPath });
		} else if (process.platform === 'win32') {
			// Docker Desktop named pipe
			this.docker = new Docker({ socketPath: '//./pipe/docker_engine' });
		} else {
			this.docker = new Docker({ socketPath: DEFAULT_DOCKER_SOCKET });
		}
	}

	public containerName(service: string): string {
		return `${this.project}_${service}`;
	}

	async list(): Promise<ObservedContainer[]> {
		const containers = await this.docker.listContainers({
			all: true,
			filters: { label: [`${LABEL_PROJECT}=${this.project}`] },
		});

		const observed: ObservedContainer[] = [];
		for (const container of containers) {
			const service = container.Labels[LABEL_SERVICE];
			if (!service) {
				continue;
			}
			observed.push({
				id: container.Id,
				name: container.Names[0]?.replace(/^\//, '') ?? container.Id,
				service,
				image: container.Image,
				...(container.Labels[LABEL_DIGEST] ? { digest: container.Labels[LABEL_DIGEST] } : {}),
				running: container.State === 'running',
			});
		}
		return observed;
	}

	async create(spec: RuntimeServiceSpec): Promise<void> {
		await this.ensureNetwork();
		await this.ensureImage(spec.image);

		const exposedPorts: Record<string, object> = {};
		const portBindings: Docker.PortMap = {};
		for (const port of spec.ports) {
			const binding = parsePortBinding(port);
			exposedPorts[binding.containerPort] = {};
			if (binding.hostPort !== undefined) {
				const bindings = portBindings[binding.containerPort] ?? [];
				bindings.push({
					HostPort: binding.hostPort,
					...(binding.hostIp ? { HostIp: binding.hostIp } : {}),
				});
				portBindings[binding.containerPort] = bindings;
			}
		}

		const createOptions: Docker.ContainerCreateOptions = {
			name: this.containerName(spec.name),
			Image: spec.image,
			Env: Object.entries(spec.environment).map(([key, value]) => `${key}=${value}`),
			...(spec.command ? { Cmd: spec.command } : {}),
			ExposedPorts: exposedPorts,
			HostConfig: {
				PortBindings: portBindings,
				Binds: spec.volumes.length > 0 ? spec.volumes : undefined,
				NetworkMode: this.networkName,
				Privileged: spec.privileged ?? false,
				RestartPolicy: { Name: spec.restart ?? 'unless-stopped' },
			},
			NetworkingConfig: {
				EndpointsConfig: {
					[this.networkName]: { Aliases: [spec.name] },
				},
			},
			Labels: {
				...spec.labels,
				[LABEL_PROJECT]: this.project,
				[LABEL_SERVICE]: spec.name,
				[LABEL_DIGEST]: spec.digest,
			},
		};

		const container = await this.docker.createContainer(createOptions);
		await container.start();
		this.logger.infoSync('Container started', {
			operation: 'create',
			service: spec.name,
			containerId: container.id.substring(0, 12),
		});
	}

	async start(container: ObservedContainer): Promise<void> {
		await this.docker.getContainer(container.id).start();
	}

	async remove(container: ObservedContainer): Promise<void> {
		const handle = this.docker.getContainer(container.id);
		if (container.running) {
			try {
				await handle.stop({ t: this.stopTimeoutSeconds });
			} catch (error) {
				// 304: already stopped
				if (statusCodeOf(error) !== 304) {
					throw error;
				}
			}
		}
		try {
			await handle.remove();
		} catch (error) {
			if (statusCodeOf(error) !== 404) {
				throw error;
			}
			this.logger.debugSync('Container already removed', { container: container.name });
		}
	}

	/**
	 * Like `docker run --rm [-it]`: output goes to this process's stdout and
	 * stderr, and an interactive run also reads from its stdin
	 */
	async runOnce(spec: OneShotContainerSpec): Promise<number> {
		await this.ensureImage(spec.image);

		const container = await this.docker.createContainer({
			Image: spec.image,
			Cmd: spec.command,
			Tty: spec.interactive,
			OpenStdin: spec.interactive,
			StdinOnce: spec.interactive,
			AttachStdin: spec.interactive,
			AttachStdout: true,
			AttachStderr: true,
			HostConfig: {
				Privileged: spec.privileged,
				Binds: spec.volumes.length > 0 ? spec.volumes : undefined,
			},
			Labels: { [LABEL_PROJECT]: this.project },
		});
		this.logger.infoSync('Running one-shot container', {
			operation: 'run',
			image: spec.image,
			containerId: container.id.substring(0, 12),
		});

		const stream = await container.attach({
			stream: true,
			stdin: spec.interactive,
			stdout: true,
			stderr: true,
			hijack: spec.interactive,
		});
		const rawMode = spec.interactive && process.stdin.isTTY;
		if (spec.interactive) {
			stream.pipe(process.stdout);
			if (rawMode) {
				process.stdin.setRawMode(true);
			}
			process.stdin.pipe(stream);
		} else {
			this.docker.modem.demuxStream(stream, process.stdout, process.stderr);
		}

		try {
			await container.start();
			const result: unknown = await container.wait();
			return exitCodeOf(result);
		} finally {
			if (spec.interactive) {
				process.stdin.unpipe(stream);
				if (rawMode) {
					process.stdin.setRawMode(false);
				}
				process.stdin.pause();
			}
			await container.remove({ force: true });
		}
	}

	private ensureNetwork(): Promise<void> {
		if (!this.networkReady) {
			this.networkReady = this.createNetworkIfMissing().catch((error: unknown) => {
				this.networkReady = undefined;
				throw error;
			});
		}
		return this.networkReady;
	}

	private async createNetworkIfMissing(): Promise<void> {
		const networks = await this.docker.listNetworks({ filters: { name: [this.networkName] } });
		if (networks.some((network) => network.Name === this.networkName)) {
			return;
		}
		this.logger.infoSync('Creating network', { network: this.networkName });
		await this.docker.createNetwork({
			Name: this.networkName,
			Driver: 'bridge',
			Labels: { [LABEL_PROJECT]: this.project },
		});
	}

	/**
	 * Services sharing an image wait on the same pull
	 */
	private ensureImage(image: string): Promise<void> {
		let pull = this.pulls.get(image);
		if (!pull) {
			pull = this.pullIfNeeded(image);
			this.pulls.set(image, pull);
		}
		return pull;
	}

	private async pullIfNeeded(image: string): Promise<void> {
		if (this.pullPolicy === 'missing' && (await this.hasImage(image))) {
			return;
		}
		this.logger.infoSync('Pulling image', { operation: 'pull', image });
		await new Promise<void>((resolve, reject) => {
			this.docker.pull(image, {}, (err: unknown, stream?: NodeJS.ReadableStream) => {
				if (err) {
					reject(toError(err));
					return;
				}
				if (!stream) {
					reject(new Error(`Docker returned no progress stream for ${image}`));
					return;
				}
				this.docker.modem.followProgress(stream, (progressErr: unknown) => {
					if (progressErr) {
						reject(toError(progressErr));
						return;
					}
					resolve();
				});
			});
		});
	}

	private async hasImage(image: string): Promise<boolean> {
		try {
			await this.docker.getImage(image).inspect();
			return true;
		} catch (error) {
			if (statusCodeOf(error) === 404) {
				return false;
			}
			throw error;
		}
	}
}

/**
 * Parses compose short syntax: "80", "8080:80", "127.0.0.1:8080:80",
 * "127.0.0.1::80", with an optional "/udp" suffix
 */
export function parsePortBinding(port: string): PortBindingSpec {
	const [mapping, protocol = 'tcp'] = port.split('/');
	const parts = mapping.split(':');
	const containerPort = `${parts[parts.length - 1]}/${protocol}`;

	if (parts.length === 1) {
		return { containerPort };
	}
	if (parts.length === 2) {
		return { containerPort, hostPort: parts[0] };
	}
	return {
		containerPort,
		hostIp: parts.slice(0, -2).join(':'),
		hostPort: parts[parts.length - 2],
	};
}

function exitCodeOf(result: unknown): number {
	if (typeof result === 'object' && result !== null && 'StatusCode' in result && typeof result.StatusCode === 'number') {
		return result.StatusCode;
	}
	throw new Error('Docker did not report an exit code');
}

function statusCodeOf(error: unknown): number | undefined {
	if (typeof error === 'object' && error !== null && 'statusCode' in error && typeof error.statusCode === 'number') {
		return error.statusCode;
	}
	return undefined;
}
