/**
 * Shared plumbing for CLI commands: what a command needs from the outside
 * world, and how its outcome maps to an exit code.
 */

import type { BrewstackConfig } from '../config/config-loader';
import { MdnsDiscovery } from '../discovery/mdns-discovery';
import type { DiscoveryAdapter } from '../discovery/types';
import { ExitCode } from '../lib/constants';
import { UserError, describeError, toError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import type { MigrationRegistry } from '../migrations/migration-registry';
import { builtinRegistry } from '../migrations/steps';
import { ContainerRuntime } from '../runtime/container-runtime';
import { DockerContainerOperations, type PullPolicy } from '../runtime/docker-operations';
import type { OneShotRunner, RuntimeAdapter } from '../runtime/types';

export interface CommandOutput {
	info(line: string): void;
	error(line: string): void;
}

export interface RuntimeRequest {
	project: string;
	pullPolicy: PullPolicy;
}

export interface CommandContext {
	stackDir: string;
	config: BrewstackConfig;
	logger: Logger;
	output: CommandOutput;
	registry: MigrationRegistry;
	createRuntime(request: RuntimeRequest): RuntimeAdapter;
	createRunner(request: RuntimeRequest): OneShotRunner;
	createDiscovery(): DiscoveryAdapter;
}

export const consoleOutput: CommandOutput = {
	info: (line) => console.log(line),
	error: (line) => console.error(line),
};

export function createCommandContext(
	stackDir: string,
	config: BrewstackConfig,
	logger: Logger,
	output: CommandOutput = consoleOutput,
): CommandContext {
	return {
		stackDir,
		config,
		logger,
		output,
		registry: builtinRegistry(),
		createRuntime: ({ project, pullPolicy }) =>
			new ContainerRuntime(
				new DockerContainerOperations({ project, socketPath: config.dockerSocket, pullPolicy, logger }),
				logger,
			),
		createRunner: ({ project, pullPolicy }) =>
			new DockerContainerOperations({ project, socketPath: config.dockerSocket, pullPolicy, logger }),
		createDiscovery: () => new MdnsDiscovery(logger),
	};
}

/**
 * Runs a command body and maps thrown errors to exit codes:
 * UserError -> 2, anything else -> 1
 */
export async function runCommand(
	context: Pick<CommandContext, 'output' | 'logger'>,
	body: () => Promise<ExitCode>,
): Promise<ExitCode> {
	try {
		return await body();
	} catch (error) {
		if (error instanceof UserError) {
			context.output.error(`❌ ${error.message}`);
			return ExitCode.UserError;
		}
		context.logger.errorSync('Command failed', toError(error), { component: 'cli' });
		context.output.error(`❌ ${describeError(error)}`);
		return ExitCode.Failed;
	}
}
