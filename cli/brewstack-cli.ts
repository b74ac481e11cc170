#!/usr/bin/env node
/**
 * brewstack CLI
 * =============
 * Installs, migrates and operates a brewstack stack directory
 *
 * Usage:
 *   brewstack init [--dir ./brewstack] [--release edge] [--force] [--skip-confirm]
 *   brewstack install [--dir ./brewstack] [--release edge] [--force] [--no-start]
 *   brewstack migrate [--target 0.7.0] [--no-reconcile]
 *   brewstack up [--pull]
 *   brewstack down
 *   brewstack status
 *   brewstack discover [--timeout 5000]
 *   brewstack add-controller <name> [--device-id <id>]
 *   brewstack enable-ipv6 [--config-file /etc/docker/daemon.json]
 *   brewstack flash [--release edge] [--no-pull]
 *   brewstack particle [--release edge] [--no-pull] [-c "<command>"]
 *   brewstack wifi
 *
 * Exit codes: 0 success, 1 failure, 2 invalid invocation
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import {
	addController,
	createCommandContext,
	discover,
	down,
	enableIpv6,
	flash,
	init,
	install,
	isStackDirectory,
	migrate,
	particle,
	status,
	up,
	wifi,
	type CommandContext,
} from '../src/commands';
import { ConfigLoader, type BrewstackConfig } from '../src/config/config-loader';
import {
	DEFAULT_DAEMON_CONFIG,
	DEFAULT_RELEASE,
	DEFAULT_STACK_DIR,
	ExitCode,
	STACK_VERSION,
} from '../src/lib/constants';
import { InvalidArgumentError, UserError, describeError } from '../src/lib/errors';
import { FileLogBackend } from '../src/logging/file-backend';
import { Logger } from '../src/logging/logger';
import type { LogLevel } from '../src/logging/types';

const CURRENT_DIR = '.';

async function withContext(
	stackDir: string,
	overrides: Partial<BrewstackConfig>,
	run: (context: CommandContext) => Promise<ExitCode>,
): Promise<ExitCode> {
	const config = new ConfigLoader(stackDir).getConfig(overrides);
	const logger = new Logger([], { level: config.logLevel });
	logger.setStackDir(stackDir);
	if (config.logToFile && (await isStackDirectory(stackDir))) {
		logger.addBackend(new FileLogBackend(stackDir));
	}

	try {
		return await run(createCommandContext(stackDir, config, logger));
	} finally {
		await logger.close();
	}
}

function logLevelOverride(level: LogLevel | undefined): Partial<BrewstackConfig> {
	return level ? { logLevel: level } : {};
}

export async function main(args: string[]): Promise<ExitCode> {
	let exitCode: ExitCode = ExitCode.Success;
	const finish = (code: ExitCode): void => {
		exitCode = code;
	};

	await yargs(args)
		.scriptName('brewstack')
		.option('dir', {
			alias: 'd',
			type: 'string',
			description: 'Stack directory (default: current directory, ./brewstack for install)',
		})
		.option('log-level', {
			alias: 'l',
			description: 'Log level',
			choices: ['debug', 'info', 'warn', 'error'] as const,
		})
		.command(
			'init',
			'Create an empty stack directory',
			(cmd) =>
				cmd
					.option('release', { type: 'string', default: DEFAULT_RELEASE, description: 'Release track' })
					.option('force', { type: 'boolean', default: false, description: 'Erase an existing stack directory' })
					.option('skip-confirm', { type: 'boolean', description: 'Do not ask for confirmation in later commands' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? DEFAULT_STACK_DIR, logLevelOverride(argv.logLevel), (context) =>
						init(context, {
							release: argv.release,
							force: argv.force,
							...(argv.skipConfirm !== undefined ? { skipConfirm: argv.skipConfirm } : {}),
						}),
					),
				);
			},
		)
		.command(
			'install',
			'Create a stack directory and bring it to the current version',
			(cmd) =>
				cmd
					.option('release', { type: 'string', default: DEFAULT_RELEASE, description: 'Release track' })
					.option('force', { type: 'boolean', default: false, description: 'Erase an existing stack directory' })
					.option('start', { type: 'boolean', default: true, description: 'Start containers (--no-start to skip)' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? DEFAULT_STACK_DIR, logLevelOverride(argv.logLevel), (context) =>
						install(context, { release: argv.release, force: argv.force, start: argv.start }),
					),
				);
			},
		)
		.command(
			'migrate',
			'Apply pending migrations and converge containers',
			(cmd) =>
				cmd
					.option('target', { type: 'string', description: `Target version (default: ${STACK_VERSION})` })
					.option('reconcile', { type: 'boolean', default: true, description: 'Converge containers (--no-reconcile to skip)' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						migrate(context, { ...(argv.target ? { target: argv.target } : {}), reconcile: argv.reconcile }),
					),
				);
			},
		)
		.command(
			'up',
			'Start or update containers to match the compose definition',
			(cmd) => cmd.option('pull', { type: 'boolean', default: false, description: 'Pull every image first' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						up(context, { pull: argv.pull }),
					),
				);
			},
		)
		.command(
			'down',
			'Stop and remove the stack containers',
			(cmd) => cmd,
			async (argv) => {
				finish(await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), down));
			},
		)
		.command(
			'status',
			'Show installed version and pending migrations',
			(cmd) => cmd,
			async (argv) => {
				finish(await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), status));
			},
		)
		.command(
			'discover',
			'List controllers on the local network',
			(cmd) => cmd.option('timeout', { type: 'number', description: 'Discovery timeout in milliseconds' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						discover(context, argv.timeout !== undefined ? { timeoutMs: argv.timeout } : {}),
					),
				);
			},
		)
		.command(
			'add-controller <name>',
			'Add a controller service to the stack',
			(cmd) =>
				cmd
					.positional('name', { type: 'string', demandOption: true, description: 'Service name' })
					.option('device-id', { type: 'string', description: 'Pin the controller to a device' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						addController(context, {
							name: argv.name,
							...(argv.deviceId ? { deviceId: argv.deviceId } : {}),
						}),
					),
				);
			},
		)
		.command(
			'enable-ipv6',
			'Enable IPv6 in the Docker daemon configuration',
			(cmd) =>
				cmd.option('config-file', {
					type: 'string',
					default: DEFAULT_DAEMON_CONFIG,
					description: 'Docker daemon configuration file',
				}),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						enableIpv6(context, { configFile: argv.configFile }),
					),
				);
			},
		)
		.command(
			'flash',
			'Flash controller firmware over USB',
			(cmd) =>
				cmd
					.option('release', { type: 'string', description: 'Firmware release track (default: the stack release)' })
					.option('pull', { type: 'boolean', default: true, description: 'Pull the flasher image (--no-pull to skip)' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						flash(context, { ...(argv.release ? { release: argv.release } : {}), pull: argv.pull }),
					),
				);
			},
		)
		.command(
			'particle',
			'Start the Particle CLI container with USB access',
			(cmd) =>
				cmd
					.option('release', { type: 'string', description: 'Image release track (default: the stack release)' })
					.option('pull', { type: 'boolean', default: true, description: 'Pull the image (--no-pull to skip)' })
					.option('command', { alias: 'c', type: 'string', description: 'Command to run (default: a shell)' }),
			async (argv) => {
				finish(
					await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), (context) =>
						particle(context, {
							...(argv.release ? { release: argv.release } : {}),
							...(argv.command ? { command: argv.command } : {}),
							pull: argv.pull,
						}),
					),
				);
			},
		)
		.command(
			'wifi',
			'Configure controller Wifi over USB (disabled)',
			(cmd) => cmd,
			async (argv) => {
				finish(await withContext(argv.dir ?? CURRENT_DIR, logLevelOverride(argv.logLevel), wifi));
			},
		)
		.demandCommand(1, 'Specify a command')
		.strict()
		.fail((message, error) => {
			throw error ?? new InvalidArgumentError(message);
		})
		.exitProcess(false)
		.help()
		.alias('help', 'h')
		.version(STACK_VERSION)
		.alias('version', 'v')
		.parseAsync();

	return exitCode;
}

if (require.main === module) {
	main(hideBin(process.argv))
		.then((code) => {
			process.exitCode = code;
		})
		.catch((error: unknown) => {
			console.error(`❌ ${describeError(error)}`);
			process.exitCode = error instanceof UserError ? ExitCode.UserError : ExitCode.Failed;
		});
}
