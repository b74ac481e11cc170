/**
 * flash / particle / wifi: controller maintenance over USB.
 *
 * The stack is stopped first so nothing else holds the serial device, then
 * the firmware flasher image runs privileged with /dev mounted. The stack
 * stays locked (and down) until the flasher exits; `up` brings it back.
 */

import { EnvFile } from '../compose/env-file';
import { DEFAULT_PROJECT_NAME, DEFAULT_RELEASE, ExitCode, FLASHER_IMAGE, RELEASE_KEY } from '../lib/constants';
import type { LockHandle } from '../state/lock-file';
import { acquireLock } from '../state/lock-file';
import { type CommandContext, runCommand } from './context';
import { printReport } from './converge';
import { isStackDirectory, projectNameOf } from './stack-directory';

export interface FlasherOptions {
	/** Release track of the flasher image; defaults to the stack's release */
	release?: string;
	/** Pull the flasher image even when it is present locally */
	pull: boolean;
}

export interface ParticleOptions extends FlasherOptions {
	/** Command for the Particle CLI container; empty starts a shell */
	command?: string;
}

export function flash(context: CommandContext, options: FlasherOptions): Promise<ExitCode> {
	return runCommand(context, () =>
		runFlasher(context, options, ['flash'], false, '⚡ Flashing controller...'),
	);
}

export function particle(context: CommandContext, options: ParticleOptions): Promise<ExitCode> {
	const command = (options.command ?? '').split(/\s+/).filter((part) => part !== '');
	return runCommand(context, () => {
		context.output.info('🐚 Starting Particle image...');
		if (command.length === 0) {
			context.output.info("   Type 'exit' and press enter to exit the shell");
		}
		return runFlasher(context, options, command, true);
	});
}

/**
 * Configuring Wifi over USB is disabled in the flasher image; controllers
 * take their Wifi settings from the UI instead
 */
export async function wifi(context: CommandContext): Promise<ExitCode> {
	context.output.info('ℹ️  This command is temporarily disabled');
	context.output.info('   To set up Wifi, connect to the controller over USB');
	context.output.info('   On the controller service page (actions, top right), you can configure Wifi settings');
	return ExitCode.Success;
}

async function runFlasher(
	context: CommandContext,
	options: FlasherOptions,
	command: string[],
	interactive: boolean,
	message?: string,
): Promise<ExitCode> {
	const { stackDir, output } = context;
	const stack = await isStackDirectory(stackDir);
	const release = options.release ?? (stack ? await new EnvFile(stackDir).get(RELEASE_KEY) : undefined) ?? DEFAULT_RELEASE;
	const project = stack ? await projectNameOf(stackDir) : DEFAULT_PROJECT_NAME;

	let lock: LockHandle | undefined;
	try {
		if (stack) {
			lock = await acquireLock(stackDir, context.logger);
			output.info('🛑 Stopping services...');
			const report = await context.createRuntime({ project, pullPolicy: context.config.pullPolicy }).reconcile([]);
			if (!report.converged) {
				printReport(context, report);
				output.error('❌ Services did not stop; not starting the flasher');
				return ExitCode.Failed;
			}
		}

		output.info('🔌 The controller must be connected over USB');
		if (message) {
			output.info(message);
		}
		const runner = context.createRunner({
			project,
			pullPolicy: options.pull ? 'always' : 'missing',
		});
		const exitCode = await runner.runOnce({
			image: `${FLASHER_IMAGE}:${release}`,
			command,
			privileged: true,
			volumes: ['/dev:/dev'],
			interactive,
		});

		if (exitCode !== 0) {
			output.error(`❌ Flasher exited with code ${exitCode}`);
			return ExitCode.Failed;
		}
		output.info('✅ Done');
		return ExitCode.Success;
	} finally {
		await lock?.release();
	}
}
