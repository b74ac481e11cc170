/**
 * init: create an empty stack directory with its release settings.
 * install runs the same preparation before migrating.
 */

import * as fs from 'fs';
import * as path from 'path';
import { EnvFile } from '../compose/env-file';
import { ExitCode, LOCK_FILE, RELEASE_KEY, SKIP_CONFIRM_KEY, STATE_DIR } from '../lib/constants';
import { InvalidArgumentError, NotAStackDirectoryError } from '../lib/errors';
import { acquireLock, type LockHandle } from '../state/lock-file';
import { type CommandContext, runCommand } from './context';
import { isStackDirectory, listDirectory } from './stack-directory';

export interface InitOptions {
	release: string;
	/** Erase an existing stack directory */
	force: boolean;
	/** Recorded in .env for front-ends that ask before acting */
	skipConfirm?: boolean;
}

export function init(context: CommandContext, options: InitOptions): Promise<ExitCode> {
	return runCommand(context, async () => {
		const lock = await prepareStackDirectory(context, options);
		try {
			context.output.info(`✅ Stack directory ${context.stackDir} is ready`);
			return ExitCode.Success;
		} finally {
			await lock.release();
		}
	});
}

/**
 * Erases (with force) or creates the stack directory and writes the release
 * settings. Resolves with the stack lock, which the caller releases.
 */
export async function prepareStackDirectory(
	context: Pick<CommandContext, 'stackDir' | 'output' | 'logger'>,
	options: InitOptions,
): Promise<LockHandle> {
	const { stackDir, output } = context;
	const entries = await listDirectory(stackDir);
	const existing = entries !== undefined && entries.length > 0;

	if (existing) {
		if (!(await isStackDirectory(stackDir))) {
			throw new NotAStackDirectoryError(stackDir);
		}
		if (!options.force) {
			throw new InvalidArgumentError(`'${stackDir}' already contains a stack; pass --force to erase it`);
		}
	}

	// Held from before the erase until the caller is done
	const lock = await acquireLock(stackDir, context.logger);
	try {
		if (existing) {
			output.info(`🧹 Erasing ${stackDir}...`);
			await eraseStack(stackDir);
		}

		output.info(`📁 Creating stack directory ${stackDir}...`);
		await fs.promises.mkdir(stackDir, { recursive: true });
		const envFile = new EnvFile(stackDir);
		await envFile.write({
			...(await envFile.read()),
			[RELEASE_KEY]: options.release,
			...(options.skipConfirm !== undefined ? { [SKIP_CONFIRM_KEY]: String(options.skipConfirm) } : {}),
		});
		return lock;
	} catch (error) {
		await lock.release();
		throw error;
	}
}

/**
 * Removes everything in the stack directory except the lock file
 */
async function eraseStack(stackDir: string): Promise<void> {
	const stateDir = path.join(stackDir, STATE_DIR);
	const topLevel = ((await listDirectory(stackDir)) ?? []).filter((entry) => entry !== STATE_DIR);
	const stateEntries = ((await listDirectory(stateDir)) ?? []).filter((entry) => entry !== LOCK_FILE);

	await Promise.all([
		...topLevel.map((entry) => fs.promises.rm(path.join(stackDir, entry), { recursive: true, force: true })),
		...stateEntries.map((entry) => fs.promises.rm(path.join(stateDir, entry), { recursive: true, force: true })),
	]);
}
