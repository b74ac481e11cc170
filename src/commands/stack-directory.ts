import * as fs from 'fs';
import { EnvFile } from '../compose/env-file';
import { COMPOSE_FILE, DEFAULT_PROJECT_NAME, ENV_FILE, PROJECT_KEY, STATE_DIR } from '../lib/constants';
import { NotAStackDirectoryError, isNotFoundError } from '../lib/errors';
import type { Logger } from '../logging/logger';
import { acquireLock } from '../state/lock-file';

const MARKERS = [COMPOSE_FILE, ENV_FILE, STATE_DIR];

/**
 * A directory is a stack directory when it holds any of the files
 * brewstack writes
 */
export async function isStackDirectory(dir: string): Promise<boolean> {
	const entries = await listDirectory(dir);
	return entries !== undefined && MARKERS.some((marker) => entries.includes(marker));
}

export async function requireStackDirectory(dir: string): Promise<void> {
	if (!(await isStackDirectory(dir))) {
		throw new NotAStackDirectoryError(dir);
	}
}

/**
 * Entry names, or undefined when the directory does not exist
 */
export async function listDirectory(dir: string): Promise<string[] | undefined> {
	try {
		return await fs.promises.readdir(dir);
	} catch (error) {
		if (isNotFoundError(error)) {
			return undefined;
		}
		throw error;
	}
}

export async function projectNameOf(stackDir: string): Promise<string> {
	const project = await new EnvFile(stackDir).get(PROJECT_KEY);
	return project || DEFAULT_PROJECT_NAME;
}

export async function withStackLock<T>(
	context: { stackDir: string; logger?: Logger },
	body: () => Promise<T>,
): Promise<T> {
	const lock = await acquireLock(context.stackDir, context.logger);
	try {
		return await body();
	} finally {
		await lock.release();
	}
}
