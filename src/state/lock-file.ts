/**
 * Advisory lock for a stack directory.
 *
 * One brewstack command may hold the write path at a time. A second
 * invocation fails immediately with LockHeldError; it never waits.
 */

import * as fs from 'fs';
import * as path from 'path';
import { tempPathFor } from '../lib/atomic-write';
import { LOCK_FILE, STATE_DIR } from '../lib/constants';
import { LockHeldError, isNotFoundError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';

export interface LockHandle {
	readonly path: string;
	release(): Promise<void>;
}

interface LockOwner {
	pid: number;
	acquiredAt: string;
}

// An unreadable lock younger than this may belong to a writer that is still starting
const UNREADABLE_LOCK_GRACE_MS = 5000;

export function lockPathFor(stackDir: string): string {
	return path.join(stackDir, STATE_DIR, LOCK_FILE);
}

export async function acquireLock(stackDir: string, logger?: Logger): Promise<LockHandle> {
	const log = new ComponentLogger(logger, 'LockFile');
	const lockPath = lockPathFor(stackDir);
	await fs.promises.mkdir(path.dirname(lockPath), { recursive: true });

	for (let attempt = 0; attempt < 2; attempt++) {
		try {
			await createExclusive(lockPath);
			log.debugSync('Lock acquired', { path: lockPath });
			return createHandle(lockPath);
		} catch (error) {
			if (!isExistsError(error)) {
				throw error;
			}
		}

		const owner = await readOwner(lockPath);
		if (owner === 'unreadable') {
			if (await isRecent(lockPath)) {
				throw new LockHeldError(lockPath);
			}
		} else if (owner && isProcessAlive(owner.pid)) {
			throw new LockHeldError(lockPath, owner.pid);
		}
		if (attempt === 0) {
			log.warnSync('Removing stale lock', { path: lockPath, ...(owner && owner !== 'unreadable' ? { pid: owner.pid } : {}) });
			await fs.promises.rm(lockPath, { force: true });
		}
	}

	throw new LockHeldError(lockPath);
}

/**
 * The owner is written to a private file first and then hard-linked into
 * place, so the lock path never exists without its contents. link() fails
 * with EEXIST when another holder got there first.
 */
async function createExclusive(lockPath: string): Promise<void> {
	const owner: LockOwner = { pid: process.pid, acquiredAt: new Date().toISOString() };
	const tempPath = tempPathFor(lockPath);
	await fs.promises.writeFile(tempPath, JSON.stringify(owner), { encoding: 'utf-8', flag: 'wx' });
	try {
		await fs.promises.link(tempPath, lockPath);
	} finally {
		await fs.promises.rm(tempPath, { force: true });
	}
}

function createHandle(lockPath: string): LockHandle {
	let released = false;
	return {
		path: lockPath,
		async release(): Promise<void> {
			if (released) {
				return;
			}
			released = true;
			await fs.promises.rm(lockPath, { force: true });
		},
	};
}

async function readOwner(lockPath: string): Promise<LockOwner | 'unreadable' | undefined> {
	let contents: string;
	try {
		contents = await fs.promises.readFile(lockPath, 'utf-8');
	} catch (error) {
		if (isNotFoundError(error)) {
			return undefined;
		}
		throw error;
	}
	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch {
		return 'unreadable';
	}
	if (
		typeof parsed === 'object' &&
		parsed !== null &&
		'pid' in parsed &&
		typeof parsed.pid === 'number' &&
		'acquiredAt' in parsed &&
		typeof parsed.acquiredAt === 'string'
	) {
		return { pid: parsed.pid, acquiredAt: parsed.acquiredAt };
	}
	return 'unreadable';
}

async function isRecent(lockPath: string): Promise<boolean> {
	try {
		const stats = await fs.promises.stat(lockPath);
		return Date.now() - stats.mtimeMs < UNREADABLE_LOCK_GRACE_MS;
	} catch (error) {
		if (isNotFoundError(error)) {
			return false;
		}
		throw error;
	}
}

function isProcessAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (error) {
		// EPERM: the process exists but belongs to another user
		return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EPERM';
	}
}

function isExistsError(error: unknown): boolean {
	return typeof error === 'object' && error !== null && 'code' in error && error.code === 'EEXIST';
}
