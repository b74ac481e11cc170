/**
 * STATE STORE
 * ===========
 *
 * Version-tracking record of a stack directory: installed version, applied
 * migration ids and service flags, kept in .brewstack/state.json.
 *
 * load() distinguishes a host that was never installed (not-found) from one
 * whose record cannot be trusted (CorruptStateError). save() replaces the
 * file atomically.
 */

import * as fs from 'fs';
import * as path from 'path';
import _ from 'lodash';
import { writeFileAtomic } from '../lib/atomic-write';
import { STATE_DIR, STATE_FILE } from '../lib/constants';
import { CorruptStateError, StateWriteError, describeError, isNotFoundError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import { Version } from '../version/version';
import {
	STATE_SCHEMA_VERSION,
	StateFileSchema,
	type LoadResult,
	type StateFile,
	type StateRecord,
} from './types';

export class StateStore {
	private readonly filePath: string;
	private readonly logger: ComponentLogger;

	constructor(stackDir: string, logger?: Logger) {
		this.filePath = path.join(stackDir, STATE_DIR, STATE_FILE);
		this.logger = new ComponentLogger(logger, 'StateStore');
	}

	public getPath(): string {
		return this.filePath;
	}

	public async exists(): Promise<boolean> {
		try {
			await fs.promises.access(this.filePath);
			return true;
		} catch {
			return false;
		}
	}

	public async load(): Promise<LoadResult> {
		let contents: string;
		try {
			contents = await fs.promises.readFile(this.filePath, 'utf-8');
		} catch (error) {
			if (isNotFoundError(error)) {
				this.logger.debugSync('No state record found', { path: this.filePath });
				return { status: 'not-found' };
			}
			throw new CorruptStateError(this.filePath, describeError(error));
		}

		let raw: unknown;
		try {
			raw = JSON.parse(contents);
		} catch (error) {
			throw new CorruptStateError(this.filePath, `invalid JSON: ${describeError(error)}`);
		}

		const parsed = StateFileSchema.safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new CorruptStateError(
				this.filePath,
				issue ? `${issue.path.join('.') || 'record'}: ${issue.message}` : 'schema validation failed',
			);
		}

		return { status: 'found', record: fromStateFile(parsed.data) };
	}

	public async save(record: StateRecord): Promise<StateRecord> {
		const saved: StateRecord = { ...record, updatedAt: new Date().toISOString() };
		const contents = JSON.stringify(toStateFile(saved), null, 2) + '\n';

		try {
			await writeFileAtomic(this.filePath, contents);
		} catch (error) {
			throw new StateWriteError(this.filePath, error);
		}

		this.logger.debugSync('State record saved', {
			operation: 'save',
			installedVersion: saved.installedVersion.toString(),
			appliedMigrations: saved.appliedMigrations,
		});
		return saved;
	}
}

function toStateFile(record: StateRecord): StateFile {
	return {
		schemaVersion: STATE_SCHEMA_VERSION,
		installedVersion: record.installedVersion.toString(),
		appliedMigrations: _.sortedUniq([...record.appliedMigrations].sort((a, b) => a - b)),
		serviceFlags: record.serviceFlags,
		...(record.descriptorsDigest !== undefined ? { descriptorsDigest: record.descriptorsDigest } : {}),
		...(record.updatedAt !== undefined ? { updatedAt: record.updatedAt } : {}),
	};
}

function fromStateFile(file: StateFile): StateRecord {
	return {
		installedVersion: Version.parse(file.installedVersion),
		appliedMigrations: _.sortedUniq([...file.appliedMigrations].sort((a, b) => a - b)),
		serviceFlags: file.serviceFlags,
		...(file.descriptorsDigest !== undefined ? { descriptorsDigest: file.descriptorsDigest } : {}),
		...(file.updatedAt !== undefined ? { updatedAt: file.updatedAt } : {}),
	};
}
