/**
 * Environment declaration file (.env) for the stack.
 *
 * Values are parsed with dotenv. Writes edit the file line by line: only the
 * lines of changed or removed keys are touched, so comments and operator
 * overrides survive every migration.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import _ from 'lodash';
import { writeFileAtomic } from '../lib/atomic-write';
import { ENV_FILE } from '../lib/constants';
import { InvalidArgumentError, isNotFoundError } from '../lib/errors';

export type EnvDeclarations = Record<string, string>;

const ASSIGNMENT_PATTERN = /^\s*(?:export\s+)?([\w.-]+)\s*=/;
const BARE_VALUE_PATTERN = /^[\w./:@,+${}-]*$/;

export class EnvFile {
	private readonly filePath: string;

	constructor(stackDir: string, fileName: string = ENV_FILE) {
		this.filePath = path.join(stackDir, fileName);
	}

	public getPath(): string {
		return this.filePath;
	}

	public async read(): Promise<EnvDeclarations> {
		return dotenv.parse(await this.readText());
	}

	public async get(key: string): Promise<string | undefined> {
		const values = await this.read();
		return Object.prototype.hasOwnProperty.call(values, key) ? values[key] : undefined;
	}

	public async set(key: string, value: string): Promise<void> {
		const values = await this.read();
		await this.write({ ...values, [key]: value });
	}

	/**
	 * Make the file declare exactly `next`, preserving untouched lines
	 */
	public async write(next: EnvDeclarations): Promise<boolean> {
		const text = await this.readText();
		const current = dotenv.parse(text);
		if (_.isEqual(current, next)) {
			return false;
		}

		const written = new Set<string>();
		const lines: string[] = [];
		const sourceLines = text === '' ? [] : text.replace(/\r?\n$/, '').split(/\r?\n/);
		const occurrences = _.countBy(sourceLines.map((line) => ASSIGNMENT_PATTERN.exec(line)?.[1] ?? ''));

		for (const line of sourceLines) {
			const match = ASSIGNMENT_PATTERN.exec(line);
			if (!match) {
				lines.push(line);
				continue;
			}
			const key = match[1];
			if (!Object.prototype.hasOwnProperty.call(next, key)) {
				continue;
			}
			if (written.has(key)) {
				// Later duplicates would override the rewritten value
				continue;
			}
			written.add(key);
			const unchanged = current[key] === next[key] && occurrences[key] === 1;
			lines.push(unchanged ? line : formatEntry(key, next[key]));
		}

		for (const key of Object.keys(next)) {
			if (!written.has(key)) {
				lines.push(formatEntry(key, next[key]));
			}
		}

		await writeFileAtomic(this.filePath, lines.join('\n') + '\n');
		return true;
	}

	private async readText(): Promise<string> {
		try {
			return await fs.promises.readFile(this.filePath, 'utf-8');
		} catch (error) {
			if (isNotFoundError(error)) {
				return '';
			}
			throw error;
		}
	}
}

/**
 * dotenv unescapes nothing but \n and \r, and only inside double quotes, so
 * a value is written in the first quoting that holds it unchanged
 */
export function formatEntry(key: string, value: string): string {
	if (BARE_VALUE_PATTERN.test(value)) {
		return `${key}=${value}`;
	}
	const multiline = /[\r\n]/.test(value);
	if (!multiline && !value.includes("'")) {
		return `${key}='${value}'`;
	}
	if (!value.includes('"') && !value.includes('\r') && !/\\[nr]/.test(value)) {
		return `${key}="${value.replace(/\n/g, '\\n')}"`;
	}
	if (!multiline && !value.includes('`')) {
		return `${key}=\`${value}\``;
	}
	throw new InvalidArgumentError(`The value of ${key} cannot be written to ${ENV_FILE}`);
}
