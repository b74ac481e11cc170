/**
 * Configuration Loader
 * ====================
 * Loads configuration from multiple sources with priority:
 * 1. CLI flags - highest priority
 * 2. Config file (brewstack.config.json in the stack directory)
 * 3. Environment variables (BREWSTACK_*, DOCKER_SOCKET)
 * 4. Default values
 */

import * as fs from 'fs';
import * as path from 'path';
import _ from 'lodash';
import { z } from 'zod';
import { CONFIG_FILE, DEFAULT_DISCOVERY_TIMEOUT_MS, DEFAULT_DOCKER_SOCKET } from '../lib/constants';
import { InvalidArgumentError, isNotFoundError } from '../lib/errors';
import { isLogLevel } from '../logging/types';

export const BrewstackConfigSchema = z
	.object({
		logLevel: z.enum(['debug', 'info', 'warn', 'error']),
		discoveryTimeoutMs: z.number().int().positive(),
		dockerSocket: z.string().min(1),
		pullPolicy: z.enum(['missing', 'always']),
		logToFile: z.boolean(),
	})
	.strict();

export type BrewstackConfig = z.infer<typeof BrewstackConfigSchema>;

export const DEFAULT_CONFIG: BrewstackConfig = {
	logLevel: 'info',
	discoveryTimeoutMs: DEFAULT_DISCOVERY_TIMEOUT_MS,
	dockerSocket: DEFAULT_DOCKER_SOCKET,
	pullPolicy: 'missing',
	logToFile: true,
};

export class ConfigLoader {
	private fileConfig: Partial<BrewstackConfig> = {};
	private envConfig: Partial<BrewstackConfig> = {};
	private readonly configPath: string;

	constructor(
		stackDir: string,
		private readonly env: NodeJS.ProcessEnv = process.env,
	) {
		this.configPath = path.join(stackDir, CONFIG_FILE);
		this.loadEnvConfig();
		this.loadFileConfig();
	}

	public getConfigPath(): string {
		return this.configPath;
	}

	/**
	 * Get merged configuration (flags override file overrides env overrides defaults)
	 */
	public getConfig(overrides: Partial<BrewstackConfig> = {}): BrewstackConfig {
		return {
			...DEFAULT_CONFIG,
			...this.envConfig,
			...this.fileConfig,
			...withoutUndefined(overrides),
		};
	}

	public reload(): void {
		this.loadEnvConfig();
		this.loadFileConfig();
	}

	private loadFileConfig(): void {
		let content: string;
		try {
			content = fs.readFileSync(this.configPath, 'utf-8');
		} catch (error) {
			if (isNotFoundError(error)) {
				this.fileConfig = {};
				return;
			}
			throw error;
		}

		let raw: unknown;
		try {
			raw = JSON.parse(content);
		} catch {
			throw new InvalidArgumentError(`${this.configPath} is not valid JSON`);
		}

		const parsed = BrewstackConfigSchema.partial().safeParse(raw);
		if (!parsed.success) {
			const issue = parsed.error.issues[0];
			throw new InvalidArgumentError(
				`${this.configPath}: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid configuration'}`,
			);
		}
		this.fileConfig = withoutUndefined(parsed.data);
	}

	private loadEnvConfig(): void {
		const logLevel = this.env.BREWSTACK_LOG_LEVEL;
		const pullPolicy = this.env.BREWSTACK_PULL_POLICY;

		this.envConfig = withoutUndefined({
			logLevel: logLevel !== undefined && isLogLevel(logLevel) ? logLevel : undefined,
			discoveryTimeoutMs: this.parseNumber(this.env.BREWSTACK_DISCOVERY_TIMEOUT_MS),
			dockerSocket: this.env.DOCKER_SOCKET || undefined,
			pullPolicy: pullPolicy === 'missing' || pullPolicy === 'always' ? pullPolicy : undefined,
			logToFile: this.parseBoolean(this.env.BREWSTACK_LOG_TO_FILE),
		});
	}

	// ========================================================================
	// Helpers
	// ========================================================================

	private parseNumber(value: string | undefined): number | undefined {
		if (value === undefined) return undefined;
		const num = parseInt(value, 10);
		return isNaN(num) || num <= 0 ? undefined : num;
	}

	private parseBoolean(value: string | undefined): boolean | undefined {
		if (value === undefined) return undefined;
		return value === 'true' || value === '1' || value === 'yes';
	}
}

function withoutUndefined<T extends object>(config: T): Partial<T> {
	return _.omitBy<T>(config, _.isUndefined);
}
