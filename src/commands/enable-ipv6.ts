/**
 * enable-ipv6: turn on IPv6 in the Docker daemon configuration so
 * controllers reachable only over link-local IPv6 can be used.
 */

import * as fs from 'fs';
import { DEFAULT_IPV6_CIDR, ExitCode } from '../lib/constants';
import { writeFileAtomic } from '../lib/atomic-write';
import { InvalidArgumentError, isNotFoundError } from '../lib/errors';
import { type CommandContext, runCommand } from './context';

export interface EnableIpv6Options {
	configFile: string;
}

export type DaemonConfig = Record<string, unknown>;

export function enableIpv6(
	context: Pick<CommandContext, 'output' | 'logger'>,
	options: EnableIpv6Options,
): Promise<ExitCode> {
	return runCommand(context, async () => {
		const current = await readDaemonConfig(options.configFile);
		const next = withIpv6(current);
		if (next === current) {
			context.output.info('IPv6 is already enabled');
			return ExitCode.Success;
		}

		await writeFileAtomic(options.configFile, JSON.stringify(next, null, 2) + '\n');
		context.logger.infoSync('Docker daemon config updated', { component: 'cli', path: options.configFile });
		context.output.info(`✅ Enabled IPv6 in ${options.configFile}`);
		context.output.info('Restart the Docker daemon to apply: sudo systemctl restart docker');
		return ExitCode.Success;
	});
}

/**
 * Returns the same object when nothing needs to change
 */
export function withIpv6(config: DaemonConfig): DaemonConfig {
	if (config.ipv6 === true && typeof config['fixed-cidr-v6'] === 'string') {
		return config;
	}
	return {
		...config,
		ipv6: true,
		'fixed-cidr-v6': typeof config['fixed-cidr-v6'] === 'string' ? config['fixed-cidr-v6'] : DEFAULT_IPV6_CIDR,
	};
}

async function readDaemonConfig(configFile: string): Promise<DaemonConfig> {
	let contents: string;
	try {
		contents = await fs.promises.readFile(configFile, 'utf-8');
	} catch (error) {
		if (isNotFoundError(error)) {
			return {};
		}
		throw error;
	}
	if (contents.trim() === '') {
		return {};
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(contents);
	} catch {
		throw new InvalidArgumentError(`${configFile} is not valid JSON`);
	}
	if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
		throw new InvalidArgumentError(`${configFile} must contain a JSON object`);
	}
	return { ...parsed };
}
