import { boundedDiscovery } from '../discovery/bounded-discovery';
import { ExitCode } from '../lib/constants';
import { InvalidArgumentError } from '../lib/errors';
import { type CommandContext, runCommand } from './context';

export interface DiscoverOptions {
	/** Milliseconds; defaults to the configured discovery timeout */
	timeoutMs?: number;
}

export function discover(context: CommandContext, options: DiscoverOptions): Promise<ExitCode> {
	return runCommand(context, async () => {
		const timeoutMs = options.timeoutMs ?? context.config.discoveryTimeoutMs;
		if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
			throw new InvalidArgumentError(`Invalid discovery timeout '${timeoutMs}'`);
		}

		context.output.info(`🔍 Looking for controllers (${timeoutMs}ms)...`);
		const devices = await boundedDiscovery(context.createDiscovery(), { timeoutMs, logger: context.logger });
		if (devices.length === 0) {
			context.output.info('No controllers found');
			return ExitCode.Success;
		}
		for (const device of devices) {
			const model = device.model ? ` ${device.model}` : '';
			const caps = device.capabilities.length > 0 ? ` [${device.capabilities.join(', ')}]` : '';
			context.output.info(`${device.id}${model} ${device.address}${caps}`);
		}
		return ExitCode.Success;
	});
}
