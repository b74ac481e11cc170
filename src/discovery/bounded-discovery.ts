/**
 * Time-bounded discovery.
 *
 * Discovery is best effort: a timeout or an adapter error degrades to an
 * empty result and a warning. Callers never wait longer than
 * timeoutMs + graceMs.
 */

import { DiscoveryTimeoutError, toError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import type { DiscoveredDevice, DiscoveryAdapter } from './types';

export interface BoundedDiscoveryOptions {
	timeoutMs: number;
	/** Extra time the adapter gets to wrap up after its own timeout */
	graceMs?: number;
	logger?: Logger;
}

export async function boundedDiscovery(
	adapter: DiscoveryAdapter,
	options: BoundedDiscoveryOptions,
): Promise<DiscoveredDevice[]> {
	const log = new ComponentLogger(options.logger, 'Discovery');
	const limitMs = options.timeoutMs + (options.graceMs ?? 250);
	let timer: NodeJS.Timeout | undefined;

	const timeout = new Promise<never>((_resolve, reject) => {
		timer = setTimeout(() => reject(new DiscoveryTimeoutError(limitMs)), limitMs);
	});

	try {
		const devices = await Promise.race([adapter.enumerate(options.timeoutMs), timeout]);
		log.debugSync('Discovery finished', { devices: devices.length });
		return devices;
	} catch (error) {
		const reason = toError(error);
		log.warnSync('Discovery unavailable, continuing without devices', {
			reason: reason.message,
			timedOut: reason instanceof DiscoveryTimeoutError,
		});
		return [];
	} finally {
		clearTimeout(timer);
	}
}

/**
 * Runs discovery at most once and reuses the result
 */
export function memoizedDiscovery(
	adapter: DiscoveryAdapter | undefined,
	options: BoundedDiscoveryOptions,
): () => Promise<DiscoveredDevice[]> {
	let result: Promise<DiscoveredDevice[]> | undefined;
	return () => {
		if (!adapter) {
			return Promise.resolve([]);
		}
		result ??= boundedDiscovery(adapter, options);
		return result;
	};
}
