/**
 * mDNS discovery of brewing controllers.
 *
 * Controllers advertise _brewstack._tcp with TXT records:
 *   id    device identity
 *   model hardware model
 *   caps  comma-separated capability flags
 */

import { Bonjour } from 'bonjour-service';
import { EventEmitter } from 'events';
import { MDNS_SERVICE_TYPE } from '../lib/constants';
import { toError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import type { DiscoveredDevice, DiscoveryAdapter } from './types';

export interface AdvertisedService {
	name: string;
	host: string;
	port: number;
	addresses?: string[];
	referer?: { address: string };
	txt?: unknown;
}

export class MdnsDiscovery implements DiscoveryAdapter {
	private readonly logger: ComponentLogger;

	constructor(
		logger?: Logger,
		private readonly serviceType: string = MDNS_SERVICE_TYPE,
	) {
		this.logger = new ComponentLogger(logger, 'MdnsDiscovery');
	}

	/**
	 * Browses for timeoutMs. A socket error (port 5353 busy, no permission)
	 * ends the browse early with whatever was found until then.
	 */
	enumerate(timeoutMs: number): Promise<DiscoveredDevice[]> {
		return new Promise<DiscoveredDevice[]>((resolve) => {
			const devices = new Map<string, DiscoveredDevice>();
			let browser: ReturnType<Bonjour['find']> | undefined;
			let timer: NodeJS.Timeout | undefined;
			let finished = false;

			const finish = (): void => {
				if (finished) {
					return;
				}
				finished = true;
				clearTimeout(timer);
				browser?.stop();
				bonjour.destroy();
				resolve([...devices.values()].sort((a, b) => a.id.localeCompare(b.id)));
			};

			const onError = (error: unknown): void => {
				this.logger.warnSync('mDNS browse failed', { error: toError(error).message, found: devices.size });
				finish();
			};

			const bonjour = new Bonjour({}, onError);
			multicastSocketOf(bonjour)?.on('error', onError);

			browser = bonjour.find({ type: this.serviceType, protocol: 'tcp' }, (service) => {
				const device = toDiscoveredDevice(service);
				if (device && !devices.has(device.id)) {
					this.logger.debugSync('Controller found', { id: device.id, address: device.address });
					devices.set(device.id, device);
				}
			});
			if (!finished) {
				timer = setTimeout(finish, timeoutMs);
			}
		});
	}
}

/**
 * The multicast-dns emitter behind a Bonjour instance. bonjour-service does
 * not forward its socket errors, and an 'error' event without a listener
 * throws.
 */
function multicastSocketOf(bonjour: Bonjour): EventEmitter | undefined {
	const server: unknown = Reflect.get(bonjour, 'server');
	if (typeof server === 'object' && server !== null && 'mdns' in server && server.mdns instanceof EventEmitter) {
		return server.mdns;
	}
	return undefined;
}

export function toDiscoveredDevice(service: AdvertisedService): DiscoveredDevice | undefined {
	const txt = readTxt(service.txt);
	const id = txt.id ?? service.name;
	const address = service.addresses?.find((candidate) => !candidate.includes(':')) ??
		service.addresses?.[0] ??
		service.referer?.address;

	if (!id || !address) {
		return undefined;
	}

	return {
		id,
		address,
		host: service.host,
		port: service.port,
		...(txt.model ? { model: txt.model } : {}),
		capabilities: txt.caps ? txt.caps.split(',').map((cap) => cap.trim()).filter((cap) => cap !== '') : [],
	};
}

function readTxt(txt: unknown): Record<string, string> {
	const result: Record<string, string> = {};
	if (typeof txt !== 'object' || txt === null) {
		return result;
	}
	for (const [key, value] of Object.entries(txt)) {
		if (typeof value === 'string') {
			result[key.toLowerCase()] = value;
		} else if (Buffer.isBuffer(value)) {
			result[key.toLowerCase()] = value.toString('utf-8');
		}
	}
	return result;
}
