/**
 * COMPOSE STORE
 * =============
 *
 * Reads and writes docker-compose.yml as a ServiceDescriptorSet.
 *
 * Everything the descriptor model does not interpret is carried through:
 * unknown service keys land in descriptor.extra, unknown top-level keys in
 * the definition's extensions. Disabled services keep their definition and
 * get the "disabled" profile so `docker compose up` leaves them alone.
 */

import * as fs from 'fs';
import * as path from 'path';
import crypto from 'crypto';
import * as yaml from 'js-yaml';
import _ from 'lodash';
import { writeFileAtomic } from '../lib/atomic-write';
import { COMPOSE_FILE, DISABLED_PROFILE } from '../lib/constants';
import { InvalidComposeError, describeError, isNotFoundError } from '../lib/errors';
import { ComponentLogger } from '../logging/component-logger';
import type { Logger } from '../logging/logger';
import { ServiceDescriptorSet, createDescriptor } from './service-descriptor-set';
import {
	ComposeDocumentSchema,
	type ComposeDefinition,
	type ComposeService,
	type LongPort,
	type LongVolume,
	type ServiceDescriptor,
} from './types';

export class ComposeStore {
	private readonly filePath: string;
	private readonly logger: ComponentLogger;

	constructor(stackDir: string, logger?: Logger) {
		this.filePath = path.join(stackDir, COMPOSE_FILE);
		this.logger = new ComponentLogger(logger, 'ComposeStore');
	}

	public getPath(): string {
		return this.filePath;
	}

	public async read(): Promise<ComposeDefinition> {
		let contents: string;
		try {
			contents = await fs.promises.readFile(this.filePath, 'utf-8');
		} catch (error) {
			if (isNotFoundError(error)) {
				this.logger.debugSync('No compose definition yet', { path: this.filePath });
				return { services: ServiceDescriptorSet.empty(), extensions: {} };
			}
			throw error;
		}
		return parseComposeDocument(contents, this.filePath);
	}

	public async write(definition: ComposeDefinition): Promise<string> {
		const contents = serializeComposeDocument(definition);
		await writeFileAtomic(this.filePath, contents);
		this.logger.debugSync('Compose definition written', {
			operation: 'write',
			services: definition.services.names(),
		});
		return digestOf(contents);
	}

	/**
	 * SHA-256 of the file on disk, undefined when it does not exist
	 */
	public async digest(): Promise<string | undefined> {
		try {
			return digestOf(await fs.promises.readFile(this.filePath, 'utf-8'));
		} catch (error) {
			if (isNotFoundError(error)) {
				return undefined;
			}
			throw error;
		}
	}
}

export function digestOf(contents: string): string {
	return crypto.createHash('sha256').update(contents).digest('hex');
}

export function parseComposeDocument(contents: string, source: string = COMPOSE_FILE): ComposeDefinition {
	let raw: unknown;
	try {
		raw = yaml.load(contents);
	} catch (error) {
		throw new InvalidComposeError(source, describeError(error));
	}
	if (raw === undefined || raw === null) {
		return { services: ServiceDescriptorSet.empty(), extensions: {} };
	}

	const parsed = ComposeDocumentSchema.safeParse(raw);
	if (!parsed.success) {
		const issue = parsed.error.issues[0];
		throw new InvalidComposeError(source, issue ? `${issue.path.join('.')}: ${issue.message}` : 'schema validation failed');
	}

	const { services, ...extensions } = parsed.data;
	const descriptors = Object.entries(services ?? {}).map(([name, service]) => toDescriptor(name, service));

	try {
		return { services: ServiceDescriptorSet.from(descriptors), extensions };
	} catch (error) {
		throw new InvalidComposeError(source, describeError(error));
	}
}

export function serializeComposeDocument(definition: ComposeDefinition): string {
	const { version, ...extensions } = definition.extensions;
	const services: Record<string, Record<string, unknown>> = {};
	for (const descriptor of definition.services.list()) {
		services[descriptor.name] = toComposeService(descriptor);
	}

	const document = {
		...(version !== undefined ? { version } : {}),
		services,
		..._.omit(extensions, 'services'),
	};
	return yaml.dump(document, { lineWidth: -1, noRefs: true, quotingType: '"', forceQuotes: true });
}

function toDescriptor(name: string, service: ComposeService): ServiceDescriptor {
	const { image, environment, ports, volumes, profiles, ...extra } = service;
	const otherProfiles = (profiles ?? []).filter((profile) => profile !== DISABLED_PROFILE);

	return createDescriptor({
		name,
		image: image ?? '',
		environment: normalizeEnvironment(environment),
		ports: (ports ?? []).map(normalizePort),
		volumes: (volumes ?? []).map(normalizeVolume),
		enabled: !(profiles ?? []).includes(DISABLED_PROFILE),
		extra: otherProfiles.length > 0 ? { ...extra, profiles: otherProfiles } : extra,
	});
}

function toComposeService(descriptor: ServiceDescriptor): Record<string, unknown> {
	const { profiles, ...extra } = descriptor.extra;
	const keptProfiles = Array.isArray(profiles)
		? profiles.filter((profile): profile is string => typeof profile === 'string' && profile !== DISABLED_PROFILE)
		: [];
	const allProfiles = descriptor.enabled ? keptProfiles : [...keptProfiles, DISABLED_PROFILE];

	return {
		image: descriptor.image,
		...(allProfiles.length > 0 ? { profiles: allProfiles } : {}),
		...(Object.keys(descriptor.environment).length > 0 ? { environment: sortedRecord(descriptor.environment) } : {}),
		...(descriptor.ports.length > 0 ? { ports: descriptor.ports } : {}),
		...(descriptor.volumes.length > 0 ? { volumes: descriptor.volumes } : {}),
		...extra,
	};
}

function normalizeEnvironment(environment: ComposeService['environment']): Record<string, string> {
	if (!environment) {
		return {};
	}
	if (Array.isArray(environment)) {
		const result: Record<string, string> = {};
		for (const entry of environment) {
			const separator = entry.indexOf('=');
			if (separator === -1) {
				result[entry] = '';
			} else {
				result[entry.slice(0, separator)] = entry.slice(separator + 1);
			}
		}
		return result;
	}
	return _.mapValues(environment, (value) => (value === null ? '' : String(value)));
}

function normalizePort(port: string | number | LongPort): string {
	if (typeof port === 'string' || typeof port === 'number') {
		return String(port);
	}
	const hostIp = port.host_ip ? `${port.host_ip}:` : '';
	const published = port.published !== undefined ? `${port.published}:` : '';
	const protocol = port.protocol && port.protocol !== 'tcp' ? `/${port.protocol}` : '';
	return `${hostIp}${published}${port.target}${protocol}`;
}

function normalizeVolume(volume: string | LongVolume): string {
	if (typeof volume === 'string') {
		return volume;
	}
	const source = volume.source ? `${volume.source}:` : '';
	const mode = volume.read_only ? ':ro' : '';
	return `${source}${volume.target}${mode}`;
}

function sortedRecord(record: Record<string, string>): Record<string, string> {
	const sorted: Record<string, string> = {};
	for (const key of Object.keys(record).sort()) {
		sorted[key] = record[key];
	}
	return sorted;
}
