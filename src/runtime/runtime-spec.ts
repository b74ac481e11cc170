/**
 * Converts compose descriptors into concrete runtime specs: variables
 * interpolated, relative bind mounts resolved against the stack directory,
 * the extra keys the runtime understands lifted out, and a config digest.
 */

import * as path from 'path';
import crypto from 'crypto';
import _ from 'lodash';
import type { ServiceDescriptor } from '../compose/types';
import type { ServiceDescriptorSet } from '../compose/service-descriptor-set';
import { interpolate } from '../lib/interpolate';
import type { RuntimeServiceSpec, UnresolvedService } from './types';

export interface RuntimeSpecResult {
	specs: RuntimeServiceSpec[];
	/** Undefined variables substituted with empty strings, one message per service */
	warnings: string[];
	/** Enabled services without a usable image */
	unresolved: UnresolvedService[];
}

export function toRuntimeSpecs(
	services: ServiceDescriptorSet,
	env: Record<string, string>,
	stackDir: string,
): RuntimeSpecResult {
	const warnings: string[] = [];
	const specs: RuntimeServiceSpec[] = [];
	const unresolved: UnresolvedService[] = [];

	for (const descriptor of services.enabled()) {
		const missing: string[] = [];
		const sub = (text: string): string => {
			const result = interpolate(text, env);
			missing.push(...result.missing);
			return result.value;
		};

		const image = interpolate(descriptor.image, env);
		if (image.missing.length > 0 || image.value.trim() === '') {
			unresolved.push({ service: descriptor.name, error: `Service '${descriptor.name}' has no resolvable image` });
			continue;
		}

		specs.push(buildSpec(descriptor, image.value.trim(), sub, stackDir));
		if (missing.length > 0) {
			warnings.push(`Service '${descriptor.name}': undefined variable(s) ${_.uniq(missing).join(', ')} set to ''`);
		}
	}

	return { specs, warnings, unresolved };
}

function buildSpec(
	descriptor: ServiceDescriptor,
	image: string,
	sub: (text: string) => string,
	stackDir: string,
): RuntimeServiceSpec {
	const { command, restart, privileged, labels } = descriptor.extra;

	const withoutDigest: Omit<RuntimeServiceSpec, 'digest'> = {
		name: descriptor.name,
		image,
		environment: _.mapValues(descriptor.environment, sub),
		ports: descriptor.ports.map(sub),
		volumes: descriptor.volumes.map((volume) => resolveBindMount(sub(volume), stackDir)),
		...toCommand(command, sub),
		...(typeof restart === 'string' ? { restart } : {}),
		...(privileged === true ? { privileged: true } : {}),
		labels: toLabels(labels, sub),
	};

	return { ...withoutDigest, digest: specDigest(withoutDigest) };
}

export function specDigest(spec: Omit<RuntimeServiceSpec, 'digest'>): string {
	const canonical = {
		name: spec.name,
		image: spec.image,
		environment: Object.entries(spec.environment).sort(([a], [b]) => a.localeCompare(b)),
		ports: spec.ports,
		volumes: spec.volumes,
		command: spec.command ?? null,
		restart: spec.restart ?? null,
		privileged: spec.privileged ?? false,
		labels: Object.entries(spec.labels).sort(([a], [b]) => a.localeCompare(b)),
	};
	return crypto.createHash('sha256').update(JSON.stringify(canonical)).digest('hex');
}

export function resolveBindMount(volume: string, stackDir: string): string {
	if (!volume.startsWith('./') && !volume.startsWith('../')) {
		return volume;
	}
	const separator = volume.indexOf(':');
	const source = separator === -1 ? volume : volume.slice(0, separator);
	const rest = separator === -1 ? '' : volume.slice(separator);
	return `${path.resolve(stackDir, source)}${rest}`;
}

function toCommand(command: unknown, sub: (text: string) => string): { command?: string[] } {
	if (typeof command === 'string') {
		return { command: command.split(/\s+/).filter((part) => part !== '').map(sub) };
	}
	if (Array.isArray(command)) {
		return { command: command.map((part) => sub(String(part))) };
	}
	return {};
}

function toLabels(labels: unknown, sub: (text: string) => string): Record<string, string> {
	const result: Record<string, string> = {};
	if (Array.isArray(labels)) {
		for (const entry of labels) {
			const [key, ...value] = String(entry).split('=');
			result[key] = sub(value.join('='));
		}
	} else if (typeof labels === 'object' && labels !== null) {
		for (const [key, value] of Object.entries(labels)) {
			result[key] = sub(String(value));
		}
	}
	return result;
}
