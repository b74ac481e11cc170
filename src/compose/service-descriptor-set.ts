/**
 * SERVICE DESCRIPTOR SET
 * ======================
 *
 * Immutable collection of the stack's services keyed by name. Every
 * mutation returns a new set, so migrations can be compared before/after
 * and a failed transform never touches the committed set.
 *
 * Invariants:
 *   - names are unique and valid compose service names
 *   - an enabled descriptor's image resolves against the .env declarations
 */

import _ from 'lodash';
import { InvalidDescriptorError } from '../lib/errors';
import { interpolate } from '../lib/interpolate';
import type { ServiceDescriptor, ServiceDescriptorInput } from './types';

const SERVICE_NAME_PATTERN = /^[a-zA-Z0-9][a-zA-Z0-9._-]*$/;

export function createDescriptor(input: ServiceDescriptorInput): ServiceDescriptor {
	return {
		name: input.name,
		image: input.image,
		environment: { ...input.environment },
		ports: [...(input.ports ?? [])],
		volumes: [...(input.volumes ?? [])],
		enabled: input.enabled ?? true,
		extra: _.cloneDeep(input.extra ?? {}),
	};
}

export interface ResolvedImage {
	image: string;
	missing: string[];
}

export class ServiceDescriptorSet {
	private readonly byName: ReadonlyMap<string, ServiceDescriptor>;

	private constructor(byName: Map<string, ServiceDescriptor>) {
		this.byName = byName;
	}

	static empty(): ServiceDescriptorSet {
		return new ServiceDescriptorSet(new Map());
	}

	static from(descriptors: Iterable<ServiceDescriptor>): ServiceDescriptorSet {
		const byName = new Map<string, ServiceDescriptor>();
		for (const descriptor of descriptors) {
			assertValidName(descriptor.name);
			if (byName.has(descriptor.name)) {
				throw new InvalidDescriptorError(`Duplicate service name '${descriptor.name}'`);
			}
			byName.set(descriptor.name, _.cloneDeep(descriptor));
		}
		return new ServiceDescriptorSet(byName);
	}

	get size(): number {
		return this.byName.size;
	}

	has(name: string): boolean {
		return this.byName.has(name);
	}

	get(name: string): ServiceDescriptor | undefined {
		const descriptor = this.byName.get(name);
		return descriptor ? _.cloneDeep(descriptor) : undefined;
	}

	names(): string[] {
		return [...this.byName.keys()].sort();
	}

	/**
	 * All descriptors, sorted by name
	 */
	list(): ServiceDescriptor[] {
		return this.names().map((name) => _.cloneDeep(this.require(name)));
	}

	enabled(): ServiceDescriptor[] {
		return this.list().filter((descriptor) => descriptor.enabled);
	}

	upsert(descriptor: ServiceDescriptor): ServiceDescriptorSet {
		assertValidName(descriptor.name);
		const next = new Map(this.byName);
		next.set(descriptor.name, _.cloneDeep(descriptor));
		return new ServiceDescriptorSet(next);
	}

	/**
	 * Insert only when no service of that name exists
	 */
	ensure(descriptor: ServiceDescriptor): ServiceDescriptorSet {
		return this.has(descriptor.name) ? this : this.upsert(descriptor);
	}

	remove(name: string): ServiceDescriptorSet {
		if (!this.byName.has(name)) {
			return this;
		}
		const next = new Map(this.byName);
		next.delete(name);
		return new ServiceDescriptorSet(next);
	}

	update(name: string, change: (descriptor: ServiceDescriptor) => ServiceDescriptor): ServiceDescriptorSet {
		const updated = change(_.cloneDeep(this.require(name)));
		if (updated.name !== name) {
			if (this.byName.has(updated.name)) {
				throw new InvalidDescriptorError(`Cannot rename '${name}' to existing service '${updated.name}'`);
			}
			return this.remove(name).upsert(updated);
		}
		return this.upsert(updated);
	}

	setEnabled(name: string, enabled: boolean): ServiceDescriptorSet {
		return this.update(name, (descriptor) => ({ ...descriptor, enabled }));
	}

	resolveImage(name: string, env: Record<string, string>): ResolvedImage {
		const { value, missing } = interpolate(this.require(name).image, env);
		return { image: value.trim(), missing };
	}

	/**
	 * Invariant violations, one message per problem
	 */
	validate(env: Record<string, string>): string[] {
		const problems: string[] = [];
		for (const descriptor of this.enabled()) {
			const { image, missing } = this.resolveImage(descriptor.name, env);
			if (missing.length > 0) {
				problems.push(
					`Service '${descriptor.name}': image '${descriptor.image}' references undefined variable(s) ${missing.join(', ')}`,
				);
			} else if (image === '') {
				problems.push(`Service '${descriptor.name}' is enabled but has no image`);
			}
		}
		return problems;
	}

	assertValid(env: Record<string, string>): void {
		const problems = this.validate(env);
		if (problems.length > 0) {
			throw new InvalidDescriptorError(problems.join('; '));
		}
	}

	equals(other: ServiceDescriptorSet): boolean {
		return _.isEqual(this.list(), other.list());
	}

	toJSON(): ServiceDescriptor[] {
		return this.list();
	}

	private require(name: string): ServiceDescriptor {
		const descriptor = this.byName.get(name);
		if (!descriptor) {
			throw new InvalidDescriptorError(`Unknown service '${name}'`);
		}
		return descriptor;
	}
}

function assertValidName(name: string): void {
	if (!SERVICE_NAME_PATTERN.test(name)) {
		throw new InvalidDescriptorError(`Invalid service name '${name}'`);
	}
}
