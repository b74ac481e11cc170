import { z } from 'zod';
import type { ServiceDescriptorSet } from './service-descriptor-set';

export interface ServiceDescriptor {
	/** Compose service name, unique within the stack */
	name: string;
	/** Image reference; may contain ${VAR} references to .env declarations */
	image: string;
	environment: Record<string, string>;
	/** Short syntax, e.g. "80:80" or "127.0.0.1:5984:5984/tcp" */
	ports: string[];
	/** Short syntax, e.g. "./redis:/data" or "history-data:/var/lib/influxdb:ro" */
	volumes: string[];
	enabled: boolean;
	/** Every other compose key (restart, command, labels, depends_on, ...) */
	extra: Record<string, unknown>;
}

export type ServiceDescriptorInput = Pick<ServiceDescriptor, 'name' | 'image'> &
	Partial<Omit<ServiceDescriptor, 'name' | 'image'>>;

export interface ComposeDefinition {
	services: ServiceDescriptorSet;
	/** Top-level keys other than services (version, networks, volumes, x-*) */
	extensions: Record<string, unknown>;
}

// ============================================================================
// On-disk schema (docker-compose.yml)
// ============================================================================

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const LongPortSchema = z
	.object({
		target: z.union([z.number(), z.string()]),
		published: z.union([z.number(), z.string()]).optional(),
		protocol: z.string().optional(),
		host_ip: z.string().optional(),
	})
	.passthrough();

const LongVolumeSchema = z
	.object({
		type: z.string().optional(),
		source: z.string().optional(),
		target: z.string(),
		read_only: z.boolean().optional(),
	})
	.passthrough();

export const ComposeServiceSchema = z
	.object({
		image: z.string().optional(),
		environment: z.union([z.record(ScalarSchema), z.array(z.string())]).optional(),
		ports: z.array(z.union([z.string(), z.number(), LongPortSchema])).optional(),
		volumes: z.array(z.union([z.string(), LongVolumeSchema])).optional(),
		profiles: z.array(z.string()).optional(),
	})
	.passthrough();

export const ComposeDocumentSchema = z
	.object({
		services: z.record(ComposeServiceSchema).nullable().optional(),
	})
	.passthrough();

export type ComposeService = z.infer<typeof ComposeServiceSchema>;
export type LongPort = z.infer<typeof LongPortSchema>;
export type LongVolume = z.infer<typeof LongVolumeSchema>;
