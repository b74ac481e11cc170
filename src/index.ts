export { Version } from './version/version';
export * from './lib/errors';
export * from './lib/constants';
export { interpolate } from './lib/interpolate';
export * from './logging';
export * from './state/types';
export { StateStore } from './state/state-store';
export { acquireLock, lockPathFor } from './state/lock-file';
export type { LockHandle } from './state/lock-file';
export * from './compose/types';
export { ServiceDescriptorSet, createDescriptor } from './compose/service-descriptor-set';
export { ComposeStore, digestOf, parseComposeDocument, serializeComposeDocument } from './compose/compose-store';
export { EnvFile } from './compose/env-file';
export type { EnvDeclarations } from './compose/env-file';
export * from './migrations';
export * from './engine';
export * from './discovery/types';
export { boundedDiscovery, memoizedDiscovery } from './discovery/bounded-discovery';
export { MdnsDiscovery } from './discovery/mdns-discovery';
export * from './runtime/types';
export { planReconciliation, isNoop } from './runtime/reconcile-plan';
export { toRuntimeSpecs } from './runtime/runtime-spec';
export { ContainerRuntime } from './runtime/container-runtime';
export { DockerContainerOperations } from './runtime/docker-operations';
export type { PullPolicy } from './runtime/docker-operations';
export { ConfigLoader, DEFAULT_CONFIG } from './config/config-loader';
export type { BrewstackConfig } from './config/config-loader';
