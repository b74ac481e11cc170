import { MigrationRegistry } from '../migration-registry';
import type { MigrationStep } from '../types';
import { controllerIdentities } from './controller-identities';
import { coreServices } from './core-services';
import { envDefaults } from './env-defaults';
import { proxyV2 } from './proxy-v2';
import { redisDatastore } from './redis-datastore';

export const BUILTIN_MIGRATIONS: readonly MigrationStep[] = [
	envDefaults,
	coreServices,
	redisDatastore,
	controllerIdentities,
	proxyV2,
];

export function builtinRegistry(): MigrationRegistry {
	return new MigrationRegistry(BUILTIN_MIGRATIONS);
}

export { envDefaults, coreServices, redisDatastore, controllerIdentities, proxyV2 };
export { CORE_SERVICES } from './core-services';
export { DATASTORE_ENGINE_FLAG } from './redis-datastore';
export { DEVICE_ID_KEY, isControllerService } from './controller-identities';
export { PROXY_VERSION_FLAG, TRAEFIK_V2_COMMAND, TRAEFIK_V2_IMAGE } from './proxy-v2';
export { controllerFlagKey } from './flags';
