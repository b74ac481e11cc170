import { Version } from '../../version/version';
import type { MigrationStep } from '../types';
import { withFlag } from './flags';

export const PROXY_VERSION_FLAG = 'proxy.version';
export const TRAEFIK_V2_IMAGE = 'traefik:v2.10';

export const TRAEFIK_V2_COMMAND = [
	'--api.dashboard=true',
	'--providers.docker=true',
	'--providers.docker.exposedbydefault=false',
	'--entrypoints.web.address=:80',
	'--entrypoints.websecure.address=:443',
];

const TRAEFIK_V1_PATTERN = /^traefik:v?1(\.|$)/;

export const proxyV2: MigrationStep = {
	id: 5,
	name: 'proxy-v2',
	description: 'Move the proxy from Traefik v1 to Traefik v2',
	range: { lower: Version.parse('0.6.0') },
	idempotent: true,
	transform: ({ state, services, env }, { logger }) => {
		const proxy = services.get('proxy');
		if (!proxy || !TRAEFIK_V1_PATTERN.test(proxy.image)) {
			return { state, services, env };
		}

		logger.infoSync('Upgrading proxy to Traefik v2', { from: proxy.image, to: TRAEFIK_V2_IMAGE });
		return {
			state: withFlag(state, PROXY_VERSION_FLAG, 2),
			services: services.update('proxy', (descriptor) => ({
				...descriptor,
				image: TRAEFIK_V2_IMAGE,
				extra: { ...descriptor.extra, command: [...TRAEFIK_V2_COMMAND] },
			})),
			env,
		};
	},
};
