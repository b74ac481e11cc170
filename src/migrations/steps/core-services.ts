import { createDescriptor } from '../../compose/service-descriptor-set';
import type { ServiceDescriptor } from '../../compose/types';
import { HTTPS_PORT_KEY, HTTP_PORT_KEY, RELEASE_KEY } from '../../lib/constants';
import { Version } from '../../version/version';
import type { MigrationStep } from '../types';

const RELEASE_TAG = `\${${RELEASE_KEY}}`;

/**
 * The services every stack runs, as they were first introduced.
 * Later steps move them forward.
 */
export const CORE_SERVICES: readonly ServiceDescriptor[] = [
	createDescriptor({
		name: 'eventbus',
		image: 'eclipse-mosquitto:2.0',
		volumes: ['./eventbus:/mosquitto/data'],
		extra: { restart: 'unless-stopped' },
	}),
	createDescriptor({
		name: 'history',
		image: `brewstack/history:${RELEASE_TAG}`,
		environment: { EVENTBUS_HOST: 'eventbus' },
		extra: { restart: 'unless-stopped', depends_on: ['eventbus'] },
	}),
	createDescriptor({
		name: 'datastore',
		image: 'treehouses/couchdb:2.3.1',
		volumes: ['./couchdb:/opt/couchdb/data'],
		extra: { restart: 'unless-stopped' },
	}),
	createDescriptor({
		name: 'ui',
		image: `brewstack/ui:${RELEASE_TAG}`,
		extra: { restart: 'unless-stopped' },
	}),
	createDescriptor({
		name: 'proxy',
		image: 'traefik:v1.7',
		ports: [`\${${HTTP_PORT_KEY}}:80`, `\${${HTTPS_PORT_KEY}}:443`],
		volumes: ['/var/run/docker.sock:/var/run/docker.sock'],
		extra: {
			restart: 'unless-stopped',
			command: '--api --docker --docker.exposedbydefault=false',
		},
	}),
];

export const coreServices: MigrationStep = {
	id: 2,
	name: 'core-services',
	description: 'Add the event bus, history, datastore, UI and proxy services',
	range: { lower: Version.ZERO },
	idempotent: true,
	transform: ({ state, services, env }) => ({
		state,
		services: CORE_SERVICES.reduce((set, descriptor) => set.ensure(descriptor), services),
		env,
	}),
};
