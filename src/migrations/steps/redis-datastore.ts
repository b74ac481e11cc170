import { createDescriptor } from '../../compose/service-descriptor-set';
import { Version } from '../../version/version';
import type { MigrationStep } from '../types';
import { withFlag } from './flags';

export const DATASTORE_ENGINE_FLAG = 'datastore.engine';

const REDIS = createDescriptor({
	name: 'redis',
	image: 'redis:6.0',
	volumes: ['./redis:/data'],
	extra: { restart: 'unless-stopped', command: '--appendonly yes' },
});

export const redisDatastore: MigrationStep = {
	id: 3,
	name: 'redis-datastore',
	description: 'Replace the CouchDB datastore with Redis',
	range: { lower: Version.parse('0.3.0') },
	idempotent: true,
	transform: ({ state, services, env }, { logger }) => {
		let next = services;
		const datastore = services.get('datastore');
		if (datastore && datastore.enabled && datastore.image.includes('couchdb')) {
			// Data stays on disk under ./couchdb for manual export
			logger.infoSync('Disabling CouchDB datastore', { image: datastore.image });
			next = next.setEnabled('datastore', false);
		}
		return {
			state: withFlag(state, DATASTORE_ENGINE_FLAG, 'redis'),
			services: next.ensure(REDIS),
			env,
		};
	},
};
