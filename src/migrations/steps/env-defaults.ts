import { DEFAULT_PROJECT_NAME, DEFAULT_RELEASE, HTTPS_PORT_KEY, HTTP_PORT_KEY, PROJECT_KEY, RELEASE_KEY } from '../../lib/constants';
import { Version } from '../../version/version';
import type { MigrationStep } from '../types';

const DEFAULTS: Record<string, string> = {
	[RELEASE_KEY]: DEFAULT_RELEASE,
	[PROJECT_KEY]: DEFAULT_PROJECT_NAME,
	[HTTP_PORT_KEY]: '80',
	[HTTPS_PORT_KEY]: '443',
};

export const envDefaults: MigrationStep = {
	id: 1,
	name: 'env-defaults',
	description: 'Declare release track, project name and proxy ports in .env',
	range: { lower: Version.ZERO },
	idempotent: true,
	transform: ({ state, services, env }) => ({
		state,
		services,
		// Operator values win
		env: { ...DEFAULTS, ...env },
	}),
};
