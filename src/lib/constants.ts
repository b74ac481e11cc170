/**
 * Constants shared by the engine, the stores and the CLI
 */

// Version of the stack this build converges hosts to
export const STACK_VERSION = '0.7.0';

export const DEFAULT_STACK_DIR = './brewstack';
export const DEFAULT_RELEASE = 'edge';
export const DEFAULT_PROJECT_NAME = 'brewstack';

export const COMPOSE_FILE = 'docker-compose.yml';
export const ENV_FILE = '.env';
export const CONFIG_FILE = 'brewstack.config.json';
export const STATE_DIR = '.brewstack';
export const STATE_FILE = 'state.json';
export const LOCK_FILE = 'lock';
export const LOG_DIR = 'logs';
export const LOG_FILE = 'brewstack.log';

// .env keys
export const RELEASE_KEY = 'BREWSTACK_RELEASE';
export const SKIP_CONFIRM_KEY = 'BREWSTACK_SKIP_CONFIRM';
export const PROJECT_KEY = 'COMPOSE_PROJECT_NAME';
export const HTTP_PORT_KEY = 'BREWSTACK_PORT_HTTP';
export const HTTPS_PORT_KEY = 'BREWSTACK_PORT_HTTPS';

// Profile that keeps a service in the compose file without starting it
export const DISABLED_PROFILE = 'disabled';

export const DEFAULT_DISCOVERY_TIMEOUT_MS = 5000;
export const MDNS_SERVICE_TYPE = 'brewstack';

export const FLASHER_IMAGE = 'brewstack/firmware-flasher';

export const DEFAULT_DOCKER_SOCKET = '/var/run/docker.sock';
export const DEFAULT_DAEMON_CONFIG = '/etc/docker/daemon.json';
export const DEFAULT_IPV6_CIDR = '2001:db8:1::/64';

// Labels for managed containers and networks
export const LABEL_PROJECT = 'brewstack.project';
export const LABEL_SERVICE = 'brewstack.service';
export const LABEL_DIGEST = 'brewstack.config-digest';

export const ExitCode = {
	Success: 0,
	Failed: 1,
	UserError: 2,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];
