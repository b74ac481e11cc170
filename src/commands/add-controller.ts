import { ComposeStore } from '../compose/compose-store';
import { EnvFile } from '../compose/env-file';
import { createDescriptor } from '../compose/service-descriptor-set';
import { ExitCode, RELEASE_KEY } from '../lib/constants';
import { InvalidArgumentError } from '../lib/errors';
import { DEVICE_ID_KEY, controllerFlagKey } from '../migrations/steps';
import { StateStore } from '../state/state-store';
import { emptyStateRecord } from '../state/types';
import { type CommandContext, runCommand } from './context';
import { requireStackDirectory, withStackLock } from './stack-directory';

export const CONTROLLER_IMAGE = `brewstack/controller:\${${RELEASE_KEY}}`;

const CONTROLLER_NAME_PATTERN = /^[a-z0-9][a-z0-9_-]*$/;

export interface AddControllerOptions {
	name: string;
	deviceId?: string;
}

/**
 * Adds a controller service. Without a device id the controller connects to
 * the first device it finds; pin it later with --device-id or migrate.
 */
export function addController(context: CommandContext, options: AddControllerOptions): Promise<ExitCode> {
	return runCommand(context, async () => {
		const { name, deviceId } = options;
		if (!CONTROLLER_NAME_PATTERN.test(name)) {
			throw new InvalidArgumentError(`Invalid service name '${name}': use lowercase letters, digits, '-' and '_'`);
		}
		await requireStackDirectory(context.stackDir);

		return withStackLock(context, async () => {
			const composeStore = new ComposeStore(context.stackDir, context.logger);
			const stateStore = new StateStore(context.stackDir, context.logger);
			const compose = await composeStore.read();
			if (compose.services.has(name)) {
				throw new InvalidArgumentError(`Service '${name}' already exists`);
			}

			const services = compose.services.upsert(
				createDescriptor({
					name,
					image: CONTROLLER_IMAGE,
					environment: deviceId ? { [DEVICE_ID_KEY]: deviceId } : {},
					volumes: ['/dev:/dev'],
					extra: { privileged: true, restart: 'unless-stopped' },
				}),
			);
			services.assertValid(await new EnvFile(context.stackDir).read());

			const loaded = await stateStore.load();
			const record = loaded.status === 'found' ? loaded.record : emptyStateRecord();
			const descriptorsDigest = await composeStore.write({ ...compose, services });
			await stateStore.save({
				...record,
				descriptorsDigest,
				serviceFlags: deviceId ? { ...record.serviceFlags, [controllerFlagKey(name)]: deviceId } : record.serviceFlags,
			});

			context.output.info(`✅ Added controller '${name}'${deviceId ? ` for device ${deviceId}` : ''}`);
			context.output.info('Run `brewstack up` to start it');
			return ExitCode.Success;
		});
	});
}
