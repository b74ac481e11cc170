import type { ServiceDescriptorSet } from '../../compose/service-descriptor-set';
import type { ServiceDescriptor } from '../../compose/types';
import type { StateRecord } from '../../state/types';
import { Version } from '../../version/version';
import type { MigrationStep } from '../types';
import { controllerFlagKey, withFlag } from './flags';

export const DEVICE_ID_KEY = 'DEVICE_ID';

const CONTROLLER_IMAGE_PATTERN = /(^|\/)controller(:|@|$)/;

export function isControllerService(descriptor: ServiceDescriptor): boolean {
	return CONTROLLER_IMAGE_PATTERN.test(descriptor.image);
}

/**
 * Pins every controller service to a device id.
 *
 * Known ids come from the service itself or from state flags; the rest are
 * assigned from discovered devices that no other controller claims. When
 * discovery finds nothing the service is left unpinned.
 */
export const controllerIdentities: MigrationStep = {
	id: 4,
	name: 'controller-identities',
	description: 'Pin controller services to a device id',
	range: { lower: Version.parse('0.5.0') },
	idempotent: true,
	transform: async ({ state, services, env }, { discover, logger }) => {
		let nextServices = services;
		const unresolved: string[] = [];

		for (const controller of services.list().filter(isControllerService)) {
			if (deviceIdOf(controller)) {
				continue;
			}
			const known = state.serviceFlags[controllerFlagKey(controller.name)];
			if (typeof known === 'string' && known !== '') {
				nextServices = withDeviceId(nextServices, controller.name, known);
			} else {
				unresolved.push(controller.name);
			}
		}

		if (unresolved.length > 0) {
			const claimed = new Set(
				nextServices
					.list()
					.map(deviceIdOf)
					.filter((id): id is string => id !== undefined),
			);
			const available = (await discover()).filter((device) => !claimed.has(device.id));

			for (const name of unresolved) {
				const device = available.shift();
				if (!device) {
					logger.warnSync('No device available for controller', { service: name });
					continue;
				}
				logger.infoSync('Assigning discovered device', { service: name, deviceId: device.id });
				nextServices = withDeviceId(nextServices, name, device.id);
			}
		}

		return { state: recordIdentities(state, nextServices), services: nextServices, env };
	},
};

function deviceIdOf(descriptor: ServiceDescriptor): string | undefined {
	const id = descriptor.environment[DEVICE_ID_KEY];
	return id ? id : undefined;
}

function withDeviceId(services: ServiceDescriptorSet, name: string, deviceId: string): ServiceDescriptorSet {
	return services.update(name, (descriptor) => ({
		...descriptor,
		environment: { ...descriptor.environment, [DEVICE_ID_KEY]: deviceId },
	}));
}

function recordIdentities(state: StateRecord, services: ServiceDescriptorSet): StateRecord {
	return services
		.list()
		.filter(isControllerService)
		.reduce((record, controller) => {
			const id = deviceIdOf(controller);
			return id ? withFlag(record, controllerFlagKey(controller.name), id) : record;
		}, state);
}
