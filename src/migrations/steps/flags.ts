import type { ServiceFlagValue, StateRecord } from '../../state/types';

export function withFlag(state: StateRecord, key: string, value: ServiceFlagValue): StateRecord {
	if (state.serviceFlags[key] === value) {
		return state;
	}
	return { ...state, serviceFlags: { ...state.serviceFlags, [key]: value } };
}

export function controllerFlagKey(service: string): string {
	return `controller.${service}.deviceId`;
}
