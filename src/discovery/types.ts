/**
 * Discovery types
 */

export interface DiscoveredDevice {
	/** Declared controller identity (device id) */
	id: string;
	/** IP address the device answered from */
	address: string;
	host?: string;
	port?: number;
	model?: string;
	/** Capability flags advertised by the device */
	capabilities: string[];
}

export interface DiscoveryAdapter {
	/**
	 * Enumerate controllers, returning within roughly timeoutMs
	 */
	enumerate(timeoutMs: number): Promise<DiscoveredDevice[]>;
}
