import type { PowerAction } from "@maas-agent/shared";

/**
 * Power parameters of a machine.
 */
export interface PowerParameters {
	driverType: string;
	driverOptions: Record<string, string>;
}

/**
 * Runs power operations against a machine's BMC.
 */
export interface PowerDriver {
	/** Returns the power state the driver reports after the action. */
	power(action: PowerAction, params: PowerParameters): Promise<string>;
	setBootOrder(params: PowerParameters, netboot: boolean): Promise<void>;
}
