import type { ActivityHandler, PowerDriver } from "../types/index.js";
import { type PowerActivityResult, powerActivityInputSchema } from "./schemas.js";

/**
 * Activity running one power action through the driver.
 */
export function createPowerActivity(driver: PowerDriver): ActivityHandler {
	return async (input: unknown): Promise<PowerActivityResult> => {
		const { action, driverType, driverOptions } = powerActivityInputSchema.parse(input);
		const state = await driver.power(action, { driverType, driverOptions });
		return { state };
	};
}
