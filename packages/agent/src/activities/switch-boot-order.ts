import type { ActivityHandler, PowerDriver } from "../types/index.js";
import { type SwitchBootOrderResult, switchBootOrderInputSchema } from "./schemas.js";

/**
 * Activity making the machine boot from the network (netboot) or from disk.
 */
export function createSwitchBootOrderActivity(driver: PowerDriver): ActivityHandler {
	return async (input: unknown): Promise<SwitchBootOrderResult> => {
		const { netboot, driverType, driverOptions } = switchBootOrderInputSchema.parse(input);
		await driver.setBootOrder({ driverType, driverOptions }, netboot);
		return { netboot };
	};
}
