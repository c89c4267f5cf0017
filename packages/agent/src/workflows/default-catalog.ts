import { ACTIVITY_NAME, WORKFLOW_NAME } from "@maas-agent/shared";
import type { HandlerCatalog, PowerDriver } from "../types/index.js";
import { createPowerActivity, createSwitchBootOrderActivity } from "../activities/index.js";
import { createHandlerCatalog } from "../pool/index.js";
import { checkIpWorkflow } from "./check-ip.js";
import { commissionWorkflow, deployWorkflow, deployedOsWorkflow, ephemeralOsWorkflow } from "./boot.js";
import { powerCycleWorkflow, powerOffWorkflow, powerOnWorkflow, powerQueryWorkflow } from "./power.js";

/**
 * The workflows and activities every agent registers with the controller.
 */
export function createDefaultHandlerCatalog(powerDriver: PowerDriver): HandlerCatalog {
	return createHandlerCatalog({
		workflows: {
			[WORKFLOW_NAME.CHECK_IP]: checkIpWorkflow,
			[WORKFLOW_NAME.COMMISSION]: commissionWorkflow,
			[WORKFLOW_NAME.DEPLOY]: deployWorkflow,
			[WORKFLOW_NAME.DEPLOYED_OS]: deployedOsWorkflow,
			[WORKFLOW_NAME.EPHEMERAL_OS]: ephemeralOsWorkflow,
			[WORKFLOW_NAME.POWER_ON]: powerOnWorkflow,
			[WORKFLOW_NAME.POWER_OFF]: powerOffWorkflow,
			[WORKFLOW_NAME.POWER_QUERY]: powerQueryWorkflow,
			[WORKFLOW_NAME.POWER_CYCLE]: powerCycleWorkflow,
		},
		activities: {
			[ACTIVITY_NAME.SWITCH_BOOT_ORDER]: createSwitchBootOrderActivity(powerDriver),
			[ACTIVITY_NAME.POWER]: createPowerActivity(powerDriver),
		},
	});
}
