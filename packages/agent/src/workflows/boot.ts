import { z } from "zod";
import { ACTIVITY_NAME } from "@maas-agent/shared";
import type { WorkflowContext, WorkflowHandler } from "../types/index.js";
import {
	type PowerParametersInput,
	type SwitchBootOrderResult,
	powerParametersSchema,
	switchBootOrderResultSchema,
} from "../activities/index.js";
import { powerCycleOrOn } from "./power.js";

async function switchBootOrder(
	context: WorkflowContext,
	params: PowerParametersInput,
	netboot: boolean,
): Promise<SwitchBootOrderResult> {
	const result = await context.executeActivity(ACTIVITY_NAME.SWITCH_BOOT_ORDER, { ...params, netboot });
	return switchBootOrderResultSchema.parse(result);
}

/**
 * Netboot the machine: switch to network boot, then cycle or power it on.
 */
async function netbootMachine(context: WorkflowContext, params: PowerParametersInput): Promise<{ state: string; netboot: boolean }> {
	const { netboot } = await switchBootOrder(context, params, true);
	const { state } = await powerCycleOrOn(context, params);
	return { state, netboot };
}

export const commissionWorkflow: WorkflowHandler = (context, input) =>
	netbootMachine(context, powerParametersSchema.parse(input));

const deployInputSchema = powerParametersSchema.extend({
	netboot: z.boolean().default(true),
});

/**
 * Deployment netboots by default; a machine installed from its disk image skips the boot order switch.
 */
export const deployWorkflow: WorkflowHandler = async (context, input) => {
	const { netboot, ...params } = deployInputSchema.parse(input);
	if (netboot) {
		return netbootMachine(context, params);
	}
	const { state } = await powerCycleOrOn(context, params);
	return { state, netboot };
};

export const ephemeralOsWorkflow: WorkflowHandler = (context, input) =>
	netbootMachine(context, powerParametersSchema.parse(input));

/**
 * Once the OS is on disk the machine must boot locally from then on.
 */
export const deployedOsWorkflow: WorkflowHandler = (context, input) =>
	switchBootOrder(context, powerParametersSchema.parse(input), false);
