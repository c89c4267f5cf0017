import { ACTIVITY_NAME, POWER_ACTION, POWER_STATE, type PowerAction } from "@maas-agent/shared";
import type { WorkflowContext, WorkflowHandler } from "../types/index.js";
import {
	type PowerActivityResult,
	type PowerParametersInput,
	powerActivityResultSchema,
	powerParametersSchema,
} from "../activities/index.js";

export async function runPowerAction(
	context: WorkflowContext,
	action: PowerAction,
	params: PowerParametersInput,
): Promise<PowerActivityResult> {
	const result = await context.executeActivity(ACTIVITY_NAME.POWER, { action, ...params });
	return powerActivityResultSchema.parse(result);
}

/**
 * Power cycle a machine that is on, power on any other.
 */
export async function powerCycleOrOn(
	context: WorkflowContext,
	params: PowerParametersInput,
): Promise<PowerActivityResult> {
	const { state } = await runPowerAction(context, POWER_ACTION.QUERY, params);
	const action = state === POWER_STATE.ON ? POWER_ACTION.CYCLE : POWER_ACTION.ON;
	return runPowerAction(context, action, params);
}

function powerWorkflow(action: PowerAction): WorkflowHandler {
	return (context, input) => runPowerAction(context, action, powerParametersSchema.parse(input));
}

export const powerOnWorkflow = powerWorkflow(POWER_ACTION.ON);
export const powerOffWorkflow = powerWorkflow(POWER_ACTION.OFF);
export const powerQueryWorkflow = powerWorkflow(POWER_ACTION.QUERY);
export const powerCycleWorkflow = powerWorkflow(POWER_ACTION.CYCLE);
