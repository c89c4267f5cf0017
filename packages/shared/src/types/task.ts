// =============================================================================
// Task Kinds
// =============================================================================

/**
 * Kinds of task a controller hands out to a worker.
 */
export const TASK_KIND = {
	WORKFLOW: "workflow",
	ACTIVITY: "activity",
} as const;

export type TaskKind = (typeof TASK_KIND)[keyof typeof TASK_KIND];

// =============================================================================
// Task Names
// =============================================================================

/**
 * Workflows every agent registers with the controller.
 */
export const WORKFLOW_NAME = {
	CHECK_IP: "check_ip",
	COMMISSION: "commission",
	DEPLOY: "deploy",
	DEPLOYED_OS: "deployed_os_workflow",
	EPHEMERAL_OS: "ephemeral_os_workflow",
	POWER_ON: "power_on",
	POWER_OFF: "power_off",
	POWER_QUERY: "power_query",
	POWER_CYCLE: "power_cycle",
} as const;

export type WorkflowName = (typeof WORKFLOW_NAME)[keyof typeof WORKFLOW_NAME];

/**
 * Activities every agent registers with the controller.
 */
export const ACTIVITY_NAME = {
	SWITCH_BOOT_ORDER: "switch_boot_order",
	POWER: "power",
} as const;

export type ActivityName = (typeof ACTIVITY_NAME)[keyof typeof ACTIVITY_NAME];

// =============================================================================
// Power
// =============================================================================

export const POWER_ACTION = {
	ON: "on",
	OFF: "off",
	QUERY: "query",
	CYCLE: "cycle",
} as const;

export type PowerAction = (typeof POWER_ACTION)[keyof typeof POWER_ACTION];

/**
 * Power states reported by a power driver.
 * Drivers may report other values; these are the ones workflows act on.
 */
export const POWER_STATE = {
	ON: "on",
	OFF: "off",
	UNKNOWN: "unknown",
} as const;
