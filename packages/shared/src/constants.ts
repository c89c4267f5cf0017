/**
 * Shared constants for the agent and the controller it talks to.
 *
 * Constants are organized into domain-specific groups for easier discovery.
 */

// =============================================================================
// Controller Endpoint
// =============================================================================

/** Port the controller's orchestration endpoint listens on */
export const CONTROLLER_PORT = 5271;

/**
 * Paths of the controller's orchestration API.
 * Functions take already-validated identifiers and URL-encode them.
 */
export const CONTROLLER_API = {
	HEALTH: "/api/v1/health",
	WORKERS: "/api/v1/workers",
	claimTask: (identity: string): string => `/api/v1/workers/${encodeURIComponent(identity)}/tasks/claim`,
	completeTask: (taskId: string): string => `/api/v1/tasks/${encodeURIComponent(taskId)}/complete`,
	failTask: (taskId: string): string => `/api/v1/tasks/${encodeURIComponent(taskId)}/fail`,
} as const;

// =============================================================================
// Task Queues
// =============================================================================

/** Suffix of the task queue every agent polls */
export const AGENT_TASK_QUEUE_SUFFIX = "@agent:main";

/**
 * Name of the task queue owned by the agent running on the given system.
 */
export function agentTaskQueue(systemId: string): string {
	return `${systemId}${AGENT_TASK_QUEUE_SUFFIX}`;
}

// =============================================================================
// Payload Encodings
// =============================================================================

/** Metadata key naming the encoding of a payload */
export const PAYLOAD_ENCODING_KEY = "encoding";

export const PAYLOAD_ENCODING = {
	/** JSON document in UTF-8 */
	JSON: "json/plain",
	/** Encrypted serialized payload */
	ENCRYPTED: "binary/encrypted",
	/** Absent value */
	NULL: "binary/null",
} as const;

export type PayloadEncoding = (typeof PAYLOAD_ENCODING)[keyof typeof PAYLOAD_ENCODING];
