import type { TaskKind } from "./task.js";

// =============================================================================
// Payloads
// =============================================================================

/**
 * A payload as it travels over the wire.
 * Metadata values and data are base64 encoded.
 */
export interface EncodedPayload {
	metadata: Record<string, string>;
	data: string;
}

// =============================================================================
// Worker Registration
// =============================================================================

/**
 * Request body for POST /api/v1/workers
 */
export interface RegisterWorkerRequest {
	identity: string;
	taskQueue: string;
	clusterUuid: string;
	workflows: string[];
	activities: string[];
}

// =============================================================================
// Tasks
// =============================================================================

/**
 * Response body for POST /api/v1/workers/:identity/tasks/claim (200)
 */
export interface ClaimTaskResponse {
	taskId: string;
	kind: TaskKind;
	name: string;
	input: EncodedPayload;
}

/**
 * Request body for POST /api/v1/tasks/:taskId/complete
 */
export interface CompleteTaskRequest {
	identity: string;
	result: EncodedPayload;
}

/**
 * Request body for POST /api/v1/tasks/:taskId/fail
 */
export interface FailTaskRequest {
	identity: string;
	error: string;
}

/**
 * Error body returned by the controller for non-success statuses
 */
export interface ErrorResponse {
	error: string;
}
