import { AgentError } from "./agent-error.js";

/**
 * Thrown when the controller answers with a non-success status
 */
export class ControllerRequestError extends AgentError {
	readonly status: number;

	constructor(operation: string, status: number, detail?: string) {
		super(`${operation} failed with status ${status}${detail ? `: ${detail}` : ""}`);
		this.status = status;
	}
}

/**
 * Thrown when the controller no longer knows the polling worker
 */
export class WorkerDeregisteredError extends AgentError {
	constructor(identity: string) {
		super(`worker ${identity} is no longer registered with the controller`);
	}
}

/**
 * Thrown when a task names a workflow or activity missing from the catalog
 */
export class UnknownTaskError extends AgentError {
	constructor(kind: string, name: string) {
		super(`unknown ${kind}: ${name}`);
	}
}

/**
 * Thrown when a payload cannot be decrypted or parsed
 */
export class PayloadDecodeError extends AgentError {}

/**
 * Thrown when a claimed task's input cannot be decoded.
 * The task has been handed out, so it must still be reported as failed.
 */
export class TaskInputDecodeError extends PayloadDecodeError {
	readonly taskId: string;

	constructor(taskId: string, detail: string, options?: { cause?: unknown }) {
		super(`input of task ${taskId} could not be decoded: ${detail}`, options);
		this.taskId = taskId;
	}
}
