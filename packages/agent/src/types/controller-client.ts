import type { TaskKind } from "@maas-agent/shared";
import type { DataConverter } from "./payload.js";
import type { Logger } from "./logger.js";

/**
 * Worker registration sent to the controller when a pool starts.
 */
export interface WorkerRegistration {
	identity: string;
	taskQueue: string;
	clusterUuid: string;
	workflows: string[];
	activities: string[];
}

/**
 * A task handed out by the controller, with its input already decoded.
 */
export interface ClaimedTask {
	taskId: string;
	kind: TaskKind;
	name: string;
	input: unknown;
}

/**
 * Connected handle to the controller's orchestration endpoint.
 * All values sent and received go through the handle's data converter.
 */
export interface ControllerClient {
	readonly hostPort: string;
	registerWorker(registration: WorkerRegistration): Promise<void>;
	/** Returns null when no work is available. */
	claimTask(identity: string): Promise<ClaimedTask | null>;
	completeTask(taskId: string, identity: string, result: unknown): Promise<void>;
	failTask(taskId: string, identity: string, message: string): Promise<void>;
}

export interface DialOptions {
	hostPort: string;
	logger: Logger;
	dataConverter: DataConverter;
}

/**
 * Establishes a connection to a controller endpoint.
 */
export type ControllerDialer = (options: DialOptions) => Promise<ControllerClient>;
