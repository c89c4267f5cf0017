import type { FailureSignal } from "../pool/failure-signal.js";

/**
 * Lifecycle states of a worker pool.
 */
export type WorkerPoolState = "constructed" | "starting" | "running" | "failed" | "stopped";

/**
 * Runtime that executes catalog handlers dispatched by the controller.
 */
export interface WorkerPool {
	getState(): WorkerPoolState;
	/** Register with the controller and begin taking tasks. */
	start(): Promise<void>;
	stop(): void;
	/** Delivers at most one terminal error. */
	failureSignal(): FailureSignal;
}
