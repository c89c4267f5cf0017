import { TASK_KIND, agentTaskQueue } from "@maas-agent/shared";
import type {
	AgentIdentity,
	ClaimedTask,
	ControllerClient,
	HandlerCatalog,
	Logger,
	WorkerPool,
	WorkerPoolState,
	WorkflowContext,
} from "../types/index.js";
import {
	PoolRuntimeFailure,
	PoolStartError,
	TaskInputDecodeError,
	UnknownTaskError,
	WorkerDeregisteredError,
} from "../errors/index.js";
import { type Sleep, formatError, sleep as defaultSleep } from "../utils/index.js";
import { FailureSignal } from "./failure-signal.js";

export interface WorkerPoolOptions {
	pollIntervalMs: number;
	/** Consecutive failed claims after which the pool fails. */
	maxConsecutivePollFailures: number;
	sleep?: Sleep;
}

/**
 * Worker pool that polls the controller for tasks and runs them from the catalog.
 *
 * States: constructed → starting → running → failed | stopped.
 * A failed registration returns the pool to constructed so start can be retried.
 */
export class WorkerPoolImpl implements WorkerPool {
	private state: WorkerPoolState = "constructed";
	private readonly signal = new FailureSignal();
	private readonly sleep: Sleep;
	private readonly workflowContext: WorkflowContext;
	private consecutivePollFailures = 0;
	private loop: Promise<void> | null = null;

	constructor(
		private readonly identity: AgentIdentity,
		private readonly client: ControllerClient,
		private readonly catalog: HandlerCatalog,
		private readonly logger: Logger,
		private readonly options: WorkerPoolOptions,
	) {
		this.sleep = options.sleep ?? defaultSleep;
		this.workflowContext = {
			identity: identity.systemID,
			executeActivity: (name, input) => this.runActivity(name, input),
		};
	}

	getState(): WorkerPoolState {
		return this.state;
	}

	failureSignal(): FailureSignal {
		return this.signal;
	}

	/**
	 * Register with the controller and start the poll loop.
	 */
	async start(): Promise<void> {
		if (this.state !== "constructed") {
			throw new PoolStartError(`cannot start a worker pool that is ${this.state}`);
		}

		this.state = "starting";
		try {
			await this.client.registerWorker({
				identity: this.identity.systemID,
				taskQueue: agentTaskQueue(this.identity.systemID),
				clusterUuid: this.identity.clusterUUID,
				workflows: [...this.catalog.workflows.keys()],
				activities: [...this.catalog.activities.keys()],
			});
		} catch (err) {
			this.state = "constructed";
			throw err;
		}

		this.state = "running";
		this.logger.info(`Worker pool ${this.identity.systemID} running`);
		this.loop = this.runLoop().catch((err: unknown) => this.fail(err));
	}

	stop(): void {
		if (this.state === "running") {
			this.state = "stopped";
			this.logger.info("Worker pool stopped");
		}
	}

	/**
	 * Resolves once the poll loop has exited.
	 */
	async whenIdle(): Promise<void> {
		await this.loop;
	}

	/**
	 * Run one iteration of the claim-execute-report cycle.
	 */
	async runOneIteration(): Promise<void> {
		let task: ClaimedTask | null;
		try {
			task = await this.client.claimTask(this.identity.systemID);
			this.consecutivePollFailures = 0;
		} catch (err) {
			if (err instanceof TaskInputDecodeError) {
				await this.rejectUndecodable(err);
				return;
			}
			this.handleClaimFailure(err);
			return;
		}

		if (!task) {
			return;
		}

		await this.execute(task);
	}

	private async runLoop(): Promise<void> {
		while (this.state === "running") {
			await this.runOneIteration();
			if (this.state === "running") {
				await this.sleep(this.options.pollIntervalMs);
			}
		}
	}

	private handleClaimFailure(err: unknown): void {
		if (err instanceof WorkerDeregisteredError) {
			this.fail(err);
			return;
		}

		this.consecutivePollFailures++;
		this.logger.warn("Task claim failed", {
			failures: this.consecutivePollFailures,
			error: formatError(err),
		});

		if (this.consecutivePollFailures >= this.options.maxConsecutivePollFailures) {
			this.fail(new PoolRuntimeFailure(
				`${this.consecutivePollFailures} consecutive task claims failed: ${formatError(err)}`,
				{ cause: err },
			));
		}
	}

	/**
	 * A task whose input cannot be decoded was still claimed, so the poll counts
	 * as successful and the task is reported as failed.
	 */
	private async rejectUndecodable(err: TaskInputDecodeError): Promise<void> {
		this.consecutivePollFailures = 0;
		this.logger.warn(`Task ${err.taskId} rejected: ${err.message}`);
		try {
			await this.client.failTask(err.taskId, this.identity.systemID, err.message);
		} catch (reportErr) {
			this.logger.error(`Reporting task ${err.taskId} failed: ${formatError(reportErr)}`);
		}
	}

	private async execute(task: ClaimedTask): Promise<void> {
		let result: unknown;
		try {
			result = await this.dispatch(task);
		} catch (err) {
			this.logger.warn(`Task ${task.taskId} (${task.kind} ${task.name}) failed: ${formatError(err)}`);
			await this.report(task, () => this.client.failTask(task.taskId, this.identity.systemID, formatError(err)));
			return;
		}

		this.logger.info(`Task ${task.taskId} (${task.kind} ${task.name}) completed`);
		await this.report(task, () => this.client.completeTask(task.taskId, this.identity.systemID, result));
	}

	private dispatch(task: ClaimedTask): Promise<unknown> {
		if (task.kind === TASK_KIND.ACTIVITY) {
			return this.runActivity(task.name, task.input);
		}
		const handler = this.catalog.workflows.get(task.name);
		if (!handler) {
			throw new UnknownTaskError(TASK_KIND.WORKFLOW, task.name);
		}
		return handler(this.workflowContext, task.input);
	}

	private async runActivity(name: string, input: unknown): Promise<unknown> {
		const handler = this.catalog.activities.get(name);
		if (!handler) {
			throw new UnknownTaskError(TASK_KIND.ACTIVITY, name);
		}
		return handler(input);
	}

	/**
	 * The controller reschedules tasks whose outcome never arrives, so a failed
	 * report is logged and the loop carries on.
	 */
	private async report(task: ClaimedTask, send: () => Promise<void>): Promise<void> {
		try {
			await send();
		} catch (err) {
			this.logger.error(`Reporting task ${task.taskId} failed: ${formatError(err)}`);
		}
	}

	private fail(err: unknown): void {
		if (this.state !== "running") {
			return;
		}
		this.state = "failed";
		const failure = err instanceof PoolRuntimeFailure
			? err
			: new PoolRuntimeFailure(formatError(err), { cause: err });
		this.logger.debug(`Worker pool failed: ${failure.message}`);
		this.signal.deliver(failure);
	}
}
