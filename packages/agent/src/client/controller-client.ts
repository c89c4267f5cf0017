import {
	CONTROLLER_API,
	type ClaimTaskResponse,
	type CompleteTaskRequest,
	type FailTaskRequest,
	type RegisterWorkerRequest,
	TASK_KIND,
	type TaskKind,
} from "@maas-agent/shared";
import type {
	ClaimedTask,
	ControllerClient,
	DataConverter,
	DialOptions,
	Logger,
	WorkerRegistration,
} from "../types/index.js";
import {
	ControllerRequestError,
	PayloadDecodeError,
	TaskInputDecodeError,
	WorkerDeregisteredError,
} from "../errors/index.js";
import { formatError } from "../utils/index.js";
import { parseEncodedPayload, toEncodedPayload } from "../codec/index.js";

/**
 * Timeout applied to every request to the controller.
 */
const REQUEST_TIMEOUT_MS = 10_000;

function isTaskKind(value: unknown): value is TaskKind {
	return value === TASK_KIND.WORKFLOW || value === TASK_KIND.ACTIVITY;
}

function isClaimTaskResponse(value: unknown): value is ClaimTaskResponse {
	return typeof value === "object" && value !== null
		&& "taskId" in value && typeof value.taskId === "string"
		&& "kind" in value && isTaskKind(value.kind)
		&& "name" in value && typeof value.name === "string"
		&& "input" in value;
}

async function readErrorDetail(response: Response): Promise<string | undefined> {
	try {
		const body: unknown = await response.json();
		if (typeof body === "object" && body !== null && "error" in body && typeof body.error === "string") {
			return body.error;
		}
	} catch {
		// Body is not JSON; the status alone describes the failure
	}
	return undefined;
}

/**
 * HTTP client for the controller's orchestration endpoint.
 * Task inputs and results pass through the data converter, so they are
 * encrypted on the wire when the converter carries the encryption codec.
 */
export class ControllerClientImpl implements ControllerClient {
	private readonly baseUrl: string;

	constructor(
		readonly hostPort: string,
		private readonly dataConverter: DataConverter,
		private readonly logger: Logger,
		private readonly fetchImpl: typeof fetch = fetch,
	) {
		this.baseUrl = `http://${hostPort}`;
	}

	/**
	 * Check that the endpoint answers its health probe.
	 * @throws if the endpoint is unreachable or unhealthy
	 */
	async checkHealth(): Promise<void> {
		const response = await this.request("GET", CONTROLLER_API.HEALTH);
		if (!response.ok) {
			throw new ControllerRequestError("Health check", response.status, await readErrorDetail(response));
		}
		this.logger.debug(`Controller ${this.hostPort} is healthy`);
	}

	async registerWorker(registration: WorkerRegistration): Promise<void> {
		const body: RegisterWorkerRequest = { ...registration };
		const response = await this.request("POST", CONTROLLER_API.WORKERS, body);
		if (!response.ok) {
			throw new ControllerRequestError("Worker registration", response.status, await readErrorDetail(response));
		}
		this.logger.info(`Registered worker ${registration.identity}`, {
			taskQueue: registration.taskQueue,
			workflows: registration.workflows.length,
			activities: registration.activities.length,
		});
	}

	async claimTask(identity: string): Promise<ClaimedTask | null> {
		const response = await this.request("POST", CONTROLLER_API.claimTask(identity));

		if (response.status === 204) {
			this.logger.trace("No work available");
			return null;
		}

		if (response.status === 410) {
			throw new WorkerDeregisteredError(identity);
		}

		if (!response.ok) {
			throw new ControllerRequestError("Task claim", response.status, await readErrorDetail(response));
		}

		const data: unknown = await response.json();
		if (!isClaimTaskResponse(data)) {
			throw new PayloadDecodeError("malformed claim response");
		}

		let input: unknown;
		try {
			[input] = await this.dataConverter.fromPayloads([parseEncodedPayload(data.input)]);
		} catch (err) {
			throw new TaskInputDecodeError(data.taskId, formatError(err), { cause: err });
		}
		this.logger.debug(`Claimed ${data.kind} ${data.name}`, { taskId: data.taskId });
		return { taskId: data.taskId, kind: data.kind, name: data.name, input };
	}

	async completeTask(taskId: string, identity: string, result: unknown): Promise<void> {
		const [payload] = await this.dataConverter.toPayloads([result]);
		const body: CompleteTaskRequest = { identity, result: toEncodedPayload(payload) };
		const response = await this.request("POST", CONTROLLER_API.completeTask(taskId), body);
		if (response.status !== 204) {
			throw new ControllerRequestError(`Completing task ${taskId}`, response.status, await readErrorDetail(response));
		}
	}

	async failTask(taskId: string, identity: string, message: string): Promise<void> {
		const body: FailTaskRequest = { identity, error: message };
		const response = await this.request("POST", CONTROLLER_API.failTask(taskId), body);
		if (response.status !== 204) {
			throw new ControllerRequestError(`Failing task ${taskId}`, response.status, await readErrorDetail(response));
		}
	}

	private request(method: "GET" | "POST", path: string, body?: unknown): Promise<Response> {
		return this.fetchImpl(`${this.baseUrl}${path}`, {
			method,
			headers: body === undefined ? undefined : { "Content-Type": "application/json" },
			body: body === undefined ? undefined : JSON.stringify(body),
			signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
		});
	}
}

/**
 * Open a client to the given endpoint, failing unless it passes its health check.
 */
export async function dialController(options: DialOptions): Promise<ControllerClient> {
	const client = new ControllerClientImpl(options.hostPort, options.dataConverter, options.logger);
	await client.checkHealth();
	return client;
}
