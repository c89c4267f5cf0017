/**
 * Controller Stub for E2E Tests
 *
 * In-process Express app serving the controller endpoints the agent uses:
 * health, worker registration, task claim, completion and failure.
 * Records every request and lets tests queue tasks, delay readiness and
 * forget the worker.
 */

import express, { type Request, type Response } from "express";
import type * as http from "node:http";
import {
	CONTROLLER_API,
	type ClaimTaskResponse,
	type CompleteTaskRequest,
	type FailTaskRequest,
	type RegisterWorkerRequest,
} from "@maas-agent/shared";

export interface ReportedCompletion {
	taskId: string;
	request: CompleteTaskRequest;
}

export interface ReportedFailure {
	taskId: string;
	request: FailTaskRequest;
}

export interface ControllerStub {
	readonly port: number;
	readonly registrations: RegisterWorkerRequest[];
	readonly completions: ReportedCompletion[];
	readonly failures: ReportedFailure[];
	healthChecks(): number;
	claims(): number;
	/** Queue a task for the next claim. */
	enqueue(task: ClaimTaskResponse): void;
	/** Answer the next health checks with 503. */
	failHealthChecks(count: number): void;
	/** Answer every later claim with 410 Gone. */
	deregister(): void;
	close(): Promise<void>;
}

/**
 * Start a controller stub on an ephemeral port of 127.0.0.1
 */
export async function startControllerStub(): Promise<ControllerStub> {
	const registrations: RegisterWorkerRequest[] = [];
	const completions: ReportedCompletion[] = [];
	const failures: ReportedFailure[] = [];
	const queue: ClaimTaskResponse[] = [];
	const registered = new Set<string>();
	let healthChecks = 0;
	let claims = 0;
	let unhealthyChecks = 0;
	let deregistered = false;

	const app = express();
	app.use(express.json());

	app.get(CONTROLLER_API.HEALTH, (_req: Request, res: Response): void => {
		healthChecks++;
		if (unhealthyChecks > 0) {
			unhealthyChecks--;
			res.status(503).json({ error: "controller starting" });
			return;
		}
		res.status(200).json({ status: "ok" });
	});

	app.post(CONTROLLER_API.WORKERS, (req: Request, res: Response): void => {
		const body: RegisterWorkerRequest = req.body;
		if (!body.identity || !body.taskQueue) {
			res.status(400).json({ error: "Missing identity or taskQueue" });
			return;
		}
		registrations.push(body);
		registered.add(body.identity);
		res.status(201).end();
	});

	app.post("/api/v1/workers/:identity/tasks/claim", (req: Request, res: Response): void => {
		claims++;
		if (deregistered || !registered.has(req.params.identity)) {
			res.status(410).json({ error: "Worker is not registered" });
			return;
		}
		const task = queue.shift();
		if (!task) {
			res.status(204).end();
			return;
		}
		res.status(200).json(task);
	});

	app.post("/api/v1/tasks/:taskId/complete", (req: Request, res: Response): void => {
		const request: CompleteTaskRequest = req.body;
		completions.push({ taskId: req.params.taskId, request });
		res.status(204).end();
	});

	app.post("/api/v1/tasks/:taskId/fail", (req: Request, res: Response): void => {
		const request: FailTaskRequest = req.body;
		failures.push({ taskId: req.params.taskId, request });
		res.status(204).end();
	});

	const server = await new Promise<http.Server>((resolve, reject) => {
		const httpServer = app.listen(0, "127.0.0.1", () => resolve(httpServer));
		httpServer.on("error", reject);
	});

	const address = server.address();
	if (address === null || typeof address === "string") {
		throw new Error("Controller stub is not listening on a TCP port");
	}

	return {
		port: address.port,
		registrations,
		completions,
		failures,
		healthChecks: () => healthChecks,
		claims: () => claims,
		enqueue: (task) => {
			queue.push(task);
		},
		failHealthChecks: (count) => {
			unhealthyChecks = count;
		},
		deregister: () => {
			deregistered = true;
		},
		close: () => new Promise<void>((resolve, reject) => {
			server.closeAllConnections();
			server.close(err => (err ? reject(err) : resolve()));
		}),
	};
}
