/**
 * Tests for WorkerPoolImpl.
 *
 * Covers:
 * - Registration on start and the state machine
 * - Task dispatch to workflows and activities
 * - Reporting results and failures to the controller
 * - Claim failure counting and terminal failures on the failure signal
 * - Rejecting claimed tasks whose input cannot be decoded
 */

import { afterEach, describe, expect, it, vi } from "vitest";
import { WorkerPoolImpl, createHandlerCatalog } from "../pool/index.js";
import { ControllerClientImpl } from "../client/index.js";
import { createCodecDataConverter, createEncryptionCodec, toEncodedPayload } from "../codec/index.js";
import { PoolRuntimeFailure, PoolStartError, TaskInputDecodeError, WorkerDeregisteredError } from "../errors/index.js";
import type { ClaimedTask, ControllerClient, HandlerCatalog, Logger } from "../types/index.js";
import {
	createMockClient,
	createMockLogger,
	createTestIdentity,
	emptyResponse,
	jsonResponse,
	requestBody,
	requestUrl,
} from "./test-utils.js";

function createTestCatalog(): HandlerCatalog {
	return createHandlerCatalog({
		workflows: {
			double_twice: async (context, input) => {
				const once = await context.executeActivity("double", input);
				return context.executeActivity("double", once);
			},
			whoami: async context => context.identity,
			explode: async () => {
				throw new Error("driver timed out");
			},
		},
		activities: {
			double: async input => (typeof input === "number" ? input * 2 : 0),
		},
	});
}

function task(overrides: Partial<ClaimedTask>): ClaimedTask {
	return { taskId: "task-1", kind: "workflow", name: "whoami", input: undefined, ...overrides };
}

describe("WorkerPoolImpl", () => {
	let pools: WorkerPoolImpl[] = [];
	let logger: Logger;

	function createPool(client: ControllerClient, maxConsecutivePollFailures = 3): WorkerPoolImpl {
		logger = createMockLogger();
		const pool = new WorkerPoolImpl(createTestIdentity(), client, createTestCatalog(), logger, {
			pollIntervalMs: 1,
			maxConsecutivePollFailures,
		});
		pools.push(pool);
		return pool;
	}

	afterEach(async () => {
		for (const pool of pools) {
			pool.stop();
			await pool.whenIdle();
		}
		pools = [];
	});

	describe("start", () => {
		it("should register the catalog and enter running", async () => {
			const client = createMockClient();
			const pool = createPool(client);

			await pool.start();

			expect(pool.getState()).toBe("running");
			expect(client.registerWorker).toHaveBeenCalledWith({
				identity: "abc123",
				taskQueue: "abc123@agent:main",
				clusterUuid: "cluster-uuid-1",
				workflows: ["double_twice", "whoami", "explode"],
				activities: ["double"],
			});
			expect(logger.info).toHaveBeenCalledWith("Worker pool abc123 running");
		});

		it("should return to constructed when registration fails", async () => {
			const client = createMockClient();
			client.registerWorker.mockRejectedValueOnce(new Error("controller busy"));
			const pool = createPool(client);

			await expect(pool.start()).rejects.toThrow("controller busy");
			expect(pool.getState()).toBe("constructed");

			await pool.start();
			expect(pool.getState()).toBe("running");
		});

		it("should refuse to start twice", async () => {
			const pool = createPool(createMockClient());
			await pool.start();

			await expect(pool.start()).rejects.toThrow(PoolStartError);
			await expect(pool.start()).rejects.toThrow("cannot start a worker pool that is running");
		});
	});

	describe("runOneIteration", () => {
		it("should do nothing when no work is available", async () => {
			const client = createMockClient();
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(client.claimTask).toHaveBeenCalledWith("abc123");
			expect(client.completeTask).not.toHaveBeenCalled();
			expect(client.failTask).not.toHaveBeenCalled();
		});

		it("should run activities and report the result", async () => {
			const client = createMockClient([task({ kind: "activity", name: "double", input: 21 })]);
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(client.completeTask).toHaveBeenCalledWith("task-1", "abc123", 42);
		});

		it("should let workflows call activities", async () => {
			const client = createMockClient([task({ name: "double_twice", input: 5 })]);
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(client.completeTask).toHaveBeenCalledWith("task-1", "abc123", 20);
		});

		it("should give workflows the worker identity", async () => {
			const client = createMockClient([task({ name: "whoami" })]);
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(client.completeTask).toHaveBeenCalledWith("task-1", "abc123", "abc123");
		});

		it("should report handler errors as task failures", async () => {
			const client = createMockClient([task({ name: "explode" })]);
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(client.failTask).toHaveBeenCalledWith("task-1", "abc123", "driver timed out");
			expect(client.completeTask).not.toHaveBeenCalled();
		});

		it("should fail tasks naming unknown handlers", async () => {
			const client = createMockClient([
				task({ taskId: "task-1", name: "reboot" }),
				task({ taskId: "task-2", kind: "activity", name: "wipe" }),
			]);
			const pool = createPool(client);

			await pool.runOneIteration();
			await pool.runOneIteration();

			expect(client.failTask).toHaveBeenNthCalledWith(1, "task-1", "abc123", "unknown workflow: reboot");
			expect(client.failTask).toHaveBeenNthCalledWith(2, "task-2", "abc123", "unknown activity: wipe");
		});

		it("should log and carry on when a report cannot be delivered", async () => {
			const client = createMockClient([task({ name: "whoami" })]);
			client.completeTask.mockRejectedValue(new Error("connection reset"));
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(logger.error).toHaveBeenCalledWith("Reporting task task-1 failed: connection reset");
			expect(pool.failureSignal().peek()).toBeNull();
		});

		it("should reset the failure count after a successful claim", async () => {
			const client = createMockClient();
			client.claimTask
				.mockRejectedValueOnce(new Error("timeout"))
				.mockRejectedValueOnce(new Error("timeout"))
				.mockResolvedValueOnce(null)
				.mockRejectedValueOnce(new Error("timeout"));
			const pool = createPool(client);

			for (let i = 0; i < 4; i++) {
				await pool.runOneIteration();
			}

			expect(logger.warn).toHaveBeenLastCalledWith("Task claim failed", { failures: 1, error: "timeout" });
		});
	});

	describe("undecodable task input", () => {
		it("should report the task as failed without counting a claim failure", async () => {
			const client = createMockClient();
			client.claimTask
				.mockRejectedValueOnce(new Error("timeout"))
				.mockRejectedValueOnce(new TaskInputDecodeError("task-7", "malformed payload"))
				.mockRejectedValueOnce(new Error("timeout"));
			const pool = createPool(client);

			for (let i = 0; i < 3; i++) {
				await pool.runOneIteration();
			}

			expect(client.failTask).toHaveBeenCalledWith(
				"task-7",
				"abc123",
				"input of task task-7 could not be decoded: malformed payload",
			);
			expect(logger.warn).toHaveBeenLastCalledWith("Task claim failed", { failures: 1, error: "timeout" });
		});

		it("should log and carry on when the rejection cannot be delivered", async () => {
			const client = createMockClient();
			client.claimTask.mockRejectedValueOnce(new TaskInputDecodeError("task-7", "malformed payload"));
			client.failTask.mockRejectedValue(new Error("connection reset"));
			const pool = createPool(client);

			await pool.runOneIteration();

			expect(logger.error).toHaveBeenCalledWith("Reporting task task-7 failed: connection reset");
			expect(pool.failureSignal().peek()).toBeNull();
		});

		it("should keep running when tasks are encrypted under another secret", async () => {
			const foreign = createCodecDataConverter(createEncryptionCodec(new TextEncoder().encode("other-secret")));
			const [input] = await foreign.toPayloads([{ driverType: "ipmi" }]);
			const claim = { taskId: "task-9", kind: "workflow", name: "whoami", input: toEncodedPayload(input) };
			const fetchMock = vi.fn<typeof fetch>().mockImplementation(async (url) => {
				if (String(url).endsWith("/tasks/claim")) {
					return jsonResponse(200, claim);
				}
				return emptyResponse(String(url).endsWith("/workers") ? 201 : 204);
			});
			const ownConverter = createCodecDataConverter(createEncryptionCodec(new TextEncoder().encode("test-secret")));
			const client = new ControllerClientImpl("10.0.0.1:5271", ownConverter, createMockLogger(), fetchMock);
			const pool = createPool(client, 3);

			await pool.start();
			await vi.waitFor(() => {
				const failReports = fetchMock.mock.calls.filter(([url]) => String(url).endsWith("/tasks/task-9/fail"));
				expect(failReports.length).toBeGreaterThanOrEqual(4);
			});

			expect(pool.getState()).toBe("running");
			expect(pool.failureSignal().peek()).toBeNull();
			const firstReport = fetchMock.mock.calls.findIndex(([url]) => String(url).endsWith("/fail"));
			expect(requestUrl(fetchMock, firstReport)).toBe("http://10.0.0.1:5271/api/v1/tasks/task-9/fail");
			expect(requestBody(fetchMock, firstReport)).toEqual({
				identity: "abc123",
				error: expect.stringMatching(/^input of task task-9 could not be decoded: payload decryption failed: /),
			});
		});
	});

	describe("failure", () => {
		it("should fail when the worker is deregistered", async () => {
			const client = createMockClient();
			client.claimTask.mockRejectedValue(new WorkerDeregisteredError("abc123"));
			const pool = createPool(client);

			await pool.start();
			const error = await pool.failureSignal().wait();

			expect(error).toBeInstanceOf(PoolRuntimeFailure);
			expect(error.message).toBe("worker abc123 is no longer registered with the controller");
			expect(error.cause).toBeInstanceOf(WorkerDeregisteredError);
			expect(pool.getState()).toBe("failed");
			expect(client.claimTask).toHaveBeenCalledTimes(1);
		});

		it("should fail after too many consecutive claim failures", async () => {
			const client = createMockClient();
			client.claimTask.mockRejectedValue(new Error("connection refused"));
			const pool = createPool(client, 3);

			await pool.start();
			const error = await pool.failureSignal().wait();

			expect(error.message).toBe("3 consecutive task claims failed: connection refused");
			expect(client.claimTask).toHaveBeenCalledTimes(3);
			expect(pool.getState()).toBe("failed");
		});

		it("should keep polling until stopped", async () => {
			const client = createMockClient([task({ name: "whoami" })]);
			const pool = createPool(client);

			await pool.start();
			await vi.waitFor(() => {
				expect(client.claimTask.mock.calls.length).toBeGreaterThanOrEqual(3);
			});
			pool.stop();
			await pool.whenIdle();

			expect(pool.getState()).toBe("stopped");
			expect(client.completeTask).toHaveBeenCalledTimes(1);
			expect(pool.failureSignal().peek()).toBeNull();
		});

		it("should stay failed when stopped after a failure", async () => {
			const client = createMockClient();
			client.claimTask.mockRejectedValue(new WorkerDeregisteredError("abc123"));
			const pool = createPool(client);

			await pool.start();
			await pool.failureSignal().wait();
			pool.stop();

			expect(pool.getState()).toBe("failed");
		});
	});
});
