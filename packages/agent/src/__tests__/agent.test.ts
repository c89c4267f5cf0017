/**
 * Tests for AgentImpl.
 *
 * Covers:
 * - The startup pipeline order and stage failures
 * - Exit codes for signals and pool failures
 * - Log lines for unknown log levels, startup failures and fatal pool errors
 */

import { beforeEach, describe, expect, it, vi } from "vitest";
import { EventEmitter } from "node:events";
import { AgentImpl, type AgentDependencies } from "../agent.js";
import { ResilientConnector } from "../client/index.js";
import { createCodecDataConverter, createEncryptionCodec } from "../codec/index.js";
import { PoolSupervisor } from "../pool/index.js";
import { ConfigError, PoolRuntimeFailure } from "../errors/index.js";
import type { AgentIdentity, Logger } from "../types/index.js";
import {
	FakeWorkerPool,
	type ManualClock,
	createManualClock,
	createMockClient,
	createMockLogger,
	createTestIdentity,
	createTestRetryPolicy,
	createTestSettings,
} from "./test-utils.js";

describe("AgentImpl", () => {
	let clock: ManualClock;
	let logger: Logger;
	let signals: EventEmitter;
	let pool: FakeWorkerPool;
	let dial: ReturnType<typeof vi.fn>;
	let createWorkerPool: ReturnType<typeof vi.fn>;

	beforeEach(() => {
		clock = createManualClock();
		logger = createMockLogger();
		signals = new EventEmitter();
		pool = new FakeWorkerPool();
		dial = vi.fn().mockResolvedValue(createMockClient());
		createWorkerPool = vi.fn().mockReturnValue(pool);
	});

	function createAgentUnderTest(overrides: Partial<AgentDependencies> = {}): AgentImpl {
		const timing = { policy: createTestRetryPolicy(), clock: clock.now, sleep: clock.sleep };
		return new AgentImpl({
			settings: createTestSettings(),
			logger,
			loadIdentity: async (): Promise<AgentIdentity> => createTestIdentity(),
			createCodec: createEncryptionCodec,
			createDataConverter: createCodecDataConverter,
			connector: new ResilientConnector(dial, logger, timing),
			createWorkerPool,
			poolSupervisor: new PoolSupervisor(logger, timing),
			signals,
			...overrides,
		});
	}

	async function whenWaitingForShutdown(): Promise<void> {
		await vi.waitFor(() => {
			expect(signals.listenerCount("SIGTERM")).toBe(1);
		});
	}

	it("should exit 0 on SIGTERM", async () => {
		const running = createAgentUnderTest().run();
		await whenWaitingForShutdown();

		signals.emit("SIGTERM", "SIGTERM");

		await expect(running).resolves.toBe(0);
		expect(logger.info).toHaveBeenCalledWith("Service MAAS Agent started");
		expect(logger.info).toHaveBeenCalledWith("Received SIGTERM, shutting down");
		expect(logger.error).not.toHaveBeenCalled();
		expect(pool.getState()).toBe("running");
	});

	it("should exit 1 with a fatal log when the pool fails", async () => {
		const running = createAgentUnderTest().run();
		await whenWaitingForShutdown();

		pool.signal.deliver(new PoolRuntimeFailure("worker abc123 is no longer registered with the controller"));

		await expect(running).resolves.toBe(1);
		expect(logger.fatal).toHaveBeenCalledWith(
			"Worker pool failure: worker abc123 is no longer registered with the controller",
			{ errorType: "PoolRuntimeFailure" },
		);
	});

	it("should hand the connected client to the pool", async () => {
		const client = createMockClient();
		dial.mockResolvedValue(client);
		const running = createAgentUnderTest().run();
		await whenWaitingForShutdown();
		signals.emit("SIGINT", "SIGINT");
		await running;

		expect(createWorkerPool).toHaveBeenCalledWith(createTestIdentity(), client);
		expect(pool.startCalls).toBe(1);
	});

	it("should stop when the configuration cannot be loaded", async () => {
		const agent = createAgentUnderTest({
			loadIdentity: async () => {
				throw new ConfigError("ENOENT: no such file or directory");
			},
		});

		await expect(agent.run()).resolves.toBe(1);

		expect(logger.error).toHaveBeenCalledWith(
			"Agent startup failed: configuration error: ENOENT: no such file or directory",
			{ errorType: "ConfigError" },
		);
		expect(dial).not.toHaveBeenCalled();
	});

	it("should stop before dialing when the secret is empty", async () => {
		const agent = createAgentUnderTest({
			loadIdentity: async () => createTestIdentity({ sharedSecret: "" }),
		});

		await expect(agent.run()).resolves.toBe(1);

		expect(logger.error).toHaveBeenCalledWith(
			"Agent startup failed: encryption codec setup failed: secret must not be empty",
			{ errorType: "CodecSetupError" },
		);
		expect(dial).not.toHaveBeenCalled();
	});

	it("should wrap other codec errors", async () => {
		const agent = createAgentUnderTest({
			createCodec: () => {
				throw new Error("cipher unavailable");
			},
		});

		await expect(agent.run()).resolves.toBe(1);

		expect(logger.error).toHaveBeenCalledWith(
			"Agent startup failed: encryption codec setup failed: cipher unavailable",
			{ errorType: "CodecSetupError" },
		);
	});

	it("should not build a pool when the controller is unreachable", async () => {
		dial.mockRejectedValue(new Error("connection refused"));

		await expect(createAgentUnderTest().run()).resolves.toBe(1);

		expect(logger.error).toHaveBeenCalledWith(
			"Agent startup failed: controller connection failed after 4 attempt(s) to 10.0.0.1:5271: connection refused",
			{ errorType: "ConnectionError" },
		);
		expect(createWorkerPool).not.toHaveBeenCalled();
	});

	it("should report pool construction errors as start errors", async () => {
		createWorkerPool.mockImplementation(() => {
			throw new Error("catalog broken");
		});

		await expect(createAgentUnderTest().run()).resolves.toBe(1);

		expect(logger.error).toHaveBeenCalledWith(
			"Agent startup failed: worker pool construction failed: catalog broken",
			{ errorType: "PoolStartError" },
		);
	});

	it("should give up when the pool never starts", async () => {
		createWorkerPool.mockReturnValue(new FakeWorkerPool(Number.POSITIVE_INFINITY));

		await expect(createAgentUnderTest().run()).resolves.toBe(1);

		expect(logger.error).toHaveBeenCalledWith(
			"Agent startup failed: worker pool failed to start after 4 attempt(s): start attempt 4 failed",
			{ errorType: "PoolStartError" },
		);
		expect(logger.info).not.toHaveBeenCalledWith("Service MAAS Agent started");
	});

	it("should warn about an unknown log level", async () => {
		const agent = createAgentUnderTest({
			settings: createTestSettings({ unknownLogLevel: "chatty" }),
			loadIdentity: async () => {
				throw new ConfigError("missing");
			},
		});

		await agent.run();

		expect(logger.warn).toHaveBeenCalledWith("Unknown log level, defaulting to INFO", { LOG_LEVEL: "chatty" });
	});
});
