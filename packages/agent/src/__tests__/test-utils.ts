/**
 * Shared test utilities for agent tests
 *
 * Provides:
 * - Factory functions for identities, settings and retry policies
 * - Mock implementations for Logger, ControllerClient, PowerDriver and WorkerPool
 * - A manual clock for driving backoff without real waiting
 * - Fetch response helpers
 */

import { type Mock, vi } from "vitest";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import type {
	AgentIdentity,
	AgentSettings,
	ClaimedTask,
	ControllerClient,
	Logger,
	PowerDriver,
	RetryPolicy,
	WorkerPool,
	WorkerPoolState,
} from "../types/index.js";
import { getDefaultSettings } from "../config/index.js";
import { FailureSignal } from "../pool/index.js";

// =============================================================================
// Temp Directory Management
// =============================================================================

/**
 * Creates a temporary directory for test isolation.
 */
export function createTempDir(prefix = "agent-test-"): string {
	return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

/**
 * Cleans up a temporary directory created during tests.
 */
export function cleanupTempDir(dirPath: string): void {
	fs.rmSync(dirPath, { recursive: true, force: true });
}

/**
 * Writes a configuration file into the directory and returns its path.
 */
export function writeConfigFile(dirPath: string, contents: string, name = "agent.yaml"): string {
	const filePath = path.join(dirPath, name);
	fs.writeFileSync(filePath, contents);
	return filePath;
}

export const VALID_CONFIG_YAML = [
	"maas_uuid: cluster-uuid-1",
	"system_id: abc123",
	"secret: test-secret",
	"controllers: [10.0.0.1, 10.0.0.2]",
	"",
].join("\n");

// =============================================================================
// Config Factories
// =============================================================================

export function createTestIdentity(overrides?: Partial<AgentIdentity>): AgentIdentity {
	return {
		clusterUUID: "cluster-uuid-1",
		systemID: "abc123",
		sharedSecret: "test-secret",
		controllerEndpoints: ["10.0.0.1"],
		...overrides,
	};
}

/**
 * Retry policy without randomization, so delays are 100, 200, 400, ...
 */
export function createTestRetryPolicy(overrides?: Partial<RetryPolicy>): RetryPolicy {
	return {
		initialIntervalMs: 100,
		multiplier: 2,
		randomizationFactor: 0,
		maxIntervalMs: 10_000,
		maxElapsedTimeMs: 1_000,
		...overrides,
	};
}

export function createTestSettings(overrides?: Partial<AgentSettings>): AgentSettings {
	return {
		...getDefaultSettings(),
		connectRetry: createTestRetryPolicy(),
		poolStartRetry: createTestRetryPolicy(),
		pollIntervalMs: 10,
		...overrides,
	};
}

// =============================================================================
// Time
// =============================================================================

/**
 * Clock advanced only by its own sleep, for backoff tests.
 */
export interface ManualClock {
	now: () => number;
	sleep: (ms: number) => Promise<void>;
	/** Delays passed to sleep, in order. */
	sleeps: number[];
}

export function createManualClock(start = 0): ManualClock {
	let current = start;
	const sleeps: number[] = [];
	return {
		now: () => current,
		sleep: async (ms: number) => {
			sleeps.push(ms);
			current += ms;
		},
		sleeps,
	};
}

// =============================================================================
// Mocks
// =============================================================================

/**
 * Creates a mock Logger for testing.
 * All methods are no-op Vitest mocks that can be inspected.
 */
export function createMockLogger(): Logger {
	return {
		trace: vi.fn(),
		debug: vi.fn(),
		info: vi.fn(),
		warn: vi.fn(),
		error: vi.fn(),
		fatal: vi.fn(),
	};
}

/**
 * Creates a mock ControllerClient. claimTask returns the queued tasks in
 * order, then null.
 */
export function createMockClient(tasks: ClaimedTask[] = []): ControllerClient & {
	registerWorker: ReturnType<typeof vi.fn>;
	claimTask: ReturnType<typeof vi.fn>;
	completeTask: ReturnType<typeof vi.fn>;
	failTask: ReturnType<typeof vi.fn>;
} {
	const queue = [...tasks];
	return {
		hostPort: "10.0.0.1:5271",
		registerWorker: vi.fn().mockResolvedValue(undefined),
		claimTask: vi.fn().mockImplementation(async () => queue.shift() ?? null),
		completeTask: vi.fn().mockResolvedValue(undefined),
		failTask: vi.fn().mockResolvedValue(undefined),
	};
}

/**
 * Creates a PowerDriver reporting the given state for queries and "on"/"off"
 * for the matching actions.
 */
export function createMockPowerDriver(queryState = "off"): PowerDriver & {
	power: ReturnType<typeof vi.fn>;
	setBootOrder: ReturnType<typeof vi.fn>;
} {
	return {
		power: vi.fn().mockImplementation(async (action: string) => {
			if (action === "query") {
				return queryState;
			}
			return action === "off" ? "off" : "on";
		}),
		setBootOrder: vi.fn().mockResolvedValue(undefined),
	};
}

/**
 * A worker pool whose start outcome and failure are driven by the test.
 */
export class FakeWorkerPool implements WorkerPool {
	readonly signal = new FailureSignal();
	state: WorkerPoolState = "constructed";
	startCalls = 0;

	constructor(private readonly startFailures = 0) {}

	getState(): WorkerPoolState {
		return this.state;
	}

	async start(): Promise<void> {
		this.startCalls++;
		if (this.startCalls <= this.startFailures) {
			throw new Error(`start attempt ${this.startCalls} failed`);
		}
		this.state = "running";
	}

	stop(): void {
		this.state = "stopped";
	}

	failureSignal(): FailureSignal {
		return this.signal;
	}
}

// =============================================================================
// Fetch Helpers
// =============================================================================

export function jsonResponse(status: number, body: unknown): Response {
	return new Response(JSON.stringify(body), {
		status,
		headers: { "Content-Type": "application/json" },
	});
}

export function emptyResponse(status: number): Response {
	return new Response(null, { status });
}

/**
 * Parses the JSON body of the nth call made to a fetch mock.
 */
export function requestBody(fetchMock: Mock<typeof fetch>, call = 0): unknown {
	const init = fetchMock.mock.calls[call]?.[1];
	return typeof init?.body === "string" ? JSON.parse(init.body) : undefined;
}

/**
 * URL of the nth call made to a fetch mock.
 */
export function requestUrl(fetchMock: Mock<typeof fetch>, call = 0): string {
	const input = fetchMock.mock.calls[call]?.[0];
	return typeof input === "string" ? input : String(input);
}

// =============================================================================
// DI Test Helpers
// =============================================================================

/** Counter for generating unique token names */
let tokenCounter = 0;

/**
 * Creates a unique token name by appending an incrementing counter.
 * Useful for DI tests where each test needs isolated tokens to avoid
 * conflicts from Symbol.for sharing.
 */
export function createUniqueTokenName(baseName: string): string {
	tokenCounter++;
	return `${baseName}-${tokenCounter}`;
}
