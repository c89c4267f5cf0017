/**
 * Constants for the agent package.
 */

import type { RetryPolicy } from "./types/index.js";

/** Configuration file read when MAAS_AGENT_CONFIG is not set */
export const DEFAULT_CONFIG_PATH = "/etc/maas/agent.yaml";

/**
 * Environment variables the agent reads.
 */
export const ENV_VARS = {
	CONFIG_PATH: "MAAS_AGENT_CONFIG",
	LOG_LEVEL: "LOG_LEVEL",
	CONNECT_MAX_ELAPSED_MS: "MAAS_AGENT_CONNECT_MAX_ELAPSED_MS",
	POOL_START_MAX_ELAPSED_MS: "MAAS_AGENT_POOL_START_MAX_ELAPSED_MS",
	CONNECT_FAILOVER: "MAAS_AGENT_CONNECT_FAILOVER",
	CONTROLLER_PORT: "MAAS_AGENT_CONTROLLER_PORT",
	POLL_INTERVAL_MS: "MAAS_AGENT_POLL_INTERVAL_MS",
	MAX_POLL_FAILURES: "MAAS_AGENT_MAX_POLL_FAILURES",
	POWER_COMMAND: "MAAS_AGENT_POWER_COMMAND",
} as const;

/**
 * Backoff shape shared by both startup retry policies.
 * Each policy gets its own copy with its own elapsed-time budget.
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
	initialIntervalMs: 500,
	multiplier: 1.5,
	randomizationFactor: 0.5,
	maxIntervalMs: 60_000,
	maxElapsedTimeMs: 60_000,
};

export const DEFAULT_POLL_INTERVAL_MS = 1000;

export const DEFAULT_MAX_CONSECUTIVE_POLL_FAILURES = 10;

export const DEFAULT_POWER_COMMAND = "maas.power";
