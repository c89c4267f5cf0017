/**
 * Default settings for the agent.
 */

import { CONTROLLER_PORT } from "@maas-agent/shared";
import type { AgentSettings } from "../types/index.js";
import { DEFAULT_LOG_LEVEL } from "../logger/index.js";
import {
	DEFAULT_CONFIG_PATH,
	DEFAULT_MAX_CONSECUTIVE_POLL_FAILURES,
	DEFAULT_POLL_INTERVAL_MS,
	DEFAULT_POWER_COMMAND,
	DEFAULT_RETRY_POLICY,
} from "../constants.js";

export function getDefaultSettings(): AgentSettings {
	return {
		configPath: DEFAULT_CONFIG_PATH,
		logLevel: DEFAULT_LOG_LEVEL,
		unknownLogLevel: null,
		connectRetry: { ...DEFAULT_RETRY_POLICY },
		poolStartRetry: { ...DEFAULT_RETRY_POLICY },
		connectFailover: false,
		controllerPort: CONTROLLER_PORT,
		pollIntervalMs: DEFAULT_POLL_INTERVAL_MS,
		maxConsecutivePollFailures: DEFAULT_MAX_CONSECUTIVE_POLL_FAILURES,
		powerCommand: DEFAULT_POWER_COMMAND,
	};
}
