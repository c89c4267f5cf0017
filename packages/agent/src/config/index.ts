/**
 * Agent configuration module.
 *
 * Settings come from environment variables over defaults; the identity comes
 * from the YAML configuration file the settings point at.
 */

import type { AgentSettings } from "../types/index.js";
import { getDefaultSettings } from "./defaults.js";
import { parseEnvVars } from "./env-parser.js";

/**
 * Load agent settings from environment variables and defaults.
 * Priority: Environment > Defaults
 */
export function loadAgentSettings(env: NodeJS.ProcessEnv): AgentSettings {
	const parsed = parseEnvVars(env);
	const defaults = getDefaultSettings();

	return {
		configPath: parsed.configPath ?? defaults.configPath,
		logLevel: parsed.logLevel.level ?? defaults.logLevel,
		unknownLogLevel: parsed.logLevel.unknown ?? defaults.unknownLogLevel,
		connectRetry: {
			...defaults.connectRetry,
			maxElapsedTimeMs: parsed.connectMaxElapsedMs ?? defaults.connectRetry.maxElapsedTimeMs,
		},
		poolStartRetry: {
			...defaults.poolStartRetry,
			maxElapsedTimeMs: parsed.poolStartMaxElapsedMs ?? defaults.poolStartRetry.maxElapsedTimeMs,
		},
		connectFailover: parsed.connectFailover ?? defaults.connectFailover,
		controllerPort: parsed.controllerPort ?? defaults.controllerPort,
		pollIntervalMs: parsed.pollIntervalMs ?? defaults.pollIntervalMs,
		maxConsecutivePollFailures: parsed.maxConsecutivePollFailures ?? defaults.maxConsecutivePollFailures,
		powerCommand: parsed.powerCommand ?? defaults.powerCommand,
	};
}

export { getDefaultSettings } from "./defaults.js";
export { parseEnvFlag, parseEnvLogLevel, parseEnvNumber, parseEnvPort, parseEnvString, parseEnvVars } from "./env-parser.js";
export { loadAgentIdentity, parseAgentIdentity, type ReadTextFile } from "./identity-loader.js";
export { agentConfigDocumentSchema, type AgentConfigDocument } from "./identity-schema.js";
