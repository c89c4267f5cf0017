import type { LogLevel } from "../logger/log-level.js";
import type { RetryPolicy } from "./retry-policy.js";

/**
 * Process settings taken from the environment.
 * Kept apart from the identity, which comes from the configuration file.
 */
export interface AgentSettings {
	configPath: string;
	logLevel: LogLevel;
	/** Raw LOG_LEVEL value that was not recognized, if any. */
	unknownLogLevel: string | null;
	connectRetry: RetryPolicy;
	poolStartRetry: RetryPolicy;
	/** Try every controller endpoint in order instead of only the first. */
	connectFailover: boolean;
	/** Port dialed on every controller endpoint. */
	controllerPort: number;
	pollIntervalMs: number;
	maxConsecutivePollFailures: number;
	powerCommand: string;
}
