/**
 * Environment variable parsing for agent settings.
 */

import { type LogLevel, parseLogLevel } from "../logger/index.js";
import { ENV_VARS } from "../constants.js";

const MAX_PORT = 65535;

/**
 * Positive integer from the environment, at most `max`; anything else is treated as unset.
 */
export function parseEnvNumber(env: NodeJS.ProcessEnv, key: string, max = Number.MAX_SAFE_INTEGER): number | undefined {
	const value = env[key]?.trim();
	if (value === undefined || !/^\d+$/.test(value)) {
		return undefined;
	}
	const parsed = Number(value);
	return parsed <= 0 || parsed > max ? undefined : parsed;
}

export function parseEnvPort(env: NodeJS.ProcessEnv, key: string): number | undefined {
	return parseEnvNumber(env, key, MAX_PORT);
}

export function parseEnvFlag(env: NodeJS.ProcessEnv, key: string): boolean | undefined {
	const value = env[key]?.trim().toLowerCase();
	if (!value) {
		return undefined;
	}
	if (["1", "true", "yes", "on"].includes(value)) {
		return true;
	}
	if (["0", "false", "no", "off"].includes(value)) {
		return false;
	}
	return undefined;
}

/**
 * Non-empty string from the environment.
 */
export function parseEnvString(env: NodeJS.ProcessEnv, key: string): string | undefined {
	const value = env[key];
	return value === undefined || value === "" ? undefined : value;
}

export interface ParsedLogLevel {
	level?: LogLevel;
	/** Set when LOG_LEVEL is present but names no level. */
	unknown?: string;
}

export function parseEnvLogLevel(env: NodeJS.ProcessEnv): ParsedLogLevel {
	const raw = env[ENV_VARS.LOG_LEVEL];
	if (raw === undefined) {
		return {};
	}
	const level = parseLogLevel(raw);
	return level ? { level } : { unknown: raw };
}

export interface ParsedEnv {
	configPath?: string;
	logLevel: ParsedLogLevel;
	connectMaxElapsedMs?: number;
	poolStartMaxElapsedMs?: number;
	connectFailover?: boolean;
	controllerPort?: number;
	pollIntervalMs?: number;
	maxConsecutivePollFailures?: number;
	powerCommand?: string;
}

export function parseEnvVars(env: NodeJS.ProcessEnv): ParsedEnv {
	return {
		configPath: parseEnvString(env, ENV_VARS.CONFIG_PATH),
		logLevel: parseEnvLogLevel(env),
		connectMaxElapsedMs: parseEnvNumber(env, ENV_VARS.CONNECT_MAX_ELAPSED_MS),
		poolStartMaxElapsedMs: parseEnvNumber(env, ENV_VARS.POOL_START_MAX_ELAPSED_MS),
		connectFailover: parseEnvFlag(env, ENV_VARS.CONNECT_FAILOVER),
		controllerPort: parseEnvPort(env, ENV_VARS.CONTROLLER_PORT),
		pollIntervalMs: parseEnvNumber(env, ENV_VARS.POLL_INTERVAL_MS),
		maxConsecutivePollFailures: parseEnvNumber(env, ENV_VARS.MAX_POLL_FAILURES),
		powerCommand: parseEnvString(env, ENV_VARS.POWER_COMMAND),
	};
}
