export const LOG_LEVELS = {
	trace: 0,
	debug: 1,
	info: 2,
	warn: 3,
	error: 4,
	fatal: 5,
	panic: 6,
	disabled: 7,
} as const;

export type LogLevel = keyof typeof LOG_LEVELS;

/**
 * Levels a logger writes at. `panic` and `disabled` only serve as thresholds.
 */
export type EmittedLogLevel = Exclude<LogLevel, "panic" | "disabled">;

export const DEFAULT_LOG_LEVEL: LogLevel = "info";

export function isLogLevel(value: string): value is LogLevel {
	return Object.hasOwn(LOG_LEVELS, value);
}

/**
 * Parse a level name, case insensitively.
 * Returns null for names that are not levels.
 */
export function parseLogLevel(value: string): LogLevel | null {
	const normalized = value.trim().toLowerCase();
	return isLogLevel(normalized) ? normalized : null;
}

export function isLevelEnabled(level: LogLevel, threshold: LogLevel): boolean {
	return LOG_LEVELS[level] >= LOG_LEVELS[threshold];
}
