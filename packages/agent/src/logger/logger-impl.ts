import type { LogFields, LogSink, Logger } from "../types/index.js";
import { DEFAULT_LOG_LEVEL, type EmittedLogLevel, type LogLevel, isLevelEnabled } from "./log-level.js";

export interface LoggerOptions {
	level?: LogLevel;
	sink?: LogSink;
}

const stderrSink: LogSink = (line: string) => {
	process.stderr.write(`${line}\n`);
};

function formatTimestamp(): string {
	return new Date().toISOString();
}

function formatValue(value: string | number | boolean | null): string {
	const text = String(value);
	return /[\s="]/.test(text) || text === "" ? JSON.stringify(text) : text;
}

/**
 * Render fields as space-separated key=value pairs. Undefined values are skipped.
 */
export function formatFields(fields?: LogFields): string {
	if (!fields) {
		return "";
	}
	const parts: string[] = [];
	for (const [key, value] of Object.entries(fields)) {
		if (value !== undefined) {
			parts.push(`${key}=${formatValue(value)}`);
		}
	}
	return parts.length > 0 ? ` ${parts.join(" ")}` : "";
}

export class LoggerImpl implements Logger {
	private readonly level: LogLevel;
	private readonly sink: LogSink;

	constructor(private readonly prefix: string, options: LoggerOptions = {}) {
		this.level = options.level ?? DEFAULT_LOG_LEVEL;
		this.sink = options.sink ?? stderrSink;
	}

	private log(level: EmittedLogLevel, message: string, fields?: LogFields): void {
		if (isLevelEnabled(level, this.level)) {
			const timestamp = formatTimestamp();
			const levelStr = level.toUpperCase().padEnd(5);
			this.sink(`[${timestamp}] [${levelStr}] [${this.prefix}] ${message}${formatFields(fields)}`);
		}
	}

	trace(message: string, fields?: LogFields): void {
		this.log("trace", message, fields);
	}

	debug(message: string, fields?: LogFields): void {
		this.log("debug", message, fields);
	}

	info(message: string, fields?: LogFields): void {
		this.log("info", message, fields);
	}

	warn(message: string, fields?: LogFields): void {
		this.log("warn", message, fields);
	}

	error(message: string, fields?: LogFields): void {
		this.log("error", message, fields);
	}

	fatal(message: string, fields?: LogFields): void {
		this.log("fatal", message, fields);
	}
}

/**
 * Creates loggers sharing one level and sink.
 */
export type LoggerFactory = (prefix: string) => Logger;

export function createLoggerFactory(options: LoggerOptions = {}): LoggerFactory {
	return (prefix: string) => new LoggerImpl(prefix, options);
}
