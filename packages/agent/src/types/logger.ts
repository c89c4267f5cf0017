/**
 * Structured fields attached to a log record.
 */
export type LogFields = Record<string, string | number | boolean | null | undefined>;

export interface Logger {
	trace(message: string, fields?: LogFields): void;
	debug(message: string, fields?: LogFields): void;
	info(message: string, fields?: LogFields): void;
	warn(message: string, fields?: LogFields): void;
	error(message: string, fields?: LogFields): void;
	fatal(message: string, fields?: LogFields): void;
}

/**
 * Destination for formatted log lines.
 */
export type LogSink = (line: string) => void;
