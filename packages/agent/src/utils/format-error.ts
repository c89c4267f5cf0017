/**
 * Format an unknown error value into a string message.
 * Handles both Error objects and other types.
 */
export function formatError(err: unknown): string {
	return err instanceof Error ? err.message : String(err);
}

/**
 * Name of the error's class, for log fields.
 */
export function errorType(err: unknown): string {
	return err instanceof Error ? err.name : typeof err;
}
