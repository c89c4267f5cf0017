import { AgentError } from "../errors/index.js";
import { type Sleep, sleep as defaultSleep } from "../utils/index.js";
import type { ExponentialBackoff } from "./exponential-backoff.js";

/**
 * Thrown when a retried operation keeps failing until the backoff stops.
 */
export class RetryExhaustedError extends AgentError {
	constructor(
		readonly attempts: number,
		readonly elapsedMs: number,
		readonly lastError: unknown,
	) {
		super(`gave up after ${attempts} attempt(s) in ${Math.round(elapsedMs)}ms`, { cause: lastError });
	}
}

export interface RetryOptions {
	sleep?: Sleep;
	/** Called after each failed attempt that will be retried. */
	onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

/**
 * Run an operation until it succeeds or the backoff stops.
 * The operation receives the 1-based attempt number.
 *
 * @throws RetryExhaustedError carrying the last error
 */
export async function retryWithBackoff<T>(
	operation: (attempt: number) => Promise<T>,
	backoff: ExponentialBackoff,
	options: RetryOptions = {},
): Promise<T> {
	const sleep = options.sleep ?? defaultSleep;
	for (let attempt = 1; ; attempt++) {
		try {
			return await operation(attempt);
		} catch (err) {
			const delayMs = backoff.nextDelay();
			if (delayMs === null) {
				throw new RetryExhaustedError(attempt, backoff.getElapsedMs(), err);
			}
			options.onRetry?.(err, attempt, delayMs);
			await sleep(delayMs);
		}
	}
}
