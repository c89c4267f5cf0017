import type { Logger, RetryPolicy, WorkerPool } from "../types/index.js";
import { PoolStartError } from "../errors/index.js";
import { type Clock, ExponentialBackoff, type RandomSource, RetryExhaustedError, retryWithBackoff } from "../retry/index.js";
import { type Sleep, formatError } from "../utils/index.js";

export interface PoolSupervisorOptions {
	policy: RetryPolicy;
	clock?: Clock;
	random?: RandomSource;
	sleep?: Sleep;
}

/**
 * Starts a worker pool under its own bounded retry policy.
 */
export class PoolSupervisor {
	constructor(
		private readonly logger: Logger,
		private readonly options: PoolSupervisorOptions,
	) {}

	/**
	 * @throws PoolStartError once the retry budget is spent
	 */
	async start(pool: WorkerPool): Promise<void> {
		const backoff = new ExponentialBackoff(this.options.policy, this.options.clock, this.options.random);
		try {
			await retryWithBackoff(() => pool.start(), backoff, {
				sleep: this.options.sleep,
				onRetry: (err, attempt, delayMs) => {
					this.logger.warn("Worker pool start failed, retrying", {
						attempt,
						delayMs: Math.round(delayMs),
						error: formatError(err),
					});
				},
			});
		} catch (err) {
			if (err instanceof RetryExhaustedError) {
				throw new PoolStartError(
					`worker pool failed to start after ${err.attempts} attempt(s): ${formatError(err.lastError)}`,
					{ cause: err.lastError },
				);
			}
			throw err;
		}
	}
}
