import type { RetryPolicy } from "../types/index.js";

/**
 * Returns the current time in milliseconds.
 */
export type Clock = () => number;

/**
 * Returns a number in [0, 1).
 */
export type RandomSource = () => number;

/**
 * Exponential backoff with randomized intervals and a total elapsed-time budget.
 *
 * The budget is measured from construction (or the last reset). Once the next
 * delay would end past it, nextDelay returns null and the sequence stays stopped.
 */
export class ExponentialBackoff {
	private currentIntervalMs: number;
	private startTime: number;
	private stopped = false;

	constructor(
		private readonly policy: RetryPolicy,
		private readonly clock: Clock = Date.now,
		private readonly random: RandomSource = Math.random,
	) {
		if (!(policy.maxElapsedTimeMs > 0)) {
			throw new RangeError("maxElapsedTimeMs must be positive");
		}
		if (!(policy.initialIntervalMs > 0) || !(policy.multiplier >= 1)) {
			throw new RangeError("initialIntervalMs must be positive and multiplier at least 1");
		}
		this.currentIntervalMs = policy.initialIntervalMs;
		this.startTime = clock();
	}

	reset(): void {
		this.currentIntervalMs = this.policy.initialIntervalMs;
		this.startTime = this.clock();
		this.stopped = false;
	}

	getElapsedMs(): number {
		return this.clock() - this.startTime;
	}

	/**
	 * Delay before the next attempt, or null once the budget is spent.
	 */
	nextDelay(): number | null {
		if (this.stopped) {
			return null;
		}
		const elapsed = this.getElapsedMs();
		const next = this.randomize(this.currentIntervalMs);
		this.increment();
		if (elapsed + next > this.policy.maxElapsedTimeMs) {
			this.stopped = true;
			return null;
		}
		return next;
	}

	private randomize(intervalMs: number): number {
		const delta = this.policy.randomizationFactor * intervalMs;
		const min = intervalMs - delta;
		const max = intervalMs + delta;
		return min + this.random() * (max - min);
	}

	private increment(): void {
		if (this.currentIntervalMs >= this.policy.maxIntervalMs / this.policy.multiplier) {
			this.currentIntervalMs = this.policy.maxIntervalMs;
		} else {
			this.currentIntervalMs *= this.policy.multiplier;
		}
	}
}
