/**
 * Parameters of an exponential backoff retry policy.
 */
export interface RetryPolicy {
	readonly initialIntervalMs: number;
	readonly multiplier: number;
	/** Each delay is drawn from interval * (1 ± randomizationFactor). */
	readonly randomizationFactor: number;
	readonly maxIntervalMs: number;
	/** Total time after which no further attempt is scheduled. */
	readonly maxElapsedTimeMs: number;
}
