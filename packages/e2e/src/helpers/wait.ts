/**
 * Wait Utilities for E2E Tests
 *
 * Polls a condition on real time until it holds or the timeout passes.
 */

import { DEFAULT_WAIT_TIMEOUT_MS } from "./constants.js";

export interface WaitOptions {
	timeoutMs?: number;
	intervalMs?: number;
	/** Named in the timeout error */
	description?: string;
}

/**
 * Wait for a condition to become true
 */
export async function waitFor(
	condition: () => boolean,
	options: WaitOptions = {},
): Promise<void> {
	const { timeoutMs = DEFAULT_WAIT_TIMEOUT_MS, intervalMs = 20, description = "condition" } = options;
	const deadline = Date.now() + timeoutMs;

	while (!condition()) {
		if (Date.now() >= deadline) {
			throw new Error(`Timeout waiting for ${description} after ${timeoutMs}ms`);
		}
		await sleep(intervalMs);
	}
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
	return new Promise((resolve) => setTimeout(resolve, ms));
}
