/**
 * Waits for a number of milliseconds. Injected where tests need to control time.
 */
export type Sleep = (ms: number) => Promise<void>;

/**
 * Sleep for a specified number of milliseconds.
 */
export const sleep: Sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));
