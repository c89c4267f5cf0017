export { ExponentialBackoff, type Clock, type RandomSource } from "./exponential-backoff.js";
export { RetryExhaustedError, retryWithBackoff, type RetryOptions } from "./retry.js";
