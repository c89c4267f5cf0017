/**
 * E2E Test Constants
 *
 * Centralized timing values shared by the E2E scenarios.
 */

/**
 * Poll interval the agents under test use between task claims
 */
export const TEST_POLL_INTERVAL_MS = 50;

/**
 * Default timeout for waitFor/waitForValue utilities
 */
export const DEFAULT_WAIT_TIMEOUT_MS = 10000;

/**
 * How long an agent runs before a scenario sends it a shutdown signal
 */
export const RUN_BEFORE_SIGNAL_MS = 1000;

/**
 * Fake time advanced past the one minute connection budget
 */
export const PAST_CONNECT_BUDGET_MS = 70_000;

/**
 * Timeout for tests that wait through real connection retries
 */
export const LONG_TEST_TIMEOUT_MS = 60000;

/**
 * Secret shared between the stub controller and the agents under test
 */
export const TEST_SECRET = "test-secret";

/**
 * System id of the agents under test
 */
export const TEST_SYSTEM_ID = "abc123";
