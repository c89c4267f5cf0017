/**
 * E2E Test Helpers
 *
 * Barrel export for all test helper modules.
 */

export * from "./constants.js";
export * from "./controller-stub.js";
export * from "./agent-fixture.js";
export * from "./wait.js";
