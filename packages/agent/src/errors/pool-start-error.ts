import { AgentError } from "./agent-error.js";

/**
 * Thrown when the worker pool cannot be constructed or started
 */
export class PoolStartError extends AgentError {}
