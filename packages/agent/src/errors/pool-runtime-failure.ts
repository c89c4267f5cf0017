import { AgentError } from "./agent-error.js";

/**
 * Terminal failure of a running worker pool, delivered through its failure signal
 */
export class PoolRuntimeFailure extends AgentError {}
