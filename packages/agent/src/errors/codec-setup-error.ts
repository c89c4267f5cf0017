import { AgentError } from "./agent-error.js";

/**
 * Thrown when the payload encryption codec cannot be constructed
 */
export class CodecSetupError extends AgentError {
	constructor(reason: string, options?: { cause?: unknown }) {
		super(`encryption codec setup failed: ${reason}`, options);
	}
}
