import { AgentError } from "./agent-error.js";

/**
 * Thrown when the configuration file cannot be read or does not have the expected shape
 */
export class ConfigError extends AgentError {
	constructor(reason: string, options?: { cause?: unknown }) {
		super(`configuration error: ${reason}`, options);
	}
}
