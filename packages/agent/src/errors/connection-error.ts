import { formatError } from "../utils/format-error.js";
import { AgentError } from "./agent-error.js";

/**
 * Thrown when no controller endpoint could be reached within the retry budget.
 * The last underlying error is kept as the cause.
 */
export class ConnectionError extends AgentError {
	readonly endpoints: readonly string[];
	readonly attempts: number;

	constructor(endpoints: readonly string[], attempts: number, lastError: unknown) {
		super(
			`controller connection failed after ${attempts} attempt(s) to ${endpoints.join(", ")}: ${formatError(lastError)}`,
			{ cause: lastError },
		);
		this.endpoints = endpoints;
		this.attempts = attempts;
	}
}
