/**
 * Base class for agent errors.
 */
export class AgentError extends Error {
	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = this.constructor.name;
	}
}
