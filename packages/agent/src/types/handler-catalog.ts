/**
 * Context handed to a workflow handler.
 */
export interface WorkflowContext {
	/** Identity of the worker running the workflow. */
	readonly identity: string;
	executeActivity(name: string, input: unknown): Promise<unknown>;
}

export type WorkflowHandler = (context: WorkflowContext, input: unknown) => Promise<unknown>;

export type ActivityHandler = (input: unknown) => Promise<unknown>;

/**
 * Name-to-handler mappings registered with the controller.
 * Immutable after construction.
 */
export interface HandlerCatalog {
	readonly workflows: ReadonlyMap<string, WorkflowHandler>;
	readonly activities: ReadonlyMap<string, ActivityHandler>;
}
