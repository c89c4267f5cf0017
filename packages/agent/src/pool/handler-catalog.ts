import type { ActivityHandler, HandlerCatalog, WorkflowHandler } from "../types/index.js";
import { PoolStartError } from "../errors/index.js";

export interface HandlerCatalogDefinition {
	workflows: Record<string, WorkflowHandler>;
	activities: Record<string, ActivityHandler>;
}

function validateEntries(kind: string, entries: [string, unknown][], problems: string[]): void {
	for (const [name, handler] of entries) {
		if (name.trim() === "") {
			problems.push(`${kind} name must not be empty`);
		}
		if (typeof handler !== "function") {
			problems.push(`${kind} ${name} has no handler function`);
		}
	}
}

/**
 * Validate and freeze a handler catalog.
 * A name may appear only once across workflows and activities.
 *
 * @throws PoolStartError listing every problem found
 */
export function createHandlerCatalog(definition: HandlerCatalogDefinition): HandlerCatalog {
	const workflows = Object.entries(definition.workflows);
	const activities = Object.entries(definition.activities);
	const problems: string[] = [];

	validateEntries("workflow", workflows, problems);
	validateEntries("activity", activities, problems);

	const workflowNames = new Set(workflows.map(([name]) => name));
	for (const [name] of activities) {
		if (workflowNames.has(name)) {
			problems.push(`${name} is registered as both a workflow and an activity`);
		}
	}

	if (problems.length > 0) {
		throw new PoolStartError(`invalid handler catalog: ${problems.join("; ")}`);
	}

	return Object.freeze({
		workflows: new Map(workflows),
		activities: new Map(activities),
	});
}
