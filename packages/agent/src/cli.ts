/**
 * CLI entry point for the agent.
 * Runs the agent and exits the process with its exit code.
 */

import { createAgent } from "./di/index.js";

/**
 * Check if this module is being run directly (as CLI entry point).
 * Works for both .js (compiled) and .ts (tsx) execution.
 */
function isMainModule(): boolean {
	const scriptPath = process.argv[1];
	if (!scriptPath) {
		return false;
	}
	return scriptPath.endsWith("cli.js") || scriptPath.endsWith("cli.ts") || scriptPath.endsWith("maas-agent");
}

if (isMainModule()) {
	createAgent(process.env)
		.run()
		.then((code) => {
			// The worker pool is torn down with the process
			process.exit(code);
		})
		.catch((err: unknown) => {
			console.error("Agent failed:", err);
			process.exit(1);
		});
}
