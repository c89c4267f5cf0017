import { describe, expect, it } from "vitest";
import {
	AGENT_TASK_QUEUE_SUFFIX,
	CONTROLLER_API,
	CONTROLLER_PORT,
	PAYLOAD_ENCODING,
	agentTaskQueue,
} from "../constants.js";
import { ACTIVITY_NAME, WORKFLOW_NAME } from "../types/task.js";

describe("shared constants", () => {
	describe("controller endpoint", () => {
		it("CONTROLLER_PORT equals 5271", () => {
			expect(CONTROLLER_PORT).toBe(5271);
		});

		it("builds task paths with encoded identifiers", () => {
			expect(CONTROLLER_API.claimTask("abc def")).toBe("/api/v1/workers/abc%20def/tasks/claim");
			expect(CONTROLLER_API.completeTask("t-1")).toBe("/api/v1/tasks/t-1/complete");
			expect(CONTROLLER_API.failTask("t/2")).toBe("/api/v1/tasks/t%2F2/fail");
		});
	});

	describe("task queues", () => {
		it("derives the agent task queue from the system id", () => {
			expect(AGENT_TASK_QUEUE_SUFFIX).toBe("@agent:main");
			expect(agentTaskQueue("xyz123")).toBe("xyz123@agent:main");
		});
	});

	describe("payload encodings", () => {
		it("names the JSON and encrypted encodings", () => {
			expect(PAYLOAD_ENCODING.JSON).toBe("json/plain");
			expect(PAYLOAD_ENCODING.ENCRYPTED).toBe("binary/encrypted");
		});
	});

	describe("task names", () => {
		it("lists nine workflows", () => {
			expect(Object.values(WORKFLOW_NAME).sort()).toEqual([
				"check_ip",
				"commission",
				"deploy",
				"deployed_os_workflow",
				"ephemeral_os_workflow",
				"power_cycle",
				"power_off",
				"power_on",
				"power_query",
			]);
		});

		it("lists two activities", () => {
			expect(Object.values(ACTIVITY_NAME).sort()).toEqual(["power", "switch_boot_order"]);
		});
	});
});
