import { isIP } from "node:net";
import { z } from "zod";
import type { WorkflowHandler } from "../types/index.js";

const checkIpInputSchema = z.object({
	ips: z.array(z.string()),
});

export interface CheckedIp {
	ip: string;
	valid: boolean;
	family: 4 | 6 | null;
}

export const checkIpWorkflow: WorkflowHandler = async (_context, input) => {
	const { ips } = checkIpInputSchema.parse(input);
	const results = ips.map((ip): CheckedIp => {
		const family = isIP(ip);
		return family === 4 || family === 6
			? { ip, valid: true, family }
			: { ip, valid: false, family: null };
	});
	return { results };
};
