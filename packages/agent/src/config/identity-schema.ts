import { z } from "zod";

/**
 * Shape of the agent configuration document.
 */
export const agentConfigDocumentSchema = z.object({
	maas_uuid: z.string(),
	system_id: z.string().min(1, "system_id must not be empty"),
	secret: z.string(),
	controllers: z
		.array(z.string().min(1, "controller entries must not be empty"))
		.nonempty("at least one controller is required"),
});

export type AgentConfigDocument = z.infer<typeof agentConfigDocumentSchema>;
