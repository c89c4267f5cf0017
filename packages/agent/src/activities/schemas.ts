import { z } from "zod";
import { POWER_ACTION } from "@maas-agent/shared";

export const powerParametersSchema = z.object({
	driverType: z.string().min(1),
	driverOptions: z.record(z.string()).default({}),
});

export const powerActivityInputSchema = powerParametersSchema.extend({
	action: z.enum([POWER_ACTION.ON, POWER_ACTION.OFF, POWER_ACTION.QUERY, POWER_ACTION.CYCLE]),
});

export const powerActivityResultSchema = z.object({
	state: z.string(),
});

export const switchBootOrderInputSchema = powerParametersSchema.extend({
	netboot: z.boolean(),
});

export const switchBootOrderResultSchema = z.object({
	netboot: z.boolean(),
});

export type PowerParametersInput = z.infer<typeof powerParametersSchema>;
export type PowerActivityInput = z.infer<typeof powerActivityInputSchema>;
export type PowerActivityResult = z.infer<typeof powerActivityResultSchema>;
export type SwitchBootOrderInput = z.infer<typeof switchBootOrderInputSchema>;
export type SwitchBootOrderResult = z.infer<typeof switchBootOrderResultSchema>;
