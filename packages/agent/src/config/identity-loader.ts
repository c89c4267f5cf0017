import { readFile } from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml } from "yaml";
import type { AgentIdentity } from "../types/index.js";
import { ConfigError } from "../errors/index.js";
import { formatError } from "../utils/index.js";
import { type AgentConfigDocument, agentConfigDocumentSchema } from "./identity-schema.js";

export type ReadTextFile = (filePath: string) => Promise<string>;

const readUtf8: ReadTextFile = (filePath: string) => readFile(filePath, "utf8");

function toIdentity(document: AgentConfigDocument): AgentIdentity {
	const [first, ...rest] = document.controllers;
	return Object.freeze({
		clusterUUID: document.maas_uuid,
		systemID: document.system_id,
		sharedSecret: document.secret,
		controllerEndpoints: Object.freeze([first, ...rest] as const),
	});
}

/**
 * Parse an agent configuration document.
 * @throws ConfigError if the text is not YAML or misses required fields
 */
export function parseAgentIdentity(text: string): AgentIdentity {
	let document: unknown;
	try {
		document = parseYaml(text);
	} catch (err) {
		throw new ConfigError(formatError(err), { cause: err });
	}

	const parsed = agentConfigDocumentSchema.safeParse(document);
	if (!parsed.success) {
		const issues = parsed.error.issues
			.map(issue => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
			.join("; ");
		throw new ConfigError(issues, { cause: parsed.error });
	}

	return toIdentity(parsed.data);
}

/**
 * Read and parse the agent configuration file.
 * @throws ConfigError if the file cannot be read or parsed
 */
export async function loadAgentIdentity(
	configPath: string,
	readTextFile: ReadTextFile = readUtf8,
): Promise<AgentIdentity> {
	let text: string;
	try {
		text = await readTextFile(path.normalize(configPath));
	} catch (err) {
		throw new ConfigError(formatError(err), { cause: err });
	}
	return parseAgentIdentity(text);
}
