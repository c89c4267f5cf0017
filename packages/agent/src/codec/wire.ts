import { type EncodedPayload, PAYLOAD_ENCODING_KEY } from "@maas-agent/shared";
import type { Payload } from "../types/index.js";
import { PayloadDecodeError } from "../errors/index.js";

function isStringRecord(value: unknown): value is Record<string, string> {
	return typeof value === "object" && value !== null && !Array.isArray(value)
		&& Object.values(value).every(entry => typeof entry === "string");
}

export function isEncodedPayload(value: unknown): value is EncodedPayload {
	return typeof value === "object" && value !== null
		&& "metadata" in value && isStringRecord(value.metadata)
		&& "data" in value && typeof value.data === "string";
}

/**
 * Base64-encode a payload for transport.
 */
export function toEncodedPayload(payload: Payload): EncodedPayload {
	const metadata: Record<string, string> = {};
	for (const [key, value] of Object.entries(payload.metadata)) {
		metadata[key] = Buffer.from(value).toString("base64");
	}
	return { metadata, data: Buffer.from(payload.data).toString("base64") };
}

export function fromEncodedPayload(encoded: EncodedPayload): Payload {
	const metadata: Record<string, Uint8Array> = {};
	for (const [key, value] of Object.entries(encoded.metadata)) {
		metadata[key] = Buffer.from(value, "base64");
	}
	return { metadata, data: Buffer.from(encoded.data, "base64") };
}

/**
 * Decode the wire form of a payload received from the controller.
 * @throws PayloadDecodeError if the value is not an encoded payload
 */
export function parseEncodedPayload(value: unknown): Payload {
	if (!isEncodedPayload(value)) {
		throw new PayloadDecodeError("malformed payload");
	}
	return fromEncodedPayload(value);
}

export function payloadEncoding(payload: Payload): string | undefined {
	const raw = payload.metadata[PAYLOAD_ENCODING_KEY];
	return raw === undefined ? undefined : Buffer.from(raw).toString("utf8");
}
