import { PAYLOAD_ENCODING, PAYLOAD_ENCODING_KEY } from "@maas-agent/shared";
import type { Payload, PayloadConverter } from "../types/index.js";
import { PayloadDecodeError } from "../errors/index.js";
import { payloadEncoding } from "./wire.js";

function encodingMetadata(encoding: string): Record<string, Uint8Array> {
	return { [PAYLOAD_ENCODING_KEY]: Buffer.from(encoding, "utf8") };
}

/**
 * Converts values to JSON payloads. undefined travels as a null payload.
 */
export class JsonPayloadConverter implements PayloadConverter {
	toPayload(value: unknown): Payload {
		if (value === undefined) {
			return { metadata: encodingMetadata(PAYLOAD_ENCODING.NULL), data: new Uint8Array(0) };
		}
		return {
			metadata: encodingMetadata(PAYLOAD_ENCODING.JSON),
			data: Buffer.from(JSON.stringify(value), "utf8"),
		};
	}

	fromPayload(payload: Payload): unknown {
		const encoding = payloadEncoding(payload);
		switch (encoding) {
			case PAYLOAD_ENCODING.NULL:
				return undefined;
			case PAYLOAD_ENCODING.JSON:
				try {
					return JSON.parse(Buffer.from(payload.data).toString("utf8"));
				} catch (err) {
					throw new PayloadDecodeError("payload is not valid JSON", { cause: err });
				}
			default:
				throw new PayloadDecodeError(`unsupported payload encoding: ${encoding ?? "none"}`);
		}
	}
}
