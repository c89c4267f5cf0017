import type { DataConverter, Payload, PayloadCodec, PayloadConverter } from "../types/index.js";
import { JsonPayloadConverter } from "./payload-converter.js";

/**
 * Data converter that runs payloads through codecs after conversion.
 * Codecs encode in order and decode in reverse order.
 */
export class CodecDataConverter implements DataConverter {
	constructor(
		private readonly payloadConverter: PayloadConverter,
		private readonly codecs: readonly PayloadCodec[],
	) {}

	async toPayloads(values: unknown[]): Promise<Payload[]> {
		let payloads = values.map(value => this.payloadConverter.toPayload(value));
		for (const codec of this.codecs) {
			payloads = await codec.encode(payloads);
		}
		return payloads;
	}

	async fromPayloads(payloads: Payload[]): Promise<unknown[]> {
		let decoded = payloads;
		for (const codec of [...this.codecs].reverse()) {
			decoded = await codec.decode(decoded);
		}
		return decoded.map(payload => this.payloadConverter.fromPayload(payload));
	}
}

/**
 * Default JSON conversion wrapped with the given codec.
 */
export function createCodecDataConverter(codec: PayloadCodec): CodecDataConverter {
	return new CodecDataConverter(new JsonPayloadConverter(), [codec]);
}
