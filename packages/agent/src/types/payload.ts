/**
 * A value converted for transport, before wire (base64) encoding.
 */
export interface Payload {
	metadata: Record<string, Uint8Array>;
	data: Uint8Array;
}

/**
 * Transformation applied to payloads on their way to and from the controller.
 */
export interface PayloadCodec {
	encode(payloads: Payload[]): Promise<Payload[]>;
	decode(payloads: Payload[]): Promise<Payload[]>;
}

/**
 * Converts between values and payloads.
 */
export interface PayloadConverter {
	toPayload(value: unknown): Payload;
	fromPayload(payload: Payload): unknown;
}

/**
 * Converts between values and payloads, applying codecs on the way.
 */
export interface DataConverter {
	toPayloads(values: unknown[]): Promise<Payload[]>;
	fromPayloads(payloads: Payload[]): Promise<unknown[]>;
}
