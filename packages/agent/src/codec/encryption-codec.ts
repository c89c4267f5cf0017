import { createCipheriv, createDecipheriv, createHash, randomBytes } from "node:crypto";
import { PAYLOAD_ENCODING, PAYLOAD_ENCODING_KEY } from "@maas-agent/shared";
import type { Payload, PayloadCodec } from "../types/index.js";
import { CodecSetupError, PayloadDecodeError } from "../errors/index.js";
import { formatError } from "../utils/index.js";
import { parseEncodedPayload, payloadEncoding, toEncodedPayload } from "./wire.js";

const ALGORITHM = "aes-256-gcm";
const IV_LENGTH = 12;
const TAG_LENGTH = 16;

/**
 * Encrypts whole payloads (metadata included) with AES-256-GCM.
 * Encrypted payloads are stored as iv ‖ ciphertext ‖ tag.
 */
export class EncryptionCodec implements PayloadCodec {
	constructor(private readonly key: Buffer) {}

	async encode(payloads: Payload[]): Promise<Payload[]> {
		return payloads.map(payload => this.encrypt(payload));
	}

	async decode(payloads: Payload[]): Promise<Payload[]> {
		return payloads.map(payload =>
			payloadEncoding(payload) === PAYLOAD_ENCODING.ENCRYPTED ? this.decrypt(payload) : payload,
		);
	}

	private encrypt(payload: Payload): Payload {
		const plaintext = Buffer.from(JSON.stringify(toEncodedPayload(payload)), "utf8");
		const iv = randomBytes(IV_LENGTH);
		const cipher = createCipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
		const ciphertext = Buffer.concat([cipher.update(plaintext), cipher.final()]);
		return {
			metadata: { [PAYLOAD_ENCODING_KEY]: Buffer.from(PAYLOAD_ENCODING.ENCRYPTED, "utf8") },
			data: Buffer.concat([iv, ciphertext, cipher.getAuthTag()]),
		};
	}

	private decrypt(payload: Payload): Payload {
		const data = Buffer.from(payload.data);
		if (data.length < IV_LENGTH + TAG_LENGTH) {
			throw new PayloadDecodeError("encrypted payload is too short");
		}
		const iv = data.subarray(0, IV_LENGTH);
		const tag = data.subarray(data.length - TAG_LENGTH);
		const ciphertext = data.subarray(IV_LENGTH, data.length - TAG_LENGTH);

		let plaintext: string;
		try {
			const decipher = createDecipheriv(ALGORITHM, this.key, iv, { authTagLength: TAG_LENGTH });
			decipher.setAuthTag(tag);
			plaintext = Buffer.concat([decipher.update(ciphertext), decipher.final()]).toString("utf8");
		} catch (err) {
			throw new PayloadDecodeError(`payload decryption failed: ${formatError(err)}`, { cause: err });
		}

		let inner: unknown;
		try {
			inner = JSON.parse(plaintext);
		} catch (err) {
			throw new PayloadDecodeError("decrypted payload is not valid JSON", { cause: err });
		}
		return parseEncodedPayload(inner);
	}
}

/**
 * Build the codec used to encrypt controller payloads.
 * The AES key is the SHA-256 digest of the shared secret.
 *
 * @throws CodecSetupError if the secret is empty
 */
export function createEncryptionCodec(secret: Uint8Array): EncryptionCodec {
	if (secret.length === 0) {
		throw new CodecSetupError("secret must not be empty");
	}
	const key = createHash("sha256").update(secret).digest();
	return new EncryptionCodec(key);
}
