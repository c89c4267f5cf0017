export { CodecDataConverter, createCodecDataConverter } from "./data-converter.js";
export { EncryptionCodec, createEncryptionCodec } from "./encryption-codec.js";
export { JsonPayloadConverter } from "./payload-converter.js";
export { fromEncodedPayload, isEncodedPayload, parseEncodedPayload, toEncodedPayload } from "./wire.js";
