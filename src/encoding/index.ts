/**
 * Content-transfer-encodings
 *
 * Streaming encoders for base64, quoted-printable, uuencode and the
 * pass-through encodings, plus the registry that resolves them by name.
 *
 * @packageDocumentation
 */

export { Encoder, DEFAULT_CHUNK_SIZE } from './encoder.js';
export type { EncoderProperties } from './encoder.js';
export { Base64Encoder, base64Encode, base64Decode, base64DecodeToString, base64EncodedLength } from './base64.js';
export {
  QuotedPrintableEncoder,
  quotedPrintableEncode,
  quotedPrintableDecode,
  quotedPrintableDecodeToString,
  qEncode,
  qDecode,
  qEncodedLength,
} from './quoted-printable.js';
export { UUEncoder } from './uuencode.js';
export { IdentityEncoder } from './identity.js';
export { EncoderRegistry, registerStandardEncoders } from './registry.js';
export type { EncoderFactory } from './registry.js';
export { Encoding, EncodingTypes } from './encoding.js';
