/**
 * lexint
 *
 * Order-preserving variable-length encoding for 64-bit integers. Encoded
 * values compare byte by byte in the same order as the integers they hold,
 * so they can be used directly as sort-key components.
 *
 * @packageDocumentation
 */

// Types
export * from "./types/index.js";

// Utilities
export * from "./util/index.js";

// Codec
export {
  encodeUnsigned,
  decodeUnsigned,
  decodeUnsignedNumber,
  encodeSigned,
  decodeSigned,
  decodeSignedNumber,
  classifyUnsigned,
  classifySigned,
  categoryOfHeader,
  encodedLength,
  encodedLengthUnsigned,
  encodedLengthSigned,
  DecodeError,
  type DecodeErrorCode,
  reinterpretSigned,
  reinterpretUnsigned,
} from "./codec/index.js";
