import { asI64 } from "../types/int.js";
import {
  Category,
  MARKERS,
  NEG_1BYTE_MIN,
  NEG_2BYTE_MIN,
} from "../types/category.js";
import { categoryOfHeader, payloadLength } from "./category.js";
import { encodedLengthSigned, signedPayloadLength } from "./length.js";
import {
  DecodeError,
  getBits,
  Reader,
  reinterpretSigned,
  reinterpretUnsigned,
  Writer,
} from "./primitives.js";
import { decodeUnsigned, writeUnsigned } from "./unsigned.js";

/**
 * Encodes a signed 64-bit integer.
 *
 * Non-negative values encode exactly as `encodeUnsigned` does. Negative values
 * take the categories below `0x80`, so every negative encoding sorts before
 * every non-negative one.
 *
 * @throws RangeError if `value` is not in `[-2^63, 2^63 - 1]`.
 */
export function encodeSigned(value: bigint | number): Uint8Array {
  const x = asI64(value);
  const writer = new Writer(encodedLengthSigned(x));

  if (x >= 0n) {
    writeUnsigned(writer, x);
  } else if (x < NEG_2BYTE_MIN) {
    // Header nibble is the count of dropped 0xff bytes: longer payloads
    // (larger magnitudes) get smaller headers.
    const len = signedPayloadLength(x);
    writer.writeByte(MARKERS[Category.NegativeMulti] | (8 - len));
    writer.writeUintBE(x, len);
  } else if (x < NEG_1BYTE_MIN) {
    const y = x - NEG_2BYTE_MIN;
    writer.writeByte(MARKERS[Category.Negative2Byte] | getBits(y, 13, 8));
    writer.writeByte(getBits(y, 8, 0));
  } else {
    const y = x - NEG_1BYTE_MIN;
    writer.writeByte(MARKERS[Category.Negative1Byte] | getBits(y, 6, 0));
  }

  return writer.finish();
}

/**
 * Decodes a signed 64-bit integer from the start of `bytes`.
 *
 * Headers of the non-negative categories are decoded as unsigned and the
 * resulting bit pattern is reinterpreted as two's complement.
 *
 * @throws DecodeError
 * - `INVALID_MARKER` for reserved headers or bad length nibbles
 * - `TRUNCATED` when the payload is incomplete
 * - `OVERFLOW` when a multi-byte payload exceeds the u64 range, or a negative
 *   one has no sign bit
 */
export function decodeSigned(bytes: Uint8Array): bigint {
  const reader = new Reader(bytes);
  const header = reader.readByte();
  const category = categoryOfHeader(header);

  switch (category) {
    case Category.NegativeMulti: {
      const len = payloadLength(header, category);
      const payload = reader.readUintBE(len);
      // Sign-extend: every byte above the payload is 0xff.
      const fill = reinterpretUnsigned(-1n << BigInt(len * 8));
      const x = reinterpretSigned(fill | payload);
      if (x >= 0n) {
        throw new DecodeError("OVERFLOW", `negative payload decodes to non-negative value: ${x}`);
      }
      return x;
    }

    case Category.Negative2Byte: {
      const hi = header & 0x1f;
      const lo = reader.readByte();
      return BigInt((hi << 8) | lo) + NEG_2BYTE_MIN;
    }

    case Category.Negative1Byte:
      return BigInt(header & 0x3f) + NEG_1BYTE_MIN;

    default:
      return reinterpretSigned(decodeUnsigned(bytes));
  }
}

/**
 * Decodes a signed integer and returns it as a number.
 * @throws RangeError if the value is outside the safe integer range.
 */
export function decodeSignedNumber(bytes: Uint8Array): number {
  const value = decodeSigned(bytes);
  if (
    value > BigInt(Number.MAX_SAFE_INTEGER) ||
    value < BigInt(Number.MIN_SAFE_INTEGER)
  ) {
    throw new RangeError(`value outside safe integer range: ${value}`);
  }
  return Number(value);
}
