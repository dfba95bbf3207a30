import { asU64, U64_MAX } from "../types/int.js";
import {
  Category,
  MARKERS,
  POS_1BYTE_MAX,
  POS_2BYTE_MAX,
} from "../types/category.js";
import { categoryOfHeader, payloadLength } from "./category.js";
import { encodedLengthUnsigned, unsignedPayloadLength } from "./length.js";
import { DecodeError, getBits, Reader, Writer } from "./primitives.js";

/**
 * Encodes an unsigned 64-bit integer.
 *
 * Encodings of smaller values compare lower, byte by byte, than encodings of
 * larger ones.
 *
 * @throws RangeError if `value` is not in `[0, 2^64 - 1]`.
 *
 * @example
 * ```typescript
 * encodeUnsigned(0);     // [0x80]
 * encodeUnsigned(64);    // [0xc0, 0x00]
 * encodeUnsigned(8256n); // [0xe1, 0x00]
 * ```
 */
export function encodeUnsigned(value: bigint | number): Uint8Array {
  const x = asU64(value);
  const writer = new Writer(encodedLengthUnsigned(x));
  writeUnsigned(writer, x);
  return writer.finish();
}

/**
 * Writes a checked non-negative value. Shared with the signed encoder, which
 * uses the same encodings for non-negative integers.
 */
export function writeUnsigned(writer: Writer, x: bigint): void {
  if (x <= POS_1BYTE_MAX) {
    writer.writeByte(MARKERS[Category.Positive1Byte] | getBits(x, 6, 0));
  } else if (x <= POS_2BYTE_MAX) {
    const y = x - (POS_1BYTE_MAX + 1n);
    writer.writeByte(MARKERS[Category.Positive2Byte] | getBits(y, 13, 8));
    writer.writeByte(getBits(y, 8, 0));
  } else {
    const y = x - (POS_2BYTE_MAX + 1n);
    const len = unsignedPayloadLength(y);
    writer.writeByte(MARKERS[Category.PositiveMulti] | len);
    writer.writeUintBE(y, len);
  }
}

/**
 * Decodes an unsigned 64-bit integer from the start of `bytes`.
 *
 * Only the bytes announced by the header are read; anything after them is
 * ignored.
 *
 * @throws DecodeError
 * - `INVALID_MARKER` for reserved or negative-category headers
 * - `TRUNCATED` when the payload is incomplete
 * - `OVERFLOW` when a multi-byte payload exceeds the u64 range
 */
export function decodeUnsigned(bytes: Uint8Array): bigint {
  const reader = new Reader(bytes);
  const header = reader.readByte();
  const category = categoryOfHeader(header);

  switch (category) {
    case Category.Positive1Byte:
      return BigInt(header & 0x3f);

    case Category.Positive2Byte: {
      const hi = header & 0x1f;
      const lo = reader.readByte();
      return BigInt((hi << 8) | lo) + POS_1BYTE_MAX + 1n;
    }

    case Category.PositiveMulti: {
      const y = reader.readUintBE(payloadLength(header, category));
      const x = y + POS_2BYTE_MAX + 1n;
      if (x > U64_MAX) {
        throw new DecodeError("OVERFLOW", `unsigned value exceeds 2^64 - 1: ${x}`);
      }
      return x;
    }

    default:
      throw new DecodeError(
        "INVALID_MARKER",
        `header byte 0x${header.toString(16).padStart(2, "0")} is not an unsigned encoding`
      );
  }
}

/**
 * Decodes an unsigned integer and returns it as a number.
 * @throws RangeError if the value is larger than `Number.MAX_SAFE_INTEGER`.
 */
export function decodeUnsignedNumber(bytes: Uint8Array): number {
  const value = decodeUnsigned(bytes);
  if (value > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new RangeError(`value too large for number: ${value}`);
  }
  return Number(value);
}
