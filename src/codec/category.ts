import { asI64, asU64 } from "../types/int.js";
import {
  Category,
  MARKERS,
  NEG_1BYTE_MIN,
  NEG_2BYTE_MIN,
  POS_1BYTE_MAX,
  POS_2BYTE_MAX,
} from "../types/category.js";
import { DecodeError } from "./primitives.js";

const NEG_MULTI_MARKER = MARKERS[Category.NegativeMulti];
const NEG_2BYTE_MARKER = MARKERS[Category.Negative2Byte];
const NEG_1BYTE_MARKER = MARKERS[Category.Negative1Byte];
const POS_1BYTE_MARKER = MARKERS[Category.Positive1Byte];
const POS_2BYTE_MARKER = MARKERS[Category.Positive2Byte];
const POS_MULTI_MARKER = MARKERS[Category.PositiveMulti];

/**
 * Category an unsigned value encodes into.
 */
export function classifyUnsigned(value: bigint | number): Category {
  const x = asU64(value);
  if (x <= POS_1BYTE_MAX) return Category.Positive1Byte;
  if (x <= POS_2BYTE_MAX) return Category.Positive2Byte;
  return Category.PositiveMulti;
}

/**
 * Category a signed value encodes into.
 */
export function classifySigned(value: bigint | number): Category {
  const x = asI64(value);
  if (x < NEG_2BYTE_MIN) return Category.NegativeMulti;
  if (x < NEG_1BYTE_MIN) return Category.Negative2Byte;
  if (x < 0n) return Category.Negative1Byte;
  return classifyUnsigned(x);
}

/**
 * Category named by a header byte.
 *
 * The low bits of 1-byte and 2-byte headers carry value bits, so every
 * top-nibble variant of those markers maps to the same category.
 *
 * @throws DecodeError (`INVALID_MARKER`) for the reserved `0x0_` and `0xF_` ranges.
 */
export function categoryOfHeader(header: number): Category {
  const marker = header & 0xf0;
  switch (marker) {
    case NEG_MULTI_MARKER:
      return Category.NegativeMulti;

    case NEG_2BYTE_MARKER:
    case NEG_2BYTE_MARKER | 0x10:
      return Category.Negative2Byte;

    case NEG_1BYTE_MARKER:
    case NEG_1BYTE_MARKER | 0x10:
    case NEG_1BYTE_MARKER | 0x20:
    case NEG_1BYTE_MARKER | 0x30:
      return Category.Negative1Byte;

    case POS_1BYTE_MARKER:
    case POS_1BYTE_MARKER | 0x10:
    case POS_1BYTE_MARKER | 0x20:
    case POS_1BYTE_MARKER | 0x30:
      return Category.Positive1Byte;

    case POS_2BYTE_MARKER:
    case POS_2BYTE_MARKER | 0x10:
      return Category.Positive2Byte;

    case POS_MULTI_MARKER:
      return Category.PositiveMulti;

    default:
      throw new DecodeError(
        "INVALID_MARKER",
        `reserved header byte 0x${header.toString(16).padStart(2, "0")}`
      );
  }
}

/**
 * Number of payload bytes following a header of the given category.
 *
 * @throws DecodeError (`INVALID_MARKER`) if a multi-byte length nibble does not
 * name 1 to 8 bytes.
 */
export function payloadLength(header: number, category: Category): number {
  switch (category) {
    case Category.Negative1Byte:
    case Category.Positive1Byte:
      return 0;

    case Category.Negative2Byte:
    case Category.Positive2Byte:
      return 1;

    case Category.NegativeMulti: {
      // The nibble counts the all-ones bytes dropped from the value.
      const dropped = header & 0x0f;
      if (dropped > 7) {
        throw new DecodeError("INVALID_MARKER", `invalid negative length nibble: ${dropped}`);
      }
      return 8 - dropped;
    }

    case Category.PositiveMulti: {
      const len = header & 0x0f;
      if (len < 1 || len > 8) {
        throw new DecodeError("INVALID_MARKER", `invalid positive length nibble: ${len}`);
      }
      return len;
    }
  }
}

/**
 * Total length of the encoded integer at the start of `bytes`, read from its
 * header alone. Bytes past the header are not inspected.
 */
export function encodedLength(bytes: Uint8Array): number {
  if (bytes.length === 0) {
    throw new DecodeError("TRUNCATED", "empty input");
  }
  const header = bytes[0];
  return 1 + payloadLength(header, categoryOfHeader(header));
}
