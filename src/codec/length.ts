import { asI64, asU64 } from "../types/int.js";
import {
  NEG_1BYTE_MIN,
  NEG_2BYTE_MIN,
  POS_1BYTE_MAX,
  POS_2BYTE_MAX,
} from "../types/category.js";
import { reinterpretUnsigned } from "./primitives.js";

/**
 * Number of leading zero bits in the 64-bit pattern of `value`.
 */
export function leadingZeroBits(value: bigint): number {
  const bits = reinterpretUnsigned(value);
  if (bits === 0n) return 64;
  return 64 - bits.toString(2).length;
}

/**
 * Number of leading one bits in the 64-bit pattern of `value`.
 */
export function leadingOneBits(value: bigint): number {
  return leadingZeroBits(~value);
}

/**
 * Fewest bytes that hold the non-negative magnitude `m` (at least 1).
 */
export function unsignedPayloadLength(m: bigint): number {
  return Math.max(1, 8 - Math.floor(leadingZeroBits(m) / 8));
}

/**
 * Fewest bytes that hold the negative value `v` once the dropped high bytes
 * are sign-extended back with ones (at least 1).
 */
export function signedPayloadLength(v: bigint): number {
  return Math.max(1, 8 - Math.floor(leadingOneBits(v) / 8));
}

/**
 * Total encoded size of an unsigned value, header included.
 */
export function encodedLengthUnsigned(value: bigint | number): number {
  const x = asU64(value);
  if (x <= POS_1BYTE_MAX) return 1;
  if (x <= POS_2BYTE_MAX) return 2;
  return 1 + unsignedPayloadLength(x - (POS_2BYTE_MAX + 1n));
}

/**
 * Total encoded size of a signed value, header included.
 */
export function encodedLengthSigned(value: bigint | number): number {
  const x = asI64(value);
  if (x < NEG_2BYTE_MIN) return 1 + signedPayloadLength(x);
  if (x < NEG_1BYTE_MIN) return 2;
  if (x < 0n) return 1;
  return encodedLengthUnsigned(x);
}
