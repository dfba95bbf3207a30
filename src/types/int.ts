/**
 * Largest unsigned 64-bit value.
 */
export const U64_MAX = 0xffffffffffffffffn;

/**
 * Smallest signed 64-bit value.
 */
export const I64_MIN = -(1n << 63n);

/**
 * Largest signed 64-bit value.
 */
export const I64_MAX = (1n << 63n) - 1n;

function toBigInt(value: bigint | number, kind: string): bigint {
  if (typeof value === "bigint") return value;
  if (!Number.isSafeInteger(value)) {
    throw new RangeError(`${kind} value must be a safe integer, got ${value}`);
  }
  return BigInt(value);
}

/**
 * Checks that `value` is an unsigned 64-bit integer and returns it as a bigint.
 * @throws RangeError if the value is out of range or not an integer.
 */
export function asU64(value: bigint | number): bigint {
  const v = toBigInt(value, "u64");
  if (v < 0n || v > U64_MAX) {
    throw new RangeError(`u64 value out of range [0, 2^64 - 1]: ${v}`);
  }
  return v;
}

/**
 * Checks that `value` is a signed 64-bit integer and returns it as a bigint.
 * @throws RangeError if the value is out of range or not an integer.
 */
export function asI64(value: bigint | number): bigint {
  const v = toBigInt(value, "i64");
  if (v < I64_MIN || v > I64_MAX) {
    throw new RangeError(`i64 value out of range [-2^63, 2^63 - 1]: ${v}`);
  }
  return v;
}
