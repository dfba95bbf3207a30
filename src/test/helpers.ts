import { DecodeError, type DecodeErrorCode } from "../codec/primitives.js";

/**
 * Runs `fn` and returns the code of the DecodeError it throws.
 * Fails the test if `fn` returns normally or throws anything else.
 */
export function decodeErrorCode(fn: () => unknown): DecodeErrorCode {
  try {
    fn();
  } catch (error) {
    if (error instanceof DecodeError) return error.code;
    throw error;
  }
  throw new Error("expected a DecodeError");
}

export function bytes(...values: number[]): Uint8Array {
  return new Uint8Array(values);
}
