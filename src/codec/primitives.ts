/**
 * Low-level byte primitives shared by the unsigned and signed codecs.
 */

/**
 * Reasons a buffer can fail to decode.
 *
 * - `INVALID_MARKER`: the header byte names no category the decoder accepts
 * - `TRUNCATED`: the buffer ends before the payload the header announces
 * - `OVERFLOW`: the payload describes a value outside the 64-bit range
 */
export type DecodeErrorCode = "INVALID_MARKER" | "TRUNCATED" | "OVERFLOW";

/**
 * Error thrown when decoding malformed input.
 */
export class DecodeError extends Error {
  readonly code: DecodeErrorCode;

  constructor(code: DecodeErrorCode, message: string) {
    super(message);
    this.name = "DecodeError";
    this.code = code;
  }
}

/**
 * Reinterprets the low 64 bits of `value` as a two's-complement signed integer.
 */
export function reinterpretSigned(value: bigint): bigint {
  return BigInt.asIntN(64, value);
}

/**
 * Reinterprets the low 64 bits of `value` as an unsigned integer.
 */
export function reinterpretUnsigned(value: bigint): bigint {
  return BigInt.asUintN(64, value);
}

/**
 * Extracts bits `[end, start)` of the 64-bit pattern of `value` as a number.
 * Only used for fields narrower than 32 bits.
 */
export function getBits(value: bigint, start: number, end: number): number {
  const mask = (1n << BigInt(start)) - 1n;
  return Number((reinterpretUnsigned(value) & mask) >> BigInt(end));
}

/**
 * Fixed-capacity byte writer. The buffer is allocated once and handed to the
 * caller by `finish()`.
 */
export class Writer {
  private readonly buf: Uint8Array;
  private pos = 0;

  constructor(capacity: number) {
    this.buf = new Uint8Array(capacity);
  }

  writeByte(byte: number): void {
    if (this.pos >= this.buf.length) {
      throw new Error(`writer capacity ${this.buf.length} exceeded`);
    }
    this.buf[this.pos++] = byte & 0xff;
  }

  /**
   * Writes the low `length` bytes of the 64-bit pattern of `value`, big-endian.
   */
  writeUintBE(value: bigint, length: number): void {
    const bits = reinterpretUnsigned(value);
    for (let shift = (length - 1) * 8; shift >= 0; shift -= 8) {
      this.writeByte(Number((bits >> BigInt(shift)) & 0xffn));
    }
  }

  finish(): Uint8Array {
    if (this.pos !== this.buf.length) {
      throw new Error(`writer finished after ${this.pos} of ${this.buf.length} bytes`);
    }
    return this.buf;
  }
}

/**
 * Bounds-checked byte reader. Running past the end raises `TRUNCATED`.
 */
export class Reader {
  private readonly data: Uint8Array;
  private pos = 0;

  constructor(data: Uint8Array) {
    this.data = data;
  }

  remaining(): number {
    return this.data.length - this.pos;
  }

  readByte(): number {
    if (this.pos >= this.data.length) {
      throw new DecodeError(
        "TRUNCATED",
        `unexpected end of input at offset ${this.pos}`
      );
    }
    return this.data[this.pos++];
  }

  /**
   * Reads `length` bytes as a big-endian unsigned integer.
   */
  readUintBE(length: number): bigint {
    if (this.remaining() < length) {
      throw new DecodeError(
        "TRUNCATED",
        `expected ${length} payload bytes at offset ${this.pos}, found ${this.remaining()}`
      );
    }
    let value = 0n;
    for (let i = 0; i < length; i++) {
      value = (value << 8n) | BigInt(this.data[this.pos++]);
    }
    return value;
  }
}
