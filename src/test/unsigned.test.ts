import { describe, it, expect } from "vitest";
import {
  decodeUnsigned,
  decodeUnsignedNumber,
  encodeUnsigned,
} from "../codec/unsigned.js";
import { U64_MAX } from "../types/int.js";
import { bytes, decodeErrorCode } from "./helpers.js";

describe("encodeUnsigned", () => {
  it("encodes the category boundaries", () => {
    expect(encodeUnsigned(0)).toEqual(bytes(0x80));
    expect(encodeUnsigned(63)).toEqual(bytes(0xbf));
    expect(encodeUnsigned(64)).toEqual(bytes(0xc0, 0x00));
    expect(encodeUnsigned(8255)).toEqual(bytes(0xdf, 0xff));
    expect(encodeUnsigned(8256)).toEqual(bytes(0xe1, 0x00));
  });

  it("encodes interior values", () => {
    expect(encodeUnsigned(300)).toEqual(bytes(0xc0, 0xec));
    expect(encodeUnsigned(4160)).toEqual(bytes(0xd0, 0x00));
    expect(encodeUnsigned(8257)).toEqual(bytes(0xe1, 0x01));
    expect(encodeUnsigned(8511)).toEqual(bytes(0xe1, 0xff));
    expect(encodeUnsigned(8512)).toEqual(bytes(0xe2, 0x01, 0x00));
  });

  it("encodes the largest value in nine bytes", () => {
    expect(encodeUnsigned(U64_MAX)).toEqual(
      bytes(0xe8, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xdf, 0xbf)
    );
  });

  it("accepts numbers and bigints alike", () => {
    expect(encodeUnsigned(1234)).toEqual(encodeUnsigned(1234n));
  });

  it("rejects values outside the u64 range", () => {
    expect(() => encodeUnsigned(-1)).toThrow(RangeError);
    expect(() => encodeUnsigned(U64_MAX + 1n)).toThrow(RangeError);
    expect(() => encodeUnsigned(1.5)).toThrow(RangeError);
    expect(() => encodeUnsigned(Number.NaN)).toThrow(RangeError);
  });

  it("returns a fresh buffer on every call", () => {
    const a = encodeUnsigned(7);
    const b = encodeUnsigned(7);
    expect(a).not.toBe(b);
    a[0] = 0;
    expect(encodeUnsigned(7)).toEqual(bytes(0x87));
  });
});

describe("decodeUnsigned", () => {
  it("decodes each category", () => {
    expect(decodeUnsigned(bytes(0x80))).toBe(0n);
    expect(decodeUnsigned(bytes(0xbf))).toBe(63n);
    expect(decodeUnsigned(bytes(0xc0, 0x00))).toBe(64n);
    expect(decodeUnsigned(bytes(0xd0, 0x00))).toBe(4160n);
    expect(decodeUnsigned(bytes(0xdf, 0xff))).toBe(8255n);
    expect(decodeUnsigned(bytes(0xe1, 0x00))).toBe(8256n);
    expect(decodeUnsigned(bytes(0xe2, 0x01, 0x00))).toBe(8512n);
    expect(
      decodeUnsigned(bytes(0xe8, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xdf, 0xbf))
    ).toBe(U64_MAX);
  });

  it("ignores bytes after the encoded value", () => {
    expect(decodeUnsigned(bytes(0x80, 0xff))).toBe(0n);
    expect(decodeUnsigned(bytes(0xc0, 0x00, 0x12))).toBe(64n);
    expect(decodeUnsigned(bytes(0xe1, 0x01, 0x80, 0x80))).toBe(8257n);
  });

  it("rejects reserved headers", () => {
    for (const header of [0x00, 0x01, 0x0f, 0xf0, 0xf8, 0xff]) {
      expect(decodeErrorCode(() => decodeUnsigned(bytes(header)))).toBe("INVALID_MARKER");
    }
  });

  it("rejects negative-category headers", () => {
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0x7f)))).toBe("INVALID_MARKER");
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0x3f, 0xff)))).toBe("INVALID_MARKER");
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0x16, 0xdf, 0xbf)))).toBe("INVALID_MARKER");
  });

  it("rejects length nibbles outside 1..8", () => {
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0xe0, 0x00)))).toBe("INVALID_MARKER");
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0xe9, 0, 0, 0, 0, 0, 0, 0, 0, 0)))).toBe(
      "INVALID_MARKER"
    );
  });

  it("rejects truncated input", () => {
    expect(decodeErrorCode(() => decodeUnsigned(bytes()))).toBe("TRUNCATED");
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0xc0)))).toBe("TRUNCATED");
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0xe1)))).toBe("TRUNCATED");
    expect(decodeErrorCode(() => decodeUnsigned(bytes(0xe3, 0x01, 0x02)))).toBe("TRUNCATED");
  });

  it("rejects payloads past the u64 range", () => {
    expect(
      decodeErrorCode(() =>
        decodeUnsigned(bytes(0xe8, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xdf, 0xc0))
      )
    ).toBe("OVERFLOW");
    expect(
      decodeErrorCode(() =>
        decodeUnsigned(bytes(0xe8, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff, 0xff))
      )
    ).toBe("OVERFLOW");
  });
});

describe("decodeUnsignedNumber", () => {
  it("returns safe integers as numbers", () => {
    expect(decodeUnsignedNumber(bytes(0x80))).toBe(0);
    expect(decodeUnsignedNumber(bytes(0xe1, 0x00))).toBe(8256);
    expect(decodeUnsignedNumber(encodeUnsigned(Number.MAX_SAFE_INTEGER))).toBe(
      Number.MAX_SAFE_INTEGER
    );
  });

  it("rejects values above Number.MAX_SAFE_INTEGER", () => {
    expect(() => decodeUnsignedNumber(encodeUnsigned(U64_MAX))).toThrow(RangeError);
  });
});
