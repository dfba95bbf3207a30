/**
 * Wire categories, ordered by the values they hold.
 *
 * ```
 * header      | payload | values
 * ------------+---------+----------------------------
 * 0000 xxxx   | -       | reserved
 * 0001 nnnn   | 8 - n   | [-2^63, -8257]
 * 001x xxxx   | 1       | [-8256, -65]
 * 01xx xxxx   | 0       | [-64, -1]
 * 10xx xxxx   | 0       | [0, 63]
 * 110x xxxx   | 1       | [64, 8255]
 * 1110 llll   | l       | [8256, 2^64 - 1]
 * 1111 xxxx   | -       | reserved
 * ```
 *
 * The two reserved header patterns are not a category; decoders reject them.
 */
export enum Category {
  NegativeMulti = 0,
  Negative2Byte = 1,
  Negative1Byte = 2,
  Positive1Byte = 3,
  Positive2Byte = 4,
  PositiveMulti = 5,
}

/**
 * Fixed high-order bits of each category's header byte.
 */
export const MARKERS: Readonly<Record<Category, number>> = {
  [Category.NegativeMulti]: 0x10,
  [Category.Negative2Byte]: 0x20,
  [Category.Negative1Byte]: 0x40,
  [Category.Positive1Byte]: 0x80,
  [Category.Positive2Byte]: 0xc0,
  [Category.PositiveMulti]: 0xe0,
};

export const NEG_1BYTE_MIN = -(1n << 6n);
export const NEG_2BYTE_MIN = -(1n << 13n) + NEG_1BYTE_MIN;
export const POS_1BYTE_MAX = (1n << 6n) - 1n;
export const POS_2BYTE_MAX = (1n << 13n) + POS_1BYTE_MAX;

/**
 * Longest encoding: one header byte and eight payload bytes.
 */
export const MAX_ENCODED_LENGTH = 9;
