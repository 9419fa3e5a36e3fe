import type { Uint8, UintSize } from "semantic-types";

// Bit arithmetic on a single byte. Bits are indexed MSB-first: index 0 is the
// highest-order bit of the byte and index 7 the lowest-order one.

export function extractBit(byte: Uint8, index: UintSize): Uint8 {
  return (byte >>> (7 - index)) & 1;
}

/**
 * Returns `count` consecutive bits starting at `startIndex`, right-justified.
 *
 * The first extracted bit becomes the highest-order bit of the result.
 * The caller ensures `startIndex + count <= 8`.
 */
export function extractBits(byte: Uint8, startIndex: UintSize, count: UintSize): Uint8 {
  const mask: number = (1 << count) - 1;
  return (byte >>> (8 - startIndex - count)) & mask;
}

export function extractBitAsBool(byte: Uint8, index: UintSize): boolean {
  return extractBit(byte, index) === 1;
}

export function insertBit(byte: Uint8, index: UintSize, value: boolean): Uint8 {
  const mask: number = 1 << (7 - index);
  return value ? (byte | mask) & 0xff : byte & ~mask & 0xff;
}
