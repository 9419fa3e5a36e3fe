import type { Uint8, UintSize } from "semantic-types";

const HEX_DIGITS: string = "0123456789ABCDEF";
const GROUP_SIZE: UintSize = 4;
const ROW_SIZE: UintSize = 16;

/**
 * Renders bytes as uppercase hex for log output, e.g. `B20F0000 01`.
 *
 * Bytes are grouped by 4 (space-separated) and rows hold 16 bytes
 * (newline-separated).
 */
export function toHex(bytes: Uint8Array, maxBytes: number = Infinity): string {
  const len: UintSize = Math.max(0, Math.min(maxBytes, bytes.length));
  let result: string = "";
  for (let i: number = 0; i < len; i++) {
    if (i > 0) {
      if (i % ROW_SIZE === 0) {
        result += "\n";
      } else if (i % GROUP_SIZE === 0) {
        result += " ";
      }
    }
    const byte: Uint8 = bytes[i];
    result += HEX_DIGITS[byte >>> 4] + HEX_DIGITS[byte & 0x0f];
  }
  return result;
}
