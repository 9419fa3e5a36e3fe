import type { Uint8, UintSize } from "semantic-types";
import type { BitCursor } from "./bit-cursor.js";
import { createInvalidLayoutError } from "./errors/invalid-layout.js";

/**
 * Parses a comma-separated list of field widths, e.g. `"1,3,4"`.
 */
export function parseLayout(text: string): UintSize[] {
  const widths: UintSize[] = [];
  for (const entry of text.split(",")) {
    const trimmed: string = entry.trim();
    if (!/^[1-8]$/.test(trimmed)) {
      throw createInvalidLayoutError(text);
    }
    widths.push(parseInt(trimmed, 10));
  }
  return widths;
}

export function readLayout(cursor: BitCursor, widths: ReadonlyArray<UintSize>): Uint8[] {
  const fields: Uint8[] = [];
  for (const width of widths) {
    fields.push(cursor.readBits(width));
  }
  return fields;
}
