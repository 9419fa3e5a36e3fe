import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "InvalidBitRange";
export const name: Name = "InvalidBitRange";

export interface Data {
  bitOffset: UintSize;
  count: number;
}

export type Cause = undefined;
export type InvalidBitRangeError = Incident<Data, Name, Cause>;

export function format({bitOffset, count}: Data): string {
  if (bitOffset >= 8) {
    return `Cannot access ${count} bits: the current byte is fully consumed, resync first`;
  }
  return `Cannot access ${count} bits at bit offset ${bitOffset}: the range must be 1 to ${8 - bitOffset} bits`;
}

export function createInvalidBitRangeError(bitOffset: UintSize, count: number): InvalidBitRangeError {
  return new Incident(name, {bitOffset, count}, format);
}
