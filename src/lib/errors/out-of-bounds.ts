import { Incident } from "incident";
import type { UintSize } from "semantic-types";

export type Name = "OutOfBounds";
export const name: Name = "OutOfBounds";

export interface Data {
  pos: number;
  byteEnd: UintSize;
}

export type Cause = undefined;
export type OutOfBoundsError = Incident<Data, Name, Cause>;

export function format({pos, byteEnd}: Data): string {
  return `Byte position ${pos} is outside of the buffer (length: ${byteEnd})`;
}

export function createOutOfBoundsError(pos: number, byteEnd: UintSize): OutOfBoundsError {
  return new Incident(name, {pos, byteEnd}, format);
}
