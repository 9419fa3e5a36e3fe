import type { Uint8, UintSize } from "semantic-types";
import type { ByteCursor } from "./byte-cursor.js";
import { createIncompleteStreamError } from "./errors/incomplete-stream.js";
import { createOutOfBoundsError } from "./errors/out-of-bounds.js";
import { toHex } from "./hex.js";

/**
 * In-memory byte buffer, read and written at byte granularity.
 */
export class ByteBuffer implements ByteCursor {
  readonly bytes: Uint8Array;
  readonly byteEnd: UintSize;
  private pos: UintSize;

  constructor(bytes: Uint8Array, bytePos: UintSize = 0) {
    this.bytes = bytes;
    this.byteEnd = bytes.length;
    this.pos = 0;
    this.seek(bytePos);
  }

  get bytePos(): UintSize {
    return this.pos;
  }

  available(): UintSize {
    return this.byteEnd - this.pos;
  }

  seek(pos: UintSize): void {
    if (!Number.isInteger(pos) || pos < 0 || pos > this.byteEnd) {
      throw createOutOfBoundsError(pos, this.byteEnd);
    }
    this.pos = pos;
  }

  skip(size: UintSize): void {
    this.seek(this.pos + size);
  }

  readUint8(): Uint8 {
    if (this.pos >= this.byteEnd) {
      throw createIncompleteStreamError(1);
    }
    return this.bytes[this.pos++];
  }

  peekUint8(): Uint8 {
    if (this.pos >= this.byteEnd) {
      throw createIncompleteStreamError(1);
    }
    return this.bytes[this.pos];
  }

  writeUint8(value: Uint8): void {
    this.writeUint8At(this.pos, value);
    this.pos++;
  }

  writeUint8At(pos: UintSize, value: Uint8): void {
    if (!Number.isInteger(pos) || pos < 0 || pos >= this.byteEnd) {
      throw createOutOfBoundsError(pos, this.byteEnd);
    }
    this.bytes[pos] = value & 0xff;
  }

  rewindByte(): void {
    if (this.pos === 0) {
      throw createOutOfBoundsError(-1, this.byteEnd);
    }
    this.pos--;
  }

  toHex(maxBytes: number = Infinity): string {
    return toHex(this.bytes, maxBytes);
  }
}
