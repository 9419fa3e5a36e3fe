import type { Uint8, UintSize } from "semantic-types";
import { extractBitAsBool, extractBits, insertBit } from "./bits.js";
import type { ByteCursor } from "./byte-cursor.js";
import { createInvalidBitRangeError } from "./errors/invalid-bit-range.js";

/**
 * Reads and writes bits inside the current byte of a `ByteCursor`.
 *
 * A single call never spans two bytes: it must fit in the bits left in the
 * current byte or it fails with `InvalidBitRange`. The buffer position only
 * moves past a byte once its last bit has been consumed, so byte-level code
 * can keep using the same buffer between bit accesses.
 *
 * If the buffer position changed since the previous call (because some other
 * code read, wrote or seeked), the cursor starts over at the first bit of the
 * byte at the new position. Any partially consumed byte is silently dropped:
 * call `resync()` to make this explicit.
 */
export class BitCursor {
  private readonly buffer: ByteCursor;

  /**
   * Number of bits already consumed in the current byte, in `[0, 8]`.
   */
  private bitPos: UintSize;

  /**
   * Buffer position as seen at the end of the last call.
   */
  private bytePos: UintSize;

  constructor(buffer: ByteCursor) {
    this.buffer = buffer;
    this.bitPos = 0;
    this.bytePos = buffer.bytePos;
  }

  get bitOffset(): UintSize {
    return this.bitPos;
  }

  get rememberedBytePos(): UintSize {
    return this.bytePos;
  }

  /**
   * Restarts at the first bit of the byte at the current buffer position.
   */
  resync(): void {
    this.bitPos = 0;
    this.bytePos = this.buffer.bytePos;
  }

  /**
   * Skips the remaining bits of a partially consumed byte.
   */
  align(): void {
    this.reconcile();
    if (this.bitPos > 0 && this.bitPos < 8) {
      this.buffer.readUint8();
      this.bitPos = 8;
    }
  }

  /**
   * Reads `n` bits (1 to 8) and returns them right-justified.
   */
  readBits(n: UintSize): Uint8 {
    this.reconcile();
    this.checkRange(n);
    const byte: Uint8 = this.buffer.readUint8();
    const result: Uint8 = extractBits(byte, this.bitPos, n);
    this.bitPos += n;
    this.release();
    return result;
  }

  readBitAsBool(): boolean {
    this.reconcile();
    this.checkRange(1);
    const byte: Uint8 = this.buffer.readUint8();
    const result: boolean = extractBitAsBool(byte, this.bitPos);
    this.bitPos += 1;
    this.release();
    return result;
  }

  /**
   * Writes the `n` low-order bits of `value`, e.g. `writeBits(0b011, 3)`
   * writes `011` in the next three bit positions.
   */
  writeBits(value: number, n: UintSize): void {
    this.reconcile();
    this.checkRange(n);
    const pos: UintSize = this.buffer.bytePos;
    let byte: Uint8 = this.buffer.readUint8();
    for (let i: number = 0; i < n; i++) {
      byte = insertBit(byte, this.bitPos + i, ((value >>> (n - 1 - i)) & 1) === 1);
    }
    this.store(pos, byte, n);
  }

  writeBool(value: boolean): void {
    this.reconcile();
    this.checkRange(1);
    const pos: UintSize = this.buffer.bytePos;
    const byte: Uint8 = insertBit(this.buffer.readUint8(), this.bitPos, value);
    this.store(pos, byte, 1);
  }

  private reconcile(): void {
    if (this.buffer.bytePos !== this.bytePos) {
      this.resync();
    }
  }

  private checkRange(n: number): void {
    if (!Number.isInteger(n) || n < 1 || this.bitPos + n > 8) {
      throw createInvalidBitRangeError(this.bitPos, n);
    }
  }

  /**
   * Writes back the byte fetched from `pos`, then commits `n` bits.
   * If the buffer refuses the write, it is moved back to `pos` and the cursor is unchanged.
   */
  private store(pos: UintSize, byte: Uint8, n: UintSize): void {
    try {
      this.buffer.writeUint8At(pos, byte);
    } catch (err) {
      this.buffer.rewindByte();
      throw err;
    }
    this.bitPos += n;
    this.release();
  }

  /**
   * Moves the buffer back to the current byte unless all of its bits were consumed.
   */
  private release(): void {
    if (this.bitPos < 8) {
      this.buffer.rewindByte();
    }
  }
}
