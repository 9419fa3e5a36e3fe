import type { Uint8, UintSize } from "semantic-types";

/**
 * Byte-addressable buffer with a movable read/write position.
 *
 * This is the only capability a `BitCursor` needs from its storage, so any
 * implementation (in-memory, file-backed, ...) can be used. The bit cursor
 * borrows the buffer: it must stay alive as long as the cursor is used.
 */
export interface ByteCursor {
  /**
   * Current byte offset.
   */
  readonly bytePos: UintSize;

  /**
   * Returns the byte at `bytePos` and advances `bytePos` by one.
   * Fails if `bytePos` is at or past the end of the buffer.
   */
  readUint8(): Uint8;

  /**
   * Stores `value` at the absolute position `pos`, without moving `bytePos`.
   */
  writeUint8At(pos: UintSize, value: Uint8): void;

  /**
   * Moves `bytePos` back by exactly one byte.
   */
  rewindByte(): void;
}
