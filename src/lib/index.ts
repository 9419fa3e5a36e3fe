export { BitCursor } from "./bit-cursor.js";
export { extractBit, extractBitAsBool, extractBits, insertBit } from "./bits.js";
export { ByteBuffer } from "./byte-buffer.js";
export type { ByteCursor } from "./byte-cursor.js";
export { toHex } from "./hex.js";
export { parseLayout, readLayout } from "./layout.js";
export { createIncompleteStreamError, type IncompleteStreamError } from "./errors/incomplete-stream.js";
export { createInvalidBitRangeError, type InvalidBitRangeError } from "./errors/invalid-bit-range.js";
export { createInvalidLayoutError, type InvalidLayoutError } from "./errors/invalid-layout.js";
export { createOutOfBoundsError, type OutOfBoundsError } from "./errors/out-of-bounds.js";
