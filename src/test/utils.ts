import chai from "chai";
import fs from "fs";
import { Incident } from "incident";
import sysPath from "path";
import { ByteBuffer } from "../lib/byte-buffer.js";
import meta from "./meta.js";

export const testResourcesRoot: string = sysPath.join(meta.dirname, "resources");

export interface BufferJson {
  buffer: string;
  bytePos?: number;
}

export function readTestResource(path: string): Buffer {
  return fs.readFileSync(sysPath.resolve(testResourcesRoot, path));
}

export function readTestJson<T>(path: string): T {
  return JSON.parse(readTestResource(path).toString("utf8"));
}

/**
 * Reads `0b…` (binary) or `0x…` (hex) buffer strings, ignoring separators.
 */
export function readBufferString(buffer: string): Uint8Array {
  if (buffer === "") {
    return new Uint8Array(0);
  } else if (buffer.startsWith("0b")) {
    const binaryString: string = buffer.slice(2).replace(/[^01]/g, "");
    if (binaryString.length % 8 !== 0) {
      throw new Incident("InvalidBufferString", "Binary format [01] count is not a multiple of 8");
    }
    const len: number = binaryString.length / 8;
    const result: Uint8Array = new Uint8Array(len);
    for (let i: number = 0; i < len; i++) {
      result[i] = parseInt(binaryString.slice(8 * i, 8 * i + 8), 2);
    }
    return result;
  } else if (buffer.startsWith("0x")) {
    const hexString: string = buffer.slice(2).replace(/[^0-9a-f]/g, "");
    if (hexString.length % 2 !== 0) {
      throw new Incident("InvalidBufferString", "Hex format [0-9a-f] count is not a multiple of 2");
    }
    return new Uint8Array(Buffer.from(hexString, "hex"));
  } else {
    throw new Incident("InvalidBufferString", "Unknown buffer string format");
  }
}

export function readBufferJson(input: BufferJson): ByteBuffer {
  return new ByteBuffer(readBufferString(input.buffer), input.bytePos);
}

/**
 * Runs `fn` and returns the `Incident` it throws, checking its name.
 */
export function assertThrowsIncident(fn: () => unknown, name: string): Incident<object> {
  try {
    fn();
  } catch (err) {
    if (err instanceof Incident) {
      chai.assert.strictEqual(err.name, name);
      return err;
    }
    throw err;
  }
  return chai.assert.fail(`Expected an error named ${name}`);
}
