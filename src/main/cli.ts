import fs from "fs";
import { Incident } from "incident";
import minimist from "minimist";
import sysPath from "path";
import type { Uint8, UintSize } from "semantic-types";
import { BitCursor } from "../lib/bit-cursor.js";
import { ByteBuffer } from "../lib/byte-buffer.js";
import { parseLayout, readLayout } from "../lib/layout.js";

const DUMP_BYTES: UintSize = 64;

interface Options {
  hex?: string;
  layout?: string;
  offset: string;
}

export interface CliResult {
  offset: UintSize;
  layout: UintSize[];
  fields: Uint8[];
}

function parseOffset(text: string): UintSize {
  if (!/^\d+$/.test(text)) {
    throw new Incident("InvalidOffset", {text}, `Invalid byte offset ${JSON.stringify(text)}`);
  }
  return parseInt(text, 10);
}

function readInput(options: Options & minimist.ParsedArgs): Uint8Array {
  if (options.hex !== undefined) {
    const hexString: string = options.hex.toLowerCase().replace(/[^0-9a-f]/g, "");
    if (hexString.length % 2 !== 0) {
      throw new Incident("InvalidHexString", "Hex format [0-9a-f] count is not a multiple of 2");
    }
    return Buffer.from(hexString, "hex");
  }
  const filePath: string | undefined = options._[0];
  if (filePath === undefined) {
    throw new Incident("MissingInput", "Missing input path (or --hex)");
  }
  return fs.readFileSync(sysPath.resolve(filePath));
}

/**
 * Reads the fields described by `--layout` from a file or `--hex` input.
 *
 * The hex dump of the input is passed to `log` before the fields are read.
 */
export function run(argv: string[], log: (line: string) => void = console.error): CliResult {
  const options: Options & minimist.ParsedArgs = minimist<Options>(argv, {
    string: ["hex", "layout", "offset"],
    default: {offset: "0"},
  });
  if (options.layout === undefined) {
    throw new Incident("MissingLayout", "Missing field layout (--layout 1,3,4)");
  }
  const layout: UintSize[] = parseLayout(options.layout);
  const offset: UintSize = parseOffset(options.offset);
  const buffer: ByteBuffer = new ByteBuffer(readInput(options), offset);
  log(buffer.toHex(DUMP_BYTES));
  const fields: Uint8[] = readLayout(new BitCursor(buffer), layout);
  return {offset, layout, fields};
}
