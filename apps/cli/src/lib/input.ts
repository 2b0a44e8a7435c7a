/**
 * Bounded input reading for commands that take a file or hex argument.
 */

import { readFile, stat } from "node:fs/promises";
import { hexToBytes } from "@noble/hashes/utils";

export async function readInputFile(path: string, maxBytes: number): Promise<Uint8Array> {
  const info = await stat(path);
  if (!info.isFile()) throw new Error(`Not a file: ${path}`);
  if (info.size > maxBytes) {
    throw new Error(`${path} is ${info.size} bytes, over the ${maxBytes}-byte input limit`);
  }
  return new Uint8Array(await readFile(path));
}

/** Hex with optional whitespace and 0x prefix. */
export function parseHexInput(text: string, maxBytes: number): Uint8Array {
  const hex = text.replace(/\s+/g, "").replace(/^0x/i, "").toLowerCase();
  if (hex.length / 2 > maxBytes) {
    throw new Error(`hex input is ${hex.length / 2} bytes, over the ${maxBytes}-byte input limit`);
  }
  if (!/^([0-9a-f]{2})*$/.test(hex)) {
    throw new Error("Invalid hex input: expected an even number of hex digits");
  }
  return hexToBytes(hex);
}
