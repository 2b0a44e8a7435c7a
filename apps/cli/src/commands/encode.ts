/**
 * dagkit encode <json-file> [-o file]
 *
 * JSON ({"$link"} / {"$bytes"} aware) → canonical DAG-CBOR → print hex + CID.
 * With -o the raw bytes are also written to a file.
 */

import { writeFile } from "node:fs/promises";
import { bytesToHex } from "@noble/hashes/utils";
import { encodeBlock, parseJson } from "@dagkit/codec";
import type { CliConfig } from "../lib/config.js";
import { readInputFile } from "../lib/input.js";

interface EncodeOptions {
  output?: string;
}

export async function encodeCommand(
  path: string,
  config: CliConfig,
  opts: EncodeOptions = {},
): Promise<string> {
  const text = new TextDecoder().decode(await readInputFile(path, config.maxInputBytes));
  const value = parseJson(text);
  if (value.kind !== "map") {
    throw new Error(`Top-level JSON value must be an object, got ${value.kind}`);
  }

  const block = encodeBlock(value);
  if (opts.output !== undefined) {
    await writeFile(opts.output, block.bytes);
    console.error(`[dagkit] wrote ${block.bytes.length} bytes to ${opts.output}`);
  }

  return [
    `cid:  ${block.cid.toString()}`,
    `size: ${block.bytes.length} bytes`,
    `hex:  ${bytesToHex(block.bytes)}`,
  ].join("\n");
}
