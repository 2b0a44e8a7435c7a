/**
 * dagkit decode <hex|file> [--file]
 *
 * Canonical DAG-CBOR → JSON. Non-canonical input is rejected with the
 * byte offset and path of the problem. Integers beyond ±(2^53 - 1) print
 * as decimal strings.
 */

import { decode, stringifyJson } from "@dagkit/codec";
import type { CliConfig } from "../lib/config.js";
import { parseHexInput, readInputFile } from "../lib/input.js";

interface DecodeOptions {
  /** Treat the argument as a path to a binary file. */
  file?: boolean;
}

export async function decodeCommand(
  input: string,
  config: CliConfig,
  opts: DecodeOptions = {},
): Promise<string> {
  const bytes = opts.file
    ? await readInputFile(input, config.maxInputBytes)
    : parseHexInput(input, config.maxInputBytes);
  return stringifyJson(decode(bytes), 2, { unsafeIntegers: "string" });
}
