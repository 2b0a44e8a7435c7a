/**
 * dagkit cid <file> [--codec raw|dag-cbor]
 *
 * SHA-256 the file's bytes → print the CIDv1 text form.
 */

import { createCid } from "@dagkit/codec";
import { parseCodecName, type CliConfig } from "../lib/config.js";
import { readInputFile } from "../lib/input.js";

interface CidOptions {
  codec?: string;
}

export async function cidCommand(
  path: string,
  config: CliConfig,
  opts: CidOptions = {},
): Promise<string> {
  const codec = opts.codec !== undefined ? parseCodecName(opts.codec) : config.defaultCodec;
  const bytes = await readInputFile(path, config.maxInputBytes);
  return createCid(codec, bytes).toString();
}
