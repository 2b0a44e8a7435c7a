/**
 * dagkit inspect <cid>
 *
 * Parse a CID and print its fields.
 */

import { cidDigestHex, parseCid, type Cid } from "@dagkit/codec";
import { codecName } from "../lib/config.js";

const hex = (n: number) => `0x${n.toString(16).padStart(2, "0")}`;

export function describeCid(cid: Cid): string[] {
  return [
    `CID ${cid.toString()}`,
    `  version: ${cid.version}`,
    `  codec:   ${codecName(cid.codec)} (${hex(cid.codec)})`,
    `  hash:    sha2-256 (${hex(cid.hashType)})`,
    `  digest:  ${cid.isEmpty ? "(empty)" : cidDigestHex(cid)}`,
  ];
}

export function inspectCommand(text: string): string {
  return describeCid(parseCid(text.trim())).join("\n");
}
