/**
 * Unpadded lowercase base32 over the sorted alphabet used by CID text.
 *
 * The alphabet sorts in the same order as the bytes it encodes, so CID
 * strings compare the way their binary forms do.
 */

import { utils } from "@scure/base";

export const BASE32_SORTED_ALPHABET = "234567abcdefghijklmnopqrstuvwxyz";

const coder = utils.chain(
  utils.radix2(5),
  utils.alphabet(BASE32_SORTED_ALPHABET),
  utils.join(""),
);

export function base32Encode(bytes: Uint8Array): string {
  return coder.encode(bytes);
}

/**
 * Decode unpadded base32. Throws on characters outside the alphabet and on
 * non-zero trailing pad bits.
 */
export function base32Decode(text: string): Uint8Array {
  return coder.decode(text);
}
