/**
 * Fixed-width integer ⇄ base32 over the sorted alphabet.
 *
 * Digits are most-significant first and left-padded with "2" (zero), so
 * string order matches numeric order for equal widths.
 */

export const B32_ALPHABET = "234567abcdefghijklmnopqrstuvwxyz";

const DIGIT_VALUES = new Map<string, bigint>(
  Array.from(B32_ALPHABET, (ch, i): [string, bigint] => [ch, BigInt(i)]),
);

/** Low `width * 5` bits of `n`, as exactly `width` characters. */
export function b32EncodeInt(n: bigint, width: number): string {
  const digits: string[] = new Array<string>(width);
  let rest = n;
  for (let i = width - 1; i >= 0; i--) {
    digits[i] = B32_ALPHABET.charAt(Number(rest & 31n));
    rest >>= 5n;
  }
  return digits.join("");
}

/** Inverse of b32EncodeInt. Throws on characters outside the alphabet. */
export function b32DecodeInt(text: string): bigint {
  let n = 0n;
  for (const ch of text) {
    const digit = DIGIT_VALUES.get(ch);
    if (digit === undefined) throw new Error(`invalid base32 character ${JSON.stringify(ch)}`);
    n = (n << 5n) | digit;
  }
  return n;
}
