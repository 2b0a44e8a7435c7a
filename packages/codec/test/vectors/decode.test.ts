/**
 * Golden test vectors — canonical decoding and rejection of non-canonical input.
 * These vectors are FROZEN. If a test breaks, the code is wrong, not the vector.
 */

import { describe, it, expect } from "vitest";
import { bytesToHex, hexToBytes } from "@noble/hashes/utils";
import { decode, decodeFirst } from "../../src/decode.js";
import { cidDigestHex } from "../../src/cid.js";
import { CidError, DecodeError } from "../../src/errors.js";
import type { Value } from "../../src/value.js";

const ABC_CID_BYTES = "01711220ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad";

function decodeError(hex: string): DecodeError {
  try {
    decode(hexToBytes(hex));
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error(`expected ${hex} to be rejected`);
}

function field(value: Value, key: string): Value | undefined {
  return value.kind === "map" ? value.entries.get(key) : undefined;
}

// ── Well-formed input ──────────────────────────────────────────────

describe("decode", () => {
  it("map with one int", () => {
    const value = decode(hexToBytes("a1616101"));
    expect(field(value, "a")).toEqual({ kind: "int", value: 1n });
  });

  it("integers at every width", () => {
    expect(decode(hexToBytes("17"))).toEqual({ kind: "int", value: 23n });
    expect(decode(hexToBytes("1818"))).toEqual({ kind: "int", value: 24n });
    expect(decode(hexToBytes("190100"))).toEqual({ kind: "int", value: 256n });
    expect(decode(hexToBytes("1a00010000"))).toEqual({ kind: "int", value: 65536n });
    expect(decode(hexToBytes("1b0000000100000000"))).toEqual({
      kind: "int",
      value: 0x1_0000_0000n,
    });
    expect(decode(hexToBytes("3bffffffffffffffff"))).toEqual({
      kind: "int",
      value: -0x1_0000_0000_0000_0000n,
    });
  });

  it("scalars", () => {
    expect(decode(hexToBytes("f6"))).toEqual({ kind: "null" });
    expect(decode(hexToBytes("f5"))).toEqual({ kind: "bool", value: true });
    expect(decode(hexToBytes("fb3ff8000000000000"))).toEqual({ kind: "float", value: 1.5 });
    expect(decode(hexToBytes("62c3a9"))).toEqual({ kind: "text", value: "é" });
  });

  it("byte strings are copied out of the input", () => {
    const input = hexToBytes("43010203");
    const value = decode(input);
    input[1] = 0xff;
    expect(value.kind === "bytes" && bytesToHex(value.value)).toBe("010203");
  });

  it("keys come back in canonical order", () => {
    const value = decode(hexToBytes("a3" + "616102" + "616303" + "62626201"));
    expect(value.kind === "map" && Array.from(value.entries.keys())).toEqual(["a", "c", "bb"]);
  });

  it("links", () => {
    const value = decode(hexToBytes(`a1646c696e6bd82a582500${ABC_CID_BYTES}`));
    const link = field(value, "link");
    expect(link?.kind).toBe("link");
    if (link?.kind === "link") {
      expect(cidDigestHex(link.cid)).toBe(ABC_CID_BYTES.slice(8));
    }
  });

  it("deep nesting does not use the call stack", () => {
    const depth = 100_000;
    const bytes = new Uint8Array(depth + 1).fill(0x81);
    bytes[depth] = 0x80;

    let value = decode(bytes);
    let seen = 0;
    while (value.kind === "array" && value.items.length === 1) {
      const [inner] = value.items;
      if (inner === undefined) break;
      value = inner;
      seen++;
    }
    expect(seen).toBe(depth);
    expect(value).toEqual({ kind: "array", items: [] });
  });

  it("decodeFirst returns the unread remainder", () => {
    const { value, remainder } = decodeFirst(hexToBytes("a0" + "0102"));
    expect(value.kind).toBe("map");
    expect(bytesToHex(remainder)).toBe("0102");
  });
});

// ── Minimal encoding ───────────────────────────────────────────────

describe("rejects non-minimal arguments", () => {
  it("10 encoded with a 2-byte argument", () => {
    const err = decodeError("a1" + "6161" + "19000a");
    expect(err.code).toBe("ERR_NON_MINIMAL");
    expect(err.kind).toBe("malformed");
    expect(err.offset).toBe(3);
    expect(err.path).toBe("$.a");
  });

  it("every width at its lower boundary", () => {
    expect(decodeError("1817").code).toBe("ERR_NON_MINIMAL");
    expect(decodeError("1900ff").code).toBe("ERR_NON_MINIMAL");
    expect(decodeError("1a0000ffff").code).toBe("ERR_NON_MINIMAL");
    expect(decodeError("1b00000000ffffffff").code).toBe("ERR_NON_MINIMAL");
  });

  it("lengths and counts too", () => {
    expect(decodeError("780161").code).toBe("ERR_NON_MINIMAL");
    expect(decodeError("980101").code).toBe("ERR_NON_MINIMAL");
  });
});

// ── Map keys ───────────────────────────────────────────────────────

describe("rejects out-of-order map keys", () => {
  it("longer key before shorter", () => {
    const err = decodeError("a2" + "626262" + "01" + "6161" + "02");
    expect(err.code).toBe("ERR_KEY_ORDER");
    expect(err.kind).toBe("order");
    expect(err.offset).toBe(5);
    expect(err.message).toBe(
      'map key order violation: key "a" is shorter than previous key "bb" (at byte 5, $<key #1>)',
    );
  });

  it("same length, bytes out of order", () => {
    const err = decodeError("a2" + "6162" + "01" + "6161" + "02");
    expect(err.code).toBe("ERR_KEY_ORDER");
    expect(err.message).toContain('sorts before previous key "b" of the same length');
  });

  it("duplicate keys", () => {
    expect(decodeError("a2" + "6161" + "01" + "6161" + "02").code).toBe("ERR_DUPLICATE_KEY");
  });

  it("non-text keys", () => {
    expect(decodeError("a1" + "01" + "02").code).toBe("ERR_MAP_KEY_TYPE");
    expect(decodeError("a1" + "816161" + "02").code).toBe("ERR_MAP_KEY_TYPE");
  });
});

// ── Floats and simple values ───────────────────────────────────────

describe("floats and simple values", () => {
  it("rejects NaN", () => {
    const err = decodeError("a1" + "6166" + "fb7ff8000000000000");
    expect(err.code).toBe("ERR_FLOAT_RANGE");
    expect(err.path).toBe("$.f");
    expect(err.message).toBe("decoded float NaN is not allowed (at byte 3, $.f)");
  });

  it("rejects infinities", () => {
    const pos = decodeError("fb7ff0000000000000");
    expect(pos.code).toBe("ERR_FLOAT_RANGE");
    expect(pos.message).toBe("decoded float Infinity is not allowed (at byte 0, $)");
    expect(decodeError("fbfff0000000000000").message).toBe(
      "decoded float -Infinity is not allowed (at byte 0, $)",
    );
  });

  it("rejects half and single precision", () => {
    expect(decodeError("f93c00").code).toBe("ERR_FLOAT_WIDTH");
    expect(decodeError("fa3fc00000").code).toBe("ERR_FLOAT_WIDTH");
  });

  it("rejects undefined and other simple values", () => {
    expect(decodeError("f7").code).toBe("ERR_SIMPLE_VALUE");
    expect(decodeError("f820").code).toBe("ERR_SIMPLE_VALUE");
  });
});

// ── Structure ──────────────────────────────────────────────────────

describe("structural errors", () => {
  it("indefinite lengths and stray breaks", () => {
    expect(decodeError("9f01ff").code).toBe("ERR_INDEFINITE_LENGTH");
    expect(decodeError("ff").code).toBe("ERR_INDEFINITE_LENGTH");
  });

  it("reserved argument selectors", () => {
    expect(decodeError("1c").code).toBe("ERR_MALFORMED");
  });

  it("tags other than 42", () => {
    expect(decodeError("c100").code).toBe("ERR_UNSUPPORTED_TAG");
  });

  it("invalid UTF-8", () => {
    expect(decodeError("61ff").code).toBe("ERR_UTF8");
    expect(decodeError("62c328").code).toBe("ERR_UTF8");
  });

  it("trailing bytes", () => {
    const err = decodeError("a0" + "00");
    expect(err.code).toBe("ERR_TRAILING_DATA");
    expect(err.kind).toBe("trailing");
    expect(err.offset).toBe(1);
    expect(bytesToHex(err.remainder)).toBe("00");
  });
});

// ── Truncation ─────────────────────────────────────────────────────

describe("truncated input", () => {
  it("empty input", () => {
    const err = decodeError("");
    expect(err.code).toBe("ERR_UNEXPECTED_END");
    expect(err.offset).toBe(0);
  });

  it("map value missing", () => {
    const err = decodeError("a1" + "6161");
    expect(err.code).toBe("ERR_UNEXPECTED_END");
    expect(err.kind).toBe("bounds");
    expect(err.offset).toBe(3);
    expect(err.path).toBe("$.a");
  });

  it("string shorter than its length", () => {
    const err = decodeError("63" + "6162");
    expect(err.code).toBe("ERR_UNEXPECTED_END");
    expect(err.message).toBe("unexpected end of input: need 3 bytes, have 2 (at byte 1, $)");
  });

  it("integer argument cut short", () => {
    expect(decodeError("1a0001").code).toBe("ERR_UNEXPECTED_END");
  });

  it("huge declared count", () => {
    expect(decodeError("9affffffff").code).toBe("ERR_UNEXPECTED_END");
    expect(decodeError("bb00000001000000000000").code).toBe("ERR_UNEXPECTED_END");
  });

  it("every strict prefix of a valid encoding fails with a bounds error", () => {
    const full = hexToBytes(`a2616101646c696e6bd82a582500${ABC_CID_BYTES}`);
    expect(decode(full).kind).toBe("map");
    for (let n = 0; n < full.length; n++) {
      let code: string | undefined;
      try {
        decode(full.subarray(0, n));
      } catch (err) {
        if (err instanceof DecodeError) code = err.code;
      }
      expect(code, `prefix of ${n} bytes`).toBe("ERR_UNEXPECTED_END");
    }
  });
});

// ── Links ──────────────────────────────────────────────────────────

describe("link validation", () => {
  it("rejects a corrupted 0x00 prefix", () => {
    const err = decodeError(`d82a582501${ABC_CID_BYTES}`);
    expect(err.code).toBe("ERR_LINK");
    expect(err.message).toBe(
      "invalid CID encoding: expected 0x00 prefix, got 0x01 (at byte 0, $)",
    );
  });

  it("rejects non-bytes content", () => {
    expect(decodeError("d82a" + "6161").code).toBe("ERR_LINK");
  });

  it("rejects an empty byte string", () => {
    expect(decodeError("d82a" + "40").code).toBe("ERR_LINK");
  });

  it("rejects an invalid CID behind a valid prefix", () => {
    const err = decodeError("d82a" + "45" + "0002711200");
    expect(err.code).toBe("ERR_LINK");
    expect(err.cause).toBeInstanceOf(CidError);
  });

  it("rejects a wrong length", () => {
    expect(decodeError("d82a" + "46" + "000171120000").code).toBe("ERR_LINK");
  });
});
