/**
 * Golden test vectors — TIDs.
 * These vectors are FROZEN. If a test breaks, the code is wrong, not the vector.
 */

import { describe, it, expect } from "vitest";
import { createTid, isValidTid, parseTid, validateTid } from "../../src/tid.js";
import { b32DecodeInt, b32EncodeInt } from "../../src/b32.js";
import { TidError } from "../../src/errors.js";

function tidErrorCode(fn: () => unknown): string {
  try {
    fn();
  } catch (err) {
    if (err instanceof TidError) return err.code;
    throw err;
  }
  throw new Error("expected a TidError");
}

describe("createTid", () => {
  const vectors: [number, number, string][] = [
    [0, 0, "2222222222222"],
    [1234567890, 0, "222236tg2qm22"],
    [1234567890, 5, "222236tg2qm27"],
    [1_700_000_000_000_000, 7, "3ke6kg3wk222b"],
    [1_700_000_000_000_001, 7, "3ke6kg3wk232b"],
    [1_700_000_000_000_000, 1023, "3ke6kg3wk22zz"],
    [Number.MAX_SAFE_INTEGER, 1023, "bzzzzzzzzzzzz"],
  ];

  for (const [timestamp, clockId, expected] of vectors) {
    it(`(${timestamp}, ${clockId}) → ${expected}`, () => {
      expect(createTid(timestamp, clockId)).toBe(expected);
    });
  }

  it("keeps only the low 10 bits of the clock id", () => {
    expect(createTid(1234567890, 1024 + 5)).toBe("222236tg2qm27");
  });

  it("sorts by timestamp", () => {
    const tids = [5, 1_000, 1_000_000, 1_700_000_000_000_000].map((t) => createTid(t, 0));
    expect([...tids].sort()).toEqual(tids);
  });

  it("rejects negative and fractional timestamps", () => {
    expect(tidErrorCode(() => createTid(-1, 0))).toBe("ERR_TID_TIMESTAMP");
    expect(tidErrorCode(() => createTid(1.5, 0))).toBe("ERR_TID_TIMESTAMP");
    expect(tidErrorCode(() => createTid(1, 0.5))).toBe("ERR_TID_CLOCK_ID");
  });
});

describe("parseTid", () => {
  it("splits timestamp and clock id", () => {
    expect(parseTid("222236tg2qm27")).toEqual({ timestamp: 1234567890, clockId: 5 });
    expect(parseTid("3ke6kg3wk22zz")).toEqual({ timestamp: 1_700_000_000_000_000, clockId: 1023 });
    expect(parseTid("bzzzzzzzzzzzz")).toEqual({
      timestamp: Number.MAX_SAFE_INTEGER,
      clockId: 1023,
    });
  });

  it("inverts createTid", () => {
    const tid = createTid(1_699_999_999_123_456, 42);
    expect(parseTid(tid)).toEqual({ timestamp: 1_699_999_999_123_456, clockId: 42 });
  });

  it("rejects well-formed TIDs whose timestamp exceeds 2^53 - 1", () => {
    expect(isValidTid("c222222222222")).toBe(true);
    expect(() => parseTid("c222222222222")).toThrow(
      "TID timestamp 9007199254740992 exceeds the safe integer range",
    );
    expect(isValidTid("jzzzzzzzzzzzz")).toBe(true);
    expect(tidErrorCode(() => parseTid("jzzzzzzzzzzzz"))).toBe("ERR_TID_TIMESTAMP");
  });
});

describe("validateTid", () => {
  it("accepts well-formed TIDs", () => {
    expect(() => validateTid("3ke6kg3wk222b")).not.toThrow();
    expect(isValidTid("3ke6kg3wk222b")).toBe(true);
  });

  it("rejects the wrong length", () => {
    expect(tidErrorCode(() => validateTid("3ke6kg3wk222"))).toBe("ERR_TID_LENGTH");
    expect(tidErrorCode(() => parseTid("3ke6kg3wk222bb"))).toBe("ERR_TID_LENGTH");
    expect(isValidTid("")).toBe(false);
  });

  it("rejects a first character with the top bit set", () => {
    expect(tidErrorCode(() => validateTid("k222222222222"))).toBe("ERR_TID_FORMAT");
    expect(isValidTid("j222222222222")).toBe(true);
  });

  it("rejects characters outside the alphabet", () => {
    expect(tidErrorCode(() => validateTid("3ke6kg3wk2220"))).toBe("ERR_TID_FORMAT");
    expect(isValidTid("3KE6KG3WK222B")).toBe(false);
  });
});

describe("b32 integers", () => {
  it("pads with the zero digit", () => {
    expect(b32EncodeInt(0n, 3)).toBe("222");
    expect(b32EncodeInt(31n, 3)).toBe("22z");
    expect(b32EncodeInt(32n, 3)).toBe("232");
  });

  it("decodes what it encodes", () => {
    expect(b32DecodeInt("232")).toBe(32n);
    expect(b32DecodeInt(b32EncodeInt(123_456_789n, 8))).toBe(123_456_789n);
  });

  it("rejects unknown characters", () => {
    expect(() => b32DecodeInt("21")).toThrow('invalid base32 character "1"');
  });
});
