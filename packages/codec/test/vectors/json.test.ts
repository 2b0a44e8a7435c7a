/**
 * JSON form — {"$link"} and {"$bytes"} wrappers.
 */

import { describe, it, expect } from "vitest";
import { bytesToHex } from "@noble/hashes/utils";
import { fromJson, parseJson, stringifyJson, toJson } from "../../src/json.js";
import { encode } from "../../src/encode.js";
import { createCid } from "../../src/cid.js";
import { CODEC_DAG_CBOR } from "../../src/constants.js";
import { EncodeError } from "../../src/errors.js";
import { V, valueEquals } from "../../src/value.js";

const ABC_CID = "b27sl6c7uj2ffz5s3tzp64ke2vtiuwcl5q23q5cwq4xxdth2kzxkz622ppo";

function jsonError(text: string): EncodeError {
  try {
    parseJson(text);
  } catch (err) {
    if (err instanceof EncodeError) return err;
    throw err;
  }
  throw new Error("expected an EncodeError");
}

describe("toJson", () => {
  it("wraps links and bytes", () => {
    const cid = createCid(CODEC_DAG_CBOR, new TextEncoder().encode("abc"));
    const value = V.map({ ref: V.link(cid), data: V.bytes(new Uint8Array([0xff, 0x00, 0x10])) });
    expect(stringifyJson(value)).toBe(`{"ref":{"$link":"${ABC_CID}"},"data":{"$bytes":"/wAQ"}}`);
  });

  it("pads nothing", () => {
    expect(toJson(V.bytes(new Uint8Array([1])))).toEqual({ $bytes: "AQ" });
    expect(toJson(V.bytes(new Uint8Array([1, 2])))).toEqual({ $bytes: "AQI" });
  });

  it("refuses integers JSON cannot hold exactly", () => {
    expect(() => toJson(V.map({ n: V.int(2n ** 53n) }))).toThrow(
      "integer 9007199254740992 has no exact JSON representation (at $.n)",
    );
  });

  it("writes out-of-range integers as decimal strings when asked", () => {
    const value = V.map({ big: V.int(2n ** 64n - 1n), low: V.int(-(2n ** 53n)), ok: V.int(7) });
    expect(toJson(value, { unsafeIntegers: "string" })).toEqual({
      big: "18446744073709551615",
      low: "-9007199254740992",
      ok: 7,
    });
    expect(stringifyJson(V.map({ n: V.int(2n ** 53n) }), undefined, { unsafeIntegers: "string" })).toBe(
      '{"n":"9007199254740992"}',
    );
  });
});

describe("fromJson", () => {
  it("round-trips through JSON text", () => {
    const value = V.map({
      ref: V.link(createCid(CODEC_DAG_CBOR, new Uint8Array([1]))),
      data: V.bytes(new Uint8Array([1, 2, 3, 4, 5])),
      n: V.int(-3),
      f: V.float(2.5),
      list: V.array([V.text("x"), V.null(), V.bool(true)]),
    });
    expect(valueEquals(parseJson(stringifyJson(value)), value)).toBe(true);
  });

  it("$link with the canonical encoding", () => {
    const value = parseJson(`{"link":{"$link":"${ABC_CID}"}}`);
    expect(value.kind).toBe("map");
    if (value.kind === "map") {
      expect(bytesToHex(encode(value))).toBe(
        "a1646c696e6bd82a582500" +
          "01711220ba7816bf8f01cfea414140de5dae2223b00361a396177a9cb410ff61f20015ad",
      );
    }
  });

  it("objects with extra keys stay maps", () => {
    const value = fromJson({ $link: ABC_CID, note: "x" });
    expect(value.kind === "map" && Array.from(value.entries.keys())).toEqual(["$link", "note"]);
  });

  it("integral numbers become ints", () => {
    expect(fromJson(4)).toEqual({ kind: "int", value: 4n });
    expect(fromJson(4.25)).toEqual({ kind: "float", value: 4.25 });
  });

  it("rejects an invalid $link", () => {
    const err = jsonError('{"a":{"$link":"b27sl62"}}');
    expect(err.code).toBe("ERR_LINK");
    expect(err.path).toBe("$.a");
  });

  it("rejects invalid $bytes", () => {
    expect(jsonError('{"a":{"$bytes":"*"}}').code).toBe("ERR_MALFORMED");
  });
});
