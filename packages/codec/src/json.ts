/**
 * JSON representation of the data model.
 *
 *   link  → { "$link": "<cid text>" }
 *   bytes → { "$bytes": "<unpadded base64>" }
 *
 * JSON numbers cannot tell 1 from 1.0, so integral numbers read back as
 * ints. Integers outside ±(2^53 - 1) have no exact JSON form: they are refused,
 * or written as decimal strings when asked.
 */

import { Type, type Static } from "@sinclair/typebox";
import { Value as SchemaValue } from "@sinclair/typebox/value";
import { utils } from "@scure/base";
import { formatCid, parseCid } from "./cid.js";
import {
  CidError,
  EncodeError,
  ERR_LINK,
  ERR_MALFORMED,
  ERR_UNSUPPORTED_VALUE,
  ERR_VALUE_RANGE,
} from "./errors.js";
import { childPath, describe, indexPath, ROOT_PATH } from "./path.js";
import type { Value } from "./value.js";

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export const JsonLink = Type.Object({ $link: Type.String() }, { additionalProperties: false });
export type JsonLink = Static<typeof JsonLink>;

export const JsonBytes = Type.Object({ $bytes: Type.String() }, { additionalProperties: false });
export type JsonBytes = Static<typeof JsonBytes>;

const base64 = utils.chain(
  utils.radix2(6),
  utils.alphabet("ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789+/"),
  utils.join(""),
);

// ── Value → JSON ───────────────────────────────────────────────────

export interface JsonOptions {
  /**
   * Integers outside ±(2^53 - 1): `"error"` (default) refuses them,
   * `"string"` writes their decimal digits as a JSON string.
   */
  unsafeIntegers?: "error" | "string";
}

export function toJson(value: Value, options: JsonOptions = {}): JsonValue {
  return jsonOf(value, ROOT_PATH, options.unsafeIntegers ?? "error");
}

function jsonOf(value: Value, path: string, unsafeIntegers: "error" | "string"): JsonValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "float":
    case "text":
      return value.value;
    case "int":
      if (
        value.value < BigInt(Number.MIN_SAFE_INTEGER) ||
        value.value > BigInt(Number.MAX_SAFE_INTEGER)
      ) {
        if (unsafeIntegers === "string") return value.value.toString();
        throw new EncodeError(
          ERR_VALUE_RANGE,
          `integer ${value.value} has no exact JSON representation`,
          path,
        );
      }
      return Number(value.value);
    case "bytes":
      return { $bytes: base64.encode(value.value) };
    case "link":
      return { $link: formatCid(value.cid) };
    case "array":
      return value.items.map((item, i) => jsonOf(item, indexPath(path, i), unsafeIntegers));
    case "map":
      return Object.fromEntries(
        Array.from(value.entries, ([key, item]): [string, JsonValue] => [
          key,
          jsonOf(item, childPath(path, key), unsafeIntegers),
        ]),
      );
  }
}

export function stringifyJson(value: Value, space?: number, options?: JsonOptions): string {
  return JSON.stringify(toJson(value, options), null, space);
}

// ── JSON → Value ───────────────────────────────────────────────────

export function fromJson(input: unknown, path: string = ROOT_PATH): Value {
  if (input === null) return { kind: "null" };

  switch (typeof input) {
    case "boolean":
      return { kind: "bool", value: input };
    case "string":
      return { kind: "text", value: input };
    case "number":
      if (!Number.isFinite(input)) {
        throw new EncodeError(ERR_VALUE_RANGE, `number ${input} is not allowed`, path);
      }
      return Number.isSafeInteger(input)
        ? { kind: "int", value: BigInt(input) }
        : { kind: "float", value: input };
    case "object":
      if (Array.isArray(input)) {
        return {
          kind: "array",
          items: input.map((item: unknown, i) => fromJson(item, indexPath(path, i))),
        };
      }
      if (SchemaValue.Check(JsonLink, input)) return linkFromJson(input, path);
      if (SchemaValue.Check(JsonBytes, input)) return bytesFromJson(input, path);
      return mapFromJson(input, path);
    default:
      throw new EncodeError(
        ERR_UNSUPPORTED_VALUE,
        `unsupported JSON value: ${describe(input)}`,
        path,
      );
  }
}

export function parseJson(text: string): Value {
  return fromJson(JSON.parse(text));
}

function linkFromJson(input: JsonLink, path: string): Value {
  try {
    return { kind: "link", cid: parseCid(input.$link) };
  } catch (err) {
    if (err instanceof CidError) {
      throw new EncodeError(ERR_LINK, `invalid $link: ${err.message}`, path, { cause: err });
    }
    throw err;
  }
}

function bytesFromJson(input: JsonBytes, path: string): Value {
  try {
    return { kind: "bytes", value: base64.decode(input.$bytes) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new EncodeError(ERR_MALFORMED, `invalid $bytes: ${reason}`, path, { cause: err });
  }
}

function mapFromJson(input: object, path: string): Value {
  const entries = new Map<string, Value>();
  for (const [key, item] of Object.entries(input)) {
    entries.set(key, fromJson(item, childPath(path, key)));
  }
  return { kind: "map", entries };
}
