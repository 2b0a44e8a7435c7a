/**
 * Bridge between ordinary JavaScript values and the Value union.
 *
 *   null               ⇄ null
 *   boolean            ⇄ bool
 *   safe integer       ⇄ int   (bigint outside the safe range)
 *   other number       ⇄ float
 *   string             ⇄ text
 *   Uint8Array         ⇄ bytes
 *   Cid                ⇄ link
 *   array              ⇄ array
 *   plain object / Map ⇄ map   (decoded maps come back as plain objects)
 *
 * Everything else (undefined, functions, symbols, class instances) is
 * refused with the path where it was found.
 */

import { decode } from "./decode.js";
import { encode } from "./encode.js";
import { isCid, type Cid } from "./cid.js";
import { EncodeError, ERR_UNSUPPORTED_VALUE, ERR_VALUE_RANGE } from "./errors.js";
import { childPath, describe, indexPath, ROOT_PATH } from "./path.js";
import type { MapValue, Value } from "./value.js";

export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | Cid
  | PlainValue[]
  | { [key: string]: PlainValue };

export type PlainObject = { [key: string]: unknown };

function isPlainObject(input: object): input is PlainObject {
  const proto: unknown = Object.getPrototypeOf(input);
  return proto === Object.prototype || proto === null;
}

export function fromPlain(input: unknown, path: string = ROOT_PATH): Value {
  switch (typeof input) {
    case "boolean":
      return { kind: "bool", value: input };
    case "bigint":
      return { kind: "int", value: input };
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
      if (input === null) return { kind: "null" };
      if (input instanceof Uint8Array) return { kind: "bytes", value: input };
      if (isCid(input)) return { kind: "link", cid: input };
      if (Array.isArray(input)) {
        return {
          kind: "array",
          items: input.map((item: unknown, i) => fromPlain(item, indexPath(path, i))),
        };
      }
      if (input instanceof Map) return fromPlainMap(input, path);
      if (isPlainObject(input)) {
        const entries = new Map<string, Value>();
        for (const key of Object.keys(input)) {
          entries.set(key, fromPlain(input[key], childPath(path, key)));
        }
        return { kind: "map", entries };
      }
      break;
    default:
      break;
  }

  throw new EncodeError(
    ERR_UNSUPPORTED_VALUE,
    `unsupported type for encoding: ${describe(input)}`,
    path,
  );
}

function fromPlainMap(input: Map<unknown, unknown>, path: string): MapValue {
  const entries = new Map<string, Value>();
  for (const [key, item] of input) {
    if (typeof key !== "string") {
      throw new EncodeError(
        ERR_UNSUPPORTED_VALUE,
        `map keys must be strings, got ${describe(key)}`,
        path,
      );
    }
    entries.set(key, fromPlain(item, childPath(path, key)));
  }
  return { kind: "map", entries };
}

export function toPlain(value: Value): PlainValue {
  switch (value.kind) {
    case "null":
      return null;
    case "bool":
    case "float":
    case "text":
    case "bytes":
      return value.value;
    case "int": {
      const n = value.value;
      return n >= BigInt(Number.MIN_SAFE_INTEGER) && n <= BigInt(Number.MAX_SAFE_INTEGER)
        ? Number(n)
        : n;
    }
    case "link":
      return value.cid;
    case "array":
      return value.items.map(toPlain);
    case "map":
      return Object.fromEntries(
        Array.from(value.entries, ([key, item]): [string, PlainValue] => [key, toPlain(item)]),
      );
  }
}

// ── Shortcuts ──────────────────────────────────────────────────────

/** fromPlain + encode; the input must convert to a map. */
export function encodeObject(obj: PlainObject | ReadonlyMap<string, unknown>): Uint8Array {
  return encode(toMapValue(obj));
}

/** decode + toPlain. */
export function decodeObject(bytes: Uint8Array): PlainValue {
  return toPlain(decode(bytes));
}

export function toMapValue(obj: PlainObject | ReadonlyMap<string, unknown>): MapValue {
  const value = fromPlain(obj);
  if (value.kind !== "map") {
    throw new EncodeError(
      ERR_UNSUPPORTED_VALUE,
      `top-level value must be a map, got ${value.kind}`,
      ROOT_PATH,
    );
  }
  return value;
}
