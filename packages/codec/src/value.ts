/**
 * The DAG-CBOR data model — a closed tagged union.
 *
 * Maps are keyed by text only and iterate in insertion order; the encoder
 * sorts keys canonically, the decoder yields them in canonical order.
 */

import { cidEquals, type Cid } from "./cid.js";

export type NullValue = { readonly kind: "null" };
export type BoolValue = { readonly kind: "bool"; readonly value: boolean };
/** Signed integer in [-2^64, 2^64 - 1]. */
export type IntValue = { readonly kind: "int"; readonly value: bigint };
/** IEEE-754 double; always finite. */
export type FloatValue = { readonly kind: "float"; readonly value: number };
export type BytesValue = { readonly kind: "bytes"; readonly value: Uint8Array };
export type TextValue = { readonly kind: "text"; readonly value: string };
export type ArrayValue = { readonly kind: "array"; readonly items: readonly Value[] };
export type MapValue = { readonly kind: "map"; readonly entries: ReadonlyMap<string, Value> };
export type LinkValue = { readonly kind: "link"; readonly cid: Cid };

export type Value =
  | NullValue
  | BoolValue
  | IntValue
  | FloatValue
  | BytesValue
  | TextValue
  | ArrayValue
  | MapValue
  | LinkValue;

export type ValueKind = Value["kind"];

// ── Constructors ───────────────────────────────────────────────────

const NULL: NullValue = { kind: "null" };

export const V = {
  null(): NullValue {
    return NULL;
  },
  bool(value: boolean): BoolValue {
    return { kind: "bool", value };
  },
  int(value: bigint | number): IntValue {
    return { kind: "int", value: BigInt(value) };
  },
  float(value: number): FloatValue {
    return { kind: "float", value };
  },
  bytes(value: Uint8Array): BytesValue {
    return { kind: "bytes", value };
  },
  text(value: string): TextValue {
    return { kind: "text", value };
  },
  array(items: readonly Value[]): ArrayValue {
    return { kind: "array", items };
  },
  map(
    entries: ReadonlyMap<string, Value> | Iterable<readonly [string, Value]> | Record<string, Value>,
  ): MapValue {
    if (isIterable(entries)) return { kind: "map", entries: new Map(entries) };
    return { kind: "map", entries: new Map(Object.entries(entries)) };
  },
  link(cid: Cid): LinkValue {
    return { kind: "link", cid };
  },
} as const;

function isIterable(
  value: ReadonlyMap<string, Value> | Iterable<readonly [string, Value]> | Record<string, Value>,
): value is Iterable<readonly [string, Value]> {
  return Symbol.iterator in value;
}

// ── Equality ───────────────────────────────────────────────────────

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/**
 * Structural equality. Map comparison ignores insertion order, since
 * order carries no meaning in the data model. Floats compare with
 * Object.is so 0 and -0 differ, matching their encodings.
 */
export function valueEquals(a: Value, b: Value): boolean {
  switch (a.kind) {
    case "null":
      return b.kind === "null";
    case "bool":
      return b.kind === "bool" && a.value === b.value;
    case "int":
      return b.kind === "int" && a.value === b.value;
    case "text":
      return b.kind === "text" && a.value === b.value;
    case "float":
      return b.kind === "float" && Object.is(a.value, b.value);
    case "bytes":
      return b.kind === "bytes" && bytesEqual(a.value, b.value);
    case "array": {
      if (b.kind !== "array" || a.items.length !== b.items.length) return false;
      const others = b.items;
      return a.items.every((item, i) => {
        const other = others[i];
        return other !== undefined && valueEquals(item, other);
      });
    }
    case "map": {
      if (b.kind !== "map" || a.entries.size !== b.entries.size) return false;
      for (const [key, item] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valueEquals(item, other)) return false;
      }
      return true;
    }
    case "link":
      return b.kind === "link" && cidEquals(a.cid, b.cid);
  }
}
