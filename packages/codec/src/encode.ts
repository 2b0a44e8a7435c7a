/**
 * Canonical DAG-CBOR encoder.
 *
 * Rules:
 *   1. Every argument (integer, length, count, tag) uses its shortest form
 *   2. Floats are always 8-byte doubles; NaN and ±Infinity are refused
 *   3. Map keys are text, written sorted by (UTF-8 length, bytes)
 *   4. Links are tag 42 over 0x00 ++ CID bytes
 *
 * Same value → identical bytes, whatever the maps' insertion order.
 */

import { ByteBuffer } from "./byte-buffer.js";
import {
  CID_BINARY_PREFIX,
  MAJOR_ARRAY,
  MAJOR_BYTES,
  MAJOR_MAP,
  MAJOR_NEGATIVE,
  MAJOR_SIMPLE,
  MAJOR_TAG,
  MAJOR_TEXT,
  MAJOR_UNSIGNED,
  MAX_UINT64,
  MIN_NEGATIVE_INT,
  SIMPLE_FALSE,
  SIMPLE_FLOAT64,
  SIMPLE_NULL,
  SIMPLE_TRUE,
  TAG_CID,
} from "./constants.js";
import { cidFromBytes, type Cid } from "./cid.js";
import {
  CidError,
  EncodeError,
  ERR_LINK,
  ERR_UNSUPPORTED_VALUE,
  ERR_UTF8,
  ERR_VALUE_RANGE,
} from "./errors.js";
import { childPath, describe, indexPath, ROOT_PATH } from "./path.js";
import { compareKeys, findLoneSurrogate, utf8Encode } from "./text.js";
import type { MapValue, Value } from "./value.js";

export interface EncodeOptions {
  /** Starting size of the output buffer. */
  initialCapacity?: number;
}

/**
 * Encode a map value to canonical bytes.
 *
 * @throws EncodeError for values outside the data model, with the path of
 *   the offending value
 */
export function encode(value: MapValue, options: EncodeOptions = {}): Uint8Array {
  if (value.kind !== "map") {
    throw new EncodeError(
      ERR_UNSUPPORTED_VALUE,
      `top-level value must be a map, got ${describe(value)}`,
      ROOT_PATH,
    );
  }
  const out = new ByteBuffer(options.initialCapacity);
  writeValue(out, value, ROOT_PATH);
  return out.finalize();
}

// ── Writers ────────────────────────────────────────────────────────

function writeTypeAndArgument(out: ByteBuffer, major: number, arg: number | bigint): void {
  const head = major << 5;
  if (typeof arg === "bigint") {
    if (arg <= 0xffff_ffffn) {
      writeTypeAndArgument(out, major, Number(arg));
      return;
    }
    out.writeUint8(head | 27);
    out.writeUint64(arg);
    return;
  }

  if (arg < 24) {
    out.writeUint8(head | arg);
  } else if (arg < 0x100) {
    out.writeUint8(head | 24);
    out.writeUint8(arg);
  } else if (arg < 0x10000) {
    out.writeUint8(head | 25);
    out.writeUint16(arg);
  } else if (arg < 0x1_0000_0000) {
    out.writeUint8(head | 26);
    out.writeUint32(arg);
  } else {
    out.writeUint8(head | 27);
    out.writeUint64(BigInt(arg));
  }
}

function writeInteger(out: ByteBuffer, n: bigint, path: string): void {
  if (n > MAX_UINT64 || n < MIN_NEGATIVE_INT) {
    throw new EncodeError(ERR_VALUE_RANGE, `integer ${n} does not fit in 64 bits`, path);
  }
  if (n >= 0n) {
    writeTypeAndArgument(out, MAJOR_UNSIGNED, n);
  } else {
    writeTypeAndArgument(out, MAJOR_NEGATIVE, -1n - n);
  }
}

function writeFloat(out: ByteBuffer, n: number, path: string): void {
  if (!Number.isFinite(n)) {
    throw new EncodeError(ERR_VALUE_RANGE, `float ${n} is not allowed`, path);
  }
  out.writeUint8((MAJOR_SIMPLE << 5) | SIMPLE_FLOAT64);
  out.writeFloat64(n);
}

function encodeText(s: string, path: string): Uint8Array {
  const bad = findLoneSurrogate(s);
  if (bad >= 0) {
    throw new EncodeError(ERR_UTF8, `string has an unpaired surrogate at index ${bad}`, path);
  }
  return utf8Encode(s);
}

function writeString(out: ByteBuffer, major: number, bytes: Uint8Array): void {
  writeTypeAndArgument(out, major, bytes.length);
  out.write(bytes);
}

function writeLink(out: ByteBuffer, cid: Cid, path: string): void {
  let bytes: Uint8Array;
  try {
    bytes = cidFromBytes(cid.bytes).bytes;
  } catch (err) {
    if (!(err instanceof CidError)) throw err;
    throw new EncodeError(ERR_LINK, `invalid link: ${err.message}`, path, { cause: err });
  }
  writeTypeAndArgument(out, MAJOR_TAG, TAG_CID);
  writeTypeAndArgument(out, MAJOR_BYTES, bytes.length + 1);
  out.writeUint8(CID_BINARY_PREFIX);
  out.write(bytes);
}

// ── Tree walk ──────────────────────────────────────────────────────

/** Pending work: a value still to write, or a map key already encoded. */
type Task =
  | { type: "value"; value: Value; path: string }
  | { type: "key"; bytes: Uint8Array };

/**
 * Writes `root` depth-first with an explicit stack, so nesting depth is
 * bounded by memory rather than the call stack.
 */
function writeValue(out: ByteBuffer, root: Value, rootPath: string): void {
  const stack: Task[] = [{ type: "value", value: root, path: rootPath }];

  for (let task = stack.pop(); task !== undefined; task = stack.pop()) {
    if (task.type === "key") {
      writeString(out, MAJOR_TEXT, task.bytes);
      continue;
    }

    const { value, path } = task;
    switch (value.kind) {
      case "null":
        out.writeUint8((MAJOR_SIMPLE << 5) | SIMPLE_NULL);
        break;
      case "bool":
        out.writeUint8((MAJOR_SIMPLE << 5) | (value.value ? SIMPLE_TRUE : SIMPLE_FALSE));
        break;
      case "int":
        writeInteger(out, value.value, path);
        break;
      case "float":
        writeFloat(out, value.value, path);
        break;
      case "bytes":
        writeString(out, MAJOR_BYTES, value.value);
        break;
      case "text":
        writeString(out, MAJOR_TEXT, encodeText(value.value, path));
        break;
      case "array":
        writeTypeAndArgument(out, MAJOR_ARRAY, value.items.length);
        // reverse push: first item pops first
        for (let i = value.items.length - 1; i >= 0; i--) {
          const item = value.items[i];
          if (item !== undefined) {
            stack.push({ type: "value", value: item, path: indexPath(path, i) });
          }
        }
        break;
      case "map": {
        const sorted: { key: string; bytes: Uint8Array; value: Value }[] = [];
        for (const [key, item] of value.entries) {
          sorted.push({ key, bytes: encodeText(key, childPath(path, key)), value: item });
        }
        sorted.sort((a, b) => compareKeys(a.bytes, b.bytes));

        writeTypeAndArgument(out, MAJOR_MAP, sorted.length);
        for (let i = sorted.length - 1; i >= 0; i--) {
          const entry = sorted[i];
          if (entry === undefined) continue;
          stack.push({ type: "value", value: entry.value, path: childPath(path, entry.key) });
          stack.push({ type: "key", bytes: entry.bytes });
        }
        break;
      }
      case "link":
        writeLink(out, value.cid, path);
        break;
      default:
        throw new EncodeError(
          ERR_UNSUPPORTED_VALUE,
          `unsupported value for encoding: ${describe(value)}`,
          path,
        );
    }
  }
}
