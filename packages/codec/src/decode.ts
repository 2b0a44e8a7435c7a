/**
 * Canonical DAG-CBOR decoder.
 *
 * Nested arrays and maps are rebuilt with an explicit stack of open
 * containers instead of recursion, so nesting depth is limited by memory
 * and not by the call stack. The loop alternates between reading one item
 * and draining completed values up into their parents.
 *
 * Canonical form is checked as bytes are read; anything that the encoder
 * would not have produced is rejected with a DecodeError.
 */

import { cidFromBinary } from "./cid.js";
import {
  ARG_INDEFINITE,
  ARG_UINT16,
  ARG_UINT32,
  ARG_UINT64,
  ARG_UINT8,
  CID_BINARY_PREFIX,
  MAJOR_ARRAY,
  MAJOR_BYTES,
  MAJOR_MAP,
  MAJOR_NEGATIVE,
  MAJOR_SIMPLE,
  MAJOR_TAG,
  MAJOR_TEXT,
  MAJOR_UNSIGNED,
  SIMPLE_FALSE,
  SIMPLE_FLOAT16,
  SIMPLE_FLOAT32,
  SIMPLE_FLOAT64,
  SIMPLE_NULL,
  SIMPLE_TRUE,
  TAG_CID,
} from "./constants.js";
import {
  CidError,
  DecodeError,
  ERR_DUPLICATE_KEY,
  ERR_FLOAT_RANGE,
  ERR_FLOAT_WIDTH,
  ERR_INDEFINITE_LENGTH,
  ERR_KEY_ORDER,
  ERR_LINK,
  ERR_MALFORMED,
  ERR_MAP_KEY_TYPE,
  ERR_NON_MINIMAL,
  ERR_SIMPLE_VALUE,
  ERR_TRAILING_DATA,
  ERR_UNEXPECTED_END,
  ERR_UNSUPPORTED_TAG,
  ERR_UTF8,
  type CodecErrorCode,
} from "./errors.js";
import { childPath, indexPath, ROOT_PATH } from "./path.js";
import { compareKeys, utf8Decode } from "./text.js";
import type { Value } from "./value.js";

export interface DecodeResult {
  value: Value;
  /** Bytes after the first item (a view into the input). */
  remainder: Uint8Array;
}

/**
 * Decode exactly one item from the front of `bytes`.
 *
 * @throws DecodeError carrying the failing offset, path and unconsumed bytes
 */
export function decodeFirst(bytes: Uint8Array): DecodeResult {
  const decoder = new Decoder(bytes);
  const value = decoder.run();
  return { value, remainder: bytes.subarray(decoder.position) };
}

/**
 * Decode a single item that must span all of `bytes`.
 *
 * @throws DecodeError, ERR_TRAILING_DATA when bytes remain after the item
 */
export function decode(bytes: Uint8Array): Value {
  const { value, remainder } = decodeFirst(bytes);
  if (remainder.length > 0) {
    throw new DecodeError(
      ERR_TRAILING_DATA,
      `decoding finished with ${remainder.length} trailing bytes`,
      { offset: bytes.length - remainder.length, path: ROOT_PATH, remainder },
    );
  }
  return value;
}

// ── Open containers ────────────────────────────────────────────────

interface ArrayFrame {
  type: "array";
  items: Value[];
  /** Items still expected. */
  remaining: number;
}

interface MapFrame {
  type: "map";
  entries: Map<string, Value>;
  /** Keys plus values still expected (pairs × 2). */
  remaining: number;
  /** Key read, waiting for its value. */
  pendingKey: string | undefined;
  /** Last accepted key, raw bytes for the ordering check. */
  prevKey: { text: string; bytes: Uint8Array } | undefined;
}

type Frame = ArrayFrame | MapFrame;

// ── Decoder ────────────────────────────────────────────────────────

class Decoder {
  private readonly bytes: Uint8Array;
  private readonly view: DataView;
  private pos = 0;
  /** Offset of the header of the item being decoded. */
  private itemStart = 0;
  private readonly stack: Frame[] = [];
  /** Raw bytes of the most recent text string, for map-key ordering. */
  private lastText: Uint8Array | undefined;

  constructor(bytes: Uint8Array) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.pos;
  }

  run(): Value {
    for (;;) {
      this.itemStart = this.pos;
      let value = this.readItem();
      if (value === undefined) continue; // a non-empty container was opened

      for (;;) {
        const top = this.stack[this.stack.length - 1];
        if (top === undefined) return value;

        this.feed(top, value);
        top.remaining--;
        if (top.remaining > 0) break;

        this.stack.pop();
        value =
          top.type === "array"
            ? { kind: "array", items: top.items }
            : { kind: "map", entries: top.entries };
      }
    }
  }

  // ── Errors ───────────────────────────────────────────────────────

  private fail(code: CodecErrorCode, message: string, cause?: unknown): never {
    throw new DecodeError(code, message, {
      offset: code === ERR_UNEXPECTED_END ? this.pos : this.itemStart,
      path: this.currentPath(),
      remainder: this.bytes.subarray(this.pos),
      cause,
    });
  }

  /** Where in the tree the current item belongs. */
  private currentPath(): string {
    let path = ROOT_PATH;
    for (const frame of this.stack) {
      if (frame.type === "array") {
        path = indexPath(path, frame.items.length);
      } else if (frame.pendingKey !== undefined) {
        path = childPath(path, frame.pendingKey);
      } else {
        path = `${path}<key #${frame.entries.size}>`;
      }
    }
    return path;
  }

  // ── Raw reads ────────────────────────────────────────────────────

  private ensure(n: number): void {
    const available = this.bytes.length - this.pos;
    if (n > available) {
      this.fail(ERR_UNEXPECTED_END, `unexpected end of input: need ${n} bytes, have ${available}`);
    }
  }

  private readUint8(): number {
    this.ensure(1);
    const v = this.view.getUint8(this.pos);
    this.pos += 1;
    return v;
  }

  private readUint16(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.pos);
    this.pos += 2;
    return v;
  }

  private readUint32(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.pos);
    this.pos += 4;
    return v;
  }

  private readUint64(): bigint {
    this.ensure(8);
    const v = this.view.getBigUint64(this.pos);
    this.pos += 8;
    return v;
  }

  private readFloat64(): number {
    this.ensure(8);
    const v = this.view.getFloat64(this.pos);
    this.pos += 8;
    return v;
  }

  /** Argument for major types 0–6, enforcing the shortest encoding. */
  private readArgument(info: number): bigint {
    if (info < ARG_UINT8) return BigInt(info);

    switch (info) {
      case ARG_UINT8: {
        const v = this.readUint8();
        if (v < 24) this.fail(ERR_NON_MINIMAL, `integer ${v} is not minimally encoded (1-byte form)`);
        return BigInt(v);
      }
      case ARG_UINT16: {
        const v = this.readUint16();
        if (v < 0x100) this.fail(ERR_NON_MINIMAL, `integer ${v} is not minimally encoded (2-byte form)`);
        return BigInt(v);
      }
      case ARG_UINT32: {
        const v = this.readUint32();
        if (v < 0x10000) this.fail(ERR_NON_MINIMAL, `integer ${v} is not minimally encoded (4-byte form)`);
        return BigInt(v);
      }
      case ARG_UINT64: {
        const v = this.readUint64();
        if (v < 0x1_0000_0000n) this.fail(ERR_NON_MINIMAL, `integer ${v} is not minimally encoded (8-byte form)`);
        return v;
      }
      case ARG_INDEFINITE:
        return this.fail(ERR_INDEFINITE_LENGTH, "indefinite-length items are not supported");
      default:
        return this.fail(ERR_MALFORMED, `reserved argument selector ${info}`);
    }
  }

  /** Byte length that must be available in full. */
  private readLength(info: number): number {
    const length = this.readArgument(info);
    const available = this.bytes.length - this.pos;
    if (length > BigInt(available)) {
      this.fail(ERR_UNEXPECTED_END, `unexpected end of input: need ${length} bytes, have ${available}`);
    }
    return Number(length);
  }

  /** Item count; every item takes at least one byte, so the count is bounded too. */
  private readCount(info: number, itemsPerEntry: number): number {
    const count = this.readArgument(info);
    const available = this.bytes.length - this.pos;
    if (count * BigInt(itemsPerEntry) > BigInt(available)) {
      this.fail(
        ERR_UNEXPECTED_END,
        `unexpected end of input: ${count} entries cannot fit in ${available} bytes`,
      );
    }
    return Number(count);
  }

  private readByteString(info: number): Uint8Array {
    const length = this.readLength(info);
    const out = this.bytes.slice(this.pos, this.pos + length);
    this.pos += length;
    return out;
  }

  private readTextString(info: number): string {
    const length = this.readLength(info);
    const raw = this.bytes.subarray(this.pos, this.pos + length);
    const text = utf8Decode(raw);
    if (text === undefined) return this.fail(ERR_UTF8, "invalid UTF-8 in text string");
    this.pos += length;
    this.lastText = raw;
    return text;
  }

  // ── Items ────────────────────────────────────────────────────────

  /**
   * Read one item. Returns the finished value, or undefined after pushing
   * a container that still needs children.
   */
  private readItem(): Value | undefined {
    const initial = this.readUint8();
    const major = initial >> 5;
    const info = initial & 0x1f;

    switch (major) {
      case MAJOR_UNSIGNED:
        return { kind: "int", value: this.readArgument(info) };
      case MAJOR_NEGATIVE:
        return { kind: "int", value: -1n - this.readArgument(info) };
      case MAJOR_BYTES:
        return { kind: "bytes", value: this.readByteString(info) };
      case MAJOR_TEXT:
        return { kind: "text", value: this.readTextString(info) };
      case MAJOR_ARRAY: {
        const count = this.readCount(info, 1);
        if (count === 0) return { kind: "array", items: [] };
        this.stack.push({ type: "array", items: [], remaining: count });
        return undefined;
      }
      case MAJOR_MAP: {
        const count = this.readCount(info, 2);
        if (count === 0) return { kind: "map", entries: new Map() };
        this.stack.push({
          type: "map",
          entries: new Map(),
          remaining: count * 2,
          pendingKey: undefined,
          prevKey: undefined,
        });
        return undefined;
      }
      case MAJOR_TAG:
        return this.readTagged(this.readArgument(info));
      case MAJOR_SIMPLE:
      default:
        return this.readSimple(info);
    }
  }

  private readSimple(info: number): Value {
    switch (info) {
      case SIMPLE_FALSE:
        return { kind: "bool", value: false };
      case SIMPLE_TRUE:
        return { kind: "bool", value: true };
      case SIMPLE_NULL:
        return { kind: "null" };
      case SIMPLE_FLOAT64: {
        const v = this.readFloat64();
        if (!Number.isFinite(v)) this.fail(ERR_FLOAT_RANGE, `decoded float ${v} is not allowed`);
        return { kind: "float", value: v };
      }
      case SIMPLE_FLOAT16:
      case SIMPLE_FLOAT32:
        return this.fail(ERR_FLOAT_WIDTH, `floats must be 8-byte doubles, got selector ${info}`);
      case ARG_INDEFINITE:
        return this.fail(ERR_INDEFINITE_LENGTH, "unexpected break code");
      default:
        return this.fail(ERR_SIMPLE_VALUE, `invalid simple value info: ${info}`);
    }
  }

  private readTagged(tag: bigint): Value {
    if (tag !== BigInt(TAG_CID)) {
      this.fail(ERR_UNSUPPORTED_TAG, `unsupported tag number: ${tag}`);
    }

    const initial = this.readUint8();
    const major = initial >> 5;
    if (major !== MAJOR_BYTES) {
      this.fail(
        ERR_LINK,
        `expected tag ${TAG_CID} content to be major type ${MAJOR_BYTES} (bytes), got major type ${major}`,
      );
    }

    const content = this.readByteString(initial & 0x1f);
    const prefix = content[0];
    if (prefix !== CID_BINARY_PREFIX) {
      const found = prefix === undefined ? "nothing" : `0x${prefix.toString(16).padStart(2, "0")}`;
      this.fail(ERR_LINK, `invalid CID encoding: expected 0x00 prefix, got ${found}`);
    }

    try {
      return { kind: "link", cid: cidFromBinary(content) };
    } catch (err) {
      if (err instanceof CidError) return this.fail(ERR_LINK, `invalid CID: ${err.message}`, err);
      throw err;
    }
  }

  // ── Draining ─────────────────────────────────────────────────────

  private feed(frame: Frame, value: Value): void {
    if (frame.type === "array") {
      frame.items.push(value);
      return;
    }

    if (frame.pendingKey !== undefined) {
      frame.entries.set(frame.pendingKey, value);
      frame.pendingKey = undefined;
      return;
    }

    if (value.kind !== "text" || this.lastText === undefined) {
      return this.fail(ERR_MAP_KEY_TYPE, `map key must be a text string, got ${value.kind}`);
    }
    const key = { text: value.value, bytes: this.lastText };

    const prev = frame.prevKey;
    if (prev !== undefined) {
      const order = compareKeys(key.bytes, prev.bytes);
      if (order === 0) {
        this.fail(ERR_DUPLICATE_KEY, `map key order violation: duplicate key ${JSON.stringify(key.text)}`);
      }
      if (order < 0) {
        const detail =
          key.bytes.length < prev.bytes.length
            ? `is shorter than previous key ${JSON.stringify(prev.text)}`
            : `sorts before previous key ${JSON.stringify(prev.text)} of the same length`;
        this.fail(ERR_KEY_ORDER, `map key order violation: key ${JSON.stringify(key.text)} ${detail}`);
      }
    }

    frame.prevKey = key;
    frame.pendingKey = key.text;
  }
}
