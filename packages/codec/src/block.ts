/**
 * Blocks — canonical bytes paired with the CID that names them.
 *
 * cid = CIDv1(dag-cbor, SHA256(encode(value)))
 */

import { cidEquals, createCid, type Cid } from "./cid.js";
import { CODEC_DAG_CBOR } from "./constants.js";
import { decode } from "./decode.js";
import { encode } from "./encode.js";
import { toMapValue, type PlainObject } from "./plain.js";
import type { Value, MapValue } from "./value.js";

export interface Block {
  cid: Cid;
  bytes: Uint8Array;
}

export function encodeBlock(value: MapValue): Block {
  const bytes = encode(value);
  return { cid: createCid(CODEC_DAG_CBOR, bytes), bytes };
}

/** dag-cbor CID of a map value. */
export function cidForValue(value: MapValue): Cid {
  return encodeBlock(value).cid;
}

/** dag-cbor CID of a plain object, after canonical encoding. */
export function cidForObject(obj: PlainObject | ReadonlyMap<string, unknown>): Cid {
  return cidForValue(toMapValue(obj));
}

/**
 * Check that `bytes` hash to `cid` under the CID's own codec. The empty
 * CID names no content and never verifies.
 */
export function verifyBlock(cid: Cid, bytes: Uint8Array): boolean {
  if (cid.isEmpty) return false;
  return cidEquals(createCid(cid.codec, bytes), cid);
}

/**
 * Verify and decode a dag-cbor block.
 *
 * @throws Error if the bytes do not match the CID; DecodeError if they are
 *   not canonical
 */
export function decodeBlock(cid: Cid, bytes: Uint8Array): Value {
  if (cid.codec !== CODEC_DAG_CBOR) {
    throw new Error(`block ${cid.toString()} is not dag-cbor`);
  }
  if (!verifyBlock(cid, bytes)) {
    throw new Error(`block bytes do not match ${cid.toString()}`);
  }
  return decode(bytes);
}
