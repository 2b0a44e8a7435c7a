/**
 * @dagkit/codec — canonical DAG-CBOR and CIDv1.
 *
 * Pure functions, no I/O, no shared state. Encoding is deterministic:
 * the same value always yields the same bytes and therefore the same CID.
 */

// Data model
export {
  V,
  valueEquals,
  type Value,
  type ValueKind,
  type NullValue,
  type BoolValue,
  type IntValue,
  type FloatValue,
  type BytesValue,
  type TextValue,
  type ArrayValue,
  type MapValue,
  type LinkValue,
} from "./value.js";

// Codec
export { encode, type EncodeOptions } from "./encode.js";
export { decode, decodeFirst, type DecodeResult } from "./decode.js";
export { ByteBuffer } from "./byte-buffer.js";
export { compareKeys } from "./text.js";

// Content identifiers
export {
  Cid,
  createCid,
  createEmptyCid,
  parseCid,
  formatCid,
  cidFromBytes,
  cidFromBinary,
  cidToBinary,
  cidEquals,
  cidDigestHex,
  isCid,
  isCidCodec,
  type CidCodec,
} from "./cid.js";
export { base32Encode, base32Decode, BASE32_SORTED_ALPHABET } from "./base32.js";

// Blocks
export {
  encodeBlock,
  decodeBlock,
  verifyBlock,
  cidForValue,
  cidForObject,
  type Block,
} from "./block.js";

// Plain JavaScript values
export {
  fromPlain,
  toPlain,
  encodeObject,
  decodeObject,
  toMapValue,
  type PlainValue,
  type PlainObject,
} from "./plain.js";

// JSON form
export {
  toJson,
  fromJson,
  parseJson,
  stringifyJson,
  JsonLink,
  JsonBytes,
  type JsonValue,
  type JsonOptions,
} from "./json.js";

// Errors
export * from "./errors.js";

// Constants
export * from "./constants.js";
