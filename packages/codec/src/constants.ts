/**
 * Wire constants for canonical DAG-CBOR and CIDv1.
 */

// ── CBOR major types (high 3 bits of the initial byte) ─────────────
export const MAJOR_UNSIGNED = 0;
export const MAJOR_NEGATIVE = 1;
export const MAJOR_BYTES = 2;
export const MAJOR_TEXT = 3;
export const MAJOR_ARRAY = 4;
export const MAJOR_MAP = 5;
export const MAJOR_TAG = 6;
export const MAJOR_SIMPLE = 7;

// ── Argument selectors (low 5 bits) ────────────────────────────────
export const ARG_UINT8 = 24;
export const ARG_UINT16 = 25;
export const ARG_UINT32 = 26;
export const ARG_UINT64 = 27;
export const ARG_INDEFINITE = 31;

// ── Major type 7 selectors ─────────────────────────────────────────
export const SIMPLE_FALSE = 20;
export const SIMPLE_TRUE = 21;
export const SIMPLE_NULL = 22;
export const SIMPLE_FLOAT16 = 25;
export const SIMPLE_FLOAT32 = 26;
export const SIMPLE_FLOAT64 = 27;

/** Tag number marking a byte string as a CID link. */
export const TAG_CID = 42;

/** Multibase "identity" marker that precedes a binary CID inside tag 42. */
export const CID_BINARY_PREFIX = 0x00;

// ── CIDv1 ──────────────────────────────────────────────────────────
export const CID_VERSION = 1;
export const CODEC_RAW = 0x55;
export const CODEC_DAG_CBOR = 0x71;
export const HASH_SHA256 = 0x12;
export const SHA256_DIGEST_LENGTH = 32;

/** Version, codec, hash type, digest length. */
export const CID_HEADER_LENGTH = 4;

/** `b` + base32 of a 4-byte (empty) or 36-byte CID. */
export const CID_TEXT_LENGTH_EMPTY = 8;
export const CID_TEXT_LENGTH_SHA256 = 59;

/** Multibase prefix for the base32 text form. */
export const CID_TEXT_PREFIX = "b";

export const MAX_UINT64 = 0xffff_ffff_ffff_ffffn;
export const MIN_NEGATIVE_INT = -0x1_0000_0000_0000_0000n;
