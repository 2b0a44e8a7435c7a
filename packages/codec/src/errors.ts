/**
 * Codec error codes and error classes.
 *
 * Every failure in the codec is a recoverable, structured error with a
 * stable string code. Codes group into kinds:
 *   bounds       input ended mid-item
 *   malformed    bytes are not canonical DAG-CBOR
 *   order        map keys out of canonical order or duplicated
 *   range        value outside what the data model allows
 *   unsupported  encoder given a value outside the data model
 *   trailing     bytes left after the top-level item
 */

// ── Decode / encode codes ──────────────────────────────────────────

export const ERR_UNEXPECTED_END = "ERR_UNEXPECTED_END";
export const ERR_NON_MINIMAL = "ERR_NON_MINIMAL";
export const ERR_MALFORMED = "ERR_MALFORMED";
export const ERR_INDEFINITE_LENGTH = "ERR_INDEFINITE_LENGTH";
export const ERR_UTF8 = "ERR_UTF8";
export const ERR_UNSUPPORTED_TAG = "ERR_UNSUPPORTED_TAG";
export const ERR_SIMPLE_VALUE = "ERR_SIMPLE_VALUE";
export const ERR_FLOAT_WIDTH = "ERR_FLOAT_WIDTH";
export const ERR_KEY_ORDER = "ERR_KEY_ORDER";
export const ERR_DUPLICATE_KEY = "ERR_DUPLICATE_KEY";
export const ERR_FLOAT_RANGE = "ERR_FLOAT_RANGE";
export const ERR_MAP_KEY_TYPE = "ERR_MAP_KEY_TYPE";
export const ERR_LINK = "ERR_LINK";
export const ERR_VALUE_RANGE = "ERR_VALUE_RANGE";
export const ERR_UNSUPPORTED_VALUE = "ERR_UNSUPPORTED_VALUE";
export const ERR_TRAILING_DATA = "ERR_TRAILING_DATA";

export type CodecErrorCode =
  | typeof ERR_UNEXPECTED_END
  | typeof ERR_NON_MINIMAL
  | typeof ERR_MALFORMED
  | typeof ERR_INDEFINITE_LENGTH
  | typeof ERR_UTF8
  | typeof ERR_UNSUPPORTED_TAG
  | typeof ERR_SIMPLE_VALUE
  | typeof ERR_FLOAT_WIDTH
  | typeof ERR_KEY_ORDER
  | typeof ERR_DUPLICATE_KEY
  | typeof ERR_FLOAT_RANGE
  | typeof ERR_MAP_KEY_TYPE
  | typeof ERR_LINK
  | typeof ERR_VALUE_RANGE
  | typeof ERR_UNSUPPORTED_VALUE
  | typeof ERR_TRAILING_DATA;

export type CodecErrorKind =
  | "bounds"
  | "malformed"
  | "order"
  | "range"
  | "unsupported"
  | "trailing";

const KIND_BY_CODE: Record<CodecErrorCode, CodecErrorKind> = {
  ERR_UNEXPECTED_END: "bounds",
  ERR_NON_MINIMAL: "malformed",
  ERR_MALFORMED: "malformed",
  ERR_INDEFINITE_LENGTH: "malformed",
  ERR_UTF8: "malformed",
  ERR_UNSUPPORTED_TAG: "malformed",
  ERR_SIMPLE_VALUE: "malformed",
  ERR_FLOAT_WIDTH: "malformed",
  ERR_KEY_ORDER: "order",
  ERR_DUPLICATE_KEY: "order",
  ERR_FLOAT_RANGE: "range",
  ERR_MAP_KEY_TYPE: "range",
  ERR_LINK: "range",
  ERR_VALUE_RANGE: "range",
  ERR_UNSUPPORTED_VALUE: "unsupported",
  ERR_TRAILING_DATA: "trailing",
};

export class CodecError extends Error {
  readonly code: CodecErrorCode;
  readonly kind: CodecErrorKind;

  constructor(code: CodecErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.kind = KIND_BY_CODE[code];
    this.name = "CodecError";
  }
}

export class EncodeError extends CodecError {
  /** Location of the offending value, e.g. `$.items[2].name`. */
  readonly path: string;

  constructor(code: CodecErrorCode, message: string, path: string, options?: { cause?: unknown }) {
    super(code, `${message} (at ${path})`, options);
    this.path = path;
    this.name = "EncodeError";
  }
}

export interface DecodeErrorContext {
  /** Byte offset of the item being decoded when the failure happened. */
  offset: number;
  /** Array index / map key being filled, e.g. `$.links[0]`. */
  path: string;
  /** Bytes not yet consumed at the point of failure. */
  remainder: Uint8Array;
  cause?: unknown;
}

export class DecodeError extends CodecError {
  readonly offset: number;
  readonly path: string;
  readonly remainder: Uint8Array;

  constructor(code: CodecErrorCode, message: string, context: DecodeErrorContext) {
    super(code, `${message} (at byte ${context.offset}, ${context.path})`, {
      cause: context.cause,
    });
    this.offset = context.offset;
    this.path = context.path;
    this.remainder = context.remainder;
    this.name = "DecodeError";
  }
}

// ── CID codes ──────────────────────────────────────────────────────

export const ERR_CID_PREFIX = "ERR_CID_PREFIX";
export const ERR_CID_LENGTH = "ERR_CID_LENGTH";
export const ERR_CID_ENCODING = "ERR_CID_ENCODING";
export const ERR_CID_VERSION = "ERR_CID_VERSION";
export const ERR_CID_CODEC = "ERR_CID_CODEC";
export const ERR_CID_HASH = "ERR_CID_HASH";
export const ERR_CID_DIGEST_SIZE = "ERR_CID_DIGEST_SIZE";
export const ERR_CID_TRUNCATED = "ERR_CID_TRUNCATED";
export const ERR_CID_TRAILING = "ERR_CID_TRAILING";
export const ERR_CID_BINARY_PREFIX = "ERR_CID_BINARY_PREFIX";

export type CidErrorCode =
  | typeof ERR_CID_PREFIX
  | typeof ERR_CID_LENGTH
  | typeof ERR_CID_ENCODING
  | typeof ERR_CID_VERSION
  | typeof ERR_CID_CODEC
  | typeof ERR_CID_HASH
  | typeof ERR_CID_DIGEST_SIZE
  | typeof ERR_CID_TRUNCATED
  | typeof ERR_CID_TRAILING
  | typeof ERR_CID_BINARY_PREFIX;

export class CidError extends Error {
  readonly code: CidErrorCode;

  constructor(code: CidErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.code = code;
    this.name = "CidError";
  }
}
