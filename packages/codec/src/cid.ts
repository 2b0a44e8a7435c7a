/**
 * Content identifiers (CIDv1, SHA-256).
 *
 * Binary layout: [version=1, codec, hashType=0x12, digestLength] ++ digest
 *   codec        0x55 (raw) or 0x71 (dag-cbor)
 *   digestLength 32, or 0 for the empty CID
 *
 * Text form:   "b" + unpadded base32 (sorted alphabet) of the binary layout
 * Binary form: 0x00 ++ binary layout (as embedded in tag 42)
 */

import { sha256 } from "@noble/hashes/sha256";
import { bytesToHex } from "@noble/hashes/utils";
import { base32Decode, base32Encode } from "./base32.js";
import {
  CID_BINARY_PREFIX,
  CID_HEADER_LENGTH,
  CID_TEXT_LENGTH_EMPTY,
  CID_TEXT_LENGTH_SHA256,
  CID_TEXT_PREFIX,
  CID_VERSION,
  CODEC_DAG_CBOR,
  CODEC_RAW,
  HASH_SHA256,
  SHA256_DIGEST_LENGTH,
} from "./constants.js";
import {
  CidError,
  ERR_CID_BINARY_PREFIX,
  ERR_CID_CODEC,
  ERR_CID_DIGEST_SIZE,
  ERR_CID_ENCODING,
  ERR_CID_HASH,
  ERR_CID_LENGTH,
  ERR_CID_PREFIX,
  ERR_CID_TRAILING,
  ERR_CID_TRUNCATED,
  ERR_CID_VERSION,
} from "./errors.js";

export type CidCodec = typeof CODEC_RAW | typeof CODEC_DAG_CBOR;

export class Cid {
  readonly version = CID_VERSION;
  readonly hashType = HASH_SHA256;
  readonly codec: CidCodec;
  /** Private copy of the binary layout; never handed out. */
  private readonly raw: Uint8Array;

  /**
   * Validates `bytes` as a binary layout and keeps a copy.
   *
   * @throws CidError naming the structural check that failed
   */
  constructor(bytes: Uint8Array) {
    this.raw = bytes.slice();
    this.codec = checkLayout(this.raw);
  }

  /** Full binary layout, header included (a fresh copy). */
  get bytes(): Uint8Array {
    return this.raw.slice();
  }

  /** Raw digest; empty for the empty CID (a fresh copy). */
  get digest(): Uint8Array {
    return this.raw.slice(CID_HEADER_LENGTH);
  }

  /** True for the placeholder CID whose digest length is 0. */
  get isEmpty(): boolean {
    return this.raw.length === CID_HEADER_LENGTH;
  }

  toString(): string {
    return formatCid(this);
  }

  toJSON(): { $link: string } {
    return { $link: formatCid(this) };
  }

  equals(other: Cid): boolean {
    return cidEquals(this, other);
  }
}

export function isCidCodec(codec: number): codec is CidCodec {
  return codec === CODEC_RAW || codec === CODEC_DAG_CBOR;
}

function assertCodec(codec: number): asserts codec is CidCodec {
  if (!isCidCodec(codec)) {
    throw new CidError(ERR_CID_CODEC, `invalid codec 0x${codec.toString(16)}`);
  }
}

/** Structural checks on a binary layout; returns its codec. */
function checkLayout(bytes: Uint8Array): CidCodec {
  if (bytes.length < CID_HEADER_LENGTH) {
    throw new CidError(ERR_CID_TRUNCATED, `cid too short: ${bytes.length} bytes`);
  }

  const [version = 0, codec = 0, hashType = 0, digestSize = 0] = bytes;

  if (version !== CID_VERSION) {
    throw new CidError(ERR_CID_VERSION, `invalid cid version ${version}`);
  }
  assertCodec(codec);
  if (hashType !== HASH_SHA256) {
    throw new CidError(ERR_CID_HASH, `invalid hash type 0x${hashType.toString(16)}`);
  }
  if (digestSize !== SHA256_DIGEST_LENGTH && digestSize !== 0) {
    throw new CidError(ERR_CID_DIGEST_SIZE, `invalid digest size ${digestSize}`);
  }

  const end = CID_HEADER_LENGTH + digestSize;
  if (bytes.length < end) {
    throw new CidError(
      ERR_CID_TRUNCATED,
      `cid too short: digest needs ${digestSize} bytes, have ${bytes.length - CID_HEADER_LENGTH}`,
    );
  }
  if (bytes.length > end) {
    throw new CidError(ERR_CID_TRAILING, `cid has ${bytes.length - end} trailing bytes`);
  }
  return codec;
}

// ── Construction ───────────────────────────────────────────────────

/** CID of `content` under `codec`: digest = SHA256(content). */
export function createCid(codec: number, content: Uint8Array): Cid {
  assertCodec(codec);
  const bytes = new Uint8Array(CID_HEADER_LENGTH + SHA256_DIGEST_LENGTH);
  bytes[0] = CID_VERSION;
  bytes[1] = codec;
  bytes[2] = HASH_SHA256;
  bytes[3] = SHA256_DIGEST_LENGTH;
  bytes.set(sha256(content), CID_HEADER_LENGTH);
  return new Cid(bytes);
}

/** Placeholder CID with a zero-length digest (4 bytes total). */
export function createEmptyCid(codec: number): Cid {
  assertCodec(codec);
  return new Cid(new Uint8Array([CID_VERSION, codec, HASH_SHA256, 0]));
}

// ── Binary layout ──────────────────────────────────────────────────

/** Decode the binary layout (no multibase prefix). */
export function cidFromBytes(input: Uint8Array): Cid {
  return new Cid(input);
}

/** Parse the 0x00-prefixed form used inside tag 42 (5 or 37 bytes). */
export function cidFromBinary(input: Uint8Array): Cid {
  if (
    input.length !== CID_HEADER_LENGTH + 1 &&
    input.length !== CID_HEADER_LENGTH + SHA256_DIGEST_LENGTH + 1
  ) {
    throw new CidError(ERR_CID_LENGTH, `invalid binary cid length ${input.length}`);
  }
  if (input[0] !== CID_BINARY_PREFIX) {
    throw new CidError(
      ERR_CID_BINARY_PREFIX,
      `binary cid must start with 0x00, got 0x${(input[0] ?? 0).toString(16).padStart(2, "0")}`,
    );
  }
  return cidFromBytes(input.subarray(1));
}

/** 0x00 ++ cid.bytes */
export function cidToBinary(cid: Cid): Uint8Array {
  const bytes = cid.bytes;
  const out = new Uint8Array(bytes.length + 1);
  out[0] = CID_BINARY_PREFIX;
  out.set(bytes, 1);
  return out;
}

// ── Text form ──────────────────────────────────────────────────────

export function parseCid(text: string): Cid {
  if (text.length < 2 || !text.startsWith(CID_TEXT_PREFIX)) {
    throw new CidError(ERR_CID_PREFIX, "cid must start with 'b'");
  }
  // 4 bytes → 7 chars, 36 bytes → 58 chars, plus the prefix
  if (text.length !== CID_TEXT_LENGTH_EMPTY && text.length !== CID_TEXT_LENGTH_SHA256) {
    throw new CidError(ERR_CID_LENGTH, `invalid cid length ${text.length}`);
  }

  let bytes: Uint8Array;
  try {
    bytes = base32Decode(text.slice(1));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new CidError(ERR_CID_ENCODING, `invalid base32 in cid: ${reason}`, { cause: err });
  }

  return cidFromBytes(bytes);
}

export function formatCid(cid: Cid): string {
  return CID_TEXT_PREFIX + base32Encode(cid.bytes);
}

// ── Helpers ────────────────────────────────────────────────────────

export function isCid(value: unknown): value is Cid {
  return value instanceof Cid;
}

export function cidEquals(a: Cid, b: Cid): boolean {
  const x = a.bytes;
  const y = b.bytes;
  if (x.length !== y.length) return false;
  for (let i = 0; i < x.length; i++) {
    if (x[i] !== y[i]) return false;
  }
  return true;
}

/** Hex digest, handy for logs and storage keys. */
export function cidDigestHex(cid: Cid): string {
  return bytesToHex(cid.digest);
}
