/**
 * CLI configuration — environment variables with defaults.
 *
 * Priority: command-line flags > env vars > defaults.
 */

import { CODEC_DAG_CBOR, CODEC_RAW, type CidCodec } from "@dagkit/codec";
import { MAX_CLOCK_ID } from "@dagkit/tid";

export type Env = Record<string, string | undefined>;

export interface CliConfig {
  /** TID clock id, 0–1023. */
  clockId: number;
  /** Inputs larger than this are refused before reading. */
  maxInputBytes: number;
  /** Codec for `dagkit cid` when --codec is not given. */
  defaultCodec: CidCodec;
}

const DEFAULT_MAX_INPUT_BYTES = 16 * 1024 * 1024;

const CODEC_NAMES = new Map<string, CidCodec>([
  ["raw", CODEC_RAW],
  ["dag-cbor", CODEC_DAG_CBOR],
]);

function env(source: Env, key: string, fallback?: string): string {
  const val = source[key] ?? fallback;
  if (val === undefined) throw new Error(`Missing env: ${key}`);
  return val;
}

function parseIntInRange(key: string, raw: string, min: number, max: number): number {
  const n = Number(raw);
  if (!Number.isInteger(n) || n < min || n > max) {
    throw new Error(`${key} must be an integer in ${min}–${max}, got "${raw}"`);
  }
  return n;
}

/** "raw" | "dag-cbor" → codec number. */
export function parseCodecName(name: string): CidCodec {
  const codec = CODEC_NAMES.get(name);
  if (codec === undefined) {
    throw new Error(`Unknown codec "${name}" (expected: ${[...CODEC_NAMES.keys()].join(", ")})`);
  }
  return codec;
}

export function codecName(codec: CidCodec): string {
  return codec === CODEC_RAW ? "raw" : "dag-cbor";
}

export function loadConfig(source: Env = process.env): CliConfig {
  return Object.freeze({
    clockId: parseIntInRange(
      "DAGKIT_CLOCK_ID",
      env(source, "DAGKIT_CLOCK_ID", "0"),
      0,
      MAX_CLOCK_ID,
    ),
    maxInputBytes: parseIntInRange(
      "DAGKIT_MAX_INPUT_BYTES",
      env(source, "DAGKIT_MAX_INPUT_BYTES", String(DEFAULT_MAX_INPUT_BYTES)),
      1,
      Number.MAX_SAFE_INTEGER,
    ),
    defaultCodec: parseCodecName(env(source, "DAGKIT_DEFAULT_CODEC", "raw")),
  });
}
