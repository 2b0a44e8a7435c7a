/**
 * TIDs — 13-character, lexically sortable timestamp identifiers.
 *
 * Layout (64 bits, top bit always 0):
 *   bits 62..10  timestamp, microseconds since the Unix epoch (53 bits)
 *   bits  9..0   clock id (10 bits)
 *
 * Text: 13 base32 digits over the sorted alphabet, big-endian. The first
 * 11 characters carry the timestamp, the last 2 the clock id.
 */

import { b32DecodeInt, b32EncodeInt } from "./b32.js";
import {
  ERR_TID_CLOCK_ID,
  ERR_TID_FORMAT,
  ERR_TID_LENGTH,
  ERR_TID_TIMESTAMP,
  TidError,
} from "./errors.js";

export const TID_LENGTH = 13;
export const MAX_CLOCK_ID = 0x3ff;

const TIMESTAMP_MASK = 0x1f_ffff_ffff_ffffn;
const TOP_BIT_CLEAR = 0x7fff_ffff_ffff_ffffn;
const TID_PATTERN = /^[234567abcdefghij][234567abcdefghijklmnopqrstuvwxyz]{12}$/;

export interface ParsedTid {
  /** Microseconds since the Unix epoch. */
  timestamp: number;
  clockId: number;
}

export function createTid(timestamp: number, clockId: number): string {
  if (!Number.isSafeInteger(timestamp) || timestamp < 0) {
    throw new TidError(ERR_TID_TIMESTAMP, `timestamp must be a non-negative safe integer, got ${timestamp}`);
  }
  if (!Number.isInteger(clockId)) {
    throw new TidError(ERR_TID_CLOCK_ID, `clock id must be an integer, got ${clockId}`);
  }

  const ts = BigInt(timestamp) & TIMESTAMP_MASK;
  const id = BigInt(clockId) & BigInt(MAX_CLOCK_ID);
  return b32EncodeInt(((ts << 10n) | id) & TOP_BIT_CLEAR, TID_LENGTH);
}

export function validateTid(text: string): void {
  if (text.length !== TID_LENGTH) {
    throw new TidError(ERR_TID_LENGTH, `TID must be ${TID_LENGTH} characters, got ${text.length}`);
  }
  if (!TID_PATTERN.test(text)) {
    throw new TidError(ERR_TID_FORMAT, `TID has invalid format: ${JSON.stringify(text)}`);
  }
}

export function isValidTid(text: string): boolean {
  return text.length === TID_LENGTH && TID_PATTERN.test(text);
}

export function parseTid(text: string): ParsedTid {
  validateTid(text);
  const timestamp = b32DecodeInt(text.slice(0, 11));
  if (timestamp > BigInt(Number.MAX_SAFE_INTEGER)) {
    throw new TidError(ERR_TID_TIMESTAMP, `TID timestamp ${timestamp} exceeds the safe integer range`);
  }
  return {
    timestamp: Number(timestamp),
    clockId: Number(b32DecodeInt(text.slice(11))),
  };
}
