/**
 * @dagkit/tid — sortable timestamp identifiers.
 */

export {
  createTid,
  parseTid,
  validateTid,
  isValidTid,
  TID_LENGTH,
  MAX_CLOCK_ID,
  type ParsedTid,
} from "./tid.js";
export { TidClock, systemMicros, type MicrosSource } from "./clock.js";
export { b32EncodeInt, b32DecodeInt, B32_ALPHABET } from "./b32.js";
export * from "./errors.js";
