/**
 * Monotonic TID source.
 *
 * Each clock remembers the last timestamp it issued. When the time source
 * has not moved past it (same microsecond, or the wall clock stepped
 * back) the clock issues last + 1 instead, so TIDs from one clock are
 * strictly increasing.
 */

import { ERR_TID_CLOCK_ID, TidError } from "./errors.js";
import { createTid, MAX_CLOCK_ID } from "./tid.js";

/** Current time in microseconds since the Unix epoch. */
export type MicrosSource = () => number;

export const systemMicros: MicrosSource = () => Date.now() * 1000;

export class TidClock {
  private last = 0;

  constructor(
    readonly clockId: number = 0,
    private readonly micros: MicrosSource = systemMicros,
  ) {
    if (!Number.isInteger(clockId) || clockId < 0 || clockId > MAX_CLOCK_ID) {
      throw new TidError(ERR_TID_CLOCK_ID, `clock id must be 0-${MAX_CLOCK_ID}, got ${clockId}`);
    }
  }

  /** Timestamp of the most recent TID, 0 before the first. */
  get lastTimestamp(): number {
    return this.last;
  }

  now(): string {
    const current = this.micros();
    this.last = current > this.last ? current : this.last + 1;
    return createTid(this.last, this.clockId);
  }
}
