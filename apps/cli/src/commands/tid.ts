/**
 * dagkit tid [--count n] [--clock-id n]
 *
 * Print strictly increasing TIDs from one clock.
 */

import { TidClock, type MicrosSource } from "@dagkit/tid";
import type { CliConfig } from "../lib/config.js";

interface TidOptions {
  count?: string;
  clockId?: string;
}

const MAX_COUNT = 10_000;

export function tidCommand(
  config: CliConfig,
  opts: TidOptions = {},
  micros?: MicrosSource,
): string {
  const count = parseInt(opts.count ?? "1", 10);
  if (isNaN(count) || count < 1 || count > MAX_COUNT) {
    throw new Error(`--count must be 1–${MAX_COUNT}`);
  }
  const clockId = opts.clockId !== undefined ? parseInt(opts.clockId, 10) : config.clockId;
  if (isNaN(clockId)) throw new Error("--clock-id must be an integer");

  const clock = new TidClock(clockId, micros);
  return Array.from({ length: count }, () => clock.now()).join("\n");
}
