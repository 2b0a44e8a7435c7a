/**
 * dagkit CLI — content identifiers, canonical DAG-CBOR and TIDs from the shell.
 *
 * Commands:
 *   cid <file> [--codec c]      CID of a file's bytes (raw or dag-cbor)
 *   inspect <cid>               Print version / codec / hash / digest
 *   encode <json-file> [-o f]   JSON → canonical CBOR hex + CID
 *   decode <hex|file> [--file]  Canonical CBOR → JSON
 *   tid [-n count]              Print strictly increasing TIDs
 *
 * Environment: DAGKIT_CLOCK_ID, DAGKIT_MAX_INPUT_BYTES, DAGKIT_DEFAULT_CODEC.
 */

import { Command } from "commander";
import { loadConfig } from "./lib/config.js";
import { cidCommand } from "./commands/cid.js";
import { inspectCommand } from "./commands/inspect.js";
import { encodeCommand } from "./commands/encode.js";
import { decodeCommand } from "./commands/decode.js";
import { tidCommand } from "./commands/tid.js";

const program = new Command();

program
  .name("dagkit")
  .description("Canonical DAG-CBOR, CIDs and TIDs")
  .version("0.1.0");

// ── cid ─────────────────────────────────────────────────────────────

program
  .command("cid")
  .description("Print the CID of a file's bytes")
  .argument("<file>", "File to hash")
  .option("--codec <codec>", "raw | dag-cbor (default: DAGKIT_DEFAULT_CODEC or raw)")
  .action(async (file: string, opts: { codec?: string }) => {
    console.log(await cidCommand(file, loadConfig(), opts));
  });

// ── inspect ─────────────────────────────────────────────────────────

program
  .command("inspect")
  .description("Parse a CID and print its fields")
  .argument("<cid>", "CID text form (b...)")
  .action((cid: string) => {
    console.log(inspectCommand(cid));
  });

// ── encode ──────────────────────────────────────────────────────────

program
  .command("encode")
  .description("Encode a JSON file as canonical DAG-CBOR → print CID + hex")
  .argument("<json-file>", "JSON object; {\"$link\"} and {\"$bytes\"} are recognised")
  .option("-o, --output <file>", "Also write the encoded bytes to a file")
  .action(async (file: string, opts: { output?: string }) => {
    console.log(await encodeCommand(file, loadConfig(), opts));
  });

// ── decode ──────────────────────────────────────────────────────────

program
  .command("decode")
  .description("Decode canonical DAG-CBOR → JSON")
  .argument("<input>", "Hex string, or a file path with --file")
  .option("--file", "Read binary input from a file")
  .action(async (input: string, opts: { file?: boolean }) => {
    console.log(await decodeCommand(input, loadConfig(), opts));
  });

// ── tid ─────────────────────────────────────────────────────────────

program
  .command("tid")
  .description("Print strictly increasing TIDs")
  .option("-n, --count <n>", "How many", "1")
  .option("--clock-id <id>", "Clock id 0–1023 (default: DAGKIT_CLOCK_ID or 0)")
  .action((opts: { count?: string; clockId?: string }) => {
    console.log(tidCommand(loadConfig(), opts));
  });

// ── Run ─────────────────────────────────────────────────────────────

program.parseAsync(process.argv).catch((err: Error) => {
  console.error(`\nError: ${err.message}`);
  process.exit(1);
});
