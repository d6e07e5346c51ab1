// One-shot cross-section volume report.
//
//   tsx apps/cli/src/run_once.ts --snapshot doc.json --alignment AL-1 [--profile default] [--log-level info]
//
// The report goes to stdout, logs go to stderr.

import process from "node:process";

import pino from "pino";

import { resolveRepoRoot } from "../../server/src/config/env";
import { parseArgs } from "./args";
import { runOnce } from "./run";

function main(): number {
  const args = parseArgs(process.argv.slice(2));
  const logger = pino({ name: "earthwork-cli", level: args.logLevel }, pino.destination(2));
  return runOnce(args, {
    repoRoot: resolveRepoRoot(),
    logger,
    write: (text) => process.stdout.write(text)
  });
}

try {
  process.exitCode = main();
} catch (err) {
  console.error(`FAIL: ${err instanceof Error ? err.message : String(err)}`);
  process.exitCode = 1;
}
