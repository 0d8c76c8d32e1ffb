#!/usr/bin/env node
/**
 * @tally/cli — Entry point.
 *
 * Replays the input file and writes the account report to stdout.
 * Logs and the optional summary go to stderr.
 */

import { hideBin } from "yargs/helpers";
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli({
    argv: hideBin(process.argv),
    env: process.env,
    stdout: process.stdout,
    stderr: process.stderr,
  });
}

main().catch((err: unknown) => {
  process.stderr.write(`tally: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
