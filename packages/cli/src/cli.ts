/**
 * @tally/cli — Command wiring.
 *
 * Config, logger, arguments and the replay, bound to injectable streams.
 * main.ts hands it the real process; tests hand it captures.
 */

import { createReadStream } from "node:fs";
import { access, constants } from "node:fs/promises";
import type { Writable } from "node:stream";
import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import { parseArgs } from "./args.js";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { processInput } from "./run.js";
import { formatFatal, formatSummary } from "./summary.js";

export interface CliIo {
  /** Arguments without the node binary and script path */
  readonly argv: readonly string[];
  readonly env: Record<string, string | undefined>;
  /** Receives the report */
  readonly stdout: Writable;
  /** Receives JSON logs, the summary and fatal errors */
  readonly stderr: Writable;
}

/**
 * Run the `tally` command and resolve to its exit code.
 */
export async function runCli(io: CliIo, paint: ChalkInstance = chalk): Promise<number> {
  try {
    const config = loadConfig(io.env);
    const logger = config.LOG_PRETTY
      ? createLogger(config)
      : createLogger({ LOG_LEVEL: config.LOG_LEVEL, LOG_PRETTY: false }, io.stderr);
    const args = await parseArgs(io.argv);

    // Fail before streaming so a missing file is reported as such
    await access(args.file, constants.R_OK);

    logger.info({ file: args.file, format: args.format }, "Replay started");
    const result = await processInput(createReadStream(args.file), io.stdout, {
      format: args.format,
      logger,
    });

    if (args.summary) {
      io.stderr.write(formatSummary(result, paint) + "\n");
    }
    return 0;
  } catch (err: unknown) {
    io.stderr.write(formatFatal(err, paint) + "\n");
    return 1;
  }
}
