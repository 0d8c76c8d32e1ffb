/**
 * @tally/cli — Structured logging.
 *
 * pino logger writing JSON lines to stderr, so that the report on
 * stdout is never interleaved with log output.
 */

import pino from "pino";
import type { DestinationStream, Logger } from "pino";
import type { AppConfig } from "./config.js";

const STDERR_FD = 2;

export type LoggerConfig = Pick<AppConfig, "LOG_LEVEL" | "LOG_PRETTY">;

/**
 * Create the process logger.
 *
 * JSON output goes to `destination`, or to stderr when none is given.
 * Pretty output runs in the pino-pretty transport worker, which can only
 * write to a file descriptor, so it always goes to stderr and takes no
 * destination.
 */
export function createLogger(
  config: LoggerConfig & { readonly LOG_PRETTY: false },
  destination?: DestinationStream,
): Logger;
export function createLogger(config: LoggerConfig): Logger;
export function createLogger(config: LoggerConfig, destination?: DestinationStream): Logger {
  if (config.LOG_PRETTY) {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: STDERR_FD } },
    });
  }

  return pino(
    { level: config.LOG_LEVEL, base: { name: "tally" } },
    destination ?? pino.destination(STDERR_FD),
  );
}
