/**
 * @tally/cli — CSV front end for the replay engine.
 *
 * The `tally` binary lives in main.ts and runs runCli(); this module
 * exposes runCli and its building blocks for embedding and tests.
 */

export { runCli } from "./cli.js";
export type { CliIo } from "./cli.js";

export { loadConfig, ConfigSchema } from "./config.js";
export type { AppConfig } from "./config.js";

export { createLogger } from "./logger.js";
export type { LoggerConfig } from "./logger.js";

export { parseArgs, CliArgsSchema } from "./args.js";
export type { CliArgs } from "./args.js";

export { parseRecordLine, readRecords } from "./record-reader.js";
export type { ParsedLine, ReadRecordsOptions } from "./record-reader.js";

export {
  CSV_HEADER,
  formatCsvReport,
  formatJsonReport,
  formatReport,
  writeReport,
} from "./report-writer.js";
export type { ReportFormat } from "./report-writer.js";

export { processInput } from "./run.js";
export type { ProcessInputOptions, RunResult } from "./run.js";

export { formatSummary, formatFatal } from "./summary.js";
