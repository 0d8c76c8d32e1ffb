/**
 * @tally/cli — Input → replay → report pipeline.
 */

import type { Readable, Writable } from "node:stream";
import type { Logger } from "pino";
import { TransactionProcessor, replayAsync } from "@tally/ledger";
import type { ReplaySummary } from "@tally/ledger";
import { readRecords } from "./record-reader.js";
import type { ReportFormat } from "./report-writer.js";
import { writeReport } from "./report-writer.js";

export interface ProcessInputOptions {
  readonly format: ReportFormat;
  readonly logger: Logger;
}

export interface RunResult extends ReplaySummary {
  /** Rows skipped because they could not be parsed */
  readonly malformed: number;
  /** Accounts in the final report */
  readonly accounts: number;
}

/**
 * Read CSV records from `input`, replay them through a fresh processor,
 * and write the resulting accounts to `output`.
 */
export async function processInput(
  input: Readable,
  output: Writable,
  options: ProcessInputOptions,
): Promise<RunResult> {
  const { logger } = options;
  const processor = new TransactionProcessor();
  let malformed = 0;

  const records = readRecords(input, {
    onMalformed: (lineNumber, line, reason) => {
      malformed++;
      logger.debug({ lineNumber, line, reason }, "Skipping malformed row");
    },
  });

  const summary = await replayAsync(processor, records, {
    onRejected: (record, error) => {
      logger.debug(
        { code: error.code, kind: record.kind, clientId: record.clientId, txId: record.txId },
        `Rejected transaction: ${error.message}`,
      );
    },
  });

  await writeReport(processor.snapshot(), output, options.format);

  const result: RunResult = {
    ...summary,
    malformed,
    accounts: processor.accountCount,
  };
  logger.info(
    {
      applied: result.applied,
      rejected: result.rejected,
      malformed: result.malformed,
      accounts: result.accounts,
    },
    "Replay complete",
  );
  return result;
}
