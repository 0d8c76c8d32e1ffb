/**
 * @tally/ledger — Replay driver.
 *
 * Feeds a lazy record sequence through a TransactionProcessor, one record
 * at a time, in input order. Rejections are counted and reported through
 * hooks; they never stop the replay. Unexpected errors propagate.
 */

import type { TransactionRecord } from "@tally/types";
import type { TransactionProcessor } from "./processor.js";
import type { ProcessingErrorCode, ReplayHooks, ReplaySummary } from "./types.js";

/**
 * Mutable tally behind a ReplaySummary.
 */
class SummaryCollector {
  private _applied = 0;
  private _rejected = 0;
  private readonly _byCode = new Map<ProcessingErrorCode, number>();

  accept(processor: TransactionProcessor, record: TransactionRecord, hooks: ReplayHooks): void {
    const outcome = processor.apply(record);
    if (outcome.ok) {
      this._applied++;
      return;
    }

    this._rejected++;
    this._byCode.set(outcome.error.code, (this._byCode.get(outcome.error.code) ?? 0) + 1);
    hooks.onRejected?.(record, outcome.error);
  }

  summary(): ReplaySummary {
    const rejectionsByCode: Partial<Record<ProcessingErrorCode, number>> = {};
    for (const [code, count] of this._byCode) {
      rejectionsByCode[code] = count;
    }
    return {
      applied: this._applied,
      rejected: this._rejected,
      rejectionsByCode,
    };
  }
}

/**
 * Replay a synchronous record sequence.
 */
export function replay(
  processor: TransactionProcessor,
  records: Iterable<TransactionRecord>,
  hooks: ReplayHooks = {},
): ReplaySummary {
  const collector = new SummaryCollector();
  for (const record of records) {
    collector.accept(processor, record, hooks);
  }
  return collector.summary();
}

/**
 * Replay an asynchronous record sequence (e.g. a file being read).
 * Awaits only between records; each apply() is synchronous.
 */
export async function replayAsync(
  processor: TransactionProcessor,
  records: AsyncIterable<TransactionRecord>,
  hooks: ReplayHooks = {},
): Promise<ReplaySummary> {
  const collector = new SummaryCollector();
  for await (const record of records) {
    collector.accept(processor, record, hooks);
  }
  return collector.summary();
}
