/**
 * @tally/ledger — Transaction log.
 *
 * Retains every accepted deposit and withdrawal so that later dispute,
 * resolve and chargeback records can reference them by txId.
 *
 * Rules:
 * - A txId is consumed exactly once; reuse is rejected, never overwritten
 * - Entries are never removed
 * - Only the dispute state of an entry ever changes
 */

import type { TxId } from "@tally/types";
import type { DisputeState, LogEntry } from "./types.js";
import { ProcessingError } from "./types.js";

export class TransactionLog {
  private readonly _entries: Map<TxId, LogEntry> = new Map();

  /**
   * Insert a new entry.
   * Throws if the txId has already been used by a deposit or withdrawal.
   */
  record(entry: LogEntry): LogEntry {
    if (this._entries.has(entry.txId)) {
      throw new ProcessingError(
        "DUPLICATE_TRANSACTION",
        `Transaction already recorded: ${String(entry.txId)}`,
        { clientId: entry.clientId, txId: entry.txId },
      );
    }

    const stored: LogEntry = { ...entry };
    this._entries.set(entry.txId, stored);
    return stored;
  }

  get(txId: TxId): LogEntry | undefined {
    return this._entries.get(txId);
  }

  has(txId: TxId): boolean {
    return this._entries.has(txId);
  }

  /**
   * Get an entry by txId. Throws if it was never recorded.
   */
  assertExists(txId: TxId): LogEntry {
    const entry = this._entries.get(txId);
    if (entry === undefined) {
      throw new ProcessingError(
        "UNKNOWN_TRANSACTION",
        `Unknown transaction: ${String(txId)}`,
        { txId },
      );
    }
    return entry;
  }

  /**
   * Replace the dispute state of an entry.
   */
  transition(txId: TxId, disputeState: DisputeState): LogEntry {
    const next: LogEntry = { ...this.assertExists(txId), disputeState };
    this._entries.set(txId, next);
    return next;
  }

  get count(): number {
    return this._entries.size;
  }
}
