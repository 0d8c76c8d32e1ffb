/**
 * @tally/ledger — Transaction processor.
 *
 * The state machine that applies one transaction record at a time to an
 * owned account store and transaction log.
 *
 * API surface:
 * - apply() — Apply a single record, returning an ApplyOutcome
 * - snapshot() — Export every account, ascending by client ID
 * - getAccount() / getEntry() — Read-only lookups
 *
 * A rejected record changes no balance, lock flag or log entry.
 * Every check runs before the first write.
 */

import type {
  AccountSnapshot,
  ChargebackRecord,
  ClientId,
  DepositRecord,
  DisputeActionRecord,
  DisputeRecord,
  FundsMovementRecord,
  ResolveRecord,
  TransactionRecord,
  TxId,
  WithdrawalRecord,
} from "@tally/types";
import { AccountStore, toSnapshot } from "./accounts.js";
import { AMOUNT_DECIMALS, checkedAdd, checkedSub, formatAmount, quantizeAmount } from "./money-math.js";
import { TransactionLog } from "./transaction-log.js";
import type { AccountState, ApplyOutcome, LogEntry } from "./types.js";
import { ProcessingError } from "./types.js";

/**
 * Sequential replay engine for deposits, withdrawals and the
 * dispute → resolve | chargeback lifecycle.
 */
export class TransactionProcessor {
  private readonly _accounts: AccountStore = new AccountStore();
  private readonly _log: TransactionLog = new TransactionLog();

  // ─── Apply (The Only Write Operation) ────────────────────────────────

  /**
   * Apply one record.
   *
   * Business-rule failures come back as `{ ok: false, error }`.
   * Anything else thrown while applying is unexpected and propagates.
   */
  apply(record: TransactionRecord): ApplyOutcome {
    try {
      return { ok: true, account: toSnapshot(this._process(record)) };
    } catch (err: unknown) {
      if (err instanceof ProcessingError) {
        return { ok: false, error: withRecordRef(err, record) };
      }
      throw err;
    }
  }

  private _process(record: TransactionRecord): AccountState {
    const account = this._accounts.open(record.clientId);

    if (account.locked) {
      throw new ProcessingError(
        "ACCOUNT_LOCKED",
        `Account ${String(record.clientId)} is locked`,
        { clientId: record.clientId, txId: record.txId },
      );
    }

    switch (record.kind) {
      case "deposit":
        return this._deposit(account, record);
      case "withdrawal":
        return this._withdraw(account, record);
      case "dispute":
        return this._dispute(account, record);
      case "resolve":
        return this._resolve(account, record);
      case "chargeback":
        return this._chargeback(account, record);
      default:
        return assertNever(record);
    }
  }

  // ─── Funds Movements ─────────────────────────────────────────────────

  private _deposit(account: AccountState, record: DepositRecord): AccountState {
    const amount = parseMovementAmount(record);
    this._assertUnusedTxId(record);
    const available = checkedAdd(account.available, amount);

    this._recordMovement(record, amount);
    return this._accounts.commit({ ...account, available });
  }

  private _withdraw(account: AccountState, record: WithdrawalRecord): AccountState {
    const amount = parseMovementAmount(record);
    this._assertUnusedTxId(record);

    if (amount > account.available) {
      throw new ProcessingError(
        "INSUFFICIENT_FUNDS",
        `Withdrawal of ${formatAmount(amount, AMOUNT_DECIMALS)} exceeds available ${formatAmount(account.available, AMOUNT_DECIMALS)}`,
        { clientId: record.clientId, txId: record.txId },
      );
    }
    const available = checkedSub(account.available, amount);

    this._recordMovement(record, amount);
    return this._accounts.commit({ ...account, available });
  }

  private _assertUnusedTxId(record: FundsMovementRecord): void {
    if (this._log.has(record.txId)) {
      throw new ProcessingError(
        "DUPLICATE_TRANSACTION",
        `Transaction already recorded: ${String(record.txId)}`,
        { clientId: record.clientId, txId: record.txId },
      );
    }
  }

  private _recordMovement(record: FundsMovementRecord, amount: bigint): void {
    this._log.record({
      txId: record.txId,
      clientId: record.clientId,
      kind: record.kind,
      amount,
      disputeState: "none",
    });
  }

  // ─── Dispute Lifecycle ───────────────────────────────────────────────

  private _dispute(account: AccountState, record: DisputeRecord): AccountState {
    const entry = this._lookup(record);

    if (entry.kind === "withdrawal") {
      throw notDisputable(record, "withdrawals cannot be disputed");
    }

    switch (entry.disputeState) {
      case "none":
        break;
      case "disputed":
        throw notDisputable(record, "already under dispute");
      case "charged_back":
        throw notDisputable(record, "already charged back");
      default:
        return assertNever(entry.disputeState);
    }

    const available = checkedSub(account.available, entry.amount);
    const held = checkedAdd(account.held, entry.amount);

    this._log.transition(entry.txId, "disputed");
    return this._accounts.commit({ ...account, available, held });
  }

  private _resolve(account: AccountState, record: ResolveRecord): AccountState {
    const entry = this._lookupDisputed(record);
    const held = checkedSub(account.held, entry.amount);
    const available = checkedAdd(account.available, entry.amount);

    this._log.transition(entry.txId, "none");
    return this._accounts.commit({ ...account, available, held });
  }

  private _chargeback(account: AccountState, record: ChargebackRecord): AccountState {
    const entry = this._lookupDisputed(record);
    const held = checkedSub(account.held, entry.amount);

    this._log.transition(entry.txId, "charged_back");
    return this._accounts.commit({ ...account, held, locked: true });
  }

  /**
   * Find the referenced entry and check it belongs to the record's client.
   */
  private _lookup(record: DisputeActionRecord): LogEntry {
    const entry = this._log.assertExists(record.txId);
    if (entry.clientId !== record.clientId) {
      throw new ProcessingError(
        "CLIENT_MISMATCH",
        `Transaction ${String(record.txId)} belongs to client ${String(entry.clientId)}, not ${String(record.clientId)}`,
        { clientId: record.clientId, txId: record.txId },
      );
    }
    return entry;
  }

  private _lookupDisputed(record: ResolveRecord | ChargebackRecord): LogEntry {
    const entry = this._lookup(record);
    if (entry.disputeState !== "disputed") {
      throw new ProcessingError(
        "NOT_DISPUTED",
        `Transaction ${String(record.txId)} is not under dispute`,
        { clientId: record.clientId, txId: record.txId },
      );
    }
    return entry;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getAccount(clientId: ClientId): AccountSnapshot | undefined {
    const account = this._accounts.get(clientId);
    return account === undefined ? undefined : toSnapshot(account);
  }

  getEntry(txId: TxId): LogEntry | undefined {
    return this._log.get(txId);
  }

  /**
   * Every account, ascending by client ID.
   */
  snapshot(): readonly AccountSnapshot[] {
    return this._accounts.snapshot();
  }

  get accountCount(): number {
    return this._accounts.count;
  }

  get entryCount(): number {
    return this._log.count;
  }
}

// ─── Helpers ─────────────────────────────────────────────────────────────

/**
 * Quantize a movement amount to AMOUNT_DECIMALS and reject negatives.
 * A missing amount arrives as an empty string and fails the format check.
 */
function parseMovementAmount(record: FundsMovementRecord): bigint {
  const amount = quantizeAmount(record.amount, AMOUNT_DECIMALS);
  if (amount < 0n) {
    throw new ProcessingError(
      "INVALID_AMOUNT",
      `Amount must not be negative, got "${record.amount}"`,
      { clientId: record.clientId, txId: record.txId },
    );
  }
  return amount;
}

function notDisputable(record: DisputeRecord, reason: string): ProcessingError {
  return new ProcessingError(
    "NOT_DISPUTABLE",
    `Transaction ${String(record.txId)} cannot be disputed: ${reason}`,
    { clientId: record.clientId, txId: record.txId },
  );
}

/**
 * Fill in the record's identifiers on errors raised by helpers
 * that do not know which record they were working on.
 */
function withRecordRef(error: ProcessingError, record: TransactionRecord): ProcessingError {
  if (error.clientId !== undefined && error.txId !== undefined) {
    return error;
  }
  return new ProcessingError(error.code, error.message, {
    clientId: record.clientId,
    txId: record.txId,
  });
}

function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}
