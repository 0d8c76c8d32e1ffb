/**
 * @tally/ledger — Internal types for the replay engine.
 *
 * These extend the shared @tally/types with engine-specific
 * structures used only within this package.
 *
 * Rules:
 * - All types are readonly; state changes replace whole values
 * - Fail-closed: invalid records throw internally, never silently succeed
 */

import type {
  AccountSnapshot,
  ClientId,
  FundsMovementKind,
  TransactionRecord,
  TxId,
} from "@tally/types";

// ─── Account Types ───────────────────────────────────────────────────────

/**
 * Engine-side account state. Balances are counts of the smallest unit
 * (see AMOUNT_DECIMALS in money-math).
 */
export interface AccountState {
  readonly clientId: ClientId;
  readonly available: bigint;
  readonly held: bigint;
  readonly locked: boolean;
}

// ─── Transaction Log Types ───────────────────────────────────────────────

/**
 * Dispute lifecycle of a logged deposit.
 *
 * none ──dispute──▶ disputed ──resolve──▶ none
 *                      │
 *                      └──chargeback──▶ charged_back (terminal)
 *
 * Withdrawals stay in `none` forever.
 */
export type DisputeState = "none" | "disputed" | "charged_back";

/** A deposit or withdrawal retained for later dispute actions. */
export interface LogEntry {
  readonly txId: TxId;
  readonly clientId: ClientId;
  readonly kind: FundsMovementKind;
  readonly amount: bigint;
  readonly disputeState: DisputeState;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Business-rule error codes. Each is attributable to one rejected record. */
export type ProcessingErrorCode =
  | "INVALID_AMOUNT"
  | "DUPLICATE_TRANSACTION"
  | "OVERFLOW"
  | "INSUFFICIENT_FUNDS"
  | "ACCOUNT_LOCKED"
  | "UNKNOWN_TRANSACTION"
  | "CLIENT_MISMATCH"
  | "NOT_DISPUTABLE"
  | "NOT_DISPUTED";

/**
 * Structured error from the replay engine.
 * Thrown inside the engine; surfaced by TransactionProcessor.apply() as a value.
 */
export class ProcessingError extends Error {
  public readonly code: ProcessingErrorCode;
  public readonly clientId: ClientId | undefined;
  public readonly txId: TxId | undefined;

  constructor(
    code: ProcessingErrorCode,
    message: string,
    ref?: { readonly clientId?: ClientId | undefined; readonly txId?: TxId | undefined },
  ) {
    super(message);
    this.name = "ProcessingError";
    this.code = code;
    this.clientId = ref?.clientId;
    this.txId = ref?.txId;
  }
}

// ─── Apply Types ─────────────────────────────────────────────────────────

/**
 * Outcome of applying one record.
 * A rejected record leaves balances, lock flags and the log untouched.
 */
export type ApplyOutcome =
  | { readonly ok: true; readonly account: AccountSnapshot }
  | { readonly ok: false; readonly error: ProcessingError };

// ─── Replay Types ────────────────────────────────────────────────────────

export interface ReplayHooks {
  /** Called once per rejected record, in input order. */
  readonly onRejected?: ((record: TransactionRecord, error: ProcessingError) => void) | undefined;
}

/**
 * Counts collected while replaying a record sequence.
 */
export interface ReplaySummary {
  readonly applied: number;
  readonly rejected: number;
  readonly rejectionsByCode: Readonly<Partial<Record<ProcessingErrorCode, number>>>;
}
