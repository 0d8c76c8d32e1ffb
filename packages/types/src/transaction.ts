/**
 * Transaction Record Types
 *
 * The input grammar of the replay engine: five record kinds,
 * modelled as a closed discriminated union on `kind`.
 *
 * Rules:
 * - All amounts are decimal strings to avoid floating-point errors
 * - Only deposits and withdrawals carry an amount
 * - Dispute actions reference an earlier deposit by its txId
 */

/** Client identifier (0..65535). */
export type ClientId = number;

/** Transaction identifier (0..4294967295). */
export type TxId = number;

/** Kinds that move funds and are retained in the transaction log. */
export type FundsMovementKind = "deposit" | "withdrawal";

/** Kinds that act on an earlier logged transaction. */
export type DisputeActionKind = "dispute" | "resolve" | "chargeback";

export type TransactionKind = FundsMovementKind | DisputeActionKind;

interface RecordBase {
  /** Account the record applies to */
  readonly clientId: ClientId;

  /**
   * For deposits and withdrawals, the new transaction's identifier.
   * For dispute actions, the identifier of the transaction being referenced.
   */
  readonly txId: TxId;
}

export interface DepositRecord extends RecordBase {
  readonly kind: "deposit";
  /** Decimal string, e.g. "1.5" */
  readonly amount: string;
}

export interface WithdrawalRecord extends RecordBase {
  readonly kind: "withdrawal";
  readonly amount: string;
}

export interface DisputeRecord extends RecordBase {
  readonly kind: "dispute";
}

export interface ResolveRecord extends RecordBase {
  readonly kind: "resolve";
}

export interface ChargebackRecord extends RecordBase {
  readonly kind: "chargeback";
}

export type FundsMovementRecord = DepositRecord | WithdrawalRecord;

export type DisputeActionRecord = DisputeRecord | ResolveRecord | ChargebackRecord;

/** One already-parsed input row. */
export type TransactionRecord = FundsMovementRecord | DisputeActionRecord;
