/**
 * @tally/types — Shared domain types for the Tally stack.
 *
 * These types are used across all Tally packages:
 * - Transaction records (the input grammar)
 * - Account snapshots (the exported ledger state)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in consuming code
 */

// Transaction types
export type {
  ClientId,
  TxId,
  TransactionKind,
  FundsMovementKind,
  DisputeActionKind,
  DepositRecord,
  WithdrawalRecord,
  DisputeRecord,
  ResolveRecord,
  ChargebackRecord,
  FundsMovementRecord,
  DisputeActionRecord,
  TransactionRecord,
} from "./transaction.js";

// Account types
export type { AccountSnapshot } from "./account.js";

// Runtime type guards
export {
  isFundsMovementKind,
  isDisputeActionKind,
  isTransactionKind,
  isClientId,
  isTxId,
} from "./guards.js";
