/**
 * Runtime Type Guards
 *
 * Narrowing functions for the fields of a transaction record,
 * used where rows enter the system from text.
 */

import type {
  ClientId,
  DisputeActionKind,
  FundsMovementKind,
  TransactionKind,
  TxId,
} from "./transaction.js";

const MAX_CLIENT_ID = 0xffff;
const MAX_TX_ID = 0xffffffff;

const FUNDS_MOVEMENT_KINDS = new Set<string>(["deposit", "withdrawal"]);
const DISPUTE_ACTION_KINDS = new Set<string>(["dispute", "resolve", "chargeback"]);

export function isFundsMovementKind(value: unknown): value is FundsMovementKind {
  return typeof value === "string" && FUNDS_MOVEMENT_KINDS.has(value);
}

export function isDisputeActionKind(value: unknown): value is DisputeActionKind {
  return typeof value === "string" && DISPUTE_ACTION_KINDS.has(value);
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return isFundsMovementKind(value) || isDisputeActionKind(value);
}

export function isClientId(value: unknown): value is ClientId {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_CLIENT_ID;
}

export function isTxId(value: unknown): value is TxId {
  return typeof value === "number" && Number.isInteger(value) && value >= 0 && value <= MAX_TX_ID;
}
