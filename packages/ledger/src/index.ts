/**
 * @tally/ledger — Transaction replay engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the account invariants of the replay:
 * - Each deposit/withdrawal txId is used exactly once
 * - Withdrawals never exceed available funds
 * - Disputes move funds from available to held; resolves move them back
 * - Chargebacks remove held funds and lock the account for good
 * - All monetary arithmetic uses bigint (no floating point)
 *
 * Design rules:
 * - All types are readonly
 * - Fail-closed: a rejected record changes nothing
 * - Zero runtime dependencies
 */

// Core engine
export { TransactionProcessor } from "./processor.js";

// Replay driver
export { replay, replayAsync } from "./replay.js";

// Stores
export { AccountStore, toSnapshot } from "./accounts.js";
export { TransactionLog } from "./transaction-log.js";

// Money arithmetic
export {
  AMOUNT_DECIMALS,
  MAX_UNITS,
  quantizeAmount,
  formatAmount,
  assertInRange,
  checkedAdd,
  checkedSub,
} from "./money-math.js";

// Types
export type {
  AccountState,
  DisputeState,
  LogEntry,
  ProcessingErrorCode,
  ApplyOutcome,
  ReplayHooks,
  ReplaySummary,
} from "./types.js";

export { ProcessingError } from "./types.js";
