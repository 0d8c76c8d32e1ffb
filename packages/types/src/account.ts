/**
 * Account Types
 *
 * The exported view of a client account, consumed by report builders.
 */

import type { ClientId } from "./transaction.js";

/**
 * Read-only state of one client account.
 * Amounts are decimal strings with a fixed number of fractional digits.
 */
export interface AccountSnapshot {
  readonly clientId: ClientId;

  /** Funds usable for withdrawal */
  readonly available: string;

  /** Funds frozen by open disputes */
  readonly held: string;

  /** available + held */
  readonly total: string;

  /** Set by a chargeback; a locked account accepts no further records */
  readonly locked: boolean;
}
