/**
 * @tally/ledger — Account store.
 *
 * Maps client identifiers to account state for the lifetime of one run.
 *
 * Rules:
 * - Accounts are opened on first reference with zero balances
 * - Accounts are never removed
 * - State is replaced whole via commit(); stored values are never mutated
 */

import type { AccountSnapshot, ClientId } from "@tally/types";
import { AMOUNT_DECIMALS, formatAmount } from "./money-math.js";
import type { AccountState } from "./types.js";

/**
 * Convert engine state to the exported snapshot shape.
 */
export function toSnapshot(account: AccountState): AccountSnapshot {
  return {
    clientId: account.clientId,
    available: formatAmount(account.available, AMOUNT_DECIMALS),
    held: formatAmount(account.held, AMOUNT_DECIMALS),
    total: formatAmount(account.available + account.held, AMOUNT_DECIMALS),
    locked: account.locked,
  };
}

/**
 * In-memory account store keyed by client ID.
 */
export class AccountStore {
  private readonly _accounts: Map<ClientId, AccountState> = new Map();

  /**
   * Get an account, opening a zero-balance one if it does not exist yet.
   */
  open(clientId: ClientId): AccountState {
    const existing = this._accounts.get(clientId);
    if (existing !== undefined) {
      return existing;
    }

    const account: AccountState = {
      clientId,
      available: 0n,
      held: 0n,
      locked: false,
    };
    this._accounts.set(clientId, account);
    return account;
  }

  /**
   * Get an account by client ID.
   * Returns undefined if it has never been referenced.
   */
  get(clientId: ClientId): AccountState | undefined {
    return this._accounts.get(clientId);
  }

  has(clientId: ClientId): boolean {
    return this._accounts.has(clientId);
  }

  /**
   * Replace the stored state of an account.
   * Callers commit only after every check for the record has passed.
   */
  commit(next: AccountState): AccountState {
    this._accounts.set(next.clientId, next);
    return next;
  }

  /**
   * Every account, ascending by client ID.
   */
  snapshot(): readonly AccountSnapshot[] {
    return [...this._accounts.values()]
      .sort((a, b) => a.clientId - b.clientId)
      .map(toSnapshot);
  }

  get count(): number {
    return this._accounts.size;
  }
}
