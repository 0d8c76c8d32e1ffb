/**
 * Runtime type guard tests for @tally/types
 *
 * Validates that guards accept every valid kind and identifier
 * and reject everything else.
 */
import { describe, it, expect } from "vitest";
import {
  isFundsMovementKind,
  isDisputeActionKind,
  isTransactionKind,
  isClientId,
  isTxId,
} from "../src/guards.js";

// =============================================================================
// Kind guards
// =============================================================================

describe("kind guards", () => {
  it("accepts every transaction kind", () => {
    for (const kind of ["deposit", "withdrawal", "dispute", "resolve", "chargeback"]) {
      expect(isTransactionKind(kind)).toBe(true);
    }
  });

  it("rejects unknown or non-string kinds", () => {
    expect(isTransactionKind("refund")).toBe(false);
    expect(isTransactionKind("Deposit")).toBe(false);
    expect(isTransactionKind(1)).toBe(false);
    expect(isTransactionKind(undefined)).toBe(false);
  });

  it("splits funds movements from dispute actions", () => {
    expect(isFundsMovementKind("deposit")).toBe(true);
    expect(isFundsMovementKind("dispute")).toBe(false);
    expect(isDisputeActionKind("chargeback")).toBe(true);
    expect(isDisputeActionKind("withdrawal")).toBe(false);
  });
});

// =============================================================================
// Identifier guards
// =============================================================================

describe("isClientId", () => {
  it("accepts the full 16-bit range", () => {
    expect(isClientId(0)).toBe(true);
    expect(isClientId(65535)).toBe(true);
  });

  it("rejects out of range, fractional and non-numeric values", () => {
    expect(isClientId(65536)).toBe(false);
    expect(isClientId(-1)).toBe(false);
    expect(isClientId(1.5)).toBe(false);
    expect(isClientId("1")).toBe(false);
  });
});

describe("isTxId", () => {
  it("accepts the full 32-bit range", () => {
    expect(isTxId(0)).toBe(true);
    expect(isTxId(4294967295)).toBe(true);
  });

  it("rejects values beyond 32 bits", () => {
    expect(isTxId(4294967296)).toBe(false);
    expect(isTxId(Number.NaN)).toBe(false);
  });
});
