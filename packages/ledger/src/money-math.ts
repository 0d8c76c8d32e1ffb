/**
 * @tally/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint internally for precision.
 * String amounts are converted to/from bigint via decimal scaling.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts are decimal strings at every boundary
 * - Every balance stays within ±MAX_UNITS
 * - Zero runtime dependencies
 */

import { ProcessingError } from "./types.js";

/** Fractional digits carried by every amount. */
export const AMOUNT_DECIMALS = 4;

/** Largest representable magnitude, in 1/10^AMOUNT_DECIMALS units (2^96 - 1). */
export const MAX_UNITS = 2n ** 96n - 1n;

const AMOUNT_PATTERN = /^([+-]?)(\d+)(?:\.(\d*))?$/;

// ─── Parsing / Formatting ────────────────────────────────────────────────

/**
 * Parse a decimal string amount, rounding half-to-even beyond `decimals`.
 *
 * "3.12345" with decimals=4 → 31234n
 * "0.87655" with decimals=4 → 8766n
 * "-1.00005" with decimals=4 → -10000n
 */
export function quantizeAmount(amount: string, decimals: number): bigint {
  const { negative, intPart, fracPart } = splitAmount(amount);

  const kept = fracPart.slice(0, decimals).padEnd(decimals, "0");
  const dropped = fracPart.slice(decimals);
  let value = BigInt(intPart + kept);

  if (dropped.length > 0) {
    const first = dropped.charCodeAt(0) - 48;
    const restNonZero = /[1-9]/.test(dropped.slice(1));
    const roundUp = first > 5 || (first === 5 && (restNonZero || value % 2n === 1n));
    if (roundUp) {
      value += 1n;
    }
  }

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * 15000n with decimals=4 → "1.5000"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

// ─── Checked Arithmetic ──────────────────────────────────────────────────

/**
 * Assert a scaled value is within ±MAX_UNITS.
 * Throws ProcessingError("OVERFLOW") otherwise.
 */
export function assertInRange(value: bigint): bigint {
  if (value > MAX_UNITS || value < -MAX_UNITS) {
    throw new ProcessingError(
      "OVERFLOW",
      `Balance ${formatAmount(value, AMOUNT_DECIMALS)} is outside the representable range`,
    );
  }
  return value;
}

/**
 * a + b, failing with OVERFLOW outside the representable range.
 */
export function checkedAdd(a: bigint, b: bigint): bigint {
  return assertInRange(a + b);
}

/**
 * a - b, failing with OVERFLOW outside the representable range.
 */
export function checkedSub(a: bigint, b: bigint): bigint {
  return assertInRange(a - b);
}

// ─── Internal Helpers ────────────────────────────────────────────────────

interface AmountParts {
  readonly negative: boolean;
  readonly intPart: string;
  readonly fracPart: string;
}

function splitAmount(amount: string): AmountParts {
  const trimmed = amount.trim();
  const match = AMOUNT_PATTERN.exec(trimmed);
  if (match === null) {
    throw new ProcessingError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  return {
    negative: match[1] === "-",
    intPart: match[2] ?? "0",
    fracPart: match[3] ?? "",
  };
}
