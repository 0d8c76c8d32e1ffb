/**
 * @tally/cli — Human-readable run summary for stderr.
 */

import chalk from "chalk";
import type { ChalkInstance } from "chalk";
import type { RunResult } from "./run.js";

/**
 * Render the run counts, then one line per rejection code (sorted by code).
 */
export function formatSummary(result: RunResult, paint: ChalkInstance = chalk): string {
  const lines = [
    [
      paint.green(`applied ${String(result.applied)}`),
      paint.yellow(`rejected ${String(result.rejected)}`),
      paint.gray(`malformed ${String(result.malformed)}`),
      paint.white(`accounts ${String(result.accounts)}`),
    ].join("  "),
  ];

  const counts = Object.entries(result.rejectionsByCode).sort(([a], [b]) => a.localeCompare(b));
  for (const [code, count] of counts) {
    lines.push(paint.gray("  → ") + paint.yellow(code.padEnd(24)) + String(count ?? 0));
  }

  return lines.join("\n");
}

/**
 * One-line fatal error message.
 */
export function formatFatal(err: unknown, paint: ChalkInstance = chalk): string {
  const message = err instanceof Error ? err.message : String(err);
  return paint.red.bold("tally: ") + paint.red(message);
}
