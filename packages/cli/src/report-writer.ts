/**
 * @tally/cli — Report writer.
 *
 * Formats the final account snapshot as CSV or JSON.
 */

import type { Writable } from "node:stream";
import type { AccountSnapshot } from "@tally/types";

export type ReportFormat = "csv" | "json";

export const CSV_HEADER = "client,available,held,total,locked";

/**
 * CSV report: header plus one row per account, newline-terminated.
 */
export function formatCsvReport(accounts: readonly AccountSnapshot[]): string {
  const rows = accounts.map(
    (a) => `${String(a.clientId)},${a.available},${a.held},${a.total},${String(a.locked)}`,
  );
  return [CSV_HEADER, ...rows].join("\n") + "\n";
}

/**
 * JSON report: an array of account snapshots, two-space indented.
 */
export function formatJsonReport(accounts: readonly AccountSnapshot[]): string {
  return JSON.stringify(accounts, null, 2) + "\n";
}

export function formatReport(
  accounts: readonly AccountSnapshot[],
  format: ReportFormat,
): string {
  switch (format) {
    case "csv":
      return formatCsvReport(accounts);
    case "json":
      return formatJsonReport(accounts);
  }
}

/**
 * Write the formatted report, resolving once the chunk is flushed to the stream.
 */
export function writeReport(
  accounts: readonly AccountSnapshot[],
  output: Writable,
  format: ReportFormat,
): Promise<void> {
  const text = formatReport(accounts, format);
  return new Promise((resolve, reject) => {
    output.write(text, (err) => {
      if (err) {
        reject(err);
      } else {
        resolve();
      }
    });
  });
}
