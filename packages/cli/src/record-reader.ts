/**
 * @tally/cli — CSV record reader.
 *
 * Turns `type,client,tx,amount` rows into TransactionRecords.
 *
 * Row rules:
 * - Fields are whitespace-trimmed; `type` is case-insensitive
 * - The trailing `amount` column may be omitted
 * - The header row and blank lines are skipped
 * - Rows that fail validation are reported and skipped, never fatal
 *
 * Amount contents are not checked here: the processor owns that rule,
 * so a deposit without an amount reaches it as "" and is rejected there.
 */

import type { Readable } from "node:stream";
import { createInterface } from "node:readline";
import { z } from "zod";
import type { TransactionRecord } from "@tally/types";
import { isClientId, isTransactionKind, isTxId } from "@tally/types";

const MAX_FIELDS = 4;
const HEADER_FIRST_FIELD = "type";

const integerField = <T extends number>(isInRange: (value: unknown) => value is T, max: number) =>
  z
    .string()
    .regex(/^\d+$/, "must be a non-negative integer")
    .transform(Number)
    .pipe(z.number().refine(isInRange, `must be at most ${String(max)}`));

const RowSchema = z.object({
  type: z
    .string()
    .transform((v) => v.toLowerCase())
    .pipe(z.string().refine(isTransactionKind, "unknown transaction type")),
  client: integerField(isClientId, 0xffff),
  tx: integerField(isTxId, 0xffffffff),
  amount: z.string().default(""),
});

export type ParsedLine =
  | { readonly status: "record"; readonly record: TransactionRecord }
  | { readonly status: "skip" }
  | { readonly status: "malformed"; readonly reason: string };

/**
 * Parse a single CSV line.
 */
export function parseRecordLine(line: string): ParsedLine {
  if (line.trim() === "") {
    return { status: "skip" };
  }

  const fields = line.split(",").map((f) => f.trim());
  if (fields[0]?.toLowerCase() === HEADER_FIRST_FIELD) {
    return { status: "skip" };
  }
  if (fields.length > MAX_FIELDS) {
    return {
      status: "malformed",
      reason: `expected at most ${String(MAX_FIELDS)} fields, got ${String(fields.length)}`,
    };
  }

  const [type, client, tx, amount] = fields;
  const result = RowSchema.safeParse({ type, client, tx, amount });
  if (!result.success) {
    return {
      status: "malformed",
      reason: result.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; "),
    };
  }

  const row = result.data;
  const ids = { clientId: row.client, txId: row.tx };
  switch (row.type) {
    case "deposit":
    case "withdrawal":
      return { status: "record", record: { kind: row.type, ...ids, amount: row.amount } };
    case "dispute":
    case "resolve":
    case "chargeback":
      return { status: "record", record: { kind: row.type, ...ids } };
  }
}

export interface ReadRecordsOptions {
  /** Called for each skipped malformed row, with its 1-based line number. */
  readonly onMalformed?: ((lineNumber: number, line: string, reason: string) => void) | undefined;
}

/**
 * Lazily read records from a CSV stream, one line at a time.
 */
export async function* readRecords(
  input: Readable,
  options: ReadRecordsOptions = {},
): AsyncGenerator<TransactionRecord> {
  const lines = createInterface({ input, crlfDelay: Infinity });
  let lineNumber = 0;

  for await (const line of lines) {
    lineNumber++;
    const parsed = parseRecordLine(line);
    switch (parsed.status) {
      case "record":
        yield parsed.record;
        break;
      case "malformed":
        options.onMalformed?.(lineNumber, line, parsed.reason);
        break;
      case "skip":
        break;
    }
  }
}
