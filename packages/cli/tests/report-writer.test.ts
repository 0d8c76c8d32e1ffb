/**
 * Tests for the report writer.
 */

import { describe, it, expect } from "vitest";
import { Writable } from "node:stream";
import type { AccountSnapshot } from "@tally/types";
import {
  CSV_HEADER,
  formatCsvReport,
  formatJsonReport,
  formatReport,
  writeReport,
} from "../src/report-writer.js";

const ACCOUNTS: readonly AccountSnapshot[] = [
  { clientId: 1, available: "1.5000", held: "0.0000", total: "1.5000", locked: false },
  { clientId: 2, available: "-1.0000", held: "5.0000", total: "4.0000", locked: true },
];

describe("formatCsvReport", () => {
  it("writes a header and one row per account", () => {
    expect(formatCsvReport(ACCOUNTS)).toBe(
      "client,available,held,total,locked\n" +
        "1,1.5000,0.0000,1.5000,false\n" +
        "2,-1.0000,5.0000,4.0000,true\n",
    );
  });

  it("writes only the header for no accounts", () => {
    expect(formatCsvReport([])).toBe(`${CSV_HEADER}\n`);
  });
});

describe("formatJsonReport", () => {
  it("writes an indented array that parses back to the snapshots", () => {
    const text = formatJsonReport(ACCOUNTS);
    expect(text.endsWith("\n")).toBe(true);
    expect(JSON.parse(text)).toEqual(ACCOUNTS);
    expect(text.split("\n")[1]).toBe("  {");
  });
});

describe("formatReport", () => {
  it("dispatches on the format", () => {
    expect(formatReport(ACCOUNTS, "csv")).toBe(formatCsvReport(ACCOUNTS));
    expect(formatReport(ACCOUNTS, "json")).toBe(formatJsonReport(ACCOUNTS));
  });
});

describe("writeReport", () => {
  it("writes the formatted report to the stream", async () => {
    const chunks: string[] = [];
    const output = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk.toString("utf8"));
        callback();
      },
    });

    await writeReport(ACCOUNTS, output, "csv");

    expect(chunks.join("")).toBe(formatCsvReport(ACCOUNTS));
  });

  it("rejects when the stream fails", async () => {
    const output = new Writable({
      write(_chunk: Buffer, _encoding, callback) {
        callback(new Error("disk full"));
      },
    });
    output.on("error", () => undefined);

    await expect(writeReport(ACCOUNTS, output, "json")).rejects.toThrow("disk full");
  });
});
