/**
 * End-to-end tests for processInput: CSV in, report out, in memory.
 */

import { describe, it, expect } from "vitest";
import { Readable, Writable } from "node:stream";
import { processInput } from "../src/run.js";
import { createLogger } from "../src/logger.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function sink(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer, _encoding, callback) {
      chunks.push(chunk.toString("utf8"));
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}

function logCapture(): {
  logger: ReturnType<typeof createLogger>;
  records: () => Record<string, unknown>[];
} {
  const lines: string[] = [];
  const logger = createLogger(
    { LOG_LEVEL: "debug", LOG_PRETTY: false },
    { write: (msg: string) => { lines.push(msg); } },
  );
  return {
    logger,
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

function csv(...lines: string[]): Readable {
  return Readable.from([lines.join("\n") + "\n"]);
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("processInput", () => {
  it("replays deposits and withdrawals into a CSV report", async () => {
    const out = sink();
    const { logger } = logCapture();

    const result = await processInput(
      csv(
        "type, client, tx, amount",
        "deposit, 1, 1, 1.0",
        "deposit, 2, 2, 2.0",
        "deposit, 1, 3, 2.0",
        "withdrawal, 1, 4, 1.5",
        "withdrawal, 2, 5, 3.0",
      ),
      out.stream,
      { format: "csv", logger },
    );

    expect(out.text()).toBe(
      "client,available,held,total,locked\n" +
        "1,1.5000,0.0000,1.5000,false\n" +
        "2,2.0000,0.0000,2.0000,false\n",
    );
    expect(result).toEqual({
      applied: 4,
      rejected: 1,
      rejectionsByCode: { INSUFFICIENT_FUNDS: 1 },
      malformed: 0,
      accounts: 2,
    });
  });

  it("reports a dispute that drives available negative", async () => {
    const out = sink();
    const { logger } = logCapture();

    await processInput(
      csv(
        "type,client,tx,amount",
        "deposit,1,1,5.0",
        "deposit,1,2,3.0",
        "withdrawal,1,3,4.0",
        "dispute,1,1,",
      ),
      out.stream,
      { format: "json", logger },
    );

    expect(JSON.parse(out.text())).toEqual([
      { clientId: 1, available: "-1.0000", held: "5.0000", total: "4.0000", locked: false },
    ]);
  });

  it("locks an account after a chargeback and ignores its later records", async () => {
    const out = sink();
    const { logger } = logCapture();

    const result = await processInput(
      csv(
        "type,client,tx,amount",
        "deposit,1,1,10",
        "deposit,1,2,4",
        "dispute,1,1",
        "chargeback,1,1",
        "deposit,1,3,100",
        "deposit,2,4,1",
      ),
      out.stream,
      { format: "csv", logger },
    );

    expect(out.text()).toBe(
      "client,available,held,total,locked\n" +
        "1,4.0000,0.0000,4.0000,true\n" +
        "2,1.0000,0.0000,1.0000,false\n",
    );
    expect(result.rejectionsByCode).toEqual({ ACCOUNT_LOCKED: 1 });
  });

  it("skips malformed rows and logs every skipped or rejected row", async () => {
    const out = sink();
    const capture = logCapture();

    const result = await processInput(
      csv(
        "type,client,tx,amount",
        "deposit,1,1,1.0",
        "teleport,1,2,1.0",
        "withdrawal,1,3,5.0",
      ),
      out.stream,
      { format: "csv", logger: capture.logger },
    );

    expect(result.malformed).toBe(1);
    expect(result.rejected).toBe(1);

    const debug = capture.records().filter((r) => r.level === 20);
    expect(debug).toHaveLength(2);
    expect(debug[0]?.msg).toBe("Skipping malformed row");
    expect(debug[0]?.lineNumber).toBe(3);
    expect(debug[1]).toMatchObject({
      code: "INSUFFICIENT_FUNDS",
      kind: "withdrawal",
      clientId: 1,
      txId: 3,
      msg: "Rejected transaction: Withdrawal of 5.0000 exceeds available 1.0000",
    });

    const info = capture.records().filter((r) => r.level === 30);
    expect(info).toHaveLength(1);
    expect(info[0]).toMatchObject({
      msg: "Replay complete",
      applied: 1,
      rejected: 1,
      malformed: 1,
      accounts: 1,
    });
  });

  it("writes only the header for an input with no records", async () => {
    const out = sink();
    const { logger } = logCapture();

    const result = await processInput(csv("type,client,tx,amount"), out.stream, {
      format: "csv",
      logger,
    });

    expect(out.text()).toBe("client,available,held,total,locked\n");
    expect(result.accounts).toBe(0);
  });
});
