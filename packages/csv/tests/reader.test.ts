/**
 * Tests for the CSV transaction reader.
 *
 * Covers:
 * - Header matching and field trimming
 * - Optional amounts
 * - Per-record format errors
 * - File loading and I/O failures
 */

import { describe, it, expect } from "vitest";
import { fileURLToPath } from "node:url";
import type { TransactionRecord } from "@ledgerline/types";
import { TransactionReader } from "../src/reader.js";
import type { ReadResult } from "../src/reader.js";
import { CsvError } from "../src/errors.js";

// ─── Helpers ─────────────────────────────────────────────────────────────

function fixture(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

function readAll(text: string, delimiter?: string): ReadResult[] {
  return [...new TransactionReader(text, { delimiter })];
}

function firstError(text: string): CsvError {
  const failed = readAll(text).find((r) => !r.ok);
  if (failed === undefined || failed.ok) {
    throw new Error("Expected a failed read result");
  }
  return failed.error;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("TransactionReader", () => {
  describe("valid input", () => {
    it("reads every record of a file in order", () => {
      const records = [...TransactionReader.fromFile(fixture("sample_1.csv")).records()];
      expect(records).toEqual<TransactionRecord[]>([
        { kind: "deposit", client: 1, tx: 1, amount: 1 },
        { kind: "deposit", client: 2, tx: 2, amount: 2 },
        { kind: "deposit", client: 1, tx: 3, amount: 2 },
        { kind: "withdrawal", client: 1, tx: 4, amount: 1.5 },
        { kind: "withdrawal", client: 2, tx: 5, amount: 3 },
      ]);
    });

    it("trims fields, ignores header case and skips blank lines", () => {
      const records = [...TransactionReader.fromFile(fixture("sample_2.csv")).records()];
      expect(records).toEqual<TransactionRecord[]>([
        { kind: "deposit", client: 1, tx: 1, amount: 25.11 },
        { kind: "withdrawal", client: 1, tx: 2, amount: 25 },
        { kind: "dispute", client: 1, tx: 1 },
        { kind: "resolve", client: 1, tx: 1 },
        { kind: "chargeback", client: 1, tx: 1 },
      ]);
    });

    it("numbers records from 1", () => {
      const results = readAll("type,client,tx,amount\ndeposit,1,1,2\ndeposit,1,2,3\n");
      expect(results.map((r) => (r.ok ? r.recordNumber : -1))).toEqual([1, 2]);
    });

    it("accepts a file without an amount column", () => {
      const results = readAll("type,client,tx\ndispute,4,9\n");
      expect(results).toEqual([{ ok: true, record: { kind: "dispute", client: 4, tx: 9 }, recordNumber: 1 }]);
    });

    it("parses negative and huge amounts for the ledger to judge", () => {
      const records = [
        ...new TransactionReader("type,client,tx,amount\ndeposit,1,1,-3\ndeposit,1,2,1e400\n").records(),
      ];
      expect(records[0]!.amount).toBe(-3);
      expect(records[1]!.amount).toBe(Number.POSITIVE_INFINITY);
    });

    it("reads NaN and infinity tokens as non-finite amounts", () => {
      const records = [
        ...new TransactionReader(
          "type,client,tx,amount\ndeposit,1,1,NaN\ndeposit,1,2,inf\nwithdrawal,1,3,-Infinity\n",
        ).records(),
      ];
      expect(records[0]!.amount).toBeNaN();
      expect(records[1]!.amount).toBe(Number.POSITIVE_INFINITY);
      expect(records[2]!.amount).toBe(Number.NEGATIVE_INFINITY);
    });

    it("reads an unparseable amount as no amount", () => {
      const results = readAll("type,client,tx,amount\ndeposit,1,1,abc\ndeposit,1,2,0x10\n");
      expect(results).toEqual([
        { ok: true, record: { kind: "deposit", client: 1, tx: 1 }, recordNumber: 1 },
        { ok: true, record: { kind: "deposit", client: 1, tx: 2 }, recordNumber: 2 },
      ]);
    });

    it("accepts the id range bounds", () => {
      const records = [
        ...new TransactionReader("type,client,tx,amount\ndeposit,65535,4294967295,1\n").records(),
      ];
      expect(records[0]).toEqual({ kind: "deposit", client: 65535, tx: 4294967295, amount: 1 });
    });

    it("honours a custom delimiter", () => {
      const results = readAll("type;client;tx;amount\ndeposit;1;1;0.5\n", ";");
      expect(results).toEqual([
        { ok: true, record: { kind: "deposit", client: 1, tx: 1, amount: 0.5 }, recordNumber: 1 },
      ]);
    });

    it("yields nothing for empty input", () => {
      expect(readAll("")).toEqual([]);
      expect(readAll("type,client,tx,amount\n")).toEqual([]);
    });
  });

  describe("format errors", () => {
    it("reports a non-numeric client with its record number", () => {
      const results = [...TransactionReader.fromFile(fixture("sample_1_with_errors.csv"))];
      expect(results).toHaveLength(3);
      expect(results[0]!.ok).toBe(true);
      expect(results[2]!.ok).toBe(true);

      const second = results[1]!;
      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.code).toBe("INPUT_FORMAT");
        expect(second.error.recordNumber).toBe(2);
        expect(second.error.message).toBe("Record 2: client: client must be an unsigned integer");
      }
    });

    it("rejects an out-of-range client id", () => {
      expect(firstError("type,client,tx,amount\ndeposit,65536,1,1\n").message).toBe(
        "Record 1: client: client must be at most 65535",
      );
    });

    it("rejects an out-of-range tx id", () => {
      expect(firstError("type,client,tx,amount\ndeposit,1,4294967296,1\n").message).toBe(
        "Record 1: tx: tx must be at most 4294967295",
      );
    });

    it("rejects an unknown transaction type", () => {
      const error = firstError("type,client,tx,amount\ntransfer,1,1,1\n");
      expect(error.code).toBe("INPUT_FORMAT");
      expect(error.message).toMatch(/^Record 1: type: /);
    });

    it("keeps a quote error on the record it occurs on", () => {
      const results = readAll('type,client,tx,amount\nwithdrawal,1,1,5\ndeposit,1,2,"5"x\n');
      expect(results).toHaveLength(2);
      expect(results[0]).toEqual({
        ok: true,
        record: { kind: "withdrawal", client: 1, tx: 1, amount: 5 },
        recordNumber: 1,
      });

      const second = results[1]!;
      expect(second.ok).toBe(false);
      if (!second.ok) {
        expect(second.error.recordNumber).toBe(2);
        expect(second.error.message).toMatch(/^Record 2: Trailing quote on quoted field is malformed/);
      }
    });

    it("reports a quote error in the header row", () => {
      const error = firstError('"type"x,client,tx,amount\ndeposit,1,1,1\n');
      expect(error.recordNumber).toBe(0);
      expect(error.message).toMatch(/^Header: Trailing quote on quoted field is malformed/);
    });

    it("rejects a record missing a required field", () => {
      expect(firstError("type,client,tx,amount\ndeposit,1\n").message).toBe(
        "Record 1: tx: tx is required",
      );
    });

    it("rejects a record with too many fields", () => {
      const error = firstError("type,client,tx,amount\ndeposit,1,1,1,9\n");
      expect(error.code).toBe("INPUT_FORMAT");
      expect(error.recordNumber).toBe(1);
    });

    it("rejects a header without the required columns", () => {
      const results = readAll("type,client,amount\ndeposit,1,1\n");
      expect(results).toHaveLength(1);
      const [only] = results;
      expect(only!.ok).toBe(false);
      if (only !== undefined && !only.ok) {
        expect(only.error.message).toBe("Missing column(s) in header: tx");
        expect(only.error.recordNumber).toBe(0);
      }
    });

    it("records() throws the first error", () => {
      const reader = TransactionReader.fromFile(fixture("sample_1_with_errors.csv"));
      const seen: TransactionRecord[] = [];
      expect(() => {
        for (const record of reader.records()) {
          seen.push(record);
        }
      }).toThrow(CsvError);
      expect(seen).toHaveLength(1);
    });
  });

  describe("fromFile", () => {
    it("throws IO_ERROR for a missing file", () => {
      try {
        TransactionReader.fromFile(fixture("does-not-exist.csv"));
        expect.unreachable("fromFile should have thrown");
      } catch (err) {
        expect(err).toBeInstanceOf(CsvError);
        if (err instanceof CsvError) {
          expect(err.code).toBe("IO_ERROR");
          expect(err.message).toMatch(/does-not-exist\.csv/);
        }
      }
    });
  });
});
