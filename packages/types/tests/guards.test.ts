/**
 * Runtime type guard tests for @ledgerline/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isTransactionKind,
  isClientId,
  isTxId,
  isTransactionRecord,
  isAccountSnapshot,
} from "../src/guards.js";
import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "../src/transaction.js";

// =============================================================================
// Transaction guards
// =============================================================================

describe("isTransactionKind", () => {
  it("accepts every canonical kind", () => {
    for (const kind of TRANSACTION_KINDS) {
      expect(isTransactionKind(kind)).toBe(true);
    }
  });

  it("is case-sensitive", () => {
    expect(isTransactionKind("Deposit")).toBe(false);
  });

  it("rejects unknown strings and non-strings", () => {
    expect(isTransactionKind("transfer")).toBe(false);
    expect(isTransactionKind(1)).toBe(false);
    expect(isTransactionKind(undefined)).toBe(false);
  });
});

describe("isClientId / isTxId", () => {
  it("accepts the range bounds", () => {
    expect(isClientId(0)).toBe(true);
    expect(isClientId(MAX_CLIENT_ID)).toBe(true);
    expect(isTxId(0)).toBe(true);
    expect(isTxId(MAX_TX_ID)).toBe(true);
  });

  it("rejects values past the range", () => {
    expect(isClientId(65536)).toBe(false);
    expect(isTxId(4294967296)).toBe(false);
    expect(isClientId(-1)).toBe(false);
  });

  it("rejects fractional and non-numeric ids", () => {
    expect(isClientId(1.5)).toBe(false);
    expect(isTxId("1")).toBe(false);
    expect(isTxId(Number.NaN)).toBe(false);
  });
});

describe("isTransactionRecord", () => {
  it("accepts a deposit with an amount", () => {
    expect(isTransactionRecord({ kind: "deposit", client: 1, tx: 1, amount: 2.5 })).toBe(true);
  });

  it("accepts a dispute without an amount", () => {
    expect(isTransactionRecord({ kind: "dispute", client: 1, tx: 1 })).toBe(true);
  });

  it("rejects a string amount", () => {
    expect(isTransactionRecord({ kind: "deposit", client: 1, tx: 1, amount: "2.5" })).toBe(false);
  });

  it("rejects null and missing fields", () => {
    expect(isTransactionRecord(null)).toBe(false);
    expect(isTransactionRecord({ kind: "deposit", client: 1 })).toBe(false);
  });
});

// =============================================================================
// Account guards
// =============================================================================

describe("isAccountSnapshot", () => {
  it("accepts a complete snapshot", () => {
    expect(
      isAccountSnapshot({ client: 7, available: 1, held: 0, total: 1, locked: false }),
    ).toBe(true);
  });

  it("rejects a snapshot with a non-boolean lock flag", () => {
    expect(
      isAccountSnapshot({ client: 7, available: 1, held: 0, total: 1, locked: "false" }),
    ).toBe(false);
  });
});
