/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger domain types, exported for callers that
 * receive records or snapshots as untyped values.
 */

import type { AccountSnapshot } from "./account.js";
import type { ClientId, TransactionKind, TransactionRecord, TxId } from "./transaction.js";
import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "./transaction.js";

const KINDS = new Set<string>(TRANSACTION_KINDS);

function isIdInRange(value: unknown, max: number): value is number {
  return (
    typeof value === "number" &&
    Number.isInteger(value) &&
    value >= 0 &&
    value <= max
  );
}

export function isTransactionKind(value: unknown): value is TransactionKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isClientId(value: unknown): value is ClientId {
  return isIdInRange(value, MAX_CLIENT_ID);
}

export function isTxId(value: unknown): value is TxId {
  return isIdInRange(value, MAX_TX_ID);
}

export function isTransactionRecord(value: unknown): value is TransactionRecord {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isTransactionKind(v.kind) &&
    isClientId(v.client) &&
    isTxId(v.tx) &&
    (v.amount === undefined || typeof v.amount === "number")
  );
}

export function isAccountSnapshot(value: unknown): value is AccountSnapshot {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isClientId(v.client) &&
    typeof v.available === "number" &&
    typeof v.held === "number" &&
    typeof v.total === "number" &&
    typeof v.locked === "boolean"
  );
}
