/**
 * @ledgerline/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @ledgerline/types with ledger-specific
 * structures used only within this package.
 *
 * Rules:
 * - Exported views are readonly; only the engine mutates its state
 * - Fail-closed: rejected records throw, never silently succeed
 */

import type { ClientId, TransactionRecord, TxId } from "@ledgerline/types";

// ─── Account State ───────────────────────────────────────────────────────

/**
 * Mutable balance state held per client inside the account book.
 * `total == available + held` after every successful operation.
 */
export interface AccountState {
  available: number;
  held: number;
  total: number;
  locked: boolean;
}

// ─── History ─────────────────────────────────────────────────────────────

/**
 * A stored deposit or withdrawal, kept to service later dispute lookups.
 */
export interface HistoryEntry {
  readonly record: TransactionRecord;
  readonly underDispute: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNKNOWN_CLIENT"
  | "UNKNOWN_TRANSACTION"
  | "INVALID_AMOUNT"
  | "AMOUNT_OVERFLOW"
  | "NOT_DISPUTED"
  | "ACCOUNT_LOCKED"
  | "DUPLICATE_TRANSACTION"
  | "INSUFFICIENT_FUNDS";

/** Identifiers and amount attached to a rejection. */
export interface LedgerErrorDetails {
  readonly client?: ClientId | undefined;
  readonly tx?: TxId | undefined;
  readonly amount?: number | undefined;
}

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly client: ClientId | undefined;
  public readonly tx: TxId | undefined;
  public readonly amount: number | undefined;

  constructor(code: LedgerErrorCode, message: string, details: LedgerErrorDetails = {}) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.client = details.client;
    this.tx = details.tx;
    this.amount = details.amount;
  }
}
