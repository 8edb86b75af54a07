/**
 * @ledgerline/ledger — Transaction history.
 *
 * Keeps every successfully applied deposit and withdrawal, keyed by tx id,
 * together with its dispute flag. Dispute, resolve and chargeback records
 * are never stored; they only flip the flag of the entry they reference.
 *
 * Rules:
 * - Tx ids are unique; an entry is never overwritten
 * - Only the dispute flag of a stored entry changes
 */

import type { TransactionRecord, TxId } from "@ledgerline/types";
import type { HistoryEntry } from "./types.js";
import { LedgerError } from "./types.js";

interface StoredEntry {
  readonly record: TransactionRecord;
  underDispute: boolean;
}

export class TransactionHistory {
  private readonly _entries: Map<TxId, StoredEntry> = new Map();

  /**
   * Store a deposit or withdrawal. Throws on a repeated tx id.
   */
  record(record: TransactionRecord): HistoryEntry {
    if (this._entries.has(record.tx)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Transaction already recorded (tx: ${String(record.tx)})`,
        { client: record.client, tx: record.tx },
      );
    }

    const entry: StoredEntry = { record: { ...record }, underDispute: false };
    this._entries.set(record.tx, entry);
    return { ...entry };
  }

  has(tx: TxId): boolean {
    return this._entries.has(tx);
  }

  get(tx: TxId): HistoryEntry | undefined {
    const entry = this._entries.get(tx);
    return entry === undefined ? undefined : { ...entry };
  }

  /**
   * Assert a stored entry exists. Throws UNKNOWN_TRANSACTION if not.
   */
  assertExists(tx: TxId): HistoryEntry {
    const entry = this._entries.get(tx);
    if (entry === undefined) {
      throw new LedgerError("UNKNOWN_TRANSACTION", `Unknown transaction (tx: ${String(tx)})`, { tx });
    }
    return { ...entry };
  }

  /**
   * Set the dispute flag of a stored entry.
   */
  setUnderDispute(tx: TxId, underDispute: boolean): void {
    const entry = this._entries.get(tx);
    if (entry === undefined) {
      throw new LedgerError("UNKNOWN_TRANSACTION", `Unknown transaction (tx: ${String(tx)})`, { tx });
    }
    entry.underDispute = underDispute;
  }

  get count(): number {
    return this._entries.size;
  }
}
