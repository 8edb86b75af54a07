/**
 * @ledgerline/ledger — Core Ledger class.
 *
 * Replays transaction records against per-client accounts. Each record
 * either applies fully or is rejected with a LedgerError; the caller
 * decides whether a rejection halts the run.
 *
 * API surface:
 * - apply() — Apply one record (the only write operation)
 * - exportAccounts() — Snapshot every account
 * - getAccount() / hasAccount() — Per-client queries
 * - getTransaction() — Stored deposit/withdrawal lookup
 *
 * Dispute lifecycle of a stored entry:
 *   normal --dispute--> disputed --resolve--> normal
 *                                --chargeback--> normal (account locked)
 */

import type {
  AccountSnapshot,
  ClientId,
  TransactionRecord,
  TxId,
} from "@ledgerline/types";
import { AccountBook } from "./accounts.js";
import { TransactionHistory } from "./history.js";
import { amountOrZero, isValidAmount, wasAbsorbed } from "./money-math.js";
import type { AccountState, HistoryEntry } from "./types.js";
import { LedgerError } from "./types.js";

export class Ledger {
  private readonly _accounts: AccountBook = new AccountBook();
  private readonly _history: TransactionHistory = new TransactionHistory();

  // ─── Core Apply (The Only Write Operation) ───────────────────────────

  /**
   * Apply a single transaction record.
   *
   * The client's account is created first, even when the record is then
   * rejected. Throws LedgerError on rejection; returns the account as it
   * stands after the record on success.
   */
  apply(record: TransactionRecord): AccountSnapshot {
    this._accounts.getOrCreate(record.client);

    switch (record.kind) {
      case "deposit":
        this._deposit(record);
        break;
      case "withdrawal":
        this._withdraw(record);
        break;
      case "dispute":
        this._dispute(record);
        break;
      case "resolve":
        this._resolve(record);
        break;
      case "chargeback":
        this._chargeback(record);
        break;
    }

    return this._snapshotOf(record.client);
  }

  private _deposit(record: TransactionRecord): void {
    const { amount, account } = this._checkFundsMovement(record);

    const availableBefore = account.available;
    const totalBefore = account.total;

    account.available += amount;
    account.total += amount;

    // Post-mutation check: an absorbed addend leaves the balance as it was,
    // and the record is not stored.
    if (
      wasAbsorbed(availableBefore, account.available, amount) ||
      wasAbsorbed(totalBefore, account.total, amount)
    ) {
      throw new LedgerError(
        "AMOUNT_OVERFLOW",
        `Account balance too large to add ${String(amount)} (client id: ${String(record.client)})`,
        { client: record.client, tx: record.tx, amount },
      );
    }

    this._history.record(record);
  }

  private _withdraw(record: TransactionRecord): void {
    const { amount, account } = this._checkFundsMovement(record);

    if (amount > account.available) {
      throw new LedgerError(
        "INSUFFICIENT_FUNDS",
        `Insufficient funds: ${String(amount)} requested, ${String(account.available)} available (client id: ${String(record.client)})`,
        { client: record.client, tx: record.tx, amount },
      );
    }

    account.available -= amount;
    account.total -= amount;

    this._history.record(record);
  }

  private _dispute(record: TransactionRecord): void {
    const entry = this._history.assertExists(record.tx);
    const amount = amountOrZero(entry.record.amount);
    const account = this._accounts.assertExists(record.client);

    account.available -= amount;
    account.held += amount;

    this._history.setUnderDispute(record.tx, true);
  }

  private _resolve(record: TransactionRecord): void {
    const entry = this._assertDisputed(record);
    const amount = amountOrZero(entry.record.amount);
    const account = this._accounts.assertExists(record.client);

    account.held -= amount;
    account.available += amount;

    this._history.setUnderDispute(record.tx, false);
  }

  private _chargeback(record: TransactionRecord): void {
    const entry = this._assertDisputed(record);
    const amount = amountOrZero(entry.record.amount);
    const account = this._accounts.assertExists(record.client);

    account.held -= amount;
    account.total -= amount;
    account.locked = true;

    // Closing the dispute makes a repeated chargeback fail with NOT_DISPUTED
    this._history.setUnderDispute(record.tx, false);
  }

  /**
   * Checks shared by deposits and withdrawals, in order:
   * duplicate tx, invalid amount, locked account.
   */
  private _checkFundsMovement(record: TransactionRecord): { amount: number; account: AccountState } {
    if (this._history.has(record.tx)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION",
        `Invalid or non unique transaction (tx: ${String(record.tx)})`,
        { client: record.client, tx: record.tx },
      );
    }

    const amount = record.amount;
    if (!isValidAmount(amount)) {
      throw new LedgerError(
        "INVALID_AMOUNT",
        `Invalid amount: ${String(amount)} (tx: ${String(record.tx)})`,
        { client: record.client, tx: record.tx, amount },
      );
    }

    const account = this._accounts.assertExists(record.client);
    if (account.locked) {
      throw new LedgerError(
        "ACCOUNT_LOCKED",
        `Account (client id: ${String(record.client)}) is locked`,
        { client: record.client, tx: record.tx },
      );
    }

    return { amount, account };
  }

  private _assertDisputed(record: TransactionRecord): HistoryEntry {
    const entry = this._history.assertExists(record.tx);
    if (!entry.underDispute) {
      throw new LedgerError(
        "NOT_DISPUTED",
        `Transaction ${String(record.tx)} is not disputed`,
        { client: record.client, tx: record.tx },
      );
    }
    return entry;
  }

  private _snapshotOf(client: ClientId): AccountSnapshot {
    const snapshot = this._accounts.snapshot(client);
    if (snapshot === undefined) {
      throw new LedgerError("UNKNOWN_CLIENT", `Unknown client: ${String(client)}`, { client });
    }
    return snapshot;
  }

  // ─── Query Operations ────────────────────────────────────────────────

  /**
   * Snapshot of every account, in first-reference order.
   */
  exportAccounts(): readonly AccountSnapshot[] {
    return this._accounts.snapshotAll();
  }

  getAccount(client: ClientId): AccountSnapshot | undefined {
    return this._accounts.snapshot(client);
  }

  hasAccount(client: ClientId): boolean {
    return this._accounts.has(client);
  }

  /**
   * Stored deposit or withdrawal with its dispute flag.
   */
  getTransaction(tx: TxId): HistoryEntry | undefined {
    return this._history.get(tx);
  }

  get accountCount(): number {
    return this._accounts.count;
  }

  get transactionCount(): number {
    return this._history.count;
  }
}
