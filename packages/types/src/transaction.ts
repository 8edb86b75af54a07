/**
 * Transaction Types
 *
 * One input event of the replay stream. Records are produced by a record
 * source (CSV reader, test fixture) and consumed by the ledger.
 *
 * Rules:
 * - Records are immutable once created
 * - Amounts are IEEE doubles; no fixed-point conversion happens here
 * - `amount` is only meaningful for deposits and withdrawals
 */

/**
 * Every transaction kind the ledger understands, in canonical lowercase form.
 */
export const TRANSACTION_KINDS = [
  "deposit",
  "withdrawal",
  "dispute",
  "resolve",
  "chargeback",
] as const;

export type TransactionKind = (typeof TRANSACTION_KINDS)[number];

/** Client identifier (unsigned 16-bit range). */
export type ClientId = number;

/** Transaction identifier (unsigned 32-bit range, globally unique). */
export type TxId = number;

export const MAX_CLIENT_ID = 0xffff;
export const MAX_TX_ID = 0xffffffff;

/**
 * A single transaction record.
 */
export interface TransactionRecord {
  readonly kind: TransactionKind;

  /** Owner of the account the record applies to */
  readonly client: ClientId;

  /** Transaction id; disputes, resolves and chargebacks reference a stored one */
  readonly tx: TxId;

  /** Present for deposits and withdrawals only */
  readonly amount?: number | undefined;
}
