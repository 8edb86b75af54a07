/**
 * Account Types
 *
 * Read-only view of a client account as exported by the ledger.
 */

import type { ClientId } from "./transaction.js";

export interface AccountSnapshot {
  readonly client: ClientId;

  /** Funds immediately usable */
  readonly available: number;

  /** Funds frozen pending dispute resolution */
  readonly held: number;

  /** available + held */
  readonly total: number;

  /** Set by a chargeback; rejects further deposits and withdrawals */
  readonly locked: boolean;
}
