/**
 * @ledgerline/ledger — Account book.
 *
 * Holds one balance record per client. Accounts are created lazily,
 * zero-initialised, the first time a client id is referenced, and are
 * never removed during a run.
 */

import type { AccountSnapshot, ClientId } from "@ledgerline/types";
import type { AccountState } from "./types.js";
import { LedgerError } from "./types.js";

function emptyAccount(): AccountState {
  return { available: 0, held: 0, total: 0, locked: false };
}

function toSnapshot(client: ClientId, account: AccountState): AccountSnapshot {
  return {
    client,
    available: account.available,
    held: account.held,
    total: account.total,
    locked: account.locked,
  };
}

export class AccountBook {
  private readonly _accounts: Map<ClientId, AccountState> = new Map();

  /**
   * Get the account for a client, creating an empty one on first reference.
   */
  getOrCreate(client: ClientId): AccountState {
    let account = this._accounts.get(client);
    if (account === undefined) {
      account = emptyAccount();
      this._accounts.set(client, account);
    }
    return account;
  }

  /**
   * Mutable account state. Throws if the client was never referenced.
   */
  assertExists(client: ClientId): AccountState {
    const account = this._accounts.get(client);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_CLIENT", `Unknown client: ${String(client)}`, { client });
    }
    return account;
  }

  has(client: ClientId): boolean {
    return this._accounts.has(client);
  }

  /**
   * Read-only snapshot of one account, or undefined if never referenced.
   */
  snapshot(client: ClientId): AccountSnapshot | undefined {
    const account = this._accounts.get(client);
    return account === undefined ? undefined : toSnapshot(client, account);
  }

  /**
   * Snapshots of every account, in first-reference order.
   */
  snapshotAll(): readonly AccountSnapshot[] {
    return [...this._accounts].map(([client, account]) => toSnapshot(client, account));
  }

  get count(): number {
    return this._accounts.size;
  }
}
