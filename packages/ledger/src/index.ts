/**
 * @ledgerline/ledger — Transaction replay ledger engine.
 *
 * A pure TypeScript ledger with zero runtime dependencies.
 * Enforces the account invariants:
 * - total == available + held after every successful operation
 * - Tx ids of stored deposits/withdrawals are unique
 * - Disputes reference stored transactions; resolves and chargebacks
 *   reference disputed ones
 * - Locked accounts reject deposits and withdrawals
 */

// Core engine
export { Ledger } from "./ledger.js";

// State containers
export { AccountBook } from "./accounts.js";
export { TransactionHistory } from "./history.js";

// Money helpers
export {
  DEFAULT_PRECISION,
  MAX_PRECISION,
  isValidAmount,
  amountOrZero,
  wasAbsorbed,
  formatAmount,
} from "./money-math.js";

// Types
export type {
  AccountState,
  HistoryEntry,
  LedgerErrorCode,
  LedgerErrorDetails,
} from "./types.js";

export { LedgerError } from "./types.js";
