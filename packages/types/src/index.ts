/**
 * @ledgerline/types — Shared domain types for the ledgerline stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types: meaning lives in the ledger
 */

// Transaction types
export type {
  TransactionKind,
  TransactionRecord,
  ClientId,
  TxId,
} from "./transaction.js";

export {
  TRANSACTION_KINDS,
  MAX_CLIENT_ID,
  MAX_TX_ID,
} from "./transaction.js";

// Account types
export type { AccountSnapshot } from "./account.js";

// Runtime type guards
export {
  isTransactionKind,
  isClientId,
  isTxId,
  isTransactionRecord,
  isAccountSnapshot,
} from "./guards.js";
