/**
 * @ledgerline/csv — CSV adapters around the ledger.
 *
 * - TransactionReader: header-keyed CSV → TransactionRecord stream
 * - formatAccounts / writeAccounts: account snapshots → CSV
 */

export { TransactionReader, DEFAULT_DELIMITER } from "./reader.js";
export type { ReadResult, TransactionReaderOptions } from "./reader.js";

export { formatAccounts, writeAccounts, ACCOUNT_COLUMNS } from "./exporter.js";
export type { FormatAccountsOptions, TextSink } from "./exporter.js";

export { TransactionRowSchema, REQUIRED_COLUMNS, toRecord, describeIssues, parseAmount } from "./schema.js";
export type { TransactionRow } from "./schema.js";

export { CsvError } from "./errors.js";
export type { CsvErrorCode, CsvErrorOptions } from "./errors.js";
