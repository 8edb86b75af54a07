/**
 * @ledgerline/csv — Account exporter.
 *
 * Renders account snapshots as CSV with the header
 * client,available,held,total,locked and one row per account.
 */

import Papa from "papaparse";
import type { AccountSnapshot } from "@ledgerline/types";
import { DEFAULT_PRECISION, formatAmount } from "@ledgerline/ledger";
import { DEFAULT_DELIMITER } from "./reader.js";

export const ACCOUNT_COLUMNS = ["client", "available", "held", "total", "locked"] as const;

export interface FormatAccountsOptions {
  /** Fractional digits kept when rendering amounts (default 4) */
  readonly precision?: number | undefined;
  readonly delimiter?: string | undefined;
}

/** Anything that accepts text chunks, such as process.stdout. */
export interface TextSink {
  write(chunk: string): unknown;
}

function toRow(account: AccountSnapshot, precision: number): string[] {
  return [
    String(account.client),
    formatAmount(account.available, precision),
    formatAmount(account.held, precision),
    formatAmount(account.total, precision),
    account.locked ? "true" : "false",
  ];
}

/**
 * Render accounts as newline-terminated CSV text.
 */
export function formatAccounts(
  accounts: readonly AccountSnapshot[],
  options: FormatAccountsOptions = {},
): string {
  const precision = options.precision ?? DEFAULT_PRECISION;
  const csv = Papa.unparse(
    {
      fields: [...ACCOUNT_COLUMNS],
      data: accounts.map((account) => toRow(account, precision)),
    },
    {
      delimiter: options.delimiter ?? DEFAULT_DELIMITER,
      newline: "\n",
    },
  );
  return `${csv}\n`;
}

/**
 * Render accounts and write them to a sink in a single chunk.
 */
export function writeAccounts(
  accounts: readonly AccountSnapshot[],
  sink: TextSink,
  options: FormatAccountsOptions = {},
): void {
  sink.write(formatAccounts(accounts, options));
}
