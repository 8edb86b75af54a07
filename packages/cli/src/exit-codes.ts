/**
 * Process exit codes, one per failure class.
 */

import { LedgerError } from "@ledgerline/ledger";
import { CsvError } from "@ledgerline/csv";

export const EXIT_CODES = {
  OK: 0,
  USAGE: 1,
  IO: 2,
  INPUT_FORMAT: 3,
  LEDGER: 4,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/**
 * Map a failure to its exit code. Returns undefined for errors that are
 * not part of the run's failure taxonomy.
 */
export function exitCodeFor(err: unknown): ExitCode | undefined {
  if (err instanceof LedgerError) {
    return EXIT_CODES.LEDGER;
  }
  if (err instanceof CsvError) {
    return err.code === "IO_ERROR" ? EXIT_CODES.IO : EXIT_CODES.INPUT_FORMAT;
  }
  return undefined;
}
