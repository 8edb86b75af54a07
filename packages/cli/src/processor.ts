/**
 * @ledgerline/cli — Processing loop.
 *
 * Feeds read results into the ledger strictly in order. A format error
 * always stops the run; a rejected record stops it under the "halt"
 * policy and is logged and skipped under "skip".
 */

import type { Logger } from "pino";
import type { TransactionRecord } from "@ledgerline/types";
import type { Ledger, LedgerErrorCode } from "@ledgerline/ledger";
import { LedgerError } from "@ledgerline/ledger";
import type { ReadResult } from "@ledgerline/csv";
import type { ErrorPolicy } from "./config.js";

export interface ProcessOptions {
  readonly logger: Logger;
  /** Default "halt" */
  readonly onError?: ErrorPolicy | undefined;
}

export interface RejectedRecord {
  readonly recordNumber: number;
  readonly record: TransactionRecord;
  readonly code: LedgerErrorCode;
  readonly message: string;
}

export interface ProcessSummary {
  readonly applied: number;
  readonly rejected: readonly RejectedRecord[];
}

/**
 * Apply every record of the source to the ledger.
 *
 * @throws {CsvError} on the first unreadable record
 * @throws {LedgerError} on the first rejected record under "halt"
 */
export function processTransactions(
  source: Iterable<ReadResult>,
  ledger: Ledger,
  options: ProcessOptions,
): ProcessSummary {
  const { logger } = options;
  const policy = options.onError ?? "halt";
  const rejected: RejectedRecord[] = [];
  let applied = 0;

  for (const result of source) {
    if (!result.ok) {
      throw result.error;
    }

    const { record, recordNumber } = result;
    logger.debug({ recordNumber, record }, "Processing record");

    try {
      ledger.apply(record);
      applied++;
    } catch (err) {
      if (!(err instanceof LedgerError) || policy === "halt") {
        throw err;
      }
      logger.warn({ recordNumber, record, code: err.code }, `Skipping record: ${err.message}`);
      rejected.push({ recordNumber, record, code: err.code, message: err.message });
    }
  }

  return { applied, rejected };
}
