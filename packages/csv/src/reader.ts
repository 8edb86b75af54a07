/**
 * @ledgerline/csv — Transaction record source.
 *
 * Reads delimited text with a header row into a forward-only sequence of
 * read results, in input order. Each result is either a TransactionRecord
 * or the CsvError describing why that record could not be read; the
 * consumer decides whether to stop.
 *
 * Input rules:
 * - Header names are matched case-insensitively after trimming
 * - type, client and tx columns are required; amount is optional
 * - Every field is trimmed; an empty amount means "no amount"
 * - Blank lines are skipped
 */

import { readFileSync } from "node:fs";
import Papa from "papaparse";
import type { ParseError, ParseStepResult } from "papaparse";
import type { TransactionRecord } from "@ledgerline/types";
import { CsvError } from "./errors.js";
import { describeIssues, REQUIRED_COLUMNS, toRecord, TransactionRowSchema } from "./schema.js";

export type ReadResult =
  | { readonly ok: true; readonly record: TransactionRecord; readonly recordNumber: number }
  | { readonly ok: false; readonly error: CsvError };

export interface TransactionReaderOptions {
  /** Field delimiter (default ",") */
  readonly delimiter?: string | undefined;
}

export const DEFAULT_DELIMITER = ",";

/** One physical row as papaparse stepped over it, with the errors met on it. */
interface RawRow {
  readonly fields: readonly string[];
  readonly errors: readonly ParseError[];
}

/**
 * Step through the text row by row so every quote error stays attached to
 * the row it was found on.
 */
function readRows(text: string, delimiter: string): RawRow[] {
  const rows: RawRow[] = [];
  Papa.parse<string[]>(text, {
    delimiter,
    skipEmptyLines: "greedy",
    step: (result: ParseStepResult<string[]>) => {
      rows.push({ fields: result.data.map((value) => value.trim()), errors: result.errors });
    },
  });
  return rows;
}

function formatError(recordNumber: number, problems: readonly string[]): ReadResult {
  return {
    ok: false,
    error: new CsvError("INPUT_FORMAT", `Record ${String(recordNumber)}: ${problems.join("; ")}`, {
      recordNumber,
    }),
  };
}

export class TransactionReader implements Iterable<ReadResult> {
  private readonly _text: string;
  private readonly _delimiter: string;

  constructor(text: string, options: TransactionReaderOptions = {}) {
    this._text = text;
    this._delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  }

  /**
   * Read the whole file up front. I/O failures surface here as IO_ERROR;
   * format errors surface while iterating.
   */
  static fromFile(path: string, options: TransactionReaderOptions = {}): TransactionReader {
    let text: string;
    try {
      text = readFileSync(path, "utf8");
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new CsvError("IO_ERROR", `Cannot read "${path}": ${reason}`, { cause: err });
    }
    return new TransactionReader(text, options);
  }

  /**
   * Rows are split once, when iteration starts; each record is validated
   * only when it is pulled, in input order.
   */
  *[Symbol.iterator](): Iterator<ReadResult> {
    const [headerRow, ...dataRows] = readRows(this._text, this._delimiter);
    if (headerRow === undefined) {
      return;
    }

    if (headerRow.errors.length > 0) {
      yield {
        ok: false,
        error: new CsvError(
          "INPUT_FORMAT",
          `Header: ${headerRow.errors.map((e) => e.message).join("; ")}`,
          { recordNumber: 0 },
        ),
      };
      return;
    }

    const columns = headerRow.fields.map((name) => name.toLowerCase());
    const missing = REQUIRED_COLUMNS.filter((column) => !columns.includes(column));
    if (dataRows.length > 0 && missing.length > 0) {
      yield {
        ok: false,
        error: new CsvError("INPUT_FORMAT", `Missing column(s) in header: ${missing.join(", ")}`, {
          recordNumber: 0,
        }),
      };
      return;
    }

    for (const [index, row] of dataRows.entries()) {
      const recordNumber = index + 1;

      const problems = row.errors.map((e) => e.message);
      // Short rows are fine: missing required fields are caught by the schema
      if (row.fields.length > columns.length) {
        problems.push(
          `Too many fields: expected ${String(columns.length)} fields but parsed ${String(row.fields.length)}`,
        );
      }
      if (problems.length > 0) {
        yield formatError(recordNumber, problems);
        continue;
      }

      const keyed = Object.fromEntries(
        columns.slice(0, row.fields.length).map((name, i): [string, string | undefined] => [name, row.fields[i]]),
      );
      const result = TransactionRowSchema.safeParse(keyed);
      if (!result.success) {
        yield formatError(recordNumber, [describeIssues(result.error)]);
        continue;
      }

      yield { ok: true, record: toRecord(result.data), recordNumber };
    }
  }

  /**
   * Records in input order. Throws the first CsvError met.
   */
  *records(): Generator<TransactionRecord> {
    for (const result of this) {
      if (!result.ok) {
        throw result.error;
      }
      yield result.record;
    }
  }
}
