/**
 * @ledgerline/csv — Error types for the CSV adapters.
 */

/** Error codes raised at the input boundary. */
export type CsvErrorCode = "IO_ERROR" | "INPUT_FORMAT";

export interface CsvErrorOptions {
  /** 1-based data record the error refers to (the header row is record 0) */
  readonly recordNumber?: number | undefined;
  readonly cause?: unknown;
}

/**
 * Structured error from the record source.
 */
export class CsvError extends Error {
  public readonly code: CsvErrorCode;
  public readonly recordNumber: number | undefined;

  constructor(code: CsvErrorCode, message: string, options: CsvErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "CsvError";
    this.code = code;
    this.recordNumber = options.recordNumber;
  }
}
