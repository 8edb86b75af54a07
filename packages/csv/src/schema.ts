/**
 * @ledgerline/csv — Row validation.
 *
 * Zod schema turning one trimmed, header-keyed CSV row into a
 * TransactionRecord. Column names are already lowercased by the reader.
 */

import { z } from "zod";
import type { TransactionRecord } from "@ledgerline/types";
import { MAX_CLIENT_ID, MAX_TX_ID, TRANSACTION_KINDS } from "@ledgerline/types";

/** Columns every input file must carry. `amount` may be absent. */
export const REQUIRED_COLUMNS = ["type", "client", "tx"] as const;

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;
const NAN_PATTERN = /^[+-]?nan$/i;
const INFINITY_PATTERN = /^([+-]?)inf(?:inity)?$/i;

/**
 * Read an amount field. NaN and infinity tokens become non-finite numbers
 * so the ledger rejects them; anything else that is not a decimal number
 * reads as "no amount".
 */
export function parseAmount(raw: string): number | undefined {
  if (DECIMAL_PATTERN.test(raw)) {
    return Number(raw);
  }
  if (NAN_PATTERN.test(raw)) {
    return Number.NaN;
  }
  const infinity = INFINITY_PATTERN.exec(raw);
  if (infinity !== null) {
    return infinity[1] === "-" ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY;
  }
  return undefined;
}

function unsignedId(label: string, max: number) {
  return z.string({ required_error: `${label} is required` }).transform((raw, ctx) => {
    if (!/^\d+$/.test(raw)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be an unsigned integer` });
      return z.NEVER;
    }
    const id = Number(raw);
    if (id > max) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `${label} must be at most ${String(max)}` });
      return z.NEVER;
    }
    return id;
  });
}

export const TransactionRowSchema = z.object({
  type: z
    .string({ required_error: "type is required" })
    .toLowerCase()
    .pipe(z.enum(TRANSACTION_KINDS)),
  client: unsignedId("client", MAX_CLIENT_ID),
  tx: unsignedId("tx", MAX_TX_ID),
  amount: z
    .string()
    .optional()
    .transform((raw) => (raw === undefined ? undefined : parseAmount(raw))),
});

export type TransactionRow = z.infer<typeof TransactionRowSchema>;

export function toRecord(row: TransactionRow): TransactionRecord {
  return row.amount === undefined
    ? { kind: row.type, client: row.client, tx: row.tx }
    : { kind: row.type, client: row.client, tx: row.tx, amount: row.amount };
}

/**
 * Flatten zod issues into one line: "client: client must be an unsigned integer".
 */
export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
