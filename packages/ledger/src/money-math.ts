/**
 * @ledgerline/ledger — Floating-point money helpers.
 *
 * Amounts are IEEE doubles end to end. These helpers hold the few
 * numeric rules the engine and the exporter share.
 *
 * Rules:
 * - NaN and ±Infinity are never valid amounts
 * - No rounding inside the engine; rounding happens only when rendering
 */

/** Default number of fractional digits used when rendering amounts. */
export const DEFAULT_PRECISION = 4;

/** Largest precision accepted by Number.prototype.toFixed that still means something for a double. */
export const MAX_PRECISION = 17;

/**
 * Whether an amount may be deposited or withdrawn.
 * Must be finite and strictly positive.
 */
export function isValidAmount(amount: number | undefined): amount is number {
  return amount !== undefined && Number.isFinite(amount) && amount > 0;
}

/**
 * Amount carried by a stored record, 0 when it has none.
 */
export function amountOrZero(amount: number | undefined): number {
  return amount ?? 0;
}

/**
 * Whether adding a non-zero amount left the value unchanged,
 * i.e. the addend was absorbed by the double's range.
 */
export function wasAbsorbed(before: number, after: number, amount: number): boolean {
  return amount !== 0 && before === after;
}

/** Number.prototype.toFixed switches to exponent notation from here on. */
const FIXED_NOTATION_LIMIT = 1e21;

/**
 * Render an amount as a decimal string, never in exponent notation.
 *
 * Rounds to `precision` fractional digits and drops trailing zeros:
 * 25.11 → "25.11", 0.10999999999999943 → "0.11", -0.00001 → "0".
 */
export function formatAmount(value: number, precision: number = DEFAULT_PRECISION): string {
  if (!Number.isInteger(precision) || precision < 0 || precision > MAX_PRECISION) {
    throw new RangeError(`Precision must be an integer in 0..${String(MAX_PRECISION)}, got ${String(precision)}`);
  }
  if (!Number.isFinite(value)) {
    return String(value);
  }
  // Doubles this large are integers, so BigInt gives every digit exactly
  const fixed =
    Math.abs(value) < FIXED_NOTATION_LIMIT ? value.toFixed(precision) : BigInt(value).toString();
  const trimmed = fixed.includes(".") ? fixed.replace(/\.?0+$/, "") : fixed;
  return trimmed === "-0" ? "0" : trimmed;
}
