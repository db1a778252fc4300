/**
 * @fracta/ledger — Integer amount arithmetic.
 *
 * All arithmetic is bigint. Division truncates toward zero; callers
 * that divide own the rounding loss.
 */

import type { Amount } from "@fracta/types";
import { LedgerError } from "./types.js";

export function formatAmount(amount: Amount): string {
  return amount.toString();
}

/** Throws unless `amount > 0`. */
export function requirePositive(amount: Amount, what: string): void {
  if (amount <= 0n) {
    throw new LedgerError(
      "INVALID_ARGUMENT",
      "NON_POSITIVE_AMOUNT",
      `${what} must be positive, got ${amount.toString()}`,
    );
  }
}

/** `a * b / d`, truncated. */
export function mulDiv(a: Amount, b: Amount, d: Amount): Amount {
  if (d === 0n) {
    throw new RangeError("mulDiv by zero");
  }
  return (a * b) / d;
}

/** `amount * percentage / 100`, truncated. */
export function percentOf(amount: Amount, percentage: number): Amount {
  if (!Number.isInteger(percentage) || percentage < 0 || percentage > 100) {
    throw new RangeError(`Percentage must be an integer in [0, 100], got ${percentage}`);
  }
  return mulDiv(amount, BigInt(percentage), 100n);
}
