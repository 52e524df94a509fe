/**
 * @tallybook/ledger — Display helpers.
 *
 * Values here are for humans. Nothing in this file may feed a
 * posting decision; the ledger balances exactly.
 */

import type { Money } from "@tallybook/types";
import { assertSameCurrency, formatAmount, parseAmount, scaleDecimal } from "./money-math.js";

/** Largest difference two amounts may show and still print as equal. */
export const DISPLAY_EPSILON = "0.01";

export const DISPLAY_DECIMALS = 2;

/**
 * True when |a − b| ≤ DISPLAY_EPSILON.
 */
export function withinDisplayTolerance(a: Money, b: Money): boolean {
  assertSameCurrency(a, b);
  const diff = parseAmount(a.amount, a.decimals) - parseAmount(b.amount, b.decimals);
  const abs = diff < 0n ? -diff : diff;
  return abs <= scaleDecimal(DISPLAY_EPSILON, a.decimals);
}

/**
 * Round half-up to two decimal places. Amounts with two or fewer
 * decimals are returned unchanged.
 */
export function roundForDisplay(money: Money): Money {
  if (money.decimals <= DISPLAY_DECIMALS) {
    return money;
  }
  const rounded = scaleDecimal(money.amount, DISPLAY_DECIMALS);
  return {
    amount: formatAmount(rounded, DISPLAY_DECIMALS),
    currency: money.currency,
    decimals: DISPLAY_DECIMALS,
  };
}
