/**
 * Statement balance check: opening + inflows − outflows must equal the
 * closing balance within one cent. A failure lowers trust in the
 * extracted transactions; it never blocks ingestion.
 */

import { formatAmount, parseAmount, scaleDecimal } from "@tallybook/ledger";
import type { Money } from "@tallybook/types";
import type { TransactionInput } from "./types.js";

export const STATEMENT_BALANCE_TOLERANCE = "0.01";

export interface StatementBalanceResult {
  readonly passed: boolean;
  readonly expectedClosing: string;
  readonly actualClosing: string;
  readonly difference: string;
}

function scaled(money: Money, decimals: number): bigint {
  return money.decimals === decimals
    ? parseAmount(money.amount, decimals)
    : scaleDecimal(money.amount, decimals);
}

export function verifyStatementBalance(
  opening: Money,
  closing: Money,
  transactions: readonly TransactionInput[],
): StatementBalanceResult {
  const decimals = Math.max(
    opening.decimals,
    closing.decimals,
    ...transactions.map((t) => t.money.decimals),
  );

  let expected = scaled(opening, decimals);
  for (const txn of transactions) {
    const amount = scaled(txn.money, decimals);
    expected += txn.direction === "in" ? amount : -amount;
  }
  const actual = scaled(closing, decimals);
  const diff = expected - actual;
  const tolerance = scaleDecimal(STATEMENT_BALANCE_TOLERANCE, decimals);

  return {
    passed: (diff < 0n ? -diff : diff) <= tolerance,
    expectedClosing: formatAmount(expected, decimals),
    actualClosing: formatAmount(actual, decimals),
    difference: formatAmount(diff, decimals),
  };
}
