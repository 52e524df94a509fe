/**
 * Many-to-one grouping
 *
 * A settlement or payroll batch booked as one ledger entry often shows
 * up on the statement as several lines with the same description on
 * the same day. Such lines are summed and scored together against
 * single entries before each line is tried on its own.
 */

import { formatAmount, parseAmount, scaleDecimal } from "@tallybook/ledger";
import type { BankTransaction } from "@tallybook/types";
import { ReconcilerError } from "./errors.js";
import { hashCanonical } from "./hashing.js";
import { compositeScore, score } from "./scoring.js";
import { normalizeText } from "./text-similarity.js";
import type { CandidateEntry, ScoreContext, ScoreResult } from "./types.js";

/** Added to the amount dimension of a group, capped at 100. */
export const GROUP_AMOUNT_BONUS = 5;

export interface TransactionGroup {
  readonly key: string;
  /** Sorted by id. */
  readonly transactions: readonly BankTransaction[];
}

/** Substring match on the normalised text, so "settlements" still counts. */
export function isBatchDescription(description: string, keywords: readonly string[]): boolean {
  const text = normalizeText(description);
  if (text === "") return false;
  return keywords.some((keyword) => {
    const needle = normalizeText(keyword);
    return needle !== "" && text.includes(needle);
  });
}

/**
 * Lines on the same account, direction, currency and date whose
 * normalised descriptions are equal and name a batch keyword. Only
 * groups of two or more are returned, in first-seen order.
 */
export function buildManyToOneGroups(
  transactions: readonly BankTransaction[],
  keywords: readonly string[],
): TransactionGroup[] {
  const byKey = new Map<string, BankTransaction[]>();
  for (const txn of transactions) {
    if (!isBatchDescription(txn.description, keywords)) continue;
    const key = [
      txn.accountId,
      txn.direction,
      txn.money.currency,
      txn.txnDate,
      normalizeText(txn.description),
    ].join("|");
    byKey.set(key, [...(byKey.get(key) ?? []), txn]);
  }

  const groups: TransactionGroup[] = [];
  for (const [key, members] of byKey) {
    if (members.length < 2) continue;
    const sorted = [...members].sort((a, b) => (a.id < b.id ? -1 : a.id > b.id ? 1 : 0));
    groups.push({ key, transactions: sorted });
  }
  return groups;
}

/**
 * One transaction standing for the whole group: the first member with
 * the summed amount, trusted only if every member is.
 */
export function groupTransaction(group: TransactionGroup): BankTransaction {
  const first = group.transactions[0];
  if (first === undefined) {
    throw new ReconcilerError("INVALID_TRANSACTION", `Empty transaction group: "${group.key}"`);
  }
  const decimals = first.money.decimals;
  let total = 0n;
  for (const txn of group.transactions) {
    total += txn.money.decimals === decimals
      ? parseAmount(txn.money.amount, decimals)
      : scaleDecimal(txn.money.amount, decimals);
  }
  return {
    ...first,
    money: { ...first.money, amount: formatAmount(total, decimals) },
    trusted: group.transactions.every((t) => t.trusted),
  };
}

/** Score the group total against one entry. */
export function scoreGroup(
  composite: BankTransaction,
  candidate: CandidateEntry,
  context: ScoreContext,
): ScoreResult {
  const base = score(composite, [candidate], context);
  const breakdown = {
    ...base.breakdown,
    amount: Math.min(100, base.breakdown.amount + GROUP_AMOUNT_BONUS),
  };
  const { weighted, score: rounded } = compositeScore(breakdown, context.config.weights);
  return { ...base, breakdown, weighted, score: rounded, flags: ["many_to_one", ...base.flags] };
}

export function groupFingerprint(txnIds: readonly string[], entryIds: readonly string[]): string {
  return hashCanonical({ txnIds: [...txnIds].sort(), entryIds: [...entryIds].sort() });
}
