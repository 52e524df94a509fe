/**
 * Reconciliation statistics over transactions and live matches.
 */

import type { BankTransaction, TransactionStatus } from "@tallybook/types";
import type {
  HistogramBucket,
  MatchStatus,
  ReconciliationMatch,
  ReconciliationStats,
} from "./types.js";

const BUCKET_COUNT = 10;

/** 0–9, 10–19 … 80–89, 90–100. */
export function scoreHistogram(scores: readonly number[]): HistogramBucket[] {
  const counts = new Array<number>(BUCKET_COUNT).fill(0);
  for (const s of scores) {
    const index = Math.min(BUCKET_COUNT - 1, Math.max(0, Math.floor(s / 10)));
    counts[index] = (counts[index] ?? 0) + 1;
  }
  return counts.map((count, i) => ({
    from: i * 10,
    to: i === BUCKET_COUNT - 1 ? 100 : i * 10 + 9,
    count,
  }));
}

export function computeStats(
  transactions: readonly BankTransaction[],
  matches: readonly ReconciliationMatch[],
): ReconciliationStats {
  const transactionsByStatus: Record<TransactionStatus, number> = {
    pending: 0,
    matched: 0,
    unmatched: 0,
  };
  for (const txn of transactions) transactionsByStatus[txn.status] += 1;

  const live = matches.filter((m) => m.status !== "superseded");
  const matchesByStatus: Record<MatchStatus, number> = {
    pending: 0,
    auto_accepted: 0,
    pending_review: 0,
    accepted: 0,
    rejected: 0,
    superseded: 0,
  };
  for (const m of live) matchesByStatus[m.status] += 1;

  const total = transactions.length;
  const matched = transactionsByStatus.matched;
  return {
    totalTransactions: total,
    matchedTransactions: matched,
    matchRate: total === 0 ? 0 : matched / total,
    transactionsByStatus,
    matchesByStatus,
    scoreHistogram: scoreHistogram(live.map((m) => m.matchScore)),
  };
}
