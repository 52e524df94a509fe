/**
 * Transfers between own accounts
 *
 * Each leg of a transfer is booked against a clearing account:
 *
 *   OUT: debit clearing / credit bank   "Transfer OUT: <description>"
 *   IN:  debit bank / credit clearing   "Transfer IN: <description>"
 *
 * Once both legs are booked the clearing balance nets to zero. A leg
 * left alone stays visible there and is reported as unpaired_transfer.
 */

import type { DraftInput } from "@tallybook/ledger";
import { isBalanceBearing, lifecycleStatus, parseAmount, scaleDecimal } from "@tallybook/ledger";
import type { BankTransaction, JournalEntry, Money } from "@tallybook/types";
import { absDaysBetween } from "./dates.js";
import { buildDraftForTransaction } from "./entry-drafter.js";
import { containsPhrase, textSimilarity } from "./text-similarity.js";
import type { TransferPair, TransferScoreBreakdown } from "./types.js";

export const TRANSFER_OUT_PREFIX = "Transfer OUT: ";
export const TRANSFER_IN_PREFIX = "Transfer IN: ";

const WEIGHTS: Readonly<Record<keyof TransferScoreBreakdown, number>> = {
  amount: 40,
  description: 30,
  date: 20,
};

/** Differences up to `within` (currency units) score `score`. */
const AMOUNT_BANDS: readonly { readonly within: string; readonly score: number }[] = [
  { within: "0.01", score: 100 },
  { within: "0.10", score: 95 },
  { within: "1.00", score: 85 },
  { within: "5.00", score: 70 },
];

const DATE_BANDS: readonly { readonly maxDays: number; readonly score: number }[] = [
  { maxDays: 0, score: 100 },
  { maxDays: 1, score: 95 },
  { maxDays: 3, score: 85 },
  { maxDays: 7, score: 70 },
];
const DATE_DECAY_PER_DAY = 10;

const round2 = (n: number): number => Math.round(n * 100) / 100;

/** Whole-word keyword match, so "fast" never hits "breakfast". */
export function looksLikeTransfer(description: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => containsPhrase(description, keyword));
}

/** Draft for one leg, the clearing account standing in for the other side. */
export function buildTransferDraft(txn: BankTransaction, clearingAccountId: string): DraftInput {
  const prefix = txn.direction === "out" ? TRANSFER_OUT_PREFIX : TRANSFER_IN_PREFIX;
  return buildDraftForTransaction(txn, {
    counterAccountId: clearingAccountId,
    memo: `${prefix}${txn.description}`,
    sourceType: "system_adjustment",
  });
}

// =============================================================================
// Scoring
// =============================================================================

export function transferAmountScore(out: Money, inbound: Money): number {
  const decimals = out.decimals;
  const a = parseAmount(out.amount, decimals);
  const b = inbound.decimals === decimals
    ? parseAmount(inbound.amount, decimals)
    : scaleDecimal(inbound.amount, decimals);
  const diff = a > b ? a - b : b - a;

  for (const band of AMOUNT_BANDS) {
    if (diff <= scaleDecimal(band.within, decimals)) return band.score;
  }
  if (a === 0n) return 0;
  return round2(Math.max(0, 100 - (Number(diff) / Number(a)) * 100));
}

export function transferDateScore(days: number): number {
  const distance = Math.abs(days);
  for (const band of DATE_BANDS) {
    if (distance <= band.maxDays) return band.score;
  }
  return Math.max(0, 100 - distance * DATE_DECAY_PER_DAY);
}

function memoBody(memo: string): string {
  for (const prefix of [TRANSFER_OUT_PREFIX, TRANSFER_IN_PREFIX]) {
    if (memo.startsWith(prefix)) return memo.slice(prefix.length);
  }
  return memo;
}

export function transferDescriptionScore(outMemo: string, inMemo: string): number {
  return round2(100 * textSimilarity(memoBody(outMemo), memoBody(inMemo)));
}

export function transferConfidence(breakdown: TransferScoreBreakdown): number {
  const keys: readonly (keyof TransferScoreBreakdown)[] = ["amount", "description", "date"];
  const total = keys.reduce((sum, k) => sum + WEIGHTS[k], 0);
  return Math.round(keys.reduce((sum, k) => sum + breakdown[k] * WEIGHTS[k], 0) / total);
}

// =============================================================================
// Pairing
// =============================================================================

export interface TransferLeg {
  readonly entryId: string;
  readonly entryDate: string;
  readonly memo: string;
  readonly clearingAccountId: string;
  readonly direction: "out" | "in";
  readonly money: Money;
}

/**
 * Booked legs: posted or reconciled system adjustments that are not
 * voided and touch a clearing account. A debited clearing account is
 * an OUT leg, a credited one an IN leg.
 */
export function transferLegs(
  entries: readonly JournalEntry[],
  clearingIds: ReadonlySet<string>,
): TransferLeg[] {
  const legs: TransferLeg[] = [];
  for (const entry of entries) {
    if (entry.sourceType !== "system_adjustment" || !isBalanceBearing(entry)) continue;
    if (entry.reversalOf !== undefined || lifecycleStatus(entry) === "void") continue;
    const line = entry.lines.find((l) => clearingIds.has(l.accountId));
    if (line === undefined) continue;
    legs.push({
      entryId: entry.id,
      entryDate: entry.entryDate,
      memo: entry.memo,
      clearingAccountId: line.accountId,
      direction: line.direction === "debit" ? "out" : "in",
      money: line.money,
    });
  }
  return legs;
}

const byDateThenId = (a: TransferLeg, b: TransferLeg): number =>
  a.entryDate.localeCompare(b.entryDate) || a.entryId.localeCompare(b.entryId);

/**
 * Pair each OUT leg, earliest first, with the unused IN leg on the same
 * clearing account and currency that scores highest at or above
 * `threshold`. Ties go to the nearer date, then the lower entry id.
 */
export function pairTransferLegs(legs: readonly TransferLeg[], threshold: number): TransferPair[] {
  const outs = legs.filter((l) => l.direction === "out").sort(byDateThenId);
  const ins = legs.filter((l) => l.direction === "in").sort(byDateThenId);
  const used = new Set<string>();
  const pairs: TransferPair[] = [];

  for (const out of outs) {
    let best: TransferPair | undefined;
    for (const inbound of ins) {
      if (used.has(inbound.entryId)) continue;
      if (inbound.clearingAccountId !== out.clearingAccountId) continue;
      if (inbound.money.currency !== out.money.currency) continue;

      const dateDiffDays = absDaysBetween(out.entryDate, inbound.entryDate);
      const breakdown: TransferScoreBreakdown = {
        amount: transferAmountScore(out.money, inbound.money),
        description: transferDescriptionScore(out.memo, inbound.memo),
        date: transferDateScore(dateDiffDays),
      };
      const confidence = transferConfidence(breakdown);
      if (confidence < threshold) continue;
      if (
        best !== undefined &&
        (confidence < best.confidence ||
          (confidence === best.confidence && dateDiffDays >= best.dateDiffDays))
      ) {
        continue;
      }
      best = {
        clearingAccountId: out.clearingAccountId,
        outEntryId: out.entryId,
        inEntryId: inbound.entryId,
        amount: out.money,
        outDate: out.entryDate,
        inDate: inbound.entryDate,
        dateDiffDays,
        confidence,
        breakdown,
      };
    }
    if (best !== undefined) {
      used.add(best.inEntryId);
      pairs.push(best);
    }
  }
  return pairs;
}
