/**
 * Scoring Engine
 *
 * Scores a (transaction, entry set) pair on five dimensions and blends
 * them into a composite 0..100 score. Pure: identical input always
 * gives identical output, and nothing here reads shared state.
 *
 * Dimensions:
 * - amount: exact, within fee tolerance, aggregate, or bounded decay
 * - date: banded proximity, aggregates use the worst leg
 * - description: bigram Dice + token Jaccard, or a reference hit
 * - businessFit: account-type plausibility for the direction
 * - history: agreement with the payee's prior accepted matches
 */

import { applyRate, parseAmount, scaleDecimal } from "@tallybook/ledger";
import type { BankTransaction, Money, TransactionDirection } from "@tallybook/types";
import { absDaysBetween, daysBetween } from "./dates.js";
import { hashCanonical } from "./hashing.js";
import { payeeKey, referenceMatches, textSimilarity } from "./text-similarity.js";
import type {
  BusinessFitTable,
  CandidateEntry,
  HistoryRecord,
  MatchFlag,
  ReconcilerConfig,
  ScoreContext,
  ScoreResult,
  ScoreWeights,
} from "./types.js";

const EXACT_SCORE = 100;
const FEE_BAND_SCORE = 90;
const AGGREGATE_SCORE = 70;

const HISTORY_NEUTRAL = 50;
const HISTORY_REGULAR = 100;
const HISTORY_FAMILIAR = 90;
const HISTORY_DEVIATION = 20;
const HISTORY_OTHER = 60;
const REGULAR_INTERVAL_SLACK_DAYS = 3;

const round2 = (n: number): number => Math.round(n * 100) / 100;

// =============================================================================
// Amount
// =============================================================================

/** Amount in minor units at the transaction's scale, sign dropped. */
function scaledAbs(money: Money, decimals: number): bigint {
  const v = money.decimals === decimals
    ? parseAmount(money.amount, decimals)
    : scaleDecimal(money.amount, decimals);
  return v < 0n ? -v : v;
}

/**
 * Fee tolerance in minor units: max(|amount| × percent, absolute).
 */
export function feeTolerance(money: Money, config: ReconcilerConfig): bigint {
  const relative = applyRate(scaledAbs(money, money.decimals), config.feeTolerance.percent);
  const floor = scaleDecimal(config.feeTolerance.absolute, money.decimals);
  return relative > floor ? relative : floor;
}

export function amountScore(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
  config: ReconcilerConfig,
): number {
  const decimals = txn.money.decimals;
  const target = scaledAbs(txn.money, decimals);
  const total = candidates.reduce((sum, c) => sum + scaledAbs(c.amount, decimals), 0n);
  const diff = target > total ? target - total : total - target;

  if (diff === 0n) return EXACT_SCORE;
  if (target === 0n) return 0;

  const tolerance = feeTolerance(txn.money, config);
  if (candidates.length === 1 && diff <= tolerance) return FEE_BAND_SCORE;
  if (candidates.length > 1 && diff <= tolerance * 2n) return AGGREGATE_SCORE;

  const relDiff = Number(diff) / Number(target);
  const span = Number(config.amountDecaySpan);
  return round2(AGGREGATE_SCORE * Math.max(0, 1 - relDiff / span));
}

// =============================================================================
// Date
// =============================================================================

/**
 * Banded score for a distance in days. Beyond the last band the score
 * drops by `dateBeyondDecayPerDay` per extra day, floored at 0.
 */
export function dateScoreForDays(days: number, config: ReconcilerConfig): number {
  const distance = Math.abs(days);
  for (const band of config.dateBands) {
    if (distance <= band.maxDays) return band.score;
  }
  const lastBand = config.dateBands[config.dateBands.length - 1]?.maxDays ?? 0;
  return Math.max(
    0,
    config.dateBeyondScore - (distance - lastBand - 1) * config.dateBeyondDecayPerDay,
  );
}

export function dateScore(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
  config: ReconcilerConfig,
): number {
  if (candidates.length === 0) return 0;
  return Math.min(
    ...candidates.map((c) => dateScoreForDays(absDaysBetween(txn.txnDate, c.entryDate), config)),
  );
}

// =============================================================================
// Description
// =============================================================================

function descriptionScoreFor(txn: BankTransaction, candidate: CandidateEntry): number {
  if (
    txn.reference !== undefined &&
    referenceMatches(txn.reference, candidate.memo, candidate.tags)
  ) {
    return EXACT_SCORE;
  }

  const sources = [txn.description, ...(txn.reference !== undefined ? [txn.reference] : [])];
  const targets = [candidate.memo, ...candidate.tags];
  let best = 0;
  for (const source of sources) {
    for (const target of targets) {
      best = Math.max(best, textSimilarity(source, target));
    }
  }
  return round2(EXACT_SCORE * best);
}

export function descriptionScore(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
): number {
  return candidates.reduce((best, c) => Math.max(best, descriptionScoreFor(txn, c)), 0);
}

// =============================================================================
// Business fit
// =============================================================================

export function businessFitFor(
  direction: TransactionDirection,
  candidate: CandidateEntry,
  table: BusinessFitTable,
): number {
  const types = new Set(candidate.accountTypes);
  for (const rule of table.rules) {
    if (rule.direction !== direction) continue;
    if (!rule.accountTypes.every((t) => types.has(t))) continue;
    if (rule.clearing === true && !candidate.touchesClearing) continue;
    if (rule.exclusive === true && [...types].some((t) => !rule.accountTypes.includes(t))) continue;
    return rule.score;
  }
  return table.fallback;
}

export function businessFitScore(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
  config: ReconcilerConfig,
): number {
  if (candidates.length === 0) return config.businessFit.fallback;
  return Math.min(
    ...candidates.map((c) => businessFitFor(txn.direction, c, config.businessFit)),
  );
}

// =============================================================================
// History
// =============================================================================

function medianOf(values: readonly bigint[]): bigint {
  const sorted = [...values].sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0n;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[mid - 1] ?? upper) + upper) / 2n;
}

function medianNumber(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const mid = Math.floor(sorted.length / 2);
  const upper = sorted[mid] ?? 0;
  return sorted.length % 2 === 1 ? upper : ((sorted[mid - 1] ?? upper) + upper) / 2;
}

/**
 * The gap from the latest prior to this transaction sits within a few
 * days of the median gap between priors.
 */
function isRegularInterval(priorDates: readonly string[], txnDate: string): boolean {
  if (priorDates.length < 2) return false;
  const sorted = [...priorDates].sort();
  const gaps: number[] = [];
  for (let i = 1; i < sorted.length; i++) {
    gaps.push(daysBetween(sorted[i - 1] ?? "", sorted[i] ?? ""));
  }
  const typical = medianNumber(gaps);
  const last = sorted[sorted.length - 1] ?? txnDate;
  const gap = daysBetween(last, txnDate);
  return typical > 0 && Math.abs(gap - typical) <= REGULAR_INTERVAL_SLACK_DAYS;
}

export interface HistoryOutcome {
  readonly score: number;
  readonly deviation: boolean;
}

export function historyScore(
  txn: BankTransaction,
  history: readonly HistoryRecord[],
  config: ReconcilerConfig,
): HistoryOutcome {
  const key = payeeKey(txn.description);
  const priors = history.filter(
    (h) =>
      h.bankTxnId !== txn.id &&
      h.money.currency === txn.money.currency &&
      key !== "" &&
      payeeKey(h.description) === key,
  );
  if (priors.length === 0) {
    return { score: HISTORY_NEUTRAL, deviation: false };
  }

  const decimals = txn.money.decimals;
  const target = scaledAbs(txn.money, decimals);
  const tolerance = feeTolerance(txn.money, config);
  const amounts = priors.map((p) => scaledAbs(p.money, decimals));

  const familiar = amounts.some((a) => (a > target ? a - target : target - a) <= tolerance);
  if (familiar) {
    const regular = isRegularInterval(priors.map((p) => p.txnDate), txn.txnDate);
    return { score: regular ? HISTORY_REGULAR : HISTORY_FAMILIAR, deviation: false };
  }

  const median = medianOf(amounts);
  const spread = median > target ? median - target : target - median;
  if (median > 0n && spread * 2n > median) {
    return { score: HISTORY_DEVIATION, deviation: true };
  }
  return { score: HISTORY_OTHER, deviation: false };
}

// =============================================================================
// Composite
// =============================================================================

export function compositeScore(
  breakdown: Readonly<Record<keyof ScoreWeights, number>>,
  weights: ScoreWeights,
): { weighted: number; score: number } {
  const keys: readonly (keyof ScoreWeights)[] = [
    "amount",
    "date",
    "description",
    "businessFit",
    "history",
  ];
  const totalWeight = keys.reduce((sum, k) => sum + weights[k], 0);
  const raw = totalWeight === 0
    ? 0
    : keys.reduce((sum, k) => sum + breakdown[k] * weights[k], 0) / totalWeight;
  // Trim float noise so 84.4999999 cannot round differently from 84.5.
  const weighted = Math.min(100, Math.max(0, Math.round(raw * 1e6) / 1e6));
  return { weighted, score: Math.floor(weighted + 0.5) };
}

/**
 * Score one transaction against one candidate set (a single entry or
 * an aggregate of several).
 */
export function score(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
  context: ScoreContext,
): ScoreResult {
  const { config } = context;
  const history = historyScore(txn, context.history, config);
  const breakdown = {
    amount: amountScore(txn, candidates, config),
    date: dateScore(txn, candidates, config),
    description: descriptionScore(txn, candidates),
    businessFit: businessFitScore(txn, candidates, config),
    history: history.score,
  };
  const { weighted, score: rounded } = compositeScore(breakdown, config.weights);

  const flags: MatchFlag[] = [];
  if (candidates.length > 1) flags.push("aggregate");
  if (history.deviation) flags.push("pattern_deviation");
  if (!txn.trusted) flags.push("low_trust");

  return {
    entryIds: candidates.map((c) => c.entryId).sort(),
    score: rounded,
    weighted,
    breakdown,
    flags,
  };
}

/**
 * Order results best-first: score, then unrounded composite, then
 * fewer entries, then entry ids. Total, so ties never depend on input
 * order.
 */
export function compareResults(a: ScoreResult, b: ScoreResult): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.weighted !== b.weighted) return b.weighted - a.weighted;
  if (a.entryIds.length !== b.entryIds.length) return a.entryIds.length - b.entryIds.length;
  const ka = a.entryIds.join(",");
  const kb = b.entryIds.join(",");
  return ka < kb ? -1 : ka > kb ? 1 : 0;
}

/**
 * Stable identity of a candidate across runs: SHA-256 over the
 * RFC 8785 canonical form of the transaction id and sorted entry ids.
 */
export function fingerprint(txnId: string, entryIds: readonly string[]): string {
  return hashCanonical({ txnId, entryIds: [...entryIds].sort() });
}
