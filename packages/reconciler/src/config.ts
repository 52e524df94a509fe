/**
 * Reconciler configuration: defaults, validation and per-account
 * resolution. Configuration is plain data so it can be loaded from a
 * file and tuned without code changes.
 */

import { isPositiveDecimal } from "@tallybook/ledger";
import { ReconcilerError } from "./errors.js";
import type {
  AccountOverride,
  AnomalyConfig,
  BusinessFitRule,
  ReconcilerConfig,
  ScoreWeights,
  Severity,
  Thresholds,
} from "./types.js";

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_THRESHOLDS: Thresholds = { autoAccept: 85, review: 60 };

export const DEFAULT_WEIGHTS: ScoreWeights = {
  amount: 40,
  date: 25,
  description: 20,
  businessFit: 10,
  history: 5,
};

const INFLOW_RULES: readonly BusinessFitRule[] = [
  { direction: "in", accountTypes: ["asset", "income"], score: 100 },
  { direction: "in", accountTypes: ["asset", "liability"], score: 85 },
  { direction: "in", accountTypes: ["asset"], clearing: true, score: 85 },
  { direction: "in", accountTypes: ["asset", "equity"], score: 75 },
  { direction: "in", accountTypes: ["asset"], exclusive: true, score: 30 },
];

const OUTFLOW_RULES: readonly BusinessFitRule[] = [
  { direction: "out", accountTypes: ["asset", "expense"], score: 100 },
  { direction: "out", accountTypes: ["asset", "liability"], score: 90 },
  { direction: "out", accountTypes: ["asset"], clearing: true, score: 85 },
  { direction: "out", accountTypes: ["asset", "equity"], score: 60 },
  { direction: "out", accountTypes: ["asset"], exclusive: true, score: 30 },
];

export const DEFAULT_TRANSFER_KEYWORDS: readonly string[] = [
  "transfer",
  "payment to",
  "fund transfer",
  "withdrawal",
  "paynow",
  "fast",
  "giro",
];

export const DEFAULT_BATCH_KEYWORDS: readonly string[] = ["batch", "bulk", "settlement", "aggregate"];

export const DEFAULT_ANOMALY_CONFIG: AnomalyConfig = {
  lookbackDays: 30,
  largeAmountMultiple: "10",
  weekendMultiple: "5",
  spikeCount: 5,
  newMerchantDays: 90,
};

export const DEFAULT_RECONCILER_CONFIG: ReconcilerConfig = {
  thresholds: DEFAULT_THRESHOLDS,
  weights: DEFAULT_WEIGHTS,
  dateBands: [
    { maxDays: 0, score: 100 },
    { maxDays: 3, score: 90 },
    { maxDays: 7, score: 70 },
  ],
  dateBeyondScore: 30,
  dateBeyondDecayPerDay: 5,
  dateWindowDays: 10,
  feeTolerance: { percent: "0.005", absolute: "0.10" },
  amountDecaySpan: "0.25",
  businessFit: { rules: [...INFLOW_RULES, ...OUTFLOW_RULES], fallback: 40 },
  clearingAccountIds: [],
  transferWindowDays: 3,
  transferKeywords: DEFAULT_TRANSFER_KEYWORDS,
  transferPairThreshold: 85,
  batchKeywords: DEFAULT_BATCH_KEYWORDS,
  anomaly: DEFAULT_ANOMALY_CONFIG,
  staleReviewAgeDays: 7,
  severityGate: "high",
  maxCandidates: 30,
  maxAggregateSize: 3,
  accountOverrides: {},
};

// =============================================================================
// Severity
// =============================================================================

export const SEVERITIES: readonly Severity[] = ["low", "medium", "high", "critical"];

export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

export function severityAtLeast(severity: Severity, gate: Severity): boolean {
  return severityRank(severity) >= severityRank(gate);
}

// =============================================================================
// Validation
// =============================================================================

const isNonNegativeDecimal = (v: string): boolean => /^\d+(\.\d+)?$/.test(v.trim());

function checkScore(issues: string[], label: string, value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 100) {
    issues.push(`${label} must be between 0 and 100`);
  }
}

function checkCount(issues: string[], label: string, value: number, min: number): void {
  if (!Number.isInteger(value) || value < min) {
    issues.push(`${label} must be an integer ≥ ${String(min)}`);
  }
}

function checkKeywords(issues: string[], label: string, values: readonly string[]): void {
  if (values.some((v) => v.trim() === "")) {
    issues.push(`${label} must not contain empty strings`);
  }
}

function checkThresholds(issues: string[], prefix: string, t: Thresholds): void {
  checkScore(issues, `${prefix}thresholds.autoAccept`, t.autoAccept);
  checkScore(issues, `${prefix}thresholds.review`, t.review);
  if (t.review > t.autoAccept) {
    issues.push(`${prefix}thresholds.review must not exceed thresholds.autoAccept`);
  }
}

function checkWeights(issues: string[], prefix: string, w: ScoreWeights): void {
  const values = [w.amount, w.date, w.description, w.businessFit, w.history];
  if (values.some((v) => !Number.isFinite(v) || v < 0)) {
    issues.push(`${prefix}weights must be non-negative numbers`);
  } else if (values.reduce((a, b) => a + b, 0) <= 0) {
    issues.push(`${prefix}weights must not all be zero`);
  }
}

/**
 * Throws ReconcilerError("INVALID_CONFIG") listing every problem found.
 */
export function validateReconcilerConfig(config: ReconcilerConfig): ReconcilerConfig {
  const issues: string[] = [];

  checkThresholds(issues, "", config.thresholds);
  checkWeights(issues, "", config.weights);

  if (config.dateBands.length === 0) {
    issues.push("dateBands must not be empty");
  }
  config.dateBands.forEach((band, i) => {
    checkCount(issues, `dateBands[${String(i)}].maxDays`, band.maxDays, 0);
    checkScore(issues, `dateBands[${String(i)}].score`, band.score);
    const prev = config.dateBands[i - 1];
    if (prev !== undefined) {
      if (band.maxDays <= prev.maxDays) {
        issues.push("dateBands must ascend in maxDays");
      }
      if (band.score > prev.score) {
        issues.push("dateBands scores must not increase with distance");
      }
    }
  });
  checkScore(issues, "dateBeyondScore", config.dateBeyondScore);
  const lastBand = config.dateBands[config.dateBands.length - 1];
  if (lastBand !== undefined && config.dateBeyondScore > lastBand.score) {
    issues.push("dateBeyondScore must not exceed the last date band score");
  }
  if (!Number.isFinite(config.dateBeyondDecayPerDay) || config.dateBeyondDecayPerDay < 0) {
    issues.push("dateBeyondDecayPerDay must be a non-negative number");
  }
  checkCount(issues, "dateWindowDays", config.dateWindowDays, 0);

  if (!isNonNegativeDecimal(config.feeTolerance.percent)) {
    issues.push("feeTolerance.percent must be a non-negative decimal string");
  }
  if (!isNonNegativeDecimal(config.feeTolerance.absolute)) {
    issues.push("feeTolerance.absolute must be a non-negative decimal string");
  }
  if (!isPositiveDecimal(config.amountDecaySpan)) {
    issues.push("amountDecaySpan must be a positive decimal string");
  }

  config.businessFit.rules.forEach((rule, i) => {
    checkScore(issues, `businessFit.rules[${String(i)}].score`, rule.score);
  });
  checkScore(issues, "businessFit.fallback", config.businessFit.fallback);

  checkCount(issues, "transferWindowDays", config.transferWindowDays, 0);
  checkKeywords(issues, "transferKeywords", config.transferKeywords);
  checkScore(issues, "transferPairThreshold", config.transferPairThreshold);
  checkKeywords(issues, "batchKeywords", config.batchKeywords);

  checkCount(issues, "anomaly.lookbackDays", config.anomaly.lookbackDays, 1);
  checkCount(issues, "anomaly.spikeCount", config.anomaly.spikeCount, 1);
  checkCount(issues, "anomaly.newMerchantDays", config.anomaly.newMerchantDays, 1);
  if (!isPositiveDecimal(config.anomaly.largeAmountMultiple)) {
    issues.push("anomaly.largeAmountMultiple must be a positive decimal string");
  }
  if (!isPositiveDecimal(config.anomaly.weekendMultiple)) {
    issues.push("anomaly.weekendMultiple must be a positive decimal string");
  }
  checkCount(issues, "staleReviewAgeDays", config.staleReviewAgeDays, 0);
  if (!SEVERITIES.includes(config.severityGate)) {
    issues.push(`severityGate must be one of ${SEVERITIES.join(", ")}`);
  }
  checkCount(issues, "maxCandidates", config.maxCandidates, 1);
  checkCount(issues, "maxAggregateSize", config.maxAggregateSize, 1);

  for (const [accountId, override] of Object.entries(config.accountOverrides)) {
    const merged = applyOverride(config, override);
    checkThresholds(issues, `accountOverrides.${accountId}.`, merged.thresholds);
    checkWeights(issues, `accountOverrides.${accountId}.`, merged.weights);
  }

  if (issues.length > 0) {
    throw new ReconcilerError(
      "INVALID_CONFIG",
      `Invalid reconciler configuration: ${issues.join("; ")}`,
      { issues },
    );
  }
  return config;
}

// =============================================================================
// Resolution
// =============================================================================

function applyOverride(config: ReconcilerConfig, override: AccountOverride): ReconcilerConfig {
  return {
    ...config,
    thresholds: { ...config.thresholds, ...override.thresholds },
    weights: { ...config.weights, ...override.weights },
  };
}

/**
 * The configuration in force for one account: global values with the
 * account's override merged on top.
 */
export function resolveConfig(config: ReconcilerConfig, accountId: string): ReconcilerConfig {
  const override = config.accountOverrides[accountId];
  return override === undefined ? config : applyOverride(config, override);
}
