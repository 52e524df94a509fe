/**
 * @tallybook/node — Configuration.
 *
 * Process settings come from environment variables, reconciliation
 * tuning from an optional JSON file. Both are validated with Zod.
 */

import { readFileSync } from "node:fs";
import { z } from "zod";
import { DEFAULT_RECONCILER_CONFIG, validateReconcilerConfig } from "@tallybook/reconciler";
import type { ReconcilerConfig } from "@tallybook/reconciler";

// =============================================================================
// Environment
// =============================================================================

const ScoreSchema = z.coerce.number().min(0).max(100);

export const ConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  HOST: z.string().default("0.0.0.0"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("development"),

  // Domain defaults
  DEFAULT_CURRENCY: z.string().min(1).default("USD"),
  DEFAULT_DECIMALS: z.coerce.number().int().min(0).max(18).default(2),

  // Reconciliation
  RECONCILIATION_CONFIG_PATH: z.string().min(1).optional(),
  RECONCILIATION_AUTO_ACCEPT_THRESHOLD: ScoreSchema.optional(),
  RECONCILIATION_REVIEW_THRESHOLD: ScoreSchema.optional(),
});

export type AppConfig = z.infer<typeof ConfigSchema>;

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): AppConfig {
  return ConfigSchema.parse(env);
}

// =============================================================================
// Reconciliation File
// =============================================================================

const score = z.number().min(0).max(100);
const decimal = z.string().regex(/^\d+(\.\d+)?$/, "Expected a decimal string");
const days = z.number().int().min(0);

const accountTypeSchema = z.enum(["asset", "liability", "equity", "income", "expense"]);
const severitySchema = z.enum(["low", "medium", "high", "critical"]);

const ThresholdsFileSchema = z
  .object({ autoAccept: score, review: score })
  .partial()
  .strict();

const WeightsFileSchema = z
  .object({
    amount: z.number().min(0),
    date: z.number().min(0),
    description: z.number().min(0),
    businessFit: z.number().min(0),
    history: z.number().min(0),
  })
  .partial()
  .strict();

const BusinessFitRuleSchema = z
  .object({
    direction: z.enum(["in", "out"]),
    accountTypes: z.array(accountTypeSchema).min(1),
    clearing: z.boolean().optional(),
    exclusive: z.boolean().optional(),
    score,
  })
  .strict();

export const ReconcilerFileSchema = z
  .object({
    thresholds: ThresholdsFileSchema,
    weights: WeightsFileSchema,
    dateBands: z.array(z.object({ maxDays: days, score }).strict()).min(1),
    dateBeyondScore: score,
    dateBeyondDecayPerDay: z.number().min(0),
    dateWindowDays: days,
    feeTolerance: z.object({ percent: decimal, absolute: decimal }).strict(),
    amountDecaySpan: decimal,
    businessFit: z
      .object({ rules: z.array(BusinessFitRuleSchema), fallback: score })
      .strict(),
    clearingAccountIds: z.array(z.string().min(1)),
    transferWindowDays: days,
    transferKeywords: z.array(z.string().min(1)),
    transferPairThreshold: score,
    batchKeywords: z.array(z.string().min(1)),
    anomaly: z
      .object({
        lookbackDays: z.number().int().min(1),
        largeAmountMultiple: decimal,
        weekendMultiple: decimal,
        spikeCount: z.number().int().min(1),
        newMerchantDays: z.number().int().min(1),
      })
      .partial()
      .strict(),
    staleReviewAgeDays: days,
    severityGate: severitySchema,
    maxCandidates: z.number().int().min(1),
    maxAggregateSize: z.number().int().min(1),
    accountOverrides: z.record(
      z
        .object({ thresholds: ThresholdsFileSchema, weights: WeightsFileSchema })
        .partial()
        .strict(),
    ),
  })
  .partial()
  .strict();

export type ReconcilerFile = z.infer<typeof ReconcilerFileSchema>;

export interface ThresholdOverrides {
  readonly autoAccept?: number | undefined;
  readonly review?: number | undefined;
}

/**
 * Merge a parsed reconciliation file and env threshold overrides over
 * the reconciler defaults. Unset fields keep their default.
 */
export function mergeReconcilerConfig(
  file: ReconcilerFile,
  overrides: ThresholdOverrides = {},
  base: ReconcilerConfig = DEFAULT_RECONCILER_CONFIG,
): ReconcilerConfig {
  const merged: ReconcilerConfig = {
    thresholds: {
      autoAccept:
        overrides.autoAccept ?? file.thresholds?.autoAccept ?? base.thresholds.autoAccept,
      review: overrides.review ?? file.thresholds?.review ?? base.thresholds.review,
    },
    weights: {
      amount: file.weights?.amount ?? base.weights.amount,
      date: file.weights?.date ?? base.weights.date,
      description: file.weights?.description ?? base.weights.description,
      businessFit: file.weights?.businessFit ?? base.weights.businessFit,
      history: file.weights?.history ?? base.weights.history,
    },
    dateBands: file.dateBands ?? base.dateBands,
    dateBeyondScore: file.dateBeyondScore ?? base.dateBeyondScore,
    dateBeyondDecayPerDay: file.dateBeyondDecayPerDay ?? base.dateBeyondDecayPerDay,
    dateWindowDays: file.dateWindowDays ?? base.dateWindowDays,
    feeTolerance: file.feeTolerance ?? base.feeTolerance,
    amountDecaySpan: file.amountDecaySpan ?? base.amountDecaySpan,
    businessFit: file.businessFit ?? base.businessFit,
    clearingAccountIds: file.clearingAccountIds ?? base.clearingAccountIds,
    transferWindowDays: file.transferWindowDays ?? base.transferWindowDays,
    transferKeywords: file.transferKeywords ?? base.transferKeywords,
    transferPairThreshold: file.transferPairThreshold ?? base.transferPairThreshold,
    batchKeywords: file.batchKeywords ?? base.batchKeywords,
    anomaly: {
      lookbackDays: file.anomaly?.lookbackDays ?? base.anomaly.lookbackDays,
      largeAmountMultiple: file.anomaly?.largeAmountMultiple ?? base.anomaly.largeAmountMultiple,
      weekendMultiple: file.anomaly?.weekendMultiple ?? base.anomaly.weekendMultiple,
      spikeCount: file.anomaly?.spikeCount ?? base.anomaly.spikeCount,
      newMerchantDays: file.anomaly?.newMerchantDays ?? base.anomaly.newMerchantDays,
    },
    staleReviewAgeDays: file.staleReviewAgeDays ?? base.staleReviewAgeDays,
    severityGate: file.severityGate ?? base.severityGate,
    maxCandidates: file.maxCandidates ?? base.maxCandidates,
    maxAggregateSize: file.maxAggregateSize ?? base.maxAggregateSize,
    accountOverrides: file.accountOverrides ?? base.accountOverrides,
  };
  return validateReconcilerConfig(merged);
}

/**
 * Read, validate and merge the reconciliation file. Without a path the
 * defaults (plus overrides) are returned.
 *
 * @throws {z.ZodError} if the file does not match the schema
 * @throws {ReconcilerError} INVALID_CONFIG if the merged values are inconsistent
 */
export function loadReconcilerConfig(
  path: string | undefined,
  overrides: ThresholdOverrides = {},
): ReconcilerConfig {
  if (path === undefined) {
    return mergeReconcilerConfig({}, overrides);
  }
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  return mergeReconcilerConfig(ReconcilerFileSchema.parse(raw), overrides);
}
