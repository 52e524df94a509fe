/**
 * @tallybook/reconciler — Bank-to-ledger reconciliation engine.
 *
 * Matches parsed bank/broker transactions against ledger entries:
 * - Scoring on amount, date, description, business fit and history
 * - Threshold routing to auto-accept, human review or unmatched
 * - Review actions with optimistic versioning and batch outcomes
 * - Many-to-one grouping of batch settlement lines
 * - Transfer booking through clearing accounts and leg pairing
 * - Anomaly flags and consistency checks that gate batch approval
 */

// Engine (top-level coordinator)
export { ReconciliationEngine } from "./engine.js";
export type { ReconciliationEngineOptions, RunOptions } from "./engine.js";

// Configuration
export {
  DEFAULT_RECONCILER_CONFIG,
  DEFAULT_THRESHOLDS,
  DEFAULT_WEIGHTS,
  DEFAULT_TRANSFER_KEYWORDS,
  DEFAULT_BATCH_KEYWORDS,
  DEFAULT_ANOMALY_CONFIG,
  SEVERITIES,
  severityRank,
  severityAtLeast,
  validateReconcilerConfig,
  resolveConfig,
} from "./config.js";

// Scoring
export {
  score,
  amountScore,
  dateScore,
  dateScoreForDays,
  descriptionScore,
  businessFitFor,
  businessFitScore,
  historyScore,
  compositeScore,
  compareResults,
  feeTolerance,
  fingerprint,
} from "./scoring.js";
export type { HistoryOutcome } from "./scoring.js";
export {
  normalizeText,
  tokenize,
  diceCoefficient,
  tokenJaccard,
  textSimilarity,
  referenceMatches,
  payeeKey,
  containsPhrase,
} from "./text-similarity.js";

// Routing
export { classify, route } from "./threshold-router.js";
export type { Route, RouteContext } from "./threshold-router.js";

// Candidates
export {
  LedgerCandidateSource,
  toCandidate,
  pruneCandidates,
  aggregateCombinations,
} from "./candidates.js";
export type { CandidateSource } from "./candidates.js";

// Storage
export { InMemoryTransactionStore } from "./transaction-store.js";
export type { TransactionStore } from "./transaction-store.js";
export {
  InMemoryMatchStore,
  MATCH_TRANSITIONS,
  matchTxnIds,
  canMatchTransition,
  assertMatchTransition,
} from "./match-store.js";
export type { MatchStore } from "./match-store.js";
export { InMemoryCheckStore } from "./check-store.js";
export type { CheckStore } from "./check-store.js";

// Review & consistency
export { MatchReviewer, assertEntriesReady, commitEntries, describeError } from "./review.js";
export { ConsistencyChecker, CHECK_SEVERITY, checkFingerprint } from "./consistency-checker.js";
export type { CheckScope, RelatedIds } from "./consistency-checker.js";

// Grouping, transfers & anomalies
export {
  GROUP_AMOUNT_BONUS,
  isBatchDescription,
  buildManyToOneGroups,
  groupTransaction,
  scoreGroup,
  groupFingerprint,
} from "./grouping.js";
export type { TransactionGroup } from "./grouping.js";
export {
  TRANSFER_OUT_PREFIX,
  TRANSFER_IN_PREFIX,
  looksLikeTransfer,
  buildTransferDraft,
  transferAmountScore,
  transferDateScore,
  transferDescriptionScore,
  transferConfidence,
  transferLegs,
  pairTransferLegs,
} from "./transfers.js";
export type { TransferLeg } from "./transfers.js";
export { detectAnomalies } from "./anomaly.js";

// Statements & drafting
export { verifyStatementBalance, STATEMENT_BALANCE_TOLERANCE } from "./statement-balance.js";
export type { StatementBalanceResult } from "./statement-balance.js";
export { buildDraftForTransaction, draftEntryForTransaction } from "./entry-drafter.js";
export type { DraftAccounts } from "./entry-drafter.js";

// Stats
export { computeStats, scoreHistogram } from "./stats.js";

// Errors
export { ReconcilerError, AlreadyProcessedError, ConsistencyBlockError } from "./errors.js";
export type { ReconcilerErrorCode } from "./errors.js";

// Types
export type {
  Thresholds,
  ScoreWeights,
  DateBand,
  FeeTolerance,
  AnomalyConfig,
  BusinessFitRule,
  BusinessFitTable,
  Severity,
  AccountOverride,
  ReconcilerConfig,
  TransactionInput,
  StatementBatch,
  IngestResult,
  TransactionFilter,
  CandidateEntry,
  HistoryRecord,
  ScoreBreakdown,
  MatchFlag,
  ScoreResult,
  ScoreContext,
  MatchStatus,
  ReconciliationMatch,
  MatchFilter,
  RouteDecision,
  BatchItem,
  BatchItemResult,
  BatchResult,
  CheckType,
  CheckStatus,
  CheckAction,
  ConsistencyCheck,
  CheckFilter,
  TransferScoreBreakdown,
  TransferPair,
  TransferOptions,
  AnomalyType,
  Anomaly,
  RunScope,
  RunError,
  RunSummary,
  HistogramBucket,
  ReconciliationStats,
} from "./types.js";
