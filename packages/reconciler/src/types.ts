/**
 * @tallybook/reconciler domain types.
 *
 * Matching bank/broker transactions against ledger entries:
 * - Candidate entries normalised from the ledger
 * - Score results and their per-dimension breakdown
 * - Match records with an optimistic version counter
 * - Consistency checks that gate batch approval
 */

import type {
  AccountType,
  BankTransaction,
  EntryStatus,
  Money,
  TransactionDirection,
  TransactionStatus,
} from "@tallybook/types";

// =============================================================================
// Configuration
// =============================================================================

export interface Thresholds {
  /** Scores at or above this are auto-accepted. */
  readonly autoAccept: number;
  /** Scores at or above this (and below autoAccept) go to review. */
  readonly review: number;
}

/** Relative weights; normalised by their sum. */
export interface ScoreWeights {
  readonly amount: number;
  readonly date: number;
  readonly description: number;
  readonly businessFit: number;
  readonly history: number;
}

export interface DateBand {
  readonly maxDays: number;
  readonly score: number;
}

export interface FeeTolerance {
  /** Fraction of the transaction amount, as a decimal string. */
  readonly percent: string;
  /** Floor in currency units, as a decimal string. */
  readonly absolute: string;
}

/**
 * One row of the business-fit table. A rule matches when the
 * candidate touches every listed account type (and a clearing
 * account, if `clearing` is set). An `exclusive` rule also requires
 * that no other account type appears.
 */
export interface BusinessFitRule {
  readonly direction: TransactionDirection;
  readonly accountTypes: readonly AccountType[];
  readonly clearing?: boolean | undefined;
  readonly exclusive?: boolean | undefined;
  readonly score: number;
}

export interface BusinessFitTable {
  readonly rules: readonly BusinessFitRule[];
  /** Score when no rule matches. */
  readonly fallback: number;
}

export type Severity = "low" | "medium" | "high" | "critical";

/**
 * Limits for the per-transaction anomaly checks. Multiples are decimal
 * strings applied to the recent same-direction average.
 */
export interface AnomalyConfig {
  readonly lookbackDays: number;
  readonly largeAmountMultiple: string;
  readonly weekendMultiple: string;
  /** More same-day transactions for one payee than this is a spike. */
  readonly spikeCount: number;
  readonly newMerchantDays: number;
}

export interface AccountOverride {
  readonly thresholds?: Partial<Thresholds> | undefined;
  readonly weights?: Partial<ScoreWeights> | undefined;
}

export interface ReconcilerConfig {
  readonly thresholds: Thresholds;
  readonly weights: ScoreWeights;
  readonly dateBands: readonly DateBand[];
  readonly dateBeyondScore: number;
  readonly dateBeyondDecayPerDay: number;
  /** Candidate entries further apart than this are never considered. */
  readonly dateWindowDays: number;
  readonly feeTolerance: FeeTolerance;
  /** Relative deviation at which the amount score reaches 0. */
  readonly amountDecaySpan: string;
  readonly businessFit: BusinessFitTable;
  readonly clearingAccountIds: readonly string[];
  readonly transferWindowDays: number;
  /** Description fragments that mark a bank line as a transfer. */
  readonly transferKeywords: readonly string[];
  /** Minimum confidence for two clearing legs to pair. */
  readonly transferPairThreshold: number;
  /** Description fragments that let same-day lines group against one entry. */
  readonly batchKeywords: readonly string[];
  readonly anomaly: AnomalyConfig;
  readonly staleReviewAgeDays: number;
  readonly severityGate: Severity;
  readonly maxCandidates: number;
  readonly maxAggregateSize: number;
  readonly accountOverrides: Readonly<Record<string, AccountOverride>>;
}

// =============================================================================
// Statements
// =============================================================================

export interface TransactionInput {
  readonly id: string;
  readonly txnDate: string;
  readonly money: Money;
  readonly direction: TransactionDirection;
  readonly description: string;
  readonly reference?: string | undefined;
}

/**
 * A parsed statement as delivered by the extraction step.
 * `balanceCheckPassed` is the extractor's own verdict; when absent and
 * both balances are given, it is computed on ingest.
 */
export interface StatementBatch {
  readonly statementId: string;
  readonly accountId: string;
  readonly openingBalance?: Money | undefined;
  readonly closingBalance?: Money | undefined;
  readonly balanceCheckPassed?: boolean | undefined;
  readonly transactions: readonly TransactionInput[];
}

export interface IngestResult {
  readonly statementId: string;
  readonly accountId: string;
  readonly trusted: boolean;
  readonly transactions: readonly BankTransaction[];
}

export interface TransactionFilter {
  readonly accountId?: string | undefined;
  readonly statementId?: string | undefined;
  readonly statuses?: readonly TransactionStatus[] | undefined;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
}

// =============================================================================
// Candidates & Scoring
// =============================================================================

/** A ledger entry normalised for scoring against one currency. */
export interface CandidateEntry {
  readonly entryId: string;
  readonly entryDate: string;
  readonly memo: string;
  readonly tags: readonly string[];
  /** Sum of the entry's debit lines in the transaction currency. */
  readonly amount: Money;
  readonly accountTypes: readonly AccountType[];
  readonly touchesClearing: boolean;
  readonly status: EntryStatus;
}

/** A prior accepted match, as seen by the history dimension. */
export interface HistoryRecord {
  readonly bankTxnId: string;
  readonly txnDate: string;
  readonly money: Money;
  readonly description: string;
}

export interface ScoreBreakdown {
  readonly amount: number;
  readonly date: number;
  readonly description: number;
  readonly businessFit: number;
  readonly history: number;
}

export type MatchFlag = "aggregate" | "many_to_one" | "pattern_deviation" | "low_trust";

export interface ScoreResult {
  readonly entryIds: readonly string[];
  /** Integer 0..100 used for routing. */
  readonly score: number;
  /** Unrounded composite. */
  readonly weighted: number;
  readonly breakdown: ScoreBreakdown;
  readonly flags: readonly MatchFlag[];
}

export interface ScoreContext {
  readonly config: ReconcilerConfig;
  readonly history: readonly HistoryRecord[];
}

// =============================================================================
// Matches
// =============================================================================

export type MatchStatus =
  | "pending"
  | "auto_accepted"
  | "pending_review"
  | "accepted"
  | "rejected"
  | "superseded";

export interface ReconciliationMatch {
  readonly id: string;
  readonly bankTxnId: string;
  /**
   * Every bank line a many-to-one match covers, sorted. `bankTxnId` is
   * the first of them. Absent on one-to-one matches.
   */
  readonly groupTxnIds?: readonly string[] | undefined;
  readonly accountId: string;
  readonly journalEntryIds: readonly string[];
  readonly matchScore: number;
  readonly weightedScore: number;
  readonly scoreBreakdown: ScoreBreakdown;
  readonly flags: readonly MatchFlag[];
  readonly fingerprint: string;
  readonly status: MatchStatus;
  readonly version: number;
  readonly createdAt: string;
  readonly resolvedAt?: string | undefined;
  readonly runId?: string | undefined;
  readonly supersedes?: string | undefined;
  readonly supersededBy?: string | undefined;
  readonly rejectionReason?: string | undefined;
}

export interface MatchFilter {
  readonly statuses?: readonly MatchStatus[] | undefined;
  /** Also finds many-to-one matches that cover the transaction. */
  readonly bankTxnId?: string | undefined;
  readonly accountId?: string | undefined;
  readonly entryId?: string | undefined;
  readonly runId?: string | undefined;
  readonly minScore?: number | undefined;
  readonly maxScore?: number | undefined;
}

export type RouteDecision = "auto_accept" | "review" | "unmatched";

// =============================================================================
// Review
// =============================================================================

export interface BatchItem {
  readonly id: string;
  /** The match must still be at this version. */
  readonly version: number;
}

export interface BatchItemResult {
  readonly id: string;
  readonly ok: boolean;
  readonly match?: ReconciliationMatch | undefined;
  readonly error?: {
    readonly code: string;
    readonly message: string;
    readonly details?: Readonly<Record<string, unknown>> | undefined;
  } | undefined;
}

export interface BatchResult {
  readonly succeeded: number;
  readonly failed: number;
  readonly results: readonly BatchItemResult[];
}

// =============================================================================
// Consistency Checks
// =============================================================================

export type CheckType =
  | "duplicate_match"
  | "duplicate_entry_use"
  | "unpaired_transfer"
  | "stale_review"
  | "duplicate_transaction"
  | "pattern_deviation"
  | "transfer_pair"
  | "anomaly";

export type CheckStatus = "pending" | "resolved";

export type CheckAction = "approve" | "reject" | "flag";

export interface ConsistencyCheck {
  readonly id: string;
  readonly checkType: CheckType;
  readonly severity: Severity;
  readonly status: CheckStatus;
  readonly relatedTransactionIds: readonly string[];
  readonly relatedMatchIds: readonly string[];
  readonly relatedEntryIds: readonly string[];
  readonly details: Readonly<Record<string, unknown>>;
  readonly fingerprint: string;
  readonly createdAt: string;
  readonly resolvedAt?: string | undefined;
  readonly resolution?: CheckAction | undefined;
  readonly resolutionNote?: string | undefined;
}

export interface CheckFilter {
  readonly statuses?: readonly CheckStatus[] | undefined;
  readonly checkTypes?: readonly CheckType[] | undefined;
  readonly minSeverity?: Severity | undefined;
}

// =============================================================================
// Transfers & Anomalies
// =============================================================================

export interface TransferScoreBreakdown {
  readonly amount: number;
  readonly description: number;
  readonly date: number;
}

/** A transfer OUT leg and the transfer IN leg it pairs with. */
export interface TransferPair {
  readonly clearingAccountId: string;
  readonly outEntryId: string;
  readonly inEntryId: string;
  readonly amount: Money;
  readonly outDate: string;
  readonly inDate: string;
  readonly dateDiffDays: number;
  readonly confidence: number;
  readonly breakdown: TransferScoreBreakdown;
}

export interface TransferOptions {
  /** Defaults to the first configured or registered clearing account. */
  readonly clearingAccountId?: string | undefined;
}

export type AnomalyType = "large_amount" | "frequency_spike" | "new_merchant" | "weekend_large";

export interface Anomaly {
  readonly anomalyType: AnomalyType;
  readonly severity: Severity;
  readonly message: string;
}

// =============================================================================
// Runs & Stats
// =============================================================================

export interface RunScope {
  readonly accountId?: string | undefined;
  readonly statementId?: string | undefined;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
  readonly limit?: number | undefined;
}

export interface RunError {
  readonly bankTxnId: string;
  readonly code: string;
  readonly message: string;
}

export interface RunSummary {
  readonly runId: string;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly processed: number;
  readonly autoAccepted: number;
  readonly pendingReview: number;
  readonly unmatched: number;
  readonly superseded: number;
  /** Transactions left as they were: an identical live proposal already exists. */
  readonly skipped: number;
  readonly aborted: boolean;
  readonly errors: readonly RunError[];
}

export interface HistogramBucket {
  /** Inclusive lower bound. */
  readonly from: number;
  /** Inclusive upper bound. */
  readonly to: number;
  readonly count: number;
}

export interface ReconciliationStats {
  readonly totalTransactions: number;
  readonly matchedTransactions: number;
  /** matched / total, 0 when there are no transactions. */
  readonly matchRate: number;
  readonly transactionsByStatus: Readonly<Record<TransactionStatus, number>>;
  readonly matchesByStatus: Readonly<Record<MatchStatus, number>>;
  readonly scoreHistogram: readonly HistogramBucket[];
}
