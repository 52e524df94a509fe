/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Schemas check
 * shape only; amounts, dates and balances are checked by the domain
 * packages, which answer 422 when they disagree.
 */

import { z } from "zod";

// =============================================================================
// Shared Schemas
// =============================================================================

/** Currency and decimals fall back to the service defaults when omitted. */
export const MoneySchema = z.object({
  amount: z.string().min(1).max(64),
  currency: z.string().min(1).max(16).optional(),
  decimals: z.number().int().min(0).max(18).optional(),
});

export type MoneyDto = z.infer<typeof MoneySchema>;

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

const id = z.string().min(1).max(128);
const version = z.number().int().min(1);
const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Expected YYYY-MM-DD");

/** Comma-separated list of enum values in a query string. */
function csv<T extends string>(values: readonly [T, ...T[]]) {
  return z
    .string()
    .transform((raw) => raw.split(",").map((v) => v.trim()).filter((v) => v !== ""))
    .pipe(z.array(z.enum(values)).min(1));
}

const ACCOUNT_TYPES = ["asset", "liability", "equity", "income", "expense"] as const;
const ENTRY_STATUSES = ["draft", "posted", "reconciled", "void"] as const;
const SOURCE_TYPES = ["manual", "bank_statement", "system_adjustment"] as const;
const TRANSACTION_STATUSES = ["pending", "matched", "unmatched"] as const;
const MATCH_STATUSES = [
  "pending",
  "auto_accepted",
  "pending_review",
  "accepted",
  "rejected",
  "superseded",
] as const;
const CHECK_TYPES = [
  "duplicate_match",
  "duplicate_entry_use",
  "unpaired_transfer",
  "stale_review",
  "duplicate_transaction",
  "pattern_deviation",
  "transfer_pair",
  "anomaly",
] as const;
const SEVERITIES = ["low", "medium", "high", "critical"] as const;

// =============================================================================
// Accounts
// =============================================================================

export const CreateAccountSchema = z.object({
  id,
  name: z.string().min(1).max(256),
  type: z.enum(ACCOUNT_TYPES),
  currency: z.string().min(1).max(16).optional(),
  clearing: z.boolean().optional(),
});

export type CreateAccountDto = z.infer<typeof CreateAccountSchema>;

// =============================================================================
// Entries
// =============================================================================

export const LineSchema = z.object({
  id: id.optional(),
  accountId: id,
  direction: z.enum(["debit", "credit"]),
  money: MoneySchema,
  fxRate: z.string().min(1).optional(),
  eventType: z.string().min(1).max(64).optional(),
  tags: z.array(z.string().max(128)).max(32).optional(),
});

export type LineDto = z.infer<typeof LineSchema>;

export const CreateEntrySchema = z.object({
  id: id.optional(),
  entryDate: z.string().min(1),
  memo: z.string().max(1024),
  sourceType: z.enum(SOURCE_TYPES).optional(),
  sourceTransactionId: id.optional(),
  lines: z.array(LineSchema).max(200).default([]),
});

export type CreateEntryDto = z.infer<typeof CreateEntrySchema>;

export const ListEntriesQuerySchema = PaginationQuerySchema.extend({
  status: csv(ENTRY_STATUSES).optional(),
  accountId: id.optional(),
  sourceType: z.enum(SOURCE_TYPES).optional(),
  fromDate: isoDate.optional(),
  toDate: isoDate.optional(),
});

export type ListEntriesQuery = z.infer<typeof ListEntriesQuerySchema>;

export const AddLineSchema = z.object({
  line: LineSchema,
  version: version.optional(),
});

export const UpdateLineSchema = LineSchema.omit({ id: true })
  .partial()
  .extend({ version: version.optional() });

export type UpdateLineDto = z.infer<typeof UpdateLineSchema>;

export const VersionQuerySchema = z.object({
  version: z.coerce.number().int().min(1).optional(),
});

export const PostEntrySchema = z.object({ version });

export const VoidEntrySchema = z.object({
  reason: z.string().min(1).max(1024),
  version: version.optional(),
});

// =============================================================================
// Statements & Transactions
// =============================================================================

export const TransactionInputSchema = z.object({
  id,
  txnDate: z.string().min(1),
  money: MoneySchema,
  direction: z.enum(["in", "out"]),
  description: z.string().max(1024),
  reference: z.string().max(256).optional(),
});

export const StatementSchema = z.object({
  statementId: id,
  accountId: id,
  openingBalance: MoneySchema.optional(),
  closingBalance: MoneySchema.optional(),
  balanceCheckPassed: z.boolean().optional(),
  transactions: z.array(TransactionInputSchema).max(10_000),
});

export type StatementDto = z.infer<typeof StatementSchema>;

export const ListTransactionsQuerySchema = PaginationQuerySchema.extend({
  accountId: id.optional(),
  statementId: id.optional(),
  status: csv(TRANSACTION_STATUSES).optional(),
  fromDate: isoDate.optional(),
  toDate: isoDate.optional(),
});

export type ListTransactionsQuery = z.infer<typeof ListTransactionsQuerySchema>;

export const DraftEntrySchema = z.object({
  bankAccountId: id.optional(),
  counterAccountId: id,
  memo: z.string().max(1024).optional(),
  tags: z.array(z.string().max(128)).max(32).optional(),
});

export type DraftEntryDto = z.infer<typeof DraftEntrySchema>;

/** Without an account the configured clearing account is used. */
export const BookTransferSchema = z.object({
  clearingAccountId: id.optional(),
});

export type BookTransferDto = z.infer<typeof BookTransferSchema>;

// =============================================================================
// Reconciliation
// =============================================================================

const ScopeFields = {
  accountId: id.optional(),
  statementId: id.optional(),
  fromDate: isoDate.optional(),
  toDate: isoDate.optional(),
};

export const RunReconciliationSchema = z.object({
  ...ScopeFields,
  limit: z.number().int().min(1).optional(),
});

export type RunReconciliationDto = z.infer<typeof RunReconciliationSchema>;

export const StatsQuerySchema = z.object(ScopeFields);

// =============================================================================
// Transfers
// =============================================================================

export const TransferCandidatesQuerySchema = z.object({
  ...ScopeFields,
  limit: z.coerce.number().int().min(1).optional(),
});

export const TransferPairsQuerySchema = z.object({
  minConfidence: z.coerce.number().min(0).max(100).optional(),
});

export const ListMatchesQuerySchema = PaginationQuerySchema.extend({
  status: csv(MATCH_STATUSES).optional(),
  accountId: id.optional(),
  bankTxnId: id.optional(),
  entryId: id.optional(),
  runId: id.optional(),
  minScore: z.coerce.number().min(0).max(100).optional(),
  maxScore: z.coerce.number().min(0).max(100).optional(),
});

export type ListMatchesQuery = z.infer<typeof ListMatchesQuerySchema>;

export const AcceptMatchSchema = z.object({ version });

export const RejectMatchSchema = z.object({
  version,
  reason: z.string().min(1).max(1024),
});

const BatchItemsSchema = z
  .array(z.object({ id, version }))
  .min(1)
  .max(500);

export const BatchAcceptSchema = z.object({ items: BatchItemsSchema });

export const BatchRejectSchema = z.object({
  items: BatchItemsSchema,
  reason: z.string().min(1).max(1024),
});

// =============================================================================
// Consistency Checks
// =============================================================================

export const ListChecksQuerySchema = z.object({
  status: csv(["pending", "resolved"]).optional(),
  type: csv(CHECK_TYPES).optional(),
  minSeverity: z.enum(SEVERITIES).optional(),
});

/** A statement id adds the transfer pair and anomaly detectors. */
export const RunChecksSchema = z.object({
  asOf: z.string().datetime().optional(),
  statementId: id.optional(),
});

export const ResolveCheckSchema = z.object({
  action: z.enum(["approve", "reject", "flag"]),
  note: z.string().max(1024).optional(),
});

// =============================================================================
// Audit
// =============================================================================

export const AuditQuerySchema = z.object({
  action: z.string().min(1).optional(),
  resourceType: z.string().min(1).optional(),
  resourceId: z.string().min(1).optional(),
  limit: z.coerce.number().int().min(1).max(1000).optional(),
});
