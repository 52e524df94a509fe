/**
 * @tallybook/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @tallybook/types with ledger-specific
 * structures used by the ledger core, its store and its reports.
 *
 * Rules:
 * - All types are readonly
 * - Posted lines are never mutated
 * - Fail-closed: invalid entries throw, never silently succeed
 */

import type {
  Account,
  AccountType,
  Direction,
  EntrySourceType,
  EntryStatus,
  JournalEntry,
  Money,
} from "@tallybook/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** Normal balance direction for an account. */
export type NormalBalance = Direction;

/**
 * Map account types to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Income, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountType, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  income: "credit",
  equity: "credit",
} as const;

/**
 * Input for registering an account.
 */
export interface AccountInput {
  readonly id: string;
  readonly name: string;
  readonly type: AccountType;
  readonly currency: string;
  readonly clearing?: boolean | undefined;
}

// ─── Entry Input Types ───────────────────────────────────────────────────

/**
 * A line as supplied by the caller. The ledger assigns the id
 * when none is given.
 */
export interface LineInput {
  readonly id?: string | undefined;
  readonly accountId: string;
  readonly direction: Direction;
  readonly money: Money;
  readonly fxRate?: string | undefined;
  readonly eventType?: string | undefined;
  readonly tags?: readonly string[] | undefined;
}

/**
 * Changes allowed on a draft line.
 */
export interface LinePatch {
  readonly accountId?: string | undefined;
  readonly direction?: Direction | undefined;
  readonly money?: Money | undefined;
  readonly fxRate?: string | undefined;
  readonly eventType?: string | undefined;
  readonly tags?: readonly string[] | undefined;
}

/**
 * Input for creating a draft entry.
 */
export interface DraftInput {
  readonly id?: string | undefined;
  readonly entryDate: string;
  readonly memo: string;
  readonly sourceType?: EntrySourceType | undefined;
  readonly sourceTransactionId?: string | undefined;
  readonly lines: readonly LineInput[];
}

/**
 * Result of voiding an entry. `reversal` is present only when the
 * voided entry had been posted.
 */
export interface VoidResult {
  readonly original: JournalEntry;
  readonly reversal?: JournalEntry | undefined;
}

// ─── Validation ──────────────────────────────────────────────────────────

/**
 * Imbalance report for one currency of an entry.
 * `delta` is signed: total debits minus total credits.
 */
export interface ImbalanceDetails {
  readonly currency: string;
  readonly totalDebits: string;
  readonly totalCredits: string;
  readonly delta: string;
  readonly shortSide: Direction;
}

export type ValidationResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: ValidationError };

// ─── Balance Types ───────────────────────────────────────────────────────

/**
 * Balance for a single currency within an account.
 */
export interface CurrencyBalance {
  readonly currency: string;
  readonly decimals: number;
  /** Net balance as string. Positive = normal direction, negative = contra. */
  readonly balance: string;
  /** Total debits applied to this account in this currency. */
  readonly totalDebits: string;
  /** Total credits applied to this account in this currency. */
  readonly totalCredits: string;
}

/**
 * Full balance information for an account across all currencies.
 */
export interface AccountBalance {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly balances: readonly CurrencyBalance[];
  /** Everything above in the account's currency, foreign lines at their fx rate. */
  readonly homeBalance: Money;
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly accountId: string;
  readonly accountType: AccountType;
  readonly currency: string;
  readonly decimals: number;
  readonly debitBalance: string;
  readonly creditBalance: string;
}

/**
 * The full trial balance report.
 * Total debits MUST equal total credits (per currency).
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly generatedAt: string;
  /** Whether the trial balance is in balance (debits = credits per currency). */
  readonly balanced: boolean;
}

/**
 * Accounting equation totals for one currency:
 * assets = liabilities + equity + income − expenses.
 */
export interface EquationLine {
  readonly currency: string;
  readonly decimals: number;
  readonly assets: string;
  readonly liabilities: string;
  readonly equity: string;
  readonly income: string;
  readonly expenses: string;
  /** assets − (liabilities + equity + income − expenses). */
  readonly difference: string;
  /** Exact check. */
  readonly holds: boolean;
  /** Reporting check, within DISPLAY_EPSILON. */
  readonly withinDisplayTolerance: boolean;
}

export interface EquationReport {
  readonly lines: readonly EquationLine[];
  readonly holds: boolean;
  readonly generatedAt: string;
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for querying journal entries.
 */
export interface EntryFilter {
  readonly statuses?: readonly EntryStatus[] | undefined;
  readonly accountId?: string | undefined;
  readonly currency?: string | undefined;
  readonly sourceType?: EntrySourceType | undefined;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
}

// ─── Snapshot Types ──────────────────────────────────────────────────────

/**
 * Serializable snapshot of the entire ledger state.
 */
export interface LedgerSnapshot {
  readonly version: 1;
  readonly accounts: readonly Account[];
  readonly entries: readonly JournalEntry[];
  readonly createdAt: string;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | ValidationErrorCode
  | "STALE_VERSION"
  | "ACCOUNT_NOT_FOUND"
  | "DUPLICATE_ACCOUNT_ID"
  | "ACCOUNT_IN_USE"
  | "ENTRY_NOT_FOUND"
  | "DUPLICATE_ENTRY_ID"
  | "LINE_NOT_FOUND"
  | "INVALID_TRANSITION"
  | "INVALID_SNAPSHOT";

/** Codes that mean the entry itself is wrong. Never retried. */
export type ValidationErrorCode =
  | "UNBALANCED_ENTRY"
  | "MISSING_FX_RATE"
  | "INVALID_FX_RATE"
  | "POSTED_ENTRY_IMMUTABLE"
  | "TOO_FEW_LINES"
  | "INACTIVE_ACCOUNT"
  | "UNKNOWN_ACCOUNT"
  | "INVALID_AMOUNT"
  | "INVALID_MONEY"
  | "INVALID_DATE"
  | "CURRENCY_MISMATCH"
  | "INVALID_ACCOUNT";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;
  public readonly details: Readonly<Record<string, unknown>> | undefined;

  constructor(
    code: LedgerErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
    this.details = details;
  }
}

/**
 * The entry (or the edit) is invalid. Rejected, never retried.
 */
export class ValidationError extends LedgerError {
  declare public readonly code: ValidationErrorCode;

  constructor(
    code: ValidationErrorCode,
    message: string,
    details?: Readonly<Record<string, unknown>>,
  ) {
    super(code, message, details);
    this.name = "ValidationError";
  }
}

/**
 * The caller acted on a version that is no longer current.
 * The caller must re-fetch and retry; nothing is resolved server-side.
 */
export class ConflictError extends LedgerError {
  public readonly resourceId: string;
  public readonly expectedVersion: number;
  public readonly actualVersion: number;

  constructor(resourceId: string, expectedVersion: number, actualVersion: number) {
    super(
      "STALE_VERSION",
      `Version conflict on "${resourceId}": expected ${String(expectedVersion)}, found ${String(actualVersion)}`,
      { resourceId, expectedVersion, actualVersion },
    );
    this.name = "ConflictError";
    this.resourceId = resourceId;
    this.expectedVersion = expectedVersion;
    this.actualVersion = actualVersion;
  }
}
