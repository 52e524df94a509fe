/**
 * Financial Types
 *
 * Core financial primitives for the double-entry ledger.
 *
 * Rules:
 * - All amounts are strings to avoid floating-point errors
 * - Currency is always explicit (no implicit home currency)
 * - Posted lines are never mutated; corrections are reversing entries
 */

/**
 * Currency identifier (ISO 4217 code or broker symbol).
 */
export type Currency = string;

/**
 * A precise monetary amount.
 * String representation to avoid IEEE 754 floating-point issues.
 * Arithmetic happens on bigint minor units (see @tallybook/ledger).
 */
export interface Money {
  /** String representation of the amount (e.g., "100.50", "5000") */
  readonly amount: string;

  /** Currency code (e.g., "SGD", "USD") */
  readonly currency: Currency;

  /** Number of decimal places for this currency (USD = 2, JPY = 0). */
  readonly decimals: number;
}

/** The five fundamental account types in double-entry accounting. */
export type AccountType = "asset" | "liability" | "equity" | "income" | "expense";

/** Side of a journal line. */
export type Direction = "debit" | "credit";

/**
 * An account in the chart of accounts.
 *
 * The type is fixed at creation: changing it would invalidate every
 * historical accounting-equation check the account took part in.
 * Accounts are deactivated, never deleted, once lines reference them.
 */
export interface Account {
  readonly id: string;
  readonly name: string;
  readonly type: AccountType;
  /** Home currency of the account. */
  readonly currency: Currency;
  readonly active: boolean;
  /** Clearing/processing account used for in-transit transfers. */
  readonly clearing: boolean;
  readonly createdAt: string;
}

/** Where a journal entry came from. */
export type EntrySourceType = "manual" | "bank_statement" | "system_adjustment";

/**
 * Journal entry lifecycle.
 *
 * draft → posted → reconciled, draft → void, posted → void (by reversal).
 * reconciled and void are terminal.
 */
export type EntryStatus = "draft" | "posted" | "reconciled" | "void";

/**
 * A single debit or credit line of a journal entry.
 */
export interface JournalLine {
  readonly id: string;
  readonly entryId: string;
  readonly accountId: string;
  readonly direction: Direction;
  /** Non-negative amount in the line currency. */
  readonly money: Money;
  /**
   * Conversion rate to the account's home currency, as a decimal string.
   * Required when the line currency differs from the account currency.
   */
  readonly fxRate?: string | undefined;
  readonly eventType?: string | undefined;
  readonly tags: readonly string[];
}

/**
 * A balanced set of lines representing one business event.
 */
export interface JournalEntry {
  readonly id: string;
  /** Business date, YYYY-MM-DD. */
  readonly entryDate: string;
  readonly memo: string;
  readonly sourceType: EntrySourceType;
  readonly status: EntryStatus;
  readonly lines: readonly JournalLine[];
  /** Optimistic concurrency counter, bumped by every mutation. */
  readonly version: number;
  readonly createdAt: string;
  readonly updatedAt: string;
  readonly postedAt?: string | undefined;
  readonly reconciledAt?: string | undefined;
  readonly voidedAt?: string | undefined;
  readonly voidReason?: string | undefined;
  /** Set on a reversing entry: the entry it reverses. */
  readonly reversalOf?: string | undefined;
  /** Set on a posted entry that has been voided: its reversing entry. */
  readonly reversedBy?: string | undefined;
  /** Bank transaction this entry was drafted from, if any. */
  readonly sourceTransactionId?: string | undefined;
}
