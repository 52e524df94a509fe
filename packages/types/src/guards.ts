/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tallybook domain types.
 * These enable safe runtime validation at system boundaries
 * (API inputs, restored snapshots, extraction output).
 */

import type {
  Account,
  AccountType,
  Direction,
  EntrySourceType,
  EntryStatus,
  JournalLine,
  Money,
} from "./financial.js";
import type {
  BankTransaction,
  TransactionDirection,
  TransactionStatus,
} from "./statement.js";

// =============================================================================
// Closed unions
// =============================================================================

export const ACCOUNT_TYPES: readonly AccountType[] = [
  "asset",
  "liability",
  "equity",
  "income",
  "expense",
];

export const ENTRY_STATUSES: readonly EntryStatus[] = [
  "draft",
  "posted",
  "reconciled",
  "void",
];

export const ENTRY_SOURCE_TYPES: readonly EntrySourceType[] = [
  "manual",
  "bank_statement",
  "system_adjustment",
];

export const TRANSACTION_STATUSES: readonly TransactionStatus[] = [
  "pending",
  "matched",
  "unmatched",
];

const ACCOUNT_TYPE_SET = new Set<string>(ACCOUNT_TYPES);
const DIRECTIONS = new Set<string>(["debit", "credit"]);
const ENTRY_STATUS_SET = new Set<string>(ENTRY_STATUSES);
const SOURCE_TYPE_SET = new Set<string>(ENTRY_SOURCE_TYPES);
const TXN_DIRECTIONS = new Set<string>(["in", "out"]);
const TXN_STATUS_SET = new Set<string>(TRANSACTION_STATUSES);

export function isAccountType(value: unknown): value is AccountType {
  return typeof value === "string" && ACCOUNT_TYPE_SET.has(value);
}

export function isDirection(value: unknown): value is Direction {
  return typeof value === "string" && DIRECTIONS.has(value);
}

export function isEntryStatus(value: unknown): value is EntryStatus {
  return typeof value === "string" && ENTRY_STATUS_SET.has(value);
}

export function isEntrySourceType(value: unknown): value is EntrySourceType {
  return typeof value === "string" && SOURCE_TYPE_SET.has(value);
}

export function isTransactionDirection(value: unknown): value is TransactionDirection {
  return typeof value === "string" && TXN_DIRECTIONS.has(value);
}

export function isTransactionStatus(value: unknown): value is TransactionStatus {
  return typeof value === "string" && TXN_STATUS_SET.has(value);
}

// =============================================================================
// Records
// =============================================================================

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * True for a calendar date in YYYY-MM-DD form that actually exists.
 */
export function isIsoDate(value: unknown): value is string {
  if (typeof value !== "string" || !ISO_DATE.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

export function isMoney(value: unknown): value is Money {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.amount === "string" &&
    typeof v.currency === "string" &&
    v.currency.length > 0 &&
    typeof v.decimals === "number" &&
    Number.isInteger(v.decimals) &&
    v.decimals >= 0
  );
}

export function isAccount(value: unknown): value is Account {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    v.id.length > 0 &&
    typeof v.name === "string" &&
    isAccountType(v.type) &&
    typeof v.currency === "string" &&
    typeof v.active === "boolean" &&
    typeof v.clearing === "boolean" &&
    typeof v.createdAt === "string"
  );
}

export function isJournalLine(value: unknown): value is JournalLine {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.entryId === "string" &&
    typeof v.accountId === "string" &&
    isDirection(v.direction) &&
    isMoney(v.money) &&
    (v.fxRate === undefined || typeof v.fxRate === "string") &&
    Array.isArray(v.tags) &&
    v.tags.every((t) => typeof t === "string")
  );
}

export function isBankTransaction(value: unknown): value is BankTransaction {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.id === "string" &&
    typeof v.accountId === "string" &&
    typeof v.statementId === "string" &&
    isIsoDate(v.txnDate) &&
    isMoney(v.money) &&
    isTransactionDirection(v.direction) &&
    typeof v.description === "string" &&
    (v.reference === undefined || typeof v.reference === "string") &&
    isTransactionStatus(v.status) &&
    typeof v.trusted === "boolean"
  );
}
