/**
 * @tallybook/types — Shared domain types for the Tallybook stack.
 *
 * These types are used across all Tallybook packages:
 * - Financial primitives (Money, accounts, journal entries and lines)
 * - External statement activity (bank/broker transactions)
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No methods that mutate state
 */

// Financial types
export type {
  Money,
  Currency,
  AccountType,
  Direction,
  Account,
  EntrySourceType,
  EntryStatus,
  JournalLine,
  JournalEntry,
} from "./financial.js";

// Statement types
export type {
  TransactionDirection,
  TransactionStatus,
  BankTransaction,
} from "./statement.js";

// Runtime type guards
export {
  ACCOUNT_TYPES,
  ENTRY_STATUSES,
  ENTRY_SOURCE_TYPES,
  TRANSACTION_STATUSES,
  isAccountType,
  isDirection,
  isEntryStatus,
  isEntrySourceType,
  isTransactionDirection,
  isTransactionStatus,
  isIsoDate,
  isMoney,
  isAccount,
  isJournalLine,
  isBankTransaction,
} from "./guards.js";
