/**
 * @tallybook/ledger — Double-entry ledger engine.
 *
 * Enforces double-entry accounting invariants:
 * - A posted entry balances exactly in every currency
 * - Lines change only while an entry is a draft
 * - Corrections of posted entries are reversing entries
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { Ledger, findImbalance } from "./ledger.js";
export type { LedgerOptions } from "./ledger.js";

// Storage
export { InMemoryLedgerStore, matchesFilter } from "./store.js";
export type { LedgerStore } from "./store.js";

// Account registry
export { AccountRegistry } from "./accounts.js";

// Lifecycle
export {
  ENTRY_TRANSITIONS,
  assertTransition,
  lifecycleStatus,
} from "./transitions.js";

// Balance computation
export {
  computeAccountBalance,
  computeTrialBalance,
  computeAccountingEquation,
  isBalanceBearing,
} from "./balance-calculator.js";

// Display helpers
export { DISPLAY_EPSILON, DISPLAY_DECIMALS, withinDisplayTolerance, roundForDisplay } from "./reporting.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  applyRate,
  scaleDecimal,
  isPositiveDecimal,
  validateMoney,
  assertSameCurrency,
  addMoney,
  subtractMoney,
  sumMoney,
  isZero,
  zeroMoney,
  compareMoney,
  absMoney,
  convertMoney,
} from "./money-math.js";

// Types
export type {
  NormalBalance,
  AccountInput,
  LineInput,
  LinePatch,
  DraftInput,
  VoidResult,
  ImbalanceDetails,
  ValidationResult,
  CurrencyBalance,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  EquationLine,
  EquationReport,
  EntryFilter,
  LedgerSnapshot,
  LedgerErrorCode,
  ValidationErrorCode,
} from "./types.js";

export { LedgerError, ValidationError, ConflictError, NORMAL_BALANCE } from "./types.js";
