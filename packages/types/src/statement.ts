/**
 * Statement Types
 *
 * Bank and broker activity as delivered by the statement extraction
 * collaborator. The matching engine reads these records and only ever
 * updates their status.
 */

import type { Money } from "./financial.js";

/** Money flowing into (in) or out of (out) the source account. */
export type TransactionDirection = "in" | "out";

/** Matching state of an external transaction. */
export type TransactionStatus = "pending" | "matched" | "unmatched";

/**
 * A single parsed bank/broker transaction.
 */
export interface BankTransaction {
  readonly id: string;
  /** Ledger account the statement belongs to. */
  readonly accountId: string;
  readonly statementId: string;
  /** Transaction date, YYYY-MM-DD. */
  readonly txnDate: string;
  /** Unsigned amount; the sign lives in `direction`. */
  readonly money: Money;
  readonly direction: TransactionDirection;
  readonly description: string;
  readonly reference?: string | undefined;
  readonly status: TransactionStatus;
  /**
   * False when the statement this transaction came from failed its
   * opening + movements = closing check.
   */
  readonly trusted: boolean;
}
