/**
 * Bank transaction storage. Transactions come from the extraction
 * step and are read-only here apart from their status.
 */

import type { BankTransaction, TransactionStatus } from "@tallybook/types";
import { ReconcilerError } from "./errors.js";
import type { TransactionFilter } from "./types.js";

export interface TransactionStore {
  /** Throws DUPLICATE_TRANSACTION_ID when the id is taken. */
  insert(txn: BankTransaction): void;
  get(id: string): BankTransaction | undefined;
  list(filter?: TransactionFilter): readonly BankTransaction[];
  setStatus(id: string, status: TransactionStatus): BankTransaction;
}

function matchesFilter(txn: BankTransaction, filter: TransactionFilter): boolean {
  if (filter.accountId !== undefined && txn.accountId !== filter.accountId) return false;
  if (filter.statementId !== undefined && txn.statementId !== filter.statementId) return false;
  if (filter.statuses !== undefined && !filter.statuses.includes(txn.status)) return false;
  if (filter.fromDate !== undefined && txn.txnDate < filter.fromDate) return false;
  if (filter.toDate !== undefined && txn.txnDate > filter.toDate) return false;
  return true;
}

export class InMemoryTransactionStore implements TransactionStore {
  private readonly _txns = new Map<string, BankTransaction>();

  insert(txn: BankTransaction): void {
    if (this._txns.has(txn.id)) {
      throw new ReconcilerError(
        "DUPLICATE_TRANSACTION_ID",
        `Transaction already exists: "${txn.id}"`,
        { bankTxnId: txn.id },
      );
    }
    this._txns.set(txn.id, txn);
  }

  get(id: string): BankTransaction | undefined {
    return this._txns.get(id);
  }

  /** Ordered by transaction date, then id. */
  list(filter: TransactionFilter = {}): readonly BankTransaction[] {
    return [...this._txns.values()]
      .filter((t) => matchesFilter(t, filter))
      .sort((a, b) => a.txnDate.localeCompare(b.txnDate) || a.id.localeCompare(b.id));
  }

  setStatus(id: string, status: TransactionStatus): BankTransaction {
    const txn = this._txns.get(id);
    if (txn === undefined) {
      throw new ReconcilerError("TRANSACTION_NOT_FOUND", `Unknown transaction: "${id}"`, {
        bankTxnId: id,
      });
    }
    const updated: BankTransaction = { ...txn, status };
    this._txns.set(id, updated);
    return updated;
  }
}
