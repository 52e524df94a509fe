/**
 * Drafts a balanced ledger entry for a bank transaction that found no
 * match, so a bookkeeper can post it after review.
 *
 *   in:  debit bank account   / credit counter account
 *   out: debit counter account / credit bank account
 */

import type { DraftInput, Ledger } from "@tallybook/ledger";
import type { BankTransaction, EntrySourceType, JournalEntry } from "@tallybook/types";

export interface DraftAccounts {
  /** Defaults to the transaction's own account. */
  readonly bankAccountId?: string | undefined;
  /** Income account for inflows, expense account for outflows. */
  readonly counterAccountId: string;
  readonly memo?: string | undefined;
  readonly tags?: readonly string[] | undefined;
  /** Defaults to bank_statement. */
  readonly sourceType?: EntrySourceType | undefined;
}

export function buildDraftForTransaction(
  txn: BankTransaction,
  accounts: DraftAccounts,
): DraftInput {
  const bank = accounts.bankAccountId ?? txn.accountId;
  const counter = accounts.counterAccountId;
  const [debit, credit] = txn.direction === "in" ? [bank, counter] : [counter, bank];
  const tags = [...(accounts.tags ?? []), ...(txn.reference !== undefined ? [txn.reference] : [])];

  return {
    entryDate: txn.txnDate,
    memo: accounts.memo ?? txn.description,
    sourceType: accounts.sourceType ?? "bank_statement",
    sourceTransactionId: txn.id,
    lines: [
      { accountId: debit, direction: "debit", money: txn.money, tags },
      { accountId: credit, direction: "credit", money: txn.money, tags },
    ],
  };
}

export function draftEntryForTransaction(
  ledger: Ledger,
  txn: BankTransaction,
  accounts: DraftAccounts,
): JournalEntry {
  return ledger.createDraft(buildDraftForTransaction(txn, accounts));
}
