/**
 * Shared builders for reconciler tests.
 */

import { Ledger } from "@tallybook/ledger";
import type { BankTransaction, Money, TransactionDirection } from "@tallybook/types";
import { ReconciliationEngine } from "../src/engine.js";
import type { CandidateEntry, ReconcilerConfig } from "../src/types.js";

export const NOW = "2025-03-15T12:00:00.000Z";

export function usd(amount: string): Money {
  return { amount, currency: "USD", decimals: 2 };
}

export function txn(overrides: Partial<BankTransaction> = {}): BankTransaction {
  return {
    id: "t1",
    accountId: "bank",
    statementId: "stmt-1",
    txnDate: "2025-03-10",
    money: usd("1500.00"),
    direction: "in",
    description: "ACME",
    status: "pending",
    trusted: true,
    ...overrides,
  };
}

export function candidate(overrides: Partial<CandidateEntry> = {}): CandidateEntry {
  return {
    entryId: "e1",
    entryDate: "2025-03-10",
    memo: "Payroll",
    tags: [],
    amount: usd("1500.00"),
    accountTypes: ["asset", "income"],
    touchesClearing: false,
    status: "posted",
    ...overrides,
  };
}

export interface Harness {
  readonly ledger: Ledger;
  readonly engine: ReconciliationEngine;
  /** Post a balanced two-line entry and return its id. */
  post(debit: string, credit: string, amount: string, entryDate: string, memo: string): string;
  /** Ingest one trusted statement for the bank account. */
  ingest(...transactions: TxnSpec[]): void;
}

export interface TxnSpec {
  readonly id: string;
  readonly txnDate: string;
  readonly amount: string;
  readonly direction?: TransactionDirection;
  readonly description?: string;
  readonly reference?: string;
}

export function harness(options: { config?: ReconcilerConfig } = {}): Harness {
  let ledgerIds = 0;
  let engineIds = 0;
  const ledger = new Ledger({
    clock: () => NOW,
    idGenerator: () => `L-${String(++ledgerIds)}`,
  });
  ledger.registerAccount({ id: "bank", name: "Operating bank", type: "asset", currency: "USD" });
  ledger.registerAccount({ id: "clearing", name: "Card clearing", type: "asset", currency: "USD", clearing: true });
  ledger.registerAccount({ id: "sales", name: "Sales", type: "income", currency: "USD" });
  ledger.registerAccount({ id: "rent", name: "Rent", type: "expense", currency: "USD" });
  ledger.registerAccount({ id: "capital", name: "Capital", type: "equity", currency: "USD" });

  const engine = new ReconciliationEngine({
    ledger,
    config: options.config,
    clock: () => NOW,
    idGenerator: () => `R-${String(++engineIds)}`,
  });

  return {
    ledger,
    engine,
    post(debit, credit, amount, entryDate, memo) {
      const draft = ledger.createDraft({
        entryDate,
        memo,
        lines: [
          { accountId: debit, direction: "debit", money: usd(amount) },
          { accountId: credit, direction: "credit", money: usd(amount) },
        ],
      });
      return ledger.post(draft.id, draft.version).id;
    },
    ingest(...transactions) {
      engine.ingestStatement({
        statementId: "stmt-1",
        accountId: "bank",
        transactions: transactions.map((t) => ({
          id: t.id,
          txnDate: t.txnDate,
          money: usd(t.amount),
          direction: t.direction ?? "in",
          description: t.description ?? "ACME",
          ...(t.reference !== undefined ? { reference: t.reference } : {}),
        })),
      });
    },
  };
}
