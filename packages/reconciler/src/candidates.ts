/**
 * Candidate Source
 *
 * Supplies open bank transactions, the ledger entries that could match
 * them, and the account's match history. The engine depends only on
 * the CandidateSource interface; LedgerCandidateSource reads the
 * in-process Ledger and stores.
 */

import type { Ledger } from "@tallybook/ledger";
import { formatAmount, lifecycleStatus, parseAmount, scaleDecimal } from "@tallybook/ledger";
import type { Account, AccountType, BankTransaction, JournalEntry } from "@tallybook/types";
import { absDaysBetween, addDays } from "./dates.js";
import { matchTxnIds } from "./match-store.js";
import type { MatchStore } from "./match-store.js";
import { feeTolerance } from "./scoring.js";
import type { TransactionStore } from "./transaction-store.js";
import type { CandidateEntry, HistoryRecord, ReconcilerConfig, RunScope } from "./types.js";

export interface CandidateSource {
  listOpenTransactions(scope: RunScope): Promise<readonly BankTransaction[]>;
  listCandidateEntries(txn: BankTransaction, windowDays: number): Promise<readonly CandidateEntry[]>;
  listHistory(accountId: string): Promise<readonly HistoryRecord[]>;
}

const ACCOUNT_TYPE_ORDER: readonly AccountType[] = ["asset", "liability", "equity", "income", "expense"];

/**
 * Normalise an entry for scoring against one currency. Returns
 * undefined when the entry has no line in that currency.
 */
export function toCandidate(
  entry: JournalEntry,
  lookupAccount: (id: string) => Account | undefined,
  currency: string,
  clearingIds: ReadonlySet<string> = new Set(),
): CandidateEntry | undefined {
  const inCurrency = entry.lines.filter((l) => l.money.currency === currency);
  const first = inCurrency[0];
  if (first === undefined) return undefined;

  const decimals = first.money.decimals;
  let debits = 0n;
  for (const line of inCurrency) {
    if (line.direction !== "debit") continue;
    debits += line.money.decimals === decimals
      ? parseAmount(line.money.amount, decimals)
      : scaleDecimal(line.money.amount, decimals);
  }

  const types = new Set<AccountType>();
  let touchesClearing = false;
  for (const line of entry.lines) {
    const account = lookupAccount(line.accountId);
    if (account === undefined) continue;
    types.add(account.type);
    if (account.clearing || clearingIds.has(account.id)) touchesClearing = true;
  }

  const tags = [...new Set(entry.lines.flatMap((l) => l.tags))];

  return {
    entryId: entry.id,
    entryDate: entry.entryDate,
    memo: entry.memo,
    tags,
    amount: {
      amount: formatAmount(debits, decimals),
      currency,
      decimals,
    },
    accountTypes: ACCOUNT_TYPE_ORDER.filter((t) => types.has(t)),
    touchesClearing,
    status: entry.status,
  };
}

function scaled(c: CandidateEntry, decimals: number): bigint {
  return c.amount.decimals === decimals
    ? parseAmount(c.amount.amount, decimals)
    : scaleDecimal(c.amount.amount, decimals);
}

function distance(a: bigint, b: bigint): bigint {
  return a > b ? a - b : b - a;
}

/**
 * Keep the `max` candidates nearest the transaction by date distance,
 * then amount distance, then entry id.
 */
export function pruneCandidates(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
  max: number,
): CandidateEntry[] {
  const decimals = txn.money.decimals;
  const target = parseAmount(txn.money.amount, decimals);
  const keyed = candidates.map((c) => ({
    c,
    days: absDaysBetween(txn.txnDate, c.entryDate),
    diff: distance(scaled(c, decimals), target),
  }));
  keyed.sort((a, b) => {
    if (a.days !== b.days) return a.days - b.days;
    if (a.diff !== b.diff) return a.diff < b.diff ? -1 : 1;
    return a.c.entryId < b.c.entryId ? -1 : a.c.entryId > b.c.entryId ? 1 : 0;
  });
  return keyed.slice(0, max).map((k) => k.c);
}

/**
 * Subsets of 2..maxAggregateSize candidates whose combined amount lies
 * within twice the fee tolerance of the transaction.
 */
export function aggregateCombinations(
  txn: BankTransaction,
  candidates: readonly CandidateEntry[],
  config: ReconcilerConfig,
): CandidateEntry[][] {
  const decimals = txn.money.decimals;
  const target = parseAmount(txn.money.amount, decimals);
  const band = feeTolerance(txn.money, config) * 2n;
  const pool = candidates
    .map((c) => ({ c, v: scaled(c, decimals) }))
    .filter((x) => x.v > 0n && x.v <= target + band);

  const results: CandidateEntry[][] = [];
  const chosen: { c: CandidateEntry; v: bigint }[] = [];

  const walk = (start: number, sum: bigint): void => {
    if (chosen.length >= 2 && distance(sum, target) <= band) {
      results.push(chosen.map((x) => x.c));
    }
    if (chosen.length >= config.maxAggregateSize) return;
    for (let i = start; i < pool.length; i++) {
      const next = pool[i];
      if (next === undefined || sum + next.v > target + band) continue;
      chosen.push(next);
      walk(i + 1, sum + next.v);
      chosen.pop();
    }
  };
  walk(0, 0n);

  return results;
}

/**
 * Candidate source over the in-process ledger and stores.
 *
 * Eligible entries are drafts that validate, or posted entries that
 * are neither reversed nor reversals, dated within the window, with a
 * line on the transaction's account and a line in its currency.
 */
export class LedgerCandidateSource implements CandidateSource {
  constructor(
    private readonly ledger: Ledger,
    private readonly transactions: TransactionStore,
    private readonly matches: MatchStore,
    private readonly config: ReconcilerConfig,
  ) {}

  async listOpenTransactions(scope: RunScope): Promise<readonly BankTransaction[]> {
    const open = this.transactions.list({
      accountId: scope.accountId,
      statementId: scope.statementId,
      fromDate: scope.fromDate,
      toDate: scope.toDate,
      statuses: ["pending", "unmatched"],
    });
    return scope.limit === undefined ? open : open.slice(0, scope.limit);
  }

  async listCandidateEntries(
    txn: BankTransaction,
    windowDays: number,
  ): Promise<readonly CandidateEntry[]> {
    const entries = this.ledger.listEntries({
      statuses: ["draft", "posted"],
      accountId: txn.accountId,
      currency: txn.money.currency,
      fromDate: addDays(txn.txnDate, -windowDays),
      toDate: addDays(txn.txnDate, windowDays),
    });

    const clearingIds = new Set(this.config.clearingAccountIds);
    const lookup = (id: string): Account | undefined => this.ledger.accounts.get(id);
    const candidates: CandidateEntry[] = [];

    for (const entry of entries) {
      if (entry.reversalOf !== undefined || lifecycleStatus(entry) !== entry.status) continue;
      if (entry.status === "draft" && !this.ledger.validate(entry).ok) continue;
      const candidate = toCandidate(entry, lookup, txn.money.currency, clearingIds);
      if (candidate !== undefined) candidates.push(candidate);
    }
    return candidates;
  }

  async listHistory(accountId: string): Promise<readonly HistoryRecord[]> {
    const accepted = this.matches.list({ accountId, statuses: ["accepted", "auto_accepted"] });
    const records: HistoryRecord[] = [];
    for (const match of accepted) {
      for (const txnId of matchTxnIds(match)) {
        const txn = this.transactions.get(txnId);
        if (txn === undefined) continue;
        records.push({
          bankTxnId: txn.id,
          txnDate: txn.txnDate,
          money: txn.money,
          description: txn.description,
        });
      }
    }
    return records;
  }
}
