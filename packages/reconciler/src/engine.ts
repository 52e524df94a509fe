/**
 * Reconciliation Engine — Top-level coordinator
 *
 * Ingests parsed statements, scores each open transaction against its
 * candidate ledger entries, routes the best candidate by threshold and
 * records the outcome. Batch lines that share a description and date
 * are tried together first. Review actions, transfers, anomalies,
 * consistency checks and stats sit on the same object so callers deal
 * with one entry point.
 *
 * Usage:
 *   const engine = new ReconciliationEngine({ ledger });
 *   engine.ingestStatement(batch);
 *   const summary = await engine.run({ accountId: "bank" });
 *   engine.accept(matchId, version);
 */

import { randomUUID } from "node:crypto";
import type { Ledger } from "@tallybook/ledger";
import { parseAmount, validateMoney, ValidationError } from "@tallybook/ledger";
import type { BankTransaction, JournalEntry } from "@tallybook/types";
import { isIsoDate, isTransactionDirection } from "@tallybook/types";
import { detectAnomalies } from "./anomaly.js";
import type { CandidateSource } from "./candidates.js";
import { aggregateCombinations, LedgerCandidateSource, pruneCandidates } from "./candidates.js";
import type { CheckStore } from "./check-store.js";
import { InMemoryCheckStore } from "./check-store.js";
import { DEFAULT_RECONCILER_CONFIG, resolveConfig, validateReconcilerConfig } from "./config.js";
import { ConsistencyChecker } from "./consistency-checker.js";
import type { CheckScope } from "./consistency-checker.js";
import type { DraftAccounts } from "./entry-drafter.js";
import { draftEntryForTransaction } from "./entry-drafter.js";
import { AlreadyProcessedError, ReconcilerError } from "./errors.js";
import type { TransactionGroup } from "./grouping.js";
import { buildManyToOneGroups, groupFingerprint, groupTransaction, scoreGroup } from "./grouping.js";
import type { MatchStore } from "./match-store.js";
import { InMemoryMatchStore, matchTxnIds } from "./match-store.js";
import { assertEntriesReady, commitEntries, describeError, MatchReviewer } from "./review.js";
import { compareResults, fingerprint, score } from "./scoring.js";
import { verifyStatementBalance } from "./statement-balance.js";
import { computeStats } from "./stats.js";
import { route } from "./threshold-router.js";
import type { Route } from "./threshold-router.js";
import type { TransactionStore } from "./transaction-store.js";
import { InMemoryTransactionStore } from "./transaction-store.js";
import { buildTransferDraft, looksLikeTransfer, pairTransferLegs, transferLegs } from "./transfers.js";
import type {
  Anomaly,
  BatchItem,
  BatchResult,
  CheckAction,
  CheckFilter,
  ConsistencyCheck,
  HistoryRecord,
  IngestResult,
  MatchFilter,
  ReconcilerConfig,
  ReconciliationMatch,
  ReconciliationStats,
  RunError,
  RunScope,
  RunSummary,
  ScoreResult,
  StatementBatch,
  TransactionFilter,
  TransferOptions,
  TransferPair,
} from "./types.js";

// =============================================================================
// Configuration
// =============================================================================

export interface ReconciliationEngineOptions {
  readonly ledger: Ledger;
  readonly config?: ReconcilerConfig | undefined;
  readonly transactions?: TransactionStore | undefined;
  readonly matches?: MatchStore | undefined;
  readonly checks?: CheckStore | undefined;
  /** Defaults to a LedgerCandidateSource over the ledger and stores. */
  readonly candidateSource?: CandidateSource | undefined;
  readonly clock?: (() => string) | undefined;
  readonly idGenerator?: (() => string) | undefined;
}

export interface RunOptions {
  /** Checked between transactions; work already committed stays. */
  readonly signal?: AbortSignal | undefined;
}

type Outcome =
  | { readonly kind: "auto_accepted" | "pending_review"; readonly superseded: boolean }
  | { readonly kind: "unmatched" | "skipped" };

/** Accepted matches per account, read once when a run starts. */
type HistorySnapshot = ReadonlyMap<string, readonly HistoryRecord[]>;

const OPEN_PROPOSAL: readonly ("pending" | "pending_review")[] = ["pending", "pending_review"];

// =============================================================================
// Engine
// =============================================================================

export class ReconciliationEngine {
  readonly config: ReconcilerConfig;
  private readonly ledger: Ledger;
  private readonly transactions: TransactionStore;
  private readonly matches: MatchStore;
  private readonly checks: CheckStore;
  private readonly source: CandidateSource;
  private readonly clock: () => string;
  private readonly nextId: () => string;
  private readonly checker: ConsistencyChecker;
  private readonly reviewer: MatchReviewer;

  constructor(options: ReconciliationEngineOptions) {
    this.config = validateReconcilerConfig(options.config ?? DEFAULT_RECONCILER_CONFIG);
    this.ledger = options.ledger;
    this.transactions = options.transactions ?? new InMemoryTransactionStore();
    this.matches = options.matches ?? new InMemoryMatchStore();
    this.checks = options.checks ?? new InMemoryCheckStore();
    this.clock = options.clock ?? (() => new Date().toISOString());
    this.nextId = options.idGenerator ?? randomUUID;
    this.source =
      options.candidateSource ??
      new LedgerCandidateSource(this.ledger, this.transactions, this.matches, this.config);

    this.checker = new ConsistencyChecker({
      ledger: this.ledger,
      matches: this.matches,
      transactions: this.transactions,
      checks: this.checks,
      config: this.config,
      clock: this.clock,
      idGenerator: this.nextId,
    });
    this.reviewer = new MatchReviewer({
      ledger: this.ledger,
      matches: this.matches,
      transactions: this.transactions,
      checker: this.checker,
      clock: this.clock,
    });
  }

  // ===========================================================================
  // Statements
  // ===========================================================================

  /**
   * Store a parsed statement. Nothing is stored unless every
   * transaction in the batch is well-formed and new.
   */
  ingestStatement(batch: StatementBatch): IngestResult {
    const seen = new Set<string>();
    for (const input of batch.transactions) {
      if (!isIsoDate(input.txnDate)) {
        throw new ValidationError("INVALID_DATE", `Invalid transaction date: "${input.txnDate}"`, {
          bankTxnId: input.id,
        });
      }
      if (!isTransactionDirection(input.direction)) {
        throw new ReconcilerError(
          "INVALID_TRANSACTION",
          `Invalid direction: "${String(input.direction)}"`,
          { bankTxnId: input.id },
        );
      }
      validateMoney(input.money);
      if (parseAmount(input.money.amount, input.money.decimals) < 0n) {
        throw new ReconcilerError("INVALID_TRANSACTION", "Transaction amounts are unsigned", {
          bankTxnId: input.id,
          amount: input.money.amount,
        });
      }
      if (seen.has(input.id) || this.transactions.get(input.id) !== undefined) {
        throw new ReconcilerError(
          "DUPLICATE_TRANSACTION_ID",
          `Transaction already exists: "${input.id}"`,
          { bankTxnId: input.id },
        );
      }
      seen.add(input.id);
    }

    const trusted = this.statementTrusted(batch);
    const stored = batch.transactions.map((input) => {
      const txn: BankTransaction = {
        id: input.id,
        accountId: batch.accountId,
        statementId: batch.statementId,
        txnDate: input.txnDate,
        money: input.money,
        direction: input.direction,
        description: input.description,
        ...(input.reference !== undefined ? { reference: input.reference } : {}),
        status: "pending",
        trusted,
      };
      this.transactions.insert(txn);
      return txn;
    });

    return {
      statementId: batch.statementId,
      accountId: batch.accountId,
      trusted,
      transactions: stored,
    };
  }

  getTransaction(id: string): BankTransaction {
    const txn = this.transactions.get(id);
    if (txn === undefined) {
      throw new ReconcilerError("TRANSACTION_NOT_FOUND", `Unknown transaction: "${id}"`, {
        bankTxnId: id,
      });
    }
    return txn;
  }

  listTransactions(filter?: TransactionFilter): readonly BankTransaction[] {
    return this.transactions.list(filter);
  }

  /**
   * Draft a balanced bank_statement entry for a transaction that is not
   * matched yet.
   */
  draftEntryForTransaction(txnId: string, accounts: DraftAccounts): JournalEntry {
    const txn = this.getTransaction(txnId);
    if (txn.status === "matched") {
      throw new AlreadyProcessedError("Transaction", txnId, "matched");
    }
    return draftEntryForTransaction(this.ledger, txn, accounts);
  }

  // ===========================================================================
  // Runs
  // ===========================================================================

  /**
   * Score and route every open transaction in scope. A failure on one
   * transaction is recorded and the run moves on.
   *
   * History is read once up front, so auto-accepts made during the run
   * never change the scores of transactions processed after them.
   * Many-to-one groups go first; members of a group that found no
   * entry are then processed on their own.
   */
  async run(scope: RunScope = {}, options: RunOptions = {}): Promise<RunSummary> {
    const runId = this.nextId();
    const startedAt = this.clock();
    const open = await this.source.listOpenTransactions(scope);
    const history = await this.historySnapshot(open);

    let processed = 0;
    let autoAccepted = 0;
    let pendingReview = 0;
    let unmatched = 0;
    let superseded = 0;
    let skipped = 0;
    let aborted = false;
    const errors: RunError[] = [];

    const tally = (outcome: Outcome, count: number): void => {
      switch (outcome.kind) {
        case "auto_accepted":
          autoAccepted += count;
          if (outcome.superseded) superseded += 1;
          break;
        case "pending_review":
          pendingReview += count;
          if (outcome.superseded) superseded += 1;
          break;
        case "unmatched":
          unmatched += count;
          break;
        case "skipped":
          skipped += count;
          break;
      }
    };

    const grouped = new Set<string>();
    for (const group of buildManyToOneGroups(open, this.config.batchKeywords)) {
      if (options.signal?.aborted === true) {
        aborted = true;
        break;
      }
      try {
        const outcome = await this.processGroup(group, runId, history);
        if (outcome === undefined) continue;
        for (const txn of group.transactions) grouped.add(txn.id);
        processed += group.transactions.length;
        tally(outcome, group.transactions.length);
      } catch (error) {
        const { code, message } = describeError(error);
        errors.push({ bankTxnId: group.transactions[0]?.id ?? group.key, code, message });
      }
    }

    for (const txn of open) {
      if (aborted || options.signal?.aborted === true) {
        aborted = true;
        break;
      }
      if (grouped.has(txn.id)) continue;
      processed += 1;

      try {
        tally(await this.processTransaction(txn, runId, history.get(txn.accountId) ?? []), 1);
      } catch (error) {
        const { code, message } = describeError(error);
        errors.push({ bankTxnId: txn.id, code, message });
      }
    }

    return {
      runId,
      startedAt,
      finishedAt: this.clock(),
      processed,
      autoAccepted,
      pendingReview,
      unmatched,
      superseded,
      skipped,
      aborted,
      errors,
    };
  }

  /**
   * Every candidate set for one transaction, best first. Entry sets a
   * reviewer rejected for this transaction are left out. Without a
   * `history` snapshot the account's current history is read.
   */
  async rankCandidates(
    txn: BankTransaction,
    history?: readonly HistoryRecord[],
  ): Promise<ScoreResult[]> {
    const config = resolveConfig(this.config, txn.accountId);
    const entries = await this.source.listCandidateEntries(txn, config.dateWindowDays);
    const pruned = pruneCandidates(txn, entries, config.maxCandidates);
    const prior = history ?? (await this.source.listHistory(txn.accountId));
    const rejected = this.rejectedFingerprints(txn.id);

    const sets = [...pruned.map((c) => [c]), ...aggregateCombinations(txn, pruned, config)];
    return sets
      .map((set) => score(txn, set, { config, history: prior }))
      .filter((r) => !rejected.has(fingerprint(txn.id, r.entryIds)))
      .sort(compareResults);
  }

  private async processTransaction(
    txn: BankTransaction,
    runId: string,
    history: readonly HistoryRecord[],
  ): Promise<Outcome> {
    const live = this.matches.list({ bankTxnId: txn.id, statuses: OPEN_PROPOSAL })[0];
    // A pending group proposal covers this line; leave it to the reviewer.
    if (live?.groupTxnIds !== undefined) return { kind: "skipped" };

    const config = resolveConfig(this.config, txn.accountId);
    const ranked = await this.rankCandidates(txn, history);
    const best = ranked[0];
    const decision = route(txn, best, {
      thresholds: config.thresholds,
      hasRejectedMatch: this.rejectedFingerprints(txn.id).size > 0,
    });

    if (best === undefined || decision.decision === "unmatched") {
      if (live !== undefined) return { kind: "skipped" };
      if (txn.status !== "unmatched") this.transactions.setStatus(txn.id, "unmatched");
      return { kind: "unmatched" };
    }

    const print = fingerprint(txn.id, best.entryIds);
    if (live !== undefined && (live.fingerprint === print || best.weighted <= live.weightedScore)) {
      return { kind: "skipped" };
    }

    return this.record(txn, [txn], best, decision, print, runId, live);
  }

  /**
   * Score the group total against single entries. Returns undefined,
   * leaving the members to individual processing, when a member already
   * has an open proposal or no entry reaches the review threshold.
   */
  private async processGroup(
    group: TransactionGroup,
    runId: string,
    history: HistorySnapshot,
  ): Promise<Outcome | undefined> {
    const members = group.transactions;
    const txnIds = members.map((t) => t.id);
    if (txnIds.some((id) => this.matches.list({ bankTxnId: id, statuses: OPEN_PROPOSAL }).length > 0)) {
      return undefined;
    }

    const composite = groupTransaction(group);
    const config = resolveConfig(this.config, composite.accountId);
    const entries = await this.source.listCandidateEntries(composite, config.dateWindowDays);
    const pruned = pruneCandidates(composite, entries, config.maxCandidates);
    const rejected = new Set(txnIds.flatMap((id) => [...this.rejectedFingerprints(id)]));
    const context = { config, history: history.get(composite.accountId) ?? [] };

    const best = pruned
      .map((c) => scoreGroup(composite, c, context))
      .filter((r) => r.score >= config.thresholds.review)
      .filter((r) => !rejected.has(groupFingerprint(txnIds, r.entryIds)))
      .sort(compareResults)[0];
    if (best === undefined) return undefined;

    const decision = route(composite, best, {
      thresholds: config.thresholds,
      hasRejectedMatch: rejected.size > 0,
    });
    const print = groupFingerprint(txnIds, best.entryIds);
    return this.record(composite, members, best, decision, print, runId, undefined);
  }

  /**
   * `txn` names the match; `members` are the bank lines it covers, more
   * than one for a many-to-one group.
   */
  private record(
    txn: BankTransaction,
    members: readonly BankTransaction[],
    best: ScoreResult,
    decision: Route,
    print: string,
    runId: string,
    replaces: ReconciliationMatch | undefined,
  ): Outcome {
    const autoAccept = decision.decision === "auto_accept";
    if (autoAccept) assertEntriesReady(this.ledger, best.entryIds);

    const pending: ReconciliationMatch = {
      id: this.nextId(),
      bankTxnId: txn.id,
      ...(members.length > 1 ? { groupTxnIds: members.map((m) => m.id) } : {}),
      accountId: txn.accountId,
      journalEntryIds: best.entryIds,
      matchScore: best.score,
      weightedScore: best.weighted,
      scoreBreakdown: best.breakdown,
      flags: decision.flags,
      fingerprint: print,
      status: "pending",
      version: 1,
      createdAt: this.clock(),
      runId,
      ...(replaces !== undefined ? { supersedes: replaces.id } : {}),
    };
    this.matches.insert(pending);

    if (replaces !== undefined) {
      this.matches.replace(
        { ...replaces, status: "superseded", version: replaces.version + 1, supersededBy: pending.id },
        replaces.version,
      );
    }

    if (autoAccept) {
      commitEntries(this.ledger, best.entryIds);
      this.matches.replace(
        { ...pending, status: "auto_accepted", version: pending.version + 1, resolvedAt: this.clock() },
        pending.version,
      );
      for (const member of members) this.transactions.setStatus(member.id, "matched");
      return { kind: "auto_accepted", superseded: replaces !== undefined };
    }

    this.matches.replace(
      { ...pending, status: "pending_review", version: pending.version + 1 },
      pending.version,
    );
    for (const member of members) {
      if (member.status !== "pending") this.transactions.setStatus(member.id, "pending");
    }
    return { kind: "pending_review", superseded: replaces !== undefined };
  }

  // ===========================================================================
  // Matches & Review
  // ===========================================================================

  /** Matches awaiting review unless the filter names other statuses. */
  listPending(filter: MatchFilter = {}): readonly ReconciliationMatch[] {
    return this.matches.list({ ...filter, statuses: filter.statuses ?? ["pending_review"] });
  }

  listMatches(filter?: MatchFilter): readonly ReconciliationMatch[] {
    return this.matches.list(filter);
  }

  getMatch(id: string): ReconciliationMatch {
    return this.reviewer.getMatch(id);
  }

  accept(matchId: string, version: number): ReconciliationMatch {
    return this.reviewer.accept(matchId, version);
  }

  reject(matchId: string, version: number, reason: string): ReconciliationMatch {
    return this.reviewer.reject(matchId, version, reason);
  }

  batchAccept(items: readonly BatchItem[]): BatchResult {
    return this.reviewer.batchAccept(items);
  }

  batchReject(items: readonly BatchItem[], reason: string): BatchResult {
    return this.reviewer.batchReject(items, reason);
  }

  // ===========================================================================
  // Consistency
  // ===========================================================================

  /** A `statementId` in scope adds the transfer_pair and anomaly checks. */
  runConsistencyChecks(asOf?: string, scope?: CheckScope): ConsistencyCheck[] {
    return this.checker.run(asOf, scope);
  }

  listConsistencyChecks(filter?: CheckFilter): readonly ConsistencyCheck[] {
    return this.checker.list(filter);
  }

  resolveCheck(id: string, action: CheckAction, note?: string): ConsistencyCheck {
    return this.checker.resolve(id, action, note);
  }

  // ===========================================================================
  // Transfers & Anomalies
  // ===========================================================================

  /** Open transactions whose description names a transfer keyword. */
  listTransferCandidates(scope: RunScope = {}): readonly BankTransaction[] {
    const open = this.transactions.list({
      accountId: scope.accountId,
      statementId: scope.statementId,
      fromDate: scope.fromDate,
      toDate: scope.toDate,
      statuses: ["pending", "unmatched"],
    });
    const candidates = open.filter((t) => looksLikeTransfer(t.description, this.config.transferKeywords));
    return scope.limit === undefined ? candidates : candidates.slice(0, scope.limit);
  }

  /**
   * Book one leg of a transfer against a clearing account and post it.
   * The transaction stays open; the next run matches it to the entry.
   */
  bookTransfer(txnId: string, options: TransferOptions = {}): JournalEntry {
    const txn = this.getTransaction(txnId);
    if (txn.status === "matched") {
      throw new AlreadyProcessedError("Transaction", txnId, "matched");
    }
    const clearingId = this.clearingAccountFor(options.clearingAccountId);
    const draft = this.ledger.createDraft(buildTransferDraft(txn, clearingId));
    const result = this.ledger.validate(draft);
    if (!result.ok) {
      this.ledger.void(draft.id, "transfer leg failed validation");
      throw result.error;
    }
    return this.ledger.post(draft.id, draft.version);
  }

  /** OUT legs paired with IN legs at or above `threshold` confidence. */
  findTransferPairs(threshold: number = this.config.transferPairThreshold): TransferPair[] {
    return pairTransferLegs(transferLegs(this.ledger.listEntries(), this.clearingIds()), threshold);
  }

  detectAnomalies(txnId: string): Anomaly[] {
    const txn = this.getTransaction(txnId);
    return detectAnomalies(txn, this.transactions.list(), this.config.anomaly);
  }

  // ===========================================================================
  // Stats
  // ===========================================================================

  stats(scope: RunScope = {}): ReconciliationStats {
    const txns = this.transactions.list({
      accountId: scope.accountId,
      statementId: scope.statementId,
      fromDate: scope.fromDate,
      toDate: scope.toDate,
    });
    const ids = new Set(txns.map((t) => t.id));
    const matches = this.matches.list().filter((m) => matchTxnIds(m).some((id) => ids.has(id)));
    return computeStats(txns, matches);
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async historySnapshot(open: readonly BankTransaction[]): Promise<HistorySnapshot> {
    const snapshot = new Map<string, readonly HistoryRecord[]>();
    for (const accountId of new Set(open.map((t) => t.accountId))) {
      snapshot.set(accountId, await this.source.listHistory(accountId));
    }
    return snapshot;
  }

  private clearingIds(): Set<string> {
    return new Set([...this.config.clearingAccountIds, ...this.ledger.accounts.clearingIds()]);
  }

  private clearingAccountFor(requested: string | undefined): string {
    const clearing = this.clearingIds();
    const id = requested ?? [...clearing][0];
    if (id === undefined) {
      throw new ReconcilerError("NO_CLEARING_ACCOUNT", "No clearing account is configured or registered");
    }
    if (!clearing.has(id)) {
      throw new ReconcilerError("NO_CLEARING_ACCOUNT", `Account "${id}" is not a clearing account`, {
        accountId: id,
      });
    }
    return id;
  }

  private rejectedFingerprints(txnId: string): Set<string> {
    return new Set(
      this.matches.list({ bankTxnId: txnId, statuses: ["rejected"] }).map((m) => m.fingerprint),
    );
  }

  private statementTrusted(batch: StatementBatch): boolean {
    if (batch.balanceCheckPassed !== undefined) return batch.balanceCheckPassed;
    if (batch.openingBalance === undefined || batch.closingBalance === undefined) return true;
    return verifyStatementBalance(batch.openingBalance, batch.closingBalance, batch.transactions)
      .passed;
  }
}
