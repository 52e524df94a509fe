/**
 * TallybookService — Composition root for the ledger and reconciler.
 *
 * Route handlers delegate to this service; they never import domain
 * packages directly. Each tenant gets its own instance, so ledgers,
 * statements and matches never cross tenants.
 */

import type { Logger } from "pino";
import { Ledger, ValidationError } from "@tallybook/ledger";
import type {
  AccountBalance,
  EntryFilter,
  EquationReport,
  LineInput,
  LinePatch,
  TrialBalance,
  VoidResult,
} from "@tallybook/ledger";
import { describeError, ReconciliationEngine } from "@tallybook/reconciler";
import type {
  Anomaly,
  BatchItem,
  BatchResult,
  CheckAction,
  CheckFilter,
  ConsistencyCheck,
  IngestResult,
  MatchFilter,
  ReconcilerConfig,
  ReconciliationMatch,
  ReconciliationStats,
  RunScope,
  RunSummary,
  TransactionFilter,
  TransferPair,
} from "@tallybook/reconciler";
import type { Account, BankTransaction, JournalEntry, Money } from "@tallybook/types";
import type { AuditAction, AuditLog, AuditResourceType } from "./audit-log.js";
import type {
  BookTransferDto,
  CreateAccountDto,
  CreateEntryDto,
  DraftEntryDto,
  LineDto,
  MoneyDto,
  StatementDto,
  UpdateLineDto,
} from "../types/dto.js";

// =============================================================================
// Configuration
// =============================================================================

export interface TallybookServiceConfig {
  readonly tenantId: string;
  readonly defaultCurrency: string;
  readonly defaultDecimals: number;
  readonly reconciler?: ReconcilerConfig | undefined;
  readonly logger: Logger;
  readonly auditLog: AuditLog;
  readonly clock?: (() => string) | undefined;
}

export type EntryCheck =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: ReturnType<typeof describeError> };

export interface ServiceHealth {
  readonly ready: boolean;
  readonly equationHolds: boolean;
}

// =============================================================================
// Service
// =============================================================================

export class TallybookService {
  readonly tenantId: string;
  readonly ledger: Ledger;
  readonly engine: ReconciliationEngine;

  private readonly _config: TallybookServiceConfig;
  private readonly _log: Logger;
  private readonly _shutdown = new AbortController();
  private _ready = false;

  constructor(config: TallybookServiceConfig) {
    this._config = config;
    this.tenantId = config.tenantId;
    this._log = config.logger.child({ tenantId: config.tenantId });
    this.ledger = new Ledger({ clock: config.clock });
    this.engine = new ReconciliationEngine({
      ledger: this.ledger,
      config: config.reconciler,
      clock: config.clock,
    });
    this._ready = true;
  }

  // ─── Accounts ──────────────────────────────────────────────────────

  createAccount(dto: CreateAccountDto): Account {
    return this.ledger.registerAccount({
      id: dto.id,
      name: dto.name,
      type: dto.type,
      currency: dto.currency ?? this._config.defaultCurrency,
      clearing: dto.clearing,
    });
  }

  listAccounts(): readonly Account[] {
    return this.ledger.listAccounts();
  }

  getAccount(id: string): Account {
    return this.ledger.getAccount(id);
  }

  deactivateAccount(id: string): Account {
    return this.ledger.deactivateAccount(id);
  }

  getBalance(accountId: string): AccountBalance {
    return this.ledger.getBalance(accountId);
  }

  // ─── Entries ───────────────────────────────────────────────────────

  createEntry(dto: CreateEntryDto): JournalEntry {
    return this.ledger.createDraft({
      id: dto.id,
      entryDate: dto.entryDate,
      memo: dto.memo,
      sourceType: dto.sourceType,
      sourceTransactionId: dto.sourceTransactionId,
      lines: dto.lines.map((l) => this.toLineInput(l)),
    });
  }

  listEntries(filter?: EntryFilter): readonly JournalEntry[] {
    return this.ledger.listEntries(filter);
  }

  getEntry(id: string): JournalEntry {
    return this.ledger.getEntry(id);
  }

  addLine(entryId: string, line: LineDto, version?: number): JournalEntry {
    return this.ledger.addLine(entryId, this.toLineInput(line), version);
  }

  updateLine(entryId: string, lineId: string, dto: UpdateLineDto): JournalEntry {
    const patch: LinePatch = {
      accountId: dto.accountId,
      direction: dto.direction,
      money: dto.money === undefined ? undefined : this.toMoney(dto.money),
      fxRate: dto.fxRate,
      eventType: dto.eventType,
      tags: dto.tags,
    };
    return this.ledger.updateLine(entryId, lineId, patch, dto.version);
  }

  removeLine(entryId: string, lineId: string, version?: number): JournalEntry {
    return this.ledger.removeLine(entryId, lineId, version);
  }

  /** Dry-run the posting checks without changing the entry. */
  checkEntry(id: string): EntryCheck {
    const result = this.ledger.validate(this.ledger.getEntry(id));
    return result.ok ? { ok: true } : { ok: false, error: describeError(result.error) };
  }

  postEntry(id: string, version: number, actor: string): JournalEntry {
    const entry = this.ledger.post(id, version);
    this.audit("post", "entry", id, actor);
    return entry;
  }

  voidEntry(id: string, reason: string, version: number | undefined, actor: string): VoidResult {
    const result = this.ledger.void(id, reason, version);
    this.audit("void", "entry", id, actor, reason);
    return result;
  }

  // ─── Reports ───────────────────────────────────────────────────────

  trialBalance(): TrialBalance {
    return this.ledger.getTrialBalance();
  }

  accountingEquation(): EquationReport {
    return this.ledger.checkAccountingEquation();
  }

  // ─── Statements ────────────────────────────────────────────────────

  ingestStatement(dto: StatementDto): IngestResult {
    const result = this.engine.ingestStatement({
      statementId: dto.statementId,
      accountId: dto.accountId,
      openingBalance: dto.openingBalance === undefined ? undefined : this.toMoney(dto.openingBalance),
      closingBalance: dto.closingBalance === undefined ? undefined : this.toMoney(dto.closingBalance),
      balanceCheckPassed: dto.balanceCheckPassed,
      transactions: dto.transactions.map((t) => ({
        id: t.id,
        txnDate: t.txnDate,
        money: this.toMoney(t.money),
        direction: t.direction,
        description: t.description,
        reference: t.reference,
      })),
    });
    this._log.info(
      {
        statementId: result.statementId,
        accountId: result.accountId,
        transactions: result.transactions.length,
        trusted: result.trusted,
      },
      "Statement ingested",
    );
    return result;
  }

  listTransactions(filter?: TransactionFilter): readonly BankTransaction[] {
    return this.engine.listTransactions(filter);
  }

  getTransaction(id: string): BankTransaction {
    return this.engine.getTransaction(id);
  }

  draftEntry(txnId: string, dto: DraftEntryDto): JournalEntry {
    return this.engine.draftEntryForTransaction(txnId, dto);
  }

  detectAnomalies(txnId: string): Anomaly[] {
    return this.engine.detectAnomalies(txnId);
  }

  // ─── Transfers ─────────────────────────────────────────────────────

  listTransferCandidates(scope?: RunScope): readonly BankTransaction[] {
    return this.engine.listTransferCandidates(scope);
  }

  /** Post one leg against the clearing account; audited as a posting. */
  bookTransfer(txnId: string, dto: BookTransferDto, actor: string): JournalEntry {
    const entry = this.engine.bookTransfer(txnId, dto);
    this.audit("book_transfer", "entry", entry.id, actor, txnId);
    this._log.info({ entryId: entry.id, bankTxnId: txnId }, "Transfer leg booked");
    return entry;
  }

  findTransferPairs(minConfidence?: number): TransferPair[] {
    return this.engine.findTransferPairs(minConfidence);
  }

  // ─── Reconciliation ────────────────────────────────────────────────

  /**
   * Run a pass over open transactions. Stops between transactions once
   * the service is shutting down.
   */
  async runReconciliation(scope: RunScope = {}): Promise<RunSummary> {
    const summary = await this.engine.run(scope, { signal: this._shutdown.signal });

    this._log.info(
      {
        runId: summary.runId,
        processed: summary.processed,
        autoAccepted: summary.autoAccepted,
        pendingReview: summary.pendingReview,
        unmatched: summary.unmatched,
        superseded: summary.superseded,
        skipped: summary.skipped,
        errors: summary.errors.length,
        aborted: summary.aborted,
      },
      "Reconciliation run finished",
    );
    for (const error of summary.errors) {
      this._log.warn(
        { runId: summary.runId, bankTxnId: error.bankTxnId, code: error.code },
        error.message,
      );
    }
    return summary;
  }

  /** Matches awaiting a decision unless statuses are given. */
  listPending(filter?: MatchFilter): readonly ReconciliationMatch[] {
    return this.engine.listPending(filter);
  }

  getMatch(id: string): ReconciliationMatch {
    return this.engine.getMatch(id);
  }

  acceptMatch(id: string, version: number, actor: string): ReconciliationMatch {
    const match = this.engine.accept(id, version);
    this.audit("accept", "match", id, actor);
    return match;
  }

  rejectMatch(id: string, version: number, reason: string, actor: string): ReconciliationMatch {
    const match = this.engine.reject(id, version, reason);
    this.audit("reject", "match", id, actor, reason);
    return match;
  }

  batchAccept(items: readonly BatchItem[], actor: string): BatchResult {
    const result = this.engine.batchAccept(items);
    this.auditBatch("batch_accept", result, actor);
    return result;
  }

  batchReject(items: readonly BatchItem[], reason: string, actor: string): BatchResult {
    const result = this.engine.batchReject(items, reason);
    this.auditBatch("batch_reject", result, actor, reason);
    return result;
  }

  stats(scope?: RunScope): ReconciliationStats {
    return this.engine.stats(scope);
  }

  // ─── Consistency ───────────────────────────────────────────────────

  runChecks(asOf?: string, statementId?: string): ConsistencyCheck[] {
    const created = this.engine.runConsistencyChecks(asOf, { statementId });
    if (created.length > 0) {
      this._log.info(
        { checks: created.map((c) => ({ id: c.id, type: c.checkType, severity: c.severity })) },
        "Consistency checks raised",
      );
    }
    return created;
  }

  listChecks(filter?: CheckFilter): readonly ConsistencyCheck[] {
    return this.engine.listConsistencyChecks(filter);
  }

  resolveCheck(id: string, action: CheckAction, note: string | undefined, actor: string): ConsistencyCheck {
    const check = this.engine.resolveCheck(id, action, note);
    this.audit("resolve", "check", id, actor, note === undefined ? action : `${action}: ${note}`);
    return check;
  }

  // ─── Health & Lifecycle ────────────────────────────────────────────

  checkHealth(): ServiceHealth {
    return { ready: this._ready, equationHolds: this.ledger.checkAccountingEquation().holds };
  }

  isReady(): boolean {
    return this._ready;
  }

  /** Abort in-flight runs and report not ready. */
  async stop(): Promise<void> {
    this._ready = false;
    this._shutdown.abort();
  }

  // ─── Internals ─────────────────────────────────────────────────────

  /**
   * Fill in currency and decimals. Decimals may only be omitted for the
   * default currency.
   */
  private toMoney(dto: MoneyDto): Money {
    const currency = dto.currency ?? this._config.defaultCurrency;
    const decimals =
      dto.decimals ?? (currency === this._config.defaultCurrency ? this._config.defaultDecimals : undefined);
    if (decimals === undefined) {
      throw new ValidationError("INVALID_MONEY", `Decimals are required for currency ${currency}`, {
        currency,
      });
    }
    return { amount: dto.amount, currency, decimals };
  }

  private toLineInput(line: LineDto): LineInput {
    return {
      id: line.id,
      accountId: line.accountId,
      direction: line.direction,
      money: this.toMoney(line.money),
      fxRate: line.fxRate,
      eventType: line.eventType,
      tags: line.tags,
    };
  }

  private audit(
    action: AuditAction,
    resourceType: AuditResourceType,
    resourceId: string,
    actor: string,
    detail?: string,
  ): void {
    this._config.auditLog.append({
      tenantId: this.tenantId,
      action,
      resourceType,
      resourceId,
      actor,
      detail,
    });
  }

  private auditBatch(
    action: "batch_accept" | "batch_reject",
    result: BatchResult,
    actor: string,
    detail?: string,
  ): void {
    for (const item of result.results) {
      if (item.ok) this.audit(action, "match", item.id, actor, detail);
    }
  }
}
