/**
 * @tallybook/ledger — Core Ledger class.
 *
 * Double-entry ledger with an explicit entry lifecycle. Lines may change
 * only while an entry is a draft; posting requires an exact balance in
 * every currency; a posted entry is corrected by a reversing entry and
 * never edited.
 *
 * API surface:
 * - registerAccount() / deactivateAccount() — Chart of accounts
 * - createDraft(), addLine(), updateLine(), removeLine() — Draft editing
 * - validate() — Check an entry without changing it
 * - post(), void(), reconcile() — Lifecycle transitions
 * - getBalance(), getTrialBalance(), checkAccountingEquation() — Reports
 * - snapshot() / fromSnapshot() — Persistence
 */

import { randomUUID } from "node:crypto";
import type { Account, Direction, EntryStatus, JournalEntry, JournalLine } from "@tallybook/types";
import { isIsoDate } from "@tallybook/types";
import { AccountRegistry } from "./accounts.js";
import {
  computeAccountBalance,
  computeAccountingEquation,
  computeTrialBalance,
} from "./balance-calculator.js";
import { formatAmount, isPositiveDecimal, parseAmount, validateMoney } from "./money-math.js";
import type { LedgerStore } from "./store.js";
import { InMemoryLedgerStore } from "./store.js";
import { assertTransition, lifecycleStatus } from "./transitions.js";
import type {
  AccountBalance,
  AccountInput,
  DraftInput,
  EntryFilter,
  EquationReport,
  ImbalanceDetails,
  LedgerSnapshot,
  LineInput,
  LinePatch,
  TrialBalance,
  ValidationResult,
  VoidResult,
} from "./types.js";
import { ConflictError, LedgerError, ValidationError } from "./types.js";

export interface LedgerOptions {
  readonly store?: LedgerStore | undefined;
  /** Returns an ISO-8601 timestamp. */
  readonly clock?: (() => string) | undefined;
  readonly idGenerator?: (() => string) | undefined;
}

const opposite = (d: Direction): Direction => (d === "debit" ? "credit" : "debit");

export class Ledger {
  private readonly _store: LedgerStore;
  private readonly _accounts: AccountRegistry;
  private readonly _clock: () => string;
  private readonly _nextId: () => string;

  constructor(options: LedgerOptions = {}) {
    this._store = options.store ?? new InMemoryLedgerStore();
    this._accounts = new AccountRegistry(this._store);
    this._clock = options.clock ?? (() => new Date().toISOString());
    this._nextId = options.idGenerator ?? randomUUID;
  }

  get accounts(): AccountRegistry {
    return this._accounts;
  }

  // ─── Account Management ──────────────────────────────────────────────

  registerAccount(input: AccountInput): Account {
    return this._accounts.register(input, this._clock());
  }

  /**
   * Soft delete. Lines on an inactive account cannot be posted.
   */
  deactivateAccount(id: string): Account {
    return this._accounts.deactivate(id);
  }

  /**
   * Get an account by ID. Throws ACCOUNT_NOT_FOUND.
   */
  getAccount(id: string): Account {
    return this._accounts.assertExists(id);
  }

  listAccounts(): readonly Account[] {
    return this._accounts.getAll();
  }

  // ─── Drafts ──────────────────────────────────────────────────────────

  /**
   * Create a draft entry. Drafts may be unbalanced, but every line must
   * reference a known account and carry a valid non-negative amount.
   */
  createDraft(input: DraftInput): JournalEntry {
    if (!isIsoDate(input.entryDate)) {
      throw new ValidationError("INVALID_DATE", `Invalid entry date: "${input.entryDate}"`);
    }

    const id = input.id ?? this._nextId();
    const now = this._clock();
    const entry: JournalEntry = {
      id,
      entryDate: input.entryDate,
      memo: input.memo,
      sourceType: input.sourceType ?? "manual",
      status: "draft",
      lines: input.lines.map((l) => this._buildLine(id, l)),
      version: 1,
      createdAt: now,
      updatedAt: now,
      ...(input.sourceTransactionId !== undefined
        ? { sourceTransactionId: input.sourceTransactionId }
        : {}),
    };

    this._store.insertEntry(entry);
    return entry;
  }

  addLine(entryId: string, line: LineInput, expectedVersion?: number): JournalEntry {
    const entry = this._editableDraft(entryId, expectedVersion);
    return this._replaceLines(entry, [...entry.lines, this._buildLine(entry.id, line)]);
  }

  updateLine(
    entryId: string,
    lineId: string,
    patch: LinePatch,
    expectedVersion?: number,
  ): JournalEntry {
    const entry = this._editableDraft(entryId, expectedVersion);
    const index = entry.lines.findIndex((l) => l.id === lineId);
    const current = entry.lines[index];
    if (current === undefined) {
      throw new LedgerError("LINE_NOT_FOUND", `Entry "${entryId}" has no line "${lineId}"`);
    }

    const updated = this._buildLine(entry.id, {
      id: current.id,
      accountId: patch.accountId ?? current.accountId,
      direction: patch.direction ?? current.direction,
      money: patch.money ?? current.money,
      fxRate: patch.fxRate ?? current.fxRate,
      eventType: patch.eventType ?? current.eventType,
      tags: patch.tags ?? current.tags,
    });

    const lines = entry.lines.map((l, i) => (i === index ? updated : l));
    return this._replaceLines(entry, lines);
  }

  removeLine(entryId: string, lineId: string, expectedVersion?: number): JournalEntry {
    const entry = this._editableDraft(entryId, expectedVersion);
    if (!entry.lines.some((l) => l.id === lineId)) {
      throw new LedgerError("LINE_NOT_FOUND", `Entry "${entryId}" has no line "${lineId}"`);
    }
    return this._replaceLines(entry, entry.lines.filter((l) => l.id !== lineId));
  }

  // ─── Validation ──────────────────────────────────────────────────────

  /**
   * Check an entry without changing it. Checks run in a fixed order and
   * the first failure is reported.
   */
  validate(entry: JournalEntry): ValidationResult {
    try {
      this._assertValid(entry);
      return { ok: true };
    } catch (err) {
      if (err instanceof ValidationError) {
        return { ok: false, error: err };
      }
      throw err;
    }
  }

  private _assertValid(entry: JournalEntry): void {
    if (entry.lines.length < 2) {
      throw new ValidationError(
        "TOO_FEW_LINES",
        `Entry "${entry.id}" needs at least two lines, has ${String(entry.lines.length)}`,
        { entryId: entry.id, lineCount: entry.lines.length },
      );
    }

    const accounts = new Map<string, Account>();
    for (const line of entry.lines) {
      const account = this._accounts.get(line.accountId);
      if (account === undefined) {
        throw new ValidationError("UNKNOWN_ACCOUNT", `Unknown account: "${line.accountId}"`, {
          entryId: entry.id,
          lineId: line.id,
          accountId: line.accountId,
        });
      }
      if (!account.active) {
        throw new ValidationError("INACTIVE_ACCOUNT", `Account "${account.id}" is inactive`, {
          entryId: entry.id,
          lineId: line.id,
          accountId: account.id,
        });
      }
      accounts.set(account.id, account);
    }

    for (const line of entry.lines) {
      this._assertLineAmount(line.money, line.id);
    }

    for (const line of entry.lines) {
      const account = accounts.get(line.accountId);
      if (account === undefined || line.money.currency === account.currency) {
        if (line.fxRate !== undefined && !isPositiveDecimal(line.fxRate)) {
          throw this._fxError("INVALID_FX_RATE", entry, line);
        }
        continue;
      }
      if (line.fxRate === undefined) {
        throw this._fxError("MISSING_FX_RATE", entry, line);
      }
      if (!isPositiveDecimal(line.fxRate)) {
        throw this._fxError("INVALID_FX_RATE", entry, line);
      }
    }

    const imbalance = findImbalance(entry.lines);
    if (imbalance !== undefined) {
      const { currency, totalDebits, totalCredits, delta, shortSide } = imbalance;
      throw new ValidationError(
        "UNBALANCED_ENTRY",
        `Entry "${entry.id}" does not balance in ${currency}: debits ${totalDebits}, credits ${totalCredits} (delta ${delta}, ${shortSide} side short)`,
        { entryId: entry.id, ...imbalance },
      );
    }
  }

  private _fxError(
    code: "MISSING_FX_RATE" | "INVALID_FX_RATE",
    entry: JournalEntry,
    line: JournalLine,
  ): ValidationError {
    const message = code === "MISSING_FX_RATE"
      ? `Line "${line.id}" is in ${line.money.currency} on an account of another currency and needs an fx rate`
      : `Line "${line.id}" has an invalid fx rate: "${String(line.fxRate)}"`;
    return new ValidationError(code, message, {
      entryId: entry.id,
      lineId: line.id,
      accountId: line.accountId,
      currency: line.money.currency,
    });
  }

  // ─── Lifecycle ───────────────────────────────────────────────────────

  /**
   * Post a draft. The caller's version must be current, so two posts of
   * the same stale draft cannot both succeed.
   */
  post(entryId: string, expectedVersion: number): JournalEntry {
    const entry = this.getEntry(entryId);
    this._assertVersion(entry, expectedVersion);
    assertTransition(entry, "posted");

    const result = this.validate(entry);
    if (!result.ok) {
      throw result.error;
    }

    const now = this._clock();
    const posted: JournalEntry = {
      ...entry,
      status: "posted",
      version: entry.version + 1,
      updatedAt: now,
      postedAt: now,
    };
    this._store.replaceEntry(posted, entry.version);
    return posted;
  }

  /**
   * Void an entry. A draft simply becomes void. A posted entry is
   * offset by a posted reversing entry and keeps its own status for
   * the audit trail.
   */
  void(entryId: string, reason: string, expectedVersion?: number): VoidResult {
    const entry = this.getEntry(entryId);
    if (expectedVersion !== undefined) {
      this._assertVersion(entry, expectedVersion);
    }
    assertTransition(entry, "void");
    if (entry.reversalOf !== undefined) {
      throw new LedgerError(
        "INVALID_TRANSITION",
        `Entry "${entryId}" reverses "${entry.reversalOf}" and cannot itself be voided`,
        { entryId, reversalOf: entry.reversalOf },
      );
    }

    const now = this._clock();

    if (entry.status === "draft") {
      const voided: JournalEntry = {
        ...entry,
        status: "void",
        version: entry.version + 1,
        updatedAt: now,
        voidedAt: now,
        voidReason: reason,
      };
      this._store.replaceEntry(voided, entry.version);
      return { original: voided };
    }

    const reversalId = this._nextId();
    const reversal: JournalEntry = {
      id: reversalId,
      entryDate: now.slice(0, 10),
      memo: `Reversal of ${entry.id}: ${reason}`,
      sourceType: "system_adjustment",
      status: "posted",
      lines: entry.lines.map((l) => ({
        ...l,
        id: this._nextId(),
        entryId: reversalId,
        direction: opposite(l.direction),
      })),
      version: 1,
      createdAt: now,
      updatedAt: now,
      postedAt: now,
      reversalOf: entry.id,
    };

    const original: JournalEntry = {
      ...entry,
      version: entry.version + 1,
      updatedAt: now,
      voidedAt: now,
      voidReason: reason,
      reversedBy: reversalId,
    };

    this._store.replaceEntry(original, entry.version);
    this._store.insertEntry(reversal);
    return { original, reversal };
  }

  /**
   * Mark a posted entry as reconciled. Status only; lines were
   * validated when the entry was posted.
   */
  reconcile(entryId: string, expectedVersion?: number): JournalEntry {
    const entry = this.getEntry(entryId);
    if (expectedVersion !== undefined) {
      this._assertVersion(entry, expectedVersion);
    }
    assertTransition(entry, "reconciled");

    const now = this._clock();
    const reconciled: JournalEntry = {
      ...entry,
      status: "reconciled",
      version: entry.version + 1,
      updatedAt: now,
      reconciledAt: now,
    };
    this._store.replaceEntry(reconciled, entry.version);
    return reconciled;
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Get an entry by ID. Throws ENTRY_NOT_FOUND.
   */
  getEntry(id: string): JournalEntry {
    const entry = this._store.getEntry(id);
    if (entry === undefined) {
      throw new LedgerError("ENTRY_NOT_FOUND", `Unknown entry: "${id}"`);
    }
    return entry;
  }

  findEntry(id: string): JournalEntry | undefined {
    return this._store.getEntry(id);
  }

  listEntries(filter?: EntryFilter): readonly JournalEntry[] {
    return this._store.listEntries(filter);
  }

  lifecycleStatus(entry: JournalEntry): EntryStatus {
    return lifecycleStatus(entry);
  }

  getBalance(accountId: string): AccountBalance {
    return computeAccountBalance(accountId, this._store.listEntries(), this._accounts);
  }

  getTrialBalance(): TrialBalance {
    return computeTrialBalance(this._store.listEntries(), this._accounts, this._clock());
  }

  checkAccountingEquation(): EquationReport {
    return computeAccountingEquation(this._store.listEntries(), this._accounts, this._clock());
  }

  // ─── Snapshot (Persistence) ──────────────────────────────────────────

  snapshot(): LedgerSnapshot {
    return {
      version: 1,
      accounts: this._store.listAccounts(),
      entries: this._store.listEntries(),
      createdAt: this._clock(),
    };
  }

  /**
   * Restore a ledger from a snapshot. Ids, versions and statuses are
   * kept as they were.
   */
  static fromSnapshot(
    snapshot: LedgerSnapshot,
    options: Omit<LedgerOptions, "store"> = {},
  ): Ledger {
    return new Ledger({ ...options, store: InMemoryLedgerStore.fromSnapshot(snapshot) });
  }

  // ─── Internals ───────────────────────────────────────────────────────

  private _assertVersion(entry: JournalEntry, expectedVersion: number): void {
    if (entry.version !== expectedVersion) {
      throw new ConflictError(entry.id, expectedVersion, entry.version);
    }
  }

  private _editableDraft(entryId: string, expectedVersion: number | undefined): JournalEntry {
    const entry = this.getEntry(entryId);
    if (entry.status !== "draft") {
      throw new ValidationError(
        "POSTED_ENTRY_IMMUTABLE",
        `Entry "${entryId}" is ${lifecycleStatus(entry)}; only drafts can be edited`,
        { entryId, status: lifecycleStatus(entry) },
      );
    }
    if (expectedVersion !== undefined) {
      this._assertVersion(entry, expectedVersion);
    }
    return entry;
  }

  private _replaceLines(entry: JournalEntry, lines: readonly JournalLine[]): JournalEntry {
    const updated: JournalEntry = {
      ...entry,
      lines,
      version: entry.version + 1,
      updatedAt: this._clock(),
    };
    this._store.replaceEntry(updated, entry.version);
    return updated;
  }

  private _assertLineAmount(money: JournalLine["money"], lineId: string): void {
    validateMoney(money);
    if (parseAmount(money.amount, money.decimals) < 0n) {
      throw new ValidationError(
        "INVALID_AMOUNT",
        `Line "${lineId}" has a negative amount "${money.amount}"; use the opposite direction`,
        { lineId, amount: money.amount },
      );
    }
  }

  private _buildLine(entryId: string, input: LineInput): JournalLine {
    if (!this._accounts.has(input.accountId)) {
      throw new ValidationError("UNKNOWN_ACCOUNT", `Unknown account: "${input.accountId}"`, {
        entryId,
        accountId: input.accountId,
      });
    }
    const id = input.id ?? this._nextId();
    this._assertLineAmount(input.money, id);

    return {
      id,
      entryId,
      accountId: input.accountId,
      direction: input.direction,
      money: { ...input.money, amount: input.money.amount.trim() },
      tags: [...(input.tags ?? [])],
      ...(input.fxRate !== undefined ? { fxRate: input.fxRate } : {}),
      ...(input.eventType !== undefined ? { eventType: input.eventType } : {}),
    };
  }
}

/**
 * First currency (in line order) whose debits and credits differ,
 * compared exactly in minor units.
 */
export function findImbalance(lines: readonly JournalLine[]): ImbalanceDetails | undefined {
  const totals = new Map<string, { decimals: number; debits: bigint; credits: bigint }>();

  for (const line of lines) {
    const { currency, decimals } = line.money;
    const bucket = totals.get(currency) ?? { decimals, debits: 0n, credits: 0n };
    if (bucket.decimals !== decimals) {
      throw new ValidationError(
        "CURRENCY_MISMATCH",
        `Decimal mismatch for currency "${currency}": ${String(bucket.decimals)} vs ${String(decimals)}`,
        { currency },
      );
    }
    const amount = parseAmount(line.money.amount, decimals);
    if (line.direction === "debit") {
      bucket.debits += amount;
    } else {
      bucket.credits += amount;
    }
    totals.set(currency, bucket);
  }

  for (const [currency, { decimals, debits, credits }] of totals) {
    if (debits !== credits) {
      const delta = debits - credits;
      return {
        currency,
        totalDebits: formatAmount(debits, decimals),
        totalCredits: formatAmount(credits, decimals),
        delta: formatAmount(delta, decimals),
        shortSide: delta > 0n ? "credit" : "debit",
      };
    }
  }
  return undefined;
}
