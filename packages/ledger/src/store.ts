/**
 * @tallybook/ledger — Ledger storage.
 *
 * The store owns referential integrity only: unique ids, accounts
 * referenced by lines cannot be removed, and entries are replaced
 * through compare-and-swap on their version. Accounting rules live
 * in the Ledger.
 */

import type { Account, JournalEntry } from "@tallybook/types";
import type { EntryFilter, LedgerSnapshot } from "./types.js";
import { ConflictError, LedgerError } from "./types.js";

export interface LedgerStore {
  /** Insert or replace an account. */
  putAccount(account: Account): void;
  getAccount(id: string): Account | undefined;
  listAccounts(): readonly Account[];
  /** Throws ACCOUNT_IN_USE when any stored line references the account. */
  removeAccount(id: string): void;

  /** Throws DUPLICATE_ENTRY_ID when the id is taken. */
  insertEntry(entry: JournalEntry): void;
  getEntry(id: string): JournalEntry | undefined;
  listEntries(filter?: EntryFilter): readonly JournalEntry[];
  /**
   * Replace a stored entry if its current version equals
   * `expectedVersion`. Throws ConflictError otherwise.
   */
  replaceEntry(entry: JournalEntry, expectedVersion: number): void;
}

/**
 * Apply an EntryFilter to one entry.
 */
export function matchesFilter(entry: JournalEntry, filter: EntryFilter): boolean {
  if (filter.statuses !== undefined && !filter.statuses.includes(entry.status)) {
    return false;
  }
  if (filter.sourceType !== undefined && entry.sourceType !== filter.sourceType) {
    return false;
  }
  if (filter.fromDate !== undefined && entry.entryDate < filter.fromDate) {
    return false;
  }
  if (filter.toDate !== undefined && entry.entryDate > filter.toDate) {
    return false;
  }
  if (filter.accountId !== undefined) {
    const accountId = filter.accountId;
    if (!entry.lines.some((l) => l.accountId === accountId)) {
      return false;
    }
  }
  if (filter.currency !== undefined) {
    const currency = filter.currency;
    if (!entry.lines.some((l) => l.money.currency === currency)) {
      return false;
    }
  }
  return true;
}

/**
 * Map-backed store. Iteration follows insertion order.
 */
export class InMemoryLedgerStore implements LedgerStore {
  private readonly _accounts = new Map<string, Account>();
  private readonly _entries = new Map<string, JournalEntry>();

  putAccount(account: Account): void {
    this._accounts.set(account.id, account);
  }

  getAccount(id: string): Account | undefined {
    return this._accounts.get(id);
  }

  listAccounts(): readonly Account[] {
    return [...this._accounts.values()];
  }

  removeAccount(id: string): void {
    if (!this._accounts.has(id)) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Unknown account: "${id}"`);
    }
    for (const entry of this._entries.values()) {
      if (entry.lines.some((l) => l.accountId === id)) {
        throw new LedgerError(
          "ACCOUNT_IN_USE",
          `Account "${id}" is referenced by entry "${entry.id}"`,
          { accountId: id, entryId: entry.id },
        );
      }
    }
    this._accounts.delete(id);
  }

  insertEntry(entry: JournalEntry): void {
    if (this._entries.has(entry.id)) {
      throw new LedgerError("DUPLICATE_ENTRY_ID", `Entry already exists: "${entry.id}"`);
    }
    this._entries.set(entry.id, entry);
  }

  getEntry(id: string): JournalEntry | undefined {
    return this._entries.get(id);
  }

  listEntries(filter?: EntryFilter): readonly JournalEntry[] {
    const all = [...this._entries.values()];
    return filter === undefined ? all : all.filter((e) => matchesFilter(e, filter));
  }

  replaceEntry(entry: JournalEntry, expectedVersion: number): void {
    const current = this._entries.get(entry.id);
    if (current === undefined) {
      throw new LedgerError("ENTRY_NOT_FOUND", `Unknown entry: "${entry.id}"`);
    }
    if (current.version !== expectedVersion) {
      throw new ConflictError(entry.id, expectedVersion, current.version);
    }
    this._entries.set(entry.id, entry);
  }

  // ─── Snapshot ────────────────────────────────────────────────────────

  snapshot(createdAt: string): LedgerSnapshot {
    return {
      version: 1,
      accounts: this.listAccounts(),
      entries: this.listEntries(),
      createdAt,
    };
  }

  /**
   * Rebuild a store from a snapshot. Accounts go in first so every
   * restored line references a known account.
   */
  static fromSnapshot(snapshot: LedgerSnapshot): InMemoryLedgerStore {
    if (snapshot.version !== 1) {
      throw new LedgerError(
        "INVALID_SNAPSHOT",
        `Unsupported snapshot version: ${String(snapshot.version)}`,
      );
    }

    const store = new InMemoryLedgerStore();
    for (const account of snapshot.accounts) {
      store.putAccount(account);
    }
    for (const entry of snapshot.entries) {
      for (const line of entry.lines) {
        if (!store._accounts.has(line.accountId)) {
          throw new LedgerError(
            "ACCOUNT_NOT_FOUND",
            `Snapshot entry "${entry.id}" references unknown account "${line.accountId}"`,
          );
        }
      }
      store.insertEntry(entry);
    }
    return store;
  }
}
