/**
 * @tallybook/ledger — Account registry.
 *
 * Manages the chart of accounts on top of a LedgerStore.
 *
 * Rules:
 * - No duplicate account IDs
 * - Account type is fixed at registration
 * - Accounts are deactivated, never deleted, once lines reference them
 */

import type { Account, AccountType } from "@tallybook/types";
import { isAccountType } from "@tallybook/types";
import type { LedgerStore } from "./store.js";
import type { AccountInput, NormalBalance } from "./types.js";
import { LedgerError, NORMAL_BALANCE, ValidationError } from "./types.js";

export class AccountRegistry {
  constructor(private readonly store: LedgerStore) {}

  /**
   * Register a new account. Throws if the ID already exists.
   */
  register(input: AccountInput, timestamp: string): Account {
    if (this.store.getAccount(input.id) !== undefined) {
      throw new LedgerError("DUPLICATE_ACCOUNT_ID", `Account already exists: "${input.id}"`);
    }
    if (input.id.trim() === "") {
      throw new ValidationError("INVALID_ACCOUNT", "Account id must be a non-empty string");
    }
    if (!isAccountType(input.type)) {
      throw new ValidationError("INVALID_ACCOUNT", `Unknown account type: "${String(input.type)}"`);
    }
    if (input.currency.trim() === "") {
      throw new ValidationError("INVALID_ACCOUNT", `Account "${input.id}" needs a currency`);
    }

    const account: Account = {
      id: input.id,
      name: input.name,
      type: input.type,
      currency: input.currency,
      active: true,
      clearing: input.clearing ?? false,
      createdAt: timestamp,
    };

    this.store.putAccount(account);
    return account;
  }

  /**
   * Soft delete. History stays; the account can no longer be posted to.
   */
  deactivate(id: string): Account {
    const account = this.assertExists(id);
    if (!account.active) {
      return account;
    }
    const updated: Account = { ...account, active: false };
    this.store.putAccount(updated);
    return updated;
  }

  get(id: string): Account | undefined {
    return this.store.getAccount(id);
  }

  has(id: string): boolean {
    return this.store.getAccount(id) !== undefined;
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(id: string): Account {
    const account = this.store.getAccount(id);
    if (account === undefined) {
      throw new LedgerError("ACCOUNT_NOT_FOUND", `Unknown account: "${id}"`);
    }
    return account;
  }

  getType(id: string): AccountType {
    return this.assertExists(id).type;
  }

  getNormalBalance(id: string): NormalBalance {
    return NORMAL_BALANCE[this.getType(id)];
  }

  getAll(): readonly Account[] {
    return this.store.listAccounts();
  }

  get count(): number {
    return this.store.listAccounts().length;
  }

  getByType(type: AccountType): readonly Account[] {
    return this.store.listAccounts().filter((a) => a.type === type);
  }

  /** IDs of accounts flagged as clearing accounts. */
  clearingIds(): readonly string[] {
    return this.store.listAccounts().filter((a) => a.clearing).map((a) => a.id);
  }
}
