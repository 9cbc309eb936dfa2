/**
 * @payledger/ledger — Account registry.
 *
 * Manages the chart of accounts. Accounts are immutable once registered.
 *
 * Rules:
 * - An identifier has exactly one role
 * - Re-registering an identifier with the same role is a no-op
 * - Role determines normal balance (debit/credit)
 */

import { isAccount } from "@payledger/types";
import type { Account, AccountRole } from "@payledger/types";
import type { NormalBalance } from "./types.js";
import { LedgerError, NORMAL_BALANCE } from "./types.js";

/**
 * Append-only registry of accounts.
 */
export class AccountRegistry {
  private readonly _accounts: Map<string, Account> = new Map();

  /**
   * Register an account.
   * Throws if the identifier is already registered under another role,
   * or if the account is malformed.
   */
  register(account: Account): Account {
    if (!isAccount(account)) {
      throw new LedgerError("INVALID_ACCOUNT", `Invalid account: ${JSON.stringify(account)}`);
    }
    const existing = this._accounts.get(account.identifier);
    if (existing !== undefined) {
      if (existing.role !== account.role) {
        throw new LedgerError(
          "ACCOUNT_ROLE_CONFLICT",
          `Account "${account.identifier}" is already registered as ${existing.role}, cannot register as ${account.role}`,
        );
      }
      return existing;
    }

    const registered: Account = { identifier: account.identifier, role: account.role };
    this._accounts.set(account.identifier, registered);
    return registered;
  }

  get(identifier: string): Account | undefined {
    return this._accounts.get(identifier);
  }

  has(identifier: string): boolean {
    return this._accounts.has(identifier);
  }

  /**
   * Assert an account exists. Throws if not found.
   */
  assertExists(identifier: string): Account {
    const account = this._accounts.get(identifier);
    if (account === undefined) {
      throw new LedgerError("UNKNOWN_ACCOUNT", `Unknown account: "${identifier}"`);
    }
    return account;
  }

  getRole(identifier: string): AccountRole {
    return this.assertExists(identifier).role;
  }

  getNormalBalance(identifier: string): NormalBalance {
    return NORMAL_BALANCE[this.getRole(identifier)];
  }

  /** All accounts, in registration order. */
  getAll(): readonly Account[] {
    return [...this._accounts.values()];
  }

  get count(): number {
    return this._accounts.size;
  }
}
