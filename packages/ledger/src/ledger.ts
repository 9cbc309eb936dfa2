/**
 * @payledger/ledger — Core Ledger class.
 *
 * Append-only journal of assembled transactions. Once a transaction is
 * appended it is permanent; corrections are new reversing transactions.
 *
 * API surface:
 * - registerAccount() — Add an account to the chart
 * - append() — Append an assembled, balanced transaction
 * - getBalance() — Account balance in its normal direction
 * - getTrialBalance() — Compute the full trial balance
 * - getTransactions() — Query transactions with optional filters
 * - replay() — Rebuild a ledger from a transaction sequence
 */

import { isTransaction } from "@payledger/types";
import type { Account, Currency, Transaction } from "@payledger/types";
import { AccountRegistry } from "./accounts.js";
import { sumSplits } from "./assembler.js";
import { computeAccountBalance, computeTrialBalance } from "./balance-calculator.js";
import type { AccountBalance, TransactionFilter, TrialBalance } from "./types.js";
import { LedgerError, UnbalancedTransactionError } from "./types.js";

/**
 * Single-currency append-only ledger.
 */
export class Ledger {
  private readonly _accounts: AccountRegistry = new AccountRegistry();
  private readonly _transactions: Transaction[] = [];
  private readonly _transactionIds: Set<string> = new Set();
  private readonly _currency: Currency;

  constructor(currency: Currency) {
    this._currency = currency;
  }

  get currency(): Currency {
    return this._currency;
  }

  // ─── Account Management ──────────────────────────────────────────────

  registerAccount(account: Account): Account {
    return this._accounts.register(account);
  }

  getAccount(identifier: string): Account | undefined {
    return this._accounts.get(identifier);
  }

  hasAccount(identifier: string): boolean {
    return this._accounts.has(identifier);
  }

  getAccounts(): readonly Account[] {
    return this._accounts.getAll();
  }

  // ─── Core Append (The Only Write Operation) ──────────────────────────

  /**
   * Append an assembled transaction.
   *
   * Validation rules (fail-closed — all must pass):
   * 1. Transaction ID must be unique
   * 2. Currency must match the ledger's
   * 3. All referenced accounts must exist
   * 4. Splits must sum to zero
   */
  append(transaction: Transaction): void {
    if (this._transactionIds.has(transaction.id)) {
      throw new LedgerError(
        "DUPLICATE_TRANSACTION_ID",
        `Transaction ID already exists in ledger: "${transaction.id}"`,
      );
    }

    if (transaction.currency !== this._currency) {
      throw new LedgerError(
        "CURRENCY_MISMATCH",
        `Transaction "${transaction.id}" is in "${transaction.currency}", ledger is "${this._currency}"`,
      );
    }

    for (const split of transaction.splits) {
      this._accounts.assertExists(split.account);
    }

    const imbalance = sumSplits(transaction.splits);
    if (imbalance !== 0n) {
      throw new UnbalancedTransactionError(transaction.id, imbalance);
    }

    this._transactions.push(transaction);
    this._transactionIds.add(transaction.id);
  }

  // ─── Query Operations ────────────────────────────────────────────────

  getBalance(identifier: string): AccountBalance {
    return computeAccountBalance(identifier, this._transactions, this._accounts);
  }

  getTrialBalance(): TrialBalance {
    return computeTrialBalance(this._transactions, this._accounts);
  }

  getTransactions(filter?: TransactionFilter): readonly Transaction[] {
    if (filter === undefined) {
      return [...this._transactions];
    }

    return this._transactions.filter((txn) => {
      if (filter.account !== undefined && !txn.splits.some((s) => s.account === filter.account)) {
        return false;
      }
      if (filter.eventId !== undefined && !txn.eventIds.includes(filter.eventId)) {
        return false;
      }
      if (filter.fromDate !== undefined && txn.date < filter.fromDate) {
        return false;
      }
      if (filter.toDate !== undefined && txn.date > filter.toDate) {
        return false;
      }
      return true;
    });
  }

  get transactionCount(): number {
    return this._transactions.length;
  }

  // ─── Replay ──────────────────────────────────────────────────────────

  /**
   * Rebuild a ledger from its accounts and transaction sequence.
   * Every transaction goes through full validation again; the input
   * may come from outside the engine, so its shape is checked first.
   */
  static replay(
    currency: Currency,
    accounts: readonly Account[],
    transactions: readonly unknown[],
  ): Ledger {
    const ledger = new Ledger(currency);
    for (const account of accounts) {
      ledger.registerAccount(account);
    }
    transactions.forEach((txn, position) => {
      if (!isTransaction(txn)) {
        throw new LedgerError("INVALID_TRANSACTION", `Replay input ${position} is not a transaction`);
      }
      ledger.append(txn);
    });
    return ledger;
  }
}
