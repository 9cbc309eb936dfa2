/**
 * @payledger/ledger — Balance calculation engine.
 *
 * Replays transactions into account balances and a trial balance.
 * All calculations are deterministic bigint arithmetic.
 *
 * Rules:
 * - Normal balance rules determine sign conventions
 * - Trial balance must always balance (debits = credits)
 */

import type { Transaction } from "@payledger/types";
import type { AccountRegistry } from "./accounts.js";
import type { AccountBalance, TrialBalance, TrialBalanceLine } from "./types.js";
import { NORMAL_BALANCE } from "./types.js";

interface BalanceAccumulator {
  totalDebits: bigint;
  totalCredits: bigint;
}

function buildAccumulators(
  transactions: readonly Transaction[],
): Map<string, BalanceAccumulator> {
  const accumulators = new Map<string, BalanceAccumulator>();

  for (const txn of transactions) {
    for (const split of txn.splits) {
      let acc = accumulators.get(split.account);
      if (acc === undefined) {
        acc = { totalDebits: 0n, totalCredits: 0n };
        accumulators.set(split.account, acc);
      }

      if (split.signedAmount > 0n) {
        acc.totalDebits += split.signedAmount;
      } else {
        acc.totalCredits -= split.signedAmount;
      }
    }
  }

  return accumulators;
}

/**
 * Compute the balance for a single account.
 */
export function computeAccountBalance(
  identifier: string,
  transactions: readonly Transaction[],
  accounts: AccountRegistry,
): AccountBalance {
  const account = accounts.assertExists(identifier);
  const acc = buildAccumulators(transactions).get(identifier) ?? {
    totalDebits: 0n,
    totalCredits: 0n,
  };

  const balance = NORMAL_BALANCE[account.role] === "debit"
    ? acc.totalDebits - acc.totalCredits
    : acc.totalCredits - acc.totalDebits;

  return {
    account,
    balance,
    totalDebits: acc.totalDebits,
    totalCredits: acc.totalCredits,
  };
}

/**
 * Compute the trial balance over every touched account.
 *
 * Debit-normal accounts with a positive net show in the debit column,
 * credit-normal accounts with a positive net in the credit column;
 * contra balances flip columns. Lines are ordered by identifier.
 */
export function computeTrialBalance(
  transactions: readonly Transaction[],
  accounts: AccountRegistry,
): TrialBalance {
  const accumulators = buildAccumulators(transactions);
  const lines: TrialBalanceLine[] = [];
  let totalDebits = 0n;
  let totalCredits = 0n;

  const identifiers = [...accumulators.keys()].sort();
  for (const identifier of identifiers) {
    const acc = accumulators.get(identifier);
    if (acc === undefined) continue;

    const role = accounts.getRole(identifier);
    const netDebit = acc.totalDebits - acc.totalCredits;
    const debitBalance = netDebit > 0n ? netDebit : 0n;
    const creditBalance = netDebit < 0n ? -netDebit : 0n;

    lines.push({ account: identifier, role, debitBalance, creditBalance });
    totalDebits += debitBalance;
    totalCredits += creditBalance;
  }

  return {
    lines,
    totalDebits,
    totalCredits,
    balanced: totalDebits === totalCredits,
  };
}
