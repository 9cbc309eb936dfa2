/**
 * Accrual Splitter — split sets per event type.
 *
 * Pure builders: amounts in, splits out. Signed amounts follow the
 * ledger convention (positive = debit, negative = credit), and every
 * builder returns a set that sums to zero on its own.
 */

import type { Split } from "@payledger/types";
import type { WithholdingResult } from "@payledger/tax";
import type { AccountMapping, TaxAccountSet } from "./types.js";

export const MEMO = {
  grossCharge: "Gross charge",
  revenue: "Revenue",
  taxRounding: "Tax rounding",
  processingFee: "Processing fee",
  billingFee: "Billing fee",
  payout: "Payout",
  unmatched: "Unmatched reversal",
} as const;

/** Debit `debit`, credit `credit`, both by `amount`. */
function pair(debit: string, credit: string, amount: bigint, memo: string): Split[] {
  return [
    { account: debit, signedAmount: amount, memo },
    { account: credit, signedAmount: -amount, memo },
  ];
}

export function taxMemo(category: string): string {
  return `Tax withholding: ${category}`;
}

export function sweepMemo(category: string): string {
  return `Withholding sweep: ${category}`;
}

/**
 * Charge(G): debit Accrual-Clearing G, credit Revenue G, then one
 * expense/liability pair per tax category and one for the rounding
 * adjustment.
 */
export function chargeSplits(
  gross: bigint,
  revenueAccount: string,
  withholding: WithholdingResult,
  taxAccounts: readonly TaxAccountSet[],
  accounts: AccountMapping,
): Split[] {
  const splits: Split[] = [
    { account: accounts.accrualClearing, signedAmount: gross, memo: MEMO.grossCharge },
    { account: revenueAccount, signedAmount: -gross, memo: MEMO.revenue },
  ];

  for (const entry of withholding.withholdings) {
    const set = taxAccounts.find((t) => t.category === entry.category);
    if (set === undefined) continue;
    splits.push(...pair(set.expense, set.liability, entry.amount, taxMemo(entry.category)));
  }

  splits.push(
    ...pair(
      accounts.taxRoundingExpense,
      accounts.taxRoundingLiability,
      withholding.roundingAdjustment,
      MEMO.taxRounding,
    ),
  );

  return splits;
}

/**
 * Fee cost F: debit the expense account, credit Accrual-Clearing.
 * A negative F (fee refunded) posts the reverse.
 */
export function feeSplits(cost: bigint, expenseAccount: string, accounts: AccountMapping, memo: string): Split[] {
  return pair(expenseAccount, accounts.accrualClearing, cost, memo);
}

export interface SweepAllocation {
  readonly account: string;
  readonly category: string;
  readonly amount: bigint;
}

/**
 * Payout(N): credit Accrual-Clearing N, debit Bank N. Swept withholding
 * is carved out of the Bank leg into the withholding accounts.
 */
export function payoutSplits(net: bigint, accounts: AccountMapping, sweep: readonly SweepAllocation[]): Split[] {
  let swept = 0n;
  const splits: Split[] = [];
  for (const allocation of sweep) {
    swept += allocation.amount;
    splits.push({ account: allocation.account, signedAmount: allocation.amount, memo: sweepMemo(allocation.category) });
  }
  splits.push(
    { account: accounts.bank, signedAmount: net - swept, memo: MEMO.payout },
    { account: accounts.accrualClearing, signedAmount: -net, memo: MEMO.payout },
  );
  return splits;
}

/**
 * Reversal with nothing to reverse against. A negative gross (money
 * returned to a customer) debits Unmatched-Refunds and credits
 * Accrual-Clearing; a positive gross posts the reverse.
 */
export function unmatchedSplits(gross: bigint, accounts: AccountMapping): Split[] {
  return pair(accounts.accrualClearing, accounts.unmatchedRefunds, gross, MEMO.unmatched);
}

/**
 * Allocate a payout to withholding accounts, in table order, up to the
 * payout amount. Categories with nothing reserved get no allocation.
 */
export function allocateSweep(
  net: bigint,
  reserved: ReadonlyMap<string, bigint>,
  taxAccounts: readonly TaxAccountSet[],
): SweepAllocation[] {
  const allocations: SweepAllocation[] = [];
  let remaining = net;

  for (const set of taxAccounts) {
    const available = reserved.get(set.category) ?? 0n;
    if (set.withholding === undefined || available <= 0n || remaining <= 0n) continue;
    const amount = available < remaining ? available : remaining;
    allocations.push({ account: set.withholding, category: set.category, amount });
    remaining -= amount;
  }

  return allocations;
}
