/**
 * @payledger/ledger — Transaction assembler.
 *
 * The only place a Transaction is constructed. A candidate either
 * passes every check and comes out frozen, or throws.
 *
 * Validation rules (fail-closed):
 * 1. Zero-amount splits are dropped
 * 2. At least one split must remain
 * 3. Signed amounts must sum to exactly 0n
 *
 * Split order: debits before credits, then account identifier,
 * then memo, then absolute amount.
 */

import type { Split, Transaction } from "@payledger/types";
import { absAmount } from "./money-math.js";
import type { TransactionCandidate } from "./types.js";
import { LedgerError, UnbalancedTransactionError } from "./types.js";

function compareStrings(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Deterministic split ordering for reproducible output.
 */
export function compareSplits(a: Split, b: Split): number {
  const aDebit = a.signedAmount > 0n;
  const bDebit = b.signedAmount > 0n;
  if (aDebit !== bDebit) {
    return aDebit ? -1 : 1;
  }

  const byAccount = compareStrings(a.account, b.account);
  if (byAccount !== 0) return byAccount;

  const byMemo = compareStrings(a.memo, b.memo);
  if (byMemo !== 0) return byMemo;

  const absA = absAmount(a.signedAmount);
  const absB = absAmount(b.signedAmount);
  if (absA < absB) return -1;
  if (absA > absB) return 1;
  return 0;
}

export function sumSplits(splits: readonly Split[]): bigint {
  let total = 0n;
  for (const split of splits) {
    total += split.signedAmount;
  }
  return total;
}

/**
 * Validate and freeze a transaction candidate.
 *
 * @throws {UnbalancedTransactionError} when the splits do not sum to zero
 * @throws {LedgerError} EMPTY_TRANSACTION when no non-zero split remains
 */
export function assembleTransaction(candidate: TransactionCandidate): Transaction {
  const splits = candidate.splits
    .filter((s) => s.signedAmount !== 0n)
    .map((s) => Object.freeze({ account: s.account, signedAmount: s.signedAmount, memo: s.memo }));

  if (splits.length === 0) {
    throw new LedgerError(
      "EMPTY_TRANSACTION",
      `Transaction "${candidate.id}" has no non-zero splits`,
    );
  }

  const imbalance = sumSplits(splits);
  if (imbalance !== 0n) {
    throw new UnbalancedTransactionError(candidate.id, imbalance);
  }

  splits.sort(compareSplits);

  return Object.freeze({
    id: candidate.id,
    date: candidate.timestamp.slice(0, 10),
    timestamp: candidate.timestamp,
    description: candidate.description,
    currency: candidate.currency,
    eventIds: Object.freeze([...candidate.eventIds]),
    splits: Object.freeze(splits),
  });
}
