/**
 * @payledger/ledger — Transaction sequence digest.
 *
 * Algorithm:
 * 1. Convert each transaction to plain JSON (bigint → decimal string)
 * 2. Canonicalize the ordered array (RFC 8785 / JCS)
 * 3. SHA-256 the canonical form
 *
 * Same input sequence → same digest, so two runs over unchanged input
 * can be compared without diffing rendered output.
 */

import { createHash } from "node:crypto";
import { canonicalize } from "json-canonicalize";
import type { Transaction } from "@payledger/types";

function toPlain(txn: Transaction): Record<string, unknown> {
  return {
    id: txn.id,
    date: txn.date,
    timestamp: txn.timestamp,
    description: txn.description,
    currency: txn.currency,
    eventIds: [...txn.eventIds],
    splits: txn.splits.map((s) => ({
      account: s.account,
      signedAmount: s.signedAmount.toString(),
      memo: s.memo,
    })),
  };
}

/**
 * Canonical JSON form of a transaction sequence.
 */
export function canonicalTransactions(transactions: readonly Transaction[]): string {
  return canonicalize(transactions.map(toPlain));
}

/**
 * SHA-256 hex digest of a transaction sequence.
 */
export function digestTransactions(transactions: readonly Transaction[]): string {
  return createHash("sha256").update(canonicalTransactions(transactions)).digest("hex");
}
