/**
 * Financial Types
 *
 * Core double-entry primitives for the accrual engine.
 *
 * Rules:
 * - Amounts are bigint minor units (cents), never floating point
 * - A split is signed: positive = debit, negative = credit
 * - A transaction's splits always sum to exactly zero
 */

/**
 * Lower-case ISO 4217 currency code (e.g. "usd", "eur").
 */
export type Currency = string;

/**
 * The five fundamental account roles in double-entry accounting.
 */
export type AccountRole = "asset" | "liability" | "equity" | "revenue" | "expense";

/**
 * An account in the chart of accounts.
 */
export interface Account {
  /** Destination-ledger account path, e.g. "Assets:Stripe Clearing" */
  readonly identifier: string;

  readonly role: AccountRole;
}

/**
 * One signed leg of a double-entry transaction against one account.
 */
export interface Split {
  /** Account identifier */
  readonly account: string;

  /** Minor units. Positive = debit, negative = credit. */
  readonly signedAmount: bigint;

  readonly memo: string;
}

/**
 * A balanced, atomically assembled ledger transaction.
 * Sum of `splits[].signedAmount` is exactly 0n.
 */
export interface Transaction {
  /** Deterministic identifier derived from the primary event */
  readonly id: string;

  /** Posting date (YYYY-MM-DD, UTC) */
  readonly date: string;

  /** ISO 8601 timestamp of the primary event */
  readonly timestamp: string;

  readonly description: string;

  readonly currency: Currency;

  /** Every event whose postings were merged into this transaction */
  readonly eventIds: readonly string[];

  /** Ordered: debits first, then credits, each by account identifier */
  readonly splits: readonly Split[];
}
