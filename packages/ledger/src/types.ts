/**
 * @payledger/ledger — Internal types for the ledger engine.
 *
 * Rules:
 * - All types are readonly
 * - No mutation of emitted transactions
 * - Fail-closed: invalid transactions throw, never silently succeed
 */

import type { Account, AccountRole, Currency, Split } from "@payledger/types";

// ─── Account Types ───────────────────────────────────────────────────────

/** Normal balance direction for an account. */
export type NormalBalance = "debit" | "credit";

/**
 * Map account roles to their normal balance direction.
 *
 * - Asset, Expense → debit-normal (increases with debits)
 * - Liability, Revenue, Equity → credit-normal (increases with credits)
 */
export const NORMAL_BALANCE: Readonly<Record<AccountRole, NormalBalance>> = {
  asset: "debit",
  expense: "debit",
  liability: "credit",
  revenue: "credit",
  equity: "credit",
} as const;

// ─── Assembly Types ──────────────────────────────────────────────────────

/**
 * Splits gathered for one event (or one charge plus its merged fee),
 * not yet validated. Only the assembler turns a candidate into a
 * Transaction.
 */
export interface TransactionCandidate {
  readonly id: string;
  readonly timestamp: string;
  readonly description: string;
  readonly currency: Currency;
  readonly eventIds: readonly string[];
  readonly splits: readonly Split[];
}

// ─── Balance Types ───────────────────────────────────────────────────────

/**
 * Balance of one account, in minor units.
 */
export interface AccountBalance {
  readonly account: Account;
  /** Net balance in the account's normal direction. Negative = contra. */
  readonly balance: bigint;
  readonly totalDebits: bigint;
  readonly totalCredits: bigint;
}

/**
 * A single line in the trial balance.
 */
export interface TrialBalanceLine {
  readonly account: string;
  readonly role: AccountRole;
  readonly debitBalance: bigint;
  readonly creditBalance: bigint;
}

/**
 * The full trial balance report.
 * Total debits MUST equal total credits.
 */
export interface TrialBalance {
  readonly lines: readonly TrialBalanceLine[];
  readonly totalDebits: bigint;
  readonly totalCredits: bigint;
  readonly balanced: boolean;
}

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "UNBALANCED_TRANSACTION"
  | "EMPTY_TRANSACTION"
  | "UNKNOWN_ACCOUNT"
  | "CURRENCY_MISMATCH"
  | "INVALID_AMOUNT"
  | "INVALID_RATE"
  | "DUPLICATE_TRANSACTION_ID"
  | "ACCOUNT_ROLE_CONFLICT"
  | "INVALID_ACCOUNT"
  | "INVALID_TRANSACTION";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = "LedgerError";
    this.code = code;
  }
}

/**
 * A transaction candidate whose splits do not sum to zero.
 * Fatal for the run: nothing unbalanced is ever emitted.
 */
export class UnbalancedTransactionError extends LedgerError {
  public readonly transactionId: string;
  public readonly imbalance: bigint;

  constructor(transactionId: string, imbalance: bigint) {
    super(
      "UNBALANCED_TRANSACTION",
      `Transaction "${transactionId}" is unbalanced by ${imbalance.toString()} minor units`,
    );
    this.name = "UnbalancedTransactionError";
    this.transactionId = transactionId;
    this.imbalance = imbalance;
  }
}

// ─── Query Types ─────────────────────────────────────────────────────────

/**
 * Filter criteria for querying ledger transactions.
 */
export interface TransactionFilter {
  readonly account?: string | undefined;
  readonly eventId?: string | undefined;
  readonly fromDate?: string | undefined;
  readonly toDate?: string | undefined;
}
