/**
 * @payledger/accrual domain types.
 *
 * Configuration (account mapping, tax table, revenue routing) is
 * read-only for the whole run. The engine's only outputs are the
 * transaction sequence and a RunReport.
 */

import type { Currency, Transaction } from "@payledger/types";
import type { TrialBalance } from "@payledger/ledger";
import type { TaxState, TaxTable } from "@payledger/tax";

// =============================================================================
// Configuration
// =============================================================================

/**
 * Account identifiers per posting role.
 * Per-category tax accounts are keyed by tax category name.
 */
export interface AccountMapping {
  readonly revenue: string;
  readonly accrualClearing: string;
  readonly processingFeeExpense: string;
  /** Processor billing fees that belong to no charge */
  readonly billingFeeExpense: string;
  readonly bank: string;
  /** Liability suspense for refunds and adjustments with no matching charge */
  readonly unmatchedRefunds: string;
  readonly taxRoundingExpense: string;
  readonly taxRoundingLiability: string;
  readonly taxExpense: Readonly<Record<string, string>>;
  readonly taxLiability: Readonly<Record<string, string>>;
  /** Asset accounts receiving swept withholding; required with `sweepWithholding` */
  readonly withholding?: Readonly<Record<string, string>> | undefined;
}

/** Routes a charge to a revenue account when its description contains `contains`. */
export interface RevenueRule {
  readonly contains: string;
  readonly account: string;
}

export interface EngineOptions {
  /**
   * Move reserved tax out of the operating bank leg into per-category
   * withholding accounts on each payout: the tax still outstanding on
   * the charges the payout settles, or, for a payout no charge links
   * to, the tax reserved since the previous payout.
   */
  readonly sweepWithholding?: boolean | undefined;
}

export interface EngineConfig {
  readonly currency: Currency;
  readonly accounts: AccountMapping;
  readonly taxTable: TaxTable;
  readonly revenueRules?: readonly RevenueRule[] | undefined;
  readonly options?: EngineOptions | undefined;
}

/** Tax accounts of one category, resolved from the mapping. */
export interface TaxAccountSet {
  readonly category: string;
  readonly expense: string;
  readonly liability: string;
  readonly withholding: string | undefined;
}

// =============================================================================
// Warnings
// =============================================================================

/**
 * - skipped: the row or event produced no transaction
 * - degraded: posted through a fallback (suspense or billing account)
 * - flagged: posted normally, but worth a look
 */
export type WarningKind = "skipped" | "degraded" | "flagged";

export type WarningCode =
  | "MALFORMED_ROW"
  | "UNKNOWN_CURRENCY"
  | "CURRENCY_MISMATCH"
  | "DUPLICATE_EVENT"
  | "UNCLASSIFIABLE_EVENT"
  | "ORPHAN_REFUND"
  | "UNLINKED_FEE"
  | "NEGATIVE_CLEARING_BALANCE";

export interface RunWarning {
  readonly kind: WarningKind;
  readonly code: WarningCode;
  readonly rowIndex: number | undefined;
  readonly eventId: string | undefined;
  readonly message: string;
  /** The row or event error behind the warning, when there is one */
  readonly error: Error | undefined;
}

export interface EngineHooks {
  /** Called once per warning, in the order warnings are raised */
  readonly onWarning?: ((warning: RunWarning) => void) | undefined;
}

// =============================================================================
// Report
// =============================================================================

export type RunStatus = "clean" | "warnings" | "aborted";

/** A charge no processed payout has settled yet. */
export interface UnpaidRevenue {
  readonly eventId: string;
  readonly timestamp: string;
  readonly availableOn: string | undefined;
  /** Payout the export links the charge to, if any */
  readonly payoutId: string | undefined;
  /** Gross not yet reversed, minor units */
  readonly amount: bigint;
}

export interface RunReport {
  readonly status: RunStatus;
  /** Emitted transactions, in primary-event order */
  readonly transactions: readonly Transaction[];
  readonly warnings: readonly RunWarning[];
  /** The error that aborted the run */
  readonly error: Error | undefined;
  readonly rowCount: number;
  readonly clearingBalance: bigint;
  /** Tax liability balance per category, rounding excluded */
  readonly withheld: ReadonlyMap<string, bigint>;
  /** Charges not yet settled by a payout, in input order */
  readonly unpaidRevenue: readonly UnpaidRevenue[];
  readonly trialBalance: TrialBalance;
  readonly taxState: TaxState;
  /** SHA-256 of the canonical transaction sequence */
  readonly digest: string;
}
