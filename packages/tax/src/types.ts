/**
 * @payledger/tax domain types.
 *
 * Tax categories are read-only configuration. The year-to-date running
 * totals live in a separate immutable TaxState that the caller threads
 * through every computation in event order.
 */

import type { Fraction, Rate } from "@payledger/ledger";

// =============================================================================
// Categories
// =============================================================================

/** Withholding at a single rate on every unit of gross (e.g. FICA). */
export interface FlatTaxCategory {
  readonly kind: "flat";
  readonly name: string;
  readonly rate: Rate;
}

/** One bracket: applies from `from` (inclusive, minor units) to the next bracket. */
export interface TaxBracket {
  readonly from: bigint;
  readonly rate: Rate;
}

/** Withholding by marginal bracket on year-to-date income. */
export interface GraduatedTaxCategory {
  readonly kind: "graduated";
  readonly name: string;
  /** Ascending by `from`; the first bracket starts at 0. */
  readonly brackets: readonly TaxBracket[];
}

export type TaxCategory = FlatTaxCategory | GraduatedTaxCategory;

export type TaxTable = readonly TaxCategory[];

// =============================================================================
// Running state
// =============================================================================

/**
 * Year-to-date income per tax year, per category.
 * Never mutated; every computation returns a new state.
 */
export interface TaxState {
  readonly years: ReadonlyMap<number, ReadonlyMap<string, bigint>>;
  /** Timestamp of the last committed computation */
  readonly lastTimestamp: string | undefined;
}

// =============================================================================
// Results
// =============================================================================

export interface CategoryWithholding {
  readonly category: string;
  /** Truncated toward zero */
  readonly amount: bigint;
  /** Untruncated amount */
  readonly exact: Fraction;
}

export interface WithholdingResult {
  readonly withholdings: readonly CategoryWithholding[];
  /** Exact sum over all categories */
  readonly exactTotal: Fraction;
  /** roundHalfUp(exactTotal) − Σ truncated amounts; ≥ 0 for positive gross */
  readonly roundingAdjustment: bigint;
  /** State after this computation committed */
  readonly state: TaxState;
}

// =============================================================================
// Errors
// =============================================================================

export type TaxErrorCode =
  | "OUT_OF_ORDER"
  | "INVALID_TABLE"
  | "INVALID_AMOUNT";

export class TaxError extends Error {
  public readonly code: TaxErrorCode;

  constructor(code: TaxErrorCode, message: string) {
    super(message);
    this.name = "TaxError";
    this.code = code;
  }
}

/**
 * A computation was requested for a moment earlier than one already
 * committed. Bracket results would silently diverge, so this is fatal.
 */
export class ChronologyError extends TaxError {
  public readonly at: string;
  public readonly lastTimestamp: string;

  constructor(at: string, lastTimestamp: string) {
    super(
      "OUT_OF_ORDER",
      `Event at ${at} precedes one already committed at ${lastTimestamp}`,
    );
    this.name = "ChronologyError";
    this.at = at;
    this.lastTimestamp = lastTimestamp;
  }
}
