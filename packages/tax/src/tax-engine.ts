/**
 * Tax Engine — Deterministic withholding computation.
 *
 * Given a gross revenue amount and a tax table, computes the amount to
 * reserve per category:
 * - Flat: truncate(gross × rate)
 * - Graduated: the slice [ytd, ytd + gross) is taxed bracket by bracket,
 *   where ytd is the category's year-to-date income before this event
 *
 * Rules:
 * - Each category truncates toward zero
 * - The shortfall against the half-up rounded exact total is reported
 *   as a single rounding adjustment
 * - Running totals advance only after every category is computed
 * - Computations must arrive in chronological order (ChronologyError)
 */

import {
  ZERO_FRACTION,
  addFractions,
  applyRate,
  roundHalfUp,
  truncateFraction,
} from "@payledger/ledger";
import type { Fraction } from "@payledger/ledger";
import type {
  CategoryWithholding,
  TaxBracket,
  TaxCategory,
  TaxState,
  TaxTable,
  WithholdingResult,
} from "./types.js";
import { ChronologyError, TaxError } from "./types.js";

// =============================================================================
// State
// =============================================================================

const EMPTY_YEAR: ReadonlyMap<string, bigint> = new Map();

export function createTaxState(): TaxState {
  return { years: new Map(), lastTimestamp: undefined };
}

/** Tax year of an ISO 8601 timestamp (UTC calendar year). */
export function taxYear(timestamp: string): number {
  const year = new Date(timestamp).getUTCFullYear();
  if (Number.isNaN(year)) {
    throw new TaxError("INVALID_AMOUNT", `Invalid timestamp for tax year: "${timestamp}"`);
  }
  return year;
}

export function yearToDate(state: TaxState, year: number, category: string): bigint {
  return state.years.get(year)?.get(category) ?? 0n;
}

function assertChronological(state: TaxState, at: string): void {
  if (state.lastTimestamp !== undefined && at < state.lastTimestamp) {
    throw new ChronologyError(at, state.lastTimestamp);
  }
}

function withYear(
  state: TaxState,
  year: number,
  totals: ReadonlyMap<string, bigint>,
  at: string,
): TaxState {
  const years = new Map(state.years);
  years.set(year, totals);
  return { years, lastTimestamp: at };
}

// =============================================================================
// Table validation
// =============================================================================

/**
 * Validate a tax table. Throws TaxError("INVALID_TABLE") on:
 * - duplicate category names
 * - a graduated category without brackets
 * - a first bracket not starting at zero
 * - brackets not strictly ascending
 */
export function validateTaxTable(table: TaxTable): void {
  const names = new Set<string>();

  for (const category of table) {
    if (category.name.trim() === "") {
      throw new TaxError("INVALID_TABLE", "Tax category name cannot be empty");
    }
    if (names.has(category.name)) {
      throw new TaxError("INVALID_TABLE", `Duplicate tax category "${category.name}"`);
    }
    names.add(category.name);

    if (category.kind === "graduated") {
      const first = category.brackets[0];
      if (first === undefined) {
        throw new TaxError("INVALID_TABLE", `Graduated category "${category.name}" has no brackets`);
      }
      if (first.from !== 0n) {
        throw new TaxError(
          "INVALID_TABLE",
          `First bracket of "${category.name}" must start at 0, starts at ${first.from.toString()}`,
        );
      }
      for (let i = 1; i < category.brackets.length; i++) {
        const prev = category.brackets[i - 1];
        const curr = category.brackets[i];
        if (prev !== undefined && curr !== undefined && curr.from <= prev.from) {
          throw new TaxError(
            "INVALID_TABLE",
            `Brackets of "${category.name}" must be strictly ascending`,
          );
        }
      }
    }
  }
}

// =============================================================================
// Computation
// =============================================================================

/**
 * Exact tax on the income slice [ytdBefore, ytdBefore + gross).
 */
export function graduatedTax(
  ytdBefore: bigint,
  gross: bigint,
  brackets: readonly TaxBracket[],
): Fraction {
  const lo = ytdBefore;
  const hi = ytdBefore + gross;
  let total = ZERO_FRACTION;

  brackets.forEach((bracket, i) => {
    const next = brackets[i + 1];
    const start = bracket.from > lo ? bracket.from : lo;
    const end = next !== undefined && next.from < hi ? next.from : hi;
    if (end > start) {
      total = addFractions(total, applyRate(end - start, bracket.rate));
    }
  });

  return total;
}

function exactWithholding(
  category: TaxCategory,
  gross: bigint,
  ytdBefore: bigint,
): Fraction {
  switch (category.kind) {
    case "flat":
      return applyRate(gross, category.rate);
    case "graduated":
      return graduatedTax(ytdBefore, gross, category.brackets);
  }
}

/**
 * Compute the withholding for one revenue event.
 *
 * @param gross - revenue in minor units, ≥ 0
 * @param table - tax categories, in posting order
 * @param state - running totals before this event
 * @param at - ISO timestamp of the event
 * @throws {ChronologyError} if `at` precedes the state's last computation
 */
export function computeWithholding(
  gross: bigint,
  table: TaxTable,
  state: TaxState,
  at: string,
): WithholdingResult {
  if (gross < 0n) {
    throw new TaxError("INVALID_AMOUNT", `Gross revenue must be non-negative, got ${gross.toString()}`);
  }
  assertChronological(state, at);

  const year = taxYear(at);
  const before = state.years.get(year) ?? EMPTY_YEAR;
  const after = new Map(before);

  const withholdings: CategoryWithholding[] = [];
  let exactTotal = ZERO_FRACTION;
  let truncatedTotal = 0n;

  for (const category of table) {
    const ytdBefore = before.get(category.name) ?? 0n;
    const exact = exactWithholding(category, gross, ytdBefore);
    const amount = truncateFraction(exact);

    withholdings.push({ category: category.name, amount, exact });
    exactTotal = addFractions(exactTotal, exact);
    truncatedTotal += amount;
    after.set(category.name, ytdBefore + gross);
  }

  return {
    withholdings,
    exactTotal,
    roundingAdjustment: roundHalfUp(exactTotal) - truncatedTotal,
    state: withYear(state, year, after, at),
  };
}

/**
 * Lower year-to-date income after revenue is reversed (refund, dispute).
 * Totals never drop below zero.
 *
 * @param at - timestamp of the reversing event, checked for chronology
 * @param incomeAt - timestamp of the reversed revenue; its tax year is
 *   the one lowered (defaults to `at`)
 */
export function releaseIncome(
  amount: bigint,
  table: TaxTable,
  state: TaxState,
  at: string,
  incomeAt: string = at,
): TaxState {
  if (amount < 0n) {
    throw new TaxError("INVALID_AMOUNT", `Released income must be non-negative, got ${amount.toString()}`);
  }
  assertChronological(state, at);

  const year = taxYear(incomeAt);
  const after = new Map(state.years.get(year) ?? EMPTY_YEAR);
  for (const category of table) {
    const current = after.get(category.name) ?? 0n;
    after.set(category.name, current > amount ? current - amount : 0n);
  }
  return withYear(state, year, after, at);
}

/**
 * Restore previously released income (a reversed dispute) to the tax
 * year of `incomeAt`. Advances totals without computing withholding.
 */
export function restoreIncome(
  amount: bigint,
  table: TaxTable,
  state: TaxState,
  at: string,
  incomeAt: string = at,
): TaxState {
  if (amount < 0n) {
    throw new TaxError("INVALID_AMOUNT", `Restored income must be non-negative, got ${amount.toString()}`);
  }
  assertChronological(state, at);

  const year = taxYear(incomeAt);
  const after = new Map(state.years.get(year) ?? EMPTY_YEAR);
  for (const category of table) {
    after.set(category.name, (after.get(category.name) ?? 0n) + amount);
  }
  return withYear(state, year, after, at);
}
