/**
 * Tax category builders from decimal strings.
 *
 * Bracket thresholds are given in major units ("10000.00") and scaled
 * with the run currency's decimals.
 */

import { parseAmount, parseRate } from "@payledger/ledger";
import type { FlatTaxCategory, GraduatedTaxCategory } from "./types.js";

export interface BracketInput {
  readonly from: string;
  readonly rate: string;
}

export function flatCategory(name: string, rate: string): FlatTaxCategory {
  return { kind: "flat", name, rate: parseRate(rate) };
}

export function graduatedCategory(
  name: string,
  brackets: readonly BracketInput[],
  decimals: number,
): GraduatedTaxCategory {
  return {
    kind: "graduated",
    name,
    brackets: brackets.map((b) => ({
      from: parseAmount(b.from, decimals),
      rate: parseRate(b.rate),
    })),
  };
}
