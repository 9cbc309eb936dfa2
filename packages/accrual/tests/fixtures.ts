/**
 * Shared fixtures for accrual tests.
 */

import type { RawRow } from "@payledger/types";
import { flatCategory, graduatedCategory } from "@payledger/tax";
import type { AccountMapping, EngineConfig } from "../src/types.js";

export const ACCOUNTS: AccountMapping = {
  revenue: "Income:Sales",
  accrualClearing: "Assets:Stripe Clearing",
  processingFeeExpense: "Expenses:Processing Fees",
  billingFeeExpense: "Expenses:Billing Fees",
  bank: "Assets:Bank",
  unmatchedRefunds: "Liabilities:Unmatched Refunds",
  taxRoundingExpense: "Expenses:Tax Rounding",
  taxRoundingLiability: "Liabilities:Tax Rounding",
  taxExpense: {
    FICA: "Expenses:Tax:FICA",
    Federal: "Expenses:Tax:Federal",
    State: "Expenses:Tax:State",
  },
  taxLiability: {
    FICA: "Liabilities:Tax:FICA",
    Federal: "Liabilities:Tax:Federal",
    State: "Liabilities:Tax:State",
  },
  withholding: {
    FICA: "Assets:Withholding:FICA",
    Federal: "Assets:Withholding:Federal",
    State: "Assets:Withholding:State",
  },
};

export const CONFIG: EngineConfig = {
  currency: "usd",
  accounts: ACCOUNTS,
  taxTable: [
    flatCategory("FICA", "0.153"),
    graduatedCategory("Federal", [{ from: "0", rate: "0.12" }], 2),
    flatCategory("State", "0.05"),
  ],
};

export interface RowOptions {
  readonly fee?: string;
  readonly correlationId?: string;
  readonly description?: string;
  readonly currency?: string;
  readonly minute?: number;
  /** Overrides the fixture clock */
  readonly timestamp?: string;
  readonly payoutId?: string;
  readonly availableOn?: string;
}

let clock = 0;

/** Reset the fixture clock; rows get one minute each from 2024-03-01 00:00. */
export function resetClock(): void {
  clock = 0;
}

export function row(id: string, type: string, grossAmount: string, options: RowOptions = {}): RawRow {
  const minute = options.minute ?? clock++;
  const hh = String(Math.floor(minute / 60)).padStart(2, "0");
  const mm = String(minute % 60).padStart(2, "0");
  return {
    id,
    timestamp: options.timestamp ?? `2024-03-01T${hh}:${mm}:00Z`,
    type,
    grossAmount,
    fee: options.fee,
    currency: options.currency ?? "usd",
    correlationId: options.correlationId,
    description: options.description,
    payoutId: options.payoutId,
    availableOn: options.availableOn,
  };
}
