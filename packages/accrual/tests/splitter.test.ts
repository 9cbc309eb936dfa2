/**
 * Tests for the split builders and cumulative reversal.
 */

import { describe, it, expect } from "vitest";
import type { Split } from "@payledger/types";
import { sumSplits } from "@payledger/ledger";
import { allocateSweep, feeSplits, payoutSplits, unmatchedSplits } from "../src/splitter.js";
import { reversalSplits, reversalStep, reversedShare } from "../src/reversal.js";
import { resolveTaxAccounts, revenueAccountFor } from "../src/account-map.js";
import { ACCOUNTS, CONFIG } from "./fixtures.js";

describe("feeSplits", () => {
  it("debits the expense and credits clearing", () => {
    expect(feeSplits(290n, "Expenses:Processing Fees", ACCOUNTS, "Processing fee")).toEqual([
      { account: "Expenses:Processing Fees", signedAmount: 290n, memo: "Processing fee" },
      { account: "Assets:Stripe Clearing", signedAmount: -290n, memo: "Processing fee" },
    ]);
  });

  it("posts a refunded fee the other way", () => {
    const [expense] = feeSplits(-50n, "Expenses:Processing Fees", ACCOUNTS, "Processing fee");
    expect(expense?.signedAmount).toBe(-50n);
  });
});

describe("payoutSplits", () => {
  it("carves swept withholding out of the bank leg", () => {
    const splits = payoutSplits(1000n, ACCOUNTS, [
      { account: "Assets:Withholding:FICA", category: "FICA", amount: 150n },
    ]);
    expect(splits.map((s) => [s.account, s.signedAmount])).toEqual([
      ["Assets:Withholding:FICA", 150n],
      ["Assets:Bank", 850n],
      ["Assets:Stripe Clearing", -1000n],
    ]);
    expect(sumSplits(splits)).toBe(0n);
  });
});

describe("unmatchedSplits", () => {
  it("debits suspense for money returned", () => {
    expect(unmatchedSplits(-700n, ACCOUNTS).map((s) => [s.account, s.signedAmount])).toEqual([
      ["Assets:Stripe Clearing", -700n],
      ["Liabilities:Unmatched Refunds", 700n],
    ]);
  });
});

describe("allocateSweep", () => {
  const taxAccounts = resolveTaxAccounts({ ...CONFIG, options: { sweepWithholding: true } });

  it("allocates in table order up to the payout", () => {
    const reserved = new Map([
      ["FICA", 300n],
      ["Federal", 500n],
      ["State", 100n],
    ]);
    expect(allocateSweep(600n, reserved, taxAccounts).map((a) => [a.category, a.amount])).toEqual([
      ["FICA", 300n],
      ["Federal", 300n],
    ]);
  });

  it("skips categories with a negative reserve", () => {
    const reserved = new Map([["FICA", -20n]]);
    expect(allocateSweep(600n, reserved, taxAccounts)).toEqual([]);
  });
});

describe("cumulative reversal", () => {
  const legs: Split[] = [
    { account: "Assets:Stripe Clearing", signedAmount: 1000n, memo: "Gross charge" },
    { account: "Income:Sales", signedAmount: -1000n, memo: "Revenue" },
    { account: "Expenses:Tax:FICA", signedAmount: 153n, memo: "Tax withholding: FICA" },
    { account: "Liabilities:Tax:FICA", signedAmount: -153n, memo: "Tax withholding: FICA" },
  ];

  it("truncates each leg's share toward zero", () => {
    expect(reversedShare(153n, 1n, 3n)).toBe(51n);
    expect(reversedShare(-154n, 1n, 3n)).toBe(-51n);
  });

  it("reverses in three equal thirds without drift", () => {
    const first = reversalSplits(legs, 1000n, 0n, 333n, "Refund");
    const second = reversalSplits(legs, 1000n, 333n, 666n, "Refund");
    const third = reversalSplits(legs, 1000n, 666n, 1000n, "Refund");

    const fica = [first, second, third].map((set) => set[3]?.signedAmount);
    // truncate(153 × 0.333) = 50, truncate(153 × 0.666) = 101
    expect(fica).toEqual([50n, 51n, 52n]);
    for (const set of [first, second, third]) {
      expect(sumSplits(set)).toBe(0n);
    }
    expect(first[0]?.memo).toBe("Refund: Gross charge");
  });

  it("caps a reversal at the charge gross", () => {
    expect(reversalStep(-700n, 1000n, 500n)).toEqual({ after: 1000n, applied: 500n, excess: -200n });
  });

  it("floors a reinstatement at zero", () => {
    expect(reversalStep(300n, 1000n, 200n)).toEqual({ after: 0n, applied: 200n, excess: 100n });
  });
});

describe("revenueAccountFor", () => {
  const rules = [
    { contains: "Invoice", account: "Income:Invoices" },
    { contains: "subscription", account: "Income:Subscriptions" },
  ];

  it("matches case-insensitively, first rule wins", () => {
    expect(revenueAccountFor("Subscription for invoice 4", rules, "Income:Sales")).toBe("Income:Invoices");
    expect(revenueAccountFor("SUBSCRIPTION", rules, "Income:Sales")).toBe("Income:Subscriptions");
    expect(revenueAccountFor("Donation", rules, "Income:Sales")).toBe("Income:Sales");
  });
});
