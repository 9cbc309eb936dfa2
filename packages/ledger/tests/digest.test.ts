import { describe, it, expect } from "vitest";
import type { Transaction } from "@payledger/types";
import { canonicalTransactions, digestTransactions } from "../src/digest.js";

const TXN: Transaction = {
  id: "txn:po_1",
  date: "2024-01-12",
  timestamp: "2024-01-12T00:00:00.000Z",
  description: "Payout",
  currency: "usd",
  eventIds: ["po_1"],
  splits: [
    { account: "Assets:Bank", signedAmount: 9710n, memo: "Payout to bank" },
    { account: "Assets:Clearing", signedAmount: -9710n, memo: "Payout" },
  ],
};

describe("digestTransactions", () => {
  it("serializes amounts as decimal strings in canonical key order", () => {
    const canonical = canonicalTransactions([TXN]);
    expect(canonical.startsWith('[{"currency":"usd","date":"2024-01-12"')).toBe(true);
    expect(canonical).toContain('"signedAmount":"-9710"');
  });

  it("is stable across calls", () => {
    expect(digestTransactions([TXN])).toBe(digestTransactions([{ ...TXN }]));
    expect(digestTransactions([TXN])).toMatch(/^[0-9a-f]{64}$/);
  });

  it("changes when any amount changes", () => {
    const altered: Transaction = {
      ...TXN,
      splits: [
        { account: "Assets:Bank", signedAmount: 9711n, memo: "Payout to bank" },
        { account: "Assets:Clearing", signedAmount: -9711n, memo: "Payout" },
      ],
    };
    expect(digestTransactions([altered])).not.toBe(digestTransactions([TXN]));
  });

  it("depends on order", () => {
    const other: Transaction = { ...TXN, id: "txn:po_2" };
    expect(digestTransactions([TXN, other])).not.toBe(digestTransactions([other, TXN]));
  });
});
