/**
 * Tests for the core Ledger class.
 *
 * Covers:
 * - Account management
 * - Append validation (duplicates, currency, unknown accounts, balance)
 * - Balances and trial balance
 * - Query filters
 * - Replay
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Account, Split, Transaction } from "@payledger/types";
import { Ledger } from "../src/ledger.js";
import { LedgerError, UnbalancedTransactionError } from "../src/types.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const BANK: Account = { identifier: "Assets:Bank", role: "asset" };
const CLEARING: Account = { identifier: "Assets:Clearing", role: "asset" };
const REVENUE: Account = { identifier: "Income:Sales", role: "revenue" };
const FEES: Account = { identifier: "Expenses:Fees", role: "expense" };

function txn(id: string, date: string, splits: Split[], eventIds: string[] = [id]): Transaction {
  return {
    id,
    date,
    timestamp: `${date}T00:00:00.000Z`,
    description: id,
    currency: "usd",
    eventIds,
    splits,
  };
}

const CHARGE = txn("txn:ch_1", "2024-01-10", [
  { account: "Assets:Clearing", signedAmount: 10000n, memo: "" },
  { account: "Expenses:Fees", signedAmount: 290n, memo: "" },
  { account: "Assets:Clearing", signedAmount: -290n, memo: "" },
  { account: "Income:Sales", signedAmount: -10000n, memo: "" },
]);

const PAYOUT = txn("txn:po_1", "2024-01-12", [
  { account: "Assets:Bank", signedAmount: 9000n, memo: "" },
  { account: "Assets:Clearing", signedAmount: -9000n, memo: "" },
]);

// ─── Tests ───────────────────────────────────────────────────────────────

describe("Ledger", () => {
  let ledger: Ledger;

  beforeEach(() => {
    ledger = new Ledger("usd");
    ledger.registerAccount(BANK);
    ledger.registerAccount(CLEARING);
    ledger.registerAccount(REVENUE);
    ledger.registerAccount(FEES);
  });

  describe("account management", () => {
    it("registers and retrieves accounts", () => {
      expect(ledger.getAccount("Assets:Bank")?.role).toBe("asset");
      expect(ledger.hasAccount("Assets:Nowhere")).toBe(false);
      expect(ledger.getAccounts()).toHaveLength(4);
    });
  });

  describe("append", () => {
    it("appends balanced transactions", () => {
      ledger.append(CHARGE);
      ledger.append(PAYOUT);
      expect(ledger.transactionCount).toBe(2);
    });

    it("rejects a duplicate transaction id", () => {
      ledger.append(CHARGE);
      expect(() => ledger.append(CHARGE)).toThrow(/already exists/);
    });

    it("rejects a foreign currency", () => {
      expect(() => ledger.append({ ...CHARGE, currency: "eur" })).toThrow(LedgerError);
    });

    it("rejects unknown accounts", () => {
      const bad = txn("txn:x", "2024-01-10", [
        { account: "Assets:Nowhere", signedAmount: 1n, memo: "" },
        { account: "Income:Sales", signedAmount: -1n, memo: "" },
      ]);
      expect(() => ledger.append(bad)).toThrow(/Unknown account/);
    });

    it("rejects an unbalanced transaction that bypassed assembly", () => {
      const bad = txn("txn:x", "2024-01-10", [
        { account: "Assets:Bank", signedAmount: 2n, memo: "" },
        { account: "Income:Sales", signedAmount: -1n, memo: "" },
      ]);
      expect(() => ledger.append(bad)).toThrow(UnbalancedTransactionError);
      expect(ledger.transactionCount).toBe(0);
    });
  });

  describe("balances", () => {
    beforeEach(() => {
      ledger.append(CHARGE);
      ledger.append(PAYOUT);
    });

    it("computes a debit-normal balance", () => {
      const clearing = ledger.getBalance("Assets:Clearing");
      expect(clearing.balance).toBe(710n);
      expect(clearing.totalDebits).toBe(10000n);
      expect(clearing.totalCredits).toBe(9290n);
    });

    it("computes a credit-normal balance", () => {
      expect(ledger.getBalance("Income:Sales").balance).toBe(10000n);
    });

    it("returns debit-normal balances and zero for untouched accounts", () => {
      const balance = ledger.getBalance("Assets:Bank");
      expect(balance.balance).toBe(9000n);
      const fresh = new Ledger("usd");
      fresh.registerAccount(BANK);
      expect(fresh.getBalance("Assets:Bank").balance).toBe(0n);
    });

    it("produces a balanced trial balance", () => {
      const tb = ledger.getTrialBalance();
      expect(tb.balanced).toBe(true);
      expect(tb.totalDebits).toBe(10000n);
      expect(tb.lines.map((l) => l.account)).toEqual([
        "Assets:Bank",
        "Assets:Clearing",
        "Expenses:Fees",
        "Income:Sales",
      ]);
      expect(tb.lines[3]).toEqual({
        account: "Income:Sales",
        role: "revenue",
        debitBalance: 0n,
        creditBalance: 10000n,
      });
    });
  });

  describe("queries", () => {
    beforeEach(() => {
      ledger.append(CHARGE);
      ledger.append(PAYOUT);
    });

    it("filters by account", () => {
      expect(ledger.getTransactions({ account: "Assets:Bank" }).map((t) => t.id)).toEqual([
        "txn:po_1",
      ]);
    });

    it("filters by event id", () => {
      expect(ledger.getTransactions({ eventId: "txn:ch_1" })).toHaveLength(1);
    });

    it("filters by date range", () => {
      expect(ledger.getTransactions({ fromDate: "2024-01-11" }).map((t) => t.id)).toEqual([
        "txn:po_1",
      ]);
      expect(ledger.getTransactions({ toDate: "2024-01-11" }).map((t) => t.id)).toEqual([
        "txn:ch_1",
      ]);
    });

    it("returns a copy of all transactions", () => {
      const all = ledger.getTransactions();
      expect(all).toHaveLength(2);
      expect(all).not.toBe(ledger.getTransactions());
    });
  });

  describe("replay", () => {
    it("rebuilds identical balances", () => {
      ledger.append(CHARGE);
      ledger.append(PAYOUT);

      const replayed = Ledger.replay("usd", ledger.getAccounts(), ledger.getTransactions());
      expect(replayed.getBalance("Assets:Clearing").balance).toBe(710n);
      expect(replayed.currency).toBe("usd");
    });

    it("rejects input that is not a transaction", () => {
      const malformed = { ...PAYOUT, splits: [{ account: "Assets:Bank", signedAmount: 710 }] };

      expect(() => Ledger.replay("usd", ledger.getAccounts(), [CHARGE, malformed])).toThrow(
        new LedgerError("INVALID_TRANSACTION", "Replay input 1 is not a transaction"),
      );
    });
  });
});
