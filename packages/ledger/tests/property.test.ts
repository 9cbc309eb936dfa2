/**
 * Property-Based Tests for @payledger/ledger
 *
 * Uses fast-check to verify invariants that must hold for ANY input:
 *
 * 1. Assembled transactions always sum to zero
 * 2. Split order is independent of input order
 * 3. Trial balance over assembled transactions always balances
 * 4. parse → format → parse is identity
 * 5. roundHalfUp never strays more than one unit from truncation
 */

import { describe, it, expect } from "vitest";
import fc from "fast-check";
import type { Split } from "@payledger/types";
import { assembleTransaction, sumSplits } from "../src/assembler.js";
import { Ledger } from "../src/ledger.js";
import { formatAmount, parseAmount, roundHalfUp, truncateFraction } from "../src/money-math.js";

// =============================================================================
// Arbitraries
// =============================================================================

const ACCOUNTS = ["Assets:Bank", "Assets:Clearing", "Expenses:Fees", "Income:Sales"] as const;

const arbAccount = fc.constantFrom(...ACCOUNTS);

/**
 * A balanced split set: arbitrary debits/credits plus one closing split
 * that brings the total back to zero.
 */
const arbBalancedSplits: fc.Arbitrary<Split[]> = fc
  .array(
    fc.tuple(arbAccount, fc.bigInt({ min: -1_000_000n, max: 1_000_000n }), fc.string({ maxLength: 4 })),
    { minLength: 1, maxLength: 8 },
  )
  .chain((legs) =>
    arbAccount.map((closing) => {
      const splits: Split[] = legs.map(([account, signedAmount, memo]) => ({
        account,
        signedAmount,
        memo,
      }));
      splits.push({ account: closing, signedAmount: -sumSplits(splits), memo: "closing" });
      return splits;
    }),
  )
  .filter((splits) => splits.some((s) => s.signedAmount !== 0n));

function candidate(id: string, splits: readonly Split[]) {
  return {
    id,
    timestamp: "2025-01-01T00:00:00.000Z",
    description: id,
    currency: "usd",
    eventIds: [id],
    splits,
  };
}

// =============================================================================
// Properties
// =============================================================================

describe("property: assembled transactions balance", () => {
  it("every assembled transaction sums to zero", () => {
    fc.assert(
      fc.property(arbBalancedSplits, (splits) => {
        const txn = assembleTransaction(candidate("t", splits));
        expect(sumSplits(txn.splits)).toBe(0n);
      }),
      { numRuns: 200 },
    );
  });

  it("split order does not depend on input order", () => {
    fc.assert(
      fc.property(arbBalancedSplits, (splits) => {
        const forward = assembleTransaction(candidate("t", splits));
        const reversed = assembleTransaction(candidate("t", [...splits].reverse()));
        expect(reversed.splits).toEqual(forward.splits);
      }),
      { numRuns: 200 },
    );
  });

  it("trial balance over any sequence is balanced", () => {
    fc.assert(
      fc.property(fc.array(arbBalancedSplits, { minLength: 1, maxLength: 10 }), (sets) => {
        const ledger = new Ledger("usd");
        ledger.registerAccount({ identifier: "Assets:Bank", role: "asset" });
        ledger.registerAccount({ identifier: "Assets:Clearing", role: "asset" });
        ledger.registerAccount({ identifier: "Expenses:Fees", role: "expense" });
        ledger.registerAccount({ identifier: "Income:Sales", role: "revenue" });

        sets.forEach((splits, i) => {
          ledger.append(assembleTransaction(candidate(`t${String(i)}`, splits)));
        });

        expect(ledger.getTrialBalance().balanced).toBe(true);
      }),
      { numRuns: 100 },
    );
  });
});

describe("property: money math", () => {
  it("parse → format → parse is identity", () => {
    fc.assert(
      fc.property(fc.bigInt({ min: -(10n ** 15n), max: 10n ** 15n }), fc.integer({ min: 0, max: 4 }), (value, decimals) => {
        expect(parseAmount(formatAmount(value, decimals), decimals)).toBe(value);
      }),
    );
  });

  it("roundHalfUp is within one unit of truncation", () => {
    fc.assert(
      fc.property(
        fc.bigInt({ min: -(10n ** 12n), max: 10n ** 12n }),
        fc.bigInt({ min: 1n, max: 10n ** 6n }),
        (numerator, denominator) => {
          const value = { numerator, denominator };
          const diff = roundHalfUp(value) - truncateFraction(value);
          expect(diff >= -1n && diff <= 1n).toBe(true);
        },
      ),
    );
  });
});
