/**
 * Runtime type guard tests for @payledger/types
 *
 * Validates that guards narrow correctly for valid inputs
 * and reject malformed inputs at system boundaries.
 */
import { describe, it, expect } from "vitest";
import {
  isAccountRole,
  isAccount,
  isRawRow,
  isTransaction,
} from "../src/guards.js";

// =============================================================================
// Financial guards
// =============================================================================

describe("isAccountRole", () => {
  it("accepts the five roles", () => {
    for (const role of ["asset", "liability", "equity", "revenue", "expense"]) {
      expect(isAccountRole(role)).toBe(true);
    }
  });

  it("rejects the old income spelling", () => {
    expect(isAccountRole("income")).toBe(false);
  });
});

describe("isAccount", () => {
  it("accepts a valid account", () => {
    expect(isAccount({ identifier: "Assets:Bank", role: "asset" })).toBe(true);
  });

  it("rejects an empty identifier", () => {
    expect(isAccount({ identifier: "", role: "asset" })).toBe(false);
  });

  it("rejects null", () => {
    expect(isAccount(null)).toBe(false);
  });
});

describe("isTransaction", () => {
  const valid = {
    id: "txn:ch_1",
    date: "2024-03-01",
    timestamp: "2024-03-01T00:00:00.000Z",
    description: "Charge",
    currency: "usd",
    eventIds: ["ch_1"],
    splits: [
      { account: "a", signedAmount: 5n, memo: "" },
      { account: "b", signedAmount: -5n, memo: "" },
    ],
  };

  it("accepts a well-formed transaction", () => {
    expect(isTransaction(valid)).toBe(true);
  });

  it("rejects a transaction with a malformed split", () => {
    expect(isTransaction({ ...valid, splits: [{ account: "a" }] })).toBe(false);
    expect(isTransaction({ ...valid, splits: [{ account: "a", signedAmount: 5, memo: "" }] })).toBe(false);
  });
});

// =============================================================================
// Event guards
// =============================================================================

describe("isRawRow", () => {
  it("accepts string and undefined values", () => {
    expect(isRawRow({ type: "charge", fee: undefined })).toBe(true);
  });

  it("rejects numeric values", () => {
    expect(isRawRow({ grossAmount: 100 })).toBe(false);
  });

  it("rejects arrays", () => {
    expect(isRawRow(["charge"])).toBe(false);
  });
});
