import { describe, it, expect } from "vitest";
import { currencyDecimals, normalizeCurrency } from "../src/currencies.js";

describe("currencyDecimals", () => {
  it("looks up exponents case-insensitively", () => {
    expect(currencyDecimals("USD")).toBe(2);
    expect(currencyDecimals(" jpy ")).toBe(0);
    expect(currencyDecimals("kwd")).toBe(3);
  });

  it("returns undefined for unknown codes", () => {
    expect(currencyDecimals("xyz")).toBeUndefined();
    expect(currencyDecimals("toString")).toBeUndefined();
  });

  it("normalizes to lower case", () => {
    expect(normalizeCurrency(" EUR")).toBe("eur");
  });
});
