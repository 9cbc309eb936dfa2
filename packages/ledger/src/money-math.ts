/**
 * @payledger/ledger — Deterministic monetary arithmetic.
 *
 * All arithmetic uses bigint minor units. Rates are exact decimal
 * fractions, so every product is a rational number until it is
 * explicitly truncated or rounded.
 *
 * Rules:
 * - No floating-point operations
 * - Amounts must be valid decimal strings
 * - Division truncates toward zero unless a rounding helper says otherwise
 */

import { LedgerError } from "./types.js";

// ─── Amounts ─────────────────────────────────────────────────────────────

/**
 * Parse a decimal string amount into a bigint scaled by decimals.
 *
 * "100.50" with decimals=2 → 10050n
 * "100" with decimals=0 → 100n
 * "-50.25" with decimals=2 → -5025n
 */
export function parseAmount(amount: string, decimals: number): bigint {
  if (typeof amount !== "string" || amount.trim() === "") {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount: "${String(amount)}"`);
  }

  const trimmed = amount.trim();

  if (!/^-?\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid amount format: "${trimmed}"`);
  }

  const negative = trimmed.startsWith("-");
  const abs = negative ? trimmed.slice(1) : trimmed;
  const parts = abs.split(".");
  const intPart = parts[0] ?? "0";
  const fracPart = parts[1] ?? "";

  if (fracPart.length > decimals) {
    throw new LedgerError(
      "INVALID_AMOUNT",
      `Amount "${trimmed}" has ${String(fracPart.length)} decimal places, but currency allows ${String(decimals)}`,
    );
  }

  const paddedFrac = fracPart.padEnd(decimals, "0");
  const value = BigInt(intPart + paddedFrac);

  return negative ? -value : value;
}

/**
 * Convert a scaled bigint back to a decimal string.
 *
 * 10050n with decimals=2 → "100.50"
 * -5025n with decimals=2 → "-50.25"
 */
export function formatAmount(scaled: bigint, decimals: number): string {
  if (decimals === 0) {
    return scaled.toString();
  }

  const negative = scaled < 0n;
  const abs = negative ? -scaled : scaled;
  const str = abs.toString().padStart(decimals + 1, "0");
  const intPart = str.slice(0, str.length - decimals);
  const fracPart = str.slice(str.length - decimals);
  const result = `${intPart}.${fracPart}`;

  return negative ? `-${result}` : result;
}

export function absAmount(value: bigint): bigint {
  return value < 0n ? -value : value;
}

// ─── Fractions ───────────────────────────────────────────────────────────

/**
 * An exact rational value. The denominator is always positive.
 */
export interface Fraction {
  readonly numerator: bigint;
  readonly denominator: bigint;
}

/** A non-negative rate, e.g. "0.153" → 153/1000. */
export type Rate = Fraction;

export const ZERO_FRACTION: Fraction = { numerator: 0n, denominator: 1n };

/**
 * Parse a non-negative decimal rate without going through floats.
 *
 * "0.153" → 153/1000
 * "0.05"  → 5/100
 * "1"     → 1/1
 */
export function parseRate(value: string): Rate {
  const trimmed = typeof value === "string" ? value.trim() : "";
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new LedgerError("INVALID_RATE", `Invalid rate: "${String(value)}"`);
  }
  const [intPart = "0", fracPart = ""] = trimmed.split(".");
  return {
    numerator: BigInt(intPart + fracPart),
    denominator: 10n ** BigInt(fracPart.length),
  };
}

/** Exact product of an amount and a rate. */
export function applyRate(amount: bigint, rate: Rate): Fraction {
  return { numerator: amount * rate.numerator, denominator: rate.denominator };
}

export function addFractions(a: Fraction, b: Fraction): Fraction {
  if (a.denominator === b.denominator) {
    return { numerator: a.numerator + b.numerator, denominator: a.denominator };
  }
  return {
    numerator: a.numerator * b.denominator + b.numerator * a.denominator,
    denominator: a.denominator * b.denominator,
  };
}

/** Truncate toward zero. */
export function truncateFraction(value: Fraction): bigint {
  return value.numerator / value.denominator;
}

/**
 * Round half away from zero.
 *
 * 1530.5 → 1531, -1530.5 → -1531, 1530.49 → 1530
 */
export function roundHalfUp(value: Fraction): bigint {
  const negative = value.numerator < 0n;
  const abs = negative ? -value.numerator : value.numerator;
  const rounded = (2n * abs + value.denominator) / (2n * value.denominator);
  return negative ? -rounded : rounded;
}

/**
 * `truncate(amount × numerator / denominator)` for proportional scaling.
 * Used when reversing a share of an original posting.
 */
export function scaleAmount(amount: bigint, numerator: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError("INVALID_AMOUNT", "Cannot scale by a zero denominator");
  }
  return (amount * numerator) / denominator;
}
