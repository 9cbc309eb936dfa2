/**
 * Event Normalizer — one raw row in, one frozen PaymentEvent out.
 *
 * Pure: no I/O, no shared state. Every failure is a typed error the
 * engine turns into a skipped-row warning.
 */

import {
  LedgerError,
  currencyDecimals,
  normalizeCurrency,
  parseAmount,
} from "@payledger/ledger";
import type { PaymentEvent, RawRow } from "@payledger/types";
import {
  CurrencyMismatchError,
  MalformedRowError,
  UnknownCurrencyError,
} from "./errors.js";

export interface NormalizeContext {
  /** 1-based position of the row in the input */
  readonly index: number;
  /** Run currency; rows in any other currency are rejected */
  readonly expectedCurrency?: string | undefined;
}

const REQUIRED_FIELDS = ["timestamp", "type", "grossAmount", "currency"] as const;

// YYYY-MM-DD, optionally followed by HH:MM[:SS[.fff]] and no zone (read as UTC)
const NAIVE_TIMESTAMP = /^(\d{4})-(\d{2})-(\d{2})(?:[ T](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,3}))?)?)?$/;

function field(row: RawRow, name: string): string | undefined {
  const value = row[name];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}

/**
 * Parse a processor timestamp to ISO 8601 UTC.
 * Returns undefined when the value is not a real calendar moment.
 */
export function parseTimestamp(value: string): string | undefined {
  const trimmed = value.trim().replace(/^"|"$/g, "");
  const naive = NAIVE_TIMESTAMP.exec(trimmed);

  if (naive !== null) {
    const [, y, mo, d, h = "0", mi = "0", s = "0", ms = "0"] = naive;
    const year = Number(y);
    const month = Number(mo);
    const day = Number(d);
    const date = new Date(
      Date.UTC(year, month - 1, day, Number(h), Number(mi), Number(s), Number(ms.padEnd(3, "0"))),
    );
    if (
      date.getUTCFullYear() !== year ||
      date.getUTCMonth() !== month - 1 ||
      date.getUTCDate() !== day
    ) {
      return undefined;
    }
    return date.toISOString();
  }

  if (!/^\d{4}-\d{2}-\d{2}T/.test(trimmed)) {
    return undefined;
  }
  const parsed = new Date(trimmed);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed.toISOString();
}

/**
 * Strip quotes and thousands separators from a processor amount.
 * "\"1,234.50\"" → "1234.50"
 */
export function cleanAmount(value: string): string {
  return value.trim().replace(/^["']|["']$/g, "").replace(/,/g, "").trim();
}

function parseMinorUnits(
  value: string,
  decimals: number,
  name: string,
  rowIndex: number,
): bigint {
  try {
    return parseAmount(cleanAmount(value), decimals);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw new MalformedRowError(`Field "${name}" is not a valid amount: ${err.message}`, {
        rowIndex,
      });
    }
    throw err;
  }
}

/**
 * Convert one raw row into a PaymentEvent.
 *
 * @throws {MalformedRowError} missing required field, bad amount, timestamp or availability date
 * @throws {UnknownCurrencyError} currency not in the currency table
 * @throws {CurrencyMismatchError} currency differs from the run currency
 */
export function normalizeRow(row: RawRow, context: NormalizeContext): PaymentEvent {
  const rowIndex = context.index;

  const missing = REQUIRED_FIELDS.filter((name) => field(row, name) === undefined);
  if (missing.length > 0) {
    throw new MalformedRowError(`Missing required field(s): ${missing.join(", ")}`, { rowIndex });
  }

  const rawCurrency = field(row, "currency") ?? "";
  const currency = normalizeCurrency(rawCurrency);
  const decimals = currencyDecimals(currency);
  if (decimals === undefined) {
    throw new UnknownCurrencyError(rawCurrency, { rowIndex });
  }
  if (
    context.expectedCurrency !== undefined &&
    currency !== normalizeCurrency(context.expectedCurrency)
  ) {
    throw new CurrencyMismatchError(currency, normalizeCurrency(context.expectedCurrency), {
      rowIndex,
    });
  }

  const rawTimestamp = field(row, "timestamp") ?? "";
  const timestamp = parseTimestamp(rawTimestamp);
  if (timestamp === undefined) {
    throw new MalformedRowError(`Invalid timestamp "${rawTimestamp}"`, { rowIndex });
  }

  const rawAvailableOn = field(row, "availableOn");
  const availableOn = rawAvailableOn === undefined ? undefined : parseTimestamp(rawAvailableOn);
  if (rawAvailableOn !== undefined && availableOn === undefined) {
    throw new MalformedRowError(`Invalid availability date "${rawAvailableOn}"`, { rowIndex });
  }

  const grossAmount = parseMinorUnits(field(row, "grossAmount") ?? "", decimals, "grossAmount", rowIndex);
  const rawFee = field(row, "fee");
  const fee = rawFee === undefined ? 0n : parseMinorUnits(rawFee, decimals, "fee", rowIndex);

  return Object.freeze({
    id: field(row, "id") ?? `row-${String(rowIndex)}`,
    timestamp,
    grossAmount,
    fee,
    currency,
    rawType: (field(row, "type") ?? "").toLowerCase(),
    correlationId: field(row, "correlationId"),
    description: field(row, "description") ?? "",
    payoutId: field(row, "payoutId"),
    availableOn,
    sequence: rowIndex,
  });
}
