/**
 * Stripe balance-history CSV → raw rows.
 *
 * Maps the export's columns onto the engine's raw-row fields and puts
 * the rows in ascending chronological order (exports list newest
 * first). Values are passed through as text; the normalizer owns all
 * parsing and validation.
 */

import { parse } from "csv-parse/sync";
import { parseTimestamp } from "@payledger/ingest";
import { isRawRow } from "@payledger/types";
import type { RawRow } from "@payledger/types";

export type StripeImportErrorCode = "INVALID_CSV" | "MISSING_COLUMN";

export class StripeImportError extends Error {
  public readonly code: StripeImportErrorCode;

  constructor(code: StripeImportErrorCode, message: string) {
    super(message);
    this.name = "StripeImportError";
    this.code = code;
  }
}

type RowField =
  | "id"
  | "timestamp"
  | "type"
  | "grossAmount"
  | "fee"
  | "currency"
  | "description"
  | "correlationId"
  | "payoutId"
  | "availableOn";

/** Raw-row field → candidate export columns, first non-empty wins. */
export const COLUMN_MAP: Readonly<Record<RowField, readonly string[]>> = {
  id: ["id"],
  timestamp: ["Created (UTC)", "Created", "created"],
  type: ["Type", "type", "Reporting Category"],
  grossAmount: ["Amount", "amount", "Gross"],
  fee: ["Fee", "fee"],
  currency: ["Currency", "currency"],
  description: ["Description", "description"],
  correlationId: ["Charge ID", "charge_id", "Source", "source"],
  payoutId: ["Transfer", "transfer", "Automatic Payout ID", "automatic_payout_id"],
  availableOn: ["Available On (UTC)", "Available On", "available_on"],
};

const REQUIRED: readonly RowField[] = ["timestamp", "type", "grossAmount", "currency"];

function pick(record: RawRow, columns: readonly string[]): string | undefined {
  for (const column of columns) {
    const value = record[column];
    if (value !== undefined && value.trim() !== "") return value.trim();
  }
  return undefined;
}

export function mapRecord(record: RawRow): RawRow {
  return {
    id: pick(record, COLUMN_MAP.id),
    timestamp: pick(record, COLUMN_MAP.timestamp),
    type: pick(record, COLUMN_MAP.type)?.toLowerCase(),
    grossAmount: pick(record, COLUMN_MAP.grossAmount),
    fee: pick(record, COLUMN_MAP.fee),
    currency: pick(record, COLUMN_MAP.currency),
    description: pick(record, COLUMN_MAP.description),
    correlationId: pick(record, COLUMN_MAP.correlationId),
    payoutId: pick(record, COLUMN_MAP.payoutId),
    availableOn: pick(record, COLUMN_MAP.availableOn),
  };
}

function readRecords(content: string): RawRow[] {
  let records: unknown;
  try {
    records = parse(content, {
      columns: true,
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true,
    });
  } catch (err) {
    throw new StripeImportError(
      "INVALID_CSV",
      `Cannot parse balance history: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  if (!Array.isArray(records)) {
    throw new StripeImportError("INVALID_CSV", "Balance history did not parse to a row list");
  }
  return records.filter(isRawRow);
}

function assertColumns(header: readonly string[]): void {
  const missing = REQUIRED.filter((field) => !COLUMN_MAP[field].some((c) => header.includes(c)));
  if (missing.length > 0) {
    throw new StripeImportError(
      "MISSING_COLUMN",
      `Balance history is missing column(s) for: ${missing.join(", ")}`,
    );
  }
}

function sortKey(row: RawRow): string {
  return row.timestamp === undefined ? "" : (parseTimestamp(row.timestamp) ?? "");
}

/**
 * Oldest first. A newest-first export is reversed before the stable
 * sort so rows sharing a timestamp keep their real order.
 */
export function chronological(rows: readonly RawRow[]): RawRow[] {
  const first = rows[0];
  const last = rows[rows.length - 1];
  const ordered =
    first !== undefined && last !== undefined && sortKey(first) > sortKey(last) ? [...rows].reverse() : [...rows];
  return ordered.sort((a, b) => {
    const ka = sortKey(a);
    const kb = sortKey(b);
    if (ka < kb) return -1;
    if (ka > kb) return 1;
    return 0;
  });
}

/**
 * Parse a balance_history.csv export into raw rows, oldest first.
 *
 * @throws {StripeImportError} unparseable CSV or a missing required column
 */
export function parseBalanceHistory(content: string): RawRow[] {
  const records = readRecords(content);
  const header = records[0] === undefined ? [] : Object.keys(records[0]);
  if (records.length > 0) {
    assertColumns(header);
  }
  return chronological(records.map(mapRecord));
}
