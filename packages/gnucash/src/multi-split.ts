/**
 * GnuCash multi-split CSV formatter.
 *
 * One CSV row per split. Date and description appear on a
 * transaction's first split row only; GnuCash's importer treats the
 * following rows with blank date and description as further splits of
 * the same transaction.
 */

import { stringify } from "csv-stringify/sync";
import type { Transaction } from "@payledger/types";
import { LedgerError, currencyDecimals, formatAmount } from "@payledger/ledger";

export const GNUCASH_COLUMNS = ["Date", "Description", "Account", "Amount", "Notes"] as const;

export type GnuCashRow = readonly [date: string, description: string, account: string, amount: string, notes: string];

/**
 * Flatten transactions into GnuCash rows, in sequence order.
 *
 * @throws {LedgerError} CURRENCY_MISMATCH for a currency with no known exponent
 */
export function toGnuCashRows(transactions: readonly Transaction[]): GnuCashRow[] {
  const rows: GnuCashRow[] = [];

  for (const txn of transactions) {
    const decimals = currencyDecimals(txn.currency);
    if (decimals === undefined) {
      throw new LedgerError("CURRENCY_MISMATCH", `Cannot format amounts in unknown currency "${txn.currency}"`);
    }
    txn.splits.forEach((split, i) => {
      rows.push([
        i === 0 ? txn.date : "",
        i === 0 ? txn.description : "",
        split.account,
        formatAmount(split.signedAmount, decimals),
        split.memo,
      ]);
    });
  }

  return rows;
}

/** Inclusive date bounds, YYYY-MM-DD; an absent bound is open. */
export interface ExportWindow {
  readonly start?: string | undefined;
  readonly end?: string | undefined;
}

/** Transactions whose posting date falls inside the window, order kept. */
export function withinWindow(transactions: readonly Transaction[], window: ExportWindow): Transaction[] {
  return transactions.filter(
    (txn) =>
      (window.start === undefined || txn.date >= window.start) &&
      (window.end === undefined || txn.date <= window.end),
  );
}

/** Render a GnuCash multi-split CSV, header included. */
export function formatGnuCashCsv(transactions: readonly Transaction[]): string {
  return stringify(toGnuCashRows(transactions).map((row) => [...row]), {
    header: true,
    columns: [...GNUCASH_COLUMNS],
  });
}
