/**
 * Terminal run summary.
 */

import chalk from "chalk";
import type { RunReport, RunStatus } from "@payledger/accrual";
import { currencyDecimals, formatAmount } from "@payledger/ledger";

export const EXIT_CODES: Readonly<Record<RunStatus, number>> = {
  clean: 0,
  warnings: 2,
  aborted: 1,
};

const UNPAID_SHOWN = 10;

function info(label: string, value: string): string {
  return chalk.gray("  → ") + chalk.gray(label.padEnd(20)) + chalk.white(value);
}

function headline(report: RunReport): string {
  switch (report.status) {
    case "clean":
      return chalk.green("✓ ") + chalk.white.bold("Run completed cleanly");
    case "warnings":
      return (
        chalk.yellow("! ") +
        chalk.yellow.bold(`Run completed with ${String(report.warnings.length)} warning(s)`)
      );
    case "aborted":
      return chalk.red("✗ ") + chalk.red.bold(`Run aborted: ${report.error?.message ?? "unknown error"}`);
  }
}

/**
 * Summary lines for a finished run, amounts in major units.
 */
export function renderSummary(report: RunReport, currency: string): string[] {
  const decimals = currencyDecimals(currency) ?? 0;
  const money = (amount: bigint): string => `${formatAmount(amount, decimals)} ${currency.toUpperCase()}`;

  const lines = [
    headline(report),
    info("Rows", String(report.rowCount)),
    info("Transactions", String(report.transactions.length)),
    info("Accrual clearing", money(report.clearingBalance)),
  ];
  for (const [category, amount] of report.withheld) {
    lines.push(info(`Withheld ${category}`, money(amount)));
  }

  const unpaid = report.unpaidRevenue;
  const unpaidTotal = unpaid.reduce((sum, u) => sum + u.amount, 0n);
  lines.push(info("Unpaid revenue", `${money(unpaidTotal)} (${String(unpaid.length)} charge(s))`));
  for (const u of unpaid.slice(0, UNPAID_SHOWN)) {
    const available = u.availableOn === undefined ? "N/A" : u.availableOn.slice(0, 10);
    lines.push(
      chalk.yellow(`      ${u.timestamp.slice(0, 10)}  ${money(u.amount).padStart(16)}  available ${available}`),
    );
  }
  if (unpaid.length > UNPAID_SHOWN) {
    lines.push(chalk.yellow(`      ... and ${String(unpaid.length - UNPAID_SHOWN)} more`));
  }

  lines.push(info("Digest", chalk.yellow(report.digest.slice(0, 16))));
  return lines;
}
