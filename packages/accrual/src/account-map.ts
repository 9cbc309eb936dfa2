/**
 * Account mapping — role → identifier, validated once per run.
 */

import type { Account, AccountRole } from "@payledger/types";
import { LedgerError, currencyDecimals, AccountRegistry } from "@payledger/ledger";
import { TaxError, validateTaxTable } from "@payledger/tax";
import type { EngineConfig, RevenueRule, TaxAccountSet } from "./types.js";
import { AccrualError } from "./errors.js";

function lookup(record: Readonly<Record<string, string>> | undefined, key: string): string | undefined {
  if (record === undefined || !Object.hasOwn(record, key)) return undefined;
  const value = record[key];
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Resolve the expense/liability (and withholding) accounts of every tax
 * category, in table order.
 *
 * @throws {AccrualError} INVALID_CONFIGURATION when a category has no account
 */
export function resolveTaxAccounts(config: EngineConfig): readonly TaxAccountSet[] {
  const sweep = config.options?.sweepWithholding === true;

  return config.taxTable.map((category) => {
    const expense = lookup(config.accounts.taxExpense, category.name);
    const liability = lookup(config.accounts.taxLiability, category.name);
    const withholding = lookup(config.accounts.withholding, category.name);

    if (expense === undefined || liability === undefined) {
      throw new AccrualError(
        "INVALID_CONFIGURATION",
        `Tax category "${category.name}" needs both a tax expense and a tax liability account`,
      );
    }
    if (sweep && withholding === undefined) {
      throw new AccrualError(
        "INVALID_CONFIGURATION",
        `Tax category "${category.name}" needs a withholding account when sweeping is enabled`,
      );
    }
    return { category: category.name, expense, liability, withholding };
  });
}

/**
 * Every account the mapping can post to, with its role.
 * An identifier may appear more than once only with the same role.
 */
export function chartOfAccounts(config: EngineConfig): readonly Account[] {
  const accounts = config.accounts;
  const entries: [string, AccountRole][] = [
    [accounts.revenue, "revenue"],
    [accounts.accrualClearing, "asset"],
    [accounts.processingFeeExpense, "expense"],
    [accounts.billingFeeExpense, "expense"],
    [accounts.bank, "asset"],
    [accounts.unmatchedRefunds, "liability"],
    [accounts.taxRoundingExpense, "expense"],
    [accounts.taxRoundingLiability, "liability"],
  ];

  for (const set of resolveTaxAccounts(config)) {
    entries.push([set.expense, "expense"], [set.liability, "liability"]);
    if (set.withholding !== undefined) {
      entries.push([set.withholding, "asset"]);
    }
  }
  for (const rule of config.revenueRules ?? []) {
    entries.push([rule.account, "revenue"]);
  }

  const registry = new AccountRegistry();
  for (const [identifier, role] of entries) {
    if (identifier.trim() === "") {
      throw new AccrualError("INVALID_CONFIGURATION", `An account of role "${role}" has an empty identifier`);
    }
    try {
      registry.register({ identifier, role });
    } catch (err) {
      if (err instanceof LedgerError) {
        throw new AccrualError("INVALID_CONFIGURATION", err.message);
      }
      throw err;
    }
  }
  return registry.getAll();
}

/**
 * Check a configuration before any row is processed.
 *
 * @throws {AccrualError} INVALID_CONFIGURATION
 */
export function validateEngineConfig(config: EngineConfig): void {
  if (currencyDecimals(config.currency) === undefined) {
    throw new AccrualError("INVALID_CONFIGURATION", `Unknown run currency "${config.currency}"`);
  }
  try {
    validateTaxTable(config.taxTable);
  } catch (err) {
    if (err instanceof TaxError) {
      throw new AccrualError("INVALID_CONFIGURATION", err.message);
    }
    throw err;
  }
  for (const rule of config.revenueRules ?? []) {
    if (rule.contains.trim() === "") {
      throw new AccrualError("INVALID_CONFIGURATION", "Revenue rule match text cannot be empty");
    }
  }
  chartOfAccounts(config);
}

/**
 * First revenue rule whose text occurs in the description
 * (case-insensitive), else the default revenue account.
 */
export function revenueAccountFor(
  description: string,
  rules: readonly RevenueRule[],
  fallback: string,
): string {
  const haystack = description.toLowerCase();
  const match = rules.find((rule) => haystack.includes(rule.contains.toLowerCase()));
  return match?.account ?? fallback;
}
