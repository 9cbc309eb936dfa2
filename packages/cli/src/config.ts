/**
 * @payledger/cli — Configuration.
 *
 * Two sources, both validated with Zod:
 * - environment (log level, runtime mode)
 * - the engine configuration JSON file (run currency, account mapping,
 *   tax categories, revenue routing, options)
 */

import { readFile } from "node:fs/promises";
import { z } from "zod";
import type { EngineConfig } from "@payledger/accrual";
import { currencyDecimals, normalizeCurrency } from "@payledger/ledger";
import { flatCategory, graduatedCategory } from "@payledger/tax";
import type { TaxCategory } from "@payledger/tax";

// =============================================================================
// Errors
// =============================================================================

export class ConfigurationError extends Error {
  /** Dotted paths of the offending fields, when known */
  public readonly paths: readonly string[];

  constructor(message: string, paths: readonly string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.paths = paths;
  }
}

function fromZodError(source: string, error: z.ZodError): ConfigurationError {
  const paths = error.issues.map((issue) => (issue.path.length > 0 ? issue.path.join(".") : "(root)"));
  const details = error.issues
    .map((issue, i) => `${paths[i] ?? "(root)"}: ${issue.message}`)
    .join("; ");
  return new ConfigurationError(`Invalid ${source}: ${details}`, paths);
}

// =============================================================================
// Environment
// =============================================================================

export const EnvSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),
});

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * @throws {ConfigurationError} on an invalid LOG_LEVEL or NODE_ENV
 */
export function loadEnv(env: Record<string, string | undefined> = process.env): EnvConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw fromZodError("environment", result.error);
  }
  return result.data;
}

// =============================================================================
// Engine configuration file
// =============================================================================

const RATE = z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal, e.g. \"0.153\"");
const MAJOR_AMOUNT = z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal amount");
const ACCOUNT = z.string().trim().min(1, "account identifier cannot be empty");

const TaxCategorySchema = z.discriminatedUnion("kind", [
  z.object({
    kind: z.literal("flat"),
    name: z.string().trim().min(1),
    rate: RATE,
  }),
  z.object({
    kind: z.literal("graduated"),
    name: z.string().trim().min(1),
    brackets: z.array(z.object({ from: MAJOR_AMOUNT, rate: RATE })).min(1),
  }),
]);

export const EngineConfigSchema = z.object({
  currency: z
    .string()
    .transform(normalizeCurrency)
    .refine((code) => currencyDecimals(code) !== undefined, "unknown currency code"),
  accounts: z.object({
    revenue: ACCOUNT,
    accrualClearing: ACCOUNT,
    processingFeeExpense: ACCOUNT,
    billingFeeExpense: ACCOUNT,
    bank: ACCOUNT,
    unmatchedRefunds: ACCOUNT,
    taxRoundingExpense: ACCOUNT,
    taxRoundingLiability: ACCOUNT,
    taxExpense: z.record(ACCOUNT).default({}),
    taxLiability: z.record(ACCOUNT).default({}),
    withholding: z.record(ACCOUNT).optional(),
  }),
  taxCategories: z.array(TaxCategorySchema).default([]),
  revenueRules: z
    .array(z.object({ contains: z.string().trim().min(1), account: ACCOUNT }))
    .default([]),
  options: z
    .object({ sweepWithholding: z.boolean().default(false) })
    .default({}),
});

export type EngineConfigFile = z.infer<typeof EngineConfigSchema>;

function toTaxCategory(
  category: EngineConfigFile["taxCategories"][number],
  decimals: number,
): TaxCategory {
  switch (category.kind) {
    case "flat":
      return flatCategory(category.name, category.rate);
    case "graduated":
      return graduatedCategory(category.name, category.brackets, decimals);
  }
}

/**
 * Validate parsed JSON and build the engine configuration.
 *
 * @throws {ConfigurationError} with the offending paths
 */
export function parseEngineConfig(json: unknown): EngineConfig {
  const result = EngineConfigSchema.safeParse(json);
  if (!result.success) {
    throw fromZodError("engine configuration", result.error);
  }

  const file = result.data;
  const decimals = currencyDecimals(file.currency) ?? 0;
  try {
    return {
      currency: file.currency,
      accounts: file.accounts,
      taxTable: file.taxCategories.map((c) => toTaxCategory(c, decimals)),
      revenueRules: file.revenueRules,
      options: file.options,
    };
  } catch (err) {
    // Bracket thresholds finer than the currency's minor unit
    throw new ConfigurationError(
      `Invalid engine configuration: ${describe(err)}`,
      ["taxCategories"],
    );
  }
}

/**
 * Read and validate the engine configuration file.
 *
 * @throws {ConfigurationError} unreadable file, invalid JSON or invalid content
 */
export async function loadEngineConfig(path: string): Promise<EngineConfig> {
  const text = await readFile(path, "utf8").catch((err: unknown) => {
    throw new ConfigurationError(`Cannot read configuration file "${path}": ${describe(err)}`);
  });
  return parseEngineConfig(parseJson(text, path));
}

function parseJson(text: string, path: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    throw new ConfigurationError(`Configuration file "${path}" is not valid JSON: ${describe(err)}`);
  }
}

function describe(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
