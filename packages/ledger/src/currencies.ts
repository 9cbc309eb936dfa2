/**
 * @payledger/ledger — Currency table.
 *
 * Minor-unit exponents for the ISO 4217 codes payment processors
 * settle in. A code missing from this table is unknown to the engine.
 */

import type { Currency } from "@payledger/types";

export const CURRENCY_DECIMALS: Readonly<Record<string, number>> = {
  aud: 2,
  brl: 2,
  cad: 2,
  chf: 2,
  clp: 0,
  cny: 2,
  czk: 2,
  dkk: 2,
  eur: 2,
  gbp: 2,
  hkd: 2,
  huf: 2,
  inr: 2,
  jpy: 0,
  krw: 0,
  kwd: 3,
  mxn: 2,
  nok: 2,
  nzd: 2,
  pln: 2,
  sek: 2,
  sgd: 2,
  usd: 2,
  vnd: 0,
  zar: 2,
} as const;

/** Canonical form: lower-case, trimmed. */
export function normalizeCurrency(code: string): Currency {
  return code.trim().toLowerCase();
}

/**
 * Minor-unit exponent for a currency code, or undefined when unknown.
 */
export function currencyDecimals(code: string): number | undefined {
  const key = normalizeCurrency(code);
  return Object.hasOwn(CURRENCY_DECIMALS, key) ? CURRENCY_DECIMALS[key] : undefined;
}
