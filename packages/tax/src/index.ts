/**
 * @payledger/tax — Withholding computation against running totals.
 *
 * Flat and graduated categories, exact rational arithmetic, explicit
 * immutable year-to-date state threaded by the caller.
 */

export {
  createTaxState,
  taxYear,
  yearToDate,
  validateTaxTable,
  graduatedTax,
  computeWithholding,
  releaseIncome,
  restoreIncome,
} from "./tax-engine.js";

export { flatCategory, graduatedCategory } from "./categories.js";
export type { BracketInput } from "./categories.js";

export type {
  FlatTaxCategory,
  TaxBracket,
  GraduatedTaxCategory,
  TaxCategory,
  TaxTable,
  TaxState,
  CategoryWithholding,
  WithholdingResult,
  TaxErrorCode,
} from "./types.js";

export { TaxError, ChronologyError } from "./types.js";
