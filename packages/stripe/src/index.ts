/**
 * @payledger/stripe — Stripe balance-history import adapter.
 */

export {
  parseBalanceHistory,
  mapRecord,
  chronological,
  COLUMN_MAP,
  StripeImportError,
} from "./balance-history.js";
export type { StripeImportErrorCode } from "./balance-history.js";
