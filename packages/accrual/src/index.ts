/**
 * @payledger/accrual
 *
 * Accrual splitting of classified payment events and the run engine
 * that turns raw rows into balanced ledger transactions.
 */

export { AccrualEngine, runAccrual } from "./engine.js";

export {
  MEMO,
  taxMemo,
  sweepMemo,
  chargeSplits,
  feeSplits,
  payoutSplits,
  unmatchedSplits,
  allocateSweep,
} from "./splitter.js";
export type { SweepAllocation } from "./splitter.js";

export { reversedShare, reversalSplits, reversalStep } from "./reversal.js";
export type { ReversalStep } from "./reversal.js";

export {
  resolveTaxAccounts,
  chartOfAccounts,
  validateEngineConfig,
  revenueAccountFor,
} from "./account-map.js";

export { AccrualError, OrphanRefundError } from "./errors.js";
export type { AccrualErrorCode } from "./errors.js";

export type {
  AccountMapping,
  RevenueRule,
  EngineOptions,
  EngineConfig,
  TaxAccountSet,
  WarningKind,
  WarningCode,
  RunWarning,
  EngineHooks,
  RunStatus,
  RunReport,
  UnpaidRevenue,
} from "./types.js";
