/**
 * @payledger/ledger — Append-only double-entry ledger engine.
 *
 * Enforces double-entry invariants:
 * - Every transaction sums to exactly zero in minor units
 * - Transactions are immutable once assembled
 * - Corrections are new reversing transactions
 * - All monetary arithmetic uses bigint (no floating point)
 */

// Core engine
export { Ledger } from "./ledger.js";

// Transaction assembly
export { assembleTransaction, compareSplits, sumSplits } from "./assembler.js";

// Account registry
export { AccountRegistry } from "./accounts.js";

// Balance computation
export {
  computeAccountBalance,
  computeTrialBalance,
} from "./balance-calculator.js";

// Currency table
export { CURRENCY_DECIMALS, currencyDecimals, normalizeCurrency } from "./currencies.js";

// Money arithmetic
export {
  parseAmount,
  formatAmount,
  absAmount,
  parseRate,
  applyRate,
  addFractions,
  truncateFraction,
  roundHalfUp,
  scaleAmount,
  ZERO_FRACTION,
} from "./money-math.js";
export type { Fraction, Rate } from "./money-math.js";

// Digest
export { canonicalTransactions, digestTransactions } from "./digest.js";

// Types
export type {
  NormalBalance,
  TransactionCandidate,
  AccountBalance,
  TrialBalanceLine,
  TrialBalance,
  LedgerErrorCode,
  TransactionFilter,
} from "./types.js";

export { LedgerError, UnbalancedTransactionError, NORMAL_BALANCE } from "./types.js";
