/**
 * @payledger/types — Shared domain types for the payledger stack.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Monetary amounts are bigint minor units
 */

// Financial types
export type {
  Currency,
  AccountRole,
  Account,
  Split,
  Transaction,
} from "./financial.js";

// Event types
export type {
  RawRow,
  PaymentEvent,
  EventType,
  ChargeRecord,
  ClassifiedCharge,
  ClassifiedPayout,
  ClassifiedLinked,
  ClassifiedEvent,
} from "./event.js";

// Runtime type guards
export {
  isAccountRole,
  isAccount,
  isRawRow,
  isTransaction,
} from "./guards.js";
