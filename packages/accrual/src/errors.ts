/**
 * @payledger/accrual errors.
 */

export type AccrualErrorCode =
  | "INVALID_CONFIGURATION"
  | "ORPHAN_REFUND"
  | "RUN_ABORTED"
  | "RUN_FINISHED";

export class AccrualError extends Error {
  public readonly code: AccrualErrorCode;

  constructor(code: AccrualErrorCode, message: string) {
    super(message);
    this.name = "AccrualError";
    this.code = code;
  }
}

/**
 * A reversal with no charge left to reverse. The engine does not throw
 * it: it rides on the degraded warning while `amount` (minor units,
 * unsigned) goes to the unmatched-refunds suspense account.
 */
export class OrphanRefundError extends AccrualError {
  public readonly eventId: string;
  public readonly amount: bigint;

  constructor(eventId: string, amount: bigint, reason: string) {
    super("ORPHAN_REFUND", `Event "${eventId}": ${reason}; ${amount.toString()} posted to suspense`);
    this.name = "OrphanRefundError";
    this.eventId = eventId;
    this.amount = amount;
  }
}
