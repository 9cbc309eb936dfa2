/**
 * Cumulative reversal of a charge's legs.
 *
 * For a charge of gross G with legs x, the amount of x reversed once a
 * cumulative share `cum` of G has been refunded is
 *
 *   reversed(x, cum) = truncate(x × cum / G)
 *
 * Each refund posts reversed(x, after) − reversed(x, before) with the
 * opposite sign of x. Partial refunds therefore never drift: once
 * `cum` reaches G every leg is reversed exactly. Legs come in
 * debit/credit pairs of equal magnitude and truncation is symmetric
 * around zero, so each reversal set balances.
 */

import type { Split } from "@payledger/types";
import { scaleAmount } from "@payledger/ledger";

export function reversedShare(leg: bigint, cumulative: bigint, gross: bigint): bigint {
  return scaleAmount(leg, cumulative, gross);
}

/**
 * Splits that move a charge's reversed share from `before` to `after`.
 * `after < before` reinstates (dispute won) and posts with the legs'
 * original signs.
 */
export function reversalSplits(
  legs: readonly Split[],
  gross: bigint,
  before: bigint,
  after: bigint,
  label: string,
): Split[] {
  return legs.map((leg) => ({
    account: leg.account,
    signedAmount:
      reversedShare(leg.signedAmount, before, gross) - reversedShare(leg.signedAmount, after, gross),
    memo: `${label}: ${leg.memo}`,
  }));
}

export interface ReversalStep {
  /** Cumulative reversed gross after this event */
  readonly after: bigint;
  /** Gross applied against the charge (always ≥ 0) */
  readonly applied: bigint;
  /** Signed gross left over for suspense (same sign as the event) */
  readonly excess: bigint;
}

/**
 * Apply a signed event gross to a charge's cumulative reversed share.
 * Negative gross reverses (capped at G), positive reinstates (floored at 0).
 */
export function reversalStep(gross: bigint, chargeGross: bigint, before: bigint): ReversalStep {
  if (gross < 0n) {
    const requested = -gross;
    const room = chargeGross - before;
    const applied = requested < room ? requested : room;
    return { after: before + applied, applied, excess: -(requested - applied) };
  }
  const applied = gross < before ? gross : before;
  return { after: before - applied, applied, excess: gross - applied };
}
