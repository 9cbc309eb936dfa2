/**
 * Classifier — PaymentEvent → ClassifiedEvent.
 *
 * Rules are tried in order; the first match wins:
 * 1. payout
 * 2. charge with a positive amount
 * 3. refund, or a negative amount whose correlation id names a charge
 * 4. fee
 * 5. adjustment / dispute
 *
 * Charges are registered in the correlation index as they are seen, so
 * events must be classified in input order.
 */

import type { ClassifiedEvent, EventType, PaymentEvent } from "@payledger/types";
import { CorrelationIndex } from "./correlation-index.js";
import { UnclassifiableEventError } from "./errors.js";

/** Processor type spellings → accounting event type. */
export const TYPE_ALIASES: Readonly<Record<string, EventType>> = {
  charge: "charge",
  payment: "charge",
  payout: "payout",
  transfer: "payout",
  refund: "refund",
  payment_refund: "refund",
  fee: "fee",
  stripe_fee: "fee",
  application_fee: "fee",
  adjustment: "adjustment",
  dispute: "dispute",
};

export function resolveEventType(rawType: string): EventType | undefined {
  const key = rawType.trim().toLowerCase();
  return Object.hasOwn(TYPE_ALIASES, key) ? TYPE_ALIASES[key] : undefined;
}

export class Classifier {
  readonly index: CorrelationIndex;

  constructor(index: CorrelationIndex = new CorrelationIndex()) {
    this.index = index;
  }

  /**
   * @throws {UnclassifiableEventError} zero amount, unknown type, a charge
   *   that is not positive, or a charge reusing an indexed correlation id
   */
  classify(event: PaymentEvent): ClassifiedEvent {
    const context = { rowIndex: event.sequence, eventId: event.id };
    const kind = resolveEventType(event.rawType);

    if (event.grossAmount === 0n) {
      throw new UnclassifiableEventError(`Event "${event.id}" has a zero gross amount`, context);
    }

    if (kind === "payout") {
      return { type: "payout", event };
    }

    if (kind === "charge" && event.grossAmount > 0n) {
      if (event.correlationId !== undefined && this.index.has(event.correlationId)) {
        throw new UnclassifiableEventError(
          `Charge "${event.id}" reuses correlation id "${event.correlationId}"`,
          context,
        );
      }
      return { type: "charge", event, charge: this.index.register(event) };
    }

    const linked = this.index.lookup(event.correlationId);

    if (
      kind === "refund" ||
      (event.grossAmount < 0n && linked !== undefined && (kind === undefined || kind === "charge"))
    ) {
      return { type: "refund", event, charge: linked };
    }

    if (kind === "fee" || kind === "adjustment" || kind === "dispute") {
      return { type: kind, event, charge: linked };
    }

    throw new UnclassifiableEventError(
      kind === undefined
        ? `Event "${event.id}" has unknown type "${event.rawType}"`
        : `Event "${event.id}" of type "${kind}" has an unexpected amount sign`,
      context,
    );
  }
}
