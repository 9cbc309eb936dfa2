/**
 * Event Types
 *
 * Payment-processor events as they flow through the engine:
 * raw row → PaymentEvent → ClassifiedEvent.
 *
 * Rules:
 * - PaymentEvents are frozen after creation
 * - Classification is a tagged union, discriminated by `type`
 * - Linked events carry the charge they reference (or undefined)
 */

import type { Currency } from "./financial.js";

/**
 * One input row from an import adapter, field name → raw value.
 */
export type RawRow = Readonly<Record<string, string | undefined>>;

/**
 * A normalized payment-processor event.
 */
export interface PaymentEvent {
  readonly id: string;

  /** ISO 8601, UTC */
  readonly timestamp: string;

  /** Signed gross amount in minor units */
  readonly grossAmount: bigint;

  /** Processing fee carried on the same row, minor units; negative when refunded */
  readonly fee: bigint;

  readonly currency: Currency;

  /** Lower-cased processor type, before alias mapping */
  readonly rawType: string;

  readonly correlationId: string | undefined;

  readonly description: string;

  /** Payout that settled this event, when the export says so */
  readonly payoutId: string | undefined;

  /** ISO 8601 UTC moment the funds become available for payout */
  readonly availableOn: string | undefined;

  /** 1-based position in the input sequence */
  readonly sequence: number;
}

/** Accounting event types. */
export type EventType =
  | "charge"
  | "refund"
  | "payout"
  | "fee"
  | "adjustment"
  | "dispute";

/**
 * A charge registered in the correlation index.
 * `handle` addresses the charge's slot in the engine's arena.
 */
export interface ChargeRecord {
  readonly handle: number;
  readonly event: PaymentEvent;
}

export interface ClassifiedCharge {
  readonly type: "charge";
  readonly event: PaymentEvent;
  readonly charge: ChargeRecord;
}

export interface ClassifiedPayout {
  readonly type: "payout";
  readonly event: PaymentEvent;
}

/** Events that act on a prior charge through its correlation id. */
export interface ClassifiedLinked {
  readonly type: "refund" | "fee" | "adjustment" | "dispute";
  readonly event: PaymentEvent;
  readonly charge: ChargeRecord | undefined;
}

export type ClassifiedEvent = ClassifiedCharge | ClassifiedPayout | ClassifiedLinked;
