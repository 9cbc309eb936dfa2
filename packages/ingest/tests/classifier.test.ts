/**
 * Tests for the Classifier and its correlation index.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { PaymentEvent } from "@payledger/types";
import { Classifier, resolveEventType } from "../src/classifier.js";
import { CorrelationIndex } from "../src/correlation-index.js";
import { UnclassifiableEventError } from "../src/errors.js";

let sequence = 0;

function event(overrides: Partial<PaymentEvent>): PaymentEvent {
  sequence++;
  return {
    id: `evt_${String(sequence)}`,
    timestamp: "2024-03-01T00:00:00.000Z",
    grossAmount: 1000n,
    fee: 0n,
    currency: "usd",
    rawType: "charge",
    correlationId: undefined,
    description: "",
    payoutId: undefined,
    availableOn: undefined,
    sequence,
    ...overrides,
  };
}

describe("Classifier", () => {
  let classifier: Classifier;

  beforeEach(() => {
    sequence = 0;
    classifier = new Classifier();
  });

  it("classifies a payout", () => {
    const result = classifier.classify(event({ rawType: "transfer", grossAmount: -500n }));
    expect(result.type).toBe("payout");
  });

  it("registers a charge in the index", () => {
    const result = classifier.classify(event({ correlationId: "ch_1" }));

    expect(result.type).toBe("charge");
    if (result.type !== "charge") return;
    expect(result.charge.handle).toBe(0);
    expect(classifier.index.lookup("ch_1")).toBe(result.charge);
  });

  it("links a refund to its charge", () => {
    const charge = classifier.classify(event({ correlationId: "ch_1" }));
    const refund = classifier.classify(
      event({ rawType: "payment_refund", grossAmount: -400n, correlationId: "ch_1" }),
    );

    expect(refund.type).toBe("refund");
    if (refund.type === "refund" && charge.type === "charge") {
      expect(refund.charge).toBe(charge.charge);
    }
  });

  it("treats a negative charge-typed row for a known charge as a refund", () => {
    classifier.classify(event({ correlationId: "ch_1" }));
    const result = classifier.classify(event({ grossAmount: -1000n, correlationId: "ch_1" }));
    expect(result.type).toBe("refund");
  });

  it("keeps an unlinked refund, without a charge", () => {
    const result = classifier.classify(event({ rawType: "refund", grossAmount: -10n, correlationId: "ch_9" }));
    expect(result).toMatchObject({ type: "refund", charge: undefined });
  });

  it("links fees, adjustments and disputes", () => {
    classifier.classify(event({ correlationId: "ch_1" }));

    expect(classifier.classify(event({ rawType: "stripe_fee", grossAmount: -30n, correlationId: "ch_1" }))).toMatchObject({
      type: "fee",
      charge: { handle: 0 },
    });
    expect(classifier.classify(event({ rawType: "dispute", grossAmount: -1000n, correlationId: "ch_1" }))).toMatchObject({
      type: "dispute",
      charge: { handle: 0 },
    });
    expect(classifier.classify(event({ rawType: "adjustment", grossAmount: 1000n, correlationId: "ch_1" }))).toMatchObject({
      type: "adjustment",
      charge: { handle: 0 },
    });
  });

  it("rejects a zero amount", () => {
    expect(() => classifier.classify(event({ grossAmount: 0n }))).toThrow(UnclassifiableEventError);
  });

  it("rejects an unknown type", () => {
    expect(() => classifier.classify(event({ rawType: "topup" }))).toThrow('unknown type "topup"');
  });

  it("rejects a negative charge with no linked charge", () => {
    expect(() => classifier.classify(event({ grossAmount: -10n }))).toThrow(/unexpected amount sign/);
  });

  it("rejects a second charge with the same correlation id", () => {
    const first = classifier.classify(event({ id: "ch_a", correlationId: "ch_1" }));
    expect(() => classifier.classify(event({ id: "ch_b", correlationId: "ch_1" }))).toThrow(/reuses correlation id/);
    expect(classifier.index.lookup("ch_1")).toEqual(first.type === "charge" ? first.charge : undefined);
  });
});

describe("CorrelationIndex", () => {
  it("stores unkeyed charges without indexing them", () => {
    const index = new CorrelationIndex();
    const unkeyed = index.register(event({ id: "ch_a", correlationId: undefined }));
    const keyed = index.register(event({ id: "ch_b", correlationId: "ch_b" }));

    expect(unkeyed.handle).toBe(0);
    expect(keyed.handle).toBe(1);
    expect(index.lookup(undefined)).toBeUndefined();
    expect(index.lookup("ch_b")).toBe(keyed);
    expect(index.has("ch_a")).toBe(false);
  });
});

describe("resolveEventType", () => {
  it("maps aliases case-insensitively", () => {
    expect(resolveEventType("Payment")).toBe("charge");
    expect(resolveEventType("application_fee")).toBe("fee");
    expect(resolveEventType("toString")).toBeUndefined();
  });
});
