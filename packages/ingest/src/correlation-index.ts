/**
 * Correlation index — charges addressed by handle, looked up by key.
 *
 * Charges live in an append-only arena; the key map only stores the
 * handle. Charges without a correlation id are stored but not keyed.
 */

import type { ChargeRecord, PaymentEvent } from "@payledger/types";

export class CorrelationIndex {
  private readonly arena: ChargeRecord[] = [];
  private readonly byKey = new Map<string, number>();

  /**
   * Add a charge to the arena and key it by its correlation id.
   * Callers check `lookup` first: a key is never re-pointed.
   */
  register(event: PaymentEvent): ChargeRecord {
    const record: ChargeRecord = Object.freeze({ handle: this.arena.length, event });
    this.arena.push(record);
    if (event.correlationId !== undefined && !this.byKey.has(event.correlationId)) {
      this.byKey.set(event.correlationId, record.handle);
    }
    return record;
  }

  lookup(correlationId: string | undefined): ChargeRecord | undefined {
    if (correlationId === undefined) return undefined;
    const handle = this.byKey.get(correlationId);
    return handle === undefined ? undefined : this.arena[handle];
  }

  has(correlationId: string): boolean {
    return this.byKey.has(correlationId);
  }
}
