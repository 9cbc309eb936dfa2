/**
 * AccrualEngine — raw rows in, balanced accrual transactions out.
 *
 * One synchronous pass in input order:
 *   row → normalizeRow → Classifier → split builders (↔ Tax Engine)
 *       → assembleTransaction → emission buffer → Ledger
 *
 * A charge's transaction stays pending in the emission buffer until its
 * fee is merged, a later event of its correlation chain arrives, or
 * input ends. Transactions leave the buffer from the head only, so the
 * output order is the order of each transaction's primary event.
 *
 * Row- and event-scoped problems become warnings. An unbalanced
 * transaction, an out-of-order event or a ledger rejection aborts the
 * run: nothing after it is emitted.
 */

import type { ChargeRecord, ClassifiedEvent, ClassifiedLinked, PaymentEvent, RawRow, Split, Transaction } from "@payledger/types";
import {
  Ledger,
  LedgerError,
  absAmount,
  assembleTransaction,
  digestTransactions,
} from "@payledger/ledger";
import type { TransactionCandidate } from "@payledger/ledger";
import {
  ChronologyError,
  TaxError,
  computeWithholding,
  createTaxState,
  releaseIncome,
  restoreIncome,
} from "@payledger/tax";
import type { TaxState } from "@payledger/tax";
import {
  Classifier,
  DuplicateEventError,
  IngestError,
  normalizeRow,
} from "@payledger/ingest";
import type {
  EngineConfig,
  EngineHooks,
  RunReport,
  RunWarning,
  TaxAccountSet,
  WarningCode,
  WarningKind,
} from "./types.js";
import { AccrualError, OrphanRefundError } from "./errors.js";
import { chartOfAccounts, resolveTaxAccounts, revenueAccountFor, validateEngineConfig } from "./account-map.js";
import {
  MEMO,
  allocateSweep,
  chargeSplits,
  feeSplits,
  payoutSplits,
  unmatchedSplits,
} from "./splitter.js";
import { reversalSplits, reversalStep, reversedShare } from "./reversal.js";

// =============================================================================
// Internal state
// =============================================================================

interface BufferEntry {
  transaction: Transaction | undefined;
}

interface ChargeState {
  readonly record: ChargeRecord;
  readonly entry: BufferEntry;
  /** Splits gathered so far; fixed once the charge is finalized */
  readonly draft: Split[];
  readonly eventIds: string[];
  legs: readonly Split[] | undefined;
  /** Cumulative gross reversed, 0 ≤ reversed ≤ G */
  reversed: bigint;
  /** Settled by a processed payout */
  paidOut: boolean;
}

const LABELS: Readonly<Record<ClassifiedEvent["type"], string>> = {
  charge: "Charge",
  payout: "Payout",
  refund: "Refund",
  fee: "Fee",
  adjustment: "Adjustment",
  dispute: "Dispute",
};

function assertNever(value: never): never {
  throw new Error(`Unhandled event: ${JSON.stringify(value)}`);
}

function isFatal(err: unknown): err is Error {
  return err instanceof LedgerError || err instanceof TaxError || err instanceof AccrualError;
}

// =============================================================================
// Engine
// =============================================================================

export class AccrualEngine {
  private readonly config: EngineConfig;
  private readonly hooks: EngineHooks;
  private readonly taxAccounts: readonly TaxAccountSet[];
  private readonly liabilityCategories: ReadonlyMap<string, string>;
  private readonly ledger: Ledger;
  private readonly classifier = new Classifier();

  private readonly charges: ChargeState[] = [];
  /** Charges keyed by the payout the export links them to */
  private readonly chargesByPayout = new Map<string, ChargeState[]>();
  /** Charges without a payout link, since the last unlinked payout */
  private unlinkedSincePayout: ChargeState[] = [];
  private readonly buffer: BufferEntry[] = [];
  private head = 0;

  private readonly emitted: Transaction[] = [];
  private readonly warnings: RunWarning[] = [];
  private readonly seenEventIds = new Set<string>();

  private taxState: TaxState = createTaxState();
  private readonly reserved = new Map<string, bigint>();
  private clearing = 0n;
  private lastTimestamp: string | undefined;
  private rowCount = 0;

  private failure: Error | undefined;
  private report: RunReport | undefined;

  /**
   * @throws {AccrualError} INVALID_CONFIGURATION
   */
  constructor(config: EngineConfig, hooks: EngineHooks = {}) {
    validateEngineConfig(config);
    this.config = config;
    this.hooks = hooks;
    this.taxAccounts = resolveTaxAccounts(config);
    this.liabilityCategories = new Map(this.taxAccounts.map((set) => [set.liability, set.category]));
    this.ledger = Ledger.replay(config.currency, chartOfAccounts(config), []);
  }

  get aborted(): boolean {
    return this.failure !== undefined;
  }

  get clearingBalance(): bigint {
    return this.clearing;
  }

  // ───────────────────────────────────────────────────────────────────────
  // Driving
  // ───────────────────────────────────────────────────────────────────────

  /**
   * Process one raw row. Returns the transactions released from the
   * head of the emission buffer by this row.
   *
   * @throws {AccrualError} RUN_ABORTED / RUN_FINISHED when the run is over
   */
  push(row: RawRow): readonly Transaction[] {
    this.assertOpen();
    this.rowCount++;
    const released = this.emitted.length;

    this.guard(() => {
      this.processRow(row, this.rowCount);
      this.release();
    });

    return this.emitted.slice(released);
  }

  /**
   * End of input: finalize pending charges, flush the buffer and build
   * the report. Calling it again returns the same report.
   */
  finish(): RunReport {
    if (this.report !== undefined) return this.report;

    if (this.failure === undefined) {
      this.guard(() => {
        for (const state of this.charges) {
          this.finalize(state);
        }
        this.release();
      });
    }

    this.report = this.buildReport();
    return this.report;
  }

  /**
   * Convenience: push every row, stopping at the first fatal error.
   */
  run(rows: Iterable<RawRow>): RunReport {
    for (const row of rows) {
      if (this.aborted) break;
      this.push(row);
    }
    return this.finish();
  }

  private assertOpen(): void {
    if (this.report !== undefined) {
      throw new AccrualError("RUN_FINISHED", "Run already finished");
    }
    if (this.failure !== undefined) {
      throw new AccrualError("RUN_ABORTED", `Run aborted: ${this.failure.message}`);
    }
  }

  private guard(step: () => void): void {
    try {
      step();
    } catch (err) {
      if (!isFatal(err)) throw err;
      this.failure = err;
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Row pipeline
  // ───────────────────────────────────────────────────────────────────────

  private processRow(row: RawRow, rowIndex: number): void {
    const classified = this.admit(row, rowIndex);
    if (classified === undefined) return;

    this.seenEventIds.add(classified.event.id);
    this.lastTimestamp = classified.event.timestamp;
    this.dispatch(classified);
  }

  /** Normalize and classify; row-scoped failures become warnings. */
  private admit(row: RawRow, rowIndex: number): ClassifiedEvent | undefined {
    try {
      const event = normalizeRow(row, { index: rowIndex, expectedCurrency: this.config.currency });
      if (this.seenEventIds.has(event.id)) {
        throw new DuplicateEventError(event.id, { rowIndex, eventId: event.id });
      }
      this.assertChronological(event);
      return this.classifier.classify(event);
    } catch (err) {
      if (err instanceof IngestError) {
        this.warn("skipped", err.code, err.message, rowIndex, err.eventId, err);
        return undefined;
      }
      throw err;
    }
  }

  private assertChronological(event: PaymentEvent): void {
    if (this.lastTimestamp !== undefined && event.timestamp < this.lastTimestamp) {
      throw new ChronologyError(event.timestamp, this.lastTimestamp);
    }
  }

  private dispatch(classified: ClassifiedEvent): void {
    switch (classified.type) {
      case "charge":
        this.onCharge(classified.event, classified.charge);
        return;
      case "payout":
        this.onPayout(classified.event);
        return;
      case "fee":
        this.onFee(classified.event, classified.charge);
        return;
      case "refund":
      case "adjustment":
      case "dispute":
        this.onReversal(classified);
        return;
      default:
        assertNever(classified);
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Event handlers
  // ───────────────────────────────────────────────────────────────────────

  private onCharge(event: PaymentEvent, record: ChargeRecord): void {
    const accounts = this.config.accounts;
    const withholding = computeWithholding(event.grossAmount, this.config.taxTable, this.taxState, event.timestamp);
    const revenue = revenueAccountFor(event.description, this.config.revenueRules ?? [], accounts.revenue);

    const splits = [
      ...chargeSplits(event.grossAmount, revenue, withholding, this.taxAccounts, accounts),
      ...feeSplits(event.fee, accounts.processingFeeExpense, accounts, MEMO.processingFee),
    ];

    this.taxState = withholding.state;
    this.track(splits);

    const entry: BufferEntry = { transaction: undefined };
    this.buffer.push(entry);
    const state: ChargeState = {
      record,
      entry,
      draft: splits,
      eventIds: [event.id],
      legs: undefined,
      reversed: 0n,
      paidOut: false,
    };
    this.charges[record.handle] = state;
    if (event.payoutId === undefined) {
      this.unlinkedSincePayout.push(state);
    } else {
      const linked = this.chargesByPayout.get(event.payoutId) ?? [];
      linked.push(state);
      this.chargesByPayout.set(event.payoutId, linked);
    }

    // Nothing more can be merged into a charge that already carries its
    // fee or cannot be correlated.
    if (event.fee !== 0n || event.correlationId === undefined) {
      this.finalize(state);
    }
  }

  private onPayout(event: PaymentEvent): void {
    const accounts = this.config.accounts;
    const net = -event.grossAmount;

    const linked = this.settledBy(event);
    const settled = linked.length > 0 ? linked : this.unlinkedSincePayout;
    const sweep =
      this.config.options?.sweepWithholding === true && net > 0n
        ? allocateSweep(net, linked.length > 0 ? this.outstandingTax(linked) : this.reserved, this.taxAccounts)
        : [];
    for (const state of settled) {
      state.paidOut = true;
    }
    if (linked.length === 0) {
      this.unlinkedSincePayout = [];
    }
    for (const allocation of sweep) {
      this.reserved.set(allocation.category, (this.reserved.get(allocation.category) ?? 0n) - allocation.amount);
    }

    const splits = [
      ...payoutSplits(net, accounts, sweep),
      ...feeSplits(event.fee, accounts.processingFeeExpense, accounts, MEMO.processingFee),
    ];
    this.emitStandalone(event, LABELS.payout, splits);

    if (this.clearing < 0n) {
      this.warn(
        "flagged",
        "NEGATIVE_CLEARING_BALANCE",
        `Accrual clearing is ${this.clearing.toString()} after payout "${event.id}"`,
        event.sequence,
        event.id,
      );
    }
  }

  /** Unsettled charges linked to the payout by its id, source or transfer id. */
  private settledBy(event: PaymentEvent): ChargeState[] {
    const settled = new Set<ChargeState>();
    for (const key of [event.id, event.correlationId, event.payoutId]) {
      if (key === undefined) continue;
      for (const state of this.chargesByPayout.get(key) ?? []) {
        if (!state.paidOut) settled.add(state);
      }
      this.chargesByPayout.delete(key);
    }
    return [...settled];
  }

  /** Tax still reserved on the given charges, per category. */
  private outstandingTax(states: readonly ChargeState[]): Map<string, bigint> {
    const outstanding = new Map<string, bigint>();
    for (const state of states) {
      const gross = state.record.event.grossAmount;
      for (const split of state.legs ?? state.draft) {
        const category = this.liabilityCategories.get(split.account);
        if (category === undefined) continue;
        const remaining = reversedShare(split.signedAmount, state.reversed, gross) - split.signedAmount;
        outstanding.set(category, (outstanding.get(category) ?? 0n) + remaining);
      }
    }
    return outstanding;
  }

  private onFee(event: PaymentEvent, record: ChargeRecord | undefined): void {
    const accounts = this.config.accounts;
    const cost = event.fee - event.grossAmount;
    const state = record === undefined ? undefined : this.charges[record.handle];

    if (state !== undefined && state.legs === undefined) {
      const splits = feeSplits(cost, accounts.processingFeeExpense, accounts, MEMO.processingFee);
      this.track(splits);
      state.draft.push(...splits);
      state.eventIds.push(event.id);
      this.finalize(state);
      return;
    }

    if (state !== undefined) {
      this.emitStandalone(event, LABELS.fee, feeSplits(cost, accounts.processingFeeExpense, accounts, MEMO.processingFee));
      return;
    }

    if (event.correlationId !== undefined) {
      this.warn(
        "degraded",
        "UNLINKED_FEE",
        `Fee "${event.id}" references unknown charge "${event.correlationId}"; posted as a billing fee`,
        event.sequence,
        event.id,
      );
    }
    this.emitStandalone(event, LABELS.fee, feeSplits(cost, accounts.billingFeeExpense, accounts, MEMO.billingFee));
  }

  /**
   * Refunds always take money back from the customer, whatever sign the
   * processor gave the row. Disputes and adjustments keep their sign: a
   * positive amount reinstates a reversed charge.
   */
  private onReversal(classified: ClassifiedLinked): void {
    const { event } = classified;
    const label = LABELS[classified.type];
    const accounts = this.config.accounts;
    const state = classified.charge === undefined ? undefined : this.charges[classified.charge.handle];
    const gross = classified.type === "refund" ? -absAmount(event.grossAmount) : event.grossAmount;
    const rowFee = feeSplits(event.fee, accounts.processingFeeExpense, accounts, MEMO.processingFee);

    if (state === undefined) {
      this.orphan(event, gross, "no matching charge");
      this.emitStandalone(event, label, [...unmatchedSplits(gross, accounts), ...rowFee]);
      return;
    }

    const legs = this.finalize(state);
    const charge = state.record.event;
    const before = state.reversed;
    const step = reversalStep(gross, charge.grossAmount, before);

    if (step.applied > 0n) {
      this.taxState =
        gross < 0n
          ? releaseIncome(step.applied, this.config.taxTable, this.taxState, event.timestamp, charge.timestamp)
          : restoreIncome(step.applied, this.config.taxTable, this.taxState, event.timestamp, charge.timestamp);
    }
    state.reversed = step.after;

    const splits = [...reversalSplits(legs, charge.grossAmount, before, step.after, label), ...rowFee];
    if (step.excess !== 0n) {
      this.orphan(
        event,
        step.excess,
        step.excess < 0n ? "exceeds the unreversed amount of its charge" : "exceeds the reversed amount of its charge",
      );
      splits.push(...unmatchedSplits(step.excess, accounts));
    }
    this.emitStandalone(event, label, splits);
  }

  // ───────────────────────────────────────────────────────────────────────
  // Emission
  // ───────────────────────────────────────────────────────────────────────

  private candidate(
    event: PaymentEvent,
    label: string,
    eventIds: readonly string[],
    splits: readonly Split[],
  ): TransactionCandidate {
    return {
      id: `txn:${event.id}`,
      timestamp: event.timestamp,
      description: event.description === "" ? `${label} ${event.id}` : event.description,
      currency: this.config.currency,
      eventIds,
      splits,
    };
  }

  private emitStandalone(event: PaymentEvent, label: string, splits: readonly Split[]): void {
    this.track(splits);
    const transaction = assembleTransaction(this.candidate(event, label, [event.id], splits));
    this.buffer.push({ transaction });
  }

  /** Assemble a pending charge; returns its final legs. */
  private finalize(state: ChargeState): readonly Split[] {
    if (state.legs !== undefined) return state.legs;
    const transaction = assembleTransaction(this.candidate(state.record.event, LABELS.charge, state.eventIds, state.draft));
    state.entry.transaction = transaction;
    state.legs = transaction.splits;
    return state.legs;
  }

  private release(): void {
    while (this.head < this.buffer.length) {
      const transaction = this.buffer[this.head]?.transaction;
      if (transaction === undefined) return;
      this.ledger.append(transaction);
      this.emitted.push(transaction);
      this.head++;
    }
  }

  /** Running clearing balance and per-category reserve. */
  private track(splits: readonly Split[]): void {
    for (const split of splits) {
      if (split.account === this.config.accounts.accrualClearing) {
        this.clearing += split.signedAmount;
      }
      const category = this.liabilityCategories.get(split.account);
      if (category !== undefined) {
        this.reserved.set(category, (this.reserved.get(category) ?? 0n) - split.signedAmount);
      }
    }
  }

  // ───────────────────────────────────────────────────────────────────────
  // Warnings & report
  // ───────────────────────────────────────────────────────────────────────

  /** `gross` is the signed amount posted to suspense. */
  private orphan(event: PaymentEvent, gross: bigint, reason: string): void {
    const error = new OrphanRefundError(event.id, absAmount(gross), reason);
    this.warn("degraded", "ORPHAN_REFUND", error.message, event.sequence, event.id, error);
  }

  private warn(
    kind: WarningKind,
    code: WarningCode,
    message: string,
    rowIndex: number | undefined,
    eventId: string | undefined,
    error?: Error,
  ): void {
    const warning: RunWarning = { kind, code, rowIndex, eventId, message, error };
    this.warnings.push(warning);
    this.hooks.onWarning?.(warning);
  }

  private buildReport(): RunReport {
    const withheld = new Map<string, bigint>();
    for (const set of this.taxAccounts) {
      withheld.set(set.category, this.ledger.getBalance(set.liability).balance);
    }

    const unpaidRevenue = this.charges
      .filter((state) => !state.paidOut && state.record.event.grossAmount > state.reversed)
      .map((state) => ({
        eventId: state.record.event.id,
        timestamp: state.record.event.timestamp,
        availableOn: state.record.event.availableOn,
        payoutId: state.record.event.payoutId,
        amount: state.record.event.grossAmount - state.reversed,
      }));

    let status: RunReport["status"] = "clean";
    if (this.failure !== undefined) status = "aborted";
    else if (this.warnings.length > 0) status = "warnings";

    return {
      status,
      transactions: [...this.emitted],
      warnings: [...this.warnings],
      error: this.failure,
      rowCount: this.rowCount,
      clearingBalance: this.ledger.getBalance(this.config.accounts.accrualClearing).balance,
      withheld,
      unpaidRevenue,
      trialBalance: this.ledger.getTrialBalance(),
      taxState: this.taxState,
      digest: digestTransactions(this.emitted),
    };
  }
}

/**
 * Run a materialized row sequence through a fresh engine.
 */
export function runAccrual(config: EngineConfig, rows: Iterable<RawRow>, hooks: EngineHooks = {}): RunReport {
  return new AccrualEngine(config, hooks).run(rows);
}
