/**
 * @payledger/ingest — Row- and event-scoped errors.
 *
 * None of these abort a run: the engine skips the offending row or
 * event and records a warning.
 */

export type IngestErrorCode =
  | "MALFORMED_ROW"
  | "UNKNOWN_CURRENCY"
  | "CURRENCY_MISMATCH"
  | "DUPLICATE_EVENT"
  | "UNCLASSIFIABLE_EVENT";

export interface IngestErrorContext {
  readonly rowIndex?: number | undefined;
  readonly eventId?: string | undefined;
}

export class IngestError extends Error {
  public readonly code: IngestErrorCode;
  public readonly rowIndex: number | undefined;
  public readonly eventId: string | undefined;

  constructor(code: IngestErrorCode, message: string, context: IngestErrorContext = {}) {
    super(message);
    this.name = "IngestError";
    this.code = code;
    this.rowIndex = context.rowIndex;
    this.eventId = context.eventId;
  }
}

export class MalformedRowError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}) {
    super("MALFORMED_ROW", message, context);
    this.name = "MalformedRowError";
  }
}

export class UnknownCurrencyError extends IngestError {
  public readonly currency: string;

  constructor(currency: string, context: IngestErrorContext = {}) {
    super("UNKNOWN_CURRENCY", `Unknown currency code "${currency}"`, context);
    this.name = "UnknownCurrencyError";
    this.currency = currency;
  }
}

export class CurrencyMismatchError extends IngestError {
  constructor(currency: string, expected: string, context: IngestErrorContext = {}) {
    super(
      "CURRENCY_MISMATCH",
      `Row currency "${currency}" does not match run currency "${expected}"`,
      context,
    );
    this.name = "CurrencyMismatchError";
  }
}

export class DuplicateEventError extends IngestError {
  constructor(eventId: string, context: IngestErrorContext = {}) {
    super("DUPLICATE_EVENT", `Event "${eventId}" was already processed`, context);
    this.name = "DuplicateEventError";
  }
}

export class UnclassifiableEventError extends IngestError {
  constructor(message: string, context: IngestErrorContext = {}) {
    super("UNCLASSIFIABLE_EVENT", message, context);
    this.name = "UnclassifiableEventError";
  }
}
