/**
 * @payledger/ingest
 *
 * Row normalization and event classification.
 */

export {
  IngestError,
  MalformedRowError,
  UnknownCurrencyError,
  CurrencyMismatchError,
  DuplicateEventError,
  UnclassifiableEventError,
} from "./errors.js";
export type { IngestErrorCode, IngestErrorContext } from "./errors.js";

export { normalizeRow, parseTimestamp, cleanAmount } from "./normalizer.js";
export type { NormalizeContext } from "./normalizer.js";

export { CorrelationIndex } from "./correlation-index.js";
export { Classifier, TYPE_ALIASES, resolveEventType } from "./classifier.js";
