import { Context, DateTime, type Effect, Option } from "effect";
import type { StreamDescriptor } from "../catalog/catalog";
import type {
  BulkJobError,
  CatalogError,
  InvalidFilterError,
  QuotaExceededError,
  StateError,
  UnknownOperatorError,
  UnsupportedTypeError,
} from "../core/errors";
import type { ApiError } from "../salesforce/client";

export type RawRecord = { readonly [field: string]: unknown };

export interface ExtractionRequest {
  readonly stream: StreamDescriptor;
  /** Lower bound of the replication key, from the bookmark or the configured start. */
  readonly startDate: DateTime.Utc;
  /** Cutoff for bookmark advancement. */
  readonly runStart: DateTime.Utc;
  readonly onRecord: (record: RawRecord) => Effect.Effect<void, StateError>;
}

export type ExtractionError =
  | ApiError
  | QuotaExceededError
  | BulkJobError
  | CatalogError
  | StateError
  | UnsupportedTypeError
  | UnknownOperatorError
  | InvalidFilterError;

/**
 * Fresh extraction of one stream: a report run for report sources,
 * otherwise a bulk job or synchronous query depending on the API type.
 */
export class Extraction extends Context.Tag("Extraction")<
  Extraction,
  { readonly extract: (request: ExtractionRequest) => Effect.Effect<void, ExtractionError> }
>() {}

/**
 * Replication-key value of a record as text. Bulk JSON results carry
 * datetimes as epoch milliseconds.
 */
export const replicationValue = (
  record: RawRecord,
  replicationKey: string
): Option.Option<string> => {
  const value = record[replicationKey];
  if (typeof value === "string" && value !== "") return Option.some(value);
  if (typeof value === "number" && Number.isFinite(value)) {
    return Option.map(DateTime.make(value), DateTime.formatIso);
  }
  return Option.none();
};
