import { type DateTime, Effect, Option } from "effect";
import type { StreamDescriptor } from "../catalog/catalog";
import { hasSchemaMapping } from "../catalog/mapper";
import {
  type InvalidFilterError,
  type UnknownOperatorError,
  UnsupportedTypeError,
} from "../core/errors";
import { formatSoqlDateTime } from "../core/time";
import { compileFilter, type FilterNode } from "./filter";

export interface QueryOptions {
  readonly startDate: DateTime.Utc;
  readonly endDate?: DateTime.Utc;
  readonly filter: Option.Option<FilterNode>;
  /** Disabled for bulk jobs, whose batches come back unordered. */
  readonly orderBy: boolean;
}

export type QueryError = UnsupportedTypeError | UnknownOperatorError | InvalidFilterError;

const checkFieldTypes = (stream: StreamDescriptor) =>
  Effect.forEach(
    stream.selectedFields,
    (field) => {
      const sourceType = stream.sourceColumnTypes[field];
      return sourceType === undefined || hasSchemaMapping(sourceType)
        ? Effect.void
        : Effect.fail(
            new UnsupportedTypeError({
              message: `Found unsupported type: ${sourceType}`,
              field,
              sourceType,
            })
          );
    },
    { discard: true }
  );

/**
 * Builds the SOQL statement for one extraction:
 * `SELECT f1,f2 FROM Object WHERE <clauses> [ORDER BY key ASC]`.
 *
 * Clauses always come in this order: the soft-delete exclusion, the
 * configured filter, the lower bound, then the upper bound.
 */
export const buildQuery = (
  stream: StreamDescriptor,
  options: QueryOptions
): Effect.Effect<string, QueryError> =>
  Effect.gen(function* () {
    yield* checkFieldTypes(stream);

    const clauses: string[] = [];
    if (stream.selectedFields.includes("IsDeleted")) {
      clauses.push("IsDeleted = false");
    }

    if (Option.isSome(options.filter)) {
      const predicate = yield* compileFilter(options.filter.value, stream.sourceColumnTypes);
      if (Option.isSome(predicate)) {
        clauses.push(predicate.value);
      }
    }

    const replicationKey = stream.replicationKey;
    if (replicationKey !== undefined) {
      clauses.push(`${replicationKey} >= ${formatSoqlDateTime(options.startDate)}`);
      if (options.endDate !== undefined) {
        clauses.push(`${replicationKey} < ${formatSoqlDateTime(options.endDate)}`);
      }
    }

    let query = `SELECT ${stream.selectedFields.join(",")} FROM ${stream.displayName}`;
    if (clauses.length > 0) {
      query += ` WHERE ${clauses.join(" AND ")}`;
    }
    if (replicationKey !== undefined && options.orderBy) {
      query += ` ORDER BY ${replicationKey} ASC`;
    }
    return query;
  });
