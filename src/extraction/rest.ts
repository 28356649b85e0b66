import { HttpClientRequest } from "@effect/platform";
import { DateTime, Duration, Effect, Layer, Option, Schema } from "effect";
import { AppConfig } from "../config";
import { buildQuery } from "../query/builder";
import { SalesforceClient, type Session } from "../salesforce/client";
import { hasRemoteErrorCode } from "../salesforce/remote-error";
import { Extraction, type ExtractionError, type ExtractionRequest } from "./types";

const QueryPage = Schema.Struct({
  done: Schema.Boolean,
  nextRecordsUrl: Schema.optional(Schema.String),
  records: Schema.Array(Schema.Record({ key: Schema.String, value: Schema.Unknown })),
});

const MAX_WINDOW_ATTEMPTS = 4;
const MIN_WINDOW = Duration.days(1);

const isQueryTimeout = (error: ExtractionError): boolean =>
  error._tag === "RemoteApiError" && hasRemoteErrorCode(error.body, "QUERY_TIMEOUT");

/**
 * Midpoint of `[start, end)`, or none when the halves would be shorter
 * than a day.
 */
export const halveWindow = (
  start: DateTime.Utc,
  end: DateTime.Utc
): Option.Option<DateTime.Utc> => {
  const half = Duration.millis(
    (DateTime.toEpochMillis(end) - DateTime.toEpochMillis(start)) / 2
  );
  return Duration.lessThan(half, MIN_WINDOW)
    ? Option.none()
    : Option.some(DateTime.addDuration(start, half));
};

export class RestExtraction extends Effect.Service<RestExtraction>()("RestExtraction", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const client = yield* SalesforceClient;

    const firstPage = (query: string) => (s: Session) =>
      HttpClientRequest.get(client.dataUrl(s, "queryAll")).pipe(
        HttpClientRequest.setUrlParam("q", query),
        HttpClientRequest.bearerToken(s.accessToken),
        HttpClientRequest.acceptJson
      );

    const nextPage = (path: string) => (s: Session) =>
      HttpClientRequest.get(`${s.instanceUrl}${path}`).pipe(
        HttpClientRequest.bearerToken(s.accessToken),
        HttpClientRequest.acceptJson
      );

    const pageThrough = (
      request: ExtractionRequest,
      start: DateTime.Utc,
      end: Option.Option<DateTime.Utc>
    ) =>
      Effect.gen(function* () {
        const query = yield* buildQuery(request.stream, {
          startDate: start,
          ...Option.match(end, { onNone: () => ({}), onSome: (endDate) => ({ endDate }) }),
          filter: config.sync.filters,
          orderBy: true,
        });
        const context = `Query ${request.stream.streamId}`;
        let page = yield* client.requestJson(firstPage(query), QueryPage, context);
        for (;;) {
          for (const record of page.records) {
            yield* request.onRecord(record);
          }
          if (page.done || page.nextRecordsUrl === undefined) return;
          page = yield* client.requestJson(nextPage(page.nextRecordsUrl), QueryPage, context);
        }
      });

    /**
     * Queries `[start, end)`. A query timeout splits the window in two, the
     * first half is read, then the rest up to the original end.
     */
    const extractWindow = (
      request: ExtractionRequest,
      start: DateTime.Utc,
      end: Option.Option<DateTime.Utc>,
      attempt: number
    ): Effect.Effect<void, ExtractionError> =>
      pageThrough(request, start, end).pipe(
        Effect.catchIf(isQueryTimeout, (error) => {
          const midpoint =
            request.stream.replicationKey === undefined || attempt >= MAX_WINDOW_ATTEMPTS
              ? Option.none()
              : halveWindow(start, Option.getOrElse(end, () => request.runStart));
          if (Option.isNone(midpoint)) {
            return Effect.fail(error);
          }
          return Effect.logWarning(
            `Query for ${request.stream.streamId} timed out, retrying up to ` +
              DateTime.formatIso(midpoint.value)
          ).pipe(
            Effect.zipRight(extractWindow(request, start, midpoint, attempt + 1)),
            Effect.zipRight(extractWindow(request, midpoint.value, end, attempt + 1))
          );
        })
      );

    const extract = (request: ExtractionRequest) =>
      extractWindow(request, request.startDate, Option.none(), 0);

    return { extract };
  }),
  dependencies: [SalesforceClient.Default],
}) {}

export const RestExtractionLive = Layer.effect(
  Extraction,
  Effect.map(RestExtraction, (rest) => Extraction.of({ extract: rest.extract }))
);
