import { HttpClientRequest } from "@effect/platform";
import { Effect, Schema, Stream } from "effect";
import { AppConfig } from "../config";
import { RemoteApiError } from "../core/errors";
import { splitJsonArray } from "../core/json-array";
import { type ApiError, SalesforceClient, type Session } from "./client";
import { hasRemoteErrorCode } from "./remote-error";

export const JobInfo = Schema.Struct({
  id: Schema.String,
  object: Schema.optional(Schema.String),
  state: Schema.String,
});
export type JobInfo = typeof JobInfo.Type;

export const BatchInfo = Schema.Struct({
  id: Schema.String,
  jobId: Schema.String,
  state: Schema.String,
  stateMessage: Schema.optional(Schema.String),
});
export type BatchInfo = typeof BatchInfo.Type;

const BatchInfoList = Schema.Struct({ batchInfo: Schema.Array(BatchInfo) });
const ResultIds = Schema.Array(Schema.String);

export const BulkRecord = Schema.Record({ key: Schema.String, value: Schema.Unknown });
export type BulkRecord = typeof BulkRecord.Type;
const decodeRecord = Schema.decodeUnknown(Schema.parseJson(BulkRecord));

/**
 * Asynchronous query API (Bulk API 1.0, JSON content type).
 */
export class BulkApi extends Effect.Service<BulkApi>()("BulkApi", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const client = yield* SalesforceClient;

    const sessionHeaders = (s: Session) =>
      HttpClientRequest.setHeaders({
        "X-SFDC-Session": s.accessToken,
        "Content-Type": "application/json",
      });

    const get = (path: string) => (s: Session) =>
      HttpClientRequest.get(client.asyncUrl(s, path)).pipe(sessionHeaders(s));

    const postJson = (path: string, body: unknown, headers: Record<string, string> = {}) =>
      (s: Session) =>
        HttpClientRequest.post(client.asyncUrl(s, path)).pipe(
          HttpClientRequest.bodyUnsafeJson(body),
          sessionHeaders(s),
          HttpClientRequest.setHeaders(headers)
        );

    const createJob = (objectName: string, options: { readonly pkChunking: boolean }) =>
      client.requestJson(
        postJson(
          "job",
          { operation: "queryAll", object: objectName, contentType: "JSON" },
          options.pkChunking
            ? { "Sforce-Enable-PKChunking": `chunkSize=${config.bulk.pkChunkSize}` }
            : {}
        ),
        JobInfo,
        `Create bulk job for ${objectName}`
      );

    const addBatch = (jobId: string, query: string) =>
      client.requestJson(
        (s) =>
          HttpClientRequest.post(client.asyncUrl(s, `job/${jobId}/batch`)).pipe(
            HttpClientRequest.bodyText(query, "application/json"),
            sessionHeaders(s)
          ),
        BatchInfo,
        `Add batch to job ${jobId}`
      );

    const closeJob = (jobId: string) =>
      client.requestJson(
        postJson(`job/${jobId}`, { state: "Closed" }),
        JobInfo,
        `Close job ${jobId}`
      );

    const jobStatus = (jobId: string) =>
      client.requestJson(get(`job/${jobId}`), JobInfo, `Read job ${jobId}`);

    /**
     * False when the server no longer knows the job, which happens once a
     * job is older than its retention window.
     */
    const jobExists = (jobId: string): Effect.Effect<boolean, ApiError> =>
      jobStatus(jobId).pipe(
        Effect.as(true),
        Effect.catchIf(
          (e) => e._tag === "RemoteApiError" && hasRemoteErrorCode(e.body, "InvalidJob"),
          () => Effect.succeed(false)
        )
      );

    const listBatches = (jobId: string) =>
      client
        .requestJson(get(`job/${jobId}/batch`), BatchInfoList, `List batches of job ${jobId}`)
        .pipe(Effect.map((list) => list.batchInfo));

    const batchStatus = (jobId: string, batchId: string) =>
      client.requestJson(
        get(`job/${jobId}/batch/${batchId}`),
        BatchInfo,
        `Read batch ${batchId}`
      );

    const resultIds = (jobId: string, batchId: string) =>
      client.requestJson(
        get(`job/${jobId}/batch/${batchId}/result`),
        ResultIds,
        `List results of batch ${batchId}`
      );

    /**
     * Records of one result set, decoded one at a time as the body arrives.
     */
    const results = (
      jobId: string,
      batchId: string,
      resultId: string
    ): Stream.Stream<BulkRecord, ApiError> => {
      const context = `Read result ${resultId} of batch ${batchId}`;
      const path = `job/${jobId}/batch/${batchId}/result/${resultId}`;
      return client.requestStream(get(path), context).pipe(
        Stream.decodeText(),
        splitJsonArray(
          () =>
            new RemoteApiError({
              message: `${context}: Result set ended before the closing bracket`,
              status: 200,
              body: "",
            })
        ),
        Stream.mapEffect((element) =>
          decodeRecord(element).pipe(
            Effect.mapError(
              (e) =>
                new RemoteApiError({
                  message: `${context}: Invalid record - ${e.message}`,
                  status: 200,
                  body: element,
                })
            )
          )
        )
      );
    };

    return {
      createJob,
      addBatch,
      closeJob,
      jobStatus,
      jobExists,
      listBatches,
      batchStatus,
      resultIds,
      results,
    };
  }),
  dependencies: [SalesforceClient.Default],
}) {}
