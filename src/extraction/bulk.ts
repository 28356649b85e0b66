import { Data, Duration, Effect, Layer, Option, Stream } from "effect";
import { AppConfig } from "../config";
import { BulkJobError } from "../core/errors";
import { isAtOrBefore, isLater } from "../core/time";
import { buildQuery } from "../query/builder";
import { BulkApi, type BatchInfo } from "../salesforce/bulk";
import { SalesforceClient } from "../salesforce/client";
import { QuotaGovernor } from "../salesforce/quota";
import { Checkpoint } from "../state/checkpoint";
import {
  completeBatch,
  discardJob,
  type ExtractionProgress,
  finishJob,
  setBatches,
  startJob,
} from "../state/store";
import {
  Extraction,
  type ExtractionError,
  type ExtractionRequest,
  type RawRecord,
  replicationValue,
} from "./types";

/**
 * Lifecycle of one bulk job. A fresh extraction enters at `Submitted`, a
 * resumed one at `Draining`.
 */
export type JobPhase = Data.TaggedEnum<{
  Submitted: { readonly jobId: string; readonly batchId: string; readonly chunked: boolean };
  Polling: {
    readonly jobId: string;
    readonly batchId: string;
    readonly chunked: boolean;
    readonly attempt: number;
  };
  JobFailed: { readonly jobId: string; readonly chunked: boolean; readonly message: string };
  BatchesAvailable: { readonly jobId: string; readonly batchIds: ReadonlyArray<string> };
  Draining: {
    readonly jobId: string;
    readonly batchIds: ReadonlyArray<string>;
    readonly highestSeen?: string;
  };
  Done: { readonly jobId: string };
}>;

export const JobPhase = Data.taggedEnum<JobPhase>();

// failures the server recovers from when the query is split by primary key
const CHUNKABLE_FAILURES = [
  "QUERY_TIMEOUT",
  "Retried more than 15 times",
  "Failed to write query result",
];

export const isChunkableFailure = (message: string): boolean =>
  CHUNKABLE_FAILURES.some((phrase) => message.includes(phrase));

export const pollDelay = (attempt: number, baseMs: number, maxMs: number): Duration.Duration =>
  Duration.millis(Math.min(baseMs * 2 ** attempt, maxMs));

const isPending = (batch: BatchInfo) => batch.state === "Queued" || batch.state === "InProgress";

/**
 * Highest replication-key value seen so far that does not pass the run's
 * own start time.
 */
export const advanceHighestSeen = (
  current: string | undefined,
  record: RawRecord,
  replicationKey: string | undefined,
  runStart: ExtractionRequest["runStart"]
): string | undefined => {
  if (replicationKey === undefined) return current;
  return Option.match(replicationValue(record, replicationKey), {
    onNone: () => current,
    onSome: (value) =>
      isAtOrBefore(value, runStart) && (current === undefined || isLater(value, current))
        ? value
        : current,
  });
};

export class BulkJobMachine extends Effect.Service<BulkJobMachine>()("BulkJobMachine", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const api = yield* BulkApi;
    const client = yield* SalesforceClient;
    const quota = yield* QuotaGovernor;
    const checkpoint = yield* Checkpoint;

    const submit = (request: ExtractionRequest, query: string, pkChunking: boolean) =>
      Effect.gen(function* () {
        const { streamId, displayName } = request.stream;
        yield* quota.checkBulk(yield* client.bulkLimits);

        const job = yield* api.createJob(displayName, { pkChunking });
        const batch = yield* api.addBatch(job.id, query);
        if (!pkChunking) {
          yield* api.closeJob(job.id);
        }
        yield* checkpoint.updateBookmark(streamId, (b) => startJob(b, job.id));
        yield* Effect.logInfo(
          `Created bulk job ${job.id} for ${streamId}${pkChunking ? " with PK chunking" : ""}`
        );
        return JobPhase.Submitted({ jobId: job.id, batchId: batch.id, chunked: pkChunking });
      });

    const pollBatch = (phase: Extract<JobPhase, { _tag: "Polling" }>) =>
      Effect.gen(function* () {
        const batch = yield* api.batchStatus(phase.jobId, phase.batchId);
        switch (batch.state) {
          case "Completed":
            return JobPhase.BatchesAvailable({ jobId: phase.jobId, batchIds: [batch.id] });
          case "Failed":
          case "NotProcessed":
            return JobPhase.JobFailed({
              jobId: phase.jobId,
              chunked: false,
              message: batch.stateMessage ?? `Batch ${batch.id} ended as ${batch.state}`,
            });
          default:
            return JobPhase.Polling({
              jobId: phase.jobId,
              batchId: phase.batchId,
              chunked: phase.chunked,
              attempt: phase.attempt + 1,
            });
        }
      });

    const pollChunkedJob = (phase: Extract<JobPhase, { _tag: "Polling" }>) =>
      Effect.gen(function* () {
        const job = yield* api.jobStatus(phase.jobId);
        if (job.state === "Aborted" || job.state === "Failed") {
          return JobPhase.JobFailed({
            jobId: phase.jobId,
            chunked: true,
            message: `Job ${phase.jobId} ended as ${job.state}`,
          });
        }

        const batches = yield* api.listBatches(phase.jobId);
        if (batches.some(isPending)) {
          return JobPhase.Polling({
            jobId: phase.jobId,
            batchId: phase.batchId,
            chunked: true,
            attempt: phase.attempt + 1,
          });
        }
        const failed = batches.find((batch) => batch.state === "Failed");
        if (failed !== undefined) {
          return JobPhase.JobFailed({
            jobId: phase.jobId,
            chunked: true,
            message: failed.stateMessage ?? `Batch ${failed.id} failed`,
          });
        }

        // the original query batch ends as NotProcessed once split into chunks
        const completed = batches.filter((batch) => batch.state === "Completed");
        yield* api.closeJob(phase.jobId);
        return JobPhase.BatchesAvailable({
          jobId: phase.jobId,
          batchIds: completed.map((batch) => batch.id),
        });
      });

    const drainBatch = (
      request: ExtractionRequest,
      jobId: string,
      batchId: string,
      highestSeen: string | undefined
    ) =>
      Effect.gen(function* () {
        const { streamId, replicationKey } = request.stream;
        let highest = highestSeen;
        for (const resultId of yield* api.resultIds(jobId, batchId)) {
          highest = yield* api.results(jobId, batchId, resultId).pipe(
            Stream.runFoldEffect(highest, (seen, record) =>
              request
                .onRecord(record)
                .pipe(Effect.as(advanceHighestSeen(seen, record, replicationKey, request.runStart)))
            )
          );
        }
        yield* checkpoint.updateBookmark(streamId, (b) => completeBatch(b, batchId, highest));
        yield* Effect.logInfo(`Finished syncing batch ${batchId}. Removing batch from state.`);
        return highest;
      });

    const step =
      (request: ExtractionRequest, query: string) =>
      (phase: JobPhase): Effect.Effect<JobPhase, ExtractionError> => {
        const { streamId } = request.stream;
        switch (phase._tag) {
          case "Submitted":
            return Effect.succeed(
              JobPhase.Polling({
                jobId: phase.jobId,
                batchId: phase.batchId,
                chunked: phase.chunked,
                attempt: 0,
              })
            );

          case "Polling":
            return Effect.sleep(
              pollDelay(phase.attempt, config.bulk.pollIntervalMs, config.bulk.maxPollIntervalMs)
            ).pipe(
              Effect.zipRight(Effect.logInfo(`Waiting on bulk job ${phase.jobId}`)),
              Effect.zipRight(phase.chunked ? pollChunkedJob(phase) : pollBatch(phase))
            );

          case "JobFailed":
            if (!phase.chunked && isChunkableFailure(phase.message)) {
              return Effect.logWarning(
                `Bulk job ${phase.jobId} failed (${phase.message}), retrying with PK chunking`
              ).pipe(Effect.zipRight(submit(request, query, true)));
            }
            return Effect.fail(new BulkJobError({ message: phase.message, jobId: phase.jobId }));

          case "BatchesAvailable":
            return checkpoint
              .updateBookmark(streamId, (b) => setBatches(b, phase.batchIds))
              .pipe(
                Effect.as(JobPhase.Draining({ jobId: phase.jobId, batchIds: phase.batchIds }))
              );

          case "Draining":
            return Effect.reduce(phase.batchIds, phase.highestSeen, (highest, batchId) =>
              drainBatch(request, phase.jobId, batchId, highest)
            ).pipe(Effect.as(JobPhase.Done({ jobId: phase.jobId })));

          case "Done":
            return Effect.succeed(phase);
        }
      };

    const complete = (request: ExtractionRequest, jobId: string) =>
      Effect.gen(function* () {
        yield* checkpoint.updateBookmark(request.stream.streamId, finishJob);
        yield* quota.jobCompleted;
        yield* Effect.logInfo(`Completed bulk job ${jobId} for ${request.stream.streamId}`);
      });

    const run = (request: ExtractionRequest, query: string, initial: JobPhase) =>
      Effect.iterate(initial, {
        while: (phase) => phase._tag !== "Done",
        body: step(request, query),
      }).pipe(Effect.flatMap((done) => complete(request, done.jobId)));

    const extract = (request: ExtractionRequest): Effect.Effect<void, ExtractionError> =>
      Effect.gen(function* () {
        const query = yield* buildQuery(request.stream, {
          startDate: request.startDate,
          filter: config.sync.filters,
          orderBy: false,
        });
        yield* run(request, query, yield* submit(request, query, false));
      });

    /**
     * Drains the batches a previous run left behind. Returns false when the
     * job has expired on the server; its state is then dropped without
     * promoting anything it saw.
     */
    const resume = (
      request: ExtractionRequest,
      progress: Extract<ExtractionProgress, { _tag: "InProgress" }>
    ): Effect.Effect<boolean, ExtractionError> =>
      Effect.gen(function* () {
        const { streamId } = request.stream;
        if (!(yield* api.jobExists(progress.jobId))) {
          yield* Effect.logWarning(
            `Bulk job ${progress.jobId} for ${streamId} no longer exists, starting over`
          );
          yield* checkpoint.updateBookmark(streamId, discardJob);
          return false;
        }
        yield* Effect.logInfo(
          `Resuming bulk job ${progress.jobId} for ${streamId}, ` +
            `${progress.batchIds.length} batches to go`
        );
        yield* run(
          request,
          "",
          JobPhase.Draining({
            jobId: progress.jobId,
            batchIds: progress.batchIds,
            ...(progress.highestSeen !== undefined && { highestSeen: progress.highestSeen }),
          })
        );
        return true;
      });

    return { extract, resume };
  }),
  dependencies: [BulkApi.Default, SalesforceClient.Default, QuotaGovernor.Default],
}) {}

export const BulkExtractionLive = Layer.effect(
  Extraction,
  Effect.map(BulkJobMachine, (machine) => Extraction.of({ extract: machine.extract }))
);
