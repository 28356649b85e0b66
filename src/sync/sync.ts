import { Clock, DateTime, Effect, Option, Ref } from "effect";
import { type Catalog, type StreamDescriptor, selectedStreams } from "../catalog/catalog";
import { AppConfig } from "../config";
import { isAtOrBefore, parseInstant } from "../core/time";
import { BulkJobMachine } from "../extraction/bulk";
import {
  Extraction,
  type ExtractionRequest,
  type RawRecord,
  replicationValue,
} from "../extraction/types";
import { Sink, SinkMessage } from "../sink/sink";
import { Checkpoint } from "../state/checkpoint";
import { type Bookmark, discardJob, progressOf } from "../state/store";
import { classifyStreamError } from "./classify";
import { transformRecord } from "./transform";

export interface StreamSummary {
  readonly streamId: string;
  readonly records: number;
  readonly resumed: boolean;
}

export interface SyncSummary {
  readonly streams: ReadonlyArray<StreamSummary>;
  readonly durationMs: number;
}

/**
 * Streams left to sync. A run interrupted mid-stream restarts at that
 * stream; an unknown marker means a full pass.
 */
export const remainingStreams = (
  streams: ReadonlyArray<StreamDescriptor>,
  currentStream: string | null | undefined
): ReadonlyArray<StreamDescriptor> => {
  if (currentStream === null || currentStream === undefined) return streams;
  const index = streams.findIndex((stream) => stream.streamId === currentStream);
  return index === -1 ? streams : streams.slice(index);
};

const isEmptyBookmark = (bookmark: Bookmark | undefined): boolean =>
  bookmark === undefined || Object.keys(bookmark).length === 0;

export class SyncService extends Effect.Service<SyncService>()("SyncService", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const checkpoint = yield* Checkpoint;
    const sink = yield* Sink;
    const extraction = yield* Extraction;
    const bulk = yield* BulkJobMachine;

    const startDateFor = (bookmark: Bookmark | undefined): DateTime.Utc =>
      Option.fromNullable(bookmark?.replicationKeyValue).pipe(
        Option.flatMap(parseInstant),
        Option.getOrElse(() => config.sync.startDate)
      );

    /**
     * Emits one record. Outside a bulk job the bookmark follows the
     * record, but never past the run's start.
     */
    const recordHandler =
      (
        stream: StreamDescriptor,
        version: number,
        runStart: DateTime.Utc,
        count: Ref.Ref<number>
      ) =>
      (raw: RawRecord) =>
        Effect.gen(function* () {
          const record = transformRecord(raw, stream.schema);
          yield* sink.emit(
            SinkMessage.Record({
              stream: stream.streamId,
              record,
              version,
              extractedAt: runStart,
            })
          );
          yield* Ref.update(count, (n) => n + 1);

          const replicationKey = stream.replicationKey;
          if (replicationKey === undefined) return;
          const progress = progressOf(yield* checkpoint.bookmark(stream.streamId));
          if (progress._tag !== "NoJob") return;

          const value = replicationValue(record, replicationKey);
          if (Option.isSome(value) && isAtOrBefore(value.value, runStart)) {
            yield* checkpoint.updateBookmark(stream.streamId, (b) => ({
              ...b,
              replicationKeyValue: value.value,
            }));
          }
        });

    const syncStream = (stream: StreamDescriptor, runStart: DateTime.Utc) =>
      Effect.gen(function* () {
        const { streamId, replicationKey } = stream;
        yield* sink.emit(
          SinkMessage.Schema({
            stream: streamId,
            schema: stream.schema,
            keyProperties: stream.keyProperties,
            ...(replicationKey !== undefined && { replicationKey }),
          })
        );

        const bookmark = yield* checkpoint.bookmark(streamId);
        const hasKey = replicationKey !== undefined;
        const persisted = bookmark?.version;
        const version =
          hasKey && persisted !== undefined && persisted !== null
            ? persisted
            : yield* Clock.currentTimeMillis;

        const count = yield* Ref.make(0);
        const request = (recordVersion: number): ExtractionRequest => ({
          stream,
          startDate: startDateFor(bookmark),
          runStart,
          onRecord: recordHandler(stream, recordVersion, runStart, count),
        });

        const progress = progressOf(bookmark);
        if (progress._tag === "InProgress") {
          if (progress.batchIds.length > 0) {
            if (yield* bulk.resume(request(version), progress)) {
              return { streamId, records: yield* Ref.get(count), resumed: true };
            }
          } else {
            yield* Effect.logInfo(`Discarding bulk job ${progress.jobId} with no batches`);
            yield* checkpoint.updateBookmark(streamId, discardJob);
          }
        }

        if (hasKey || isEmptyBookmark(bookmark)) {
          yield* sink.emit(SinkMessage.ActivateVersion({ stream: streamId, version }));
          yield* checkpoint.updateBookmark(streamId, (b) => ({ ...b, version }));
        }

        // a full-table pass always lands in a new version
        const recordVersion = hasKey ? version : yield* Clock.currentTimeMillis;
        yield* extraction.extract(request(recordVersion));

        if (!hasKey) {
          yield* sink.emit(
            SinkMessage.ActivateVersion({ stream: streamId, version: recordVersion })
          );
          yield* checkpoint.updateBookmark(streamId, (b) => ({ ...b, version: null }));
        }
        return { streamId, records: yield* Ref.get(count), resumed: false };
      });

    const run = (catalog: Catalog) =>
      Effect.gen(function* () {
        const startedAt = yield* Clock.currentTimeMillis;
        const runStart = yield* DateTime.now;
        const state = yield* checkpoint.get;
        const streams = remainingStreams(
          selectedStreams(catalog, config.sync.selectFieldsByDefault),
          state.currentStream
        );

        yield* Effect.logInfo(`Starting sync of ${streams.length} streams`);
        const summaries: StreamSummary[] = [];
        for (const stream of streams) {
          yield* checkpoint.markCurrentStream(stream.streamId);
          yield* Effect.logInfo(`Syncing ${stream.streamId}`);
          const summary = yield* syncStream(stream, runStart).pipe(
            Effect.mapError((error) => classifyStreamError(error, stream.streamId))
          );
          yield* Effect.logInfo(
            `Synced ${summary.records} records for ${stream.streamId}` +
              (summary.resumed ? " (resumed)" : "")
          );
          summaries.push(summary);
        }
        yield* checkpoint.markCurrentStream(null);

        const durationMs = (yield* Clock.currentTimeMillis) - startedAt;
        yield* Effect.logInfo(`Sync completed in ${durationMs}ms`);
        return { streams: summaries, durationMs } satisfies SyncSummary;
      });

    return { run, syncStream };
  }),
}) {}
