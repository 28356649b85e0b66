import * as NodeFs from "node:fs/promises";
import * as NodePath from "node:path";
import { Context, Data, Effect, Layer, Schema } from "effect";
import stringify from "fast-json-stable-stringify";
import { AppConfig } from "../config";
import { errorMessage, StateError } from "../core/errors";

export const Bookmark = Schema.Struct({
  version: Schema.optional(Schema.NullOr(Schema.Number)),
  replicationKeyValue: Schema.optional(Schema.String),
  jobId: Schema.optional(Schema.String),
  batchIds: Schema.optional(Schema.Array(Schema.String)),
  jobHighestBookmarkSeen: Schema.optional(Schema.String),
});
export type Bookmark = typeof Bookmark.Type;

// schedulers hand over `{}` as the state of a first run
export const SyncState = Schema.Struct({
  bookmarks: Schema.optionalWith(Schema.Record({ key: Schema.String, value: Bookmark }), {
    default: () => ({}),
  }),
  currentStream: Schema.optional(Schema.NullOr(Schema.String)),
});
export type SyncState = typeof SyncState.Type;

export const emptyState: SyncState = { bookmarks: {} };

export class StateStore extends Context.Tag("StateStore")<
  StateStore,
  {
    readonly load: () => Effect.Effect<SyncState, StateError>;
    readonly save: (state: SyncState) => Effect.Effect<void, StateError>;
  }
>() {}

/**
 * Canonical text of a state: sorted keys, no whitespace. Saving what was
 * loaded reproduces the file byte for byte.
 */
export const serializeState = (state: SyncState): string => stringify(state);

// keys written by other tools survive a load/save cycle
const decodeState = Schema.decodeUnknown(Schema.parseJson(SyncState), {
  onExcessProperty: "preserve",
});

export const parseState = (content: string): Effect.Effect<SyncState, StateError> =>
  content.trim() === ""
    ? Effect.succeed(emptyState)
    : decodeState(content).pipe(
        Effect.mapError(
          (e) => new StateError({ message: `Invalid state file - ${e.message}`, cause: e })
        )
      );

const isMissingFile = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

const readStateFile = (statePath: string): Effect.Effect<SyncState, StateError> =>
  Effect.tryPromise({
    try: async () => await NodeFs.readFile(statePath, "utf-8"),
    catch: (error) => error,
  }).pipe(
    Effect.catchAll((error) =>
      isMissingFile(error)
        ? Effect.succeed("")
        : Effect.fail(
            new StateError({
              message: errorMessage(error, "Failed to read state file"),
              cause: error,
            })
          )
    ),
    Effect.flatMap(parseState)
  );

const writeStateFile = (statePath: string, state: SyncState): Effect.Effect<void, StateError> =>
  Effect.tryPromise({
    try: async () => {
      await NodeFs.mkdir(NodePath.dirname(statePath), { recursive: true });
      const tempPath = `${statePath}.tmp`;
      await NodeFs.writeFile(tempPath, serializeState(state), "utf-8");
      await NodeFs.rename(tempPath, statePath);
    },
    catch: (error) =>
      new StateError({
        message: errorMessage(error, "Failed to write state file"),
        cause: error,
      }),
  });

export const makeFileStateStore = (statePath: string) =>
  StateStore.of({
    load: () => readStateFile(statePath),
    save: (state) => writeStateFile(statePath, state),
  });

export const FileStateStoreLive = Layer.effect(
  StateStore,
  Effect.map(AppConfig, (config) => makeFileStateStore(config.sync.statePath))
);

/**
 * In-flight bulk job of a stream. A bookmark holding only one of `jobId`
 * and `batchIds` reads as no job.
 */
export type ExtractionProgress = Data.TaggedEnum<{
  NoJob: {};
  InProgress: {
    readonly jobId: string;
    readonly batchIds: ReadonlyArray<string>;
    readonly highestSeen?: string;
  };
}>;

export const ExtractionProgress = Data.taggedEnum<ExtractionProgress>();

export const getBookmark = (state: SyncState, streamId: string): Bookmark | undefined =>
  state.bookmarks[streamId];

export const updateBookmark = (
  state: SyncState,
  streamId: string,
  f: (bookmark: Bookmark) => Bookmark
): SyncState => ({
  ...state,
  bookmarks: { ...state.bookmarks, [streamId]: f(state.bookmarks[streamId] ?? {}) },
});

export const setCurrentStream = (state: SyncState, streamId: string | null): SyncState => ({
  ...state,
  currentStream: streamId,
});

export const progressOf = (bookmark: Bookmark | undefined): ExtractionProgress =>
  bookmark?.jobId !== undefined && bookmark.batchIds !== undefined
    ? ExtractionProgress.InProgress({
        jobId: bookmark.jobId,
        batchIds: bookmark.batchIds,
        ...(bookmark.jobHighestBookmarkSeen !== undefined && {
          highestSeen: bookmark.jobHighestBookmarkSeen,
        }),
      })
    : ExtractionProgress.NoJob();

export const startJob = (bookmark: Bookmark, jobId: string): Bookmark => ({
  ...bookmark,
  jobId,
  batchIds: [],
});

export const setBatches = (bookmark: Bookmark, batchIds: ReadonlyArray<string>): Bookmark => ({
  ...bookmark,
  batchIds,
});

/**
 * Acknowledges a drained batch: records the highest value seen so far and
 * drops the batch from the resume list.
 */
export const completeBatch = (
  bookmark: Bookmark,
  batchId: string,
  highestSeen: string | undefined
): Bookmark => ({
  ...bookmark,
  batchIds: (bookmark.batchIds ?? []).filter((id) => id !== batchId),
  ...(highestSeen !== undefined && { jobHighestBookmarkSeen: highestSeen }),
});

/**
 * Drops the job and promotes its highest seen value. Without one, the
 * existing bookmark stays as it was.
 */
export const finishJob = (bookmark: Bookmark): Bookmark => {
  const { jobId: _jobId, batchIds: _batchIds, jobHighestBookmarkSeen, ...rest } = bookmark;
  return jobHighestBookmarkSeen === undefined
    ? rest
    : { ...rest, replicationKeyValue: jobHighestBookmarkSeen };
};

export const discardJob = (bookmark: Bookmark): Bookmark => {
  const { jobId: _jobId, batchIds: _batchIds, jobHighestBookmarkSeen: _seen, ...rest } = bookmark;
  return rest;
};
