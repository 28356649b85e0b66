import { Effect, Ref } from "effect";
import { Sink, SinkMessage } from "../sink/sink";
import {
  type Bookmark,
  getBookmark,
  setCurrentStream,
  StateStore,
  type SyncState,
  updateBookmark,
} from "./store";

/**
 * Owns the run's copy of the state. Every mutation is written through to
 * the store and then announced downstream as a State message.
 */
export class Checkpoint extends Effect.Service<Checkpoint>()("Checkpoint", {
  effect: Effect.gen(function* () {
    const store = yield* StateStore;
    const sink = yield* Sink;
    const ref = yield* Ref.make(yield* store.load());

    const get = Ref.get(ref);

    const update = (f: (state: SyncState) => SyncState) =>
      Effect.gen(function* () {
        const next = yield* Ref.updateAndGet(ref, f);
        yield* store.save(next);
        yield* sink.emit(SinkMessage.State({ value: next }));
      });

    const bookmark = (streamId: string) =>
      Effect.map(get, (state) => getBookmark(state, streamId));

    const updateStreamBookmark = (streamId: string, f: (bookmark: Bookmark) => Bookmark) =>
      update((state) => updateBookmark(state, streamId, f));

    const markCurrentStream = (streamId: string | null) =>
      update((state) => setCurrentStream(state, streamId));

    return { get, update, bookmark, updateBookmark: updateStreamBookmark, markCurrentStream };
  }),
}) {}
