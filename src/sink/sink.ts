import { Console, Context, Data, DateTime, type Effect, Layer } from "effect";
import type { PropertySchema } from "../catalog/catalog";
import type { SyncState } from "../state/store";

export type SinkMessage = Data.TaggedEnum<{
  Schema: {
    readonly stream: string;
    readonly schema: PropertySchema;
    readonly keyProperties: ReadonlyArray<string>;
    readonly replicationKey?: string;
  };
  Record: {
    readonly stream: string;
    readonly record: { readonly [field: string]: unknown };
    readonly version: number;
    readonly extractedAt: DateTime.Utc;
  };
  State: { readonly value: SyncState };
  ActivateVersion: { readonly stream: string; readonly version: number };
}>;

export const SinkMessage = Data.taggedEnum<SinkMessage>();

/**
 * Downstream collector. Messages arrive in emission order.
 */
export class Sink extends Context.Tag("Sink")<
  Sink,
  { readonly emit: (message: SinkMessage) => Effect.Effect<void> }
>() {}

/**
 * One JSON line per message, in the wire shape downstream loaders read.
 */
export const toJsonLine = (message: SinkMessage): string =>
  JSON.stringify(
    SinkMessage.$match(message, {
      Schema: ({ stream, schema, keyProperties, replicationKey }) => ({
        type: "SCHEMA",
        stream,
        schema,
        key_properties: keyProperties,
        bookmark_properties: replicationKey === undefined ? [] : [replicationKey],
      }),
      Record: ({ stream, record, version, extractedAt }) => ({
        type: "RECORD",
        stream,
        record,
        version,
        time_extracted: DateTime.formatIso(extractedAt),
      }),
      State: ({ value }) => ({ type: "STATE", value }),
      ActivateVersion: ({ stream, version }) => ({ type: "ACTIVATE_VERSION", stream, version }),
    })
  );

export const SinkLive = Layer.succeed(Sink, {
  emit: (message) => Console.log(toJsonLine(message)),
});
