import * as NodeFs from "node:fs/promises";
import { Effect, Schema } from "effect";
import { CatalogError, errorMessage } from "../core/errors";

export interface PropertySchema {
  readonly type?: string | ReadonlyArray<string>;
  readonly format?: string;
  readonly properties?: { readonly [name: string]: PropertySchema };
  readonly additionalProperties?: boolean;
}

export const PropertySchema: Schema.Schema<PropertySchema> = Schema.Struct({
  type: Schema.optional(Schema.Union(Schema.String, Schema.Array(Schema.String))),
  format: Schema.optional(Schema.String),
  properties: Schema.optional(
    Schema.Record({
      key: Schema.String,
      value: Schema.suspend((): Schema.Schema<PropertySchema> => PropertySchema),
    })
  ),
  additionalProperties: Schema.optional(Schema.Boolean),
});

export const Inclusion = Schema.Literal("automatic", "available", "unsupported");
export type Inclusion = typeof Inclusion.Type;

export const FieldMetadata = Schema.Struct({
  inclusion: Inclusion,
  selectedByDefault: Schema.optional(Schema.Boolean),
  selected: Schema.optional(Schema.Boolean),
  unsupportedDescription: Schema.optional(Schema.String),
});
export type FieldMetadata = typeof FieldMetadata.Type;

export const CatalogEntry = Schema.Struct({
  streamId: Schema.NonEmptyTrimmedString,
  displayName: Schema.NonEmptyTrimmedString,
  selected: Schema.optional(Schema.Boolean),
  schema: PropertySchema,
  keyProperties: Schema.Array(Schema.String),
  replicationKey: Schema.optional(Schema.String),
  sourceColumnTypes: Schema.Record({ key: Schema.String, value: Schema.String }),
  fields: Schema.Record({ key: Schema.String, value: FieldMetadata }),
});
export type CatalogEntry = typeof CatalogEntry.Type;

export const Catalog = Schema.Struct({
  streams: Schema.Array(CatalogEntry),
});
export type Catalog = typeof Catalog.Type;

/**
 * Immutable per-run view of a selected stream.
 */
export interface StreamDescriptor {
  readonly streamId: string;
  readonly displayName: string;
  readonly schema: PropertySchema;
  readonly selectedFields: ReadonlyArray<string>;
  readonly replicationKey?: string;
  readonly keyProperties: ReadonlyArray<string>;
  readonly sourceColumnTypes: Readonly<Record<string, string>>;
}

export const shouldSyncField = (
  field: FieldMetadata | undefined,
  selectFieldsByDefault: boolean
): boolean => {
  if (field?.inclusion === "automatic") return true;
  if (field?.inclusion === "unsupported") return false;
  return field?.selected ?? selectFieldsByDefault;
};

export const toStreamDescriptor = (
  entry: CatalogEntry,
  selectFieldsByDefault: boolean
): StreamDescriptor => ({
  streamId: entry.streamId,
  displayName: entry.displayName,
  schema: entry.schema,
  selectedFields: Object.keys(entry.schema.properties ?? {}).filter((name) =>
    shouldSyncField(entry.fields[name], selectFieldsByDefault)
  ),
  ...(entry.replicationKey !== undefined && { replicationKey: entry.replicationKey }),
  keyProperties: entry.keyProperties,
  sourceColumnTypes: entry.sourceColumnTypes,
});

export const selectedStreams = (
  catalog: Catalog,
  selectFieldsByDefault: boolean
): ReadonlyArray<StreamDescriptor> =>
  catalog.streams
    .filter((entry) => entry.selected === true)
    .map((entry) => toStreamDescriptor(entry, selectFieldsByDefault));

export const decodeCatalog = (content: string): Effect.Effect<Catalog, CatalogError> =>
  Schema.decodeUnknown(Schema.parseJson(Catalog))(content).pipe(
    Effect.mapError(
      (e) => new CatalogError({ message: `Invalid catalog - ${e.message}`, cause: e })
    )
  );

export const loadCatalog = (path: string): Effect.Effect<Catalog, CatalogError> =>
  Effect.tryPromise({
    try: async () => await NodeFs.readFile(path, "utf-8"),
    catch: (error) =>
      new CatalogError({
        message: errorMessage(error, `Failed to read catalog file ${path}`),
        cause: error,
      }),
  }).pipe(Effect.flatMap(decodeCatalog));
