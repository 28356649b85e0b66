import { Effect, Schema } from "effect";
import type { ApiType } from "../config";
import { CatalogError, ClassifiedError, UnsupportedTypeError } from "../core/errors";
import type { CatalogEntry, FieldMetadata, Inclusion, PropertySchema } from "./catalog";
import unsupported from "./unsupported-objects.json";

export const DescribeField = Schema.Struct({
  name: Schema.String,
  type: Schema.String,
});
export type DescribeField = typeof DescribeField.Type;

export const ObjectDescription = Schema.Struct({
  name: Schema.String,
  fields: Schema.Array(DescribeField),
});
export type ObjectDescription = typeof ObjectDescription.Type;

const STRING_TYPES = new Set([
  "id",
  "string",
  "picklist",
  "textarea",
  "phone",
  "url",
  "reference",
  "multipicklist",
  "combobox",
  "encryptedstring",
  "email",
  "complexvalue",
  "masterrecord",
  "datacategorygroupreference",
  "time",
  "json",
]);

const DATE_TYPES = new Set(["date", "datetime"]);
const NUMBER_TYPES = new Set(["double", "percent"]);
const INTEGER_TYPES = new Set(["int", "long"]);
// calculated fields take the type of their formula
const LOOSE_TYPES = new Set(["anyType", "calculated"]);
const BINARY_TYPES = new Set(["base64", "byte"]);
// nillable cannot be trusted, so everything else is widened with null
const NOT_WIDENED = new Set(["location", "date", "datetime", "currency"]);

const nullable = (type: string): PropertySchema => ({ type: ["null", type] });

const typedProperty = (sourceType: string): PropertySchema | undefined => {
  if (STRING_TYPES.has(sourceType)) return { type: "string" };
  if (DATE_TYPES.has(sourceType)) return { type: ["string", "null"], format: "date-time" };
  if (NUMBER_TYPES.has(sourceType)) return { type: "number" };
  if (INTEGER_TYPES.has(sourceType)) return { type: "integer" };
  switch (sourceType) {
    case "boolean":
      return { type: "boolean" };
    // multi-currency orgs prefix the ISO code
    case "currency":
      return { type: ["number", "string", "null"] };
    case "address":
      return {
        type: "object",
        properties: {
          street: nullable("string"),
          state: nullable("string"),
          postalCode: nullable("string"),
          city: nullable("string"),
          country: nullable("string"),
          longitude: nullable("number"),
          latitude: nullable("number"),
          geocodeAccuracy: nullable("string"),
        },
      };
    case "location":
      return {
        type: ["number", "object", "null"],
        properties: { longitude: nullable("number"), latitude: nullable("number") },
      };
    default:
      return undefined;
  }
};

export interface FieldMapping {
  readonly property: PropertySchema;
  readonly unsupportedDescription?: string;
}

export const hasSchemaMapping = (sourceType: string): boolean =>
  LOOSE_TYPES.has(sourceType) ||
  BINARY_TYPES.has(sourceType) ||
  typedProperty(sourceType) !== undefined;

/**
 * Maps a described field to its JSON-schema property. Report cells show
 * percentages with their `%` sign, so report percent columns are text.
 */
export const fieldToPropertySchema = (
  field: DescribeField,
  options: { readonly report?: boolean } = {}
): Effect.Effect<FieldMapping, UnsupportedTypeError> =>
  Effect.gen(function* () {
    if (LOOSE_TYPES.has(field.type)) {
      return { property: {} };
    }
    if (BINARY_TYPES.has(field.type)) {
      return { property: {}, unsupportedDescription: "binary data" };
    }

    const property =
      options.report === true && field.type === "percent"
        ? { type: "string" }
        : typedProperty(field.type);
    if (property === undefined) {
      return yield* Effect.fail(
        new UnsupportedTypeError({
          message: `Found unsupported type: ${field.type}`,
          field: field.name,
          sourceType: field.type,
        })
      );
    }

    const widen = field.name !== "Id" && !NOT_WIDENED.has(field.type);
    if (widen && typeof property.type === "string") {
      return { property: { ...property, type: ["null", property.type] } };
    }
    return { property };
  });

const FORCED_FULL_TABLE = new Set(unsupported.forcedFullTable);
const REPLICATION_KEYS = ["SystemModstamp", "LastModifiedDate", "CreatedDate"];

export const replicationKeyFor = (
  objectName: string,
  fields: ReadonlyArray<DescribeField>
): string | undefined => {
  if (FORCED_FULL_TABLE.has(objectName)) return undefined;
  const names = new Set(fields.map((f) => f.name));
  const key = REPLICATION_KEYS.find((candidate) => names.has(candidate));
  if (key !== undefined) return key;
  return objectName === "LoginHistory" && names.has("LoginTime") ? "LoginTime" : undefined;
};

export const unsupportedObjects = (apiType: ApiType): ReadonlySet<string> =>
  new Set(
    apiType === "BULK"
      ? [
          ...unsupported.bulkUnsupported,
          ...unsupported.queryRestricted,
          ...unsupported.queryIncompatible,
        ]
      : [...unsupported.queryRestricted, ...unsupported.queryIncompatible]
  );

const unsupportedFields = (apiType: ApiType): Readonly<Record<string, string>> =>
  apiType === "BULK" ? unsupported.bulkUnsupportedFields : {};

export interface DiscoverOptions {
  readonly apiType: ApiType;
  readonly selectFieldsByDefault: boolean;
}

/**
 * Builds the catalog entry of a described object. Field-level problems
 * are recorded as unsupported metadata instead of failing discovery.
 */
export const describeToCatalogEntry = (
  description: ObjectDescription,
  options: DiscoverOptions
): Effect.Effect<CatalogEntry, ClassifiedError | CatalogError> =>
  Effect.gen(function* () {
    const objectName = description.name;

    // change events cannot be queried through either API
    if (
      unsupportedObjects(options.apiType).has(objectName) ||
      objectName.endsWith("ChangeEvent")
    ) {
      return yield* Effect.fail(
        new ClassifiedError({
          message: `Getting requested object is not supported: ${objectName}`,
          code: "salesforce.UnsupportedObject",
          details: { object: objectName, apiType: options.apiType },
        })
      );
    }

    if (!description.fields.some((f) => f.name === "Id")) {
      return yield* Effect.fail(
        new CatalogError({
          message: `Skipping Salesforce Object ${objectName}, as it has no Id field`,
        })
      );
    }

    const replicationKey = replicationKeyFor(objectName, description.fields);
    const blacklistedFields = unsupportedFields(options.apiType);
    const properties: Record<string, PropertySchema> = {};
    const sourceColumnTypes: Record<string, string> = {};
    const fields: Record<string, FieldMetadata> = {};

    for (const field of description.fields) {
      sourceColumnTypes[field.name] = field.type;

      if (options.apiType === "BULK" && (field.type === "address" || field.type === "location")) {
        continue;
      }

      const mapping = yield* fieldToPropertySchema(field).pipe(
        Effect.catchTag("UnsupportedTypeError", (e) =>
          Effect.logWarning(`${objectName}.${field.name}: ${e.message}`).pipe(
            Effect.as<FieldMapping>({
              property: {},
              unsupportedDescription: `unsupported type: ${e.sourceType}`,
            })
          )
        )
      );

      const unsupportedDescription =
        blacklistedFields[`${objectName}.${field.name}`] ??
        (field.type === "json"
          ? "do not currently support json fields - please contact support"
          : mapping.unsupportedDescription);

      const inclusion: Inclusion =
        unsupportedDescription !== undefined
          ? "unsupported"
          : field.name === "Id" || field.name === replicationKey
            ? "automatic"
            : "available";

      properties[field.name] = mapping.property;
      fields[field.name] = {
        inclusion,
        selectedByDefault: options.selectFieldsByDefault && inclusion !== "unsupported",
        ...(unsupportedDescription !== undefined && { unsupportedDescription }),
      };
    }

    const unsupportedNames = Object.keys(fields).filter(
      (name) => fields[name]?.inclusion === "unsupported"
    );
    if (unsupportedNames.length > 0) {
      yield* Effect.logInfo(
        `Not syncing the following unsupported fields for object ${objectName}: ` +
          unsupportedNames.sort().join(", ")
      );
    }

    return {
      streamId: objectName,
      displayName: objectName,
      selected: true,
      schema: { type: "object", additionalProperties: false, properties },
      keyProperties: ["Id"],
      ...(replicationKey !== undefined && { replicationKey }),
      sourceColumnTypes,
      fields,
    };
  });
