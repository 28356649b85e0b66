import { Effect, Schema } from "effect";
import type { CatalogEntry, FieldMetadata, Inclusion, PropertySchema } from "./catalog";
import { type DiscoverOptions, type FieldMapping, fieldToPropertySchema } from "./mapper";

export const ReportColumn = Schema.Struct({
  label: Schema.String,
  dataType: Schema.String,
});
export type ReportColumn = typeof ReportColumn.Type;

export const ReportDescription = Schema.Struct({
  attributes: Schema.Struct({ reportName: Schema.String }),
  reportExtendedMetadata: Schema.Struct({
    detailColumnInfo: Schema.Record({ key: Schema.String, value: ReportColumn }),
  }),
});
export type ReportDescription = typeof ReportDescription.Type;

/** Column holding the ISO code that goes with a currency column. */
export const currencyCodeColumn = (column: string): string => `${column} Currency`;

/**
 * Builds the catalog entry of a described report. Reports have no key and
 * no replication key, so every run replaces the stream.
 */
export const reportToCatalogEntry = (
  reportId: string,
  description: ReportDescription,
  options: DiscoverOptions
): Effect.Effect<CatalogEntry> =>
  Effect.gen(function* () {
    const reportName = description.attributes.reportName;
    const properties: Record<string, PropertySchema> = {};
    const sourceColumnTypes: Record<string, string> = {};
    const fields: Record<string, FieldMetadata> = {};

    const addField = (name: string, unsupportedDescription: string | undefined) => {
      const inclusion: Inclusion =
        unsupportedDescription === undefined ? "available" : "unsupported";
      fields[name] = {
        inclusion,
        selectedByDefault: options.selectFieldsByDefault && inclusion !== "unsupported",
        ...(unsupportedDescription !== undefined && { unsupportedDescription }),
      };
    };

    for (const [name, column] of Object.entries(
      description.reportExtendedMetadata.detailColumnInfo
    )) {
      if (
        options.apiType === "BULK" &&
        (column.dataType === "address" || column.dataType === "location")
      ) {
        continue;
      }

      const mapping = yield* fieldToPropertySchema(
        { name, type: column.dataType },
        { report: true }
      ).pipe(
        Effect.catchTag("UnsupportedTypeError", (e) =>
          Effect.logWarning(`Report ${reportId} column ${name}: ${e.message}`).pipe(
            Effect.as<FieldMapping>({
              property: {},
              unsupportedDescription: `unsupported type: ${e.sourceType}`,
            })
          )
        )
      );

      if (column.dataType === "currency") {
        const codeColumn = currencyCodeColumn(name);
        properties[codeColumn] = { type: ["string", "null"] };
        sourceColumnTypes[codeColumn] = "string";
        addField(codeColumn, undefined);
      }

      properties[name] = mapping.property;
      sourceColumnTypes[name] = column.dataType;
      addField(
        name,
        column.dataType === "json"
          ? "do not currently support json fields - please contact support"
          : mapping.unsupportedDescription
      );
    }

    const unsupportedNames = Object.keys(fields).filter(
      (name) => fields[name]?.inclusion === "unsupported"
    );
    if (unsupportedNames.length > 0) {
      yield* Effect.logInfo(
        `Not syncing the following unsupported fields for report ${reportId}: ` +
          unsupportedNames.sort().join(", ")
      );
    }

    return {
      streamId: reportId,
      displayName: reportName,
      selected: true,
      schema: { type: "object", additionalProperties: false, properties },
      keyProperties: [],
      sourceColumnTypes,
      fields,
    };
  });
