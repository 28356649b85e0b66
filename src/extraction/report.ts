import { Effect, Layer, Schema } from "effect";
import type { StreamDescriptor } from "../catalog/catalog";
import { currencyCodeColumn } from "../catalog/report";
import { AppConfig } from "../config";
import { CatalogError } from "../core/errors";
import { type DataCell, ReportApi, type ReportRun } from "../salesforce/report";
import { Extraction, type ExtractionRequest, type RawRecord } from "./types";

const isCurrencyAmount = Schema.is(
  Schema.Struct({
    amount: Schema.NullOr(Schema.Number),
    currency: Schema.NullOr(Schema.String),
  })
);

const cellValue = (cell: DataCell | undefined, sourceType: string | undefined): unknown => {
  if (cell === undefined) return null;
  const { value, label } = cell;
  if (value === null) return null;
  // the label carries the % sign
  if (sourceType === "percent" || value === undefined) return label ?? null;
  if (typeof value === "string" || typeof value === "number" || typeof value === "boolean") {
    return value;
  }
  return label ?? null;
};

/**
 * Detail rows of a report run as records keyed by column name, limited to
 * the stream's selected fields. Currency cells fill two columns: the
 * amount and its ISO code.
 */
export const reportRecords = (
  run: ReportRun,
  stream: Pick<StreamDescriptor, "selectedFields" | "sourceColumnTypes">
): ReadonlyArray<RawRecord> => {
  const selected = new Set(stream.selectedFields);
  const columns = run.reportMetadata.detailColumns;
  // tabular reports keep their rows under T!T, grouped ones under one key per group
  const rows = Object.entries(run.factMap)
    .filter(([key]) => key.endsWith("!T"))
    .flatMap(([, fact]) => fact.rows ?? []);

  return rows.map((row) => {
    const record: Record<string, unknown> = {};
    columns.forEach((column, index) => {
      const cell = row.dataCells[index];
      const codeColumn = currencyCodeColumn(column);
      if (cell !== undefined && isCurrencyAmount(cell.value)) {
        if (selected.has(column)) record[column] = cell.value.amount;
        if (selected.has(codeColumn)) record[codeColumn] = cell.value.currency;
        return;
      }
      if (selected.has(column)) {
        record[column] = cellValue(cell, stream.sourceColumnTypes[column]);
      }
    });
    return record;
  });
};

export class ReportExtraction extends Effect.Service<ReportExtraction>()("ReportExtraction", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const api = yield* ReportApi;

    const extract = (request: ExtractionRequest) =>
      Effect.gen(function* () {
        const source = config.sync.source;
        const { streamId } = request.stream;
        if (source.type !== "report" || source.reportId !== streamId) {
          return yield* Effect.fail(
            new CatalogError({
              message: "report_id in the stream should match the report_id in the config",
            })
          );
        }

        yield* Effect.logInfo(`Syncing Salesforce report data for stream ${streamId}`);
        const run = yield* api.run(source.reportId);
        if (!run.allData) {
          yield* Effect.logWarning(
            `Report ${streamId} returned part of its rows; ` +
              "a synchronous run stops at 2,000 detail rows"
          );
        }
        for (const record of reportRecords(run, request.stream)) {
          yield* request.onRecord(record);
        }
      });

    return { extract };
  }),
  dependencies: [ReportApi.Default],
}) {}

export const ReportExtractionLive = Layer.effect(
  Extraction,
  Effect.map(ReportExtraction, (report) => Extraction.of({ extract: report.extract }))
);
