import { HttpClientRequest } from "@effect/platform";
import { Effect, Schema } from "effect";
import { ReportDescription } from "../catalog/report";
import { SalesforceClient, type Session } from "./client";

const DataCell = Schema.Struct({
  label: Schema.optional(Schema.NullOr(Schema.String)),
  value: Schema.optional(Schema.Unknown),
});
export type DataCell = typeof DataCell.Type;

const ReportRow = Schema.Struct({ dataCells: Schema.Array(DataCell) });

export const ReportRun = Schema.Struct({
  allData: Schema.Boolean,
  factMap: Schema.Record({
    key: Schema.String,
    value: Schema.Struct({ rows: Schema.optional(Schema.Array(ReportRow)) }),
  }),
  reportMetadata: Schema.Struct({ detailColumns: Schema.Array(Schema.String) }),
});
export type ReportRun = typeof ReportRun.Type;

/**
 * Analytics reports API: describe a report and run it synchronously with
 * its detail rows.
 */
export class ReportApi extends Effect.Service<ReportApi>()("ReportApi", {
  effect: Effect.gen(function* () {
    const client = yield* SalesforceClient;

    const get = (path: string, params: Record<string, string> = {}) => (s: Session) =>
      HttpClientRequest.get(client.dataUrl(s, path)).pipe(
        HttpClientRequest.setUrlParams(params),
        HttpClientRequest.bearerToken(s.accessToken),
        HttpClientRequest.acceptJson
      );

    const describe = (reportId: string) =>
      client.requestJson(
        get(`analytics/reports/${reportId}/describe`),
        ReportDescription,
        `Describe report ${reportId}`
      );

    const run = (reportId: string) =>
      client.requestJson(
        get(`analytics/reports/${reportId}`, { includeDetails: "true" }),
        ReportRun,
        `Run report ${reportId}`
      );

    return { describe, run };
  }),
  dependencies: [SalesforceClient.Default],
}) {}
