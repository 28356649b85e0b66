import { Config, ConfigError, Either, Option, Schema } from "effect";
import { parseInstant } from "./core/time";
import { FilterNode } from "./query/filter";

export type ApiType = "BULK" | "REST";
export type RunMode = "sync" | "discover";

/**
 * What a run reads: described objects queried with SOQL, or a single
 * analytics report.
 */
export type Source =
  | { readonly type: "object" }
  | { readonly type: "report"; readonly reportId: string };

/**
 * Percent settings fall back to their default when blank.
 */
const percent = (name: string, fallback: number) =>
  Config.string(name).pipe(
    Config.withDefault(""),
    Config.mapOrFail((value) => {
      const trimmed = value.trim();
      if (trimmed === "") return Either.right(fallback);
      const parsed = Number(trimmed);
      return Number.isFinite(parsed)
        ? Either.right(parsed)
        : Either.left(ConfigError.InvalidData([name], `Expected a number but received ${value}`));
    })
  );

const filters = Config.string("FILTERS").pipe(
  Config.withDefault(""),
  Config.mapOrFail((value) => {
    if (value.trim() === "") return Either.right(Option.none<FilterNode>());
    return Schema.decodeUnknownEither(Schema.parseJson(FilterNode))(value).pipe(
      Either.map(Option.some),
      Either.mapLeft((e) =>
        ConfigError.InvalidData(["FILTERS"], `Invalid filter tree - ${e.message}`)
      )
    );
  })
);

const source = Config.all({
  type: Config.literal("object", "report")("SOURCE_TYPE").pipe(
    Config.withDefault<Source["type"]>("object")
  ),
  reportId: Config.option(Config.string("REPORT_ID")),
}).pipe(
  Config.mapOrFail(({ type, reportId }): Either.Either<Source, ConfigError.ConfigError> => {
    if (type === "object") return Either.right({ type });
    return Option.match(reportId, {
      onNone: () =>
        Either.left(
          ConfigError.MissingData(["REPORT_ID"], "Report id is required when source type is report")
        ),
      onSome: (id) => Either.right({ type, reportId: id }),
    });
  })
);

export const DEFAULT_START_MARKER = "[tap_error_start]";
export const DEFAULT_END_MARKER = "[tap_error_end]";

/**
 * Where a failed run leaves its error report. Read on its own as well, so
 * a run with broken settings can still report.
 */
export const ReportConfig = Config.all({
  errorFilePath: Config.option(Config.string("ERROR_FILE_PATH")),
  startMarker: Config.string("ERROR_START_MARKER").pipe(Config.withDefault(DEFAULT_START_MARKER)),
  endMarker: Config.string("ERROR_END_MARKER").pipe(Config.withDefault(DEFAULT_END_MARKER)),
});
export type ReportConfig = Config.Config.Success<typeof ReportConfig>;

export const AppConfig = Config.all({
  salesforce: Config.all({
    clientId: Config.string("SF_CLIENT_ID"),
    clientSecret: Config.redacted("SF_CLIENT_SECRET"),
    refreshToken: Config.redacted("SF_REFRESH_TOKEN"),
    isSandbox: Config.boolean("SF_IS_SANDBOX").pipe(Config.withDefault(false)),
    apiVersion: Config.string("SF_API_VERSION").pipe(Config.withDefault("52.0")),
  }),
  sync: Config.all({
    apiType: Config.string("API_TYPE").pipe(
      Config.map((v) => v.trim().toUpperCase()),
      Config.validate({
        message: "API_TYPE must be BULK or REST",
        validation: (v): v is ApiType => v === "BULK" || v === "REST",
      })
    ),
    startDate: Config.string("START_DATE").pipe(
      Config.mapOrFail((value) =>
        Option.match(parseInstant(value), {
          onNone: () =>
            Either.left(
              ConfigError.InvalidData(
                ["START_DATE"],
                `Expected an ISO-8601 date but received ${value}`
              )
            ),
          onSome: (instant) => Either.right(instant),
        })
      )
    ),
    selectFieldsByDefault: Config.boolean("SELECT_FIELDS_BY_DEFAULT").pipe(
      Config.withDefault(true)
    ),
    filters,
    source,
    catalogPath: Config.string("CATALOG_PATH").pipe(Config.withDefault("catalog.json")),
    statePath: Config.string("STATE_PATH").pipe(Config.withDefault("data/state.json")),
    objectName: Config.option(Config.string("OBJECT_NAME")),
    runMode: Config.literal("sync", "discover")("RUN_MODE").pipe(
      Config.withDefault<RunMode>("sync")
    ),
  }),
  quota: Config.all({
    percentPerRun: percent("QUOTA_PERCENT_PER_RUN", 25),
    percentTotal: percent("QUOTA_PERCENT_TOTAL", 80),
  }),
  bulk: Config.all({
    pollIntervalMs: Config.integer("BULK_POLL_INTERVAL_MS").pipe(Config.withDefault(20_000)),
    maxPollIntervalMs: Config.integer("BULK_MAX_POLL_INTERVAL_MS").pipe(
      Config.withDefault(120_000)
    ),
    pkChunkSize: Config.integer("PK_CHUNK_SIZE").pipe(Config.withDefault(100_000)),
  }),
  http: Config.all({
    retryBaseDelayMs: Config.integer("RETRY_BASE_DELAY_MS").pipe(Config.withDefault(2_000)),
  }),
  report: ReportConfig,
});

export type AppConfig = Config.Config.Success<typeof AppConfig>;
