/**
 * CRM Incremental Extractor
 *
 * Replicates Salesforce objects and reports incrementally, resuming
 * interrupted bulk jobs from the persisted state.
 */

import { ConfigError, Console, Effect, Exit, Layer, Option } from "effect";
import { loadCatalog } from "./catalog/catalog";
import { describeToCatalogEntry } from "./catalog/mapper";
import { reportToCatalogEntry } from "./catalog/report";
import { AppConfig, DEFAULT_END_MARKER, DEFAULT_START_MARKER, ReportConfig } from "./config";
import { CatalogError, errorMessage, SyncError } from "./core/errors";
import { LoggerLive } from "./core/logger";
import { exitCodeFor, reportFailure, type RunFailure } from "./error/report";
import { BulkJobMachine } from "./extraction/bulk";
import { ExtractionLive } from "./extraction/live";
import { ReportExtraction } from "./extraction/report";
import { RestExtraction } from "./extraction/rest";
import { SalesforceClient } from "./salesforce/client";
import { QuotaGovernor } from "./salesforce/quota";
import { ReportApi } from "./salesforce/report";
import { startTokenRefresh } from "./scheduler/refresh";
import { SinkLive } from "./sink/sink";
import { Checkpoint } from "./state/checkpoint";
import { FileStateStoreLive } from "./state/store";
import { SyncService } from "./sync/sync";

const CheckpointLive = Checkpoint.Default.pipe(
  Layer.provideMerge(Layer.mergeAll(FileStateStoreLive, SinkLive))
);

const ExtractorsLive = Layer.mergeAll(
  BulkJobMachine.Default,
  RestExtraction.Default,
  ReportExtraction.Default,
  SalesforceClient.Default,
  QuotaGovernor.Default
).pipe(Layer.provideMerge(CheckpointLive));

const SyncLive = SyncService.Default.pipe(
  Layer.provideMerge(ExtractionLive.pipe(Layer.provideMerge(ExtractorsLive)))
);

const discoverObject = (config: AppConfig) =>
  Effect.gen(function* () {
    const objectName = yield* Option.match(config.sync.objectName, {
      onNone: () =>
        Effect.fail(new CatalogError({ message: "OBJECT_NAME is required in discover mode" })),
      onSome: Effect.succeed,
    });
    const client = yield* SalesforceClient;
    const description = yield* client.describe(objectName);
    return yield* describeToCatalogEntry(description, {
      apiType: config.sync.apiType,
      selectFieldsByDefault: config.sync.selectFieldsByDefault,
    });
  }).pipe(Effect.provide(SalesforceClient.Default));

const discoverReport = (config: AppConfig, reportId: string) =>
  Effect.gen(function* () {
    const reports = yield* ReportApi;
    const description = yield* reports.describe(reportId);
    return yield* reportToCatalogEntry(reportId, description, {
      apiType: config.sync.apiType,
      selectFieldsByDefault: config.sync.selectFieldsByDefault,
    });
  }).pipe(Effect.provide(ReportApi.Default));

const discover = (config: AppConfig) =>
  Effect.gen(function* () {
    const source = config.sync.source;
    const entry = yield* source.type === "report"
      ? discoverReport(config, source.reportId)
      : discoverObject(config);
    yield* Console.log(JSON.stringify({ streams: [entry] }, null, 2));
  });

const sync = (config: AppConfig) =>
  Effect.gen(function* () {
    const client = yield* SalesforceClient;
    const quota = yield* QuotaGovernor;
    const syncService = yield* SyncService;

    yield* client.login;
    yield* startTokenRefresh();

    const catalog = yield* loadCatalog(config.sync.catalogPath);
    const summary = yield* syncService.run(catalog).pipe(
      Effect.ensuring(
        quota.usage.pipe(
          Effect.flatMap(({ restCalls, bulkJobs }) =>
            Effect.logDebug(
              `This run used ${restCalls} REST requests and ${bulkJobs} Bulk API jobs`
            )
          )
        )
      )
    );
    yield* Effect.logInfo(
      `Replicated ${summary.streams.length} streams in ${summary.durationMs}ms`
    );
  }).pipe(Effect.scoped, Effect.provide(SyncLive));

const reportSettings = ReportConfig.pipe(
  Effect.orElseSucceed(() => ({
    errorFilePath: Option.none<string>(),
    startMarker: DEFAULT_START_MARKER,
    endMarker: DEFAULT_END_MARKER,
  }))
);

const toRunFailure = (error: RunFailure | ConfigError.ConfigError): RunFailure =>
  ConfigError.isConfigError(error)
    ? new SyncError({ message: `Invalid configuration - ${String(error)}` })
    : error;

const fail = (failure: RunFailure) =>
  reportSettings.pipe(
    Effect.flatMap((settings) => reportFailure(failure, settings)),
    Effect.as(exitCodeFor(failure))
  );

const program = Effect.gen(function* () {
  const config = yield* AppConfig;
  yield* config.sync.runMode === "discover" ? discover(config) : sync(config);
  return 0;
}).pipe(
  Effect.catchAll((error) => fail(toRunFailure(error))),
  Effect.catchAllDefect((defect) =>
    fail(new SyncError({ message: errorMessage(defect, String(defect)) }))
  ),
  Effect.provide(LoggerLive.pipe(Layer.orElse(() => Layer.empty)))
);

void Effect.runPromiseExit(program).then((exit) => {
  process.exitCode = Exit.match(exit, { onFailure: () => 1, onSuccess: (code) => code });
});
