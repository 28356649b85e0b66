import * as NodeFs from "node:fs/promises";
import { Effect, Option } from "effect";
import type { ReportConfig } from "../config";
import { errorMessage } from "../core/errors";

export interface ErrorReport {
  readonly message: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;
}

/**
 * Any tagged failure that reaches the run boundary.
 */
export interface RunFailure {
  readonly _tag: string;
  readonly message: string;
  readonly code?: string;
  readonly details?: Record<string, unknown>;
}

export const toErrorReport = (error: RunFailure): ErrorReport => ({
  message: error.message,
  ...(error.code !== undefined && { code: error.code }),
  ...(error.details !== undefined && { details: error.details }),
});

export const exitCodeFor = (error: RunFailure): number =>
  error._tag === "QuotaExceededError" ? 2 : 1;

export const formatReportLine = (report: ErrorReport, settings: ReportConfig): string =>
  `${settings.startMarker}${JSON.stringify(report)}${settings.endMarker}`;

const writeReportFile = (path: string, report: ErrorReport) =>
  Effect.tryPromise({
    try: async () => await NodeFs.writeFile(path, JSON.stringify(report), "utf-8"),
    catch: (error) => error,
  }).pipe(
    Effect.catchAll((error) =>
      Effect.logWarning(
        `Could not write error file ${path}: ${errorMessage(error, "unknown error")}`
      )
    )
  );

/**
 * Records a failed run: written to the error file when one is configured
 * and always logged between the markers, since the file may be lost.
 */
export const reportFailure = (error: RunFailure, settings: ReportConfig) =>
  Effect.gen(function* () {
    const report = toErrorReport(error);
    if (Option.isSome(settings.errorFilePath)) {
      yield* writeReportFile(settings.errorFilePath.value, report);
    }
    yield* Effect.logError(error.message);
    yield* Effect.logInfo(formatReportLine(report, settings));
    return report;
  });
