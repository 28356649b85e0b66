import { Effect, Option, Ref } from "effect";
import { AppConfig } from "../config";
import { QuotaExceededError } from "../core/errors";

export interface QuotaSnapshot {
  readonly used: number;
  readonly allotted: number;
}

export interface QuotaLimits {
  readonly percentPerRun: number;
  readonly percentTotal: number;
}

export interface BulkLimits {
  readonly max: number;
  readonly remaining: number;
}

const USAGE_HEADER = /^api-usage=(\d+)\/(\d+)$/;

/**
 * Parses `Sforce-Limit-Info: api-usage=<used>/<allotted>`.
 */
export const parseUsageHeader = (header: string | undefined): Option.Option<QuotaSnapshot> => {
  const match = header === undefined ? null : USAGE_HEADER.exec(header.trim());
  if (match === null) return Option.none();
  const allotted = Number(match[2]);
  if (allotted <= 0) return Option.none();
  return Option.some({ used: Number(match[1]), allotted });
};

export const maxCallsForRun = (allotted: number, percentPerRun: number): number =>
  Math.floor((percentPerRun * allotted) / 100);

const pct = (value: number): string => value.toFixed(2);

/**
 * REST quota. The total limit is checked before the per-run limit.
 */
export const checkRestQuota = (
  snapshot: QuotaSnapshot,
  callsThisRun: number,
  limits: QuotaLimits
): Effect.Effect<void, QuotaExceededError> => {
  const percentUsed = (snapshot.used / snapshot.allotted) * 100;
  if (percentUsed > limits.percentTotal) {
    return Effect.fail(
      new QuotaExceededError({
        message:
          `Salesforce has reported ${snapshot.used}/${snapshot.allotted} (${pct(percentUsed)}%) ` +
          "total REST quota used across all Salesforce Applications. Terminating replication " +
          `to not continue past the configured percentage of ${limits.percentTotal}% total quota.`,
      })
    );
  }
  if (callsThisRun > maxCallsForRun(snapshot.allotted, limits.percentPerRun)) {
    return Effect.fail(
      new QuotaExceededError({
        message:
          `This replication job has made ${callsThisRun} REST requests ` +
          `(${pct((callsThisRun / snapshot.allotted) * 100)}% of total quota). Terminating ` +
          `replication due to allotted quota of ${limits.percentPerRun}% per replication.`,
      })
    );
  }
  return Effect.void;
};

/**
 * Bulk quota, read from the daily batch limits before each job.
 */
export const checkBulkQuota = (
  limits: BulkLimits,
  jobsThisRun: number,
  quota: QuotaLimits
): Effect.Effect<void, QuotaExceededError> => {
  if (limits.max <= 0) return Effect.void;
  const used = limits.max - limits.remaining;
  const percentUsed = (used / limits.max) * 100;
  if (percentUsed > quota.percentTotal) {
    return Effect.fail(
      new QuotaExceededError({
        message:
          `Salesforce has reported ${used}/${limits.max} (${pct(percentUsed)}%) ` +
          "total Bulk API quota used across all Salesforce Applications. Terminating replication " +
          `to not continue past the configured percentage of ${quota.percentTotal}% total quota.`,
      })
    );
  }
  if (jobsThisRun > maxCallsForRun(limits.max, quota.percentPerRun)) {
    return Effect.fail(
      new QuotaExceededError({
        message:
          `This replication job has completed ${jobsThisRun} Bulk API jobs ` +
          `(${pct((jobsThisRun / limits.max) * 100)}% of total quota). Terminating ` +
          `replication due to allotted quota of ${quota.percentPerRun}% per replication.`,
      })
    );
  }
  return Effect.void;
};

/**
 * Run-scoped quota accounting. Counters live in the service instance, so
 * every run starts from zero.
 */
export class QuotaGovernor extends Effect.Service<QuotaGovernor>()("QuotaGovernor", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const restCalls = yield* Ref.make(0);
    const bulkJobs = yield* Ref.make(0);

    /** Counts an outbound call. Runs before the response is inspected. */
    const recordCall = Ref.update(restCalls, (n) => n + 1);

    const inspect = (header: string | undefined) =>
      Effect.gen(function* () {
        const snapshot = parseUsageHeader(header);
        if (Option.isNone(snapshot)) return;
        const { used, allotted } = snapshot.value;
        yield* Effect.logDebug(`Used ${used} of ${allotted} daily REST API quota`);
        yield* checkRestQuota(snapshot.value, yield* Ref.get(restCalls), config.quota);
      });

    const checkBulk = (limits: BulkLimits) =>
      Ref.get(bulkJobs).pipe(
        Effect.flatMap((jobs) => checkBulkQuota(limits, jobs, config.quota))
      );

    const jobCompleted = Ref.update(bulkJobs, (n) => n + 1);

    const usage = Effect.all({ restCalls: Ref.get(restCalls), bulkJobs: Ref.get(bulkJobs) });

    return { recordCall, inspect, checkBulk, jobCompleted, usage };
  }),
  dependencies: [],
}) {}
