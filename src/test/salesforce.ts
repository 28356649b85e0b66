import type { StreamDescriptor } from "../catalog/catalog";
import type { RawRecord } from "../extraction/types";
import type { MockHttpResponse, MockRequest } from "./helpers";

export const INSTANCE_URL = "https://test.my.salesforce.com";

const DATA = "/services/data/v52.0";
const ASYNC = "/services/async/52.0";

/**
 * Incremental stream keyed on SystemModstamp.
 */
export const accountStream: StreamDescriptor = {
  streamId: "Account",
  displayName: "Account",
  schema: {
    type: "object",
    properties: {
      Id: { type: "string" },
      Name: { type: ["null", "string"] },
      SystemModstamp: { type: ["null", "string"], format: "date-time" },
    },
  },
  selectedFields: ["Id", "Name", "SystemModstamp"],
  replicationKey: "SystemModstamp",
  keyProperties: ["Id"],
  sourceColumnTypes: { Id: "id", Name: "string", SystemModstamp: "datetime" },
};

/**
 * Full-table stream: no replication key.
 */
export const tagStream: StreamDescriptor = {
  streamId: "TopicTag",
  displayName: "TopicTag",
  schema: {
    type: "object",
    properties: {
      Id: { type: "string" },
      Label: { type: ["null", "string"] },
    },
  },
  selectedFields: ["Id", "Label"],
  keyProperties: ["Id"],
  sourceColumnTypes: { Id: "id", Label: "string" },
};

export type FakeBatchState = "Queued" | "InProgress" | "Completed" | "Failed" | "NotProcessed";

export interface FakeBatch {
  readonly id: string;
  readonly state: FakeBatchState;
  readonly stateMessage?: string;
  /** Status reads answered with InProgress before `state` shows. */
  readonly pendingPolls?: number;
  /** One entry per result set. */
  readonly results?: ReadonlyArray<ReadonlyArray<RawRecord>>;
}

export interface FakeJob {
  readonly id: string;
  readonly object: string;
  readonly pkChunking: boolean;
  state: string;
  batches: ReadonlyArray<FakeBatch>;
}

export type QueryAnswer =
  | { readonly pages: ReadonlyArray<ReadonlyArray<RawRecord>> }
  | { readonly error: MockHttpResponse };

export interface FakeSalesforceOptions {
  /** Batches created when a query is added to a new job. */
  readonly batches?: (job: FakeJob, query: string) => ReadonlyArray<FakeBatch>;
  /** Jobs left on the server by an earlier run. */
  readonly existingJobs?: ReadonlyArray<FakeJob>;
  readonly query?: (soql: string) => QueryAnswer;
  readonly usage?: string;
  readonly bulkLimits?: { readonly max: number; readonly remaining: number };
  readonly describe?: Record<string, unknown>;
  /** Report describe and run bodies by report id. */
  readonly reports?: Record<string, { readonly describe?: unknown; readonly run?: unknown }>;
}

const invalidJob = (id: string): MockHttpResponse => ({
  status: 400,
  body: { exceptionCode: "InvalidJob", exceptionMessage: `Invalid job id: ${id}` },
});

const notFound: MockHttpResponse = {
  status: 404,
  body: [{ errorCode: "NOT_FOUND", message: "The requested resource does not exist" }],
};

/**
 * In-process stand-in for the Salesforce login, REST and Bulk endpoints.
 */
export const createFakeSalesforce = (options: FakeSalesforceOptions = {}) => {
  const requests: MockRequest[] = [];
  const jobs = new Map<string, FakeJob>(
    (options.existingJobs ?? []).map((job) => [job.id, job])
  );
  const pending = new Map<string, number>();
  const cursors = new Map<string, ReadonlyArray<ReadonlyArray<RawRecord>>>();
  const queries: string[] = [];
  let logins = 0;
  let jobCount = 0;

  const stateOf = (batch: FakeBatch): FakeBatchState => {
    const left = pending.get(batch.id) ?? batch.pendingPolls ?? 0;
    if (left > 0) {
      pending.set(batch.id, left - 1);
      return "InProgress";
    }
    pending.set(batch.id, 0);
    return batch.state;
  };

  const batchInfo = (jobId: string, batch: FakeBatch) => ({
    id: batch.id,
    jobId,
    state: stateOf(batch),
    ...(batch.stateMessage !== undefined && { stateMessage: batch.stateMessage }),
  });

  const page = (key: string, pages: ReadonlyArray<ReadonlyArray<RawRecord>>, index: number) => {
    const done = index >= pages.length - 1;
    return {
      totalSize: pages.reduce((n, p) => n + p.length, 0),
      done,
      records: pages[index] ?? [],
      ...(!done && { nextRecordsUrl: `${DATA}/query/${key}-${index + 1}` }),
    };
  };

  const bulk = (req: MockRequest, rest: string): MockHttpResponse => {
    if (rest === "job" && req.method === "POST") {
      jobCount += 1;
      const job: FakeJob = {
        id: `750JOB${jobCount}`,
        object: /"object":"([^"]+)"/.exec(req.body ?? "")?.[1] ?? "",
        pkChunking: req.headers["sforce-enable-pkchunking"] !== undefined,
        state: "Open",
        batches: [],
      };
      jobs.set(job.id, job);
      return { body: { id: job.id, object: job.object, state: job.state } };
    }

    const [, jobId = "", section, batchId, resultSection, resultId] = rest.split("/");
    const job = jobs.get(jobId);
    if (job === undefined) return invalidJob(jobId);

    if (section === undefined) {
      if (req.method === "POST") job.state = "Closed";
      return { body: { id: job.id, object: job.object, state: job.state } };
    }
    if (batchId === undefined) {
      if (req.method === "POST") {
        const query = req.body ?? "";
        queries.push(query);
        job.batches = options.batches?.(job, query) ?? [];
        const first = job.batches[0];
        return first === undefined
          ? notFound
          : { body: { id: first.id, jobId: job.id, state: "Queued" } };
      }
      return { body: { batchInfo: job.batches.map((b) => batchInfo(job.id, b)) } };
    }

    const batch = job.batches.find((b) => b.id === batchId);
    if (batch === undefined) return notFound;
    if (resultSection === undefined) return { body: batchInfo(job.id, batch) };
    const results = batch.results ?? [];
    if (resultId === undefined) {
      return { body: results.map((_, i) => `${batch.id}-R${i}`) };
    }
    return { body: results[Number(resultId.split("-R")[1])] ?? [] };
  };

  const handle = (req: MockRequest): MockHttpResponse => {
    if (req.path === "/services/oauth2/token") {
      logins += 1;
      return { body: { access_token: `test-token-${logins}`, instance_url: INSTANCE_URL } };
    }
    if (req.path.startsWith(`${ASYNC}/`)) {
      return bulk(req, req.path.slice(ASYNC.length + 1));
    }
    if (req.path === `${DATA}/limits`) {
      const limits = options.bulkLimits ?? { max: 15000, remaining: 15000 };
      return {
        body: { DailyBulkApiBatches: { Max: limits.max, Remaining: limits.remaining } },
      };
    }
    if (req.path === `${DATA}/queryAll`) {
      const soql = req.params.q ?? "";
      queries.push(soql);
      const answer = options.query?.(soql) ?? { pages: [[]] };
      if ("error" in answer) return answer.error;
      const key = `01gCURSOR${cursors.size + 1}`;
      cursors.set(key, answer.pages);
      return { body: page(key, answer.pages, 0) };
    }
    if (req.path.startsWith(`${DATA}/query/`)) {
      const [key = "", index = "0"] = req.path.slice(`${DATA}/query/`.length).split("-");
      const pages = cursors.get(key);
      return pages === undefined ? notFound : { body: page(key, pages, Number(index)) };
    }
    const report = /^\/services\/data\/v52\.0\/analytics\/reports\/([^/]+)(\/describe)?$/.exec(
      req.path
    );
    if (report !== null) {
      const answers = options.reports?.[report[1] ?? ""];
      const body = report[2] === undefined ? answers?.run : answers?.describe;
      return body === undefined ? notFound : { body };
    }
    const describe = /^\/services\/data\/v52\.0\/sobjects\/([^/]+)\/describe$/.exec(req.path);
    if (describe !== null) {
      const body = options.describe?.[describe[1] ?? ""];
      return body === undefined ? notFound : { body };
    }
    return notFound;
  };

  const handler = (req: MockRequest): MockHttpResponse => {
    requests.push(req);
    const response = handle(req);
    return options.usage === undefined || req.path === "/services/oauth2/token"
      ? response
      : { ...response, headers: { ...response.headers, "Sforce-Limit-Info": options.usage } };
  };

  return { handler, requests, jobs, queries, logins: () => logins };
};
