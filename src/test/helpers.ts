import { HttpClient, HttpClientError, HttpClientResponse } from "@effect/platform";
import { Effect, Layer } from "effect";
import { BulkJobMachine } from "../extraction/bulk";
import { ExtractionLive } from "../extraction/live";
import { ReportExtraction } from "../extraction/report";
import { RestExtraction } from "../extraction/rest";
import { BulkApi } from "../salesforce/bulk";
import { SalesforceClient } from "../salesforce/client";
import { QuotaGovernor } from "../salesforce/quota";
import { ReportApi } from "../salesforce/report";
import { Sink, type SinkMessage } from "../sink/sink";
import { Checkpoint } from "../state/checkpoint";
import { emptyState, StateStore, type SyncState } from "../state/store";
import { SyncService } from "../sync/sync";
import { createTestConfig, createTestConfigLayer, type TestConfig } from "./config";

/**
 * Mock response configuration for HttpClient tests.
 */
export interface MockHttpResponse {
  status?: number;
  body?: unknown;
  headers?: Record<string, string>;
}

/**
 * What a mock handler sees of an outgoing request.
 */
export interface MockRequest {
  method: string;
  url: string;
  path: string;
  params: Record<string, string>;
  headers: Record<string, string>;
  body?: string;
}

const decoder = new TextDecoder();

/**
 * Creates a mock HttpClient that returns configured responses.
 * The handler function receives the request and returns the mock response.
 * String bodies are sent as they are, anything else as JSON.
 */
export const createMockHttpClient = (handler: (req: MockRequest) => MockHttpResponse) =>
  HttpClient.make((req, url) =>
    Effect.sync(() => {
      const mockResponse = handler({
        method: req.method,
        url: url.href,
        path: url.pathname,
        params: Object.fromEntries(url.searchParams),
        headers: { ...req.headers },
        ...(req.body._tag === "Uint8Array" && { body: decoder.decode(req.body.body) }),
      });

      const status = mockResponse.status ?? 200;
      const body = mockResponse.body;
      const headers = mockResponse.headers ?? {};
      const responseBody =
        body === undefined ? "" : typeof body === "string" ? body : JSON.stringify(body);
      const response = new Response(responseBody, {
        status,
        headers: { "Content-Type": "application/json", ...headers },
      });

      return HttpClientResponse.fromWeb(req, response);
    })
  );

/**
 * Creates a mock HttpClient that fails with a network-level error.
 * Useful for testing error handling when the HTTP request itself fails.
 */
export const createNetworkErrorHttpClient = (errorMessage: string) =>
  HttpClient.make((req) =>
    Effect.fail(
      new HttpClientError.RequestError({
        request: req,
        reason: "Transport",
        cause: new Error(errorMessage),
      })
    )
  );

export const createMockHttpClientLayer = (handler: (req: MockRequest) => MockHttpResponse) =>
  Layer.succeed(HttpClient.HttpClient, createMockHttpClient(handler));

/**
 * Sink that keeps every emitted message in order. `onEmit` runs after each
 * message is kept.
 */
export const createCaptureSink = (
  onEmit: (message: SinkMessage) => Effect.Effect<void> = () => Effect.void
) => {
  const messages: SinkMessage[] = [];
  const layer = Layer.succeed(Sink, {
    emit: (message) =>
      Effect.sync(() => void messages.push(message)).pipe(Effect.zipRight(onEmit(message))),
  });
  return { messages, layer };
};

/**
 * In-memory state store. `writes` holds every saved state in order.
 */
export const createMemoryStateStore = (initial: SyncState = emptyState) => {
  const writes: SyncState[] = [];
  let current = initial;
  const layer = Layer.succeed(
    StateStore,
    StateStore.of({
      load: () => Effect.sync(() => current),
      save: (state) =>
        Effect.sync(() => {
          current = state;
          writes.push(state);
        }),
    })
  );
  return { writes, current: () => current, layer };
};

/**
 * SalesforceClient over a mock HttpClient, with its QuotaGovernor exposed.
 */
export const createSalesforceTestLayer = (
  handler: (req: MockRequest) => MockHttpResponse,
  config: TestConfig = createTestConfig()
) =>
  SalesforceClient.DefaultWithoutDependencies.pipe(
    Layer.provideMerge(QuotaGovernor.Default),
    Layer.provideMerge(createMockHttpClientLayer(handler)),
    Layer.provide(createTestConfigLayer(config))
  );

/**
 * Everything a sync run needs, over a mock HttpClient and in-memory state.
 */
export const createSyncTestLayer = (options: {
  handler: (req: MockRequest) => MockHttpResponse;
  config?: TestConfig;
  state?: SyncState;
  onEmit?: (message: SinkMessage) => Effect.Effect<void>;
}) => {
  const config = options.config ?? createTestConfig();
  const sink = createCaptureSink(options.onEmit);
  const store = createMemoryStateStore(options.state);

  const client = SalesforceClient.DefaultWithoutDependencies.pipe(
    Layer.provideMerge(QuotaGovernor.Default),
    Layer.provideMerge(createMockHttpClientLayer(options.handler))
  );
  const checkpoint = Checkpoint.Default.pipe(
    Layer.provideMerge(Layer.mergeAll(sink.layer, store.layer))
  );
  const apis = Layer.mergeAll(
    BulkApi.DefaultWithoutDependencies,
    ReportApi.DefaultWithoutDependencies
  ).pipe(Layer.provideMerge(client));
  const machines = Layer.mergeAll(
    BulkJobMachine.DefaultWithoutDependencies,
    RestExtraction.DefaultWithoutDependencies,
    ReportExtraction.DefaultWithoutDependencies
  ).pipe(Layer.provideMerge(apis), Layer.provideMerge(checkpoint));
  const layer = SyncService.Default.pipe(
    Layer.provideMerge(ExtractionLive.pipe(Layer.provideMerge(machines))),
    Layer.provide(createTestConfigLayer(config))
  );

  return { layer, sink, store };
};
