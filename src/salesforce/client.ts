import {
  FetchHttpClient,
  HttpClient,
  type HttpClientError,
  HttpClientRequest,
  type HttpClientResponse,
} from "@effect/platform";
import { Duration, Effect, Option, Redacted, Ref, Schedule, Schema, Stream } from "effect";
import { ObjectDescription } from "../catalog/mapper";
import { AppConfig } from "../config";
import {
  AuthError,
  type QuotaExceededError,
  RemoteApiError,
  TransientNetworkError,
} from "../core/errors";
import { type BulkLimits, QuotaGovernor } from "./quota";

export interface Session {
  readonly accessToken: string;
  readonly instanceUrl: string;
}

export type ApiError = RemoteApiError | TransientNetworkError | QuotaExceededError | AuthError;

const TokenResponse = Schema.Struct({
  access_token: Schema.String,
  instance_url: Schema.String,
});

const LimitsResponse = Schema.Struct({
  DailyBulkApiBatches: Schema.Struct({ Max: Schema.Number, Remaining: Schema.Number }),
});

const REQUEST_TIMEOUT = Duration.minutes(5);
const TIMEOUT_SECONDS = Duration.toSeconds(REQUEST_TIMEOUT);
const MAX_ATTEMPTS = 10;

const loginUrl = (isSandbox: boolean) =>
  isSandbox
    ? "https://test.salesforce.com/services/oauth2/token"
    : "https://login.salesforce.com/services/oauth2/token";

const toTransportError = (
  error: HttpClientError.HttpClientError
): TransientNetworkError | RemoteApiError =>
  error._tag === "RequestError" && error.reason === "Transport"
    ? new TransientNetworkError({ message: error.message, cause: error })
    : new RemoteApiError({ message: error.message, status: 0, body: "" });

export class SalesforceClient extends Effect.Service<SalesforceClient>()("SalesforceClient", {
  effect: Effect.gen(function* () {
    const config = yield* AppConfig;
    const httpClient = yield* HttpClient.HttpClient;
    const quota = yield* QuotaGovernor;
    const session = yield* Ref.make(Option.none<Session>());
    const apiVersion = config.salesforce.apiVersion;

    const retryPolicy = {
      while: (e: ApiError) => e._tag === "TransientNetworkError",
      times: MAX_ATTEMPTS - 1,
      schedule: Schedule.exponential(Duration.millis(config.http.retryBaseDelayMs)),
    };

    const transmit = (request: HttpClientRequest.HttpClientRequest) =>
      httpClient.execute(request).pipe(
        Effect.timeoutFail({
          duration: REQUEST_TIMEOUT,
          onTimeout: () =>
            new TransientNetworkError({
              message: `Took longer than ${TIMEOUT_SECONDS} seconds to hear from the server`,
            }),
        }),
        Effect.mapError((e) => (e._tag === "TransientNetworkError" ? e : toTransportError(e))),
        Effect.tapError((e) =>
          e._tag === "TransientNetworkError"
            ? Effect.logWarning(`Connection problem for ${request.url}: ${e.message}`)
            : Effect.void
        )
      );

    /** Counted against the run's quota, then inspected for the usage header. */
    const exchange = (request: HttpClientRequest.HttpClientRequest) =>
      quota.recordCall.pipe(
        Effect.zipRight(transmit(request)),
        Effect.retry(retryPolicy),
        Effect.tap((response) => quota.inspect(response.headers["sforce-limit-info"]))
      );

    const ensureOk = (response: HttpClientResponse.HttpClientResponse, context: string) =>
      Effect.gen(function* () {
        if (response.status >= 200 && response.status < 300) {
          return response;
        }
        const body = yield* response.text.pipe(Effect.orElseSucceed(() => ""));
        return yield* Effect.fail(
          new RemoteApiError({
            message: `${context}: ${response.status} - ${body}`,
            status: response.status,
            body,
          })
        );
      });

    const login: Effect.Effect<Session, AuthError> = Effect.gen(function* () {
      yield* Effect.logInfo("Attempting login via OAuth2");
      const request = HttpClientRequest.post(loginUrl(config.salesforce.isSandbox)).pipe(
        HttpClientRequest.acceptJson,
        HttpClientRequest.bodyUrlParams({
          grant_type: "refresh_token",
          client_id: config.salesforce.clientId,
          client_secret: Redacted.value(config.salesforce.clientSecret),
          refresh_token: Redacted.value(config.salesforce.refreshToken),
        })
      );

      const response = yield* transmit(request).pipe(
        Effect.retry(retryPolicy),
        Effect.flatMap((res) => ensureOk(res, "OAuth2 login failed"))
      );
      const text = yield* response.text.pipe(
        Effect.mapError(
          (e) => new AuthError({ message: "Failed to read login response", cause: e })
        )
      );
      const token = yield* Schema.decodeUnknown(Schema.parseJson(TokenResponse))(text).pipe(
        Effect.mapError(
          (e) => new AuthError({ message: `Invalid login response - ${e.message}`, cause: e })
        )
      );

      const next: Session = { accessToken: token.access_token, instanceUrl: token.instance_url };
      yield* Ref.set(session, Option.some(next));
      yield* Effect.logInfo("OAuth2 login successful");
      return next;
    }).pipe(
      Effect.catchTags({
        RemoteApiError: (e) =>
          Effect.fail(
            new AuthError({
              message: `${e.message}, Response from Salesforce: ${e.body}`,
              cause: e,
            })
          ),
        TransientNetworkError: (e) => Effect.fail(new AuthError({ message: e.message, cause: e })),
      })
    );

    const currentSession = Ref.get(session).pipe(
      Effect.flatMap(Option.match({ onNone: () => login, onSome: (s) => Effect.succeed(s) }))
    );

    /**
     * Sends a request built from the live session. An expired token gets
     * one fresh login and one replay.
     */
    const request = (
      build: (session: Session) => HttpClientRequest.HttpClientRequest,
      context: string
    ): Effect.Effect<HttpClientResponse.HttpClientResponse, ApiError> =>
      Effect.gen(function* () {
        const first = yield* exchange(build(yield* currentSession));
        if (first.status !== 401) {
          return yield* ensureOk(first, context);
        }
        yield* Effect.logInfo(`${context}: session expired, logging in again`);
        const retried = yield* exchange(build(yield* login));
        return yield* ensureOk(retried, context);
      });

    const requestJson = <A, I>(
      build: (session: Session) => HttpClientRequest.HttpClientRequest,
      schema: Schema.Schema<A, I>,
      context: string
    ): Effect.Effect<A, ApiError> =>
      Effect.gen(function* () {
        const response = yield* request(build, context);
        const body = yield* response.text.pipe(Effect.orElseSucceed(() => ""));
        return yield* Schema.decodeUnknown(Schema.parseJson(schema))(body).pipe(
          Effect.mapError(
            (e) =>
              new RemoteApiError({
                message: `${context}: Invalid response schema - ${e.message}`,
                status: response.status,
                body,
              })
          )
        );
      });

    /**
     * Body of a successful response as it arrives. A connection lost
     * partway through is not retried, since part of the body was consumed.
     */
    const requestStream = (
      build: (session: Session) => HttpClientRequest.HttpClientRequest,
      context: string
    ): Stream.Stream<Uint8Array, ApiError> =>
      Stream.unwrap(
        Effect.map(request(build, context), (response) =>
          response.stream.pipe(
            Stream.mapError(
              (e) =>
                new RemoteApiError({
                  message: `${context}: ${e.message}`,
                  status: response.status,
                  body: "",
                })
            )
          )
        )
      );

    const dataUrl = (s: Session, path: string) =>
      `${s.instanceUrl}/services/data/v${apiVersion}/${path}`;

    const asyncUrl = (s: Session, path: string) =>
      `${s.instanceUrl}/services/async/${apiVersion}/${path}`;

    const restGet = (path: string) => (s: Session) =>
      HttpClientRequest.get(dataUrl(s, path)).pipe(
        HttpClientRequest.bearerToken(s.accessToken),
        HttpClientRequest.acceptJson
      );

    const describe = (objectName: string) =>
      requestJson(
        restGet(`sobjects/${objectName}/describe`),
        ObjectDescription,
        `Describe ${objectName}`
      );

    const bulkLimits: Effect.Effect<BulkLimits, ApiError> = requestJson(
      restGet("limits"),
      LimitsResponse,
      "Read limits"
    ).pipe(
      Effect.map((limits) => ({
        max: limits.DailyBulkApiBatches.Max,
        remaining: limits.DailyBulkApiBatches.Remaining,
      }))
    );

    return {
      login,
      request,
      requestJson,
      requestStream,
      dataUrl,
      asyncUrl,
      describe,
      bulkLimits,
    };
  }),
  dependencies: [QuotaGovernor.Default, FetchHttpClient.layer],
}) {}
