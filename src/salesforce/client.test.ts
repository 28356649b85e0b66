import { HttpClient, HttpClientError } from "@effect/platform";
import { describe, expect, it } from "@effect/vitest";
import { Effect, Layer } from "effect";
import { createTestConfig, createTestConfigLayer } from "../test/config";
import { createMockHttpClient, createSalesforceTestLayer, type MockRequest } from "../test/helpers";
import { createFakeSalesforce } from "../test/salesforce";
import { SalesforceClient } from "./client";
import { QuotaGovernor } from "./quota";

const accountDescription = {
  name: "Account",
  fields: [
    { name: "Id", type: "id" },
    { name: "Name", type: "string" },
  ],
};

describe("SalesforceClient", () => {
  it.effect("should log in with the refresh token before the first call", () => {
    const fake = createFakeSalesforce({ describe: { Account: accountDescription } });

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      const description = yield* client.describe("Account");

      expect(description.fields.map((f) => f.name)).toEqual(["Id", "Name"]);
      const [login, describeCall] = fake.requests;
      expect(login?.url).toBe("https://login.salesforce.com/services/oauth2/token");
      expect(login?.body).toContain("grant_type=refresh_token");
      expect(login?.body).toContain("client_secret=test-secret");
      expect(describeCall?.url).toBe(
        "https://test.my.salesforce.com/services/data/v52.0/sobjects/Account/describe"
      );
      expect(describeCall?.headers.authorization).toBe("Bearer test-token-1");
    }).pipe(Effect.provide(createSalesforceTestLayer(fake.handler)));
  });

  it.effect("should use the sandbox login host", () => {
    const fake = createFakeSalesforce();
    const config = createTestConfig();
    config.salesforce.isSandbox = true;

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      yield* client.login;
      expect(fake.requests[0]?.url).toBe("https://test.salesforce.com/services/oauth2/token");
    }).pipe(Effect.provide(createSalesforceTestLayer(fake.handler, config)));
  });

  it.effect("should log in again once when the session has expired", () => {
    const fake = createFakeSalesforce({ describe: { Account: accountDescription } });
    let expired = true;
    const handler = (req: MockRequest) => {
      if (req.path.endsWith("/describe") && expired) {
        expired = false;
        return {
          status: 401,
          body: [{ errorCode: "INVALID_SESSION_ID", message: "Session expired or invalid" }],
        };
      }
      return fake.handler(req);
    };

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      yield* client.describe("Account");

      expect(fake.logins()).toBe(2);
      expect(fake.requests.at(-1)?.headers.authorization).toBe("Bearer test-token-2");
    }).pipe(Effect.provide(createSalesforceTestLayer(handler)));
  });

  it.effect("should turn a rejected login into an auth error", () => {
    const handler = () => ({
      status: 400,
      body: { error: "invalid_grant", error_description: "expired access/refresh token" },
    });

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      const error = yield* Effect.flip(client.login);

      expect(error._tag).toBe("AuthError");
      expect(error.message).toBe(
        'OAuth2 login failed: 400 - {"error":"invalid_grant","error_description":' +
          '"expired access/refresh token"}, Response from Salesforce: {"error":"invalid_grant",' +
          '"error_description":"expired access/refresh token"}'
      );
    }).pipe(Effect.provide(createSalesforceTestLayer(handler)));
  });

  it.effect("should keep the body of a failed call", () => {
    const fake = createFakeSalesforce();

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      const error = yield* Effect.flip(client.describe("Nope__c"));

      expect(error).toMatchObject({
        _tag: "RemoteApiError",
        status: 404,
        body: '[{"errorCode":"NOT_FOUND","message":"The requested resource does not exist"}]',
      });
    }).pipe(Effect.provide(createSalesforceTestLayer(fake.handler)));
  });

  it.effect("should stop when the usage header passes the total quota", () => {
    const fake = createFakeSalesforce({ usage: "api-usage=95/100" });

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      const error = yield* Effect.flip(client.bulkLimits);
      expect(error._tag).toBe("QuotaExceededError");
    }).pipe(Effect.provide(createSalesforceTestLayer(fake.handler)));
  });

  it.live("should retry connection failures and count every attempt", () => {
    const fake = createFakeSalesforce({ describe: { Account: accountDescription } });
    const mock = createMockHttpClient(fake.handler);
    let failures = 2;
    const flaky = HttpClient.make((req, url) => {
      if (url.pathname.endsWith("/describe") && failures > 0) {
        failures -= 1;
        return Effect.fail(
          new HttpClientError.RequestError({
            request: req,
            reason: "Transport",
            cause: new Error("socket hang up"),
          })
        );
      }
      return mock.execute(req);
    });
    const layer = SalesforceClient.DefaultWithoutDependencies.pipe(
      Layer.provideMerge(QuotaGovernor.Default),
      Layer.provideMerge(Layer.succeed(HttpClient.HttpClient, flaky)),
      Layer.provide(createTestConfigLayer())
    );

    return Effect.gen(function* () {
      const client = yield* SalesforceClient;
      const quota = yield* QuotaGovernor;
      const description = yield* client.describe("Account");

      expect(description.name).toBe("Account");
      expect((yield* quota.usage).restCalls).toBe(3);
    }).pipe(Effect.provide(layer));
  });
});
