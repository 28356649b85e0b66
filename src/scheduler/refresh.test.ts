import { describe, expect, it } from "@effect/vitest";
import { Duration, Effect, Layer, Ref, Stream, TestClock } from "effect";
import { AuthError } from "../core/errors";
import { SalesforceClient } from "../salesforce/client";
import { INSTANCE_URL } from "../test/salesforce";
import { startTokenRefresh, TOKEN_REFRESH_INTERVAL } from "./refresh";

/**
 * Client whose logins are only counted. Attempts listed in `rejected`
 * fail.
 */
const countingClient = (logins: Ref.Ref<number>, rejected: ReadonlyArray<number> = []) =>
  Layer.succeed(
    SalesforceClient,
    new SalesforceClient({
      login: Ref.updateAndGet(logins, (n) => n + 1).pipe(
        Effect.flatMap((n) =>
          rejected.includes(n)
            ? Effect.fail(new AuthError({ message: "invalid_grant" }))
            : Effect.succeed({ accessToken: `test-token-${n}`, instanceUrl: INSTANCE_URL })
        )
      ),
      request: () => Effect.dieMessage("not used"),
      requestJson: () => Effect.dieMessage("not used"),
      requestStream: () => Stream.dieMessage("not used"),
      dataUrl: () => INSTANCE_URL,
      asyncUrl: () => INSTANCE_URL,
      describe: () => Effect.dieMessage("not used"),
      bulkLimits: Effect.dieMessage("not used"),
    })
  );

describe("startTokenRefresh", () => {
  it("should refresh every fifteen minutes by default", () => {
    expect(Duration.toMinutes(TOKEN_REFRESH_INTERVAL)).toBe(15);
  });

  it.scoped("should log in again at every interval", () =>
    Effect.gen(function* () {
      const logins = yield* Ref.make(0);
      yield* startTokenRefresh(Duration.minutes(15)).pipe(Effect.provide(countingClient(logins)));

      yield* TestClock.adjust(Duration.minutes(14));
      expect(yield* Ref.get(logins)).toBe(0);
      yield* TestClock.adjust(Duration.minutes(1));
      expect(yield* Ref.get(logins)).toBe(1);
      yield* TestClock.adjust(Duration.minutes(30));
      expect(yield* Ref.get(logins)).toBe(3);
    })
  );

  it.scoped("should keep going after a failed refresh", () =>
    Effect.gen(function* () {
      const logins = yield* Ref.make(0);
      yield* startTokenRefresh(Duration.minutes(15)).pipe(
        Effect.provide(countingClient(logins, [1]))
      );

      yield* TestClock.adjust(Duration.minutes(30));
      expect(yield* Ref.get(logins)).toBe(2);
    })
  );

  it.effect("should stop when its scope closes", () =>
    Effect.gen(function* () {
      const logins = yield* Ref.make(0);
      yield* startTokenRefresh(Duration.minutes(15)).pipe(
        Effect.provide(countingClient(logins)),
        Effect.scoped
      );

      yield* TestClock.adjust(Duration.minutes(45));
      expect(yield* Ref.get(logins)).toBe(0);
    })
  );
});
