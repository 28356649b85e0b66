import { Duration, Effect } from "effect";
import { SalesforceClient } from "../salesforce/client";

/**
 * Access tokens are refreshed well inside their lifetime.
 */
export const TOKEN_REFRESH_INTERVAL = Duration.minutes(15);

/**
 * Logs in again every interval for as long as the enclosing scope lives.
 * The new session replaces the old one for every later request. A failed
 * refresh is retried at the next interval.
 */
export const startTokenRefresh = (interval: Duration.DurationInput = TOKEN_REFRESH_INTERVAL) =>
  Effect.gen(function* () {
    const client = yield* SalesforceClient;
    const refresh = client.login.pipe(
      Effect.zipRight(Effect.logDebug("Access token refreshed")),
      Effect.catchAll((error) =>
        Effect.logWarning(`Token refresh failed, retrying next interval: ${error.message}`)
      )
    );
    return yield* refresh.pipe(Effect.delay(interval), Effect.forever, Effect.forkScoped);
  });
