import { Option, Schema } from "effect";

export interface RemoteErrorDetail {
  readonly code: string;
  readonly message: string;
}

const RestErrorEntry = Schema.Struct({ errorCode: Schema.String, message: Schema.String });
const BulkErrorEntry = Schema.Struct({
  exceptionCode: Schema.String,
  exceptionMessage: Schema.String,
});
const ErrorEntry = Schema.Union(RestErrorEntry, BulkErrorEntry);

const decodeEntry = Schema.decodeUnknownOption(Schema.parseJson(ErrorEntry));
const decodeEntries = Schema.decodeUnknownOption(
  Schema.parseJson(Schema.NonEmptyArray(ErrorEntry))
);

/**
 * Reads the structured error of a failed call. The REST API answers with
 * a list of `{errorCode, message}`, the Bulk API with a single
 * `{exceptionCode, exceptionMessage}`.
 */
export const parseRemoteError = (body: string): Option.Option<RemoteErrorDetail> =>
  decodeEntry(body).pipe(
    Option.orElse(() => Option.map(decodeEntries(body), (entries) => entries[0])),
    Option.map((entry) =>
      "errorCode" in entry
        ? { code: entry.errorCode, message: entry.message }
        : { code: entry.exceptionCode, message: entry.exceptionMessage }
    )
  );

export const hasRemoteErrorCode = (body: string, code: string): boolean =>
  Option.exists(parseRemoteError(body), (detail) => detail.code === code);
