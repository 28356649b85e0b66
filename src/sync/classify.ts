import { Option } from "effect";
import {
  ClassifiedError,
  type QuotaExceededError,
  SyncError,
} from "../core/errors";
import type { ExtractionError } from "../extraction/types";
import { parseRemoteError } from "../salesforce/remote-error";

export type StreamFailure = ExtractionError | ClassifiedError;

const FILTER_PREFIX = "Invalid filter: ";
const TOO_LARGE = "OPERATION_TOO_LARGE: exceeded 100000 distinct who/what's";
const NO_SUCH_COLUMN = /No such column '([^']+)' on entity '([^']+)'/;
const FILTER_TYPE_MISMATCH =
  /value of filter criterion for field '([A-Za-z0-9_]*)' must be of type ([A-Za-z0-9]*)/;

const textOf = (error: StreamFailure): string =>
  error._tag === "RemoteApiError" && !error.message.includes(error.body)
    ? `${error.message} ${error.body}`
    : error.message;

const invalidField = (text: string): Option.Option<ClassifiedError> => {
  if (!text.includes("INVALID_FIELD")) return Option.none();
  const match = NO_SUCH_COLUMN.exec(text);
  if (match === null) return Option.none();
  const [, column, entity] = match;
  return Option.some(
    new ClassifiedError({
      message:
        `We can't find "${column}" column on "${entity}" object. ` +
        "Review the Field Level Permissions in Salesforce and try importing your data again.",
      code: "salesforce.InvalidField",
    })
  );
};

const invalidFilter = (text: string): Option.Option<ClassifiedError> => {
  const match = FILTER_TYPE_MISMATCH.exec(text);
  if (match === null) return Option.none();
  const [, field, expectedType] = match;
  const operand = new RegExp(`\\(${field} .* (.*?)\\)`).exec(text);
  return Option.some(
    new ClassifiedError({
      message:
        operand === null
          ? `Invalid filter: Value of filter criterion for field '${field}' is of invalid type`
          : `Invalid filter: Field ${field} filter value of ${operand[1]} ` +
            `does not match field type of ${expectedType}`,
      code: "salesforce.InvalidFilter",
      details: { field },
    })
  );
};

/**
 * Turns a stream failure into what the run reports. Quota errors end the
 * run unchanged; known remote failures get a stable code; anything else is
 * wrapped with the stream name.
 */
export const classifyStreamError = (
  error: StreamFailure,
  stream: string
): QuotaExceededError | ClassifiedError | SyncError => {
  switch (error._tag) {
    case "QuotaExceededError":
    case "ClassifiedError":
      return error;
    case "UnsupportedTypeError":
      return new ClassifiedError({
        message: `${error.message} (Stream: ${stream}, Field: ${error.field})`,
        code: "salesforce.UnsupportedType",
        details: { field: error.field, type: error.sourceType },
      });
    case "UnknownOperatorError":
    case "InvalidFilterError":
      return new ClassifiedError({
        message: error.message.startsWith(FILTER_PREFIX)
          ? error.message
          : `${FILTER_PREFIX}${error.message}`,
        code: "salesforce.InvalidFilter",
      });
    default:
      break;
  }

  const text = textOf(error);
  if (text.includes(TOO_LARGE)) {
    return new ClassifiedError({
      message:
        `${TOO_LARGE}. Consider asking your Salesforce System Administrator to provide you ` +
        `with the \`View All Data\` profile permission. (Stream: ${stream})`,
      code: "salesforce.OperationTooLarge",
    });
  }

  const specific = Option.orElse(invalidField(text), () => invalidFilter(text));
  if (Option.isSome(specific)) return specific.value;

  if (error._tag === "RemoteApiError") {
    const detail = parseRemoteError(error.body);
    if (Option.isSome(detail)) {
      return new ClassifiedError({
        message:
          "Import failed with the following Salesforce error: " +
          `(error code: ${detail.value.code}) ${detail.value.message}`,
        code: "salesforce.SalesforceApiError",
      });
    }
  }

  return new SyncError({ message: `${text}, (Stream: ${stream})`, stream, cause: error });
};
