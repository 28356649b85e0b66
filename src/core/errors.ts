import { Data } from "effect";

/**
 * Connection failure or request timeout. Retried at the call site.
 */
export class TransientNetworkError extends Data.TaggedError("TransientNetworkError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Non-2xx response from Salesforce. The body is kept verbatim so the
 * structured error code can be recovered later.
 */
export class RemoteApiError extends Data.TaggedError("RemoteApiError")<{
  readonly message: string;
  readonly status: number;
  readonly body: string;
}> {}

export class AuthError extends Data.TaggedError("AuthError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * Terminates the whole run. Never retried.
 */
export class QuotaExceededError extends Data.TaggedError("QuotaExceededError")<{
  readonly message: string;
}> {}

export class UnsupportedTypeError extends Data.TaggedError("UnsupportedTypeError")<{
  readonly message: string;
  readonly field: string;
  readonly sourceType: string;
}> {}

export class UnknownOperatorError extends Data.TaggedError("UnknownOperatorError")<{
  readonly message: string;
  readonly operator: string;
}> {}

export class InvalidFilterError extends Data.TaggedError("InvalidFilterError")<{
  readonly message: string;
  readonly field?: string;
}> {}

export class BulkJobError extends Data.TaggedError("BulkJobError")<{
  readonly message: string;
  readonly jobId: string;
}> {}

export class CatalogError extends Data.TaggedError("CatalogError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class StateError extends Data.TaggedError("StateError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

/**
 * User-facing failure with a stable code, surfaced in the error report.
 */
export class ClassifiedError extends Data.TaggedError("ClassifiedError")<{
  readonly message: string;
  readonly code: string;
  readonly details?: Record<string, unknown>;
}> {}

export class SyncError extends Data.TaggedError("SyncError")<{
  readonly message: string;
  readonly stream?: string;
  readonly cause?: unknown;
}> {}

export const errorMessage = (error: unknown, fallback: string): string =>
  error instanceof Error ? error.message : fallback;
