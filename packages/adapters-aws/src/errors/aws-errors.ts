/**
 * Classification of AWS SDK errors into the collaborator error taxonomy.
 */

import { NotFoundError, TransientQueryError } from "@ephemera/adapters-common";

/** SDK error names that indicate throttling or a temporary service fault */
const TRANSIENT_ERROR_NAMES = new Set([
  "RequestLimitExceeded",
  "Throttling",
  "ThrottlingException",
  "TooManyRequestsException",
  "RequestTimeout",
  "RequestTimeoutException",
  "TimeoutError",
  "InternalError",
  "InternalFailure",
  "ServiceUnavailable",
  "Unavailable",
]);

/** Node socket error codes seen when the endpoint is unreachable */
const NETWORK_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
]);

function field(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  return Reflect.get(error, key);
}

export function awsErrorName(error: unknown): string {
  const name = field(error, "name");
  return typeof name === "string" ? name : "UnknownError";
}

export function awsErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isNotFoundError(error: unknown): boolean {
  const name = awsErrorName(error);
  return name.includes("NotFound") || name.includes("NoSuchEntity");
}

export function isTransientError(error: unknown): boolean {
  if (TRANSIENT_ERROR_NAMES.has(awsErrorName(error))) return true;

  const retryable = field(error, "$retryable");
  if (typeof retryable === "object" && retryable !== null) return true;

  const code = field(error, "code");
  return typeof code === "string" && NETWORK_ERROR_CODES.has(code);
}

/**
 * Translate a failed query into NotFoundError or TransientQueryError.
 * Anything else is returned unchanged so the caller sees the provider's own error.
 */
export function toQueryError(error: unknown, operation: string, resourceId: string): Error {
  if (isNotFoundError(error)) {
    return new NotFoundError(
      `${operation}: ${resourceId} not found (${awsErrorName(error)})`,
      resourceId,
      { cause: error },
    );
  }
  if (isTransientError(error)) {
    return new TransientQueryError(
      `${operation} failed: ${awsErrorMessage(error)}`,
      operation,
      { cause: error },
    );
  }
  return error instanceof Error ? error : new Error(String(error));
}
