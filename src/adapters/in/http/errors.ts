import type { DomainError, DomainErrorType } from "../../../domain/models/errors.ts";
import { type ErrorStatusCode, getErrorStatusCode } from "../../../domain/models/errors.ts";
import type { ProviderAttempt, SearchError } from "../../../domain/models/search.ts";

/**
 * API error class for HTTP responses
 */
export class ApiError extends Error {
  status: ErrorStatusCode;
  details?: Record<string, unknown>;

  constructor(message: string, status: ErrorStatusCode = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }
}

/**
 * Common interface for API error responses
 * @template D - Type of response data
 * @template E - Type of error details
 */
export interface ApiErrorResponse<D = null, E = Record<string, unknown>> {
  status: "error";
  message: string;
  error?: E;
  data?: D;
}

export function createErrorResponse<D = null, E = Record<string, unknown>>(
  message: string,
  error?: E,
  data?: D,
): ApiErrorResponse<D, E> {
  return {
    status: "error",
    message,
    error,
    data,
  };
}

export function domainErrorToResponse<D = null>(
  error: DomainError,
  data?: D,
): ApiErrorResponse<D, { type: DomainErrorType } & Record<string, unknown>> {
  const errorDetails = {
    type: error.type,
    ...(error.details ?? {}),
  };

  return createErrorResponse<D, typeof errorDetails>(
    error.message,
    errorDetails,
    data,
  );
}

export function domainErrorToApiError(error: DomainError): ApiError {
  return new ApiError(
    error.message,
    getErrorStatusCode(error),
    { type: error.type, ...(error.details ?? {}) },
  );
}

function attemptDetails(attempts: ReadonlyArray<ProviderAttempt>) {
  return attempts.map((attempt) => ({
    provider: attempt.provider,
    reason: attempt.reason.type,
    message: attempt.reason.message,
  }));
}

/**
 * Query-level search failures as domain errors, so they share the status code table.
 * Unavailability caused by rate limits alone maps to 429.
 */
export function searchErrorToDomainError(error: SearchError): DomainError {
  switch (error.type) {
    case "invalid_query":
      return { type: "validation", message: error.message, details: { issues: error.issues } };
    case "budget_exceeded":
      return { type: "budget", message: error.message, details: { attempts: attemptDetails(error.attempts) } };
    case "providers_unavailable":
      return {
        type: error.attempts.every((attempt) => attempt.reason.type === "rate_limited") ? "rate_limit" : "unavailable",
        message: error.message,
        details: { retryAfterMs: error.retryAfterMs, attempts: attemptDetails(error.attempts) },
      };
    case "no_providers_available":
      return { type: "unavailable", message: error.message, details: { attempts: attemptDetails(error.attempts) } };
    case "partial_results":
      return { type: "external", message: error.message, details: { attempts: attemptDetails(error.attempts) } };
  }
}
