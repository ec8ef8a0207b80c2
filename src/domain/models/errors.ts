export type DomainErrorType =
  | "validation" // Validation error (400)
  | "parse" // Parse error (400)
  | "budget" // Spend limit reached (402)
  | "rate_limit" // Rate limit (429)
  | "search" // Search error (500)
  | "server" // Server error (500)
  | "external" // External service error (502)
  | "unavailable"; // No provider could serve the request (503)

export interface DomainError {
  type: DomainErrorType;
  message: string;
  details?: Record<string, unknown>;
}

export type ErrorStatusCode = 400 | 402 | 429 | 500 | 502 | 503;

export function getErrorStatusCode(error: DomainError | { type: string }): ErrorStatusCode {
  switch (error.type) {
    case "validation":
    case "parse":
      return 400;
    case "budget":
      return 402;
    case "rate_limit":
      return 429;
    case "external":
      return 502;
    case "unavailable":
      return 503;
    case "search":
    case "server":
    default:
      return 500;
  }
}
