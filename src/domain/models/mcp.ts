import type { DomainError, DomainErrorType } from "./errors.ts";
import type { ContentType, StrategyName } from "./routing.ts";

export interface ApiErrorResponse<D = unknown, T = unknown> {
  status: "error";
  message: string;
  error?: T;
  data?: D;
}

export interface McpRequest {
  readonly query: string;
  readonly options?: McpOptions;
}

export interface McpOptions {
  readonly maxResults?: number;
  readonly contentType?: ContentType;
  readonly providers?: ReadonlyArray<string>;
  readonly budget?: number;
  readonly timeoutMs?: number;
  readonly strategy?: StrategyName;
  readonly routingHints?: string;
}

export interface McpSuccessResponse {
  readonly results: ReadonlyArray<McpResult>;
  readonly status: "success";
  readonly providersUsed: ReadonlyArray<string>;
  readonly cacheHit: boolean;
  readonly totalCost: string;
  readonly message?: string;
}

export interface McpErrorResponse extends ApiErrorResponse<ReadonlyArray<McpResult>> {
  readonly results: ReadonlyArray<McpResult>;
}

export interface McpResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly published?: string;
  readonly sources: ReadonlyArray<string>;
  readonly score: number;
}

export type McpErrorType =
  | Extract<DomainErrorType, "validation" | "budget" | "unavailable" | "search" | "server">
  | "parse";

export interface McpError extends DomainError {
  type: McpErrorType;
}

export function createMcpErrorResponse(
  message: string,
  error?: unknown,
  results: ReadonlyArray<McpResult> = [],
): McpErrorResponse {
  return {
    status: "error",
    message,
    error,
    data: results,
    results,
  };
}
