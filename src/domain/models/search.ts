import type Decimal from "decimal.js";
import type { ExclusionReason } from "./admission.ts";
import type { ContentType, StrategyName } from "./routing.ts";

export type MetadataValue = string | number | boolean | null;

export type ResultMetadata = Readonly<Record<string, MetadataValue>>;

/**
 * Search request as received from a caller
 */
export interface SearchQuery {
  readonly q: string;
  readonly maxResults?: number;
  readonly contentType?: ContentType;
  readonly providers?: ReadonlyArray<string>;
  /** Spend ceiling for the whole query, as a number or decimal string */
  readonly budget?: number | string;
  readonly timeoutMs?: number;
  readonly strategy?: StrategyName;
  readonly routingHints?: string;
  readonly requireAllProviders?: boolean;
}

/**
 * Validated query with defaults applied
 */
export interface QueryOptions {
  readonly q: string;
  readonly maxResults: number;
  readonly contentType?: ContentType;
  readonly providers?: ReadonlyArray<string>;
  readonly budget?: Decimal;
  readonly timeoutMs?: number;
  readonly strategy?: StrategyName;
  readonly routingHints?: string;
  readonly requireAllProviders: boolean;
}

/**
 * Parameters handed to a provider adapter
 */
export interface ProviderSearchParams {
  readonly q: string;
  readonly maxResults: number;
  readonly contentType: ContentType;
}

/**
 * Individual search result from one provider
 */
export interface SearchResult {
  readonly title: string;
  readonly url: string;
  readonly snippet: string;
  readonly content?: string;
  /** Relevance on the provider's own scale */
  readonly score: number;
  readonly source: string;
  /** ISO 8601 */
  readonly publishedAt?: string;
  readonly metadata: ResultMetadata;
}

export interface MergedResult extends SearchResult {
  readonly rank: number;
  readonly consensusCount: number;
  readonly finalScore: number;
  readonly sources: ReadonlyArray<string>;
}

export interface ProviderSearchResponse {
  readonly results: ReadonlyArray<SearchResult>;
  /** Actual cost when the backend reports one */
  readonly cost?: Decimal.Value;
}

/**
 * Combined search response from all contributing providers
 */
export interface SearchResponse {
  readonly query: string;
  readonly results: ReadonlyArray<MergedResult>;
  readonly providersUsed: ReadonlyArray<string>;
  readonly totalResults: number;
  readonly elapsedMs: number;
  readonly totalCost: string;
  readonly cacheHit: boolean;
  readonly strategy: StrategyName;
  readonly fingerprint: string;
}

/**
 * Provider-level failures, recovered inside the router
 */
export type ProviderError =
  | { type: "network"; message: string }
  | { type: "rateLimit"; message: string; retryAfterMs: number }
  | { type: "invalidQuery"; message: string; issues: string[] }
  | { type: "authorization"; message: string }
  | { type: "timeout"; message: string; timeoutMs: number };

export type AttemptFailure =
  | ExclusionReason
  | { type: "provider_error"; message: string; error: ProviderError };

export interface ProviderAttempt {
  readonly provider: string;
  readonly reason: AttemptFailure;
}

/**
 * Query-level failures surfaced to the caller
 */
export type SearchError =
  | { type: "invalid_query"; message: string; issues: string[] }
  | { type: "no_providers_available"; message: string; attempts: ReadonlyArray<ProviderAttempt> }
  | { type: "budget_exceeded"; message: string; attempts: ReadonlyArray<ProviderAttempt> }
  | {
    type: "providers_unavailable";
    message: string;
    attempts: ReadonlyArray<ProviderAttempt>;
    retryAfterMs: number;
  }
  | {
    type: "partial_results";
    message: string;
    attempts: ReadonlyArray<ProviderAttempt>;
    response: SearchResponse;
  };
