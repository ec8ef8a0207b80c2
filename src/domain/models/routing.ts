import type Decimal from "decimal.js";

export const CONTENT_TYPES = [
  "factual",
  "academic",
  "technical",
  "news",
  "commercial",
  "educational",
  "mixed",
] as const;

export type ContentType = typeof CONTENT_TYPES[number];

export const STRATEGY_NAMES = ["parallel", "cascade"] as const;

export type StrategyName = typeof STRATEGY_NAMES[number];

export interface AmbiguityFlags {
  readonly multipleQuestions: boolean;
  readonly hedging: boolean;
  readonly crossDomain: boolean;
  readonly multiIntent: boolean;
}

/**
 * Features extracted from a query once, before routing
 */
export interface QueryFeatures {
  readonly text: string;
  readonly length: number;
  readonly wordCount: number;
  readonly contentType: ContentType;
  readonly contentTypeScores: Readonly<Partial<Record<ContentType, number>>>;
  readonly complexity: number;
  readonly keywords: ReadonlyArray<string>;
  readonly ambiguity: AmbiguityFlags;
  readonly containsQuestion: boolean;
  readonly timeSensitivity: number;
  readonly factualNature: number;
}

export interface ProviderCapabilities {
  readonly contentTypes: ReadonlyArray<ContentType>;
  /** Static specialization weights in [0,1], keyed by content type */
  readonly contentTypeAffinity: Readonly<Partial<Record<ContentType, number>>>;
  readonly maxResultsPerQuery: number;
  readonly typicalLatencyMs?: number;
}

export type ProviderRole = "primary" | "fallback";

export interface ProviderScore {
  readonly provider: string;
  readonly score: number;
  readonly confidence: number;
  readonly estimatedCost: Decimal;
  readonly estimatedLatencyMs: number;
  readonly role: ProviderRole;
  readonly qualityWeight: number;
  readonly scorer: string;
}

/**
 * Rolling history of a provider's dispatches
 */
export interface ProviderPerformance {
  readonly provider: string;
  readonly totalQueries: number;
  readonly successRate: number;
  readonly averageLatencyMs: number;
  readonly averageResultQuality: number;
  readonly lastUpdatedAt: number;
}

/**
 * Routing preferences parsed from free-text hints
 */
export interface RoutingHints {
  readonly providers?: ReadonlyArray<string>;
  readonly strategy?: StrategyName;
  readonly contentType?: ContentType;
  readonly requireAllProviders?: boolean;
}
