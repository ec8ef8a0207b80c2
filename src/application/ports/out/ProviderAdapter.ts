import type Decimal from "decimal.js";
import { Result } from "neverthrow";
import type { ProviderCapabilities } from "../../../domain/models/routing.ts";
import type {
  ProviderError,
  ProviderSearchParams,
  ProviderSearchResponse,
} from "../../../domain/models/search.ts";

export interface DispatchOptions {
  readonly timeoutMs: number;
  /** Aborted when the dispatch times out */
  readonly signal: AbortSignal;
}

/**
 * Output port implemented once per search backend
 */
export interface ProviderAdapter {
  readonly id: string;
  readonly name: string;

  capabilities(): ProviderCapabilities;

  estimateCost(params: ProviderSearchParams): Decimal.Value;

  search(
    params: ProviderSearchParams,
    options: DispatchOptions,
  ): Promise<Result<ProviderSearchResponse, ProviderError>>;
}

/**
 * Adapters keyed by provider id
 */
export interface ProviderDirectory {
  get(id: string): ProviderAdapter | undefined;
  list(): ProviderAdapter[];
}
