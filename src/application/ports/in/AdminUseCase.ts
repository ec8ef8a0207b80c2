import { ResultAsync } from "neverthrow";
import type { ProviderAdmissionStatus } from "../../../domain/models/admission.ts";
import type { ProviderPerformance } from "../../../domain/models/routing.ts";
import type { CacheError } from "../out/CacheRepository.ts";

export interface ProviderStatusReport extends ProviderAdmissionStatus {
  readonly name: string;
  readonly enabled: boolean;
  readonly qualityWeight: number;
  readonly performance: ProviderPerformance | null;
}

export interface CacheInvalidation {
  readonly pattern: string;
  readonly removed: Readonly<Record<string, number>>;
}

/**
 * Input port for read-only provider status and cache maintenance
 */
export interface AdminUseCase {
  providerStatus(): ProviderStatusReport[];

  invalidateCache(keyOrPattern: string): ResultAsync<CacheInvalidation, CacheError>;
}
