import { ResultAsync } from "neverthrow";
import type { HubSettings } from "../../config/settings.ts";
import { providerSettings } from "../../config/settings.ts";
import { info } from "../../config/logger.ts";
import type { AdminUseCase, CacheInvalidation, ProviderStatusReport } from "../ports/in/AdminUseCase.ts";
import type { CacheError } from "../ports/out/CacheRepository.ts";
import type { ProviderDirectory } from "../ports/out/ProviderAdapter.ts";
import type { AdmissionControl } from "./admission/AdmissionControl.ts";
import type { PerformanceTracker } from "./PerformanceTracker.ts";
import type { TieredCacheService } from "./TieredCacheService.ts";

export class AdminService implements AdminUseCase {
  constructor(
    private readonly providers: ProviderDirectory,
    private readonly admission: AdmissionControl,
    private readonly performance: PerformanceTracker,
    private readonly cache: TieredCacheService,
    private readonly settings: HubSettings,
  ) {}

  providerStatus(): ProviderStatusReport[] {
    return this.admission.status().map((status) => {
      const configured = providerSettings(this.settings, status.provider);
      return {
        ...status,
        name: this.providers.get(status.provider)?.name ?? status.provider,
        enabled: configured.enabled,
        qualityWeight: configured.qualityWeight,
        performance: this.performance.get(status.provider) ?? null,
      };
    });
  }

  invalidateCache(keyOrPattern: string): ResultAsync<CacheInvalidation, CacheError> {
    return new ResultAsync(this.cache.invalidate(keyOrPattern)).map((removed) => {
      info(`[ADMIN] Cache invalidated for ${keyOrPattern}`);
      return { pattern: keyOrPattern, removed };
    });
  }
}
