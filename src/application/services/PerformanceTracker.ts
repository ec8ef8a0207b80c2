import type { ProviderPerformance } from "../../domain/models/routing.ts";
import { type Clock, systemClock } from "./admission/Clock.ts";

export interface DispatchOutcome {
  readonly success: boolean;
  readonly latencyMs: number;
  /** Result quality in [0,1] */
  readonly quality: number;
}

/**
 * Running averages of each provider's dispatch outcomes
 */
export class PerformanceTracker {
  private readonly metrics = new Map<string, ProviderPerformance>();

  constructor(private readonly clock: Clock = systemClock) {}

  record(provider: string, outcome: DispatchOutcome): ProviderPerformance {
    const previous = this.metrics.get(provider);
    const total = previous?.totalQueries ?? 0;
    const average = (current: number, sample: number) => (current * total + sample) / (total + 1);

    const next: ProviderPerformance = {
      provider,
      totalQueries: total + 1,
      successRate: average(previous?.successRate ?? 0, outcome.success ? 1 : 0),
      averageLatencyMs: average(previous?.averageLatencyMs ?? 0, outcome.latencyMs),
      averageResultQuality: average(previous?.averageResultQuality ?? 0, outcome.quality),
      lastUpdatedAt: this.clock.now(),
    };
    this.metrics.set(provider, next);
    return next;
  }

  get(provider: string): ProviderPerformance | undefined {
    return this.metrics.get(provider);
  }
}
