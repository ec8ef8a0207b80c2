import { err, ok, Result } from "neverthrow";
import type { RateLimitSettings } from "../../../config/settings.ts";
import type { ExclusionReason, RateLimitSnapshot, RateWindow } from "../../../domain/models/admission.ts";
import { debug, warn } from "../../../config/logger.ts";
import type { Clock } from "./Clock.ts";

type RateLimited = Extract<ExclusionReason, { type: "rate_limited" }>;

const MINUTE_MS = 60_000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

/**
 * Holds one in-flight slot until released. Releasing twice has no effect.
 */
export interface RatePermit {
  release(): void;
}

/**
 * Sliding-window rate limiter for one provider.
 * A window denial starts a cooldown during which requests are rejected without being counted.
 */
export class RateLimiter {
  private minute: number[] = [];
  private hour: number[] = [];
  private day: number[] = [];
  private inFlight = 0;
  private cooldownUntil = 0;

  constructor(
    readonly provider: string,
    private readonly settings: RateLimitSettings,
    private readonly clock: Clock,
  ) {}

  check(): Result<void, RateLimited> {
    const now = this.clock.now();
    this.prune(now);

    if (now < this.cooldownUntil) {
      return err(this.denied("cooldown", this.cooldownUntil - now));
    }
    const window = this.exceededWindow();
    if (window) {
      return err(this.denied(window, this.cooldownMs()));
    }
    if (this.inFlight >= this.settings.maxConcurrent) {
      return err(this.denied("concurrency", 0));
    }
    return ok(undefined);
  }

  tryAcquire(): Result<RatePermit, RateLimited> {
    return this.check()
      .mapErr((denial) => {
        if (denial.window !== "cooldown" && denial.window !== "concurrency") {
          this.startCooldown(this.cooldownMs(), denial.window);
        }
        return denial;
      })
      .map(() => {
        const now = this.clock.now();
        this.minute.push(now);
        this.hour.push(now);
        this.day.push(now);
        this.inFlight += 1;
        return this.permit();
      });
  }

  /**
   * Extends the cooldown after the backend itself reported a rate limit
   */
  penalize(retryAfterMs: number): void {
    this.startCooldown(retryAfterMs, "backend");
  }

  snapshot(): RateLimitSnapshot {
    const now = this.clock.now();
    this.prune(now);
    return {
      requestsLastMinute: this.minute.length,
      requestsLastHour: this.hour.length,
      requestsLastDay: this.day.length,
      inFlight: this.inFlight,
      remaining: {
        minute: Math.max(0, this.settings.requestsPerMinute - this.minute.length),
        hour: Math.max(0, this.settings.requestsPerHour - this.hour.length),
        day: Math.max(0, this.settings.requestsPerDay - this.day.length),
        concurrent: Math.max(0, this.settings.maxConcurrent - this.inFlight),
      },
      cooldownUntil: this.cooldownUntil > now ? new Date(this.cooldownUntil).toISOString() : null,
    };
  }

  private permit(): RatePermit {
    let released = false;
    return {
      release: () => {
        if (released) return;
        released = true;
        this.inFlight = Math.max(0, this.inFlight - 1);
      },
    };
  }

  private exceededWindow(): RateWindow | undefined {
    if (this.minute.length >= this.settings.requestsPerMinute) return "minute";
    if (this.hour.length >= this.settings.requestsPerHour) return "hour";
    if (this.day.length >= this.settings.requestsPerDay) return "day";
    return undefined;
  }

  private prune(now: number): void {
    this.minute = this.minute.filter((t) => now - t < MINUTE_MS);
    this.hour = this.hour.filter((t) => now - t < HOUR_MS);
    this.day = this.day.filter((t) => now - t < DAY_MS);
  }

  private cooldownMs(): number {
    return this.settings.cooldownSeconds * 1000;
  }

  private startCooldown(ms: number, cause: string): void {
    const until = this.clock.now() + ms;
    if (until > this.cooldownUntil) {
      this.cooldownUntil = until;
      warn(`[RATE_LIMIT] ${this.provider}: ${cause} limit reached, cooling down for ${ms}ms`);
    } else {
      debug(`[RATE_LIMIT] ${this.provider}: already cooling down`);
    }
  }

  private denied(window: RateWindow, retryAfterMs: number): RateLimited {
    return {
      type: "rate_limited",
      message: `Rate limit for ${this.provider} (${window})`,
      window,
      retryAfterMs,
    };
  }
}
