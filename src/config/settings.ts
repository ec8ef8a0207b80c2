import Decimal from "decimal.js";
import { z } from "zod";

export const MoneySchema = z
  .union([
    z.number().nonnegative(),
    z.string().regex(/^\d+(\.\d+)?$/, "must be a non-negative decimal"),
  ])
  .transform((value) => new Decimal(value));

export const RateLimitSettingsSchema = z.object({
  requestsPerMinute: z.number().int().positive().default(60),
  requestsPerHour: z.number().int().positive().default(1000),
  requestsPerDay: z.number().int().positive().default(10000),
  maxConcurrent: z.number().int().positive().default(10),
  cooldownSeconds: z.number().nonnegative().default(5),
});

export const BudgetSettingsSchema = z.object({
  perQuery: MoneySchema.default("0.05"),
  daily: MoneySchema.default("10.00"),
  monthly: MoneySchema.default("100.00"),
  enforce: z.boolean().default(true),
});

export const CircuitBreakerSettingsSchema = z.object({
  failureThreshold: z.number().int().positive().default(3),
  recoveryTimeoutMs: z.number().int().nonnegative().default(30_000),
});

export const ProviderSettingsSchema = z.object({
  enabled: z.boolean().default(true),
  qualityWeight: z.number().min(0).max(1).default(0.8),
  rateLimit: RateLimitSettingsSchema.default({}),
  budget: BudgetSettingsSchema.default({}),
  circuit: CircuitBreakerSettingsSchema.default({}),
});

export const RouterSettingsSchema = z
  .object({
    baseTimeoutMs: z.number().int().positive().default(10_000),
    minTimeoutMs: z.number().int().positive().default(3_000),
    maxTimeoutMs: z.number().int().positive().default(30_000),
    complexityFactor: z.number().nonnegative().default(0.5),
    maxProviders: z.number().int().positive().default(3),
    minScore: z.number().min(0).max(1).default(0.2),
    cascadeComplexityThreshold: z.number().min(0).max(1).default(0.7),
    adequacy: z
      .object({
        minResults: z.number().int().positive().default(5),
        minTopScore: z.number().min(0).optional(),
      })
      .default({}),
    maxCooldownWaitMs: z.number().int().nonnegative().default(0),
    /** Retries of network and timeout failures inside one dispatch */
    retry: z
      .object({
        maxRetries: z.number().int().nonnegative().default(2),
        baseDelayMs: z.number().int().nonnegative().default(250),
        maxDelayMs: z.number().int().nonnegative().default(2_000),
        jitter: z.boolean().default(true),
      })
      .default({}),
  })
  .refine((router) => router.minTimeoutMs <= router.maxTimeoutMs, {
    message: "minTimeoutMs must not exceed maxTimeoutMs",
  });

export const MergerSettingsSchema = z.object({
  fuzzyThreshold: z.number().min(0).max(100).default(92),
  contentThreshold: z.number().min(0).max(1).default(0.85),
  consensusWeight: z.number().nonnegative().default(0.5),
  recencyWeight: z.number().nonnegative().default(0.2),
  recencyHorizonDays: z.number().positive().default(30),
});

export const CacheSettingsSchema = z.object({
  memoryTtlSeconds: z.number().int().positive().default(300),
  redisTtlSeconds: z.number().int().positive().default(3600),
  memoryMaxEntries: z.number().int().positive().default(500),
  redisEnabled: z.boolean().default(false),
  redisUrl: z.string().url().default("redis://localhost:6379"),
  redisConnectTimeoutMs: z.number().int().positive().default(2000),
  /** Reconnect attempts before startup gives up on the shared tier */
  redisStartupRetries: z.number().int().nonnegative().default(2),
  prefix: z.string().default("search:"),
});

export const HubSettingsSchema = z.object({
  logLevel: z.enum(["debug", "info", "warn", "error"]).optional(),
  router: RouterSettingsSchema.default({}),
  merger: MergerSettingsSchema.default({}),
  cache: CacheSettingsSchema.default({}),
  providers: z.record(z.string(), ProviderSettingsSchema).default({}),
});

export type RateLimitSettings = z.infer<typeof RateLimitSettingsSchema>;
export type BudgetSettings = z.infer<typeof BudgetSettingsSchema>;
export type CircuitBreakerSettings = z.infer<typeof CircuitBreakerSettingsSchema>;
export type ProviderSettings = z.infer<typeof ProviderSettingsSchema>;
export type RouterSettings = z.infer<typeof RouterSettingsSchema>;
export type MergerSettings = z.infer<typeof MergerSettingsSchema>;
export type CacheSettings = z.infer<typeof CacheSettingsSchema>;
export type HubSettings = z.infer<typeof HubSettingsSchema>;
export type HubSettingsInput = z.input<typeof HubSettingsSchema>;

export function defaultSettings(): HubSettings {
  return HubSettingsSchema.parse({});
}

/**
 * Settings for one provider, falling back to defaults when it is not configured
 */
export function providerSettings(settings: HubSettings, providerId: string): ProviderSettings {
  return settings.providers[providerId] ?? ProviderSettingsSchema.parse({});
}
