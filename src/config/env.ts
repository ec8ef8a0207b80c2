import { readFileSync } from "node:fs";
import { err, ok, Result } from "neverthrow";
import { z } from "zod";
import { type HubSettings, HubSettingsSchema } from "./settings.ts";

/**
 * Type definition representing a collection of API keys
 */
export interface ApiKeys {
  brave?: string;
  tavily?: string;
}

export type ConfigError = {
  type: "config";
  message: string;
  issues?: string[];
};

type Env = Readonly<Record<string, string | undefined>>;

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8088),
  HUB_CONFIG: z.string().min(1).optional(),
  REDIS_URL: z.string().url().optional(),
  REDIS_ENABLED: z.enum(["true", "false", "1", "0"]).optional(),
  BRAVE_API_KEY: z.string().min(1).optional(),
  TAVILY_API_KEY: z.string().min(1).optional(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
}

function parseEnv(env: Env): Result<z.infer<typeof EnvSchema>, ConfigError> {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    return err({
      type: "config",
      message: "Invalid environment",
      issues: formatIssues(parsed.error),
    });
  }
  return ok(parsed.data);
}

/**
 * Load API keys from environment variables
 */
export function loadApiKeys(env: Env = process.env): Result<ApiKeys, ConfigError> {
  return parseEnv(env).map((values) => ({
    brave: values.BRAVE_API_KEY,
    tavily: values.TAVILY_API_KEY,
  }));
}

/**
 * Get the server port number from environment variables
 */
export function getServerPort(env: Env = process.env): Result<number, ConfigError> {
  return parseEnv(env).map((values) => values.PORT);
}

function readSettingsFile(path: string): Result<unknown, ConfigError> {
  const read = Result.fromThrowable(
    () => JSON.parse(readFileSync(path, "utf8")),
    (e): ConfigError => ({
      type: "config",
      message: `Failed to read settings file ${path}: ${e instanceof Error ? e.message : String(e)}`,
    }),
  );
  return read();
}

/**
 * Load hub settings from the optional HUB_CONFIG file, then apply Redis overrides from the environment
 */
export function loadSettings(env: Env = process.env): Result<HubSettings, ConfigError> {
  return parseEnv(env).andThen((values) => {
    const raw = values.HUB_CONFIG ? readSettingsFile(values.HUB_CONFIG) : ok<unknown, ConfigError>({});

    return raw.andThen((data) => {
      const parsed = HubSettingsSchema.safeParse(data);
      if (!parsed.success) {
        return err<HubSettings, ConfigError>({
          type: "config",
          message: "Invalid hub settings",
          issues: formatIssues(parsed.error),
        });
      }

      const settings = parsed.data;
      const redisEnabled = values.REDIS_ENABLED === undefined
        ? settings.cache.redisEnabled
        : values.REDIS_ENABLED === "true" || values.REDIS_ENABLED === "1";

      return ok<HubSettings, ConfigError>({
        ...settings,
        cache: {
          ...settings.cache,
          redisEnabled,
          redisUrl: values.REDIS_URL ?? settings.cache.redisUrl,
        },
      });
    });
  });
}
