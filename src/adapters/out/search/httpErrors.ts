import { err, ok, Result, ResultAsync } from "neverthrow";
import type { z } from "zod";
import type { ProviderError } from "../../../domain/models/search.ts";
import { warn } from "../../../config/logger.ts";

const DEFAULT_RETRY_AFTER_MS = 60_000;

/**
 * Maps a non-2xx backend response to a provider error
 */
export function responseToError(provider: string, response: Response): ProviderError {
  switch (response.status) {
    case 429: {
      const retryAfter = Number.parseInt(response.headers.get("retry-after") ?? "", 10);
      return {
        type: "rateLimit",
        message: `${provider} rate limit exceeded`,
        retryAfterMs: Number.isNaN(retryAfter) ? DEFAULT_RETRY_AFTER_MS : retryAfter * 1000,
      };
    }
    case 401:
    case 403:
      return { type: "authorization", message: `${provider} API key authentication error: ${response.status}` };
    case 400:
    case 422:
      return {
        type: "invalidQuery",
        message: `${provider} rejected the query`,
        issues: ["The backend rejected the query format. Try simplifying your search."],
      };
    default:
      return { type: "network", message: `${provider} API call error: ${response.status}` };
  }
}

/**
 * Performs the request and validates the JSON body against `schema`
 */
export function fetchJson<T>(
  provider: string,
  request: () => Promise<Response>,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  signal: AbortSignal,
): ResultAsync<T, ProviderError> {
  return ResultAsync.fromPromise(request(), (e): ProviderError =>
    signal.aborted
      ? { type: "timeout", message: `${provider} request was aborted`, timeoutMs: 0 }
      : { type: "network", message: e instanceof Error ? e.message : "Unknown error" })
    .andThen((response): Result<Response, ProviderError> => {
      if (!response.ok) {
        const error = responseToError(provider, response);
        warn(`[${provider.toUpperCase()}] ${error.message}`);
        return err(error);
      }
      return ok(response);
    })
    .andThen((response) =>
      ResultAsync.fromPromise(
        response.json(),
        (): ProviderError => ({ type: "network", message: `Failed to parse ${provider} API response` }),
      )
    )
    .andThen((body) => {
      const parsed = schema.safeParse(body);
      return parsed.success ? ok(parsed.data) : err<T, ProviderError>({
        type: "network",
        message: `Unexpected ${provider} API response: ${parsed.error.issues[0]?.message ?? "invalid"}`,
      });
    });
}
