import type { Result } from "neverthrow";
import type { ProviderError } from "../../../domain/models/search.ts";

export interface RetrySettings {
  readonly maxRetries: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly jitter: boolean;
}

/**
 * min(base * 2^attempt, max), with up to ±25% jitter when enabled
 */
export function retryDelay(settings: RetrySettings, attempt: number, random: () => number = Math.random): number {
  const delay = Math.min(settings.baseDelayMs * 2 ** attempt, settings.maxDelayMs);
  if (!settings.jitter) {
    return delay;
  }
  return Math.max(0, Math.round(delay + (random() * 2 - 1) * delay * 0.25));
}

export function isRetryable(error: ProviderError): boolean {
  return error.type === "network" || error.type === "timeout";
}

/**
 * Repeats `attempt` while it fails with a transient error, until the retries run out
 * or `signal` aborts. The caller sees one result for the whole sequence.
 */
export async function withRetry<T>(
  attempt: () => Promise<Result<T, ProviderError>>,
  settings: RetrySettings,
  signal: AbortSignal,
  onRetry?: (error: ProviderError, retry: number, delayMs: number) => void,
): Promise<Result<T, ProviderError>> {
  let result = await attempt();
  for (let retry = 1; retry <= settings.maxRetries; retry++) {
    if (result.isOk() || !isRetryable(result.error) || signal.aborted) {
      break;
    }
    const delayMs = retryDelay(settings, retry - 1);
    onRetry?.(result.error, retry, delayMs);
    if (!(await sleep(delayMs, signal))) {
      break;
    }
    result = await attempt();
  }
  return result;
}

function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
