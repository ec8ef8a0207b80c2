export interface TimeoutSettings {
  readonly baseTimeoutMs: number;
  readonly minTimeoutMs: number;
  readonly maxTimeoutMs: number;
  readonly complexityFactor: number;
}

/**
 * clamp(base * (1 + factor * complexity), min, max). A caller-supplied timeout lowers the upper bound.
 */
export function computeTimeout(
  settings: TimeoutSettings,
  complexity: number,
  queryTimeoutMs?: number,
): number {
  const upper = queryTimeoutMs === undefined
    ? settings.maxTimeoutMs
    : Math.min(settings.maxTimeoutMs, queryTimeoutMs);
  const lower = Math.min(settings.minTimeoutMs, upper);
  const raw = settings.baseTimeoutMs * (1 + settings.complexityFactor * complexity);
  return Math.round(Math.min(Math.max(raw, lower), upper));
}

/**
 * Runs `task` with an abort signal that fires after `timeoutMs`.
 * Settles with `onTimeout()` at the deadline even if the task ignores the signal.
 */
export async function withTimeout<T>(
  task: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  onTimeout: () => T,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<T>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(onTimeout());
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), deadline]);
  } finally {
    clearTimeout(timer);
  }
}
