import { setTimeout as delay } from "node:timers/promises";

/**
 * Time source for admission state and backoff waits
 */
export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms) => {
    await delay(ms);
  },
};
