import { setTimeout as delay } from 'node:timers/promises';

/** Time source used by the rate gate and retry logic; tests substitute a simulated one. */
export interface Clock {
  now(): number;
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms, signal) => {
    if (ms <= 0) return;
    await delay(ms, undefined, { signal });
  },
};
