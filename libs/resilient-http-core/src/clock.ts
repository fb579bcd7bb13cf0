import { setTimeout as sleep } from 'timers/promises';
import type { Clock } from './types';

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number, signal?: AbortSignal) => {
    if (ms <= 0) {
      signal?.throwIfAborted();
      return;
    }
    await sleep(ms, undefined, { signal });
  },
};
