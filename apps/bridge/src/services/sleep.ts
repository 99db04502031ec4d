import { setTimeout as delay } from 'timers/promises';

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

/** Resolves after `ms`, or as soon as `signal` aborts. Never rejects on abort. */
export const sleep: SleepFn = async (ms, signal) => {
  if (signal?.aborted) return;
  try {
    await delay(ms, undefined, signal ? { signal } : undefined);
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
};
