import { setTimeout as delay } from 'node:timers/promises';

/**
 * Time source for the ingestion loop. Tests swap in a manual implementation so
 * backoff and frame-rate windows run without wall-clock waits.
 */
export interface Scheduler {
  now(): number;
  /** Resolves `true` after `ms`, or `false` as soon as `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

export const systemScheduler: Scheduler = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    delay(ms, undefined, { signal }).then(
      () => true,
      (error: unknown) => {
        if (signal?.aborted) {
          return false;
        }
        throw error;
      },
    ),
};
