import { setTimeout as delay } from 'node:timers/promises';

export const CLOCK = Symbol('CLOCK');

/**
 * Time source used by every polling loop. Sleeping through this port lets tests
 * advance time without waiting.
 */
export interface Clock {
  now(): Date;
  /** Resolves after `ms`, or early (without rejecting) once `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export class SystemClock implements Clock {
  now(): Date {
    return new Date();
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<void> {
    if (ms <= 0 || signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (error) {
      if (signal?.aborted) return;
      throw error;
    }
  }
}
