import { DEFAULT_RATE_LIMIT_MS } from './utils.js';

export interface RateLimiterOptions {
  readonly intervalMs?: number;
  readonly now?: () => number;
  readonly sleep?: (ms: number) => Promise<void>;
}

export interface RateLimiter {
  readonly wait: () => Promise<void>;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

/**
 * Keeps successive track operations at least `intervalMs` apart. The first call never waits.
 * Create one per run.
 */
export const createRateLimiter = (options: RateLimiterOptions = {}): RateLimiter => {
  const intervalMs = Math.max(0, options.intervalMs ?? DEFAULT_RATE_LIMIT_MS);
  const now = options.now ?? Date.now;
  const pause = options.sleep ?? sleep;
  let lastReturn: number | null = null;

  const wait = async (): Promise<void> => {
    if (lastReturn !== null) {
      const remaining = lastReturn + intervalMs - now();
      if (remaining > 0) {
        await pause(remaining);
      }
    }
    lastReturn = now();
  };

  return { wait };
};
