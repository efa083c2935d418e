import pRetry, { AbortError } from 'p-retry';
import { type DownloadError, TransientNetworkError, classifyError } from './errors.js';
import { sleep as defaultSleep } from './rateLimiter.js';
import type { ErrorKind } from './types.js';
import { DEFAULT_BASE_DELAY_MS, DEFAULT_MAX_RETRIES } from './utils.js';

export interface RetryInfo {
  readonly retry: number;
  readonly delayMs: number;
  readonly error: DownloadError;
}

export interface RetryPolicy {
  /** Additional attempts after the first one. */
  readonly maxRetries?: number;
  readonly baseDelayMs?: number;
  /** Multiplies each backoff delay by a random factor between 1 and 2. */
  readonly randomize?: boolean;
  /** Used to wait out the part of a server-requested delay that exceeds the backoff. */
  readonly sleep?: (ms: number) => Promise<void>;
  readonly onRetry?: (info: RetryInfo) => void | Promise<void>;
}

export type RetryResult<T> =
  | { readonly ok: true; readonly value: T; readonly retries: number; readonly attempts: number }
  | {
      readonly ok: false;
      readonly kind: ErrorKind;
      readonly message: string;
      readonly retries: number;
      readonly attempts: number;
    };

/**
 * Backoff before the given retry (1-based): base, 2x base, 4x base, ...
 */
export const backoffDelay = (retry: number, baseDelayMs: number = DEFAULT_BASE_DELAY_MS): number =>
  Math.max(0, baseDelayMs) * 2 ** (retry - 1);

/**
 * Runs one network operation with bounded exponential backoff on transient failures.
 * Permanent failures are returned after the first attempt; nothing is thrown.
 */
export const withRetry = async <T>(operation: () => Promise<T>, policy: RetryPolicy = {}): Promise<RetryResult<T>> => {
  const maxRetries = Math.max(0, policy.maxRetries ?? DEFAULT_MAX_RETRIES);
  const baseDelayMs = Math.max(0, policy.baseDelayMs ?? DEFAULT_BASE_DELAY_MS);
  const sleep = policy.sleep ?? defaultSleep;

  let attempts = 0;
  let lastError: DownloadError | undefined;

  try {
    const value = await pRetry(
      async () => {
        attempts += 1;
        try {
          return await operation();
        } catch (thrown) {
          const error = classifyError(thrown);
          lastError = error;
          throw error.retryable ? error : new AbortError(error);
        }
      },
      {
        retries: maxRetries,
        factor: 2,
        minTimeout: baseDelayMs,
        randomize: policy.randomize ?? false,
        onFailedAttempt: async ({ retriesLeft }) => {
          if (retriesLeft === 0 || !lastError) {
            return;
          }
          const retry = attempts;
          const backoff = backoffDelay(retry, baseDelayMs);
          const retryAfter = lastError instanceof TransientNetworkError ? lastError.retryAfterMs ?? 0 : 0;
          await policy.onRetry?.({ retry, delayMs: Math.max(backoff, retryAfter), error: lastError });
          if (retryAfter > backoff) {
            await sleep(retryAfter - backoff);
          }
        },
      },
    );
    return { ok: true, value, retries: attempts - 1, attempts };
  } catch (thrown) {
    const error = lastError ?? classifyError(thrown);
    const retries = Math.max(0, attempts - 1);
    if (!error.retryable) {
      return { ok: false, kind: error.kind, message: error.message, retries, attempts };
    }
    return { ok: false, kind: 'exhausted-retries', message: error.message, retries, attempts };
  }
};
