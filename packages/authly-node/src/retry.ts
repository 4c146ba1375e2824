import { DEFAULT_RETRY_BASE_DELAY_MS, DEFAULT_RETRY_MAX_DELAY_MS } from './constants.js';
import { AuthlyError } from './errors.js';

export interface RetryOptions {
  /** Retries after the first attempt. Default: 0. */
  maxRetries?: number;
  /** Delay before the first retry. Default: 250ms. */
  baseDelayMs?: number;
  /** Upper bound on any delay. Default: 10s. */
  maxDelayMs?: number;
  /** Multiplier applied per retry. Default: 2. */
  backoffMultiplier?: number;
  /** Only errors this accepts are retried; others are thrown at once. */
  retryOn?: (error: AuthlyError) => boolean;
  /** Aborting stops further attempts and interrupts a pending delay. */
  signal?: AbortSignal;
  /** Called before each delay with the failed attempt (0-based) and the delay. */
  onRetry?: (error: AuthlyError, attempt: number, delayMs: number) => void;
}

/** Delay before retry `attempt` (0-based). */
export function backoffDelay(
  attempt: number,
  baseDelayMs: number = DEFAULT_RETRY_BASE_DELAY_MS,
  maxDelayMs: number = DEFAULT_RETRY_MAX_DELAY_MS,
  backoffMultiplier = 2,
): number {
  return Math.min(baseDelayMs * Math.pow(backoffMultiplier, attempt), maxDelayMs);
}

/**
 * Run `fn` with exponential-backoff retries. Every failure is normalized to
 * an AuthlyError; the last one is thrown once retries run out.
 *
 * `fn` receives the 0-based attempt number.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options?: RetryOptions,
): Promise<T> {
  const maxRetries = options?.maxRetries ?? 0;
  const retryOn = options?.retryOn ?? ((error: AuthlyError) => error.retryable);

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err: unknown) {
      const error = AuthlyError.from(err);

      if (attempt >= maxRetries || !retryOn(error) || options?.signal?.aborted) {
        throw error;
      }

      const delay = backoffDelay(
        attempt,
        options?.baseDelayMs,
        options?.maxDelayMs,
        options?.backoffMultiplier,
      );
      options?.onRetry?.(error, attempt, delay);
      await sleep(delay, options?.signal);
    }
  }
}

/** Promise-based sleep that rejects with CANCELLED when the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(AuthlyError.cancelled());
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(AuthlyError.cancelled());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
