import { createLogger } from './logger';

const logger = createLogger('retry');

export interface Failure<E extends Error> {
  ok: false;
  error: E;
}

export type SleepFn = (ms: number, signal?: AbortSignal) => Promise<void>;

export interface RetryOptions<E extends Error> {
  /** Total attempts, including the first one */
  maxAttempts?: number;
  initialDelay?: number;
  maxDelay?: number;
  backoffMultiplier?: number;
  jitter?: boolean;
  shouldRetry?: (error: E) => boolean;
  onRetry?: (error: E, attempt: number, delay: number) => void;
  sleep?: SleepFn;
  signal?: AbortSignal;
}

interface ResolvedRetryOptions<E extends Error>
  extends Required<Omit<RetryOptions<E>, 'signal'>> {
  signal?: AbortSignal;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_INITIAL_DELAY = 1000;
const DEFAULT_BACKOFF_MULTIPLIER = 2;

// Explicitly undefined options fall back to the defaults
function resolveOptions<E extends Error>(
  options: RetryOptions<E>
): ResolvedRetryOptions<E> {
  return {
    maxAttempts: options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS,
    initialDelay: options.initialDelay ?? DEFAULT_INITIAL_DELAY,
    maxDelay: options.maxDelay ?? Number.POSITIVE_INFINITY,
    backoffMultiplier: options.backoffMultiplier ?? DEFAULT_BACKOFF_MULTIPLIER,
    jitter: options.jitter ?? false,
    shouldRetry: options.shouldRetry ?? (() => true),
    onRetry: options.onRetry ?? (() => {}),
    sleep: options.sleep ?? sleep,
    signal: options.signal,
  };
}

/**
 * Sleeps for the specified number of milliseconds.
 * Rejects with the signal's reason if it is aborted first.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };

    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Delay before the retry that follows the given 0-based attempt:
 * initialDelay * backoffMultiplier ^ attempt, capped at maxDelay,
 * plus up to 100% random jitter when enabled.
 */
export function calculateDelay(
  attempt: number,
  initialDelay: number,
  maxDelay: number,
  backoffMultiplier: number,
  jitter: boolean
): number {
  const exponentialDelay = initialDelay * Math.pow(backoffMultiplier, attempt);
  const cappedDelay = Math.min(exponentialDelay, maxDelay);

  if (!jitter) {
    return cappedDelay;
  }

  return Math.floor(cappedDelay + cappedDelay * Math.random());
}

function isFailure<S extends { ok: true }, E extends Error>(
  result: S | Failure<E>
): result is Failure<E> {
  return result.ok === false;
}

/**
 * Retries an async operation that reports failure as a value.
 *
 * The operation is attempted up to `maxAttempts` times. A failure that
 * `shouldRetry` rejects is returned immediately; after the last attempt the
 * last failure is returned. Aborting `signal` rejects with its reason at the
 * next attempt or backoff boundary.
 *
 * @example
 * ```ts
 * const result = await retryWithBackoff(
 *   () => fetchListingHtml(url),
 *   { maxAttempts: 3, shouldRetry: isRetryableListingError }
 * );
 * ```
 */
export async function retryWithBackoff<
  S extends { ok: true },
  E extends Error,
>(
  fn: (attempt: number) => Promise<S | Failure<E>>,
  options: RetryOptions<E> = {}
): Promise<S | Failure<E>> {
  const opts = resolveOptions(options);
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));

  for (let attempt = 0; ; attempt++) {
    opts.signal?.throwIfAborted();

    const result = await fn(attempt);
    if (!isFailure(result)) {
      return result;
    }

    const { error } = result;

    if (!opts.shouldRetry(error)) {
      logger.debug('Error is not retryable, returning immediately', {
        error: error.message,
        attempt,
      });
      return result;
    }

    if (attempt >= maxAttempts - 1) {
      logger.warn('Max retries exhausted', {
        error: error.message,
        attempts: attempt + 1,
      });
      return result;
    }

    const delay = calculateDelay(
      attempt,
      opts.initialDelay,
      opts.maxDelay,
      opts.backoffMultiplier,
      opts.jitter
    );

    logger.info('Retrying operation after error', {
      error: error.message,
      attempt: attempt + 1,
      maxAttempts,
      delayMs: delay,
    });

    opts.onRetry(error, attempt + 1, delay);

    await opts.sleep(delay, opts.signal);
  }
}
