import { ListingError, isRetryableListingError } from './errors';
import { createLogger } from './logger';
import { retryWithBackoff, type SleepFn } from './retry';
import type {
  BasicCredentials,
  FetchResult,
  FetchSuccess,
} from '@/types/listing';

const logger = createLogger('listing-fetcher');

export const DEFAULT_FETCH_TIMEOUT_SECONDS = 30;
export const DEFAULT_MAX_RETRIES = 3;

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface FetchListingOptions {
  credentials?: BasicCredentials;
  timeoutSeconds?: number;
  signal?: AbortSignal;
  fetchImpl?: FetchLike;
}

export interface FetchListingRetryOptions extends FetchListingOptions {
  /** Total attempts, including the first one */
  maxRetries?: number;
  sleep?: SleepFn;
  onRetry?: (error: ListingError, attempt: number, delayMs: number) => void;
}

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_SOCKET',
]);

const TIMEOUT_ERROR_CODES = new Set([
  'ETIMEDOUT',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_HEADERS_TIMEOUT',
  'UND_ERR_BODY_TIMEOUT',
]);

export function basicAuthHeader(credentials: BasicCredentials): string {
  const token = Buffer.from(
    `${credentials.username}:${credentials.password}`,
    'utf8'
  ).toString('base64');
  return `Basic ${token}`;
}

/**
 * Map an HTTP status to a listing error, or null for a success status.
 */
export function classifyStatus(
  status: number,
  url: string
): ListingError | null {
  const details = { url, statusCode: status };

  if (status === 401) {
    return new ListingError({
      kind: 'authentication',
      message: 'Authentication required - invalid or missing credentials',
      details,
    });
  }
  if (status === 403) {
    return new ListingError({
      kind: 'authentication',
      message: 'Access forbidden - check permissions',
      details,
    });
  }
  if (status === 404) {
    return new ListingError({
      kind: 'not_found',
      message: `Resource not found: ${url}`,
      details,
    });
  }
  if (status >= 500) {
    return new ListingError({
      kind: 'server',
      message: `Server error (HTTP ${status})`,
      details,
    });
  }
  if (status >= 400) {
    return new ListingError({
      kind: 'connection',
      message: `Client error (HTTP ${status})`,
      details,
    });
  }
  return null;
}

// undici wraps socket errors: TypeError('fetch failed') -> cause { code }
function findErrorCode(error: unknown, depth = 0): string | undefined {
  if (!error || typeof error !== 'object' || depth > 4) return undefined;
  if ('code' in error && typeof error.code === 'string') return error.code;
  if ('cause' in error) return findErrorCode(error.cause, depth + 1);
  return undefined;
}

function describeError(error: unknown): string {
  if (error instanceof Error) {
    if (error.cause instanceof Error && error.cause.message) {
      return error.cause.message;
    }
    return error.message;
  }
  return String(error);
}

/**
 * Map a failure thrown by the transport to a listing error.
 */
export function classifyTransportError(
  error: unknown,
  url: string,
  timeoutSeconds?: number
): ListingError {
  const code = findErrorCode(error);
  const details = code ? { url, code } : { url };

  if (code && TIMEOUT_ERROR_CODES.has(code)) {
    return new ListingError({
      kind: 'timeout',
      message:
        timeoutSeconds === undefined
          ? 'Request timeout'
          : `Request timeout after ${timeoutSeconds} seconds`,
      cause: error,
      details,
    });
  }

  if (code && CONNECTION_ERROR_CODES.has(code)) {
    return new ListingError({
      kind: 'connection',
      message: `Connection failed - check network and server address: ${describeError(error)}`,
      cause: error,
      details,
    });
  }

  return new ListingError({
    kind: 'connection',
    message: `Request error: ${describeError(error)}`,
    cause: error,
    details,
  });
}

/**
 * Release the connection behind a response whose body will not be read
 */
export async function discardBody(response: Response): Promise<void> {
  try {
    await response.body?.cancel();
  } catch (error) {
    logger.debug('Could not discard response body', {
      error: describeError(error),
    });
  }
}

/**
 * Fetch a listing page once.
 *
 * HTTP and transport failures come back as `{ ok: false, error }`. Aborting
 * `signal` rejects with the signal's reason instead, since cancellation is
 * the caller's decision rather than a listing failure.
 */
export async function fetchListingHtml(
  url: string,
  options: FetchListingOptions = {}
): Promise<FetchResult> {
  const {
    credentials,
    timeoutSeconds = DEFAULT_FETCH_TIMEOUT_SECONDS,
    signal,
    fetchImpl = fetch,
  } = options;

  signal?.throwIfAborted();

  const controller = new AbortController();
  let timedOut = false;

  const timer = setTimeout(() => {
    timedOut = true;
    controller.abort();
  }, timeoutSeconds * 1000);

  const onAbort = () => controller.abort(signal?.reason);
  signal?.addEventListener('abort', onAbort, { once: true });

  const headers: Record<string, string> = {};
  if (credentials) {
    headers.Authorization = basicAuthHeader(credentials);
  }

  logger.debug('Fetching listing', { url, timeoutSeconds });

  try {
    const response = await fetchImpl(url, {
      headers,
      redirect: 'follow',
      signal: controller.signal,
    });

    const statusError = classifyStatus(response.status, url);
    if (statusError) {
      await discardBody(response);
      logger.debug('Listing request failed', {
        url,
        statusCode: response.status,
        kind: statusError.kind,
      });
      return { ok: false, error: statusError };
    }

    const body = Buffer.from(await response.arrayBuffer());

    logger.debug('Listing fetched', { url, bytes: body.length });

    return { ok: true, body };
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }

    if (timedOut) {
      return {
        ok: false,
        error: new ListingError({
          kind: 'timeout',
          message: `Request timeout after ${timeoutSeconds} seconds`,
          cause: error,
          details: { url },
        }),
      };
    }

    return {
      ok: false,
      error: classifyTransportError(error, url, timeoutSeconds),
    };
  } finally {
    clearTimeout(timer);
    signal?.removeEventListener('abort', onAbort);
  }
}

/**
 * Fetch a listing page, retrying connection, timeout and server failures.
 *
 * Waits 2^attempt seconds between attempts (1s, 2s, 4s, ...). Authentication
 * and not-found failures are returned without retrying.
 */
export async function fetchListingWithRetry(
  url: string,
  options: FetchListingRetryOptions = {}
): Promise<FetchResult> {
  const {
    maxRetries = DEFAULT_MAX_RETRIES,
    sleep,
    onRetry,
    ...fetchOptions
  } = options;

  const result = await retryWithBackoff<FetchSuccess, ListingError>(
    () => fetchListingHtml(url, fetchOptions),
    {
      maxAttempts: maxRetries,
      initialDelay: 1000,
      backoffMultiplier: 2,
      jitter: false,
      shouldRetry: isRetryableListingError,
      sleep,
      signal: fetchOptions.signal,
      onRetry: (error, attempt, delay) => {
        logger.warn(`Attempt ${attempt} failed, retrying in ${delay / 1000}s`, {
          url,
          kind: error.kind,
          error: error.message,
        });
        onRetry?.(error, attempt, delay);
      },
    }
  );

  if (!result.ok) {
    logger.debug('Listing fetch gave up', {
      url,
      kind: result.error.kind,
      maxRetries,
    });
  }

  return result;
}
