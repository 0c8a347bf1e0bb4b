import type { ListingError } from './errors';
import { fetchListingHtml, type FetchLike } from './listing-fetcher';
import { createLogger } from './logger';
import type { BasicCredentials } from '@/types/listing';

const logger = createLogger('connectivity');

export const DEFAULT_PROBE_TIMEOUT_SECONDS = 10;

export type ConnectivityResult =
  | { ok: true; latencyMs: number }
  | { ok: false; error: ListingError };

export interface ConnectivityOptions {
  credentials?: BasicCredentials;
  timeoutSeconds?: number;
  fetchImpl?: FetchLike;
  // epoch milliseconds
  now?: () => number;
}

/**
 * Check that a server answers a listing request. One attempt, no retries.
 */
export async function checkConnectivity(
  url: string,
  options: ConnectivityOptions = {}
): Promise<ConnectivityResult> {
  const now = options.now ?? Date.now;
  const startedAt = now();

  const result = await fetchListingHtml(url, {
    credentials: options.credentials,
    timeoutSeconds: options.timeoutSeconds ?? DEFAULT_PROBE_TIMEOUT_SECONDS,
    fetchImpl: options.fetchImpl,
  });

  const latencyMs = now() - startedAt;

  if (!result.ok) {
    logger.info('Server unreachable', {
      url,
      kind: result.error.kind,
      latencyMs,
    });
    return { ok: false, error: result.error };
  }

  logger.debug('Server reachable', { url, latencyMs });
  return { ok: true, latencyMs };
}
