import { deriveCacheKey } from './cache-key';
import { createLogger } from './logger';
import {
  fetchListingWithRetry,
  type FetchListingRetryOptions,
} from './listing-fetcher';
import { parseListing } from './listing-parser';
import type { ListingStore } from './listing-store';
import type {
  BasicCredentials,
  CacheKey,
  ListingEntry,
  ListingResult,
} from '@/types/listing';

const logger = createLogger('listing-service');

export interface ListingServiceOptions {
  store: ListingStore;
  // defaults applied to every fetch; credentials can be overridden per call
  fetchOptions?: FetchListingRetryOptions;
  // epoch milliseconds
  now?: () => number;
}

export interface GetListingOptions {
  credentials?: BasicCredentials;
  forceRefresh?: boolean;
  signal?: AbortSignal;
}

/**
 * Serves directory listings from the cache while fresh, otherwise fetches,
 * parses and stores them. Failed fetches never touch the store.
 *
 * Concurrent requests for the same URL and credentials share one in-flight
 * fetch, unless a caller passes its own abort signal.
 */
export class ListingService {
  private readonly store: ListingStore;
  private readonly fetchOptions: FetchListingRetryOptions;
  private readonly now: () => number;
  private readonly inFlight = new Map<string, Promise<ListingResult>>();

  constructor(options: ListingServiceOptions) {
    this.store = options.store;
    this.fetchOptions = options.fetchOptions ?? {};
    this.now = options.now ?? Date.now;
  }

  async getListing(
    url: string,
    options: GetListingOptions = {}
  ): Promise<ListingResult> {
    const key = deriveCacheKey(url);

    if (!options.forceRefresh) {
      const cached = await this.store.lookup(key);
      if (cached) {
        logger.debug('Serving listing from cache', { url });
        return {
          ok: true,
          listing: { folders: cached.folders, files: cached.files },
          fromCache: true,
        };
      }
    }

    // A caller with its own signal must not cancel, or be cancelled by,
    // anyone else, so it always fetches alone.
    if (options.signal) {
      return this.fetchAndStore(url, key, options);
    }

    const flightKey = `${key}:${this.credentialsId(options.credentials)}`;
    const pending = this.inFlight.get(flightKey);
    if (pending) {
      logger.debug('Joining in-flight listing request', { url });
      return pending;
    }

    const request = this.fetchAndStore(url, key, options).finally(() => {
      this.inFlight.delete(flightKey);
    });
    this.inFlight.set(flightKey, request);
    return request;
  }

  /**
   * Fetch a listing regardless of what is cached and replace the cached copy.
   */
  async refresh(
    url: string,
    options: Omit<GetListingOptions, 'forceRefresh'> = {}
  ): Promise<ListingResult> {
    return this.getListing(url, { ...options, forceRefresh: true });
  }

  async invalidate(url: string): Promise<void> {
    await this.store.invalidate(deriveCacheKey(url));
  }

  // Hashed so the password never sits in a map key
  private credentialsId(credentials: BasicCredentials | undefined): string {
    const effective = credentials ?? this.fetchOptions.credentials;
    if (!effective) {
      return 'anonymous';
    }
    return deriveCacheKey(`${effective.username}\0${effective.password}`);
  }

  private async fetchAndStore(
    url: string,
    key: CacheKey,
    options: GetListingOptions
  ): Promise<ListingResult> {
    logger.info('Fetching listing', {
      url,
      forceRefresh: options.forceRefresh ?? false,
    });

    const fetched = await fetchListingWithRetry(url, {
      ...this.fetchOptions,
      credentials: options.credentials ?? this.fetchOptions.credentials,
      signal: options.signal ?? this.fetchOptions.signal,
    });

    if (!fetched.ok) {
      logger.warn('Listing fetch failed', {
        url,
        kind: fetched.error.kind,
        error: fetched.error.message,
      });
      return { ok: false, error: fetched.error };
    }

    const listing = parseListing(url, fetched.body);
    const entry: ListingEntry = {
      url,
      fetchedAt: this.now() / 1000,
      folders: listing.folders,
      files: listing.files,
    };

    await this.store.put(key, entry);

    logger.info('Listing cached', {
      url,
      folderCount: listing.folders.length,
      fileCount: listing.files.length,
    });

    return { ok: true, listing, fromCache: false };
  }
}
