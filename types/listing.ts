import type { ListingError } from '@/lib/errors';

/**
 * A sub-directory link in a listing
 */
export interface FolderRef {
  readonly name: string;
  readonly url: string;
}

/**
 * A file link in a listing. `size` is the listing's size column text when it has one.
 */
export interface FileRef {
  readonly name: string;
  readonly url: string;
  readonly size?: string;
}

export interface ParsedListing {
  readonly folders: readonly FolderRef[];
  readonly files: readonly FileRef[];
}

/**
 * A cached listing. Replaced wholesale on refresh, never mutated.
 */
export interface ListingEntry extends ParsedListing {
  readonly url: string;
  // seconds since epoch
  readonly fetchedAt: number;
}

/**
 * Lowercase hex SHA-256 digest of a listing URL
 */
export type CacheKey = string;

export interface BasicCredentials {
  username: string;
  password: string;
}

export interface FetchSuccess {
  ok: true;
  body: Buffer;
}

export type FetchResult = FetchSuccess | { ok: false; error: ListingError };

export type ListingResult =
  | { ok: true; listing: ParsedListing; fromCache: boolean }
  | { ok: false; error: ListingError };

export interface ListingStoreStats {
  totalEntries: number;
  validEntries: number;
  expiredEntries: number;
  sizeBytes: number;
  ttlSeconds: number;
  location: string;
}
