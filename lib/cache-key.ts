import { createHash } from 'crypto';
import type { CacheKey } from '@/types/listing';

/**
 * Derive the cache key for a listing URL.
 *
 * The URL is hashed byte for byte: `http://h/a` and `http://h/a/` are
 * different keys, as are URLs that differ only in query order or case.
 */
export function deriveCacheKey(url: string): CacheKey {
  return createHash('sha256').update(url, 'utf8').digest('hex');
}

const CACHE_KEY_PATTERN = /^[0-9a-f]{64}$/;

export function isCacheKey(value: string): boolean {
  return CACHE_KEY_PATTERN.test(value);
}
