import type { AppConfig } from '@/lib/config';
import { BookmarkStore } from '@/lib/bookmark-store';
import { ListingService } from '@/lib/listing-service';
import { ListingStore } from '@/lib/listing-store';
import { createLogger } from '@/lib/logger';
import { resolveTarget, type ResolvedTarget } from './output';

const logger = createLogger('cli');

export interface CliContext {
  config: AppConfig;
  store: ListingStore;
  bookmarks: BookmarkStore;
  service: ListingService;
  resolve(target: string): ResolvedTarget;
}

export function createContext(config: AppConfig): CliContext {
  const store = new ListingStore({
    filePath: config.cacheFile,
    ttlSeconds: config.ttlSeconds,
  });

  const service = new ListingService({
    store,
    fetchOptions: {
      credentials: config.credentials,
      timeoutSeconds: config.timeoutSeconds,
      maxRetries: config.maxRetries,
    },
  });

  return {
    config,
    store,
    bookmarks: new BookmarkStore({ filePath: config.bookmarksFile }),
    service,
    resolve(target) {
      const resolved = resolveTarget(target, config.servers, config.configFile);
      logger.debug('Resolved target', { target, url: resolved.url });
      return resolved;
    },
  };
}
