import fs from 'fs';
import path from 'path';
import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { z } from 'zod';
import { isCacheKey } from './cache-key';
import { createLogger } from './logger';
import type {
  CacheKey,
  ListingEntry,
  ListingStoreStats,
} from '@/types/listing';

const logger = createLogger('listing-store');

export const DEFAULT_TTL_SECONDS = 300;
export const LISTING_CACHE_FILENAME = 'directory_cache.json';

const folderRecordSchema = z.object({
  name: z.string(),
  url: z.string(),
});

const fileRecordSchema = z.object({
  name: z.string(),
  url: z.string(),
  size: z.string().optional(),
});

/**
 * On-disk shape of one cached listing
 */
const listingRecordSchema = z.object({
  url: z.string(),
  timestamp: z.number(),
  folders: z.array(folderRecordSchema),
  files: z.array(fileRecordSchema),
});

const documentSchema = z.record(z.string(), z.unknown());

type ListingRecord = z.infer<typeof listingRecordSchema>;

type ListingDocument = Record<CacheKey, ListingRecord>;

export interface ListingStoreOptions {
  filePath: string;
  ttlSeconds?: number;
  // epoch milliseconds
  now?: () => number;
}

function toEntry(record: ListingRecord): ListingEntry {
  return {
    url: record.url,
    fetchedAt: record.timestamp,
    folders: record.folders,
    files: record.files,
  };
}

function toRecord(entry: ListingEntry): ListingRecord {
  return {
    url: entry.url,
    timestamp: entry.fetchedAt,
    folders: entry.folders.map(folder => ({
      name: folder.name,
      url: folder.url,
    })),
    files: entry.files.map(file =>
      file.size === undefined
        ? { name: file.name, url: file.url }
        : { name: file.name, url: file.url, size: file.size }
    ),
  };
}

/**
 * Two-tier listing cache: an in-process map over a single JSON document.
 *
 * Every mutation reads, modifies and rewrites the whole document. There is
 * no locking, so two processes sharing the file overwrite each other (last
 * writer wins). Storage faults never reach the caller: an unreadable
 * document reads as empty, and a failed write leaves the in-process tier
 * authoritative until the process exits.
 */
export class ListingStore {
  readonly filePath: string;
  readonly ttlSeconds: number;

  private readonly now: () => number;
  private readonly memory = new Map<CacheKey, ListingEntry>();
  private readonly db: Low<unknown>;

  constructor(options: ListingStoreOptions) {
    this.filePath = options.filePath;
    this.ttlSeconds = options.ttlSeconds ?? DEFAULT_TTL_SECONDS;
    this.now = options.now ?? Date.now;
    this.db = new Low<unknown>(new JSONFile<unknown>(this.filePath), {});
  }

  /**
   * Age check is inclusive: an entry exactly ttlSeconds old is still fresh.
   */
  isFresh(fetchedAt: number): boolean {
    const ageSeconds = this.now() / 1000 - fetchedAt;
    return ageSeconds <= this.ttlSeconds;
  }

  async lookup(key: CacheKey): Promise<ListingEntry | null> {
    const cached = this.memory.get(key);
    if (cached) {
      if (this.isFresh(cached.fetchedAt)) {
        logger.debug('Memory cache hit', { key, url: cached.url });
        return cached;
      }
      this.memory.delete(key);
    }

    const document = await this.readDocument();
    const record = document[key];
    if (!record) {
      logger.debug('Cache miss', { key });
      return null;
    }

    if (this.isFresh(record.timestamp)) {
      const entry = toEntry(record);
      this.memory.set(key, entry);
      logger.debug('Disk cache hit', { key, url: entry.url });
      return entry;
    }

    delete document[key];
    await this.writeDocument(document);
    logger.debug('Expired entry removed', { key, url: record.url });
    return null;
  }

  async put(key: CacheKey, entry: ListingEntry): Promise<void> {
    this.memory.set(key, entry);

    const document = await this.readDocument();
    document[key] = toRecord(entry);
    await this.writeDocument(document);
  }

  async invalidate(key: CacheKey): Promise<void> {
    this.memory.delete(key);

    const document = await this.readDocument();
    if (key in document) {
      delete document[key];
      await this.writeDocument(document);
      logger.debug('Cache entry invalidated', { key });
    }
  }

  async clearAll(): Promise<void> {
    this.memory.clear();

    try {
      await fs.promises.rm(this.filePath, { force: true });
      logger.info('Listing cache cleared', { filePath: this.filePath });
    } catch (error) {
      logger.warn('Could not delete cache file', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  /**
   * Remove every expired entry from the durable document. Entries already
   * promoted to memory are left alone and expire there on their next lookup.
   */
  async purgeExpired(): Promise<number> {
    const document = await this.readDocument();
    let removed = 0;

    for (const [key, record] of Object.entries(document)) {
      if (!this.isFresh(record.timestamp)) {
        delete document[key];
        removed++;
      }
    }

    if (removed > 0) {
      await this.writeDocument(document);
    }

    logger.info('Purged expired listings', { removed });
    return removed;
  }

  async stats(): Promise<ListingStoreStats> {
    const document = await this.readDocument();
    const records = Object.values(document);
    const expiredEntries = records.filter(
      record => !this.isFresh(record.timestamp)
    ).length;

    let sizeBytes = 0;
    try {
      sizeBytes = (await fs.promises.stat(this.filePath)).size;
    } catch (error) {
      logger.debug('Cache file not available for stat', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }

    return {
      totalEntries: records.length,
      validEntries: records.length - expiredEntries,
      expiredEntries,
      sizeBytes,
      ttlSeconds: this.ttlSeconds,
      location: this.filePath,
    };
  }

  private async readDocument(): Promise<ListingDocument> {
    // lowdb keeps the previous data when the file is missing
    this.db.data = {};

    try {
      await this.db.read();
    } catch (error) {
      logger.warn('Listing cache unreadable, treating as empty', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
      return {};
    }

    return this.decodeDocument(this.db.data);
  }

  private decodeDocument(data: unknown): ListingDocument {
    const parsed = documentSchema.safeParse(data);
    if (!parsed.success) {
      logger.warn('Listing cache is not a JSON object, treating as empty', {
        filePath: this.filePath,
      });
      return {};
    }

    const document: ListingDocument = {};
    for (const [key, value] of Object.entries(parsed.data)) {
      const record = listingRecordSchema.safeParse(value);
      if (!isCacheKey(key) || !record.success) {
        logger.debug('Skipping malformed cache record', { key });
        continue;
      }
      document[key] = record.data;
    }
    return document;
  }

  private async writeDocument(document: ListingDocument): Promise<void> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      this.db.data = document;
      await this.db.write();
    } catch (error) {
      logger.warn('Could not save listing cache to disk', {
        filePath: this.filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
