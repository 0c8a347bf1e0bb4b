import fs from 'fs';
import path from 'path';
import { Low } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import { z } from 'zod';
import { createLogger } from './logger';
import type { Bookmark, BookmarkUpdate } from '@/types/bookmark';

const logger = createLogger('bookmark-store');

const bookmarkSchema = z.object({
  name: z.string().min(1),
  server: z.string(),
  url: z.string(),
  timestamp: z.number(),
});

export interface BookmarkStoreOptions {
  filePath: string;
  // epoch milliseconds
  now?: () => number;
}

function sameName(a: string, b: string): boolean {
  return a.toLowerCase() === b.toLowerCase();
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Keep the records that look like bookmarks, drop the rest.
 */
export function decodeBookmarks(data: unknown): Bookmark[] | null {
  if (!Array.isArray(data)) {
    return null;
  }

  const bookmarks: Bookmark[] = [];
  for (const item of data) {
    const parsed = bookmarkSchema.safeParse(item);
    if (parsed.success) {
      bookmarks.push(parsed.data);
    } else {
      logger.debug('Skipping malformed bookmark record');
    }
  }
  return bookmarks;
}

/**
 * Named shortcuts to listing URLs, kept as a JSON array on disk.
 * Names are unique, compared case-insensitively.
 */
export class BookmarkStore {
  readonly filePath: string;

  private readonly now: () => number;
  private readonly db: Low<unknown>;
  private bookmarks: Bookmark[] | null = null;

  constructor(options: BookmarkStoreOptions) {
    this.filePath = options.filePath;
    this.now = options.now ?? Date.now;
    this.db = new Low<unknown>(new JSONFile<unknown>(this.filePath), []);
  }

  private async load(): Promise<Bookmark[]> {
    if (this.bookmarks) {
      return this.bookmarks;
    }

    try {
      await this.db.read();
      const bookmarks = decodeBookmarks(this.db.data);
      if (!bookmarks) {
        logger.warn('Bookmarks file is not a JSON array, starting empty', {
          filePath: this.filePath,
        });
      }
      this.bookmarks = bookmarks ?? [];
    } catch (error) {
      logger.warn('Could not load bookmarks', {
        filePath: this.filePath,
        error: errorMessage(error),
      });
      this.bookmarks = [];
    }

    logger.debug('Bookmarks loaded', {
      filePath: this.filePath,
      count: this.bookmarks.length,
    });
    return this.bookmarks;
  }

  private async save(bookmarks: Bookmark[]): Promise<boolean> {
    try {
      await fs.promises.mkdir(path.dirname(this.filePath), { recursive: true });
      this.db.data = bookmarks;
      await this.db.write();
      this.bookmarks = bookmarks;
      return true;
    } catch (error) {
      logger.error('Could not save bookmarks', error, {
        filePath: this.filePath,
      });
      return false;
    }
  }

  /**
   * Returns false when the name is already taken or the file cannot be written
   */
  async add(name: string, server: string, url: string): Promise<boolean> {
    const bookmarks = await this.load();

    if (bookmarks.some(bookmark => sameName(bookmark.name, name))) {
      logger.debug('Bookmark name already exists', { name });
      return false;
    }

    const bookmark: Bookmark = {
      name,
      server,
      url,
      timestamp: this.now() / 1000,
    };

    const saved = await this.save([...bookmarks, bookmark]);
    if (saved) {
      logger.info('Bookmark added', { name, server, url });
    }
    return saved;
  }

  async remove(name: string): Promise<boolean> {
    const bookmarks = await this.load();
    const remaining = bookmarks.filter(
      bookmark => !sameName(bookmark.name, name)
    );

    if (remaining.length === bookmarks.length) {
      return false;
    }

    return this.save(remaining);
  }

  async get(name: string): Promise<Bookmark | null> {
    const bookmarks = await this.load();
    return bookmarks.find(bookmark => sameName(bookmark.name, name)) ?? null;
  }

  /**
   * Most recently added or updated first
   */
  async list(): Promise<Bookmark[]> {
    const bookmarks = await this.load();
    return [...bookmarks].sort((a, b) => b.timestamp - a.timestamp);
  }

  /**
   * Name of the bookmark pointing at `url`, if any
   */
  async findByUrl(url: string): Promise<string | null> {
    const bookmarks = await this.load();
    return bookmarks.find(bookmark => bookmark.url === url)?.name ?? null;
  }

  async update(name: string, update: BookmarkUpdate): Promise<boolean> {
    const bookmarks = await this.load();
    const index = bookmarks.findIndex(bookmark =>
      sameName(bookmark.name, name)
    );
    if (index === -1) {
      return false;
    }

    const current = bookmarks[index];
    const newName = update.name;

    if (
      newName &&
      bookmarks.some(
        (bookmark, i) => i !== index && sameName(bookmark.name, newName)
      )
    ) {
      logger.debug('Bookmark rename collides with existing name', {
        name,
        newName,
      });
      return false;
    }

    const updated: Bookmark = {
      ...current,
      name: update.name || current.name,
      url: update.url || current.url,
      timestamp: this.now() / 1000,
    };

    const next = [...bookmarks];
    next[index] = updated;
    return this.save(next);
  }

  async byServer(server: string): Promise<Bookmark[]> {
    const bookmarks = await this.load();
    return bookmarks.filter(bookmark => bookmark.server === server);
  }

  /**
   * Remove every bookmark and return how many there were
   */
  async clear(): Promise<number> {
    const bookmarks = await this.load();
    const count = bookmarks.length;

    if (count > 0 && !(await this.save([]))) {
      return 0;
    }

    return count;
  }

  async exportTo(filePath: string): Promise<boolean> {
    const bookmarks = await this.load();

    try {
      await new JSONFile<Bookmark[]>(filePath).write(bookmarks);
      logger.info('Bookmarks exported', { filePath, count: bookmarks.length });
      return true;
    } catch (error) {
      logger.error('Could not export bookmarks', error, { filePath });
      return false;
    }
  }

  /**
   * Import bookmarks from a JSON array file. Merging keeps existing
   * bookmarks and only adds names not already present; otherwise the
   * imported list replaces the current one. Returns the number imported.
   */
  async importFrom(
    filePath: string,
    options: { merge?: boolean } = {}
  ): Promise<number> {
    const merge = options.merge ?? true;

    let imported: Bookmark[] | null;
    try {
      imported = decodeBookmarks(await new JSONFile<unknown>(filePath).read());
    } catch (error) {
      logger.warn('Could not read bookmarks to import', {
        filePath,
        error: errorMessage(error),
      });
      return 0;
    }

    if (!imported) {
      logger.warn('Import file is missing or not a JSON array', { filePath });
      return 0;
    }

    if (!merge) {
      return (await this.save(imported)) ? imported.length : 0;
    }

    const existing = await this.load();
    const additions = imported.filter(
      candidate => !existing.some(bookmark => sameName(bookmark.name, candidate.name))
    );

    if (additions.length === 0) {
      return 0;
    }

    return (await this.save([...existing, ...additions])) ? additions.length : 0;
  }
}
