import * as cheerio from 'cheerio';
import type { FileRef, FolderRef, ParsedListing } from '@/types/listing';

// Name and size columns of the directory index table
const NAME_CELL_SELECTOR = 'td.fb-n';
const SIZE_CELL_SELECTOR = 'td.fb-s';

export const PARENT_ENTRY_NAME = '..';

/**
 * Resolve an href against the listing URL. Falls back to the raw href when
 * the base is not an absolute URL.
 */
export function resolveHref(baseUrl: string, href: string): string {
  try {
    return new URL(href, baseUrl).toString();
  } catch {
    return href;
  }
}

/**
 * Extract folder and file links from a directory index page.
 *
 * The first folder is always the synthetic parent entry. Anchors without an
 * href, and anchors pointing at `..`, are skipped. Hrefs ending in `/` are
 * folders; everything else is a file. Document order is preserved.
 */
export function parseListing(
  baseUrl: string,
  html: string | Buffer
): ParsedListing {
  const $ = cheerio.load(typeof html === 'string' ? html : html.toString('utf8'));

  const folders: FolderRef[] = [
    { name: PARENT_ENTRY_NAME, url: resolveHref(baseUrl, PARENT_ENTRY_NAME) },
  ];
  const files: FileRef[] = [];

  $(NAME_CELL_SELECTOR).each((_, cell) => {
    const $cell = $(cell);
    const sizeText = $cell.siblings(SIZE_CELL_SELECTOR).first().text().trim();

    $cell.find('a').each((_, anchor) => {
      const $anchor = $(anchor);
      const href = $anchor.attr('href');

      if (href === undefined || href.startsWith('..')) {
        return;
      }

      const name = $anchor.text();
      const url = resolveHref(baseUrl, href);

      if (href.endsWith('/')) {
        folders.push({ name, url });
      } else {
        files.push(sizeText ? { name, url, size: sizeText } : { name, url });
      }
    });
  });

  return { folders, files };
}
