import { describe, it, expect } from 'vitest';
import { parseListing, resolveHref } from './listing-parser';

const BASE = 'http://h/a/b/';

function page(rows: string): string {
  return `<html><body><table>${rows}</table></body></html>`;
}

describe('resolveHref', () => {
  it('resolves relative hrefs against the listing URL', () => {
    expect(resolveHref(BASE, 'c/d.mp4')).toBe('http://h/a/b/c/d.mp4');
    expect(resolveHref(BASE, '/root/')).toBe('http://h/root/');
    expect(resolveHref(BASE, '..')).toBe('http://h/a/');
  });

  it('keeps absolute hrefs', () => {
    expect(resolveHref(BASE, 'https://other/x')).toBe('https://other/x');
  });

  it('falls back to the raw href when the base is not a URL', () => {
    expect(resolveHref('not a url', 'c/')).toBe('c/');
  });
});

describe('parseListing', () => {
  it('returns only the parent entry for an empty document', () => {
    expect(parseListing(BASE, '')).toEqual({
      folders: [{ name: '..', url: 'http://h/a/' }],
      files: [],
    });
  });

  it('splits folders and files by trailing slash', () => {
    const html = page(`
      <tr><td class="fb-n"><a href="c/">c</a></td><td class="fb-s"></td></tr>
      <tr><td class="fb-n"><a href="c/d.mp4">d.mp4</a></td><td class="fb-s">1.2 GB</td></tr>
    `);

    expect(parseListing(BASE, html)).toEqual({
      folders: [
        { name: '..', url: 'http://h/a/' },
        { name: 'c', url: 'http://h/a/b/c/' },
      ],
      files: [{ name: 'd.mp4', url: 'http://h/a/b/c/d.mp4', size: '1.2 GB' }],
    });
  });

  it('skips parent links and anchors without href', () => {
    const html = page(`
      <tr><td class="fb-n"><a href="../">Parent</a></td></tr>
      <tr><td class="fb-n"><a>nothing</a></td></tr>
      <tr><td class="fb-n"><a href="notes.txt">notes.txt</a></td></tr>
    `);

    const listing = parseListing(BASE, html);
    expect(listing.folders).toEqual([{ name: '..', url: 'http://h/a/' }]);
    expect(listing.files).toEqual([
      { name: 'notes.txt', url: 'http://h/a/b/notes.txt' },
    ]);
  });

  it('ignores anchors outside name cells', () => {
    const html = `<a href="x.mp4">x</a>${page('<tr><td><a href="y/">y</a></td></tr>')}`;
    expect(parseListing(BASE, html).files).toEqual([]);
    expect(parseListing(BASE, html).folders).toHaveLength(1);
  });

  it('accepts a buffer and keeps document order', () => {
    const html = page(`
      <tr><td class="fb-n"><a href="b.jpg">b.jpg</a></td></tr>
      <tr><td class="fb-n"><a href="a.jpg">a.jpg</a></td></tr>
    `);

    const listing = parseListing(BASE, Buffer.from(html, 'utf8'));
    expect(listing.files.map(file => file.name)).toEqual(['b.jpg', 'a.jpg']);
  });

  it('is deterministic', () => {
    const html = page('<tr><td class="fb-n"><a href="z/">z</a></td></tr>');
    expect(parseListing(BASE, html)).toEqual(parseListing(BASE, html));
  });
});
