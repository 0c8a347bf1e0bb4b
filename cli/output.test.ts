import { describe, it, expect, vi } from 'vitest';
import { ListingError } from '@/lib/errors';
import {
  UsageError,
  formatBytes,
  formatListing,
  formatListingError,
  isHttpUrl,
  resolveCredentials,
  resolveTarget,
} from './output';

vi.mock('@/lib/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const servers = [{ name: 'Films', url: 'http://films.local/' }];
const CONFIG_FILE = '/home/me/.indexbrowse.env';

describe('resolveTarget', () => {
  it('passes URLs through', () => {
    expect(resolveTarget('https://x.local/a/', [], CONFIG_FILE)).toEqual({
      url: 'https://x.local/a/',
    });
  });

  it('resolves server names', () => {
    expect(resolveTarget('films', servers, CONFIG_FILE)).toEqual({
      url: 'http://films.local/',
      server: servers[0],
    });
  });

  it('names the config file when no servers exist', () => {
    expect(() => resolveTarget('films', [], CONFIG_FILE)).toThrow(
      `No servers configured. Add SERVER_1_NAME and SERVER_1_URL to ${CONFIG_FILE}`
    );
  });

  it('rejects unknown servers with a usage error', () => {
    let caught: unknown;
    try {
      resolveTarget('music', servers, CONFIG_FILE);
    } catch (error) {
      caught = error;
    }
    expect(UsageError.isUsageError(caught)).toBe(true);
  });
});

describe('isHttpUrl', () => {
  it('accepts only http and https', () => {
    expect(isHttpUrl('http://h/')).toBe(true);
    expect(isHttpUrl('ftp://h/')).toBe(false);
    expect(isHttpUrl('films')).toBe(false);
  });
});

describe('resolveCredentials', () => {
  const fallback = { username: 'env-user', password: 'test-secret' };

  it('prefers flags over configured credentials', () => {
    expect(resolveCredentials({ user: 'me', password: 'test-secret' }, fallback)).toEqual({
      username: 'me',
      password: 'test-secret',
    });
    expect(resolveCredentials({}, fallback)).toBe(fallback);
  });

  it('requires both flags', () => {
    expect(() => resolveCredentials({ user: 'me' }, undefined)).toThrow(
      '--user and --password must be given together'
    );
  });
});

describe('formatListing', () => {
  it('prints folders before files', () => {
    expect(
      formatListing({
        folders: [{ name: '..', url: 'http://h/' }],
        files: [{ name: 'x.mp4', url: 'http://h/a/x.mp4', size: '1 MB' }],
      })
    ).toEqual(['d ..\thttp://h/', 'f x.mp4\thttp://h/a/x.mp4']);
  });
});

describe('formatListingError', () => {
  it('adds a hint for the error kind', () => {
    const error = new ListingError({
      kind: 'authentication',
      message: 'Authentication required - invalid or missing credentials',
      details: { url: 'http://h/', statusCode: 401 },
    });

    expect(formatListingError(error)).toBe(
      'Error: Authentication required - invalid or missing credentials\n' +
        'Hint: Pass --user and --password, or set INDEXBROWSE_USERNAME and INDEXBROWSE_PASSWORD'
    );
  });
});

describe('formatBytes', () => {
  it('scales to the largest whole unit', () => {
    expect(formatBytes(512)).toBe('512 B');
    expect(formatBytes(1536)).toBe('1.5 KB');
    expect(formatBytes(5 * 1024 * 1024)).toBe('5.0 MB');
  });
});
