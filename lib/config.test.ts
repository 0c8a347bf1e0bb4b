import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CONFIG_FILENAME,
  findServer,
  loadConfig,
  loadServers,
  parseServers,
} from './config';

vi.mock('@/lib/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

describe('parseServers', () => {
  it('reads numbered pairs up to the first gap', () => {
    expect(
      parseServers({
        SERVER_1_NAME: 'Films',
        SERVER_1_URL: 'http://films.local/',
        SERVER_2_NAME: 'Photos',
        SERVER_2_URL: 'https://photos.local/',
        SERVER_4_NAME: 'Unreached',
        SERVER_4_URL: 'http://unreached.local/',
      })
    ).toEqual([
      { name: 'Films', url: 'http://films.local/' },
      { name: 'Photos', url: 'https://photos.local/' },
    ]);
  });

  it('skips entries whose URL is not http(s)', () => {
    expect(
      parseServers({
        SERVER_1_NAME: 'Ftp',
        SERVER_1_URL: 'ftp://files.local/',
        SERVER_2_NAME: 'Web',
        SERVER_2_URL: 'http://web.local/',
      })
    ).toEqual([{ name: 'Web', url: 'http://web.local/' }]);
  });
});

describe('findServer', () => {
  it('matches names case-insensitively', () => {
    const servers = [{ name: 'Films', url: 'http://films.local/' }];
    expect(findServer(servers, 'films')).toEqual(servers[0]);
    expect(findServer(servers, 'music')).toBeUndefined();
  });
});

describe('loadConfig', () => {
  let home: string;

  beforeEach(async () => {
    home = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'config-'));
  });

  afterEach(async () => {
    await fs.promises.rm(home, { recursive: true, force: true });
  });

  it('uses defaults without a config file', () => {
    const config = loadConfig({ env: {}, homeDir: home });

    expect(config).toEqual({
      configFile: path.join(home, CONFIG_FILENAME),
      cacheDir: path.join(home, '.cache', 'indexbrowse'),
      configDir: path.join(home, '.config', 'indexbrowse'),
      cacheFile: path.join(home, '.cache', 'indexbrowse', 'directory_cache.json'),
      bookmarksFile: path.join(home, '.config', 'indexbrowse', 'bookmarks.json'),
      ttlSeconds: 300,
      timeoutSeconds: 30,
      maxRetries: 3,
      credentials: undefined,
      logLevel: 'warn',
      servers: [],
    });
  });

  it('reads the env file and lets the environment override it', async () => {
    await fs.promises.writeFile(
      path.join(home, CONFIG_FILENAME),
      [
        'SERVER_1_NAME=Films',
        'SERVER_1_URL=http://films.local/',
        'INDEXBROWSE_CACHE_TTL=60',
        'INDEXBROWSE_TIMEOUT=5',
      ].join('\n'),
      'utf8'
    );

    const config = loadConfig({
      env: { INDEXBROWSE_TIMEOUT: '12', XDG_CACHE_HOME: '/tmp/xdg-cache' },
      homeDir: home,
    });

    expect(config.servers).toEqual([{ name: 'Films', url: 'http://films.local/' }]);
    expect(config.ttlSeconds).toBe(60);
    expect(config.timeoutSeconds).toBe(12);
    expect(config.cacheDir).toBe(path.join('/tmp/xdg-cache', 'indexbrowse'));
  });

  it('reads credentials set together', () => {
    const config = loadConfig({
      env: { INDEXBROWSE_USERNAME: 'user', INDEXBROWSE_PASSWORD: 'test-secret' },
      homeDir: home,
    });
    expect(config.credentials).toEqual({ username: 'user', password: 'test-secret' });
  });

  it('rejects a username without a password', () => {
    expect(() =>
      loadConfig({ env: { INDEXBROWSE_USERNAME: 'user' }, homeDir: home })
    ).toThrow(/Invalid configuration/);
  });

  it('rejects a non-numeric ttl', () => {
    expect(() =>
      loadConfig({ env: { INDEXBROWSE_CACHE_TTL: 'soon' }, homeDir: home })
    ).toThrow(/Invalid configuration/);
  });

  it('rejects a timeout longer than a timer can wait', () => {
    expect(() =>
      loadConfig({ env: { INDEXBROWSE_TIMEOUT: '2147484' }, homeDir: home })
    ).toThrow(/INDEXBROWSE_TIMEOUT/);
    expect(
      loadConfig({ env: { INDEXBROWSE_TIMEOUT: '2147483' }, homeDir: home }).timeoutSeconds
    ).toBe(2147483);
  });

  it('honours an explicit config path', async () => {
    const configFile = path.join(home, 'custom.env');
    await fs.promises.writeFile(configFile, 'LOG_LEVEL=debug\n', 'utf8');

    const config = loadConfig({ env: { INDEXBROWSE_CONFIG: configFile }, homeDir: home });

    expect(config.configFile).toBe(configFile);
    expect(config.logLevel).toBe('debug');
  });
});

describe('loadServers', () => {
  it('returns no servers for a missing file', () => {
    expect(loadServers(path.join(os.tmpdir(), 'does-not-exist.env'))).toEqual([]);
  });
});
