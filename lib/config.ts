import fs from 'fs';
import os from 'os';
import path from 'path';
import dotenv from 'dotenv';
import { z } from 'zod';
import { ExtendedError } from './errors';
import { LISTING_CACHE_FILENAME } from './listing-store';
import { createLogger, type LogThreshold } from './logger';
import type { BasicCredentials } from '@/types/listing';
import type { Server } from '@/types/server';

const logger = createLogger('config');

export const APP_NAME = 'indexbrowse';
export const BOOKMARKS_FILENAME = 'bookmarks.json';
export const CONFIG_FILENAME = `.${APP_NAME}.env`;

const envSchema = z
  .object({
    INDEXBROWSE_CACHE_DIR: z.string().optional(),
    INDEXBROWSE_CONFIG_DIR: z.string().optional(),
    XDG_CACHE_HOME: z.string().optional(),
    XDG_CONFIG_HOME: z.string().optional(),
    INDEXBROWSE_CACHE_TTL: z.coerce.number().int().nonnegative().default(300),
    // setTimeout takes at most 2^31-1 ms
    INDEXBROWSE_TIMEOUT: z.coerce.number().positive().max(2147483).default(30),
    INDEXBROWSE_MAX_RETRIES: z.coerce.number().int().positive().default(3),
    INDEXBROWSE_USERNAME: z.string().optional(),
    INDEXBROWSE_PASSWORD: z.string().optional(),
    LOG_LEVEL: z
      .enum(['debug', 'info', 'warn', 'error', 'silent'])
      .default('warn'),
  })
  .refine(
    env =>
      (env.INDEXBROWSE_USERNAME === undefined) ===
      (env.INDEXBROWSE_PASSWORD === undefined),
    {
      message:
        'INDEXBROWSE_USERNAME and INDEXBROWSE_PASSWORD must be set together',
      path: ['INDEXBROWSE_USERNAME'],
    }
  );

const serverSchema = z.object({
  name: z.string().min(1),
  url: z.url({ protocol: /^https?$/ }),
});

export interface AppConfig {
  configFile: string;
  cacheDir: string;
  configDir: string;
  cacheFile: string;
  bookmarksFile: string;
  ttlSeconds: number;
  timeoutSeconds: number;
  maxRetries: number;
  credentials?: BasicCredentials;
  logLevel: LogThreshold;
  servers: Server[];
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

// Unset and empty variables are treated alike
function definedVars(
  vars: NodeJS.ProcessEnv | Record<string, string>
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [name, value] of Object.entries(vars)) {
    if (value !== undefined && value !== '') {
      result[name] = value;
    }
  }
  return result;
}

/**
 * Read an env-style file. A missing file yields no variables.
 */
export function readEnvFile(filePath: string): Record<string, string> {
  if (!fs.existsSync(filePath)) {
    logger.debug('Config file not found', { configFile: filePath });
    return {};
  }

  try {
    return dotenv.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (error) {
    throw new ExtendedError({
      message: `Could not read config file ${filePath}`,
      cause: error,
      details: { configFile: filePath },
    });
  }
}

/**
 * Collect SERVER_<n>_NAME / SERVER_<n>_URL pairs, n = 1, 2, ... up to the
 * first missing pair. Entries with an invalid URL are skipped.
 */
export function parseServers(vars: Record<string, string>): Server[] {
  const servers: Server[] = [];

  for (let i = 1; ; i++) {
    const name = vars[`SERVER_${i}_NAME`];
    const url = vars[`SERVER_${i}_URL`];
    if (!name || !url) {
      break;
    }

    const parsed = serverSchema.safeParse({ name, url });
    if (!parsed.success) {
      logger.warn('Skipping invalid server entry', {
        index: i,
        name,
        url,
        error: z.prettifyError(parsed.error),
      });
      continue;
    }
    servers.push(parsed.data);
  }

  return servers;
}

export function loadServers(filePath: string): Server[] {
  return parseServers(definedVars(readEnvFile(filePath)));
}

/**
 * Case-insensitive lookup by server name
 */
export function findServer(
  servers: readonly Server[],
  name: string
): Server | undefined {
  const wanted = name.toLowerCase();
  return servers.find(server => server.name.toLowerCase() === wanted);
}

/**
 * Build the application configuration from the environment and the env file.
 * Process environment variables take precedence over the file.
 */
export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const processVars = definedVars(options.env ?? process.env);
  const homeDir = options.homeDir ?? os.homedir();

  const configFile =
    processVars.INDEXBROWSE_CONFIG ?? path.join(homeDir, CONFIG_FILENAME);
  const vars = { ...definedVars(readEnvFile(configFile)), ...processVars };

  const parsed = envSchema.safeParse(vars);
  if (!parsed.success) {
    throw new ExtendedError({
      message: `Invalid configuration:\n${z.prettifyError(parsed.error)}`,
      details: { configFile },
    });
  }
  const env = parsed.data;

  const cacheDir =
    env.INDEXBROWSE_CACHE_DIR ??
    path.join(env.XDG_CACHE_HOME ?? path.join(homeDir, '.cache'), APP_NAME);
  const configDir =
    env.INDEXBROWSE_CONFIG_DIR ??
    path.join(env.XDG_CONFIG_HOME ?? path.join(homeDir, '.config'), APP_NAME);

  const credentials =
    env.INDEXBROWSE_USERNAME !== undefined &&
    env.INDEXBROWSE_PASSWORD !== undefined
      ? {
          username: env.INDEXBROWSE_USERNAME,
          password: env.INDEXBROWSE_PASSWORD,
        }
      : undefined;

  const servers = parseServers(vars);

  logger.debug('Configuration loaded', {
    configFile,
    cacheDir,
    configDir,
    serverCount: servers.length,
  });

  return {
    configFile,
    cacheDir,
    configDir,
    cacheFile: path.join(cacheDir, LISTING_CACHE_FILENAME),
    bookmarksFile: path.join(configDir, BOOKMARKS_FILENAME),
    ttlSeconds: env.INDEXBROWSE_CACHE_TTL,
    timeoutSeconds: env.INDEXBROWSE_TIMEOUT,
    maxRetries: env.INDEXBROWSE_MAX_RETRIES,
    credentials,
    logLevel: env.LOG_LEVEL,
    servers,
  };
}
