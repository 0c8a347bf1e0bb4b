import { ExtendedError, type ListingError } from '@/lib/errors';
import { findServer } from '@/lib/config';
import type { BasicCredentials, ParsedListing } from '@/types/listing';
import type { Server } from '@/types/server';

/**
 * Bad arguments or an unknown target. The entry point exits with 2.
 */
export class UsageError extends ExtendedError {
  constructor(message: string, details?: Record<string, unknown>) {
    super({ message, details });
    this.name = 'UsageError';
  }

  static isUsageError(error: unknown): error is UsageError {
    return error instanceof UsageError;
  }
}

export interface ResolvedTarget {
  url: string;
  server?: Server;
}

export function isHttpUrl(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

/**
 * A target is either an http(s) URL or the name of a configured server.
 */
export function resolveTarget(
  target: string,
  servers: readonly Server[],
  configFile: string
): ResolvedTarget {
  if (isHttpUrl(target)) {
    return { url: target };
  }

  if (servers.length === 0) {
    throw new UsageError(
      `No servers configured. Add SERVER_1_NAME and SERVER_1_URL to ${configFile}`,
      { configFile }
    );
  }

  const server = findServer(servers, target);
  if (!server) {
    throw new UsageError(
      `Unknown server "${target}". Known servers: ${servers.map(s => s.name).join(', ')}`,
      { target }
    );
  }

  return { url: server.url, server };
}

/**
 * Credentials from -u/-p, falling back to the configured ones
 */
export function resolveCredentials(
  options: { user?: string; password?: string },
  fallback: BasicCredentials | undefined
): BasicCredentials | undefined {
  const { user, password } = options;
  if (user === undefined && password === undefined) {
    return fallback;
  }
  if (user === undefined || password === undefined) {
    throw new UsageError('--user and --password must be given together');
  }
  return { username: user, password };
}

export function formatListing(listing: ParsedListing): string[] {
  return [
    ...listing.folders.map(folder => `d ${folder.name}\t${folder.url}`),
    ...listing.files.map(file => `f ${file.name}\t${file.url}`),
  ];
}

function errorHint(error: ListingError): string {
  switch (error.kind) {
    case 'authentication':
      return 'Pass --user and --password, or set INDEXBROWSE_USERNAME and INDEXBROWSE_PASSWORD';
    case 'not_found':
      return 'Check the path; the directory may have moved';
    case 'timeout':
      return 'The server is slow to answer; raise INDEXBROWSE_TIMEOUT or try again later';
    case 'connection':
      return 'Check the network and the server address';
    case 'server':
      return 'The server failed to answer; try again later';
  }
}

export function formatListingError(error: ListingError): string {
  return `Error: ${error.message}\nHint: ${errorHint(error)}`;
}

export function formatBytes(bytes: number): string {
  const units = ['B', 'KB', 'MB', 'GB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}
