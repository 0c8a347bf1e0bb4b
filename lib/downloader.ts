import fs from 'fs';
import path from 'path';
import { ExtendedError } from './errors';
import {
  basicAuthHeader,
  classifyStatus,
  classifyTransportError,
  discardBody,
  type FetchLike,
} from './listing-fetcher';
import { createLogger } from './logger';
import type { BasicCredentials, FileRef } from '@/types/listing';

const logger = createLogger('downloader');

export type DownloadResult =
  | { ok: true; filePath: string; bytes: number }
  | { ok: false; error: ExtendedError };

export interface DownloadOptions {
  credentials?: BasicCredentials;
  fetchImpl?: FetchLike;
  signal?: AbortSignal;
  onProgress?: (downloadedBytes: number, totalBytes: number | null) => void;
}

export interface DownloadAllOptions extends DownloadOptions {
  onFileStart?: (file: FileRef, index: number, total: number) => void;
  onFileDone?: (file: FileRef, result: DownloadResult) => void;
}

const FALLBACK_FILE_NAME = 'download';

/**
 * Local file name for a listing entry: the entry's base name, or the last
 * URL path segment when the name is unusable.
 */
export function localFileName(file: FileRef): string {
  const fromName = path.basename(file.name.trim());
  if (fromName && fromName !== '.' && fromName !== '..') {
    return fromName;
  }

  try {
    const segments = new URL(file.url).pathname.split('/').filter(Boolean);
    const last = segments.at(-1);
    if (last) {
      return path.basename(decodeURIComponent(last));
    }
  } catch (error) {
    logger.debug('Could not derive file name from URL', {
      url: file.url,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  return FALLBACK_FILE_NAME;
}

function parseContentLength(response: Response): number | null {
  const header = response.headers.get('content-length');
  if (header === null) return null;
  const length = Number.parseInt(header, 10);
  return Number.isFinite(length) && length >= 0 ? length : null;
}

async function removePartial(filePath: string): Promise<void> {
  try {
    await fs.promises.rm(filePath, { force: true });
  } catch (error) {
    logger.warn('Could not remove partial download', {
      filePath,
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

async function cancelReader(
  reader: { cancel(reason?: unknown): Promise<void> },
  reason: unknown
): Promise<void> {
  try {
    await reader.cancel(reason);
  } catch (error) {
    logger.debug('Could not cancel download stream', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Stream one file into `destinationDir`, creating the directory if needed.
 * A failed download leaves no partial file behind.
 */
export async function downloadFile(
  file: FileRef,
  destinationDir: string,
  options: DownloadOptions = {}
): Promise<DownloadResult> {
  const { credentials, fetchImpl = fetch, signal, onProgress } = options;
  const filePath = path.join(destinationDir, localFileName(file));

  const headers: Record<string, string> = {};
  if (credentials) {
    headers.Authorization = basicAuthHeader(credentials);
  }

  let response: Response;
  try {
    response = await fetchImpl(file.url, {
      headers,
      redirect: 'follow',
      signal,
    });
  } catch (error) {
    if (signal?.aborted) {
      throw signal.reason;
    }
    return { ok: false, error: classifyTransportError(error, file.url) };
  }

  const statusError = classifyStatus(response.status, file.url);
  if (statusError) {
    await discardBody(response);
    logger.warn('Download request failed', {
      url: file.url,
      statusCode: response.status,
    });
    return { ok: false, error: statusError };
  }

  const totalBytes = parseContentLength(response);
  const reader = response.body?.getReader();
  let downloadedBytes = 0;

  try {
    await fs.promises.mkdir(destinationDir, { recursive: true });
    const handle = await fs.promises.open(filePath, 'w');

    try {
      if (reader) {
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          await handle.write(value);
          downloadedBytes += value.byteLength;
          onProgress?.(downloadedBytes, totalBytes);
        }
      }
    } finally {
      await handle.close();
    }
  } catch (error) {
    if (reader) {
      await cancelReader(reader, error);
    }
    await removePartial(filePath);

    if (signal?.aborted) {
      throw signal.reason;
    }

    return {
      ok: false,
      error: new ExtendedError({
        message: `Error saving ${file.name}: ${error instanceof Error ? error.message : String(error)}`,
        cause: error,
        details: { url: file.url, filePath, downloadedBytes },
      }),
    };
  }

  logger.info('File downloaded', {
    url: file.url,
    filePath,
    bytes: downloadedBytes,
  });

  return { ok: true, filePath, bytes: downloadedBytes };
}

/**
 * Download files one after another, carrying on past individual failures.
 */
export async function downloadAll(
  files: readonly FileRef[],
  destinationDir: string,
  options: DownloadAllOptions = {}
): Promise<{ succeeded: number; failed: number }> {
  const { onFileStart, onFileDone, ...downloadOptions } = options;
  let succeeded = 0;
  let failed = 0;

  for (const [index, file] of files.entries()) {
    onFileStart?.(file, index, files.length);

    const result = await downloadFile(file, destinationDir, downloadOptions);
    if (result.ok) {
      succeeded++;
    } else {
      failed++;
      logger.error(`Error downloading ${file.name}`, result.error);
    }

    onFileDone?.(file, result);
  }

  logger.info('Download batch finished', {
    destinationDir,
    succeeded,
    failed,
  });

  return { succeeded, failed };
}
