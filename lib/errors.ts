/**
 * Extended Error class that preserves error context and details
 *
 * Usage:
 * ```ts
 * throw new ExtendedError({
 *   message: 'Failed to save bookmarks',
 *   cause: originalError,
 *   details: {
 *     filePath: '/home/me/.config/indexbrowse/bookmarks.json',
 *   }
 * });
 * ```
 */

export interface ExtendedErrorOptions {
  message: string;
  cause?: Error | unknown;
  details?: Record<string, unknown>;
}

export class ExtendedError extends Error {
  public readonly cause?: Error | unknown;
  public readonly details?: Record<string, unknown>;

  constructor(options: ExtendedErrorOptions) {
    super(options.message);
    this.name = 'ExtendedError';
    this.cause = options.cause;
    this.details = options.details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }

  /**
   * Type guard to check if an error is an ExtendedError
   */
  static isExtendedError(error: unknown): error is ExtendedError {
    return error instanceof ExtendedError;
  }
}

/**
 * Closed set of failures a listing request can end in.
 */
export type ListingErrorKind =
  | 'connection'
  | 'timeout'
  | 'authentication'
  | 'not_found'
  | 'server';

export interface ListingErrorOptions extends ExtendedErrorOptions {
  kind: ListingErrorKind;
}

/**
 * Failure of a directory listing request, discriminated by `kind`.
 * `details.url` is always set; `details.statusCode` when the server answered.
 */
export class ListingError extends ExtendedError {
  public readonly kind: ListingErrorKind;

  constructor(options: ListingErrorOptions) {
    super(options);
    this.name = 'ListingError';
    this.kind = options.kind;
  }

  get statusCode(): number | undefined {
    const statusCode = this.details?.statusCode;
    return typeof statusCode === 'number' ? statusCode : undefined;
  }

  static isListingError(error: unknown): error is ListingError {
    return error instanceof ListingError;
  }
}

const RETRYABLE_KINDS: ReadonlySet<ListingErrorKind> = new Set([
  'connection',
  'timeout',
  'server',
]);

/**
 * Authentication and not-found failures are terminal; everything else may
 * succeed on another attempt.
 */
export function isRetryableListingError(error: ListingError): boolean {
  return RETRYABLE_KINDS.has(error.kind);
}
