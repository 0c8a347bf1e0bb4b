import type { ParsedListing } from '@/types/listing';
import type { CliContext } from './context';
import { formatListingError, resolveCredentials } from './output';

export interface CredentialOptions {
  user?: string;
  password?: string;
}

export interface LoadListingOptions extends CredentialOptions {
  refresh?: boolean;
}

/**
 * Fetch a listing for a command. Failures are reported on stderr and
 * yield null with the exit code set.
 */
export async function loadListing(
  ctx: CliContext,
  url: string,
  options: LoadListingOptions = {}
): Promise<ParsedListing | null> {
  const result = await ctx.service.getListing(url, {
    credentials: resolveCredentials(options, ctx.config.credentials),
    forceRefresh: options.refresh ?? false,
  });

  if (!result.ok) {
    console.error(formatListingError(result.error));
    process.exitCode = 1;
    return null;
  }

  return result.listing;
}
