import { Command } from 'commander';
import type { CliContext } from '../context';
import { loadListing, type LoadListingOptions } from '../listing';
import { formatListing } from '../output';

interface LsOptions extends LoadListingOptions {
  json?: boolean;
}

export function createLsCommand(ctx: CliContext): Command {
  return new Command('ls')
    .description('List folders and files of a directory URL or server')
    .argument('<target>', 'listing URL or configured server name')
    .option('-r, --refresh', 'bypass the cache')
    .option('--json', 'print the listing as JSON')
    .option('-u, --user <username>', 'basic auth user')
    .option('-p, --password <password>', 'basic auth password')
    .action(async (target: string, options: LsOptions) => {
      const { url } = ctx.resolve(target);
      const listing = await loadListing(ctx, url, options);
      if (!listing) return;

      if (options.json) {
        console.log(JSON.stringify(listing, null, 2));
        return;
      }

      for (const line of formatListing(listing)) {
        console.log(line);
      }
    });
}
