import { Command } from 'commander';
import type { CliContext } from '../context';
import { formatBytes } from '../output';

export function createCacheCommand(ctx: CliContext): Command {
  const cache = new Command('cache').description('Inspect or prune the listing cache');

  cache
    .command('stats')
    .description('Show cache statistics')
    .action(async () => {
      const stats = await ctx.store.stats();
      console.log(`location\t${stats.location}`);
      console.log(`entries\t${stats.totalEntries}`);
      console.log(`valid\t${stats.validEntries}`);
      console.log(`expired\t${stats.expiredEntries}`);
      console.log(`size\t${formatBytes(stats.sizeBytes)}`);
      console.log(`ttl\t${stats.ttlSeconds} s`);
    });

  cache
    .command('clear')
    .description('Delete every cached listing')
    .action(async () => {
      await ctx.store.clearAll();
      console.log('Cache cleared');
    });

  cache
    .command('purge')
    .description('Delete expired listings')
    .action(async () => {
      const removed = await ctx.store.purgeExpired();
      console.log(`Removed ${removed} expired ${removed === 1 ? 'entry' : 'entries'}`);
    });

  cache
    .command('invalidate')
    .description('Forget the cached listing of one URL or server')
    .argument('<target>', 'listing URL or configured server name')
    .action(async (target: string) => {
      const { url } = ctx.resolve(target);
      await ctx.service.invalidate(url);
      console.log(`Invalidated ${url}`);
    });

  return cache;
}
