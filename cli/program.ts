import { Command } from 'commander';
import { APP_NAME } from '@/lib/config';
import type { CliContext } from './context';
import { createBookmarksCommand } from './commands/bookmarks';
import { createCacheCommand } from './commands/cache';
import { createDownloadCommand } from './commands/download';
import { createLsCommand } from './commands/ls';
import { createPlayAllCommand, createPlayCommand } from './commands/play';
import { createProbeCommand } from './commands/probe';
import { createServersCommand } from './commands/servers';

export function buildProgram(ctx: CliContext): Command {
  return new Command(APP_NAME)
    .description('Browse, cache and fetch HTTP directory listings')
    .addCommand(createServersCommand(ctx))
    .addCommand(createLsCommand(ctx))
    .addCommand(createProbeCommand(ctx))
    .addCommand(createCacheCommand(ctx))
    .addCommand(createDownloadCommand(ctx))
    .addCommand(createPlayCommand(ctx))
    .addCommand(createPlayAllCommand(ctx))
    .addCommand(createBookmarksCommand(ctx));
}
