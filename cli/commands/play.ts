import { Command } from 'commander';
import {
  buildPlayAllCommand,
  buildPlayerCommand,
  findAvailablePlayers,
  isPlayerName,
  launchPlayer,
  writePlaylist,
  SUPPORTED_PLAYERS,
  type PlayerCommand,
  type PlayerName,
} from '@/lib/player';
import type { CliContext } from '../context';
import { loadListing, type LoadListingOptions } from '../listing';
import { UsageError } from '../output';

interface PlayOptions extends LoadListingOptions {
  player?: string;
}

interface PlayFileOptions extends PlayOptions {
  file: string;
}

async function choosePlayer(requested: string | undefined): Promise<PlayerName> {
  if (requested !== undefined) {
    if (!isPlayerName(requested)) {
      throw new UsageError(
        `Unsupported player "${requested}". Choose one of: ${SUPPORTED_PLAYERS.join(', ')}`
      );
    }
    return requested;
  }

  const [first] = await findAvailablePlayers();
  if (!first) {
    throw new UsageError(
      `No media player found on PATH. Install one of: ${SUPPORTED_PLAYERS.join(', ')}`
    );
  }
  return first;
}

async function run(command: PlayerCommand): Promise<void> {
  const exitCode = await launchPlayer(command);
  if (exitCode !== null && exitCode !== 0) {
    process.exitCode = exitCode;
  }
}

export function createPlayCommand(ctx: CliContext): Command {
  return new Command('play')
    .description('Open one video or image from a listing')
    .argument('<target>', 'listing URL or configured server name')
    .requiredOption('-f, --file <name>', 'file to open')
    .option('--player <player>', `one of ${SUPPORTED_PLAYERS.join(', ')}`)
    .option('-r, --refresh', 'bypass the cache')
    .option('-u, --user <username>', 'basic auth user')
    .option('-p, --password <password>', 'basic auth password')
    .action(async (target: string, options: PlayFileOptions) => {
      const player = await choosePlayer(options.player);
      const { url } = ctx.resolve(target);
      const listing = await loadListing(ctx, url, options);
      if (!listing) return;

      const file = listing.files.find(entry => entry.name === options.file);
      if (!file) {
        throw new UsageError(`No file named "${options.file}" in ${url}`);
      }

      const command = buildPlayerCommand(player, file);
      if (!command) {
        throw new UsageError(`${file.name} is not a video or image`);
      }

      await run(command);
    });
}

export function createPlayAllCommand(ctx: CliContext): Command {
  return new Command('play-all')
    .description('Play every video of a listing')
    .argument('<target>', 'listing URL or configured server name')
    .option('--player <player>', `one of ${SUPPORTED_PLAYERS.join(', ')}`)
    .option('-r, --refresh', 'bypass the cache')
    .option('-u, --user <username>', 'basic auth user')
    .option('-p, --password <password>', 'basic auth password')
    .action(async (target: string, options: PlayOptions) => {
      const player = await choosePlayer(options.player);
      const { url } = ctx.resolve(target);
      const listing = await loadListing(ctx, url, options);
      if (!listing) return;

      const playlistPath =
        player === 'mpv' ? await writePlaylist(listing.files) : '';
      const command =
        playlistPath === null
          ? null
          : buildPlayAllCommand(player, listing.files, playlistPath);

      if (!command) {
        console.error(`No videos in ${url}`);
        process.exitCode = 1;
        return;
      }

      await run(command);
    });
}
