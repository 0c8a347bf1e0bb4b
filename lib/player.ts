import { spawn, type ChildProcess, type SpawnOptions } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { ExtendedError } from './errors';
import { createLogger } from './logger';
import { buildPlaylist, isImage, isVideo } from './media';
import type { FileRef } from '@/types/listing';

const logger = createLogger('player');

export const SUPPORTED_PLAYERS = ['mpv', 'vlc', 'iina'] as const;

export type PlayerName = (typeof SUPPORTED_PLAYERS)[number];

export interface PlayerCommand {
  command: string;
  args: string[];
  // image viewers keep running in the background
  detached: boolean;
}

export type SpawnFn = (
  command: string,
  args: readonly string[],
  options: SpawnOptions
) => ChildProcess;

export function isPlayerName(value: string): value is PlayerName {
  return SUPPORTED_PLAYERS.some(player => player === value);
}

async function isExecutable(filePath: string): Promise<boolean> {
  try {
    await fs.promises.access(filePath, fs.constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Supported players found on PATH, in preference order
 */
export async function findAvailablePlayers(
  searchPath: string = process.env.PATH ?? ''
): Promise<PlayerName[]> {
  const dirs = searchPath.split(path.delimiter).filter(Boolean);
  const available: PlayerName[] = [];

  for (const player of SUPPORTED_PLAYERS) {
    for (const dir of dirs) {
      if (await isExecutable(path.join(dir, player))) {
        available.push(player);
        break;
      }
    }
  }

  logger.debug('Detected media players', { available });
  return available;
}

/**
 * Command that opens one file, or null for files that are neither video nor image
 */
export function buildPlayerCommand(
  player: PlayerName,
  file: FileRef
): PlayerCommand | null {
  if (isImage(file)) {
    const args =
      player === 'mpv' ? ['--loop-file=inf', file.url] : [file.url];
    return { command: player, args, detached: true };
  }

  if (isVideo(file)) {
    return { command: player, args: [file.url], detached: false };
  }

  return null;
}

/**
 * Command that plays every video in the listing. mpv reads the playlist
 * file; the other players take the URLs as arguments.
 */
export function buildPlayAllCommand(
  player: PlayerName,
  files: readonly FileRef[],
  playlistPath: string
): PlayerCommand | null {
  const videos = files.filter(isVideo);
  if (videos.length === 0) {
    return null;
  }

  if (player === 'mpv') {
    return {
      command: player,
      args: [`--playlist=${playlistPath}`],
      detached: false,
    };
  }

  return {
    command: player,
    args: videos.map(file => file.url),
    detached: false,
  };
}

/**
 * Write the video playlist to a temp file. The file is left for the OS to clean up.
 */
export async function writePlaylist(
  files: readonly FileRef[],
  dir: string = os.tmpdir()
): Promise<string | null> {
  const playlist = buildPlaylist(files);
  if (!playlist) {
    return null;
  }

  const playlistPath = path.join(dir, `indexbrowse-${Date.now()}.m3u`);
  await fs.promises.writeFile(playlistPath, playlist, 'utf8');
  logger.debug('Playlist written', { playlistPath });
  return playlistPath;
}

/**
 * Start the player. Attached runs resolve with the exit code once the player
 * closes; detached runs resolve with null as soon as the process starts.
 */
export function launchPlayer(
  playerCommand: PlayerCommand,
  spawnImpl: SpawnFn = spawn
): Promise<number | null> {
  logger.info('Launching player', {
    command: playerCommand.command,
    args: playerCommand.args,
    detached: playerCommand.detached,
  });

  return new Promise((resolve, reject) => {
    const child = spawnImpl(playerCommand.command, playerCommand.args, {
      stdio: playerCommand.detached ? 'ignore' : 'inherit',
      detached: playerCommand.detached,
    });

    child.once('error', error => {
      reject(
        new ExtendedError({
          message: `Could not start ${playerCommand.command}`,
          cause: error,
          details: { command: playerCommand.command },
        })
      );
    });

    if (playerCommand.detached) {
      child.once('spawn', () => {
        child.unref();
        resolve(null);
      });
    } else {
      child.once('close', code => resolve(code));
    }
  });
}
