import { ChildProcess } from 'child_process';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  buildPlayAllCommand,
  buildPlayerCommand,
  findAvailablePlayers,
  isPlayerName,
  launchPlayer,
  writePlaylist,
  type SpawnFn,
} from './player';

vi.mock('@/lib/logger', () => ({
  createLogger: () => ({
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  }),
}));

const video = { name: 'clip.mp4', url: 'http://h/clip.mp4' };
const image = { name: 'cover.jpg', url: 'http://h/cover.jpg' };
const text = { name: 'notes.txt', url: 'http://h/notes.txt' };

describe('buildPlayerCommand', () => {
  it('loops images in mpv and detaches', () => {
    expect(buildPlayerCommand('mpv', image)).toEqual({
      command: 'mpv',
      args: ['--loop-file=inf', 'http://h/cover.jpg'],
      detached: true,
    });
    expect(buildPlayerCommand('vlc', image)).toEqual({
      command: 'vlc',
      args: ['http://h/cover.jpg'],
      detached: true,
    });
  });

  it('plays videos attached', () => {
    expect(buildPlayerCommand('iina', video)).toEqual({
      command: 'iina',
      args: ['http://h/clip.mp4'],
      detached: false,
    });
  });

  it('refuses other files', () => {
    expect(buildPlayerCommand('mpv', text)).toBeNull();
  });
});

describe('buildPlayAllCommand', () => {
  const files = [video, image, { name: 'b.mkv', url: 'http://h/b.mkv' }];

  it('hands mpv the playlist file', () => {
    expect(buildPlayAllCommand('mpv', files, '/tmp/list.m3u')).toEqual({
      command: 'mpv',
      args: ['--playlist=/tmp/list.m3u'],
      detached: false,
    });
  });

  it('passes video URLs to other players', () => {
    expect(buildPlayAllCommand('vlc', files, '')).toEqual({
      command: 'vlc',
      args: ['http://h/clip.mp4', 'http://h/b.mkv'],
      detached: false,
    });
  });

  it('returns null without videos', () => {
    expect(buildPlayAllCommand('mpv', [image, text], '/tmp/list.m3u')).toBeNull();
  });
});

describe('isPlayerName', () => {
  it('accepts only supported players', () => {
    expect(isPlayerName('mpv')).toBe(true);
    expect(isPlayerName('totem')).toBe(false);
  });
});

describe('with a temporary directory', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'player-'));
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('finds executable players on the search path', async () => {
    await fs.promises.writeFile(path.join(dir, 'vlc'), '', { mode: 0o755 });
    await fs.promises.writeFile(path.join(dir, 'mpv'), '', { mode: 0o644 });

    expect(await findAvailablePlayers(dir)).toEqual(['vlc']);
  });

  it('writes the playlist of videos', async () => {
    const playlistPath = await writePlaylist([video, image], dir);

    expect(playlistPath).not.toBeNull();
    if (playlistPath) {
      expect(path.dirname(playlistPath)).toBe(dir);
      expect(await fs.promises.readFile(playlistPath, 'utf8')).toBe(
        'http://h/clip.mp4\n'
      );
    }
  });

  it('writes no playlist without videos', async () => {
    expect(await writePlaylist([image], dir)).toBeNull();
  });
});

describe('launchPlayer', () => {
  it('resolves with the exit code of an attached player', async () => {
    const spawnImpl = vi.fn<SpawnFn>(() => {
      const child = new ChildProcess();
      setImmediate(() => child.emit('close', 3));
      return child;
    });

    const code = await launchPlayer(
      { command: 'mpv', args: ['http://h/clip.mp4'], detached: false },
      spawnImpl
    );

    expect(code).toBe(3);
    expect(spawnImpl).toHaveBeenCalledWith('mpv', ['http://h/clip.mp4'], {
      stdio: 'inherit',
      detached: false,
    });
  });

  it('resolves once a detached player starts', async () => {
    const spawnImpl = vi.fn<SpawnFn>(() => {
      const child = new ChildProcess();
      setImmediate(() => child.emit('spawn'));
      return child;
    });

    await expect(
      launchPlayer({ command: 'vlc', args: ['http://h/cover.jpg'], detached: true }, spawnImpl)
    ).resolves.toBeNull();
  });

  it('rejects when the player cannot start', async () => {
    const spawnImpl = vi.fn<SpawnFn>(() => {
      const child = new ChildProcess();
      setImmediate(() => child.emit('error', new Error('spawn mpv ENOENT')));
      return child;
    });

    await expect(
      launchPlayer({ command: 'mpv', args: [], detached: false }, spawnImpl)
    ).rejects.toThrow('Could not start mpv');
  });
});
