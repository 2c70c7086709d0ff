import { mkdir, mkdtemp, rm, symlink, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isExcluded, walkFiles } from './scanner.js';

describe('isExcluded', () => {
  it('skips property lists and thumbnails', () => {
    expect(isExcluded('/music/thumbs.jpg')).toBe(true);
    expect(isExcluded('/music/x.plist')).toBe(true);
    expect(isExcluded('/music/COVER.JPG')).toBe(true);
  });

  it('skips paths ending in the system sentinel name', () => {
    expect(isExcluded('/music/.DS_Store')).toBe(true);
    expect(isExcluded('/music/album/._.DS_Store')).toBe(true);
  });

  it('keeps everything else', () => {
    expect(isExcluded('/music/song.mp3')).toBe(false);
    expect(isExcluded('/music/cover.png')).toBe(false);
    expect(isExcluded('/music/README')).toBe(false);
  });

  it('honours custom rules', () => {
    const rules = { extensions: ['txt'], names: ['Thumbs.db'] };

    expect(isExcluded('/music/notes.txt', rules)).toBe(true);
    expect(isExcluded('/music/Thumbs.db', rules)).toBe(true);
    expect(isExcluded('/music/thumbs.jpg', rules)).toBe(false);
  });
});

describe('walkFiles', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'walk-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  async function collect(root: string, onError?: (dir: string, reason: string) => void): Promise<string[]> {
    const files: string[] = [];

    for await (const path of walkFiles(root, onError)) {
      files.push(path);
    }

    return files.sort();
  }

  it('yields every file in nested directories', async () => {
    await mkdir(join(dir, 'a', 'b'), { recursive: true });
    await writeFile(join(dir, 'top.mp3'), '1');
    await writeFile(join(dir, 'a', 'mid.flac'), '2');
    await writeFile(join(dir, 'a', 'b', 'deep.txt'), '3');

    expect(await collect(dir)).toEqual([
      join(dir, 'a', 'b', 'deep.txt'),
      join(dir, 'a', 'mid.flac'),
      join(dir, 'top.mp3'),
    ]);
  });

  it('yields nothing for an empty directory', async () => {
    expect(await collect(dir)).toEqual([]);
  });

  it('reports directories it cannot list', async () => {
    const onError = vi.fn();

    expect(await collect(join(dir, 'nope'), onError)).toEqual([]);
    expect(onError).toHaveBeenCalledWith(join(dir, 'nope'), expect.stringContaining('ENOENT'));
  });

  it('skips links to directories but lists links to files and dangling links', async () => {
    await mkdir(join(dir, 'lib'));
    await mkdir(join(dir, 'albums', 'one'), { recursive: true });
    await writeFile(join(dir, 'albums', 'one', 'track.mp3'), 'x');
    await writeFile(join(dir, 'lib', 'song.txt'), 'y');
    await symlink(join(dir, 'albums'), join(dir, 'lib', 'linked-album'));
    await symlink(join(dir, 'lib', 'song.txt'), join(dir, 'lib', 'song-link.txt'));
    await symlink(join(dir, 'lib', 'gone.txt'), join(dir, 'lib', 'dangling.txt'));

    expect(await collect(join(dir, 'lib'))).toEqual([
      join(dir, 'lib', 'dangling.txt'),
      join(dir, 'lib', 'song-link.txt'),
      join(dir, 'lib', 'song.txt'),
    ]);
  });
});
