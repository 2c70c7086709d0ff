import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { createHash } from 'node:crypto';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { hashFile } from './hasher.js';

describe('hashFile', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'hasher-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('produces the sha256 hex digest of the file', async () => {
    const path = join(dir, 'hello.txt');
    await writeFile(path, 'hello');

    expect(await hashFile(path)).toBe('2cf24dba5fb0a30e26e83b2ac5b9e29e1b161e5c1fa7425e73043362938b9824');
  });

  it('gives the same digest whatever the chunk size', async () => {
    const path = join(dir, 'big.bin');
    const content = Buffer.alloc(10_000, 7);
    await writeFile(path, content);

    const expected = createHash('sha256').update(content).digest('hex');

    expect(await hashFile(path, 3)).toBe(expected);
    expect(await hashFile(path, 4096)).toBe(expected);
  });

  it('hashes empty files', async () => {
    const path = join(dir, 'empty');
    await writeFile(path, '');

    expect(await hashFile(path)).toBe('e3b0c44298fc1c149afbf4c8996fb92427ae41e4649b934ca495991b7852b855');
  });

  it('rejects when the file cannot be read', async () => {
    await expect(hashFile(join(dir, 'missing.mp3'))).rejects.toThrow(/ENOENT/);
  });
});
