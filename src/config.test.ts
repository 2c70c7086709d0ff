import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { DEFAULT_CONFIG, loadConfig, parseConfig } from './config.js';
import { ConfigError } from './errors.js';

describe('parseConfig', () => {
  it('fills missing fields with defaults', () => {
    expect(parseConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('normalizes extensions and expands the home directory', () => {
    const config = parseConfig({
      dbPath: '~/catalog.db',
      excludeExtensions: ['.PLIST', 'Jpg'],
      scanProgressInterval: 10,
    });

    expect(config.dbPath).toBe(join(homedir(), 'catalog.db'));
    expect(config.excludeExtensions).toEqual(['plist', 'jpg']);
    expect(config.scanProgressInterval).toBe(10);
    expect(config.copyProgressInterval).toBe(250);
  });

  it('rejects values of the wrong type', () => {
    expect(() => parseConfig([])).toThrow(ConfigError);
    expect(() => parseConfig({ excludeNames: 'x' })).toThrow(/"excludeNames" must be a list of strings/);
    expect(() => parseConfig({ hashChunkSize: 0 })).toThrow(/"hashChunkSize" must be a positive integer/);
    expect(() => parseConfig({ dbPath: '' })).toThrow(/"dbPath" must be a non-empty string/);
  });
});

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('falls back to defaults when the file is missing', async () => {
    expect(await loadConfig(join(dir, 'config.json'), {})).toEqual(DEFAULT_CONFIG);
  });

  it('reads values from the file', async () => {
    const file = join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ dbPath: '/srv/catalog.db', copyProgressInterval: 5 }));

    const config = await loadConfig(file, {});

    expect(config.dbPath).toBe('/srv/catalog.db');
    expect(config.copyProgressInterval).toBe(5);
  });

  it('lets the environment override the database path', async () => {
    const file = join(dir, 'config.json');
    await writeFile(file, JSON.stringify({ dbPath: '/srv/catalog.db' }));

    const config = await loadConfig(file, { MUSIC_CATALOG_DB: '/tmp/other.db' });

    expect(config.dbPath).toBe('/tmp/other.db');
  });

  it('raises a ConfigError for malformed JSON', async () => {
    const file = join(dir, 'config.json');
    await writeFile(file, '{ nope');

    await expect(loadConfig(file, {})).rejects.toBeInstanceOf(ConfigError);
  });
});
