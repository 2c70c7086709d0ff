import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { homedir } from 'node:os';
import type { Config } from './types.js';
import { ConfigError, isMissingPathError } from './errors.js';

export const CONFIG_FILE = join(process.cwd(), 'config.json');
export const DB_ENV_VAR = 'MUSIC_CATALOG_DB';

export const DEFAULT_CONFIG: Config = {
  dbPath: join(process.cwd(), 'data', 'catalog.db'),
  excludeExtensions: ['plist', 'jpg'],
  excludeNames: ['.DS_Store'],
  supportedExtensions: [
    'mp3', 'mp4', 'm4a', 'm4b', 'aac', 'flac', 'ogg',
    'oga', 'opus', 'wav', 'wma', 'aiff', 'aif',
  ],
  hashChunkSize: 4096,
  scanProgressInterval: 500,
  copyProgressInterval: 250,
};

export function expandPath(path: string): string {
  if (path === '~' || path.startsWith('~/')) {
    return path.replace('~', homedir());
  }

  return path;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(raw: Record<string, unknown>, key: string, file: string): string | undefined {
  const value = raw[key];

  if (value === undefined) {
    return undefined;
  }

  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(file, `"${key}" must be a non-empty string`);
  }

  return value;
}

function readStringList(raw: Record<string, unknown>, key: string, file: string): string[] | undefined {
  const value = raw[key];

  if (value === undefined) {
    return undefined;
  }

  if (!Array.isArray(value) || !value.every((item) => typeof item === 'string')) {
    throw new ConfigError(file, `"${key}" must be a list of strings`);
  }

  return value.map((item) => String(item));
}

function readPositiveInt(raw: Record<string, unknown>, key: string, file: string): number | undefined {
  const value = raw[key];

  if (value === undefined) {
    return undefined;
  }

  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(file, `"${key}" must be a positive integer`);
  }

  return value;
}

export function parseConfig(raw: unknown, file: string = CONFIG_FILE): Config {
  if (!isRecord(raw)) {
    throw new ConfigError(file, 'expected a JSON object');
  }

  const dbPath = readString(raw, 'dbPath', file);

  return {
    dbPath: expandPath(dbPath ?? DEFAULT_CONFIG.dbPath),
    excludeExtensions: (readStringList(raw, 'excludeExtensions', file) ?? DEFAULT_CONFIG.excludeExtensions)
      .map((ext) => ext.replace(/^\./, '').toLowerCase()),
    excludeNames: readStringList(raw, 'excludeNames', file) ?? DEFAULT_CONFIG.excludeNames,
    supportedExtensions: (readStringList(raw, 'supportedExtensions', file) ?? DEFAULT_CONFIG.supportedExtensions)
      .map((ext) => ext.replace(/^\./, '').toLowerCase()),
    hashChunkSize: readPositiveInt(raw, 'hashChunkSize', file) ?? DEFAULT_CONFIG.hashChunkSize,
    scanProgressInterval: readPositiveInt(raw, 'scanProgressInterval', file) ?? DEFAULT_CONFIG.scanProgressInterval,
    copyProgressInterval: readPositiveInt(raw, 'copyProgressInterval', file) ?? DEFAULT_CONFIG.copyProgressInterval,
  };
}

export async function loadConfig(
  file: string = CONFIG_FILE,
  env: NodeJS.ProcessEnv = process.env
): Promise<Config> {
  let config: Config;

  try {
    const data = await readFile(file, 'utf-8');
    let raw: unknown;

    try {
      raw = JSON.parse(data);
    } catch (error) {
      throw new ConfigError(file, error instanceof Error ? error.message : String(error));
    }

    config = parseConfig(raw, file);
  } catch (error) {
    if (!isMissingPathError(error)) {
      throw error;
    }

    config = { ...DEFAULT_CONFIG };
  }

  const envDb = env[DB_ENV_VAR];

  if (envDb) {
    config.dbPath = expandPath(envDb);
  }

  return config;
}
