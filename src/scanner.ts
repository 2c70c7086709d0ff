import { readdir, stat } from 'node:fs/promises';
import type { Dirent } from 'node:fs';
import { join } from 'node:path';
import type { ExclusionRules } from './types.js';
import { DEFAULT_CONFIG } from './config.js';
import { fileExtension } from './metadata.js';
import { errorMessage } from './errors.js';

export const DEFAULT_EXCLUSIONS: ExclusionRules = {
  extensions: DEFAULT_CONFIG.excludeExtensions,
  names: DEFAULT_CONFIG.excludeNames,
};

export function isExcluded(fullPath: string, rules: ExclusionRules = DEFAULT_EXCLUSIONS): boolean {
  const ext = fileExtension(fullPath);

  if (ext && rules.extensions.includes(ext)) {
    return true;
  }

  return rules.names.some((name) => fullPath.endsWith(name));
}

// Links to directories are neither followed nor listed; dangling links are listed.
async function isDirectoryLink(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function* walkFiles(
  dir: string,
  onError?: (dir: string, reason: string) => void
): AsyncGenerator<string> {
  let entries: Dirent[];

  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch (error) {
    onError?.(dir, errorMessage(error));
    return;
  }

  for (const entry of entries) {
    const fullPath = join(dir, entry.name);

    if (entry.isDirectory()) {
      yield* walkFiles(fullPath, onError);
      continue;
    }

    if (entry.isFile()) {
      yield fullPath;
      continue;
    }

    if (entry.isSymbolicLink() && !(await isDirectoryLink(fullPath))) {
      yield fullPath;
    }
  }
}
