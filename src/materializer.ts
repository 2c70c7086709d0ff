import { chmod, copyFile, mkdir, stat, utimes } from 'node:fs/promises';
import type { Stats } from 'node:fs';
import { basename, join } from 'node:path';
import type { CopyProgressSink, CopyReport } from './types.js';
import type { CatalogStore } from './store.js';
import { DEFAULT_CONFIG } from './config.js';
import { assertScansExist } from './reconcile.js';
import { isMissingPathError } from './errors.js';

export interface CopyOptions {
  progressInterval?: number;
  sink?: CopyProgressSink;
}

export const silentCopySink: CopyProgressSink = {
  onStart: () => {},
  onProgress: () => {},
  onMissing: () => {},
};

async function statIfExists(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (error) {
    if (isMissingPathError(error)) {
      return null;
    }

    throw error;
  }
}

// Content, permission bits and timestamps; flattened into the target folder.
async function copyPreservingTimes(sourcePath: string, sourceStats: Stats, targetFolder: string): Promise<string> {
  const destPath = join(targetFolder, basename(sourcePath));

  await copyFile(sourcePath, destPath);
  await chmod(destPath, sourceStats.mode & 0o7777);
  await utimes(destPath, sourceStats.atime, sourceStats.mtime);

  return destPath;
}

export function formatCopySummary(report: CopyReport): string {
  return `${report.copied} out of ${report.total} copied`;
}

export async function copyDiff(
  store: CatalogStore,
  originScan: string,
  destScan: string,
  targetFolder: string,
  options: CopyOptions = {}
): Promise<CopyReport> {
  assertScansExist(store, originScan, destScan);

  const sink = options.sink ?? silentCopySink;
  const progressInterval = options.progressInterval ?? DEFAULT_CONFIG.copyProgressInterval;

  await mkdir(targetFolder, { recursive: true });

  const sources = store.listDiff(originScan, destScan);
  const total = sources.length;
  const missing: string[] = [];
  let copied = 0;
  let processed = 0;

  sink.onStart(total);

  for (const sourcePath of sources) {
    const sourceStats = await statIfExists(sourcePath);

    // Gone, or no longer a regular file: reported as missing.
    if (sourceStats?.isFile()) {
      await copyPreservingTimes(sourcePath, sourceStats, targetFolder);
      copied++;
    } else {
      missing.push(sourcePath);
      sink.onMissing(sourcePath);
    }

    processed++;

    if (processed % progressInterval === 0) {
      sink.onProgress(processed, total, (processed / total) * 100);
    }
  }

  return { total, copied, missing, targetFolder };
}
