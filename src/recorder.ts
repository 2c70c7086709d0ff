import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import type {
  ExclusionRules,
  FileOutcome,
  FileRecord,
  MetadataExtractor,
  RawTags,
  ScanProgressSink,
  ScanResult,
} from './types.js';
import type { CatalogStore } from './store.js';
import { DEFAULT_CONFIG } from './config.js';
import { hashFile } from './hasher.js';
import { createMusicMetadataExtractor, fileExtension, parseYear } from './metadata.js';
import { DEFAULT_EXCLUSIONS, isExcluded, walkFiles } from './scanner.js';
import { ScanConflictError, ScanRootError, errorMessage } from './errors.js';

export interface ScanOptions {
  extractor?: MetadataExtractor;
  exclusions?: ExclusionRules;
  chunkSize?: number;
  progressInterval?: number;
  sink?: ScanProgressSink;
  clock?: () => Date;
}

export const silentScanSink: ScanProgressSink = {
  onProgress: () => {},
  onUnhashable: () => {},
  onFileError: () => {},
  onDirectoryError: () => {},
};

interface FileContext {
  store: CatalogStore;
  scanName: string;
  extractor: MetadataExtractor;
  exclusions: ExclusionRules;
  chunkSize: number;
  sink: ScanProgressSink;
}

async function digestOrNull(path: string, ctx: FileContext): Promise<string | null> {
  try {
    return await hashFile(path, ctx.chunkSize);
  } catch (error) {
    ctx.sink.onUnhashable(path, errorMessage(error));
    return null;
  }
}

export function buildFileRecord(
  fullPath: string,
  scanName: string,
  tags: RawTags | null,
  taggable: boolean,
  contentDigest: string | null
): FileRecord {
  return {
    fileName: basename(fullPath),
    fullPath,
    extension: fileExtension(fullPath),
    songTitle: tags?.title ?? null,
    albumName: tags?.album ?? null,
    albumArtist: tags?.artist ?? null,
    genre: tags?.genre ?? null,
    year: parseYear(tags?.year),
    duration: tags?.duration ?? null,
    taggable,
    scanName,
    contentDigest,
  };
}

async function processFile(fullPath: string, ctx: FileContext): Promise<FileOutcome> {
  if (isExcluded(fullPath, ctx.exclusions)) {
    return { status: 'skipped', path: fullPath };
  }

  try {
    const contentDigest = await digestOrNull(fullPath, ctx);
    const taggable = ctx.extractor.isSupported(fullPath);
    const tags = taggable ? await ctx.extractor.extract(fullPath) : null;

    ctx.store.insertFile(buildFileRecord(fullPath, ctx.scanName, tags, taggable, contentDigest));

    return { status: 'recorded', path: fullPath, taggable };
  } catch (error) {
    return { status: 'failed', path: fullPath, reason: errorMessage(error) };
  }
}

async function assertDirectory(rootPath: string): Promise<void> {
  let isDirectory: boolean;

  try {
    isDirectory = (await stat(rootPath)).isDirectory();
  } catch (error) {
    throw new ScanRootError(rootPath, errorMessage(error));
  }

  if (!isDirectory) {
    throw new ScanRootError(rootPath, 'not a directory');
  }
}

export async function startScan(
  store: CatalogStore,
  rootPath: string,
  scanName: string,
  options: ScanOptions = {}
): Promise<ScanResult> {
  if (store.hasScan(scanName)) {
    return { status: 'conflict', scanName };
  }

  await assertDirectory(rootPath);

  const clock = options.clock ?? (() => new Date());
  const progressInterval = options.progressInterval ?? DEFAULT_CONFIG.scanProgressInterval;
  const ctx: FileContext = {
    store,
    scanName,
    extractor: options.extractor ?? createMusicMetadataExtractor(),
    exclusions: options.exclusions ?? DEFAULT_EXCLUSIONS,
    chunkSize: options.chunkSize ?? DEFAULT_CONFIG.hashChunkSize,
    sink: options.sink ?? silentScanSink,
  };

  const startedAt = clock();

  try {
    store.createScan(scanName, startedAt);
  } catch (error) {
    if (error instanceof ScanConflictError) {
      return { status: 'conflict', scanName };
    }

    throw error;
  }

  let processed = 0;
  let taggable = 0;
  let errors = 0;

  for await (const fullPath of walkFiles(rootPath, (dir, reason) => ctx.sink.onDirectoryError(dir, reason))) {
    const outcome = await processFile(fullPath, ctx);

    switch (outcome.status) {
      case 'recorded':
        processed++;

        if (outcome.taggable) {
          taggable++;
        }

        if (processed % progressInterval === 0) {
          ctx.sink.onProgress(processed);
        }
        break;

      case 'failed':
        errors++;
        ctx.sink.onFileError(outcome.path, outcome.reason);
        break;

      case 'skipped':
        break;
    }
  }

  const finishedAt = clock();

  store.completeScan(scanName, {
    endTime: finishedAt,
    numFiles: processed,
    numTaggable: taggable,
    numErrors: errors,
  });

  return {
    status: 'completed',
    summary: {
      scanName,
      rootPath,
      processed,
      taggable,
      errors,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
    },
  };
}
