import { basename } from 'node:path';
import type { FileRecord } from './types.js';
import { fileExtension } from './metadata.js';

export function fileRecord(scanName: string, fullPath: string, overrides: Partial<FileRecord> = {}): FileRecord {
  return {
    fileName: basename(fullPath),
    fullPath,
    extension: fileExtension(fullPath),
    songTitle: null,
    albumName: null,
    albumArtist: null,
    genre: null,
    year: null,
    duration: null,
    taggable: false,
    scanName,
    contentDigest: null,
    ...overrides,
  };
}
