import { extname } from 'node:path';
import { parseFile } from 'music-metadata';
import type { MetadataExtractor, RawTags } from './types.js';
import { DEFAULT_CONFIG } from './config.js';

export function fileExtension(path: string): string {
  return extname(path).slice(1).toLowerCase();
}

export function parseYear(raw: string | null | undefined): number | null {
  if (!raw) {
    return null;
  }

  const head = raw.split('-')[0].replace(/\s+/g, '');

  if (!/^[+-]?\d+$/.test(head)) {
    return null;
  }

  return Number.parseInt(head, 10);
}

export function createMusicMetadataExtractor(
  supportedExtensions: string[] = DEFAULT_CONFIG.supportedExtensions
): MetadataExtractor {
  const supported = new Set(supportedExtensions.map((ext) => ext.toLowerCase()));

  return {
    isSupported(path: string): boolean {
      return supported.has(fileExtension(path));
    },

    async extract(path: string): Promise<RawTags> {
      const { common, format } = await parseFile(path, { duration: true });

      return {
        title: common.title ?? null,
        album: common.album ?? null,
        artist: common.albumartist ?? common.artist ?? common.artists?.[0] ?? null,
        genre: common.genre?.[0] ?? null,
        year: common.date ?? (common.year !== undefined ? String(common.year) : null),
        duration: format.duration ?? null,
      };
    },
  };
}

export function formatDuration(seconds: number | null): string {
  if (seconds === null) {
    return 'unknown';
  }

  const mins = Math.floor(seconds / 60);
  const secs = Math.floor(seconds % 60);

  return `${mins}:${secs.toString().padStart(2, '0')}`;
}
