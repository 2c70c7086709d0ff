export interface RawTags {
  title: string | null;
  album: string | null;
  artist: string | null;
  genre: string | null;
  year: string | null;
  duration: number | null;
}

export interface MetadataExtractor {
  isSupported(path: string): boolean;
  extract(path: string): Promise<RawTags>;
}

export interface FileRecord {
  fileName: string;
  fullPath: string;
  extension: string;
  songTitle: string | null;
  albumName: string | null;
  albumArtist: string | null;
  genre: string | null;
  year: number | null;
  duration: number | null;
  taggable: boolean;
  scanName: string;
  contentDigest: string | null;
}

export interface ScanSession {
  scanName: string;
  startTime: string;
  endTime: string | null;
  numFiles: number | null;
  numTaggable: number | null;
  numErrors: number | null;
}

export interface ScanCompletion {
  endTime: Date;
  numFiles: number;
  numTaggable: number;
  numErrors: number;
}

export interface ScanSummary {
  scanName: string;
  rootPath: string;
  processed: number;
  taggable: number;
  errors: number;
  startedAt: string;
  finishedAt: string;
}

export type ScanResult =
  | { status: 'completed'; summary: ScanSummary }
  | { status: 'conflict'; scanName: string };

export type FileOutcome =
  | { status: 'recorded'; path: string; taggable: boolean }
  | { status: 'skipped'; path: string }
  | { status: 'failed'; path: string; reason: string };

export interface ExclusionRules {
  extensions: string[];
  names: string[];
}

export interface ExtensionCount {
  extension: string;
  count: number;
}

export interface ListFilesQuery {
  extension: string;
  limit?: number;
  offset?: number;
}

export interface CopyReport {
  total: number;
  copied: number;
  missing: string[];
  targetFolder: string;
}

export interface ScanProgressSink {
  onProgress(processed: number): void;
  onUnhashable(path: string, reason: string): void;
  onFileError(path: string, reason: string): void;
  onDirectoryError(path: string, reason: string): void;
}

export interface CopyProgressSink {
  onStart(total: number): void;
  onProgress(processed: number, total: number, percentage: number): void;
  onMissing(path: string): void;
}

export interface Config {
  dbPath: string;
  excludeExtensions: string[];
  excludeNames: string[];
  supportedExtensions: string[];
  hashChunkSize: number;
  scanProgressInterval: number;
  copyProgressInterval: number;
}
