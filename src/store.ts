import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import Database from 'better-sqlite3';
import type {
  ExtensionCount,
  FileRecord,
  ListFilesQuery,
  ScanCompletion,
  ScanSession,
} from './types.js';
import { ScanConflictError } from './errors.js';

export interface CatalogStore {
  init(): void;
  hasScan(scanName: string): boolean;
  createScan(scanName: string, startTime: Date): void;
  insertFile(record: FileRecord): void;
  completeScan(scanName: string, completion: ScanCompletion): void;
  getScan(scanName: string): ScanSession | null;
  listScans(): ScanSession[];
  countFiles(scanName: string): number;
  countExtensions(scanName?: string): ExtensionCount[];
  listFiles(query: ListFilesQuery): FileRecord[];
  countDiff(originScan: string, destScan: string): number;
  listDiff(originScan: string, destScan: string): string[];
  close(): void;
}

// Title (or file name when untagged) followed by album; a missing album counts as ''.
// The diff join and idx_file_data_identity must spell this identically for the index to apply.
function identityKey(alias?: string): string {
  const column = (name: string) => (alias ? `${alias}.${name}` : name);
  return `COALESCE(${column('song_title')}, ${column('file_name')}) || COALESCE(${column('album_name')}, '')`;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS scans (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    scan_name TEXT NOT NULL UNIQUE,
    start_time TEXT NOT NULL,
    end_time TEXT,
    num_files INTEGER,
    num_taggable INTEGER,
    num_errors INTEGER
  );

  CREATE TABLE IF NOT EXISTS file_data (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    file_name TEXT NOT NULL,
    full_path TEXT NOT NULL,
    extension TEXT NOT NULL,
    song_title TEXT,
    album_name TEXT,
    album_artist TEXT,
    genre TEXT,
    year INTEGER,
    duration REAL,
    taggable INTEGER NOT NULL CHECK (taggable IN (0, 1)),
    scan_name TEXT NOT NULL REFERENCES scans(scan_name),
    content_digest TEXT,
    UNIQUE (scan_name, full_path)
  );

  CREATE INDEX IF NOT EXISTS idx_file_data_extension ON file_data(extension);

  CREATE INDEX IF NOT EXISTS idx_file_data_identity
    ON file_data(scan_name, (${identityKey()}));
`;

export const DIFF_RELATION = `
  FROM file_data origin
  LEFT JOIN file_data dest
    ON ${identityKey('dest')} = ${identityKey('origin')}
    AND dest.scan_name = ?
  WHERE origin.scan_name = ?
    AND dest.id IS NULL
`;

const PRAGMAS = ['journal_mode = WAL', 'synchronous = NORMAL', 'foreign_keys = ON'];

// Lock waits before SQLITE_BUSY surfaces to the caller.
const BUSY_TIMEOUT_MS = 5000;

interface ScanRow {
  scan_name: string;
  start_time: string;
  end_time: string | null;
  num_files: number | null;
  num_taggable: number | null;
  num_errors: number | null;
}

interface FileRow {
  file_name: string;
  full_path: string;
  extension: string;
  song_title: string | null;
  album_name: string | null;
  album_artist: string | null;
  genre: string | null;
  year: number | null;
  duration: number | null;
  taggable: number;
  scan_name: string;
  content_digest: string | null;
}

type FileParams = [
  string, string, string,
  string | null, string | null, string | null, string | null,
  number | null, number | null,
  number, string, string | null,
];

function toScanSession(row: ScanRow): ScanSession {
  return {
    scanName: row.scan_name,
    startTime: row.start_time,
    endTime: row.end_time,
    numFiles: row.num_files,
    numTaggable: row.num_taggable,
    numErrors: row.num_errors,
  };
}

function toFileRecord(row: FileRow): FileRecord {
  return {
    fileName: row.file_name,
    fullPath: row.full_path,
    extension: row.extension,
    songTitle: row.song_title,
    albumName: row.album_name,
    albumArtist: row.album_artist,
    genre: row.genre,
    year: row.year,
    duration: row.duration,
    taggable: row.taggable === 1,
    scanName: row.scan_name,
    contentDigest: row.content_digest,
  };
}

function isUniqueViolation(error: unknown): boolean {
  return error instanceof Database.SqliteError && error.code === 'SQLITE_CONSTRAINT_UNIQUE';
}

export class SqliteCatalogStore implements CatalogStore {
  private readonly db: Database.Database;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      mkdirSync(dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath, { timeout: BUSY_TIMEOUT_MS });

    for (const pragma of PRAGMAS) {
      this.db.pragma(pragma);
    }
  }

  init(): void {
    this.db.exec(SCHEMA);
  }

  hasScan(scanName: string): boolean {
    const row = this.db
      .prepare<[string], { found: number }>('SELECT 1 AS found FROM scans WHERE scan_name = ?')
      .get(scanName);

    return row !== undefined;
  }

  createScan(scanName: string, startTime: Date): void {
    try {
      this.db
        .prepare<[string, string]>('INSERT INTO scans (scan_name, start_time) VALUES (?, ?)')
        .run(scanName, startTime.toISOString());
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ScanConflictError(scanName);
      }

      throw error;
    }
  }

  insertFile(record: FileRecord): void {
    const params: FileParams = [
      record.fileName,
      record.fullPath,
      record.extension,
      record.songTitle,
      record.albumName,
      record.albumArtist,
      record.genre,
      record.year,
      record.duration,
      record.taggable ? 1 : 0,
      record.scanName,
      record.contentDigest,
    ];

    this.db
      .prepare<FileParams>(`
        INSERT INTO file_data (
          file_name, full_path, extension, song_title, album_name, album_artist,
          genre, year, duration, taggable, scan_name, content_digest
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
      `)
      .run(...params);
  }

  completeScan(scanName: string, completion: ScanCompletion): void {
    this.db
      .prepare<[string, number, number, number, string]>(`
        UPDATE scans
        SET end_time = ?, num_files = ?, num_taggable = ?, num_errors = ?
        WHERE scan_name = ?
      `)
      .run(
        completion.endTime.toISOString(),
        completion.numFiles,
        completion.numTaggable,
        completion.numErrors,
        scanName
      );
  }

  getScan(scanName: string): ScanSession | null {
    const row = this.db
      .prepare<[string], ScanRow>(`
        SELECT scan_name, start_time, end_time, num_files, num_taggable, num_errors
        FROM scans WHERE scan_name = ?
      `)
      .get(scanName);

    return row ? toScanSession(row) : null;
  }

  listScans(): ScanSession[] {
    return this.db
      .prepare<[], ScanRow>(`
        SELECT scan_name, start_time, end_time, num_files, num_taggable, num_errors
        FROM scans ORDER BY start_time, id
      `)
      .all()
      .map(toScanSession);
  }

  countFiles(scanName: string): number {
    const row = this.db
      .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM file_data WHERE scan_name = ?')
      .get(scanName);

    return row?.count ?? 0;
  }

  countExtensions(scanName?: string): ExtensionCount[] {
    return this.db
      .prepare<[string | null, string | null], ExtensionCount>(`
        SELECT extension, COUNT(*) AS count
        FROM file_data
        WHERE ? IS NULL OR scan_name = ?
        GROUP BY extension
        ORDER BY count DESC, extension
      `)
      .all(scanName ?? null, scanName ?? null);
  }

  listFiles({ extension, limit = 25, offset = 0 }: ListFilesQuery): FileRecord[] {
    return this.db
      .prepare<[string, number, number], FileRow>(`
        SELECT file_name, full_path, extension, song_title, album_name, album_artist,
               genre, year, duration, taggable, scan_name, content_digest
        FROM file_data
        WHERE extension = ?
        ORDER BY file_name DESC, id
        LIMIT ? OFFSET ?
      `)
      .all(extension.replace(/^\./, '').toLowerCase(), limit, offset)
      .map(toFileRecord);
  }

  countDiff(originScan: string, destScan: string): number {
    const row = this.db
      .prepare<[string, string], { count: number }>(`SELECT COUNT(*) AS count ${DIFF_RELATION}`)
      .get(destScan, originScan);

    return row?.count ?? 0;
  }

  listDiff(originScan: string, destScan: string): string[] {
    return this.db
      .prepare<[string, string], { full_path: string }>(
        `SELECT origin.full_path ${DIFF_RELATION} ORDER BY origin.id`
      )
      .all(destScan, originScan)
      .map((row) => row.full_path);
  }

  close(): void {
    this.db.close();
  }
}

export function openCatalogStore(dbPath: string): SqliteCatalogStore {
  const store = new SqliteCatalogStore(dbPath);
  store.init();
  return store;
}

export async function withCatalogStore<T>(
  dbPath: string,
  fn: (store: CatalogStore) => Promise<T>
): Promise<T> {
  const store = openCatalogStore(dbPath);

  try {
    return await fn(store);
  } finally {
    store.close();
  }
}
