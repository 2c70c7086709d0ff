import type { CatalogStore } from './store.js';
import { UnknownScanError } from './errors.js';

export function assertScansExist(store: CatalogStore, ...scanNames: string[]): void {
  for (const scanName of scanNames) {
    if (!store.hasScan(scanName)) {
      throw new UnknownScanError(scanName);
    }
  }
}

/**
 * Origin files with no destination file sharing their identity key
 * (title or file name, followed by album). A match against several
 * destination files still excludes the origin file exactly once.
 */
export function computeDiff(store: CatalogStore, originScan: string, destScan: string): string[] {
  assertScansExist(store, originScan, destScan);
  return store.listDiff(originScan, destScan);
}

export function countDiff(store: CatalogStore, originScan: string, destScan: string): number {
  assertScansExist(store, originScan, destScan);
  return store.countDiff(originScan, destScan);
}
