import chalk from 'chalk';
import type { Ora } from 'ora';
import cliProgress from 'cli-progress';
import type {
  CopyProgressSink,
  CopyReport,
  ExtensionCount,
  FileRecord,
  ScanProgressSink,
  ScanSession,
  ScanSummary,
} from './types.js';
import { formatDuration } from './metadata.js';
import { formatCopySummary } from './materializer.js';

export function createScanReporter(spinner: Ora): ScanProgressSink {
  return {
    onProgress(processed) {
      spinner.text = `Scanning... (${processed} files processed)`;
    },

    onUnhashable(path, reason) {
      spinner.clear();
      console.log(chalk.yellow(`Could not hash ${path}: ${reason}`));
      spinner.render();
    },

    onFileError(path, reason) {
      spinner.clear();
      console.log(chalk.red(`Error processing ${path}: ${reason}`));
      spinner.render();
    },

    onDirectoryError(path, reason) {
      spinner.clear();
      console.log(chalk.yellow(`Skipping unreadable directory ${path}: ${reason}`));
      spinner.render();
    },
  };
}

export interface CopyReporter extends CopyProgressSink {
  stop(): void;
}

export function createCopyReporter(): CopyReporter {
  const progressBar = new cliProgress.SingleBar({
    format: 'Copying |{bar}| {percentage}% | {value}/{total} files',
    barCompleteChar: '█',
    barIncompleteChar: '░',
  });
  const missing: string[] = [];

  return {
    onStart(total) {
      progressBar.start(total, 0);
    },

    onProgress(processed) {
      progressBar.update(processed);
    },

    onMissing(path) {
      missing.push(path);
    },

    stop() {
      progressBar.stop();

      for (const path of missing) {
        console.log(chalk.yellow(`File ${path} not found in source directory`));
      }
    },
  };
}

export function printScanSummary(summary: ScanSummary): void {
  console.log(chalk.green(`\n✓ Scan complete for directory: ${summary.rootPath}`));
  console.log(chalk.gray(`  Scan name: ${summary.scanName}`));
  console.log(chalk.gray(`  Files: ${summary.processed}`));
  console.log(chalk.gray(`  Taggable: ${summary.taggable}`));

  const errorLine = `  Errors: ${summary.errors}`;
  console.log(summary.errors > 0 ? chalk.red(errorLine) : chalk.gray(errorLine));
}

export function printCopyReport(report: CopyReport): void {
  const line = `done: ${formatCopySummary(report)}`;

  console.log(report.missing.length > 0 ? chalk.yellow(line) : chalk.green(line));

  if (report.missing.length > 0) {
    console.log(chalk.yellow(`  Missing sources: ${report.missing.length}`));
  }

  console.log(chalk.gray(`  Target folder: ${report.targetFolder}`));
}

export function formatScanRow(scan: ScanSession): string {
  if (scan.endTime === null) {
    return `${scan.scanName}\tstarted ${scan.startTime}\t${chalk.yellow('incomplete')}`;
  }

  return [
    scan.scanName,
    `started ${scan.startTime}`,
    `finished ${scan.endTime}`,
    `${scan.numFiles ?? 0} files`,
    `${scan.numTaggable ?? 0} taggable`,
    `${scan.numErrors ?? 0} errors`,
  ].join('\t');
}

export function printScans(scans: ScanSession[]): void {
  if (scans.length === 0) {
    console.log(chalk.yellow('No scans recorded yet.'));
    return;
  }

  for (const scan of scans) {
    console.log(formatScanRow(scan));
  }
}

export function printExtensions(counts: ExtensionCount[]): void {
  for (const { extension, count } of counts) {
    console.log(`\t${extension || '(none)'}\t\t${count}`);
  }
}

export function formatFileRow(record: FileRecord): string {
  return [
    record.scanName,
    record.fileName,
    record.fullPath,
    record.songTitle ?? '-',
    record.albumName ?? '-',
    record.albumArtist ?? '-',
    record.genre ?? '-',
    record.year ?? '-',
    formatDuration(record.duration),
    record.taggable ? 'taggable' : 'untagged',
    record.contentDigest ?? '-',
  ].join('\t');
}

export function printFiles(records: FileRecord[]): void {
  for (const record of records) {
    console.log(formatFileRow(record));
    console.log();
  }
}
