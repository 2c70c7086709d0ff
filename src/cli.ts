import { resolve } from 'node:path';
import { Command, CommanderError, InvalidArgumentError } from 'commander';
import { confirm } from '@inquirer/prompts';
import chalk from 'chalk';
import ora from 'ora';
import type { Config, MetadataExtractor } from './types.js';
import { expandPath, loadConfig } from './config.js';
import { openCatalogStore, withCatalogStore } from './store.js';
import { startScan } from './recorder.js';
import { computeDiff, countDiff } from './reconcile.js';
import { copyDiff } from './materializer.js';
import { createMusicMetadataExtractor } from './metadata.js';
import { ConfigError, ScanRootError, UnknownScanError } from './errors.js';
import {
  createCopyReporter,
  createScanReporter,
  printCopyReport,
  printExtensions,
  printFiles,
  printScans,
  printScanSummary,
} from './reporter.js';

export interface CliDeps {
  extractor?: (supportedExtensions: string[]) => MetadataExtractor;
  confirm?: (message: string) => Promise<boolean>;
}

function confirmOnConsole(message: string): Promise<boolean> {
  return confirm({ message, default: true });
}

function parseCount(value: string): number {
  const parsed = Number.parseInt(value, 10);

  if (Number.isNaN(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Expected a non-negative integer.');
  }

  return parsed;
}

export function createProgram(deps: CliDeps = {}): Command {
  const extractorFor = deps.extractor ?? createMusicMetadataExtractor;
  const ask = deps.confirm ?? confirmOnConsole;

  const program = new Command()
    .name('music-catalog')
    .description('Catalogue music files into a database, compare scans and copy the difference')
    .option('--db <path>', 'catalog database file (overrides config.json and MUSIC_CATALOG_DB)')
    .exitOverride();

  async function resolveConfig(): Promise<Config> {
    const config = await loadConfig();
    const { db } = program.opts<{ db?: string }>();

    if (db) {
      config.dbPath = resolve(expandPath(db));
    }

    return config;
  }

  async function runInitStore(): Promise<void> {
    const config = await resolveConfig();
    const store = openCatalogStore(config.dbPath);
    store.close();

    console.log(chalk.green(`Catalog initialized: ${config.dbPath}`));
  }

  async function runScan(opts: { path: string; scanName: string }): Promise<void> {
    const config = await resolveConfig();
    const rootPath = resolve(expandPath(opts.path));

    console.log(chalk.cyan(`\n🔍 Scanning ${rootPath} as "${opts.scanName}"\n`));

    await withCatalogStore(config.dbPath, async (store) => {
      const spinner = ora('Scanning...').start();

      try {
        const result = await startScan(store, rootPath, opts.scanName, {
          extractor: extractorFor(config.supportedExtensions),
          exclusions: { extensions: config.excludeExtensions, names: config.excludeNames },
          chunkSize: config.hashChunkSize,
          progressInterval: config.scanProgressInterval,
          sink: createScanReporter(spinner),
        });

        if (result.status === 'conflict') {
          spinner.warn(`Scan name ${result.scanName} already exists.`);
          return;
        }

        spinner.succeed(`${result.summary.processed} files processed`);
        printScanSummary(result.summary);
      } catch (error) {
        spinner.fail('Scan aborted');
        throw error;
      }
    });
  }

  async function runScans(): Promise<void> {
    const config = await resolveConfig();

    await withCatalogStore(config.dbPath, async (store) => {
      printScans(store.listScans());
    });
  }

  async function runDiffCount(opts: { originScan: string; destScan: string }): Promise<void> {
    const config = await resolveConfig();

    await withCatalogStore(config.dbPath, async (store) => {
      const count = countDiff(store, opts.originScan, opts.destScan);
      console.log(`Different files count between ${opts.originScan} and ${opts.destScan}: ${count}`);
    });
  }

  async function runDiffList(opts: { originScan: string; destScan: string }): Promise<void> {
    const config = await resolveConfig();

    await withCatalogStore(config.dbPath, async (store) => {
      for (const path of computeDiff(store, opts.originScan, opts.destScan)) {
        console.log(path);
      }
    });
  }

  async function runCopyDiff(opts: {
    originScan: string;
    destScan: string;
    folder: string;
    yes?: boolean;
  }): Promise<void> {
    const config = await resolveConfig();
    const targetFolder = resolve(expandPath(opts.folder));

    await withCatalogStore(config.dbPath, async (store) => {
      const total = countDiff(store, opts.originScan, opts.destScan);

      if (total > 0 && !opts.yes) {
        const proceed = await ask(`Copy ${total} files into ${targetFolder}?`);

        if (!proceed) {
          console.log(chalk.yellow('Copy cancelled.'));
          return;
        }
      }

      const reporter = createCopyReporter();

      try {
        const report = await copyDiff(store, opts.originScan, opts.destScan, targetFolder, {
          progressInterval: config.copyProgressInterval,
          sink: reporter,
        });

        reporter.stop();
        printCopyReport(report);
      } catch (error) {
        reporter.stop();
        throw error;
      }
    });
  }

  async function runExts(opts: { scanName?: string }): Promise<void> {
    const config = await resolveConfig();

    await withCatalogStore(config.dbPath, async (store) => {
      if (opts.scanName && store.countFiles(opts.scanName) === 0) {
        console.log(chalk.yellow(`No records found for scan_name: ${opts.scanName}`));
        return;
      }

      printExtensions(store.countExtensions(opts.scanName));
    });
  }

  async function runListFiles(opts: { ext: string; limit: number; offset: number }): Promise<void> {
    const config = await resolveConfig();

    await withCatalogStore(config.dbPath, async (store) => {
      printFiles(store.listFiles({ extension: opts.ext, limit: opts.limit, offset: opts.offset }));
    });
  }

  program
    .command('init-store')
    .description('Create the catalog tables. Safe to run more than once.')
    .action(runInitStore);

  program
    .command('scan')
    .description('Scan a music directory and record every file under a new scan name')
    .requiredOption('--path <dir>', 'directory to scan')
    .requiredOption('--scan-name <name>', 'unique name for this scan')
    .action(runScan);

  program
    .command('scans')
    .description('List recorded scans')
    .action(runScans);

  program
    .command('diff-count')
    .description('Count origin files with no matching title and album in the destination scan')
    .requiredOption('--origin-scan <name>', 'origin scan name')
    .requiredOption('--dest-scan <name>', 'destination scan name')
    .action(runDiffCount);

  program
    .command('diff-list')
    .description('Print the paths of origin files missing from the destination scan')
    .requiredOption('--origin-scan <name>', 'origin scan name')
    .requiredOption('--dest-scan <name>', 'destination scan name')
    .action(runDiffList);

  program
    .command('copy-diff')
    .description('Copy origin files missing from the destination scan into a folder')
    .requiredOption('--origin-scan <name>', 'origin scan name')
    .requiredOption('--dest-scan <name>', 'destination scan name')
    .requiredOption('--folder <dir>', 'folder to copy files into')
    .option('-y, --yes', 'skip the confirmation prompt')
    .action(runCopyDiff);

  program
    .command('exts')
    .description('Count recorded files per extension')
    .option('--scan-name <name>', 'only count files from this scan')
    .action(runExts);

  program
    .command('list-files')
    .description('List recorded files with the given extension')
    .requiredOption('--ext <ext>', 'file extension to filter by')
    .option('--limit <n>', 'maximum number of rows', parseCount, 25)
    .option('--offset <n>', 'number of rows to skip', parseCount, 0)
    .action(runListFiles);

  return program;
}

function printFailure(error: unknown): void {
  if (
    error instanceof ConfigError ||
    error instanceof ScanRootError ||
    error instanceof UnknownScanError
  ) {
    console.error(chalk.red(error.message));
  } else {
    console.error(error);
  }
}

// Resolves to the process exit code; usage errors keep commander's own code.
export async function runCli(argv: string[], deps: CliDeps = {}): Promise<number> {
  try {
    await createProgram(deps).parseAsync(argv);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }

    printFailure(error);
    return 1;
  }
}
