import chalk from 'chalk';
import { ResultTable } from '../lib/result-table';
import { ScanOperation } from '../lib/scan-operation';
import { Operation } from '../lib/operation';
import { stateManager } from '../lib/state-manager';
import { activityLogger } from '../lib/activity-logger';
import { SORT_FIELDS, SortField, SortState, isSortField } from '../types/model-record';
import { ScanReport } from '../types/operation-types';
import { expandHome } from '../utils/file-utils';
import { truncateStart } from '../utils/format-utils';

export interface ViewOptions {
  sort?: string;
  desc?: boolean;
  filter?: string;
}

export interface ScanSession {
  root: string;
  table: ResultTable;
  report: ScanReport;
}

/**
 * Directory argument, or the configured models directory
 */
export async function resolveScanRoot(dir?: string): Promise<string> {
  if (dir && dir.trim() !== '') {
    return expandHome(dir.trim());
  }

  const configured = await stateManager.getModelsDirectory();
  if (!configured) {
    throw new Error(
      'No directory given and no models directory configured.\n\n' +
      'Pass one: modelsweep scan <dir>\n' +
      'Or save one: modelsweep config --models-dir <dir>'
    );
  }
  return configured;
}

export function parseSortField(value: string): SortField {
  if (!isSortField(value)) {
    throw new Error(`Unknown sort field: ${value}\n\nValid fields: ${SORT_FIELDS.join(', ')}`);
  }
  return value;
}

/**
 * Command-line sort flags win over the saved sort
 */
export async function resolveSort(options: ViewOptions): Promise<SortState> {
  const saved = (await stateManager.loadGlobalConfig()).sort;
  if (!options.sort && options.desc === undefined) {
    return saved;
  }
  return {
    field: options.sort ? parseSortField(options.sort) : saved.field,
    direction: options.desc ? 'desc' : 'asc',
  };
}

/**
 * Run an operation in the foreground; Ctrl+C asks it to stop instead of
 * killing the process. A second Ctrl+C falls through to the default handler.
 */
export async function runInterruptible<TProgress, TReport>(
  operation: Operation<TProgress, TReport>
): Promise<TReport> {
  const sigintHandler = () => {
    process.stdout.write('\r\x1b[K');
    console.log(chalk.yellow('⚠️  Cancelling... (press Ctrl+C again to force quit)'));
    operation.cancel();
  };

  process.once('SIGINT', sigintHandler);
  try {
    return await operation.start();
  } finally {
    process.removeListener('SIGINT', sigintHandler);
  }
}

/**
 * Scan a root into a fresh table, showing a running counter on a TTY
 */
export async function scanToTable(root: string, options: ViewOptions = {}): Promise<ScanSession> {
  const sort = await resolveSort(options);
  const operation = new ScanOperation(root);
  const showProgress = process.stdout.isTTY === true;

  if (showProgress) {
    operation.onProgress((progress) => {
      process.stdout.write('\r\x1b[K');
      process.stdout.write(
        chalk.blue(`🔍 ${progress.matched} found, ${progress.entriesVisited} checked `) +
        chalk.dim(truncateStart(progress.currentDirectory, 50))
      );
    });
  }

  const report = await runInterruptible(operation);

  if (showProgress) {
    process.stdout.write('\r\x1b[K');
  }

  await activityLogger.logScan(report);

  if (report.error) {
    throw report.error;
  }

  if (report.cancelled) {
    console.log(chalk.yellow(`⚠️  Scan cancelled: showing the ${report.records.length} files found so far`));
  }

  const table = new ResultTable(report.records, { sort, filter: options.filter ?? '' });
  return { root: report.root, table, report };
}
