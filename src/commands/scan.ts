import chalk from 'chalk';
import Table from 'cli-table3';
import { TableRow } from '../types/model-record';
import { formatBytes, formatDateTime, truncate, truncateStart } from '../utils/format-utils';
import { ViewOptions, resolveScanRoot, scanToTable } from './scan-runner';

export interface ScanCommandOptions extends ViewOptions {
  limit?: number;
}

export function renderModelTable(rows: TableRow[], startIndex = 1): string {
  const table = new Table({
    head: ['#', 'NAME', 'EXT', 'SIZE', 'LAST ACCESS', 'DIRECTORY'],
    colWidths: [6, 40, 14, 12, 21, 50],
  });

  rows.forEach((row, index) => {
    table.push([
      String(startIndex + index),
      truncate(row.name, 38),
      row.extension,
      formatBytes(row.sizeBytes),
      formatDateTime(row.lastAccessTime),
      truncateStart(row.directory, 48),
    ]);
  });

  return table.toString();
}

export async function scanCommand(dir: string | undefined, options: ScanCommandOptions): Promise<void> {
  const root = await resolveScanRoot(dir);
  console.log(chalk.blue(`📦 Scanning ${root} for model files\n`));

  const { table, report } = await scanToTable(root, options);

  if (table.size === 0) {
    console.log(chalk.yellow('No model files found.'));
    if (report.skipped.length > 0) {
      console.log(chalk.dim(`${report.skipped.length} entries could not be read.`));
    }
    return;
  }

  const rows = table.visibleRows();
  const shown = options.limit && options.limit > 0 ? rows.slice(0, options.limit) : rows;

  if (shown.length === 0) {
    console.log(chalk.yellow(`No model files match "${table.getFilter()}".`));
  } else {
    console.log(renderModelTable(shown));
  }

  const sort = table.getSort();
  const totalSize = rows.reduce((sum, row) => sum + row.sizeBytes, 0);
  const filterNote = table.getFilter() ? ` matching "${table.getFilter()}"` : '';

  console.log(chalk.dim(`\nShowing ${shown.length} of ${rows.length} files${filterNote} (${formatBytes(totalSize)})`));
  if (rows.length !== table.size) {
    console.log(chalk.dim(`${table.size} model files in total`));
  }
  console.log(chalk.dim(`Sorted by ${sort.field} (${sort.direction})`));

  if (report.skipped.length > 0) {
    console.log(chalk.yellow(`⚠️  ${report.skipped.length} entries skipped (unreadable or vanished during scan)`));
  }

  const target = dir ? ` ${dir}` : '';
  console.log(chalk.dim(`\nDelete stale models: modelsweep rm${target} --oldest <n>`));
}
