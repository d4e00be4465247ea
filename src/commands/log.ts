import chalk from 'chalk';
import Table from 'cli-table3';
import { activityLogger } from '../lib/activity-logger';
import { formatDateTime, truncate } from '../utils/format-utils';

export interface LogOptions {
  lines?: number;
}

export async function logCommand(options: LogOptions): Promise<void> {
  const limit = options.lines && options.lines > 0 ? options.lines : 20;
  const entries = await activityLogger.readRecent(limit);

  if (entries.length === 0) {
    console.log(chalk.yellow('No activity recorded yet.'));
    console.log(chalk.dim(`\nLog file: ${activityLogger.getLogFilePath()}`));
    return;
  }

  const table = new Table({
    head: ['TIME', 'OPERATION', 'STATUS', 'SUMMARY'],
    colWidths: [21, 11, 11, 70],
  });

  for (const entry of entries) {
    const statusColor =
      entry.status === 'success' ? chalk.green : entry.status === 'error' ? chalk.red : chalk.yellow;

    table.push([
      formatDateTime(new Date(entry.timestamp)),
      entry.kind,
      statusColor(entry.status),
      truncate(entry.summary, 68),
    ]);
  }

  console.log(table.toString());
  console.log(chalk.dim(`\nLog file: ${activityLogger.getLogFilePath()}`));
}
