#!/usr/bin/env node

import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import { scanCommand, ScanCommandOptions } from './commands/scan';
import { rmCommand, RmOptions } from './commands/rm';
import { exportCommand, ExportOptions } from './commands/export';
import { browseCommand } from './commands/browse';
import { configCommand, ConfigOptions } from './commands/config';
import { logCommand, LogOptions } from './commands/log';
import { activityLogger } from './lib/activity-logger';
import { errorMessage } from './lib/errors';

function parseCount(value: string): number {
  const parsed = parseInt(value, 10);
  if (isNaN(parsed) || parsed < 1) {
    throw new InvalidArgumentError('Must be a positive whole number.');
  }
  return parsed;
}

function fail(error: unknown): never {
  console.error(chalk.red('❌ Error:'), errorMessage(error));
  process.exit(1);
}

const program = new Command();

program
  .name('modelsweep')
  .description('Find, sort and clean up large machine-learning model files')
  .version('1.0.0')
  .option('--verbose', 'Echo activity log entries to stderr')
  .hook('preAction', () => {
    activityLogger.setVerbose(program.opts().verbose === true);
  });

// List model files
program
  .command('scan')
  .alias('ls')
  .description('Scan a directory tree for model files')
  .argument('[dir]', 'Directory to scan (default: configured models directory)')
  .option('-s, --sort <field>', 'Sort by name, path, directory, extension, sizeBytes, lastAccessTime, lastWriteTime or creationTime')
  .option('--desc', 'Sort descending')
  .option('-f, --filter <text>', 'Only show files whose path, name or extension contains text')
  .option('-l, --limit <number>', 'Max rows to show', parseCount)
  .action(async (dir: string | undefined, options: ScanCommandOptions) => {
    try {
      await scanCommand(dir, options);
    } catch (error) {
      fail(error);
    }
  });

// Delete model files
program
  .command('rm')
  .description('Move model files to the trash, or delete them permanently')
  .argument('[dir]', 'Directory to scan (default: configured models directory)')
  .option('-f, --filter <text>', 'Select files whose path, name or extension contains text')
  .option('--oldest <number>', 'Select only the first n rows (least recently accessed by default)', parseCount)
  .option('--all', 'Select every model file found')
  .option('--permanent', 'Delete permanently instead of moving to the trash')
  .option('-y, --yes', 'Skip confirmation')
  .option('-s, --sort <field>', 'Sort field used by --oldest')
  .option('--desc', 'Sort descending')
  .action(async (dir: string | undefined, options: RmOptions) => {
    try {
      await rmCommand(dir, options);
    } catch (error) {
      fail(error);
    }
  });

// Export to spreadsheet
program
  .command('export')
  .description('Export the model file list to an .xlsx spreadsheet')
  .argument('[dir]', 'Directory to scan (default: configured models directory)')
  .option('-o, --output <file>', 'Output file (default: models.xlsx in the export directory)')
  .option('-f, --filter <text>', 'Only export rows whose path, name or extension contains text')
  .option('-s, --sort <field>', 'Sort field')
  .option('--desc', 'Sort descending')
  .option('--no-open', 'Do not open the file afterwards')
  .option('-y, --yes', 'Overwrite an existing file without asking')
  .action(async (dir: string | undefined, options: ExportOptions) => {
    try {
      await exportCommand(dir, options);
    } catch (error) {
      fail(error);
    }
  });

// Interactive browser
program
  .command('browse')
  .description('Browse, select, delete and export model files interactively')
  .argument('[dir]', 'Directory to scan (default: configured models directory)')
  .action(async (dir: string | undefined) => {
    try {
      await browseCommand(dir);
    } catch (error) {
      fail(error);
    }
  });

// Show or change settings
program
  .command('config')
  .description('Show or update configuration')
  .option('--models-dir <path>', 'Default directory to scan')
  .option('--sort <field>', 'Default sort field')
  .option('--desc', 'Default sort direction: descending')
  .option('--asc', 'Default sort direction: ascending')
  .option('--delete-mode <mode>', 'Default delete mode: recycle or permanent')
  .option('--open-after-export', 'Open exported spreadsheets')
  .option('--no-open-after-export', 'Do not open exported spreadsheets')
  .option('--export-dir <path>', 'Default directory for exports ("" for the current directory)')
  .action(async (options: ConfigOptions & { asc?: boolean }) => {
    try {
      const { asc, ...rest } = options;
      await configCommand({ ...rest, desc: asc ? false : rest.desc });
    } catch (error) {
      fail(error);
    }
  });

// Show activity log
program
  .command('log')
  .description('Show recent scans, deletions and exports')
  .option('-n, --lines <number>', 'Number of entries to show (default: 20)', parseCount)
  .action(async (options: LogOptions) => {
    try {
      await logCommand(options);
    } catch (error) {
      fail(error);
    }
  });

program.parse();
