import chalk from 'chalk';
import { DeleteOperation } from '../lib/delete-operation';
import { stateManager } from '../lib/state-manager';
import { activityLogger } from '../lib/activity-logger';
import { platformTrash } from '../lib/trash-manager';
import { DeleteMode } from '../types/operation-types';
import { confirmTyped } from '../utils/prompt-utils';
import { formatBytes } from '../utils/format-utils';
import { renderModelTable } from './scan';
import { ViewOptions, resolveScanRoot, runInterruptible, scanToTable } from './scan-runner';

export interface RmOptions extends ViewOptions {
  oldest?: number;
  all?: boolean;
  permanent?: boolean;
  yes?: boolean;
}

export async function rmCommand(dir: string | undefined, options: RmOptions): Promise<void> {
  const root = await resolveScanRoot(dir);

  const filter = options.filter?.trim() ?? '';
  if (filter === '' && !options.oldest && !options.all) {
    throw new Error(
      'Refusing to select every model file.\n\n' +
      'Narrow the selection with --filter <text> or --oldest <n>, or pass --all'
    );
  }

  const config = await stateManager.loadGlobalConfig();
  const mode: DeleteMode = options.permanent ? 'permanent' : config.deleteMode;

  // --oldest means least recently accessed unless a sort is given
  const view: ViewOptions = options.oldest && !options.sort
    ? { ...options, filter, sort: 'lastAccessTime', desc: false }
    : { ...options, filter };

  console.log(chalk.blue(`📦 Scanning ${root} for model files\n`));
  const { table } = await scanToTable(root, view);

  // Select what the user sees: the filtered rows, optionally only the first n
  const visible = table.visibleRows();
  if (options.oldest && options.oldest > 0) {
    for (const row of visible.slice(0, options.oldest)) {
      table.toggleSelect(row.path);
    }
  } else {
    table.selectAll();
  }

  const summary = table.selectionSummary();
  if (summary.count === 0) {
    console.log(chalk.yellow('Nothing selected to delete.'));
    return;
  }

  console.log(renderModelTable(visible.filter((row) => table.isSelected(row.path))));
  console.log();

  const where = mode === 'recycle' ? `move to the ${platformTrash.describe()}` : chalk.red.bold('PERMANENTLY delete');
  console.log(chalk.yellow(`⚠️  About to ${where} ${summary.count} file(s), ${formatBytes(summary.totalBytes)}`));
  if (mode === 'permanent') {
    console.log(chalk.red('   This cannot be undone.'));
  }
  console.log();

  if (!options.yes) {
    const confirmed = await confirmTyped('yes');
    if (!confirmed) {
      console.log(chalk.dim('Cancelled'));
      return;
    }
    console.log();
  }

  const operation = new DeleteOperation(table, { mode });
  if (process.stdout.isTTY) {
    operation.onProgress((progress) => {
      process.stdout.write('\r\x1b[K');
      process.stdout.write(
        chalk.blue(`🗑️  ${progress.processed}/${progress.total} processed, ${progress.failed} failed`)
      );
    });
  }

  const report = await runInterruptible(operation);
  if (process.stdout.isTTY) {
    process.stdout.write('\r\x1b[K');
  }
  await activityLogger.logDelete(report, root);

  const verb = mode === 'recycle' ? 'Moved to trash' : 'Deleted';
  if (report.deleted.length > 0) {
    console.log(chalk.green(`✅ ${verb}: ${report.deleted.length} file(s), ${formatBytes(report.freedBytes)} freed`));
  }

  if (report.failures.length > 0) {
    console.log(chalk.red(`❌ Failed: ${report.failures.length} file(s)`));
    for (const failure of report.failures) {
      console.log(chalk.dim(`   ${failure.path}`));
      console.log(chalk.red(`     ${failure.reason}`));
    }
    process.exitCode = 1;
  }

  if (report.cancelled) {
    console.log(chalk.yellow(`⚠️  Cancelled: ${report.notProcessed.length} file(s) left untouched`));
  }

  console.log(chalk.dim(`\n${table.size} model files remain in ${root}`));
}
