import * as path from 'path';
import chalk from 'chalk';
import { DEFAULT_EXPORT_FILENAME, ExportOperation, normalizeExportPath } from '../lib/export-operation';
import { ExportError } from '../lib/errors';
import { stateManager } from '../lib/state-manager';
import { activityLogger } from '../lib/activity-logger';
import { fileExists } from '../utils/file-utils';
import { confirm } from '../utils/prompt-utils';
import { ViewOptions, resolveScanRoot, scanToTable } from './scan-runner';

export interface ExportOptions extends ViewOptions {
  output?: string;
  open?: boolean;
  yes?: boolean;
}

export async function exportCommand(dir: string | undefined, options: ExportOptions): Promise<void> {
  const root = await resolveScanRoot(dir);
  const config = await stateManager.loadGlobalConfig();

  const outputPath = normalizeExportPath(
    options.output ?? path.join(config.exportDirectory || process.cwd(), DEFAULT_EXPORT_FILENAME)
  );

  if (!options.yes && (await fileExists(outputPath))) {
    const overwrite = await confirm(chalk.yellow(`⚠️  ${outputPath} exists. Overwrite?`), false);
    if (!overwrite) {
      console.log(chalk.dim('Cancelled'));
      return;
    }
  }

  console.log(chalk.blue(`📦 Scanning ${root} for model files\n`));
  const { table } = await scanToTable(root, options);

  // --no-open sets open=false; otherwise the saved preference decides
  const openAfterExport = options.open === false ? false : config.openAfterExport;
  const operation = new ExportOperation(table, { outputPath, openAfterExport });

  try {
    const report = await operation.start();
    await activityLogger.logExport(report, root);

    console.log(chalk.green(`✅ Exported ${report.rowCount} rows`));
    console.log(chalk.dim(`   File: ${report.outputPath}`));
    if (report.opened) {
      console.log(chalk.dim('   Opened in your spreadsheet application'));
    }
  } catch (error) {
    if (error instanceof ExportError) {
      await activityLogger.logExportFailure(error.outputPath, error.message, root);
    }
    throw error;
  }
}
