import * as path from 'path';
import chalk from 'chalk';
import { stateManager } from '../lib/state-manager';
import { GlobalConfig } from '../types/global-config';
import { expandHome, getGlobalConfigPath } from '../utils/file-utils';
import { parseSortField } from './scan-runner';

export interface ConfigOptions {
  modelsDir?: string;
  sort?: string;
  desc?: boolean;
  deleteMode?: string;
  openAfterExport?: boolean;
  exportDir?: string;
}

function printConfig(config: GlobalConfig): void {
  console.log(chalk.blue('⚙️  Configuration\n'));
  console.log(chalk.bold('Models Directory:'));
  console.log(`  ${config.modelsDirectory || chalk.dim('(not set)')}`);
  console.log();
  console.log(chalk.bold('Defaults:'));
  console.log(`  Sort:          ${config.sort.field} (${config.sort.direction})`);
  console.log(`  Delete mode:   ${config.deleteMode}`);
  console.log(`  Open export:   ${config.openAfterExport ? 'yes' : 'no'}`);
  console.log(`  Export dir:    ${config.exportDirectory || chalk.dim('(current directory)')}`);
  console.log();
  console.log(chalk.dim(`Config file: ${getGlobalConfigPath()}`));
  console.log(chalk.dim('Change models directory: modelsweep config --models-dir <path>'));
}

export async function configCommand(options: ConfigOptions): Promise<void> {
  const updates: Partial<GlobalConfig> = {};
  const current = await stateManager.loadGlobalConfig();

  if (options.modelsDir !== undefined) {
    updates.modelsDirectory = path.resolve(expandHome(options.modelsDir));
  }

  if (options.sort !== undefined || options.desc !== undefined) {
    updates.sort = {
      field: options.sort !== undefined ? parseSortField(options.sort) : current.sort.field,
      direction: options.desc === undefined
        ? current.sort.direction
        : options.desc ? 'desc' : 'asc',
    };
  }

  if (options.deleteMode !== undefined) {
    if (options.deleteMode !== 'recycle' && options.deleteMode !== 'permanent') {
      throw new Error(`Invalid delete mode: ${options.deleteMode}\n\nUse: recycle or permanent`);
    }
    updates.deleteMode = options.deleteMode;
  }

  if (options.openAfterExport !== undefined) {
    updates.openAfterExport = options.openAfterExport;
  }

  if (options.exportDir !== undefined) {
    updates.exportDirectory = options.exportDir === '' ? '' : path.resolve(expandHome(options.exportDir));
  }

  // If no options provided, show current config
  if (Object.keys(updates).length === 0) {
    printConfig(current);
    return;
  }

  const updated = await stateManager.updateGlobalConfig(updates);
  console.log(chalk.green('✅ Configuration updated\n'));
  printConfig(updated);

  if (updates.deleteMode === 'permanent') {
    console.log();
    console.log(chalk.yellow('⚠️  rm and browse will now delete files permanently by default'));
  }
}
