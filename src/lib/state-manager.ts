import * as path from 'path';
import { GlobalConfig, DEFAULT_GLOBAL_CONFIG } from '../types/global-config';
import { SortState, isSortField } from '../types/model-record';
import { DeleteMode } from '../types/operation-types';
import {
  ensureDir,
  writeJsonAtomic,
  readJson,
  fileExists,
  getConfigDir,
  getLogsDir,
  getGlobalConfigPath,
} from '../utils/file-utils';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isDeleteMode(value: unknown): value is DeleteMode {
  return value === 'recycle' || value === 'permanent';
}

function parseSort(value: unknown): SortState {
  if (
    isRecord(value) &&
    typeof value.field === 'string' &&
    isSortField(value.field) &&
    (value.direction === 'asc' || value.direction === 'desc')
  ) {
    return { field: value.field, direction: value.direction };
  }
  return { ...DEFAULT_GLOBAL_CONFIG.sort };
}

/**
 * Merge a config file's contents over the defaults, ignoring fields that
 * are missing or have the wrong type
 */
export function parseGlobalConfig(raw: unknown): GlobalConfig {
  const source: Record<string, unknown> = isRecord(raw) ? raw : {};
  const defaults = DEFAULT_GLOBAL_CONFIG;

  return {
    version: typeof source.version === 'string' ? source.version : defaults.version,
    modelsDirectory:
      typeof source.modelsDirectory === 'string' ? source.modelsDirectory : defaults.modelsDirectory,
    sort: parseSort(source.sort),
    deleteMode: isDeleteMode(source.deleteMode) ? source.deleteMode : defaults.deleteMode,
    openAfterExport:
      typeof source.openAfterExport === 'boolean' ? source.openAfterExport : defaults.openAfterExport,
    exportDirectory:
      typeof source.exportDirectory === 'string' ? source.exportDirectory : defaults.exportDirectory,
  };
}

export class StateManager {
  private configDir: string;
  private logsDir: string;
  private globalConfigPath: string;

  constructor(configDir?: string) {
    this.configDir = configDir ?? getConfigDir();
    this.logsDir = configDir ? path.join(configDir, 'logs') : getLogsDir();
    this.globalConfigPath = configDir ? path.join(configDir, 'config.json') : getGlobalConfigPath();
  }

  /**
   * Initialize config directories
   */
  async initialize(): Promise<void> {
    await ensureDir(this.configDir);
    await ensureDir(this.logsDir);

    // Create default global config if it doesn't exist
    if (!(await fileExists(this.globalConfigPath))) {
      await this.saveGlobalConfig({ ...DEFAULT_GLOBAL_CONFIG, sort: { ...DEFAULT_GLOBAL_CONFIG.sort } });
    }
  }

  /**
   * Load global configuration
   */
  async loadGlobalConfig(): Promise<GlobalConfig> {
    await this.initialize();
    return parseGlobalConfig(await readJson(this.globalConfigPath));
  }

  /**
   * Save global configuration
   */
  async saveGlobalConfig(config: GlobalConfig): Promise<void> {
    await writeJsonAtomic(this.globalConfigPath, config);
  }

  /**
   * Update global configuration with partial changes
   */
  async updateGlobalConfig(updates: Partial<GlobalConfig>): Promise<GlobalConfig> {
    const existing = await this.loadGlobalConfig();
    const updated = { ...existing, ...updates };
    await this.saveGlobalConfig(updated);
    return updated;
  }

  /**
   * Get the configured models directory ('' if none)
   */
  async getModelsDirectory(): Promise<string> {
    const config = await this.loadGlobalConfig();
    return config.modelsDirectory;
  }

  /**
   * Set the models directory
   */
  async setModelsDirectory(directory: string): Promise<void> {
    await this.updateGlobalConfig({ modelsDirectory: directory });
  }

  /**
   * Remember the last sort column/direction
   */
  async setSort(sort: SortState): Promise<void> {
    await this.updateGlobalConfig({ sort: { ...sort } });
  }
}

// Export singleton instance
export const stateManager = new StateManager();
