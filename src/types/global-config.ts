import { DEFAULT_SORT, SortState } from './model-record';
import { DEFAULT_DELETE_MODE, DeleteMode } from './operation-types';

export interface GlobalConfig {
  version: string;
  modelsDirectory: string;      // Empty until the user picks one
  sort: SortState;              // Last sort column/direction
  deleteMode: DeleteMode;
  openAfterExport: boolean;
  exportDirectory: string;      // Empty means current working directory
}

/**
 * Default global configuration
 */
export const DEFAULT_GLOBAL_CONFIG: GlobalConfig = {
  version: '1.0.0',
  modelsDirectory: '',
  sort: { ...DEFAULT_SORT },
  deleteMode: DEFAULT_DELETE_MODE,
  openAfterExport: true,
  exportDirectory: '',
};
