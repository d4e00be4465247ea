import type { ModelFileRecord } from './model-record';
import type { DeleteFailure, ScanError } from '../lib/errors';

export type OperationKind = 'scan' | 'delete' | 'export';

export type OperationStatus = 'pending' | 'running' | 'completed' | 'cancelled' | 'failed';

// Scan

export interface SkippedEntry {
  path: string;
  reason: string;
}

export interface ScanProgress {
  entriesVisited: number;   // Files and directories looked at so far
  matched: number;
  skipped: number;
  currentDirectory: string;
}

export interface ScanReport {
  root: string;
  records: ModelFileRecord[];
  skipped: SkippedEntry[];
  entriesVisited: number;
  cancelled: boolean;
  durationMs: number;
  error?: ScanError;
}

// Delete

export type DeleteMode = 'recycle' | 'permanent';

export const DEFAULT_DELETE_MODE: DeleteMode = 'recycle';

export interface DeleteProgress {
  processed: number;
  total: number;
  succeeded: number;
  failed: number;
  currentPath: string;
}

export interface DeleteReport {
  mode: DeleteMode;
  total: number;
  deleted: string[];
  failures: DeleteFailure[];
  notProcessed: string[];   // Left untouched because of cancellation
  freedBytes: number;
  cancelled: boolean;
}

// Export

export interface ExportProgress {
  rowsWritten: number;
  totalRows: number;
}

export interface ExportReport {
  outputPath: string;
  rowCount: number;
  opened: boolean;
}
