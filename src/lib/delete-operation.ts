import * as fs from 'fs/promises';
import {
  DEFAULT_DELETE_MODE,
  DeleteMode,
  DeleteProgress,
  DeleteReport,
} from '../types/operation-types';
import { DeleteFailure, UnsupportedOperation } from './errors';
import { Operation } from './operation';
import { ResultTable } from './result-table';
import { TrashFacility, platformTrash } from './trash-manager';

export interface DeleteOperationOptions {
  mode?: DeleteMode;            // Default: recycle
  trash?: TrashFacility;
}

/**
 * Deletes every selected file in a table, one at a time.
 *
 * Each file succeeds or fails on its own. When the run ends (normally or by
 * cancellation) deleted files are removed from the table; failed ones stay
 * in it, still selected.
 */
export class DeleteOperation extends Operation<DeleteProgress, DeleteReport> {
  readonly kind = 'delete' as const;
  readonly mode: DeleteMode;
  private table: ResultTable;
  private trash: TrashFacility;

  constructor(table: ResultTable, options: DeleteOperationOptions = {}) {
    super();
    this.table = table;
    this.mode = options.mode ?? DEFAULT_DELETE_MODE;
    this.trash = options.trash ?? platformTrash;
  }

  protected async run(signal: AbortSignal): Promise<DeleteReport> {
    const paths = this.table.selectedPaths();
    const total = paths.length;
    const sizes = new Map<string, number>();
    for (const filePath of paths) {
      sizes.set(filePath, this.table.getRow(filePath)?.sizeBytes ?? 0);
    }

    const deleted: string[] = [];
    const failures: DeleteFailure[] = [];
    let freedBytes = 0;
    let processed = 0;

    // Checked once per batch: without a trash every file fails the same way
    const recycleSupported = this.mode === 'recycle' && total > 0
      ? await this.trash.isAvailable()
      : true;

    for (const filePath of paths) {
      if (signal.aborted) break;

      try {
        await this.deleteFile(filePath, recycleSupported);
        deleted.push(filePath);
        freedBytes += sizes.get(filePath) ?? 0;
      } catch (error) {
        failures.push(DeleteFailure.fromError(filePath, error));
      }

      processed++;
      this.emitProgress({
        processed,
        total,
        succeeded: deleted.length,
        failed: failures.length,
        currentPath: filePath,
      });
    }

    this.table.removeRecords(deleted);

    return {
      mode: this.mode,
      total,
      deleted,
      failures,
      notProcessed: paths.slice(processed),
      freedBytes,
      cancelled: signal.aborted,
    };
  }

  private async deleteFile(filePath: string, recycleSupported: boolean): Promise<void> {
    if (this.mode === 'permanent') {
      await fs.unlink(filePath);
      return;
    }

    if (!recycleSupported) {
      throw new UnsupportedOperation(`Moving files to the ${this.trash.describe()}`);
    }
    await this.trash.moveToTrash(filePath);
  }
}
