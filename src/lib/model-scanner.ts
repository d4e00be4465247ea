import * as fs from 'fs/promises';
import type { Dirent, Stats } from 'fs';
import * as path from 'path';
import { ModelExtension, ModelFileRecord, isModelExtension } from '../types/model-record';
import { ScanProgress, ScanReport, SkippedEntry } from '../types/operation-types';
import { expandHome } from '../utils/file-utils';
import { ScanError, errorCode, errorMessage } from './errors';

export interface ScanOptions {
  signal?: AbortSignal;
  onProgress?: (progress: ScanProgress) => void;
  onSkip?: (entry: SkippedEntry) => void;
}

/**
 * Lowercased allow-listed extension of a filename, or null
 */
export function modelExtensionOf(filename: string): ModelExtension | null {
  const extension = path.extname(filename).toLowerCase();
  return isModelExtension(extension) ? extension : null;
}

function buildRecord(filePath: string, extension: ModelExtension, stats: Stats): ModelFileRecord {
  return {
    path: filePath,
    name: path.basename(filePath),
    directory: path.dirname(filePath),
    extension,
    sizeBytes: stats.size,
    lastAccessTime: stats.atime,
    lastWriteTime: stats.mtime,
    creationTime: stats.birthtimeMs > 0 ? stats.birthtime : stats.ctime,
  };
}

export class ModelScanner {
  /**
   * Walk a directory tree and yield a record for every model file in it.
   *
   * Throws ScanError if the root itself cannot be read. Anything below the
   * root that cannot be read is reported through onSkip and the walk goes on.
   * Directory symlinks are not followed; file symlinks are.
   */
  async *scan(root: string, options: ScanOptions = {}): AsyncGenerator<ModelFileRecord> {
    const { signal, onProgress, onSkip } = options;
    const absoluteRoot = path.resolve(expandHome(root));
    await this.validateRoot(absoluteRoot);

    const progress: ScanProgress = {
      entriesVisited: 0,
      matched: 0,
      skipped: 0,
      currentDirectory: absoluteRoot,
    };

    const skip = (entryPath: string, error: unknown) => {
      progress.skipped++;
      onSkip?.({ path: entryPath, reason: errorMessage(error) });
    };

    const pending: string[] = [absoluteRoot];

    try {
      while (pending.length > 0) {
        if (signal?.aborted) return;

        const dir = pending.pop();
        if (dir === undefined) break;
        progress.currentDirectory = dir;

        let entries: Dirent[];
        try {
          entries = await fs.readdir(dir, { withFileTypes: true });
        } catch (error) {
          if (dir === absoluteRoot) {
            throw new ScanError(absoluteRoot, errorMessage(error));
          }
          skip(dir, error);
          continue;
        }

        for (const entry of entries) {
          if (signal?.aborted) return;
          progress.entriesVisited++;

          const entryPath = path.join(dir, entry.name);

          if (entry.isDirectory()) {
            pending.push(entryPath);
            continue;
          }

          if (!entry.isFile() && !entry.isSymbolicLink()) continue;

          const extension = modelExtensionOf(entry.name);
          if (!extension) continue;

          let record: ModelFileRecord | null = null;
          try {
            const stats = await fs.stat(entryPath);
            if (stats.isFile()) {
              record = buildRecord(entryPath, extension, stats);
            }
          } catch (error) {
            // Vanished, permission denied or a dangling symlink
            skip(entryPath, error);
          }

          if (record) {
            progress.matched++;
            yield record;
          }
        }

        onProgress?.({ ...progress });
      }
    } finally {
      onProgress?.({ ...progress });
    }
  }

  /**
   * Run a full scan and collect the outcome. A ScanError is captured in the
   * report (with zero records) rather than thrown.
   */
  async scanAll(root: string, options: ScanOptions = {}): Promise<ScanReport> {
    const startTime = Date.now();
    const absoluteRoot = path.resolve(expandHome(root));
    const records: ModelFileRecord[] = [];
    const skipped: SkippedEntry[] = [];
    let entriesVisited = 0;

    try {
      const stream = this.scan(absoluteRoot, {
        signal: options.signal,
        onSkip: (entry) => {
          skipped.push(entry);
          options.onSkip?.(entry);
        },
        onProgress: (progress) => {
          entriesVisited = progress.entriesVisited;
          options.onProgress?.(progress);
        },
      });

      for await (const record of stream) {
        records.push(record);
      }
    } catch (error) {
      if (error instanceof ScanError) {
        return {
          root: absoluteRoot,
          records: [],
          skipped: [],
          entriesVisited: 0,
          cancelled: false,
          durationMs: Date.now() - startTime,
          error,
        };
      }
      throw error;
    }

    return {
      root: absoluteRoot,
      records,
      skipped,
      entriesVisited,
      cancelled: options.signal?.aborted ?? false,
      durationMs: Date.now() - startTime,
    };
  }

  /**
   * Root must exist and be a directory
   */
  private async validateRoot(root: string): Promise<void> {
    let stats: Stats;
    try {
      stats = await fs.stat(root);
    } catch (error) {
      throw new ScanError(root, errorCode(error) === 'ENOENT' ? 'directory does not exist' : errorMessage(error));
    }

    if (!stats.isDirectory()) {
      throw new ScanError(root, 'not a directory');
    }
  }
}

// Export singleton instance
export const modelScanner = new ModelScanner();
