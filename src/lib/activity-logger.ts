import * as fs from 'fs/promises';
import * as path from 'path';
import chalk from 'chalk';
import { OperationKind, DeleteReport, ExportReport, ScanReport } from '../types/operation-types';
import { ensureDir, fileExists, getActivityLogPath } from '../utils/file-utils';
import { formatBytes, formatDuration } from '../utils/format-utils';

export type ActivityStatus = 'success' | 'partial' | 'cancelled' | 'error';

export interface ActivityEntry {
  timestamp: string;
  kind: OperationKind;
  status: ActivityStatus;
  summary: string;
  root?: string;
  details?: Record<string, unknown>;
}

const KINDS: readonly string[] = ['scan', 'delete', 'export'];
const STATUSES: readonly string[] = ['success', 'partial', 'cancelled', 'error'];

function isActivityEntry(value: unknown): value is ActivityEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.timestamp === 'string' &&
    typeof entry.kind === 'string' &&
    KINDS.includes(entry.kind) &&
    typeof entry.status === 'string' &&
    STATUSES.includes(entry.status) &&
    typeof entry.summary === 'string'
  );
}

/**
 * Append-only record of what modelsweep did to the filesystem.
 * One JSON object per line; writing it never fails the operation.
 */
export class ActivityLogger {
  private logFilePath: string;
  private verbose: boolean;

  constructor(logFilePath: string = getActivityLogPath(), verbose: boolean = false) {
    this.logFilePath = logFilePath;
    this.verbose = verbose;
  }

  getLogFilePath(): string {
    return this.logFilePath;
  }

  setVerbose(verbose: boolean): void {
    this.verbose = verbose;
  }

  async record(entry: ActivityEntry): Promise<void> {
    // Verbose mode: echo to stderr so it does not mix with command output
    if (this.verbose) {
      console.error(this.formatHumanReadable(entry));
    }

    try {
      await ensureDir(path.dirname(this.logFilePath));
      await fs.appendFile(this.logFilePath, JSON.stringify(entry) + '\n', 'utf-8');
    } catch (error) {
      console.error('[Activity Logger] Failed to write to log file:', error);
    }
  }

  async logScan(report: ScanReport): Promise<void> {
    let status: ActivityStatus = 'success';
    let summary = `${report.records.length} model files, ${report.skipped.length} skipped in ${formatDuration(report.durationMs)}`;

    if (report.error) {
      status = 'error';
      summary = report.error.message;
    } else if (report.cancelled) {
      status = 'cancelled';
      summary = `cancelled after ${report.records.length} model files`;
    }

    await this.record({
      timestamp: new Date().toISOString(),
      kind: 'scan',
      status,
      summary,
      root: report.root,
      details: {
        matched: report.records.length,
        skipped: report.skipped.length,
        entriesVisited: report.entriesVisited,
        durationMs: report.durationMs,
      },
    });
  }

  async logDelete(report: DeleteReport, root?: string): Promise<void> {
    let status: ActivityStatus = 'success';
    if (report.cancelled) {
      status = 'cancelled';
    } else if (report.failures.length > 0) {
      status = report.deleted.length > 0 ? 'partial' : 'error';
    }

    const verb = report.mode === 'recycle' ? 'recycled' : 'deleted permanently';
    await this.record({
      timestamp: new Date().toISOString(),
      kind: 'delete',
      status,
      summary: `${report.deleted.length}/${report.total} ${verb} (${formatBytes(report.freedBytes)}), ${report.failures.length} failed`,
      root,
      details: {
        mode: report.mode,
        deleted: report.deleted,
        failures: report.failures.map((f) => ({ path: f.path, reason: f.reason, code: f.code })),
        notProcessed: report.notProcessed,
        freedBytes: report.freedBytes,
      },
    });
  }

  async logExport(report: ExportReport, root?: string): Promise<void> {
    await this.record({
      timestamp: new Date().toISOString(),
      kind: 'export',
      status: 'success',
      summary: `${report.rowCount} rows to ${report.outputPath}`,
      root,
      details: { ...report },
    });
  }

  async logExportFailure(outputPath: string, message: string, root?: string): Promise<void> {
    await this.record({
      timestamp: new Date().toISOString(),
      kind: 'export',
      status: 'error',
      summary: message,
      root,
      details: { outputPath },
    });
  }

  /**
   * Most recent entries, oldest first. Malformed lines are ignored.
   */
  async readRecent(limit: number): Promise<ActivityEntry[]> {
    if (!(await fileExists(this.logFilePath))) {
      return [];
    }

    const content = await fs.readFile(this.logFilePath, 'utf-8');
    const entries: ActivityEntry[] = [];

    for (const line of content.split('\n')) {
      if (line.trim() === '') continue;
      try {
        const parsed: unknown = JSON.parse(line);
        if (isActivityEntry(parsed)) {
          entries.push(parsed);
        }
      } catch {
        continue;
      }
    }

    return limit > 0 ? entries.slice(-limit) : entries;
  }

  /**
   * Format log entry for human reading (console output)
   */
  formatHumanReadable(entry: ActivityEntry): string {
    const color =
      entry.status === 'success'
        ? chalk.green
        : entry.status === 'error'
          ? chalk.red
          : chalk.yellow;

    return `${chalk.dim(entry.timestamp)} ${color(entry.status.padEnd(9))} ${entry.kind.padEnd(6)} ${entry.summary}`;
  }
}

export const activityLogger = new ActivityLogger();
