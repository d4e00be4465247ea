import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ActivityLogger } from './activity-logger';
import { DeleteFailure } from './errors';
import type { DeleteReport, ScanReport } from '../types/operation-types';

function deleteReport(overrides: Partial<DeleteReport> = {}): DeleteReport {
  return {
    mode: 'recycle',
    total: 3,
    deleted: ['/test/models/a.gguf', '/test/models/b.gguf'],
    failures: [new DeleteFailure('/test/models/c.gguf', 'permission denied', 'EACCES')],
    notProcessed: [],
    freedBytes: 2048,
    cancelled: false,
    ...overrides,
  };
}

describe('ActivityLogger', () => {
  let dir: string;
  let logger: ActivityLogger;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'modelsweep-log-'));
    logger = new ActivityLogger(path.join(dir, 'logs', 'activity.log'));
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('should return nothing before anything was logged', async () => {
    expect(await logger.readRecent(10)).toEqual([]);
  });

  it('should log a scan summary', async () => {
    const report: ScanReport = {
      root: '/test/models',
      records: [],
      skipped: [{ path: '/test/models/locked', reason: 'EACCES' }],
      entriesVisited: 12,
      cancelled: false,
      durationMs: 15,
    };

    await logger.logScan(report);

    const [entry] = await logger.readRecent(10);
    expect(entry.kind).toBe('scan');
    expect(entry.status).toBe('success');
    expect(entry.summary).toBe('0 model files, 1 skipped in 15ms');
    expect(entry.root).toBe('/test/models');
    expect(entry.details).toEqual({ matched: 0, skipped: 1, entriesVisited: 12, durationMs: 15 });
  });

  it('should mark a delete with some failures as partial', async () => {
    await logger.logDelete(deleteReport(), '/test/models');

    const [entry] = await logger.readRecent(10);
    expect(entry.status).toBe('partial');
    expect(entry.summary).toBe('2/3 recycled (2.0 KB), 1 failed');
    expect(entry.details?.failures).toEqual([
      { path: '/test/models/c.gguf', reason: 'permission denied', code: 'EACCES' },
    ]);
  });

  it('should mark deletes by outcome', async () => {
    await logger.logDelete(deleteReport({ deleted: [], freedBytes: 0 }));
    await logger.logDelete(deleteReport({ cancelled: true }));
    await logger.logDelete(deleteReport({ mode: 'permanent', failures: [], total: 2 }));

    const entries = await logger.readRecent(10);
    expect(entries.map((e) => e.status)).toEqual(['error', 'cancelled', 'success']);
    expect(entries[2].summary).toBe('2/2 deleted permanently (2.0 KB), 0 failed');
  });

  it('should log export success and failure', async () => {
    await logger.logExport({ outputPath: '/test/out/models.xlsx', rowCount: 7, opened: false });
    await logger.logExportFailure('/test/out/models.xlsx', 'disk full');

    const entries = await logger.readRecent(10);
    expect(entries.map((e) => [e.status, e.summary])).toEqual([
      ['success', '7 rows to /test/out/models.xlsx'],
      ['error', 'disk full'],
    ]);
  });

  it('should return only the most recent entries, oldest first', async () => {
    await logger.logExportFailure('/test/1.xlsx', 'first');
    await logger.logExportFailure('/test/2.xlsx', 'second');
    await logger.logExportFailure('/test/3.xlsx', 'third');

    const entries = await logger.readRecent(2);
    expect(entries.map((e) => e.summary)).toEqual(['second', 'third']);
  });

  it('should skip malformed lines', async () => {
    const logPath = logger.getLogFilePath();
    await logger.logExportFailure('/test/1.xlsx', 'kept');
    await fs.appendFile(logPath, 'not json\n{"kind":"unknown"}\n', 'utf-8');

    const entries = await logger.readRecent(10);
    expect(entries.map((e) => e.summary)).toEqual(['kept']);
  });

  it('should report a write failure without throwing', async () => {
    const blocker = path.join(dir, 'blocker');
    await fs.writeFile(blocker, '');
    const broken = new ActivityLogger(path.join(blocker, 'activity.log'));
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await expect(broken.logExportFailure('/test/x.xlsx', 'nope')).resolves.toBeUndefined();

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(errorSpy.mock.calls[0][0]).toBe('[Activity Logger] Failed to write to log file:');
  });

  it('should echo entries to stderr in verbose mode', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setVerbose(true);

    await logger.logExportFailure('/test/x.xlsx', 'echoed');

    expect(errorSpy).toHaveBeenCalledTimes(1);
    expect(String(errorSpy.mock.calls[0][0])).toContain('echoed');
  });
});
