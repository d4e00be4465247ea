import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DeleteOperation } from './delete-operation';
import { ResultTable } from './result-table';
import type { DeleteProgress } from '../types/operation-types';
import { createModelRecord } from '../../tests/fixtures/model-records';
import { createMockTrash } from '../../tests/mocks';

const a = createModelRecord('a.gguf', { sizeBytes: 100 });
const b = createModelRecord('b.gguf', { sizeBytes: 200 });
const c = createModelRecord('c.gguf', { sizeBytes: 300 });

function selectedTable(): ResultTable {
  const table = new ResultTable([a, b, c]);
  table.selectAll();
  return table;
}

describe('DeleteOperation', () => {
  describe('recycle mode', () => {
    it('should move every selected file and drop them from the table', async () => {
      const table = selectedTable();
      const trash = createMockTrash();
      const operation = new DeleteOperation(table, { trash });

      const report = await operation.start();

      expect(operation.status).toBe('completed');
      expect(report.mode).toBe('recycle');
      expect(report.total).toBe(3);
      expect(report.deleted).toEqual([a.path, b.path, c.path]);
      expect(report.failures).toEqual([]);
      expect(report.freedBytes).toBe(600);
      expect(trash.trashed).toEqual([a.path, b.path, c.path]);
      expect(table.size).toBe(0);
    });

    it('should leave unselected files alone', async () => {
      const table = new ResultTable([a, b, c]);
      table.toggleSelect(b.path);
      const trash = createMockTrash();

      const report = await new DeleteOperation(table, { trash }).start();

      expect(report.deleted).toEqual([b.path]);
      expect(trash.trashed).toEqual([b.path]);
      expect(table.visibleRows().map((row) => row.name)).toEqual(['a.gguf', 'c.gguf']);
    });

    it('should carry on past a failing file and keep it selected', async () => {
      const table = selectedTable();
      const trash = createMockTrash({ failOn: [b.path] });

      const report = await new DeleteOperation(table, { trash }).start();

      expect(report.deleted).toEqual([a.path, c.path]);
      expect(report.freedBytes).toBe(400);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0].path).toBe(b.path);
      expect(report.failures[0].code).toBe('EACCES');
      expect(report.failures[0].reason).toBe(`EACCES: permission denied, open '${b.path}'`);
      expect(table.size).toBe(1);
      expect(table.isSelected(b.path)).toBe(true);
    });

    it('should fail every file as unsupported when there is no trash', async () => {
      const table = selectedTable();
      const trash = createMockTrash({ available: false, name: 'Recycle Bin' });

      const report = await new DeleteOperation(table, { trash }).start();

      expect(report.deleted).toEqual([]);
      expect(report.failures.map((f) => f.code)).toEqual(['UNSUPPORTED', 'UNSUPPORTED', 'UNSUPPORTED']);
      expect(report.failures[0].reason).toBe(
        `Moving files to the Recycle Bin is not supported on ${process.platform}`
      );
      expect(trash.moveToTrash).not.toHaveBeenCalled();
      expect(table.size).toBe(3);
    });

    it('should do nothing without a selection', async () => {
      const table = new ResultTable([a, b]);
      const trash = createMockTrash();

      const report = await new DeleteOperation(table, { trash }).start();

      expect(report.total).toBe(0);
      expect(report.deleted).toEqual([]);
      expect(trash.isAvailable).not.toHaveBeenCalled();
    });
  });

  describe('progress and cancellation', () => {
    it('should report progress after each file', async () => {
      const trash = createMockTrash({ failOn: [c.path] });
      const operation = new DeleteOperation(selectedTable(), { trash });
      const updates: DeleteProgress[] = [];
      operation.onProgress((progress) => updates.push(progress));

      await operation.start();

      expect(updates.map((u) => u.processed)).toEqual([1, 2, 3]);
      expect(updates[2]).toEqual({
        processed: 3,
        total: 3,
        succeeded: 2,
        failed: 1,
        currentPath: c.path,
      });
    });

    it('should stop between files when cancelled and keep the rest selected', async () => {
      const table = selectedTable();
      const trash = createMockTrash();
      const operation = new DeleteOperation(table, { trash });
      operation.onProgress(() => operation.cancel());

      const report = await operation.start();

      expect(operation.status).toBe('cancelled');
      expect(report.cancelled).toBe(true);
      expect(report.deleted).toEqual([a.path]);
      expect(report.notProcessed).toEqual([b.path, c.path]);
      expect(table.selectedPaths()).toEqual([b.path, c.path]);
    });

    it('should refuse to start twice', async () => {
      const operation = new DeleteOperation(selectedTable(), { trash: createMockTrash() });
      await operation.start();

      await expect(operation.start()).rejects.toThrow('delete operation has already been started');
    });
  });

  describe('permanent mode', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await fs.mkdtemp(path.join(os.tmpdir(), 'modelsweep-delete-'));
    });

    afterEach(async () => {
      await fs.rm(dir, { recursive: true, force: true });
    });

    it('should unlink files without touching the trash', async () => {
      const keepPath = path.join(dir, 'keep.gguf');
      const dropPath = path.join(dir, 'drop.gguf');
      await fs.writeFile(keepPath, 'keep');
      await fs.writeFile(dropPath, 'drop');

      const table = new ResultTable([
        createModelRecord('keep.gguf', { directory: dir, sizeBytes: 4 }),
        createModelRecord('drop.gguf', { directory: dir, sizeBytes: 4 }),
      ]);
      table.toggleSelect(dropPath);
      const trash = createMockTrash();

      const report = await new DeleteOperation(table, { mode: 'permanent', trash }).start();

      expect(report.deleted).toEqual([dropPath]);
      expect(report.freedBytes).toBe(4);
      expect(trash.moveToTrash).not.toHaveBeenCalled();
      expect(trash.isAvailable).not.toHaveBeenCalled();
      await expect(fs.access(dropPath)).rejects.toThrow();
      await expect(fs.readFile(keepPath, 'utf-8')).resolves.toBe('keep');
    });

    it('should record a file that vanished as a failure', async () => {
      const table = new ResultTable([createModelRecord('gone.gguf', { directory: dir })]);
      table.selectAll();

      const report = await new DeleteOperation(table, { mode: 'permanent' }).start();

      expect(report.deleted).toEqual([]);
      expect(report.failures).toHaveLength(1);
      expect(report.failures[0].code).toBe('ENOENT');
      expect(table.isSelected(path.join(dir, 'gone.gguf'))).toBe(true);
    });
  });
});
