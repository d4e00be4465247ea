import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { ModelScanner, modelExtensionOf } from './model-scanner';
import { ScanError } from './errors';
import { ResultTable } from './result-table';
import type { ScanProgress } from '../types/operation-types';
import { day } from '../../tests/fixtures/model-records';

async function writeFile(filePath: string, content = 'x', accessed?: Date): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content);
  if (accessed) {
    await fs.utimes(filePath, accessed, accessed);
  }
}

describe('modelExtensionOf()', () => {
  it('should return the lowercased extension for allow-listed files', () => {
    expect(modelExtensionOf('model.safetensors')).toBe('.safetensors');
    expect(modelExtensionOf('Model.GGUF')).toBe('.gguf');
    expect(modelExtensionOf('weights.Pt')).toBe('.pt');
  });

  it('should return null for anything else', () => {
    expect(modelExtensionOf('notes.txt')).toBeNull();
    expect(modelExtensionOf('model.safetensors.part')).toBeNull();
    expect(modelExtensionOf('gguf')).toBeNull();
    expect(modelExtensionOf('.bin')).toBeNull();
  });
});

describe('ModelScanner', () => {
  let scanner: ModelScanner;
  let root: string;

  beforeEach(async () => {
    scanner = new ModelScanner();
    root = await fs.mkdtemp(path.join(os.tmpdir(), 'modelsweep-scan-'));
  });

  afterEach(async () => {
    await fs.rm(root, { recursive: true, force: true });
  });

  describe('scanAll()', () => {
    it('should collect only allow-listed files, oldest access first once tabled', async () => {
      await writeFile(path.join(root, 'a.safetensors'), 'x', day(1));
      await writeFile(path.join(root, 'b.ckpt'), 'x', day(3));
      await writeFile(path.join(root, 'c.txt'), 'x', day(2));

      const report = await scanner.scanAll(root);

      expect(report.error).toBeUndefined();
      expect(report.cancelled).toBe(false);
      expect(report.records).toHaveLength(2);

      const table = new ResultTable(report.records);
      expect(table.visibleRows().map((r) => r.name)).toEqual(['a.safetensors', 'b.ckpt']);
    });

    it('should record size, location and access time', async () => {
      const filePath = path.join(root, 'tiny.onnx');
      await writeFile(filePath, 'hello', day(5));

      const report = await scanner.scanAll(root);

      expect(report.records).toHaveLength(1);
      const [record] = report.records;
      expect(record.path).toBe(filePath);
      expect(record.name).toBe('tiny.onnx');
      expect(record.directory).toBe(root);
      expect(record.extension).toBe('.onnx');
      expect(record.sizeBytes).toBe(5);
      expect(record.lastAccessTime.getTime()).toBe(day(5).getTime());
      expect(record.lastWriteTime.getTime()).toBe(day(5).getTime());
      expect(record.creationTime).toBeInstanceOf(Date);
      expect(record.creationTime.getTime()).toBeGreaterThan(0);
    });

    it('should descend into nested directories and match extensions case-insensitively', async () => {
      await writeFile(path.join(root, 'one', 'two', 'three', 'Deep.GGUF'));
      await writeFile(path.join(root, 'one', 'shallow.PTH'));
      await writeFile(path.join(root, 'one', 'two', 'readme.md'));

      const report = await scanner.scanAll(root);
      const names = report.records.map((r) => `${r.name} ${r.extension}`).sort();

      expect(names).toEqual(['Deep.GGUF .gguf', 'shallow.PTH .pth']);
    });

    it('should treat a directory with a model extension as a directory', async () => {
      await writeFile(path.join(root, 'checkpoints.bin', 'inner.pt'));

      const report = await scanner.scanAll(root);

      expect(report.records.map((r) => r.name)).toEqual(['inner.pt']);
    });

    it('should return an empty report for an empty directory', async () => {
      const report = await scanner.scanAll(root);

      expect(report.records).toEqual([]);
      expect(report.skipped).toEqual([]);
      expect(report.entriesVisited).toBe(0);
    });

    it('should skip a dangling symlink and keep going', async () => {
      if (process.platform === 'win32') return;
      await writeFile(path.join(root, 'real.gguf'));
      const link = path.join(root, 'broken.gguf');
      await fs.symlink(path.join(root, 'missing-target.gguf'), link);

      const report = await scanner.scanAll(root);

      expect(report.records.map((r) => r.name)).toEqual(['real.gguf']);
      expect(report.skipped).toHaveLength(1);
      expect(report.skipped[0].path).toBe(link);
    });

    it('should report a missing root as a scan error with no records', async () => {
      const missing = path.join(root, 'does-not-exist');

      const report = await scanner.scanAll(missing);

      expect(report.error).toBeInstanceOf(ScanError);
      expect(report.error?.message).toBe(`Cannot scan ${missing}: directory does not exist`);
      expect(report.records).toEqual([]);
    });

    it('should report a file root as not a directory', async () => {
      const filePath = path.join(root, 'model.gguf');
      await writeFile(filePath);

      const report = await scanner.scanAll(filePath);

      expect(report.error?.message).toBe(`Cannot scan ${filePath}: not a directory`);
    });

    it('should stop and flag the report when cancelled', async () => {
      await writeFile(path.join(root, 'a.gguf'));
      const controller = new AbortController();
      controller.abort();

      const report = await scanner.scanAll(root, { signal: controller.signal });

      expect(report.cancelled).toBe(true);
      expect(report.records).toEqual([]);
      expect(report.error).toBeUndefined();
    });

    it('should emit progress ending with the final counts', async () => {
      await writeFile(path.join(root, 'a.gguf'));
      await writeFile(path.join(root, 'sub', 'b.bin'));
      await writeFile(path.join(root, 'sub', 'c.txt'));
      const updates: ScanProgress[] = [];

      await scanner.scanAll(root, { onProgress: (p) => updates.push(p) });

      const last = updates[updates.length - 1];
      expect(last.matched).toBe(2);
      // a.gguf, sub, b.bin, c.txt
      expect(last.entriesVisited).toBe(4);
      expect(last.skipped).toBe(0);
    });
  });

  describe('scan()', () => {
    it('should stream records as they are found', async () => {
      await writeFile(path.join(root, 'a.gguf'));

      const names: string[] = [];
      for await (const record of scanner.scan(root)) {
        names.push(record.name);
      }

      expect(names).toEqual(['a.gguf']);
    });

    it('should throw ScanError when the root is missing', async () => {
      const stream = scanner.scan(path.join(root, 'nope'));

      await expect(stream.next()).rejects.toThrow(ScanError);
    });
  });
});
