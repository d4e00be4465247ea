import path from 'path';
import type { ModelFileRecord } from '../../src/types/model-record';
import { modelExtensionOf } from '../../src/lib/model-scanner';

const MODELS_DIR = '/test/models';

/**
 * Midnight UTC on the given day of January 2024
 */
export function day(n: number): Date {
  return new Date(Date.UTC(2024, 0, n));
}

/**
 * Create a test record with sensible defaults. The extension follows the
 * file name unless given.
 */
export function createModelRecord(
  name: string,
  overrides?: Partial<ModelFileRecord>
): ModelFileRecord {
  const directory = overrides?.directory ?? MODELS_DIR;
  const filePath = overrides?.path ?? path.join(directory, name);

  return {
    path: filePath,
    name,
    directory,
    extension: modelExtensionOf(name) ?? '.bin',
    sizeBytes: 1024,
    lastAccessTime: day(1),
    lastWriteTime: day(1),
    creationTime: day(1),
    ...overrides,
  };
}
