import { vi } from 'vitest';

export interface MockTrashOptions {
  available?: boolean;          // Default: true
  failOn?: string[];            // Paths whose move is rejected
  name?: string;                // Default: 'Trash'
}

/**
 * In-memory trash facility. Records every path it is asked to move;
 * nothing on disk is touched.
 */
export function createMockTrash(options: MockTrashOptions = {}) {
  const failOn = new Set(options.failOn ?? []);
  const trashed: string[] = [];

  return {
    trashed,
    isAvailable: vi.fn(async () => options.available ?? true),
    moveToTrash: vi.fn(async (filePath: string): Promise<void> => {
      if (failOn.has(filePath)) {
        throw Object.assign(new Error(`EACCES: permission denied, open '${filePath}'`), { code: 'EACCES' });
      }
      trashed.push(filePath);
    }),
    describe: vi.fn(() => options.name ?? 'Trash'),
  };
}
