import { vi } from 'vitest';

/**
 * Spreadsheet launcher that never starts a process
 */
export function createMockLauncher(result: boolean | Error = true) {
  return {
    open: vi.fn(async (_filePath: string): Promise<boolean> => {
      if (result instanceof Error) throw result;
      return result;
    }),
  };
}
