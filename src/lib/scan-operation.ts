import { ScanProgress, ScanReport } from '../types/operation-types';
import { Operation } from './operation';
import { ModelScanner, modelScanner } from './model-scanner';

/**
 * Scan of one root directory as a cancellable operation.
 * A missing or unreadable root comes back as report.error with no records.
 */
export class ScanOperation extends Operation<ScanProgress, ScanReport> {
  readonly kind = 'scan' as const;
  readonly root: string;
  private scanner: ModelScanner;

  constructor(root: string, scanner: ModelScanner = modelScanner) {
    super();
    this.root = root;
    this.scanner = scanner;
  }

  protected run(signal: AbortSignal): Promise<ScanReport> {
    return this.scanner.scanAll(this.root, {
      signal,
      onProgress: (progress) => this.emitProgress(progress),
    });
  }
}
