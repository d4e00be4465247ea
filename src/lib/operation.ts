import { OperationKind, OperationStatus } from '../types/operation-types';

export type ProgressListener<TProgress> = (progress: TProgress) => void;

/**
 * A long-running unit of work (scan, delete, export) that the presentation
 * layer can start, watch and cancel without knowing what it does.
 *
 * Subclasses implement run() and call emitProgress(). Cancellation is
 * cooperative: run() checks the signal between items and returns a partial
 * report.
 */
export abstract class Operation<TProgress, TReport> implements CancellableOperation {
  abstract readonly kind: OperationKind;

  private listeners = new Set<ProgressListener<TProgress>>();
  private abortController = new AbortController();
  private currentStatus: OperationStatus = 'pending';

  get status(): OperationStatus {
    return this.currentStatus;
  }

  get signal(): AbortSignal {
    return this.abortController.signal;
  }

  get isCancelled(): boolean {
    return this.abortController.signal.aborted;
  }

  /**
   * Register a progress listener. Returns a function that unregisters it.
   */
  onProgress(listener: ProgressListener<TProgress>): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Request cancellation. Has no effect once the operation has finished.
   */
  cancel(): void {
    if (this.currentStatus === 'pending' || this.currentStatus === 'running') {
      this.abortController.abort();
    }
  }

  /**
   * Run the operation. An operation can only be started once.
   */
  async start(): Promise<TReport> {
    if (this.currentStatus !== 'pending') {
      throw new Error(`${this.kind} operation has already been started`);
    }

    this.currentStatus = 'running';
    try {
      const report = await this.run(this.abortController.signal);
      this.currentStatus = this.isCancelled ? 'cancelled' : 'completed';
      return report;
    } catch (error) {
      this.currentStatus = 'failed';
      throw error;
    }
  }

  protected emitProgress(progress: TProgress): void {
    for (const listener of this.listeners) {
      listener(progress);
    }
  }

  protected abstract run(signal: AbortSignal): Promise<TReport>;
}

/**
 * The part of an operation that can be tracked without knowing its types
 */
export interface CancellableOperation {
  readonly kind: OperationKind;
  readonly status: OperationStatus;
  cancel(): void;
}
