import { CancellableOperation, Operation } from './operation';
import { OperationBusyError } from './errors';

/**
 * Allows one long-running operation at a time.
 * The record table is only ever handed to the operation holding the slot.
 */
export class OperationManager {
  private active: CancellableOperation | null = null;

  isBusy(): boolean {
    return this.active !== null;
  }

  getActive(): CancellableOperation | null {
    return this.active;
  }

  /**
   * Start an operation, or reject with OperationBusyError if another one
   * is still running
   */
  async run<TProgress, TReport>(operation: Operation<TProgress, TReport>): Promise<TReport> {
    if (this.active) {
      throw new OperationBusyError(this.active.kind);
    }

    this.active = operation;
    try {
      return await operation.start();
    } finally {
      this.active = null;
    }
  }

  /**
   * Ask the running operation to stop. Returns false if nothing is running.
   */
  cancelActive(): boolean {
    if (!this.active) return false;
    this.active.cancel();
    return true;
  }
}
