import { describe, it, expect } from 'vitest';
import { Operation } from './operation';
import { OperationManager } from './operation-manager';
import { OperationBusyError } from './errors';

/**
 * Counts to a target, one tick per step, waiting on a gate between ticks
 * so tests control when it moves
 */
class CountingOperation extends Operation<number, number> {
  readonly kind = 'scan' as const;
  private gate: Promise<void>;
  private releaseGate: () => void = () => undefined;

  constructor(private target: number, private failWith?: Error) {
    super();
    this.gate = new Promise((resolve) => {
      this.releaseGate = resolve;
    });
  }

  release(): void {
    this.releaseGate();
  }

  protected async run(signal: AbortSignal): Promise<number> {
    await this.gate;
    let count = 0;
    while (count < this.target && !signal.aborted) {
      count++;
      this.emitProgress(count);
    }
    if (this.failWith) throw this.failWith;
    return count;
  }
}

describe('Operation', () => {
  it('should move from pending through running to completed', async () => {
    const operation = new CountingOperation(3);
    expect(operation.status).toBe('pending');

    const running = operation.start();
    expect(operation.status).toBe('running');

    operation.release();
    await expect(running).resolves.toBe(3);
    expect(operation.status).toBe('completed');
  });

  it('should deliver progress to listeners until they unsubscribe', async () => {
    const operation = new CountingOperation(3);
    const seen: number[] = [];
    const unsubscribe = operation.onProgress((n) => {
      seen.push(n);
      if (n === 2) unsubscribe();
    });

    operation.release();
    await operation.start();

    expect(seen).toEqual([1, 2]);
  });

  it('should end as cancelled with a partial result', async () => {
    const operation = new CountingOperation(10);
    operation.onProgress((n) => {
      if (n === 4) operation.cancel();
    });

    operation.release();
    const result = await operation.start();

    expect(result).toBe(4);
    expect(operation.isCancelled).toBe(true);
    expect(operation.status).toBe('cancelled');
  });

  it('should ignore cancel after completion', async () => {
    const operation = new CountingOperation(1);
    operation.release();
    await operation.start();

    operation.cancel();

    expect(operation.isCancelled).toBe(false);
    expect(operation.status).toBe('completed');
  });

  it('should end as failed when run throws', async () => {
    const operation = new CountingOperation(1, new Error('disk on fire'));
    operation.release();

    await expect(operation.start()).rejects.toThrow('disk on fire');
    expect(operation.status).toBe('failed');
  });

  it('should refuse to start twice', async () => {
    const operation = new CountingOperation(1);
    operation.release();
    await operation.start();

    await expect(operation.start()).rejects.toThrow('scan operation has already been started');
  });
});

describe('OperationManager', () => {
  it('should reject a second operation while one is running', async () => {
    const manager = new OperationManager();
    const first = new CountingOperation(1);
    const second = new CountingOperation(1);

    const running = manager.run(first);
    expect(manager.isBusy()).toBe(true);
    expect(manager.getActive()).toBe(first);

    await expect(manager.run(second)).rejects.toBeInstanceOf(OperationBusyError);
    await expect(manager.run(second)).rejects.toThrow('Another operation is already running (scan)');
    expect(second.status).toBe('pending');

    first.release();
    await running;
    expect(manager.isBusy()).toBe(false);
  });

  it('should free the slot after a failure', async () => {
    const manager = new OperationManager();
    const failing = new CountingOperation(1, new Error('boom'));
    failing.release();

    await expect(manager.run(failing)).rejects.toThrow('boom');

    const next = new CountingOperation(2);
    next.release();
    await expect(manager.run(next)).resolves.toBe(2);
  });

  it('should cancel the active operation', async () => {
    const manager = new OperationManager();
    const operation = new CountingOperation(5);
    const running = manager.run(operation);

    expect(manager.cancelActive()).toBe(true);
    operation.release();

    await expect(running).resolves.toBe(0);
    expect(operation.status).toBe('cancelled');
  });

  it('should report false when there is nothing to cancel', () => {
    expect(new OperationManager().cancelActive()).toBe(false);
  });
});
