/**
 * Base class for every error modelsweep raises on purpose.
 * Anything else reaching the CLI is a bug or an unexpected system error.
 */
export class ModelSweepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Scan root is missing, not a directory or unreadable. Aborts the whole scan.
 */
export class ScanError extends ModelSweepError {
  readonly root: string;

  constructor(root: string, reason: string) {
    super(`Cannot scan ${root}: ${reason}`);
    this.root = root;
  }
}

/**
 * Recycle requested but the platform has no usable trash facility
 */
export class UnsupportedOperation extends ModelSweepError {
  constructor(operation: string, platform: string = process.platform) {
    super(`${operation} is not supported on ${platform}`);
  }
}

/**
 * One file that could not be deleted. Collected into the delete report;
 * never aborts the batch.
 */
export class DeleteFailure extends ModelSweepError {
  readonly path: string;
  readonly reason: string;
  readonly code?: string;

  constructor(path: string, reason: string, code?: string) {
    super(`Failed to delete ${path}: ${reason}`);
    this.path = path;
    this.reason = reason;
    this.code = code;
  }

  static fromError(path: string, error: unknown): DeleteFailure {
    if (error instanceof UnsupportedOperation) {
      return new DeleteFailure(path, error.message, 'UNSUPPORTED');
    }
    return new DeleteFailure(path, errorMessage(error), errorCode(error));
  }
}

/**
 * Spreadsheet could not be written. Export fails fast.
 */
export class ExportError extends ModelSweepError {
  readonly outputPath: string;

  constructor(outputPath: string, reason: string) {
    super(`Failed to export to ${outputPath}: ${reason}`);
    this.outputPath = outputPath;
  }
}

/**
 * A second long-running operation was started while one is in flight
 */
export class OperationBusyError extends ModelSweepError {
  constructor(active: string) {
    super(`Another operation is already running (${active})`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
