/**
 * Error classes for config tree sync
 * Each error carries the process exit code the CLI reports for it
 */

/**
 * Base error class for sync operations
 */
export class SyncError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number,
    public readonly data?: Record<string, unknown>
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Malformed rules file, invalid setting or missing credential.
 * Always raised before any filesystem mutation or network call.
 */
export class ConfigError extends SyncError {
  constructor(message: string, data?: Record<string, unknown>) {
    super(message, 2, data);
  }
}

/**
 * Unreadable entry found while scanning a tree
 */
export class AccessError extends SyncError {
  constructor(path: string, reason: string) {
    super(`Cannot read ${path}: ${reason}`, 3, {
      path,
      reason
    });
  }
}

/**
 * Symbolic link leaving the scanned root, or looping back into it
 */
export class TraversalError extends SyncError {
  constructor(path: string, target: string, reason = 'points outside the tree root') {
    super(`Refusing to follow ${path} -> ${target}: ${reason}`, 3, {
      path,
      target,
      reason
    });
  }
}

/**
 * Transfer primitive failed without per-path detail
 */
export class TransferError extends SyncError {
  constructor(message: string, exitCode?: number, output?: string) {
    super(message, 4, {
      transferExitCode: exitCode,
      output
    });
  }
}

/**
 * Format any thrown value for a log line or wrapped error message
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Narrow a thrown value to a Node.js system error carrying an errno code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
