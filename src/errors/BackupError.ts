export type BackupErrorKind =
  | 'SourceUnavailable'
  | 'DumpFailed'
  | 'ArchiveWriteFailed'
  | 'CleanupFailed'
  | 'ConnectionFailed'
  | 'TransferFailed'
  | 'ListingFailed'
  | 'RemoteDeleteFailed';

/**
 * Base class for every failure a backup run can report.
 * `kind` is what the pipeline uses to decide between aborting and carrying on.
 */
export class BackupError extends Error {
  constructor(
    message: string,
    public readonly kind: BackupErrorKind,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = 'BackupError';
    if (cause) {
      this.stack = `${this.stack}\nCaused by: ${cause.stack}`;
    }
  }
}

export class SourceUnavailableError extends BackupError {
  constructor(
    message: string,
    public readonly sourcePath: string,
    cause?: Error
  ) {
    super(message, 'SourceUnavailable', cause);
    this.name = 'SourceUnavailableError';
  }
}

export class DumpFailedError extends BackupError {
  constructor(
    message: string,
    public readonly exitCode?: number,
    cause?: Error
  ) {
    super(message, 'DumpFailed', cause);
    this.name = 'DumpFailedError';
  }
}

export class ArchiveWriteFailedError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'ArchiveWriteFailed', cause);
    this.name = 'ArchiveWriteFailedError';
  }
}

export class CleanupFailedError extends BackupError {
  constructor(
    message: string,
    public readonly filePath: string,
    cause?: Error
  ) {
    super(message, 'CleanupFailed', cause);
    this.name = 'CleanupFailedError';
  }
}

export class ConnectionFailedError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'ConnectionFailed', cause);
    this.name = 'ConnectionFailedError';
  }
}

export class TransferFailedError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'TransferFailed', cause);
    this.name = 'TransferFailedError';
  }
}

export class ListingFailedError extends BackupError {
  constructor(message: string, cause?: Error) {
    super(message, 'ListingFailed', cause);
    this.name = 'ListingFailedError';
  }
}

export class RemoteDeleteFailedError extends BackupError {
  constructor(
    message: string,
    public readonly fileName: string,
    cause?: Error
  ) {
    super(message, 'RemoteDeleteFailed', cause);
    this.name = 'RemoteDeleteFailedError';
  }
}

/**
 * Format error for consistent logging
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function toError(error: unknown): Error | undefined {
  return error instanceof Error ? error : undefined;
}

export function asError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Read the `code` of a Node.js system error, if any
 */
export function errorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}
