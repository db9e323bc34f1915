/**
 * Error taxonomy shared by the record store, persistence and sync layers.
 */

export type TrackerErrorCode =
  | 'VALIDATION'
  | 'TABLE_FORMAT'
  | 'NOT_FOUND'
  | 'FILE_IO'
  | 'REMOTE_SYNC'
  | 'CONFIG_CORRUPT';

export class TrackerError extends Error {
  public readonly code: TrackerErrorCode;

  constructor(code: TrackerErrorCode, message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'TrackerError';
    this.code = code;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * A mutation was rejected because it would break a record invariant.
 */
export class ValidationError extends TrackerError {
  public readonly field?: string;

  constructor(message: string, field?: string) {
    super('VALIDATION', message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/**
 * A stored or fetched table could not be decoded into records.
 */
export class TableFormatError extends TrackerError {
  public readonly row?: number;

  constructor(message: string, row?: number) {
    super('TABLE_FORMAT', row === undefined ? message : `Row ${row}: ${message}`);
    this.name = 'TableFormatError';
    this.row = row;
  }
}

export class NotFoundError extends TrackerError {
  public readonly id: number;

  constructor(id: number) {
    super('NOT_FOUND', `No application with id ${id}`);
    this.name = 'NotFoundError';
    this.id = id;
  }
}

export class FileIOError extends TrackerError {
  public readonly path: string;

  constructor(message: string, path: string, cause?: unknown) {
    super('FILE_IO', message, cause);
    this.name = 'FileIOError';
    this.path = path;
  }
}

export type RemoteErrorKind = 'network' | 'auth' | 'timeout' | 'malformed' | 'config';

export class RemoteSyncError extends TrackerError {
  public readonly kind: RemoteErrorKind;

  constructor(kind: RemoteErrorKind, message: string, cause?: unknown) {
    super('REMOTE_SYNC', message, cause);
    this.name = 'RemoteSyncError';
    this.kind = kind;
  }
}

export class ConfigCorruptError extends TrackerError {
  public readonly backupPath: string;

  constructor(message: string, backupPath: string, cause?: unknown) {
    super('CONFIG_CORRUPT', message, cause);
    this.name = 'ConfigCorruptError';
    this.backupPath = backupPath;
  }
}

/**
 * Render any thrown value as a single log-friendly line.
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
