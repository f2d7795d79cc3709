export type StorageErrorCode = 'ENOENT' | 'EISDIR' | 'EEXIST' | 'EACCES' | 'EINVAL' | 'EIO';

const KNOWN_CODES: ReadonlySet<string> = new Set(['ENOENT', 'EISDIR', 'EEXIST', 'EACCES', 'EINVAL']);

const isKnownCode = (code: string): code is Exclude<StorageErrorCode, 'EIO'> => KNOWN_CODES.has(code);

/**
 * Failure of a storage backend operation, with an errno-like code
 */
export class StorageError extends Error {
  constructor(
    message: string,
    public code: StorageErrorCode = 'EIO',
    public filepath?: string
  ) {
    super(message);
    this.name = 'StorageError';
    Error.captureStackTrace(this, this.constructor);
  }

  static notFound(filepath: string): StorageError {
    return new StorageError('No such file or directory', 'ENOENT', filepath);
  }

  static isDirectory(filepath: string): StorageError {
    return new StorageError('Is a directory', 'EISDIR', filepath);
  }

  /**
   * Wrap an error thrown by node's fs API
   */
  static fromNodeError(error: unknown, filepath: string): StorageError {
    if (error instanceof StorageError) {
      return error;
    }
    if (error instanceof Error && 'code' in error && typeof error.code === 'string' && isKnownCode(error.code)) {
      return new StorageError(error.message, error.code, filepath);
    }
    return new StorageError(error instanceof Error ? error.message : String(error), 'EIO', filepath);
  }
}

export const isStorageError = (error: unknown, code: StorageErrorCode): error is StorageError =>
  error instanceof StorageError && error.code === code;
