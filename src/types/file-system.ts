/**
 * FileSystem interface
 * Abstracts filesystem operations for testability
 */

import { Result } from './result';

/**
 * Options for writing files
 */
export interface WriteOptions {
  /** File encoding (default: 'utf-8') */
  encoding?: BufferEncoding;
  /** Whether to use atomic writes (write to temp, then rename) */
  atomic?: boolean;
  /** Create parent directories if they don't exist */
  createParents?: boolean;
}

/**
 * File statistics
 */
export interface FileStats {
  /** Size in bytes */
  size: number;
  /** Whether it's a file */
  isFile: boolean;
  /** Whether it's a directory */
  isDirectory: boolean;
  /** Last modified time */
  modifiedAt: Date;
}

/**
 * Error types for filesystem operations
 */
export type FileSystemErrorCode =
  | 'NOT_FOUND'
  | 'PERMISSION_DENIED'
  | 'NOT_A_FILE'
  | 'NOT_A_DIRECTORY'
  | 'IO_ERROR';

/**
 * Filesystem operation error
 */
export interface FileSystemError {
  code: FileSystemErrorCode;
  message: string;
  path: string;
  cause?: Error;
}

/**
 * Interface for filesystem operations
 * Implementations can be real (Node.js fs) or mock (in-memory for testing)
 */
export interface FileSystem {
  /**
   * Read a file's contents as a string
   */
  readFile(path: string): Promise<Result<string, FileSystemError>>;

  /**
   * Write content to a file, replacing it
   */
  writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>>;

  /**
   * Check if a file or directory exists
   */
  exists(path: string): Promise<boolean>;

  /**
   * Get file statistics
   */
  stat(path: string): Promise<Result<FileStats, FileSystemError>>;

  /**
   * Create a directory (and optionally parents)
   */
  mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>>;
}

/**
 * Create a FileSystemError
 */
export function createFileSystemError(
  code: FileSystemErrorCode,
  path: string,
  message?: string,
  cause?: Error
): FileSystemError {
  const defaultMessages: Record<FileSystemErrorCode, string> = {
    NOT_FOUND: `Path not found: ${path}`,
    PERMISSION_DENIED: `Permission denied: ${path}`,
    NOT_A_FILE: `Not a file: ${path}`,
    NOT_A_DIRECTORY: `Not a directory: ${path}`,
    IO_ERROR: `IO error: ${path}`,
  };

  return {
    code,
    path,
    message: message ?? defaultMessages[code],
    cause,
  };
}

/**
 * Extract the errno code (ENOENT, EACCES, ...) from a thrown value
 */
export function getErrnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Map a thrown fs error onto a FileSystemError
 */
export function toFileSystemError(error: unknown, path: string): FileSystemError {
  const cause = error instanceof Error ? error : undefined;
  switch (getErrnoCode(error)) {
    case 'ENOENT':
      return createFileSystemError('NOT_FOUND', path, undefined, cause);
    case 'EACCES':
    case 'EPERM':
    case 'EROFS':
      return createFileSystemError('PERMISSION_DENIED', path, undefined, cause);
    case 'EISDIR':
      return createFileSystemError('NOT_A_FILE', path, undefined, cause);
    case 'ENOTDIR':
      return createFileSystemError('NOT_A_DIRECTORY', path, undefined, cause);
    default:
      return createFileSystemError(
        'IO_ERROR',
        path,
        cause?.message ?? String(error),
        cause
      );
  }
}
