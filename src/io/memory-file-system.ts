/**
 * In-memory FileSystem implementation
 * For testing - keeps a virtual filesystem in memory, with read-only
 * locations to stand in for /var/log or /etc when not running as root
 */

import { resolve, dirname, sep } from 'path';
import {
  FileSystem,
  FileStats,
  WriteOptions,
  FileSystemError,
  createFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

interface VirtualFile {
  type: 'file';
  content: string;
  modifiedAt: Date;
}

interface VirtualDirectory {
  type: 'directory';
  modifiedAt: Date;
}

type VirtualEntry = VirtualFile | VirtualDirectory;

/**
 * In-memory implementation of FileSystem for testing
 */
export class MemoryFileSystem implements FileSystem {
  private readonly entries: Map<string, VirtualEntry> = new Map();
  private readonly readOnlyPaths: Set<string> = new Set();

  constructor() {
    this.entries.set(sep, { type: 'directory', modifiedAt: new Date() });
  }

  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    const entry = this.entries.get(resolve(path));

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }
    if (entry.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }
    return ok(entry.content);
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    const normalizedPath = resolve(path);
    const parentDir = dirname(normalizedPath);

    const parentEntry = this.entries.get(parentDir);
    if (!parentEntry) {
      if (!options?.createParents) {
        return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
      }
      const mkdirResult = await this.mkdir(parentDir, true);
      if (!mkdirResult.ok) {
        return mkdirResult;
      }
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
    }

    if (this.isReadOnly(normalizedPath)) {
      return err(createFileSystemError('PERMISSION_DENIED', path));
    }

    if (this.entries.get(normalizedPath)?.type === 'directory') {
      return err(createFileSystemError('NOT_A_FILE', path));
    }

    this.entries.set(normalizedPath, { type: 'file', content, modifiedAt: new Date() });
    return ok(undefined);
  }

  async exists(path: string): Promise<boolean> {
    return this.entries.has(resolve(path));
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    const entry = this.entries.get(resolve(path));

    if (!entry) {
      return err(createFileSystemError('NOT_FOUND', path));
    }

    return ok({
      size: entry.type === 'file' ? Buffer.byteLength(entry.content, 'utf-8') : 0,
      isFile: entry.type === 'file',
      isDirectory: entry.type === 'directory',
      modifiedAt: entry.modifiedAt,
    });
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    const normalizedPath = resolve(path);

    const existingEntry = this.entries.get(normalizedPath);
    if (existingEntry) {
      if (existingEntry.type === 'directory') {
        return ok(undefined);
      }
      return err(createFileSystemError('NOT_A_DIRECTORY', path));
    }

    const parentDir = dirname(normalizedPath);
    const parentEntry = this.entries.get(parentDir);
    if (!parentEntry) {
      if (!recursive) {
        return err(createFileSystemError('NOT_FOUND', parentDir, 'Parent directory does not exist'));
      }
      const mkdirResult = await this.mkdir(parentDir, true);
      if (!mkdirResult.ok) {
        return mkdirResult;
      }
    } else if (parentEntry.type !== 'directory') {
      return err(createFileSystemError('NOT_A_DIRECTORY', parentDir));
    }

    if (this.isReadOnly(normalizedPath)) {
      return err(createFileSystemError('PERMISSION_DENIED', path));
    }

    this.entries.set(normalizedPath, { type: 'directory', modifiedAt: new Date() });
    return ok(undefined);
  }

  /**
   * Seed a file, creating its parent directories; ignores read-only marks
   */
  setFile(path: string, content: string): void {
    const normalizedPath = resolve(path);
    let current = dirname(normalizedPath);
    const parents: string[] = [];
    while (!this.entries.has(current)) {
      parents.unshift(current);
      current = dirname(current);
    }
    for (const dir of parents) {
      this.entries.set(dir, { type: 'directory', modifiedAt: new Date() });
    }
    this.entries.set(normalizedPath, { type: 'file', content, modifiedAt: new Date() });
  }

  /**
   * Refuse writes at this path and everything beneath it
   */
  setReadOnly(path: string): void {
    this.readOnlyPaths.add(resolve(path));
  }

  /**
   * Current content of a file, or undefined
   */
  getFile(path: string): string | undefined {
    const entry = this.entries.get(resolve(path));
    return entry?.type === 'file' ? entry.content : undefined;
  }

  private isReadOnly(normalizedPath: string): boolean {
    for (const readOnly of this.readOnlyPaths) {
      if (normalizedPath === readOnly || normalizedPath.startsWith(readOnly + sep)) {
        return true;
      }
    }
    return false;
  }
}
