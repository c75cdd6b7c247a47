/**
 * Real FileSystem implementation
 * Uses Node.js fs with atomic writes for the files the installer edits
 */

import {
  readFile as fsReadFile,
  writeFile as fsWriteFile,
  stat as fsStat,
  mkdir as fsMkdir,
  existsSync,
  mkdirSync,
  writeFileSync,
  renameSync,
  unlinkSync,
} from 'fs';
import { promisify } from 'util';
import { dirname } from 'path';
import { randomBytes } from 'crypto';
import {
  FileSystem,
  FileStats,
  WriteOptions,
  FileSystemError,
  getErrnoCode,
  toFileSystemError,
} from '../types/file-system';
import { Result, ok, err } from '../types/result';

const readFileAsync = promisify(fsReadFile);
const writeFileAsync = promisify(fsWriteFile);
const statAsync = promisify(fsStat);
const mkdirAsync = promisify(fsMkdir);

/**
 * Real implementation of FileSystem using Node.js fs
 */
export class RealFileSystem implements FileSystem {
  async readFile(path: string): Promise<Result<string, FileSystemError>> {
    try {
      const content = await readFileAsync(path, { encoding: 'utf-8' });
      return ok(content);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async writeFile(
    path: string,
    content: string,
    options?: WriteOptions
  ): Promise<Result<void, FileSystemError>> {
    try {
      const encoding = options?.encoding ?? 'utf-8';

      if (options?.createParents) {
        mkdirSync(dirname(path), { recursive: true });
      }

      // Atomic write: write to temp file, then rename
      if (options?.atomic ?? true) {
        const tempPath = `${path}.${randomBytes(8).toString('hex')}.tmp`;
        try {
          writeFileSync(tempPath, content, { encoding });
          renameSync(tempPath, path);
        } catch (error) {
          if (existsSync(tempPath)) {
            unlinkSync(tempPath);
          }
          throw error;
        }
      } else {
        await writeFileAsync(path, content, { encoding });
      }

      return ok(undefined);
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async exists(path: string): Promise<boolean> {
    return existsSync(path);
  }

  async stat(path: string): Promise<Result<FileStats, FileSystemError>> {
    try {
      const stats = await statAsync(path);
      return ok({
        size: stats.size,
        isFile: stats.isFile(),
        isDirectory: stats.isDirectory(),
        modifiedAt: stats.mtime,
      });
    } catch (error) {
      return err(toFileSystemError(error, path));
    }
  }

  async mkdir(path: string, recursive?: boolean): Promise<Result<void, FileSystemError>> {
    try {
      await mkdirAsync(path, { recursive: recursive ?? false });
      return ok(undefined);
    } catch (error) {
      // An existing directory is what the caller wanted
      if (getErrnoCode(error) === 'EEXIST' && existsSync(path)) {
        return ok(undefined);
      }
      return err(toFileSystemError(error, path));
    }
  }
}

export function createRealFileSystem(): FileSystem {
  return new RealFileSystem();
}
