/**
 * Log file housekeeping
 * Run once at process start: make sure the log file exists and truncate it
 * when it has grown past the configured threshold.
 */

import { dirname } from 'path';
import { FileSystem, FileSystemError, createFileSystemError } from '../types/file-system';
import { Result, ok, err } from '../types/result';
import { LoggingConfig } from '../types/run-config';

/**
 * A log file ready for appending
 */
export interface PreparedLogFile {
  path: string;
  /** Whether the file was emptied because it exceeded the threshold */
  truncated: boolean;
  /** Size before truncation (0 for a new file) */
  previousSize: number;
}

/**
 * Outcome of choosing where this run logs to
 */
export type RunLogTarget =
  | { status: 'disabled' }
  | ({ status: 'ready'; usedFallback: boolean; primaryError?: FileSystemError } & PreparedLogFile)
  | { status: 'unavailable'; errors: FileSystemError[] };

/**
 * Create the log file (and its directory) if missing; truncate it when it is
 * larger than maxSizeBytes
 */
export async function prepareLogFile(
  fs: FileSystem,
  path: string,
  maxSizeBytes: number
): Promise<Result<PreparedLogFile, FileSystemError>> {
  const dirResult = await fs.mkdir(dirname(path), true);
  if (!dirResult.ok) {
    return dirResult;
  }

  const statResult = await fs.stat(path);
  if (!statResult.ok) {
    if (statResult.error.code !== 'NOT_FOUND') {
      return statResult;
    }
    const created = await fs.writeFile(path, '', { atomic: false });
    if (!created.ok) {
      return created;
    }
    return ok({ path, truncated: false, previousSize: 0 });
  }

  if (!statResult.value.isFile) {
    return err(createFileSystemError('NOT_A_FILE', path));
  }

  const size = statResult.value.size;
  if (size > maxSizeBytes) {
    const truncated = await fs.writeFile(path, '', { atomic: false });
    if (!truncated.ok) {
      return truncated;
    }
    return ok({ path, truncated: true, previousSize: size });
  }

  return ok({ path, truncated: false, previousSize: size });
}

/**
 * Pick the log destination for this run: the primary file, else the
 * fallback file, else none
 */
export async function openRunLog(fs: FileSystem, config: LoggingConfig): Promise<RunLogTarget> {
  if (!config.enabled) {
    return { status: 'disabled' };
  }

  const primary = await prepareLogFile(fs, config.file, config.maxSizeBytes);
  if (primary.ok) {
    return { status: 'ready', usedFallback: false, ...primary.value };
  }

  if (config.fallbackFile === config.file) {
    return { status: 'unavailable', errors: [primary.error] };
  }

  const fallback = await prepareLogFile(fs, config.fallbackFile, config.maxSizeBytes);
  if (fallback.ok) {
    return {
      status: 'ready',
      usedFallback: true,
      primaryError: primary.error,
      ...fallback.value,
    };
  }

  return { status: 'unavailable', errors: [primary.error, fallback.error] };
}
