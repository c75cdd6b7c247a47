/**
 * Installer environment: paths, required boot parameters and the checks
 * that pick between WSL, systemd and manual setup
 */

import { FileSystem } from '../types/file-system';
import { ProcessRunner, isSpawnSuccess } from '../types/process-runner';
import { Logger } from '../types/logger';

/** Default location of the dockstart executable */
export const DEFAULT_BIN_PATH = '/usr/local/bin/dockstart';

/** Flags every boot entry must pass */
export const REQUIRED_PARAMS: readonly string[] = ['--retry', '--force'];

export const WSL_CONF_PATH = '/etc/wsl.conf';
export const PROC_VERSION_PATH = '/proc/version';
export const SERVICE_NAME = 'dockstart.service';
export const SYSTEMD_UNIT_PATH = `/etc/systemd/system/${SERVICE_NAME}`;

/**
 * The command line registered at boot
 */
export function bootCommand(binPath: string): string {
  return [binPath, ...REQUIRED_PARAMS].join(' ');
}

/**
 * Required parameters absent from a command line. Parameters are matched as
 * whole words, so `--retry-interval` does not count as `--retry`.
 */
export function findMissingParams(commandLine: string): string[] {
  const tokens = new Set(commandLine.split(/[\s;&|]+/).filter(Boolean));
  return REQUIRED_PARAMS.filter((param) => !tokens.has(param));
}

/**
 * Whether the process runs with uid 0. Platforms without uids never count.
 */
export function isRoot(getuid: (() => number) | undefined = process.getuid): boolean {
  return typeof getuid === 'function' && getuid() === 0;
}

/**
 * WSL kernels identify themselves with "microsoft" in /proc/version
 */
export async function detectWsl(fs: FileSystem, versionPath: string = PROC_VERSION_PATH): Promise<boolean> {
  const result = await fs.readFile(versionPath);
  return result.ok && /microsoft/i.test(result.value);
}

/**
 * Whether systemctl is on PATH and answers
 */
export async function detectSystemd(runner: ProcessRunner, logger?: Logger): Promise<boolean> {
  try {
    const result = await runner.spawn('systemctl', { args: ['--version'], timeoutMs: 10_000 });
    return isSpawnSuccess(result);
  } catch (error) {
    logger?.debug('systemctl is not available', {
      error: error instanceof Error ? error.message : String(error),
    });
    return false;
  }
}
