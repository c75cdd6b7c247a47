/**
 * `dockstart install`
 */

import { ExitCode } from '../types/exit-codes';
import { Logger } from '../types/logger';
import { Notifier } from '../types/notifier';
import { createRealFileSystem } from '../io/real-file-system';
import { createRealProcessRunner } from '../process/real-process-runner';
import { createInquirerPrompter } from '../ui/inquirer-prompter';
import { Installer } from '../install/installer';
import { DEFAULT_BIN_PATH } from '../install/environment';

export interface InstallCommandOptions {
  binPath: string | null;
  assumeYes: boolean;
}

/**
 * Run the installer against the real system
 */
export async function installDockstart(
  options: InstallCommandOptions,
  notifier: Notifier,
  logger: Logger
): Promise<ExitCode> {
  const installer = new Installer({
    fs: createRealFileSystem(),
    runner: createRealProcessRunner(),
    notifier,
    prompter: createInquirerPrompter({ assumeYes: options.assumeYes }),
    logger,
  });

  const report = await installer.install({ binPath: options.binPath ?? DEFAULT_BIN_PATH });
  logger.info(`Installer finished: ${report.outcome}`, { outcome: report.outcome });
  return report.exitCode;
}
