/**
 * Installer
 *
 * Registers dockstart to run at startup: the WSL boot command when running
 * under WSL, a oneshot systemd unit otherwise, or instructions when neither
 * is available. Independent of the run path.
 */

import { FileSystem } from '../types/file-system';
import { ProcessRunner, SpawnResult, isSpawnSuccess, describeSpawnFailure } from '../types/process-runner';
import { Notifier } from '../types/notifier';
import { Prompter } from '../types/prompter';
import { Logger } from '../types/logger';
import { ExitCode } from '../types/exit-codes';
import { Result, ok, err } from '../types/result';
import {
  WSL_CONF_PATH,
  SYSTEMD_UNIT_PATH,
  SERVICE_NAME,
  PROC_VERSION_PATH,
  bootCommand,
  isRoot,
  detectWsl,
  detectSystemd,
} from './environment';
import { planWslConfig, WslWriteAction } from './wsl-config';
import { planSystemdUnit, requiresDaemonReload } from './systemd-unit';

export interface InstallOptions {
  /** Executable registered at boot */
  binPath: string;
}

export interface InstallerDependencies {
  fs: FileSystem;
  runner: ProcessRunner;
  notifier: Notifier;
  prompter: Prompter;
  logger: Logger;
  /** Defaults to process.getuid */
  getuid?: () => number;
  /** Defaults to /proc/version */
  procVersionPath?: string;
}

/** What the installer ended up doing */
export type InstallOutcome =
  | 'not_root'
  | 'wsl_configured'
  | 'wsl_manual'
  | 'systemd_configured'
  | 'manual_setup'
  | 'failed';

export interface InstallReport {
  outcome: InstallOutcome;
  exitCode: ExitCode;
}

const WSL_SUCCESS_MESSAGES: Record<WslWriteAction, string> = {
  create: `Created ${WSL_CONF_PATH}`,
  update: `Updated the dockstart command in ${WSL_CONF_PATH}`,
  append: `Appended dockstart to the existing boot command in ${WSL_CONF_PATH}`,
  insert: `Added dockstart to the existing [boot] section in ${WSL_CONF_PATH}`,
  add_section: `Added a [boot] section to ${WSL_CONF_PATH}`,
};

export class Installer {
  private readonly deps: InstallerDependencies;

  constructor(deps: InstallerDependencies) {
    this.deps = deps;
  }

  async install(options: InstallOptions): Promise<InstallReport> {
    const { fs, runner, notifier, logger } = this.deps;

    notifier.heading('dockstart installer');

    if (!isRoot(this.deps.getuid ?? process.getuid)) {
      notifier.error('The installer must be run as root (sudo)');
      logger.error('Installer not run as root');
      return { outcome: 'not_root', exitCode: ExitCode.FAILURE };
    }

    if (!(await fs.exists(options.binPath))) {
      notifier.warn(`${options.binPath} does not exist; the boot entry will fail until dockstart is installed there`);
      logger.warn('Registered executable not found', { binPath: options.binPath });
    }

    let outcome: InstallOutcome;
    if (await detectWsl(fs, this.deps.procVersionPath ?? PROC_VERSION_PATH)) {
      notifier.info('WSL environment detected');
      outcome = await this.configureWsl(options.binPath);
    } else if (await detectSystemd(runner, logger)) {
      outcome = await this.configureSystemd(options.binPath);
    } else {
      notifier.warn('Neither WSL nor systemd detected');
      notifier.warn('Configure dockstart to run at startup yourself');
      notifier.info(`Manual run: sudo ${bootCommand(options.binPath)}`);
      logger.event('install_manual_action', 'No supported boot mechanism found');
      outcome = 'manual_setup';
    }

    if (outcome === 'failed') {
      return { outcome, exitCode: ExitCode.FAILURE };
    }

    notifier.heading('Installation complete');
    return { outcome, exitCode: ExitCode.SUCCESS };
  }

  private async configureWsl(binPath: string): Promise<InstallOutcome> {
    const { fs, notifier, logger } = this.deps;
    notifier.heading('Configuring WSL integration');

    const existing = await this.readOptional(WSL_CONF_PATH);
    if (!existing.ok) {
      notifier.error(existing.error);
      return 'failed';
    }

    const plan = planWslConfig(existing.value, binPath);
    switch (plan.action) {
      case 'unchanged':
        notifier.success(`dockstart is already configured in ${WSL_CONF_PATH}`);
        notifier.info(`  ${plan.commandLine}`);
        break;

      case 'manual':
        notifier.warn(`A boot command is already configured in ${WSL_CONF_PATH}: ${plan.current}`);
        if (plan.reason === 'chained') {
          notifier.warn(`The boot command is part of a command chain; add ${plan.missing.join(' ')} to it by hand`);
        } else if (plan.suggestion !== null) {
          notifier.warn('Add dockstart to the boot command by hand, for example:');
          notifier.info(`  ${plan.suggestion}`);
        }
        notifier.warn('WSL configuration requires manual adjustment');
        logger.event('install_manual_action', 'wsl.conf requires manual adjustment', {
          reason: plan.reason,
          current: plan.current,
        });
        return 'wsl_manual';

      default: {
        const written = await fs.writeFile(WSL_CONF_PATH, plan.content, { createParents: true });
        if (!written.ok) {
          notifier.error(`Could not write ${WSL_CONF_PATH}: ${written.error.message}`);
          logger.error('wsl.conf write failed', { error: written.error.message });
          return 'failed';
        }
        notifier.success(WSL_SUCCESS_MESSAGES[plan.action]);
        notifier.info(`  ${plan.commandLine}`);
        logger.event('install_step', WSL_SUCCESS_MESSAGES[plan.action], { action: plan.action });
      }
    }

    notifier.success('WSL configuration complete');
    notifier.info('Restart WSL for the change to take effect (wsl --shutdown, from PowerShell)');
    return 'wsl_configured';
  }

  private async configureSystemd(binPath: string): Promise<InstallOutcome> {
    const { fs, notifier, logger, prompter } = this.deps;
    notifier.heading('Configuring systemd integration');

    const existing = await this.readOptional(SYSTEMD_UNIT_PATH);
    if (!existing.ok) {
      notifier.error(existing.error);
      return 'failed';
    }

    const plan = planSystemdUnit(existing.value, binPath);
    if (plan.action === 'unchanged') {
      notifier.success(`${SERVICE_NAME} is already configured`);
    } else {
      if (plan.action === 'update') {
        notifier.warn(`${SERVICE_NAME} is missing required parameters: ${plan.missing.join(' ')}`);
      } else if (plan.action === 'replace') {
        notifier.warn(`The existing ${SERVICE_NAME} does not run ${binPath}; replacing it`);
      }

      const written = await fs.writeFile(SYSTEMD_UNIT_PATH, plan.content, { createParents: true });
      if (!written.ok) {
        notifier.error(`Could not write ${SYSTEMD_UNIT_PATH}: ${written.error.message}`);
        logger.error('Unit file write failed', { error: written.error.message });
        return 'failed';
      }
      notifier.success(`Service file written to ${SYSTEMD_UNIT_PATH}`);
      logger.event('install_step', 'Unit file written', { action: plan.action });

      if (requiresDaemonReload(plan)) {
        const reloaded = await this.systemctl(['daemon-reload']);
        if (!reloaded.ok) {
          notifier.error(`systemctl daemon-reload failed: ${reloaded.error}`);
          return 'failed';
        }
        notifier.success('systemd daemon reloaded');
      }
    }

    const enabled = await this.systemctl(['is-enabled', SERVICE_NAME]);
    if (enabled.ok) {
      notifier.success(`${SERVICE_NAME} is already enabled`);
    } else {
      const enabling = await this.systemctl(['enable', SERVICE_NAME]);
      if (!enabling.ok) {
        notifier.error(`Could not enable ${SERVICE_NAME}: ${enabling.error}`);
        return 'failed';
      }
      notifier.success(`${SERVICE_NAME} enabled; it will start at boot`);
      logger.event('install_step', 'Unit enabled', { service: SERVICE_NAME });
    }

    const active = await this.systemctl(['is-active', SERVICE_NAME]);
    if (active.ok) {
      notifier.success(`${SERVICE_NAME} is already running`);
    } else {
      const answer = await prompter.confirm({ message: `Start ${SERVICE_NAME} now?`, default: false });
      if (!answer.ok) {
        notifier.warn(`Not starting ${SERVICE_NAME}: ${answer.error.message}`);
      } else if (answer.value) {
        notifier.progress(`Starting ${SERVICE_NAME}...`);
        const started = await this.systemctl(['start', SERVICE_NAME]);
        if (!started.ok) {
          notifier.error(`Could not start ${SERVICE_NAME}: ${started.error}`);
          return 'failed';
        }
        notifier.success(`${SERVICE_NAME} started`);
        logger.event('install_step', 'Unit started', { service: SERVICE_NAME });
      }
    }

    notifier.success('systemd configuration complete');
    return 'systemd_configured';
  }

  /**
   * Read a file that may legitimately be missing (null)
   */
  private async readOptional(path: string): Promise<Result<string | null, string>> {
    const result = await this.deps.fs.readFile(path);
    if (result.ok) {
      return ok(result.value);
    }
    if (result.error.code === 'NOT_FOUND') {
      return ok(null);
    }
    return err(`Could not read ${path}: ${result.error.message}`);
  }

  private async systemctl(args: string[]): Promise<Result<SpawnResult, string>> {
    const label = `systemctl ${args[0]}`;
    try {
      const result = await this.deps.runner.spawn('systemctl', { args });
      this.deps.logger.debug(`${label} exited with ${result.exitCode}`);
      return isSpawnSuccess(result) ? ok(result) : err(describeSpawnFailure(label, result));
    } catch (error) {
      return err(error instanceof Error ? error.message : String(error));
    }
  }
}

export function createInstaller(deps: InstallerDependencies): Installer {
  return new Installer(deps);
}
