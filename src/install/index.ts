/**
 * Install module - registers dockstart to run at startup
 */

export {
  DEFAULT_BIN_PATH,
  REQUIRED_PARAMS,
  WSL_CONF_PATH,
  SYSTEMD_UNIT_PATH,
  SERVICE_NAME,
  bootCommand,
  findMissingParams,
  isRoot,
  detectWsl,
  detectSystemd,
} from './environment';

export type { WslConfigPlan, WslWriteAction } from './wsl-config';
export { planWslConfig } from './wsl-config';

export type { SystemdUnitPlan } from './systemd-unit';
export { renderSystemdUnit, planSystemdUnit, requiresDaemonReload } from './systemd-unit';

export type { InstallOptions, InstallerDependencies, InstallOutcome, InstallReport } from './installer';
export { Installer, createInstaller } from './installer';
