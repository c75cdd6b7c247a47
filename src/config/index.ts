/**
 * Config module - configuration resolution
 */

export type { CliFlags, ConfigError, ResolveOptions } from './resolve-config';
export {
  CONFIG_ENV_VAR,
  resolveConfigPath,
  loadConfigFile,
  resolveRunConfig,
  deepFreeze,
} from './resolve-config';

export { parseSize, formatSize } from './parse-size';
export { formatRunConfigForDisplay } from './describe-config';
