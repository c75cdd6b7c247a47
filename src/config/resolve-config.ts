/**
 * Configuration Resolution
 * Single-pass config resolution with explicit precedence
 * CLI flags > config file > defaults
 */

import { existsSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import {
  RunConfig,
  ConfigSource,
  DEFAULT_RUN_CONFIG,
  DEFAULT_CONFIG_FILE,
} from '../types/run-config';
import { Result, ok, err } from '../types/result';
import { ConfigFile, parseConfigFile } from '../schemas/validators';
import { parseSize } from './parse-size';

/** Environment variable naming the config file */
export const CONFIG_ENV_VAR = 'DOCKSTART_CONFIG';

/**
 * CLI flags that can override configuration
 */
export interface CliFlags {
  retry?: boolean;
  retryIntervalSeconds?: number;
  maxWaitSeconds?: number;
  force?: boolean;
  logFile?: string;
  logSizeBytes?: number;
  log?: boolean;
  verbose?: boolean;
}

/**
 * Configuration error (unreadable or invalid config file)
 */
export interface ConfigError {
  path: string;
  message: string;
}

/**
 * Options for resolveRunConfig
 */
export interface ResolveOptions {
  /** Directory for the fallback log file (default: os.tmpdir()) */
  tmpDir?: string;
}

/**
 * Pick the config file: --config, then $DOCKSTART_CONFIG, then the system default
 */
export function resolveConfigPath(
  explicitPath: string | null | undefined,
  env: NodeJS.ProcessEnv = process.env
): string {
  return explicitPath ?? env[CONFIG_ENV_VAR] ?? DEFAULT_CONFIG_FILE;
}

/**
 * Load and validate the JSON config file. A missing file is not an error.
 */
export function loadConfigFile(path: string): Result<ConfigFile | null, ConfigError> {
  if (!existsSync(path)) {
    return ok(null);
  }

  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (error) {
    return err({
      path,
      message: `Cannot read config file: ${error instanceof Error ? error.message : String(error)}`,
    });
  }

  const parsed = parseConfigFile(content);
  if (!parsed.success || !parsed.data) {
    return err({
      path,
      message: `Invalid config file: ${(parsed.errors ?? []).join('; ')}`,
    });
  }
  return ok(parsed.data);
}

/**
 * Freeze an object graph
 */
export function deepFreeze<T extends object>(value: T): Readonly<T> {
  for (const key of Object.keys(value)) {
    const child: unknown = Reflect.get(value, key);
    if (typeof child === 'object' && child !== null && !Object.isFrozen(child)) {
      deepFreeze(child);
    }
  }
  return Object.freeze(value);
}

/**
 * Resolve configuration from all sources with explicit precedence
 * CLI flags > config file > defaults
 */
export function resolveRunConfig(
  cliFlags: CliFlags,
  fileConfig: ConfigFile | null,
  options: ResolveOptions = {}
): RunConfig {
  const file: ConfigFile = fileConfig ?? {};

  // Track sources for debugging
  const sources: Record<string, ConfigSource> = {};

  // Helper to resolve a value with precedence
  function resolveValue<T>(key: string, cli: T | undefined, fromFile: T | undefined, defaultVal: T): T {
    if (cli !== undefined) {
      sources[key] = 'cli';
      return cli;
    }
    if (fromFile !== undefined) {
      sources[key] = 'file';
      return fromFile;
    }
    sources[key] = 'default';
    return defaultVal;
  }

  const fileLogSize = file.logSize === undefined ? undefined : parseSize(file.logSize) ?? undefined;
  const secondsToMs = (seconds: number | undefined) => (seconds === undefined ? undefined : seconds * 1000);

  const config: RunConfig = {
    retry: {
      enabled: resolveValue('retry', cliFlags.retry, file.retry, DEFAULT_RUN_CONFIG.retry.enabled),
      intervalMs: resolveValue(
        'retryInterval',
        secondsToMs(cliFlags.retryIntervalSeconds),
        secondsToMs(file.retryInterval),
        DEFAULT_RUN_CONFIG.retry.intervalMs
      ),
      maxWaitMs: resolveValue(
        'maxWait',
        secondsToMs(cliFlags.maxWaitSeconds),
        secondsToMs(file.maxWait),
        DEFAULT_RUN_CONFIG.retry.maxWaitMs
      ),
    },

    force: resolveValue('force', cliFlags.force, file.force, DEFAULT_RUN_CONFIG.force),

    logging: {
      enabled: resolveValue('log', cliFlags.log, file.log, DEFAULT_RUN_CONFIG.logging.enabled),
      file: resolveValue('logFile', cliFlags.logFile, file.logFile, DEFAULT_RUN_CONFIG.logging.file),
      fallbackFile: join(options.tmpDir ?? tmpdir(), 'dockstart.log'),
      maxSizeBytes: resolveValue(
        'logSize',
        cliFlags.logSizeBytes,
        fileLogSize,
        DEFAULT_RUN_CONFIG.logging.maxSizeBytes
      ),
    },

    commands: {
      docker: resolveValue('dockerCommand', undefined, file.dockerCommand, DEFAULT_RUN_CONFIG.commands.docker),
      jq: resolveValue('jqCommand', undefined, file.jqCommand, DEFAULT_RUN_CONFIG.commands.jq),
    },

    containerPauseMs: resolveValue(
      'containerPauseMs',
      undefined,
      file.containerPauseMs,
      DEFAULT_RUN_CONFIG.containerPauseMs
    ),

    verbose: resolveValue('verbose', cliFlags.verbose, file.verbose, DEFAULT_RUN_CONFIG.verbose),

    sources,
  };

  return deepFreeze(config);
}
