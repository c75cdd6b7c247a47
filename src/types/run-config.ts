/**
 * RunConfig type
 * Immutable configuration object built once at startup and passed
 * explicitly to the gate, the engine and the logging setup
 */

/**
 * Availability gate settings
 */
export interface RetryConfig {
  /** Whether the gate keeps polling instead of failing on the first pass */
  readonly enabled: boolean;
  /** Sleep between polls in milliseconds */
  readonly intervalMs: number;
  /** Deadline per readiness group in milliseconds */
  readonly maxWaitMs: number;
}

/**
 * Log file settings
 */
export interface LoggingConfig {
  /** Whether the log file is written at all */
  readonly enabled: boolean;
  /** Primary log file */
  readonly file: string;
  /** Used when the primary location is not writable */
  readonly fallbackFile: string;
  /** Truncate the log at start when it is larger than this */
  readonly maxSizeBytes: number;
}

/**
 * External commands used by dockstart
 */
export interface RuntimeCommands {
  /** Container runtime CLI */
  readonly docker: string;
  /** JSON-query helper */
  readonly jq: string;
}

/**
 * Fully resolved configuration for one run
 */
export interface RunConfig {
  readonly retry: RetryConfig;
  /** Start stopped unless-stopped containers regardless of exit code */
  readonly force: boolean;
  readonly logging: LoggingConfig;
  readonly commands: RuntimeCommands;
  /** Pause after each container, keeping output and log writes ordered */
  readonly containerPauseMs: number;
  /** Mirror log events on the console */
  readonly verbose: boolean;
  /** Where each value came from, for diagnostics */
  readonly sources: Readonly<Record<string, ConfigSource>>;
}

/**
 * Where a configuration value came from
 */
export type ConfigSource = 'cli' | 'file' | 'default';

/** Default primary log file */
export const DEFAULT_LOG_FILE = '/var/log/dockstart.log';

/** Default JSON config file */
export const DEFAULT_CONFIG_FILE = '/etc/dockstart/config.json';

/**
 * Default configuration values
 */
export const DEFAULT_RUN_CONFIG = {
  retry: {
    enabled: false,
    intervalMs: 5_000,
    maxWaitMs: 120_000,
  },
  force: false,
  logging: {
    enabled: true,
    file: DEFAULT_LOG_FILE,
    maxSizeBytes: 1024 * 1024,
  },
  commands: {
    docker: 'docker',
    jq: 'jq',
  },
  containerPauseMs: 100,
  verbose: false,
} as const;
