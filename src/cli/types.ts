/**
 * CLI Types
 *
 * Type definitions for CLI argument parsing
 */

/** Subcommands */
export type CommandName = 'run' | 'install';

/**
 * Parsed CLI arguments. Run options are null when the flag was not given,
 * so the config file and the defaults can fill them in.
 */
export interface ParsedArgs {
  /** Subcommand (default: run) */
  command: CommandName;

  /** Wait for Docker and jq instead of failing at once */
  retry: boolean | null;

  /** Seconds between availability polls */
  retryIntervalSeconds: number | null;

  /** Deadline per readiness group, in seconds */
  maxWaitSeconds: number | null;

  /** Start stopped unless-stopped containers regardless of exit code */
  force: boolean | null;

  /** Primary log file */
  logFile: string | null;

  /** Truncate the log at start when larger than this many bytes */
  logSizeBytes: number | null;

  /** false with --no-log */
  log: boolean | null;

  /** JSON config file */
  configPath: string | null;

  /** Mirror log events on the console */
  verbose: boolean | null;

  /** (install) answer yes to confirmations */
  yes: boolean;

  /** (install) path of the executable to register */
  binPath: string | null;

  /** Show help and exit */
  help: boolean;

  /** Show version and exit */
  version: boolean;
}

/** Default values for parsed arguments */
export const DEFAULT_ARGS: ParsedArgs = {
  command: 'run',
  retry: null,
  retryIntervalSeconds: null,
  maxWaitSeconds: null,
  force: null,
  logFile: null,
  logSizeBytes: null,
  log: null,
  configPath: null,
  verbose: null,
  yes: false,
  binPath: null,
  help: false,
  version: false,
};

/** Result of parsing arguments */
export interface ParseResult {
  success: boolean;
  args?: ParsedArgs;
  error?: string;
}
