/**
 * Standardized exit codes
 */

/**
 * Exit codes for the CLI. Every fatal condition (missing tool, gate timeout,
 * unrecognised input, invalid config, enumeration failure) maps to FAILURE.
 */
export const ExitCode = {
  /** Normal completion, including "no containers" and "nothing eligible" */
  SUCCESS: 0,
  /** Fatal failure */
  FAILURE: 1,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

/**
 * Categories of fatal failure, used for reporting
 */
export type FatalReason =
  | 'usage'
  | 'config'
  | 'tool_unavailable'
  | 'gate_timeout'
  | 'enumeration_failed'
  | 'install_failed'
  | 'unexpected';

/**
 * Get a human-readable description of a fatal reason
 */
export function describeFatalReason(reason: FatalReason): string {
  switch (reason) {
    case 'usage':
      return 'Unrecognized command line input';
    case 'config':
      return 'Invalid configuration';
    case 'tool_unavailable':
      return 'A required tool is not available';
    case 'gate_timeout':
      return 'Timed out waiting for required tools';
    case 'enumeration_failed':
      return 'Could not list containers';
    case 'install_failed':
      return 'Installation failed';
    case 'unexpected':
      return 'Unexpected error';
  }
}
