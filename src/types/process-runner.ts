/**
 * ProcessRunner interface
 * Abstracts subprocess execution so Docker, jq and systemctl calls can be faked
 */

/**
 * Options for spawning a subprocess
 */
export interface SpawnOptions {
  /** Arguments to pass to the command */
  args: string[];
  /** Working directory for the subprocess (default: current directory) */
  cwd?: string;
  /** Environment variables (merged with process.env) */
  env?: Record<string, string>;
  /** Timeout in milliseconds (0 or undefined = no timeout) */
  timeoutMs?: number;
  /** Text written to the subprocess stdin, which is then closed */
  input?: string;
}

/**
 * Result from spawning a subprocess
 */
export interface SpawnResult {
  /** Exit code from the subprocess */
  exitCode: number;
  /** Duration of execution in milliseconds */
  durationMs: number;
  /** Captured stdout */
  stdout: string;
  /** Captured stderr */
  stderr: string;
  /** Whether the process was killed due to timeout */
  timedOut: boolean;
  /** Whether the process was interrupted by signal */
  interrupted: boolean;
  /** Signal that terminated the process, if any */
  signal?: string;
}

/**
 * Interface for running subprocesses
 * Implementations can be real (child_process) or mock (for testing).
 * spawn() rejects only when the process cannot be started at all
 * (e.g. the command is not on PATH).
 */
export interface ProcessRunner {
  spawn(command: string, options: SpawnOptions): Promise<SpawnResult>;
}

/**
 * Check whether a spawn result represents a clean exit
 */
export function isSpawnSuccess(result: SpawnResult): boolean {
  return result.exitCode === 0 && !result.timedOut && !result.interrupted;
}

/**
 * Pick the most useful one-line description of a failed spawn
 */
export function describeSpawnFailure(command: string, result: SpawnResult): string {
  if (result.timedOut) {
    return `${command} timed out after ${result.durationMs}ms`;
  }
  if (result.interrupted) {
    return `${command} was interrupted by ${result.signal ?? 'a signal'}`;
  }
  const lines = result.stderr
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
  if (lines.length > 0) {
    // docker puts the cause on the daemon line and a generic summary last
    return lines.find((line) => line.startsWith('Error response from daemon')) ?? lines[lines.length - 1];
  }
  return `${command} exited with code ${result.exitCode}`;
}
