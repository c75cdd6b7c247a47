/**
 * Real ProcessRunner implementation
 * Uses child_process.spawn for subprocess execution
 */

import { spawn } from 'child_process';
import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Real implementation of ProcessRunner using child_process
 */
export class RealProcessRunner implements ProcessRunner {
  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const startTime = Date.now();

    return new Promise((resolve, reject) => {
      const env = options.env ? { ...process.env, ...options.env } : process.env;

      // shell: false so container names are never interpreted by a shell
      const child = spawn(command, options.args, {
        cwd: options.cwd,
        env,
        stdio: [options.input !== undefined ? 'pipe' : 'ignore', 'pipe', 'pipe'],
        shell: false,
      });

      const stdoutChunks: Buffer[] = [];
      const stderrChunks: Buffer[] = [];
      let timedOut = false;
      let timer: NodeJS.Timeout | undefined;

      if (options.timeoutMs && options.timeoutMs > 0) {
        timer = setTimeout(() => {
          timedOut = true;
          child.kill('SIGTERM');
        }, options.timeoutMs);
      }

      child.stdout?.on('data', (data: Buffer) => {
        stdoutChunks.push(data);
      });

      child.stderr?.on('data', (data: Buffer) => {
        stderrChunks.push(data);
      });

      if (options.input !== undefined && child.stdin) {
        // jq exits early on bad input; the resulting EPIPE is reported through the exit code
        child.stdin.on('error', () => undefined);
        child.stdin.end(options.input);
      }

      child.on('close', (code, sig) => {
        if (timer) clearTimeout(timer);

        const interrupted = !timedOut && sig !== null;

        resolve({
          exitCode: code ?? (timedOut ? 124 : 130),
          durationMs: Date.now() - startTime,
          stdout: Buffer.concat(stdoutChunks).toString(),
          stderr: Buffer.concat(stderrChunks).toString(),
          timedOut,
          interrupted,
          signal: sig ?? undefined,
        });
      });

      // Spawn errors (ENOENT for a command that is not installed)
      child.on('error', (error) => {
        if (timer) clearTimeout(timer);
        reject(error);
      });
    });
  }
}

/**
 * Create a real process runner instance
 */
export function createRealProcessRunner(): ProcessRunner {
  return new RealProcessRunner();
}
