/**
 * Mock ProcessRunner implementation
 * For testing - returns scripted results without spawning real processes
 */

import { ProcessRunner, SpawnOptions, SpawnResult } from '../types/process-runner';

/**
 * Configuration for mock process behavior
 */
export interface MockProcessConfig {
  /** Exit code to return (default: 0) */
  exitCode?: number;
  /** Duration to report in milliseconds (default: 10) */
  durationMs?: number;
  /** Stdout to return */
  stdout?: string;
  /** Stderr to return */
  stderr?: string;
  /** Whether to simulate timeout */
  timedOut?: boolean;
  /** Error to throw (simulates spawn failure, e.g. command not found) */
  throwError?: Error;
}

/**
 * A recorded spawn call
 */
export interface MockProcessCall {
  command: string;
  options: SpawnOptions;
  /** `command arg1 arg2 ...` */
  commandLine: string;
}

/**
 * Responses for one command line. An array is consumed one entry per call;
 * its last entry repeats once the rest are used up.
 */
type ScriptedResponse = MockProcessConfig | MockProcessConfig[];

/**
 * Mock implementation of ProcessRunner for testing
 */
export class MockProcessRunner implements ProcessRunner {
  private defaultConfig: MockProcessConfig;
  private commandConfigs: Map<string, ScriptedResponse> = new Map();
  private patternConfigs: Array<{ pattern: RegExp; response: ScriptedResponse }> = [];
  private callCounts: Map<string, number> = new Map();
  private callHistory: MockProcessCall[] = [];

  constructor(defaultConfig: MockProcessConfig = {}) {
    this.defaultConfig = {
      exitCode: 0,
      durationMs: 10,
      stdout: '',
      stderr: '',
      timedOut: false,
      ...defaultConfig,
    };
  }

  /**
   * Configure behavior for an exact command line (`docker info`, `jq --version`)
   */
  setCommandConfig(commandLine: string, response: ScriptedResponse): void {
    this.commandConfigs.set(commandLine, response);
  }

  /**
   * Configure behavior for command lines matching a pattern
   */
  setPatternConfig(pattern: RegExp, response: ScriptedResponse): void {
    this.patternConfigs.push({ pattern, response });
  }

  /**
   * Make a command behave as if it were not installed
   */
  setMissing(command: string): void {
    const error = Object.assign(new Error(`spawn ${command} ENOENT`), { code: 'ENOENT' });
    this.setPatternConfig(new RegExp(`^${escapeRegExp(command)}( |$)`), { throwError: error });
  }

  /**
   * Get the call history for verification in tests
   */
  getCallHistory(): MockProcessCall[] {
    return [...this.callHistory];
  }

  /**
   * Command lines that were spawned, in order
   */
  getCommandLines(): string[] {
    return this.callHistory.map((call) => call.commandLine);
  }

  /**
   * Reset all configurations and history
   */
  reset(): void {
    this.commandConfigs.clear();
    this.patternConfigs = [];
    this.callCounts.clear();
    this.callHistory = [];
  }

  async spawn(command: string, options: SpawnOptions): Promise<SpawnResult> {
    const commandLine = [command, ...options.args].join(' ');
    this.callHistory.push({ command, options, commandLine });

    const config = { ...this.defaultConfig, ...this.nextScripted(commandLine) };

    if (config.throwError) {
      throw config.throwError;
    }

    return {
      exitCode: config.exitCode ?? 0,
      durationMs: config.durationMs ?? 10,
      stdout: config.stdout ?? '',
      stderr: config.stderr ?? '',
      timedOut: config.timedOut ?? false,
      interrupted: false,
    };
  }

  private nextScripted(commandLine: string): MockProcessConfig | undefined {
    let key = commandLine;
    let response = this.commandConfigs.get(commandLine);

    if (response === undefined) {
      const match = this.patternConfigs.find((entry) => entry.pattern.test(commandLine));
      if (match) {
        key = `__pattern__${match.pattern.source}`;
        response = match.response;
      }
    }

    if (response === undefined) {
      return undefined;
    }
    if (!Array.isArray(response)) {
      return response;
    }

    const index = this.callCounts.get(key) ?? 0;
    this.callCounts.set(key, index + 1);
    return response[Math.min(index, response.length - 1)];
  }
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
