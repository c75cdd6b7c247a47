#!/usr/bin/env node

import { parseArgs, getUsageText } from './cli';
import { ParsedArgs } from './cli/types';
import { VERSION } from './version';
import { ExitCode, describeFatalReason } from './types/exit-codes';
import { Logger } from './types/logger';
import { Notifier } from './types/notifier';
import { SystemClock } from './types/clock';
import { CliFlags, resolveConfigPath, loadConfigFile, resolveRunConfig, formatRunConfigForDisplay } from './config';
import { RunConfig } from './types/run-config';
import { createRealFileSystem } from './io/real-file-system';
import { createRealProcessRunner } from './process/real-process-runner';
import { createDockerCliRuntime } from './docker/docker-cli-runtime';
import { openRunLog } from './logging/log-file';
import { createRunLogger } from './logging/run-log';
import { ConsoleLogger } from './logging/console-logger';
import { CompositeLogger } from './logging/composite-logger';
import { createConsoleNotifier } from './ui/console-notifier';
import { runDockstart } from './commands/run';
import { installDockstart } from './commands/install';

// Library surface
export { runDockstart } from './commands/run';
export type { RunDependencies, RunResult } from './commands/run';
export { installDockstart } from './commands/install';
export { AvailabilityGate, createReadinessGroups } from './gate';
export { RestartEngine, decideRestart } from './restart';
export { DockerCliRuntime } from './docker';
export { Installer } from './install';
export { resolveRunConfig, loadConfigFile } from './config';

function toCliFlags(args: ParsedArgs): CliFlags {
  const orUndefined = <T>(value: T | null): T | undefined => (value === null ? undefined : value);
  return {
    retry: orUndefined(args.retry),
    retryIntervalSeconds: orUndefined(args.retryIntervalSeconds),
    maxWaitSeconds: orUndefined(args.maxWaitSeconds),
    force: orUndefined(args.force),
    logFile: orUndefined(args.logFile),
    logSizeBytes: orUndefined(args.logSizeBytes),
    log: orUndefined(args.log),
    verbose: orUndefined(args.verbose),
  };
}

async function openLogger(config: RunConfig): Promise<Logger> {
  const target = await openRunLog(createRealFileSystem(), config.logging);
  return createRunLogger(config, target);
}

/**
 * The flags could not be parsed, so the log goes wherever the config file
 * (or the defaults) point it
 */
async function reportUsageError(error: string): Promise<ExitCode> {
  console.error(error);
  console.error('Run dockstart --help for usage');

  const loaded = loadConfigFile(resolveConfigPath(null));
  const logger = await openLogger(resolveRunConfig({}, loaded.ok ? loaded.value : null));
  logger.event('run_failed', describeFatalReason('usage'), { reason: 'usage', error });
  return ExitCode.FAILURE;
}

async function run(args: ParsedArgs, notifier: Notifier): Promise<ExitCode> {
  const flags = toCliFlags(args);
  const loaded = loadConfigFile(resolveConfigPath(args.configPath));

  if (!loaded.ok) {
    notifier.error(`${loaded.error.message} (${loaded.error.path})`);
    // Log with what the command line alone gives us
    const logger = await openLogger(resolveRunConfig(flags, null));
    logger.event('run_failed', describeFatalReason('config'), {
      reason: 'config',
      path: loaded.error.path,
      error: loaded.error.message,
    });
    return ExitCode.FAILURE;
  }

  const config = resolveRunConfig(flags, loaded.value);
  const logger = await openLogger(config);
  if (config.verbose) {
    console.error(formatRunConfigForDisplay(config));
  }

  const runner = createRealProcessRunner();
  const result = await runDockstart(config, {
    runner,
    runtime: createDockerCliRuntime(runner, config.commands, logger),
    clock: new SystemClock(),
    notifier,
    logger,
  });
  return result.exitCode;
}

/**
 * CLI entry point; resolves to the process exit code
 */
export async function main(argv: string[] = process.argv): Promise<ExitCode> {
  const parsed = parseArgs(argv);
  if (!parsed.success || !parsed.args) {
    return reportUsageError(parsed.error ?? 'Error: Invalid arguments');
  }

  const args = parsed.args;
  if (args.help) {
    console.log(getUsageText());
    return ExitCode.SUCCESS;
  }
  if (args.version) {
    console.log(VERSION);
    return ExitCode.SUCCESS;
  }

  const notifier = createConsoleNotifier();
  try {
    if (args.command === 'install') {
      const logger = args.verbose ? new ConsoleLogger() : new CompositeLogger([]);
      return await installDockstart({ binPath: args.binPath, assumeYes: args.yes }, notifier, logger);
    }
    return await run(args, notifier);
  } catch (error) {
    notifier.error(`${describeFatalReason('unexpected')}: ${error instanceof Error ? error.message : String(error)}`);
    return ExitCode.FAILURE;
  } finally {
    notifier.stop();
  }
}

if (require.main === module) {
  main().then(
    (code) => {
      process.exitCode = code;
    },
    (error: unknown) => {
      console.error('Error:', error instanceof Error ? error.message : String(error));
      process.exitCode = ExitCode.FAILURE;
    }
  );
}
