/**
 * Run logger assembly
 * Builds the logger for a run from the resolved config and the log target
 */

import { Logger } from '../types/logger';
import { Clock } from '../types/clock';
import { RunConfig } from '../types/run-config';
import { RunLogTarget } from './log-file';
import { AppendLine, FileLogger, LogFileSink } from './file-logger';
import { ConsoleLogger } from './console-logger';
import { CompositeLogger } from './composite-logger';

/**
 * Injection points for createRunLogger
 */
export interface RunLoggerOptions {
  clock?: Clock;
  /** Appender for the log file (tests) */
  append?: AppendLine;
  /** Stream for verbose console output */
  consoleStream?: NodeJS.WritableStream;
}

/**
 * Create the logger for a run and record any log housekeeping that happened
 * while the target was prepared
 */
export function createRunLogger(
  config: RunConfig,
  target: RunLogTarget,
  options: RunLoggerOptions = {}
): Logger {
  const delegates: Logger[] = [];

  if (target.status === 'ready') {
    const sink = new LogFileSink({
      path: target.path,
      // Already on the fallback file: nowhere left to go
      fallbackPath: target.usedFallback ? undefined : config.logging.fallbackFile,
      append: options.append,
    });
    delegates.push(new FileLogger(sink, { clock: options.clock }));
  }

  if (config.verbose) {
    delegates.push(new ConsoleLogger({ clock: options.clock, stream: options.consoleStream }));
  }

  const logger = new CompositeLogger(delegates, { clock: options.clock });

  if (target.status === 'ready') {
    if (target.usedFallback) {
      logger.event(
        'log_fallback',
        `Log file ${config.logging.file} is not writable (${target.primaryError?.message ?? 'unknown error'}); logging to ${target.path}`
      );
    }
    if (target.truncated) {
      logger.event(
        'log_truncated',
        `Log file exceeded ${config.logging.maxSizeBytes} bytes (was ${target.previousSize}); truncated`
      );
    }
  } else if (target.status === 'unavailable') {
    logger.debug(
      `Log file disabled: ${target.errors.map((e) => e.message).join('; ')}`
    );
  }

  return logger;
}
