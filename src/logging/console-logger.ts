/**
 * Console Logger implementation
 * Mirrors log events on stderr when --verbose is set
 */

import { Logger, LogLevel, LogMetadata, LogEvent, formatMetadata } from '../types/logger';
import { BaseLogger, BaseLoggerOptions } from './base-logger';

/**
 * Options for the console logger
 */
export interface ConsoleLoggerOptions extends BaseLoggerOptions {
  /** Whether to include timestamps in console output */
  includeTimestamp?: boolean;
  /** Output stream (default: process.stderr) */
  stream?: NodeJS.WritableStream;
}

/**
 * Console-based logger implementation
 */
export class ConsoleLogger extends BaseLogger {
  private readonly options: ConsoleLoggerOptions;
  private readonly stream: NodeJS.WritableStream;

  constructor(
    options: ConsoleLoggerOptions = {},
    context: Partial<LogMetadata> = {},
    events: LogEvent[] = []
  ) {
    super(options, 'debug', context, events);
    this.options = { includeTimestamp: true, ...options };
    this.stream = options.stream ?? process.stderr;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    return new ConsoleLogger(this.options, this.mergedContext(additionalContext), this.events);
  }

  protected write(event: LogEvent): void {
    const parts: string[] = [];

    if (this.options.includeTimestamp) {
      // HH:MM:SS from the ISO timestamp
      parts.push(`[${event.timestamp.slice(11, 19)}]`);
    }

    parts.push(this.getLevelIndicator(event.level));

    // Event type (if not a basic level)
    if (!['debug', 'info', 'warn', 'error'].includes(event.eventType)) {
      parts.push(`(${event.eventType})`);
    }

    parts.push(event.message);

    const meta = formatMetadata(event.metadata);
    if (meta) {
      parts.push(meta);
    }

    this.stream.write(parts.join(' ') + '\n');
  }

  private getLevelIndicator(level: LogLevel): string {
    switch (level) {
      case 'debug':
        return '🔍';
      case 'info':
        return 'ℹ️';
      case 'warn':
        return '⚠️';
      case 'error':
        return '❌';
    }
  }
}
