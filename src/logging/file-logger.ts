/**
 * File Logger implementation
 * Appends timestamped lines to the run log. Write failures never reach the
 * caller: the sink moves to its fallback file, then disables itself.
 */

import { appendFileSync } from 'fs';
import { Logger, LogMetadata, LogEvent, formatMetadata } from '../types/logger';
import { BaseLogger, BaseLoggerOptions } from './base-logger';

/**
 * Synchronous line appender (fs.appendFileSync in production)
 */
export type AppendLine = (path: string, text: string) => void;

/**
 * What happened to a line handed to the sink
 */
export type SinkWriteStatus = 'written' | 'fell_back' | 'disabled';

/**
 * Options for the log file sink
 */
export interface LogFileSinkOptions {
  /** Primary log file */
  path: string;
  /** File used once the primary path fails */
  fallbackPath?: string;
  /** Appender (default: fs.appendFileSync) */
  append?: AppendLine;
}

/**
 * Append-only log destination shared by a file logger and its children
 */
export class LogFileSink {
  private currentPath: string | null;
  private usingFallback = false;
  private lastError: string | null = null;
  private readonly fallbackPath?: string;
  private readonly append: AppendLine;

  constructor(options: LogFileSinkOptions) {
    this.currentPath = options.path;
    this.fallbackPath = options.fallbackPath;
    this.append = options.append ?? ((path, text) => appendFileSync(path, text, 'utf-8'));
  }

  /**
   * Append one line; newline is added here
   */
  write(line: string): SinkWriteStatus {
    let fellBack = false;

    while (this.currentPath !== null) {
      try {
        this.append(this.currentPath, line + '\n');
        return fellBack ? 'fell_back' : 'written';
      } catch (error) {
        this.lastError = error instanceof Error ? error.message : String(error);
        fellBack = this.degrade();
      }
    }

    return 'disabled';
  }

  /**
   * Current destination, or null once logging is disabled
   */
  getPath(): string | null {
    return this.currentPath;
  }

  isUsingFallback(): boolean {
    return this.usingFallback;
  }

  isDisabled(): boolean {
    return this.currentPath === null;
  }

  /**
   * Message of the last append failure
   */
  getLastError(): string | null {
    return this.lastError;
  }

  private degrade(): boolean {
    const failedPath = this.currentPath;
    if (!this.usingFallback && this.fallbackPath && this.fallbackPath !== failedPath) {
      this.currentPath = this.fallbackPath;
      this.usingFallback = true;
      return true;
    }
    this.currentPath = null;
    return false;
  }
}

/**
 * File-based logger implementation
 */
export class FileLogger extends BaseLogger {
  private readonly options: BaseLoggerOptions;
  private readonly sink: LogFileSink;

  constructor(
    sink: LogFileSink,
    options: BaseLoggerOptions = {},
    context: Partial<LogMetadata> = {},
    events: LogEvent[] = []
  ) {
    super(options, 'info', context, events);
    this.sink = sink;
    this.options = options;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    return new FileLogger(this.sink, this.options, this.mergedContext(additionalContext), this.events);
  }

  protected write(event: LogEvent): void {
    const failedPath = this.sink.getPath();
    const status = this.sink.write(formatLogLine(event));

    if (status === 'fell_back') {
      this.sink.write(
        formatLogLine({
          timestamp: event.timestamp,
          level: 'warn',
          eventType: 'log_fallback',
          message: `Log file ${failedPath} is not writable (${this.sink.getLastError()}); logging to ${this.sink.getPath()}`,
          metadata: {},
        })
      );
    }
  }
}

/**
 * Render an event as a log file line
 */
export function formatLogLine(event: LogEvent): string {
  const meta = formatMetadata(event.metadata);
  const line = `${event.timestamp} [${event.level.toUpperCase()}] ${event.message}`;
  return meta ? `${line} ${meta}` : line;
}
