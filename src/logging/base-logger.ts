/**
 * Base logger
 * Level filtering, context merging and event bookkeeping shared by the
 * concrete loggers; subclasses only decide where an event goes.
 */

import {
  Logger,
  LogLevel,
  LogEventType,
  LogMetadata,
  LogEvent,
  LoggerOptions,
  shouldLog,
  getEventLevel,
} from '../types/logger';
import { Clock, SystemClock } from '../types/clock';

/**
 * Options shared by every logger built on BaseLogger
 */
export interface BaseLoggerOptions extends LoggerOptions {
  /** Clock used for event timestamps */
  clock?: Clock;
}

export abstract class BaseLogger implements Logger {
  protected readonly minLevel: LogLevel;
  protected readonly clock: Clock;
  protected readonly context: Partial<LogMetadata>;
  /** Shared with child loggers */
  protected readonly events: LogEvent[];

  protected constructor(
    options: BaseLoggerOptions,
    defaultLevel: LogLevel,
    context: Partial<LogMetadata> = {},
    events: LogEvent[] = []
  ) {
    this.minLevel = options.minLevel ?? defaultLevel;
    this.clock = options.clock ?? new SystemClock();
    this.context = context;
    this.events = events;
  }

  debug(message: string, metadata?: LogMetadata): void {
    this.log('debug', 'debug', message, metadata);
  }

  info(message: string, metadata?: LogMetadata): void {
    this.log('info', 'info', message, metadata);
  }

  warn(message: string, metadata?: LogMetadata): void {
    this.log('warn', 'warn', message, metadata);
  }

  error(message: string, metadata?: LogMetadata): void {
    this.log('error', 'error', message, metadata);
  }

  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void {
    this.log(getEventLevel(eventType), eventType, message, metadata);
  }

  getEvents(): LogEvent[] {
    return [...this.events];
  }

  abstract child(additionalContext: Partial<LogMetadata>): Logger;

  /**
   * Deliver an event that passed level filtering
   */
  protected abstract write(event: LogEvent): void;

  /**
   * Context for a child logger
   */
  protected mergedContext(additionalContext: Partial<LogMetadata>): Partial<LogMetadata> {
    return { ...this.context, ...additionalContext };
  }

  private log(
    level: LogLevel,
    eventType: LogEventType,
    message: string,
    metadata?: LogMetadata
  ): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const event: LogEvent = {
      timestamp: this.clock.iso(),
      level,
      eventType,
      message,
      metadata: { ...this.context, ...metadata },
    };

    this.events.push(event);
    this.write(event);
  }
}
