/**
 * Buffer Logger implementation
 * For testing - stores events in memory without output
 */

import { Logger, LogLevel, LogEventType, LogMetadata, LogEvent } from '../types/logger';
import { BaseLogger, BaseLoggerOptions } from './base-logger';

/**
 * Buffer-based logger for testing
 * Stores all events in memory; child loggers write into the same buffer
 */
export class BufferLogger extends BaseLogger {
  private readonly options: BaseLoggerOptions;

  constructor(
    options: BaseLoggerOptions = {},
    context: Partial<LogMetadata> = {},
    events: LogEvent[] = []
  ) {
    // Capture all by default for testing
    super(options, 'debug', context, events);
    this.options = options;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    return new BufferLogger(this.options, this.mergedContext(additionalContext), this.events);
  }

  /**
   * Get events filtered by level
   */
  getEventsByLevel(level: LogLevel): LogEvent[] {
    return this.events.filter((e) => e.level === level);
  }

  /**
   * Get events filtered by event type
   */
  getEventsByType(eventType: LogEventType): LogEvent[] {
    return this.events.filter((e) => e.eventType === eventType);
  }

  /**
   * Check if any events with the given type exist
   */
  hasEventType(eventType: LogEventType): boolean {
    return this.events.some((e) => e.eventType === eventType);
  }

  /**
   * Get the last event
   */
  getLastEvent(): LogEvent | undefined {
    return this.events[this.events.length - 1];
  }

  protected write(): void {
    // Events are kept in the shared buffer only
  }
}
