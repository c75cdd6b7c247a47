/**
 * Composite Logger
 * Fans every event out to several loggers (log file + verbose console)
 */

import { Logger, LogMetadata, LogEvent } from '../types/logger';
import { BaseLogger, BaseLoggerOptions } from './base-logger';

export class CompositeLogger extends BaseLogger {
  private readonly delegates: Logger[];
  private readonly options: BaseLoggerOptions;

  /**
   * Level filtering is left to the delegates, so the composite accepts everything
   */
  constructor(
    delegates: Logger[],
    options: Omit<BaseLoggerOptions, 'minLevel'> = {},
    context: Partial<LogMetadata> = {},
    events: LogEvent[] = []
  ) {
    super({ ...options, minLevel: 'debug' }, 'debug', context, events);
    this.delegates = delegates;
    this.options = options;
  }

  child(additionalContext: Partial<LogMetadata>): Logger {
    return new CompositeLogger(
      this.delegates.map((delegate) => delegate.child(additionalContext)),
      this.options,
      this.mergedContext(additionalContext),
      this.events
    );
  }

  protected write(event: LogEvent): void {
    for (const delegate of this.delegates) {
      delegate.event(event.eventType, event.message, event.metadata);
    }
  }
}
