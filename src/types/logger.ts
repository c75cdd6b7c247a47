/**
 * Logger interface
 * Structured logging with event types and metadata
 */

/**
 * Log levels
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/**
 * Structured event types for a dockstart run
 */
export type LogEventType =
  // Run lifecycle
  | 'run_started'
  | 'run_completed'
  | 'run_failed'
  // Availability gate
  | 'gate_check_passed'
  | 'gate_retry'
  | 'gate_group_ready'
  | 'gate_timeout'
  | 'gate_unavailable'
  // Container processing
  | 'containers_listed'
  | 'container_started'
  | 'container_already_running'
  | 'container_skipped'
  | 'container_start_failed'
  | 'no_eligible_containers'
  // Log file housekeeping
  | 'log_truncated'
  | 'log_fallback'
  // Installer
  | 'install_step'
  | 'install_manual_action'
  // General
  | 'debug'
  | 'info'
  | 'warn'
  | 'error';

/**
 * Metadata attached to log events
 */
export interface LogMetadata {
  /** Readiness group being awaited */
  group?: string;
  /** Container the event is about */
  container?: string;
  /** Gate retry counter */
  retryCount?: number;
  /** Additional context-specific metadata */
  [key: string]: unknown;
}

/**
 * A structured log event
 */
export interface LogEvent {
  /** Timestamp of the event (ISO 8601) */
  timestamp: string;
  /** Log level */
  level: LogLevel;
  /** Event type for structured queries */
  eventType: LogEventType;
  /** Human-readable message */
  message: string;
  /** Structured metadata */
  metadata: LogMetadata;
}

/**
 * Options for configuring a logger
 */
export interface LoggerOptions {
  /** Minimum log level to emit */
  minLevel?: LogLevel;
}

/**
 * Interface for structured logging
 * Implementations can write to a file, the console, or a buffer (for testing)
 */
export interface Logger {
  debug(message: string, metadata?: LogMetadata): void;

  info(message: string, metadata?: LogMetadata): void;

  warn(message: string, metadata?: LogMetadata): void;

  error(message: string, metadata?: LogMetadata): void;

  /**
   * Log a structured event; the level is derived from the event type
   */
  event(eventType: LogEventType, message: string, metadata?: LogMetadata): void;

  /**
   * Get all events emitted through this logger
   */
  getEvents(): LogEvent[];

  /**
   * Create a child logger whose events carry additional context
   */
  child(additionalContext: Partial<LogMetadata>): Logger;
}

/**
 * Compare log levels (returns positive if a > b)
 */
export function compareLogLevels(a: LogLevel, b: LogLevel): number {
  const order: Record<LogLevel, number> = {
    debug: 0,
    info: 1,
    warn: 2,
    error: 3,
  };
  return order[a] - order[b];
}

/**
 * Check if a log level should be emitted given a minimum level
 */
export function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return compareLogLevels(level, minLevel) >= 0;
}

/**
 * Map an event type to the level it is logged at
 */
export function getEventLevel(eventType: LogEventType): LogLevel {
  switch (eventType) {
    case 'error':
    case 'run_failed':
    case 'gate_timeout':
    case 'gate_unavailable':
    case 'container_start_failed':
      return 'error';
    case 'warn':
    case 'log_fallback':
    case 'install_manual_action':
      return 'warn';
    case 'debug':
      return 'debug';
    default:
      return 'info';
  }
}

/**
 * Render metadata as `{key=value, ...}`, skipping undefined values
 */
export function formatMetadata(metadata: LogMetadata): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(metadata)) {
    if (value === undefined) continue;
    parts.push(`${key}=${typeof value === 'string' ? value : JSON.stringify(value)}`);
  }
  return parts.length > 0 ? `{${parts.join(', ')}}` : '';
}
