/**
 * Types module - shared interfaces and types
 * This module provides all injectable interfaces for testability
 */

// Result type for typed error handling
export type { Ok, Err, Result } from './result';
export { ok, err } from './result';

// Exit codes
export type { FatalReason } from './exit-codes';
export { ExitCode, describeFatalReason } from './exit-codes';

// Process runner interface
export type { ProcessRunner, SpawnOptions, SpawnResult } from './process-runner';
export { isSpawnSuccess, describeSpawnFailure } from './process-runner';

// File system interface
export type {
  FileSystem,
  FileStats,
  WriteOptions,
  FileSystemError,
  FileSystemErrorCode,
} from './file-system';
export { createFileSystemError, getErrnoCode, toFileSystemError } from './file-system';

// Prompter interface
export type { Prompter, ConfirmOptions, PrompterError, PrompterErrorCode } from './prompter';
export { createPrompterError } from './prompter';

// Clock interface
export type { Clock, MockClockOptions } from './clock';
export { SystemClock, MockClock } from './clock';

// Logger interface
export type { Logger, LogLevel, LogEventType, LogMetadata, LogEvent, LoggerOptions } from './logger';
export { compareLogLevels, shouldLog, getEventLevel, formatMetadata } from './logger';

// Notifier interface
export type { Notifier, Notification, NotificationKind } from './notifier';

// Containers and outcomes
export type {
  RestartPolicy,
  ContainerRecord,
  OutcomeKind,
  OutcomeReason,
  ContainerOutcome,
  RunSummary,
} from './container';
export { classifyRestartPolicy } from './container';

// Run configuration
export type { RunConfig, RetryConfig, LoggingConfig, RuntimeCommands, ConfigSource } from './run-config';
export { DEFAULT_RUN_CONFIG, DEFAULT_LOG_FILE, DEFAULT_CONFIG_FILE } from './run-config';
