/**
 * Logging module - structured logging implementations
 */

export type { BaseLoggerOptions } from './base-logger';
export { BaseLogger } from './base-logger';
export { ConsoleLogger } from './console-logger';
export type { ConsoleLoggerOptions } from './console-logger';
export { BufferLogger } from './buffer-logger';
export { CompositeLogger } from './composite-logger';

// Log file
export type { AppendLine, SinkWriteStatus, LogFileSinkOptions } from './file-logger';
export { LogFileSink, FileLogger, formatLogLine } from './file-logger';
export type { PreparedLogFile, RunLogTarget } from './log-file';
export { prepareLogFile, openRunLog } from './log-file';
export type { RunLoggerOptions } from './run-log';
export { createRunLogger } from './run-log';

// Run summary
export {
  RunSummaryBuilder,
  getSummaryTotal,
  isNothingEligible,
  formatRunSummary,
} from './run-summary';
