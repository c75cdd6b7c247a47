/**
 * Notifier interface
 * Live, human-readable output for the person (or journal) watching a run.
 * Durable records go through the Logger instead.
 */

/**
 * Kinds of notification lines
 */
export type NotificationKind = 'heading' | 'progress' | 'success' | 'info' | 'warn' | 'error';

/**
 * A single notification, as recorded by test doubles
 */
export interface Notification {
  kind: NotificationKind;
  message: string;
}

/**
 * Sink for live progress/outcome/summary lines
 */
export interface Notifier {
  /** Section heading */
  heading(title: string): void;
  /** Ongoing activity; replaces the previous progress line where the terminal allows */
  progress(message: string): void;
  success(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Stop any in-flight progress indicator */
  stop(): void;
}
