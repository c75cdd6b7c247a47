/**
 * Buffer notifier
 * Records notifications in memory for assertions
 */

import { Notification, NotificationKind, Notifier } from '../types/notifier';

export class BufferNotifier implements Notifier {
  private readonly notifications: Notification[] = [];

  heading(title: string): void {
    this.record('heading', title);
  }

  progress(message: string): void {
    this.record('progress', message);
  }

  success(message: string): void {
    this.record('success', message);
  }

  info(message: string): void {
    this.record('info', message);
  }

  warn(message: string): void {
    this.record('warn', message);
  }

  error(message: string): void {
    this.record('error', message);
  }

  stop(): void {
    // nothing in flight
  }

  getNotifications(): Notification[] {
    return [...this.notifications];
  }

  getMessages(kind?: NotificationKind): string[] {
    return this.notifications
      .filter((n) => kind === undefined || n.kind === kind)
      .map((n) => n.message);
  }

  clear(): void {
    this.notifications.length = 0;
  }

  private record(kind: NotificationKind, message: string): void {
    this.notifications.push({ kind, message });
  }
}
