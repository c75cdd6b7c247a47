/**
 * Console notifier
 * Renders gate progress and per-container outcomes through the spinner service
 */

import { Notifier } from '../types/notifier';
import { Spinner, SpinnerService } from './spinner-service';

export class ConsoleNotifier implements Notifier {
  private readonly spinners: SpinnerService;
  private active: Spinner | null = null;

  constructor(spinners: SpinnerService) {
    this.spinners = spinners;
  }

  heading(title: string): void {
    this.stop();
    this.spinners.getStream().write(`\n=== ${title} ===\n`);
  }

  progress(message: string): void {
    if (this.active?.isSpinning) {
      this.active.setText(message);
      return;
    }
    this.active = this.spinners.start(message, 'cyan');
  }

  success(message: string): void {
    this.finish(message).succeed(message);
  }

  info(message: string): void {
    this.finish(message).info(message);
  }

  warn(message: string): void {
    this.finish(message).warn(message);
  }

  error(message: string): void {
    this.finish(message).fail(message);
  }

  stop(): void {
    this.active?.stop();
    this.active = null;
    this.spinners.stopAll();
  }

  /**
   * The spinner that carries a final status line: the running one, or a fresh one
   */
  private finish(message: string): Spinner {
    const spinner = this.active ?? this.spinners.create({ text: message });
    this.active = null;
    return spinner;
  }
}

/**
 * Create a notifier writing to the given stream (stdout by default)
 */
export function createConsoleNotifier(stream?: NodeJS.WritableStream): Notifier {
  return new ConsoleNotifier(new SpinnerService({ stream }));
}
