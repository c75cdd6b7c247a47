/**
 * Spinner Service
 * Spinner management with TTY awareness. Boot-time runs (systemd journal,
 * wsl.conf boot command) have no TTY and get plain symbol lines instead.
 */

import ora, { Ora } from 'ora';

/**
 * Options for creating a spinner
 */
export interface SpinnerOptions {
  /** Text to display with the spinner */
  text: string;
  /** Color for the spinner */
  color?: 'black' | 'red' | 'green' | 'yellow' | 'blue' | 'magenta' | 'cyan' | 'white' | 'gray';
  /** Symbol to use when not spinning */
  prefixSymbol?: string;
}

/**
 * Spinner instance interface
 */
export interface Spinner {
  /** Start the spinner */
  start(): void;
  /** Stop with success */
  succeed(text?: string): void;
  /** Stop with failure */
  fail(text?: string): void;
  /** Stop with warning */
  warn(text?: string): void;
  /** Stop with info */
  info(text?: string): void;
  /** Update the spinner text */
  setText(text: string): void;
  /** Stop the spinner without status */
  stop(): void;
  /** Whether the spinner is spinning */
  readonly isSpinning: boolean;
}

/**
 * Spinner service configuration
 */
export interface SpinnerServiceConfig {
  /** Whether TTY output is available */
  isTTY: boolean;
  /** Output stream for the spinner */
  stream: NodeJS.WritableStream;
}

/**
 * A simple text-based spinner for non-TTY environments
 */
export class TextSpinner implements Spinner {
  private spinning = false;
  private text: string;
  private readonly stream: NodeJS.WritableStream;
  private readonly prefixSymbol: string;

  constructor(
    text: string,
    stream: NodeJS.WritableStream = process.stdout,
    prefixSymbol: string = '>'
  ) {
    this.text = text;
    this.stream = stream;
    this.prefixSymbol = prefixSymbol;
  }

  start(): void {
    this.spinning = true;
    this.stream.write(`${this.prefixSymbol} ${this.text}\n`);
  }

  succeed(text?: string): void {
    this.persist('✅', text);
  }

  fail(text?: string): void {
    this.persist('❌', text);
  }

  warn(text?: string): void {
    this.persist('⚠️ ', text);
  }

  info(text?: string): void {
    this.persist('ℹ️ ', text);
  }

  setText(text: string): void {
    this.text = text;
    // Every update becomes its own line; that is what ends up in the journal
    if (this.spinning) {
      this.stream.write(`${this.prefixSymbol} ${text}\n`);
    }
  }

  stop(): void {
    this.spinning = false;
  }

  get isSpinning(): boolean {
    return this.spinning;
  }

  private persist(symbol: string, text?: string): void {
    this.spinning = false;
    this.stream.write(`${symbol} ${text ?? this.text}\n`);
  }
}

/**
 * A wrapper around ora spinner
 */
class OraSpinner implements Spinner {
  private readonly oraInstance: Ora;

  constructor(text: string, color?: SpinnerOptions['color'], stream?: NodeJS.WritableStream) {
    this.oraInstance = ora({
      text,
      color,
      stream,
    });
  }

  start(): void {
    this.oraInstance.start();
  }

  succeed(text?: string): void {
    this.oraInstance.succeed(text);
  }

  fail(text?: string): void {
    this.oraInstance.fail(text);
  }

  warn(text?: string): void {
    this.oraInstance.warn(text);
  }

  info(text?: string): void {
    this.oraInstance.info(text);
  }

  setText(text: string): void {
    this.oraInstance.text = text;
  }

  stop(): void {
    this.oraInstance.stop();
  }

  get isSpinning(): boolean {
    return this.oraInstance.isSpinning;
  }
}

/**
 * Centralized service for managing spinners
 */
export class SpinnerService {
  private readonly config: SpinnerServiceConfig;
  private activeSpinner: Spinner | null = null;

  constructor(config: Partial<SpinnerServiceConfig> = {}) {
    const stream = config.stream ?? process.stdout;
    this.config = {
      isTTY: config.isTTY ?? ('isTTY' in stream && stream.isTTY === true),
      stream,
    };
  }

  /**
   * Create a new spinner instance, stopping any spinner still running
   */
  create(options: SpinnerOptions): Spinner {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }

    const spinner: Spinner = this.config.isTTY
      ? new OraSpinner(options.text, options.color, this.config.stream)
      : new TextSpinner(options.text, this.config.stream, options.prefixSymbol ?? '>');

    this.activeSpinner = spinner;
    return spinner;
  }

  /**
   * Create and start a spinner
   */
  start(text: string, color?: SpinnerOptions['color']): Spinner {
    const spinner = this.create({ text, color });
    spinner.start();
    return spinner;
  }

  /**
   * Stop any active spinner
   */
  stopAll(): void {
    if (this.activeSpinner?.isSpinning) {
      this.activeSpinner.stop();
    }
    this.activeSpinner = null;
  }

  /**
   * The stream spinners write to
   */
  getStream(): NodeJS.WritableStream {
    return this.config.stream;
  }
}
