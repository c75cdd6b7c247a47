/**
 * Inquirer-based Prompter Implementation
 * The installer's only question is whether to start the unit right away
 */

import inquirer from 'inquirer';
import { Prompter, ConfirmOptions, PrompterError, createPrompterError } from '../types/prompter';
import { Result, ok, err } from '../types/result';

/**
 * Configuration for the inquirer prompter
 */
export interface InquirerPrompterConfig {
  /** Whether running in interactive mode */
  interactive: boolean;
  /** Answer used for every confirmation when not interactive (--yes) */
  defaults?: {
    confirm?: boolean;
  };
}

/**
 * Inquirer-based implementation of the Prompter interface
 */
export class InquirerPrompter implements Prompter {
  private readonly config: InquirerPrompterConfig;

  constructor(config: Partial<InquirerPrompterConfig> = {}) {
    this.config = {
      interactive: config.interactive ?? true,
      defaults: config.defaults,
    };
  }

  isInteractive(): boolean {
    return this.config.interactive && (process.stdin.isTTY ?? false) && (process.stdout.isTTY ?? false);
  }

  async confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>> {
    if (!this.isInteractive()) {
      if (this.config.defaults?.confirm !== undefined) {
        return ok(this.config.defaults.confirm);
      }
      if (options.default !== undefined) {
        return ok(options.default);
      }
      return err(
        createPrompterError('NON_INTERACTIVE', 'Cannot prompt for confirmation in non-interactive mode')
      );
    }

    try {
      const response = await inquirer.prompt<{ value: boolean }>([
        {
          type: 'confirm',
          name: 'value',
          message: options.message,
          default: options.default ?? true,
        },
      ]);
      return ok(response.value);
    } catch (error) {
      if (this.isCancelledError(error)) {
        return err(createPrompterError('CANCELLED', 'User cancelled the prompt'));
      }
      return err(
        createPrompterError(
          'IO_ERROR',
          `confirm failed: ${error instanceof Error ? error.message : String(error)}`,
          error instanceof Error ? error : undefined
        )
      );
    }
  }

  private isCancelledError(error: unknown): boolean {
    // Ctrl+C
    if (error instanceof Error) {
      return error.message.includes('User force closed') || error.name === 'ExitPromptError';
    }
    return false;
  }
}

/**
 * Create an inquirer-based prompter. With assumeYes every confirmation is
 * answered yes without asking.
 */
export function createInquirerPrompter(options: { assumeYes?: boolean } = {}): Prompter {
  if (options.assumeYes) {
    return new InquirerPrompter({ interactive: false, defaults: { confirm: true } });
  }
  return new InquirerPrompter();
}
