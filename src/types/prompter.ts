/**
 * Prompter interface
 * Abstracts user prompts for testability and non-interactive mode support
 */

import { Result } from './result';

/**
 * Options for a confirmation prompt
 */
export interface ConfirmOptions {
  /** The question to ask */
  message: string;
  /** Default value if user just presses enter */
  default?: boolean;
}

/**
 * Error types for prompter operations
 */
export type PrompterErrorCode = 'CANCELLED' | 'NON_INTERACTIVE' | 'IO_ERROR';

/**
 * Prompter operation error
 */
export interface PrompterError {
  code: PrompterErrorCode;
  message: string;
  cause?: Error;
}

/**
 * Interface for user prompts
 * Implementations can be real (inquirer) or scripted (for testing)
 */
export interface Prompter {
  /**
   * Ask for confirmation (yes/no)
   */
  confirm(options: ConfirmOptions): Promise<Result<boolean, PrompterError>>;

  /**
   * Check if prompts are available (TTY and interactive mode)
   */
  isInteractive(): boolean;
}

/**
 * Create a PrompterError
 */
export function createPrompterError(
  code: PrompterErrorCode,
  message?: string,
  cause?: Error
): PrompterError {
  const defaultMessages: Record<PrompterErrorCode, string> = {
    CANCELLED: 'User cancelled the prompt',
    NON_INTERACTIVE: 'Cannot prompt in non-interactive mode',
    IO_ERROR: 'IO error during prompt',
  };

  return {
    code,
    message: message ?? defaultMessages[code],
    cause,
  };
}
