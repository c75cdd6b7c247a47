/**
 * UI module - live console output and prompts
 */

export type { SpinnerServiceConfig, SpinnerOptions, Spinner } from './spinner-service';
export { SpinnerService, TextSpinner } from './spinner-service';

export { ConsoleNotifier, createConsoleNotifier } from './console-notifier';
export { BufferNotifier } from './buffer-notifier';

export type { InquirerPrompterConfig } from './inquirer-prompter';
export { InquirerPrompter, createInquirerPrompter } from './inquirer-prompter';
