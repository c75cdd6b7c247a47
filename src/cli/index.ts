/**
 * CLI Module
 *
 * Exports for the CLI argument parsing module
 */

export { parseArgs } from './arg-parser';
export { getUsageText } from './help';
export type { ParsedArgs, ParseResult, CommandName } from './types';
export { DEFAULT_ARGS } from './types';
