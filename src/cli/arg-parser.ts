/**
 * CLI Argument Parser
 *
 * Parses command line arguments into structured ParsedArgs
 */

import { ParsedArgs, ParseResult, DEFAULT_ARGS, CommandName } from './types';
import { parseSize } from '../config/parse-size';

const COMMANDS: CommandName[] = ['run', 'install'];

/** Options that take no value */
const SWITCHES = ['--help', '-h', '--version', '-v', '--retry', '--force', '--no-log', '--verbose', '--yes', '-y'];

type ArgValue = { ok: true; value: string; skip: number } | { ok: false; error: string };

function isCommandName(value: string): value is CommandName {
  return COMMANDS.some((command) => command === value);
}

/**
 * Parse a positive integer from a string
 */
function parsePositiveInt(value: string, name: string): { value?: number; error?: string } {
  if (!/^\d+$/.test(value)) {
    return { error: `${name} must be a positive integer` };
  }
  const parsed = parseInt(value, 10);
  if (parsed < 1) {
    return { error: `${name} must be a positive integer` };
  }
  return { value: parsed };
}

/**
 * Get the value for an argument, handling both --arg value and --arg=value formats
 */
function getArgValue(args: string[], index: number, argName: string): ArgValue {
  const arg = args[index];

  // Check for --arg=value format
  const equals = arg.indexOf('=');
  if (equals !== -1) {
    const value = arg.slice(equals + 1);
    if (!value) {
      return { ok: false, error: `${argName}= requires a value` };
    }
    return { ok: true, value, skip: 0 };
  }

  // Check for --arg value format
  const nextArg = args[index + 1];
  if (nextArg === undefined || nextArg.startsWith('-')) {
    return { ok: false, error: `${argName} requires a value` };
  }
  return { ok: true, value: nextArg, skip: 1 };
}

/**
 * Parse command line arguments
 */
export function parseArgs(argv: string[]): ParseResult {
  const args = argv.slice(2); // Remove node and script path
  const result: ParsedArgs = { ...DEFAULT_ARGS };
  let commandSeen = false;
  const installOnly: string[] = [];
  const runOnly: string[] = [];

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const argBase = arg.split('=')[0]; // Get the base argument name

    if (argBase !== arg && SWITCHES.includes(argBase)) {
      return { success: false, error: `Error: ${argBase} does not take a value` };
    }

    switch (argBase) {
      case '--help':
      case '-h': {
        result.help = true;
        break;
      }

      case '--version':
      case '-v': {
        result.version = true;
        break;
      }

      case '--retry': {
        result.retry = true;
        runOnly.push(argBase);
        break;
      }

      case '--force': {
        result.force = true;
        runOnly.push(argBase);
        break;
      }

      case '--no-log': {
        result.log = false;
        runOnly.push(argBase);
        break;
      }

      case '--verbose': {
        result.verbose = true;
        break;
      }

      case '--yes':
      case '-y': {
        result.yes = true;
        installOnly.push(argBase);
        break;
      }

      case '--retry-interval':
      case '--max-wait': {
        const value = getArgValue(args, i, argBase);
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        const parsed = parsePositiveInt(value.value, argBase);
        if (parsed.value === undefined) return { success: false, error: `Error: ${parsed.error}` };
        runOnly.push(argBase);
        if (argBase === '--retry-interval') {
          result.retryIntervalSeconds = parsed.value;
        } else {
          result.maxWaitSeconds = parsed.value;
        }
        i += value.skip;
        break;
      }

      case '--log-size': {
        const value = getArgValue(args, i, '--log-size');
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        const bytes = parseSize(value.value);
        if (bytes === null) {
          return {
            success: false,
            error: 'Error: --log-size must be a size such as 512K, 1M or a byte count',
          };
        }
        result.logSizeBytes = bytes;
        runOnly.push(argBase);
        i += value.skip;
        break;
      }

      case '--log-file': {
        const value = getArgValue(args, i, '--log-file');
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.logFile = value.value;
        runOnly.push(argBase);
        i += value.skip;
        break;
      }

      case '--config': {
        const value = getArgValue(args, i, '--config');
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.configPath = value.value;
        runOnly.push(argBase);
        i += value.skip;
        break;
      }

      case '--bin-path': {
        const value = getArgValue(args, i, '--bin-path');
        if (!value.ok) return { success: false, error: `Error: ${value.error}` };
        result.binPath = value.value;
        installOnly.push(argBase);
        i += value.skip;
        break;
      }

      default: {
        // Check for unknown flags
        if (arg.startsWith('-')) {
          return { success: false, error: `Error: Unknown option: ${argBase}` };
        }
        if (commandSeen || !isCommandName(arg)) {
          return { success: false, error: `Error: Unexpected argument: ${arg}` };
        }
        result.command = arg;
        commandSeen = true;
      }
    }
  }

  if (result.command !== 'install' && installOnly.length > 0 && !result.help) {
    return { success: false, error: `Error: ${installOnly[0]} is only valid with the install command` };
  }
  if (result.command === 'install' && runOnly.length > 0 && !result.help) {
    return { success: false, error: `Error: ${runOnly[0]} is not valid with the install command` };
  }

  return { success: true, args: result };
}
