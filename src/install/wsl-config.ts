/**
 * /etc/wsl.conf planning
 *
 * Works out how to register dockstart as the WSL boot command without
 * clobbering a command somebody else put there. Pure: the installer reads
 * the file, asks for a plan and writes `content` back when there is one.
 */

import { bootCommand, findMissingParams } from './environment';

/** Changes that produce new file content */
export type WslWriteAction = 'create' | 'update' | 'append' | 'insert' | 'add_section';

export type WslConfigPlan =
  | {
      action: WslWriteAction;
      /** Full new file content */
      content: string;
      /** The boot command line as written */
      commandLine: string;
      /** The line it replaces (update, append) */
      previous: string | null;
    }
  | {
      action: 'unchanged';
      commandLine: string;
    }
  | {
      action: 'manual';
      /** chained: our command sits in a chain; foreign: somebody else's command without a trailing `;` */
      reason: 'chained' | 'foreign';
      current: string;
      missing: string[];
      /** A line the user could use instead, when one can be suggested */
      suggestion: string | null;
    };

const BOOT_HEADER = '[boot]';
const COMMAND_LINE = /^\s*command\s*=\s*(.*)$/;
const CHAIN_OPERATOR = /&&|\|\||;/;

function commandEntry(binPath: string): string {
  return `command = ${bootCommand(binPath)}`;
}

interface BootSection {
  headerIndex: number;
  /** Index of the `command =` line inside the section, -1 when absent */
  commandIndex: number;
}

function findBootSection(lines: string[]): BootSection | null {
  const headerIndex = lines.findIndex((line) => line.trim() === BOOT_HEADER);
  if (headerIndex === -1) {
    return null;
  }

  for (let i = headerIndex + 1; i < lines.length; i++) {
    const trimmed = lines[i].trim();
    if (trimmed.startsWith('[')) break;
    if (COMMAND_LINE.test(lines[i])) {
      return { headerIndex, commandIndex: i };
    }
  }
  return { headerIndex, commandIndex: -1 };
}

/**
 * Plan the wsl.conf change for `binPath`. `existing` is null when the file
 * does not exist.
 */
export function planWslConfig(existing: string | null, binPath: string): WslConfigPlan {
  const entry = commandEntry(binPath);

  if (existing === null) {
    return { action: 'create', content: `${BOOT_HEADER}\n${entry}\n`, commandLine: entry, previous: null };
  }

  const lines = existing.split('\n');
  const section = findBootSection(lines);

  if (section === null) {
    const base = existing.length === 0 ? '' : existing.endsWith('\n') ? `${existing}\n` : `${existing}\n\n`;
    return {
      action: 'add_section',
      content: `${base}${BOOT_HEADER}\n${entry}\n`,
      commandLine: entry,
      previous: null,
    };
  }

  if (section.commandIndex === -1) {
    const updated = [...lines];
    updated.splice(section.headerIndex + 1, 0, entry);
    return { action: 'insert', content: updated.join('\n'), commandLine: entry, previous: null };
  }

  const current = lines[section.commandIndex].trim();
  const value = COMMAND_LINE.exec(current)?.[1] ?? '';

  if (value.includes(binPath)) {
    const missing = findMissingParams(value);
    if (missing.length === 0) {
      return { action: 'unchanged', commandLine: current };
    }
    if (CHAIN_OPERATOR.test(value)) {
      return { action: 'manual', reason: 'chained', current, missing, suggestion: null };
    }
    return replaceLine(lines, section.commandIndex, entry, 'update');
  }

  if (/;\s*$/.test(value)) {
    return replaceLine(lines, section.commandIndex, `${current} ${bootCommand(binPath)}`, 'append');
  }

  return {
    action: 'manual',
    reason: 'foreign',
    current,
    missing: [],
    suggestion: `${current} && ${bootCommand(binPath)}`,
  };
}

function replaceLine(lines: string[], index: number, line: string, action: 'update' | 'append'): WslConfigPlan {
  const updated = [...lines];
  const previous = updated[index].trim();
  updated[index] = line;
  return { action, content: updated.join('\n'), commandLine: line, previous };
}
