/**
 * Human-readable rendering of the resolved configuration (--verbose)
 */

import { RunConfig } from '../types/run-config';
import { formatSize } from './parse-size';

function withSource(config: RunConfig, key: string, value: string): string {
  const source = config.sources[key];
  return source && source !== 'default' ? `${value} (${source})` : value;
}

/**
 * Format the run configuration for display
 */
export function formatRunConfigForDisplay(config: RunConfig): string {
  const lines: string[] = [];
  const yesNo = (value: boolean) => (value ? 'yes' : 'no');

  lines.push('┌─ Availability ──────────────────────────────────────────────┐');
  lines.push(`│ Retry:          ${withSource(config, 'retry', yesNo(config.retry.enabled))}`);
  if (config.retry.enabled) {
    lines.push(`│ Retry Interval: ${withSource(config, 'retryInterval', `${config.retry.intervalMs / 1000}s`)}`);
    lines.push(`│ Max Wait:       ${withSource(config, 'maxWait', `${config.retry.maxWaitMs / 1000}s`)}`);
  }
  lines.push('└──────────────────────────────────────────────────────────────┘');

  lines.push('┌─ Containers ────────────────────────────────────────────────┐');
  lines.push(`│ Force:          ${withSource(config, 'force', yesNo(config.force))}`);
  lines.push(`│ Docker:         ${withSource(config, 'dockerCommand', config.commands.docker)}`);
  lines.push(`│ jq:             ${withSource(config, 'jqCommand', config.commands.jq)}`);
  lines.push('└──────────────────────────────────────────────────────────────┘');

  lines.push('┌─ Logging ───────────────────────────────────────────────────┐');
  if (config.logging.enabled) {
    lines.push(`│ Log File:       ${withSource(config, 'logFile', config.logging.file)}`);
    lines.push(`│ Max Size:       ${withSource(config, 'logSize', formatSize(config.logging.maxSizeBytes))}`);
  } else {
    lines.push(`│ Log File:       ${withSource(config, 'log', 'disabled')}`);
  }
  lines.push('└──────────────────────────────────────────────────────────────┘');

  return lines.join('\n');
}
