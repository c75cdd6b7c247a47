/**
 * Size parsing for --log-size and the logSize config key
 */

import { SIZE_PATTERN } from '../schemas/validators';

const MULTIPLIERS: Record<string, number> = {
  '': 1,
  K: 1024,
  M: 1024 * 1024,
  G: 1024 * 1024 * 1024,
};

/**
 * Parse "512K", "1M", "2G" or a plain byte count. Returns null when the
 * value is malformed or not positive.
 */
export function parseSize(value: string | number): number | null {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value > 0 ? value : null;
  }

  const match = SIZE_PATTERN.exec(value.trim());
  if (!match) {
    return null;
  }

  const amount = parseInt(match[1], 10);
  const multiplier = MULTIPLIERS[(match[2] ?? '').toUpperCase()];
  const bytes = amount * multiplier;
  return bytes > 0 ? bytes : null;
}

/**
 * Render a byte count the way it would be written on the command line
 */
export function formatSize(bytes: number): string {
  for (const unit of ['G', 'M', 'K']) {
    const multiplier = MULTIPLIERS[unit];
    if (bytes >= multiplier && bytes % multiplier === 0) {
      return `${bytes / multiplier}${unit}`;
    }
  }
  return `${bytes}`;
}
