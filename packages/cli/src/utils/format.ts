import chalk from 'chalk';
import { formatBytes, formatPercent } from '@dhtwatch/shared';

export { formatBytes, formatPercent };

export function formatPercentDisplay(value: number | null): string {
  if (value === null) return chalk.gray('-');
  const str = formatPercent(value);
  if (value > 90) return chalk.red(str);
  if (value > 75) return chalk.yellow(str);
  return chalk.green(str);
}

export function formatBytesDisplay(value: number | null): string {
  if (value === null) return chalk.gray('-');
  return formatBytes(value);
}

/** UTC timestamp to the second, e.g. `2026-01-10 12:00:00`. */
export function formatTimestamp(date: Date | null): string {
  if (!date) return chalk.gray('-');
  return date.toISOString().slice(0, 19).replace('T', ' ');
}

export function formatCount(value: number): string {
  return value.toLocaleString('en-US');
}
