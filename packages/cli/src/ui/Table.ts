import Table from 'cli-table3';
import chalk from 'chalk';
import type { StoredSample, StoredTrafficWindow, StoreSummary } from '@dhtwatch/shared';
import {
  formatBytes,
  formatBytesDisplay,
  formatCount,
  formatPercentDisplay,
  formatTimestamp,
} from '../utils/format.js';

const TABLE_STYLE = {
  head: [],
  border: ['gray'],
};

export function renderWindowTable(windows: StoredTrafficWindow[]): string {
  const table = new Table({
    head: [
      chalk.bold('time'),
      chalk.bold('peers'),
      chalk.bold('bytes'),
      chalk.bold('packets'),
      chalk.bold('in/out'),
      chalk.bold('new'),
      chalk.bold('expired'),
      chalk.bold('top talker'),
    ],
    style: TABLE_STYLE,
  });

  for (const window of windows) {
    const top = window.topTalkers[0];
    table.push([
      formatTimestamp(window.timestamp),
      String(window.uniquePeers),
      formatBytes(window.totalBytes),
      formatCount(window.totalPackets),
      `${formatBytes(window.inBytes)} / ${formatBytes(window.outBytes)}`,
      String(window.newPeers),
      String(window.expiredPeers),
      top ? `${top.address} (${formatBytes(top.bytes)})` : chalk.gray('-'),
    ]);
  }

  return table.toString();
}

export function renderSampleTable(samples: StoredSample[]): string {
  const table = new Table({
    head: [
      chalk.bold('time'),
      chalk.bold('cpu'),
      chalk.bold('memory'),
      chalk.bold('disk'),
      chalk.bold('mem used'),
      chalk.bold('disk used'),
    ],
    style: TABLE_STYLE,
  });

  for (const sample of samples) {
    table.push([
      formatTimestamp(sample.timestamp),
      formatPercentDisplay(sample.cpuPercent),
      formatPercentDisplay(sample.memPercent),
      formatPercentDisplay(sample.diskPercent),
      formatBytesDisplay(sample.memUsedBytes),
      formatBytesDisplay(sample.diskUsedBytes),
    ]);
  }

  return table.toString();
}

export function renderSummary(summary: StoreSummary, storePath: string): string {
  const lines: string[] = [];

  lines.push(chalk.bold('\n  Metric store'));
  lines.push(`  Path:             ${storePath}`);
  lines.push(`  Size:             ${formatBytes(summary.storageBytes)}`);
  lines.push(`  Samples:          ${formatCount(summary.counts.sample)}`);
  lines.push(`  Traffic windows:  ${formatCount(summary.counts.traffic)}`);
  lines.push(`  Capture failures: ${formatCount(summary.captureFailures)}`);
  lines.push(`  Earliest:         ${formatTimestamp(summary.earliest)}`);
  lines.push(`  Latest:           ${formatTimestamp(summary.latest)}`);
  lines.push('');

  return lines.join('\n');
}
