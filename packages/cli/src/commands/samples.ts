import { Command } from 'commander';
import chalk from 'chalk';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, parseLimit, withStore } from '../utils/store.js';
import { renderSampleTable } from '../ui/Table.js';

interface RecentOptions extends ConfigOption {
  limit: number;
  json?: boolean;
}

export const samplesCommand = new Command('samples')
  .option('-c, --config <file>', 'Config file')
  .option('-n, --limit <n>', 'Number of samples', parseLimit, 20)
  .option('--json', 'Output as JSON')
  .description('Show the most recent system samples')
  .action(async (options: RecentOptions) => {
    try {
      await withStore(options, (store) => {
        const samples = store.recent('sample', options.limit);

        if (options.json) {
          console.log(JSON.stringify(samples, null, 2));
          return;
        }

        if (samples.length === 0) {
          console.log(chalk.gray('\n  No system samples recorded yet.\n'));
          return;
        }

        console.log(renderSampleTable(samples));
      });
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
