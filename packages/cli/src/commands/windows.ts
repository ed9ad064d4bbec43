import { Command } from 'commander';
import chalk from 'chalk';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, parseLimit, withStore } from '../utils/store.js';
import { renderWindowTable } from '../ui/Table.js';

interface RecentOptions extends ConfigOption {
  limit: number;
  json?: boolean;
}

export const windowsCommand = new Command('windows')
  .option('-c, --config <file>', 'Config file')
  .option('-n, --limit <n>', 'Number of windows', parseLimit, 20)
  .option('--json', 'Output as JSON')
  .description('Show the most recent traffic windows')
  .action(async (options: RecentOptions) => {
    try {
      await withStore(options, (store) => {
        const windows = store.recent('traffic', options.limit);

        if (options.json) {
          console.log(JSON.stringify(windows, null, 2));
          return;
        }

        if (windows.length === 0) {
          console.log(
            chalk.gray('\n  No traffic windows recorded yet. Start one with: dhtwatch run\n'),
          );
          return;
        }

        console.log(renderWindowTable(windows));
      });
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
