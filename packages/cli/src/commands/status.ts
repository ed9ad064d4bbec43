import { Command } from 'commander';
import chalk from 'chalk';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, withStore } from '../utils/store.js';
import { renderSummary } from '../ui/Table.js';

interface StatusOptions extends ConfigOption {
  json?: boolean;
}

export const statusCommand = new Command('status')
  .option('-c, --config <file>', 'Config file')
  .option('--json', 'Output as JSON')
  .description('Show a summary of the metric store')
  .action(async (options: StatusOptions) => {
    try {
      await withStore(options, (store, config) => {
        const summary = store.summaryStats();
        if (options.json) {
          console.log(JSON.stringify(summary, null, 2));
          return;
        }
        console.log(renderSummary(summary, config.store.path));
      });
    } catch (err) {
      console.error(chalk.red(`Error: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
