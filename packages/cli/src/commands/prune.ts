import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { parseDuration } from '@dhtwatch/shared';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, withStore } from '../utils/store.js';

interface PruneOptions extends ConfigOption {
  olderThan: string;
}

export const pruneCommand = new Command('prune')
  .option('-c, --config <file>', 'Config file')
  .requiredOption('--older-than <duration>', 'Delete records older than this (e.g. 7d, 12h)')
  .description('Delete old records from the metric store')
  .action(async (options: PruneOptions) => {
    const spinner = ora('Pruning metric store...').start();

    try {
      const cutoff = new Date(Date.now() - parseDuration(options.olderThan));
      const result = await withStore(options, (store) => store.prune(cutoff));

      spinner.succeed(
        chalk.green(
          `Removed ${result.sample} sample(s), ${result.traffic} window(s) and ` +
            `${result.captureFailures} capture failure(s) before ${cutoff.toISOString()}`,
        ),
      );
    } catch (err) {
      spinner.fail(chalk.red(`Failed to prune: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
