import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigValidationError } from '@dhtwatch/shared';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, resolveConfig } from '../utils/store.js';

export const configCommand = new Command('config')
  .option('-c, --config <file>', 'Config file')
  .description('Print the resolved configuration')
  .action((options: ConfigOption) => {
    try {
      console.log(JSON.stringify(resolveConfig(options), null, 2));
    } catch (err) {
      if (err instanceof ConfigValidationError) {
        console.error(chalk.red('Invalid configuration:'));
        for (const issue of err.errors) {
          console.error(chalk.red(`  - ${issue}`));
        }
      } else {
        console.error(chalk.red(`Error: ${errorMessage(err)}`));
      }
      process.exitCode = 1;
    }
  });
