import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { MonitorDaemon } from '@dhtwatch/core';
import { formatDuration } from '@dhtwatch/shared';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, resolveConfig } from '../utils/store.js';

export const runCommand = new Command('run')
  .option('-c, --config <file>', 'Config file')
  .description('Run the monitor daemon in the foreground')
  .action(async (options: ConfigOption) => {
    const spinner = ora('Starting dhtwatch...').start();

    try {
      const config = resolveConfig(options);
      const daemon = new MonitorDaemon(config);
      await daemon.start();

      const http = config.http.enabled
        ? `http://${config.http.host}:${config.http.port}`
        : chalk.gray('disabled');
      spinner.succeed(
        chalk.green(
          `Monitoring ${chalk.bold(config.capture.interface)} every ${formatDuration(
            config.scheduler.intervalMs,
          )} (API: ${http})`,
        ),
      );
    } catch (err) {
      spinner.fail(chalk.red(`Failed to start: ${errorMessage(err)}`));
      process.exitCode = 1;
    }
  });
