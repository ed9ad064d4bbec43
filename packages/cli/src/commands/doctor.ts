import { Command } from 'commander';
import chalk from 'chalk';
import { execFile } from 'node:child_process';
import { existsSync } from 'node:fs';
import type { MonitorConfig } from '@dhtwatch/shared';
import { MetricStore, openDatabase } from '@dhtwatch/core';
import type { ConfigOption } from '../utils/store.js';
import { errorMessage, resolveConfig } from '../utils/store.js';

const TOOL_CHECK_TIMEOUT = 5000;

/** First line of `<tool> --version`, or null when the tool cannot be run. */
export function probeCaptureTool(tool: string): Promise<string | null> {
  return new Promise((resolve) => {
    execFile(tool, ['--version'], { timeout: TOOL_CHECK_TIMEOUT }, (err, stdout) => {
      if (err) {
        resolve(null);
        return;
      }
      resolve(String(stdout).split('\n')[0]?.trim() || tool);
    });
  });
}

export const doctorCommand = new Command('doctor')
  .option('-c, --config <file>', 'Config file')
  .description('Diagnose the dhtwatch installation')
  .action(async (options: ConfigOption) => {
    console.log(chalk.bold('\n  dhtwatch doctor\n'));

    let issues = 0;

    const nodeVersion = process.versions.node;
    const major = parseInt(nodeVersion.split('.')[0] ?? '0', 10);
    if (major >= 20) {
      console.log(chalk.green(`  ✓ Node.js version: ${nodeVersion}`));
    } else {
      console.log(chalk.red(`  ✗ Node.js version: ${nodeVersion} (requires >= 20)`));
      issues++;
    }

    let config: MonitorConfig;
    try {
      config = resolveConfig(options);
      console.log(chalk.green('  ✓ Configuration is valid'));
    } catch (err) {
      console.log(chalk.red(`  ✗ Configuration: ${errorMessage(err)}`));
      console.log(chalk.red('\n  Fix the configuration before running further checks.\n'));
      process.exitCode = 1;
      return;
    }

    if (existsSync(config.home)) {
      console.log(chalk.green(`  ✓ Home directory: ${config.home}`));
    } else {
      console.log(chalk.yellow(`  ⚠ Home directory not created yet: ${config.home}`));
    }

    if (existsSync(config.store.path)) {
      try {
        const store = new MetricStore(openDatabase(config.store.path));
        try {
          const { counts } = store.summaryStats();
          console.log(
            chalk.green(
              `  ✓ Database: ${config.store.path} (${counts.traffic} windows, ${counts.sample} samples)`,
            ),
          );
        } finally {
          store.close();
        }
      } catch (err) {
        console.log(chalk.red(`  ✗ Database: ${errorMessage(err)}`));
        issues++;
      }
    } else {
      console.log(chalk.gray(`  - Database: not created yet`));
    }

    const version = await probeCaptureTool(config.capture.tool);
    if (version) {
      console.log(chalk.green(`  ✓ Capture tool: ${version}`));
    } else {
      console.log(chalk.red(`  ✗ Capture tool not found: ${config.capture.tool}`));
      issues++;
    }

    if (config.watchProcess) {
      console.log(chalk.gray(`  - Watched process: ${config.watchProcess}`));
    }

    console.log('');

    if (issues > 0) {
      console.log(chalk.red(`  Found ${issues} issue(s) to fix.\n`));
      process.exitCode = 1;
    } else {
      console.log(chalk.green(`  No issues found! dhtwatch is ready to run.\n`));
    }
  });
