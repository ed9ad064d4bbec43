#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import { DHTWATCH_VERSION } from '@dhtwatch/shared';
import { runCommand } from './commands/run.js';
import { statusCommand } from './commands/status.js';
import { windowsCommand } from './commands/windows.js';
import { samplesCommand } from './commands/samples.js';
import { pruneCommand } from './commands/prune.js';
import { configCommand } from './commands/config.js';
import { doctorCommand } from './commands/doctor.js';

const program = new Command();

program
  .name('dhtwatch')
  .version(DHTWATCH_VERSION, '-v, --version')
  .description(chalk.bold('dhtwatch') + ': DHT traffic and host metrics monitor')
  .addCommand(runCommand)
  .addCommand(statusCommand)
  .addCommand(windowsCommand)
  .addCommand(samplesCommand)
  .addCommand(pruneCommand)
  .addCommand(configCommand)
  .addCommand(doctorCommand);

await program.parseAsync(process.argv);
