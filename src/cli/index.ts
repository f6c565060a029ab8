#!/usr/bin/env node

import 'dotenv/config';
import { Command } from 'commander';
import { registerRunCommands } from './commands/run';
import { registerConfigCommands } from './commands/config';
import { registerUtilityCommands } from './commands/utility';
import chalk from 'chalk';

const program = new Command();

program
  .name('ssh-batch')
  .description(
    'Run a file of shell commands on a remote host over a single SSH session'
  );

registerRunCommands(program);
registerConfigCommands(program);
registerUtilityCommands(program);

program.parseAsync().catch((error: unknown) => {
  console.error(chalk.red(`✗ Error: ${String(error)}`));
  process.exit(1);
});
