import { Command } from 'commander';
import chalk from 'chalk';
import { existsSync, writeFileSync } from 'fs';

export const SAMPLE_COMMANDS = [
  '# Test commands for demonstration',
  "echo 'Hello from SSH!'",
  'date',
  'whoami',
  'pwd',
  "echo 'Test completed'",
];

/**
 * @description Writes the sample command file. Returns false when the file
 * exists and `force` is not set.
 */
export function writeSampleCommands(file: string, force = false): boolean {
  if (existsSync(file) && !force) {
    return false;
  }
  writeFileSync(file, SAMPLE_COMMANDS.join('\n') + '\n');
  return true;
}

export function registerUtilityCommands(program: Command) {
  // example: npx tsx src/cli/index.ts init-commands test_commands.txt
  program
    .command('init-commands')
    .description('Create a sample commands file')
    .argument('[file]', 'File to create', 'test_commands.txt')
    .option('-f, --force', 'Overwrite an existing file')
    .action((file: string, options: { force?: boolean }) => {
      if (!writeSampleCommands(file, options.force)) {
        console.error(
          chalk.red(`✗ ${file} already exists, use --force to overwrite it`)
        );
        process.exit(1);
      }
      console.log(chalk.green(`✓ Created ${file} with sample commands`));
    });
}
