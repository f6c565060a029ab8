import { Command } from 'commander';
import chalk from 'chalk';
import { DEFAULT_CONFIG_FILE, loadConfigFile } from '../../lib/config';
import { logger } from '../../lib/logger';
import { sanitizeNumber } from '../../lib/sanitization';
import { applyLogLevel, executeBatch, reportCliError } from './run';

interface RunConfigOptions {
  delay: string;
  previewLength: string;
  fullOutput?: boolean;
  logLevel?: string;
}

export function registerConfigCommands(program: Command) {
  // example: npx tsx src/cli/index.ts run-config ./config.json --full-output
  program
    .command('run-config')
    .description('Run a command file using connection details from a JSON file')
    .argument('[configFile]', 'Configuration file', DEFAULT_CONFIG_FILE)
    .option('--delay <ms>', 'Pause between commands in milliseconds', '500')
    .option('--full-output', 'Print complete stdout/stderr of each command')
    .option(
      '--preview-length <chars>',
      'Characters of output shown per log line',
      '200'
    )
    .option('--log-level <level>', 'debug, info, warn or error')
    .action(async (configFile: string, options: RunConfigOptions) => {
      try {
        applyLogLevel(options.logLevel, logger);

        const loaded = loadConfigFile(configFile);
        if (loaded.kind === 'template-created') {
          console.log(
            chalk.yellow(
              `Configuration file ${loaded.path} not found. Created a template.`
            )
          );
          console.log(
            chalk.dim(
              `Please edit ${loaded.path} with your SSH connection details`
            )
          );
          process.exit(1);
        }

        const commandDelayMs = sanitizeNumber(
          options.delay,
          'delay',
          0,
          60000
        );
        const outputPreviewLength = sanitizeNumber(
          options.previewLength,
          'preview-length',
          10,
          100000
        );
        const exitCode = await executeBatch(loaded.settings, {
          commandDelayMs,
          fullOutput: options.fullOutput,
          outputPreviewLength,
        });
        process.exit(exitCode);
      } catch (error) {
        reportCliError(error);
        process.exit(1);
      }
    });
}
