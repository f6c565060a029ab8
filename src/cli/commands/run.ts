import { Command } from 'commander';
import chalk from 'chalk';
import { CommandLoader } from '../../classes/command-loader';
import { CommandRunner } from '../../classes/command-runner';
import {
  CommandList,
  ConnectionParameters,
  ExecutionResult,
  RunReport,
  SessionFactory,
} from '../../interfaces';
import { DEFAULT_COMMANDS_FILE, RunSettings } from '../../lib/config';
import { PasswordPrompt, resolveCredential } from '../../lib/credentials';
import {
  ConnectionError,
  NotFoundError,
  describeError,
} from '../../lib/errors';
import { Logger, isLogLevel, logger as defaultLogger } from '../../lib/logger';
import { formatSummary, renderResultsTable } from '../../lib/report';
import {
  ValidationError,
  sanitizeNumber,
  sanitizePort,
  sanitizeSSHHost,
  sanitizeSSHUsername,
} from '../../lib/sanitization';

export interface BatchOptions {
  /**
   * @description Pause between commands in milliseconds.
   */
  commandDelayMs?: number;
  /**
   * @description Print complete stdout/stderr of every command.
   */
  fullOutput?: boolean;
  /**
   * @description Characters of stdout/stderr kept in each log line.
   */
  outputPreviewLength?: number;
}

/**
 * @description Where SIGINT is delivered during the run; `process` by default.
 */
export interface SignalSource {
  on(event: 'SIGINT', listener: () => void): unknown;
  removeListener(event: 'SIGINT', listener: () => void): unknown;
}

export interface BatchDependencies {
  logger?: Logger;
  prompt?: PasswordPrompt;
  sessionFactory?: SessionFactory;
  print?: (line: string) => void;
  signals?: SignalSource;
}

export interface RunCliOptions {
  passphrase?: string;
  delay: string;
  previewLength: string;
  fullOutput?: boolean;
  logLevel?: string;
}

/**
 * @description Loads the command file, runs it against the host and prints the
 * summary. Resolves to the process exit code.
 */
export async function executeBatch(
  settings: RunSettings,
  options: BatchOptions = {},
  deps: BatchDependencies = {}
): Promise<number> {
  const logger = deps.logger ?? defaultLogger;
  const print = deps.print ?? ((line: string) => console.log(line));
  const signals = deps.signals ?? process;

  let commands: CommandList;
  try {
    commands = await new CommandLoader(logger).load(settings.commandsFile);
  } catch (error) {
    if (error instanceof NotFoundError) {
      print(chalk.red(`✗ ${error.message}`));
      return 1;
    }
    throw error;
  }

  if (commands.length === 0) {
    print(chalk.red('✗ No commands to execute'));
    return 1;
  }

  const credential = await resolveCredential(settings, settings, deps.prompt);
  const params: ConnectionParameters = {
    host: settings.host,
    port: settings.port,
    username: settings.username,
    credential,
  };

  const runner = new CommandRunner({
    commandDelayMs: options.commandDelayMs,
    outputPreviewLength: options.outputPreviewLength,
    logger,
    sessionFactory: deps.sessionFactory,
  });

  if (options.fullOutput) {
    runner.on('commandFinished', (result: ExecutionResult) => {
      const stdout = result.stdout.toString('utf8');
      const stderr = result.stderr.toString('utf8');
      if (stdout) print(`STDOUT:\n${stdout}`);
      if (stderr) print(`STDERR:\n${stderr}`);
    });
  }

  let interrupted = false;
  const onInterrupt = async () => {
    interrupted = true;
    print(chalk.yellow('\nOperation interrupted by user'));
    await runner.stop();
  };

  signals.on('SIGINT', onInterrupt);
  let report: RunReport;
  try {
    report = await runner.run(params, commands);
  } finally {
    signals.removeListener('SIGINT', onInterrupt);
  }

  if (report.fatal instanceof ConnectionError) {
    print(
      chalk.red(`✗ Failed to establish SSH connection: ${report.fatal.message}`)
    );
    return 1;
  }

  if (report.results.length > 0) {
    print(renderResultsTable(report.results));
  }
  print(formatSummary(report));

  if (interrupted) {
    return 1;
  }

  if (report.fatal) {
    print(chalk.red(`✗ Connection lost: ${report.fatal.message}`));
  }

  if (report.allSucceeded) {
    print(chalk.green('✓ All commands executed successfully'));
    return 0;
  }

  print(chalk.yellow('⚠ Some commands failed to execute'));
  return 1;
}

export function applyLogLevel(level: string | undefined, logger: Logger) {
  if (level === undefined) return;

  const normalized = level.toLowerCase();
  if (!isLogLevel(normalized)) {
    throw new ValidationError(
      'Log level must be one of: debug, info, warn, error'
    );
  }
  logger.setLevel(normalized);
}

/**
 * @description Shared reporting of errors raised before or around a run.
 */
export function reportCliError(error: unknown): void {
  if (error instanceof ValidationError) {
    console.error(chalk.red(`✗ Validation Error: ${error.message}`));
  } else if (error instanceof Error && error.name === 'ExitPromptError') {
    console.error(chalk.yellow('\nOperation interrupted by user'));
  } else {
    console.error(chalk.red(`✗ Unexpected error: ${describeError(error)}`));
  }
}

export function registerRunCommands(program: Command) {
  // example: npx tsx src/cli/index.ts run 192.168.1.100 deploy commands.txt '' ~/.ssh/id_ed25519 2222
  program
    .command('run')
    .description('Run every command in a file on a remote host over SSH')
    .argument('[host]', 'Remote server hostname or IP address (SSH_HOST)')
    .argument('[username]', 'SSH username (SSH_USERNAME)')
    .argument(
      '[commandsFile]',
      `File with one command per line (COMMANDS_FILE, default: ${DEFAULT_COMMANDS_FILE})`
    )
    .argument('[password]', "SSH password, '' to use a key (SSH_PASSWORD)")
    .argument('[keyPath]', 'Path to private key file (SSH_KEY_PATH)')
    .argument('[port]', 'SSH port (SSH_PORT, default: 22)')
    .option('--passphrase <passphrase>', 'Passphrase for private key')
    .option('--delay <ms>', 'Pause between commands in milliseconds', '500')
    .option('--full-output', 'Print complete stdout/stderr of each command')
    .option(
      '--preview-length <chars>',
      'Characters of output shown per log line',
      '200'
    )
    .option('--log-level <level>', 'debug, info, warn or error')
    .action(
      async (
        host: string | undefined,
        username: string | undefined,
        commandsFile: string | undefined,
        password: string | undefined,
        keyPath: string | undefined,
        port: string | undefined,
        options: RunCliOptions
      ) => {
        try {
          applyLogLevel(options.logLevel, defaultLogger);

          // Get values from arguments or environment variables
          const settings: RunSettings = {
            host: sanitizeSSHHost(host || process.env.SSH_HOST),
            username: sanitizeSSHUsername(
              username || process.env.SSH_USERNAME
            ),
            port: sanitizePort(port || process.env.SSH_PORT),
            password: password ?? process.env.SSH_PASSWORD,
            keyPath: keyPath || process.env.SSH_KEY_PATH,
            passphrase: options.passphrase || process.env.SSH_KEY_PASSPHRASE,
            commandsFile:
              commandsFile ||
              process.env.COMMANDS_FILE ||
              DEFAULT_COMMANDS_FILE,
          };
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

          const exitCode = await executeBatch(settings, {
            commandDelayMs,
            fullOutput: options.fullOutput,
            outputPreviewLength,
          });
          process.exit(exitCode);
        } catch (error) {
          reportCliError(error);
          process.exit(1);
        }
      }
    );
}
