import { EventEmitter } from 'events';
import {
  CommandList,
  CommandOutcome,
  CommandRunnerOptions,
  ConnectionParameters,
  ExecutionResult,
  RunReport,
  SessionFactory,
  TransportSession,
} from '../interfaces';
import {
  ChannelError,
  ConnectionError,
  ConnectionLostError,
  describeError,
} from '../lib/errors';
import { Logger, logger as defaultLogger } from '../lib/logger';
import { formatSummary, truncate } from '../lib/report';
import { RemoteExecutor } from './remote-executor';

/**
 * Runs a command list against one host over a single session.
 *
 * Events: `commandStarted(command, position, total)`,
 * `commandFinished(result)`, `aborted(cause)`.
 *
 * `stop()` releases the active session; the run then ends with the commands
 * attempted so far.
 */
export class CommandRunner extends EventEmitter {
  private commandDelayMs: number;
  private outputPreviewLength: number;
  private logger: Logger;
  private sessionFactory: SessionFactory;
  private activeSession: TransportSession | undefined;
  private stopped = false;

  constructor(options: CommandRunnerOptions = {}) {
    super();
    this.commandDelayMs = options.commandDelayMs ?? 500;
    this.outputPreviewLength = options.outputPreviewLength ?? 200;
    this.logger = options.logger ?? defaultLogger;
    this.sessionFactory =
      options.sessionFactory ?? ((params) => new RemoteExecutor(params));
  }

  async run(
    params: ConnectionParameters,
    commands: CommandList
  ): Promise<RunReport> {
    const total = commands.length;
    const results: ExecutionResult[] = [];

    if (total === 0) {
      this.logger.error('No commands to execute');
      return this.report(results, total);
    }

    this.stopped = false;
    const session = this.sessionFactory(params);
    this.activeSession = session;
    let fatal: ConnectionError | ConnectionLostError | undefined;

    try {
      this.logger.info(
        `Connecting to ${params.host}:${params.port} as ${params.username}`
      );

      try {
        await session.connect();
      } catch (error) {
        fatal =
          error instanceof ConnectionError
            ? error
            : new ConnectionError(describeError(error), 'unknown', {
                cause: error,
              });
        this.logger.error(fatal.message);
        this.emit('aborted', fatal);
        return this.report(results, total, fatal);
      }

      this.logger.info('SSH connection established successfully');

      for (const [index, command] of commands.entries()) {
        const position = index + 1;
        if (this.stopped) {
          fatal = new ConnectionLostError(
            `Run interrupted before command ${position}`,
            command
          );
          this.logger.warn(fatal.message);
          this.emit('aborted', fatal);
          break;
        }

        this.logger.info(`Executing command ${position}/${total}: ${command}`);
        this.emit('commandStarted', command, position, total);

        const outcome = await this.attempt(session, command);
        if (outcome.kind === 'fatal') {
          fatal = outcome.cause;
          this.logger.error(
            `${fatal.message}; skipping ${total - position} remaining command(s)`
          );
          this.emit('aborted', fatal);
          break;
        }

        const result = this.toResult(command, position, outcome);
        results.push(result);
        this.logResult(result);
        this.emit('commandFinished', result);

        if (this.commandDelayMs > 0 && position < total) {
          await new Promise((resolve) =>
            setTimeout(resolve, this.commandDelayMs)
          );
        }
      }
    } finally {
      if (this.activeSession === session) {
        this.activeSession = undefined;
        await this.release(session);
      }
    }

    const report = this.report(results, total, fatal);
    this.logger.info(formatSummary(report));
    return report;
  }

  /**
   * Stop the current run and close its session
   */
  async stop(): Promise<void> {
    this.stopped = true;

    const session = this.activeSession;
    if (!session) return;
    this.activeSession = undefined;
    await this.release(session);
  }

  /**
   * Runs one command, turning channel faults into data
   */
  private async attempt(
    session: TransportSession,
    command: string
  ): Promise<CommandOutcome> {
    const startTime = Date.now();

    try {
      const output = await session.runCommand(command);
      return { kind: 'completed', ...output };
    } catch (error) {
      if (error instanceof ConnectionLostError) {
        return { kind: 'fatal', cause: error };
      }
      if (error instanceof ChannelError) {
        return {
          kind: 'failed',
          exitStatus: -1,
          stderr: Buffer.from(error.message),
          duration: Date.now() - startTime,
        };
      }
      throw error;
    }
  }

  private toResult(
    command: string,
    position: number,
    outcome: Exclude<CommandOutcome, { kind: 'fatal' }>
  ): ExecutionResult {
    return Object.freeze({
      command,
      position,
      exitStatus: outcome.exitStatus,
      stdout: outcome.kind === 'completed' ? outcome.stdout : Buffer.alloc(0),
      stderr: outcome.stderr,
      succeeded: outcome.exitStatus === 0,
      duration: outcome.duration,
    });
  }

  private logResult(result: ExecutionResult): void {
    if (result.succeeded) {
      this.logger.info(
        `Command ${result.position} executed successfully (exit code: ${result.exitStatus})`
      );
    } else {
      this.logger.warn(
        `Command ${result.position} failed with exit code: ${result.exitStatus}`
      );
      this.logger.error(`Command failed: ${result.command}`);
    }

    const stdout = result.stdout.toString('utf8');
    const stderr = result.stderr.toString('utf8');
    if (stdout.trim()) {
      this.logger.info(
        `stdout: ${truncate(stdout, this.outputPreviewLength)}`
      );
    }
    if (stderr.trim()) {
      this.logger.info(
        `stderr: ${truncate(stderr, this.outputPreviewLength)}`
      );
    }
  }

  private async release(session: TransportSession): Promise<void> {
    try {
      await session.disconnect();
      this.logger.info('SSH connection closed');
    } catch (error) {
      this.logger.warn(`Error closing SSH connection: ${describeError(error)}`);
    }
  }

  private report(
    results: ExecutionResult[],
    total: number,
    fatal?: ConnectionError | ConnectionLostError
  ): RunReport {
    const successCount = results.filter((result) => result.succeeded).length;

    return {
      results: Object.freeze(results),
      total,
      successCount,
      allSucceeded:
        total > 0 &&
        fatal === undefined &&
        results.length === total &&
        successCount === results.length,
      fatal,
    };
  }
}
