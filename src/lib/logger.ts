import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

export interface LoggerOptions {
  level?: LogLevel;
  /**
   * @description Receives each finished line. Defaults to stderr.
   */
  write?: (line: string) => void;
  color?: boolean;
  clock?: () => Date;
}

const paint: Record<LogLevel, (text: string) => string> = {
  debug: chalk.dim,
  info: chalk.cyan,
  warn: chalk.yellow,
  error: chalk.red,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && LOG_LEVELS.some((level) => level === value);
}

const pad = (value: number, width = 2) => String(value).padStart(width, '0');

/**
 * @description Local time as `YYYY-MM-DD HH:mm:ss.SSS`.
 */
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}.` +
    pad(date.getMilliseconds(), 3)
  );
}

/**
 * @description Timestamped, leveled text lines. Informational only.
 */
export class Logger {
  private level: LogLevel;
  private readonly write: (line: string) => void;
  private readonly color: boolean;
  private readonly clock: () => Date;

  constructor(options: LoggerOptions = {}) {
    const fromEnv = process.env.LOG_LEVEL?.toLowerCase();
    this.level = options.level ?? (isLogLevel(fromEnv) ? fromEnv : 'info');
    this.write = options.write ?? ((line) => console.error(line));
    this.color = options.color ?? chalk.supportsColor !== false;
    this.clock = options.clock ?? (() => new Date());
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  getLevel(): LogLevel {
    return this.level;
  }

  debug(message: string): void {
    this.log('debug', message);
  }

  info(message: string): void {
    this.log('info', message);
  }

  warn(message: string): void {
    this.log('warn', message);
  }

  error(message: string): void {
    this.log('error', message);
  }

  private log(level: LogLevel, message: string): void {
    if (LOG_LEVELS.indexOf(level) < LOG_LEVELS.indexOf(this.level)) return;

    const label = level.toUpperCase();
    const timestamp = formatTimestamp(this.clock());
    this.write(
      `${timestamp} - ${this.color ? paint[level](label) : label} - ${message}`
    );
  }
}

export const logger = new Logger();
