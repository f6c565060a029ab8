import { existsSync, mkdirSync, readFileSync, writeFileSync } from 'fs';
import { dirname } from 'path';
import {
  ValidationError,
  sanitizePort,
  sanitizeSSHHost,
  sanitizeSSHUsername,
} from './sanitization';

/**
 * @description Shape of the JSON configuration file.
 */
export interface FileConfig {
  hostname: string;
  username: string;
  password: string;
  key_filename: string;
  port: number;
  commands_file: string;
  passphrase?: string;
}

export const DEFAULT_CONFIG_FILE = 'config.json';
export const DEFAULT_COMMANDS_FILE = 'commands.txt';

export const DEFAULT_CONFIG: FileConfig = {
  hostname: '',
  username: '',
  password: '',
  key_filename: '',
  port: 22,
  commands_file: DEFAULT_COMMANDS_FILE,
};

/**
 * @description Connection and input settings before a credential is chosen.
 */
export interface RunSettings {
  host: string;
  username: string;
  port: number;
  password?: string;
  keyPath?: string;
  passphrase?: string;
  commandsFile: string;
}

export type ConfigLoadResult =
  | { kind: 'template-created'; path: string }
  | { kind: 'loaded'; path: string; settings: RunSettings };

function optionalString(
  fields: Map<string, unknown>,
  key: keyof FileConfig
): string | undefined {
  const value = fields.get(key);
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${key} must be a string in config file`);
  }
  return value.trim() === '' ? undefined : value;
}

/**
 * Validates a parsed configuration record
 */
export function parseConfig(raw: unknown): RunSettings {
  if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
    throw new ValidationError('Configuration file must contain a JSON object');
  }

  const fields = new Map<string, unknown>(Object.entries(raw));
  const hostname = optionalString(fields, 'hostname');
  const username = optionalString(fields, 'username');

  if (!hostname || !username) {
    throw new ValidationError(
      'hostname and username are required in config file'
    );
  }

  const rawPort = fields.get('port');
  let port: string | number | undefined;
  if (typeof rawPort === 'number' || typeof rawPort === 'string') {
    port = rawPort;
  } else if (rawPort !== undefined && rawPort !== null) {
    throw new ValidationError('port must be a number in config file');
  }

  return {
    host: sanitizeSSHHost(hostname),
    username: sanitizeSSHUsername(username),
    port: sanitizePort(port),
    password: optionalString(fields, 'password'),
    keyPath: optionalString(fields, 'key_filename'),
    passphrase: optionalString(fields, 'passphrase'),
    commandsFile:
      optionalString(fields, 'commands_file') ?? DEFAULT_COMMANDS_FILE,
  };
}

/**
 * @description Loads the configuration file, writing a template when it is missing.
 */
export function loadConfigFile(configPath: string): ConfigLoadResult {
  if (!existsSync(configPath)) {
    mkdirSync(dirname(configPath), { recursive: true });
    writeFileSync(configPath, JSON.stringify(DEFAULT_CONFIG, null, 4) + '\n');
    return { kind: 'template-created', path: configPath };
  }

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    if (error instanceof SyntaxError) {
      throw new ValidationError(
        `Error parsing configuration file ${configPath}: ${error.message}`
      );
    }
    throw error;
  }

  return { kind: 'loaded', path: configPath, settings: parseConfig(raw) };
}
