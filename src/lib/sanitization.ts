import * as path from 'path';
import * as fs from 'fs';
import { homedir } from 'os';
import { logger } from './logger';

/**
 * Sanitization utilities for CLI and config-file input
 */

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * Validates numeric inputs
 */
export function sanitizeNumber(
  value: string | number,
  fieldName: string,
  min?: number,
  max?: number
): number {
  if (value === '') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const num = typeof value === 'number' ? value : Number(value.trim());

  if (!Number.isInteger(num)) {
    throw new ValidationError(`${fieldName} must be a valid number`);
  }

  if (min !== undefined && num < min) {
    throw new ValidationError(`${fieldName} must be at least ${min}`);
  }

  if (max !== undefined && num > max) {
    throw new ValidationError(`${fieldName} cannot exceed ${max}`);
  }

  return num;
}

export function sanitizePort(value: string | number | undefined): number {
  if (value === undefined || value === '') return 22;
  return sanitizeNumber(value, 'SSH port', 1, 65535);
}

/**
 * Expands a leading `~` to the home directory
 */
export function expandHomePath(filePath: string): string {
  if (filePath === '~' || filePath.startsWith('~/')) {
    return path.join(homedir(), filePath.slice(1));
  }
  return filePath;
}

/**
 * Validates and resolves file paths
 */
export function sanitizeFilePath(filePath: string, fieldName: string): string {
  if (!filePath || typeof filePath !== 'string') {
    throw new ValidationError(`${fieldName} is required`);
  }

  const trimmed = filePath.trim();

  if (trimmed.length === 0) {
    throw new ValidationError(`${fieldName} cannot be empty`);
  }

  if (trimmed.includes('\0')) {
    throw new ValidationError(`${fieldName} contains null bytes`);
  }

  const resolved = path.resolve(expandHomePath(trimmed));

  if (resolved.length > 500) {
    throw new ValidationError(`${fieldName} path is too long`);
  }

  return resolved;
}

/**
 * Validates SSH key file path and permissions
 */
export function sanitizeSSHKeyPath(keyPath: string): string {
  const sanitized = sanitizeFilePath(keyPath, 'SSH key path');

  let stats: fs.Stats;
  try {
    stats = fs.statSync(sanitized);
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new ValidationError(`SSH key file does not exist: ${sanitized}`);
    }
    throw new ValidationError(`Cannot access SSH key file: ${error}`);
  }

  if (!stats.isFile()) {
    throw new ValidationError('SSH key path must point to a file');
  }

  // Check file permissions (should not be world-readable)
  const mode = stats.mode & parseInt('777', 8);
  if (mode & parseInt('044', 8)) {
    logger.warn(
      'SSH key file is readable by others, consider changing permissions'
    );
  }

  return sanitized;
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string | undefined): string {
  if (!host || typeof host !== 'string') {
    throw new ValidationError('SSH host is required');
  }

  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  // Hostnames, IPv4 and bare IPv6 addresses
  const hostnameRegex = /^[a-zA-Z0-9.-]+$/;
  const ipv6Regex = /^[0-9a-fA-F:]+$/;

  const isIpv6 = trimmed.includes(':') && ipv6Regex.test(trimmed);

  if (!hostnameRegex.test(trimmed) && !isIpv6) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string | undefined): string {
  if (!username || typeof username !== 'string') {
    throw new ValidationError('SSH username is required');
  }

  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (trimmed.length > 64) {
    throw new ValidationError('SSH username cannot exceed 64 characters');
  }

  if (!/^[a-zA-Z0-9_][a-zA-Z0-9._@-]*$/.test(trimmed)) {
    throw new ValidationError('SSH username contains invalid characters');
  }

  if (trimmed === 'root') {
    logger.warn('Using root user for SSH connections is not recommended');
  }

  return trimmed;
}
