import * as os from 'os';
import * as path from 'path';
import { ValidationError } from './errors';

/**
 * Sanitization utilities for CLI and config input validation
 */

/**
 * Validates pipeline names passed with --name
 */
export function sanitizePipelineName(name: string): string {
  if (!name || typeof name !== 'string') {
    throw new ValidationError('Pipeline name is required and must be a string');
  }

  const trimmed = name.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('Pipeline name cannot be empty');
  }

  if (trimmed === 'remote_config') {
    throw new ValidationError("'remote_config' is not a pipeline name");
  }

  return trimmed;
}

/**
 * Validates local file paths and resolves them against the working directory
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

  return path.resolve(expandHome(trimmed));
}

/**
 * Validates SSH hostnames/IPs
 */
export function sanitizeSSHHost(host: string): string {
  const trimmed = host.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH host cannot be empty');
  }

  if (trimmed.length > 253) {
    throw new ValidationError('SSH host name is too long');
  }

  // hostnames, IPv4 and IPv6 literals
  if (!/^[a-zA-Z0-9.:_-]+$/.test(trimmed)) {
    throw new ValidationError(
      'SSH host must be a valid hostname or IP address'
    );
  }

  return trimmed;
}

/**
 * Validates SSH usernames
 */
export function sanitizeSSHUsername(username: string): string {
  const trimmed = username.trim();

  if (trimmed.length === 0) {
    throw new ValidationError('SSH username cannot be empty');
  }

  if (/[\s\x00-\x1F\x7F@]/.test(trimmed)) {
    throw new ValidationError(
      'SSH username cannot contain whitespace, control characters or "@"'
    );
  }

  return trimmed;
}

/**
 * Validates SSH ports
 */
export function sanitizePort(value: unknown): number {
  if (typeof value !== 'number' || !Number.isInteger(value)) {
    throw new ValidationError('SSH port must be an integer');
  }

  if (value < 1 || value > 65535) {
    throw new ValidationError('SSH port must be between 1 and 65535');
  }

  return value;
}

/**
 * Replaces a leading "~" with the home directory
 */
export function expandHome(filePath: string): string {
  if (filePath === '~') {
    return os.homedir();
  }
  if (filePath.startsWith('~/')) {
    return path.join(os.homedir(), filePath.slice(2));
  }
  return filePath;
}
