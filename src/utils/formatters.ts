import { relative, isAbsolute } from 'path';
import { normalizePathWithTilde } from './home-directory.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path for display to the user.
 *
 * - Uses tilde notation (~) for paths under the home directory
 * - Uses relative paths from cwd for paths in the working directory
 * - Falls back to the absolute path otherwise
 *
 * @example
 * formatPathForDisplay('/Users/user/.zshrc') // => '~/.zshrc'
 * formatPathForDisplay('/work/build/.zshrc', '/work') // => 'build/.zshrc'
 */
export function formatPathForDisplay(path: string, cwd: string = process.cwd()): string {
  if (path.startsWith('~') || !isAbsolute(path)) {
    return path;
  }

  const relativePath = relative(cwd, path);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  return normalizePathWithTilde(path);
}

/**
 * RFC 3339 timestamp in UTC without fractional seconds, used in generated headers.
 */
export function formatTimestamp(date: Date): string {
  return date.toISOString().replace(/\.\d{3}Z$/, 'Z');
}

/**
 * Compact local timestamp for backup file names (YYYYMMDD-HHMMSS).
 */
export function formatBackupTimestamp(date: Date): string {
  const pad = (value: number): string => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}` +
    `-${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Format tree connector symbols
 */
export function getTreeConnector(isLast: boolean): string {
  return isLast ? '└── ' : '├── ';
}

/**
 * Format tree prefix for nested items
 */
export function getTreePrefix(prefix: string, isLast: boolean): string {
  return prefix + (isLast ? '    ' : '│   ');
}

/**
 * Format a count with a singular or plural noun
 */
export function formatCount(count: number, noun: string): string {
  return `${count} ${count === 1 ? noun : `${noun}s`}`;
}
