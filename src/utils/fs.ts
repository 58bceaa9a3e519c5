import { promises as fs, constants as fsConstants } from 'fs';
import { dirname } from 'path';
import { isJunk } from 'junk';
import { logger } from './logger.js';
import { FileSystemError, NotFoundError } from './errors.js';

/**
 * File system utilities with proper error handling
 */

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Check if a file or directory exists
 */
export async function exists(path: string): Promise<boolean> {
  try {
    await fs.access(path, fsConstants.F_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Recursively create directories
 */
export async function ensureDir(path: string): Promise<void> {
  try {
    await fs.mkdir(path, { recursive: true });
    logger.debug(`Directory located or created: ${path}`);
  } catch (error) {
    throw new FileSystemError('create directory', path, error);
  }
}

/**
 * Read a file as text. A missing file is a NotFoundError, anything else a FileSystemError.
 */
export async function readTextFile(path: string, encoding: BufferEncoding = 'utf8'): Promise<string> {
  try {
    return await fs.readFile(path, encoding);
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new NotFoundError('file', path);
    }
    throw new FileSystemError('read file', path, error);
  }
}

/**
 * Write text to a file, creating parent directories
 */
export async function writeTextFile(path: string, content: string, encoding: BufferEncoding = 'utf8'): Promise<void> {
  await ensureDir(dirname(path));
  try {
    await fs.writeFile(path, content, encoding);
    logger.debug(`Wrote file: ${path}`);
  } catch (error) {
    throw new FileSystemError('write file', path, error);
  }
}

/**
 * Copy a file from source to destination
 */
export async function copyFile(src: string, dest: string): Promise<void> {
  await ensureDir(dirname(dest));
  try {
    await fs.copyFile(src, dest);
    logger.debug(`Copied file: ${src} -> ${dest}`);
  } catch (error) {
    if (errorCode(error) === 'ENOENT' && !(await exists(src))) {
      throw new NotFoundError('file', src);
    }
    throw new FileSystemError('copy file to', dest, error);
  }
}

/**
 * List entries in a directory (non-recursive), ignoring junk files like .DS_Store
 */
export async function listEntries(dirPath: string): Promise<string[]> {
  try {
    const entries = await fs.readdir(dirPath);
    return entries.filter(entry => !isJunk(entry)).sort();
  } catch (error) {
    if (errorCode(error) === 'ENOENT') {
      throw new NotFoundError('directory', dirPath);
    }
    throw new FileSystemError('list directory', dirPath, error);
  }
}
