/**
 * Node File System Adapter
 *
 * Default FileSystemPort backed by the local disk.
 */

import type { FileSystemPort } from './file-system.js';
import { copyFile, exists, listEntries, readTextFile, writeTextFile } from '../../utils/fs.js';

export const nodeFileSystem: FileSystemPort = {
  readFile(path: string): Promise<string> {
    return readTextFile(path);
  },

  fileExists(path: string): Promise<boolean> {
    return exists(path);
  },

  listDir(path: string): Promise<string[]> {
    return listEntries(path);
  },

  writeFile(path: string, content: string): Promise<void> {
    return writeTextFile(path, content);
  },

  copy(src: string, dest: string): Promise<void> {
    return copyFile(src, dest);
  },
};
