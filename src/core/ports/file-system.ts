/**
 * File System Port Interface
 *
 * The storage capabilities the core pipelines need. Core logic never touches
 * `fs` directly, so builds can run against an in-memory store.
 *
 * Implementations:
 *   - nodeFileSystem: the local disk via utils/fs
 *   - MemoryFileSystem (tests)
 */

export interface FileSystemPort {
  /** Read a file as UTF-8 text; rejects with NotFoundError when it does not exist */
  readFile(path: string): Promise<string>;

  fileExists(path: string): Promise<boolean>;

  /** Entry names directly under `path`, sorted */
  listDir(path: string): Promise<string[]>;

  /** Write a file, creating its parent directories */
  writeFile(path: string, content: string): Promise<void>;

  /** Copy a file, creating the destination's parent directories */
  copy(src: string, dest: string): Promise<void>;
}
