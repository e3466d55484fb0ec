/**
 * File Store Interface
 *
 * Byte-oriented storage the core reads documents from and writes them to.
 * Implementations throw on failure; callers turn failures into results.
 */

export interface FileStat {
  /** Last modification time in milliseconds since the epoch */
  mtimeMs: number;
  size: number;
}

export interface FileStore {
  readFile(path: string): Promise<string>;
  writeFile(path: string, content: string): Promise<void>;
  /** Stat a file, or null when it does not exist */
  stat(path: string): Promise<FileStat | null>;
}
