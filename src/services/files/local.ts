/**
 * Local File Store
 *
 * FileStore backed by the local file system.
 */

import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { FileStat, FileStore } from './interface.ts';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class LocalFileStore implements FileStore {
  async readFile(path: string): Promise<string> {
    return readFile(path, 'utf8');
  }

  async writeFile(path: string, content: string): Promise<void> {
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, content, 'utf8');
  }

  async stat(path: string): Promise<FileStat | null> {
    try {
      const info = await stat(path);
      return { mtimeMs: info.mtimeMs, size: info.size };
    } catch (error) {
      if (isNotFound(error)) return null;
      throw error;
    }
  }
}
