/**
 * File History Store
 *
 * Stores each document's history log under the history directory, at the
 * document's absolute path with a `.history` suffix.
 */

import { appendFile, mkdir, readFile, rm, writeFile } from 'fs/promises';
import { dirname, join, resolve } from 'path';
import { EditorError } from '../../core/errors.ts';
import { err, ok, type Result } from '../../core/result.ts';
import type { HistoryOperation } from '../../core/undo.ts';
import { debugLog } from '../../debug.ts';
import type { HistoryStore } from './interface.ts';
import { parseLog, serializeLog, serializeOperations, type HistoryLog } from './schema.ts';

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Path of the log for a document: `<dir>/<absolute path>.history`.
 */
export function historyPathFor(directory: string, documentPath: string): string {
  const absolute = resolve(documentPath).replace(/^([A-Za-z]):/, '$1');
  return join(directory, `${absolute}.history`);
}

export class FileHistoryStore implements HistoryStore {
  private _debugName = 'FileHistoryStore';

  constructor(private readonly directory: string) {}

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  pathFor(documentPath: string): string {
    return historyPathFor(this.directory, documentPath);
  }

  async load(documentPath: string): Promise<Result<HistoryLog | null, EditorError>> {
    const logPath = this.pathFor(documentPath);
    let text: string;
    try {
      text = await readFile(logPath, 'utf8');
    } catch (error) {
      if (isNotFound(error)) return ok(null);
      throw error;
    }
    const parsed = parseLog(text);
    if (!parsed.ok) {
      this.debugLog(`Rejected ${logPath}: ${parsed.error}`);
      return err(EditorError.persistence(logPath, parsed.error));
    }
    this.debugLog(`Loaded ${logPath} (${parsed.value.operations.length} operations)`);
    return ok(parsed.value);
  }

  async append(documentPath: string, operations: readonly HistoryOperation[]): Promise<void> {
    if (operations.length === 0) return;
    await appendFile(this.pathFor(documentPath), serializeOperations(operations), 'utf8');
  }

  async rewrite(documentPath: string, log: HistoryLog): Promise<void> {
    const logPath = this.pathFor(documentPath);
    await mkdir(dirname(logPath), { recursive: true });
    await writeFile(logPath, serializeLog(log), 'utf8');
    this.debugLog(`Compacted ${logPath} (${log.operations.length} operations)`);
  }

  async remove(documentPath: string): Promise<void> {
    await rm(this.pathFor(documentPath), { force: true });
  }
}
