/**
 * In-Memory History Store
 *
 * Keeps serialized logs in a map. Logs go through the same codec as the
 * file store, so parse failures behave identically.
 */

import { EditorError } from '../../core/errors.ts';
import { err, ok, type Result } from '../../core/result.ts';
import type { HistoryOperation } from '../../core/undo.ts';
import type { HistoryStore } from './interface.ts';
import { parseLog, serializeLog, serializeOperations, type HistoryLog } from './schema.ts';

export class MemoryHistoryStore implements HistoryStore {
  private logs = new Map<string, string>();

  async load(documentPath: string): Promise<Result<HistoryLog | null, EditorError>> {
    const text = this.logs.get(documentPath);
    if (text === undefined) return ok(null);
    const parsed = parseLog(text);
    return parsed.ok ? ok(parsed.value) : err(EditorError.persistence(documentPath, parsed.error));
  }

  async append(documentPath: string, operations: readonly HistoryOperation[]): Promise<void> {
    this.logs.set(documentPath, (this.logs.get(documentPath) ?? '') + serializeOperations(operations));
  }

  async rewrite(documentPath: string, log: HistoryLog): Promise<void> {
    this.logs.set(documentPath, serializeLog(log));
  }

  async remove(documentPath: string): Promise<void> {
    this.logs.delete(documentPath);
  }

  /**
   * Raw log text, for inspection.
   */
  raw(documentPath: string): string | undefined {
    return this.logs.get(documentPath);
  }

  /**
   * Store raw text as a log.
   */
  setRaw(documentPath: string, text: string): void {
    this.logs.set(documentPath, text);
  }
}
