/**
 * History Store Interface
 *
 * Persistence for per-document undo history logs. Implementations throw
 * on I/O failure; a log that exists but does not parse is reported as a
 * PERSISTENCE_ERROR result so the caller can fall back to an empty history.
 */

import type { EditorError } from '../../core/errors.ts';
import type { Result } from '../../core/result.ts';
import type { HistoryOperation } from '../../core/undo.ts';
import type { HistoryLog } from './schema.ts';

export interface HistoryStore {
  /**
   * Load the log for a document, or null when there is none.
   */
  load(documentPath: string): Promise<Result<HistoryLog | null, EditorError>>;

  /**
   * Append operations to an existing log.
   */
  append(documentPath: string, operations: readonly HistoryOperation[]): Promise<void>;

  /**
   * Replace the whole log.
   */
  rewrite(documentPath: string, log: HistoryLog): Promise<void>;

  remove(documentPath: string): Promise<void>;
}
