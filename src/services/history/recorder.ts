/**
 * History Recorder
 *
 * Mirrors an UndoHistory into its persisted log. Operations are appended as
 * they happen; saves and evictions rewrite the log from the in-memory state.
 * Writes run one at a time through a promise queue so the log follows
 * commit order while editing continues. A failed write is reported and
 * never touches the in-memory history.
 */

import { EditorError } from '../../core/errors.ts';
import { UndoHistory, type HistoryEvent, type HistoryOperation, type UndoHistoryOptions } from '../../core/undo.ts';
import { debugLog } from '../../debug.ts';
import type { HistoryStore } from './interface.ts';
import { createHeader, type HistoryLog } from './schema.ts';
import type { Result } from '../../core/result.ts';

export type PersistenceErrorCallback = (error: EditorError) => void;

export interface LoadedHistory {
  history: UndoHistory;
  /** True when the history came from a valid log */
  restored: boolean;
  /**
   * True when the log still describes the history as returned, so a
   * recorder may append to it. Seeking to the saved point moves records
   * between the stacks without logging it; the log must then be rewritten.
   */
  inSync: boolean;
}

/**
 * Load a document's history. A missing log gives an empty history; so does
 * an unreadable or corrupt log, or one written against a different version
 * of the file on disk, and those cases are logged.
 */
export async function loadHistory(
  store: HistoryStore,
  documentPath: string,
  fileMtimeMs: number | null,
  options: UndoHistoryOptions = {}
): Promise<LoadedHistory> {
  const empty = (): LoadedHistory => ({ history: new UndoHistory(options), restored: false, inSync: false });

  let loaded: Result<HistoryLog | null, EditorError>;
  try {
    loaded = await store.load(documentPath);
  } catch (error) {
    debugLog(`[HistoryRecorder] Could not read history for ${documentPath}: ${error}`);
    return empty();
  }

  if (!loaded.ok) {
    debugLog(`[HistoryRecorder] Discarding history for ${documentPath}: ${loaded.error.message}`);
    return empty();
  }
  if (!loaded.value) return empty();

  const { header, operations } = loaded.value;
  if (header.fileMtimeMs !== fileMtimeMs) {
    debugLog(`[HistoryRecorder] Discarding history for ${documentPath}: file changed on disk`);
    return empty();
  }

  const history = UndoHistory.replay(operations, options);
  const depth = history.size();
  if (!history.seekSaved()) {
    debugLog(`[HistoryRecorder] Discarding history for ${documentPath}: no saved point`);
    return empty();
  }
  debugLog(`[HistoryRecorder] Restored ${history.size()} undo / ${history.redoSize()} redo records for ${documentPath}`);
  return { history, restored: true, inSync: history.size() === depth };
}

export class HistoryRecorder {
  private _debugName = 'HistoryRecorder';
  private queue: Promise<void> = Promise.resolve();
  private needsRewrite: boolean;
  private errorCallbacks = new Set<PersistenceErrorCallback>();
  private unsubscribe: () => void;

  /**
   * @param getFileMtimeMs - current modification time of the document file, written into log headers
   * @param inSync - whether the stored log already describes the history, so appends can extend it
   */
  constructor(
    private readonly store: HistoryStore,
    private readonly documentPath: string,
    private readonly history: UndoHistory,
    private readonly getFileMtimeMs: () => number | null,
    inSync: boolean = false
  ) {
    this.needsRewrite = !inSync;
    this.unsubscribe = history.onChange((event) => this.handle(event));
  }

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  onPersistenceError(callback: PersistenceErrorCallback): () => void {
    this.errorCallbacks.add(callback);
    return () => {
      this.errorCallbacks.delete(callback);
    };
  }

  /**
   * Rewrite the log from the in-memory history.
   */
  compact(): void {
    this.needsRewrite = false;
    const log = { header: createHeader(this.getFileMtimeMs()), operations: this.history.toOperations() };
    this.enqueue('rewrite', () => this.store.rewrite(this.documentPath, log));
  }

  /**
   * Resolves once every queued write has finished.
   */
  flush(): Promise<void> {
    return this.queue;
  }

  /**
   * Stop following the history.
   */
  dispose(): void {
    this.unsubscribe();
  }

  private handle(event: HistoryEvent): void {
    switch (event.type) {
      case 'saved':
      case 'evict':
        this.compact();
        return;
      case 'push':
      case 'undo':
      case 'redo':
      case 'unsaved': {
        if (this.needsRewrite) {
          this.compact();
          return;
        }
        const operation: HistoryOperation = event;
        this.enqueue('append', () => this.store.append(this.documentPath, [operation]));
        return;
      }
    }
  }

  private enqueue(label: string, task: () => Promise<void>): void {
    this.queue = this.queue.then(task).catch((error: unknown) => {
      // The log may now be partial; the next change rewrites it
      this.needsRewrite = true;
      const reason = error instanceof Error ? error.message : String(error);
      const failure = EditorError.persistence(this.documentPath, `${label} failed: ${reason}`);
      this.debugLog(failure.message);
      for (const callback of this.errorCallbacks) {
        callback(failure);
      }
    });
  }
}
