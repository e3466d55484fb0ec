/**
 * Editor Session
 *
 * Owns one document together with its selection, cursors, undo history and
 * find state, and wires them together for the event layer:
 *   - committed edits flow from the Edit Engine into the undo history
 *   - the history's saved point drives the document's modified flag
 *   - the history is persisted per document through a HistoryRecorder
 *   - settings changes are pushed into the components that use them
 */

import type { Position, Range } from '../core/buffer.ts';
import { MemoryClipboard, type Clipboard } from '../core/clipboard.ts';
import { MultiCursorSet } from '../core/cursor.ts';
import { Document } from '../core/document.ts';
import { EditEngine } from '../core/edit-engine.ts';
import type { EditRecord } from '../core/edit.ts';
import type { EditorError } from '../core/errors.ts';
import { Navigator, type Motion } from '../core/navigation.ts';
import { ok, type Result } from '../core/result.ts';
import { SelectionModel } from '../core/selection.ts';
import { UndoHistory } from '../core/undo.ts';
import { CoordinateMapper } from '../core/wrap.ts';
import { Settings } from '../config/settings.ts';
import { debugLog } from '../debug.ts';
import { FindEngine, type HitInfo, type NavigationResult } from '../features/search/in-file-search.ts';
import type { SearchMode } from '../features/search/pattern.ts';
import type { FileStore } from '../services/files/interface.ts';
import { LocalFileStore } from '../services/files/local.ts';
import type { HistoryStore } from '../services/history/interface.ts';
import { FileHistoryStore } from '../services/history/local.ts';
import { HistoryRecorder, loadHistory, type PersistenceErrorCallback } from '../services/history/recorder.ts';

export interface EditorSessionOptions {
  fileStore?: FileStore;
  /** Where undo history is persisted; defaults to the history directory setting */
  historyStore?: HistoryStore;
  clipboard?: Clipboard;
  settings?: Settings;
}

interface Resolved {
  fileStore: FileStore;
  historyStore: HistoryStore | null;
  clipboard: Clipboard;
  settings: Settings;
}

function resolveOptions(options: EditorSessionOptions): Resolved {
  const settings = options.settings ?? new Settings();
  const historyStore = settings.get('history.enabled')
    ? (options.historyStore ?? new FileHistoryStore(settings.resolvePath(settings.get('history.directory'))))
    : null;
  return {
    fileStore: options.fileStore ?? new LocalFileStore(),
    historyStore,
    clipboard: options.clipboard ?? new MemoryClipboard(),
    settings,
  };
}

export class EditorSession {
  private _debugName = 'EditorSession';
  readonly document: Document;
  readonly selection = new SelectionModel();
  readonly cursors = new MultiCursorSet();
  readonly mapper: CoordinateMapper;
  readonly navigator: Navigator;
  readonly engine: EditEngine;
  readonly find: FindEngine;
  readonly settings: Settings;
  private _history: UndoHistory;
  private recorder: HistoryRecorder | null = null;
  private searchActive = false;
  private readonly fileStore: FileStore;
  private readonly historyStore: HistoryStore | null;
  private persistenceCallbacks = new Set<PersistenceErrorCallback>();
  private disposers: Array<() => void> = [];

  private constructor(document: Document, resolved: Resolved, history: UndoHistory) {
    this.document = document;
    this.settings = resolved.settings;
    this.fileStore = resolved.fileStore;
    this.historyStore = resolved.historyStore;
    this._history = history;

    this.mapper = new CoordinateMapper(
      document.buffer,
      this.settings.get('editor.wrapBreak'),
      this.settings.get('editor.tabSize')
    );
    this.navigator = new Navigator(document.buffer, this.cursors, this.selection, this.mapper);
    this.engine = new EditEngine(document, this.selection, this.cursors, resolved.clipboard, {
      tabSize: this.settings.get('editor.tabSize'),
    });
    this.find = new FindEngine({
      mode: this.settings.get('search.defaultMode'),
      caseSensitive: this.settings.get('search.caseSensitive'),
      historySize: this.settings.get('search.historySize'),
    });

    this.disposers.push(
      this.engine.onCommit((record) => this.handleCommit(record)),
      this.settings.onChange('editor.tabSize', (size) => {
        this.engine.setTabSize(size);
        this.mapper.setTabSize(size);
      }),
      this.settings.onChange('editor.wrapBreak', (mode) => this.mapper.setBreakMode(mode)),
      this.settings.onChange('history.maxEntries', (maxEntries) => this._history.setLimits({ maxEntries })),
      this.settings.onChange('history.maxBytes', (maxBytes) => this._history.setLimits({ maxBytes })),
      this.settings.onChange('search.defaultMode', (mode) => this.find.setDefaults({ mode })),
      this.settings.onChange('search.caseSensitive', (caseSensitive) => this.find.setDefaults({ caseSensitive })),
      this.settings.onChange('search.historySize', (historySize) => this.find.setDefaults({ historySize }))
    );
  }

  /**
   * Session over an unsaved, untitled document.
   */
  static create(content: string = '', options: EditorSessionOptions = {}): EditorSession {
    const resolved = resolveOptions(options);
    return new EditorSession(new Document(content), resolved, EditorSession.newHistory(resolved.settings));
  }

  /**
   * Open a file and restore its undo history when the log still matches it.
   */
  static async open(filePath: string, options: EditorSessionOptions = {}): Promise<Result<EditorSession, EditorError>> {
    const resolved = resolveOptions(options);
    const opened = await Document.open(filePath, resolved.fileStore);
    if (!opened.ok) return opened;
    const document = opened.value;

    if (!resolved.historyStore) {
      return ok(new EditorSession(document, resolved, EditorSession.newHistory(resolved.settings)));
    }

    const loaded = await loadHistory(resolved.historyStore, filePath, document.diskMtimeMs, {
      maxEntries: resolved.settings.get('history.maxEntries'),
      maxBytes: resolved.settings.get('history.maxBytes'),
    });
    const session = new EditorSession(document, resolved, loaded.history);
    session.attachRecorder(filePath, loaded.inSync);
    return ok(session);
  }

  private static newHistory(settings: Settings): UndoHistory {
    return new UndoHistory({
      maxEntries: settings.get('history.maxEntries'),
      maxBytes: settings.get('history.maxBytes'),
    });
  }

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  get history(): UndoHistory {
    return this._history;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Persistence
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Report history write failures. The in-memory history is unaffected.
   */
  onPersistenceError(callback: PersistenceErrorCallback): () => void {
    this.persistenceCallbacks.add(callback);
    return () => {
      this.persistenceCallbacks.delete(callback);
    };
  }

  /**
   * @param inSync - the stored log matches the history, so changes can be appended
   */
  private attachRecorder(documentPath: string, inSync: boolean): void {
    this.recorder?.dispose();
    if (!this.historyStore) return;
    const recorder = new HistoryRecorder(
      this.historyStore,
      documentPath,
      this._history,
      () => this.document.diskMtimeMs,
      inSync
    );
    recorder.onPersistenceError((error) => {
      for (const callback of this.persistenceCallbacks) {
        callback(error);
      }
    });
    this.recorder = recorder;
  }

  /**
   * Save the document (optionally under a new path) and mark the history's
   * saved point. A failed save keeps the content and the modified flag.
   */
  async save(filePath?: string): Promise<Result<void, EditorError>> {
    const previousPath = this.document.filePath;
    const result = await this.document.save(this.fileStore, filePath);
    if (!result.ok) return result;

    const savedPath = this.document.filePath;
    if (savedPath && (savedPath !== previousPath || !this.recorder)) {
      this.attachRecorder(savedPath, false);
    }
    this._history.markSaved();
    this.document.setModified(false);
    this.debugLog(`Saved ${savedPath ?? ''}`);
    return ok(undefined);
  }

  /**
   * Resolves once every pending history write has finished.
   */
  async flush(): Promise<void> {
    await this.recorder?.flush();
  }

  /**
   * Stop listening to settings and history, and wait for pending writes.
   */
  async close(): Promise<void> {
    for (const dispose of this.disposers) dispose();
    this.disposers = [];
    await this.flush();
    this.recorder?.dispose();
    this.recorder = null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Undo / Redo
  // ─────────────────────────────────────────────────────────────────────────

  private handleCommit(record: EditRecord): void {
    this._history.push(record);
    this.document.setModified(this._history.isModified());
    this.refreshSearch();
  }

  /**
   * Revert the latest record. Returns false when there is nothing to undo.
   */
  undo(): Result<boolean, EditorError> {
    const record = this._history.undo();
    if (!record) return ok(false);
    const result = this.engine.applyUndo(record);
    if (!result.ok) {
      this._history.cancelUndo(record);
      return result;
    }
    this.document.setModified(this._history.isModified());
    this.refreshSearch();
    return ok(true);
  }

  /**
   * Re-apply the latest undone record. Returns false when there is nothing to redo.
   */
  redo(): Result<boolean, EditorError> {
    const record = this._history.redo();
    if (!record) return ok(false);
    const result = this.engine.applyRedo(record);
    if (!result.ok) {
      this._history.cancelRedo(record);
      return result;
    }
    this.document.setModified(this._history.isModified());
    this.refreshSearch();
    return ok(true);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Wrap width for a viewport: 0 when wrapping is off, else the configured
   * column or the viewport width.
   */
  wrapWidth(viewportWidth: number): number {
    if (!this.settings.get('editor.wordWrap')) return 0;
    const column = this.settings.get('editor.wordWrapColumn');
    return column > 0 ? Math.min(column, viewportWidth) : viewportWidth;
  }

  move(motion: Motion, extend: boolean = false, viewportWidth: number = 0): Position {
    return this.navigator.move(motion, { extend, wrapWidth: this.wrapWidth(viewportWidth) });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Search
  // ─────────────────────────────────────────────────────────────────────────

  isSearchActive(): boolean {
    return this.searchActive;
  }

  /**
   * Enter search mode. A non-empty line selection becomes the search scope.
   */
  enterSearch(): void {
    this.find.reset();
    const range: Range | null = this.selection.hasContent() ? this.selection.normalizedRange() : null;
    this.find.setScope(range);
    this.searchActive = true;
  }

  exitSearch(): void {
    this.find.reset();
    this.searchActive = false;
  }

  /**
   * Update the pattern and recompute matches. Returns the pattern error, if any.
   */
  setSearchPattern(pattern: string): Result<number, EditorError> {
    this.find.setPattern(pattern);
    return this.recount();
  }

  setSearchMode(mode: SearchMode): Result<number, EditorError> {
    this.find.setMode(mode);
    return this.recount();
  }

  setSearchCaseSensitive(caseSensitive: boolean): Result<number, EditorError> {
    this.find.setCaseSensitive(caseSensitive);
    return this.recount();
  }

  /**
   * Confine matches to a range, or search the whole document with null.
   */
  setSearchScope(scope: Range | null): Result<number, EditorError> {
    this.find.setScope(scope);
    return this.recount();
  }

  private recount(): Result<number, EditorError> {
    const result = this.find.refresh(this.document.buffer);
    return result.ok ? ok(result.value.length) : result;
  }

  findNext(): NavigationResult | null {
    return this.goTo(this.find.next(this.cursors.primary()));
  }

  findPrevious(): NavigationResult | null {
    return this.goTo(this.find.previous(this.cursors.primary()));
  }

  hitInfo(): HitInfo {
    return this.find.hitInfo(this.cursors.primary());
  }

  replaceCurrent(template: string): Result<EditRecord | null, EditorError> {
    return this.find.replaceCurrent(template, this.engine, this.document.buffer);
  }

  replaceAll(template: string): Result<number, EditorError> {
    const result = this.find.replaceAll(template, this.engine, this.document.buffer);
    return result.ok ? ok(result.value.count) : result;
  }

  private goTo(result: NavigationResult | null): NavigationResult | null {
    if (!result) return null;
    this.find.addToHistory(this.find.getState().pattern);
    this.selection.clearSelection();
    this.cursors.set(result.match.range.start);
    return result;
  }

  private refreshSearch(): void {
    if (!this.searchActive) return;
    const result = this.find.refresh(this.document.buffer);
    if (!result.ok) this.debugLog(`Search refresh failed: ${result.error.message}`);
  }
}
