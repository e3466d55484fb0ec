/**
 * Undo History
 *
 * Undo and redo stacks of committed edit records, bounded by entry count
 * and serialized size. Tracks which point in the history matches the file
 * on disk so the document's modified flag can follow undo and redo.
 */

import type { EditRecord } from './edit.ts';

// ============================================
// Types
// ============================================

/**
 * One step of the history's evolution. Replaying a sequence of these
 * against an empty history rebuilds it.
 */
export type HistoryOperation =
  | { type: 'push'; record: EditRecord }
  | { type: 'undo' }
  | { type: 'redo' }
  /** The current point matches the file on disk */
  | { type: 'saved' }
  /** No point in the history matches the file on disk */
  | { type: 'unsaved' };

export type HistoryEvent = HistoryOperation | { type: 'evict'; count: number };

export type HistoryListener = (event: HistoryEvent) => void;

export interface UndoHistoryOptions {
  maxEntries?: number;
  maxBytes?: number;
}

interface Entry {
  record: EditRecord;
  bytes: number;
}

export const DEFAULT_MAX_ENTRIES = 1000;
export const DEFAULT_MAX_BYTES = 8 * 1024 * 1024;

/**
 * Serialized size of a record, the unit maxBytes is measured in.
 */
export function recordSize(record: EditRecord): number {
  return JSON.stringify(record).length;
}

// ============================================
// UndoHistory
// ============================================

export class UndoHistory {
  private undoStack: Entry[] = [];
  private redoStack: Entry[] = [];
  private undoBytes = 0;
  /** Undo depth that matches the file on disk, or null when unreachable */
  private savedDepth: number | null = 0;
  private maxEntries: number;
  private maxBytes: number;
  private listeners = new Set<HistoryListener>();

  constructor(options: UndoHistoryOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? DEFAULT_MAX_ENTRIES);
    this.maxBytes = Math.max(1, options.maxBytes ?? DEFAULT_MAX_BYTES);
  }

  /**
   * Rebuild a history from its operation log.
   */
  static replay(operations: readonly HistoryOperation[], options: UndoHistoryOptions = {}): UndoHistory {
    const history = new UndoHistory(options);
    for (const op of operations) {
      history.applyOperation(op);
    }
    return history;
  }

  onChange(listener: HistoryListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  setLimits(options: UndoHistoryOptions): void {
    if (options.maxEntries !== undefined) this.maxEntries = Math.max(1, options.maxEntries);
    if (options.maxBytes !== undefined) this.maxBytes = Math.max(1, options.maxBytes);
    const evicted = this.evict();
    if (evicted > 0) this.emit({ type: 'evict', count: evicted });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Stack operations
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Record a committed edit. Clears the redo stack.
   */
  push(record: EditRecord): void {
    this.pushEntry(record);
    this.emit({ type: 'push', record });
    const evicted = this.evict();
    if (evicted > 0) this.emit({ type: 'evict', count: evicted });
  }

  /**
   * Move the latest record to the redo stack and return it for reverting.
   */
  undo(): EditRecord | null {
    const entry = this.undoEntry();
    if (entry) this.emit({ type: 'undo' });
    return entry?.record ?? null;
  }

  /**
   * Move the latest undone record back and return it for re-applying.
   */
  redo(): EditRecord | null {
    const entry = this.redoEntry();
    if (entry) this.emit({ type: 'redo' });
    return entry?.record ?? null;
  }

  /**
   * Put a record taken by undo() back on the undo stack, for when applying
   * it to the document failed.
   */
  cancelUndo(record: EditRecord): void {
    const top = this.redoStack[this.redoStack.length - 1];
    if (top?.record !== record) return;
    this.redoEntry();
    this.emit({ type: 'redo' });
  }

  /**
   * Put a record taken by redo() back on the redo stack.
   */
  cancelRedo(record: EditRecord): void {
    const top = this.undoStack[this.undoStack.length - 1];
    if (top?.record !== record) return;
    this.undoEntry();
    this.emit({ type: 'undo' });
  }

  canUndo(): boolean {
    return this.undoStack.length > 0;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  /**
   * Number of undoable records.
   */
  size(): number {
    return this.undoStack.length;
  }

  redoSize(): number {
    return this.redoStack.length;
  }

  byteSize(): number {
    return this.undoBytes;
  }

  clear(): void {
    const modified = this.isModified();
    this.undoStack = [];
    this.redoStack = [];
    this.undoBytes = 0;
    this.savedDepth = modified ? null : 0;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Saved point
  // ─────────────────────────────────────────────────────────────────────────

  markSaved(): void {
    this.savedDepth = this.undoStack.length;
    this.emit({ type: 'saved' });
  }

  isModified(): boolean {
    return this.savedDepth !== this.undoStack.length;
  }

  /**
   * True when the file on disk matches some point of the history.
   */
  hasSavedPoint(): boolean {
    return this.savedDepth !== null;
  }

  /**
   * Move records between the stacks, without touching any document, until
   * the current point is the saved one. Used after a replay so the history
   * lines up with the file just loaded. Returns false when there is no
   * saved point.
   */
  seekSaved(): boolean {
    if (this.savedDepth === null) return false;
    while (this.undoStack.length > this.savedDepth) {
      if (!this.undoEntry()) break;
    }
    while (this.undoStack.length < this.savedDepth) {
      if (!this.redoEntry()) break;
    }
    return this.undoStack.length === this.savedDepth;
  }

  /**
   * Operations that rebuild the current state, for compacting the log.
   */
  toOperations(): HistoryOperation[] {
    const chronological = [...this.undoStack, ...[...this.redoStack].reverse()];
    const operations: HistoryOperation[] = [];
    if (this.savedDepth === null) operations.push({ type: 'unsaved' });
    chronological.forEach((entry, index) => {
      operations.push({ type: 'push', record: entry.record });
      if (this.savedDepth === index + 1) operations.push({ type: 'saved' });
    });
    for (let i = 0; i < this.redoStack.length; i++) {
      operations.push({ type: 'undo' });
    }
    return operations;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private applyOperation(op: HistoryOperation): void {
    switch (op.type) {
      case 'push':
        this.pushEntry(op.record);
        this.evict();
        break;
      case 'undo':
        this.undoEntry();
        break;
      case 'redo':
        this.redoEntry();
        break;
      case 'saved':
        this.savedDepth = this.undoStack.length;
        break;
      case 'unsaved':
        this.savedDepth = null;
        break;
    }
  }

  private pushEntry(record: EditRecord): void {
    // A saved point that lived on the discarded redo branch is gone
    if (this.savedDepth !== null && this.savedDepth > this.undoStack.length) {
      this.savedDepth = null;
    }
    this.redoStack = [];
    const bytes = recordSize(record);
    this.undoStack.push({ record, bytes });
    this.undoBytes += bytes;
  }

  private undoEntry(): Entry | undefined {
    const entry = this.undoStack.pop();
    if (!entry) return undefined;
    this.undoBytes -= entry.bytes;
    this.redoStack.push(entry);
    return entry;
  }

  private redoEntry(): Entry | undefined {
    const entry = this.redoStack.pop();
    if (!entry) return undefined;
    this.undoStack.push(entry);
    this.undoBytes += entry.bytes;
    return entry;
  }

  /**
   * Drop the oldest undo entries until both limits hold. The newest entry
   * is always kept.
   */
  private evict(): number {
    let evicted = 0;
    while (this.undoStack.length > 1 && (this.undoStack.length > this.maxEntries || this.undoBytes > this.maxBytes)) {
      const entry = this.undoStack.shift();
      if (!entry) break;
      this.undoBytes -= entry.bytes;
      evicted++;
      if (this.savedDepth !== null) {
        this.savedDepth = this.savedDepth === 0 ? null : this.savedDepth - 1;
      }
    }
    return evicted;
  }

  private emit(event: HistoryEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
