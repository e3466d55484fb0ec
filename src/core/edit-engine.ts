/**
 * Edit Engine
 *
 * The only component that mutates a Document. Every operation runs as a
 * transaction: primitives are applied in descending document order across
 * cursors or block rows, positions of every other cursor are transformed
 * after each primitive, and a failure rolls the buffer and cursor state
 * back. A committed transaction becomes one EditRecord handed to the
 * commit listeners (the undo history).
 */

import {
  clonePosition,
  comparePositions,
  isEmptyRange,
  normalizeNewlines,
  normalizeRange,
  type Position,
  type Range,
  type TextBuffer,
} from './buffer.ts';
import { charAtColumn, charLength, isWordChar } from './chars.ts';
import { clipRows, type Clip, type Clipboard } from './clipboard.ts';
import type { MultiCursorSet } from './cursor.ts';
import type { Document } from './document.ts';
import {
  applyEdit,
  applyPrimitive,
  changeOf,
  insertionEdit,
  invertEdit,
  rollback,
  transformPosition,
  type CursorState,
  type Edit,
  type EditRecord,
  type PrimitiveEdit,
} from './edit.ts';
import { EditorError } from './errors.ts';
import { err, ok, type Result } from './result.ts';
import {
  blockBounds,
  blockSpans,
  cloneSelection,
  extractText,
  type BlockSpan,
  type SelectionModel,
} from './selection.ts';
import { debugLog } from '../debug.ts';

export interface EditEngineOptions {
  /** Spaces inserted by insertTab */
  tabSize?: number;
}

/**
 * One replacement for replaceRanges.
 */
export interface RangeChange {
  range: Range;
  text: string;
}

export type CommitCallback = (record: EditRecord) => void;
export type Unsubscribe = () => void;

type StepResult = Result<Position, EditorError>;

// ============================================
// Transaction
// ============================================

/**
 * Primitives applied so far plus the positions that must follow them.
 */
class Transaction {
  readonly applied: PrimitiveEdit[] = [];
  private tracked: Position[] = [];

  constructor(readonly buffer: TextBuffer) {}

  /**
   * Start tracking a position. The returned object is updated in place
   * after every applied primitive.
   */
  track(pos: Position): Position {
    const handle = clonePosition(pos);
    this.tracked.push(handle);
    return handle;
  }

  apply(edit: PrimitiveEdit): StepResult {
    const result = applyPrimitive(this.buffer, edit);
    if (!result.ok) return result;
    this.applied.push(edit);
    const change = changeOf(edit);
    for (const handle of this.tracked) {
      Object.assign(handle, transformPosition(handle, change));
    }
    return result;
  }

  /**
   * Delete a range, recording the text it held. Returns the range start.
   */
  deleteRange(range: Range): StepResult {
    const normalized = normalizeRange(range);
    if (isEmptyRange(normalized)) return ok(clonePosition(normalized.start));
    const text = this.buffer.getText(normalized);
    if (!text.ok) return text;
    return this.apply({ kind: 'deleteRange', range: normalized, text: text.value });
  }
}

// ============================================
// EditEngine
// ============================================

export class EditEngine {
  private _debugName = 'EditEngine';
  private tabSize: number;
  private commitCallbacks = new Set<CommitCallback>();

  constructor(
    private readonly document: Document,
    private readonly selection: SelectionModel,
    private readonly cursors: MultiCursorSet,
    private readonly clipboard: Clipboard,
    options: EditEngineOptions = {}
  ) {
    this.tabSize = options.tabSize ?? 4;
  }

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  private get buffer(): TextBuffer {
    return this.document.buffer;
  }

  setTabSize(size: number): void {
    this.tabSize = Math.max(1, Math.floor(size));
  }

  getTabSize(): number {
    return this.tabSize;
  }

  /**
   * Register a listener for committed records.
   */
  onCommit(callback: CommitCallback): Unsubscribe {
    this.commitCallbacks.add(callback);
    return () => {
      this.commitCallbacks.delete(callback);
    };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Typing
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Insert text at every cursor, or on every row of a block selection.
   * A non-empty line selection is replaced.
   */
  insertText(input: string): Result<EditRecord | null, EditorError> {
    const text = normalizeNewlines(input);
    if (text.length === 0) return ok(null);
    return this.run((tx) => this.insertInto(tx, text));
  }

  /**
   * Insert tabSize spaces at every cursor or block row.
   */
  insertTab(): Result<EditRecord | null, EditorError> {
    return this.insertText(' '.repeat(this.tabSize));
  }

  /**
   * Break the line at a position, or at every cursor when none is given.
   */
  splitLine(pos?: Position): Result<EditRecord | null, EditorError> {
    return this.run((tx) => {
      if (pos) {
        this.selection.clearSelection();
        this.cursors.set(this.buffer.clampPosition(pos));
      }
      return this.insertInto(tx, '\n');
    });
  }

  /**
   * Join a line with the one below it. The last line has nothing to join.
   */
  joinLine(lineIndex: number): Result<EditRecord | null, EditorError> {
    if (lineIndex < 0 || lineIndex >= this.buffer.lineCount() - 1) return ok(null);
    return this.run((tx) => {
      const primary = this.cursors.primaryIndexOf();
      const handles = this.cursors.all().map((pos) => tx.track(pos));
      const result = tx.apply({ kind: 'joinLine', line: lineIndex, column: this.buffer.lineLength(lineIndex) });
      if (!result.ok) return result;
      this.selection.clearSelection();
      this.cursors.setAll(handles, primary);
      return ok(undefined);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Deletion
  // ─────────────────────────────────────────────────────────────────────────

  deleteBackward(): Result<EditRecord | null, EditorError> {
    return this.run((tx) => this.deleteInto(tx, 'backward'));
  }

  deleteForward(): Result<EditRecord | null, EditorError> {
    return this.run((tx) => this.deleteInto(tx, 'forward'));
  }

  /**
   * Delete back to the previous word boundary at every cursor.
   */
  deleteWordBackward(): Result<EditRecord | null, EditorError> {
    if (this.selection.kind() !== 'none' && (this.selection.hasContent() || this.selection.kind() === 'block')) {
      return this.deleteBackward();
    }
    return this.run((tx) => this.deleteWordRanges(tx, 'backward'));
  }

  /**
   * Delete forward to the next word boundary at every cursor.
   */
  deleteWordForward(): Result<EditRecord | null, EditorError> {
    if (this.selection.kind() !== 'none' && (this.selection.hasContent() || this.selection.kind() === 'block')) {
      return this.deleteForward();
    }
    return this.run((tx) => this.deleteWordRanges(tx, 'forward'));
  }

  /**
   * Word ranges are taken against the document before any deletion, then
   * overlapping or touching ranges are merged and deleted highest first.
   * At a line edge the range crosses the line break.
   */
  private deleteWordRanges(tx: Transaction, direction: 'backward' | 'forward'): Result<void, EditorError> {
    this.selection.clearSelection();
    const primary = this.cursors.primaryIndexOf();
    const positions = this.cursors.all();
    const ranges = positions.map((pos) => this.wordRangeAt(pos, direction)).sort((a, b) => comparePositions(a.start, b.start));

    const merged: Range[] = [];
    for (const range of ranges) {
      const last = merged[merged.length - 1];
      if (last && comparePositions(range.start, last.end) <= 0) {
        if (comparePositions(range.end, last.end) > 0) last.end = clonePosition(range.end);
      } else {
        merged.push({ start: clonePosition(range.start), end: clonePosition(range.end) });
      }
    }

    const handles = positions.map((pos) => tx.track(pos));
    for (let i = merged.length - 1; i >= 0; i--) {
      const range = merged[i];
      if (!range) continue;
      const result = tx.deleteRange(range);
      if (!result.ok) return result;
    }
    this.cursors.setAll(handles, primary);
    return ok(undefined);
  }

  private wordRangeAt(pos: Position, direction: 'backward' | 'forward'): Range {
    const text = this.buffer.line(pos.line);
    if (direction === 'backward') {
      if (pos.column > 0) return { start: { line: pos.line, column: wordBoundaryBackward(text, pos.column) }, end: pos };
      if (pos.line === 0) return { start: pos, end: pos };
      return { start: { line: pos.line - 1, column: this.buffer.lineLength(pos.line - 1) }, end: pos };
    }
    const length = this.buffer.lineLength(pos.line);
    if (pos.column < length) return { start: pos, end: { line: pos.line, column: wordBoundaryForward(text, pos.column) } };
    if (pos.line >= this.buffer.lineCount() - 1) return { start: pos, end: pos };
    return { start: pos, end: { line: pos.line + 1, column: 0 } };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Clipboard
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Copy the selection. Without a selection nothing is copied.
   */
  copy(): Clip | null {
    const clip = this.selectionClip();
    if (clip) {
      this.clipboard.write(clip);
      this.debugLog(`Copied ${clip.kind} clip (${clip.text.length} chars)`);
    }
    return clip;
  }

  /**
   * Cut the selection, or the primary cursor's whole line when nothing is
   * selected.
   */
  cut(): Result<EditRecord | null, EditorError> {
    const clip = this.selectionClip();
    if (clip) {
      this.clipboard.write(clip);
      return this.run((tx) => this.deleteSelection(tx));
    }
    if (this.selection.isZeroWidthBlock()) return ok(null);

    const line = this.cursors.primary().line;
    this.clipboard.write({ text: `${this.buffer.line(line)}\n`, kind: 'text' });
    return this.run((tx) => {
      this.selection.clearSelection();
      const last = this.buffer.lineCount() - 1;
      let range: Range;
      if (line < last) {
        range = { start: { line, column: 0 }, end: { line: line + 1, column: 0 } };
      } else if (line > 0) {
        range = {
          start: { line: line - 1, column: this.buffer.lineLength(line - 1) },
          end: { line, column: this.buffer.lineLength(line) },
        };
      } else {
        range = { start: { line, column: 0 }, end: { line, column: this.buffer.lineLength(line) } };
      }
      const result = tx.deleteRange(range);
      if (!result.ok) return result;
      this.cursors.set(this.buffer.clampPosition({ line: Math.min(line, this.buffer.lineCount() - 1), column: 0 }));
      return ok(undefined);
    });
  }

  /**
   * Paste the clipboard as one undo unit. A block clip whose row count
   * matches the cursors (or the block's rows) puts one row at each.
   */
  paste(): Result<EditRecord | null, EditorError> {
    const clip = this.clipboard.read();
    if (!clip || clip.text.length === 0) return ok(null);
    const text = normalizeNewlines(clip.text);

    return this.run((tx) => {
      const rows = clipRows({ text, kind: clip.kind });
      if (clip.kind === 'block' && rows.length > 1) {
        const current = this.selection.current();
        if (current.kind === 'block') {
          const { rows: bounds } = blockBounds(current.anchor, current.active);
          if (bounds.last - bounds.first + 1 === rows.length) {
            const deleted = this.deleteSelection(tx);
            if (!deleted.ok) return deleted;
            return this.insertRowsAtCursors(tx, rows);
          }
        } else if (current.kind === 'none' && this.cursors.count() === rows.length) {
          return this.insertRowsAtCursors(tx, rows);
        }
      }
      return this.insertInto(tx, text);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Moving text
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Move the selected text to `dest` as one undo unit, or copy it there with
   * `copy`. Positions are in the document before the move. A destination
   * inside the selection does nothing. The cursor ends after the placed text.
   */
  moveSelection(dest: Position, options: { copy?: boolean } = {}): Result<EditRecord | null, EditorError> {
    const current = this.selection.current();
    if (current.kind !== 'line') return ok(null);
    const range = normalizeRange({
      start: this.buffer.clampPosition(current.anchor),
      end: this.buffer.clampPosition(current.active),
    });
    const target = this.buffer.clampPosition(dest);
    if (isEmptyRange(range) || this.selection.contains(target)) return ok(null);
    const text = this.buffer.getText(range);
    if (!text.ok) return text;

    return this.run((tx) => {
      this.selection.clearSelection();
      const at = tx.track(target);
      if (!options.copy) {
        const deleted = tx.deleteRange(range);
        if (!deleted.ok) return deleted;
      }
      const inserted = tx.apply(insertionEdit(clonePosition(at), text.value));
      if (!inserted.ok) return inserted;
      this.cursors.set(inserted.value);
      this.debugLog(`${options.copy ? 'Copied' : 'Moved'} selection to ${target.line}:${target.column}`);
      return ok(undefined);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Bulk replacement
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Apply non-overlapping replacements as one undo unit. The cursor ends at
   * the end of the first replacement in document order.
   */
  replaceRanges(changes: readonly RangeChange[]): Result<EditRecord | null, EditorError> {
    if (changes.length === 0) return ok(null);
    const sorted = changes
      .map((change) => ({ range: normalizeRange(change.range), text: normalizeNewlines(change.text) }))
      .sort((a, b) => comparePositions(a.range.start, b.range.start));

    for (let i = 0; i < sorted.length; i++) {
      const change = sorted[i];
      if (!change) continue;
      if (!this.buffer.isValidPosition(change.range.start) || !this.buffer.isValidPosition(change.range.end)) {
        return err(EditorError.outOfBounds(`replace range at ${change.range.start.line}:${change.range.start.column}`, change.range));
      }
      const next = sorted[i + 1];
      if (next && comparePositions(change.range.end, next.range.start) > 0) {
        return err(EditorError.outOfBounds('overlapping replacement ranges', [change.range, next.range]));
      }
    }

    return this.run((tx) => {
      let cursor: Position = clonePosition(sorted[0]?.range.start ?? { line: 0, column: 0 });
      for (let i = sorted.length - 1; i >= 0; i--) {
        const change = sorted[i];
        if (!change) continue;
        const deleted = tx.deleteRange(change.range);
        if (!deleted.ok) return deleted;
        let end = deleted.value;
        if (change.text.length > 0) {
          const inserted = tx.apply(insertionEdit(deleted.value, change.text));
          if (!inserted.ok) return inserted;
          end = inserted.value;
        }
        cursor = end;
      }
      this.selection.clearSelection();
      this.cursors.set(cursor);
      this.debugLog(`Replaced ${sorted.length} ranges`);
      return ok(undefined);
    });
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Undo / redo application
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Revert a record and restore the cursor state from before it.
   */
  applyUndo(record: EditRecord): Result<void, EditorError> {
    return this.applyRecordEdit(invertEdit(record.edit), record.before);
  }

  /**
   * Re-apply a record and restore the cursor state from after it.
   */
  applyRedo(record: EditRecord): Result<void, EditorError> {
    return this.applyRecordEdit(record.edit, record.after);
  }

  private applyRecordEdit(edit: Edit, state: CursorState): Result<void, EditorError> {
    const result = applyEdit(this.buffer, edit);
    if (!result.ok) {
      this.debugLog(`History edit rejected: ${result.error.message}`);
      return result;
    }
    this.restoreState(state);
    this.document.setModified(true);
    return ok(undefined);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Transactions
  // ─────────────────────────────────────────────────────────────────────────

  captureState(): CursorState {
    return { cursors: this.cursors.snapshot(), selection: this.selection.current() };
  }

  restoreState(state: CursorState): void {
    this.cursors.restore(state.cursors);
    this.cursors.clampTo(this.buffer);
    this.selection.set(cloneSelection(state.selection));
  }

  private run(mutator: (tx: Transaction) => Result<unknown, EditorError>): Result<EditRecord | null, EditorError> {
    this.cursors.clampTo(this.buffer);
    const before = this.captureState();
    const tx = new Transaction(this.buffer);

    const result = mutator(tx);
    if (!result.ok) {
      rollback(this.buffer, tx.applied);
      this.restoreState(before);
      this.debugLog(`Edit rolled back: ${result.error.message}`);
      return result;
    }

    this.cursors.clampTo(this.buffer);
    this.cursors.setDesiredColumn(null);
    const first = tx.applied[0];
    if (!first) return ok(null);

    const edit: Edit = tx.applied.length === 1 ? first : { kind: 'composite', edits: [...tx.applied] };
    const record: EditRecord = { edit, before, after: this.captureState() };
    this.document.setModified(true);
    for (const callback of this.commitCallbacks) {
      callback(record);
    }
    return ok(record);
  }

  /**
   * Run a step at every cursor, highest position first. All cursor positions
   * are tracked, so earlier cursors follow the edits made at later ones.
   */
  private atEachCursor(tx: Transaction, step: (pos: Position, index: number) => StepResult): Result<void, EditorError> {
    const primary = this.cursors.primaryIndexOf();
    const result = this.fanOut(tx, this.cursors.all(), step);
    if (!result.ok) return result;
    this.cursors.setAll(result.value, primary);
    return ok(undefined);
  }

  /**
   * Apply a step at each position (given in document order), processing
   * them in descending order. Returns the final positions in input order.
   */
  private fanOut(
    tx: Transaction,
    positions: readonly Position[],
    step: (pos: Position, index: number) => StepResult
  ): Result<Position[], EditorError> {
    const handles = positions.map((pos) => tx.track(pos));
    for (let i = handles.length - 1; i >= 0; i--) {
      const handle = handles[i];
      if (!handle) continue;
      const result = step(clonePosition(handle), i);
      if (!result.ok) return result;
      Object.assign(handle, result.value);
    }
    return ok(handles.map(clonePosition));
  }

  private insertInto(tx: Transaction, text: string): Result<void, EditorError> {
    const current = this.selection.current();
    if (current.kind === 'block') return this.insertIntoBlock(tx, text);

    if (current.kind === 'line') {
      const deleted = this.deleteSelection(tx);
      if (!deleted.ok) return deleted;
    }
    return this.atEachCursor(tx, (pos) => tx.apply(insertionEdit(pos, text)));
  }

  /**
   * Replace the block's span on every row, inserting at the block's left
   * column clamped to each row. Single-line text leaves a zero-width block
   * after the insertion; text with line breaks ends in one cursor per row.
   */
  private insertIntoBlock(tx: Transaction, text: string): Result<void, EditorError> {
    const current = this.selection.current();
    if (current.kind !== 'block') return ok(undefined);
    const bounds = blockBounds(current.anchor, current.active);

    const deleted = this.deleteBlockSpans(tx, this.selection.blockSpans(this.buffer));
    if (!deleted.ok) return deleted;

    const rows: Position[] = [];
    for (let line = bounds.rows.first; line <= Math.min(bounds.rows.last, this.buffer.lineCount() - 1); line++) {
      rows.push({ line, column: Math.min(bounds.columns.start, this.buffer.lineLength(line)) });
    }
    const inserted = this.fanOut(tx, rows, (pos) => tx.apply(insertionEdit(pos, text)));
    if (!inserted.ok) return inserted;

    const activeIndex = Math.max(0, current.active.line - bounds.rows.first);
    if (text.includes('\n')) {
      this.selection.clearSelection();
      this.cursors.setAll(inserted.value, activeIndex);
      return ok(undefined);
    }

    const column = bounds.columns.start + charLength(text);
    this.selection.set({
      kind: 'block',
      anchor: { line: current.anchor.line, column },
      active: { line: current.active.line, column },
    });
    this.cursors.set(this.buffer.clampPosition({ line: current.active.line, column }));
    return ok(undefined);
  }

  /**
   * Place rows[i] at the i-th cursor, or at the i-th row of a zero-width block.
   */
  private insertRowsAtCursors(tx: Transaction, rows: readonly string[]): Result<void, EditorError> {
    const current = this.selection.current();
    if (current.kind === 'block') {
      const bounds = blockBounds(current.anchor, current.active);
      const positions: Position[] = [];
      for (let line = bounds.rows.first; line <= bounds.rows.last; line++) {
        positions.push(this.buffer.clampPosition({ line, column: bounds.columns.start }));
      }
      const result = this.fanOut(tx, positions, (pos, index) => tx.apply(insertionEdit(pos, rows[index] ?? '')));
      if (!result.ok) return result;
      this.selection.clearSelection();
      this.cursors.setAll(result.value, Math.max(0, current.active.line - bounds.rows.first));
      return ok(undefined);
    }
    return this.atEachCursor(tx, (pos, index) => {
      const row = rows[index] ?? '';
      return row.length > 0 ? tx.apply(insertionEdit(pos, row)) : ok(pos);
    });
  }

  private deleteInto(tx: Transaction, direction: 'backward' | 'forward'): Result<void, EditorError> {
    const current = this.selection.current();

    if (current.kind !== 'none' && this.selection.hasContent()) {
      return this.deleteSelection(tx);
    }

    if (current.kind === 'block') {
      const column = current.anchor.column;
      const bounds = blockBounds(current.anchor, current.active);
      const rows: Position[] = [];
      for (let line = bounds.rows.first; line <= Math.min(bounds.rows.last, this.buffer.lineCount() - 1); line++) {
        const length = this.buffer.lineLength(line);
        const hasChar = direction === 'backward' ? column > 0 && length >= column : column < length;
        if (hasChar) rows.push({ line, column });
      }
      const result = this.fanOut(tx, rows, (pos) =>
        direction === 'backward' ? this.backspaceAt(tx, pos) : this.forwardDeleteAt(tx, pos)
      );
      if (!result.ok) return result;
      if (direction === 'backward' && column > 0) {
        this.selection.setBlockColumns(column - 1, column - 1);
        this.cursors.set(this.buffer.clampPosition({ line: current.active.line, column: column - 1 }));
      }
      return ok(undefined);
    }

    this.selection.clearSelection();
    return this.atEachCursor(tx, (pos) =>
      direction === 'backward' ? this.backspaceAt(tx, pos) : this.forwardDeleteAt(tx, pos)
    );
  }

  /**
   * Delete the selection's text. A block keeps its rows as a zero-width
   * block at its left column.
   */
  private deleteSelection(tx: Transaction): Result<void, EditorError> {
    const current = this.selection.current();
    switch (current.kind) {
      case 'none':
        return ok(undefined);
      case 'line': {
        const range = normalizeRange({
          start: this.buffer.clampPosition(current.anchor),
          end: this.buffer.clampPosition(current.active),
        });
        this.selection.clearSelection();
        if (isEmptyRange(range)) return ok(undefined);
        const result = tx.deleteRange(range);
        if (!result.ok) return result;
        this.cursors.set(range.start);
        return ok(undefined);
      }
      case 'block': {
        const bounds = blockBounds(current.anchor, current.active);
        const result = this.deleteBlockSpans(tx, blockSpans(bounds, this.buffer));
        if (!result.ok) return result;
        this.selection.setBlockColumns(bounds.columns.start, bounds.columns.start);
        this.cursors.set(this.buffer.clampPosition({ line: current.active.line, column: bounds.columns.start }));
        return ok(undefined);
      }
    }
  }

  private deleteBlockSpans(tx: Transaction, spans: readonly BlockSpan[]): Result<void, EditorError> {
    for (let i = spans.length - 1; i >= 0; i--) {
      const span = spans[i];
      if (!span || span.end <= span.start) continue;
      const result = tx.deleteRange({
        start: { line: span.line, column: span.start },
        end: { line: span.line, column: span.end },
      });
      if (!result.ok) return result;
    }
    return ok(undefined);
  }

  /**
   * Delete the character before a position, joining with the previous line
   * at column 0.
   */
  private backspaceAt(tx: Transaction, pos: Position): StepResult {
    if (pos.column > 0) {
      const char = charAtColumn(this.buffer.line(pos.line), pos.column - 1) ?? '';
      return tx.apply({ kind: 'deleteCharBefore', at: clonePosition(pos), char });
    }
    if (pos.line > 0) {
      return tx.apply({ kind: 'joinLine', line: pos.line - 1, column: this.buffer.lineLength(pos.line - 1) });
    }
    return ok(clonePosition(pos));
  }

  /**
   * Delete the character at a position, joining with the next line at the
   * end of a line.
   */
  private forwardDeleteAt(tx: Transaction, pos: Position): StepResult {
    const length = this.buffer.lineLength(pos.line);
    if (pos.column < length) {
      const char = charAtColumn(this.buffer.line(pos.line), pos.column) ?? '';
      return tx.apply({ kind: 'deleteCharAfter', at: clonePosition(pos), char });
    }
    if (pos.line < this.buffer.lineCount() - 1) {
      return tx.apply({ kind: 'joinLine', line: pos.line, column: length });
    }
    return ok(clonePosition(pos));
  }

  private selectionClip(): Clip | null {
    const current = this.selection.current();
    if (current.kind === 'none' || !this.selection.hasContent()) return null;
    if (current.kind === 'block') {
      return { text: extractText(current, this.buffer).join('\n'), kind: 'block' };
    }
    return { text: extractText(current, this.buffer).join(''), kind: 'text' };
  }
}

// ============================================
// Word boundaries
// ============================================

/**
 * Column reached by skipping non-word characters, then word characters,
 * backwards from `column`.
 */
export function wordBoundaryBackward(lineText: string, column: number): number {
  const chars = [...lineText];
  let i = Math.min(column, chars.length);
  while (i > 0 && !isWordChar(chars[i - 1] ?? '')) i--;
  while (i > 0 && isWordChar(chars[i - 1] ?? '')) i--;
  return i;
}

/**
 * Column reached by skipping non-word characters, then word characters,
 * forwards from `column`.
 */
export function wordBoundaryForward(lineText: string, column: number): number {
  const chars = [...lineText];
  let i = Math.max(0, column);
  while (i < chars.length && !isWordChar(chars[i] ?? '')) i++;
  while (i < chars.length && isWordChar(chars[i] ?? '')) i++;
  return i;
}
