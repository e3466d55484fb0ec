/**
 * Selection Model
 *
 * Tracks the active selection: nothing, a contiguous line selection, or a
 * rectangular block. Uses the anchor/active model: the anchor is where the
 * selection started, active is where the cursor currently is.
 */

import {
  clonePosition,
  comparePositions,
  normalizeRange,
  positionsEqual,
  type Position,
  type Range,
  type TextBuffer,
} from './buffer.ts';
import { sliceChars } from './chars.ts';

// ============================================
// Types
// ============================================

export type Selection =
  | { kind: 'none' }
  | { kind: 'line'; anchor: Position; active: Position }
  | { kind: 'block'; anchor: Position; active: Position };

export type SelectionKind = 'line' | 'block';

/**
 * Normalized block bounds. Columns are half-open: [start, end).
 */
export interface BlockBounds {
  rows: { first: number; last: number };
  columns: { start: number; end: number };
}

/**
 * The part of one row a block covers, clamped to that row's length.
 */
export interface BlockSpan {
  line: number;
  start: number;
  end: number;
}

export const NO_SELECTION: Selection = { kind: 'none' };

// ============================================
// Pure helpers
// ============================================

export function cloneSelection(selection: Selection): Selection {
  if (selection.kind === 'none') return NO_SELECTION;
  return { kind: selection.kind, anchor: clonePosition(selection.anchor), active: clonePosition(selection.active) };
}

export function blockBounds(anchor: Position, active: Position): BlockBounds {
  return {
    rows: { first: Math.min(anchor.line, active.line), last: Math.max(anchor.line, active.line) },
    columns: { start: Math.min(anchor.column, active.column), end: Math.max(anchor.column, active.column) },
  };
}

/**
 * Per-row spans of a block. A row shorter than the block's start column
 * contributes an empty span at its end; a row shorter than the end column
 * contributes up to its own length.
 */
export function blockSpans(bounds: BlockBounds, buffer: TextBuffer): BlockSpan[] {
  const spans: BlockSpan[] = [];
  const last = Math.min(bounds.rows.last, buffer.lineCount() - 1);
  for (let line = Math.max(0, bounds.rows.first); line <= last; line++) {
    const length = buffer.lineLength(line);
    spans.push({
      line,
      start: Math.min(bounds.columns.start, length),
      end: Math.min(bounds.columns.end, length),
    });
  }
  return spans;
}

/**
 * Text covered by a selection: one string for a line selection, one per
 * row for a block, nothing when there is no selection.
 */
export function extractText(selection: Selection, buffer: TextBuffer): string[] {
  switch (selection.kind) {
    case 'none':
      return [];
    case 'line': {
      const range = normalizeRange({
        start: buffer.clampPosition(selection.anchor),
        end: buffer.clampPosition(selection.active),
      });
      const text = buffer.getText(range);
      return [text.ok ? text.value : ''];
    }
    case 'block':
      return blockSpans(blockBounds(selection.anchor, selection.active), buffer).map((span) =>
        sliceChars(buffer.line(span.line), span.start, span.end)
      );
  }
}

// ============================================
// SelectionModel
// ============================================

export class SelectionModel {
  private selection: Selection = NO_SELECTION;

  current(): Selection {
    return cloneSelection(this.selection);
  }

  kind(): Selection['kind'] {
    return this.selection.kind;
  }

  set(selection: Selection): void {
    this.selection = cloneSelection(selection);
  }

  /**
   * Begin a selection at a position. An existing selection is replaced.
   */
  startSelection(pos: Position, kind: SelectionKind = 'line'): void {
    this.selection = { kind, anchor: clonePosition(pos), active: clonePosition(pos) };
  }

  /**
   * Move the active end. Without a selection, starts a line selection at pos.
   */
  extendSelection(pos: Position): void {
    if (this.selection.kind === 'none') {
      this.startSelection(pos, 'line');
      return;
    }
    this.selection = { ...this.selection, active: clonePosition(pos) };
  }

  clearSelection(): void {
    this.selection = NO_SELECTION;
  }

  /**
   * True when the selection covers text (a zero-width block covers none).
   */
  hasContent(): boolean {
    switch (this.selection.kind) {
      case 'none':
        return false;
      case 'line':
        return !positionsEqual(this.selection.anchor, this.selection.active);
      case 'block':
        return this.selection.anchor.column !== this.selection.active.column;
    }
  }

  isEmpty(): boolean {
    return !this.hasContent();
  }

  isZeroWidthBlock(): boolean {
    return this.selection.kind === 'block' && this.selection.anchor.column === this.selection.active.column;
  }

  /**
   * Ordered range of a line selection.
   */
  normalizedRange(): Range | null {
    if (this.selection.kind !== 'line') return null;
    return normalizeRange({ start: this.selection.anchor, end: this.selection.active });
  }

  normalizedBlock(): BlockBounds | null {
    if (this.selection.kind !== 'block') return null;
    return blockBounds(this.selection.anchor, this.selection.active);
  }

  /**
   * Per-row spans of the current block, clamped to the buffer.
   */
  blockSpans(buffer: TextBuffer): BlockSpan[] {
    const bounds = this.normalizedBlock();
    return bounds ? blockSpans(bounds, buffer) : [];
  }

  /**
   * Re-anchor a block at new columns, keeping its rows. Used after an edit
   * shifts the block horizontally.
   */
  setBlockColumns(anchorColumn: number, activeColumn: number): void {
    if (this.selection.kind !== 'block') return;
    this.selection = {
      kind: 'block',
      anchor: { line: this.selection.anchor.line, column: Math.max(0, anchorColumn) },
      active: { line: this.selection.active.line, column: Math.max(0, activeColumn) },
    };
  }

  /**
   * True when the position lies inside the selection, for renderers.
   */
  contains(pos: Position): boolean {
    switch (this.selection.kind) {
      case 'none':
        return false;
      case 'line': {
        const { start, end } = normalizeRange({ start: this.selection.anchor, end: this.selection.active });
        return comparePositions(pos, start) >= 0 && comparePositions(pos, end) < 0;
      }
      case 'block': {
        const { rows, columns } = blockBounds(this.selection.anchor, this.selection.active);
        return pos.line >= rows.first && pos.line <= rows.last && pos.column >= columns.start && pos.column < columns.end;
      }
    }
  }
}
