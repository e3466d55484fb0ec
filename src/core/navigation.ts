/**
 * Navigation
 *
 * Cursor motions. A plain motion clears the selection and collapses the
 * cursor set to the primary cursor; an extending motion grows (or starts)
 * a line selection anchored where the primary cursor was.
 */

import { clonePosition, type Position, type TextBuffer } from './buffer.ts';
import { charAtColumn, isWordChar } from './chars.ts';
import type { MultiCursorSet } from './cursor.ts';
import type { SelectionModel } from './selection.ts';
import type { CoordinateMapper } from './wrap.ts';

export type Motion =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'lineStart'
  | 'lineEnd'
  | 'documentStart'
  | 'documentEnd'
  | 'wordLeft'
  | 'wordRight'
  | 'visualUp'
  | 'visualDown';

export interface MoveOptions {
  /** Grow the selection instead of clearing it */
  extend?: boolean;
  /** Wrap width for visual motions; <= 0 means unwrapped */
  wrapWidth?: number;
}

/**
 * Result of a motion: the new position and the column vertical motion
 * should keep aiming for.
 */
interface Target {
  pos: Position;
  desiredColumn: number | null;
}

// ============================================
// Pure motions
// ============================================

export function wordLeft(buffer: TextBuffer, pos: Position): Position {
  if (pos.column === 0) {
    return pos.line > 0 ? { line: pos.line - 1, column: buffer.lineLength(pos.line - 1) } : clonePosition(pos);
  }
  const text = buffer.line(pos.line);
  let column = pos.column;
  while (column > 0 && !isWordChar(charAtColumn(text, column - 1) ?? '')) column--;
  while (column > 0 && isWordChar(charAtColumn(text, column - 1) ?? '')) column--;
  return { line: pos.line, column };
}

export function wordRight(buffer: TextBuffer, pos: Position): Position {
  const length = buffer.lineLength(pos.line);
  if (pos.column >= length) {
    return pos.line < buffer.lineCount() - 1 ? { line: pos.line + 1, column: 0 } : clonePosition(pos);
  }
  const text = buffer.line(pos.line);
  let column = pos.column;
  while (column < length && !isWordChar(charAtColumn(text, column) ?? '')) column++;
  while (column < length && isWordChar(charAtColumn(text, column) ?? '')) column++;
  return { line: pos.line, column };
}

// ============================================
// Navigator
// ============================================

export class Navigator {
  constructor(
    private readonly buffer: TextBuffer,
    private readonly cursors: MultiCursorSet,
    private readonly selection: SelectionModel,
    private readonly mapper: CoordinateMapper
  ) {}

  /**
   * Apply a motion to the primary cursor. Returns the new position.
   */
  move(motion: Motion, options: MoveOptions = {}): Position {
    const from = this.buffer.clampPosition(this.cursors.primary());
    const target = this.target(motion, from, options.wrapWidth ?? 0);

    if (options.extend) {
      if (this.selection.kind() === 'none') this.selection.startSelection(from, 'line');
      this.selection.extendSelection(target.pos);
    } else {
      this.selection.clearSelection();
    }
    this.cursors.set(target.pos);
    this.cursors.setDesiredColumn(target.desiredColumn);
    return clonePosition(target.pos);
  }

  private target(motion: Motion, pos: Position, wrapWidth: number): Target {
    const buffer = this.buffer;
    const lastLine = buffer.lineCount() - 1;
    const desired = this.cursors.getDesiredColumn() ?? pos.column;

    switch (motion) {
      case 'left':
        if (pos.column > 0) return { pos: { line: pos.line, column: pos.column - 1 }, desiredColumn: null };
        if (pos.line > 0) return { pos: { line: pos.line - 1, column: buffer.lineLength(pos.line - 1) }, desiredColumn: null };
        return { pos, desiredColumn: null };
      case 'right':
        if (pos.column < buffer.lineLength(pos.line)) return { pos: { line: pos.line, column: pos.column + 1 }, desiredColumn: null };
        if (pos.line < lastLine) return { pos: { line: pos.line + 1, column: 0 }, desiredColumn: null };
        return { pos, desiredColumn: null };
      case 'up':
        if (pos.line === 0) return { pos, desiredColumn: desired };
        return { pos: buffer.clampPosition({ line: pos.line - 1, column: desired }), desiredColumn: desired };
      case 'down':
        if (pos.line >= lastLine) return { pos, desiredColumn: desired };
        return { pos: buffer.clampPosition({ line: pos.line + 1, column: desired }), desiredColumn: desired };
      case 'lineStart':
        return { pos: { line: pos.line, column: 0 }, desiredColumn: null };
      case 'lineEnd':
        return { pos: { line: pos.line, column: buffer.lineLength(pos.line) }, desiredColumn: null };
      case 'documentStart':
        return { pos: { line: 0, column: 0 }, desiredColumn: null };
      case 'documentEnd':
        return { pos: { line: lastLine, column: buffer.lineLength(lastLine) }, desiredColumn: null };
      case 'wordLeft':
        return { pos: wordLeft(buffer, pos), desiredColumn: null };
      case 'wordRight':
        return { pos: wordRight(buffer, pos), desiredColumn: null };
      case 'visualUp':
      case 'visualDown':
        return this.visualTarget(pos, motion === 'visualUp' ? -1 : 1, wrapWidth);
    }
  }

  /**
   * Move one wrapped row up or down, keeping the desired column within the row.
   */
  private visualTarget(pos: Position, delta: number, wrapWidth: number): Target {
    const visual = this.mapper.logicalToVisual(pos, wrapWidth, 0);
    const desired = this.cursors.getDesiredColumn() ?? visual.column;
    const row = visual.row + delta;
    if (row < 0 || row >= this.mapper.visualRowCount(wrapWidth)) {
      return { pos, desiredColumn: desired };
    }
    return { pos: this.mapper.visualToLogical(row, desired, 0, wrapWidth), desiredColumn: desired };
  }
}
