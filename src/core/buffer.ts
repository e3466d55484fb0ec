/**
 * Text Buffer
 *
 * Line-oriented storage for a document. All columns are code point
 * indices (see chars.ts). The buffer never tracks undo, selection or
 * redraw state; it only validates and applies mutations.
 */

import { charAtColumn, charLength, sliceChars } from './chars.ts';
import { EditorError } from './errors.ts';
import { err, ok, type Result } from './result.ts';

// ============================================
// Types
// ============================================

/**
 * Logical position in the document.
 */
export interface Position {
  line: number; // 0-indexed line number
  column: number; // 0-indexed code point column, may equal the line length
}

/**
 * Range between two positions.
 */
export interface Range {
  start: Position;
  end: Position;
}

/**
 * A stored line. The version changes whenever the text does, which lets
 * caches keyed on line identity detect stale entries.
 */
export interface BufferLine {
  readonly text: string;
  readonly version: number;
}

// ============================================
// Position Helpers
// ============================================

export function comparePositions(a: Position, b: Position): number {
  if (a.line !== b.line) return a.line < b.line ? -1 : 1;
  if (a.column !== b.column) return a.column < b.column ? -1 : 1;
  return 0;
}

export function positionsEqual(a: Position, b: Position): boolean {
  return a.line === b.line && a.column === b.column;
}

export function minPosition(a: Position, b: Position): Position {
  return comparePositions(a, b) <= 0 ? a : b;
}

export function maxPosition(a: Position, b: Position): Position {
  return comparePositions(a, b) >= 0 ? a : b;
}

export function clonePosition(pos: Position): Position {
  return { line: pos.line, column: pos.column };
}

/**
 * Order a range so start <= end.
 */
export function normalizeRange(range: Range): Range {
  return {
    start: clonePosition(minPosition(range.start, range.end)),
    end: clonePosition(maxPosition(range.start, range.end)),
  };
}

export function isEmptyRange(range: Range): boolean {
  return positionsEqual(range.start, range.end);
}

/**
 * Position reached after inserting `text` at `at`.
 */
export function endOfInsertion(at: Position, text: string): Position {
  const parts = text.split('\n');
  if (parts.length === 1) {
    return { line: at.line, column: at.column + charLength(text) };
  }
  return { line: at.line + parts.length - 1, column: charLength(parts[parts.length - 1] ?? '') };
}

/**
 * Normalize line endings to \n.
 */
export function normalizeNewlines(text: string): string {
  return text.replace(/\r\n?/g, '\n');
}

// ============================================
// TextBuffer
// ============================================

let nextVersion = 1;

function makeLine(text: string): BufferLine {
  return { text, version: nextVersion++ };
}

export class TextBuffer {
  private lines: BufferLine[];

  constructor(content: string = '') {
    this.lines = normalizeNewlines(content).split('\n').map(makeLine);
  }

  /**
   * Replace the whole content.
   */
  setContent(content: string): void {
    this.lines = normalizeNewlines(content).split('\n').map(makeLine);
  }

  getContent(): string {
    return this.lines.map((l) => l.text).join('\n');
  }

  lineCount(): number {
    return this.lines.length;
  }

  /**
   * Text of a line; empty string for indices outside the buffer.
   */
  line(index: number): string {
    return this.lines[index]?.text ?? '';
  }

  /**
   * Stored line record, for identity-keyed caches.
   */
  lineRecord(index: number): BufferLine | undefined {
    return this.lines[index];
  }

  lineLength(index: number): number {
    return charLength(this.line(index));
  }

  /**
   * All line texts (a copy).
   */
  getLines(): string[] {
    return this.lines.map((l) => l.text);
  }

  isValidPosition(pos: Position): boolean {
    return (
      Number.isInteger(pos.line) &&
      Number.isInteger(pos.column) &&
      pos.line >= 0 &&
      pos.line < this.lines.length &&
      pos.column >= 0 &&
      pos.column <= this.lineLength(pos.line)
    );
  }

  /**
   * Clamp a position into the buffer bounds.
   */
  clampPosition(pos: Position): Position {
    const line = Math.max(0, Math.min(Math.floor(pos.line), this.lines.length - 1));
    const column = Math.max(0, Math.min(Math.floor(pos.column), this.lineLength(line)));
    return { line, column };
  }

  charAt(pos: Position): Result<string, EditorError> {
    if (!this.isValidPosition(pos) || pos.column === this.lineLength(pos.line)) {
      return err(EditorError.outOfBounds(`charAt ${pos.line}:${pos.column}`, pos));
    }
    return ok(charAtColumn(this.line(pos.line), pos.column) ?? '');
  }

  /**
   * Text inside a range, lines joined with \n. Without a range, the whole content.
   */
  getText(range?: Range): Result<string, EditorError> {
    if (!range) return ok(this.getContent());
    const { start, end } = normalizeRange(range);
    if (!this.isValidPosition(start) || !this.isValidPosition(end)) {
      return err(EditorError.outOfBounds(`range ${start.line}:${start.column}-${end.line}:${end.column}`, range));
    }
    if (start.line === end.line) {
      return ok(sliceChars(this.line(start.line), start.column, end.column));
    }
    const parts = [sliceChars(this.line(start.line), start.column)];
    for (let i = start.line + 1; i < end.line; i++) {
      parts.push(this.line(i));
    }
    parts.push(sliceChars(this.line(end.line), 0, end.column));
    return ok(parts.join('\n'));
  }

  /**
   * Insert text at a position. Line breaks in the text split the line.
   * Returns the position just past the inserted text.
   */
  insert(pos: Position, text: string): Result<Position, EditorError> {
    if (!this.isValidPosition(pos)) {
      return err(EditorError.outOfBounds(`insert at ${pos.line}:${pos.column}`, pos));
    }
    const normalized = normalizeNewlines(text);
    if (normalized.length === 0) return ok(clonePosition(pos));

    const current = this.line(pos.line);
    const before = sliceChars(current, 0, pos.column);
    const after = sliceChars(current, pos.column);
    const parts = normalized.split('\n');

    if (parts.length === 1) {
      this.lines[pos.line] = makeLine(before + normalized + after);
    } else {
      const replacement: BufferLine[] = [makeLine(before + (parts[0] ?? ''))];
      for (let i = 1; i < parts.length - 1; i++) {
        replacement.push(makeLine(parts[i] ?? ''));
      }
      replacement.push(makeLine((parts[parts.length - 1] ?? '') + after));
      this.lines.splice(pos.line, 1, ...replacement);
    }
    return ok(endOfInsertion(pos, normalized));
  }

  /**
   * Delete a range. Deleting across line breaks joins the lines.
   * Returns the removed text.
   */
  delete(range: Range): Result<string, EditorError> {
    const removed = this.getText(range);
    if (!removed.ok) return removed;
    const { start, end } = normalizeRange(range);
    if (positionsEqual(start, end)) return ok('');

    const head = sliceChars(this.line(start.line), 0, start.column);
    const tail = sliceChars(this.line(end.line), end.column);
    this.lines.splice(start.line, end.line - start.line + 1, makeLine(head + tail));
    return ok(removed.value);
  }
}
