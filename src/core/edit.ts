/**
 * Edits
 *
 * The closed set of document mutations. Every variant carries the text it
 * inserts or removes, so inverting an edit never reads the document.
 */

import {
  clonePosition,
  comparePositions,
  endOfInsertion,
  positionsEqual,
  type Position,
  type Range,
  type TextBuffer,
} from './buffer.ts';
import { charLength } from './chars.ts';
import type { CursorSnapshot } from './cursor.ts';
import type { Selection } from './selection.ts';
import { EditorError } from './errors.ts';
import { err, ok, type Result } from './result.ts';
import { debugLog } from '../debug.ts';

// ============================================
// Types
// ============================================

export type Edit =
  /** Insert one character at `at` */
  | { kind: 'insertChar'; at: Position; char: string }
  /** Remove the character before `at` (on the same line); `at` is the cursor */
  | { kind: 'deleteCharBefore'; at: Position; char: string }
  /** Remove the character at `at` */
  | { kind: 'deleteCharAfter'; at: Position; char: string }
  /** Break the line at `at` */
  | { kind: 'splitLine'; at: Position }
  /** Join `line` and `line + 1`; `column` is the length of `line` before joining */
  | { kind: 'joinLine'; line: number; column: number }
  /** Insert a block of text that may span lines */
  | { kind: 'insertText'; at: Position; text: string }
  /** Remove a range whose content was `text` */
  | { kind: 'deleteRange'; range: Range; text: string }
  /** Several edits applied in order, undone as one unit */
  | { kind: 'composite'; edits: Edit[] };

export type PrimitiveEdit = Exclude<Edit, { kind: 'composite' }>;

/**
 * The effect of a primitive edit: replace [start, end) with text.
 */
export interface TextChange {
  start: Position;
  end: Position;
  text: string;
}

/**
 * Cursor and selection state captured around an edit.
 */
export interface CursorState {
  cursors: CursorSnapshot;
  selection: Selection;
}

/**
 * A committed edit with the cursor state immediately before and after it.
 * This is the unit the undo history stores and persists.
 */
export interface EditRecord {
  edit: Edit;
  before: CursorState;
  after: CursorState;
}

// ============================================
// Inversion
// ============================================

function assertNever(value: never): never {
  throw new Error(`Unhandled edit: ${JSON.stringify(value)}`);
}

export function invertEdit(edit: Edit): Edit {
  switch (edit.kind) {
    case 'insertChar':
      return { kind: 'deleteCharAfter', at: clonePosition(edit.at), char: edit.char };
    case 'deleteCharBefore':
      return { kind: 'insertChar', at: { line: edit.at.line, column: edit.at.column - 1 }, char: edit.char };
    case 'deleteCharAfter':
      return { kind: 'insertChar', at: clonePosition(edit.at), char: edit.char };
    case 'splitLine':
      return { kind: 'joinLine', line: edit.at.line, column: edit.at.column };
    case 'joinLine':
      return { kind: 'splitLine', at: { line: edit.line, column: edit.column } };
    case 'insertText':
      return {
        kind: 'deleteRange',
        range: { start: clonePosition(edit.at), end: endOfInsertion(edit.at, edit.text) },
        text: edit.text,
      };
    case 'deleteRange':
      return { kind: 'insertText', at: clonePosition(edit.range.start), text: edit.text };
    case 'composite':
      return { kind: 'composite', edits: [...edit.edits].reverse().map(invertEdit) };
    default:
      return assertNever(edit);
  }
}

/**
 * The range a primitive replaces and the text it puts there.
 */
export function changeOf(edit: PrimitiveEdit): TextChange {
  switch (edit.kind) {
    case 'insertChar':
      return { start: clonePosition(edit.at), end: clonePosition(edit.at), text: edit.char };
    case 'deleteCharBefore':
      return { start: { line: edit.at.line, column: edit.at.column - 1 }, end: clonePosition(edit.at), text: '' };
    case 'deleteCharAfter':
      return { start: clonePosition(edit.at), end: { line: edit.at.line, column: edit.at.column + 1 }, text: '' };
    case 'splitLine':
      return { start: clonePosition(edit.at), end: clonePosition(edit.at), text: '\n' };
    case 'joinLine':
      return { start: { line: edit.line, column: edit.column }, end: { line: edit.line + 1, column: 0 }, text: '' };
    case 'insertText':
      return { start: clonePosition(edit.at), end: clonePosition(edit.at), text: edit.text };
    case 'deleteRange':
      return { start: clonePosition(edit.range.start), end: clonePosition(edit.range.end), text: '' };
    default:
      return assertNever(edit);
  }
}

/**
 * Text a primitive removes from the document, as recorded in the edit.
 */
function expectedRemoval(edit: PrimitiveEdit): string {
  switch (edit.kind) {
    case 'deleteCharBefore':
    case 'deleteCharAfter':
      return edit.char;
    case 'joinLine':
      return '\n';
    case 'deleteRange':
      return edit.text;
    case 'insertChar':
    case 'splitLine':
    case 'insertText':
      return '';
    default:
      return assertNever(edit);
  }
}

/**
 * Flatten composites into the primitives they apply, in order.
 */
export function primitivesOf(edit: Edit): PrimitiveEdit[] {
  if (edit.kind === 'composite') return edit.edits.flatMap(primitivesOf);
  return [edit];
}

/**
 * Where a position ends up after a change. Positions inside the replaced
 * range collapse to its start; positions at or after its end shift.
 */
export function transformPosition(pos: Position, change: TextChange): Position {
  if (comparePositions(pos, change.start) < 0) return clonePosition(pos);
  const isInsertion = positionsEqual(change.start, change.end);
  if (!isInsertion && comparePositions(pos, change.end) < 0) return clonePosition(change.start);

  const newEnd = endOfInsertion(change.start, change.text);
  if (pos.line === change.end.line) {
    return { line: newEnd.line, column: newEnd.column + (pos.column - change.end.column) };
  }
  return { line: newEnd.line + (pos.line - change.end.line), column: pos.column };
}

// ============================================
// Application
// ============================================

/**
 * Apply one primitive. Deletions check that the document still holds the
 * recorded text, so a stale record is rejected instead of corrupting content.
 */
export function applyPrimitive(buffer: TextBuffer, edit: PrimitiveEdit): Result<Position, EditorError> {
  const change = changeOf(edit);
  const expected = expectedRemoval(edit);

  if (expected.length > 0) {
    const current = buffer.getText({ start: change.start, end: change.end });
    if (!current.ok) return current;
    if (current.value !== expected) {
      return err(EditorError.outOfBounds(`${edit.kind} content mismatch at ${change.start.line}:${change.start.column}`, edit));
    }
    const removed = buffer.delete({ start: change.start, end: change.end });
    if (!removed.ok) return removed;
  }
  if (change.text.length > 0) {
    return buffer.insert(change.start, change.text);
  }
  if (!buffer.isValidPosition(change.start)) {
    return err(EditorError.outOfBounds(`${edit.kind} at ${change.start.line}:${change.start.column}`, edit));
  }
  return ok(clonePosition(change.start));
}

/**
 * Apply an edit atomically: if any primitive fails, the ones already
 * applied are reverted and the buffer is left as it was.
 */
export function applyEdit(buffer: TextBuffer, edit: Edit): Result<void, EditorError> {
  const applied: PrimitiveEdit[] = [];
  for (const primitive of primitivesOf(edit)) {
    const result = applyPrimitive(buffer, primitive);
    if (!result.ok) {
      rollback(buffer, applied);
      return result;
    }
    applied.push(primitive);
  }
  return ok(undefined);
}

/**
 * Revert applied primitives, most recent first.
 */
export function rollback(buffer: TextBuffer, applied: readonly PrimitiveEdit[]): void {
  for (let i = applied.length - 1; i >= 0; i--) {
    const primitive = applied[i];
    if (!primitive) continue;
    for (const inverse of primitivesOf(invertEdit(primitive))) {
      const result = applyPrimitive(buffer, inverse);
      if (!result.ok) {
        debugLog(`[Edit] Rollback failed: ${result.error.message}`);
      }
    }
  }
}

/**
 * Number of primitives in an edit.
 */
export function editLength(edit: Edit): number {
  return edit.kind === 'composite' ? edit.edits.reduce((sum, e) => sum + editLength(e), 0) : 1;
}

/**
 * Primitive for inserting arbitrary text: a lone character, a line break,
 * or a text block.
 */
export function insertionEdit(at: Position, text: string): PrimitiveEdit {
  if (text === '\n') return { kind: 'splitLine', at: clonePosition(at) };
  if (!text.includes('\n') && charLength(text) === 1) return { kind: 'insertChar', at: clonePosition(at), char: text };
  return { kind: 'insertText', at: clonePosition(at), text };
}
