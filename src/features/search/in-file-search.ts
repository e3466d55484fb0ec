/**
 * In-File Search
 *
 * Find and replace within one document: match collection over a compiled
 * pattern, navigation with wrap-around status, hit counting, filter-view
 * line selection and a bounded search history. Replacements go through the
 * Edit Engine so each one is a single undo unit.
 */

import { comparePositions, normalizeRange, type Position, type Range, type TextBuffer } from '../../core/buffer.ts';
import { offsetToChar, sliceChars } from '../../core/chars.ts';
import type { EditEngine } from '../../core/edit-engine.ts';
import type { EditRecord } from '../../core/edit.ts';
import type { EditorError } from '../../core/errors.ts';
import { err, ok, type Result } from '../../core/result.ts';
import { debugLog } from '../../debug.ts';
import { compilePattern, type CompiledPattern, type SearchMode } from './pattern.ts';
import { expandTemplate, groupsOf, type MatchGroups } from './template.ts';

// ============================================
// Types
// ============================================

/**
 * Search match result
 */
export interface SearchMatch {
  range: Range;
  text: string;
  groups: MatchGroups;
}

export interface FindState {
  pattern: string;
  mode: SearchMode;
  caseSensitive: boolean;
  /** Matches are confined to this range when set */
  scope: Range | null;
  matches: SearchMatch[];
  /** Index into matches of the current match, or -1 */
  currentIndex: number;
  error: EditorError | null;
  /** The last navigation wrapped around the document or scope */
  wrapped: boolean;
}

export interface NavigationResult {
  match: SearchMatch;
  wrapped: boolean;
}

export interface HitInfo {
  /** 1-based index of the match at the cursor, or 0 */
  current: number;
  total: number;
}

export interface FindEngineOptions {
  mode?: SearchMode;
  caseSensitive?: boolean;
  historySize?: number;
}

export const DEFAULT_HISTORY_SIZE = 100;

// ============================================
// Match collection
// ============================================

/**
 * Columns of a line that a scope covers: [start, end).
 */
function lineBounds(buffer: TextBuffer, line: number, scope: Range | null): { start: number; end: number } {
  const length = buffer.lineLength(line);
  if (!scope) return { start: 0, end: length };
  return {
    start: line === scope.start.line ? Math.min(scope.start.column, length) : 0,
    end: line === scope.end.line ? Math.min(scope.end.column, length) : length,
  };
}

function collectInLines(
  compiled: CompiledPattern,
  buffer: TextBuffer,
  scope: Range | null,
  signal?: AbortSignal
): SearchMatch[] {
  const matches: SearchMatch[] = [];
  const firstLine = scope ? scope.start.line : 0;
  const lastLine = Math.min(scope ? scope.end.line : buffer.lineCount() - 1, buffer.lineCount() - 1);

  for (let line = firstLine; line <= lastLine; line++) {
    if (signal?.aborted) break;
    const { start, end } = lineBounds(buffer, line, scope);
    if (start >= end) continue;

    const slice = sliceChars(buffer.line(line), start, end);
    for (const match of slice.matchAll(compiled.regex)) {
      const offset = match.index ?? 0;
      matches.push({
        range: {
          start: { line, column: start + offsetToChar(slice, offset) },
          end: { line, column: start + offsetToChar(slice, offset + match[0].length) },
        },
        text: match[0],
        groups: groupsOf(match),
      });
    }
  }
  return matches;
}

/**
 * Match over the scoped text joined with \n, so \n matches exactly a line
 * boundary.
 */
function collectAcrossLines(
  compiled: CompiledPattern,
  buffer: TextBuffer,
  scope: Range | null,
  signal?: AbortSignal
): SearchMatch[] {
  const origin: Position = scope ? scope.start : { line: 0, column: 0 };
  const text = buffer.getText(scope ?? undefined);
  if (!text.ok) return [];

  const lines = text.value.split('\n');
  const lineOffsets: number[] = [];
  let offset = 0;
  for (const line of lines) {
    lineOffsets.push(offset);
    offset += line.length + 1;
  }

  const toPosition = (utf16: number): Position => {
    let index = 0;
    while (index + 1 < lineOffsets.length && (lineOffsets[index + 1] ?? Infinity) <= utf16) index++;
    const column = offsetToChar(lines[index] ?? '', utf16 - (lineOffsets[index] ?? 0));
    return index === 0
      ? { line: origin.line, column: origin.column + column }
      : { line: origin.line + index, column };
  };

  const matches: SearchMatch[] = [];
  for (const match of text.value.matchAll(compiled.regex)) {
    if (signal?.aborted) break;
    const start = match.index ?? 0;
    matches.push({
      range: { start: toPosition(start), end: toPosition(start + match[0].length) },
      text: match[0],
      groups: groupsOf(match),
    });
  }
  return matches;
}

/**
 * All matches of a compiled pattern in document order. An aborted signal
 * stops the scan and returns what was found so far.
 */
export function findAll(
  compiled: CompiledPattern,
  buffer: TextBuffer,
  scope?: Range | null,
  signal?: AbortSignal
): SearchMatch[] {
  const bounds = scope ? normalizeRange({ start: buffer.clampPosition(scope.start), end: buffer.clampPosition(scope.end) }) : null;
  return compiled.multiline
    ? collectAcrossLines(compiled, buffer, bounds, signal)
    : collectInLines(compiled, buffer, bounds, signal);
}

// ============================================
// FindEngine
// ============================================

export class FindEngine {
  private _debugName = 'FindEngine';
  private state: FindState;
  private compiled: CompiledPattern | null = null;
  /** Document of the last refresh; query changes recompute against it */
  private buffer: TextBuffer | null = null;
  private history: string[] = [];
  private historyIndex: number | null = null;
  private historySize: number;
  private defaults: { mode: SearchMode; caseSensitive: boolean };

  constructor(options: FindEngineOptions = {}) {
    this.defaults = { mode: options.mode ?? 'regex', caseSensitive: options.caseSensitive ?? false };
    this.historySize = Math.max(1, options.historySize ?? DEFAULT_HISTORY_SIZE);
    this.state = this.initialState();
  }

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  private initialState(): FindState {
    return {
      pattern: '',
      mode: this.defaults.mode,
      caseSensitive: this.defaults.caseSensitive,
      scope: null,
      matches: [],
      currentIndex: -1,
      error: null,
      wrapped: false,
    };
  }

  getState(): Readonly<FindState> {
    return this.state;
  }

  matches(): readonly SearchMatch[] {
    return this.state.matches;
  }

  currentMatch(): SearchMatch | null {
    return this.state.matches[this.state.currentIndex] ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Query
  // ─────────────────────────────────────────────────────────────────────────

  setPattern(pattern: string): void {
    this.state.pattern = pattern;
    this.recompile();
  }

  setMode(mode: SearchMode): void {
    this.state.mode = mode;
    this.recompile();
  }

  setCaseSensitive(caseSensitive: boolean): void {
    this.state.caseSensitive = caseSensitive;
    this.recompile();
  }

  setScope(scope: Range | null): void {
    this.state.scope = scope ? normalizeRange(scope) : null;
    this.state.matches = [];
    this.state.currentIndex = -1;
    this.recompute();
  }

  /**
   * Change the defaults used when search state is reset.
   */
  setDefaults(defaults: { mode?: SearchMode; caseSensitive?: boolean; historySize?: number }): void {
    if (defaults.mode) this.defaults.mode = defaults.mode;
    if (defaults.caseSensitive !== undefined) this.defaults.caseSensitive = defaults.caseSensitive;
    if (defaults.historySize !== undefined) {
      this.historySize = Math.max(1, defaults.historySize);
      this.history = this.history.slice(0, this.historySize);
    }
  }

  /**
   * Recompute matches against the document. Returns the pattern error when
   * the pattern does not compile; matches are then empty.
   */
  refresh(buffer: TextBuffer, signal?: AbortSignal): Result<readonly SearchMatch[], EditorError> {
    this.buffer = buffer;
    if (this.state.error) {
      this.state.matches = [];
      this.state.currentIndex = -1;
      return err(this.state.error);
    }
    if (!this.compiled) {
      this.state.matches = [];
      this.state.currentIndex = -1;
      return ok(this.state.matches);
    }

    const current = this.currentMatch();
    this.state.matches = findAll(this.compiled, buffer, this.state.scope, signal);
    this.state.currentIndex = current
      ? this.state.matches.findIndex((m) => comparePositions(m.range.start, current.range.start) === 0)
      : -1;
    return ok(this.state.matches);
  }

  /**
   * Clear everything except the search history.
   */
  reset(): void {
    this.state = this.initialState();
    this.compiled = null;
    this.historyIndex = null;
  }

  private recompile(): void {
    this.state.matches = [];
    this.state.currentIndex = -1;
    this.state.wrapped = false;
    this.compiled = null;
    this.state.error = null;
    if (this.state.pattern.length === 0) return;

    const result = compilePattern(this.state.pattern, {
      mode: this.state.mode,
      caseSensitive: this.state.caseSensitive,
    });
    if (result.ok) {
      this.compiled = result.value;
    } else {
      this.state.error = result.error;
      this.debugLog(result.error.message);
    }
    this.recompute();
  }

  private recompute(): void {
    if (this.buffer) this.refresh(this.buffer);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Navigation
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * First match starting strictly after `from`, wrapping to the first match.
   */
  next(from: Position): NavigationResult | null {
    const { matches } = this.state;
    if (matches.length === 0) return null;
    let index = matches.findIndex((m) => comparePositions(m.range.start, from) > 0);
    const wrapped = index === -1;
    if (wrapped) index = 0;
    return this.select(index, wrapped);
  }

  /**
   * Last match starting strictly before `from`, wrapping to the last match.
   */
  previous(from: Position): NavigationResult | null {
    const { matches } = this.state;
    if (matches.length === 0) return null;
    let index = -1;
    for (let i = matches.length - 1; i >= 0; i--) {
      const match = matches[i];
      if (match && comparePositions(match.range.start, from) < 0) {
        index = i;
        break;
      }
    }
    const wrapped = index === -1;
    if (wrapped) index = matches.length - 1;
    return this.select(index, wrapped);
  }

  private select(index: number, wrapped: boolean): NavigationResult | null {
    const match = this.state.matches[index];
    if (!match) return null;
    this.state.currentIndex = index;
    this.state.wrapped = wrapped;
    return { match, wrapped };
  }

  /**
   * Position of the match starting at the cursor among all matches.
   */
  hitInfo(cursor: Position): HitInfo {
    const index = this.state.matches.findIndex((m) => comparePositions(m.range.start, cursor) === 0);
    return { current: index + 1, total: this.state.matches.length };
  }

  /**
   * Sorted line indices holding a match, plus `before` / `after` lines of
   * context around each, kept inside the scope.
   */
  matchingLines(buffer: TextBuffer, before: number = 0, after: number = before): number[] {
    const scope = this.state.scope;
    const minLine = scope ? scope.start.line : 0;
    const maxLine = Math.min(scope ? scope.end.line : buffer.lineCount() - 1, buffer.lineCount() - 1);

    const lines = new Set<number>();
    for (const match of this.state.matches) {
      const hit = match.range.start.line;
      for (let line = Math.max(minLine, hit - before); line <= Math.min(maxLine, hit + after); line++) {
        lines.add(line);
      }
      for (let line = hit; line <= Math.min(match.range.end.line, maxLine); line++) {
        lines.add(line);
      }
    }
    return [...lines].sort((a, b) => a - b);
  }

  // ─────────────────────────────────────────────────────────────────────────
  // History
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Record a pattern, most recent first, without duplicates.
   */
  addToHistory(pattern: string): void {
    if (pattern.length === 0) return;
    this.history = [pattern, ...this.history.filter((p) => p !== pattern)].slice(0, this.historySize);
    this.historyIndex = null;
  }

  getHistory(): readonly string[] {
    return this.history;
  }

  /**
   * Step through the history: 'older' walks back from the most recent
   * pattern, 'newer' walks forward and returns '' past the newest.
   */
  recall(direction: 'older' | 'newer'): string | null {
    if (this.history.length === 0) return null;
    if (direction === 'older') {
      const index = this.historyIndex === null ? 0 : Math.min(this.historyIndex + 1, this.history.length - 1);
      this.historyIndex = index;
      return this.history[index] ?? null;
    }
    if (this.historyIndex === null) return null;
    if (this.historyIndex === 0) {
      this.historyIndex = null;
      return '';
    }
    this.historyIndex--;
    return this.history[this.historyIndex] ?? null;
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Replace
  // ─────────────────────────────────────────────────────────────────────────

  /**
   * Replace the current match with the expanded template.
   */
  replaceCurrent(template: string, engine: EditEngine, buffer: TextBuffer): Result<EditRecord | null, EditorError> {
    const refreshed = this.refresh(buffer);
    if (!refreshed.ok) return refreshed;
    const match = this.currentMatch();
    if (!match) return ok(null);

    const result = engine.replaceRanges([{ range: match.range, text: expandTemplate(template, match.groups) }]);
    if (!result.ok) return result;
    this.state.currentIndex = -1;
    this.refresh(buffer);
    return result;
  }

  /**
   * Replace every match as one undo unit. Returns the number of replacements.
   */
  replaceAll(
    template: string,
    engine: EditEngine,
    buffer: TextBuffer
  ): Result<{ count: number; record: EditRecord | null }, EditorError> {
    const refreshed = this.refresh(buffer);
    if (!refreshed.ok) return refreshed;
    const changes = refreshed.value.map((match) => ({ range: match.range, text: expandTemplate(template, match.groups) }));
    if (changes.length === 0) return ok({ count: 0, record: null });

    const result = engine.replaceRanges(changes);
    if (!result.ok) return result;
    this.debugLog(`Replaced ${changes.length} matches of ${this.state.pattern}`);
    this.state.currentIndex = -1;
    this.refresh(buffer);
    return ok({ count: changes.length, record: result.value });
  }
}
