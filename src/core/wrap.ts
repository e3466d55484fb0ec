/**
 * Coordinate Mapper
 *
 * Converts between logical positions (line, code point column) and visual
 * positions (screen row, screen column) for a given wrap width. Every
 * character is one cell wide except a tab, which advances to the next tab
 * stop. Segments are cached per line record; the cache is keyed by line
 * version, width, break mode and tab size and is never authoritative.
 */

import type { BufferLine, Position, TextBuffer } from './buffer.ts';
import { charLength } from './chars.ts';

export const DEFAULT_TAB_SIZE = 4;

// ============================================
// Types
// ============================================

/**
 * How long lines are broken into rows.
 * - character: hard break every `width` characters
 * - word: break after the last whitespace that fits, else hard break
 */
export type WrapBreak = 'character' | 'word';

/**
 * A wrapped row of a line: code point columns [start, end).
 */
export interface WrapSegment {
  start: number;
  end: number;
}

export interface VisualPosition {
  row: number;
  column: number;
}

interface CachedSegments {
  version: number;
  width: number;
  mode: WrapBreak;
  tabSize: number;
  segments: WrapSegment[];
  stops: number[];
}

// ============================================
// Segment computation
// ============================================

/**
 * Cell offset at which each code point of a line starts. Tab stops are
 * measured from the start of the line; the extra last entry is the line's
 * full width.
 */
export function cellStops(lineText: string, tabSize: number = DEFAULT_TAB_SIZE): number[] {
  const tab = Math.max(1, Math.floor(tabSize));
  const stops = [0];
  let cells = 0;
  for (const ch of lineText) {
    cells += ch === '\t' ? tab - (cells % tab) : 1;
    stops.push(cells);
  }
  return stops;
}

function cellAt(stops: readonly number[], index: number): number {
  return stops[index] ?? stops[stops.length - 1] ?? 0;
}

/**
 * Split a line into wrapped segments. Concatenating the segments
 * reconstructs the line; a width <= 0 disables wrapping. A row holds as
 * many cells as the width allows, and at least one character.
 */
export function wrappedSegments(
  lineText: string,
  wrapWidth: number,
  mode: WrapBreak = 'character',
  tabSize: number = DEFAULT_TAB_SIZE
): WrapSegment[] {
  const length = charLength(lineText);
  const stops = cellStops(lineText, tabSize);
  if (wrapWidth <= 0 || cellAt(stops, length) <= wrapWidth) {
    return [{ start: 0, end: length }];
  }

  const chars = Array.from(lineText);
  const segments: WrapSegment[] = [];
  let pos = 0;
  while (cellAt(stops, length) - cellAt(stops, pos) > wrapWidth) {
    let fit = pos + 1;
    while (fit < length && cellAt(stops, fit + 1) - cellAt(stops, pos) <= wrapWidth) fit++;

    let breakPos = fit;
    if (mode === 'word') {
      // Look backwards for whitespace; the break goes after it
      for (let i = fit; i > pos; i--) {
        const ch = chars[i - 1];
        if (ch === ' ' || ch === '\t') {
          breakPos = i;
          break;
        }
      }
    }
    segments.push({ start: pos, end: breakPos });
    pos = breakPos;
  }
  segments.push({ start: pos, end: length });
  return segments;
}

/**
 * Index of the segment containing a column: the last one starting at or before it.
 */
export function segmentIndexFor(segments: readonly WrapSegment[], column: number): number {
  for (let i = segments.length - 1; i > 0; i--) {
    const segment = segments[i];
    if (segment && segment.start <= column) return i;
  }
  return 0;
}

// ============================================
// CoordinateMapper
// ============================================

export class CoordinateMapper {
  private cache = new WeakMap<BufferLine, CachedSegments>();

  constructor(
    private readonly buffer: TextBuffer,
    private mode: WrapBreak = 'character',
    private tabSize: number = DEFAULT_TAB_SIZE
  ) {}

  setBreakMode(mode: WrapBreak): void {
    this.mode = mode;
  }

  getBreakMode(): WrapBreak {
    return this.mode;
  }

  setTabSize(tabSize: number): void {
    this.tabSize = tabSize;
  }

  getTabSize(): number {
    return this.tabSize;
  }

  /**
   * Wrapped segments of a buffer line.
   */
  segmentsForLine(line: number, wrapWidth: number): WrapSegment[] {
    return this.layout(line, wrapWidth).segments;
  }

  lineRowCount(line: number, wrapWidth: number): number {
    return this.segmentsForLine(line, wrapWidth).length;
  }

  /**
   * Visual rows taken by lines [from, to).
   */
  visualRowCount(wrapWidth: number, from: number = 0, to: number = this.buffer.lineCount()): number {
    let rows = 0;
    for (let line = Math.max(0, from); line < Math.min(to, this.buffer.lineCount()); line++) {
      rows += this.lineRowCount(line, wrapWidth);
    }
    return rows;
  }

  /**
   * Map a logical position to a visual row/column, counting rows from topLine.
   * Lines above topLine give negative rows. The column is in cells from the
   * start of the row.
   */
  logicalToVisual(pos: Position, wrapWidth: number, topLine: number = 0): VisualPosition {
    const clamped = this.buffer.clampPosition(pos);
    const { segments, stops } = this.layout(clamped.line, wrapWidth);
    const index = segmentIndexFor(segments, clamped.column);
    const segment = segments[index] ?? { start: 0, end: 0 };

    const preceding =
      clamped.line >= topLine
        ? this.visualRowCount(wrapWidth, topLine, clamped.line)
        : -this.visualRowCount(wrapWidth, clamped.line, topLine);

    return { row: preceding + index, column: cellAt(stops, clamped.column) - cellAt(stops, segment.start) };
  }

  /**
   * Map a visual row/column (rows counted from topLine) back to a logical
   * position. Rows past the end clamp to the last row of the last line; a
   * column past a row's text clamps to that row. A column inside a tab's
   * span maps to the character after the tab.
   */
  visualToLogical(row: number, column: number, topLine: number, wrapWidth: number): Position {
    const lineCount = this.buffer.lineCount();
    let remaining = Math.max(0, row);
    const col = Math.max(0, column);

    for (let line = Math.max(0, Math.min(topLine, lineCount - 1)); line < lineCount; line++) {
      const { segments, stops } = this.layout(line, wrapWidth);
      const isLastLine = line === lineCount - 1;
      if (remaining < segments.length || isLastLine) {
        const index = Math.min(remaining, segments.length - 1);
        return { line, column: columnInSegment(segments, stops, index, col) };
      }
      remaining -= segments.length;
    }
    return { line: lineCount - 1, column: this.buffer.lineLength(lineCount - 1) };
  }

  private layout(line: number, wrapWidth: number): CachedSegments {
    const record = this.buffer.lineRecord(line);
    if (!record) {
      const segments = [{ start: 0, end: 0 }];
      return { version: 0, width: wrapWidth, mode: this.mode, tabSize: this.tabSize, segments, stops: [0] };
    }

    const cached = this.cache.get(record);
    if (
      cached &&
      cached.version === record.version &&
      cached.width === wrapWidth &&
      cached.mode === this.mode &&
      cached.tabSize === this.tabSize
    ) {
      return cached;
    }
    const entry: CachedSegments = {
      version: record.version,
      width: wrapWidth,
      mode: this.mode,
      tabSize: this.tabSize,
      segments: wrappedSegments(record.text, wrapWidth, this.mode, this.tabSize),
      stops: cellStops(record.text, this.tabSize),
    };
    this.cache.set(record, entry);
    return entry;
  }
}

function columnInSegment(
  segments: readonly WrapSegment[],
  stops: readonly number[],
  index: number,
  column: number
): number {
  const segment = segments[index] ?? { start: 0, end: 0 };
  const isFinal = index === segments.length - 1;
  // Earlier rows stop one short of their end, which belongs to the next row
  const limit = isFinal ? segment.end : Math.max(segment.start, segment.end - 1);
  const target = cellAt(stops, segment.start) + column;
  let result = segment.start;
  while (result < limit && cellAt(stops, result) < target) result++;
  return result;
}
