/**
 * Selection Model Unit Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import { TextBuffer } from '../../../src/core/buffer.ts';
import { SelectionModel, blockBounds, blockSpans, extractText } from '../../../src/core/selection.ts';

describe('SelectionModel', () => {
  let selection: SelectionModel;

  beforeEach(() => {
    selection = new SelectionModel();
  });

  describe('transitions', () => {
    test('starts with no selection', () => {
      expect(selection.current()).toEqual({ kind: 'none' });
      expect(selection.hasContent()).toBe(false);
    });

    test('extendSelection without a selection starts a line selection', () => {
      selection.extendSelection({ line: 1, column: 2 });
      expect(selection.current()).toEqual({
        kind: 'line',
        anchor: { line: 1, column: 2 },
        active: { line: 1, column: 2 },
      });
      expect(selection.isEmpty()).toBe(true);
    });

    test('extendSelection moves only the active end', () => {
      selection.startSelection({ line: 0, column: 3 });
      selection.extendSelection({ line: 0, column: 1 });
      expect(selection.normalizedRange()).toEqual({ start: { line: 0, column: 1 }, end: { line: 0, column: 3 } });
    });

    test('clearSelection returns to none', () => {
      selection.startSelection({ line: 0, column: 0 }, 'block');
      selection.clearSelection();
      expect(selection.kind()).toBe('none');
    });

    test('current returns a copy', () => {
      selection.startSelection({ line: 0, column: 0 });
      const copy = selection.current();
      if (copy.kind === 'line') copy.active.column = 9;
      expect(selection.normalizedRange()?.end.column).toBe(0);
    });
  });

  describe('block', () => {
    test('zero-width block has no content', () => {
      selection.startSelection({ line: 0, column: 2 }, 'block');
      selection.extendSelection({ line: 2, column: 2 });
      expect(selection.isZeroWidthBlock()).toBe(true);
      expect(selection.hasContent()).toBe(false);
    });

    test('normalizedBlock orders rows and columns', () => {
      selection.startSelection({ line: 3, column: 5 }, 'block');
      selection.extendSelection({ line: 1, column: 2 });
      expect(selection.normalizedBlock()).toEqual({
        rows: { first: 1, last: 3 },
        columns: { start: 2, end: 5 },
      });
    });

    test('setBlockColumns keeps rows', () => {
      selection.startSelection({ line: 0, column: 4 }, 'block');
      selection.extendSelection({ line: 2, column: 6 });
      selection.setBlockColumns(1, 1);
      expect(selection.current()).toEqual({
        kind: 'block',
        anchor: { line: 0, column: 1 },
        active: { line: 2, column: 1 },
      });
    });

    test('contains checks the rectangle', () => {
      selection.startSelection({ line: 0, column: 1 }, 'block');
      selection.extendSelection({ line: 1, column: 3 });
      expect(selection.contains({ line: 1, column: 2 })).toBe(true);
      expect(selection.contains({ line: 1, column: 3 })).toBe(false);
      expect(selection.contains({ line: 2, column: 2 })).toBe(false);
    });
  });
});

describe('block extraction', () => {
  test('columns [2,5) over rows of length 10, 3 and 0', () => {
    const buffer = new TextBuffer('0123456789\nabc\n');
    const selection = { kind: 'block' as const, anchor: { line: 0, column: 2 }, active: { line: 2, column: 5 } };
    expect(extractText(selection, buffer)).toEqual(['234', 'c', '']);
  });

  test('a row shorter than the start column gives an empty span at its end', () => {
    const buffer = new TextBuffer('abcdef\na');
    expect(blockSpans(blockBounds({ line: 0, column: 3 }, { line: 1, column: 5 }), buffer)).toEqual([
      { line: 0, start: 3, end: 5 },
      { line: 1, start: 1, end: 1 },
    ]);
  });

  test('block spans stop at the last line', () => {
    const buffer = new TextBuffer('ab');
    expect(blockSpans(blockBounds({ line: 0, column: 0 }, { line: 4, column: 1 }), buffer)).toHaveLength(1);
  });

  test('line selection extracts one string spanning lines', () => {
    const buffer = new TextBuffer('one\ntwo');
    const selection = { kind: 'line' as const, anchor: { line: 1, column: 2 }, active: { line: 0, column: 1 } };
    expect(extractText(selection, buffer)).toEqual(['ne\ntw']);
  });

  test('multi-byte rows slice by code point', () => {
    const buffer = new TextBuffer('😀😀😀😀\nab😀');
    const selection = { kind: 'block' as const, anchor: { line: 0, column: 1 }, active: { line: 1, column: 3 } };
    expect(extractText(selection, buffer)).toEqual(['😀😀', 'b😀']);
  });
});
