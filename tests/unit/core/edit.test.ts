/**
 * Edit Primitive Unit Tests
 */

import { describe, test, expect } from 'vitest';
import { TextBuffer } from '../../../src/core/buffer.ts';
import {
  applyEdit,
  applyPrimitive,
  editLength,
  insertionEdit,
  invertEdit,
  primitivesOf,
  transformPosition,
  type Edit,
} from '../../../src/core/edit.ts';
import { EditorErrorCode } from '../../../src/core/errors.ts';

describe('invertEdit', () => {
  const cases: Array<{ name: string; content: string; edit: Edit; after: string }> = [
    { name: 'insertChar', content: 'ac', edit: { kind: 'insertChar', at: { line: 0, column: 1 }, char: 'b' }, after: 'abc' },
    {
      name: 'deleteCharBefore',
      content: 'abc',
      edit: { kind: 'deleteCharBefore', at: { line: 0, column: 2 }, char: 'b' },
      after: 'ac',
    },
    {
      name: 'deleteCharAfter',
      content: 'abc',
      edit: { kind: 'deleteCharAfter', at: { line: 0, column: 0 }, char: 'a' },
      after: 'bc',
    },
    { name: 'splitLine', content: 'abcd', edit: { kind: 'splitLine', at: { line: 0, column: 2 } }, after: 'ab\ncd' },
    { name: 'joinLine', content: 'ab\ncd', edit: { kind: 'joinLine', line: 0, column: 2 }, after: 'abcd' },
    {
      name: 'insertText',
      content: 'ad',
      edit: { kind: 'insertText', at: { line: 0, column: 1 }, text: 'b\nc' },
      after: 'ab\ncd',
    },
    {
      name: 'deleteRange',
      content: 'one\ntwo',
      edit: { kind: 'deleteRange', range: { start: { line: 0, column: 1 }, end: { line: 1, column: 1 } }, text: 'ne\nt' },
      after: 'owo',
    },
  ];

  for (const { name, content, edit, after } of cases) {
    test(`${name} applies and its inverse restores the content`, () => {
      const buffer = new TextBuffer(content);
      expect(applyEdit(buffer, edit).ok).toBe(true);
      expect(buffer.getContent()).toBe(after);
      expect(applyEdit(buffer, invertEdit(edit)).ok).toBe(true);
      expect(buffer.getContent()).toBe(content);
    });
  }

  test('composite inverts in reverse order', () => {
    const edit: Edit = {
      kind: 'composite',
      edits: [
        { kind: 'insertChar', at: { line: 0, column: 0 }, char: 'x' },
        { kind: 'insertChar', at: { line: 0, column: 1 }, char: 'y' },
      ],
    };
    expect(invertEdit(edit)).toEqual({
      kind: 'composite',
      edits: [
        { kind: 'deleteCharAfter', at: { line: 0, column: 1 }, char: 'y' },
        { kind: 'deleteCharAfter', at: { line: 0, column: 0 }, char: 'x' },
      ],
    });
  });
});

describe('applyPrimitive', () => {
  test('rejects a deletion whose recorded text does not match', () => {
    const buffer = new TextBuffer('abc');
    const result = applyPrimitive(buffer, { kind: 'deleteCharAfter', at: { line: 0, column: 0 }, char: 'z' });
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(EditorErrorCode.OUT_OF_BOUNDS);
    expect(buffer.getContent()).toBe('abc');
  });

  test('rejects a split outside the buffer', () => {
    const buffer = new TextBuffer('abc');
    expect(applyPrimitive(buffer, { kind: 'splitLine', at: { line: 2, column: 0 } }).ok).toBe(false);
  });
});

describe('applyEdit', () => {
  test('a failing composite leaves the buffer unchanged', () => {
    const buffer = new TextBuffer('hello');
    const result = applyEdit(buffer, {
      kind: 'composite',
      edits: [
        { kind: 'insertText', at: { line: 0, column: 5 }, text: ' world' },
        { kind: 'deleteCharAfter', at: { line: 7, column: 0 }, char: 'x' },
      ],
    });
    expect(result.ok).toBe(false);
    expect(buffer.getContent()).toBe('hello');
  });
});

describe('transformPosition', () => {
  const insertion = { start: { line: 1, column: 2 }, end: { line: 1, column: 2 }, text: 'abc' };

  test('positions before the change are unchanged', () => {
    expect(transformPosition({ line: 1, column: 1 }, insertion)).toEqual({ line: 1, column: 1 });
  });

  test('positions at an insertion point shift past it', () => {
    expect(transformPosition({ line: 1, column: 2 }, insertion)).toEqual({ line: 1, column: 5 });
  });

  test('later lines keep their columns through a multi-line insertion', () => {
    const change = { start: { line: 0, column: 1 }, end: { line: 0, column: 1 }, text: 'x\ny' };
    expect(transformPosition({ line: 0, column: 3 }, change)).toEqual({ line: 1, column: 3 });
    expect(transformPosition({ line: 2, column: 4 }, change)).toEqual({ line: 3, column: 4 });
  });

  test('positions inside a deleted range collapse to its start', () => {
    const deletion = { start: { line: 0, column: 2 }, end: { line: 2, column: 1 }, text: '' };
    expect(transformPosition({ line: 1, column: 5 }, deletion)).toEqual({ line: 0, column: 2 });
    expect(transformPosition({ line: 2, column: 4 }, deletion)).toEqual({ line: 0, column: 5 });
    expect(transformPosition({ line: 3, column: 4 }, deletion)).toEqual({ line: 1, column: 4 });
  });
});

describe('helpers', () => {
  test('insertionEdit picks the narrowest primitive', () => {
    const at = { line: 0, column: 0 };
    expect(insertionEdit(at, '\n').kind).toBe('splitLine');
    expect(insertionEdit(at, '😀').kind).toBe('insertChar');
    expect(insertionEdit(at, 'ab').kind).toBe('insertText');
  });

  test('primitivesOf flattens nested composites', () => {
    const edit: Edit = {
      kind: 'composite',
      edits: [
        { kind: 'splitLine', at: { line: 0, column: 0 } },
        { kind: 'composite', edits: [{ kind: 'joinLine', line: 0, column: 0 }] },
      ],
    };
    expect(primitivesOf(edit).map((e) => e.kind)).toEqual(['splitLine', 'joinLine']);
    expect(editLength(edit)).toBe(2);
  });
});
