/**
 * History Recorder Unit Tests
 */

import { describe, test, expect, beforeEach } from 'vitest';
import type { EditRecord } from '../../../../src/core/edit.ts';
import type { EditorError } from '../../../../src/core/errors.ts';
import { EditorErrorCode } from '../../../../src/core/errors.ts';
import { UndoHistory } from '../../../../src/core/undo.ts';
import { MemoryHistoryStore } from '../../../../src/services/history/memory.ts';
import { HistoryRecorder, loadHistory } from '../../../../src/services/history/recorder.ts';
import { createHeader, parseLog, serializeLog } from '../../../../src/services/history/schema.ts';

// ============================================
// Test Helpers
// ============================================

const DOC = '/work/notes.txt';

function record(char: string, column: number = 0): EditRecord {
  const state = (col: number) => ({
    cursors: { positions: [{ line: 0, column: col }], primary: 0 },
    selection: { kind: 'none' as const },
  });
  return {
    edit: { kind: 'insertChar', at: { line: 0, column }, char },
    before: state(column),
    after: state(column + 1),
  };
}

function operationTypes(store: MemoryHistoryStore): string[] {
  const parsed = parseLog(store.raw(DOC) ?? '');
  return parsed.ok ? parsed.value.operations.map((op) => op.type) : [];
}

/**
 * Store whose writes fail while `failing` is set.
 */
class FlakyHistoryStore extends MemoryHistoryStore {
  failing = false;

  override async append(...args: Parameters<MemoryHistoryStore['append']>): Promise<void> {
    if (this.failing) throw new Error('disk full');
    return super.append(...args);
  }

  override async rewrite(...args: Parameters<MemoryHistoryStore['rewrite']>): Promise<void> {
    if (this.failing) throw new Error('disk full');
    return super.rewrite(...args);
  }
}

describe('HistoryRecorder', () => {
  let store: MemoryHistoryStore;
  let history: UndoHistory;
  let mtime: number | null;

  beforeEach(() => {
    store = new MemoryHistoryStore();
    history = new UndoHistory();
    mtime = 1000;
  });

  test('the first change of a fresh history writes a whole log', async () => {
    const recorder = new HistoryRecorder(store, DOC, history, () => mtime);
    history.push(record('a'));
    await recorder.flush();

    const parsed = parseLog(store.raw(DOC) ?? '');
    expect(parsed.ok && parsed.value.header).toEqual(createHeader(1000));
    expect(operationTypes(store)).toEqual(['push']);
  });

  test('later changes are appended in order', async () => {
    const recorder = new HistoryRecorder(store, DOC, history, () => mtime);
    history.push(record('a'));
    history.push(record('b', 1));
    history.undo();
    history.redo();
    await recorder.flush();
    expect(operationTypes(store)).toEqual(['push', 'push', 'undo', 'redo']);
  });

  test('saving compacts the log with the new file time', async () => {
    const recorder = new HistoryRecorder(store, DOC, history, () => mtime);
    history.push(record('a'));
    history.push(record('b', 1));
    history.undo();
    mtime = 2000;
    history.markSaved();
    await recorder.flush();

    const parsed = parseLog(store.raw(DOC) ?? '');
    expect(parsed.ok && parsed.value.header.fileMtimeMs).toBe(2000);
    expect(operationTypes(store)).toEqual(['push', 'saved', 'push', 'undo']);
  });

  test('a failed write is reported and the next change rewrites the log', async () => {
    const flaky = new FlakyHistoryStore();
    const recorder = new HistoryRecorder(flaky, DOC, history, () => mtime);
    const errors: EditorError[] = [];
    recorder.onPersistenceError((error) => errors.push(error));

    history.push(record('a'));
    await recorder.flush();
    flaky.failing = true;
    history.push(record('b', 1));
    await recorder.flush();

    expect(errors).toHaveLength(1);
    expect(errors[0]?.code).toBe(EditorErrorCode.PERSISTENCE_ERROR);
    expect(errors[0]?.message).toBe(`History ${DOC}: append failed: disk full`);
    expect(history.size()).toBe(2);

    flaky.failing = false;
    history.push(record('c', 2));
    await recorder.flush();
    const parsed = parseLog(flaky.raw(DOC) ?? '');
    expect(parsed.ok && parsed.value.operations.map((op) => op.type)).toEqual(['push', 'push', 'push']);
  });

  test('dispose stops following the history', async () => {
    const recorder = new HistoryRecorder(store, DOC, history, () => mtime);
    recorder.dispose();
    history.push(record('a'));
    await recorder.flush();
    expect(store.raw(DOC)).toBeUndefined();
  });
});

describe('loadHistory', () => {
  let store: MemoryHistoryStore;

  beforeEach(() => {
    store = new MemoryHistoryStore();
  });

  test('no log gives an empty history', async () => {
    const loaded = await loadHistory(store, DOC, 1000);
    expect(loaded.restored).toBe(false);
    expect(loaded.history.canUndo()).toBe(false);
  });

  test('restores the stacks positioned at the saved point', async () => {
    const a = record('a');
    const b = record('b', 1);
    store.setRaw(
      DOC,
      serializeLog({
        header: createHeader(1000),
        operations: [
          { type: 'push', record: a },
          { type: 'saved' },
          { type: 'push', record: b },
        ],
      })
    );
    const loaded = await loadHistory(store, DOC, 1000);
    expect(loaded.restored).toBe(true);
    expect(loaded.inSync).toBe(false);
    expect(loaded.history.size()).toBe(1);
    expect(loaded.history.redoSize()).toBe(1);
    expect(loaded.history.isModified()).toBe(false);
  });

  test('a history moved to its saved point is rewritten on the next change', async () => {
    store.setRaw(
      DOC,
      serializeLog({
        header: createHeader(1000),
        operations: [{ type: 'push', record: record('a') }, { type: 'saved' }, { type: 'push', record: record('b', 1) }],
      })
    );
    const loaded = await loadHistory(store, DOC, 1000);
    const recorder = new HistoryRecorder(store, DOC, loaded.history, () => 1000, loaded.inSync);
    loaded.history.push(record('c', 1));
    await recorder.flush();

    expect(operationTypes(store)).toEqual(['push', 'saved', 'push']);
    const reloaded = await loadHistory(store, DOC, 1000);
    expect(reloaded.history.size()).toBe(1);
    expect(reloaded.history.redoSize()).toBe(1);
    const redone = reloaded.history.redo();
    expect(redone?.edit).toEqual({ kind: 'insertChar', at: { line: 0, column: 1 }, char: 'c' });
    expect(reloaded.history.redo()).toBeNull();
  });

  test('a log written against another file version is discarded', async () => {
    store.setRaw(DOC, serializeLog({ header: createHeader(1000), operations: [{ type: 'push', record: record('a') }] }));
    const loaded = await loadHistory(store, DOC, 5000);
    expect(loaded.restored).toBe(false);
    expect(loaded.history.size()).toBe(0);
  });

  test('a corrupt log is discarded', async () => {
    store.setRaw(DOC, 'not json\n');
    const loaded = await loadHistory(store, DOC, 1000);
    expect(loaded.restored).toBe(false);
  });

  test('a log without a reachable saved point is discarded', async () => {
    store.setRaw(
      DOC,
      serializeLog({ header: createHeader(1000), operations: [{ type: 'unsaved' }, { type: 'push', record: record('a') }] })
    );
    const loaded = await loadHistory(store, DOC, 1000);
    expect(loaded.restored).toBe(false);
  });

  test('limits apply to the restored history', async () => {
    store.setRaw(
      DOC,
      serializeLog({
        header: createHeader(1000),
        operations: [{ type: 'push', record: record('a') }, { type: 'push', record: record('b', 1) }, { type: 'saved' }],
      })
    );
    const loaded = await loadHistory(store, DOC, 1000, { maxEntries: 1 });
    expect(loaded.restored).toBe(true);
    expect(loaded.history.size()).toBe(1);
  });

  test('restored recorders append to the existing log', async () => {
    store.setRaw(DOC, serializeLog({ header: createHeader(1000), operations: [{ type: 'push', record: record('a') }, { type: 'saved' }] }));
    const loaded = await loadHistory(store, DOC, 1000);
    expect(loaded.inSync).toBe(true);
    const recorder = new HistoryRecorder(store, DOC, loaded.history, () => 1000, loaded.inSync);
    loaded.history.undo();
    await recorder.flush();
    expect(operationTypes(store)).toEqual(['push', 'saved', 'undo']);
  });
});
