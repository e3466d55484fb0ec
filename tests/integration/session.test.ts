/**
 * Editor Session Integration Tests
 *
 * Documents opened through an in-memory file store, with undo history
 * persisted to an in-memory history store.
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { Settings } from '../../src/config/settings.ts';
import type { EditorError } from '../../src/core/errors.ts';
import { EditorErrorCode } from '../../src/core/errors.ts';
import { MemoryHistoryStore } from '../../src/services/history/memory.ts';
import { parseLog } from '../../src/services/history/schema.ts';
import { EditorSession, type EditorSessionOptions } from '../../src/state/editor-session.ts';
import { MemoryFileStore } from '../helpers/memory-file-store.ts';

const PATH = '/work/doc.txt';

class BrokenHistoryStore extends MemoryHistoryStore {
  override async append(): Promise<void> {
    throw new Error('disk full');
  }

  override async rewrite(): Promise<void> {
    throw new Error('disk full');
  }
}

function operationTypes(store: MemoryHistoryStore, path: string): string[] {
  const parsed = parseLog(store.raw(path) ?? '');
  return parsed.ok ? parsed.value.operations.map((op) => op.type) : [];
}

describe('EditorSession', () => {
  let fileStore: MemoryFileStore;
  let historyStore: MemoryHistoryStore;
  let settings: Settings;
  let options: EditorSessionOptions;
  const sessions: EditorSession[] = [];

  async function open(path: string = PATH): Promise<EditorSession> {
    const result = await EditorSession.open(path, options);
    if (!result.ok) throw result.error;
    sessions.push(result.value);
    return result.value;
  }

  beforeEach(() => {
    fileStore = new MemoryFileStore();
    historyStore = new MemoryHistoryStore();
    settings = new Settings();
    options = { fileStore, historyStore, settings };
    fileStore.touch(PATH, 'hello\nworld');
  });

  afterEach(async () => {
    for (const session of sessions.splice(0)) {
      await session.close();
    }
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Editing and undo
  // ─────────────────────────────────────────────────────────────────────────

  describe('undo and redo', () => {
    test('drive the modified flag through the saved point', async () => {
      const session = await open();
      expect(session.document.isModified()).toBe(false);

      session.engine.insertText('X');
      expect(session.document.content).toBe('Xhello\nworld');
      expect(session.document.isModified()).toBe(true);

      expect(session.undo()).toEqual({ ok: true, value: true });
      expect(session.document.content).toBe('hello\nworld');
      expect(session.document.isModified()).toBe(false);
      expect(session.undo()).toEqual({ ok: true, value: false });

      expect(session.redo()).toEqual({ ok: true, value: true });
      expect(session.document.content).toBe('Xhello\nworld');
      expect(session.document.isModified()).toBe(true);
    });

    test('undo restores the cursor from before the edit', async () => {
      const session = await open();
      session.cursors.set({ line: 1, column: 5 });
      session.engine.insertText('!');
      expect(session.cursors.primary()).toEqual({ line: 1, column: 6 });
      session.undo();
      expect(session.cursors.primary()).toEqual({ line: 1, column: 5 });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Persistence
  // ─────────────────────────────────────────────────────────────────────────

  describe('persistence', () => {
    test('history survives a save and reopen', async () => {
      const first = await open();
      first.engine.insertText('A');
      first.engine.insertText('B');
      expect((await first.save()).ok).toBe(true);
      first.engine.insertText('C');
      await first.close();

      expect(fileStore.content(PATH)).toBe('ABhello\nworld');
      expect(operationTypes(historyStore, PATH)).toEqual(['push', 'push', 'saved', 'push']);

      const reopened = await open();
      expect(reopened.document.content).toBe('ABhello\nworld');
      expect(reopened.document.isModified()).toBe(false);
      expect(reopened.history.size()).toBe(2);
      expect(reopened.history.redoSize()).toBe(1);

      reopened.undo();
      expect(reopened.document.content).toBe('Ahello\nworld');
      reopened.redo();
      reopened.redo();
      expect(reopened.document.content).toBe('ABChello\nworld');
      expect(reopened.document.isModified()).toBe(true);
    });

    test('an edit after reopening replaces the unsaved redo branch', async () => {
      const path = '/work/abc.txt';
      fileStore.touch(path, 'abc');

      const first = await open(path);
      first.cursors.set({ line: 0, column: 3 });
      first.engine.insertText('X');
      await first.save();
      first.engine.insertText('Y');
      await first.close();

      const second = await open(path);
      expect(second.document.content).toBe('abcX');
      second.cursors.set({ line: 0, column: 4 });
      second.engine.insertText('Z');
      await second.close();

      const third = await open(path);
      expect(third.history.size() + third.history.redoSize()).toBe(2);
      expect(third.redo()).toEqual({ ok: true, value: true });
      expect(third.redo()).toEqual({ ok: true, value: false });
      expect(third.document.content).toBe('abcXZ');
    });

    test('a file changed on disk discards its history', async () => {
      const first = await open();
      first.engine.insertText('A');
      await first.save();
      await first.close();

      fileStore.touch(PATH, 'changed elsewhere');
      const reopened = await open();
      expect(reopened.document.content).toBe('changed elsewhere');
      expect(reopened.history.canUndo()).toBe(false);

      reopened.engine.insertText('Z');
      await reopened.flush();
      const parsed = parseLog(historyStore.raw(PATH) ?? '');
      expect(parsed.ok && parsed.value.header.fileMtimeMs).toBe(reopened.document.diskMtimeMs);
      expect(operationTypes(historyStore, PATH)).toEqual(['push']);
    });

    test('save as binds the history to the new path', async () => {
      const session = EditorSession.create('draft', options);
      sessions.push(session);
      session.engine.insertText('!');
      expect((await session.save('/work/new.txt')).ok).toBe(true);
      await session.flush();

      expect(fileStore.content('/work/new.txt')).toBe('!draft');
      expect(session.document.filePath).toBe('/work/new.txt');
      expect(operationTypes(historyStore, '/work/new.txt')).toEqual(['push', 'saved']);
    });

    test('a failed save keeps the content and the modified flag', async () => {
      const session = await open();
      session.engine.insertText('A');
      fileStore.failWrites = true;

      const result = await session.save();
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(EditorErrorCode.IO_ERROR);
      expect(session.document.isModified()).toBe(true);
      expect(fileStore.content(PATH)).toBe('hello\nworld');
    });

    test('history write failures are reported and editing continues', async () => {
      options.historyStore = new BrokenHistoryStore();
      const session = await open();
      const errors: EditorError[] = [];
      session.onPersistenceError((error) => errors.push(error));

      session.engine.insertText('A');
      await session.flush();

      expect(errors.map((e) => e.code)).toEqual([EditorErrorCode.PERSISTENCE_ERROR]);
      expect(errors[0]?.message).toBe(`History ${PATH}: rewrite failed: disk full`);
      expect(session.undo()).toEqual({ ok: true, value: true });
      expect(session.document.content).toBe('hello\nworld');
    });

    test('nothing is persisted with history disabled', async () => {
      settings.set('history.enabled', false);
      const session = await open();
      session.engine.insertText('A');
      await session.save();
      await session.flush();
      expect(historyStore.raw(PATH)).toBeUndefined();
      expect(session.undo()).toEqual({ ok: true, value: true });
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Settings
  // ─────────────────────────────────────────────────────────────────────────

  describe('settings', () => {
    test('changes reach the engine until the session closes', async () => {
      const session = await open();
      settings.set('editor.tabSize', 2);
      session.engine.insertTab();
      expect(session.document.content).toBe('  hello\nworld');

      await session.close();
      settings.set('editor.tabSize', 8);
      expect(session.engine.getTabSize()).toBe(2);
    });

    test('wrap width follows the wrap settings', () => {
      const session = EditorSession.create('', options);
      sessions.push(session);
      expect(session.wrapWidth(80)).toBe(80);
      settings.set('editor.wordWrapColumn', 40);
      expect(session.wrapWidth(80)).toBe(40);
      expect(session.wrapWidth(30)).toBe(30);
      settings.set('editor.wordWrap', false);
      expect(session.wrapWidth(80)).toBe(0);
    });
  });

  // ─────────────────────────────────────────────────────────────────────────
  // Search
  // ─────────────────────────────────────────────────────────────────────────

  describe('search', () => {
    const TEXT = 'cat one\ncat two\ncat three';

    test('find next, replace one, then replace all as one undo', () => {
      const session = EditorSession.create(TEXT, options);
      sessions.push(session);
      session.enterSearch();
      expect(session.isSearchActive()).toBe(true);
      expect(session.setSearchPattern('cat')).toEqual({ ok: true, value: 3 });

      const found = session.findNext();
      expect(found?.match.range.start).toEqual({ line: 1, column: 0 });
      expect(session.cursors.primary()).toEqual({ line: 1, column: 0 });
      expect(session.hitInfo()).toEqual({ current: 2, total: 3 });
      expect(session.find.getHistory()).toEqual(['cat']);

      session.replaceCurrent('dog');
      expect(session.document.content).toBe('cat one\ndog two\ncat three');
      expect(session.find.matches()).toHaveLength(2);

      expect(session.replaceAll('cow')).toEqual({ ok: true, value: 2 });
      expect(session.document.content).toBe('cow one\ndog two\ncow three');

      session.undo();
      expect(session.document.content).toBe('cat one\ndog two\ncat three');
      expect(session.find.matches()).toHaveLength(2);
    });

    test('a line selection scopes the search', () => {
      const session = EditorSession.create(TEXT, options);
      sessions.push(session);
      session.selection.startSelection({ line: 1, column: 0 });
      session.selection.extendSelection({ line: 2, column: 3 });
      session.enterSearch();
      expect(session.setSearchPattern('cat')).toEqual({ ok: true, value: 2 });
      expect(session.find.getState().scope).toEqual({ start: { line: 1, column: 0 }, end: { line: 2, column: 3 } });
    });

    test('a malformed pattern is reported without touching the document', () => {
      const session = EditorSession.create(TEXT, options);
      sessions.push(session);
      session.enterSearch();
      const result = session.setSearchPattern('cat(');
      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe(EditorErrorCode.PATTERN_ERROR);
      expect(session.findNext()).toBeNull();
      expect(session.replaceAll('x').ok).toBe(false);
      expect(session.document.content).toBe(TEXT);
    });

    test('mode, case and scope changes recount the matches', () => {
      const session = EditorSession.create('foo Foo\nfoo', options);
      sessions.push(session);
      session.enterSearch();
      expect(session.setSearchPattern('Foo')).toEqual({ ok: true, value: 3 });

      expect(session.setSearchCaseSensitive(true)).toEqual({ ok: true, value: 1 });
      expect(session.findNext()?.match.range.start).toEqual({ line: 0, column: 4 });

      expect(session.setSearchCaseSensitive(false)).toEqual({ ok: true, value: 3 });
      const scope = { start: { line: 1, column: 0 }, end: { line: 1, column: 3 } };
      expect(session.setSearchScope(scope)).toEqual({ ok: true, value: 1 });
      expect(session.setSearchScope(null)).toEqual({ ok: true, value: 3 });

      session.setSearchPattern('f?o');
      expect(session.setSearchMode('wildcard')).toEqual({ ok: true, value: 3 });
    });

    test('exiting search clears the matches', () => {
      const session = EditorSession.create(TEXT, options);
      sessions.push(session);
      session.enterSearch();
      session.setSearchPattern('cat');
      session.exitSearch();
      expect(session.isSearchActive()).toBe(false);
      expect(session.find.matches()).toEqual([]);
    });
  });
});
