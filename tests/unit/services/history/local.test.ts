/**
 * File History Store Unit Tests
 */

import { describe, test, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readFile, rm, writeFile, mkdir } from 'fs/promises';
import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import { EditorErrorCode } from '../../../../src/core/errors.ts';
import { FileHistoryStore, historyPathFor } from '../../../../src/services/history/local.ts';
import { createHeader } from '../../../../src/services/history/schema.ts';

describe('FileHistoryStore', () => {
  let dir: string;
  let store: FileHistoryStore;
  const doc = '/projects/app/readme.md';

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'inkwell-history-'));
    store = new FileHistoryStore(dir);
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('logs live under the directory at the document path', () => {
    expect(historyPathFor('/hist', '/projects/app/readme.md')).toBe('/hist/projects/app/readme.md.history');
    expect(store.pathFor(doc)).toBe(join(dir, `${resolve(doc)}.history`));
  });

  test('load without a log returns null', async () => {
    expect(await store.load(doc)).toEqual({ ok: true, value: null });
  });

  test('rewrite then append then load', async () => {
    await store.rewrite(doc, { header: createHeader(42), operations: [{ type: 'saved' }] });
    await store.append(doc, [{ type: 'unsaved' }]);

    const text = await readFile(store.pathFor(doc), 'utf8');
    expect(text).toBe('{"type":"header","version":1,"fileMtimeMs":42}\n{"type":"saved"}\n{"type":"unsaved"}\n');
    expect(await store.load(doc)).toEqual({
      ok: true,
      value: { header: createHeader(42), operations: [{ type: 'saved' }, { type: 'unsaved' }] },
    });
  });

  test('a corrupt log is a persistence error', async () => {
    const path = store.pathFor(doc);
    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, 'garbage');
    const result = await store.load(doc);
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.code).toBe(EditorErrorCode.PERSISTENCE_ERROR);
  });

  test('remove deletes the log and tolerates a missing one', async () => {
    await store.rewrite(doc, { header: createHeader(null), operations: [] });
    await store.remove(doc);
    await store.remove(doc);
    expect(await store.load(doc)).toEqual({ ok: true, value: null });
  });
});
