/**
 * Document
 *
 * A text buffer bound to an optional file path. Loading and saving go
 * through an injected FileStore; failures come back as IO_ERROR results
 * and never discard the in-memory text.
 */

import { TextBuffer } from './buffer.ts';
import { EditorError } from './errors.ts';
import { err, ok, type Result } from './result.ts';
import type { FileStore } from '../services/files/interface.ts';
import { debugLog } from '../debug.ts';

export class Document {
  readonly buffer: TextBuffer;
  private _filePath: string | null;
  private _modified = false;
  private _isNewFile = false;
  /** Modification time of the file when last loaded or saved */
  private _diskMtimeMs: number | null = null;

  constructor(content: string = '', filePath: string | null = null) {
    this.buffer = new TextBuffer(content);
    this._filePath = filePath;
  }

  /**
   * Open a document from disk. A path that does not exist yet opens as an
   * empty, new document bound to that path.
   */
  static async open(filePath: string, store: FileStore): Promise<Result<Document, EditorError>> {
    try {
      const info = await store.stat(filePath);
      if (!info) {
        const doc = new Document('', filePath);
        doc._isNewFile = true;
        debugLog(`[Document] New file: ${filePath}`);
        return ok(doc);
      }
      const content = await store.readFile(filePath);
      const doc = new Document(content, filePath);
      doc._diskMtimeMs = info.mtimeMs;
      debugLog(`[Document] Loaded ${filePath} (${doc.buffer.lineCount()} lines)`);
      return ok(doc);
    } catch (error) {
      debugLog(`[Document] Failed to load ${filePath}: ${error}`);
      return err(EditorError.io(filePath, error));
    }
  }

  get filePath(): string | null {
    return this._filePath;
  }

  get isNewFile(): boolean {
    return this._isNewFile;
  }

  get diskMtimeMs(): number | null {
    return this._diskMtimeMs;
  }

  get content(): string {
    return this.buffer.getContent();
  }

  isModified(): boolean {
    return this._modified;
  }

  setModified(modified: boolean): void {
    this._modified = modified;
  }

  /**
   * Write the document. Passing a path rebinds the document to it (save as).
   */
  async save(store: FileStore, filePath?: string): Promise<Result<void, EditorError>> {
    const target = filePath ?? this._filePath;
    if (!target) {
      return err(EditorError.io('', new Error('Document has no file path')));
    }
    try {
      await store.writeFile(target, this.buffer.getContent());
      const info = await store.stat(target);
      this._filePath = target;
      this._diskMtimeMs = info?.mtimeMs ?? null;
      this._modified = false;
      this._isNewFile = false;
      debugLog(`[Document] Saved ${target}`);
      return ok(undefined);
    } catch (error) {
      debugLog(`[Document] Failed to save ${target}: ${error}`);
      return err(EditorError.io(target, error));
    }
  }
}
