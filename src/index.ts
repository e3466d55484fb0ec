/**
 * Inkwell - terminal text editor core
 *
 * Public entry point: document model, coordinate mapping, selections and
 * cursors, the edit engine, persisted undo history and find/replace.
 */

// Core
export * from './core/buffer.ts';
export * from './core/chars.ts';
export * from './core/clipboard.ts';
export * from './core/cursor.ts';
export * from './core/document.ts';
export * from './core/edit.ts';
export * from './core/edit-engine.ts';
export * from './core/errors.ts';
export * from './core/navigation.ts';
export * from './core/result.ts';
export * from './core/selection.ts';
export * from './core/undo.ts';
export * from './core/wrap.ts';

// Search
export * from './features/search/pattern.ts';
export * from './features/search/template.ts';
export * from './features/search/in-file-search.ts';

// Services
export type { FileStat, FileStore } from './services/files/interface.ts';
export { LocalFileStore } from './services/files/local.ts';
export type { HistoryStore } from './services/history/interface.ts';
export { FileHistoryStore, historyPathFor } from './services/history/local.ts';
export { MemoryHistoryStore } from './services/history/memory.ts';
export { HistoryRecorder, loadHistory } from './services/history/recorder.ts';
export type { LoadedHistory, PersistenceErrorCallback } from './services/history/recorder.ts';
export * from './services/history/schema.ts';

// Config
export { Settings } from './config/settings.ts';
export type { EditorSettings, SettingKey } from './config/settings.ts';
export { defaultSettings, settingsSchema, validateSetting } from './config/schema.ts';
export { UserConfigManager, defaultConfigDir } from './config/user-config.ts';

// Session
export { EditorSession } from './state/editor-session.ts';
export type { EditorSessionOptions } from './state/editor-session.ts';

export { debugLog, setDebugEnabled, isDebugEnabled } from './debug.ts';
