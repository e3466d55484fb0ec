/**
 * Settings Manager
 *
 * Typed editor configuration with schema validation and change listeners.
 */

import { homedir } from 'os';
import { join } from 'path';
import type { WrapBreak } from '../core/wrap.ts';
import { EditorError } from '../core/errors.ts';
import type { SearchMode } from '../features/search/pattern.ts';
import { defaultSettings, isSettingValue, isValidSettingKey, validateSetting } from './schema.ts';

export interface EditorSettings {
  'editor.tabSize': number;
  'editor.wordWrap': boolean;
  'editor.wordWrapColumn': number;
  'editor.wrapBreak': WrapBreak;
  'search.caseSensitive': boolean;
  'search.defaultMode': SearchMode;
  'search.historySize': number;
  'history.enabled': boolean;
  'history.maxEntries': number;
  'history.maxBytes': number;
  'history.directory': string;
}

export type SettingKey = keyof EditorSettings;

type Listener<K extends SettingKey> = (value: EditorSettings[K]) => void;
/** Listeners are stored reading their own key out of the full settings */
type StoredListener = (settings: EditorSettings) => void;

export class Settings {
  private settings: EditorSettings;
  private listeners: Map<SettingKey, Set<StoredListener>> = new Map();

  constructor(initial: Partial<EditorSettings> = {}) {
    this.settings = { ...defaultSettings };
    this.update(initial);
  }

  /**
   * Get a setting value
   */
  get<K extends SettingKey>(key: K): EditorSettings[K] {
    return this.settings[key];
  }

  /**
   * Set a setting value. Throws INVALID_SETTING when validation fails.
   */
  set<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const result = validateSetting(key, value);
    if (!result.valid) {
      throw EditorError.invalidSetting(key, result.error ?? 'invalid value');
    }
    this.assign(key, value);
  }

  /**
   * Get all settings
   */
  getAll(): EditorSettings {
    return { ...this.settings };
  }

  /**
   * Update multiple settings. Every value is validated before any is applied.
   */
  update(partial: Partial<EditorSettings>): void {
    for (const [key, value] of Object.entries(partial)) {
      if (value === undefined) continue;
      const result = validateSetting(key, value);
      if (!result.valid) {
        throw EditorError.invalidSetting(key, result.error ?? 'invalid value');
      }
    }
    for (const [key, value] of Object.entries(partial)) {
      if (isValidSettingKey(key) && isSettingValue(key, value)) this.assign(key, value);
    }
  }

  /**
   * Reset to defaults
   */
  reset(): void {
    for (const key of Object.keys(defaultSettings)) {
      if (isValidSettingKey(key)) this.assign(key, defaultSettings[key]);
    }
  }

  /**
   * Listen for changes to a specific setting
   */
  onChange<K extends SettingKey>(key: K, callback: Listener<K>): () => void {
    let keyListeners = this.listeners.get(key);
    if (!keyListeners) {
      keyListeners = new Set();
      this.listeners.set(key, keyListeners);
    }
    const listener: StoredListener = (settings) => callback(settings[key]);
    keyListeners.add(listener);

    return () => {
      this.listeners.get(key)?.delete(listener);
    };
  }

  /**
   * Process environment variable substitution
   */
  resolveEnvVars(value: string): string {
    return value.replace(/\$\{env:([^}]+)\}/g, (_, envVar: string) => {
      return process.env[envVar] || '';
    });
  }

  /**
   * Resolve a path setting: environment variables, then a leading ~.
   */
  resolvePath(value: string): string {
    const resolved = this.resolveEnvVars(value);
    if (resolved === '~') return homedir();
    if (resolved.startsWith('~/')) return join(homedir(), resolved.slice(2));
    return resolved;
  }

  private assign<K extends SettingKey>(key: K, value: EditorSettings[K]): void {
    const oldValue = this.settings[key];
    this.settings[key] = value;
    if (oldValue !== value) {
      this.notifyListeners(key);
    }
  }

  private notifyListeners(key: SettingKey): void {
    const keyListeners = this.listeners.get(key);
    if (keyListeners) {
      for (const listener of keyListeners) {
        listener(this.settings);
      }
    }
  }
}
