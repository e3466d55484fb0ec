/**
 * User Configuration
 *
 * Loads user settings from ~/.inkwell/settings.json (JSON, with // and
 * block comments allowed). Unknown keys and invalid values are skipped
 * and logged; the remaining values are applied.
 */

import { homedir } from 'os';
import { join } from 'path';
import { debugLog } from '../debug.ts';
import type { FileStore } from '../services/files/interface.ts';
import { isSettingValue, isValidSettingKey, validateSetting } from './schema.ts';
import type { EditorSettings, Settings } from './settings.ts';

export interface UserConfigResult {
  /** Settings that were applied */
  applied: Partial<EditorSettings>;
  /** Problems found, one message per skipped entry */
  problems: string[];
}

export function defaultConfigDir(): string {
  return process.env.INKWELL_CONFIG_DIR ?? join(homedir(), '.inkwell');
}

/**
 * Strip comments outside of strings so settings files can be annotated.
 */
export function stripJsonComments(text: string): string {
  let out = '';
  let inString = false;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    const next = text[i + 1];
    if (inString) {
      out += ch;
      if (ch === '\\' && next !== undefined) {
        out += next;
        i++;
      } else if (ch === '"') {
        inString = false;
      }
      continue;
    }
    if (ch === '"') {
      inString = true;
      out += ch;
    } else if (ch === '/' && next === '/') {
      while (i < text.length && text[i] !== '\n') i++;
      out += '\n';
    } else if (ch === '/' && next === '*') {
      const end = text.indexOf('*/', i + 2);
      i = end === -1 ? text.length : end + 1;
    } else {
      out += ch;
    }
  }
  return out;
}

export class UserConfigManager {
  private _debugName = 'UserConfigManager';
  readonly configDir: string;
  readonly settingsPath: string;

  constructor(
    private readonly store: FileStore,
    configDir: string = defaultConfigDir()
  ) {
    this.configDir = configDir;
    this.settingsPath = join(configDir, 'settings.json');
  }

  protected debugLog(msg: string): void {
    debugLog(`[${this._debugName}] ${msg}`);
  }

  /**
   * Parse settings text and apply the valid entries.
   */
  applyText(settings: Settings, text: string): UserConfigResult {
    const result: UserConfigResult = { applied: {}, problems: [] };

    let parsed: unknown;
    try {
      parsed = JSON.parse(stripJsonComments(text));
    } catch (error) {
      result.problems.push(`${this.settingsPath}: ${error instanceof Error ? error.message : String(error)}`);
      return result;
    }
    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      result.problems.push(`${this.settingsPath}: expected an object`);
      return result;
    }

    const valid: Partial<EditorSettings> = {};
    for (const [key, value] of Object.entries(parsed)) {
      const check = validateSetting(key, value);
      if (!check.valid || !isValidSettingKey(key) || !isSettingValue(key, value)) {
        result.problems.push(`${key}: ${check.error ?? 'invalid value'}`);
        continue;
      }
      Object.assign(valid, { [key]: value });
    }

    settings.update(valid);
    result.applied = valid;
    for (const problem of result.problems) {
      this.debugLog(`Skipped setting ${problem}`);
    }
    return result;
  }

  /**
   * Load the settings file if it exists.
   */
  async load(settings: Settings): Promise<UserConfigResult> {
    const info = await this.store.stat(this.settingsPath);
    if (!info) {
      this.debugLog(`No settings file at ${this.settingsPath}`);
      return { applied: {}, problems: [] };
    }
    const text = await this.store.readFile(this.settingsPath);
    return this.applyText(settings, text);
  }
}
