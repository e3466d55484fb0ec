/**
 * Settings Schema
 *
 * Defines the schema for all settings with types, defaults, and validation rules.
 */

import type { EditorSettings } from './settings.ts';

export interface SettingsSchemaProperty {
  /** Property type */
  type: 'string' | 'number' | 'boolean';
  /** Allowed values (for enums) */
  enum?: readonly unknown[];
  /** Human-readable description */
  description?: string;
  /** Minimum value (for numbers) */
  minimum?: number;
  /** Maximum value (for numbers) */
  maximum?: number;
  /** Numbers must be whole */
  integer?: boolean;
}

export interface SettingsSchema {
  properties: { [K in keyof EditorSettings]: SettingsSchemaProperty };
}

/**
 * Settings validation result.
 */
export interface ValidationResult {
  valid: boolean;
  error?: string;
}

export const defaultSettings: EditorSettings = {
  'editor.tabSize': 4,
  'editor.wordWrap': true,
  'editor.wordWrapColumn': 0,
  'editor.wrapBreak': 'character',
  'search.caseSensitive': false,
  'search.defaultMode': 'regex',
  'search.historySize': 100,
  'history.enabled': true,
  'history.maxEntries': 1000,
  'history.maxBytes': 8 * 1024 * 1024,
  'history.directory': '~/.inkwell/history',
};

/**
 * Complete settings schema with validation rules.
 */
export const settingsSchema: SettingsSchema = {
  properties: {
    // ─────────────────────────────────────────────────────────────────────────
    // Editor Settings
    // ─────────────────────────────────────────────────────────────────────────
    'editor.tabSize': {
      type: 'number',
      minimum: 1,
      maximum: 16,
      integer: true,
      description: 'Number of spaces inserted by Tab',
    },
    'editor.wordWrap': {
      type: 'boolean',
      description: 'Wrap long lines at the wrap column',
    },
    'editor.wordWrapColumn': {
      type: 'number',
      minimum: 0,
      maximum: 10000,
      integer: true,
      description: 'Wrap width in characters; 0 uses the viewport width',
    },
    'editor.wrapBreak': {
      type: 'string',
      enum: ['character', 'word'],
      description: 'Break wrapped lines at any character or after whitespace',
    },

    // ─────────────────────────────────────────────────────────────────────────
    // Search Settings
    // ─────────────────────────────────────────────────────────────────────────
    'search.caseSensitive': {
      type: 'boolean',
      description: 'Match case unless the pattern starts with (?i)',
    },
    'search.defaultMode': {
      type: 'string',
      enum: ['regex', 'wildcard'],
      description: 'Pattern syntax used when search starts',
    },
    'search.historySize': {
      type: 'number',
      minimum: 1,
      maximum: 1000,
      integer: true,
      description: 'Number of search patterns remembered',
    },

    // ─────────────────────────────────────────────────────────────────────────
    // Undo History Settings
    // ─────────────────────────────────────────────────────────────────────────
    'history.enabled': {
      type: 'boolean',
      description: 'Persist undo history next to each document',
    },
    'history.maxEntries': {
      type: 'number',
      minimum: 1,
      integer: true,
      description: 'Undo records kept per document',
    },
    'history.maxBytes': {
      type: 'number',
      minimum: 1024,
      integer: true,
      description: 'Serialized size of undo records kept per document',
    },
    'history.directory': {
      type: 'string',
      description: 'Directory holding undo history logs (supports ~ and ${env:VAR})',
    },
  },
};

/**
 * Check if a setting key is valid.
 */
export function isValidSettingKey(key: string): key is keyof EditorSettings {
  return Object.hasOwn(settingsSchema.properties, key);
}

/**
 * Get the default value for a setting.
 */
export function getDefaultValue<K extends keyof EditorSettings>(key: K): EditorSettings[K] {
  return defaultSettings[key];
}

/**
 * Validate a setting value.
 */
export function validateSetting(key: string, value: unknown): ValidationResult {
  if (!isValidSettingKey(key)) {
    return { valid: false, error: `Unknown setting: ${key}` };
  }
  const schema = settingsSchema.properties[key];

  const valueType = Array.isArray(value) ? 'array' : value === null ? 'null' : typeof value;
  if (valueType !== schema.type) {
    return { valid: false, error: `Expected ${schema.type}, got ${valueType}` };
  }

  if (schema.enum && !schema.enum.includes(value)) {
    return { valid: false, error: `Must be one of: ${schema.enum.join(', ')}` };
  }

  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      return { valid: false, error: 'Must be a finite number' };
    }
    if (schema.integer && !Number.isInteger(value)) {
      return { valid: false, error: 'Must be a whole number' };
    }
    if (schema.minimum !== undefined && value < schema.minimum) {
      return { valid: false, error: `Minimum value is ${schema.minimum}` };
    }
    if (schema.maximum !== undefined && value > schema.maximum) {
      return { valid: false, error: `Maximum value is ${schema.maximum}` };
    }
  }

  return { valid: true };
}

/**
 * Narrow an untyped value to a setting's type.
 */
export function isSettingValue<K extends keyof EditorSettings>(key: K, value: unknown): value is EditorSettings[K] {
  return validateSetting(key, value).valid;
}
