/**
 * Search Patterns
 *
 * Compiles user patterns into regular expressions. Wildcard patterns treat
 * `*` as any run of characters and `?` as one character. Matching is
 * case-insensitive unless the caller or a leading `(?i)` / `(?-i)` group
 * says otherwise. A pattern containing the escape `\n` spans lines.
 */

import { EditorError } from '../../core/errors.ts';
import { err, ok, type Result } from '../../core/result.ts';

export type SearchMode = 'regex' | 'wildcard';

export interface PatternOptions {
  mode: SearchMode;
  caseSensitive: boolean;
}

export interface CompiledPattern {
  /** The pattern as the user typed it */
  pattern: string;
  mode: SearchMode;
  caseSensitive: boolean;
  /** Matches may cross line boundaries */
  multiline: boolean;
  /** Global, unicode-aware expression */
  regex: RegExp;
}

const REGEX_SPECIALS = /[\\^$.|+()[\]{}]/;

/**
 * Translate a wildcard pattern to a regular expression source.
 */
export function wildcardToRegex(pattern: string): string {
  let source = '';
  for (const ch of pattern) {
    if (ch === '*') source += '.*';
    else if (ch === '?') source += '.';
    else if (REGEX_SPECIALS.test(ch)) source += `\\${ch}`;
    else source += ch;
  }
  return source;
}

/**
 * Leading case modifier group, applied to the whole pattern. Only a `(?i)`
 * or `(?-i)` at the very start is taken; one elsewhere is left to the
 * regex compiler, which rejects it.
 */
function takeCaseModifier(source: string): { source: string; caseSensitive: boolean | null } {
  if (source.startsWith('(?i)')) return { source: source.slice(4), caseSensitive: false };
  if (source.startsWith('(?-i)')) return { source: source.slice(5), caseSensitive: true };
  return { source, caseSensitive: null };
}

/**
 * True when the source contains an unescaped `\n`.
 */
export function isMultilineSource(source: string): boolean {
  for (let i = 0; i < source.length; i++) {
    if (source[i] !== '\\') continue;
    if (source[i + 1] === 'n') return true;
    i++;
  }
  return false;
}

/**
 * Accept the `(?P<name>...)` and `(?P=name)` group syntax.
 */
function translateNamedGroups(source: string): string {
  return source.replace(/\(\?P<([A-Za-z_][A-Za-z0-9_]*)>/g, '(?<$1>').replace(/\(\?P=([A-Za-z_][A-Za-z0-9_]*)\)/g, '\\k<$1>');
}

export function compilePattern(pattern: string, options: PatternOptions): Result<CompiledPattern, EditorError> {
  if (pattern.length === 0) {
    return err(EditorError.patternError(pattern, 'empty pattern'));
  }

  let caseSensitive = options.caseSensitive;
  let source: string;
  if (options.mode === 'wildcard') {
    source = wildcardToRegex(pattern);
  } else {
    const modifier = takeCaseModifier(pattern);
    if (modifier.caseSensitive !== null) caseSensitive = modifier.caseSensitive;
    source = translateNamedGroups(modifier.source);
  }

  const multiline = options.mode === 'regex' && isMultilineSource(source);
  try {
    const regex = new RegExp(source, caseSensitive ? 'gu' : 'giu');
    return ok({ pattern, mode: options.mode, caseSensitive, multiline, regex });
  } catch (error) {
    return err(EditorError.patternError(pattern, error instanceof Error ? error.message : String(error)));
  }
}
