/**
 * Character Index Utilities
 *
 * Lines are JS strings, but every column the core exposes counts Unicode
 * code points. These helpers translate between code point columns and
 * UTF-16 offsets so a surrogate pair is never split.
 */

const SURROGATE = /[\uD800-\uDFFF]/;

/**
 * True when the string has no astral characters, so code point and
 * UTF-16 indices coincide.
 */
export function isSimple(text: string): boolean {
  return !SURROGATE.test(text);
}

/**
 * Number of code points in a string.
 */
export function charLength(text: string): number {
  if (isSimple(text)) return text.length;
  let count = 0;
  for (const _ of text) count++;
  return count;
}

/**
 * UTF-16 offset of a code point column. Columns past the end map to the string length.
 */
export function charToOffset(text: string, column: number): number {
  if (column <= 0) return 0;
  if (isSimple(text)) return Math.min(column, text.length);
  let offset = 0;
  let index = 0;
  for (const ch of text) {
    if (index === column) return offset;
    offset += ch.length;
    index++;
  }
  return text.length;
}

/**
 * Code point column of a UTF-16 offset. An offset inside a surrogate pair
 * resolves to the column of that pair.
 */
export function offsetToChar(text: string, offset: number): number {
  if (offset <= 0) return 0;
  if (isSimple(text)) return Math.min(offset, text.length);
  let position = 0;
  let index = 0;
  for (const ch of text) {
    if (position + ch.length > offset) return index;
    position += ch.length;
    index++;
  }
  return index;
}

/**
 * Slice by code point columns.
 */
export function sliceChars(text: string, start: number, end?: number): string {
  if (isSimple(text)) return text.slice(start, end);
  const from = charToOffset(text, start);
  const to = end === undefined ? text.length : charToOffset(text, end);
  return text.slice(from, to);
}

/**
 * Character at a code point column, or undefined past the end.
 */
export function charAtColumn(text: string, column: number): string | undefined {
  if (column < 0) return undefined;
  if (isSimple(text)) return column < text.length ? text[column] : undefined;
  let index = 0;
  for (const ch of text) {
    if (index === column) return ch;
    index++;
  }
  return undefined;
}

/**
 * Word characters for word-wise motion and deletion.
 */
export function isWordChar(ch: string): boolean {
  return /[\p{L}\p{N}_]/u.test(ch);
}
