/**
 * Editor Errors
 *
 * Error kinds raised or returned by the editing core.
 */

export enum EditorErrorCode {
  /** A position or range violated the document bounds */
  OUT_OF_BOUNDS = 'OUT_OF_BOUNDS',
  /** A search pattern failed to compile */
  PATTERN_ERROR = 'PATTERN_ERROR',
  /** Undo history could not be read or written */
  PERSISTENCE_ERROR = 'PERSISTENCE_ERROR',
  /** Document file could not be read or written */
  IO_ERROR = 'IO_ERROR',
  /** A setting value failed validation */
  INVALID_SETTING = 'INVALID_SETTING',
}

export class EditorError extends Error {
  readonly code: EditorErrorCode;
  readonly data?: unknown;

  constructor(code: EditorErrorCode, message: string, data?: unknown) {
    super(message);
    this.name = 'EditorError';
    this.code = code;
    this.data = data;
  }

  static outOfBounds(what: string, data?: unknown): EditorError {
    return new EditorError(EditorErrorCode.OUT_OF_BOUNDS, `Out of bounds: ${what}`, data);
  }

  static patternError(pattern: string, reason: string): EditorError {
    return new EditorError(EditorErrorCode.PATTERN_ERROR, `Invalid pattern: ${reason}`, { pattern });
  }

  static persistence(path: string, reason: string): EditorError {
    return new EditorError(EditorErrorCode.PERSISTENCE_ERROR, `History ${path}: ${reason}`, { path });
  }

  /**
   * I/O failures keep the underlying message unchanged so the caller can show it as-is.
   */
  static io(path: string, cause: unknown): EditorError {
    const message = cause instanceof Error ? cause.message : String(cause);
    return new EditorError(EditorErrorCode.IO_ERROR, message, { path });
  }

  static invalidSetting(key: string, reason: string): EditorError {
    return new EditorError(EditorErrorCode.INVALID_SETTING, `Invalid value for ${key}: ${reason}`, { key });
  }
}
