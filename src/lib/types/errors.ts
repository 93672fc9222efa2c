/**
 * Error codes for contract violations and environment failures.
 */
export enum EditorErrorCode {
  OUT_OF_RANGE = 'OUT_OF_RANGE',
  INVALID_CONFIGURATION = 'INVALID_CONFIGURATION',
  FONT_LOAD_ERROR = 'FONT_LOAD_ERROR'
}

/**
 * Error class for every failure the editor core throws.
 */
export class EditorError extends Error {
  constructor(
    message: string,
    public readonly code: EditorErrorCode,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = 'EditorError';
  }
}

/**
 * Raised when a font cannot be selected or loaded.
 * Callers recover by falling back to the default font.
 */
export class FontLoadError extends EditorError {
  constructor(
    message: string,
    public readonly fontName: string,
    details?: unknown
  ) {
    super(message, EditorErrorCode.FONT_LOAD_ERROR, details);
    this.name = 'FontLoadError';
  }
}

export function outOfRange(message: string, details?: unknown): EditorError {
  return new EditorError(message, EditorErrorCode.OUT_OF_RANGE, details);
}

export function invalidConfiguration(message: string, details?: unknown): EditorError {
  return new EditorError(message, EditorErrorCode.INVALID_CONFIGURATION, details);
}
