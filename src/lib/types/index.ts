export interface Margin {
  top: number;
  right: number;
  bottom: number;
  left: number;
}

/**
 * Half-open range of logical offsets: [start, end).
 */
export interface TextRange {
  start: number;
  end: number;
}

/**
 * Visual position of an offset once the text is wrapped.
 */
export interface RowColumn {
  row: number;
  column: number;
}

export interface EditorOptions {
  /** Wrap width in columns */
  documentWidth?: number;
  /** Content lines per page before double spacing is applied */
  linesPerPage?: number;
  doubleSpaced?: boolean;
  /** Maximum number of undo steps kept */
  maxUndoHistory?: number;
  /** Maximum gap between keystrokes that still coalesce into one undo step (ms) */
  coalesceTimeGap?: number;
  /** Maximum characters in one coalesced typing burst */
  coalesceMaxCharacters?: number;
  /** Clock used for undo coalescing */
  now?: () => number;
}

/**
 * Print layout switches accepted by the print formatter.
 */
export interface PrintOptions {
  doubleSided: boolean;
  doubleSpaced: boolean;
}

export * from './errors';
