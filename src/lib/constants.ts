/**
 * Fixed layout and editing policy.
 */
export const EditorConstants = {
  /** Wrap width of the editing view, in columns */
  DOCUMENT_WIDTH: 65,
  /** Content lines on a printed page (US Letter, 1" margins, 6 lpi) */
  LINES_PER_PAGE: 54,
  /** Top-margin line (0-based) that carries the page number */
  PAGE_NUMBER_LINE: 3,
  /** Horizontal shift applied to alternate pages in double-sided printing (points) */
  DUPLEX_GUTTER_POINTS: 18,
  MAX_UNDO_HISTORY: 500,
  COALESCE_TIME_GAP_MS: 1000,
  COALESCE_MAX_CHARACTERS: 50,
  DEFAULT_FONT_NAME: 'Courier'
} as const;
