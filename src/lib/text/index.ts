// Types
export type {
  TextStyle,
  StyleAttribute,
  StyledText,
  TextRun,
  ParagraphLine,
  VisualLine,
  Paragraph
} from './types';

export {
  makeStyle,
  PLAIN,
  BOLD,
  UNDERLINE,
  BOLD_UNDERLINE,
  withAttribute,
  stylesEqual,
  isPlain,
  styled,
  EMPTY_TEXT,
  concatStyled,
  styledTextEquals,
  toRuns,
  BACKSPACE_CHAR,
  PARAGRAPH_SEPARATOR
} from './types';

// Classes
export { DocumentBuffer } from './DocumentBuffer';
export type { DocumentBufferEvents } from './DocumentBuffer';
export { TextLayout, assertLineWidth, columnCount } from './TextLayout';
