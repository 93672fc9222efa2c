/**
 * Character attributes. Only bold and underline are modelled.
 */
export interface TextStyle {
  readonly bold: boolean;
  readonly underline: boolean;
}

export type StyleAttribute = 'bold' | 'underline';

/**
 * Text together with one style per UTF-16 code unit.
 */
export interface StyledText {
  text: string;
  styles: TextStyle[];
}

/**
 * A maximal run of characters sharing one style.
 */
export interface TextRun {
  text: string;
  style: TextStyle;
  start: number;
  end: number;
}

const STYLES: readonly TextStyle[] = [
  Object.freeze({ bold: false, underline: false }),
  Object.freeze({ bold: true, underline: false }),
  Object.freeze({ bold: false, underline: true }),
  Object.freeze({ bold: true, underline: true })
];

/**
 * Get the shared instance for a style combination.
 */
export function makeStyle(bold: boolean, underline: boolean): TextStyle {
  return STYLES[(bold ? 1 : 0) + (underline ? 2 : 0)];
}

export const PLAIN: TextStyle = makeStyle(false, false);
export const BOLD: TextStyle = makeStyle(true, false);
export const UNDERLINE: TextStyle = makeStyle(false, true);
export const BOLD_UNDERLINE: TextStyle = makeStyle(true, true);

export function withAttribute(style: TextStyle, attribute: StyleAttribute, on: boolean): TextStyle {
  return attribute === 'bold'
    ? makeStyle(on, style.underline)
    : makeStyle(style.bold, on);
}

export function stylesEqual(a: TextStyle, b: TextStyle): boolean {
  return a.bold === b.bold && a.underline === b.underline;
}

export function isPlain(style: TextStyle): boolean {
  return !style.bold && !style.underline;
}

/**
 * Build styled text where every character carries the same style.
 */
export function styled(text: string, style: TextStyle = PLAIN): StyledText {
  return { text, styles: new Array<TextStyle>(text.length).fill(style) };
}

export const EMPTY_TEXT: StyledText = Object.freeze({ text: '', styles: [] });

export function concatStyled(a: StyledText, b: StyledText): StyledText {
  return { text: a.text + b.text, styles: [...a.styles, ...b.styles] };
}

export function styledTextEquals(a: StyledText, b: StyledText): boolean {
  if (a.text !== b.text || a.styles.length !== b.styles.length) {
    return false;
  }
  return a.styles.every((style, i) => stylesEqual(style, b.styles[i]));
}

/**
 * Split styled text into maximal equal-style runs.
 * Offsets are relative to `base`.
 */
export function toRuns(value: StyledText, base: number = 0): TextRun[] {
  const runs: TextRun[] = [];
  let runStart = 0;

  for (let i = 1; i <= value.text.length; i++) {
    if (i === value.text.length || !stylesEqual(value.styles[i], value.styles[runStart])) {
      runs.push({
        text: value.text.slice(runStart, i),
        style: value.styles[runStart],
        start: base + runStart,
        end: base + i
      });
      runStart = i;
    }
  }

  return runs;
}

/**
 * The backspace control character used by the overstrike file form.
 */
export const BACKSPACE_CHAR = '\b';

export const PARAGRAPH_SEPARATOR = '\n';

/**
 * One wrapped line of a paragraph, with offsets relative to the paragraph start.
 */
export interface ParagraphLine {
  start: number;
  end: number;
  /** The span [start, end), trailing spaces included */
  text: string;
  /** Rendered width in columns: indent plus the span with trailing spaces trimmed */
  width: number;
  /** Hanging indent in columns */
  indent: number;
}

/**
 * One line of the wrapped document, with absolute offsets.
 */
export interface VisualLine extends ParagraphLine {
  index: number;
  paragraphIndex: number;
  /** A paragraph separator follows this line */
  hardBreak: boolean;
}

/**
 * A paragraph's text and the offset where it starts.
 */
export interface Paragraph {
  text: string;
  start: number;
  index: number;
}
