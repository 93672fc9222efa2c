import { outOfRange, invalidConfiguration } from '../types';
import { ParagraphLine, Paragraph, VisualLine, PARAGRAPH_SEPARATOR } from './types';

/**
 * A word plus the spaces that follow it.
 */
interface Segment {
  start: number;
  wordEnd: number;
  end: number;
}

/**
 * List markers that give continuation lines a hanging indent:
 * optional leading whitespace, then `- `, `* `, `12. ` or `12) ` before a non-space.
 */
const LIST_MARKER = /^(\s*)(?:([-*]) (?=\S)|((?:\d+)(?:[.)]) (?=\S)))/;

export function assertLineWidth(width: number): void {
  if (!Number.isInteger(width) || width <= 0) {
    throw invalidConfiguration(`Line width must be a positive integer, got ${width}`, { width });
  }
}

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Columns taken by `text`. Every code point is one character cell, so a
 * surrogate pair counts once.
 */
export function columnCount(text: string): number {
  let columns = 0;
  for (let i = 0; i < text.length; i++) {
    if (!(isLowSurrogate(text.charCodeAt(i)) && i > 0 && isHighSurrogate(text.charCodeAt(i - 1)))) {
      columns++;
    }
  }
  return columns;
}

/**
 * The offset `columns` character cells after `start`.
 */
function advanceColumns(text: string, start: number, columns: number): number {
  let pos = start;
  for (let n = 0; n < columns && pos < text.length; n++) {
    pos += isHighSurrogate(text.charCodeAt(pos)) && isLowSurrogate(text.charCodeAt(pos + 1)) ? 2 : 1;
  }
  return pos;
}

/**
 * Fixed-pitch word wrapping. Every code point occupies one column and only
 * U+0020 is a break opportunity. Offsets stay in UTF-16 code units.
 */
export class TextLayout {
  /**
   * Wrap every paragraph of `content` at `width` columns.
   */
  flowText(content: string, width: number): VisualLine[] {
    assertLineWidth(width);
    const lines: VisualLine[] = [];
    const paragraphs = this.splitIntoParagraphs(content);

    for (const paragraph of paragraphs) {
      const isLast = paragraph.index === paragraphs.length - 1;
      lines.push(...this.placeParagraph(paragraph, this.wrapParagraph(paragraph.text, width), isLast, lines.length));
    }

    return lines;
  }

  /**
   * Turn a paragraph's wrapped lines into document lines numbered from `firstIndex`.
   */
  placeParagraph(paragraph: Paragraph, wrapped: ParagraphLine[], isLast: boolean, firstIndex: number): VisualLine[] {
    return wrapped.map((line, i) => ({
      ...line,
      index: firstIndex + i,
      start: paragraph.start + line.start,
      end: paragraph.start + line.end,
      paragraphIndex: paragraph.index,
      hardBreak: !isLast && i === wrapped.length - 1
    }));
  }

  /**
   * Split content at paragraph separators. There is always at least one paragraph.
   */
  splitIntoParagraphs(content: string): Paragraph[] {
    const paragraphs: Paragraph[] = [];
    let currentStart = 0;

    for (let i = 0; i < content.length; i++) {
      if (content[i] === PARAGRAPH_SEPARATOR) {
        paragraphs.push({
          text: content.substring(currentStart, i),
          start: currentStart,
          index: paragraphs.length
        });
        currentStart = i + 1;
      }
    }

    paragraphs.push({
      text: content.substring(currentStart),
      start: currentStart,
      index: paragraphs.length
    });

    return paragraphs;
  }

  /**
   * Wrap one paragraph (no separators inside) at `width` columns.
   * Offsets in the result are relative to the paragraph start.
   */
  wrapParagraph(text: string, width: number): ParagraphLine[] {
    assertLineWidth(width);
    if (text.includes(PARAGRAPH_SEPARATOR)) {
      throw outOfRange('A paragraph cannot contain a paragraph separator');
    }

    if (text.length === 0) {
      return [{ start: 0, end: 0, text: '', width: 0, indent: 0 }];
    }

    const hanging = this.hangingIndent(text, width);
    const lines: ParagraphLine[] = [];
    let lineStart = 0;
    let indent = 0;

    const closeLine = (end: number): void => {
      lines.push(this.createLine(text, lineStart, end, indent));
      lineStart = end;
      indent = hanging;
    };

    const lineWidth = (end: number): number => indent + columnCount(text.substring(lineStart, end));

    for (const segment of this.splitIntoSegments(text)) {
      if (lineWidth(segment.wordEnd) <= width) {
        continue;
      }

      // The word does not fit: it starts the next line
      if (segment.start > lineStart) {
        closeLine(segment.start);
      }

      // Hard-break a word longer than the available width
      while (lineWidth(segment.wordEnd) > width) {
        closeLine(advanceColumns(text, lineStart, width - indent));
      }
    }

    closeLine(text.length);
    return lines;
  }

  /**
   * Width of a leading list marker, or 0 when the paragraph has none
   * or the marker would leave no room on continuation lines.
   */
  hangingIndent(text: string, width: number): number {
    const match = LIST_MARKER.exec(text);
    if (!match) {
      return 0;
    }
    const indent = match[0].length;
    return indent < width ? indent : 0;
  }

  private splitIntoSegments(text: string): Segment[] {
    const segments: Segment[] = [];
    let pos = 0;

    while (pos < text.length) {
      const start = pos;
      // Leading spaces only occur before the first word
      while (pos < text.length && text[pos] === ' ') pos++;
      const wordStart = pos;
      while (pos < text.length && text[pos] !== ' ') pos++;
      // Spaces with no word after them never force a break
      const wordEnd = pos > wordStart ? pos : start;
      while (pos < text.length && text[pos] === ' ') pos++;
      segments.push({ start, wordEnd, end: pos });
    }

    return segments;
  }

  private createLine(text: string, start: number, end: number, indent: number): ParagraphLine {
    const span = text.substring(start, end);
    return {
      start,
      end,
      text: span,
      width: indent + columnCount(span.replace(/ +$/, '')),
      indent
    };
  }
}
