/**
 * PDF utility functions for coordinate transformation, font mapping and
 * character filtering.
 */

import { StandardFonts, PDFPage, Color } from 'pdf-lib';

/**
 * PDF uses a bottom-left origin, page descriptions use top-left.
 * Transform a Y coordinate from page-description space to PDF space.
 */
export function transformY(y: number, pageHeight: number): number {
  return pageHeight - y;
}

/**
 * The standard PDF font with this PostScript name, if there is one.
 */
export function getStandardFont(pdfName: string): StandardFonts | null {
  return Object.values(StandardFonts).find(font => font === pdfName) ?? null;
}

/**
 * Characters in 128-159 that WinAnsi maps to printable glyphs.
 */
const WIN_ANSI_EXTRAS = new Set(
  '€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ'
);

export interface FilteredText {
  text: string;
  /** Characters that had no WinAnsi glyph, in order of appearance */
  replaced: string[];
}

/**
 * Standard PDF fonts only cover WinAnsi. Characters outside it become `?`,
 * one per code point so columns stay aligned.
 */
export function filterToWinAnsi(text: string): FilteredText {
  let result = '';
  const replaced: string[] = [];

  for (const char of text) {
    const code = char.charCodeAt(0);
    if ((code >= 32 && code <= 126) || (code >= 160 && code <= 255) || WIN_ANSI_EXTRAS.has(char)) {
      result += char;
    } else {
      result += '?';
      replaced.push(char);
    }
  }

  return { text: result, replaced };
}

/**
 * Draw a line on a PDF page, taking top-left based coordinates.
 */
export function drawLine(
  page: PDFPage,
  x1: number,
  y1: number,
  x2: number,
  y2: number,
  color: Color,
  thickness: number,
  pageHeight: number
): void {
  page.drawLine({
    start: { x: x1, y: transformY(y1, pageHeight) },
    end: { x: x2, y: transformY(y2, pageHeight) },
    color,
    thickness
  });
}
