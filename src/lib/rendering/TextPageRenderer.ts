import { encodeText } from '../codec/OverstrikeCodec';
import { PageDescription } from '../print/types';
import { TextStyle, PLAIN, makeStyle } from '../text/types';

/**
 * A page as lines of text, `widthChars` columns by `heightLines` rows.
 * Bold and underline are written as overstrike sequences.
 */
export type TextPage = string[];

const FORM_FEED = '\f';

/**
 * Render page descriptions to full-size character grids.
 * The double-sided gutter has no character equivalent and is ignored.
 */
export function renderTextPages(pages: PageDescription[]): TextPage[] {
  return pages.map(renderTextPage);
}

function renderTextPage(page: PageDescription): TextPage {
  const { widthChars, heightLines } = page.geometry;
  const chars: string[][] = [];
  const styles: TextStyle[][] = [];
  for (let row = 0; row < heightLines; row++) {
    chars.push(new Array<string>(widthChars).fill(' '));
    styles.push(new Array<TextStyle>(widthChars).fill(PLAIN));
  }

  const place = (row: number, column: number, text: string, style: TextStyle): void => {
    if (row < 0 || row >= heightLines) return;
    let col = column;
    // One cell per code point
    for (const char of text) {
      if (col >= 0 && col < widthChars) {
        chars[row][col] = char;
        styles[row][col] = style;
      }
      col++;
    }
  };

  if (page.pageNumberLabel) {
    const label = page.pageNumberLabel;
    place(label.row, label.column, label.text, PLAIN);
  }
  for (const run of page.runs) {
    place(run.row, run.column, run.text, makeStyle(run.bold, run.underline));
  }

  return chars.map((row, i) => encodeText({
    text: row.join(''),
    styles: row.flatMap((char, col) => new Array<TextStyle>(char.length).fill(styles[i][col]))
  }));
}

/**
 * Join rendered pages into one printable string with a form feed line between pages.
 */
export function joinTextPages(pages: TextPage[]): string {
  return pages.map(page => page.join('\n')).join(`\n${FORM_FEED}\n`);
}
