import { DocumentBuffer } from '../text/DocumentBuffer';
import { TextLayout, columnCount } from '../text/TextLayout';
import { StyledText, VisualLine, toRuns } from '../text/types';
import { paginate } from '../layout/Paginator';
import { EditorConstants } from '../constants';
import { PrintOptions } from '../types';
import { FontConfig, PageConstants, resolveFontConfig } from './FontConfig';
import { PageDescription, PageGeometry, PrintRun, PageNumberLabel, FormattedDocument } from './types';

export const DEFAULT_PRINT_OPTIONS: PrintOptions = {
  doubleSided: false,
  doubleSpaced: false
};

/**
 * Lays a document out on physical pages: wraps it at the font's text width,
 * paginates it at the font's text height and places every styled run on the
 * page grid.
 */
export class PrintFormatter {
  private layout: TextLayout = new TextLayout();

  format(
    document: DocumentBuffer | StyledText,
    font: FontConfig,
    options: Partial<PrintOptions> = {}
  ): PageDescription[] {
    const opts: PrintOptions = { ...DEFAULT_PRINT_OPTIONS, ...options };
    const value = document instanceof DocumentBuffer ? document.toStyledText() : document;

    if (value.text.length === 0) {
      return [];
    }

    const lines = this.layout.flowText(value.text, font.textWidth);
    const pages = paginate(lines, font.textHeight, opts.doubleSpaced);

    return pages.map(page => {
      const geometry = this.pageGeometry(font, page.number, opts.doubleSided);
      const runs = page.lines.flatMap((line, i) => {
        const row = font.topMarginLines + (opts.doubleSpaced ? 2 * i : i);
        return this.placeLine(value, line, row, font, geometry);
      });

      const description: PageDescription = {
        pageNumber: page.number,
        geometry,
        runs
      };
      if (page.showPageNumber) {
        description.pageNumberLabel = this.pageNumberLabel(page.number, font, geometry, opts.doubleSided);
      }
      return description;
    });
  }

  /**
   * Format with a named font, falling back to the default font when it is unavailable.
   */
  formatWithFallback(
    document: DocumentBuffer | StyledText,
    fontName: string,
    options: Partial<PrintOptions> = {}
  ): FormattedDocument {
    const { font, warning } = resolveFontConfig(fontName);
    return {
      pages: this.format(document, font, options),
      font,
      warnings: warning ? [warning] : []
    };
  }

  /**
   * Page size and margins for one page. In double-sided printing odd pages
   * shift right and even pages shift left by the binding gutter.
   */
  pageGeometry(font: FontConfig, pageNumber: number, doubleSided: boolean): PageGeometry {
    const charWidthPt = PageConstants.POINTS_PER_INCH / font.pitch;
    const shift = this.gutterShift(pageNumber, doubleSided);
    const toPoints = (chars: number): number => (chars * PageConstants.POINTS_PER_INCH) / font.pitch;

    return {
      widthPt: toPoints(font.pageWidthChars),
      heightPt: font.pageHeightLines * font.lineHeight,
      widthChars: font.pageWidthChars,
      heightLines: font.pageHeightLines,
      lineHeightPt: font.lineHeight,
      charWidthPt,
      margins: {
        top: font.topMarginLines * font.lineHeight,
        bottom: font.bottomMarginLines * font.lineHeight,
        left: toPoints(font.leftMarginChars) + shift,
        right: toPoints(font.rightMarginChars) - shift
      }
    };
  }

  private gutterShift(pageNumber: number, doubleSided: boolean): number {
    if (!doubleSided) {
      return 0;
    }
    return pageNumber % 2 === 1
      ? EditorConstants.DUPLEX_GUTTER_POINTS
      : -EditorConstants.DUPLEX_GUTTER_POINTS;
  }

  private placeLine(
    value: StyledText,
    line: VisualLine,
    row: number,
    font: FontConfig,
    geometry: PageGeometry
  ): PrintRun[] {
    // Trailing spaces are not printed
    const end = line.start + line.text.replace(/ +$/, '').length;
    if (end <= line.start) {
      return [];
    }

    const slice: StyledText = {
      text: value.text.slice(line.start, end),
      styles: value.styles.slice(line.start, end)
    };
    const y = (row + 1) * geometry.lineHeightPt;

    return toRuns(slice).map(run => {
      const textColumn = line.indent + columnCount(slice.text.slice(0, run.start));
      return {
        text: run.text,
        bold: run.style.bold,
        underline: run.style.underline,
        row,
        column: font.leftMarginChars + textColumn,
        x: geometry.margins.left + textColumn * geometry.charWidthPt,
        y
      };
    });
  }

  private pageNumberLabel(
    pageNumber: number,
    font: FontConfig,
    geometry: PageGeometry,
    doubleSided: boolean
  ): PageNumberLabel {
    const text = String(pageNumber);
    const column = Math.floor((font.pageWidthChars - text.length) / 2);
    const row = EditorConstants.PAGE_NUMBER_LINE;
    return {
      text,
      row,
      column,
      x: column * geometry.charWidthPt + this.gutterShift(pageNumber, doubleSided),
      y: (row + 1) * geometry.lineHeightPt
    };
  }
}
