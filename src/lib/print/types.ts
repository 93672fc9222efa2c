import { Margin } from '../types';
import { FontConfig } from './FontConfig';

/**
 * Page size and margins. Lengths are in points unless named otherwise.
 */
export interface PageGeometry {
  widthPt: number;
  heightPt: number;
  widthChars: number;
  heightLines: number;
  lineHeightPt: number;
  charWidthPt: number;
  margins: Margin;
}

/**
 * A run of equally styled text placed on the page grid.
 * `row` and `column` address the full page grid; `x` and `y` are the
 * baseline start in points from the top-left corner of the paper.
 */
export interface PrintRun {
  text: string;
  bold: boolean;
  underline: boolean;
  row: number;
  column: number;
  x: number;
  y: number;
}

export interface PageNumberLabel {
  text: string;
  row: number;
  column: number;
  x: number;
  y: number;
}

export interface PageDescription {
  pageNumber: number;
  geometry: PageGeometry;
  runs: PrintRun[];
  /** Omitted on the first page */
  pageNumberLabel?: PageNumberLabel;
}

export interface FormattedDocument {
  pages: PageDescription[];
  /** The font actually used */
  font: FontConfig;
  warnings: string[];
}
