import { VisualLine } from '../text/types';
import { outOfRange, invalidConfiguration } from '../types';

export interface Page {
  /** 1-based page number */
  number: number;
  lines: VisualLine[];
  /** Index of the page's first line in the document's line list */
  firstLineIndex: number;
  /** A page-break indicator precedes this page */
  breakBefore: boolean;
  showPageNumber: boolean;
}

/**
 * Content lines that fit on one page.
 */
export function pageCapacity(linesPerPage: number, doubleSpaced: boolean): number {
  if (!Number.isInteger(linesPerPage)) {
    throw invalidConfiguration(`Lines per page must be an integer, got ${linesPerPage}`, { linesPerPage });
  }
  const capacity = doubleSpaced ? Math.floor(linesPerPage / 2) : linesPerPage;
  if (capacity < 1) {
    throw invalidConfiguration(
      `${linesPerPage} lines per page leaves no room for content${doubleSpaced ? ' when double-spaced' : ''}`,
      { linesPerPage, doubleSpaced }
    );
  }
  return capacity;
}

/**
 * Split visual lines into pages. Every line lands on exactly one page and
 * pages are numbered from 1 in document order.
 */
export function paginate(lines: VisualLine[], linesPerPage: number, doubleSpaced: boolean = false): Page[] {
  const capacity = pageCapacity(linesPerPage, doubleSpaced);
  const pages: Page[] = [];

  for (let first = 0; first < lines.length; first += capacity) {
    const number = pages.length + 1;
    pages.push({
      number,
      lines: lines.slice(first, first + capacity),
      firstLineIndex: first,
      breakBefore: number > 1,
      showPageNumber: number > 1
    });
  }

  return pages;
}

/**
 * The page that holds a line.
 */
export function pageForLine(pages: Page[], lineIndex: number): Page {
  const page = pages.find(p => lineIndex >= p.firstLineIndex && lineIndex < p.firstLineIndex + p.lines.length);
  if (!page) {
    throw outOfRange(`Line ${lineIndex} is not on any page`, { lineIndex });
  }
  return page;
}

/**
 * True for the first line of every page after the first.
 */
export function isPageBreakLine(pages: Page[], lineIndex: number): boolean {
  return pages.some(p => p.breakBefore && p.firstLineIndex === lineIndex);
}

/**
 * Screen separator drawn above a page: ` Page N ` centered in a rule of `width` columns.
 */
export function pageBreakLabel(pageNumber: number, width: number): string {
  const label = ` Page ${pageNumber} `;
  if (label.length >= width) {
    return label;
  }
  const left = Math.floor((width - label.length) / 2);
  const right = width - label.length - left;
  return '─'.repeat(left) + label + '─'.repeat(right);
}
