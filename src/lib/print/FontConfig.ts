import { EditorConstants } from '../constants';
import { FontLoadError, invalidConfiguration } from '../types';

/**
 * US Letter page and typewriter line spacing.
 */
export const PageConstants = {
  LETTER_WIDTH_INCHES: 8.5,
  LETTER_HEIGHT_INCHES: 11,
  POINTS_PER_INCH: 72,
  LINES_PER_INCH: 6,
  /** Standard 1" margins for 10-pitch */
  STANDARD_MARGIN_INCHES: 1,
  /** 1.25" margins for 12-pitch */
  NARROW_MARGIN_INCHES: 1.25,
  TOP_MARGIN_LINES: 6,
  BOTTOM_MARGIN_LINES: 6
} as const;

/**
 * A fixed-pitch font together with the page grid it produces.
 */
export interface FontConfig {
  readonly name: string;
  /** Font name used in PDF output */
  readonly pdfName: string;
  readonly pdfBoldName: string;
  /** Characters per inch */
  readonly pitch: number;
  readonly pointSize: number;
  /** Line height in points */
  readonly lineHeight: number;
  readonly pageWidthChars: number;
  readonly pageHeightLines: number;
  readonly textWidth: number;
  readonly textHeight: number;
  readonly leftMarginChars: number;
  readonly rightMarginChars: number;
  readonly topMarginLines: number;
  readonly bottomMarginLines: number;
  /** The font is not built into PDF viewers and must be embedded */
  readonly requiresEmbedding: boolean;
}

export interface FontDimensions {
  name?: string;
  pdfName?: string;
  pdfBoldName?: string;
  pitch: number;
  pointSize?: number;
  pageWidthInches: number;
  pageHeightInches: number;
  /** Left and right margin */
  marginInches: number;
  topMarginLines?: number;
  bottomMarginLines?: number;
  requiresEmbedding?: boolean;
}

export interface ResolvedFont {
  font: FontConfig;
  /** Set when the requested font was unavailable and the default was used */
  warning?: string;
}

function assertPositive(value: number, field: string): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw invalidConfiguration(`${field} must be a positive number, got ${value}`, { field, value });
  }
}

function assertNonNegativeInteger(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0) {
    throw invalidConfiguration(`${field} must be a non-negative integer, got ${value}`, { field, value });
  }
}

/**
 * Derive a font configuration from physical page dimensions.
 */
export function fontConfigFromDimensions(dimensions: FontDimensions): FontConfig {
  const {
    pitch,
    pageWidthInches,
    pageHeightInches,
    marginInches,
    topMarginLines = PageConstants.TOP_MARGIN_LINES,
    bottomMarginLines = PageConstants.BOTTOM_MARGIN_LINES
  } = dimensions;

  assertPositive(pitch, 'pitch');
  assertPositive(pageWidthInches, 'pageWidthInches');
  assertPositive(pageHeightInches, 'pageHeightInches');
  if (!Number.isFinite(marginInches) || marginInches < 0) {
    throw invalidConfiguration(`marginInches must not be negative, got ${marginInches}`, { marginInches });
  }
  assertNonNegativeInteger(topMarginLines, 'topMarginLines');
  assertNonNegativeInteger(bottomMarginLines, 'bottomMarginLines');

  const pointSize = dimensions.pointSize ?? Math.round(120 / pitch);
  assertPositive(pointSize, 'pointSize');

  const pageWidthChars = Math.floor(pageWidthInches * pitch);
  const marginChars = Math.floor(marginInches * pitch);
  const textWidth = pageWidthChars - 2 * marginChars;
  const pageHeightLines = Math.floor(pageHeightInches * PageConstants.LINES_PER_INCH);
  const textHeight = pageHeightLines - topMarginLines - bottomMarginLines;

  if (textWidth < 1 || textHeight < 1) {
    throw invalidConfiguration(
      `Margins leave no text area (${textWidth} columns x ${textHeight} lines)`,
      { textWidth, textHeight }
    );
  }

  const name = dimensions.name ?? `${pitch}-pitch`;
  return Object.freeze({
    name,
    pdfName: dimensions.pdfName ?? 'Courier',
    pdfBoldName: dimensions.pdfBoldName ?? 'Courier-Bold',
    pitch,
    pointSize,
    lineHeight: PageConstants.POINTS_PER_INCH / PageConstants.LINES_PER_INCH,
    pageWidthChars,
    pageHeightLines,
    textWidth,
    textHeight,
    leftMarginChars: marginChars,
    rightMarginChars: marginChars,
    topMarginLines,
    bottomMarginLines,
    requiresEmbedding: dimensions.requiresEmbedding ?? false
  });
}

const FONT_CATALOG: ReadonlyMap<string, FontConfig> = new Map([
  ['Courier', fontConfigFromDimensions({
    name: 'Courier',
    pdfName: 'Courier',
    pdfBoldName: 'Courier-Bold',
    pitch: 10,
    pointSize: 12,
    pageWidthInches: PageConstants.LETTER_WIDTH_INCHES,
    pageHeightInches: PageConstants.LETTER_HEIGHT_INCHES,
    marginInches: PageConstants.STANDARD_MARGIN_INCHES,
    requiresEmbedding: false
  })],
  ['Prestige Elite Std', fontConfigFromDimensions({
    name: 'Prestige Elite Std',
    pdfName: 'PrestigeEliteStd',
    pdfBoldName: 'PrestigeEliteStd-Bold',
    pitch: 12,
    pointSize: 10,
    pageWidthInches: PageConstants.LETTER_WIDTH_INCHES,
    pageHeightInches: PageConstants.LETTER_HEIGHT_INCHES,
    marginInches: PageConstants.NARROW_MARGIN_INCHES,
    requiresEmbedding: true
  })]
]);

export function availableFonts(): string[] {
  return Array.from(FONT_CATALOG.keys());
}

/**
 * Look up a catalog font.
 * @throws FontLoadError when the font is not in the catalog
 */
export function getFontConfig(name: string): FontConfig {
  const font = FONT_CATALOG.get(name);
  if (!font) {
    throw new FontLoadError(`Unknown font "${name}"`, name, { available: availableFonts() });
  }
  return font;
}

export function defaultFontConfig(): FontConfig {
  return getFontConfig(EditorConstants.DEFAULT_FONT_NAME);
}

/**
 * Look up a font, falling back to the default font when it is unavailable.
 */
export function resolveFontConfig(name: string): ResolvedFont {
  try {
    return { font: getFontConfig(name) };
  } catch (error) {
    if (!(error instanceof FontLoadError)) {
      throw error;
    }
    const warning = `Font "${name}" is unavailable; using ${EditorConstants.DEFAULT_FONT_NAME}`;
    console.warn(`[FontConfig] ${warning}`);
    return { font: defaultFontConfig(), warning };
  }
}
