/**
 * PdfRenderer - Writes page descriptions to a PDF document.
 */

import { PDFDocument, PDFPage, PDFFont, StandardFonts, rgb } from 'pdf-lib';
import { FontConfig, defaultFontConfig } from '../print/FontConfig';
import { PageDescription } from '../print/types';
import { columnCount } from '../text/TextLayout';
import { transformY, getStandardFont, filterToWinAnsi, drawLine } from './pdf-utils';

/**
 * The fontkit instance pdf-lib needs to embed TrueType fonts.
 */
export type Fontkit = Parameters<PDFDocument['registerFontkit']>[0];

export interface EmbeddedFontFiles {
  fontkit: Fontkit;
  regular: Uint8Array;
  /** Falls back to the regular face when omitted */
  bold?: Uint8Array;
}

export interface PdfRendererOptions {
  /** Font files for fonts that are not built into PDF viewers */
  embeddedFonts?: EmbeddedFontFiles;
  title?: string;
}

export interface PdfRenderResult {
  bytes: Uint8Array;
  /** The font actually used */
  font: FontConfig;
  warnings: string[];
}

interface EmbeddedFaces {
  regular: PDFFont;
  bold: PDFFont;
  /** The font actually used */
  font: FontConfig;
  /** Standard fonts only cover WinAnsi */
  standard: boolean;
}

const UNDERLINE_OFFSET_PT = 2;
const UNDERLINE_THICKNESS_PT = 0.75;

export class PdfRenderer {
  private options: PdfRendererOptions;

  constructor(options: PdfRendererOptions = {}) {
    this.options = options;
  }

  /**
   * Render pages to PDF bytes. Warnings are logged.
   */
  async render(pages: PageDescription[], font: FontConfig): Promise<Uint8Array> {
    const result = await this.renderWithReport(pages, font);
    for (const warning of result.warnings) {
      console.warn(`[PdfRenderer] ${warning}`);
    }
    return result.bytes;
  }

  /**
   * Render pages to PDF bytes and report what had to be substituted.
   */
  async renderWithReport(pages: PageDescription[], font: FontConfig): Promise<PdfRenderResult> {
    const pdfDoc = await PDFDocument.create();
    if (this.options.title) {
      pdfDoc.setTitle(this.options.title);
    }

    const warnings: string[] = [];
    const faces = await this.embedFonts(pdfDoc, font, warnings);
    const replaced = new Set<string>();

    for (const page of pages) {
      try {
        const { widthPt, heightPt } = page.geometry;
        const pdfPage = pdfDoc.addPage([widthPt, heightPt]);
        // Point size comes from the layout font so the grid stays intact after a fallback
        this.renderPage(pdfPage, page, faces, font.pointSize, replaced);
      } catch (pageError) {
        console.error(`[PdfRenderer] Error rendering page ${page.pageNumber}:`, pageError);
        throw pageError;
      }
    }

    if (replaced.size > 0) {
      const list = Array.from(replaced).map(char => `U+${(char.codePointAt(0) ?? 0).toString(16).toUpperCase().padStart(4, '0')}`);
      warnings.push(`Replaced characters the font cannot print with "?": ${list.join(', ')}`);
    }

    const bytes = await pdfDoc.save();
    return { bytes, font: faces.font, warnings };
  }

  private renderPage(
    pdfPage: PDFPage,
    page: PageDescription,
    faces: EmbeddedFaces,
    pointSize: number,
    replaced: Set<string>
  ): void {
    const pageHeight = page.geometry.heightPt;
    const black = rgb(0, 0, 0);

    if (page.pageNumberLabel) {
      const label = page.pageNumberLabel;
      pdfPage.drawText(label.text, {
        x: label.x,
        y: transformY(label.y, pageHeight),
        font: faces.regular,
        size: pointSize,
        color: black
      });
    }

    for (const run of page.runs) {
      let text = run.text;
      if (faces.standard) {
        const filtered = filterToWinAnsi(run.text);
        filtered.replaced.forEach(char => replaced.add(char));
        text = filtered.text;
      }

      pdfPage.drawText(text, {
        x: run.x,
        y: transformY(run.y, pageHeight),
        font: run.bold ? faces.bold : faces.regular,
        size: pointSize,
        color: black
      });

      if (run.underline) {
        const underlineY = run.y + UNDERLINE_OFFSET_PT;
        const width = columnCount(run.text) * page.geometry.charWidthPt;
        drawLine(pdfPage, run.x, underlineY, run.x + width, underlineY, black, UNDERLINE_THICKNESS_PT, pageHeight);
      }
    }
  }

  /**
   * Embed the faces for `font`. A font that needs embedding but has no font
   * files falls back to the default font.
   */
  private async embedFonts(
    pdfDoc: PDFDocument,
    font: FontConfig,
    warnings: string[]
  ): Promise<EmbeddedFaces> {
    if (font.requiresEmbedding) {
      const files = this.options.embeddedFonts;
      if (files) {
        try {
          pdfDoc.registerFontkit(files.fontkit);
          const regular = await pdfDoc.embedFont(files.regular, { subset: true });
          const bold = files.bold ? await pdfDoc.embedFont(files.bold, { subset: true }) : regular;
          return { regular, bold, font, standard: false };
        } catch (error) {
          const reason = error instanceof Error ? error.message : String(error);
          warnings.push(`Could not embed font "${font.name}" (${reason}); using ${defaultFontConfig().name}`);
        }
      } else {
        warnings.push(`Font "${font.name}" must be embedded but no font files were given; using ${defaultFontConfig().name}`);
      }
      return this.embedStandardFonts(pdfDoc, defaultFontConfig(), warnings);
    }

    return this.embedStandardFonts(pdfDoc, font, warnings);
  }

  private async embedStandardFonts(
    pdfDoc: PDFDocument,
    font: FontConfig,
    warnings: string[]
  ): Promise<EmbeddedFaces> {
    let regularName = getStandardFont(font.pdfName);
    let boldName = getStandardFont(font.pdfBoldName);
    if (!regularName || !boldName) {
      warnings.push(`"${font.pdfName}" is not a standard PDF font; using Courier`);
      regularName = StandardFonts.Courier;
      boldName = StandardFonts.CourierBold;
    }

    const regular = await pdfDoc.embedFont(regularName);
    const bold = await pdfDoc.embedFont(boldName);
    return { regular, bold, font, standard: true };
  }
}
