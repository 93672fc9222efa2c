/**
 * Tests for PlatenEditor print formatting and PDF export
 */
import { describe, it, expect, vi } from 'vitest';
import { createEditor } from '../helpers/createEditor';
import { QUICK_FOX } from '../helpers/documentFixtures';

describe('PlatenEditor Printing', () => {
  describe('formatForPrint()', () => {
    it('should format with the default preferences', () => {
      const { editor } = createEditor(QUICK_FOX);

      const formatted = editor.formatForPrint();

      expect(formatted.font.name).toBe('Courier');
      expect(formatted.warnings).toEqual([]);
      expect(formatted.pages).toHaveLength(1);
      expect(formatted.pages[0].runs[0]).toMatchObject({ text: QUICK_FOX, row: 6, column: 10 });
      // Double-sided by default: page 1 shifts toward the binding edge
      expect(formatted.pages[0].runs[0].x).toBeCloseTo(90);
    });

    it('should wrap at the font width, not the screen width', () => {
      const { editor } = createEditor(QUICK_FOX, { documentWidth: 10 });

      const formatted = editor.formatForPrint();

      expect(formatted.pages[0].runs.map(run => run.text)).toEqual([QUICK_FOX]);
    });

    it('should follow the spacing preference', () => {
      const { editor } = createEditor('one\ntwo');

      const formatted = editor.formatForPrint({ fontName: 'Courier', doubleSpaced: true, doubleSided: false });

      expect(formatted.pages[0].runs.map(run => run.row)).toEqual([6, 8]);
      expect(formatted.pages[0].runs[0].x).toBeCloseTo(72);
    });

    it('should fall back to Courier for an unknown font', () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { editor } = createEditor(QUICK_FOX);

      const formatted = editor.formatForPrint({ fontName: 'Olympia', doubleSpaced: false, doubleSided: false });

      expect(formatted.font.name).toBe('Courier');
      expect(formatted.warnings).toEqual(['Font "Olympia" is unavailable; using Courier']);
    });
  });

  describe('exportPdf()', () => {
    it('should write a PDF', async () => {
      const { editor } = createEditor(QUICK_FOX);

      const result = await editor.exportPdf();

      expect(new TextDecoder().decode(result.bytes.slice(0, 5))).toBe('%PDF-');
      expect(result.warnings).toEqual([]);
    });

    it('should report warnings from formatting and rendering', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => {});
      const { editor } = createEditor('arrow →');

      const result = await editor.exportPdf({ fontName: 'Olympia', doubleSpaced: false, doubleSided: true });

      expect(result.warnings).toEqual([
        'Font "Olympia" is unavailable; using Courier',
        'Replaced characters the font cannot print with "?": U+2192'
      ]);
    });

    it('should fall back when an embedded font has no files', async () => {
      const { editor } = createEditor(QUICK_FOX);

      const result = await editor.exportPdf({ fontName: 'Prestige Elite Std', doubleSpaced: false, doubleSided: false });

      expect(result.font.name).toBe('Courier');
      expect(result.warnings).toEqual([
        'Font "Prestige Elite Std" must be embedded but no font files were given; using Courier'
      ]);
    });
  });
});
