/**
 * Tests for PlatenEditor copy, cut and paste
 */
import { describe, it, expect } from 'vitest';
import { createEditor } from '../helpers/createEditor';
import { BOLD, PLAIN, UNDERLINE } from '../../lib/text/types';
import { build } from '../helpers/documentFixtures';

describe('PlatenEditor Clipboard', () => {
  it('should copy the selection with its styles', () => {
    const { editor } = createEditor('he\bello');
    editor.select({ start: 0, end: 3 });

    const copied = editor.copySelection();

    expect(copied?.styled).toEqual({ text: 'hel', styles: [PLAIN, BOLD, PLAIN] });
    expect(copied?.text).toBe('hel');
    expect(editor.getClipboard()).toEqual(copied?.styled);
    expect(editor.getText()).toBe('hello');
  });

  it('should offer the copy as RTF', () => {
    const { editor } = createEditor('he\bello\n\u00e9t\u00e9');
    editor.select({ start: 0, end: 9 });

    const rtf = editor.copySelection()?.rtf ?? '';

    expect(rtf.startsWith('{\\rtf1')).toBe(true);
    expect(rtf.endsWith('h{\\b e}llo\\par\n\\u233?t\\u233?}')).toBe(true);
  });

  it('should paste RTF from another application', () => {
    const { editor } = createEditor('[]');
    editor.setCursorOffset(1);

    editor.paste('{\\rtf1\\ansi Normal {\\b Bold}\\par {\\ul \\u248?}}');

    expect(editor.getText()).toBe('[Normal Bold\n\u00f8]');
    expect(editor.getDocument().styles.slice(1, 14)).toEqual([
      PLAIN, PLAIN, PLAIN, PLAIN, PLAIN, PLAIN, PLAIN,
      BOLD, BOLD, BOLD, BOLD,
      PLAIN,
      UNDERLINE
    ]);
    expect(editor.getCursor().offset).toBe(14);
  });

  it('should paste a string without an RTF header as plain text', () => {
    const { editor } = createEditor();

    editor.paste('one\r\ntwo');

    expect(editor.getText()).toBe('one\ntwo');
    expect(editor.getUndoDescription()).toBe('Paste');
  });

  it('should round-trip a copy through RTF', () => {
    const { editor } = createEditor('x\u{1F600}\b\u{1F600}y\b_');
    editor.select({ start: 0, end: 4 });
    const copied = editor.copySelection();

    const { editor: target } = createEditor();
    target.paste(copied?.rtf ?? null);

    expect(target.getDocument()).toEqual(editor.getDocument());
  });

  it('should return null without a selection', () => {
    const { editor } = createEditor('hello');

    expect(editor.copySelection()).toBeNull();
    expect(editor.cutSelection()).toBeNull();
    expect(editor.getClipboard()).toBeNull();
  });

  it('should cut and paste elsewhere', () => {
    const { editor } = createEditor('hello world');
    editor.select({ start: 0, end: 5 });

    editor.cutSelection();
    expect(editor.getText()).toBe(' world');
    expect(editor.getUndoDescription()).toBe('Cut');

    editor.move('documentEnd');
    editor.paste();

    expect(editor.getText()).toBe(' worldhello');
    expect(editor.getCursor().offset).toBe(11);
  });

  it('should paste given styled text over the selection', () => {
    const { editor } = createEditor('one two');
    editor.select({ start: 4, end: 7 });

    editor.paste(build(['2', BOLD]));

    expect(editor.getText()).toBe('one 2');
    expect(editor.getDocument().styles[4]).toBe(BOLD);

    editor.undo();
    expect(editor.getText()).toBe('one two');
  });

  it('should do nothing with an empty clipboard', () => {
    const { editor } = createEditor('abc');

    editor.paste();

    expect(editor.canUndo()).toBe(false);
  });
});
