/**
 * Tests for PlatenEditor undo/redo
 */
import { describe, it, expect } from 'vitest';
import { createEditor, typeText } from '../helpers/createEditor';
import { BOLD, PLAIN } from '../../lib/text/types';

describe('PlatenEditor Undo/Redo', () => {
  describe('typing bursts', () => {
    it('should undo a typed word and its trailing space together', () => {
      const result = createEditor();
      typeText(result, 'hello world');
      const { editor } = result;

      editor.undo();
      expect(editor.getText()).toBe('hello ');

      editor.undo();
      expect(editor.getText()).toBe('');
      expect(editor.canUndo()).toBe(false);
    });

    it('should split a burst after a pause', () => {
      const result = createEditor();
      typeText(result, 'ab');
      result.clock.advance(2000);
      result.editor.insert('c');

      result.editor.undo();

      expect(result.editor.getText()).toBe('ab');
    });

    it('should split a burst at the character limit', () => {
      const result = createEditor(undefined, { coalesceMaxCharacters: 3 });
      typeText(result, 'abcd');

      result.editor.undo();

      expect(result.editor.getText()).toBe('abc');
    });

    it('should split a burst when the cursor moves', () => {
      const result = createEditor();
      typeText(result, 'ab');
      result.editor.move('left');
      typeText(result, 'c');

      expect(result.editor.getText()).toBe('acb');
      result.editor.undo();
      expect(result.editor.getText()).toBe('ab');
    });

    it('should undo a run of backspaces at once and restore the cursor', () => {
      const { editor } = createEditor('hello');
      editor.move('documentEnd');

      editor.backspace();
      editor.backspace();
      editor.backspace();
      expect(editor.getText()).toBe('he');

      editor.undo();

      expect(editor.getText()).toBe('hello');
      expect(editor.getCursor().offset).toBe(5);
    });

    it('should report the pending burst', () => {
      const result = createEditor();
      typeText(result, 'ab');

      expect(result.editor.canUndo()).toBe(true);
      expect(result.editor.getUndoDescription()).toBe('Typing');
    });
  });

  describe('redo()', () => {
    it('should bring back an undone insert', () => {
      const { editor } = createEditor('abc');
      editor.setCursorOffset(3);
      editor.insert('X');

      editor.undo();
      expect(editor.getText()).toBe('abc');

      editor.redo();
      expect(editor.getText()).toBe('abcX');
      expect(editor.getCursor().offset).toBe(4);
    });

    it('should reapply the undone step and its cursor', () => {
      const { editor } = createEditor('hello');
      editor.select({ start: 0, end: 5 });
      editor.insert('howdy');

      editor.undo();
      expect(editor.getText()).toBe('hello');
      expect(editor.getSelection()).toEqual({ start: 0, end: 5 });

      editor.redo();
      expect(editor.getText()).toBe('howdy');
      expect(editor.getCursor().offset).toBe(5);
      expect(editor.getSelection()).toBeNull();
    });

    it('should be cleared by a new edit', () => {
      const { editor } = createEditor('hello');
      editor.setAttribute({ start: 0, end: 1 }, 'bold', true);
      editor.undo();
      expect(editor.canRedo()).toBe(true);

      editor.insert('x');

      expect(editor.canRedo()).toBe(false);
      expect(editor.redo()).toEqual({ status: 'nothing-to-redo' });
    });

    it('should restore styles', () => {
      const { editor } = createEditor('ab');
      editor.setAttribute({ start: 0, end: 2 }, 'bold', true);
      editor.undo();

      editor.redo();

      expect(editor.getDocument().styles).toEqual([BOLD, BOLD]);
      expect(editor.getRedoDescription()).toBeNull();
    });
  });

  describe('history', () => {
    it('should report nothing to undo', () => {
      const { editor } = createEditor('abc');

      expect(editor.undo()).toEqual({ status: 'nothing-to-undo' });
    });

    it('should keep only the newest steps', () => {
      const { editor } = createEditor('abc', { maxUndoHistory: 2 });
      editor.setAttribute({ start: 0, end: 1 }, 'bold', true);
      editor.setAttribute({ start: 1, end: 2 }, 'bold', true);
      editor.setAttribute({ start: 2, end: 3 }, 'bold', true);

      editor.undo();
      editor.undo();

      expect(editor.canUndo()).toBe(false);
      expect(editor.getDocument().styles).toEqual([BOLD, PLAIN, PLAIN]);
    });

    it('should be cleared by load', () => {
      const result = createEditor();
      typeText(result, 'draft');

      result.editor.load('other');

      expect(result.editor.canUndo()).toBe(false);
      expect(result.editor.canRedo()).toBe(false);
    });

    it('should return to the loaded text after undoing everything', () => {
      const result = createEditor('start');
      const { editor } = result;
      editor.move('documentEnd');
      typeText(result, ' more');
      editor.move('documentStart');
      editor.deleteForward();
      editor.setAttribute({ start: 0, end: 3 }, 'underline', true);

      while (editor.canUndo()) {
        editor.undo();
      }

      expect(editor.getText()).toBe('start');
      expect(editor.getDocument().styles.every(style => style === PLAIN)).toBe(true);
    });
  });
});
