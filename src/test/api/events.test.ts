/**
 * Tests for PlatenEditor events
 */
import { describe, it, expect, vi } from 'vitest';
import { createEditor } from '../helpers/createEditor';

describe('PlatenEditor Events', () => {
  it('should emit content-changed with the buffer version', () => {
    const { editor } = createEditor('abc');
    const handler = vi.fn();
    editor.on('content-changed', handler);

    editor.insert('x');

    expect(handler).toHaveBeenCalledWith({ version: 2 });
  });

  it('should emit cursor-moved with the row and column', () => {
    const { editor } = createEditor('ab\ncd');
    const handler = vi.fn();
    editor.on('cursor-moved', handler);

    editor.setCursorOffset(4);

    expect(handler).toHaveBeenLastCalledWith({ offset: 4, row: 1, column: 1 });
  });

  it('should emit selection-changed', () => {
    const { editor } = createEditor('hello');
    const handler = vi.fn();
    editor.on('selection-changed', handler);

    editor.select({ start: 1, end: 3 });
    editor.clearSelection();

    expect(handler).toHaveBeenLastCalledWith({ selection: null });
    expect(handler).toHaveBeenCalledWith({ selection: { start: 1, end: 3 } });
  });

  it('should emit layout-changed for width and spacing', () => {
    const { editor } = createEditor('abc');
    const handler = vi.fn();
    editor.on('layout-changed', handler);

    editor.setDocumentWidth(30);
    editor.setDoubleSpaced(true);

    expect(handler.mock.calls.map(call => call[0])).toEqual([
      { width: 30, doubleSpaced: false },
      { width: 30, doubleSpaced: true }
    ]);
  });

  it('should not emit for a setting that does not change', () => {
    const { editor } = createEditor('abc');
    const handler = vi.fn();
    editor.on('layout-changed', handler);

    editor.setDocumentWidth(65);
    editor.setDoubleSpaced(false);

    expect(handler).not.toHaveBeenCalled();
  });

  it('should emit undo-state-changed', () => {
    const { editor } = createEditor('abc');
    const handler = vi.fn();
    editor.on('undo-state-changed', handler);

    editor.insert('x');
    editor.undo();

    expect(handler).toHaveBeenCalledWith({ canUndo: true, canRedo: false });
    expect(handler).toHaveBeenLastCalledWith({ canUndo: false, canRedo: true });
  });

  it('should emit modified-changed on the first edit and on save', () => {
    const { editor } = createEditor('abc');
    const handler = vi.fn();
    editor.on('modified-changed', handler);

    editor.insert('x');
    editor.insert('y');
    editor.save();

    expect(handler.mock.calls.map(call => call[0])).toEqual([
      { modified: true },
      { modified: false }
    ]);
  });

  it('should stop emitting after destroy', () => {
    const { editor } = createEditor('abc');
    const handler = vi.fn();
    editor.on('content-changed', handler);

    editor.destroy();

    expect(editor.listenerCount('content-changed')).toBe(0);
    expect(handler).not.toHaveBeenCalled();
  });
});
