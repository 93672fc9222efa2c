/**
 * Unit tests for UndoLog
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { UndoLog } from '../../../lib/undo/transaction/UndoLog';
import { CommandReplay } from '../../../lib/undo/transaction/CommandReplay';
import { CursorTracker } from '../../../lib/undo/transaction/CursorTracker';
import { EditObserver } from '../../../lib/undo/transaction/EditObserver';
import { CursorState } from '../../../lib/undo/transaction/types';
import { DocumentBuffer } from '../../../lib/text/DocumentBuffer';
import { styled, BOLD, PLAIN } from '../../../lib/text/types';
import { createClock, TestClock } from '../../helpers/createEditor';
import { QUICK_FOX } from '../../helpers/documentFixtures';

describe('UndoLog', () => {
  let buffer: DocumentBuffer;
  let clock: TestClock;
  let log: UndoLog;

  function createLog(initial = '', tracker = new CursorTracker(), maxHistory?: number): void {
    buffer = new DocumentBuffer(styled(initial));
    log = new UndoLog(new CommandReplay(buffer), tracker, { now: clock.now, maxHistory });
    new EditObserver(log).observe(buffer);
  }

  /**
   * Insert one character per call at the end of the buffer.
   */
  function type(text: string, gap = 100): void {
    for (const char of text) {
      clock.advance(gap);
      buffer.insert(buffer.length, char);
    }
  }

  beforeEach(() => {
    clock = createClock(0);
    createLog();
  });

  describe('typing bursts', () => {
    it('should coalesce quick typing into one step', () => {
      type('abc');

      expect(log.undoDepth).toBe(1);
      expect(log.getUndoDescription()).toBe('Typing');

      log.undo();
      expect(buffer.getText()).toBe('');
    });

    it('should start a new step after a pause', () => {
      type('a');
      type('b', 1001);
      type('c', 1000);

      expect(log.undoDepth).toBe(2);

      log.undo();
      expect(buffer.getText()).toBe('a');
    });

    it('should start a new step at a word after whitespace', () => {
      type('a b');

      log.undo();
      expect(buffer.getText()).toBe('a ');

      log.undo();
      expect(buffer.getText()).toBe('');
    });

    it('should close the burst after a newline', () => {
      type('a\nb');

      log.undo();
      expect(buffer.getText()).toBe('a\n');
    });

    it('should not coalesce insertions that are not contiguous', () => {
      type('ab');
      buffer.insert(0, 'x');

      expect(log.undoDepth).toBe(2);
    });

    it('should limit the characters in one step', () => {
      log.setCoalesceConfig({ maxCharacters: 3 });
      type('abcd');

      log.undo();
      expect(buffer.getText()).toBe('abc');
    });

    it('should not coalesce across a style change', () => {
      buffer.insert(0, 'a', BOLD);
      buffer.insert(1, 'b', PLAIN);

      expect(log.undoDepth).toBe(2);
    });

    it('should end the burst at a boundary', () => {
      type('ab');
      log.createBoundary();
      type('cd');

      log.undo();
      expect(buffer.getText()).toBe('ab');
    });
  });

  describe('deletion bursts', () => {
    it('should coalesce backspaces', () => {
      createLog('hello');

      buffer.delete(4, 1);
      buffer.delete(3, 1);
      buffer.delete(2, 1);

      expect(log.undoDepth).toBe(1);
      const result = log.undo();
      expect(buffer.getText()).toBe('hello');
      expect(result.status === 'undone' && result.transaction.commands[0].deleted.text).toBe('llo');
    });

    it('should coalesce forward deletes', () => {
      createLog('hello');

      buffer.delete(1, 1);
      buffer.delete(1, 1);

      const result = log.undo();
      expect(result.status === 'undone' && result.transaction.commands[0].deleted.text).toBe('el');
      expect(buffer.getText()).toBe('hello');
    });

    it('should not coalesce typing with deleting', () => {
      type('ab');
      buffer.delete(1, 1);

      expect(log.undoDepth).toBe(2);
    });
  });

  describe('style changes', () => {
    it('should commit a style change as its own step', () => {
      createLog('abc');

      buffer.setAttribute({ start: 0, end: 2 }, 'bold', true);
      expect(log.undoDepth).toBe(1);

      log.undo();
      expect(buffer.toStyledText().styles).toEqual([PLAIN, PLAIN, PLAIN]);

      log.redo();
      expect(buffer.toStyledText().styles).toEqual([BOLD, BOLD, PLAIN]);
    });
  });

  describe('compound operations', () => {
    it('should group every command into one transaction', () => {
      log.beginCompoundOperation('Replace All');
      buffer.insert(0, 'ab');
      buffer.insert(0, 'cd');
      buffer.delete(0, 1);
      log.endCompoundOperation();

      expect(buffer.getText()).toBe('dab');
      expect(log.undoDepth).toBe(1);
      expect(log.getUndoDescription()).toBe('Replace All');

      log.undo();
      expect(buffer.getText()).toBe('');

      log.redo();
      expect(buffer.getText()).toBe('dab');
    });

    it('should merge a nested operation into its parent', () => {
      log.beginCompoundOperation('Outer');
      buffer.insert(0, 'a');
      log.beginCompoundOperation('Inner');
      buffer.insert(1, 'b');
      log.endCompoundOperation();
      log.endCompoundOperation();

      log.createBoundary();
      expect(log.undoDepth).toBe(1);
      expect(log.getUndoDescription()).toBe('Outer');
    });

    it('should commit nothing for an operation without edits', () => {
      log.beginCompoundOperation('Nothing');
      log.endCompoundOperation();

      expect(log.canUndo()).toBe(false);
    });

    it('should let a single-command operation continue a typing burst', () => {
      type('a');
      log.beginCompoundOperation('Typing');
      clock.advance(100);
      buffer.insert(1, 'b');
      log.endCompoundOperation();

      expect(log.undoDepth).toBe(1);
    });
  });

  describe('undo() / redo()', () => {
    it('should report when there is nothing to do', () => {
      expect(log.undo()).toEqual({ status: 'nothing-to-undo' });
      expect(log.redo()).toEqual({ status: 'nothing-to-redo' });
    });

    it('should not record the replayed edits', () => {
      type('abc');
      log.undo();

      expect(log.undoDepth).toBe(0);
      expect(log.redoDepth).toBe(1);
      expect(log.getRedoDescription()).toBe('Typing');
    });

    it('should clear the redo stack on a new edit', () => {
      type('a');
      log.undo();
      expect(log.canRedo()).toBe(true);

      type('b');
      expect(log.canRedo()).toBe(false);
    });

    it('should follow abc, insert X, undo, redo', () => {
      createLog('abc');

      buffer.insert(3, 'X');
      log.undo();
      expect(buffer.getText()).toBe('abc');

      log.redo();
      expect(buffer.getText()).toBe('abcX');
    });

    it('should restore the cursor state around a transaction', () => {
      let cursor: CursorState = { offset: 5, selection: null };
      const restored: CursorState[] = [];
      createLog(QUICK_FOX, new CursorTracker(() => cursor, state => restored.push(state)));

      log.beginCompoundOperation('Edit');
      buffer.insert(5, 'XY');
      cursor = { offset: 7, selection: { start: 0, end: 7 } };
      log.endCompoundOperation();

      log.undo();
      log.redo();

      expect(restored).toEqual([
        { offset: 5, selection: null },
        { offset: 7, selection: { start: 0, end: 7 } }
      ]);
    });

    it('should keep at most maxHistory steps', () => {
      createLog('', new CursorTracker(), 2);
      for (const char of 'abc') {
        buffer.insert(buffer.length, char);
        log.createBoundary();
      }

      expect(log.undoDepth).toBe(2);
      log.undo();
      log.undo();
      expect(buffer.getText()).toBe('a');
      expect(log.undo().status).toBe('nothing-to-undo');
    });

    it('should return any edit sequence to its start', () => {
      createLog(QUICK_FOX);
      let seed = 42;
      const random = (): number => {
        seed = (seed * 16807) % 2147483647;
        return seed / 2147483647;
      };
      const alphabet = 'ab \nZ';

      for (let step = 0; step < 60; step++) {
        clock.advance(Math.floor(random() * 1500));
        if (random() < 0.6 || buffer.length === 0) {
          const position = Math.floor(random() * (buffer.length + 1));
          const text = alphabet[Math.floor(random() * alphabet.length)].repeat(1 + Math.floor(random() * 3));
          buffer.insert(position, text);
        } else {
          const position = Math.floor(random() * buffer.length);
          const length = 1 + Math.floor(random() * Math.min(4, buffer.length - position));
          buffer.delete(position, length);
        }
        if (random() < 0.2) {
          log.createBoundary();
        }
      }
      const edited = buffer.getText();

      while (log.undo().status === 'undone') {
        // keep undoing
      }
      expect(buffer.getText()).toBe(QUICK_FOX);

      while (log.redo().status === 'redone') {
        // keep redoing
      }
      expect(buffer.getText()).toBe(edited);
    });
  });

  describe('events', () => {
    it('should report state changes', () => {
      const onState = vi.fn();
      log.on('state-changed', onState);

      type('a');
      log.undo();

      expect(onState).toHaveBeenNthCalledWith(1, { canUndo: true, canRedo: false });
      expect(onState).toHaveBeenLastCalledWith({ canUndo: false, canRedo: true });
    });

    it('should report committed transactions when a burst is flushed', () => {
      const onCommitted = vi.fn();
      log.on('transaction-committed', onCommitted);

      type('ab');
      expect(onCommitted).not.toHaveBeenCalled();

      log.flushPendingTransaction();
      expect(onCommitted).toHaveBeenCalledTimes(1);
    });

    it('should clear the history', () => {
      const onCleared = vi.fn();
      log.on('history-cleared', onCleared);
      type('ab');

      log.clear();

      expect(onCleared).toHaveBeenCalledTimes(1);
      expect(log.canUndo()).toBe(false);
      expect(buffer.getText()).toBe('ab');
    });
  });
});
