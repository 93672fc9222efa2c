/**
 * CommandReplay - Applies edit commands forwards and backwards.
 */

import { DocumentBuffer } from '../../text/DocumentBuffer';
import { EditCommand, invertCommand } from './types';

export class CommandReplay {
  private buffer: DocumentBuffer;

  constructor(buffer: DocumentBuffer) {
    this.buffer = buffer;
  }

  /**
   * Undo a command: put `deleted` back where `inserted` now is.
   */
  undoCommand(command: EditCommand): void {
    this.apply(invertCommand(command), 'undo');
  }

  /**
   * Redo a command: replace `deleted` with `inserted` again.
   */
  redoCommand(command: EditCommand): void {
    this.apply(command, 'redo');
  }

  private apply(command: EditCommand, operation: 'undo' | 'redo'): void {
    const { position, deleted, inserted } = command;
    const end = position + deleted.text.length;
    if (end <= this.buffer.length && this.buffer.slice({ start: position, end }).text !== deleted.text) {
      console.warn(`[CommandReplay] Buffer does not match command ${command.id} during ${operation}`);
    }
    this.buffer.replace(position, deleted.text.length, inserted);
  }
}
