/**
 * EditObserver - Feeds buffer edit events into an UndoLog.
 */

import { DocumentBuffer } from '../../text/DocumentBuffer';
import { EditCommand } from './types';
import { UndoLog } from './UndoLog';

export class EditObserver {
  private log: UndoLog;
  private observed: Map<DocumentBuffer, (command: EditCommand) => void> = new Map();

  constructor(log: UndoLog) {
    this.log = log;
  }

  /**
   * Start recording every edit the buffer makes.
   */
  observe(buffer: DocumentBuffer): void {
    if (this.observed.has(buffer)) {
      return;
    }

    const handler = (command: EditCommand): void => {
      // Replayed commands are already in the history
      if (this.log.isUndoRedoInProgress) {
        return;
      }
      this.log.recordCommand(command);
    };

    buffer.on('edit', handler);
    this.observed.set(buffer, handler);
  }

  unobserve(buffer: DocumentBuffer): void {
    const handler = this.observed.get(buffer);
    if (!handler) return;

    buffer.off('edit', handler);
    this.observed.delete(buffer);
  }

  isObserving(buffer: DocumentBuffer): boolean {
    return this.observed.has(buffer);
  }
}
