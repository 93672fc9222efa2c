/**
 * CursorTracker - Captures and restores cursor state around undo transactions.
 */

import { CursorState } from './types';

export type CaptureCursorFn = () => CursorState;

export type RestoreCursorFn = (state: CursorState) => void;

const DETACHED_STATE: CursorState = { offset: 0, selection: null };

export class CursorTracker {
  private captureCursor: CaptureCursorFn;
  private restoreCursor: RestoreCursorFn;

  /**
   * Without callbacks the tracker is detached: it captures offset 0 and restores nothing.
   */
  constructor(
    captureCursor: CaptureCursorFn = () => DETACHED_STATE,
    restoreCursor: RestoreCursorFn = () => undefined
  ) {
    this.captureCursor = captureCursor;
    this.restoreCursor = restoreCursor;
  }

  capture(): CursorState {
    const state = this.captureCursor();
    return {
      offset: state.offset,
      selection: state.selection ? { ...state.selection } : null
    };
  }

  restore(state: CursorState): void {
    this.restoreCursor(state);
  }
}
