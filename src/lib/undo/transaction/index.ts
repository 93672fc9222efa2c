/**
 * Transaction-based undo/redo over document buffer edit commands.
 */

// Types
export * from './types';

export { UndoLog } from './UndoLog';
export type { UndoLogOptions } from './UndoLog';

export { CursorTracker } from './CursorTracker';
export type { CaptureCursorFn, RestoreCursorFn } from './CursorTracker';

export { EditObserver } from './EditObserver';

export { CommandReplay } from './CommandReplay';
