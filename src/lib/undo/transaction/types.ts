/**
 * Command-based undo/redo types.
 *
 * Every buffer mutation is described by an EditCommand that carries both the
 * removed and the inserted styled text, so it can be replayed in either direction.
 */

import { TextRange } from '../../types';
import { StyledText } from '../../text/types';

export type EditKind = 'insert' | 'delete' | 'style';

/**
 * One reversible buffer mutation: `deleted` at `position` was replaced by `inserted`.
 */
export interface EditCommand {
  readonly id: string;
  readonly kind: EditKind;
  readonly position: number;
  readonly deleted: StyledText;
  readonly inserted: StyledText;
}

/**
 * Cursor state captured around a transaction.
 */
export interface CursorState {
  offset: number;
  selection: TextRange | null;
}

/**
 * A transaction groups related commands into a single undoable unit.
 */
export interface Transaction {
  id: string;
  /** Commands in the order they were applied */
  commands: EditCommand[];
  cursorBefore: CursorState;
  cursorAfter: CursorState;
  /** Human-readable description */
  description: string;
  startTime: number;
  endTime: number;
}

/**
 * Configuration for coalescing typing and deletion bursts.
 */
export interface CoalesceConfig {
  /** Maximum time gap between edits to coalesce (ms) */
  maxTimeGap: number;
  /** Maximum characters in one coalesced step */
  maxCharacters: number;
}

export const DEFAULT_COALESCE_CONFIG: CoalesceConfig = {
  maxTimeGap: 1000,
  maxCharacters: 50
};

export type UndoResult =
  | { status: 'undone'; transaction: Transaction }
  | { status: 'nothing-to-undo' };

export type RedoResult =
  | { status: 'redone'; transaction: Transaction }
  | { status: 'nothing-to-redo' };

export interface UndoLogEvents {
  'state-changed': [{ canUndo: boolean; canRedo: boolean }];
  'undo-performed': [{ transaction: Transaction }];
  'redo-performed': [{ transaction: Transaction }];
  'transaction-committed': [{ transaction: Transaction }];
  'history-cleared': [];
}

/**
 * Generate a unique ID for transactions and commands.
 */
export function generateId(): string {
  return `${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

export function createEditCommand(
  kind: EditKind,
  position: number,
  deleted: StyledText,
  inserted: StyledText,
  id: string = generateId()
): EditCommand {
  return Object.freeze({
    id,
    kind,
    position,
    deleted: Object.freeze({ text: deleted.text, styles: [...deleted.styles] }),
    inserted: Object.freeze({ text: inserted.text, styles: [...inserted.styles] })
  });
}

/**
 * The command that reverses `command`.
 */
export function invertCommand(command: EditCommand): EditCommand {
  const kind: EditKind = command.kind === 'insert'
    ? 'delete'
    : command.kind === 'delete' ? 'insert' : 'style';
  return createEditCommand(kind, command.position, command.inserted, command.deleted, command.id);
}
