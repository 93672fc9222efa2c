/**
 * UndoLog - Transaction-based undo/redo management.
 *
 * Groups recorded edit commands into transactions, coalesces typing and
 * deletion bursts, and replays transactions backwards and forwards.
 */

import { EventEmitter } from '../../events/EventEmitter';
import { concatStyled } from '../../text/types';
import {
  EditCommand,
  Transaction,
  CoalesceConfig,
  DEFAULT_COALESCE_CONFIG,
  UndoLogEvents,
  UndoResult,
  RedoResult,
  createEditCommand,
  generateId
} from './types';
import { CursorTracker } from './CursorTracker';
import { CommandReplay } from './CommandReplay';

export interface UndoLogOptions {
  maxHistory?: number;
  coalesce?: Partial<CoalesceConfig>;
  /** Clock used to stamp transactions */
  now?: () => number;
}

const DEFAULT_MAX_HISTORY = 500;

const WHITESPACE = /\s/;

/**
 * Plain typing or deletion; only these coalesce into bursts.
 */
function isBurstCommand(command: EditCommand): boolean {
  return (command.kind === 'insert' && command.deleted.text.length === 0)
    || (command.kind === 'delete' && command.inserted.text.length === 0);
}

export class UndoLog extends EventEmitter<UndoLogEvents> {
  private undoStack: Transaction[] = [];
  private redoStack: Transaction[] = [];
  private maxHistory: number;

  private isReplaying: boolean = false;
  private coalesceConfig: CoalesceConfig;
  private now: () => number;

  // Pending transaction for coalescing
  private pendingTransaction: Transaction | null = null;

  // Compound operation tracking
  private transactionStack: Transaction[] = [];

  private cursorTracker: CursorTracker;
  private replay: CommandReplay;

  constructor(replay: CommandReplay, cursorTracker: CursorTracker = new CursorTracker(), options: UndoLogOptions = {}) {
    super();
    this.replay = replay;
    this.cursorTracker = cursorTracker;
    this.maxHistory = options.maxHistory ?? DEFAULT_MAX_HISTORY;
    this.coalesceConfig = { ...DEFAULT_COALESCE_CONFIG, ...options.coalesce };
    this.now = options.now ?? (() => Date.now());
  }

  /**
   * True while an undo or redo is being replayed into the buffer.
   */
  get isUndoRedoInProgress(): boolean {
    return this.isReplaying;
  }

  /**
   * Record a command. It joins the open compound operation, coalesces into
   * the pending burst, or starts a transaction of its own.
   */
  recordCommand(command: EditCommand): void {
    if (this.isReplaying) {
      return;
    }

    const timestamp = this.now();

    if (this.transactionStack.length > 0) {
      const active = this.transactionStack[this.transactionStack.length - 1];
      active.commands.push(command);
      active.endTime = timestamp;
      return;
    }

    const cursor = this.cursorTracker.capture();
    this.offerToHistory({
      id: generateId(),
      commands: [command],
      cursorBefore: cursor,
      cursorAfter: cursor,
      description: this.getDescriptionForCommand(command),
      startTime: timestamp,
      endTime: timestamp
    });
  }

  /**
   * Create a boundary: the pending burst is committed and the next edit starts a new step.
   * Call this on cursor navigation or an explicit save.
   */
  createBoundary(): void {
    this.flushPendingTransaction();
  }

  /**
   * Begin a compound operation.
   * All commands until endCompoundOperation are grouped into one transaction.
   */
  beginCompoundOperation(description?: string): void {
    const cursor = this.cursorTracker.capture();
    const timestamp = this.now();

    this.transactionStack.push({
      id: generateId(),
      commands: [],
      cursorBefore: cursor,
      cursorAfter: cursor,
      description: description || 'Multiple Changes',
      startTime: timestamp,
      endTime: timestamp
    });
  }

  /**
   * End a compound operation. Nested operations merge into their parent;
   * an operation that recorded nothing commits nothing.
   */
  endCompoundOperation(description?: string): void {
    const transaction = this.transactionStack.pop();
    if (!transaction) return;

    transaction.endTime = this.now();
    transaction.cursorAfter = this.cursorTracker.capture();
    if (description) {
      transaction.description = description;
    }

    if (this.transactionStack.length > 0) {
      const parent = this.transactionStack[this.transactionStack.length - 1];
      parent.commands.push(...transaction.commands);
      parent.endTime = transaction.endTime;
      return;
    }

    if (transaction.commands.length > 0) {
      this.offerToHistory(transaction);
    }
  }

  get inCompoundOperation(): boolean {
    return this.transactionStack.length > 0;
  }

  /**
   * Undo the newest transaction.
   */
  undo(): UndoResult {
    this.flushPendingTransaction();

    const transaction = this.undoStack.pop();
    if (!transaction) {
      return { status: 'nothing-to-undo' };
    }

    this.isReplaying = true;
    try {
      for (let i = transaction.commands.length - 1; i >= 0; i--) {
        this.replay.undoCommand(transaction.commands[i]);
      }
      this.cursorTracker.restore(transaction.cursorBefore);
    } finally {
      this.isReplaying = false;
    }

    this.redoStack.push(transaction);
    this.emit('undo-performed', { transaction });
    this.emitStateChange();

    return { status: 'undone', transaction };
  }

  /**
   * Redo the most recently undone transaction.
   */
  redo(): RedoResult {
    this.flushPendingTransaction();

    const transaction = this.redoStack.pop();
    if (!transaction) {
      return { status: 'nothing-to-redo' };
    }

    this.isReplaying = true;
    try {
      for (const command of transaction.commands) {
        this.replay.redoCommand(command);
      }
      this.cursorTracker.restore(transaction.cursorAfter);
    } finally {
      this.isReplaying = false;
    }

    this.undoStack.push(transaction);
    this.emit('redo-performed', { transaction });
    this.emitStateChange();

    return { status: 'redone', transaction };
  }

  canUndo(): boolean {
    return this.undoStack.length > 0 || this.pendingTransaction !== null;
  }

  canRedo(): boolean {
    return this.redoStack.length > 0;
  }

  getUndoDescription(): string | null {
    if (this.pendingTransaction) {
      return this.pendingTransaction.description;
    }
    if (this.undoStack.length === 0) {
      return null;
    }
    return this.undoStack[this.undoStack.length - 1].description;
  }

  getRedoDescription(): string | null {
    if (this.redoStack.length === 0) {
      return null;
    }
    return this.redoStack[this.redoStack.length - 1].description;
  }

  /**
   * Number of committed transactions plus the pending burst, if any.
   */
  get undoDepth(): number {
    return this.undoStack.length + (this.pendingTransaction ? 1 : 0);
  }

  get redoDepth(): number {
    return this.redoStack.length;
  }

  clear(): void {
    this.undoStack = [];
    this.redoStack = [];
    this.pendingTransaction = null;
    this.transactionStack = [];
    this.emit('history-cleared');
    this.emitStateChange();
  }

  setCoalesceConfig(config: Partial<CoalesceConfig>): void {
    this.coalesceConfig = { ...this.coalesceConfig, ...config };
  }

  setMaxHistory(max: number): void {
    this.maxHistory = max;
    this.trimHistory();
  }

  /**
   * Flush the pending burst to the undo stack.
   */
  flushPendingTransaction(): void {
    if (this.pendingTransaction) {
      const pending = this.pendingTransaction;
      this.pendingTransaction = null;
      this.commitTransaction(pending);
    }
  }

  /**
   * A new user action: merge it into the pending burst, hold it as the new
   * burst, or commit it. Any new action clears the redo stack.
   */
  private offerToHistory(transaction: Transaction): void {
    const hadRedo = this.redoStack.length > 0;
    this.redoStack = [];

    const single = transaction.commands.length === 1 ? transaction.commands[0] : null;

    if (single && this.pendingTransaction && this.tryCoalesce(this.pendingTransaction, single, transaction.endTime)) {
      this.pendingTransaction.cursorAfter = transaction.cursorAfter;
      this.pendingTransaction.endTime = transaction.endTime;
      if (hadRedo) this.emitStateChange();
      return;
    }

    this.flushPendingTransaction();

    if (single && isBurstCommand(single)) {
      this.pendingTransaction = transaction;
      this.emitStateChange();
      return;
    }

    this.commitTransaction(transaction);
  }

  /**
   * Merge `command` into the pending transaction's only command when it
   * continues the same burst.
   */
  private tryCoalesce(pending: Transaction, command: EditCommand, timestamp: number): boolean {
    if (pending.commands.length !== 1) {
      return false;
    }
    const last = pending.commands[0];

    if (command.kind !== last.kind || !isBurstCommand(command)) {
      return false;
    }
    if (timestamp - pending.endTime > this.coalesceConfig.maxTimeGap) {
      return false;
    }

    const merged = command.kind === 'insert'
      ? this.mergeInsert(last, command)
      : this.mergeDelete(last, command);
    if (!merged) {
      return false;
    }

    pending.commands[0] = merged;
    return true;
  }

  private mergeInsert(last: EditCommand, command: EditCommand): EditCommand | null {
    const previous = last.inserted.text;
    const next = command.inserted.text;

    if (command.position !== last.position + previous.length) {
      return null;
    }
    if (previous.length + next.length > this.coalesceConfig.maxCharacters) {
      return null;
    }
    // A newline closes the burst; a word after whitespace starts a new step
    if (previous.endsWith('\n')) {
      return null;
    }
    if (WHITESPACE.test(previous.charAt(previous.length - 1)) && !WHITESPACE.test(next.charAt(0))) {
      return null;
    }
    const lastStyle = last.inserted.styles[last.inserted.styles.length - 1];
    const nextStyle = command.inserted.styles[0];
    if (lastStyle.bold !== nextStyle.bold || lastStyle.underline !== nextStyle.underline) {
      return null;
    }

    return createEditCommand('insert', last.position, last.deleted, concatStyled(last.inserted, command.inserted), last.id);
  }

  private mergeDelete(last: EditCommand, command: EditCommand): EditCommand | null {
    const total = last.deleted.text.length + command.deleted.text.length;
    if (total > this.coalesceConfig.maxCharacters) {
      return null;
    }

    // Backspace: the new span ends where the last one started
    if (command.position + command.deleted.text.length === last.position) {
      return createEditCommand('delete', command.position, concatStyled(command.deleted, last.deleted), last.inserted, last.id);
    }
    // Forward delete: same position
    if (command.position === last.position) {
      return createEditCommand('delete', last.position, concatStyled(last.deleted, command.deleted), last.inserted, last.id);
    }
    return null;
  }

  private commitTransaction(transaction: Transaction): void {
    if (transaction.commands.length === 0) {
      return;
    }

    this.undoStack.push(transaction);
    this.trimHistory();

    this.emit('transaction-committed', { transaction });
    this.emitStateChange();
  }

  private trimHistory(): void {
    while (this.undoStack.length > this.maxHistory) {
      this.undoStack.shift();
    }
  }

  private getDescriptionForCommand(command: EditCommand): string {
    const descriptions: Record<EditCommand['kind'], string> = {
      'insert': 'Typing',
      'delete': 'Delete',
      'style': 'Format'
    };
    return descriptions[command.kind];
  }

  private emitStateChange(): void {
    this.emit('state-changed', {
      canUndo: this.canUndo(),
      canRedo: this.canRedo()
    });
  }
}
