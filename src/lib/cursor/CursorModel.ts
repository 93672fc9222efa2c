import { EventEmitter } from '../events/EventEmitter';
import { DocumentBuffer } from '../text/DocumentBuffer';
import { ReflowEngine } from '../layout/ReflowEngine';
import { EditCommand } from '../undo/transaction/types';
import { VisualLine } from '../text/types';
import { TextRange, RowColumn, outOfRange } from '../types';

export interface CursorModelEvents {
  'cursor-moved': [{ offset: number }];
  'selection-changed': [{ selection: TextRange | null }];
}

export interface CursorModelOptions {
  /** Visual lines moved by pageUp / pageDown */
  pageSize?: number;
}

const DEFAULT_PAGE_SIZE = 20;

function isHighSurrogate(code: number): boolean {
  return code >= 0xd800 && code <= 0xdbff;
}

function isLowSurrogate(code: number): boolean {
  return code >= 0xdc00 && code <= 0xdfff;
}

/**
 * Map an offset through an edit: offsets before it stay, offsets after the
 * replaced span shift, offsets inside the replaced span collapse to its start.
 */
export function mapOffsetThroughEdit(offset: number, command: EditCommand): number {
  if (command.kind === 'style') {
    return offset;
  }
  const deletedEnd = command.position + command.deleted.text.length;
  if (offset < command.position) {
    return offset;
  }
  if (offset >= deletedEnd) {
    return offset + command.inserted.text.length - command.deleted.text.length;
  }
  return command.position;
}

/**
 * The caret: a logical offset plus the sticky column used by vertical movement.
 */
export class CursorModel extends EventEmitter<CursorModelEvents> {
  private buffer: DocumentBuffer;
  private reflow: ReflowEngine;
  private pageSize: number;

  private _offset: number = 0;
  private preferredColumn: number | null = null;
  private selectionAnchor: number | null = null;

  private readonly onEdit = (command: EditCommand): void => {
    this.preferredColumn = null;
    if (this.selectionAnchor !== null) {
      this.selectionAnchor = mapOffsetThroughEdit(this.selectionAnchor, command);
    }
    const mapped = mapOffsetThroughEdit(this._offset, command);
    if (mapped !== this._offset) {
      this._offset = mapped;
      this.emit('cursor-moved', { offset: mapped });
    }
  };

  private readonly onContentReset = (): void => {
    this.preferredColumn = null;
    this.selectionAnchor = null;
    this._offset = 0;
    this.emit('cursor-moved', { offset: 0 });
  };

  constructor(buffer: DocumentBuffer, reflow: ReflowEngine, options: CursorModelOptions = {}) {
    super();
    this.buffer = buffer;
    this.reflow = reflow;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.buffer.on('edit', this.onEdit);
    this.buffer.on('content-reset', this.onContentReset);
  }

  get offset(): number {
    return this._offset;
  }

  /**
   * The sticky column, or null when the next vertical move should take the current one.
   */
  get stickyColumn(): number | null {
    return this.preferredColumn;
  }

  setOffset(offset: number): void {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.buffer.length) {
      throw outOfRange(`Offset ${offset} is outside the document (length ${this.buffer.length})`, { offset });
    }
    this.preferredColumn = null;
    this.moveTo(offset);
  }

  // ============================================
  // Coordinate conversion
  // ============================================

  toRowColumn(offset: number = this._offset): RowColumn {
    const row = this.reflow.lineIndexForOffset(offset);
    const line = this.reflow.lineAt(row);
    return { row, column: line.indent + (offset - line.start) };
  }

  /**
   * Offset shown at a visual row and column, both clamped into the document.
   */
  fromRowColumn(row: number, column: number): number {
    const lastRow = this.reflow.lineCount - 1;
    const line = this.reflow.lineAt(Math.max(0, Math.min(Math.trunc(row), lastRow)));

    if (column <= line.indent) {
      return line.start;
    }
    const offset = line.start + Math.trunc(column) - line.indent;
    return Math.min(offset, this.lastOffsetOnLine(line));
  }

  // ============================================
  // Horizontal movement
  // ============================================

  moveLeft(): void {
    if (this._offset === 0) return;
    let next = this._offset - 1;
    if (next > 0 && isLowSurrogate(this.buffer.getText().charCodeAt(next))
      && isHighSurrogate(this.buffer.getText().charCodeAt(next - 1))) {
      next--;
    }
    this.moveHorizontally(next);
  }

  moveRight(): void {
    if (this._offset >= this.buffer.length) return;
    const text = this.buffer.getText();
    let next = this._offset + 1;
    if (isHighSurrogate(text.charCodeAt(this._offset)) && isLowSurrogate(text.charCodeAt(next))) {
      next++;
    }
    this.moveHorizontally(next);
  }

  /**
   * Move to the start of the next word.
   */
  moveWordForward(): void {
    const text = this.buffer.getText();
    let pos = this._offset;

    // Skip current word if on one, then the gap after it
    while (pos < text.length && this.isWordChar(text.charAt(pos))) {
      pos++;
    }
    while (pos < text.length && !this.isWordChar(text.charAt(pos))) {
      pos++;
    }

    this.moveHorizontally(pos);
  }

  /**
   * Move to the start of the current or previous word.
   */
  moveWordBackward(): void {
    if (this._offset === 0) return;

    const text = this.buffer.getText();
    let pos = this._offset - 1;

    while (pos > 0 && !this.isWordChar(text.charAt(pos))) {
      pos--;
    }
    while (pos > 0 && this.isWordChar(text.charAt(pos - 1))) {
      pos--;
    }

    this.moveHorizontally(pos);
  }

  moveToVisualLineStart(): void {
    this.moveHorizontally(this.currentLine().start);
  }

  /**
   * End of the visual line. On a soft-wrapped line this is the last
   * character, so the caret stays on the same row.
   */
  moveToVisualLineEnd(): void {
    this.moveHorizontally(this.lastOffsetOnLine(this.currentLine()));
  }

  moveToParagraphStart(): void {
    const text = this.buffer.getText();
    const previousBreak = this._offset === 0 ? -1 : text.lastIndexOf('\n', this._offset - 1);
    this.moveHorizontally(previousBreak + 1);
  }

  moveToParagraphEnd(): void {
    const nextBreak = this.buffer.getText().indexOf('\n', this._offset);
    this.moveHorizontally(nextBreak === -1 ? this.buffer.length : nextBreak);
  }

  moveToDocumentStart(): void {
    this.moveHorizontally(0);
  }

  moveToDocumentEnd(): void {
    this.moveHorizontally(this.buffer.length);
  }

  // ============================================
  // Vertical movement
  // ============================================

  moveUp(): void {
    this.moveVertically(-1);
  }

  moveDown(): void {
    this.moveVertically(1);
  }

  pageUp(): void {
    this.moveVertically(-this.pageSize);
  }

  pageDown(): void {
    this.moveVertically(this.pageSize);
  }

  setPageSize(lines: number): void {
    this.pageSize = lines;
  }

  // ============================================
  // Selection
  // ============================================

  /**
   * Set the selection anchor; the selection spans from it to the caret.
   */
  setAnchor(position: number = this._offset): void {
    if (!Number.isInteger(position) || position < 0 || position > this.buffer.length) {
      throw outOfRange(`Anchor ${position} is outside the document (length ${this.buffer.length})`, { position });
    }
    this.selectionAnchor = position;
    this.emitSelectionChange();
  }

  get hasAnchor(): boolean {
    return this.selectionAnchor !== null;
  }

  /**
   * The selected range, or null when there is no anchor or it equals the caret.
   */
  selection(): TextRange | null {
    if (this.selectionAnchor === null || this.selectionAnchor === this._offset) {
      return null;
    }
    return {
      start: Math.min(this.selectionAnchor, this._offset),
      end: Math.max(this.selectionAnchor, this._offset)
    };
  }

  clearSelection(): void {
    if (this.selectionAnchor !== null) {
      this.selectionAnchor = null;
      this.emit('selection-changed', { selection: null });
    }
  }

  dispose(): void {
    this.buffer.off('edit', this.onEdit);
    this.buffer.off('content-reset', this.onContentReset);
  }

  private isWordChar(char: string): boolean {
    return /[\w\u00C0-\u024F]/.test(char);
  }

  private currentLine(): VisualLine {
    return this.reflow.lineForOffset(this._offset);
  }

  private lastOffsetOnLine(line: VisualLine): number {
    const softWrapped = !line.hardBreak && line.index < this.reflow.lineCount - 1;
    return softWrapped ? line.end - 1 : line.end;
  }

  private moveHorizontally(offset: number): void {
    this.preferredColumn = null;
    this.moveTo(offset);
  }

  private moveVertically(rows: number): void {
    const { row, column } = this.toRowColumn();
    const target = Math.max(0, Math.min(row + rows, this.reflow.lineCount - 1));
    if (target === row) return;

    if (this.preferredColumn === null) {
      this.preferredColumn = column;
    }
    this.moveTo(this.fromRowColumn(target, this.preferredColumn));
  }

  private moveTo(offset: number): void {
    if (offset === this._offset) return;
    this._offset = offset;
    this.emit('cursor-moved', { offset });
    if (this.selectionAnchor !== null) {
      this.emitSelectionChange();
    }
  }

  private emitSelectionChange(): void {
    this.emit('selection-changed', { selection: this.selection() });
  }
}
