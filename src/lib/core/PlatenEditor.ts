import { EventEmitter } from '../events/EventEmitter';
import { EditorConstants } from '../constants';
import { DocumentBuffer } from '../text/DocumentBuffer';
import { assertLineWidth, columnCount } from '../text/TextLayout';
import {
  TextStyle,
  StyledText,
  StyleAttribute,
  VisualLine,
  PLAIN,
  styled,
  withAttribute,
  BACKSPACE_CHAR,
  PARAGRAPH_SEPARATOR
} from '../text/types';
import { ReflowEngine } from '../layout/ReflowEngine';
import { Page, paginate, pageCapacity, pageForLine } from '../layout/Paginator';
import { CursorModel } from '../cursor/CursorModel';
import {
  UndoLog,
  CommandReplay,
  CursorTracker,
  EditObserver,
  CursorState,
  UndoResult,
  RedoResult
} from '../undo';
import { SearchDirection, SearchResult, search } from '../search/SearchEngine';
import { encodeDocument, decodeDocument } from '../codec/OverstrikeCodec';
import { styledToRtf, rtfToStyled } from '../codec/RtfCodec';
import { PrintFormatter } from '../print/PrintFormatter';
import { FormattedDocument } from '../print/types';
import { PdfRenderer, PdfRendererOptions, PdfRenderResult } from '../rendering/PdfRenderer';
import { EditorPreferences, DEFAULT_PREFERENCES } from '../session/Preferences';
import { EditorOptions, TextRange, invalidConfiguration } from '../types';

export type MoveDirection =
  | 'left'
  | 'right'
  | 'up'
  | 'down'
  | 'wordForward'
  | 'wordBackward'
  | 'lineStart'
  | 'lineEnd'
  | 'paragraphStart'
  | 'paragraphEnd'
  | 'documentStart'
  | 'documentEnd'
  | 'pageUp'
  | 'pageDown';

export interface CursorPosition {
  offset: number;
  row: number;
  column: number;
}

/**
 * What a copy hands to the host: the styled text for pasting back into an
 * editor, plain text and RTF for other applications.
 */
export interface ClipboardContent {
  styled: StyledText;
  text: string;
  rtf: string;
}

export interface PlatenEditorEvents {
  'content-changed': [{ version: number }];
  'cursor-moved': [CursorPosition];
  'selection-changed': [{ selection: TextRange | null }];
  'layout-changed': [{ width: number; doubleSpaced: boolean }];
  'undo-state-changed': [{ canUndo: boolean; canRedo: boolean }];
  'modified-changed': [{ modified: boolean }];
}

type ResolvedEditorOptions = Required<EditorOptions>;

interface IncrementalSearch {
  origin: number;
  query: string;
  match: { offset: number; length: number } | null;
}

/**
 * One open document: the buffer plus the undo log, layout, cursor and
 * print pipeline that work on it. Every editing action is one undo step.
 */
export class PlatenEditor extends EventEmitter<PlatenEditorEvents> {
  private options: ResolvedEditorOptions;
  private buffer: DocumentBuffer;
  private reflowEngine: ReflowEngine;
  private cursor: CursorModel;
  private undoLog: UndoLog;
  private editObserver: EditObserver;
  private printFormatter: PrintFormatter = new PrintFormatter();

  private caretStyle: TextStyle = PLAIN;
  private clipboard: StyledText | null = null;
  private searchSession: IncrementalSearch | null = null;
  private modified: boolean = false;
  private loading: boolean = false;
  private pageCache: { version: number; width: number; doubleSpaced: boolean; pages: Page[] } | null = null;

  constructor(options?: EditorOptions) {
    super();
    this.options = this.mergeOptions(options);

    this.buffer = new DocumentBuffer();
    this.reflowEngine = new ReflowEngine(this.buffer, this.options.documentWidth);
    this.cursor = new CursorModel(this.buffer, this.reflowEngine, {
      pageSize: pageCapacity(this.options.linesPerPage, this.options.doubleSpaced)
    });

    const cursorTracker = new CursorTracker(
      () => ({ offset: this.cursor.offset, selection: this.cursor.selection() }),
      state => this.restoreCursorState(state)
    );
    this.undoLog = new UndoLog(new CommandReplay(this.buffer), cursorTracker, {
      maxHistory: this.options.maxUndoHistory,
      coalesce: {
        maxTimeGap: this.options.coalesceTimeGap,
        maxCharacters: this.options.coalesceMaxCharacters
      },
      now: this.options.now
    });
    this.editObserver = new EditObserver(this.undoLog);
    this.editObserver.observe(this.buffer);

    this.setupEventForwarding();
  }

  private mergeOptions(options?: EditorOptions): ResolvedEditorOptions {
    const merged: ResolvedEditorOptions = {
      documentWidth: options?.documentWidth ?? EditorConstants.DOCUMENT_WIDTH,
      linesPerPage: options?.linesPerPage ?? EditorConstants.LINES_PER_PAGE,
      doubleSpaced: options?.doubleSpaced ?? false,
      maxUndoHistory: options?.maxUndoHistory ?? EditorConstants.MAX_UNDO_HISTORY,
      coalesceTimeGap: options?.coalesceTimeGap ?? EditorConstants.COALESCE_TIME_GAP_MS,
      coalesceMaxCharacters: options?.coalesceMaxCharacters ?? EditorConstants.COALESCE_MAX_CHARACTERS,
      now: options?.now ?? (() => Date.now())
    };

    assertLineWidth(merged.documentWidth);
    pageCapacity(merged.linesPerPage, merged.doubleSpaced);
    if (!Number.isInteger(merged.maxUndoHistory) || merged.maxUndoHistory < 1) {
      throw invalidConfiguration(`maxUndoHistory must be a positive integer, got ${merged.maxUndoHistory}`);
    }
    if (!(merged.coalesceTimeGap >= 0)) {
      throw invalidConfiguration(`coalesceTimeGap must not be negative, got ${merged.coalesceTimeGap}`);
    }
    if (!Number.isInteger(merged.coalesceMaxCharacters) || merged.coalesceMaxCharacters < 1) {
      throw invalidConfiguration(`coalesceMaxCharacters must be a positive integer, got ${merged.coalesceMaxCharacters}`);
    }
    return merged;
  }

  private setupEventForwarding(): void {
    this.buffer.on('content-changed', ({ version }) => {
      this.emit('content-changed', { version });
      this.emitLayoutChange();
      if (!this.loading) {
        this.setModified(true);
      }
    });
    this.cursor.on('cursor-moved', () => {
      this.emit('cursor-moved', this.getCursor());
    });
    this.cursor.on('selection-changed', ({ selection }) => {
      this.emit('selection-changed', { selection });
    });
    this.undoLog.on('state-changed', () => {
      this.emit('undo-state-changed', { canUndo: this.canUndo(), canRedo: this.canRedo() });
    });
  }

  // ============================================
  // Read-only views
  // ============================================

  getText(): string {
    return this.buffer.getText();
  }

  getDocument(): StyledText {
    return this.buffer.toStyledText();
  }

  getVisualLines(): VisualLine[] {
    return this.reflowEngine.lines();
  }

  /**
   * Screen pagination of the visual lines. Recomputed only after the text,
   * width or spacing changed.
   */
  getPages(): Page[] {
    const { documentWidth: width, doubleSpaced } = this.options;
    const cache = this.pageCache;
    if (cache && cache.version === this.buffer.version && cache.width === width && cache.doubleSpaced === doubleSpaced) {
      return cache.pages;
    }
    const pages = paginate(this.reflowEngine.lines(), this.options.linesPerPage, doubleSpaced);
    this.pageCache = { version: this.buffer.version, width, doubleSpaced, pages };
    return pages;
  }

  /**
   * Number of the page the cursor is on, counted from 1.
   */
  getCurrentPageNumber(): number {
    return pageForLine(this.getPages(), this.getCursor().row).number;
  }

  getCursor(): CursorPosition {
    const { row, column } = this.cursor.toRowColumn();
    return { offset: this.cursor.offset, row, column };
  }

  getSelection(): TextRange | null {
    return this.cursor.selection();
  }

  /**
   * Style given to typed text when there is no selection.
   */
  getCaretStyle(): TextStyle {
    return this.caretStyle;
  }

  getClipboard(): StyledText | null {
    return this.clipboard;
  }

  get documentWidth(): number {
    return this.options.documentWidth;
  }

  get doubleSpaced(): boolean {
    return this.options.doubleSpaced;
  }

  get isModified(): boolean {
    return this.modified;
  }

  canUndo(): boolean {
    return this.undoLog.canUndo();
  }

  canRedo(): boolean {
    return this.undoLog.canRedo();
  }

  getUndoDescription(): string | null {
    return this.undoLog.getUndoDescription();
  }

  getRedoDescription(): string | null {
    return this.undoLog.getRedoDescription();
  }

  // ============================================
  // Layout settings
  // ============================================

  setDocumentWidth(width: number): void {
    assertLineWidth(width);
    if (width === this.options.documentWidth) return;
    this.options.documentWidth = width;
    this.reflowEngine.reflow(width);
    this.emitLayoutChange();
    this.emit('cursor-moved', this.getCursor());
  }

  setDoubleSpaced(doubleSpaced: boolean): void {
    if (doubleSpaced === this.options.doubleSpaced) return;
    const capacity = pageCapacity(this.options.linesPerPage, doubleSpaced);
    this.options.doubleSpaced = doubleSpaced;
    this.cursor.setPageSize(capacity);
    this.emitLayoutChange();
  }

  // ============================================
  // Editing
  // ============================================

  /**
   * Type text at the cursor with the caret style, replacing the selection.
   */
  insert(text: string): void {
    const value = normalizeInput(text);
    if (value.length === 0) return;

    this.performEdit('Typing', () => {
      this.removeSelection();
      this.buffer.insert(this.cursor.offset, value, this.caretStyle);
    });
  }

  backspace(): void {
    if (this.cursor.selection()) {
      this.deleteSelection();
      return;
    }
    const offset = this.cursor.offset;
    if (offset === 0) return;

    const length = isSurrogatePairAt(this.buffer.getText(), offset - 2) ? 2 : 1;
    this.performEdit('Delete', () => {
      this.buffer.delete(offset - length, length);
    });
  }

  deleteForward(): void {
    if (this.cursor.selection()) {
      this.deleteSelection();
      return;
    }
    const offset = this.cursor.offset;
    if (offset >= this.buffer.length) return;

    const length = isSurrogatePairAt(this.buffer.getText(), offset) ? 2 : 1;
    this.performEdit('Delete', () => {
      this.buffer.delete(offset, length);
    });
  }

  deleteRange(range: TextRange): StyledText {
    return this.performEdit('Delete', () => this.buffer.delete(range.start, range.end - range.start));
  }

  /**
   * Delete from the cursor to the end of its visual line. At the end of a
   * paragraph the next paragraph is joined instead.
   */
  killLine(): void {
    const offset = this.cursor.offset;
    const line = this.reflowEngine.lineForOffset(offset);

    this.performEdit('Kill Line', () => {
      if (offset < line.end) {
        this.buffer.delete(offset, line.end - offset);
      } else if (this.buffer.charAt(offset) === PARAGRAPH_SEPARATOR) {
        this.buffer.delete(offset, 1);
      }
    });
  }

  /**
   * Delete back to the start of the previous word within the paragraph.
   * At the start of a paragraph it joins the previous one.
   */
  backwardKillWord(): void {
    const offset = this.cursor.offset;
    if (offset === 0) return;

    const text = this.buffer.getText();
    const paragraphStart = text.lastIndexOf(PARAGRAPH_SEPARATOR, offset - 1) + 1;

    this.performEdit('Delete Word', () => {
      if (offset === paragraphStart) {
        this.buffer.delete(offset - 1, 1);
        return;
      }
      let pos = offset - 1;
      while (pos > paragraphStart && /\s/.test(text[pos])) {
        pos--;
      }
      while (pos > paragraphStart && !/\s/.test(text[pos - 1])) {
        pos--;
      }
      this.buffer.delete(pos, offset - pos);
    });
  }

  /**
   * Delete the selected text. Returns what was removed, or null without a selection.
   */
  deleteSelection(): StyledText | null {
    if (!this.cursor.selection()) {
      return null;
    }
    return this.performEdit('Delete', () => this.removeSelection());
  }

  setAttribute(range: TextRange, attribute: StyleAttribute, on: boolean): void {
    this.performEdit('Format', () => {
      this.buffer.setAttribute(range, attribute, on);
    });
  }

  /**
   * Toggle an attribute on the selection, or on the caret style when nothing
   * is selected. A selection is switched on unless all of it already has the
   * attribute. Returns the new state.
   */
  toggleAttribute(attribute: StyleAttribute): boolean {
    const selection = this.cursor.selection();
    if (!selection) {
      const on = !this.caretStyle[attribute];
      this.caretStyle = withAttribute(this.caretStyle, attribute, on);
      return on;
    }

    const { text, styles } = this.buffer.slice(selection);
    const on = !styles.every((style, i) => style[attribute] || text[i] === PARAGRAPH_SEPARATOR);
    this.setAttribute(selection, attribute, on);
    return on;
  }

  /**
   * Center the cursor's paragraph within the document width.
   * Returns false, changing nothing, when the text is too wide to center.
   */
  centerLine(): boolean {
    const offset = this.cursor.offset;
    const text = this.buffer.getText();
    const start = offset === 0 ? 0 : text.lastIndexOf(PARAGRAPH_SEPARATOR, offset - 1) + 1;
    const nextBreak = text.indexOf(PARAGRAPH_SEPARATOR, offset);
    const end = nextBreak === -1 ? text.length : nextBreak;

    const paragraph = text.slice(start, end);
    const leading = paragraph.length - paragraph.trimStart().length;
    const content = paragraph.trim();
    const columns = columnCount(content);
    if (columns >= this.options.documentWidth) {
      return false;
    }

    const padding = columns === 0 ? 0 : Math.floor((this.options.documentWidth - columns) / 2);
    const contentStart = start + leading;
    const centered = [
      styled(' '.repeat(padding)),
      this.buffer.slice({ start: contentStart, end: contentStart + content.length })
    ];
    const replacement: StyledText = {
      text: centered.map(part => part.text).join(''),
      styles: centered.flatMap(part => part.styles)
    };

    const column = offset - start;
    const target = column <= leading
      ? start + padding
      : start + Math.min(column - leading, content.length) + padding;

    this.performEdit('Center Line', () => {
      if (replacement.text !== paragraph) {
        this.buffer.replace(start, end - start, replacement);
      }
      this.cursor.clearSelection();
      this.cursor.setOffset(target);
    });
    return true;
  }

  countWords(): number {
    return this.buffer.getText().split(/\s+/).filter(word => word.length > 0).length;
  }

  // ============================================
  // Clipboard
  // ============================================

  copySelection(): ClipboardContent | null {
    const selection = this.cursor.selection();
    if (!selection) {
      return null;
    }
    const copied = this.buffer.slice(selection);
    this.clipboard = copied;
    return { styled: copied, text: copied.text, rtf: styledToRtf(copied) };
  }

  cutSelection(): ClipboardContent | null {
    const copied = this.copySelection();
    if (copied) {
      this.performEdit('Cut', () => {
        this.removeSelection();
      });
    }
    return copied;
  }

  /**
   * Insert styled text at the cursor, replacing the selection. A string is
   * read as RTF when it has an RTF header and as plain text otherwise.
   * Without an argument the clipboard is pasted.
   */
  paste(content: StyledText | string | null = this.clipboard): void {
    const value = typeof content === 'string' ? rtfToStyled(content) : content;
    if (!value || value.text.length === 0) return;

    this.performEdit('Paste', () => {
      this.removeSelection();
      this.buffer.insertStyled(this.cursor.offset, value);
    });
  }

  // ============================================
  // Navigation
  // ============================================

  /**
   * Move the cursor. With `extend` the selection grows from where it started;
   * otherwise any selection is dropped.
   */
  move(direction: MoveDirection, extend: boolean = false): void {
    this.undoLog.createBoundary();
    if (extend) {
      if (!this.cursor.hasAnchor) {
        this.cursor.setAnchor();
      }
    } else {
      this.cursor.clearSelection();
    }

    switch (direction) {
      case 'left': this.cursor.moveLeft(); break;
      case 'right': this.cursor.moveRight(); break;
      case 'up': this.cursor.moveUp(); break;
      case 'down': this.cursor.moveDown(); break;
      case 'wordForward': this.cursor.moveWordForward(); break;
      case 'wordBackward': this.cursor.moveWordBackward(); break;
      case 'lineStart': this.cursor.moveToVisualLineStart(); break;
      case 'lineEnd': this.cursor.moveToVisualLineEnd(); break;
      case 'paragraphStart': this.cursor.moveToParagraphStart(); break;
      case 'paragraphEnd': this.cursor.moveToParagraphEnd(); break;
      case 'documentStart': this.cursor.moveToDocumentStart(); break;
      case 'documentEnd': this.cursor.moveToDocumentEnd(); break;
      case 'pageUp': this.cursor.pageUp(); break;
      case 'pageDown': this.cursor.pageDown(); break;
    }
  }

  setCursorOffset(offset: number): void {
    this.undoLog.createBoundary();
    this.cursor.clearSelection();
    this.cursor.setOffset(offset);
  }

  /**
   * Select a range; the cursor ends up at `range.end`.
   */
  select(range: TextRange): void {
    this.undoLog.createBoundary();
    this.cursor.clearSelection();
    this.cursor.setOffset(range.end);
    this.cursor.setAnchor(range.start);
  }

  clearSelection(): void {
    this.cursor.clearSelection();
  }

  // ============================================
  // Undo / redo
  // ============================================

  undo(): UndoResult {
    return this.undoLog.undo();
  }

  redo(): RedoResult {
    return this.undoLog.redo();
  }

  clearUndoHistory(): void {
    this.undoLog.clear();
  }

  // ============================================
  // Incremental search
  // ============================================

  beginIncrementalSearch(): void {
    this.undoLog.createBoundary();
    this.cursor.clearSelection();
    this.searchSession = { origin: this.cursor.offset, query: '', match: null };
  }

  get inIncrementalSearch(): boolean {
    return this.searchSession !== null;
  }

  /**
   * Search for `query` from where the session began and move to the match.
   * Without a match the cursor stays where it is.
   */
  updateIncrementalSearch(query: string): SearchResult {
    const session = this.requireSearchSession();
    session.query = query;
    return this.applySearch(session, search(this.buffer.getText(), query, session.origin, 'forward'));
  }

  /**
   * Search again from just past the current match.
   */
  findNextMatch(direction: SearchDirection = 'forward'): SearchResult {
    const session = this.requireSearchSession();
    const from = session.match
      ? (direction === 'forward' ? session.match.offset + 1 : session.match.offset)
      : session.origin;
    return this.applySearch(session, search(this.buffer.getText(), session.query, from, direction));
  }

  /**
   * Finish the session. When not accepted the cursor returns to where it began.
   */
  endIncrementalSearch(accept: boolean): void {
    const session = this.requireSearchSession();
    this.searchSession = null;
    if (!accept) {
      this.cursor.setOffset(Math.min(session.origin, this.buffer.length));
    }
  }

  // ============================================
  // Files and printing
  // ============================================

  /**
   * Replace the document with encoded file content. History is cleared and
   * the document is unmodified afterwards.
   */
  load(input: Uint8Array | string): void {
    const value = decodeDocument(input);
    this.searchSession = null;
    this.caretStyle = PLAIN;
    this.loading = true;
    try {
      this.buffer.setContent(value);
    } finally {
      this.loading = false;
    }
    this.undoLog.clear();
    this.setModified(false);
  }

  /**
   * Encode the document for writing to disk and mark it unmodified.
   */
  save(): Uint8Array {
    this.undoLog.createBoundary();
    const bytes = encodeDocument(this.buffer);
    this.setModified(false);
    return bytes;
  }

  formatForPrint(preferences: EditorPreferences = DEFAULT_PREFERENCES): FormattedDocument {
    return this.printFormatter.formatWithFallback(this.buffer, preferences.fontName, {
      doubleSided: preferences.doubleSided,
      doubleSpaced: preferences.doubleSpaced
    });
  }

  /**
   * Format the document and write it to a PDF. Warnings from both steps are reported.
   */
  async exportPdf(
    preferences: EditorPreferences = DEFAULT_PREFERENCES,
    rendererOptions: PdfRendererOptions = {}
  ): Promise<PdfRenderResult> {
    const formatted = this.formatForPrint(preferences);
    const renderer = new PdfRenderer(rendererOptions);
    const result = await renderer.renderWithReport(formatted.pages, formatted.font);
    return { ...result, warnings: [...formatted.warnings, ...result.warnings] };
  }

  destroy(): void {
    this.editObserver.unobserve(this.buffer);
    this.cursor.dispose();
    this.reflowEngine.dispose();
    this.buffer.removeAllListeners();
    this.undoLog.removeAllListeners();
    this.removeAllListeners();
  }

  // ============================================
  // Internals
  // ============================================

  private performEdit<T>(description: string, action: () => T): T {
    this.undoLog.beginCompoundOperation(description);
    try {
      return action();
    } finally {
      this.undoLog.endCompoundOperation();
    }
  }

  private removeSelection(): StyledText | null {
    const selection = this.cursor.selection();
    if (!selection) {
      return null;
    }
    const removed = this.buffer.delete(selection.start, selection.end - selection.start);
    this.cursor.clearSelection();
    return removed;
  }

  private restoreCursorState(state: CursorState): void {
    const clamp = (offset: number): number => Math.max(0, Math.min(offset, this.buffer.length));
    this.cursor.clearSelection();
    this.cursor.setOffset(clamp(state.offset));
    if (state.selection) {
      const anchor = state.offset === state.selection.start ? state.selection.end : state.selection.start;
      this.cursor.setAnchor(clamp(anchor));
    }
  }

  private applySearch(session: IncrementalSearch, result: SearchResult): SearchResult {
    if (result.kind === 'match') {
      session.match = { offset: result.offset, length: result.length };
      this.cursor.setOffset(result.offset);
    }
    return result;
  }

  private requireSearchSession(): IncrementalSearch {
    if (!this.searchSession) {
      throw invalidConfiguration('No incremental search is active');
    }
    return this.searchSession;
  }

  private emitLayoutChange(): void {
    this.emit('layout-changed', {
      width: this.options.documentWidth,
      doubleSpaced: this.options.doubleSpaced
    });
  }

  private setModified(modified: boolean): void {
    if (this.modified === modified) return;
    this.modified = modified;
    this.emit('modified-changed', { modified });
  }
}

/**
 * Typed text uses LF line ends and carries no backspace characters.
 */
function normalizeInput(text: string): string {
  return text.replace(/\r\n?/g, PARAGRAPH_SEPARATOR).split(BACKSPACE_CHAR).join('');
}

function isSurrogatePairAt(text: string, index: number): boolean {
  if (index < 0 || index + 1 >= text.length) return false;
  const high = text.charCodeAt(index);
  const low = text.charCodeAt(index + 1);
  return high >= 0xd800 && high <= 0xdbff && low >= 0xdc00 && low <= 0xdfff;
}
