import { EventEmitter } from '../events/EventEmitter';
import { TextRange, outOfRange } from '../types';
import { EditCommand, createEditCommand } from '../undo/transaction/types';
import {
  TextStyle,
  StyledText,
  StyleAttribute,
  TextRun,
  PLAIN,
  EMPTY_TEXT,
  styled,
  stylesEqual,
  withAttribute,
  toRuns,
  PARAGRAPH_SEPARATOR
} from './types';

/**
 * Paragraph separators never carry a style.
 */
function plainSeparators(value: StyledText): StyledText {
  if (!value.text.includes(PARAGRAPH_SEPARATOR)) {
    return value;
  }
  return {
    text: value.text,
    styles: value.styles.map((style, i) => value.text[i] === PARAGRAPH_SEPARATOR ? PLAIN : style)
  };
}

export interface DocumentBufferEvents {
  /** A single reversible mutation, emitted before the mutating call returns */
  'edit': [EditCommand];
  'content-changed': [{ version: number }];
  /** Content replaced wholesale (load); not undoable */
  'content-reset': [{ version: number }];
}

/**
 * The document: text with one bold/underline style per character.
 * All mutations go through insert/delete/setAttribute/replace and each one
 * emits an `edit` event describing how to reverse it.
 */
export class DocumentBuffer extends EventEmitter<DocumentBufferEvents> {
  private content: string = '';
  private styles: TextStyle[] = [];
  private _version: number = 0;

  constructor(initial?: StyledText) {
    super();
    if (initial) {
      this.assertStyledText(initial);
      this.content = initial.text;
      this.styles = [...plainSeparators(initial).styles];
    }
  }

  get length(): number {
    return this.content.length;
  }

  get isEmpty(): boolean {
    return this.content.length === 0;
  }

  /**
   * Incremented on every change; lets derived views detect staleness.
   */
  get version(): number {
    return this._version;
  }

  getText(): string {
    return this.content;
  }

  charAt(position: number): string {
    return this.content.charAt(position);
  }

  styleAt(position: number): TextStyle {
    if (!Number.isInteger(position) || position < 0 || position >= this.content.length) {
      throw outOfRange(`Position ${position} is outside the document (length ${this.content.length})`, { position });
    }
    return this.styles[position];
  }

  toStyledText(): StyledText {
    return { text: this.content, styles: [...this.styles] };
  }

  /**
   * Text and styles for a range.
   */
  slice(range: TextRange = { start: 0, end: this.content.length }): StyledText {
    this.assertRange(range);
    return {
      text: this.content.slice(range.start, range.end),
      styles: this.styles.slice(range.start, range.end)
    };
  }

  /**
   * Maximal equal-style runs covering a range.
   */
  runs(range: TextRange = { start: 0, end: this.content.length }): TextRun[] {
    return toRuns(this.slice(range), range.start);
  }

  /**
   * Insert text where every character carries `style`.
   */
  insert(position: number, text: string, style: TextStyle = PLAIN): EditCommand | null {
    return this.insertStyled(position, styled(text, style));
  }

  insertStyled(position: number, value: StyledText): EditCommand | null {
    this.assertPosition(position);
    this.assertStyledText(value);
    if (value.text.length === 0) {
      return null;
    }
    return this.commit(createEditCommand('insert', position, EMPTY_TEXT, plainSeparators(value)));
  }

  /**
   * Remove `length` characters starting at `position`.
   * @returns The removed text with its styles
   */
  delete(position: number, length: number): StyledText {
    this.assertRange({ start: position, end: position + length });
    const removed = this.slice({ start: position, end: position + length });
    if (length > 0) {
      this.commit(createEditCommand('delete', position, removed, EMPTY_TEXT));
    }
    return removed;
  }

  /**
   * Turn bold or underline on or off across a range. Paragraph separators stay plain.
   * @returns The styles the range had before the change
   */
  setAttribute(range: TextRange, attribute: StyleAttribute, on: boolean): TextStyle[] {
    this.assertRange(range);
    const before = this.slice(range);
    const after: StyledText = {
      text: before.text,
      styles: before.styles.map((style, i) =>
        before.text[i] === PARAGRAPH_SEPARATOR ? style : withAttribute(style, attribute, on))
    };

    const changed = after.styles.some((style, i) => !stylesEqual(style, before.styles[i]));
    if (changed) {
      this.commit(createEditCommand('style', range.start, before, after));
    }
    return before.styles;
  }

  /**
   * Replace a range with new styled text as one mutation.
   * Used to replay commands during undo and redo.
   */
  replace(position: number, length: number, value: StyledText): EditCommand | null {
    this.assertRange({ start: position, end: position + length });
    this.assertStyledText(value);
    const removed = this.slice({ start: position, end: position + length });
    if (removed.text.length === 0 && value.text.length === 0) {
      return null;
    }

    const kind = removed.text === value.text
      ? 'style'
      : value.text.length === 0 ? 'delete' : 'insert';
    return this.commit(createEditCommand(kind, position, removed, plainSeparators(value)));
  }

  /**
   * Replace the whole content, e.g. after loading a file.
   * This is not an edit and is never recorded for undo.
   */
  setContent(value: StyledText): void {
    this.assertStyledText(value);
    this.content = value.text;
    this.styles = [...plainSeparators(value).styles];
    this._version++;
    this.emit('content-reset', { version: this._version });
    this.emit('content-changed', { version: this._version });
  }

  private commit(command: EditCommand): EditCommand {
    const { position, deleted, inserted } = command;
    const end = position + deleted.text.length;

    this.content = this.content.slice(0, position) + inserted.text + this.content.slice(end);
    this.styles.splice(position, deleted.text.length, ...inserted.styles);
    this._version++;

    this.emit('edit', command);
    this.emit('content-changed', { version: this._version });
    return command;
  }

  private assertPosition(position: number): void {
    if (!Number.isInteger(position) || position < 0 || position > this.content.length) {
      throw outOfRange(
        `Position ${position} is outside the document (length ${this.content.length})`,
        { position }
      );
    }
  }

  private assertRange(range: TextRange): void {
    const { start, end } = range;
    if (!Number.isInteger(start) || !Number.isInteger(end) || start < 0 || end < start || end > this.content.length) {
      throw outOfRange(
        `Range [${start}, ${end}) is outside the document (length ${this.content.length})`,
        { range }
      );
    }
  }

  private assertStyledText(value: StyledText): void {
    if (value.styles.length !== value.text.length) {
      throw outOfRange(
        `Styled text has ${value.text.length} characters but ${value.styles.length} styles`
      );
    }
  }
}
