import { DocumentBuffer } from '../text/DocumentBuffer';
import { TextLayout, assertLineWidth } from '../text/TextLayout';
import { ParagraphLine, VisualLine } from '../text/types';
import { EditorConstants } from '../constants';
import { outOfRange } from '../types';

/**
 * Keeps the wrapped view of a buffer up to date.
 *
 * Recomputation is lazy: a content change only marks the layout dirty, and the
 * next read rebuilds it. Paragraphs whose text did not change reuse their
 * previous wrap.
 */
export class ReflowEngine {
  private buffer: DocumentBuffer;
  private layout: TextLayout = new TextLayout();
  private _width: number;

  private visualLines: VisualLine[] = [];
  private dirty: boolean = true;
  private builtVersion: number = -1;
  private paragraphCache: Map<string, ParagraphLine[]> = new Map();

  private readonly onContentChanged = (): void => {
    this.dirty = true;
  };

  constructor(buffer: DocumentBuffer, width: number = EditorConstants.DOCUMENT_WIDTH) {
    this.buffer = buffer;
    assertLineWidth(width);
    this._width = width;
    this.buffer.on('content-changed', this.onContentChanged);
  }

  get width(): number {
    return this._width;
  }

  /**
   * True when the next read will recompute. The buffer version is checked as
   * well, so reads made from an `edit` handler never see the old layout.
   */
  get isDirty(): boolean {
    return this.dirty || this.builtVersion !== this.buffer.version;
  }

  get lineCount(): number {
    return this.lines().length;
  }

  /**
   * The current visual lines, recomputed first if the buffer changed.
   */
  lines(): VisualLine[] {
    if (this.isDirty) {
      this.recompute();
    }
    return this.visualLines;
  }

  /**
   * Force recomputation, optionally at a new width.
   */
  reflow(width?: number): VisualLine[] {
    if (width !== undefined && width !== this._width) {
      assertLineWidth(width);
      this._width = width;
      this.paragraphCache.clear();
    }
    this.recompute();
    return this.visualLines;
  }

  lineAt(index: number): VisualLine {
    const lines = this.lines();
    if (!Number.isInteger(index) || index < 0 || index >= lines.length) {
      throw outOfRange(`Line ${index} does not exist (${lines.length} lines)`, { index });
    }
    return lines[index];
  }

  /**
   * Index of the line that shows `offset`. An offset on a soft-wrap boundary
   * belongs to the following line.
   */
  lineIndexForOffset(offset: number): number {
    if (!Number.isInteger(offset) || offset < 0 || offset > this.buffer.length) {
      throw outOfRange(`Offset ${offset} is outside the document (length ${this.buffer.length})`, { offset });
    }

    const lines = this.lines();
    let low = 0;
    let high = lines.length - 1;

    // Last line whose start is at or before the offset
    while (low < high) {
      const mid = Math.ceil((low + high) / 2);
      if (lines[mid].start <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }

    return low;
  }

  lineForOffset(offset: number): VisualLine {
    return this.lines()[this.lineIndexForOffset(offset)];
  }

  /**
   * Stop listening to the buffer.
   */
  dispose(): void {
    this.buffer.off('content-changed', this.onContentChanged);
  }

  private recompute(): void {
    const paragraphs = this.layout.splitIntoParagraphs(this.buffer.getText());
    const nextCache: Map<string, ParagraphLine[]> = new Map();
    const lines: VisualLine[] = [];

    for (const paragraph of paragraphs) {
      let wrapped = nextCache.get(paragraph.text) ?? this.paragraphCache.get(paragraph.text);
      if (!wrapped) {
        wrapped = this.layout.wrapParagraph(paragraph.text, this._width);
      }
      nextCache.set(paragraph.text, wrapped);

      const isLast = paragraph.index === paragraphs.length - 1;
      lines.push(...this.layout.placeParagraph(paragraph, wrapped, isLast, lines.length));
    }

    this.paragraphCache = nextCache;
    this.visualLines = lines;
    this.builtVersion = this.buffer.version;
    this.dirty = false;
  }
}
