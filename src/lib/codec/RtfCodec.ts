/**
 * RtfCodec converts styled text to and from RTF for clipboard interchange
 * with other applications. Only bold, underline and paragraph breaks
 * survive the trip.
 */

import {
  StyledText,
  TextStyle,
  PLAIN,
  makeStyle,
  styled,
  toRuns,
  PARAGRAPH_SEPARATOR
} from '../text/types';

/** Largest RTF string read, in UTF-16 units (10 MiB) */
export const MAX_RTF_SIZE = 10 * 1024 * 1024;

const RTF_HEADER = '{\\rtf';

const RTF_PREAMBLE =
  '{\\rtf1\\ansi\\ansicpg1252\\deff0\n' +
  '{\\fonttbl\\f0\\fmodern\\fcharset0 Courier;}\n' +
  '\\pard\\f0\\fs24 ';

/** Destination groups that carry no document text */
const SKIPPED_DESTINATIONS = new Set(['fonttbl', 'colortbl', 'stylesheet', 'info', 'pict', 'header', 'footer']);

const CONTROL_WORD = /\\([a-zA-Z]+)(-?\d+)? ?/y;
const HEX_BYTE = /^[0-9a-fA-F]{2}$/;

export interface RtfReadOptions {
  /** Input longer than this is ignored. Defaults to MAX_RTF_SIZE. */
  maxSize?: number;
}

export function isRtf(input: string): boolean {
  return input.startsWith(RTF_HEADER);
}

function escapeRtf(text: string): string {
  let escaped = '';
  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    const code = text.charCodeAt(i);
    if (char === '\\' || char === '{' || char === '}') {
      escaped += '\\' + char;
    } else if (code > 127) {
      // \uN takes a signed 16-bit value; pairs are written unit by unit
      escaped += `\\u${code > 0x7fff ? code - 0x10000 : code}?`;
    } else {
      escaped += char;
    }
  }
  return escaped;
}

function openGroup(style: TextStyle): string {
  if (style.bold && style.underline) return '{\\b\\ul ';
  if (style.bold) return '{\\b ';
  return '{\\ul ';
}

/**
 * Write styled text as an RTF document. Each styled run becomes a group.
 */
export function styledToRtf(value: StyledText): string {
  let rtf = RTF_PREAMBLE;
  let start = 0;

  for (const paragraph of value.text.split(PARAGRAPH_SEPARATOR)) {
    if (start > 0) {
      rtf += '\\par\n';
    }
    const slice: StyledText = {
      text: paragraph,
      styles: value.styles.slice(start, start + paragraph.length)
    };
    for (const run of toRuns(slice)) {
      const text = escapeRtf(run.text);
      rtf += run.style.bold || run.style.underline ? openGroup(run.style) + text + '}' : text;
    }
    start += paragraph.length + 1;
  }

  return rtf + '}';
}

/**
 * Read styled text from RTF. Input that is not RTF is taken as plain text;
 * RTF over the size limit reads as empty.
 */
export function rtfToStyled(rtf: string, options: RtfReadOptions = {}): StyledText {
  if (!isRtf(rtf)) {
    return styled(rtf.replace(/\r\n/g, PARAGRAPH_SEPARATOR));
  }
  const maxSize = options.maxSize ?? MAX_RTF_SIZE;
  if (rtf.length > maxSize) {
    console.warn(`[RtfCodec] Ignoring RTF of ${rtf.length} characters, over the ${maxSize} character limit`);
    return styled('');
  }
  return new RtfReader(rtf).read();
}

interface GroupState {
  bold: boolean;
  underline: boolean;
  /** Inside a destination whose text is dropped */
  skip: boolean;
  /** Fallback characters that follow each \uN */
  uc: number;
}

class RtfReader {
  private readonly source: string;
  private pos = 0;
  private state: GroupState = { bold: false, underline: false, skip: false, uc: 1 };
  private readonly groups: GroupState[] = [];
  private readonly chars: string[] = [];
  private readonly styles: TextStyle[] = [];
  private fallback = 0;
  private groupStart = false;

  constructor(source: string) {
    this.source = source;
  }

  read(): StyledText {
    const { source } = this;

    while (this.pos < source.length) {
      const char = source[this.pos];

      if (char === '{') {
        this.groups.push({ ...this.state });
        this.groupStart = true;
        this.pos++;
        continue;
      }

      if (char === '}') {
        const outer = this.groups.pop();
        this.pos++;
        if (!outer || this.groups.length === 0) {
          // End of the document group
          break;
        }
        this.state = outer;
        this.fallback = 0;
        continue;
      }

      const atGroupStart = this.groupStart;
      this.groupStart = false;

      if (char === '\\') {
        this.readControl(atGroupStart);
        continue;
      }

      this.pos++;
      // Line breaks in RTF source are not content
      if (char !== '\r' && char !== '\n') {
        this.emit(char);
      }
    }

    return { text: this.chars.join(''), styles: this.styles };
  }

  private readControl(atGroupStart: boolean): void {
    const { source } = this;
    const next = source[this.pos + 1];

    if (next === undefined) {
      this.pos++;
      return;
    }

    if (!/[a-zA-Z]/.test(next)) {
      this.pos += 2;
      switch (next) {
        case '\\':
        case '{':
        case '}':
          this.emit(next);
          break;
        case "'":
          this.readHexEscape();
          break;
        case '~':
          this.emit('\u00a0');
          break;
        case '*':
          if (atGroupStart) this.state.skip = true;
          break;
        default:
          // \- \_ and escaped line breaks
          break;
      }
      return;
    }

    CONTROL_WORD.lastIndex = this.pos;
    const match = CONTROL_WORD.exec(source);
    if (!match) {
      this.pos++;
      return;
    }
    this.pos = CONTROL_WORD.lastIndex;

    const word = match[1];
    const param = match[2] === undefined ? undefined : Number(match[2]);

    if (atGroupStart && SKIPPED_DESTINATIONS.has(word)) {
      this.state.skip = true;
      return;
    }

    switch (word) {
      case 'b':
        this.state.bold = param !== 0;
        break;
      case 'ul':
        this.state.underline = param !== 0;
        break;
      case 'ulnone':
        this.state.underline = false;
        break;
      case 'plain':
        this.state.bold = false;
        this.state.underline = false;
        break;
      case 'par':
      case 'line':
        this.emitBreak();
        break;
      case 'uc':
        if (param !== undefined && param >= 0) this.state.uc = param;
        break;
      case 'u':
        if (param !== undefined) this.emitUnicode(param);
        break;
      default:
        break;
    }
  }

  /**
   * `\'hh` is a byte in the document code page, read as Latin-1.
   * An invalid escape keeps its characters as text.
   */
  private readHexEscape(): void {
    const hex = this.source.slice(this.pos, this.pos + 2);
    this.pos += hex.length;
    if (HEX_BYTE.test(hex)) {
      this.emit(String.fromCharCode(parseInt(hex, 16)));
      return;
    }
    for (const char of hex) {
      this.emit(char);
    }
  }

  private emitUnicode(value: number): void {
    if (this.state.skip) return;
    const code = value < 0 ? value + 0x10000 : value;
    if (code <= 0xffff) {
      this.push(String.fromCharCode(code), this.currentStyle());
    } else if (code <= 0x10ffff) {
      this.push(String.fromCodePoint(code), this.currentStyle());
    }
    this.fallback = this.state.uc;
  }

  private emitBreak(): void {
    if (this.state.skip) return;
    this.fallback = 0;
    this.push(PARAGRAPH_SEPARATOR, PLAIN);
  }

  private emit(text: string): void {
    if (this.state.skip) return;
    if (this.fallback > 0) {
      this.fallback--;
      return;
    }
    this.push(text, this.currentStyle());
  }

  private push(text: string, style: TextStyle): void {
    this.chars.push(text);
    for (let i = 0; i < text.length; i++) {
      this.styles.push(style);
    }
  }

  private currentStyle(): TextStyle {
    return makeStyle(this.state.bold, this.state.underline);
  }
}
