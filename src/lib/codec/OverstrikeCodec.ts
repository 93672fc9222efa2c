import { DocumentBuffer } from '../text/DocumentBuffer';
import {
  StyledText,
  TextStyle,
  makeStyle,
  BACKSPACE_CHAR,
  PARAGRAPH_SEPARATOR
} from '../text/types';

/**
 * The file form of a document is plain UTF-8 text where attributes are
 * written the way a typewriter would: by backing up and striking again.
 *
 *   bold             c BS c
 *   underline        c BS _
 *   bold+underline   c BS c BS _
 *
 * Reading also accepts the nroff order `_ BS c` for underline. `_ BS _`
 * reads as a bold underscore, so an underscore that is only underlined is
 * written plain.
 */

const UNDERSCORE = '_';

/** The whole code point starting at `index`, one or two UTF-16 units. */
function codePointAt(source: string, index: number): string {
  const code = source.codePointAt(index);
  return code === undefined ? '' : String.fromCodePoint(code);
}

function encodeChar(char: string, style: TextStyle): string {
  if (char === PARAGRAPH_SEPARATOR) {
    return char;
  }
  const underline = style.underline && char !== UNDERSCORE;
  let encoded = char;
  if (style.bold) {
    encoded += BACKSPACE_CHAR + char;
  }
  if (underline) {
    encoded += BACKSPACE_CHAR + UNDERSCORE;
  }
  return encoded;
}

/**
 * Encode styled text into its overstrike string form.
 * Backspace characters in the text are not written.
 */
export function encodeText(value: StyledText): string {
  let encoded = '';
  let i = 0;
  while (i < value.text.length) {
    const char = codePointAt(value.text, i);
    if (char !== BACKSPACE_CHAR) {
      // A surrogate pair takes the style of its first unit
      encoded += encodeChar(char, value.styles[i]);
    }
    i += char.length;
  }
  return encoded;
}

/**
 * Decode the overstrike string form. Line endings are normalised to `\n`.
 */
export function decodeText(input: string): StyledText {
  const source = input.replace(/\r\n/g, '\n');
  const chars: string[] = [];
  const styles: TextStyle[] = [];

  let i = 0;
  while (i < source.length) {
    let base = codePointAt(source, i);
    i += base.length;

    // A backspace with nothing to strike over
    if (base === BACKSPACE_CHAR) {
      continue;
    }

    let bold = false;
    let underline = false;
    let struck = false;

    while (
      base !== PARAGRAPH_SEPARATOR &&
      source[i] === BACKSPACE_CHAR &&
      i + 1 < source.length &&
      source[i + 1] !== PARAGRAPH_SEPARATOR &&
      source[i + 1] !== BACKSPACE_CHAR
    ) {
      const over = codePointAt(source, i + 1);
      if (over === base) {
        bold = true;
      } else if (over === UNDERSCORE) {
        underline = true;
      } else if (base === UNDERSCORE && !struck) {
        // nroff underline: underscore first, then the character
        base = over;
        underline = true;
      }
      struck = true;
      i += 1 + over.length;
    }

    const style = makeStyle(bold, underline);
    chars.push(base);
    for (let unit = 0; unit < base.length; unit++) {
      styles.push(style);
    }
  }

  return { text: chars.join(''), styles };
}

/**
 * Encode a document (or styled text) to UTF-8 bytes.
 */
export function encodeDocument(document: DocumentBuffer | StyledText): Uint8Array {
  const value = document instanceof DocumentBuffer ? document.toStyledText() : document;
  return new TextEncoder().encode(encodeText(value));
}

/**
 * Decode UTF-8 bytes (or an already-decoded string) into styled text.
 */
export function decodeDocument(input: Uint8Array | string): StyledText {
  const text = typeof input === 'string' ? input : new TextDecoder('utf-8').decode(input);
  return decodeText(text);
}
