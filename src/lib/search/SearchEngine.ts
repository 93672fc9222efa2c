export type SearchDirection = 'forward' | 'backward';

export type SearchResult =
  | { kind: 'match'; offset: number; length: number; wrapped: boolean }
  | { kind: 'no-match' };

const NO_MATCH: SearchResult = { kind: 'no-match' };

/**
 * Lower-case one UTF-16 unit at a time so folded offsets line up with the
 * original text. Characters whose lower case is longer stay as they are.
 */
export function foldCase(text: string): string {
  let folded = '';
  for (let i = 0; i < text.length; i++) {
    const char = text.charAt(i);
    const lower = char.toLowerCase();
    folded += lower.length === 1 ? lower : char;
  }
  return folded;
}

/**
 * Case-insensitive literal search from `fromOffset`, wrapping around the
 * document once.
 */
export function search(
  text: string,
  query: string | null | undefined,
  fromOffset: number,
  direction: SearchDirection = 'forward'
): SearchResult {
  if (!query) {
    return NO_MATCH;
  }

  const haystack = foldCase(text);
  const needle = foldCase(query);
  const from = Math.max(0, Math.min(Math.trunc(fromOffset), text.length));

  if (direction === 'forward') {
    const offset = haystack.indexOf(needle, from);
    if (offset !== -1) {
      return { kind: 'match', offset, length: query.length, wrapped: false };
    }
    const wrappedOffset = haystack.indexOf(needle);
    if (wrappedOffset !== -1 && wrappedOffset < from) {
      return { kind: 'match', offset: wrappedOffset, length: query.length, wrapped: true };
    }
    return NO_MATCH;
  }

  // Backward: last match starting before `from`
  if (from > 0) {
    const offset = haystack.lastIndexOf(needle, from - 1);
    if (offset !== -1) {
      return { kind: 'match', offset, length: query.length, wrapped: false };
    }
  }
  const wrappedOffset = haystack.lastIndexOf(needle);
  if (wrappedOffset !== -1 && wrappedOffset >= from) {
    return { kind: 'match', offset: wrappedOffset, length: query.length, wrapped: true };
  }
  return NO_MATCH;
}

/**
 * Offsets of every non-overlapping match, in document order.
 */
export function findAll(text: string, query: string | null | undefined): number[] {
  if (!query) {
    return [];
  }

  const haystack = foldCase(text);
  const needle = foldCase(query);
  const offsets: number[] = [];

  let offset = haystack.indexOf(needle);
  while (offset !== -1) {
    offsets.push(offset);
    offset = haystack.indexOf(needle, offset + needle.length);
  }

  return offsets;
}
