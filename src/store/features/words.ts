/**
 * Word navigation over a text store.
 *
 * A word is a run of graphemes whose first character is not white space;
 * line breaks count as white space. All offsets are grapheme boundaries.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { Grapheme } from '../../types/state.ts';
import type { TextStore } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { utf8Length } from '../core/encoding.ts';
import { segmentGraphemes } from '../core/graphemes.ts';
import { byteRange, graphemeWindow } from '../core/position-codec.ts';

const whiteSpaceRegex = /^\p{White_Space}/u;

export function isWhiteSpace(grapheme: Grapheme): boolean {
  return whiteSpaceRegex.test(grapheme.text);
}

// =============================================================================
// Iteration
// =============================================================================

function graphemesAfter(store: TextStore, offset: ByteOffset): Iterable<Grapheme> {
  return store.graphemes(byteRange(offset, store.lenBytes()));
}

/**
 * Graphemes before `offset`, nearest first. Each line is segmented in
 * bounded windows walking back from the end.
 */
export function* graphemesBefore(store: TextStore, offset: ByteOffset): Generator<Grapheme> {
  let end: number = offset;
  while (end > 0) {
    const line = store.lineAt(byteOffset(end));
    const lineStart = store.lineStart(line);
    if (end === lineStart) {
      const terminator = byteRange(store.lineContent(line - 1).end, end);
      yield Object.freeze({ text: store.slice(terminator.start, terminator.end), range: terminator });
      end = terminator.start;
      continue;
    }

    const window = graphemeWindow(store, byteRange(lineStart, store.lineContent(line).end), end, 0);
    const segments = [...segmentGraphemes(window.text)];
    for (let i = segments.length - 1; i >= 0; i--) {
      const start = end - utf8Length(segments[i]);
      yield Object.freeze({ text: segments[i], range: byteRange(start, end) });
      end = start;
    }
  }
}

// =============================================================================
// Navigation
// =============================================================================

/**
 * Start of the next word. `offset` itself when it is at or inside a word;
 * the document end when only white space follows.
 */
export function nextWordStart(store: TextStore, offset: ByteOffset): ByteOffset {
  for (const grapheme of graphemesAfter(store, offset)) {
    if (!isWhiteSpace(grapheme)) return grapheme.range.start;
  }
  return byteOffset(store.lenBytes());
}

/**
 * End of the next word: skips white space, then the word.
 */
export function nextWordEnd(store: TextStore, offset: ByteOffset): ByteOffset {
  let last = offset;
  let inWord = false;
  for (const grapheme of graphemesAfter(store, offset)) {
    const space = isWhiteSpace(grapheme);
    if (inWord && space) break;
    if (!space) inWord = true;
    last = grapheme.range.end;
  }
  return last;
}

/**
 * Start of the previous word: skips white space back, then the word.
 */
export function prevWordStart(store: TextStore, offset: ByteOffset): ByteOffset {
  let last = offset;
  let inWord = false;
  for (const grapheme of graphemesBefore(store, offset)) {
    const space = isWhiteSpace(grapheme);
    if (inWord && space) break;
    if (!space) inWord = true;
    last = grapheme.range.start;
  }
  return last;
}

/**
 * End of the previous word. `offset` itself when a word ends there.
 */
export function prevWordEnd(store: TextStore, offset: ByteOffset): ByteOffset {
  let last = offset;
  for (const grapheme of graphemesBefore(store, offset)) {
    if (!isWhiteSpace(grapheme)) break;
    last = grapheme.range.start;
  }
  return last;
}

/**
 * Whether `offset` separates white space from a word (either way round).
 * False at the document ends.
 */
export function isWordBoundary(store: TextStore, offset: ByteOffset): boolean {
  const before = graphemesBefore(store, offset).next();
  const after = graphemesAfter(store, offset)[Symbol.iterator]().next();
  if (before.done || after.done) return false;
  return isWhiteSpace(before.value) !== isWhiteSpace(after.value);
}

/**
 * Start of the word around `offset`; `offset` when no word precedes it.
 */
export function wordStart(store: TextStore, offset: ByteOffset): ByteOffset {
  let last = offset;
  for (const grapheme of graphemesBefore(store, offset)) {
    if (isWhiteSpace(grapheme)) break;
    last = grapheme.range.start;
  }
  return last;
}

/**
 * End of the word around `offset`; `offset` when no word follows it.
 */
export function wordEnd(store: TextStore, offset: ByteOffset): ByteOffset {
  let last = offset;
  for (const grapheme of graphemesAfter(store, offset)) {
    if (isWhiteSpace(grapheme)) break;
    last = grapheme.range.end;
  }
  return last;
}
