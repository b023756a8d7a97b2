/**
 * Lazy grapheme iteration over a TextSource.
 *
 * The cursor segments a bounded window starting from its current offset,
 * never past the end of the current line, so skipping ahead never segments
 * the text in between.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { ByteRange, Grapheme } from '../../types/state.ts';
import type { GraphemeCursor, GraphemeSequence, TextSource } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { utf8Length } from './encoding.ts';
import { segmentGraphemes } from './graphemes.ts';
import { byteRange } from './position-codec.ts';

/** Bytes segmented per window */
export const CURSOR_WINDOW = 1024;

/**
 * Create a cursor over `range`. `range.start` and every skip target must be
 * grapheme boundaries.
 */
export function createGraphemeCursor(source: TextSource, range: ByteRange): GraphemeCursor {
  let position: number = range.start;
  let segments: string[] | null = null;
  let nextSegment = 0;

  // A window cut short of the line end drops its last cluster, which may
  // continue past the cut; the next window starts at that cluster.
  function openWindow(): boolean {
    if (position >= range.end) return false;
    const line = source.lineAt(byteOffset(position));
    const nextLineStart = line + 1 < source.lenLines()
      ? source.lineStart(line + 1)
      : source.lenBytes();
    const limit = Math.min(range.end, nextLineStart);
    for (let size = CURSOR_WINDOW; ; size *= 4) {
      const end = Math.min(limit, source.alignOffset(position + size, true));
      const window = [...segmentGraphemes(source.slice(byteOffset(position), byteOffset(end)))];
      if (end === limit) {
        segments = window;
        break;
      }
      if (window.length > 1) {
        window.pop();
        segments = window;
        break;
      }
    }
    nextSegment = 0;
    return true;
  }

  const cursor: GraphemeCursor = {
    get offset(): ByteOffset {
      return byteOffset(position);
    },

    next(): IteratorResult<Grapheme> {
      for (;;) {
        if (segments === null && !openWindow()) {
          return { done: true, value: undefined };
        }
        const text = segments?.[nextSegment];
        if (text === undefined) {
          segments = null;
          continue;
        }
        nextSegment++;
        const start = position;
        position += utf8Length(text);
        return { done: false, value: Object.freeze({ text, range: byteRange(start, position) }) };
      }
    },

    skipTo(offset: ByteOffset): void {
      position = Math.max(range.start, Math.min(range.end, offset));
      segments = null;
    },

    skipLine(): void {
      if (position >= range.end) return;
      const line = source.lineAt(byteOffset(position));
      const next = line + 1 < source.lenLines() ? source.lineStart(line + 1) : source.lenBytes();
      cursor.skipTo(byteOffset(next));
    },

    [Symbol.iterator](): GraphemeCursor {
      return cursor;
    },
  };

  return cursor;
}

/**
 * Restartable sequence: every iteration gets a fresh cursor.
 */
export function createGraphemeSequence(source: TextSource, range: ByteRange): GraphemeSequence {
  return Object.freeze({
    range,
    cursor: () => createGraphemeCursor(source, range),
    [Symbol.iterator]: () => createGraphemeCursor(source, range),
  });
}
