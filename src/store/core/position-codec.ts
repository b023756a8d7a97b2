/**
 * Position codec: conversions between byte offsets and (line, column)
 * positions over any TextSource. Columns count grapheme clusters.
 *
 * Nothing here clamps. An offset that is out of bounds or inside a grapheme
 * (including between the '\r' and '\n' of a CRLF) raises InvalidBoundary.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { ByteRange, TextPosition, TextRange } from '../../types/state.ts';
import type { TextSource } from '../../types/store.ts';
import { byteOffset, isValidOffset } from '../../types/branded.ts';
import { invalidBoundary, invalidRange } from '../../types/errors.ts';
import { byteToUtf16Index, utf8Length } from './encoding.ts';
import { countGraphemes, findSafeSegmentStart, getSegmenter, isBoundaryAt } from './graphemes.ts';

// =============================================================================
// Ranges
// =============================================================================

/**
 * Sentinel range meaning "whole document".
 */
export const MAX_TEXT_RANGE: TextRange = Object.freeze({
  start: Object.freeze({ line: 0, column: 0 }),
  end: Object.freeze({ line: Number.MAX_SAFE_INTEGER, column: Number.MAX_SAFE_INTEGER }),
});

export function isMaxRange(range: TextRange): boolean {
  return range.end.line === Number.MAX_SAFE_INTEGER && range.end.column === Number.MAX_SAFE_INTEGER;
}

/**
 * Create a frozen ByteRange.
 */
export function byteRange(start: number, end: number): ByteRange {
  return Object.freeze({ start: byteOffset(start), end: byteOffset(end) });
}

/**
 * Order positions by (line, column).
 */
export function comparePositions(a: TextPosition, b: TextPosition): number {
  return a.line !== b.line ? a.line - b.line : a.column - b.column;
}

// =============================================================================
// Lines
// =============================================================================

function checkLine(source: TextSource, line: number): void {
  if (!Number.isInteger(line) || line < 0 || line >= source.lenLines()) {
    throw invalidBoundary(`Line ${line} out of bounds (${source.lenLines()} lines)`, { line });
  }
}

/**
 * Range of a line including its terminator.
 */
export function lineBytes(source: TextSource, line: number): ByteRange {
  checkLine(source, line);
  const start = source.lineStart(line);
  const end = line + 1 < source.lenLines() ? source.lineStart(line + 1) : source.lenBytes();
  return byteRange(start, end);
}

/**
 * Range of a line excluding its terminator ('\n' or '\r\n').
 */
export function lineContentRange(source: TextSource, line: number): ByteRange {
  const { start, end: next } = lineBytes(source, line);
  if (line + 1 >= source.lenLines()) {
    return byteRange(start, next);
  }
  let end = next - 1;
  // '\r' is one byte, so it can only sit at end - 1 if that is a code-point start
  if (
    end > start &&
    source.alignOffset(end - 1, false) === end - 1 &&
    source.slice(byteOffset(end - 1), byteOffset(end)) === '\r'
  ) {
    end--;
  }
  return byteRange(start, end);
}

/**
 * Text of a line excluding its terminator.
 */
export function lineText(source: TextSource, line: number): string {
  const { start, end } = lineContentRange(source, line);
  return source.slice(start, end);
}

/**
 * Grapheme count of a line excluding its terminator.
 */
export function lineGraphemeCount(source: TextSource, line: number): number {
  return countGraphemes(lineText(source, line));
}

// =============================================================================
// Boundaries
// =============================================================================

/** Bytes looked at before an offset when segmenting around it */
const WINDOW_CONTEXT = 256;

export interface GraphemeWindow {
  /** Window text; its first index is a grapheme boundary */
  readonly text: string;
  /** Byte offset of the window start */
  readonly start: ByteOffset;
  /** UTF-16 index of the requested offset within `text` */
  readonly index: number;
}

/**
 * Text around the code-point aligned `offset`, clipped to `bounds` and
 * reaching `after` bytes past it. The window starts at `bounds.start` or at
 * a position that is certainly a grapheme boundary, so segmenting it yields
 * the same clusters as segmenting the whole line.
 */
export function graphemeWindow(source: TextSource, bounds: ByteRange, offset: number, after: number): GraphemeWindow {
  const to = Math.min(bounds.end, source.alignOffset(offset + after, true));
  let context = WINDOW_CONTEXT;
  for (;;) {
    const from = offset - bounds.start <= context
      ? bounds.start
      : Math.max(bounds.start, source.alignOffset(offset - context, false));
    const text = source.slice(byteOffset(from), byteOffset(to));
    const index = byteToUtf16Index(text, offset - from);
    if (index < 0) {
      throw invalidBoundary(`Offset ${offset} splits a code point`, { offset });
    }
    if (from === bounds.start) {
      return Object.freeze({ text, start: byteOffset(from), index });
    }
    const safe = findSafeSegmentStart(text, index);
    if (safe > 0) {
      return Object.freeze({
        text: text.slice(safe),
        start: byteOffset(from + utf8Length(text, 0, safe)),
        index: index - safe,
      });
    }
    context *= 4;
  }
}

/**
 * Whether `offset` is in [0, lenBytes] and on a grapheme boundary.
 */
export function isGraphemeBoundary(source: TextSource, offset: number): boolean {
  const lenBytes = source.lenBytes();
  if (!isValidOffset(offset) || offset > lenBytes) return false;
  if (offset === 0 || offset === lenBytes) return true;

  const line = source.lineAt(byteOffset(offset));
  const { start, end } = lineContentRange(source, line);
  if (offset === start || offset === end) return true;
  // Inside the terminator
  if (offset > end) return false;

  if (source.alignOffset(offset, false) !== offset) return false;

  const window = graphemeWindow(source, byteRange(start, end), offset, 32);
  return isBoundaryAt(window.text, window.index);
}

/**
 * Throw InvalidBoundary unless `offset` is a grapheme boundary.
 */
export function assertBoundary(source: TextSource, offset: number): void {
  if (!isGraphemeBoundary(source, offset)) {
    throw invalidBoundary(`Offset ${offset} is not a grapheme boundary`, {
      offset,
      lenBytes: source.lenBytes(),
    });
  }
}

// =============================================================================
// Conversions
// =============================================================================

/**
 * Byte offset to (line, column). `lenBytes` maps to the position after the
 * last grapheme.
 */
export function byteToPosition(source: TextSource, offset: ByteOffset): TextPosition {
  assertBoundary(source, offset);
  const line = source.lineAt(offset);
  const start = source.lineStart(line);
  const column = offset === start ? 0 : countGraphemes(source.slice(start, offset));
  return Object.freeze({ line, column });
}

/**
 * (line, column) to byte offset. `column` may equal the line's grapheme
 * count (end of line) but not exceed it.
 */
export function positionToByte(source: TextSource, position: TextPosition): ByteOffset {
  const { line, column } = position;
  checkLine(source, line);
  if (!Number.isInteger(column) || column < 0) {
    throw invalidBoundary(`Column ${column} out of bounds`, { line, column });
  }

  const { start } = lineContentRange(source, line);
  if (column === 0) return start;

  const text = lineText(source, line);
  let index = 0;
  let count = 0;
  for (const { segment } of getSegmenter().segment(text)) {
    if (count === column) break;
    index += segment.length;
    count++;
  }
  if (count < column) {
    throw invalidBoundary(`Column ${column} out of bounds (line ${line} has ${count} graphemes)`, {
      line,
      column,
    });
  }
  return byteOffset(start + utf8Length(text, 0, index));
}

/**
 * TextRange to ByteRange. MAX_TEXT_RANGE resolves to the whole document.
 */
export function rangeToBytes(source: TextSource, range: TextRange): ByteRange {
  if (isMaxRange(range)) {
    return byteRange(positionToByte(source, range.start), source.lenBytes());
  }
  if (comparePositions(range.start, range.end) > 0) {
    throw invalidRange(positionToByte(source, range.start), positionToByte(source, range.end));
  }
  return byteRange(positionToByte(source, range.start), positionToByte(source, range.end));
}

/**
 * ByteRange to TextRange.
 */
export function bytesToRange(source: TextSource, range: ByteRange): TextRange {
  if (range.end < range.start) {
    throw invalidRange(range.start, range.end);
  }
  return Object.freeze({
    start: byteToPosition(source, range.start),
    end: byteToPosition(source, range.end),
  });
}
