/**
 * Tests for byte offset <-> (line, column) conversion.
 */

import { describe, it, expect } from 'vitest';
import type { TextSource, TextStore } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { TextError } from '../../types/errors.ts';
import { createTextStore } from './text-store.ts';
import {
  MAX_TEXT_RANGE,
  bytesToRange,
  byteRange,
  byteToPosition,
  comparePositions,
  graphemeWindow,
  isGraphemeBoundary,
  lineGraphemeCount,
  positionToByte,
  rangeToBytes,
} from './position-codec.ts';

type Backend = 'flat' | 'rope';

function storeFor(kind: Backend, content: string): TextStore {
  return createTextStore(content, { expectedSize: kind === 'flat' ? 0 : 1_000_000 });
}

/**
 * Source that records the byte length of every slice taken from it.
 */
function recordingSource(source: TextSource, lengths: number[]): TextSource {
  return {
    lenBytes: () => source.lenBytes(),
    lenLines: () => source.lenLines(),
    lineStart: (line) => source.lineStart(line),
    lineAt: (offset) => source.lineAt(offset),
    slice(start, end) {
      lengths.push(end - start);
      return source.slice(start, end);
    },
    alignOffset: (offset, forward) => source.alignOffset(offset, forward),
  };
}

function boundaries(store: TextStore): number[] {
  const result: number[] = [];
  for (let offset = 0; offset <= store.lenBytes(); offset++) {
    if (isGraphemeBoundary(store, offset)) result.push(offset);
  }
  return result;
}

describe.each<Backend>(['flat', 'rope'])('position codec (%s)', (kind) => {
  describe('composed and combining graphemes', () => {
    // Line 0 has a precomposed e-acute; line 1 has an o followed by U+0308
    const content = 'h\u00e9llo\nwo\u0308rld';

    it('should keep line count and columns consistent after an insert at end of line', () => {
      const store = storeFor(kind, content);
      store.insert(byteOffset(6), '!');

      expect(store.lenLines()).toBe(2);
      expect(lineGraphemeCount(store, 0)).toBe(6);
      expect(lineGraphemeCount(store, 1)).toBe(5);
      expect(store.lineText(0)).toBe('h\u00E9llo!');
    });

    it('should enumerate exactly the grapheme boundaries', () => {
      const store = storeFor(kind, content);
      store.insert(byteOffset(6), '!');
      expect(boundaries(store)).toEqual([0, 1, 3, 4, 5, 6, 7, 8, 9, 12, 13, 14, 15]);
    });

    it('should map offsets to positions', () => {
      const store = storeFor(kind, content);
      store.insert(byteOffset(6), '!');
      const positions = boundaries(store).map(offset => {
        const { line, column } = byteToPosition(store, byteOffset(offset));
        return [line, column];
      });
      expect(positions).toEqual([
        [0, 0], [0, 1], [0, 2], [0, 3], [0, 4], [0, 5], [0, 6],
        [1, 0], [1, 1], [1, 2], [1, 3], [1, 4], [1, 5],
      ]);
    });

    it('should round-trip every boundary offset', () => {
      const store = storeFor(kind, content);
      store.insert(byteOffset(6), '!');
      for (const offset of boundaries(store)) {
        expect(positionToByte(store, byteToPosition(store, byteOffset(offset)))).toBe(offset);
      }
    });

    it('should round-trip every valid position', () => {
      const store = storeFor(kind, content);
      for (let line = 0; line < store.lenLines(); line++) {
        for (let column = 0; column <= lineGraphemeCount(store, line); column++) {
          const position = { line, column };
          expect(byteToPosition(store, positionToByte(store, position))).toEqual(position);
        }
      }
    });

    it('should reject offsets inside a grapheme', () => {
      const store = storeFor(kind, content);
      expect(() => byteToPosition(store, byteOffset(2))).toThrow(TextError);
      expect(() => byteToPosition(store, byteOffset(9))).toThrow(TextError);
    });
  });

  describe('end of document', () => {
    it('should map lenBytes to the position after the last grapheme', () => {
      const store = storeFor(kind, 'ab\ncd');
      expect(byteToPosition(store, byteOffset(5))).toEqual({ line: 1, column: 2 });
      expect(positionToByte(store, { line: 1, column: 2 })).toBe(5);
    });

    it('should map lenBytes after a trailing newline to an empty last line', () => {
      const store = storeFor(kind, 'abc\n');
      expect(byteToPosition(store, byteOffset(4))).toEqual({ line: 1, column: 0 });
      expect(positionToByte(store, { line: 1, column: 0 })).toBe(4);
    });

    it('should reject offsets and positions beyond the end without clamping', () => {
      const store = storeFor(kind, 'abc\n');
      expect(() => byteToPosition(store, byteOffset(5))).toThrow(TextError);
      expect(() => positionToByte(store, { line: 1, column: 1 })).toThrow(TextError);
      expect(() => positionToByte(store, { line: 2, column: 0 })).toThrow(TextError);
      expect(() => positionToByte(store, { line: 0, column: 4 })).toThrow(TextError);
    });

    it('should handle the empty document', () => {
      const store = storeFor(kind, '');
      expect(byteToPosition(store, byteOffset(0))).toEqual({ line: 0, column: 0 });
      expect(positionToByte(store, { line: 0, column: 0 })).toBe(0);
    });
  });

  describe('line terminators', () => {
    it('should exclude CRLF from columns', () => {
      const store = storeFor(kind, 'ab\r\ncd');
      expect(lineGraphemeCount(store, 0)).toBe(2);
      expect(byteToPosition(store, byteOffset(2))).toEqual({ line: 0, column: 2 });
      expect(byteToPosition(store, byteOffset(4))).toEqual({ line: 1, column: 0 });
      expect(() => byteToPosition(store, byteOffset(3))).toThrow(TextError);
      expect(positionToByte(store, { line: 0, column: 2 })).toBe(2);
      expect(() => positionToByte(store, { line: 0, column: 3 })).toThrow(TextError);
    });

    it('should count a lone carriage return as a column', () => {
      const store = storeFor(kind, 'a\rb');
      expect(lineGraphemeCount(store, 0)).toBe(3);
      expect(byteToPosition(store, byteOffset(2))).toEqual({ line: 0, column: 2 });
    });
  });

  describe('non-ASCII before a terminator', () => {
    it('should end the content before LF after a two-byte character', () => {
      const store = storeFor(kind, 'caf\u00e9\nx');
      expect(store.lineContent(0)).toEqual({ start: 0, end: 5 });
      expect(store.lineText(0)).toBe('caf\u00e9');
      expect(lineGraphemeCount(store, 0)).toBe(4);
      expect(byteToPosition(store, byteOffset(5))).toEqual({ line: 0, column: 4 });
      expect(byteToPosition(store, byteOffset(6))).toEqual({ line: 1, column: 0 });
      expect(positionToByte(store, { line: 0, column: 4 })).toBe(5);
    });

    it('should end the content before CRLF after a three-byte character', () => {
      const store = storeFor(kind, '\u4e2d\r\ny');
      expect(store.lineContent(0)).toEqual({ start: 0, end: 3 });
      expect(byteToPosition(store, byteOffset(3))).toEqual({ line: 0, column: 1 });
      expect(() => byteToPosition(store, byteOffset(4))).toThrow(TextError);
      expect(positionToByte(store, { line: 1, column: 0 })).toBe(5);
      expect(store.lineText(1)).toBe('y');
    });

    it('should end the content before LF after an emoji', () => {
      const store = storeFor(kind, '\u{1F600}\n\u{1F600}\r\n');
      expect(store.lineContent(0)).toEqual({ start: 0, end: 4 });
      expect(store.lineContent(1)).toEqual({ start: 5, end: 9 });
      expect(boundaries(store)).toEqual([0, 4, 5, 9, 11]);
    });
  });

  describe('windowed segmentation', () => {
    it('should look at a bounded window on a long ASCII line', () => {
      const lengths: number[] = [];
      const source = recordingSource(storeFor(kind, 'a'.repeat(100_000)), lengths);
      expect(isGraphemeBoundary(source, 50_000)).toBe(true);
      expect(lengths).toEqual([288]);
    });

    it('should look at a bounded window on a long CJK line', () => {
      const lengths: number[] = [];
      const source = recordingSource(storeFor(kind, '\u4e2d'.repeat(40_000)), lengths);
      expect(isGraphemeBoundary(source, 60_000)).toBe(true);
      expect(isGraphemeBoundary(source, 60_001)).toBe(false);
      expect(lengths).toEqual([291]);
    });

    it('should widen the window until it starts on a certain boundary', () => {
      // Combining marks never give a certain boundary, so the window reaches the line start
      const store = storeFor(kind, 'x' + '\u0301'.repeat(500));
      const window = graphemeWindow(store, store.lineContent(0), 801, 0);
      expect(window.start).toBe(0);
      expect(window.index).toBe(401);
      expect(isGraphemeBoundary(store, 801)).toBe(false);
      expect(isGraphemeBoundary(store, 1001)).toBe(true);
    });
  });

  describe('emoji clusters', () => {
    it('should count an emoji with a modifier as one column', () => {
      const store = storeFor(kind, 'a\u{1F44D}\u{1F3FD}b');
      expect(lineGraphemeCount(store, 0)).toBe(3);
      expect(positionToByte(store, { line: 0, column: 2 })).toBe(9);
      expect(() => byteToPosition(store, byteOffset(5))).toThrow(TextError);
    });
  });

  describe('ranges', () => {
    it('should convert ranges both ways', () => {
      const store = storeFor(kind, 'one\ntwo');
      const range = { start: { line: 0, column: 1 }, end: { line: 1, column: 2 } };
      expect(rangeToBytes(store, range)).toEqual({ start: 1, end: 6 });
      expect(bytesToRange(store, byteRange(1, 6))).toEqual(range);
    });

    it('should resolve the maximum range to the whole document', () => {
      const store = storeFor(kind, 'one\ntwo');
      expect(rangeToBytes(store, MAX_TEXT_RANGE)).toEqual({ start: 0, end: 7 });
    });

    it('should reject reversed ranges', () => {
      const store = storeFor(kind, 'one\ntwo');
      const reversed = { start: { line: 1, column: 0 }, end: { line: 0, column: 1 } };
      try {
        rangeToBytes(store, reversed);
        expect.unreachable();
      } catch (error) {
        expect(error instanceof TextError && error.kind).toBe('InvalidRange');
      }
      expect(() => bytesToRange(store, byteRange(3, 1))).toThrow(TextError);
    });
  });
});

describe('comparePositions', () => {
  it('should order by line then column', () => {
    expect(comparePositions({ line: 0, column: 5 }, { line: 1, column: 0 })).toBeLessThan(0);
    expect(comparePositions({ line: 1, column: 2 }, { line: 1, column: 2 })).toBe(0);
    expect(comparePositions({ line: 1, column: 3 }, { line: 1, column: 2 })).toBeGreaterThan(0);
  });
});
