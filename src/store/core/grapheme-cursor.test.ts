/**
 * Tests for windowed grapheme iteration.
 */

import { describe, it, expect } from 'vitest';
import type { TextSource } from '../../types/store.ts';
import { createTextStore } from './text-store.ts';
import { CURSOR_WINDOW, createGraphemeCursor } from './grapheme-cursor.ts';
import { byteRange } from './position-codec.ts';

type Backend = 'flat' | 'rope';

function sourceFor(kind: Backend, content: string, lengths: number[]): TextSource {
  const store = createTextStore(content, { expectedSize: kind === 'flat' ? 0 : 1_000_000 });
  return {
    lenBytes: () => store.lenBytes(),
    lenLines: () => store.lenLines(),
    lineStart: (line) => store.lineStart(line),
    lineAt: (offset) => store.lineAt(offset),
    slice(start, end) {
      lengths.push(end - start);
      return store.slice(start, end);
    },
    alignOffset: (offset, forward) => store.alignOffset(offset, forward),
  };
}

describe.each<Backend>(['flat', 'rope'])('createGraphemeCursor (%s)', (kind) => {
  it('should segment a bounded window of a long line', () => {
    const lengths: number[] = [];
    const source = sourceFor(kind, 'a'.repeat(10_000), lengths);
    const cursor = createGraphemeCursor(source, byteRange(0, 10_000));

    expect(cursor.next().value?.range).toEqual({ start: 0, end: 1 });
    expect(cursor.next().value?.range).toEqual({ start: 1, end: 2 });
    expect(lengths).toEqual([CURSOR_WINDOW]);
  });

  it('should visit every grapheme across windows', () => {
    const lengths: number[] = [];
    const source = sourceFor(kind, 'a'.repeat(10_000), lengths);
    const graphemes = [...createGraphemeCursor(source, byteRange(0, 10_000))];

    expect(graphemes.length).toBe(10_000);
    expect(graphemes[9_999].range).toEqual({ start: 9_999, end: 10_000 });
    expect(Math.max(...lengths)).toBeLessThanOrEqual(CURSOR_WINDOW);
  });

  it('should keep a cluster whole when it crosses a window edge', () => {
    const lengths: number[] = [];
    const content = 'a'.repeat(1_023) + 'e\u0301b';
    const source = sourceFor(kind, content, lengths);
    const graphemes = [...createGraphemeCursor(source, byteRange(0, 1_027))];

    expect(graphemes.length).toBe(1_025);
    expect(graphemes[1_022]).toEqual({ text: 'a', range: { start: 1_022, end: 1_023 } });
    expect(graphemes[1_023]).toEqual({ text: 'e\u0301', range: { start: 1_023, end: 1_026 } });
    expect(graphemes[1_024]).toEqual({ text: 'b', range: { start: 1_026, end: 1_027 } });
  });

  it('should widen a window that holds a single cluster', () => {
    const lengths: number[] = [];
    const content = 'x' + '\u0301'.repeat(600) + 'y';
    const source = sourceFor(kind, content, lengths);
    const graphemes = [...createGraphemeCursor(source, byteRange(0, 1_202))];

    expect(graphemes.map(g => g.range)).toEqual([
      { start: 0, end: 1_201 },
      { start: 1_201, end: 1_202 },
    ]);
  });
});
