import { describe, it, expect } from 'vitest';
import type { EditDelta, RenderConfig } from '../../types/state.ts';
import type { TextStore } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { isEmptyOperation } from '../../types/errors.ts';
import { createTextStore } from '../core/text-store.ts';
import { byteRange } from '../core/position-codec.ts';
import { DEFAULT_RENDER_CONFIG } from './glyph-shaper.ts';
import { createLineMetricsCache, renderKey } from './line-metrics.ts';

const NONE: RenderConfig = DEFAULT_RENDER_CONFIG;

function insert(store: TextStore, offset: number, text: string): EditDelta {
  const result = store.insert(byteOffset(offset), text);
  if (isEmptyOperation(result)) throw new Error('expected an edit');
  return result;
}

function remove(store: TextStore, start: number, end: number): EditDelta {
  const result = store.delete(byteRange(start, end));
  if (isEmptyOperation(result)) throw new Error('expected an edit');
  return result.delta;
}

describe('createLineMetricsCache', () => {
  it('should compute a line once per render key', () => {
    const store = createTextStore('hi\tworld');
    const cache = createLineMetricsCache();
    expect(cache.lineWidth(store, 0, NONE)).toBe(13);
    expect(cache.lineWidth(store, 0, NONE)).toBe(13);
    expect(cache.stats()).toEqual({ computations: 1, hits: 1, entries: 1 });

    expect(cache.lineWidth(store, 0, { ...NONE, tabWidth: 4 })).toBe(9);
    expect(cache.stats().computations).toBe(2);
  });

  it('should not recompute for a placeholder-only change', () => {
    const store = createTextStore('abc');
    const cache = createLineMetricsCache();
    cache.wrapSegments(store, 0, NONE);
    cache.wrapSegments(store, 0, { ...NONE, showWrap: true });
    expect(cache.stats().computations).toBe(1);
    expect(renderKey(NONE)).toBe(renderKey({ ...NONE, showWrap: true }));
  });

  it('should report the widest row of a wrapped line', () => {
    const store = createTextStore('abcdefghij');
    const cache = createLineMetricsCache();
    const hard: RenderConfig = { ...NONE, wrapMode: 'hard', viewportWidth: 4 };
    expect(cache.wrapSegments(store, 0, hard)).toHaveLength(3);
    expect(cache.lineWidth(store, 0, hard)).toBe(4);
  });

  it('should invalidate only the edited line when no line breaks change', () => {
    const store = createTextStore('one\ntwo\nthree');
    const cache = createLineMetricsCache();
    for (let line = 0; line < 3; line++) cache.lineWidth(store, line, NONE);

    cache.applyEdit(insert(store, 5, 'xx'));
    expect(cache.stats().entries).toBe(2);
    expect(cache.lineWidth(store, 1, NONE)).toBe(5);
    expect(cache.stats().computations).toBe(4);
  });

  it('should invalidate from the edited line on when line breaks change', () => {
    const store = createTextStore('one\ntwo\nthree\nfour');
    const cache = createLineMetricsCache();
    for (let line = 0; line < 4; line++) cache.lineWidth(store, line, NONE);

    cache.applyEdit(insert(store, 5, '\n'));
    expect(cache.stats().entries).toBe(1);
    expect(cache.lineWidth(store, 2, NONE)).toBe(2);
  });

  it('should drop an explicit line range', () => {
    const store = createTextStore('a\nb\nc\nd');
    const cache = createLineMetricsCache();
    for (let line = 0; line < 4; line++) cache.lineWidth(store, line, NONE);
    cache.invalidate({ start: 1, end: 3 });
    expect(cache.stats().entries).toBe(2);
    cache.invalidate({ start: 2, end: 2 });
    expect(cache.stats().entries).toBe(2);
  });

  it('should keep the line count until line breaks change', () => {
    const store = createTextStore('a\nb\nc');
    const cache = createLineMetricsCache();
    expect(cache.lineCount(store)).toBe(3);
    cache.applyEdit(insert(store, 0, 'zz'));
    expect(cache.lineCount(store)).toBe(3);
    cache.applyEdit(remove(store, 3, 4));
    expect(cache.lineCount(store)).toBe(2);
  });

  it('should find scroll positions through cached anchors', () => {
    const store = createTextStore('x'.repeat(600));
    const cache = createLineMetricsCache();
    expect(cache.scrollAnchors(store, 0, NONE).map(anchor => anchor.column)).toEqual([0, 256, 512]);
    expect(cache.scrollAnchor(store, 0, 260, NONE)).toEqual({ byte: 260, column: 260, x: 260 });
    expect(cache.scrollAnchor(store, 0, 1000, NONE)).toEqual({ byte: 600, column: 600, x: 600 });
    expect(cache.stats().computations).toBe(1);
  });

  it('should forget everything on clear', () => {
    const store = createTextStore('abc');
    const cache = createLineMetricsCache();
    cache.lineWidth(store, 0, NONE);
    cache.clear();
    expect(cache.stats().entries).toBe(0);
    cache.lineWidth(store, 0, NONE);
    expect(cache.stats().computations).toBe(2);
  });

  it('should touch only the edited line of a million-line document', () => {
    const store = createTextStore('ab\n'.repeat(999_999) + 'ab');
    expect(store.lenLines()).toBe(1_000_000);
    const cache = createLineMetricsCache();
    expect(cache.lineWidth(store, 0, NONE)).toBe(2);
    expect(cache.lineWidth(store, 500_000, NONE)).toBe(2);

    const start = store.lineStart(500_000);
    cache.applyEdit(remove(store, start, start + 1));
    expect(cache.stats()).toEqual({ computations: 2, hits: 0, entries: 1 });

    expect(cache.lineWidth(store, 0, NONE)).toBe(2);
    expect(cache.stats()).toEqual({ computations: 2, hits: 1, entries: 1 });
    expect(cache.lineWidth(store, 500_000, NONE)).toBe(1);
    expect(cache.stats().computations).toBe(3);
  });
});
