/**
 * Tests for grapheme remapping, line wrapping and glyph runs.
 */

import { describe, it, expect } from 'vitest';
import type { RenderConfig, WrapMode } from '../../types/state.ts';
import type { TextStore } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { TextError } from '../../types/errors.ts';
import { createTextStore } from '../core/text-store.ts';
import {
  DEFAULT_RENDER_CONFIG,
  computeScrollAnchors,
  computeWrapSegments,
  findScreenColumn,
  glyphsForLine,
  lineDisplayWidth,
  positionToScreen,
  remapGrapheme,
  screenToPosition,
} from './glyph-shaper.ts';

// =============================================================================
// Helpers
// =============================================================================

function config(wrapMode: WrapMode, viewportWidth: number = 80, extra: Partial<RenderConfig> = {}): RenderConfig {
  return { ...DEFAULT_RENDER_CONFIG, wrapMode, viewportWidth, ...extra };
}

function rows(store: TextStore, line: number, render: RenderConfig): string[] {
  return computeWrapSegments(store, line, render).map(segment => store.slice(segment.range.start, segment.range.end));
}

const SOFT_HYPHEN_LINE = 'a-soft\u00ADhyphen-test';

// =============================================================================
// Remapping
// =============================================================================

describe('remapGrapheme', () => {
  const hidden = { tabWidth: 4, showControl: false };
  const shown = { tabWidth: 4, showControl: true };

  it('should expand a tab to the next stop', () => {
    expect(remapGrapheme('\t', 0, hidden)).toEqual({ text: ' ', width: 4 });
    expect(remapGrapheme('\t', 3, hidden)).toEqual({ text: ' ', width: 1 });
    expect(remapGrapheme('\t', 5, shown)).toEqual({ text: '\u2409', width: 3 });
  });

  it('should show control characters as pictures or replacement characters', () => {
    expect(remapGrapheme('\u0001', 0, shown)).toEqual({ text: '\u2401', width: 1 });
    expect(remapGrapheme('\u007f', 0, shown)).toEqual({ text: '\u2421', width: 1 });
    expect(remapGrapheme('\r', 0, shown)).toEqual({ text: '\u240D', width: 1 });
    expect(remapGrapheme('\u0001', 0, hidden)).toEqual({ text: '\uFFFD', width: 1 });
    expect(remapGrapheme('\u0085', 0, shown)).toEqual({ text: '\uFFFD', width: 1 });
  });

  it('should hide line breaks unless asked to show them', () => {
    expect(remapGrapheme('\n', 0, hidden)).toEqual({ text: '', width: 0 });
    expect(remapGrapheme('\r\n', 0, shown)).toEqual({ text: '\u240A', width: 1 });
  });

  it('should give break hints no width', () => {
    expect(remapGrapheme('\u00AD', 0, hidden)).toEqual({ text: '', width: 0 });
    expect(remapGrapheme('\u200B', 0, hidden)).toEqual({ text: '', width: 0 });
  });

  it('should keep printable graphemes', () => {
    expect(remapGrapheme('\u4E2D', 0, hidden)).toEqual({ text: '\u4E2D', width: 2 });
    expect(remapGrapheme('x', 0, hidden)).toEqual({ text: 'x', width: 1 });
  });
});

// =============================================================================
// Wrap Segments
// =============================================================================

describe('computeWrapSegments', () => {
  it('should keep an unwrapped line in one row', () => {
    const store = createTextStore('hello world\nnext');
    const segments = computeWrapSegments(store, 0, config('none', 4));
    expect(segments).toEqual([{ range: { start: 0, end: 11 }, width: 11, column: 0, hyphenated: false }]);
  });

  it('should give an empty line one empty row', () => {
    const store = createTextStore('a\n\nb');
    expect(computeWrapSegments(store, 1, config('word', 4))).toEqual([
      { range: { start: 2, end: 2 }, width: 0, column: 0, hyphenated: false },
    ]);
  });

  it('should break at the soft hyphen', () => {
    const store = createTextStore(SOFT_HYPHEN_LINE);
    const segments = computeWrapSegments(store, 0, config('word', 8));
    expect(rows(store, 0, config('word', 8))).toEqual(['a-soft\u00AD', 'hyphen-', 'test']);
    expect(segments.map(segment => segment.width)).toEqual([7, 7, 4]);
    expect(segments.map(segment => segment.hyphenated)).toEqual([true, false, false]);
    expect(segments.map(segment => segment.column)).toEqual([0, 7, 14]);
  });

  it('should break hard at the viewport width', () => {
    const store = createTextStore('abcdefghij');
    const segments = computeWrapSegments(store, 0, config('hard', 4));
    expect(rows(store, 0, config('hard', 4))).toEqual(['abcd', 'efgh', 'ij']);
    expect(segments.map(segment => segment.width)).toEqual([4, 4, 2]);
  });

  it('should break after the last space that fits', () => {
    const store = createTextStore('hello world foo');
    expect(rows(store, 0, config('word', 8))).toEqual(['hello ', 'world ', 'foo']);
  });

  it('should hang a space that overflows', () => {
    const store = createTextStore('abcde fg');
    const segments = computeWrapSegments(store, 0, config('word', 5));
    expect(rows(store, 0, config('word', 5))).toEqual(['abcde ', 'fg']);
    expect(segments[0].width).toBe(5);
  });

  it('should fall back to a hard break for a long word', () => {
    const store = createTextStore('abcdefghij kl');
    expect(rows(store, 0, config('word', 4))).toEqual(['abcd', 'efgh', 'ij ', 'kl']);
  });

  it('should move a wide glyph that does not fit to the next row', () => {
    const store = createTextStore('a\u4E2Db');
    const segments = computeWrapSegments(store, 0, config('hard', 2));
    expect(rows(store, 0, config('hard', 2))).toEqual(['a', '\u4E2D', 'b']);
    expect(segments.map(segment => segment.width)).toEqual([1, 2, 1]);
  });

  it('should give a glyph wider than the viewport its own row', () => {
    const store = createTextStore('\u4E2Da');
    const segments = computeWrapSegments(store, 0, config('hard', 1));
    expect(rows(store, 0, config('hard', 1))).toEqual(['\u4E2D', 'a']);
    expect(segments[0].width).toBe(2);
  });

  it('should stop a tab at the row end', () => {
    const store = createTextStore('a\tb');
    const render = config('hard', 3, { tabWidth: 4 });
    expect(rows(store, 0, render)).toEqual(['a\t', 'b']);
    expect(computeWrapSegments(store, 0, render).map(segment => segment.width)).toEqual([3, 1]);
  });

  it('should reproduce the line text from its rows', () => {
    const text = 'The quick\tbrown \u4E2D\u6587 fox-jumps over\u200Bthe lazy\u00ADdog, e\u0301 \u{1F44D}\u{1F3FD} end';
    const store = createTextStore(`${text}\r\nsecond`);
    for (const mode of ['hard', 'word'] as const) {
      for (const width of [1, 2, 3, 5, 8, 13]) {
        expect(rows(store, 0, config(mode, width)).join('')).toBe(text);
      }
    }
  });
});

describe('lineDisplayWidth', () => {
  it('should measure the unwrapped line', () => {
    const store = createTextStore('a\tb\n\u4E2D\u4E2D');
    expect(lineDisplayWidth(store, 0, config('word', 2, { tabWidth: 4 }))).toBe(5);
    expect(lineDisplayWidth(store, 1, config('none'))).toBe(4);
  });
});

// =============================================================================
// Glyph Runs
// =============================================================================

describe('glyphsForLine', () => {
  it('should shape an unwrapped line and its terminator', () => {
    const store = createTextStore('ab\tc\nz');
    const glyphs = [...glyphsForLine(store, 0, config('none', 80, { tabWidth: 4 }))];
    expect(glyphs.map(glyph => [glyph.text, glyph.screenWidth, glyph.screenColumn, glyph.column])).toEqual([
      ['a', 1, 0, 0],
      ['b', 1, 1, 1],
      [' ', 2, 2, 2],
      ['c', 1, 4, 3],
      ['', 0, 5, 4],
    ]);
    const last = glyphs[glyphs.length - 1];
    expect(last.lineBreak).toBe(true);
    expect(last.sourceRange).toEqual({ start: 4, end: 5 });
  });

  it('should omit the terminator glyph on the last line', () => {
    const store = createTextStore('ab\nz');
    const glyphs = [...glyphsForLine(store, 1, config('none'))];
    expect(glyphs.map(glyph => glyph.text)).toEqual(['z']);
  });

  it('should place wrapped glyphs on their rows', () => {
    const store = createTextStore(SOFT_HYPHEN_LINE);
    const glyphs = [...glyphsForLine(store, 0, config('word', 8))];
    const hyphen = glyphs[6];
    expect(hyphen).toMatchObject({ text: '-', screenWidth: 1, screenRow: 0, screenColumn: 6, softBreak: true });
    expect(glyphs[7]).toMatchObject({ text: 'h', screenRow: 1, screenColumn: 0, column: 7 });
    expect(glyphs[13]).toMatchObject({ text: '-', screenRow: 1, softBreak: true });
    expect(glyphs[17]).toMatchObject({ text: 't', screenRow: 2, screenColumn: 3, softBreak: false });
    expect(glyphs).toHaveLength(18);
  });

  it('should add a placeholder at each soft wrap when asked', () => {
    const store = createTextStore('abcdef');
    const glyphs = [...glyphsForLine(store, 0, config('hard', 3, { showWrap: true }))];
    expect(glyphs.map(glyph => glyph.text)).toEqual(['a', 'b', 'c', '\u21B5', 'd', 'e', 'f']);
    expect(glyphs[2].softBreak).toBe(false);
    expect(glyphs[3]).toMatchObject({ screenWidth: 0, softBreak: true, sourceRange: { start: 3, end: 3 } });
  });

  it('should be restartable', () => {
    const run = glyphsForLine(createTextStore('xyz'), 0, config('none'));
    expect([...run]).toHaveLength(3);
    expect([...run]).toHaveLength(3);
  });

  it('should skip to a byte offset', () => {
    const store = createTextStore(`${'x'.repeat(1000)}\u4E2Dy`);
    const render = config('none');
    const cursor = glyphsForLine(store, 0, render).cursor();
    cursor.skipTo(byteOffset(1000));
    expect(cursor.next().value).toMatchObject({ text: '\u4E2D', screenColumn: 1000, column: 1000 });
    expect(cursor.next().value).toMatchObject({ text: 'y', screenColumn: 1002, column: 1001 });
    expect(cursor.next().done).toBe(true);
  });

  it('should skip using anchors', () => {
    const store = createTextStore(`${'\t'.repeat(600)}z`);
    const render = config('none', 80, { tabWidth: 4 });
    const anchors = computeScrollAnchors(store, 0, render);
    expect(anchors.map(anchor => anchor.column)).toEqual([0, 256, 512]);
    const cursor = glyphsForLine(store, 0, render, { anchors }).cursor();
    cursor.skipTo(byteOffset(600));
    expect(cursor.next().value).toMatchObject({ text: 'z', screenColumn: 2400, column: 600 });
  });

  it('should skip into a later row', () => {
    const store = createTextStore(SOFT_HYPHEN_LINE);
    const cursor = glyphsForLine(store, 0, config('word', 8)).cursor();
    cursor.skipTo(byteOffset(10));
    expect(cursor.next().value).toMatchObject({ text: 'p', screenRow: 1, screenColumn: 2, column: 9 });
  });

  it('should reject a skip target outside the line or inside a grapheme', () => {
    const store = createTextStore('ab\ne\u0301');
    const cursor = glyphsForLine(store, 1, config('none')).cursor();
    expect(() => cursor.skipTo(byteOffset(1))).toThrow(TextError);
    expect(() => cursor.skipTo(byteOffset(4))).toThrow(TextError);
  });

  it('should stop after skipLine', () => {
    const store = createTextStore('abc\ndef');
    const cursor = glyphsForLine(store, 0, config('none')).cursor();
    expect(cursor.next().value?.text).toBe('a');
    cursor.skipLine();
    expect(cursor.next().done).toBe(true);
  });
});

// =============================================================================
// Screen Mapping
// =============================================================================

describe('screen mapping', () => {
  const store = createTextStore(SOFT_HYPHEN_LINE);
  const render = config('word', 8);

  it('should map positions to rows and cells', () => {
    expect(positionToScreen(store, { line: 0, column: 6 }, render)).toEqual({ row: 0, column: 6 });
    expect(positionToScreen(store, { line: 0, column: 7 }, render)).toEqual({ row: 1, column: 0 });
    expect(positionToScreen(store, { line: 0, column: 9 }, render)).toEqual({ row: 1, column: 2 });
    expect(positionToScreen(store, { line: 0, column: 18 }, render)).toEqual({ row: 2, column: 4 });
  });

  it('should map cells back to positions', () => {
    expect(screenToPosition(store, 0, { row: 1, column: 2 }, render)).toEqual({ line: 0, column: 9 });
    expect(screenToPosition(store, 0, { row: 0, column: 6 }, render)).toEqual({ line: 0, column: 6 });
    expect(screenToPosition(store, 0, { row: 0, column: 20 }, render)).toEqual({ line: 0, column: 6 });
    expect(screenToPosition(store, 0, { row: 2, column: 10 }, render)).toEqual({ line: 0, column: 18 });
  });

  it('should map both cells of a wide glyph to it', () => {
    const wide = createTextStore('a\u4E2Db');
    expect(screenToPosition(wide, 0, { row: 0, column: 1 }, config('none'))).toEqual({ line: 0, column: 1 });
    expect(screenToPosition(wide, 0, { row: 0, column: 2 }, config('none'))).toEqual({ line: 0, column: 1 });
    expect(positionToScreen(wide, { line: 0, column: 2 }, config('none'))).toEqual({ row: 0, column: 3 });
  });

  it('should reject rows outside the line', () => {
    expect(() => screenToPosition(store, 0, { row: 3, column: 0 }, render)).toThrow(TextError);
  });

  it('should find the grapheme under a scrolled column', () => {
    const line = createTextStore('ab\u4E2Dcd');
    expect(findScreenColumn(line, 0, 3, config('none'))).toEqual({ byte: 2, column: 2, x: 2 });
    expect(findScreenColumn(line, 0, 100, config('none'))).toEqual({ byte: 7, column: 5, x: 6 });
  });
});
