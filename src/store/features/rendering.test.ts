/**
 * Tests for viewport row computation.
 */

import { describe, it, expect } from 'vitest';
import { createTextEditor } from './editor.ts';
import { WRAP_PICTURE } from './glyph-shaper.ts';
import { getVisibleRows, screenCellToPosition } from './rendering.ts';
import type { VisibleRow } from './rendering.ts';

function rowText(row: VisibleRow): string {
  return row.glyphs.map(glyph => glyph.text).join('');
}

describe('getVisibleRows', () => {
  it('should return one row per line without wrapping', () => {
    const editor = createTextEditor({ content: 'one\ntwo\nthree' });
    const result = getVisibleRows(editor, { scroll: { line: 0, row: 0, column: 0 }, width: 80, height: 2 });

    expect(result.rows.map(row => [row.line, row.row])).toEqual([[0, 0], [1, 0]]);
    expect(result.rows[0].glyphs.map(glyph => glyph.text)).toEqual(['o', 'n', 'e', '']);
    expect(result.rows[0].glyphs[3].lineBreak).toBe(true);
    expect(result.firstLine).toBe(0);
    expect(result.lastLine).toBe(1);
    expect(result.totalLines).toBe(3);
  });

  it('should start inside a wrapped line', () => {
    const editor = createTextEditor({ content: 'abcdefghij', wrapMode: 'hard', viewportWidth: 4 });
    const result = getVisibleRows(editor, { scroll: { line: 0, row: 1, column: 0 }, width: 4, height: 5 });

    expect(result.rows.map(rowText)).toEqual(['efgh', 'ij']);
    expect(result.rows.map(row => row.row)).toEqual([1, 2]);
    expect(result.rows[0].range).toEqual({ start: 4, end: 8 });
    expect(result.rows[0].glyphs.map(glyph => glyph.screenColumn)).toEqual([0, 1, 2, 3]);
    expect(result.lastLine).toBe(0);
  });

  it('should continue into the following lines', () => {
    const editor = createTextEditor({ content: 'abcdef\nxy', wrapMode: 'hard', viewportWidth: 4 });
    const result = getVisibleRows(editor, { scroll: { line: 0, row: 1, column: 0 }, width: 4, height: 2 });

    expect(result.rows.map(row => [row.line, row.row])).toEqual([[0, 1], [1, 0]]);
    expect(result.rows.map(rowText)).toEqual(['ef', 'xy']);
  });

  it('should clip to the horizontal scroll window', () => {
    const editor = createTextEditor({ content: 'abcdefghij\nxy' });
    const result = getVisibleRows(editor, { scroll: { line: 0, row: 0, column: 4 }, width: 3, height: 2 });

    expect(result.rows.map(rowText)).toEqual(['efg', '']);
    expect(result.rows[0].glyphs.map(glyph => glyph.screenColumn)).toEqual([4, 5, 6]);
    expect(result.rows[1].glyphs).toEqual([]);
  });

  it('should include the wrap placeholder when it fits', () => {
    const editor = createTextEditor({ content: 'abcdefghij', wrapMode: 'hard', viewportWidth: 4, showWrap: true });
    const result = getVisibleRows(editor, { scroll: { line: 0, row: 0, column: 0 }, width: 5, height: 1 });

    expect(result.rows[0].glyphs.map(glyph => glyph.text)).toEqual(['a', 'b', 'c', 'd', WRAP_PICTURE]);
  });

  it('should return no rows past the end', () => {
    const editor = createTextEditor({ content: 'a' });
    const result = getVisibleRows(editor, { scroll: { line: 3, row: 0, column: 0 }, width: 10, height: 4 });

    expect(result.rows).toEqual([]);
    expect(result.firstLine).toBe(3);
    expect(result.lastLine).toBe(-1);
  });
});

describe('screenCellToPosition', () => {
  it('should map cells through wrapped rows', () => {
    const editor = createTextEditor({ content: 'abcdefghij', wrapMode: 'hard', viewportWidth: 4 });
    const viewport = { scroll: { line: 0, row: 0, column: 0 }, width: 4, height: 3 };

    expect(screenCellToPosition(editor, viewport, { x: 2, y: 1 })).toEqual({ line: 0, column: 6 });
    expect(screenCellToPosition(editor, viewport, { x: 0, y: 3 })).toBeNull();
  });

  it('should add the horizontal scroll', () => {
    const editor = createTextEditor({ content: 'abcdefghij' });
    const viewport = { scroll: { line: 0, row: 0, column: 4 }, width: 3, height: 1 };

    expect(screenCellToPosition(editor, viewport, { x: 1, y: 0 })).toEqual({ line: 0, column: 5 });
  });

  it('should return null below the document', () => {
    const editor = createTextEditor({ content: 'ab' });
    const viewport = { scroll: { line: 0, row: 0, column: 0 }, width: 10, height: 5 };

    expect(screenCellToPosition(editor, viewport, { x: 0, y: 2 })).toBeNull();
    expect(screenCellToPosition(editor, viewport, { x: 9, y: 0 })).toEqual({ line: 0, column: 2 });
  });
});
