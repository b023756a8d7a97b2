/**
 * Rendering utilities for virtualized document display.
 * Computes the screen rows that fill a viewport rectangle, shaping only the
 * parts of each line that are on screen.
 */

import type { ByteRange, Glyph, TextPosition } from '../../types/state.ts';
import type { TextEditor } from './editor.ts';

// =============================================================================
// Types
// =============================================================================

/**
 * What rendering needs from an editor.
 */
export type RenderSource = Pick<
  TextEditor,
  'lineCount' | 'wrapSegments' | 'glyphs' | 'scrollAnchor' | 'screenToPosition' | 'renderConfig'
>;

/**
 * Top-left corner of the viewport in document terms.
 */
export interface ScrollPosition {
  /** First visible logical line */
  readonly line: number;
  /** First visible wrapped row of that line */
  readonly row: number;
  /** Horizontal scroll in screen cells */
  readonly column: number;
}

export interface Viewport {
  readonly scroll: ScrollPosition;
  /** Width in screen cells */
  readonly width: number;
  /** Height in screen rows */
  readonly height: number;
}

/**
 * One screen row.
 */
export interface VisibleRow {
  /** Logical line */
  readonly line: number;
  /** Wrapped row within the line */
  readonly row: number;
  /** Content bytes shown on this row */
  readonly range: ByteRange;
  /** Glyphs overlapping the viewport, in order */
  readonly glyphs: readonly Glyph[];
}

export interface VisibleRowsResult {
  readonly rows: readonly VisibleRow[];
  /** First line in the result */
  readonly firstLine: number;
  /** Last line in the result (inclusive); -1 when no rows are visible */
  readonly lastLine: number;
  /** Total number of lines in the document */
  readonly totalLines: number;
}

/**
 * A cell of the viewport, counted from its top-left corner.
 */
export interface ScreenCell {
  readonly x: number;
  readonly y: number;
}

interface RowSlot {
  readonly line: number;
  readonly row: number;
}

// =============================================================================
// Row Walk
// =============================================================================

/**
 * Line and wrapped row of each screen row, top to bottom.
 */
function* rowSlots(source: RenderSource, scroll: ScrollPosition, height: number): Generator<RowSlot> {
  const totalLines = source.lineCount();
  let emitted = 0;
  for (let line = scroll.line; line < totalLines && emitted < height; line++) {
    const rows = source.wrapSegments(line).length;
    for (let row = line === scroll.line ? scroll.row : 0; row < rows && emitted < height; row++) {
      yield { line, row };
      emitted++;
    }
  }
}

function overlaps(glyph: Glyph, left: number, right: number): boolean {
  if (glyph.screenWidth === 0) return glyph.screenColumn >= left && glyph.screenColumn < right;
  return glyph.screenColumn + glyph.screenWidth > left && glyph.screenColumn < right;
}

function shapeRow(source: RenderSource, slot: RowSlot, left: number, right: number): VisibleRow {
  const run = source.glyphs(slot.line);
  const segment = run.segments[slot.row];
  const cursor = run.cursor();

  if (left > 0 && source.renderConfig.wrapMode === 'none') {
    cursor.skipTo(source.scrollAnchor(slot.line, left).byte);
  } else if (slot.row > 0) {
    cursor.skipTo(segment.range.start);
  }

  const glyphs: Glyph[] = [];
  for (const glyph of cursor) {
    if (glyph.screenRow > slot.row || glyph.screenColumn >= right) break;
    if (overlaps(glyph, left, right)) glyphs.push(glyph);
  }

  return Object.freeze({
    line: slot.line,
    row: slot.row,
    range: segment.range,
    glyphs: Object.freeze(glyphs),
  });
}

// =============================================================================
// Visible Rows
// =============================================================================

/**
 * Screen rows filling `viewport`. Rows start at `scroll.row` of
 * `scroll.line` and continue through the following lines.
 */
export function getVisibleRows(source: RenderSource, viewport: Viewport): VisibleRowsResult {
  const { scroll, width, height } = viewport;
  const left = scroll.column;
  const right = left + width;

  const rows: VisibleRow[] = [];
  for (const slot of rowSlots(source, scroll, height)) {
    rows.push(shapeRow(source, slot, left, right));
  }

  return Object.freeze({
    rows: Object.freeze(rows),
    firstLine: rows.length > 0 ? rows[0].line : scroll.line,
    lastLine: rows.length > 0 ? rows[rows.length - 1].line : -1,
    totalLines: source.lineCount(),
  });
}

/**
 * Logical position under a viewport cell, or null below the last row.
 */
export function screenCellToPosition(source: RenderSource, viewport: Viewport, cell: ScreenCell): TextPosition | null {
  if (cell.y < 0 || cell.y >= viewport.height) return null;
  let y = 0;
  for (const slot of rowSlots(source, viewport.scroll, cell.y + 1)) {
    if (y === cell.y) {
      return source.screenToPosition(slot.line, {
        row: slot.row,
        column: Math.max(0, viewport.scroll.column + cell.x),
      });
    }
    y++;
  }
  return null;
}
