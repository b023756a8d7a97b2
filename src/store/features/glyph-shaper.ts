/**
 * Glyph shaper: turns the graphemes of one logical line into display glyphs
 * and lays them out in screen rows.
 *
 * Layout runs in two passes that share `measureInRow`: `computeWrapSegments`
 * decides where rows break, and the glyph cursor replays a row from its
 * start (or from an anchor) to produce glyphs. Both passes measure a
 * grapheme relative to the row's screen column, since tab width depends on it.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type {
  ByteRange,
  Glyph,
  Grapheme,
  RenderConfig,
  ScreenPosition,
  ScrollAnchor,
  TextPosition,
  WrapSegment,
} from '../../types/state.ts';
import type { GlyphCursor, GlyphRun, GlyphRunOptions, TextSource } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { invalidBoundary } from '../../types/errors.ts';
import { graphemeWidth, isLineBreak } from '../core/graphemes.ts';
import { createGraphemeCursor } from '../core/grapheme-cursor.ts';
import { assertBoundary, byteRange, lineBytes, lineContentRange, positionToByte } from '../core/position-codec.ts';

export const SOFT_HYPHEN = '\u00AD';
export const ZERO_WIDTH_SPACE = '\u200B';
export const TAB_PICTURE = '\u2409';
export const LINE_BREAK_PICTURE = '\u240A';
export const WRAP_PICTURE = '\u21B5';
export const REPLACEMENT_CHARACTER = '\uFFFD';

/**
 * Graphemes between anchors of an unwrapped line.
 */
export const ANCHOR_INTERVAL = 256;

export const DEFAULT_RENDER_CONFIG: RenderConfig = Object.freeze({
  wrapMode: 'none',
  viewportWidth: 80,
  tabWidth: 8,
  showControl: false,
  showWrap: false,
});

export interface ShapedGrapheme {
  readonly text: string;
  readonly width: number;
}

// =============================================================================
// Single Graphemes
// =============================================================================

/**
 * Control picture for C0 controls and DEL (U+2400 block).
 */
export function controlPicture(code: number): string {
  return String.fromCharCode(code === 0x7f ? 0x2421 : 0x2400 + code);
}

function controlCode(grapheme: string): number {
  if (grapheme.length !== 1) return -1;
  const code = grapheme.charCodeAt(0);
  return code < 0x20 || (code >= 0x7f && code <= 0x9f) ? code : -1;
}

/**
 * Display form of a grapheme drawn at screen column `x`, before any
 * row clipping.
 */
export function remapGrapheme(
  grapheme: string,
  x: number,
  config: Pick<RenderConfig, 'tabWidth' | 'showControl'>
): ShapedGrapheme {
  if (grapheme === '\t') {
    return { text: config.showControl ? TAB_PICTURE : ' ', width: config.tabWidth - (x % config.tabWidth) };
  }
  if (isLineBreak(grapheme)) {
    return config.showControl ? { text: LINE_BREAK_PICTURE, width: 1 } : { text: '', width: 0 };
  }
  if (grapheme === SOFT_HYPHEN || grapheme === ZERO_WIDTH_SPACE) {
    return { text: '', width: 0 };
  }
  const code = controlCode(grapheme);
  if (code >= 0) {
    const visible = config.showControl && code <= 0x7f;
    return { text: visible ? controlPicture(code) : REPLACEMENT_CHARACTER, width: 1 };
  }
  return { text: grapheme, width: graphemeWidth(grapheme) };
}

/**
 * Screen columns a grapheme takes at column `x` with the default tab stop.
 */
export function displayWidth(grapheme: string, x: number = 0, config: RenderConfig = DEFAULT_RENDER_CONFIG): number {
  return remapGrapheme(grapheme, x, config).width;
}

/**
 * Width of a grapheme at row column `x` once wrapping rules apply:
 * a tab stops at the row end, and in word mode a space that overflows
 * hangs past it with the width that remains.
 */
export function measureInRow(grapheme: string, x: number, config: RenderConfig): number {
  const { width } = remapGrapheme(grapheme, x, config);
  if (config.wrapMode === 'none') return width;
  const limit = config.viewportWidth;
  if (grapheme === '\t' && x < limit) return Math.min(width, limit - x);
  if (x + width <= limit) return width;
  if (config.wrapMode === 'word' && grapheme === ' ' && x > 0) return Math.max(0, limit - x);
  return width;
}

/**
 * Whether a word-wrapped row may end after `grapheme`, which ends at
 * column `x`. A soft hyphen only qualifies when its '-' still fits.
 */
function isBreakOpportunity(grapheme: string, x: number, limit: number): boolean {
  switch (grapheme) {
    case ' ':
    case '\t':
    case '-':
    case ZERO_WIDTH_SPACE:
      return true;
    case SOFT_HYPHEN:
      return x + 1 <= limit;
    default:
      return false;
  }
}

function endsHyphenated(segment: WrapSegment, grapheme: Grapheme): boolean {
  return segment.hyphenated && grapheme.text === SOFT_HYPHEN && grapheme.range.end === segment.range.end;
}

// =============================================================================
// Wrap Segments
// =============================================================================

function lineGraphemes(source: TextSource, content: ByteRange): Grapheme[] {
  return [...createGraphemeCursor(source, content)];
}

function makeSegment(start: number, end: number, width: number, column: number, hyphenated: boolean): WrapSegment {
  return Object.freeze({ range: byteRange(start, end), width, column, hyphenated });
}

/**
 * Split a line's graphemes into rows. Rows partition `content` in order.
 */
export function layoutSegments(
  graphemes: readonly Grapheme[],
  content: ByteRange,
  config: RenderConfig
): WrapSegment[] {
  if (config.wrapMode === 'none' || graphemes.length === 0) {
    let x = 0;
    for (const grapheme of graphemes) x += measureInRow(grapheme.text, x, config);
    return [makeSegment(content.start, content.end, x, 0, false)];
  }

  const limit = config.viewportWidth;
  const word = config.wrapMode === 'word';
  const segments: WrapSegment[] = [];
  const startOf = (index: number) => (index < graphemes.length ? graphemes[index].range.start : content.end);

  let rowStart = 0;
  let x = 0;
  let breakAfter = -1;
  let breakX = 0;
  let breakHyphen = false;
  let index = 0;

  while (index < graphemes.length) {
    const text = graphemes[index].text;
    const width = measureInRow(text, x, config);

    if (x + width > limit && index > rowStart) {
      if (word && breakAfter >= rowStart) {
        segments.push(makeSegment(startOf(rowStart), startOf(breakAfter + 1), breakX + (breakHyphen ? 1 : 0), rowStart, breakHyphen));
        index = breakAfter + 1;
      } else {
        segments.push(makeSegment(startOf(rowStart), startOf(index), x, rowStart, false));
      }
      rowStart = index;
      x = 0;
      breakAfter = -1;
      continue;
    }

    x += width;
    if (word && isBreakOpportunity(text, x, limit)) {
      breakAfter = index;
      breakX = x;
      breakHyphen = text === SOFT_HYPHEN;
    }
    index++;
  }

  segments.push(makeSegment(startOf(rowStart), content.end, x, rowStart, false));
  return segments;
}

/**
 * Screen rows of `line` under `config`; the terminator is excluded.
 * O(line length).
 */
export function computeWrapSegments(source: TextSource, line: number, config: RenderConfig): WrapSegment[] {
  const content = lineContentRange(source, line);
  return layoutSegments(lineGraphemes(source, content), content, config);
}

/**
 * Width of the line laid out without wrapping.
 */
export function lineDisplayWidth(source: TextSource, line: number, config: RenderConfig): number {
  return computeWrapSegments(source, line, { ...config, wrapMode: 'none' })[0].width;
}

/**
 * Checkpoints every ANCHOR_INTERVAL graphemes of an unwrapped line,
 * starting with the line start.
 */
export function computeScrollAnchors(
  source: TextSource,
  line: number,
  config: RenderConfig,
  interval: number = ANCHOR_INTERVAL
): ScrollAnchor[] {
  const content = lineContentRange(source, line);
  const unwrapped: RenderConfig = { ...config, wrapMode: 'none' };
  const anchors: ScrollAnchor[] = [{ byte: content.start, column: 0, x: 0 }];
  let x = 0;
  let column = 0;
  for (const grapheme of createGraphemeCursor(source, content)) {
    x += measureInRow(grapheme.text, x, unwrapped);
    column++;
    if (column % interval === 0) {
      anchors.push(Object.freeze({ byte: grapheme.range.end, column, x }));
    }
  }
  return anchors;
}

// =============================================================================
// Locating Offsets
// =============================================================================

interface RowLocation {
  readonly row: number;
  /** Screen column within the row */
  readonly x: number;
  /** Grapheme column within the line */
  readonly column: number;
}

/**
 * Index of the last segment starting at or before `offset`.
 */
function rowAt(segments: readonly WrapSegment[], offset: number): number {
  let low = 0;
  let high = segments.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if (segments[mid].range.start <= offset) low = mid;
    else high = mid - 1;
  }
  return low;
}

/**
 * Last anchor at or before `offset`, or the row start.
 */
function startingPoint(
  segments: readonly WrapSegment[],
  row: number,
  offset: number,
  anchors: readonly ScrollAnchor[] | undefined,
  config: RenderConfig
): { byte: number; column: number; x: number } {
  const segment = segments[row];
  let best = { byte: segment.range.start, column: segment.column, x: 0 };
  if (anchors !== undefined && config.wrapMode === 'none') {
    for (const anchor of anchors) {
      if (anchor.byte > offset) break;
      best = anchor;
    }
  }
  return best;
}

function locate(
  source: TextSource,
  segments: readonly WrapSegment[],
  content: ByteRange,
  offset: number,
  config: RenderConfig,
  anchors?: readonly ScrollAnchor[]
): RowLocation {
  const row = rowAt(segments, offset);
  const start = startingPoint(segments, row, offset, anchors, config);
  let { x, column } = start;
  const walk = createGraphemeCursor(source, byteRange(start.byte, content.end));
  for (const grapheme of walk) {
    if (grapheme.range.start >= offset) break;
    x += measureInRow(grapheme.text, x, config);
    column++;
  }
  return { row, x, column };
}

// =============================================================================
// Glyph Runs
// =============================================================================

/**
 * Glyphs of `line`, lazily shaped. Precomputed `segments` (and, for
 * unwrapped lines, `anchors`) can be passed in from the metrics cache.
 */
export function glyphsForLine(
  source: TextSource,
  line: number,
  config: RenderConfig,
  options: GlyphRunOptions = {}
): GlyphRun {
  const content = lineContentRange(source, line);
  const terminatorEnd = lineBytes(source, line).end;
  const segments = options.segments ?? computeWrapSegments(source, line, config);

  function cursor(): GlyphCursor {
    return createGlyphCursor(source, line, config, content, terminatorEnd, segments, options.anchors);
  }

  return Object.freeze({ line, segments, cursor, [Symbol.iterator]: cursor });
}

function createGlyphCursor(
  source: TextSource,
  line: number,
  config: RenderConfig,
  content: ByteRange,
  terminatorEnd: ByteOffset,
  segments: readonly WrapSegment[],
  anchors: readonly ScrollAnchor[] | undefined
): GlyphCursor {
  const graphemes = createGraphemeCursor(source, content);
  const lastRow = segments.length - 1;
  let row = 0;
  let x = 0;
  let column = 0;
  let pending: Glyph | null = null;
  let finished = false;

  function lineBreakGlyph(): Glyph | null {
    finished = true;
    if (content.end === terminatorEnd) return null;
    const shaped = remapGrapheme('\n', x, config);
    return Object.freeze({
      text: shaped.text,
      screenWidth: shaped.width,
      sourceRange: byteRange(content.end, terminatorEnd),
      line,
      column,
      screenRow: lastRow,
      screenColumn: x,
      lineBreak: true,
      softBreak: false,
    });
  }

  const glyphCursor: GlyphCursor = {
    next(): IteratorResult<Glyph> {
      if (pending !== null) {
        const value = pending;
        pending = null;
        return { done: false, value };
      }

      const result = graphemes.next();
      if (result.done) {
        const value = finished ? null : lineBreakGlyph();
        return value === null ? { done: true, value: undefined } : { done: false, value };
      }

      const grapheme = result.value;
      while (row < lastRow && grapheme.range.start >= segments[row].range.end) {
        row++;
        x = 0;
      }
      const segment = segments[row];
      const wraps = row < lastRow && grapheme.range.end >= segment.range.end;
      let { text } = remapGrapheme(grapheme.text, x, config);
      let width = measureInRow(grapheme.text, x, config);
      if (endsHyphenated(segment, grapheme)) {
        text = '-';
        width = 1;
      }

      const value: Glyph = Object.freeze({
        text,
        screenWidth: width,
        sourceRange: grapheme.range,
        line,
        column,
        screenRow: row,
        screenColumn: x,
        lineBreak: false,
        softBreak: wraps && !config.showWrap,
      });
      x += width;
      column++;

      if (wraps && config.showWrap) {
        pending = Object.freeze({
          text: WRAP_PICTURE,
          screenWidth: 0,
          sourceRange: byteRange(grapheme.range.end, grapheme.range.end),
          line,
          column,
          screenRow: row,
          screenColumn: x,
          lineBreak: false,
          softBreak: true,
        });
      }
      return { done: false, value };
    },

    skipTo(offset: ByteOffset): void {
      if (offset < content.start || offset > content.end) {
        throw invalidBoundary(`Offset ${offset} is outside line ${line}`, {
          offset,
          line,
          start: content.start,
          end: content.end,
        });
      }
      assertBoundary(source, offset);
      const location = locate(source, segments, content, offset, config, anchors);
      row = location.row;
      x = location.x;
      column = location.column;
      pending = null;
      finished = false;
      graphemes.skipTo(offset);
    },

    skipLine(): void {
      graphemes.skipTo(content.end);
      pending = null;
      finished = true;
    },

    [Symbol.iterator](): GlyphCursor {
      return glyphCursor;
    },
  };

  return glyphCursor;
}

// =============================================================================
// Screen Mapping
// =============================================================================

/**
 * Screen row and cell of a logical position, relative to its line.
 */
export function positionToScreen(
  source: TextSource,
  position: TextPosition,
  config: RenderConfig,
  segments: readonly WrapSegment[] = computeWrapSegments(source, position.line, config),
  anchors?: readonly ScrollAnchor[]
): ScreenPosition {
  const offset = positionToByte(source, position);
  const content = lineContentRange(source, position.line);
  const { row, x } = locate(source, segments, content, offset, config, anchors);
  return { row, column: x };
}

/**
 * Logical position under a screen cell of `line`. A cell on the right half
 * of a wide glyph maps to that glyph; a cell past the end of a row maps to
 * the row's last grapheme, or to the line end on the last row.
 */
export function screenToPosition(
  source: TextSource,
  line: number,
  screen: ScreenPosition,
  config: RenderConfig,
  segments: readonly WrapSegment[] = computeWrapSegments(source, line, config),
  anchors?: readonly ScrollAnchor[]
): TextPosition {
  const { row } = screen;
  if (!Number.isInteger(row) || row < 0 || row >= segments.length || screen.column < 0) {
    throw invalidBoundary(`Screen cell (${row}, ${screen.column}) is outside line ${line}`, {
      line,
      column: screen.column,
    });
  }

  const segment = segments[row];
  let start = { byte: segment.range.start, column: segment.column, x: 0 };
  if (anchors !== undefined && config.wrapMode === 'none') {
    for (const anchor of anchors) {
      if (anchor.x > screen.column) break;
      start = anchor;
    }
  }

  let { x, column } = start;
  for (const grapheme of createGraphemeCursor(source, byteRange(start.byte, segment.range.end))) {
    const width = endsHyphenated(segment, grapheme) ? 1 : measureInRow(grapheme.text, x, config);
    if (screen.column < x + width) return { line, column };
    x += width;
    column++;
  }

  const lastRow = row === segments.length - 1;
  return { line, column: lastRow || column === segment.column ? column : column - 1 };
}

/**
 * Grapheme containing screen column `x` of an unwrapped line, for
 * horizontal scrolling. Past the end, the line end.
 */
export function findScreenColumn(
  source: TextSource,
  line: number,
  x: number,
  config: RenderConfig,
  anchors?: readonly ScrollAnchor[]
): ScrollAnchor {
  const content = lineContentRange(source, line);
  const unwrapped: RenderConfig = { ...config, wrapMode: 'none' };
  let start: ScrollAnchor = { byte: content.start, column: 0, x: 0 };
  for (const anchor of anchors ?? []) {
    if (anchor.x > x) break;
    start = anchor;
  }

  let position = start.x;
  let column = start.column;
  for (const grapheme of createGraphemeCursor(source, byteRange(start.byte, content.end))) {
    const width = measureInRow(grapheme.text, position, unwrapped);
    if (x < position + width) return { byte: grapheme.range.start, column, x: position };
    position += width;
    column++;
  }
  return { byte: byteOffset(content.end), column, x: position };
}
