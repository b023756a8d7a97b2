/**
 * Line-metrics cache: memoized wrap segments, widths and scroll anchors,
 * keyed by line index and the render settings that shaped them.
 *
 * The cache never reads the store on its own. The owner pushes every
 * EditDelta through `applyEdit`; entries whose key no longer matches the
 * current render settings are recomputed on access.
 */

import type { EditDelta, RenderConfig, ScrollAnchor, WrapSegment } from '../../types/state.ts';
import type { TextSource } from '../../types/store.ts';
import { computeScrollAnchors, computeWrapSegments, findScreenColumn } from './glyph-shaper.ts';

export interface LineMetricsStats {
  /** Lines shaped since creation */
  readonly computations: number;
  /** Queries answered from the cache */
  readonly hits: number;
  /** Lines currently cached */
  readonly entries: number;
}

/**
 * Half-open range of line indices.
 */
export interface LineRange {
  readonly start: number;
  readonly end: number;
}

export interface LineMetricsCache {
  /** Widest screen row of `line` */
  lineWidth(source: TextSource, line: number, config: RenderConfig): number;
  wrapSegments(source: TextSource, line: number, config: RenderConfig): readonly WrapSegment[];
  /** Checkpoints of an unwrapped line */
  scrollAnchors(source: TextSource, line: number, config: RenderConfig): readonly ScrollAnchor[];
  /** Grapheme under screen column `x` of an unwrapped line */
  scrollAnchor(source: TextSource, line: number, x: number, config: RenderConfig): ScrollAnchor;
  lineCount(source: TextSource): number;
  /** Drop the cached lines in `range` */
  invalidate(range: LineRange): void;
  applyEdit(delta: EditDelta): void;
  clear(): void;
  stats(): LineMetricsStats;
}

interface LineEntry {
  readonly key: string;
  readonly segments: readonly WrapSegment[];
  readonly width: number;
  anchors: readonly ScrollAnchor[] | null;
}

/**
 * Settings that change a line's layout. `showWrap` only adds a zero-width
 * glyph, so it is not part of the key.
 */
export function renderKey(config: RenderConfig): string {
  return `${config.wrapMode}:${config.viewportWidth}:${config.tabWidth}:${config.showControl ? 1 : 0}`;
}

export function createLineMetricsCache(): LineMetricsCache {
  const entries = new Map<number, LineEntry>();
  let cachedLineCount: number | null = null;
  let computations = 0;
  let hits = 0;

  function entryFor(source: TextSource, line: number, config: RenderConfig): LineEntry {
    const key = renderKey(config);
    const cached = entries.get(line);
    if (cached !== undefined && cached.key === key) {
      hits++;
      return cached;
    }

    computations++;
    const segments = Object.freeze(computeWrapSegments(source, line, config));
    let width = 0;
    for (const segment of segments) width = Math.max(width, segment.width);
    const entry: LineEntry = { key, segments, width, anchors: null };
    entries.set(line, entry);
    return entry;
  }

  function scrollAnchors(source: TextSource, line: number, config: RenderConfig): readonly ScrollAnchor[] {
    const entry = entryFor(source, line, config);
    if (entry.anchors === null) {
      entry.anchors = Object.freeze(computeScrollAnchors(source, line, config));
    }
    return entry.anchors;
  }

  function invalidate(range: LineRange): void {
    if (range.end <= range.start) return;
    for (const line of [...entries.keys()]) {
      if (line >= range.start && line < range.end) entries.delete(line);
    }
  }

  function applyEdit(delta: EditDelta): void {
    if (delta.removedLineBreaks === 0 && delta.insertedLineBreaks === 0) {
      entries.delete(delta.line);
      return;
    }
    cachedLineCount = null;
    invalidate({ start: delta.line, end: Infinity });
  }

  return {
    lineWidth: (source, line, config) => entryFor(source, line, config).width,
    wrapSegments: (source, line, config) => entryFor(source, line, config).segments,
    scrollAnchors,
    scrollAnchor: (source, line, x, config) =>
      findScreenColumn(source, line, x, config, scrollAnchors(source, line, config)),

    lineCount(source: TextSource): number {
      if (cachedLineCount === null) cachedLineCount = source.lenLines();
      return cachedLineCount;
    },

    invalidate,
    applyEdit,

    clear(): void {
      entries.clear();
      cachedLineCount = null;
    },

    stats: () => ({ computations, hits, entries: entries.size }),
  };
}
