/**
 * Query namespace: O(1), O(log n), and bounded linear operations.
 * Functions here are read-only selectors over a text source, a rope or a
 * style index.
 */

import {
  ropeLength,
  ropeLineBreaks,
  ropeLineStart,
  ropeLineAt,
  ropeSlice,
  ropeAlign,
} from '../store/core/rope.ts';
import {
  byteToPosition,
  positionToByte,
  rangeToBytes,
  bytesToRange,
  lineBytes,
  lineContentRange,
  lineText,
  lineGraphemeCount,
  isGraphemeBoundary,
  graphemeWindow,
} from '../store/core/position-codec.ts';
import { stylesIn, stylesAt, styleMatch, styleCount } from '../store/core/style-index.ts';
import { positionToScreen, screenToPosition, findScreenColumn } from '../store/features/glyph-shaper.ts';
import { getVisibleRows, screenCellToPosition } from '../store/features/rendering.ts';

export const query = {
  /** @complexity O(1): cached on the root node */
  ropeLength,
  /** @complexity O(1): cached on the root node */
  ropeLineBreaks,
  /** @complexity O(log n): descent by subtree line-break counts */
  ropeLineStart,
  /** @complexity O(log n): descent by subtree byte lengths */
  ropeLineAt,
  /** @complexity O(log n + m): tree traversal to collect byte range */
  ropeSlice,
  /** @complexity O(log n + chunk_length): descent + scan of one chunk */
  ropeAlign,
  /** @complexity O(log n + line_length): line lookup + grapheme count */
  byteToPosition,
  /** @complexity O(log n + line_length): line lookup + grapheme walk */
  positionToByte,
  /** @complexity O(log n + line_length): two position lookups */
  rangeToBytes,
  /** @complexity O(log n + line_length): two offset lookups */
  bytesToRange,
  /** @complexity O(log n): two line-start lookups */
  lineBytes,
  /** @complexity O(log n): line lookup + terminator check */
  lineContentRange,
  /** @complexity O(log n + line_length): line lookup + slice */
  lineText,
  /** @complexity O(log n + line_length): segmentation of one line */
  lineGraphemeCount,
  /** @complexity O(log n + grapheme_length): segmentation around the offset */
  isGraphemeBoundary,
  /** @complexity O(window): widened only while no certain boundary is found */
  graphemeWindow,
  /** @complexity O(1): cached subtree count */
  styleCount,
  /** @complexity O(log n + k): pruned by subtree max end */
  stylesIn,
  /** @complexity O(log n + k): pruned by subtree max end */
  stylesAt,
  /** @complexity O(log n + k): point query filtered by tag */
  styleMatch,
  /** @complexity O(line_length): shaping of one line, bounded by anchors when unwrapped */
  positionToScreen,
  /** @complexity O(row_length): shaping of one wrapped row */
  screenToPosition,
  /** @complexity O(anchor_interval): walk from the nearest anchor */
  findScreenColumn,
  /** @complexity O(rows * row_length): shapes only the visible rows */
  getVisibleRows,
  /** @complexity O(rows + row_length): row walk + one row shaped */
  screenCellToPosition,
} as const;
