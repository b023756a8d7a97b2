/**
 * Scan namespace: O(n) operations.
 * All functions in this namespace perform full or partial document traversals.
 * Use `query.*` for efficient lookups when possible.
 */

import { ropeText, chunkText, createRopeState } from '../store/core/rope.ts';
import { collectSpans, styleIndexSet } from '../store/core/style-index.ts';
import { computeWrapSegments, lineDisplayWidth, computeScrollAnchors } from '../store/features/glyph-shaper.ts';
import { countLineBreaks, utf8Length } from '../store/core/encoding.ts';
import { countGraphemes } from '../store/core/graphemes.ts';
import { nextWordEnd, nextWordStart, prevWordEnd, prevWordStart, wordEnd, wordStart } from '../store/features/words.ts';

export const scan = {
  /** @complexity O(n): in-order walk of every chunk */
  ropeText,
  /** @complexity O(n): splits text into chunks on code point boundaries */
  chunkText,
  /** @complexity O(n): builds a balanced tree from chunks */
  createRopeState,
  /** @complexity O(n): in-order walk of every span */
  collectSpans,
  /** @complexity O(n log n): sorts and rebuilds the index */
  styleIndexSet,
  /** @complexity O(line_length): shapes the whole line */
  computeWrapSegments,
  /** @complexity O(line_length): shapes the whole line */
  lineDisplayWidth,
  /** @complexity O(line_length): shapes the whole line */
  computeScrollAnchors,
  /** @complexity O(n): one pass over the code units */
  utf8Length,
  /** @complexity O(n): one pass over the code units */
  countLineBreaks,
  /** @complexity O(n): full segmentation */
  countGraphemes,
  /** @complexity O(distance): grapheme walk to the next word */
  nextWordStart,
  /** @complexity O(distance): grapheme walk past the next word */
  nextWordEnd,
  /** @complexity O(distance): backward grapheme walk past the previous word */
  prevWordStart,
  /** @complexity O(distance): backward grapheme walk over white space */
  prevWordEnd,
  /** @complexity O(word_length): backward grapheme walk */
  wordStart,
  /** @complexity O(word_length): forward grapheme walk */
  wordEnd,
} as const;
