/**
 * Grapheme segmentation and display width.
 */

import { eastAsianWidth } from 'get-east-asian-width';

// Grapheme segmenter (shared instance)
const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/**
 * Get the shared grapheme segmenter instance.
 */
export function getSegmenter(): Intl.Segmenter {
  return segmenter;
}

/**
 * Lazily split a string into grapheme clusters.
 */
export function* segmentGraphemes(text: string): Generator<string> {
  for (const { segment } of segmenter.segment(text)) {
    yield segment;
  }
}

/**
 * Number of grapheme clusters in a string.
 */
export function countGraphemes(text: string): number {
  let count = 0;
  for (const _ of segmenter.segment(text)) count++;
  return count;
}

/**
 * '\n' or '\r\n'. A lone '\r' is an ordinary control grapheme.
 */
export function isLineBreak(grapheme: string): boolean {
  return grapheme === '\n' || grapheme === '\r\n';
}

/**
 * Code units that never join a neighbouring cluster: ASCII, CJK ideographs,
 * kana (without the combining sound marks) and precomposed Hangul.
 */
function isStandalone(code: number): boolean {
  return (
    code < 0x80 ||
    (code >= 0x4e00 && code <= 0x9fff) ||
    (code >= 0x3041 && code <= 0x3096) ||
    (code >= 0x30a1 && code <= 0x30fa) ||
    (code >= 0xac00 && code <= 0xd7a3)
  );
}

/**
 * Largest UTF-16 index <= `index` at which a grapheme boundary is certain,
 * looking back at most `lookBehind` units. Two adjacent standalone
 * characters other than CR LF always have a boundary between them.
 */
export function findSafeSegmentStart(text: string, index: number, lookBehind: number = 64): number {
  const floor = Math.max(0, index - lookBehind);
  for (let i = index; i > floor; i--) {
    const before = text.charCodeAt(i - 1);
    const at = text.charCodeAt(i);
    if (isStandalone(before) && isStandalone(at) && !(before === 0x0d && at === 0x0a)) {
      return i;
    }
  }
  return floor === 0 ? 0 : findSafeSegmentStart(text, floor, Number.POSITIVE_INFINITY);
}

/**
 * Whether UTF-16 index `index` of `text` falls on a grapheme boundary.
 */
export function isBoundaryAt(text: string, index: number): boolean {
  if (index <= 0 || index >= text.length) return index === 0 || index === text.length;
  const start = findSafeSegmentStart(text, index);
  const window = text.slice(start, Math.min(text.length, index + 32));
  let position = start;
  for (const { segment } of segmenter.segment(window)) {
    if (position === index) return true;
    if (position > index) return false;
    position += segment.length;
  }
  return position === index;
}

// =============================================================================
// Display Width
// =============================================================================

// Zero-width clusters: format characters, controls, lone marks
const zeroWidthRegex = /^(?:\p{Default_Ignorable_Code_Point}|\p{Control}|\p{Mark}|\p{Surrogate})+$/u;
const leadingNonPrintingRegex = /^[\p{Default_Ignorable_Code_Point}\p{Control}\p{Format}\p{Mark}\p{Surrogate}]+/u;
const emojiPresentationRegex = /\p{Emoji_Presentation}|\p{Extended_Pictographic}\uFE0F/u;

// Cache for non-ASCII clusters
const WIDTH_CACHE_SIZE = 512;
const widthCache = new Map<string, number>();

/**
 * Check if a grapheme cluster could possibly be an emoji.
 * Cheap pre-filter in front of the property regex.
 */
function couldBeEmoji(segment: string): boolean {
  const cp = segment.codePointAt(0) ?? 0;
  return (
    (cp >= 0x1f000 && cp <= 0x1fbff) || // Emoji and Pictograph
    (cp >= 0x2300 && cp <= 0x23ff) || // Misc technical
    (cp >= 0x2600 && cp <= 0x27bf) || // Misc symbols, dingbats
    (cp >= 0x2b50 && cp <= 0x2b55) ||
    segment.includes('\uFE0F') ||
    segment.length > 2 // ZWJ sequences, skin tones
  );
}

function measureGrapheme(segment: string): number {
  if (zeroWidthRegex.test(segment)) {
    return 0;
  }

  if (couldBeEmoji(segment) && emojiPresentationRegex.test(segment)) {
    return 2;
  }

  const base = segment.replace(leadingNonPrintingRegex, '');
  const cp = base.codePointAt(0);
  if (cp === undefined) {
    return 0;
  }

  let width = eastAsianWidth(cp);

  // Trailing halfwidth/fullwidth forms
  if (segment.length > 1) {
    for (const char of segment.slice(1)) {
      const c = char.codePointAt(0) ?? 0;
      if (c >= 0xff00 && c <= 0xffef) {
        width += eastAsianWidth(c);
      }
    }
  }

  return width;
}

/**
 * Terminal columns occupied by one grapheme cluster (0, 1 or 2).
 * Control characters measure 0; the glyph shaper substitutes them first.
 */
export function graphemeWidth(segment: string): number {
  if (segment.length === 1) {
    const code = segment.charCodeAt(0);
    if (code >= 0x20 && code < 0x7f) return 1;
  }

  const cached = widthCache.get(segment);
  if (cached !== undefined) {
    return cached;
  }

  const width = measureGrapheme(segment);
  if (widthCache.size >= WIDTH_CACHE_SIZE) {
    const oldest = widthCache.keys().next();
    if (!oldest.done) widthCache.delete(oldest.value);
  }
  widthCache.set(segment, width);
  return width;
}
