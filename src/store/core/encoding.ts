/**
 * UTF-8 / UTF-16 bookkeeping.
 * Text lives in JS strings (UTF-16) while every public offset is a UTF-8
 * byte offset; these helpers convert between the two without encoding.
 */

/**
 * UTF-8 width of the code point starting at UTF-16 index `index`.
 * A lone surrogate counts as 3 bytes, one unit.
 */
export function utf8WidthAt(text: string, index: number): number {
  const code = text.charCodeAt(index);
  if (code < 0x80) return 1;
  if (code < 0x800) return 2;
  if (code >= 0xd800 && code <= 0xdbff && index + 1 < text.length) {
    const next = text.charCodeAt(index + 1);
    if (next >= 0xdc00 && next <= 0xdfff) return 4;
  }
  return 3;
}

/**
 * UTF-8 length of a UTF-16 code unit sequence.
 */
export function utf8Length(text: string, from: number = 0, to: number = text.length): number {
  let bytes = 0;
  for (let i = from; i < to; i++) {
    const code = text.charCodeAt(i);
    if (code < 0x80) {
      bytes += 1;
    } else if (code < 0x800) {
      bytes += 2;
    } else if (code >= 0xd800 && code <= 0xdbff && i + 1 < to) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        bytes += 4;
        i++;
      } else {
        bytes += 3;
      }
    } else {
      bytes += 3;
    }
  }
  return bytes;
}

/**
 * UTF-16 index of a byte offset within `text`.
 * Returns -1 when the offset falls inside a code point or past the end.
 */
export function byteToUtf16Index(text: string, bytes: number): number {
  if (bytes === 0) return 0;
  let consumed = 0;
  for (let i = 0; i < text.length; i++) {
    const code = text.charCodeAt(i);
    let width: number;
    let units = 1;
    if (code < 0x80) {
      width = 1;
    } else if (code < 0x800) {
      width = 2;
    } else if (code >= 0xd800 && code <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) {
        width = 4;
        units = 2;
      } else {
        width = 3;
      }
    } else {
      width = 3;
    }
    consumed += width;
    i += units - 1;
    if (consumed === bytes) return i + 1;
    if (consumed > bytes) return -1;
  }
  return -1;
}

/**
 * Nearest code-point boundary to byte offset `bytes` of `text`, searching
 * forward or backward. Offsets outside the text clamp to its ends.
 */
export function alignByteOffset(text: string, bytes: number, forward: boolean): number {
  if (bytes <= 0) return 0;
  let consumed = 0;
  for (let i = 0; i < text.length; i++) {
    const width = utf8WidthAt(text, i);
    if (consumed + width > bytes) {
      return forward ? consumed + width : consumed;
    }
    consumed += width;
    if (width === 4) i++;
    if (consumed === bytes) return consumed;
  }
  return consumed;
}

/**
 * Count '\n' in a string (CRLF counts once, lone '\r' does not count).
 */
export function countLineBreaks(text: string): number {
  let count = 0;
  let index = text.indexOf('\n');
  while (index !== -1) {
    count++;
    index = text.indexOf('\n', index + 1);
  }
  return count;
}
