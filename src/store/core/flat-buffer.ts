/**
 * Flat backend: one string plus a table of line starts.
 * Every edit is O(length); meant for single-line inputs and short fields.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { TextBuffer, TextSource } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { invalidBoundary } from '../../types/errors.ts';
import { alignByteOffset, byteToUtf16Index, utf8WidthAt } from './encoding.ts';

interface FlatState {
  readonly text: string;
  /** Byte offset of every line start; lineStarts[0] === 0 */
  readonly lineStarts: readonly number[];
  readonly lenBytes: number;
}

function scan(text: string): FlatState {
  const lineStarts = [0];
  let bytes = 0;
  for (let i = 0; i < text.length; i++) {
    const width = utf8WidthAt(text, i);
    bytes += width;
    if (width === 4) {
      i++;
    } else if (text.charCodeAt(i) === 0x0a) {
      lineStarts.push(bytes);
    }
  }
  return Object.freeze({ text, lineStarts: Object.freeze(lineStarts), lenBytes: bytes });
}

function utf16Index(state: FlatState, offset: number): number {
  const index = byteToUtf16Index(state.text, offset);
  if (index < 0) {
    throw invalidBoundary(`Offset ${offset} splits a code point`, { offset, lenBytes: state.lenBytes });
  }
  return index;
}

/**
 * Binary search for the last line start <= offset.
 */
function lineAt(state: FlatState, offset: number): number {
  let low = 0;
  let high = state.lineStarts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >>> 1;
    if (state.lineStarts[mid] <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return low;
}

function createFlatSource(state: FlatState): TextSource {
  return {
    lenBytes: () => state.lenBytes,
    lenLines: () => state.lineStarts.length,
    lineStart: (line: number): ByteOffset => byteOffset(state.lineStarts[line] ?? state.lenBytes),
    lineAt: (offset: ByteOffset) => lineAt(state, offset),
    slice: (start: ByteOffset, end: ByteOffset) =>
      state.text.slice(utf16Index(state, start), utf16Index(state, end)),
    alignOffset: (offset: number, forward: boolean) =>
      byteOffset(alignByteOffset(state.text, offset, forward)),
  };
}

export function createFlatBuffer(text: string = ''): TextBuffer {
  let state = scan(text);

  return {
    kind: 'flat',
    lenBytes: () => state.lenBytes,
    lenLines: () => state.lineStarts.length,
    lineStart: (line: number): ByteOffset => byteOffset(state.lineStarts[line] ?? state.lenBytes),
    lineAt: (offset: ByteOffset) => lineAt(state, offset),
    slice: (start: ByteOffset, end: ByteOffset) =>
      state.text.slice(utf16Index(state, start), utf16Index(state, end)),
    alignOffset: (offset: number, forward: boolean) =>
      byteOffset(alignByteOffset(state.text, offset, forward)),
    text: () => state.text,
    insertText(offset: ByteOffset, inserted: string): void {
      const index = utf16Index(state, offset);
      state = scan(state.text.slice(0, index) + inserted + state.text.slice(index));
    },
    deleteText(start: ByteOffset, end: ByteOffset): void {
      const from = utf16Index(state, start);
      const to = utf16Index(state, end);
      state = scan(state.text.slice(0, from) + state.text.slice(to));
    },
    snapshot: () => createFlatSource(state),
  };
}
