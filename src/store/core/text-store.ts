/**
 * Text store: the validated, delta-producing document over either backend.
 *
 * The backend is chosen once from the expected-size hint and never switched:
 * below the threshold a flat string, otherwise a rope.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type { ByteRange, EditDelta, TextPosition } from '../../types/state.ts';
import type { DeleteResult, EditBoundary, GraphemeSequence, TextBuffer, TextStore } from '../../types/store.ts';
import { byteLength, isValidOffset } from '../../types/branded.ts';
import { EMPTY_OPERATION, invalidBoundary, invalidRange, type EmptyOperation } from '../../types/errors.ts';
import { countLineBreaks, utf8Length } from './encoding.ts';
import { createFlatBuffer } from './flat-buffer.ts';
import { createRopeBuffer } from './rope.ts';
import { createGraphemeSequence } from './grapheme-cursor.ts';
import {
  assertBoundary,
  byteRange,
  byteToPosition,
  isGraphemeBoundary,
  lineBytes,
  lineContentRange,
  lineText,
  positionToByte,
} from './position-codec.ts';

/**
 * Size hint (bytes) below which the flat backend is used.
 */
export const DEFAULT_FLAT_THRESHOLD = 4096;

export interface TextStoreOptions {
  /** Expected document size in bytes; defaults to the initial content size */
  readonly expectedSize?: number;
  readonly flatThreshold?: number;
}

/**
 * Pick a backend for a size hint.
 */
export function selectBackend(expectedSize: number, flatThreshold: number = DEFAULT_FLAT_THRESHOLD): 'flat' | 'rope' {
  return expectedSize < flatThreshold ? 'flat' : 'rope';
}

/**
 * Create a text store over `content`.
 */
export function createTextStore(content: string = '', options: TextStoreOptions = {}): TextStore {
  const expectedSize = options.expectedSize ?? utf8Length(content);
  const kind = selectBackend(expectedSize, options.flatThreshold);
  const buffer = kind === 'flat' ? createFlatBuffer(content) : createRopeBuffer(content);
  return createTextStoreFromBuffer(buffer);
}

/**
 * Wrap a backend with validation and edit deltas.
 */
export function createTextStoreFromBuffer(buffer: TextBuffer): TextStore {
  function checkRange(range: ByteRange): void {
    if (range.end < range.start) {
      throw invalidRange(range.start, range.end);
    }
  }

  function checkEditOffset(offset: ByteOffset, boundary: EditBoundary): void {
    if (boundary === 'grapheme') {
      assertBoundary(buffer, offset);
      return;
    }
    if (!isValidOffset(offset) || offset > buffer.lenBytes() || buffer.alignOffset(offset, false) !== offset) {
      throw invalidBoundary(`Offset ${offset} is not a code-point boundary`, { offset, lenBytes: buffer.lenBytes() });
    }
  }

  let lowestChange: ByteOffset | null = null;

  function noteChange(offset: ByteOffset): void {
    if (lowestChange === null || offset < lowestChange) lowestChange = offset;
  }

  const store: TextStore = {
    kind: buffer.kind,
    lenBytes: () => buffer.lenBytes(),
    lenLines: () => buffer.lenLines(),
    lineStart: (line: number) => buffer.lineStart(line),
    lineAt: (offset: ByteOffset) => buffer.lineAt(offset),
    slice: (start: ByteOffset, end: ByteOffset) => buffer.slice(start, end),
    alignOffset: (offset: number, forward: boolean) => buffer.alignOffset(offset, forward),
    text: () => buffer.text(),
    lineBytes: (line: number) => lineBytes(buffer, line),
    lineContent: (line: number) => lineContentRange(buffer, line),
    lineText: (line: number) => lineText(buffer, line),

    graphemes(range?: ByteRange): GraphemeSequence {
      const target = range ?? byteRange(0, buffer.lenBytes());
      checkRange(target);
      if (!isValidOffset(target.start) || target.end > buffer.lenBytes()) {
        throw invalidBoundary(`Range [${target.start}, ${target.end}) out of bounds`, {
          start: target.start,
          end: target.end,
          lenBytes: buffer.lenBytes(),
        });
      }
      return createGraphemeSequence(buffer.snapshot(), target);
    },

    isBoundary: (offset: ByteOffset) => isGraphemeBoundary(buffer, offset),

    insert(offset: ByteOffset, text: string, boundary: EditBoundary = 'grapheme'): EditDelta | EmptyOperation {
      checkEditOffset(offset, boundary);
      if (text.length === 0) return EMPTY_OPERATION;

      const line = buffer.lineAt(offset);
      buffer.insertText(offset, text);
      noteChange(offset);
      return Object.freeze({
        kind: 'insert' as const,
        offset,
        removedLength: byteLength(0),
        insertedLength: byteLength(utf8Length(text)),
        line,
        removedLineBreaks: 0,
        insertedLineBreaks: countLineBreaks(text),
      });
    },

    delete(range: ByteRange, boundary: EditBoundary = 'grapheme'): DeleteResult | EmptyOperation {
      checkRange(range);
      checkEditOffset(range.start, boundary);
      checkEditOffset(range.end, boundary);
      if (range.start === range.end) return EMPTY_OPERATION;

      const removed = buffer.slice(range.start, range.end);
      const line = buffer.lineAt(range.start);
      buffer.deleteText(range.start, range.end);
      noteChange(range.start);
      const delta: EditDelta = Object.freeze({
        kind: 'delete' as const,
        offset: range.start,
        removedLength: byteLength(range.end - range.start),
        insertedLength: byteLength(0),
        line,
        removedLineBreaks: countLineBreaks(removed),
        insertedLineBreaks: 0,
      });
      return Object.freeze({ removed, delta });
    },

    byteToPosition: (offset: ByteOffset) => byteToPosition(buffer, offset),
    positionToByte: (position: TextPosition) => positionToByte(buffer, position),
    snapshot: () => buffer.snapshot(),

    minChanged(): ByteOffset | null {
      const value = lowestChange;
      lowestChange = null;
      return value;
    },
  };

  return store;
}

