/**
 * Rope: a persistent red-black tree of text chunks.
 * In-order traversal yields the document. Each node caches subtree byte and
 * line-break totals so offset and line lookups are O(log n).
 */

import type { NodeColor, RopeNode, RopeState } from '../../types/state.ts';
import type { ByteOffset } from '../../types/branded.ts';
import type { TextBuffer, TextSource } from '../../types/store.ts';
import { byteOffset } from '../../types/branded.ts';
import { invalidBoundary } from '../../types/errors.ts';
import { alignByteOffset, byteToUtf16Index, countLineBreaks, utf8Length, utf8WidthAt } from './encoding.ts';
import {
  computeBlackHeight,
  ensureBlackRoot,
  fromSequence,
  inOrder,
  join,
  join2,
  type WithNodeFn,
} from './rb-tree.ts';

/**
 * Upper bound for chunk size, in UTF-16 units.
 */
export const MAX_CHUNK_LENGTH = 512;

// =============================================================================
// Node Construction
// =============================================================================

/**
 * Create a new rope node.
 */
export function createRopeNode(
  chunk: string,
  color: NodeColor = 'red',
  left: RopeNode | null = null,
  right: RopeNode | null = null
): RopeNode {
  const chunkBytes = utf8Length(chunk);
  const chunkLineBreaks = countLineBreaks(chunk);
  return Object.freeze({
    color,
    left,
    right,
    blackHeight: computeBlackHeight(color, left),
    chunk,
    chunkBytes,
    chunkLineBreaks,
    subtreeBytes: (left?.subtreeBytes ?? 0) + chunkBytes + (right?.subtreeBytes ?? 0),
    subtreeLineBreaks: (left?.subtreeLineBreaks ?? 0) + chunkLineBreaks + (right?.subtreeLineBreaks ?? 0),
  });
}

/**
 * Create a new node with updated properties, recalculating aggregates.
 */
export function withRopeNode(
  node: RopeNode,
  updates: Partial<{ color: NodeColor; left: RopeNode | null; right: RopeNode | null; chunk: string }>
): RopeNode {
  const color = updates.color ?? node.color;
  const left = updates.left !== undefined ? updates.left : node.left;
  const right = updates.right !== undefined ? updates.right : node.right;

  if (updates.chunk !== undefined) {
    return createRopeNode(updates.chunk, color, left, right);
  }

  return Object.freeze({
    color,
    left,
    right,
    blackHeight: computeBlackHeight(color, left),
    chunk: node.chunk,
    chunkBytes: node.chunkBytes,
    chunkLineBreaks: node.chunkLineBreaks,
    subtreeBytes: (left?.subtreeBytes ?? 0) + node.chunkBytes + (right?.subtreeBytes ?? 0),
    subtreeLineBreaks: (left?.subtreeLineBreaks ?? 0) + node.chunkLineBreaks + (right?.subtreeLineBreaks ?? 0),
  });
}

const withRope: WithNodeFn<RopeNode> = (node, updates) => withRopeNode(node, updates);

/**
 * Cut text into chunks of at most MAX_CHUNK_LENGTH units without
 * separating a surrogate pair.
 */
export function chunkText(text: string): string[] {
  const chunks: string[] = [];
  let start = 0;
  while (start < text.length) {
    let end = Math.min(text.length, start + MAX_CHUNK_LENGTH);
    if (end < text.length) {
      const last = text.charCodeAt(end - 1);
      if (last >= 0xd800 && last <= 0xdbff) end--;
    }
    chunks.push(text.slice(start, end));
    start = end;
  }
  return chunks;
}

function buildTree(text: string): RopeNode | null {
  return fromSequence(chunkText(text).map(chunk => createRopeNode(chunk)), withRope);
}

/**
 * Build a rope state from text.
 */
export function createRopeState(text: string = ''): RopeState {
  return Object.freeze({ root: buildTree(text) });
}

// =============================================================================
// Queries
// =============================================================================

export function ropeLength(state: RopeState): number {
  return state.root?.subtreeBytes ?? 0;
}

export function ropeLineBreaks(state: RopeState): number {
  return state.root?.subtreeLineBreaks ?? 0;
}

/**
 * Entire content. O(n).
 */
export function ropeText(state: RopeState): string {
  let text = '';
  for (const node of inOrder(state.root)) {
    text += node.chunk;
  }
  return text;
}

/**
 * UTF-16 index for a byte offset inside a chunk; throws on a split code point.
 */
function chunkIndex(chunk: string, bytes: number, documentOffset: number): number {
  const index = byteToUtf16Index(chunk, bytes);
  if (index < 0) {
    throw invalidBoundary(`Offset ${documentOffset} splits a code point`, { offset: documentOffset });
  }
  return index;
}

/**
 * Text in [start, end). O(log n + m).
 */
export function ropeSlice(state: RopeState, start: number, end: number): string {
  const parts: string[] = [];

  function collect(node: RopeNode | null, offset: number): void {
    if (node === null) return;
    if (offset + node.subtreeBytes <= start || offset >= end) return;

    const leftBytes = node.left?.subtreeBytes ?? 0;
    const chunkStart = offset + leftBytes;
    const chunkEnd = chunkStart + node.chunkBytes;

    if (start < chunkStart) {
      collect(node.left, offset);
    }
    if (chunkEnd > start && chunkStart < end) {
      const from = start > chunkStart ? chunkIndex(node.chunk, start - chunkStart, start) : 0;
      const to = end < chunkEnd ? chunkIndex(node.chunk, end - chunkStart, end) : node.chunk.length;
      parts.push(node.chunk.slice(from, to));
    }
    if (end > chunkEnd) {
      collect(node.right, chunkEnd);
    }
  }

  collect(state.root, 0);
  return parts.join('');
}

/**
 * Byte offset where `line` starts. O(log n + chunk).
 */
export function ropeLineStart(state: RopeState, line: number): number {
  if (line <= 0) return 0;
  let node = state.root;
  let offset = 0;
  let remaining = line;

  while (node !== null) {
    const leftBreaks = node.left?.subtreeLineBreaks ?? 0;
    if (remaining <= leftBreaks) {
      node = node.left;
      continue;
    }
    const leftBytes = node.left?.subtreeBytes ?? 0;
    remaining -= leftBreaks;
    if (remaining <= node.chunkLineBreaks) {
      let index = -1;
      for (let i = 0; i < remaining; i++) {
        index = node.chunk.indexOf('\n', index + 1);
      }
      return offset + leftBytes + utf8Length(node.chunk, 0, index + 1);
    }
    remaining -= node.chunkLineBreaks;
    offset += leftBytes + node.chunkBytes;
    node = node.right;
  }
  return offset;
}

/**
 * Number of '\n' in the first `bytes` bytes of a chunk.
 */
function lineBreaksInPrefix(chunk: string, bytes: number): number {
  let count = 0;
  let consumed = 0;
  for (let i = 0; i < chunk.length && consumed < bytes; i++) {
    const width = utf8WidthAt(chunk, i);
    if (chunk.charCodeAt(i) === 0x0a) count++;
    consumed += width;
    if (width === 4) i++;
  }
  return count;
}

/**
 * Line containing `offset`: the number of '\n' before it. O(log n + chunk).
 */
export function ropeLineAt(state: RopeState, offset: number): number {
  let node = state.root;
  let target = offset;
  let line = 0;

  while (node !== null) {
    const leftBytes = node.left?.subtreeBytes ?? 0;
    if (target <= leftBytes) {
      node = node.left;
      continue;
    }
    const leftBreaks = node.left?.subtreeLineBreaks ?? 0;
    if (target <= leftBytes + node.chunkBytes) {
      return line + leftBreaks + lineBreaksInPrefix(node.chunk, target - leftBytes);
    }
    line += leftBreaks + node.chunkLineBreaks;
    target -= leftBytes + node.chunkBytes;
    node = node.right;
  }
  return line;
}

// =============================================================================
// Split
// =============================================================================

/**
 * Split into [0, offset) and [offset, end). A chunk containing `offset`
 * is cut in two.
 */
export function ropeSplit(
  node: RopeNode | null,
  offset: number,
  documentOffset: number = offset
): [RopeNode | null, RopeNode | null] {
  if (node === null) return [null, null];

  const leftBytes = node.left?.subtreeBytes ?? 0;
  if (offset <= leftBytes) {
    const [left, right] = ropeSplit(node.left, offset, documentOffset);
    return [left, join(right, node, node.right, withRope)];
  }

  const chunkEnd = leftBytes + node.chunkBytes;
  if (offset >= chunkEnd) {
    const [left, right] = ropeSplit(node.right, offset - chunkEnd, documentOffset);
    return [join(node.left, node, left, withRope), right];
  }

  const index = chunkIndex(node.chunk, offset - leftBytes, documentOffset);
  const head = createRopeNode(node.chunk.slice(0, index));
  const tail = createRopeNode(node.chunk.slice(index));
  return [join(node.left, head, null, withRope), join(null, tail, node.right, withRope)];
}

// =============================================================================
// Edits
// =============================================================================

/**
 * Replace the chunk that holds [start, end) with `edit(chunk, from, to)`,
 * keeping the tree shape. Returns null when the range spans chunks.
 */
function editWithinChunk(
  node: RopeNode | null,
  start: number,
  end: number,
  edit: (chunk: string, from: number, to: number) => string | null,
  documentOffset: number
): RopeNode | null {
  if (node === null) return null;

  const leftBytes = node.left?.subtreeBytes ?? 0;
  const chunkEnd = leftBytes + node.chunkBytes;

  if (end < leftBytes || (end === leftBytes && start < leftBytes)) {
    const left = editWithinChunk(node.left, start, end, edit, documentOffset);
    return left === null ? null : withRopeNode(node, { left });
  }
  if (start > chunkEnd || (start === chunkEnd && end > chunkEnd)) {
    const right = editWithinChunk(node.right, start - chunkEnd, end - chunkEnd, edit, documentOffset);
    return right === null ? null : withRopeNode(node, { right });
  }
  if (start < leftBytes || end > chunkEnd) return null;

  const from = chunkIndex(node.chunk, start - leftBytes, documentOffset);
  const to = chunkIndex(node.chunk, end - leftBytes, documentOffset + (end - start));
  const chunk = edit(node.chunk, from, to);
  return chunk === null ? null : withRopeNode(node, { chunk });
}

/**
 * Insert text at a byte offset. O(log n + m).
 */
export function ropeInsert(state: RopeState, offset: number, text: string): RopeState {
  if (text.length === 0) return state;
  if (state.root === null) return createRopeState(text);

  const patched = text.length < MAX_CHUNK_LENGTH
    ? editWithinChunk(
        state.root,
        offset,
        offset,
        (chunk, from) => chunk.length + text.length <= MAX_CHUNK_LENGTH
          ? chunk.slice(0, from) + text + chunk.slice(from)
          : null,
        offset
      )
    : null;
  if (patched !== null) {
    return Object.freeze({ root: patched });
  }

  const [left, right] = ropeSplit(state.root, offset);
  const middle = buildTree(text);
  const root = join2(join2(left, middle, withRope), right, withRope);
  return Object.freeze({ root: root === null ? null : ensureBlackRoot(root, withRope) });
}

/**
 * Delete [start, end). O(log n).
 */
export function ropeDelete(state: RopeState, start: number, end: number): RopeState {
  if (end <= start || state.root === null) return state;

  const patched = editWithinChunk(
    state.root,
    start,
    end,
    (chunk, from, to) => (to - from < chunk.length ? chunk.slice(0, from) + chunk.slice(to) : null),
    start
  );
  if (patched !== null) {
    return Object.freeze({ root: patched });
  }

  const [left, rest] = ropeSplit(state.root, start);
  const [, right] = ropeSplit(rest, end - start, end);
  const root = join2(left, right, withRope);
  return Object.freeze({ root: root === null ? null : ensureBlackRoot(root, withRope) });
}

// =============================================================================
// Buffer
// =============================================================================

/**
 * Read-only TextSource over one rope version.
 */
/**
 * Nearest code-point boundary to `offset`. Chunk edges are always boundaries,
 * so only the chunk holding `offset` is scanned.
 */
export function ropeAlign(state: RopeState, offset: number, forward: boolean): number {
  const total = ropeLength(state);
  if (offset <= 0) return 0;
  if (offset >= total) return total;

  let node = state.root;
  let base = 0;
  while (node !== null) {
    const leftBytes = node.left?.subtreeBytes ?? 0;
    const chunkStart = base + leftBytes;
    const chunkEnd = chunkStart + node.chunkBytes;
    if (offset < chunkStart) {
      node = node.left;
    } else if (offset >= chunkEnd) {
      base = chunkEnd;
      node = node.right;
    } else {
      return chunkStart + alignByteOffset(node.chunk, offset - chunkStart, forward);
    }
  }
  return total;
}

export function createRopeSource(state: RopeState): TextSource {
  return {
    lenBytes: () => ropeLength(state),
    lenLines: () => ropeLineBreaks(state) + 1,
    lineStart: (line: number): ByteOffset => byteOffset(ropeLineStart(state, line)),
    lineAt: (offset: ByteOffset) => ropeLineAt(state, offset),
    slice: (start: ByteOffset, end: ByteOffset) => ropeSlice(state, start, end),
    alignOffset: (offset: number, forward: boolean) => byteOffset(ropeAlign(state, offset, forward)),
  };
}

/**
 * Multi-line backend for large documents.
 */
export function createRopeBuffer(text: string = ''): TextBuffer {
  let state = createRopeState(text);

  return {
    kind: 'rope',
    lenBytes: () => ropeLength(state),
    lenLines: () => ropeLineBreaks(state) + 1,
    lineStart: (line: number): ByteOffset => byteOffset(ropeLineStart(state, line)),
    lineAt: (offset: ByteOffset) => ropeLineAt(state, offset),
    slice: (start: ByteOffset, end: ByteOffset) => ropeSlice(state, start, end),
    alignOffset: (offset: number, forward: boolean) => byteOffset(ropeAlign(state, offset, forward)),
    text: () => ropeText(state),
    insertText(offset: ByteOffset, inserted: string): void {
      state = ropeInsert(state, offset, inserted);
    },
    deleteText(start: ByteOffset, end: ByteOffset): void {
      state = ropeDelete(state, start, end);
    },
    snapshot: () => createRopeSource(state),
  };
}
