/**
 * Style index: caller-supplied style spans kept in a persistent red-black
 * tree ordered by start offset.
 *
 * Starts are stored as gaps from the in-order predecessor's start, so the
 * absolute start of a node is the sum of all gaps up to and including it.
 * Shifting every span after an edit point is then a single update to the
 * first gap past that point. `maxEnd` prunes overlap queries.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type {
  ByteRange,
  EditDelta,
  NodeColor,
  StyleChange,
  StyleIndexState,
  StyleNode,
  StyleSpan,
  StyleTag,
} from '../../types/state.ts';
import { byteOffset } from '../../types/branded.ts';
import { invalidRange } from '../../types/errors.ts';
import {
  computeBlackHeight,
  ensureBlackRoot,
  fromSequence,
  inOrder,
  join,
  join2,
  type WithNodeFn,
} from './rb-tree.ts';

// =============================================================================
// Node Construction
// =============================================================================

export function createStyleNode(
  gap: number,
  length: number,
  tag: StyleTag,
  color: NodeColor = 'red',
  left: StyleNode | null = null,
  right: StyleNode | null = null
): StyleNode {
  const leftGaps = left?.gapSum ?? 0;
  const start = leftGaps + gap;
  let maxEnd = start + length;
  if (left !== null) maxEnd = Math.max(maxEnd, left.maxEnd);
  if (right !== null) maxEnd = Math.max(maxEnd, start + right.maxEnd);

  return Object.freeze({
    color,
    left,
    right,
    blackHeight: computeBlackHeight(color, left),
    gap,
    length,
    tag,
    count: (left?.count ?? 0) + 1 + (right?.count ?? 0),
    gapSum: start + (right?.gapSum ?? 0),
    maxEnd,
  });
}

/**
 * Create a new node with updated properties, recalculating aggregates.
 */
export function withStyleNode(
  node: StyleNode,
  updates: Partial<{
    color: NodeColor;
    left: StyleNode | null;
    right: StyleNode | null;
    gap: number;
    length: number;
  }>
): StyleNode {
  return createStyleNode(
    updates.gap ?? node.gap,
    updates.length ?? node.length,
    node.tag,
    updates.color ?? node.color,
    updates.left !== undefined ? updates.left : node.left,
    updates.right !== undefined ? updates.right : node.right
  );
}

const withStyle: WithNodeFn<StyleNode> = (node, updates) => withStyleNode(node, updates);

function gapSum(node: StyleNode | null): number {
  return node?.gapSum ?? 0;
}

function finish(root: StyleNode | null): StyleIndexState {
  return Object.freeze({ root: root === null ? null : ensureBlackRoot(root, withStyle) });
}

function span(start: number, end: number, tag: StyleTag): StyleSpan {
  return Object.freeze({ range: Object.freeze({ start: byteOffset(start), end: byteOffset(end) }), tag });
}

// =============================================================================
// Split Helpers
// =============================================================================

interface StyleSplit {
  readonly left: StyleNode | null;
  readonly right: StyleNode | null;
}

/**
 * Split into spans starting before `position` and the rest. `base` is the
 * absolute start the subtree's gaps are measured from. The right half keeps
 * its gaps relative to the left half.
 */
function splitBefore(node: StyleNode | null, base: number, position: number): StyleSplit {
  if (node === null) return { left: null, right: null };
  const start = base + gapSum(node.left) + node.gap;
  if (position <= start) {
    const { left, right } = splitBefore(node.left, base, position);
    return { left, right: join(right, node, node.right, withStyle) };
  }
  const { left, right } = splitBefore(node.right, start, position);
  return { left: join(node.left, node, left, withStyle), right };
}

/**
 * Split off the first `index` spans.
 */
function splitAtIndex(node: StyleNode | null, index: number): StyleSplit {
  if (node === null) return { left: null, right: null };
  const leftCount = node.left?.count ?? 0;
  if (index <= leftCount) {
    const { left, right } = splitAtIndex(node.left, index);
    return { left, right: join(right, node, node.right, withStyle) };
  }
  const { left, right } = splitAtIndex(node.right, index - leftCount - 1);
  return { left: join(node.left, node, left, withStyle), right };
}

/**
 * Add `delta` to the first gap of a tree, moving every span in it.
 */
function shiftFirst(node: StyleNode | null, delta: number): StyleNode | null {
  if (node === null || delta === 0) return node;
  if (node.left === null) return withStyleNode(node, { gap: node.gap + delta });
  return withStyleNode(node, { left: shiftFirst(node.left, delta) });
}

/**
 * Rewrite the length of every span ending at or after `threshold`.
 * Visits spans in order; subtrees ending before the threshold are skipped.
 */
function updateLengths(
  node: StyleNode | null,
  base: number,
  threshold: number,
  update: (start: number, end: number, tag: StyleTag) => number
): StyleNode | null {
  if (node === null || base + node.maxEnd < threshold) return node;
  const start = base + gapSum(node.left) + node.gap;
  const left = updateLengths(node.left, base, threshold, update);
  const end = start + node.length;
  const length = end >= threshold ? update(start, end, node.tag) : node.length;
  const right = updateLengths(node.right, start, threshold, update);
  if (left === node.left && right === node.right && length === node.length) return node;
  return withStyleNode(node, { left, right, length });
}

function insertSpan(root: StyleNode | null, start: number, length: number, tag: StyleTag): StyleNode {
  // Equal starts keep insertion order
  const { left, right } = splitBefore(root, 0, start + 1);
  const gap = start - gapSum(left);
  return join(left, createStyleNode(gap, length, tag), shiftFirst(right, -gap), withStyle);
}

function removeSpan(root: StyleNode | null, start: number, end: number, tag: StyleTag): StyleNode | null {
  const { left, right: rest } = splitBefore(root, 0, start);
  let position = gapSum(left);
  let index = 0;
  let found = -1;
  for (const node of inOrder(rest)) {
    position += node.gap;
    if (position > start) break;
    if (node.length === end - start && node.tag === tag) {
      found = index;
      break;
    }
    index++;
  }
  if (found < 0) return root;

  const { left: before, right: tail } = splitAtIndex(rest, found);
  const { left: target, right: after } = splitAtIndex(tail, 1);
  return join2(join2(left, before, withStyle), shiftFirst(after, gapSum(target)), withStyle);
}

function visitOverlapping(
  node: StyleNode | null,
  base: number,
  low: number,
  high: number,
  out: StyleSpan[]
): void {
  if (node === null || base + node.maxEnd <= low) return;
  const start = base + gapSum(node.left) + node.gap;
  visitOverlapping(node.left, base, low, high, out);
  if (start >= high) return;
  if (start + node.length > low) out.push(span(start, start + node.length, node.tag));
  visitOverlapping(node.right, start, low, high, out);
}

// =============================================================================
// Construction
// =============================================================================

export function createStyleIndex(spans: Iterable<StyleSpan> = []): StyleIndexState {
  return styleIndexSet(spans);
}

/**
 * Replace every span. Empty spans and exact duplicates are dropped; spans
 * with equal starts keep their given order.
 */
export function styleIndexSet(spans: Iterable<StyleSpan>): StyleIndexState {
  const seen = new Set<string>();
  const sorted: StyleSpan[] = [];
  for (const item of spans) {
    if (item.range.end < item.range.start) throw invalidRange(item.range.start, item.range.end);
    if (item.range.end === item.range.start) continue;
    const key = `${item.range.start}:${item.range.end}:${item.tag}`;
    if (seen.has(key)) continue;
    seen.add(key);
    sorted.push(item);
  }
  sorted.sort((a, b) => a.range.start - b.range.start);

  let previous = 0;
  const nodes = sorted.map(item => {
    const node = createStyleNode(item.range.start - previous, item.range.end - item.range.start, item.tag);
    previous = item.range.start;
    return node;
  });
  return finish(fromSequence(nodes, withStyle));
}

// =============================================================================
// Queries
// =============================================================================

export function styleCount(state: StyleIndexState): number {
  return state.root?.count ?? 0;
}

/**
 * Spans overlapping `range`, ordered by start. An empty range selects the
 * spans containing its offset. O(log n + k).
 */
export function stylesIn(state: StyleIndexState, range: ByteRange): StyleSpan[] {
  if (range.end < range.start) throw invalidRange(range.start, range.end);
  const out: StyleSpan[] = [];
  visitOverlapping(state.root, 0, range.start, Math.max(range.end, range.start + 1), out);
  return out;
}

/**
 * Tags of spans with start <= offset < end, ordered by start.
 */
export function stylesAt(state: StyleIndexState, offset: ByteOffset): StyleTag[] {
  const out: StyleSpan[] = [];
  visitOverlapping(state.root, 0, offset, offset + 1, out);
  return out.map(item => item.tag);
}

/**
 * Range of a span tagged `tag` with start <= offset < end, or null.
 */
export function styleMatch(state: StyleIndexState, offset: ByteOffset, tag: StyleTag): ByteRange | null {
  const out: StyleSpan[] = [];
  visitOverlapping(state.root, 0, offset, offset + 1, out);
  return out.find(item => item.tag === tag)?.range ?? null;
}

/**
 * Every span in order. O(n).
 */
export function collectSpans(state: StyleIndexState): StyleSpan[] {
  const out: StyleSpan[] = [];
  let start = 0;
  for (const node of inOrder(state.root)) {
    start += node.gap;
    out.push(span(start, start + node.length, node.tag));
  }
  return out;
}

// =============================================================================
// Mutations
// =============================================================================

/**
 * Add a span. Empty ranges and exact duplicates leave the state unchanged.
 */
export function styleIndexAdd(state: StyleIndexState, range: ByteRange, tag: StyleTag): StyleIndexState {
  if (range.end < range.start) throw invalidRange(range.start, range.end);
  if (range.end === range.start) return state;
  const duplicate = stylesIn(state, { start: range.start, end: range.start }).some(
    item => item.range.start === range.start && item.range.end === range.end && item.tag === tag
  );
  if (duplicate) return state;
  return finish(insertSpan(state.root, range.start, range.end - range.start, tag));
}

/**
 * Remove one span matching range and tag exactly. No match leaves the state unchanged.
 */
export function styleIndexRemove(state: StyleIndexState, range: ByteRange, tag: StyleTag): StyleIndexState {
  const root = removeSpan(state.root, range.start, range.end, tag);
  return root === state.root ? state : finish(root);
}

export interface StyleEditResult {
  readonly state: StyleIndexState;
  /** Spans touching a deleted range, for undo */
  readonly changes: readonly StyleChange[];
}

/**
 * Move spans through one store edit.
 *
 * Insert of d bytes at p: every boundary >= p moves by d.
 * Delete of [a, b): boundaries inside collapse to a, boundaries >= b move
 * by a - b, and spans left empty are dropped. Every span with
 * start <= b and end >= a is reported in `changes`.
 */
export function applyEditToStyles(state: StyleIndexState, delta: EditDelta): StyleEditResult {
  if (state.root === null) return { state, changes: [] };
  return delta.kind === 'insert'
    ? { state: shiftForInsert(state, delta.offset, delta.insertedLength), changes: [] }
    : shiftForDelete(state, delta.offset, delta.offset + delta.removedLength);
}

function shiftForInsert(state: StyleIndexState, position: number, inserted: number): StyleIndexState {
  if (inserted === 0) return state;
  const { left, right } = splitBefore(state.root, 0, position);
  const stretched = updateLengths(left, 0, position, (start, end) => end - start + inserted);
  return finish(join2(stretched, shiftFirst(right, inserted), withStyle));
}

function shiftForDelete(state: StyleIndexState, a: number, b: number): StyleEditResult {
  const removed = b - a;
  const changes: StyleChange[] = [];
  const mapEnd = (end: number) => (end <= b ? a : end - removed);

  const { left: head, right: rest } = splitBefore(state.root, 0, a);
  const headBase = gapSum(head);
  const { left: inside, right: tail } = splitBefore(rest, headBase, b);
  const tailBase = headBase + gapSum(inside);

  const newHead = updateLengths(head, 0, a, (start, end, tag) => {
    const newEnd = mapEnd(end);
    changes.push({ before: byteRangeOf(start, end), after: byteRangeOf(start, newEnd), tag });
    return newEnd - start;
  });

  const kept: StyleNode[] = [];
  let position = headBase;
  for (const node of inOrder(inside)) {
    position += node.gap;
    const newEnd = mapEnd(position + node.length);
    const survives = newEnd > a;
    changes.push({
      before: byteRangeOf(position, position + node.length),
      after: survives ? byteRangeOf(a, newEnd) : null,
      tag: node.tag,
    });
    if (survives) {
      kept.push(createStyleNode(kept.length === 0 ? a - headBase : 0, newEnd - a, node.tag));
    }
  }
  const newInside = fromSequence(kept, withStyle);

  position = tailBase;
  for (const node of inOrder(tail)) {
    position += node.gap;
    if (position > b) break;
    const end = position + node.length;
    changes.push({ before: byteRangeOf(position, end), after: byteRangeOf(a, end - removed), tag: node.tag });
  }

  const newTailBase = headBase + gapSum(newInside);
  const newTail = shiftFirst(tail, tailBase - removed - newTailBase);
  const root = join2(join2(newHead, newInside, withStyle), newTail, withStyle);
  return { state: finish(root), changes };
}

function byteRangeOf(start: number, end: number): ByteRange {
  return Object.freeze({ start: byteOffset(start), end: byteOffset(end) });
}

// =============================================================================
// Undo Support
// =============================================================================

/**
 * Drop the post-delete form of each changed span. Run before the deleted
 * text is re-inserted.
 */
export function removeChangedSpans(state: StyleIndexState, changes: readonly StyleChange[]): StyleIndexState {
  let root = state.root;
  for (const change of changes) {
    if (change.after !== null) {
      root = removeSpan(root, change.after.start, change.after.end, change.tag);
    }
  }
  return root === state.root ? state : finish(root);
}

/**
 * Put back the pre-delete form of each changed span. Run after the deleted
 * text is re-inserted.
 */
export function restoreStyleChanges(state: StyleIndexState, changes: readonly StyleChange[]): StyleIndexState {
  let root = state.root;
  for (const change of changes) {
    const { start, end } = change.before;
    root = insertSpan(root, start, end - start, change.tag);
  }
  return root === state.root ? state : finish(root);
}
