/**
 * Undo engine: grouped, capped, invertible edit history.
 *
 * The engine never touches the document. Undo and redo hand each record to
 * a replayer supplied by the caller, which applies or reverts it against
 * the store and the style index.
 */

import type { SelectionState, UndoDeleteRecord, UndoGroup, UndoInsertRecord, UndoRecord } from '../../types/state.ts';
import type { UndoEngine, UndoEngineConfig, UndoReplayer } from '../../types/store.ts';
import { byteLength, byteOffset } from '../../types/branded.ts';
import { countGraphemes } from '../core/graphemes.ts';

export const DEFAULT_UNDO_CONFIG: UndoEngineConfig = Object.freeze({
  limit: 1000,
  coalesceTimeout: 0,
});

// =============================================================================
// Coalescing
// =============================================================================

/**
 * Whether a lone record can merge into the previous implicit group:
 * contiguous single-grapheme typing or deleting within the timeout.
 */
function canCoalesce(last: UndoGroup, incoming: UndoRecord, timeout: number): boolean {
  if (timeout <= 0) return false;
  if (incoming.timestamp - last.timestamp > timeout) return false;
  if (last.records.length !== 1) return false;
  if (countGraphemes(incoming.text) !== 1) return false;

  const previous = last.records[0];
  if (previous.type !== incoming.type) return false;

  switch (incoming.type) {
    case 'insert':
      return incoming.offset === previous.offset + previous.byteLength;
    case 'delete': {
      if (previous.type !== 'delete') return false;
      // Style changes must replay in their own order
      if (previous.styles.length > 0 || incoming.styles.length > 0) return false;
      // Backspace ends where the previous delete started; forward delete repeats its offset
      return incoming.offset + incoming.byteLength === previous.offset || incoming.offset === previous.offset;
    }
  }
}

function mergeRecords(previous: UndoRecord, incoming: UndoRecord): UndoRecord {
  const length = byteLength(previous.byteLength + incoming.byteLength);
  if (incoming.type === 'insert') {
    const merged: UndoInsertRecord = {
      type: 'insert',
      offset: previous.offset,
      text: previous.text + incoming.text,
      byteLength: length,
      selectionBefore: previous.selectionBefore,
      selectionAfter: incoming.selectionAfter,
      timestamp: incoming.timestamp,
    };
    return Object.freeze(merged);
  }

  const backspace = incoming.offset + incoming.byteLength === previous.offset;
  const merged: UndoDeleteRecord = {
    type: 'delete',
    offset: backspace ? incoming.offset : previous.offset,
    text: backspace ? incoming.text + previous.text : previous.text + incoming.text,
    byteLength: length,
    styles: [],
    selectionBefore: previous.selectionBefore,
    selectionAfter: incoming.selectionAfter,
    timestamp: incoming.timestamp,
  };
  return Object.freeze(merged);
}

function groupOf(records: readonly UndoRecord[], before: SelectionState, after: SelectionState, timestamp: number): UndoGroup {
  return Object.freeze({
    records: Object.freeze([...records]),
    selectionBefore: before,
    selectionAfter: after,
    timestamp,
  });
}

// =============================================================================
// Engine
// =============================================================================

/**
 * Create an undo engine.
 * Idle -> beginGroup -> Grouping -> endGroup -> Idle; nested pairs only
 * count depth and the outermost pair delimits the group.
 */
export function createUndoEngine(config: Partial<UndoEngineConfig> = {}): UndoEngine {
  const { coalesceTimeout } = { ...DEFAULT_UNDO_CONFIG, ...config };
  let limit = config.limit ?? DEFAULT_UNDO_CONFIG.limit;
  let undoStack: UndoGroup[] = [];
  let redoStack: UndoGroup[] = [];
  let depth = 0;
  let pending: UndoRecord[] = [];
  let pendingBefore: SelectionState = { anchor: byteOffset(0), head: byteOffset(0) };
  // Only a group made by a lone `record` may absorb the next one
  let lastImplicit = false;

  function push(group: UndoGroup): void {
    undoStack.push(group);
    if (undoStack.length > limit) {
      undoStack = undoStack.slice(undoStack.length - limit);
    }
  }

  function beginGroup(selection: SelectionState): void {
    if (depth === 0) {
      pending = [];
      pendingBefore = selection;
    }
    depth++;
  }

  function endGroup(selection: SelectionState): void {
    if (depth <= 0) {
      console.warn('endGroup called without a matching beginGroup');
      return;
    }
    depth--;
    if (depth > 0) return;

    const records = pending;
    pending = [];
    lastImplicit = false;
    if (records.length === 0) return;
    const last = records[records.length - 1];
    push(groupOf(records, pendingBefore, selection, last.timestamp));
  }

  function record(entry: UndoRecord): void {
    redoStack = [];

    if (depth > 0) {
      pending.push(entry);
      return;
    }

    const last = undoStack[undoStack.length - 1];
    if (lastImplicit && last !== undefined && canCoalesce(last, entry, coalesceTimeout)) {
      const merged = mergeRecords(last.records[0], entry);
      undoStack[undoStack.length - 1] = groupOf([merged], last.selectionBefore, entry.selectionAfter, entry.timestamp);
      return;
    }

    push(groupOf([entry], entry.selectionBefore, entry.selectionAfter, entry.timestamp));
    lastImplicit = true;
  }

  function undo(replayer: UndoReplayer): SelectionState | null {
    if (depth > 0) {
      console.warn('undo ignored while an undo group is open');
      return null;
    }
    const group = undoStack[undoStack.length - 1];
    if (group === undefined) return null;

    for (let i = group.records.length - 1; i >= 0; i--) {
      replayer.revert(group.records[i]);
    }
    undoStack.pop();
    redoStack.push(group);
    lastImplicit = false;
    return group.selectionBefore;
  }

  function redo(replayer: UndoReplayer): SelectionState | null {
    if (depth > 0) {
      console.warn('redo ignored while an undo group is open');
      return null;
    }
    const group = redoStack[redoStack.length - 1];
    if (group === undefined) return null;

    for (const entry of group.records) {
      replayer.apply(entry);
    }
    redoStack.pop();
    push(group);
    lastImplicit = false;
    return group.selectionAfter;
  }

  function clear(): void {
    undoStack = [];
    redoStack = [];
    pending = [];
    depth = 0;
    lastImplicit = false;
  }

  function setLimit(value: number): void {
    limit = Math.max(0, value);
    if (undoStack.length > limit) {
      undoStack = undoStack.slice(undoStack.length - limit);
    }
  }

  return {
    beginGroup,
    endGroup,
    record,
    undo,
    redo,
    remainingUndo: () => undoStack.length,
    remainingRedo: () => redoStack.length,
    clear,
    setLimit,
    get depth() { return depth; },
    get isGrouping() { return depth > 0; },
  };
}
