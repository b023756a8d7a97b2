/**
 * Text editor: the widget-state owner of one document.
 *
 * An editor exclusively owns its text store, style index, undo engine and
 * line-metrics cache. Every mutating command runs the same pipeline:
 * validate, mutate the store, push the EditDelta to the style index, the
 * cache and the selection, record the inverse, then notify.
 *
 * Commands never throw TextError. A rejected command leaves the document
 * unchanged, is kept as `lastError` and reports 'unchanged'.
 */

import type { ByteOffset } from '../../types/branded.ts';
import type {
  ByteRange,
  EditDelta,
  EditorConfig,
  RenderConfig,
  ScreenPosition,
  ScrollAnchor,
  SelectionState,
  StyleChange,
  StyleIndexState,
  StyledRange,
  StyleSpan,
  StyleTag,
  StyleTarget,
  TextOutcome,
  TextPosition,
  TextRange,
  UndoRecord,
  WrapSegment,
} from '../../types/state.ts';
import type {
  Clipboard,
  EditBoundary,
  GlyphRun,
  StoreListener,
  TextSource,
  TextStore,
  Unsubscribe,
} from '../../types/store.ts';
import type { EditorCommand } from '../../types/actions.ts';
import { byteOffset } from '../../types/branded.ts';
import type { TextError } from '../../types/errors.ts';
import { invalidBoundary, invalidRange, isEmptyOperation, isTextError } from '../../types/errors.ts';
import { isByteRange } from '../../types/actions.ts';
import { createTextStore } from '../core/text-store.ts';
import { utf8Length } from '../core/encoding.ts';
import { byteRange, graphemeWindow, rangeToBytes } from '../core/position-codec.ts';
import { segmentGraphemes } from '../core/graphemes.ts';
import {
  applyEditToStyles,
  collectSpans,
  createStyleIndex,
  removeChangedSpans,
  restoreStyleChanges,
  styleIndexAdd,
  styleIndexRemove,
  styleIndexSet,
  styleMatch,
  stylesAt,
  stylesIn,
} from '../core/style-index.ts';
import {
  createInitialSelection,
  createSelection,
  isCollapsed,
  renderConfigOf,
  resolveConfig,
  selectionBounds,
  validateConfig,
} from '../core/state.ts';
import { createUndoEngine } from './undo.ts';
import { createLineMetricsCache } from './line-metrics.ts';
import type { LineMetricsStats } from './line-metrics.ts';
import { glyphsForLine, positionToScreen, screenToPosition } from './glyph-shaper.ts';
import {
  createContentChangeEvent,
  createEventEmitter,
  createHistoryChangeEvent,
  createSelectionChangeEvent,
  createStyleChangeEvent,
} from './events.ts';
import type { EditorEventMap, EventHandler } from './events.ts';
import {
  graphemesBefore,
  isWhiteSpace,
  isWordBoundary,
  nextWordEnd,
  nextWordStart,
  prevWordEnd,
  prevWordStart,
  wordEnd,
  wordStart,
} from './words.ts';

// =============================================================================
// Types
// =============================================================================

export interface EditorOptions extends Partial<EditorConfig> {
  /** Host clipboard; copy, cut and paste do nothing without one */
  readonly clipboard?: Clipboard | null;
  /** Clock for undo coalescing */
  readonly now?: () => number;
}

export interface TextEditor {
  // Commands
  dispatch(command: EditorCommand): TextOutcome;
  insertText(text: string, timestamp?: number): TextOutcome;
  insertAt(offset: ByteOffset, text: string, timestamp?: number): TextOutcome;
  deleteRange(range: ByteRange, timestamp?: number): TextOutcome;
  deleteSelection(timestamp?: number): TextOutcome;
  deletePrevGrapheme(timestamp?: number): TextOutcome;
  deleteNextGrapheme(timestamp?: number): TextOutcome;
  deleteNextWord(timestamp?: number): TextOutcome;
  deletePrevWord(timestamp?: number): TextOutcome;
  /** Indent the selected lines, or insert a tab at the cursor */
  insertTab(timestamp?: number): TextOutcome;
  /** Dedent the selected lines by up to tabWidth blanks */
  insertBacktab(timestamp?: number): TextOutcome;
  setText(text: string): TextOutcome;
  setCursor(position: TextPosition, extend?: boolean): TextOutcome;
  setSelection(range: TextRange): TextOutcome;
  selectAll(): TextOutcome;
  beginUndoSequence(): TextOutcome;
  endUndoSequence(): TextOutcome;
  undo(): TextOutcome;
  redo(): TextOutcome;
  addStyle(range: StyleTarget, tag: StyleTag): TextOutcome;
  removeStyle(range: StyleTarget, tag: StyleTag): TextOutcome;
  setStyles(spans: readonly StyledRange[]): TextOutcome;
  copy(): TextOutcome;
  cut(): TextOutcome;
  paste(): TextOutcome;
  setRenderConfig(config: Partial<RenderConfig>): TextOutcome;

  // Queries
  text(): string;
  /** Read-only view of the live document */
  readonly source: TextSource;
  selection(): SelectionState;
  cursor(): TextPosition;
  selectedText(): string;
  stylesIn(range: StyleTarget): StyleSpan[];
  stylesAt(offset: ByteOffset): StyleTag[];
  /** Range of the span tagged `tag` covering `offset`, or null */
  styleMatch(offset: ByteOffset, tag: StyleTag): ByteRange | null;
  styles(): StyleSpan[];
  nextWordStart(position: TextPosition): TextPosition;
  nextWordEnd(position: TextPosition): TextPosition;
  prevWordStart(position: TextPosition): TextPosition;
  prevWordEnd(position: TextPosition): TextPosition;
  isWordBoundary(position: TextPosition): boolean;
  wordStart(position: TextPosition): TextPosition;
  wordEnd(position: TextPosition): TextPosition;
  lineCount(): number;
  lineWidth(line: number): number;
  wrapSegments(line: number): readonly WrapSegment[];
  /** Glyphs of `line`; valid until the next edit */
  glyphs(line: number): GlyphRun;
  scrollAnchor(line: number, x: number): ScrollAnchor;
  positionToScreen(position: TextPosition): ScreenPosition;
  screenToPosition(line: number, screen: ScreenPosition): TextPosition;
  canUndo(): boolean;
  canRedo(): boolean;
  metricsStats(): LineMetricsStats;
  readonly renderConfig: RenderConfig;
  readonly kind: TextStore['kind'];
  /** Incremented on every content change */
  readonly version: number;
  readonly lastError: TextError | null;

  // Notifications
  subscribe(listener: StoreListener): Unsubscribe;
  addEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): Unsubscribe;
  removeEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): void;
}

interface DeleteOutcome {
  readonly removed: string;
  readonly delta: EditDelta;
  readonly changes: readonly StyleChange[];
}

// =============================================================================
// Selection Mapping
// =============================================================================

/**
 * Where an offset lands after an edit. Offsets at or after an insertion
 * point move with it; offsets inside a deleted range collapse to its start.
 */
export function mapOffset(offset: ByteOffset, delta: EditDelta): ByteOffset {
  if (delta.kind === 'insert') {
    return offset >= delta.offset ? byteOffset(offset + delta.insertedLength) : offset;
  }
  const end = delta.offset + delta.removedLength;
  if (offset <= delta.offset) return offset;
  return offset >= end ? byteOffset(offset - delta.removedLength) : delta.offset;
}

function mapSelection(selection: SelectionState, delta: EditDelta): SelectionState {
  return createSelection(mapOffset(selection.anchor, delta), mapOffset(selection.head, delta));
}

function sameSelection(a: SelectionState, b: SelectionState): boolean {
  return a.anchor === b.anchor && a.head === b.head;
}

// =============================================================================
// Editor
// =============================================================================

/**
 * Create an editor. The storage backend is chosen here from `expectedSize`
 * (or the initial content size) and kept for the editor's lifetime.
 *
 * @throws RangeError when the configuration is invalid
 */
export function createTextEditor(options: EditorOptions = {}): TextEditor {
  const { clipboard = null, now = Date.now, ...rest } = options;
  const config = resolveConfig(rest);
  const store = createTextStore(config.content, {
    expectedSize: config.expectedSize ?? undefined,
    flatThreshold: config.flatThreshold,
  });
  const undoEngine = createUndoEngine({ limit: config.undoLimit, coalesceTimeout: config.coalesceTimeout });
  const cache = createLineMetricsCache();
  const emitter = createEventEmitter();
  const listeners = new Set<StoreListener>();

  let render = renderConfigOf(config);
  let styles: StyleIndexState = createStyleIndex();
  let selection = createInitialSelection();
  let version = 0;
  let lastError: TextError | null = null;

  // ---------------------------------------------------------------------------
  // Notification
  // ---------------------------------------------------------------------------

  function notifyListeners(): void {
    for (const listener of [...listeners]) {
      try {
        listener();
      } catch (error) {
        console.error('Editor listener error:', error);
      }
    }
  }

  function moveSelection(next: SelectionState): void {
    if (sameSelection(selection, next)) return;
    const previous = selection;
    selection = next;
    emitter.emit('selection-change', createSelectionChangeEvent(previous, next));
  }

  // ---------------------------------------------------------------------------
  // Primitive edits (no undo bookkeeping)
  // ---------------------------------------------------------------------------

  function afterEdit(delta: EditDelta): void {
    cache.applyEdit(delta);
    version++;
    emitter.emit('content-change', createContentChangeEvent(delta));
  }

  function rawInsert(offset: ByteOffset, text: string, boundary: EditBoundary = 'grapheme'): EditDelta | null {
    const result = store.insert(offset, text, boundary);
    if (isEmptyOperation(result)) return null;
    styles = applyEditToStyles(styles, result).state;
    afterEdit(result);
    return result;
  }

  function rawDelete(range: ByteRange, boundary: EditBoundary = 'grapheme'): DeleteOutcome | null {
    const result = store.delete(range, boundary);
    if (isEmptyOperation(result)) return null;
    const edited = applyEditToStyles(styles, result.delta);
    styles = edited.state;
    afterEdit(result.delta);
    return { removed: result.removed, delta: result.delta, changes: edited.changes };
  }

  // Replays restore exact bytes; an edit may have merged clusters across
  // its ends, so only code-point boundaries are required.
  const replayer = {
    apply(record: UndoRecord): void {
      if (record.type === 'insert') {
        rawInsert(record.offset, record.text, 'code-point');
      } else {
        rawDelete(byteRange(record.offset, record.offset + record.byteLength), 'code-point');
      }
    },
    revert(record: UndoRecord): void {
      if (record.type === 'insert') {
        rawDelete(byteRange(record.offset, record.offset + record.byteLength), 'code-point');
        return;
      }
      styles = removeChangedSpans(styles, record.styles);
      rawInsert(record.offset, record.text, 'code-point');
      styles = restoreStyleChanges(styles, record.styles);
    },
  };

  /**
   * First grapheme boundary at or after `offset`. Text inserted or removed
   * next to a cluster can merge it with its neighbour.
   */
  function boundaryAtOrAfter(offset: ByteOffset): ByteOffset {
    if (store.isBoundary(offset)) return offset;
    const line = store.lineAt(offset);
    const content = store.lineContent(line);
    if (offset >= content.end) return store.lineBytes(line).end;
    const { start } = graphemeWindow(store, content, store.alignOffset(offset, true), 0);
    for (const grapheme of store.graphemes(byteRange(start, content.end))) {
      if (grapheme.range.start >= offset) return grapheme.range.start;
      if (grapheme.range.end >= offset) return grapheme.range.end;
    }
    return content.end;
  }

  function snapSelection(next: SelectionState): SelectionState {
    const anchor = boundaryAtOrAfter(next.anchor);
    const head = boundaryAtOrAfter(next.head);
    return anchor === next.anchor && head === next.head ? next : createSelection(anchor, head);
  }

  // ---------------------------------------------------------------------------
  // Recorded edits
  // ---------------------------------------------------------------------------

  function recordedInsert(offset: ByteOffset, text: string, after: SelectionState | null, timestamp: number): boolean {
    const before = selection;
    const delta = rawInsert(offset, text);
    if (delta === null) return false;
    const selectionAfter = snapSelection(after ?? mapSelection(before, delta));
    undoEngine.record(Object.freeze({
      type: 'insert',
      offset,
      text,
      byteLength: delta.insertedLength,
      selectionBefore: before,
      selectionAfter,
      timestamp,
    }));
    moveSelection(selectionAfter);
    return true;
  }

  function recordedDelete(range: ByteRange, after: SelectionState | null, timestamp: number): boolean {
    const before = selection;
    const result = rawDelete(range);
    if (result === null) return false;
    const selectionAfter = snapSelection(after ?? mapSelection(before, result.delta));
    undoEngine.record(Object.freeze({
      type: 'delete',
      offset: range.start,
      text: result.removed,
      byteLength: result.delta.removedLength,
      styles: result.changes,
      selectionBefore: before,
      selectionAfter,
      timestamp,
    }));
    moveSelection(selectionAfter);
    return true;
  }

  /**
   * Run a command at the widget boundary: a TextError leaves the document
   * as it was and becomes `lastError`.
   */
  function run(name: string, command: () => TextOutcome): TextOutcome {
    let outcome: TextOutcome;
    try {
      outcome = command();
    } catch (error) {
      if (!isTextError(error)) throw error;
      lastError = error;
      console.warn(`${name} rejected: ${error.message}`);
      return 'unchanged';
    }
    lastError = null;
    if (outcome !== 'unchanged') notifyListeners();
    return outcome;
  }

  function grouped<T>(body: () => T): T {
    undoEngine.beginGroup(selection);
    try {
      return body();
    } finally {
      undoEngine.endGroup(selection);
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  function checkBounds(range: ByteRange): ByteRange {
    if (range.end < range.start) throw invalidRange(range.start, range.end);
    if (range.end > store.lenBytes()) {
      throw invalidBoundary(`Range [${range.start}, ${range.end}) exceeds the document`, {
        start: range.start,
        end: range.end,
        lenBytes: store.lenBytes(),
      });
    }
    return range;
  }

  function resolveTarget(target: StyleTarget): ByteRange {
    return checkBounds(isByteRange(target) ? target : rangeToBytes(store, target));
  }

  function previousGrapheme(offset: ByteOffset): ByteRange | null {
    if (offset === 0) return null;
    const line = store.lineAt(offset);
    const lineStart = store.lineStart(line);
    if (offset === lineStart) {
      return byteRange(store.lineContent(line - 1).end, offset);
    }
    const window = graphemeWindow(store, byteRange(lineStart, store.lineContent(line).end), offset, 0);
    let last = 0;
    let index = 0;
    for (const segment of segmentGraphemes(window.text)) {
      last = index;
      index += segment.length;
    }
    return byteRange(window.start + utf8Length(window.text, 0, last), offset);
  }

  function nextGrapheme(offset: ByteOffset): ByteRange | null {
    if (offset === store.lenBytes()) return null;
    const line = store.lineAt(offset);
    const cursor = store.graphemes(byteRange(offset, store.lineBytes(line).end)).cursor();
    const first = cursor.next();
    return first.done ? null : first.value.range;
  }

  // ---------------------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------------------

  function deleteSelectionNow(timestamp: number): boolean {
    if (isCollapsed(selection)) return false;
    const { start, end } = selectionBounds(selection);
    return recordedDelete(byteRange(start, end), createSelection(start), timestamp);
  }

  function insertText(text: string, timestamp: number = now()): TextOutcome {
    return run('insertText', () => {
      if (isCollapsed(selection)) {
        const at = selection.head;
        const caret = createSelection(byteOffset(at + utf8Length(text)));
        return recordedInsert(at, text, caret, timestamp) ? 'text-changed' : 'unchanged';
      }
      const changed = grouped(() => {
        const { start } = selectionBounds(selection);
        const deleted = deleteSelectionNow(timestamp);
        const inserted = text.length > 0 && recordedInsert(start, text, null, timestamp);
        return deleted || inserted;
      });
      return changed ? 'text-changed' : 'unchanged';
    });
  }

  function insertAt(offset: ByteOffset, text: string, timestamp: number = now()): TextOutcome {
    return run('insertAt', () => (recordedInsert(offset, text, null, timestamp) ? 'text-changed' : 'unchanged'));
  }

  function deleteRange(range: ByteRange, timestamp: number = now()): TextOutcome {
    return run('deleteRange', () => (recordedDelete(range, null, timestamp) ? 'text-changed' : 'unchanged'));
  }

  function deleteSelection(timestamp: number = now()): TextOutcome {
    return run('deleteSelection', () => (deleteSelectionNow(timestamp) ? 'text-changed' : 'unchanged'));
  }

  function deleteGrapheme(name: string, forward: boolean, timestamp: number): TextOutcome {
    return run(name, () => {
      if (!isCollapsed(selection)) return deleteSelectionNow(timestamp) ? 'text-changed' : 'unchanged';
      const caret = selection.head;
      const range = forward ? nextGrapheme(caret) : previousGrapheme(caret);
      if (range === null) return 'unchanged';
      return recordedDelete(range, createSelection(range.start), timestamp) ? 'text-changed' : 'unchanged';
    });
  }

  function nextWordRange(caret: ByteOffset): ByteRange {
    const start = nextWordStart(store, caret);
    return byteRange(caret, start > caret ? start : nextWordEnd(store, caret));
  }

  function prevWordRange(caret: ByteOffset): ByteRange {
    const lineStart = store.lineStart(store.lineAt(caret));
    if (caret > lineStart && onlyWhiteSpaceSince(lineStart, caret)) {
      return byteRange(lineStart, caret);
    }
    const end = prevWordEnd(store, caret);
    return byteRange(end !== caret ? end : prevWordStart(store, caret), caret);
  }

  function onlyWhiteSpaceSince(lineStart: ByteOffset, caret: ByteOffset): boolean {
    for (const grapheme of graphemesBefore(store, caret)) {
      if (grapheme.range.end <= lineStart) break;
      if (!isWhiteSpace(grapheme)) return false;
    }
    return true;
  }

  function deleteWord(name: string, forward: boolean, timestamp: number): TextOutcome {
    return run(name, () => {
      if (!isCollapsed(selection)) return deleteSelectionNow(timestamp) ? 'text-changed' : 'unchanged';
      const range = forward ? nextWordRange(selection.head) : prevWordRange(selection.head);
      return recordedDelete(range, createSelection(range.start), timestamp) ? 'text-changed' : 'unchanged';
    });
  }

  function selectedLines(): { first: number; last: number } {
    const { start, end } = selectionBounds(selection);
    return { first: store.lineAt(start), last: store.lineAt(end) };
  }

  function indentLines(timestamp: number): boolean {
    const { first, last } = selectedLines();
    const indent = ' '.repeat(render.tabWidth);
    return grouped(() => {
      let changed = false;
      for (let line = first; line <= last; line++) {
        changed = recordedInsert(store.lineStart(line), indent, null, timestamp) || changed;
      }
      return changed;
    });
  }

  function dedentLines(timestamp: number): boolean {
    const { first, last } = selectedLines();
    return grouped(() => {
      let changed = false;
      for (let line = first; line <= last; line++) {
        const content = store.lineContent(line);
        let end: number = content.start;
        let taken = 0;
        for (const grapheme of store.graphemes(content)) {
          if (taken === render.tabWidth || (grapheme.text !== ' ' && grapheme.text !== '\t')) break;
          end = grapheme.range.end;
          taken++;
        }
        if (end > content.start) {
          changed = recordedDelete(byteRange(content.start, end), null, timestamp) || changed;
        }
      }
      return changed;
    });
  }

  function insertTab(timestamp: number = now()): TextOutcome {
    return run('insertTab', () => {
      if (!isCollapsed(selection)) return indentLines(timestamp) ? 'text-changed' : 'unchanged';
      const at = selection.head;
      const { column } = store.byteToPosition(at);
      const text = config.expandTabs ? ' '.repeat(render.tabWidth - (column % render.tabWidth)) : '\t';
      const caret = createSelection(byteOffset(at + text.length));
      return recordedInsert(at, text, caret, timestamp) ? 'text-changed' : 'unchanged';
    });
  }

  function insertBacktab(timestamp: number = now()): TextOutcome {
    return run('insertBacktab', () => {
      if (isCollapsed(selection)) return 'unchanged';
      return dedentLines(timestamp) ? 'text-changed' : 'unchanged';
    });
  }

  /**
   * Apply a byte-offset word query to a logical position.
   */
  function wordQuery(find: (source: TextStore, offset: ByteOffset) => ByteOffset, position: TextPosition): TextPosition {
    return store.byteToPosition(find(store, store.positionToByte(position)));
  }

  function setText(text: string): TextOutcome {
    return run('setText', () => {
      const changed = store.text() !== text;
      if (changed) {
        rawDelete(byteRange(0, store.lenBytes()));
        rawInsert(byteOffset(0), text);
      }
      undoEngine.clear();
      styles = createStyleIndex();
      cache.clear();
      moveSelection(createInitialSelection());
      emitter.emit('style-change', createStyleChangeEvent(null));
      return changed ? 'text-changed' : 'changed';
    });
  }

  function select(next: SelectionState): TextOutcome {
    if (sameSelection(selection, next)) return 'unchanged';
    moveSelection(next);
    return 'changed';
  }

  function setCursor(position: TextPosition, extend: boolean = false): TextOutcome {
    return run('setCursor', () => {
      const head = store.positionToByte(position);
      return select(createSelection(extend ? selection.anchor : head, head));
    });
  }

  function setSelection(range: TextRange): TextOutcome {
    return run('setSelection', () => {
      const bytes = rangeToBytes(store, range);
      return select(createSelection(bytes.start, bytes.end));
    });
  }

  function selectAll(): TextOutcome {
    return run('selectAll', () => select(createSelection(byteOffset(0), byteOffset(store.lenBytes()))));
  }

  function history(direction: 'undo' | 'redo'): TextOutcome {
    return run(direction, () => {
      const restored = direction === 'undo' ? undoEngine.undo(replayer) : undoEngine.redo(replayer);
      if (restored === null) return 'unchanged';
      const next = snapSelection(restored);
      moveSelection(next);
      emitter.emit('history-change', createHistoryChangeEvent(direction, next));
      return 'text-changed';
    });
  }

  function updateStyles(name: string, change: () => { next: StyleIndexState; range: ByteRange | null }): TextOutcome {
    return run(name, () => {
      const { next, range } = change();
      if (next === styles) return 'unchanged';
      styles = next;
      emitter.emit('style-change', createStyleChangeEvent(range));
      return 'changed';
    });
  }

  function addStyle(target: StyleTarget, tag: StyleTag): TextOutcome {
    return updateStyles('addStyle', () => {
      const range = resolveTarget(target);
      return { next: styleIndexAdd(styles, range, tag), range };
    });
  }

  function removeStyle(target: StyleTarget, tag: StyleTag): TextOutcome {
    return updateStyles('removeStyle', () => {
      const range = resolveTarget(target);
      return { next: styleIndexRemove(styles, range, tag), range };
    });
  }

  function setStyles(spans: readonly StyledRange[]): TextOutcome {
    return updateStyles('setStyles', () => ({
      next: styleIndexSet(spans.map(span => ({ range: resolveTarget(span.range), tag: span.tag }))),
      range: null,
    }));
  }

  function selectedText(): string {
    const { start, end } = selectionBounds(selection);
    return store.slice(start, end);
  }

  function copy(): TextOutcome {
    if (clipboard === null || isCollapsed(selection)) return 'unchanged';
    clipboard.setText(selectedText());
    return 'unchanged';
  }

  function cut(): TextOutcome {
    if (clipboard === null || isCollapsed(selection)) return 'unchanged';
    clipboard.setText(selectedText());
    return deleteSelection();
  }

  function paste(): TextOutcome {
    if (clipboard === null) return 'unchanged';
    const text = clipboard.getText();
    if (text === null || text.length === 0) return 'unchanged';
    return insertText(text);
  }

  function setRenderConfig(partial: Partial<RenderConfig>): TextOutcome {
    const result = validateConfig(partial);
    if (!result.valid) {
      console.warn(`setRenderConfig ignored: ${result.errors.join('; ')}`);
      return 'unchanged';
    }
    const next = renderConfigOf({ ...render, ...partial });
    const same =
      next.wrapMode === render.wrapMode &&
      next.viewportWidth === render.viewportWidth &&
      next.tabWidth === render.tabWidth &&
      next.showControl === render.showControl &&
      next.showWrap === render.showWrap;
    if (same) return 'unchanged';
    render = next;
    notifyListeners();
    return 'changed';
  }

  function dispatch(command: EditorCommand): TextOutcome {
    switch (command.type) {
      case 'INSERT_TEXT':
        return insertText(command.text, command.timestamp);
      case 'INSERT_AT':
        return insertAt(command.offset, command.text, command.timestamp);
      case 'DELETE_RANGE':
        return deleteRange(command.range, command.timestamp);
      case 'DELETE_SELECTION':
        return deleteSelection(command.timestamp);
      case 'DELETE_PREV_GRAPHEME':
        return deleteGrapheme('deletePrevGrapheme', false, command.timestamp ?? now());
      case 'DELETE_NEXT_GRAPHEME':
        return deleteGrapheme('deleteNextGrapheme', true, command.timestamp ?? now());
      case 'DELETE_NEXT_WORD':
        return deleteWord('deleteNextWord', true, command.timestamp ?? now());
      case 'DELETE_PREV_WORD':
        return deleteWord('deletePrevWord', false, command.timestamp ?? now());
      case 'INSERT_TAB':
        return insertTab(command.timestamp);
      case 'INSERT_BACKTAB':
        return insertBacktab(command.timestamp);
      case 'SET_TEXT':
        return setText(command.text);
      case 'SET_CURSOR':
        return setCursor(command.position, command.extend);
      case 'SET_SELECTION':
        return setSelection(command.range);
      case 'SELECT_ALL':
        return selectAll();
      case 'BEGIN_UNDO_SEQUENCE':
        undoEngine.beginGroup(selection);
        return 'unchanged';
      case 'END_UNDO_SEQUENCE':
        undoEngine.endGroup(selection);
        return 'unchanged';
      case 'UNDO':
        return history('undo');
      case 'REDO':
        return history('redo');
      case 'ADD_STYLE':
        return addStyle(command.range, command.tag);
      case 'REMOVE_STYLE':
        return removeStyle(command.range, command.tag);
      case 'SET_STYLES':
        return setStyles(command.spans);
      case 'COPY':
        return copy();
      case 'CUT':
        return cut();
      case 'PASTE':
        return paste();
    }
  }

  // ---------------------------------------------------------------------------
  // Queries
  // ---------------------------------------------------------------------------

  function anchorsFor(line: number): readonly ScrollAnchor[] | undefined {
    return render.wrapMode === 'none' ? cache.scrollAnchors(store, line, render) : undefined;
  }

  return {
    dispatch,
    insertText,
    insertAt,
    deleteRange,
    deleteSelection,
    deletePrevGrapheme: (timestamp: number = now()) => deleteGrapheme('deletePrevGrapheme', false, timestamp),
    deleteNextGrapheme: (timestamp: number = now()) => deleteGrapheme('deleteNextGrapheme', true, timestamp),
    deleteNextWord: (timestamp: number = now()) => deleteWord('deleteNextWord', true, timestamp),
    deletePrevWord: (timestamp: number = now()) => deleteWord('deletePrevWord', false, timestamp),
    insertTab,
    insertBacktab,
    setText,
    setCursor,
    setSelection,
    selectAll,
    beginUndoSequence: () => dispatch({ type: 'BEGIN_UNDO_SEQUENCE' }),
    endUndoSequence: () => dispatch({ type: 'END_UNDO_SEQUENCE' }),
    undo: () => history('undo'),
    redo: () => history('redo'),
    addStyle,
    removeStyle,
    setStyles,
    copy,
    cut,
    paste,
    setRenderConfig,

    text: () => store.text(),
    source: store,
    selection: () => selection,
    cursor: () => store.byteToPosition(selection.head),
    selectedText,
    stylesIn: (target: StyleTarget) => stylesIn(styles, resolveTarget(target)),
    stylesAt: (offset: ByteOffset) => stylesAt(styles, offset),
    styleMatch: (offset: ByteOffset, tag: StyleTag) => styleMatch(styles, offset, tag),
    styles: () => collectSpans(styles),
    nextWordStart: (position: TextPosition) => wordQuery(nextWordStart, position),
    nextWordEnd: (position: TextPosition) => wordQuery(nextWordEnd, position),
    prevWordStart: (position: TextPosition) => wordQuery(prevWordStart, position),
    prevWordEnd: (position: TextPosition) => wordQuery(prevWordEnd, position),
    isWordBoundary: (position: TextPosition) => isWordBoundary(store, store.positionToByte(position)),
    wordStart: (position: TextPosition) => wordQuery(wordStart, position),
    wordEnd: (position: TextPosition) => wordQuery(wordEnd, position),
    lineCount: () => cache.lineCount(store),
    lineWidth: (line: number) => cache.lineWidth(store, line, render),
    wrapSegments: (line: number) => cache.wrapSegments(store, line, render),
    glyphs: (line: number) =>
      glyphsForLine(store, line, render, { segments: cache.wrapSegments(store, line, render), anchors: anchorsFor(line) }),
    scrollAnchor: (line: number, x: number) => cache.scrollAnchor(store, line, x, render),
    positionToScreen: (position: TextPosition) =>
      positionToScreen(store, position, render, cache.wrapSegments(store, position.line, render), anchorsFor(position.line)),
    screenToPosition: (line: number, screen: ScreenPosition) =>
      screenToPosition(store, line, screen, render, cache.wrapSegments(store, line, render), anchorsFor(line)),
    canUndo: () => undoEngine.remainingUndo() > 0,
    canRedo: () => undoEngine.remainingRedo() > 0,
    metricsStats: () => cache.stats(),
    get renderConfig() { return render; },
    kind: store.kind,
    get version() { return version; },
    get lastError() { return lastError; },

    subscribe(listener: StoreListener): Unsubscribe {
      listeners.add(listener);
      return () => {
        listeners.delete(listener);
      };
    },
    addEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): Unsubscribe {
      return emitter.addEventListener(type, handler);
    },
    removeEventListener<K extends keyof EditorEventMap>(type: K, handler: EventHandler<EditorEventMap[K]>): void {
      emitter.removeEventListener(type, handler);
    },
  };
}
