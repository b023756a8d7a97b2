/**
 * Store exports for the Weft text engine.
 */

// Editor
export { createTextEditor, mapOffset } from './features/editor.ts';
export type { EditorOptions, TextEditor } from './features/editor.ts';

// Command creators
export { EditorCommands } from './features/actions.ts';

// Configuration and selection
export {
  DEFAULT_CONFIG,
  validateConfig,
  resolveConfig,
  renderConfigOf,
  createSelection,
  createInitialSelection,
  isCollapsed,
  selectionBounds,
} from './core/state.ts';
export type { ConfigValidationResult } from './core/state.ts';

// Text storage
export {
  DEFAULT_FLAT_THRESHOLD,
  selectBackend,
  createTextStore,
  createTextStoreFromBuffer,
} from './core/text-store.ts';
export type { TextStoreOptions } from './core/text-store.ts';
export { createFlatBuffer } from './core/flat-buffer.ts';
export {
  MAX_CHUNK_LENGTH,
  createRopeState,
  createRopeBuffer,
  createRopeSource,
  ropeInsert,
  ropeDelete,
  ropeSlice,
  ropeText,
  ropeLength,
  ropeLineBreaks,
  ropeLineStart,
  ropeLineAt,
} from './core/rope.ts';

// Encoding and graphemes
export { utf8Length, byteToUtf16Index, countLineBreaks } from './core/encoding.ts';
export { segmentGraphemes, countGraphemes, isLineBreak, graphemeWidth } from './core/graphemes.ts';
export { createGraphemeCursor, createGraphemeSequence } from './core/grapheme-cursor.ts';

// Position codec
export {
  MAX_TEXT_RANGE,
  isMaxRange,
  byteRange,
  comparePositions,
  lineBytes,
  lineContentRange,
  lineText,
  lineGraphemeCount,
  isGraphemeBoundary,
  byteToPosition,
  positionToByte,
  rangeToBytes,
  bytesToRange,
} from './core/position-codec.ts';

// Style index
export {
  createStyleIndex,
  styleIndexAdd,
  styleIndexRemove,
  styleIndexSet,
  styleCount,
  stylesIn,
  stylesAt,
  collectSpans,
  applyEditToStyles,
  removeChangedSpans,
  restoreStyleChanges,
} from './core/style-index.ts';
export type { StyleEditResult } from './core/style-index.ts';

// Undo
export { DEFAULT_UNDO_CONFIG, createUndoEngine } from './features/undo.ts';

// Glyph shaping
export {
  SOFT_HYPHEN,
  ZERO_WIDTH_SPACE,
  TAB_PICTURE,
  LINE_BREAK_PICTURE,
  WRAP_PICTURE,
  REPLACEMENT_CHARACTER,
  DEFAULT_RENDER_CONFIG,
  remapGrapheme,
  displayWidth,
  computeWrapSegments,
  lineDisplayWidth,
  computeScrollAnchors,
  glyphsForLine,
  positionToScreen,
  screenToPosition,
  findScreenColumn,
} from './features/glyph-shaper.ts';
export type { ShapedGrapheme } from './features/glyph-shaper.ts';

// Line metrics
export { createLineMetricsCache, renderKey } from './features/line-metrics.ts';
export type { LineMetricsCache, LineMetricsStats, LineRange } from './features/line-metrics.ts';

// Events
export {
  createEventEmitter,
  createContentChangeEvent,
  createSelectionChangeEvent,
  createHistoryChangeEvent,
  createStyleChangeEvent,
} from './features/events.ts';
export type {
  EditorEvent,
  ContentChangeEvent,
  SelectionChangeEvent,
  HistoryChangeEvent,
  StyleChangeEvent,
  AnyEditorEvent,
  EditorEventMap,
  EventHandler,
  EditorEventEmitter,
} from './features/events.ts';

// Rendering
export { getVisibleRows, screenCellToPosition } from './features/rendering.ts';
export type {
  RenderSource,
  ScrollPosition,
  Viewport,
  VisibleRow,
  VisibleRowsResult,
  ScreenCell,
} from './features/rendering.ts';
